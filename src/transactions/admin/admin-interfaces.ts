import config from '../../config.js';
import { createError } from '../../errors.js';
import logger from '../../logger.js';
import { OperationContext } from '../../staking/context.js';
import validate from '../../validation/index.js';

export interface AdminUpdateRewardRateData {
    rewardRate: string; // non-negative integer string
}

export interface AdminUpdateClaimDelayData {
    claimDelay: number;
}

export type AdminPauseData = Record<string, never>;

export interface AdminMintAssetData {
    assetId: string;
    owner: string;
}

export interface AdminFundRewardsData {
    amount: string; // positive integer string, raw units
}

export function requireAdministrator(ctx: OperationContext, sender: string, tag: string): void {
    if (!ctx.access.isAdministrator(sender)) {
        logger.warn(`[${tag}] ${sender} is not an administrator.`);
        throw createError('UNAUTHORIZED');
    }
}

export function parseRewardRate(raw: unknown): AdminUpdateRewardRateData {
    if (!validate.object(raw) || !validate.bigint(raw.rewardRate, true, false)) {
        throw createError('INVALID_INPUT', `rewardRate must be a non-negative integer string up to ${config.maxValue}`);
    }
    return { rewardRate: raw.rewardRate.toString() };
}

export function parseClaimDelay(raw: unknown): AdminUpdateClaimDelayData {
    if (!validate.object(raw) || !validate.integer(raw.claimDelay, true)) {
        throw createError('INVALID_INPUT', 'claimDelay must be a non-negative safe integer');
    }
    return { claimDelay: raw.claimDelay };
}

export function parseMintAsset(raw: unknown): AdminMintAssetData {
    if (!validate.object(raw) || !validate.string(raw.assetId, config.assetIdMaxLength, 1)) {
        throw createError('INVALID_INPUT', `assetId must be a string of 1 to ${config.assetIdMaxLength} characters`);
    }
    if (!validate.accountName(raw.owner)) {
        throw createError('INVALID_INPUT', 'owner must be a valid account name');
    }
    return { assetId: raw.assetId, owner: raw.owner };
}

export function parseFundRewards(raw: unknown): AdminFundRewardsData {
    if (!validate.object(raw) || !validate.bigint(raw.amount, false, false)) {
        throw createError('INVALID_INPUT', 'amount must be a positive integer string');
    }
    return { amount: raw.amount.toString() };
}
