import config from '../../config.js';
import { createError } from '../../errors.js';
import validate from '../../validation/index.js';

export interface StakingStakeData {
    assetIds: string[];
}

export interface StakingUnstakeData {
    assetIds: string[];
}

export type StakingClaimRewardsData = Record<string, never>;

/**
 * Shape check shared by stake and unstake. An empty array passes here and is rejected
 * as EmptyInput by validateTx.
 */
export function parseAssetBatch(data: unknown): { assetIds: string[] } {
    if (!validate.object(data) || !Array.isArray(data.assetIds)) {
        throw createError('INVALID_INPUT', 'assetIds must be an array of asset ids');
    }
    const candidates: unknown[] = data.assetIds;
    const assetIds: string[] = [];
    for (const id of candidates) {
        if (!validate.string(id, config.assetIdMaxLength, 1)) {
            throw createError('INVALID_INPUT', `Invalid asset id ${JSON.stringify(id)}`);
        }
        assetIds.push(id);
    }
    return { assetIds };
}

export function parseEmpty(data: unknown): Record<string, never> {
    if (data !== undefined && data !== null && !validate.object(data)) {
        throw createError('INVALID_INPUT', 'Transaction data must be an object');
    }
    return {};
}
