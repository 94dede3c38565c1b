import logger from '../logger.js';
import { OperationContext } from '../staking/context.js';
import * as adminFundRewards from './admin/admin-fund-rewards.js';
import * as adminMintAsset from './admin/admin-mint-asset.js';
import * as adminPause from './admin/admin-pause.js';
import * as adminUnpause from './admin/admin-unpause.js';
import * as adminUpdateClaimDelay from './admin/admin-update-claim-delay.js';
import * as adminUpdateRewardRate from './admin/admin-update-reward-rate.js';
import * as stakingClaimRewards from './staking/staking-claim-rewards.js';
import * as stakingStake from './staking/staking-stake.js';
import * as stakingUnstake from './staking/staking-unstake.js';
import { TransactionType } from './types.js';

// Shape every module under transactions/<category>/ exports
interface TransactionModule<T> {
    parseData: (raw: unknown) => T;
    validateTx: (data: T, sender: string, ctx: OperationContext, now: number) => Promise<void>;
    processTx: (data: T, sender: string, ctx: OperationContext, now: number, id: string) => Promise<void>;
}

export interface TransactionHandler {
    name: string;
    execute: (raw: unknown, sender: string, ctx: OperationContext, now: number, id: string) => Promise<void>;
}

function handler<T>(type: TransactionType, module: TransactionModule<T>): TransactionHandler {
    const name = TransactionType[type].toLowerCase();
    return {
        name,
        async execute(raw, sender, ctx, now, id) {
            const data = module.parseData(raw);
            await module.validateTx(data, sender, ctx, now);
            logger.trace(`[transactions] ${name} from ${sender} validated`);
            await module.processTx(data, sender, ctx, now, id);
        },
    };
}

const transactionHandlers: { [key in TransactionType]: TransactionHandler } = {
    [TransactionType.STAKING_STAKE]: handler(TransactionType.STAKING_STAKE, stakingStake),
    [TransactionType.STAKING_UNSTAKE]: handler(TransactionType.STAKING_UNSTAKE, stakingUnstake),
    [TransactionType.STAKING_CLAIM_REWARDS]: handler(TransactionType.STAKING_CLAIM_REWARDS, stakingClaimRewards),
    [TransactionType.ADMIN_UPDATE_REWARD_RATE]: handler(TransactionType.ADMIN_UPDATE_REWARD_RATE, adminUpdateRewardRate),
    [TransactionType.ADMIN_UPDATE_CLAIM_DELAY]: handler(TransactionType.ADMIN_UPDATE_CLAIM_DELAY, adminUpdateClaimDelay),
    [TransactionType.ADMIN_PAUSE]: handler(TransactionType.ADMIN_PAUSE, adminPause),
    [TransactionType.ADMIN_UNPAUSE]: handler(TransactionType.ADMIN_UNPAUSE, adminUnpause),
    [TransactionType.ADMIN_MINT_ASSET]: handler(TransactionType.ADMIN_MINT_ASSET, adminMintAsset),
    [TransactionType.ADMIN_FUND_REWARDS]: handler(TransactionType.ADMIN_FUND_REWARDS, adminFundRewards),
};

function isTypeName(name: string): name is keyof typeof TransactionType {
    return name in TransactionType && Number.isNaN(Number(name));
}

/**
 * Accepts the numeric type or its name in either case ('staking_stake', 'STAKING_STAKE').
 */
export function resolveTransactionType(value: unknown): TransactionType | null {
    if (typeof value === 'number') {
        const match = Object.values(TransactionType).find(candidate => candidate === value);
        return typeof match === 'number' ? match : null;
    }
    if (typeof value === 'string') {
        const name = value.toUpperCase();
        return isTypeName(name) ? TransactionType[name] : null;
    }
    return null;
}

export { transactionHandlers };
