import config from '../../config.js';
import { createError } from '../../errors.js';
import logger from '../../logger.js';
import { OperationContext } from '../../staking/context.js';
import { logTransactionEvent } from '../../utils/event-logger.js';
import { StakingUnstakeData, parseAssetBatch } from './staking-interfaces.js';

export function parseData(raw: unknown): StakingUnstakeData {
    return parseAssetBatch(raw);
}

export async function validateTx(data: StakingUnstakeData, sender: string, ctx: OperationContext): Promise<void> {
    if (ctx.pause.isPaused()) {
        throw createError('PAUSED');
    }
    if (data.assetIds.length === 0) {
        throw createError('EMPTY_INPUT');
    }
    if (data.assetIds.length > config.maxBatchSize) {
        throw createError('INVALID_INPUT', `At most ${config.maxBatchSize} assets per batch`);
    }
    for (const assetId of data.assetIds) {
        const owner = ctx.custody.ownerOf(assetId);
        if (owner !== sender) {
            logger.warn(`[staking-unstake] ${sender} does not own ${assetId} (custody: ${owner ?? 'none'}).`);
            throw createError('NOT_OWNER', `Asset ${assetId} is not staked by ${sender}`, { assetId });
        }
    }
}

/**
 * The whole batch is priced by one settle at the pre-withdrawal count. Each asset is then
 * released from every internal ledger before it leaves the vault.
 */
export async function processTx(data: StakingUnstakeData, sender: string, ctx: OperationContext, now: number, id: string): Promise<void> {
    const settled = ctx.ledger.settle(sender, now);

    for (const assetId of data.assetIds) {
        if (!ctx.custody.releaseIfOwner(assetId, sender)) {
            throw createError('NOT_OWNER', `Asset ${assetId} is not staked by ${sender}`, { assetId });
        }
        ctx.unbonding.markInitiated(assetId, now);
        ctx.ledger.removeAsset(sender, assetId);
        try {
            await ctx.assetTransfer.transferCustody(ctx.vaultAccount, sender, assetId);
        } catch (error) {
            throw createError('EXTERNAL_TRANSFER_FAILED', `Custody transfer of ${assetId} to ${sender} failed: ${error instanceof Error ? error.message : String(error)}`, { assetId });
        }
    }

    logTransactionEvent(ctx, 'staking', 'unstaked', sender, { depositor: sender, assetIds: data.assetIds, settledReward: settled.toString() }, now, id);
    logger.debug(`[staking-unstake] ${sender} unstaked ${data.assetIds.join(',')} at ${now}, settled ${settled}.`);
}
