import config from '../../config.js';
import { createError } from '../../errors.js';
import logger from '../../logger.js';
import { OperationContext } from '../../staking/context.js';
import { logTransactionEvent } from '../../utils/event-logger.js';
import { StakingStakeData, parseAssetBatch } from './staking-interfaces.js';

export function parseData(raw: unknown): StakingStakeData {
    return parseAssetBatch(raw);
}

export async function validateTx(data: StakingStakeData, sender: string, ctx: OperationContext): Promise<void> {
    if (ctx.pause.isPaused()) {
        throw createError('PAUSED');
    }
    if (data.assetIds.length === 0) {
        throw createError('EMPTY_INPUT');
    }
    if (data.assetIds.length > config.maxBatchSize) {
        throw createError('INVALID_INPUT', `At most ${config.maxBatchSize} assets per batch`);
    }
    logger.trace(`[staking-stake] ${sender} staking ${data.assetIds.length} assets`);
}

/**
 * Settles once at the pre-batch stake count, then moves each asset into the vault before
 * recording it, so a failed transfer leaves no custody record for that asset.
 */
export async function processTx(data: StakingStakeData, sender: string, ctx: OperationContext, now: number, id: string): Promise<void> {
    const settled = ctx.ledger.settle(sender, now);

    for (const assetId of data.assetIds) {
        try {
            await ctx.assetTransfer.transferCustody(sender, ctx.vaultAccount, assetId);
        } catch (error) {
            throw createError('EXTERNAL_TRANSFER_FAILED', `Custody transfer of ${assetId} from ${sender} failed: ${error instanceof Error ? error.message : String(error)}`, { assetId });
        }
        ctx.custody.recordDeposit(assetId, sender, now);
        ctx.ledger.addAssets(sender, [assetId], now);
    }

    logTransactionEvent(ctx, 'staking', 'staked', sender, { depositor: sender, assetIds: data.assetIds, settledReward: settled.toString() }, now, id);
    logger.debug(`[staking-stake] ${sender} staked ${data.assetIds.join(',')} at ${now}, settled ${settled}.`);
}
