import { createError } from '../../errors.js';
import logger from '../../logger.js';
import { OperationContext } from '../../staking/context.js';
import { logTransactionEvent } from '../../utils/event-logger.js';
import { StakingClaimRewardsData, parseEmpty } from './staking-interfaces.js';

export function parseData(raw: unknown): StakingClaimRewardsData {
    return parseEmpty(raw);
}

export async function validateTx(_data: StakingClaimRewardsData, sender: string, ctx: OperationContext, now: number): Promise<void> {
    if (ctx.pause.isPaused()) {
        throw createError('PAUSED');
    }
    // A depositor without a record counts from checkpoint 0
    const lastCheckpoint = ctx.ledger.get(sender)?.lastCheckpoint ?? 0;
    const claimDelay = ctx.params.claimDelay();
    if (now - lastCheckpoint < claimDelay) {
        throw createError('CLAIM_TOO_EARLY', `Claim allowed at ${lastCheckpoint + claimDelay}, now ${now}`, {
            lastCheckpoint,
            claimDelay,
        });
    }
}

export async function processTx(_data: StakingClaimRewardsData, sender: string, ctx: OperationContext, now: number, id: string): Promise<void> {
    ctx.ledger.settle(sender, now);
    const amount = ctx.ledger.drainPending(sender);

    let paid: boolean;
    try {
        paid = await ctx.rewardTransfer.transfer(sender, amount);
    } catch (error) {
        throw createError('EXTERNAL_TRANSFER_FAILED', `Reward transfer to ${sender} threw: ${error instanceof Error ? error.message : String(error)}`, { amount: amount.toString() });
    }
    if (!paid) {
        throw createError('EXTERNAL_TRANSFER_FAILED', `Reward transfer of ${amount} to ${sender} failed`, { amount: amount.toString() });
    }

    logTransactionEvent(ctx, 'staking', 'rewards_claimed', sender, { depositor: sender, amount: amount.toString() }, now, id);
    logger.debug(`[staking-claim-rewards] ${sender} claimed ${amount} at ${now}.`);
}
