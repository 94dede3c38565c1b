import logger from '../../logger.js';
import { OperationContext } from '../../staking/context.js';
import { toBigInt } from '../../utils/bigint.js';
import { logTransactionEvent } from '../../utils/event-logger.js';
import { AdminUpdateRewardRateData, parseRewardRate, requireAdministrator } from './admin-interfaces.js';

export function parseData(raw: unknown): AdminUpdateRewardRateData {
    return parseRewardRate(raw);
}

export async function validateTx(_data: AdminUpdateRewardRateData, sender: string, ctx: OperationContext): Promise<void> {
    requireAdministrator(ctx, sender, 'admin-update-reward-rate');
}

/**
 * Prospective only: pending rewards already settled keep the old rate, and the next settle
 * of each depositor prices its whole open interval at the new one.
 */
export async function processTx(data: AdminUpdateRewardRateData, sender: string, ctx: OperationContext, now: number, id: string): Promise<void> {
    const previousRate = ctx.params.rewardRate();
    const rewardRate = toBigInt(data.rewardRate);
    ctx.params.setRewardRate(rewardRate);
    logTransactionEvent(ctx, 'admin', 'reward_rate_updated', sender, { previousRate: previousRate.toString(), rewardRate: rewardRate.toString() }, now, id);
    logger.info(`[admin-update-reward-rate] Reward rate ${previousRate} -> ${rewardRate} by ${sender}.`);
}
