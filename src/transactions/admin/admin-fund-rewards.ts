import { createError } from '../../errors.js';
import logger from '../../logger.js';
import { OperationContext } from '../../staking/context.js';
import { formatTokenAmount, toBigInt } from '../../utils/bigint.js';
import { logTransactionEvent } from '../../utils/event-logger.js';
import { AdminFundRewardsData, parseFundRewards, requireAdministrator } from './admin-interfaces.js';

export function parseData(raw: unknown): AdminFundRewardsData {
    return parseFundRewards(raw);
}

export async function validateTx(_data: AdminFundRewardsData, sender: string, ctx: OperationContext): Promise<void> {
    requireAdministrator(ctx, sender, 'admin-fund-rewards');
}

/** Credits the reward pool account; the amount is newly issued. */
export async function processTx(data: AdminFundRewardsData, sender: string, ctx: OperationContext, now: number, id: string): Promise<void> {
    const amount = toBigInt(data.amount);
    const poolAccount = ctx.rewardToken.poolAccount;
    if (!ctx.rewardToken.adjustBalance(poolAccount, amount)) {
        throw createError('INVARIANT_VIOLATION', `Crediting ${amount} to ${poolAccount} failed`);
    }
    const poolBalance = ctx.rewardToken.poolBalance;
    logTransactionEvent(ctx, 'admin', 'rewards_funded', sender, { amount: amount.toString(), poolBalance: poolBalance.toString() }, now, id);
    logger.info(`[admin-fund-rewards] ${sender} funded ${formatTokenAmount(amount)} to ${poolAccount}, balance ${formatTokenAmount(poolBalance)}.`);
}
