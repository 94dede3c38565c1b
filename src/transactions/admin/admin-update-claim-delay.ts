import logger from '../../logger.js';
import { OperationContext } from '../../staking/context.js';
import { logTransactionEvent } from '../../utils/event-logger.js';
import { AdminUpdateClaimDelayData, parseClaimDelay, requireAdministrator } from './admin-interfaces.js';

export function parseData(raw: unknown): AdminUpdateClaimDelayData {
    return parseClaimDelay(raw);
}

export async function validateTx(_data: AdminUpdateClaimDelayData, sender: string, ctx: OperationContext): Promise<void> {
    requireAdministrator(ctx, sender, 'admin-update-claim-delay');
}

export async function processTx(data: AdminUpdateClaimDelayData, sender: string, ctx: OperationContext, now: number, id: string): Promise<void> {
    const previousDelay = ctx.params.claimDelay();
    ctx.params.setClaimDelay(data.claimDelay);
    logTransactionEvent(ctx, 'admin', 'claim_delay_updated', sender, { previousDelay, claimDelay: data.claimDelay }, now, id);
    logger.info(`[admin-update-claim-delay] Claim delay ${previousDelay} -> ${data.claimDelay} by ${sender}.`);
}
