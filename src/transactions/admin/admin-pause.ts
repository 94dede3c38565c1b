import logger from '../../logger.js';
import { OperationContext } from '../../staking/context.js';
import { parseEmpty } from '../staking/staking-interfaces.js';
import { logTransactionEvent } from '../../utils/event-logger.js';
import { AdminPauseData, requireAdministrator } from './admin-interfaces.js';

export function parseData(raw: unknown): AdminPauseData {
    return parseEmpty(raw);
}

export async function validateTx(_data: AdminPauseData, sender: string, ctx: OperationContext): Promise<void> {
    requireAdministrator(ctx, sender, 'admin-pause');
}

// Pausing an already paused ledger succeeds and emits the event again.
export async function processTx(_data: AdminPauseData, sender: string, ctx: OperationContext, now: number, id: string): Promise<void> {
    ctx.pause.setPaused(true);
    logTransactionEvent(ctx, 'admin', 'paused', sender, { paused: true }, now, id);
    logger.info(`[admin-pause] Staking paused by ${sender}.`);
}
