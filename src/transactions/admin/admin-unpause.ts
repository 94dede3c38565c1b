import logger from '../../logger.js';
import { OperationContext } from '../../staking/context.js';
import { parseEmpty } from '../staking/staking-interfaces.js';
import { logTransactionEvent } from '../../utils/event-logger.js';
import { AdminPauseData, requireAdministrator } from './admin-interfaces.js';

export function parseData(raw: unknown): AdminPauseData {
    return parseEmpty(raw);
}

export async function validateTx(_data: AdminPauseData, sender: string, ctx: OperationContext): Promise<void> {
    requireAdministrator(ctx, sender, 'admin-unpause');
}

export async function processTx(_data: AdminPauseData, sender: string, ctx: OperationContext, now: number, id: string): Promise<void> {
    ctx.pause.setPaused(false);
    logTransactionEvent(ctx, 'admin', 'unpaused', sender, { paused: false }, now, id);
    logger.info(`[admin-unpause] Staking resumed by ${sender}.`);
}
