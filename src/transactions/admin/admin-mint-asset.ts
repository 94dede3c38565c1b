import { createError } from '../../errors.js';
import logger from '../../logger.js';
import { OperationContext } from '../../staking/context.js';
import { logTransactionEvent } from '../../utils/event-logger.js';
import { AdminMintAssetData, parseMintAsset, requireAdministrator } from './admin-interfaces.js';

export function parseData(raw: unknown): AdminMintAssetData {
    return parseMintAsset(raw);
}

export async function validateTx(data: AdminMintAssetData, sender: string, ctx: OperationContext): Promise<void> {
    requireAdministrator(ctx, sender, 'admin-mint-asset');
    if (ctx.registry.get(data.assetId)) {
        throw createError('ALREADY_EXISTS', `Asset ${data.assetId} already exists`, { assetId: data.assetId });
    }
}

export async function processTx(data: AdminMintAssetData, sender: string, ctx: OperationContext, now: number, id: string): Promise<void> {
    ctx.registry.mint(data.assetId, data.owner);
    logTransactionEvent(ctx, 'admin', 'asset_minted', sender, { assetId: data.assetId, owner: data.owner }, now, id);
    logger.debug(`[admin-mint-asset] ${data.assetId} minted to ${data.owner} by ${sender}.`);
}
