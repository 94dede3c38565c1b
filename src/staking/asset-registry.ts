import { StateCache } from '../cache.js';
import { createError } from '../errors.js';
import logger from '../logger.js';
import { NftDoc } from '../models/index.js';
import { AssetCustodyTransfer } from './interfaces.js';

/**
 * Holder of record for every minted asset. Stakes and unstakes move assets between the
 * depositor and the vault account through transferCustody().
 */
export class AssetRegistry implements AssetCustodyTransfer {
    constructor(private readonly cache: StateCache) {}

    get(assetId: string): NftDoc | null {
        return this.cache.findOne('nfts', assetId);
    }

    holderOf(assetId: string): string | null {
        return this.get(assetId)?.owner ?? null;
    }

    mint(assetId: string, owner: string): NftDoc {
        const timestamp = new Date().toISOString();
        const doc: NftDoc = { _id: assetId, owner, mintedAt: timestamp, lastTransferredAt: timestamp };
        if (!this.cache.insertOne('nfts', doc)) {
            throw createError('ALREADY_EXISTS', `Asset ${assetId} already exists`, { assetId });
        }
        logger.debug(`[asset-registry] Minted ${assetId} to ${owner}.`);
        return doc;
    }

    async transferCustody(from: string, to: string, assetId: string): Promise<void> {
        const asset = this.get(assetId);
        if (!asset) {
            throw new Error(`Asset ${assetId} does not exist`);
        }
        if (asset.owner !== from) {
            throw new Error(`Asset ${assetId} is held by ${asset.owner}, not ${from}`);
        }
        this.cache.updateOne('nfts', assetId, { owner: to, lastTransferredAt: new Date().toISOString() });
        logger.trace(`[asset-registry] ${assetId}: ${from} -> ${to}`);
    }
}
