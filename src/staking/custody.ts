import { StateCache } from '../cache.js';
import { createError } from '../errors.js';
import logger from '../logger.js';

/**
 * Asset id to depositor, present only while the asset sits in the vault.
 */
export class AssetCustodyLedger {
    constructor(private readonly cache: StateCache) {}

    recordDeposit(assetId: string, depositor: string, now: number): void {
        const existing = this.cache.findOne('custody', assetId);
        if (existing && existing.depositor !== depositor) {
            throw createError('ALREADY_CUSTODIED', `Asset ${assetId} is already held for ${existing.depositor}`, { assetId });
        }
        if (existing) {
            logger.warn(`[custody] Asset ${assetId} already recorded for ${depositor}, refreshing deposit time.`);
            this.cache.updateOne('custody', assetId, { depositedAt: now });
            return;
        }
        this.cache.insertOne('custody', { _id: assetId, depositor, depositedAt: now });
    }

    /**
     * Clears the mapping when `depositor` is the recorded owner.
     * @returns false, without touching state, for any other caller
     */
    releaseIfOwner(assetId: string, depositor: string): boolean {
        const existing = this.cache.findOne('custody', assetId);
        if (!existing || existing.depositor !== depositor) return false;
        return this.cache.deleteOne('custody', assetId);
    }

    ownerOf(assetId: string): string | null {
        return this.cache.findOne('custody', assetId)?.depositor ?? null;
    }

    count(): number {
        return this.cache.count('custody');
    }
}
