import { StateCache } from '../cache.js';

// Written on unstake for downstream consumers; no operation gates on it.
export class UnbondingTracker {
    constructor(private readonly cache: StateCache) {}

    markInitiated(assetId: string, now: number): void {
        if (!this.cache.updateOne('unbonding', assetId, { initiatedAt: now })) {
            this.cache.insertOne('unbonding', { _id: assetId, initiatedAt: now });
        }
    }

    initiatedAt(assetId: string): number | null {
        return this.cache.findOne('unbonding', assetId)?.initiatedAt ?? null;
    }
}
