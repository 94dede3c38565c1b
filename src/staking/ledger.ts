import { StateCache } from '../cache.js';
import { createError } from '../errors.js';
import logger from '../logger.js';
import { DepositorDoc } from '../models/index.js';
import { CheckedMath, toBigInt, toDbString } from '../utils/bigint.js';
import { DepositorRecord } from './interfaces.js';
import { RewardAccrualEngine } from './rewards.js';

function toRecord(doc: DepositorDoc): DepositorRecord {
    return {
        depositor: doc._id,
        stakedAssets: doc.stakedAssets,
        pendingReward: toBigInt(doc.pendingReward),
        lastCheckpoint: doc.lastCheckpoint,
    };
}

/**
 * Sole writer of depositor records. Every mutation of `stakedAssets` must be preceded by
 * settle() at the same `now` so that accrual is priced on the pre-mutation stake count.
 */
export class StakingLedger {
    constructor(
        private readonly cache: StateCache,
        private readonly engine: RewardAccrualEngine
    ) {}

    get(depositor: string): DepositorRecord | null {
        const doc = this.cache.findOne('depositors', depositor);
        return doc ? toRecord(doc) : null;
    }

    /**
     * Folds accrual since lastCheckpoint into pendingReward and moves the checkpoint to `now`.
     * @returns the amount folded in; 0n when the depositor has no record
     */
    settle(depositor: string, now: number): bigint {
        const doc = this.cache.findOne('depositors', depositor);
        if (!doc) return 0n;

        const accrued = this.engine.accrue(doc.stakedAssets.length, doc.lastCheckpoint, now);
        if (accrued === 0n && doc.lastCheckpoint === now) return 0n;

        const pending = CheckedMath.add(toBigInt(doc.pendingReward), accrued);
        this.cache.updateOne('depositors', depositor, {
            pendingReward: toDbString(pending),
            lastCheckpoint: now,
            lastUpdatedAt: new Date().toISOString(),
        });
        logger.debug(`[ledger] Settled ${depositor}: +${accrued} over ${now - doc.lastCheckpoint} with ${doc.stakedAssets.length} assets, pending=${pending}`);
        return accrued;
    }

    /**
     * Appends to stakedAssets, creating the record on first stake with its checkpoint at `now`.
     */
    addAssets(depositor: string, assetIds: string[], now: number): void {
        const doc = this.cache.findOne('depositors', depositor);
        if (!doc) {
            const timestamp = new Date().toISOString();
            this.cache.insertOne('depositors', {
                _id: depositor,
                stakedAssets: [...assetIds],
                pendingReward: toDbString(0n),
                lastCheckpoint: now,
                createdAt: timestamp,
                lastUpdatedAt: timestamp,
            });
            logger.debug(`[ledger] Created depositor record for ${depositor}.`);
            return;
        }
        if (doc.lastCheckpoint !== now) {
            throw createError('INVARIANT_VIOLATION', `Depositor ${depositor} must be settled at ${now} before adding assets`);
        }
        const duplicate = assetIds.find(id => doc.stakedAssets.includes(id));
        if (duplicate !== undefined) {
            throw createError('INVARIANT_VIOLATION', `Asset ${duplicate} is already staked by ${depositor}`);
        }
        this.cache.updateOne('depositors', depositor, {
            stakedAssets: [...doc.stakedAssets, ...assetIds],
            lastUpdatedAt: new Date().toISOString(),
        });
    }

    /**
     * Unordered removal: the last element takes the removed slot.
     */
    removeAsset(depositor: string, assetId: string): void {
        const doc = this.cache.findOne('depositors', depositor);
        const assets = doc ? doc.stakedAssets : [];
        const index = assets.indexOf(assetId);
        if (index === -1) {
            throw createError('NOT_FOUND', `Asset ${assetId} is not staked by ${depositor}`, { assetId });
        }
        const last = assets.length - 1;
        assets[index] = assets[last];
        assets.pop();
        this.cache.updateOne('depositors', depositor, { stakedAssets: assets, lastUpdatedAt: new Date().toISOString() });
    }

    /**
     * Zeros pendingReward.
     * @returns the value it held
     */
    drainPending(depositor: string): bigint {
        const doc = this.cache.findOne('depositors', depositor);
        if (!doc) return 0n;
        const pending = toBigInt(doc.pendingReward);
        this.cache.updateOne('depositors', depositor, { pendingReward: toDbString(0n), lastUpdatedAt: new Date().toISOString() });
        return pending;
    }

    /** Pending reward plus what settle() would add at `now`, without writing. */
    claimable(depositor: string, now: number): bigint {
        const doc = this.cache.findOne('depositors', depositor);
        if (!doc) return 0n;
        return CheckedMath.add(toBigInt(doc.pendingReward), this.engine.accrue(doc.stakedAssets.length, doc.lastCheckpoint, now));
    }

    /** Largest lastCheckpoint of any depositor, 0 when there are none. */
    latestCheckpoint(): number {
        return this.cache.find('depositors').reduce((latest, doc) => Math.max(latest, doc.lastCheckpoint), 0);
    }

    /** Sum of stakedAssets lengths across every depositor. */
    totalStaked(): number {
        return this.cache.find('depositors').reduce((total, doc) => total + doc.stakedAssets.length, 0);
    }
}
