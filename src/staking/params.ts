import { StateCache } from '../cache.js';
import { createError } from '../errors.js';
import logger from '../logger.js';
import { PARAMS_ID, ParamsDoc } from '../models/index.js';
import { toBigInt, toDbString } from '../utils/bigint.js';
import { PauseSwitch, StakingParams } from './interfaces.js';

export interface GenesisParams {
    rewardRatePerUnitTime: bigint;
    claimDelay: number;
}

/**
 * Global parameters and the pause flag, kept as one document in the `state` collection
 * so that a rolled-back operation also restores them.
 */
export class ParamsStore implements PauseSwitch {
    constructor(private readonly cache: StateCache) {}

    /** Writes the parameters document if the store has none yet. */
    ensureGenesis(genesis: GenesisParams): boolean {
        if (this.cache.findOne('state', PARAMS_ID)) return false;
        this.cache.insertOne('state', {
            _id: PARAMS_ID,
            rewardRatePerUnitTime: toDbString(genesis.rewardRatePerUnitTime),
            claimDelay: genesis.claimDelay,
            paused: false,
            lastUpdatedAt: new Date().toISOString(),
        });
        logger.info(`[params] Genesis parameters written: rate=${genesis.rewardRatePerUnitTime}, claimDelay=${genesis.claimDelay}`);
        return true;
    }

    private doc(): ParamsDoc {
        const doc = this.cache.findOne('state', PARAMS_ID);
        if (!doc) {
            throw createError('INVARIANT_VIOLATION', 'Global parameters are missing from the state store');
        }
        return doc;
    }

    get(): StakingParams {
        const doc = this.doc();
        return {
            rewardRatePerUnitTime: toBigInt(doc.rewardRatePerUnitTime),
            claimDelay: doc.claimDelay,
            paused: doc.paused,
        };
    }

    rewardRate(): bigint {
        return toBigInt(this.doc().rewardRatePerUnitTime);
    }

    claimDelay(): number {
        return this.doc().claimDelay;
    }

    setRewardRate(rate: bigint): void {
        this.doc();
        this.cache.updateOne('state', PARAMS_ID, {
            rewardRatePerUnitTime: toDbString(rate),
            lastUpdatedAt: new Date().toISOString(),
        });
    }

    setClaimDelay(delay: number): void {
        this.doc();
        this.cache.updateOne('state', PARAMS_ID, { claimDelay: delay, lastUpdatedAt: new Date().toISOString() });
    }

    isPaused(): boolean {
        return this.doc().paused;
    }

    setPaused(paused: boolean): void {
        this.doc();
        this.cache.updateOne('state', PARAMS_ID, { paused, lastUpdatedAt: new Date().toISOString() });
    }
}
