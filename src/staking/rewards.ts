import { createError } from '../errors.js';
import { CheckedMath } from '../utils/bigint.js';

/**
 * stakeCount * rate * (now - lastCheckpoint), bounded by config.maxValue.
 */
export function computeAccrual(stakeCount: number, rate: bigint, lastCheckpoint: number, now: number): bigint {
    if (now < lastCheckpoint) {
        throw createError('INVARIANT_VIOLATION', `Clock went backwards: now=${now} < lastCheckpoint=${lastCheckpoint}`);
    }
    if (!Number.isSafeInteger(stakeCount) || stakeCount < 0) {
        throw createError('INVARIANT_VIOLATION', `Invalid stake count ${stakeCount}`);
    }
    return CheckedMath.mul(BigInt(stakeCount), rate, BigInt(now - lastCheckpoint));
}

export interface RateSource {
    rewardRate(): bigint;
}

/**
 * Prices accrual at the current global rate. The rate is read on every call, so a
 * change applies to every interval settled after it.
 */
export class RewardAccrualEngine {
    constructor(private readonly rates: RateSource) {}

    accrue(stakeCount: number, lastCheckpoint: number, now: number): bigint {
        return computeAccrual(stakeCount, this.rates.rewardRate(), lastCheckpoint, now);
    }
}
