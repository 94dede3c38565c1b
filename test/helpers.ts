import assert from 'assert';
import { StateCache } from '../src/cache.js';
import { ManualClock } from '../src/clock.js';
import { ErrorCode } from '../src/errors.js';
import logger from '../src/logger.js';
import { EventDocument } from '../src/models/index.js';
import { ControllerOptions, StakingController, TransactionResult } from '../src/staking/controller.js';

// Rejected operations log at warn; keep test output to failures.
logger.level = 'error';

export const ADMIN = 'staking-admin';
export const ALICE = 'alice';
export const BOB = 'bob';

export interface LedgerEnv {
    cache: StateCache;
    clock: ManualClock;
    controller: StakingController;
}

export interface LedgerOptions extends ControllerOptions {
    rate?: bigint;
    claimDelay?: number;
    poolBalance?: bigint;
    cache?: StateCache;
}

/** Fresh in-memory ledger: rate 10, claim delay 100, pool of 1,000,000 units, clock at 0. */
export async function createLedger(options: LedgerOptions = {}): Promise<LedgerEnv> {
    const cache = options.cache ?? new StateCache();
    const clock = new ManualClock(0);
    const controller = new StakingController(cache, clock, options);
    await controller.initialize({
        rewardRatePerUnitTime: options.rate ?? 10n,
        claimDelay: options.claimDelay ?? 100,
        rewardPoolBalance: options.poolBalance ?? 1_000_000n,
    });
    return { cache, clock, controller };
}

export function expectSuccess(result: TransactionResult): EventDocument[] {
    if (!result.success) {
        assert.fail(`expected success, got ${result.error}: ${result.message}`);
    }
    return result.events;
}

export function expectFailure(result: TransactionResult, code: ErrorCode): void {
    if (result.success) {
        assert.fail(`expected ${code}, got success`);
    }
    assert.strictEqual(result.error, code, result.message);
}

export async function mintAssets(controller: StakingController, owner: string, assetIds: string[]): Promise<void> {
    for (const assetId of assetIds) {
        expectSuccess(await controller.mintAsset(ADMIN, assetId, owner));
    }
}

/** Snapshot of every ledger collection, for asserting that nothing changed. */
export function snapshot(cache: StateCache): string {
    return JSON.stringify({
        depositors: cache.find('depositors'),
        custody: cache.find('custody'),
        unbonding: cache.find('unbonding'),
        state: cache.find('state'),
        nfts: cache.find('nfts'),
        accounts: cache.find('accounts'),
        events: cache.find('events'),
    });
}
