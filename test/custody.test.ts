import assert from 'assert';
import { beforeEach, describe, it } from 'node:test';
import { StateCache } from '../src/cache.js';
import { isStakingError } from '../src/errors.js';
import { AssetRegistry } from '../src/staking/asset-registry.js';
import { AssetCustodyLedger } from '../src/staking/custody.js';
import { RewardToken } from '../src/staking/reward-token.js';
import { UnbondingTracker } from '../src/staking/unbonding.js';

describe('AssetCustodyLedger', () => {
    let custody: AssetCustodyLedger;

    beforeEach(() => {
        custody = new AssetCustodyLedger(new StateCache());
    });

    it('records and reports the depositor of an asset', () => {
        custody.recordDeposit('1', 'alice', 0);
        assert.strictEqual(custody.ownerOf('1'), 'alice');
        assert.strictEqual(custody.ownerOf('2'), null);
        assert.strictEqual(custody.count(), 1);
    });

    it('fails with AlreadyCustodied when another depositor holds the asset', () => {
        custody.recordDeposit('1', 'alice', 0);
        assert.throws(
            () => custody.recordDeposit('1', 'bob', 5),
            (error: unknown) => isStakingError(error) && error.code === 'AlreadyCustodied'
        );
        assert.strictEqual(custody.ownerOf('1'), 'alice');
    });

    it('releases only for the recorded owner', () => {
        custody.recordDeposit('1', 'alice', 0);
        assert.strictEqual(custody.releaseIfOwner('1', 'bob'), false);
        assert.strictEqual(custody.ownerOf('1'), 'alice');
        assert.strictEqual(custody.releaseIfOwner('1', 'alice'), true);
        assert.strictEqual(custody.ownerOf('1'), null);
        assert.strictEqual(custody.releaseIfOwner('1', 'alice'), false);
    });
});

describe('UnbondingTracker', () => {
    it('overwrites the initiation time on every call', () => {
        const unbonding = new UnbondingTracker(new StateCache());
        assert.strictEqual(unbonding.initiatedAt('1'), null);
        unbonding.markInitiated('1', 80);
        assert.strictEqual(unbonding.initiatedAt('1'), 80);
        unbonding.markInitiated('1', 120);
        assert.strictEqual(unbonding.initiatedAt('1'), 120);
    });
});

describe('AssetRegistry', () => {
    let registry: AssetRegistry;

    beforeEach(() => {
        registry = new AssetRegistry(new StateCache());
        registry.mint('1', 'alice');
    });

    it('moves an asset held by the sender', async () => {
        await registry.transferCustody('alice', 'staking-vault', '1');
        assert.strictEqual(registry.holderOf('1'), 'staking-vault');
    });

    it('rejects transfers of unknown assets or from a non-holder', async () => {
        await assert.rejects(() => registry.transferCustody('alice', 'staking-vault', '2'), /does not exist/);
        await assert.rejects(() => registry.transferCustody('bob', 'staking-vault', '1'), /held by alice/);
        assert.strictEqual(registry.holderOf('1'), 'alice');
    });

    it('refuses to mint an existing id', () => {
        assert.throws(
            () => registry.mint('1', 'bob'),
            (error: unknown) => isStakingError(error) && error.code === 'AlreadyExists'
        );
    });
});

describe('RewardToken', () => {
    let token: RewardToken;

    beforeEach(() => {
        token = new RewardToken(new StateCache(), 'reward-pool');
        token.adjustBalance('reward-pool', 5000n);
    });

    it('pays out of the pool', async () => {
        assert.strictEqual(await token.transfer('alice', 4300n), true);
        assert.strictEqual(token.balanceOf('alice'), 4300n);
        assert.strictEqual(token.poolBalance, 700n);
    });

    it('reports failure when the pool is short', async () => {
        assert.strictEqual(await token.transfer('alice', 5001n), false);
        assert.strictEqual(token.balanceOf('alice'), 0n);
        assert.strictEqual(token.poolBalance, 5000n);
    });

    it('accepts a zero payout without touching balances', async () => {
        assert.strictEqual(await token.transfer('alice', 0n), true);
        assert.strictEqual(token.poolBalance, 5000n);
    });
});
