import assert from 'assert';
import { describe, it } from 'node:test';
import { StateCache } from '../src/cache.js';
import { SystemClock } from '../src/clock.js';
import config from '../src/config.js';
import { isStakingError } from '../src/errors.js';
import { AssetCustodyTransfer, RewardTransfer } from '../src/staking/interfaces.js';
import { StakingController, TransactionResult } from '../src/staking/controller.js';
import { resolveTransactionType } from '../src/transactions/index.js';
import { TransactionType } from '../src/transactions/types.js';
import { toBigInt } from '../src/utils/bigint.js';
import { ADMIN, ALICE, BOB, LedgerEnv, LedgerOptions, createLedger, expectFailure, expectSuccess, mintAssets, snapshot } from './helpers.js';

class FailingCache extends StateCache {
    failWrites = false;

    async writeToDisk(): Promise<void> {
        if (this.failWrites) throw new Error('disk unavailable');
        return super.writeToDisk();
    }
}

describe('StakingController', () => {
    it('answers a call back into the controller with ReentrantCall', async () => {
        const holder: { env?: LedgerEnv } = {};
        const reentrant: TransactionResult[] = [];
        const assetTransfer: AssetCustodyTransfer = {
            async transferCustody(from, to, assetId) {
                if (!holder.env) throw new Error('ledger not ready');
                reentrant.push(await holder.env.controller.claimRewards(from));
                await holder.env.controller.services.registry.transferCustody(from, to, assetId);
            },
        };
        holder.env = await createLedger({ assetTransfer });
        const { controller } = holder.env;
        await mintAssets(controller, ALICE, ['1']);

        expectSuccess(await controller.stake(ALICE, ['1']));
        assert.strictEqual(reentrant.length, 1);
        expectFailure(reentrant[0], 'ReentrantCall');
        assert.strictEqual(controller.ownerOf('1'), ALICE);
        assert.strictEqual(controller.busy, false);
    });

    it('restores pending reward and checkpoint when the reward transfer fails', async () => {
        const failures: RewardTransfer[] = [
            { transfer: async () => false },
            {
                transfer: async () => {
                    throw new Error('token contract reverted');
                },
            },
        ];
        for (const rewardTransfer of failures) {
            const { clock, controller } = await createLedger({ rewardTransfer });
            await mintAssets(controller, ALICE, ['1']);
            expectSuccess(await controller.stake(ALICE, ['1']));
            clock.set(150);

            expectFailure(await controller.claimRewards(ALICE), 'ExternalTransferFailed');
            assert.deepStrictEqual(controller.getDepositor(ALICE), {
                depositor: ALICE,
                stakedAssets: ['1'],
                pendingReward: 0n,
                lastCheckpoint: 0,
            });
            assert.strictEqual(controller.claimableReward(ALICE), 1500n);
        }
    });

    it('rolls back when the commit cannot be persisted', async () => {
        const cache = new FailingCache();
        const { controller } = await createLedger({ cache });
        await mintAssets(controller, ALICE, ['1']);
        const before = snapshot(cache);

        cache.failWrites = true;
        expectFailure(await controller.stake(ALICE, ['1']), 'PersistenceFailed');
        assert.strictEqual(snapshot(cache), before);
        assert.strictEqual(cache.pendingChanges, 0);

        cache.failWrites = false;
        expectSuccess(await controller.stake(ALICE, ['1']));
        assert.strictEqual(controller.ownerOf('1'), ALICE);
    });

    it('rejects unknown transaction types and invalid senders', async () => {
        const { controller } = await createLedger();
        expectFailure(await controller.submit({ type: 99, sender: ALICE }), 'UnknownTransaction');
        expectFailure(await controller.submit({ type: 'staking_nothing', sender: ALICE }), 'UnknownTransaction');
        expectFailure(await controller.submit({ type: TransactionType.STAKING_CLAIM_REWARDS, sender: 'Alice Smith' }), 'InvalidInput');
        expectFailure(await controller.submit({ type: TransactionType.STAKING_CLAIM_REWARDS, sender: 42 }), 'InvalidInput');
        expectFailure(await controller.submit({ type: TransactionType.STAKING_STAKE, sender: ALICE, data: { assetIds: 'nft-1' } }), 'InvalidInput');
    });

    it('resolves transaction types by number or name', () => {
        assert.strictEqual(resolveTransactionType(1), TransactionType.STAKING_STAKE);
        assert.strictEqual(resolveTransactionType('staking_unstake'), TransactionType.STAKING_UNSTAKE);
        assert.strictEqual(resolveTransactionType('ADMIN_PAUSE'), TransactionType.ADMIN_PAUSE);
        assert.strictEqual(resolveTransactionType('1'), null);
        assert.strictEqual(resolveTransactionType(4), null);
        assert.strictEqual(resolveTransactionType(null), null);
    });

    it('fails with ArithmeticOverflow and changes nothing when accrual exceeds the range', async () => {
        const { cache, clock, controller } = await createLedger({ rate: toBigInt(config.maxValue), claimDelay: 0 });
        await mintAssets(controller, ALICE, ['1', '2']);
        expectSuccess(await controller.stake(ALICE, ['1', '2']));
        clock.set(1);
        const before = snapshot(cache);

        expectFailure(await controller.unstake(ALICE, ['1']), 'ArithmeticOverflow');
        expectFailure(await controller.claimRewards(ALICE), 'ArithmeticOverflow');
        assert.strictEqual(snapshot(cache), before);
    });

    it('runs queued operations one after another in submission order', async () => {
        const { controller } = await createLedger();
        await mintAssets(controller, ALICE, ['1']);

        const staking = controller.stake(ALICE, ['1']);
        const unstaking = controller.unstake(ALICE, ['1']);
        const stealing = controller.unstake(BOB, ['1']);
        assert.strictEqual(controller.busy, true);

        const [staked, unstaked, stolen] = await Promise.all([staking, unstaking, stealing]);
        expectSuccess(staked);
        expectSuccess(unstaked);
        expectFailure(stolen, 'NotOwner');
        assert.strictEqual(controller.busy, false);
        assert.strictEqual(controller.getAsset('1').holder, ALICE);
        assert.strictEqual(controller.unbondingInitiatedAt('1'), 0);
        if (staked.success && unstaked.success) {
            assert.notStrictEqual(staked.id, unstaked.id);
        }
    });

    it('lists committed events newest first', async () => {
        const { controller } = await createLedger();
        await mintAssets(controller, ALICE, ['1', '2']);
        expectFailure(await controller.stake(BOB, ['1']), 'ExternalTransferFailed');
        expectSuccess(await controller.stake(ALICE, ['1']));

        const page = controller.listEvents(2, 0);
        assert.strictEqual(page.total, 3);
        assert.deepStrictEqual(
            page.events.map(event => [event.sequence, event.type]),
            [
                [3, 'staking_staked'],
                [2, 'admin_asset_minted'],
            ]
        );
        assert.strictEqual(page.events[0].transactionId !== undefined, true);

        const rest = controller.listEvents(10, 2);
        assert.strictEqual(rest.events.length, 1);
        assert.deepStrictEqual(rest.events[0].data, { assetId: '1', owner: ALICE });
        assert.strictEqual(rest.events[0].actor, ADMIN);
    });

    it('keeps existing state when initialized again', async () => {
        const { controller } = await createLedger();
        expectSuccess(await controller.updateRewardRate(ADMIN, 25n));
        await controller.initialize({ rewardRatePerUnitTime: 1n, claimDelay: 1, rewardPoolBalance: 5n });
        assert.deepStrictEqual(controller.getParams(), { rewardRatePerUnitTime: 25n, claimDelay: 100, paused: false });
        assert.strictEqual(controller.rewardBalance('reward-pool'), 1_000_000n);
    });

    it('refuses genesis parameters outside the accepted range', async () => {
        const invalid: LedgerOptions[] = [
            { claimDelay: parseInt('abc', 10) },
            { claimDelay: -1 },
            { claimDelay: 1.5 },
            { rate: -5n },
            { rate: toBigInt(config.maxValue) + 1n },
            { poolBalance: -1n },
        ];
        for (const options of invalid) {
            const cache = new StateCache();
            await assert.rejects(createLedger({ ...options, cache }), (error: unknown) => isStakingError(error) && error.code === 'InvalidInput');
            assert.strictEqual(cache.count('state'), 0);
            assert.strictEqual(cache.count('accounts'), 0);
        }

        const controller = new StakingController(new StateCache(), new SystemClock());
        await assert.rejects(controller.initialize({ rewardRatePerUnitTime: '1.5' }), /Genesis reward rate 1.5/);
        await controller.initialize({ rewardRatePerUnitTime: '25', claimDelay: 0, rewardPoolBalance: '0' });
        assert.deepStrictEqual(controller.getParams(), { rewardRatePerUnitTime: 25n, claimDelay: 0, paused: false });
        assert.strictEqual(controller.rewardBalance('reward-pool'), 0n);
    });

    it('commits later operations while earlier events are still being published', async () => {
        const published: string[][] = [];
        let release = (): void => undefined;
        const broker = new Promise<void>(resolve => {
            release = resolve;
        });
        const { controller } = await createLedger({
            publish: async events => {
                published.push(events.map(event => event.type));
                await broker;
            },
        });

        await mintAssets(controller, ALICE, ['1']);
        expectSuccess(await controller.stake(ALICE, ['1']));
        expectFailure(await controller.unstake(BOB, ['1']), 'NotOwner');
        assert.strictEqual(controller.busy, false);
        assert.deepStrictEqual(published, [['admin_asset_minted']]);

        release();
        await controller.flushEvents();
        assert.deepStrictEqual(published, [['admin_asset_minted'], ['staking_staked']]);
    });

    it('keeps publishing after the publisher fails once', async () => {
        const published: string[] = [];
        let calls = 0;
        const { controller } = await createLedger({
            publish: async events => {
                calls += 1;
                if (calls === 1) throw new Error('broker unavailable');
                published.push(...events.map(event => event.type));
            },
        });
        await mintAssets(controller, ALICE, ['1']);
        expectSuccess(await controller.stake(ALICE, ['1']));
        await controller.flushEvents();
        assert.strictEqual(calls, 2);
        assert.deepStrictEqual(published, ['staking_staked']);
    });

    it('seeds the wall clock from the latest stored checkpoint', async () => {
        const empty = await createLedger();
        assert.strictEqual(empty.controller.services.ledger.latestCheckpoint(), 0);

        const future = Math.floor(Date.now() / 1000) + 100_000;
        const { clock, controller } = await createLedger();
        await mintAssets(controller, ALICE, ['1', '2']);
        await mintAssets(controller, BOB, ['3']);
        expectSuccess(await controller.stake(BOB, ['3']));
        clock.set(future);
        expectSuccess(await controller.stake(ALICE, ['1']));
        assert.strictEqual(controller.services.ledger.latestCheckpoint(), future);

        const wall = new SystemClock();
        wall.raiseFloor(controller.services.ledger.latestCheckpoint());
        assert.strictEqual(wall.now(), future);
        wall.raiseFloor(5);
        assert.strictEqual(wall.now(), future);
    });
});
