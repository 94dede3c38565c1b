import assert from 'assert';
import { beforeEach, describe, it } from 'node:test';
import { StateCache } from '../src/cache.js';
import { toDbString } from '../src/utils/bigint.js';

function depositor(id: string, stakedAssets: string[]) {
    return {
        _id: id,
        stakedAssets,
        pendingReward: toDbString(0n),
        lastCheckpoint: 0,
        createdAt: '2024-01-01T00:00:00.000Z',
        lastUpdatedAt: '2024-01-01T00:00:00.000Z',
    };
}

describe('StateCache', () => {
    let cache: StateCache;

    beforeEach(() => {
        cache = new StateCache();
    });

    it('rejects a second insert with the same id', () => {
        assert.strictEqual(cache.insertOne('depositors', depositor('alice', ['1'])), true);
        assert.strictEqual(cache.insertOne('depositors', depositor('alice', ['2'])), false);
        assert.deepStrictEqual(cache.findOne('depositors', 'alice')?.stakedAssets, ['1']);
    });

    it('hands out copies that do not write through', () => {
        cache.insertOne('depositors', depositor('alice', ['1']));
        const found = cache.findOne('depositors', 'alice');
        assert.ok(found);
        found.stakedAssets.push('2');
        assert.deepStrictEqual(cache.findOne('depositors', 'alice')?.stakedAssets, ['1']);
    });

    it('returns false when updating or deleting a missing document', () => {
        assert.strictEqual(cache.updateOne('custody', 'x', { depositor: 'bob' }), false);
        assert.strictEqual(cache.deleteOne('custody', 'x'), false);
        assert.strictEqual(cache.pendingChanges, 0);
    });

    it('restores updated, inserted and deleted documents on rollback', () => {
        cache.insertOne('custody', { _id: '1', depositor: 'alice', depositedAt: 0 });
        cache.insertOne('custody', { _id: '2', depositor: 'alice', depositedAt: 0 });
        cache.clear();

        cache.updateOne('custody', '1', { depositor: 'bob' });
        cache.updateOne('custody', '1', { depositedAt: 5 });
        cache.deleteOne('custody', '2');
        cache.insertOne('custody', { _id: '3', depositor: 'bob', depositedAt: 5 });
        assert.strictEqual(cache.pendingChanges, 3);

        cache.rollback();

        assert.deepStrictEqual(cache.findOne('custody', '1'), { _id: '1', depositor: 'alice', depositedAt: 0 });
        assert.deepStrictEqual(cache.findOne('custody', '2'), { _id: '2', depositor: 'alice', depositedAt: 0 });
        assert.strictEqual(cache.findOne('custody', '3'), null);
        assert.strictEqual(cache.pendingChanges, 0);
    });

    it('keeps changes after clear', () => {
        cache.insertOne('unbonding', { _id: '1', initiatedAt: 80 });
        cache.clear();
        cache.rollback();
        assert.strictEqual(cache.findOne('unbonding', '1')?.initiatedAt, 80);
    });

    it('filters and counts', () => {
        cache.insertOne('custody', { _id: '1', depositor: 'alice', depositedAt: 0 });
        cache.insertOne('custody', { _id: '2', depositor: 'bob', depositedAt: 0 });
        cache.insertOne('custody', { _id: '3', depositor: 'alice', depositedAt: 0 });
        assert.strictEqual(cache.count('custody'), 3);
        const ids = cache.find('custody', doc => doc.depositor === 'alice').map(doc => doc._id).sort();
        assert.deepStrictEqual(ids, ['1', '3']);
    });

    it('skips the flush and refuses warmup without a database', async () => {
        cache.insertOne('custody', { _id: '1', depositor: 'alice', depositedAt: 0 });
        assert.strictEqual(cache.hasDatabase, false);
        await cache.writeToDisk();
        assert.strictEqual(cache.pendingChanges, 1);
        await assert.rejects(() => cache.warmup(), /Database not initialized/);
    });
});
