import assert from 'assert';
import { describe, it } from 'node:test';
import { isStakingError } from '../src/errors.js';
import { CheckedMath, MAX_VALUE, formatTokenAmount, toBigInt, toDbString } from '../src/utils/bigint.js';

function isOverflow(error: unknown): boolean {
    return isStakingError(error) && error.code === 'ArithmeticOverflow';
}

describe('bigint utils', () => {
    it('strips padding when converting stored strings', () => {
        assert.strictEqual(toBigInt('00000000000000000000000000001900'), 1900n);
        assert.strictEqual(toBigInt('0000'), 0n);
        assert.strictEqual(toBigInt('-0005'), -5n);
        assert.strictEqual(toBigInt(null), 0n);
        assert.strictEqual(toBigInt(undefined), 0n);
        assert.strictEqual(toBigInt(42), 42n);
    });

    it('pads values for storage', () => {
        assert.strictEqual(toDbString(5n, 4), '0005');
        assert.strictEqual(toDbString(-5n, 4), '-0005');
        assert.strictEqual(toDbString('1900').length, 32);
        assert.strictEqual(toBigInt(toDbString(MAX_VALUE)), MAX_VALUE);
    });

    it('refuses values wider than the pad length', () => {
        assert.throws(() => toDbString(12345n, 4), /too large/);
    });

    it('formats token amounts with 8 decimals', () => {
        assert.strictEqual(formatTokenAmount(123456789n), '1.23456789');
        assert.strictEqual(formatTokenAmount(100000000n), '1');
        assert.strictEqual(formatTokenAmount(4300n), '0.000043');
    });
});

describe('CheckedMath', () => {
    it('adds and multiplies within range', () => {
        assert.strictEqual(CheckedMath.add(1900n, 2400n), 4300n);
        assert.strictEqual(CheckedMath.sub(10n, 4n), 6n);
        assert.strictEqual(CheckedMath.mul(2n, 10n, 120n), 2400n);
    });

    it('throws ArithmeticOverflow past the maximum', () => {
        assert.throws(() => CheckedMath.add(MAX_VALUE, 1n), isOverflow);
        assert.throws(() => CheckedMath.sub(-MAX_VALUE, 1n), isOverflow);
        assert.throws(() => CheckedMath.mul(MAX_VALUE, 2n), isOverflow);
    });

    it('returns zero when any factor is zero', () => {
        assert.strictEqual(CheckedMath.mul(MAX_VALUE, MAX_VALUE, 0n), 0n);
    });
});
