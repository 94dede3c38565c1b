import config from '../config.js';
import { createError } from '../errors.js';

// Maximum expected length for any BigInt value we'll handle.
// config.maxValue has 30 digits, so every in-range value fits with room for padding.
const MAX_INTEGER_LENGTH = 32;

export const MAX_VALUE: bigint = BigInt(config.maxValue);

/**
 * Convert a value to BigInt, handling null, undefined, and string inputs
 */
export function toBigInt(value: string | bigint | number | null | undefined): bigint {
    if (value === null || value === undefined) return BigInt(0);
    if (typeof value === 'bigint') return value;
    if (typeof value === 'number') return BigInt(Math.floor(value));
    if (value.startsWith('-')) return -toBigInt(value.slice(1));
    // Remove padding before converting to BigInt
    return BigInt(value.replace(/^0+/, '') || '0');
}

/**
 * Convert a value to BigInt and then to a zero-padded string suitable for database storage.
 * Keeps lexicographical ordering in MongoDB equal to numeric ordering.
 */
export function toDbString(
    value: number | string | bigint,
    padLength = MAX_INTEGER_LENGTH
): string {
    const bigValue = toBigInt(value);
    const isNegative = bigValue < 0n;
    const absStr = (isNegative ? -bigValue : bigValue).toString();

    if (absStr.length > padLength) {
        throw new Error(`Value ${value} too large to fit in padLength=${padLength}`);
    }

    const padded = absStr.padStart(padLength, '0');
    return isNegative ? '-' + padded : padded;
}

/**
 * Format a raw token amount with the given number of decimal places
 */
export function formatTokenAmount(value: bigint, decimals: number = config.rewardTokenPrecision): string {
    const isNegative = value < 0n;
    const str = (isNegative ? -value : value).toString().padStart(decimals + 1, '0');
    const integerPart = str.slice(0, str.length - decimals) || '0';
    const decimalPart = decimals > 0 ? str.slice(-decimals) : '';

    const trimmedDecimal = decimalPart.replace(/0+$/, '');
    const formatted = trimmedDecimal ? `${integerPart}.${trimmedDecimal}` : integerPart;
    return isNegative ? `-${formatted}` : formatted;
}

function ensureInRange(result: bigint, operation: string): bigint {
    if (result > MAX_VALUE || result < -MAX_VALUE) {
        throw createError('ARITHMETIC_OVERFLOW', `${operation} result exceeds ${config.maxValue}`);
    }
    return result;
}

/**
 * Arithmetic bounded by config.maxValue. Out-of-range results throw ArithmeticOverflow
 * instead of producing a value that would not fit the storage format.
 */
export const CheckedMath = {
    add(a: bigint, b: bigint): bigint {
        return ensureInRange(a + b, 'add');
    },
    sub(a: bigint, b: bigint): bigint {
        return ensureInRange(a - b, 'sub');
    },
    mul(...factors: bigint[]): bigint {
        if (factors.includes(0n)) return 0n;
        let product = 1n;
        for (const factor of factors) {
            product = ensureInRange(product * factor, 'mul');
        }
        return product;
    },
};
