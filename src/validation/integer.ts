/**
 * Non-negative safe integer, used for claim delays.
 */
const validateInteger = (value: unknown, canBeZero = false, max = Number.MAX_SAFE_INTEGER): value is number => {
    if (typeof value !== 'number' || !Number.isSafeInteger(value))
        return false;
    if (value === 0)
        return canBeZero;
    return value > 0 && value <= max;
};

export default validateInteger;
