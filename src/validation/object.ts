/**
 * Plain JSON object check for request bodies and transaction payloads.
 * Arrays and class instances are rejected.
 * @param maxLength - Limit on the serialized length, when given
 */
const validateObject = (value: unknown, maxLength?: number): value is Record<string, unknown> => {
    if (typeof value !== 'object' || value === null || Array.isArray(value))
        return false;
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto !== Object.prototype && proto !== null)
        return false;
    if (maxLength === undefined)
        return true;

    let serialized: string;
    try {
        serialized = JSON.stringify(value);
    } catch (error) {
        // cycles and bigint members do not serialize
        return false;
    }
    return serialized.length <= maxLength;
};

export default validateObject;
