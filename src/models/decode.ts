import type { Document } from 'mongodb';

/**
 * Field readers for documents loaded from MongoDB. Each throws when the stored
 * value does not have the expected shape, so a corrupt collection stops warmup.
 */
export class DocumentShapeError extends Error {
    constructor(collection: string, id: unknown, field: string, expected: string) {
        super(`[models] ${collection}/${String(id)}: field '${field}' is not ${expected}`);
        this.name = 'DocumentShapeError';
    }
}

export function readString(collection: string, raw: Document, field: string): string {
    const value: unknown = raw[field];
    if (typeof value !== 'string') throw new DocumentShapeError(collection, raw._id, field, 'a string');
    return value;
}

export function readNumber(collection: string, raw: Document, field: string): number {
    const value: unknown = raw[field];
    if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
        throw new DocumentShapeError(collection, raw._id, field, 'a safe integer');
    }
    return value;
}

export function readBoolean(collection: string, raw: Document, field: string): boolean {
    const value: unknown = raw[field];
    if (typeof value !== 'boolean') throw new DocumentShapeError(collection, raw._id, field, 'a boolean');
    return value;
}

export function readStringArray(collection: string, raw: Document, field: string): string[] {
    const value: unknown = raw[field];
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
        throw new DocumentShapeError(collection, raw._id, field, 'an array of strings');
    }
    return [...value];
}

export function readOptionalString(collection: string, raw: Document, field: string): string | undefined {
    return raw[field] === undefined || raw[field] === null ? undefined : readString(collection, raw, field);
}
