import type { Document } from 'mongodb';
import { DocumentShapeError, readNumber, readOptionalString, readString } from './decode.js';

export type EventValue = string | number | boolean | string[];

/**
 * Represents the structure of an event document to be stored.
 */
export type EventDocument = {
    _id: string;
    category: string; // 'staking' | 'admin'
    action: string; // 'staked', 'unstaked', 'rewards_claimed', ...
    type: string; // category_action
    sequence: number; // position in the global event log
    time: number; // clock value of the emitting operation
    timestamp: string;
    actor: string;
    data: Record<string, EventValue>;
    transactionId?: string;
};

function isEventValue(value: unknown): value is EventValue {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return true;
    return Array.isArray(value) && value.every(item => typeof item === 'string');
}

export function decodeEvent(raw: Document): EventDocument {
    const rawData: unknown = raw.data;
    if (typeof rawData !== 'object' || rawData === null || Array.isArray(rawData)) {
        throw new DocumentShapeError('events', raw._id, 'data', 'an object');
    }
    const data: Record<string, EventValue> = {};
    for (const [key, value] of Object.entries(rawData)) {
        if (!isEventValue(value)) throw new DocumentShapeError('events', raw._id, `data.${key}`, 'an event value');
        data[key] = value;
    }
    const event: EventDocument = {
        _id: readString('events', raw, '_id'),
        category: readString('events', raw, 'category'),
        action: readString('events', raw, 'action'),
        type: readString('events', raw, 'type'),
        sequence: readNumber('events', raw, 'sequence'),
        time: readNumber('events', raw, 'time'),
        timestamp: readString('events', raw, 'timestamp'),
        actor: readString('events', raw, 'actor'),
        data,
    };
    const transactionId = readOptionalString('events', raw, 'transactionId');
    if (transactionId) event.transactionId = transactionId;
    return event;
}
