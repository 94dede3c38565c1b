import type { Document } from 'mongodb';
import { readNumber, readString } from './decode.js';

export type UnbondingDoc = {
    _id: string; // asset id
    initiatedAt: number;
};

export function decodeUnbonding(raw: Document): UnbondingDoc {
    return {
        _id: readString('unbonding', raw, '_id'),
        initiatedAt: readNumber('unbonding', raw, 'initiatedAt'),
    };
}
