import type { Document } from 'mongodb';
import { readString } from './decode.js';

export type AccountDoc = {
    _id: string; // account name
    balance: string; // reward token, padded integer string
    createdAt: string;
    lastUpdatedAt: string;
};

export function decodeAccount(raw: Document): AccountDoc {
    return {
        _id: readString('accounts', raw, '_id'),
        balance: readString('accounts', raw, 'balance'),
        createdAt: readString('accounts', raw, 'createdAt'),
        lastUpdatedAt: readString('accounts', raw, 'lastUpdatedAt'),
    };
}
