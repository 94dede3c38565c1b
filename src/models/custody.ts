import type { Document } from 'mongodb';
import { readNumber, readString } from './decode.js';

export type CustodyDoc = {
    _id: string; // asset id
    depositor: string;
    depositedAt: number;
};

export function decodeCustody(raw: Document): CustodyDoc {
    return {
        _id: readString('custody', raw, '_id'),
        depositor: readString('custody', raw, 'depositor'),
        depositedAt: readNumber('custody', raw, 'depositedAt'),
    };
}
