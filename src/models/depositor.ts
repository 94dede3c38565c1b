import type { Document } from 'mongodb';
import { readNumber, readString, readStringArray } from './decode.js';

export type DepositorDoc = {
    _id: string; // depositor account
    stakedAssets: string[];
    pendingReward: string; // padded integer string, see toDbString
    lastCheckpoint: number;
    createdAt: string;
    lastUpdatedAt: string;
};

export function decodeDepositor(raw: Document): DepositorDoc {
    return {
        _id: readString('depositors', raw, '_id'),
        stakedAssets: readStringArray('depositors', raw, 'stakedAssets'),
        pendingReward: readString('depositors', raw, 'pendingReward'),
        lastCheckpoint: readNumber('depositors', raw, 'lastCheckpoint'),
        createdAt: readString('depositors', raw, 'createdAt'),
        lastUpdatedAt: readString('depositors', raw, 'lastUpdatedAt'),
    };
}
