import type { Document } from 'mongodb';
import { readBoolean, readNumber, readString } from './decode.js';

export const PARAMS_ID = 'params';

export type ParamsDoc = {
    _id: string;
    rewardRatePerUnitTime: string; // padded integer string
    claimDelay: number;
    paused: boolean;
    lastUpdatedAt: string;
};

export function decodeParams(raw: Document): ParamsDoc {
    return {
        _id: readString('state', raw, '_id'),
        rewardRatePerUnitTime: readString('state', raw, 'rewardRatePerUnitTime'),
        claimDelay: readNumber('state', raw, 'claimDelay'),
        paused: readBoolean('state', raw, 'paused'),
        lastUpdatedAt: readString('state', raw, 'lastUpdatedAt'),
    };
}
