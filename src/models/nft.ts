import type { Document } from 'mongodb';
import { readString } from './decode.js';

export type NftDoc = {
    _id: string; // asset id
    owner: string;
    mintedAt: string;
    lastTransferredAt: string;
};

export function decodeNft(raw: Document): NftDoc {
    return {
        _id: readString('nfts', raw, '_id'),
        owner: readString('nfts', raw, 'owner'),
        mintedAt: readString('nfts', raw, 'mintedAt'),
        lastTransferredAt: readString('nfts', raw, 'lastTransferredAt'),
    };
}
