import type { Document } from 'mongodb';
import { AccountDoc, decodeAccount } from './account.js';
import { CustodyDoc, decodeCustody } from './custody.js';
import { DepositorDoc, decodeDepositor } from './depositor.js';
import { EventDocument, decodeEvent } from './event.js';
import { NftDoc, decodeNft } from './nft.js';
import { ParamsDoc, decodeParams } from './state.js';
import { UnbondingDoc, decodeUnbonding } from './unbonding.js';

export type { AccountDoc, CustodyDoc, DepositorDoc, EventDocument, NftDoc, ParamsDoc, UnbondingDoc };
export type { EventValue } from './event.js';
export { PARAMS_ID } from './state.js';

/** Document type held by each collection of the state cache. */
export interface CollectionDocs {
    depositors: DepositorDoc;
    custody: CustodyDoc;
    unbonding: UnbondingDoc;
    state: ParamsDoc;
    nfts: NftDoc;
    accounts: AccountDoc;
    events: EventDocument;
}

export type CollectionName = keyof CollectionDocs;

export const COLLECTIONS: CollectionName[] = ['depositors', 'custody', 'unbonding', 'state', 'nfts', 'accounts', 'events'];

export const decoders: { [C in CollectionName]: (raw: Document) => CollectionDocs[C] } = {
    depositors: decodeDepositor,
    custody: decodeCustody,
    unbonding: decodeUnbonding,
    state: decodeParams,
    nfts: decodeNft,
    accounts: decodeAccount,
    events: decodeEvent,
};
