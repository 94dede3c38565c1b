import cloneDeep from 'clone-deep';
import { AnyBulkWriteOperation, Db, Document } from 'mongodb';
import logger from './logger.js';
import { COLLECTIONS, CollectionDocs, CollectionName, decoders } from './models/index.js';

type CollectionStore<T> = { [id: string]: T };

type MainCollections = { [C in CollectionName]: CollectionStore<CollectionDocs[C]> };

// null marks a document that did not exist before the current operation touched it
type CopyCollections = { [C in CollectionName]: CollectionStore<CollectionDocs[C] | null> };

type Mutation<C extends CollectionName> = Partial<Omit<CollectionDocs[C], '_id'>>;

function emptyMain(): MainCollections {
    return { depositors: {}, custody: {}, unbonding: {}, state: {}, nfts: {}, accounts: {}, events: {} };
}

function emptyCopy(): CopyCollections {
    return { depositors: {}, custody: {}, unbonding: {}, state: {}, nfts: {}, accounts: {}, events: {} };
}

function toDocument(doc: CollectionDocs[CollectionName]): Document {
    return { ...doc };
}

/**
 * In-memory state shared by every ledger. Each document is copied before its first
 * mutation in an operation; rollback() restores the copies, clear() accepts the changes.
 * When a database is attached, writeToDisk() flushes the documents touched since the
 * last clear().
 */
export class StateCache {
    private main: MainCollections = emptyMain();
    private copy: CopyCollections = emptyCopy();
    private db: Db | null = null;

    setMongoDbInstance(db: Db): void {
        this.db = db;
        logger.debug('[cache] MongoDB instance has been set.');
    }

    get hasDatabase(): boolean {
        return this.db !== null;
    }

    findOne<C extends CollectionName>(collection: C, id: string): CollectionDocs[C] | null {
        const doc = this.main[collection][id];
        return doc === undefined ? null : cloneDeep(doc);
    }

    find<C extends CollectionName>(collection: C, predicate?: (doc: CollectionDocs[C]) => boolean): CollectionDocs[C][] {
        const docs = Object.values(this.main[collection]);
        return (predicate ? docs.filter(predicate) : docs).map(doc => cloneDeep(doc));
    }

    count(collection: CollectionName): number {
        return Object.keys(this.main[collection]).length;
    }

    insertOne<C extends CollectionName>(collection: C, document: CollectionDocs[C]): boolean {
        const id: string = document._id;
        const store: CollectionStore<CollectionDocs[C]> = this.main[collection];
        if (store[id] !== undefined) {
            logger.debug(`[cache] insertOne skipped, ${collection}/${id} already exists.`);
            return false;
        }
        this.keepCopy(collection, id);
        store[id] = cloneDeep(document);
        return true;
    }

    updateOne<C extends CollectionName>(collection: C, id: string, changes: Mutation<C>): boolean {
        const target = this.main[collection][id];
        if (target === undefined) {
            logger.debug(`[cache] updateOne found no document ${collection}/${id}.`);
            return false;
        }
        this.keepCopy(collection, id);
        Object.assign(target, cloneDeep(changes));
        return true;
    }

    deleteOne(collection: CollectionName, id: string): boolean {
        const store = this.main[collection];
        if (store[id] === undefined) return false;
        this.keepCopy(collection, id);
        delete store[id];
        return true;
    }

    private keepCopy<C extends CollectionName>(collection: C, id: string): void {
        const copyStore: CollectionStore<CollectionDocs[C] | null> = this.copy[collection];
        if (id in copyStore) return;
        const current = this.main[collection][id];
        copyStore[id] = current === undefined ? null : cloneDeep(current);
    }

    /** Number of documents touched since the last clear() or rollback(). */
    get pendingChanges(): number {
        return COLLECTIONS.reduce((total, collection) => total + Object.keys(this.copy[collection]).length, 0);
    }

    rollback(): void {
        for (const collection of COLLECTIONS) {
            this.restore(collection);
        }
        this.copy = emptyCopy();
    }

    private restore<C extends CollectionName>(collection: C): void {
        const store: CollectionStore<CollectionDocs[C]> = this.main[collection];
        const copyStore = this.copy[collection];
        for (const id of Object.keys(copyStore)) {
            const original = copyStore[id];
            if (original === null || original === undefined) {
                delete store[id];
            } else {
                store[id] = original;
            }
        }
    }

    clear(): void {
        this.copy = emptyCopy();
    }

    /** Drops every document, used when the node starts over from genesis. */
    reset(): void {
        this.main = emptyMain();
        this.copy = emptyCopy();
    }

    /**
     * Writes the documents touched since the last clear() with one bulkWrite per collection.
     * Does nothing without a database.
     */
    async writeToDisk(): Promise<void> {
        const currentDb = this.db;
        if (!currentDb) return;

        const executions: Promise<unknown>[] = [];
        for (const collection of COLLECTIONS) {
            const ops: AnyBulkWriteOperation<{ _id: string }>[] = [];
            for (const id of Object.keys(this.copy[collection])) {
                const current = this.main[collection][id];
                if (current === undefined) {
                    ops.push({ deleteOne: { filter: { _id: id } } });
                } else {
                    const { _id, ...replacement } = toDocument(current);
                    ops.push({ replaceOne: { filter: { _id }, replacement, upsert: true } });
                }
            }
            if (ops.length > 0) {
                logger.debug(`[cache] Preparing bulkWrite for ${collection} with ${ops.length} ops.`);
                executions.push(currentDb.collection<{ _id: string }>(collection).bulkWrite(ops, { ordered: false }));
            }
        }
        await Promise.all(executions);
    }

    /**
     * Loads every collection from the database into memory.
     * @returns number of documents loaded
     */
    async warmup(): Promise<number> {
        const currentDb = this.db;
        if (!currentDb) throw new Error('[cache] Database not initialized for warmup.');
        this.reset();
        let loaded = 0;
        for (const collection of COLLECTIONS) {
            const raws = await currentDb.collection(collection).find({}).toArray();
            loaded += this.load(collection, raws);
            logger.debug(`[cache] Warmed up ${raws.length} documents from ${collection}.`);
        }
        return loaded;
    }

    private load<C extends CollectionName>(collection: C, raws: Document[]): number {
        const decode = decoders[collection];
        const store: CollectionStore<CollectionDocs[C]> = this.main[collection];
        for (const raw of raws) {
            const doc = decode(raw);
            const id: string = doc._id;
            store[id] = doc;
        }
        return raws.length;
    }
}

const cache = new StateCache();

export default cache;
