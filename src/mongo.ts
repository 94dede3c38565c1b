import { Db, MongoClient } from 'mongodb';
import logger from './logger.js';
import settings from './settings.js';

let client: MongoClient | null = null;
let dbInstance: Db | null = null;

export const mongo = {
    /**
     * Connects, optionally drops the database (REBUILD_STATE=1) and creates indexes.
     * Genesis documents are written afterwards by the controller if the store is empty.
     */
    init: async (): Promise<Db> => {
        client = new MongoClient(settings.mongoUrl, {});
        await client.connect();
        dbInstance = client.db(settings.mongoDb);
        logger.info(`[mongo] Connected to ${settings.mongoUrl}/${dbInstance.databaseName}`);

        if (process.env.REBUILD_STATE === '1') {
            logger.warn('[mongo] Rebuild specified, dropping database.');
            await dbInstance.dropDatabase();
        }
        await mongo.addMongoIndexes();
        return dbInstance;
    },

    getDb: (): Db => {
        if (!dbInstance) {
            throw new Error('MongoDB has not been initialized. Call init() first.');
        }
        return dbInstance;
    },

    addMongoIndexes: async (): Promise<void> => {
        const currentDb = mongo.getDb();
        const custodyCollection = currentDb.collection('custody');
        await custodyCollection.createIndex({ depositor: 1 });

        const nftsCollection = currentDb.collection('nfts');
        await nftsCollection.createIndex({ owner: 1 });

        const eventsCollection = currentDb.collection('events');
        await eventsCollection.createIndex({ sequence: -1 });
        await eventsCollection.createIndex({ type: 1 });
        await eventsCollection.createIndex({ actor: 1 });
        await eventsCollection.createIndex({ 'data.depositor': 1 }, { sparse: true });
        logger.debug('[mongo] Indexes ensured for custody, nfts and events.');
    },

    close: async (): Promise<void> => {
        if (client) {
            await client.close();
            logger.info('[mongo] Connection closed.');
        }
        client = null;
        dbInstance = null;
    },
};

export default mongo;
