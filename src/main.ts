import 'dotenv/config';
import { Server } from 'http';
import cache from './cache.js';
import { SystemClock } from './clock.js';
import config from './config.js';
import logger from './logger.js';
import { disconnectKafkaProducer, initializeKafkaProducer } from './modules/kafka.js';
import http from './modules/http/index.js';
import { mongo } from './mongo.js';
import settings from './settings.js';
import { StakingController } from './staking/controller.js';

process.on('unhandledRejection', (reason: unknown) => {
    logger.fatal('CRITICAL: Unhandled Rejection, reason:', { reason_details: String(reason) });
    if (reason instanceof Error && reason.stack) {
        logger.fatal('Stack Trace:', reason.stack);
    }
});

process.on('uncaughtException', (error: Error) => {
    logger.fatal('CRITICAL: Uncaught Exception:', { errorName: error.name, errorMessage: error.message, stack: error.stack });
});

const allowNodeV = [20, 22];
const currentNodeV = parseInt(process.versions.node.split('.')[0]);
if (!allowNodeV.includes(currentNodeV)) {
    logger.fatal('Wrong NodeJS version. Allowed versions: v' + allowNodeV.join(', v'));
    process.exit(1);
} else {
    logger.info('Correctly using NodeJS v' + process.versions.node);
}

let closing = false;
let server: Server | null = null;
let controller: StakingController | null = null;

export async function main(): Promise<void> {
    logger.info(`Starting ${config.networkName} node...`);

    if (settings.useMongo) {
        const db = await mongo.init();
        cache.setMongoDbInstance(db);
        const loaded = await cache.warmup();
        logger.info(`State cache warmed up with ${loaded} documents.`);
    } else {
        logger.warn('USE_MONGO is off, state lives in memory only.');
    }

    const clock = new SystemClock();
    controller = new StakingController(cache, clock, { administrators: settings.adminAccounts });
    await controller.initialize({
        rewardRatePerUnitTime: settings.rewardRate,
        claimDelay: settings.claimDelay,
    });
    // The wall clock may have stepped back since the last run
    clock.raiseFloor(controller.services.ledger.latestCheckpoint());
    const params = controller.getParams();
    logger.info(`Staking parameters: rate=${params.rewardRatePerUnitTime}, claimDelay=${params.claimDelay}, paused=${params.paused}`);

    if (settings.useNotification) {
        await initializeKafkaProducer();
    }

    server = await http.init(controller);
    logger.info('Node daemon started successfully.');
}

async function shutdown(): Promise<void> {
    if (server) {
        const current = server;
        await new Promise<void>(resolve => current.close(() => resolve()));
    }
    while (controller?.busy) {
        logger.debug('Waiting for processing queue to drain...');
        await new Promise(resolve => setTimeout(resolve, 100));
    }
    if (controller) await controller.flushEvents();
    await disconnectKafkaProducer();
    await mongo.close();
}

process.on('SIGINT', () => {
    if (closing) return;
    closing = true;
    logger.info('Received SIGINT, completing processing queue...');

    setTimeout(() => {
        logger.warn('Forcing shutdown after 30s timeout...');
        process.exit(1);
    }, 30000).unref();

    shutdown()
        .then(() => {
            logger.info('Node exited safely');
            process.exit(0);
        })
        .catch(error => {
            logger.error('Error during shutdown:', error);
            process.exit(1);
        });
});

main().catch(error => {
    logger.fatal('Critical error during node startup:', error);
    process.exit(1);
});

export default main;
