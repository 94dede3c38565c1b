import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { Server } from 'http';
import logger from '../../logger.js';
import settings from '../../settings.js';
import { StakingController } from '../../staking/controller.js';
import assetsRouter from './assets.js';
import depositorsRouter from './depositors.js';
import eventsRouter from './events.js';
import paramsRouter from './params.js';
import transactionsRouter from './transactions.js';

/**
 * Builds the express app. Routes are mounted under their file names.
 */
export function createApp(controller: StakingController): Express {
    const app = express();
    app.use(cors());
    app.use(express.json());

    logger.trace('Setting up HTTP endpoints...');
    app.use('/assets', assetsRouter(controller));
    app.use('/depositors', depositorsRouter(controller));
    app.use('/events', eventsRouter(controller));
    app.use('/params', paramsRouter(controller));
    app.use('/transactions', transactionsRouter(controller));

    app.use((_req: Request, res: Response) => {
        res.status(404).json({ error: 'NotFound', message: 'Unknown endpoint' });
    });

    // express.json() parse failures arrive here with status 400
    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        const status = typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number' ? err.status : 500;
        if (status === 400) {
            res.status(400).json({ error: 'InvalidInput', message: 'Malformed JSON body' });
            return;
        }
        logger.error(`[http] ${req.method} ${req.originalUrl} failed:`, err);
        res.status(500).json({ error: 'InternalError', message: 'Internal server error' });
    });

    return app;
}

/**
 * HTTP server module
 */
export function init(controller: StakingController, port: number = settings.apiPort): Promise<Server> {
    const app = createApp(controller);

    return new Promise((resolve, reject) => {
        logger.debug(`Starting HTTP server on port ${port}`);
        const server = app.listen(port, () => {
            const addr = server.address();
            if (addr && typeof addr !== 'string') {
                logger.info(`HTTP server listening on ${addr.address}:${addr.port}`);
            } else {
                logger.info(`HTTP server listening on port ${port}`);
            }
            resolve(server);
        });

        server.on('error', (error: NodeJS.ErrnoException) => {
            if (error.code === 'EADDRINUSE') {
                logger.error(`HTTP port ${port} is already in use. Please use a different port by setting the API_PORT environment variable.`);
            } else if (error.code === 'EACCES') {
                logger.error(`Permission denied to use port ${port}. Try using a port number > 1024 or running with elevated privileges.`);
            } else {
                logger.error('HTTP server error:', error);
            }
            reject(error);
        });
    });
}

export default {
    createApp,
    init,
};
