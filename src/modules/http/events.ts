import express, { Router } from 'express';
import { StakingController } from '../../staking/controller.js';
import { getPagination } from './utils.js';

/**
 * @api {get} /events Event log, newest first
 * @apiUse PaginationParams
 */
export function eventsRouter(controller: StakingController): Router {
    const router = express.Router();

    router.get('/', (req, res) => {
        const { limit, skip } = getPagination(req);
        const page = controller.listEvents(limit, skip);
        res.json({
            success: true,
            data: page.events,
            total: page.total,
            limit,
            skip,
        });
    });

    return router;
}

export default eventsRouter;
