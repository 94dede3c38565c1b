import express, { Router } from 'express';
import config from '../../config.js';
import { StakingController } from '../../staking/controller.js';
import validate from '../../validation/index.js';
import { sendFailure } from './utils.js';

/**
 * @api {post} /transactions Submit a transaction
 * @apiBody {Number|String} type numeric type or its name, e.g. 1 or "staking_stake"
 * @apiBody {String} sender
 * @apiBody {Object} [data]
 */
export function transactionsRouter(controller: StakingController): Router {
    const router = express.Router();

    router.post('/', (req, res, next) => {
        const body: unknown = req.body;
        if (!validate.object(body, config.maxPayloadLength)) {
            sendFailure(res, 'InvalidInput', `Request body must be a JSON object of at most ${config.maxPayloadLength} characters`);
            return;
        }
        controller
            .submit({ type: body.type, sender: body.sender, data: body.data })
            .then(result => {
                if (result.success) {
                    res.json(result);
                } else {
                    sendFailure(res, result.error, result.message);
                }
            })
            .catch(next);
    });

    return router;
}

export default transactionsRouter;
