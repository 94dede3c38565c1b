import express, { Router } from 'express';
import { createError } from '../../errors.js';
import { StakingController } from '../../staking/controller.js';
import { sendError } from './utils.js';

export function assetsRouter(controller: StakingController): Router {
    const router = express.Router();

    // owner is the depositor while the asset is in custody; holder comes from the registry
    router.get('/:assetId', (req, res) => {
        const position = controller.getAsset(req.params.assetId);
        if (position.holder === null && position.owner === null && position.unbondingInitiatedAt === null) {
            sendError(res, createError('NOT_FOUND', `Asset ${req.params.assetId} not found`));
            return;
        }
        res.json({ success: true, ...position });
    });

    return router;
}

export default assetsRouter;
