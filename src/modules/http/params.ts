import express, { Router } from 'express';
import config from '../../config.js';
import { StakingController } from '../../staking/controller.js';

export function paramsRouter(controller: StakingController): Router {
    const router = express.Router();

    router.get('/', (_req, res) => {
        const params = controller.getParams();
        res.json({
            success: true,
            rewardRatePerUnitTime: params.rewardRatePerUnitTime.toString(),
            claimDelay: params.claimDelay,
            paused: params.paused,
            rewardTokenSymbol: config.rewardTokenSymbol,
            rewardTokenPrecision: config.rewardTokenPrecision,
        });
    });

    return router;
}

export default paramsRouter;
