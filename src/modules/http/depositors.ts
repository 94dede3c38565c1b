import express, { Router } from 'express';
import { createError, isStakingError } from '../../errors.js';
import { StakingController } from '../../staking/controller.js';
import { formatTokenAmount } from '../../utils/bigint.js';
import { sendError } from './utils.js';

/**
 * @api {get} /depositors/:account Depositor record
 * @apiSuccess {String[]} stakedAssets
 * @apiSuccess {String} pendingReward settled but unclaimed, raw units
 * @apiSuccess {Number} lastCheckpoint
 * @apiSuccess {String} claimableReward pendingReward plus accrual up to now, raw units
 * @apiError (404) NotFound the account never staked
 * @apiError (422) ArithmeticOverflow accrual since the last checkpoint exceeds the supported range
 */
export function depositorsRouter(controller: StakingController): Router {
    const router = express.Router();

    router.get('/:account', (req, res) => {
        const account = req.params.account;
        const record = controller.getDepositor(account);
        if (!record) {
            sendError(res, createError('NOT_FOUND', `Depositor ${account} not found`));
            return;
        }
        let claimable: bigint;
        try {
            claimable = controller.claimableReward(account);
        } catch (error) {
            // ArithmeticOverflow keeps its own status; anything else reaches the app error handler
            if (!isStakingError(error)) throw error;
            sendError(res, error);
            return;
        }
        res.json({
            success: true,
            depositor: record.depositor,
            stakedAssets: record.stakedAssets,
            pendingReward: record.pendingReward.toString(),
            lastCheckpoint: record.lastCheckpoint,
            claimableReward: claimable.toString(),
            claimableRewardFormatted: formatTokenAmount(claimable),
        });
    });

    return router;
}

export default depositorsRouter;
