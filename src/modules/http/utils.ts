import { Request, Response } from 'express';
import config from '../../config.js';
import { StakingError, statusForCode } from '../../errors.js';

/**
 * @apiDefine PaginationParams
 * @apiParam {Number} [limit=10] Number of items to return per page (max: 100)
 * @apiParam {Number} [offset=0] Number of items to skip (for pagination)
 *
 * @apiSuccess {Object[]} data Array of items
 * @apiSuccess {Number} total Total number of items available
 * @apiSuccess {Number} limit Number of items per page
 * @apiSuccess {Number} skip Number of items skipped
 * @apiSuccess {Number} page Current page number
 */

function queryInt(value: unknown): number {
    return typeof value === 'string' ? parseInt(value, 10) : NaN;
}

/**
 * Get pagination parameters from request query
 * @returns Object with limit, skip, and page properties
 */
export const getPagination = (req: Request) => {
    const requested = queryInt(req.query.limit);
    const limit = Math.min(requested > 0 ? requested : 10, config.eventsMaxPageSize);
    const offset = Math.max(queryInt(req.query.offset) || 0, 0);
    return {
        limit,
        skip: offset,
        page: Math.floor(offset / limit) + 1,
    };
};

export function sendError(res: Response, error: StakingError): void {
    res.status(error.status).json({ error: error.code, message: error.message });
}

export function sendFailure(res: Response, code: string, message: string): void {
    res.status(statusForCode(code)).json({ error: code, message });
}
