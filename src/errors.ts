export const ERRORS = {
    // Operation input
    EMPTY_INPUT: { code: 'EmptyInput', status: 400, message: 'At least one asset id is required' },
    INVALID_INPUT: { code: 'InvalidInput', status: 400, message: 'Invalid transaction data' },
    UNKNOWN_TRANSACTION: { code: 'UnknownTransaction', status: 400, message: 'Unknown transaction type' },

    // Ownership and custody
    NOT_OWNER: { code: 'NotOwner', status: 403, message: 'Caller does not control the referenced asset' },
    NOT_FOUND: { code: 'NotFound', status: 404, message: 'Asset is not held for this depositor' },
    ALREADY_CUSTODIED: { code: 'AlreadyCustodied', status: 409, message: 'Asset is already held for another depositor' },
    ALREADY_EXISTS: { code: 'AlreadyExists', status: 409, message: 'Asset already exists' },

    // Rewards
    CLAIM_TOO_EARLY: { code: 'ClaimTooEarly', status: 400, message: 'Claim delay has not elapsed since the last checkpoint' },
    ARITHMETIC_OVERFLOW: { code: 'ArithmeticOverflow', status: 422, message: 'Reward computation exceeded the supported range' },

    // Gating
    PAUSED: { code: 'Paused', status: 423, message: 'Staking operations are paused' },
    UNAUTHORIZED: { code: 'Unauthorized', status: 403, message: 'Only an administrator may perform this operation' },
    REENTRANT_CALL: { code: 'ReentrantCall', status: 409, message: 'Operation submitted while another operation is in flight on this call path' },

    // Collaborators and internals
    EXTERNAL_TRANSFER_FAILED: { code: 'ExternalTransferFailed', status: 502, message: 'External transfer did not succeed' },
    PERSISTENCE_FAILED: { code: 'PersistenceFailed', status: 500, message: 'Failed to persist state changes' },
    INVARIANT_VIOLATION: { code: 'InvariantViolation', status: 500, message: 'Ledger invariant violated' },
    INTERNAL_ERROR: { code: 'InternalError', status: 500, message: 'Internal error' },
} as const;

export type ErrorType = keyof typeof ERRORS;
export type ErrorCode = (typeof ERRORS)[ErrorType]['code'];

export class StakingError extends Error {
    readonly type: ErrorType;
    readonly code: ErrorCode;
    readonly status: number;
    readonly details?: Record<string, unknown>;

    constructor(type: ErrorType, message?: string, details?: Record<string, unknown>) {
        const errorDef = ERRORS[type];
        super(message ?? errorDef.message);
        this.name = 'StakingError';
        this.type = type;
        this.code = errorDef.code;
        this.status = errorDef.status;
        this.details = details;
    }

    get isInternal(): boolean {
        return this.status === 500;
    }
}

export function createError(type: ErrorType, message?: string, details?: Record<string, unknown>): StakingError {
    return new StakingError(type, message, details);
}

export function isStakingError(error: unknown): error is StakingError {
    return error instanceof StakingError;
}

/**
 * Normalizes anything thrown inside an operation into a StakingError.
 */
export function toStakingError(error: unknown): StakingError {
    if (isStakingError(error)) return error;
    const message = error instanceof Error ? error.message : String(error);
    return createError('INTERNAL_ERROR', message);
}

/** HTTP status for an error code, 500 for codes outside the table. */
export function statusForCode(code: string): number {
    return Object.values(ERRORS).find(def => def.code === code)?.status ?? 500;
}
