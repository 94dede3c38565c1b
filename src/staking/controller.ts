import { AsyncLocalStorage } from 'async_hooks';
import { StateCache } from '../cache.js';
import { Clock } from '../clock.js';
import config from '../config.js';
import { ErrorCode, StakingError, createError, toStakingError } from '../errors.js';
import logger from '../logger.js';
import { EventDocument } from '../models/index.js';
import { ProcessingQueue } from '../processingQueue.js';
import { resolveTransactionType, transactionHandlers } from '../transactions/index.js';
import { TransactionType } from '../transactions/types.js';
import validate from '../validation/index.js';
import { toBigInt } from '../utils/bigint.js';
import { deterministicIdFrom } from '../utils/deterministic-id.js';
import { publishEvents } from '../utils/event-logger.js';
import { OperationContext, StakingServices, StakingServicesOptions, createStakingServices } from './context.js';
import { AssetPosition, DepositorRecord, StakingParams } from './interfaces.js';

export type TransactionResult =
    | { success: true; id: string; events: EventDocument[] }
    | { success: false; error: ErrorCode; message: string };

export interface TransactionInput {
    type: unknown;
    sender: unknown;
    data?: unknown;
}

export interface GenesisOptions {
    rewardRatePerUnitTime?: bigint | string;
    claimDelay?: number;
    rewardPoolBalance?: bigint | string;
}

export type EventPublisher = (events: EventDocument[]) => Promise<void>;

export interface ControllerOptions extends StakingServicesOptions {
    // Called with each committed operation's events, in commit order
    publish?: EventPublisher;
}

export interface EventPage {
    total: number;
    events: EventDocument[];
}

/**
 * Entry point for every operation. Operations run one at a time through a FIFO queue; each
 * reads the clock once, runs its handler against the state cache and then either commits
 * (flush, clear) or rolls every touched document back. Committed events are published
 * after the operation has left the queue.
 *
 * A collaborator that calls back into the controller from inside an operation is answered
 * with ReentrantCall instead of being queued behind the operation it is part of.
 */
export class StakingController {
    private readonly queue = new ProcessingQueue();
    private readonly inFlight = new AsyncLocalStorage<string>();
    private sequence = 0;
    private publishing: Promise<void> = Promise.resolve();
    private readonly publish: EventPublisher;

    readonly services: StakingServices;

    constructor(
        readonly cache: StateCache,
        private readonly clock: Clock,
        options: ControllerOptions = {}
    ) {
        this.services = createStakingServices(cache, options);
        this.publish = options.publish ?? publishEvents;
    }

    /**
     * Writes the parameters document and funds the reward pool when the store is empty.
     * Safe to call on every start. Rejects with InvalidInput on out-of-range genesis values.
     */
    async initialize(genesis: GenesisOptions = {}): Promise<void> {
        const rewardRate = genesis.rewardRatePerUnitTime ?? config.rewardRatePerUnitTime;
        const claimDelay = genesis.claimDelay ?? config.claimDelay;
        const poolBalance = genesis.rewardPoolBalance ?? config.rewardPoolBalance;
        if (!validate.bigint(rewardRate, true, false)) {
            throw createError('INVALID_INPUT', `Genesis reward rate ${String(rewardRate)} must be a non-negative integer up to ${config.maxValue}`);
        }
        if (!validate.integer(claimDelay, true)) {
            throw createError('INVALID_INPUT', `Genesis claim delay ${claimDelay} must be a non-negative safe integer`);
        }
        if (!validate.bigint(poolBalance, true, false)) {
            throw createError('INVALID_INPUT', `Genesis reward pool ${String(poolBalance)} must be a non-negative integer up to ${config.maxValue}`);
        }

        return this.queue.run(async () => {
            const { params, rewardToken } = this.services;
            const created = params.ensureGenesis({ rewardRatePerUnitTime: toBigInt(rewardRate), claimDelay });
            const pool = toBigInt(poolBalance);
            if (created && pool > 0n) {
                rewardToken.adjustBalance(rewardToken.poolAccount, pool);
            }
            try {
                await this.cache.writeToDisk();
            } catch (error) {
                this.cache.rollback();
                throw error;
            }
            this.cache.clear();
        });
    }

    /** True while an operation is queued or running. */
    get busy(): boolean {
        return this.queue.busy;
    }

    submit(tx: TransactionInput): Promise<TransactionResult> {
        const current = this.inFlight.getStore();
        if (current !== undefined) {
            logger.warn(`[controller] Reentrant call rejected while ${current} is in flight.`);
            return Promise.resolve(this.failure(createError('REENTRANT_CALL')));
        }
        return this.queue.run(() => this.execute(tx));
    }

    /** Resolves once every event committed so far has been handed to the publisher. */
    flushEvents(): Promise<void> {
        return this.publishing;
    }

    // Chained off the queue: a slow broker delays later publishes, never later operations.
    private schedulePublish(events: EventDocument[]): void {
        this.publishing = this.publishing
            .then(() => this.publish(events))
            .catch((error: unknown) => {
                logger.error(`[controller] Publishing ${events.length} events failed: ${error instanceof Error ? error.message : String(error)}`);
            });
    }

    private async execute(tx: TransactionInput): Promise<TransactionResult> {
        const type = resolveTransactionType(tx.type);
        if (type === null) {
            return this.failure(createError('UNKNOWN_TRANSACTION', `Unknown transaction type ${JSON.stringify(tx.type)}`));
        }
        if (!validate.accountName(tx.sender)) {
            return this.failure(createError('INVALID_INPUT', 'sender must be a valid account name'));
        }
        const sender = tx.sender;
        const handler = transactionHandlers[type];
        const now = this.clock.now();
        const id = deterministicIdFrom([type, sender, now, ++this.sequence], 24);
        const ctx: OperationContext = { ...this.services, events: [] };

        try {
            await this.inFlight.run(id, () => handler.execute(tx.data, sender, ctx, now, id));
        } catch (error) {
            this.cache.rollback();
            const stakingError = toStakingError(error);
            if (stakingError.isInternal) {
                logger.error(`[controller] ${handler.name} by ${sender} failed at ${now}: ${error instanceof Error && error.stack ? error.stack : stakingError.message}`);
            } else {
                logger.warn(`[controller] ${handler.name} by ${sender} rejected: ${stakingError.code} ${stakingError.message}`);
            }
            return this.failure(stakingError);
        }

        try {
            await this.cache.writeToDisk();
        } catch (error) {
            this.cache.rollback();
            logger.error(`[controller] Failed to persist ${handler.name} ${id}: ${error instanceof Error ? error.message : String(error)}`);
            return this.failure(createError('PERSISTENCE_FAILED'));
        }
        this.cache.clear();
        logger.debug(`[controller] ${handler.name} ${id} by ${sender} committed at ${now} with ${ctx.events.length} events.`);

        if (ctx.events.length > 0) this.schedulePublish(ctx.events);
        return { success: true, id, events: ctx.events };
    }

    private failure(error: StakingError): TransactionResult {
        return { success: false, error: error.code, message: error.message };
    }

    stake(depositor: string, assetIds: string[]): Promise<TransactionResult> {
        return this.submit({ type: TransactionType.STAKING_STAKE, sender: depositor, data: { assetIds } });
    }

    unstake(depositor: string, assetIds: string[]): Promise<TransactionResult> {
        return this.submit({ type: TransactionType.STAKING_UNSTAKE, sender: depositor, data: { assetIds } });
    }

    claimRewards(depositor: string): Promise<TransactionResult> {
        return this.submit({ type: TransactionType.STAKING_CLAIM_REWARDS, sender: depositor, data: {} });
    }

    updateRewardRate(sender: string, rewardRate: bigint): Promise<TransactionResult> {
        return this.submit({ type: TransactionType.ADMIN_UPDATE_REWARD_RATE, sender, data: { rewardRate: rewardRate.toString() } });
    }

    updateClaimDelay(sender: string, claimDelay: number): Promise<TransactionResult> {
        return this.submit({ type: TransactionType.ADMIN_UPDATE_CLAIM_DELAY, sender, data: { claimDelay } });
    }

    pause(sender: string): Promise<TransactionResult> {
        return this.submit({ type: TransactionType.ADMIN_PAUSE, sender, data: {} });
    }

    unpause(sender: string): Promise<TransactionResult> {
        return this.submit({ type: TransactionType.ADMIN_UNPAUSE, sender, data: {} });
    }

    mintAsset(sender: string, assetId: string, owner: string): Promise<TransactionResult> {
        return this.submit({ type: TransactionType.ADMIN_MINT_ASSET, sender, data: { assetId, owner } });
    }

    fundRewards(sender: string, amount: bigint): Promise<TransactionResult> {
        return this.submit({ type: TransactionType.ADMIN_FUND_REWARDS, sender, data: { amount: amount.toString() } });
    }

    // Read surface

    getDepositor(depositor: string): DepositorRecord | null {
        return this.services.ledger.get(depositor);
    }

    claimableReward(depositor: string): bigint {
        return this.services.ledger.claimable(depositor, this.clock.now());
    }

    ownerOf(assetId: string): string | null {
        return this.services.custody.ownerOf(assetId);
    }

    unbondingInitiatedAt(assetId: string): number | null {
        return this.services.unbonding.initiatedAt(assetId);
    }

    getAsset(assetId: string): AssetPosition {
        return {
            assetId,
            owner: this.ownerOf(assetId),
            unbondingInitiatedAt: this.unbondingInitiatedAt(assetId),
            holder: this.services.registry.holderOf(assetId),
        };
    }

    getParams(): StakingParams {
        return this.services.params.get();
    }

    rewardBalance(account: string): bigint {
        return this.services.rewardToken.balanceOf(account);
    }

    /** Newest first. */
    listEvents(limit: number, offset: number): EventPage {
        const events = this.cache.find('events').sort((a, b) => b.sequence - a.sequence);
        return { total: events.length, events: events.slice(offset, offset + limit) };
    }
}
