import logger from '../logger.js';
import { EventDocument, EventValue } from '../models/index.js';
import { sendKafkaEvent } from '../modules/kafka.js';
import settings from '../settings.js';
import type { OperationContext } from '../staking/context.js';
import { deterministicIdFrom } from './deterministic-id.js';

const KAFKA_NOTIFICATIONS_TOPIC = 'notifications';
const KAFKA_STAKING_EVENTS_TOPIC = 'staking-updates';

/**
 * Records an event for the operation in flight. The document goes into the `events`
 * collection through the state cache, so it disappears with a rollback; it is published
 * only after the operation commits (see publishEvents).
 *
 * @param category - 'staking' or 'admin'
 * @param action - 'staked', 'unstaked', 'rewards_claimed', 'paused', ...
 * @param actor - account that submitted the transaction
 */
export function logTransactionEvent(
    ctx: OperationContext,
    category: string,
    action: string,
    actor: string,
    eventData: Record<string, EventValue>,
    time: number,
    transactionId?: string
): EventDocument {
    const sequence = ctx.cache.count('events') + 1;
    const eventDocument: EventDocument = {
        _id: deterministicIdFrom([category, action, actor, transactionId || '', sequence], 24),
        category,
        action,
        type: `${category}_${action}`,
        sequence,
        time,
        timestamp: new Date().toISOString(),
        actor,
        data: eventData,
    };
    if (transactionId) eventDocument.transactionId = transactionId;

    if (!ctx.cache.insertOne('events', eventDocument)) {
        throw new Error(`[event-logger] Event id collision for ${eventDocument.type} #${sequence}`);
    }
    ctx.events.push(eventDocument);
    logger.debug(`[event-logger] Event logged to cache: Category: ${category}, Action: ${action}, Actor: ${actor}, EventID: ${eventDocument._id}`);
    return eventDocument;
}

/**
 * Sends committed events to Kafka when notifications are enabled. Staking events are keyed
 * by depositor so that a consumer sees each depositor's history in order.
 */
export async function publishEvents(events: EventDocument[]): Promise<void> {
    if (!settings.useNotification || events.length === 0) return;
    for (const eventDocument of events) {
        const topic = eventDocument.category === 'staking' ? KAFKA_STAKING_EVENTS_TOPIC : KAFKA_NOTIFICATIONS_TOPIC;
        const key = eventDocument.category === 'staking' ? eventDocument.actor : eventDocument._id;
        try {
            await sendKafkaEvent(topic, eventDocument, key);
        } catch (kafkaError) {
            // Already committed; a send failure is only logged.
            logger.error(
                `[event-logger] Failed to send event ${eventDocument._id} (Key: ${key}) to Kafka topic '${topic}': ${kafkaError instanceof Error ? kafkaError.message : String(kafkaError)}`
            );
        }
    }
}
