import { Kafka, Producer, logLevel } from 'kafkajs';
import fs from 'fs';

import logger from '../logger.js';
import { EventDocument } from '../models/index.js';

// Detect whether the process is running inside a container.
function isRunningInContainer(): boolean {
    if (process.env.KAFKA_FORCE_CONTAINER === 'true') return true;
    if (process.env.KAFKA_FORCE_HOST === 'true') return false;
    if (fs.existsSync('/.dockerenv')) return true;
    try {
        const cgroup = fs.readFileSync('/proc/1/cgroup', 'utf8');
        return /docker|kubepods|containerd/.test(cgroup);
    } catch (error) {
        logger.trace(`[kafka-producer] No cgroup info: ${error instanceof Error ? error.message : String(error)}`);
        return false;
    }
}

function resolveBrokers(): string[] {
    // Inside containers use compose DNS, on host prefer the localhost mapped port
    const defaultBroker = isRunningInContainer() ? 'kafka:9092' : 'localhost:29092';
    const rawBrokers = process.env.KAFKA_BROKERS || process.env.KAFKA_BROKER || defaultBroker;
    return rawBrokers
        .split(',')
        .map(s => s.trim())
        .filter(Boolean);
}

const KAFKA_CLIENT_ID = process.env.KAFKA_CLIENT_ID || 'staking-event-producer';

let producer: Producer | null = null;
let isConnected = false;
let initialization: Promise<void> | null = null;

/**
 * Connects the singleton producer. Concurrent callers share one attempt; a failed attempt
 * leaves the producer null and is logged.
 */
export function initializeKafkaProducer(): Promise<void> {
    if (isConnected) return Promise.resolve();
    if (!initialization) {
        initialization = connectProducer().finally(() => {
            initialization = null;
        });
    } else {
        logger.info('[kafka-producer] Kafka producer initialization already in progress; awaiting existing init.');
    }
    return initialization;
}

async function connectProducer(): Promise<void> {
    const brokers = resolveBrokers();
    try {
        const kafka = new Kafka({
            clientId: KAFKA_CLIENT_ID,
            brokers,
            logLevel: logLevel.WARN,
            retry: {
                initialRetryTime: 300,
                retries: 5,
            },
        });

        const newProducer = kafka.producer({
            allowAutoTopicCreation: true,
        });

        await newProducer.connect();
        producer = newProducer;
        isConnected = true;
        logger.info(`[kafka-producer] Connected to ${brokers.join(',')}.`);

        producer.on('producer.disconnect', () => {
            logger.warn('[kafka-producer] Kafka producer disconnected.');
            isConnected = false;
        });
    } catch (error) {
        isConnected = false;
        producer = null;
        const errMsg = error instanceof Error ? `${error.message}${error.stack ? '\n' + error.stack : ''}` : String(error);
        logger.error(`[kafka-producer] Failed to initialize or connect Kafka producer: ${errMsg}`);
    }
}

/**
 * Sends an event to a Kafka topic, connecting the producer first if needed.
 *
 * @param key - Optional key for the Kafka message, for partitioning.
 */
export async function sendKafkaEvent(topic: string, message: EventDocument, key?: string): Promise<void> {
    if (!producer || !isConnected) {
        logger.warn('[kafka-producer] Kafka producer not initialized or not connected. Attempting to initialize...');
        await initializeKafkaProducer();
    }
    const currentProducer = producer;
    if (!currentProducer || !isConnected) {
        throw new Error(`Producer unavailable, event ${message._id} not sent to ${topic}`);
    }

    const stringMessage = JSON.stringify(message);
    logger.debug(`[kafka-producer] Sending event to Kafka topic '${topic}'. Key: '${key || 'none'}', Message: ${stringMessage}`);
    await currentProducer.send({
        topic,
        messages: [{ key, value: stringMessage }],
    });
    logger.debug(`[kafka-producer] Event successfully sent to Kafka topic '${topic}'. EventID: ${message._id}`);
}

/**
 * Disconnects the Kafka producer on shutdown.
 */
export async function disconnectKafkaProducer(): Promise<void> {
    if (producer && isConnected) {
        try {
            await producer.disconnect();
            logger.info('[kafka-producer] Kafka producer disconnected successfully.');
        } catch (error) {
            logger.error(`[kafka-producer] Error disconnecting Kafka producer: ${error instanceof Error ? error.message : String(error)}`);
        } finally {
            producer = null;
            isConnected = false;
        }
    } else {
        logger.info('[kafka-producer] Kafka producer was not connected or already disconnected.');
    }
}
