/**
 * Event Bus
 *
 * The publish/subscribe seam used by `event` actions and by subscription
 * wiring. InMemoryEventBus delivers synchronously in-process and keeps a
 * bounded publish history.
 */

import { randomUUID } from 'node:crypto';

import { logger as rootLogger, type Logger } from '../logging/logger.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { isValidTopic } from './topics.js';

export interface BusMessage {
    readonly id: string;
    readonly topic: string;
    readonly key?: string;
    readonly payload: Readonly<Record<string, unknown>>;
    readonly correlationId?: string;
    readonly publishedAt: string;
}

export interface PublishOptions {
    readonly key?: string;
    readonly correlationId?: string;
}

export type BusHandler = (message: BusMessage) => Promise<void> | void;

export interface Subscription {
    readonly topic: string;
    unsubscribe(): Promise<void>;
}

export interface EventBus {
    publish(topic: string, payload: Readonly<Record<string, unknown>>, options?: PublishOptions): Promise<BusMessage>;
    subscribe(topic: string, handler: BusHandler): Promise<Subscription>;
}

export interface InMemoryEventBusOptions {
    readonly historyLimit?: number;
    readonly logger?: Logger;
}

export class InMemoryEventBus implements EventBus {
    private readonly handlers = new Map<string, Set<BusHandler>>();
    private readonly history: BusMessage[] = [];
    private readonly historyLimit: number;
    private readonly logger: Logger;

    constructor(options: InMemoryEventBusOptions = {}) {
        this.historyLimit = options.historyLimit ?? 1000;
        this.logger = (options.logger ?? rootLogger).child({ component: 'InMemoryEventBus' });
    }

    async publish(
        topic: string,
        payload: Readonly<Record<string, unknown>>,
        options: PublishOptions = {}
    ): Promise<BusMessage> {
        if (!isValidTopic(topic)) {
            throw new Error(`Invalid topic name: ${topic}`);
        }

        const message: BusMessage = {
            id: randomUUID(),
            topic,
            payload,
            publishedAt: new Date().toISOString(),
            ...(options.key !== undefined ? { key: options.key } : {}),
            ...(options.correlationId !== undefined ? { correlationId: options.correlationId } : {})
        };

        this.history.push(message);
        if (this.history.length > this.historyLimit) {
            this.history.shift();
        }

        for (const handler of this.handlers.get(topic) ?? []) {
            try {
                await handler(message);
            } catch (error) {
                this.logger.error({ topic, messageId: message.id, err: ErrorSanitizer.describe(error) }, 'Subscriber failed');
            }
        }

        return message;
    }

    async subscribe(topic: string, handler: BusHandler): Promise<Subscription> {
        if (!isValidTopic(topic)) {
            throw new Error(`Invalid topic name: ${topic}`);
        }

        const set = this.handlers.get(topic) ?? new Set<BusHandler>();
        set.add(handler);
        this.handlers.set(topic, set);

        return {
            topic,
            unsubscribe: async () => {
                const current = this.handlers.get(topic);
                current?.delete(handler);
                if (current && current.size === 0) {
                    this.handlers.delete(topic);
                }
            }
        };
    }

    subscriberCount(topic: string): number {
        return this.handlers.get(topic)?.size ?? 0;
    }

    published(topic?: string): BusMessage[] {
        return topic === undefined
            ? [...this.history]
            : this.history.filter(message => message.topic === topic);
    }
}
