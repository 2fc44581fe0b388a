/**
 * Event Bus Wiring
 *
 * Subscribes every node in the graph to the topics its contract lists,
 * in dependency order. Each subscription is registered as a releasable
 * resource so the wiring contract's cleanup action can tear it down.
 */

import { logger as rootLogger, type Logger } from '../logging/logger.js';
import { SchemaError, type SchemaIssue } from '../errors/runtimeErrors.js';
import type { Contract } from '../contract/types.js';
import type { BusMessage, EventBus } from '../effects/eventBus.js';
import type { ResourceRegistry } from '../effects/resources.js';
import { isValidTopic } from '../effects/topics.js';
import type { InFlightTracker } from '../orchestrator/inFlight.js';
import type { NodeGraph } from './nodeGraph.js';

/** Resource group the event-bus wiring contract releases on shutdown. */
export const WIRING_RESOURCE_GROUP = 'event_bus_subscriptions';

export type NodeMessageHandler = (node: Contract, message: BusMessage) => Promise<void>;

export interface WiringOptions {
    readonly graph: NodeGraph;
    readonly bus: EventBus;
    readonly resources: ResourceRegistry;
    readonly inFlight: InFlightTracker;
    readonly handler?: NodeMessageHandler;
    readonly resourceGroup?: string;
    readonly logger?: Logger;
}

export interface WiredSubscription {
    readonly node: string;
    readonly topic: string;
}

export interface WiringReport {
    readonly subscriptions: readonly WiredSubscription[];
}

/**
 * Check every declared topic of every node before anything is subscribed.
 */
export function validateNodeTopics(graph: NodeGraph): void {
    for (const contract of graph.order) {
        const issues: SchemaIssue[] = [];
        contract.eventBus.subscribeTopics.forEach((topic, index) => {
            if (!isValidTopic(topic)) {
                issues.push({ path: `event_bus.subscribe_topics.${index}`, message: `invalid topic name "${topic}"` });
            }
        });
        contract.eventBus.publishTopics.forEach((topic, index) => {
            if (!isValidTopic(topic)) {
                issues.push({ path: `event_bus.publish_topics.${index}`, message: `invalid topic name "${topic}"` });
            }
        });
        if (issues.length > 0) {
            throw new SchemaError(contract.source, issues);
        }
    }
}

export async function wireNodeSubscriptions(options: WiringOptions): Promise<WiringReport> {
    const log = (options.logger ?? rootLogger).child({ component: 'EventBusWiring' });
    const group = options.resourceGroup ?? WIRING_RESOURCE_GROUP;
    const handler: NodeMessageHandler = options.handler ?? (async (node, message) => {
        log.debug({ node: node.nodeName, topic: message.topic, messageId: message.id }, 'Message received');
    });

    validateNodeTopics(options.graph);

    const subscriptions: WiredSubscription[] = [];
    try {
        for (const contract of options.graph.order) {
            for (const topic of contract.eventBus.subscribeTopics) {
                const subscription = await options.bus.subscribe(
                    topic,
                    message => options.inFlight.track(() => handler(contract, message))
                );
                options.resources.register(group, {
                    id: `${contract.nodeName}:${topic}`,
                    release: () => subscription.unsubscribe()
                });
                subscriptions.push({ node: contract.nodeName, topic });
            }
        }
    } catch (error) {
        await options.resources.release(group);
        throw error;
    }

    log.info({ subscriptions: subscriptions.length, nodes: options.graph.order.length }, 'Event bus wiring complete');
    return { subscriptions };
}
