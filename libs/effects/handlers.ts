/**
 * Default Effect Handlers
 *
 * One handler per action type. Side effects are keyed on (instance,
 * target state, generation) so that re-running an action on terminal
 * re-entry changes nothing. A retried attempt after an abort is not a
 * re-entry: its events are published again.
 *
 * Recognised `action_config` keys:
 *
 *   event         topic, topic_kind (evt|cmd), event_name, topic_version
 *   logging       level (debug|info|warn|error), message, fail_on (payload key;
 *                 a truthy value makes the action report failure)
 *   persistence   (none)
 *   data_capture  capture_key
 *   alert         severity (info|warning|critical), summary, dedupe_key
 *   cleanup       resource_group
 */

import { LRUCache } from 'lru-cache';

import { logger as rootLogger, type Logger } from '../logging/logger.js';
import type { ActionDefinition } from '../contract/types.js';
import { EffectRegistry } from '../execution/effectRegistry.js';
import type { ActionContext, EffectHandler } from '../execution/actionTypes.js';
import type { AlertSeverity, AlertSink } from './alertSink.js';
import type { CaptureStore } from './captureStore.js';
import type { EventBus } from './eventBus.js';
import type { ResourceRegistry } from './resources.js';
import type { SnapshotStore } from './snapshotStore.js';
import { buildTopic, isValidTopic, type TopicKind } from './topics.js';

export interface EffectCollaborators {
    readonly bus: EventBus;
    readonly snapshots: SnapshotStore;
    readonly captures: CaptureStore;
    readonly alerts: AlertSink;
    readonly resources: ResourceRegistry;
    readonly logger?: Logger;
}

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

const ALERT_SEVERITIES: readonly AlertSeverity[] = ['info', 'warning', 'critical'];

export function configString(action: ActionDefinition, key: string): string | undefined {
    const value = action.config[key];
    return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function configNumber(action: ActionDefinition, key: string): number | undefined {
    const value = action.config[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/** `<instance>:<target state>:<generation>:<action>` */
export function transitionScopedKey(action: ActionDefinition, context: ActionContext): string {
    return `${context.instance}:${context.toState}:${context.nextGeneration}:${action.actionName}`;
}

export function resolveEventTopic(action: ActionDefinition, context: ActionContext): string {
    const explicit = configString(action, 'topic');
    if (explicit) {
        return explicit;
    }
    const kind: TopicKind = configString(action, 'topic_kind') === 'cmd' ? 'cmd' : 'evt';
    const eventName = configString(action, 'event_name') ?? action.actionName;
    return buildTopic(kind, context.nodeName, eventName, configNumber(action, 'topic_version') ?? 1);
}

function isLogLevel(value: string | undefined): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

function isAlertSeverity(value: string | undefined): value is AlertSeverity {
    return ALERT_SEVERITIES.some(severity => severity === value);
}

export function createEffectRegistry(collaborators: EffectCollaborators): EffectRegistry {
    const log = (collaborators.logger ?? rootLogger).child({ component: 'Effects' });
    const published = new LRUCache<string, string>({ max: 10_000 });

    const publishEvent: EffectHandler = async (action, context) => {
        const topic = resolveEventTopic(action, context);
        if (!isValidTopic(topic)) {
            return { ok: false, reason: `Invalid topic name: ${topic}` };
        }

        const dedupeKey = `${topic}:${transitionScopedKey(action, context)}`;
        const previous = context.reentry ? published.get(dedupeKey) : undefined;
        if (previous) {
            return { ok: true, detail: { topic, messageId: previous, deduplicated: true } };
        }

        const message = await collaborators.bus.publish(topic, {
            instance: context.instance,
            nodeName: context.nodeName,
            event: context.event,
            fromState: context.fromState,
            toState: context.toState,
            generation: context.nextGeneration,
            payload: context.payload
        }, { key: context.instance, correlationId: context.correlationId });

        published.set(dedupeKey, message.id);
        return { ok: true, detail: { topic, messageId: message.id } };
    };

    const writeLog: EffectHandler = async (action, context) => {
        const configured = configString(action, 'level');
        const level: LogLevel = isLogLevel(configured) ? configured : 'info';
        const message = configString(action, 'message') ?? action.description ?? action.actionName;
        const failOn = configString(action, 'fail_on');
        const failing = failOn !== undefined && Boolean(context.payload[failOn]);
        if (failOn !== undefined && !failing) {
            return;
        }

        log[level]({
            action: action.actionName,
            instance: context.instance,
            event: context.event,
            fromState: context.fromState,
            toState: context.toState,
            correlationId: context.correlationId
        }, message);

        if (failing) {
            return { ok: false, reason: message };
        }
    };

    const persistSnapshot: EffectHandler = async (_action, context) => {
        const written = await collaborators.snapshots.save({
            instance: context.instance,
            nodeName: context.nodeName,
            state: context.toState,
            generation: context.nextGeneration,
            correlationId: context.correlationId,
            data: context.payload,
            savedAt: new Date().toISOString()
        });
        return { ok: true, detail: { written } };
    };

    const captureData: EffectHandler = async (action, context) => {
        const key = configString(action, 'capture_key') ?? transitionScopedKey(action, context);
        const written = await collaborators.captures.capture({
            key,
            instance: context.instance,
            state: context.toState,
            data: {
                event: context.event,
                fromState: context.fromState,
                generation: context.nextGeneration,
                payload: context.payload
            },
            capturedAt: new Date().toISOString()
        });
        return { ok: true, detail: { key, written } };
    };

    const raiseAlert: EffectHandler = async (action, context) => {
        const configured = configString(action, 'severity');
        const dedupeKey = configString(action, 'dedupe_key') ?? transitionScopedKey(action, context);
        const raised = await collaborators.alerts.raise({
            dedupeKey,
            severity: isAlertSeverity(configured) ? configured : 'warning',
            summary: configString(action, 'summary') ?? action.description ?? `${context.instance} entered ${context.toState}`,
            instance: context.instance,
            state: context.toState,
            correlationId: context.correlationId,
            raisedAt: new Date().toISOString()
        });
        return { ok: true, detail: { dedupeKey, raised } };
    };

    const releaseResources: EffectHandler = async (action, context) => {
        const group = configString(action, 'resource_group') ?? context.instance;
        const report = await collaborators.resources.release(group);
        if (report.failed.length > 0) {
            return {
                ok: false,
                reason: `Failed to release ${report.failed.length} resource(s) in ${group}: ` +
                    report.failed.map(item => `${item.id} (${item.message})`).join(', ')
            };
        }
        return { ok: true, detail: { group, released: report.released.length } };
    };

    return new EffectRegistry()
        .register('event', publishEvent)
        .register('logging', writeLog)
        .register('persistence', persistSnapshot)
        .register('data_capture', captureData)
        .register('alert', raiseAlert)
        .register('cleanup', releaseResources);
}
