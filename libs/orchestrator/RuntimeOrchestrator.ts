/**
 * Runtime Orchestrator
 *
 * Drives the four runtime FSM instances through startup and shutdown.
 *
 *   loader    idle -> discovering -> ready
 *   registry  idle -> validating -> ready
 *   graph     initializing -> wiring -> running
 *   wiring    idle -> wiring -> ready         (while graph is in wiring)
 *
 * Any instance that enters an error-typed state triggers fatal
 * propagation: the fatal event is injected into every instance once, so
 * nothing is left half-initialised. Error states are terminal and
 * re-enterable, so an instance that is already failed absorbs it.
 */

import { randomUUID } from 'node:crypto';
import { setTimeout as delay } from 'node:timers/promises';

import { logger as rootLogger, type Logger } from '../logging/logger.js';
import { BusyError, FatalError, TransitionAbortedError } from '../errors/runtimeErrors.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import type { DiscoveredDocument } from '../contract/loader.js';
import type { AppliedResult, FsmEvent, TransitionResult } from '../execution/transitionTypes.js';
import type { EventBus } from '../effects/eventBus.js';
import type { ResourceRegistry } from '../effects/resources.js';
import { RUNTIME_READY_TOPIC, RUNTIME_STOPPED_TOPIC } from '../effects/topics.js';
import type { FsmInstance, InstanceSnapshot, StateChangedNotification } from '../fsm/FsmInstance.js';
import { wireNodeSubscriptions, type NodeMessageHandler } from '../graph/eventBusWiring.js';
import { resolveNodeGraph, type NodeGraph } from '../graph/nodeGraph.js';
import type { ContractRegistry } from '../registry/contractRegistry.js';
import { summarizeHealth, type HealthSummary, type OrchestratorPhase } from './health.js';
import { InFlightTracker } from './inFlight.js';
import { INSTANCE_ROLES, LIFECYCLE_EVENTS, READY_STATES, type InstanceRole } from './lifecycleEvents.js';

export type RuntimeInstances = Readonly<Record<InstanceRole, FsmInstance>>;

export interface ContractSource {
    discover(): Promise<DiscoveredDocument[]>;
}

export interface OrchestratorSettings {
    readonly drainTimeoutMs: number;
    readonly busyRetryLimit: number;
    readonly busyRetryDelayMs: number;
}

export const DEFAULT_ORCHESTRATOR_SETTINGS: OrchestratorSettings = {
    drainTimeoutMs: 5000,
    busyRetryLimit: 3,
    busyRetryDelayMs: 25
};

export interface RuntimeOrchestratorOptions {
    readonly instances: RuntimeInstances;
    readonly source: ContractSource;
    readonly registry: ContractRegistry;
    readonly bus: EventBus;
    readonly resources: ResourceRegistry;
    readonly inFlight?: InFlightTracker;
    readonly messageHandler?: NodeMessageHandler;
    readonly settings?: Partial<OrchestratorSettings>;
    readonly logger?: Logger;
}

export interface RuntimeReadyReport {
    readonly correlationId: string;
    readonly nodes: readonly string[];
    readonly subscriptions: number;
    readonly readyAt: string;
}

export interface ShutdownReport {
    readonly reason: string;
    readonly drained: boolean;
    readonly drainTimedOut: boolean;
    readonly pendingWork: number;
    readonly finalStates: Readonly<Record<InstanceRole, string>>;
}

export type ReadyListener = (report: RuntimeReadyReport) => void;

interface FatalRecord {
    readonly origin: InstanceRole;
    readonly reason: string;
}

export class RuntimeOrchestrator {
    private readonly instances: RuntimeInstances;
    private readonly source: ContractSource;
    private readonly registry: ContractRegistry;
    private readonly bus: EventBus;
    private readonly resources: ResourceRegistry;
    private readonly inFlight: InFlightTracker;
    private readonly messageHandler: NodeMessageHandler | undefined;
    private readonly settings: OrchestratorSettings;
    private readonly logger: Logger;
    private readonly readyListeners = new Set<ReadyListener>();

    private phaseValue: OrchestratorPhase = 'created';
    private stage: InstanceRole = 'loader';
    private correlationId: string = randomUUID();
    private graph: NodeGraph | null = null;
    private fatal: FatalRecord | null = null;
    private fatalPropagation: Promise<void> | null = null;
    private shutdownRun: Promise<ShutdownReport> | null = null;

    constructor(options: RuntimeOrchestratorOptions) {
        this.instances = options.instances;
        this.source = options.source;
        this.registry = options.registry;
        this.bus = options.bus;
        this.resources = options.resources;
        this.inFlight = options.inFlight ?? new InFlightTracker();
        this.messageHandler = options.messageHandler;
        this.settings = { ...DEFAULT_ORCHESTRATOR_SETTINGS, ...options.settings };
        this.logger = (options.logger ?? rootLogger).child({ component: 'RuntimeOrchestrator' });

        for (const role of INSTANCE_ROLES) {
            this.instances[role].onStateChanged(notification => this.onStateChanged(role, notification));
        }
    }

    get phase(): OrchestratorPhase {
        return this.phaseValue;
    }

    get nodeGraph(): NodeGraph | null {
        return this.graph;
    }

    get fatalReason(): string | undefined {
        return this.fatal?.reason;
    }

    onReady(listener: ReadyListener): () => void {
        this.readyListeners.add(listener);
        return () => {
            this.readyListeners.delete(listener);
        };
    }

    /**
     * Run the startup sequence. Rejects with a single FatalError naming the
     * instance that failed; the specific error is its `cause`.
     */
    async start(): Promise<RuntimeReadyReport> {
        if (this.phaseValue !== 'created') {
            throw new FatalError('orchestrator', `Runtime cannot start from phase ${this.phaseValue}`);
        }
        this.phaseValue = 'starting';
        this.correlationId = randomUUID();
        this.logger.info({ correlationId: this.correlationId }, 'Runtime starting');

        let report: RuntimeReadyReport;
        try {
            report = await this.runStartup();
        } catch (error) {
            const failure = this.toStartupError(error);
            await this.propagateFatal(this.stage, failure.message);
            if (this.phaseValue === 'starting') {
                this.phaseValue = 'failed';
            }
            this.logger.fatal({ instance: failure.instance, err: ErrorSanitizer.describe(failure) }, 'Runtime startup failed');
            throw failure;
        }

        this.phaseValue = 'ready';
        this.logger.info({ nodes: report.nodes.length, subscriptions: report.subscriptions }, 'Runtime ready');

        try {
            await this.bus.publish(RUNTIME_READY_TOPIC, {
                nodes: report.nodes,
                subscriptions: report.subscriptions,
                readyAt: report.readyAt
            }, { correlationId: this.correlationId });
        } catch (error) {
            this.logger.warn({ err: ErrorSanitizer.describe(error) }, 'Failed to publish runtime ready event');
        }

        for (const listener of this.readyListeners) {
            try {
                listener(report);
            } catch (error) {
                this.logger.error({ err: ErrorSanitizer.describe(error) }, 'Ready listener failed');
            }
        }
        return report;
    }

    /**
     * Stop the runtime. Safe to call more than once and from any phase;
     * later calls share the first call's result.
     */
    shutdown(reason = 'shutdown requested'): Promise<ShutdownReport> {
        if (!this.shutdownRun) {
            this.shutdownRun = this.runShutdown(reason);
        }
        return this.shutdownRun;
    }

    /**
     * Deliver an event to one runtime instance, retrying while it is busy.
     */
    dispatch(role: InstanceRole, event: string | FsmEvent): Promise<TransitionResult> {
        return this.deliver(role, typeof event === 'string' ? { name: event } : event);
    }

    /**
     * Raise a fatal condition from outside the lifecycle, e.g. a node
     * handler that detected corruption.
     */
    reportFatal(origin: InstanceRole, reason: string): Promise<void> {
        return this.propagateFatal(origin, reason);
    }

    health(): HealthSummary {
        return summarizeHealth(this.phaseValue, this.snapshots(), this.fatal?.reason);
    }

    snapshots(): Readonly<Record<InstanceRole, InstanceSnapshot>> {
        return {
            loader: this.instances.loader.snapshot(),
            registry: this.instances.registry.snapshot(),
            graph: this.instances.graph.snapshot(),
            wiring: this.instances.wiring.snapshot()
        };
    }

    private async runStartup(): Promise<RuntimeReadyReport> {
        const events = LIFECYCLE_EVENTS;

        this.stage = 'loader';
        await this.drive('loader', events.loadRequested);
        let documents: DiscoveredDocument[];
        try {
            documents = await this.source.discover();
        } catch (error) {
            await this.deliverBestEffort('loader', {
                name: events.discoveryFailed,
                payload: { reason: ErrorSanitizer.describe(error).message }
            });
            throw error;
        }
        await this.drive('loader', events.contractsDiscovered, { count: documents.length });

        this.stage = 'registry';
        await this.drive('registry', events.validateRequested, { count: documents.length });
        const validation = this.registry.validateAll(documents);
        if (!validation.accepted) {
            await this.deliverBestEffort('registry', {
                name: events.validationFailed,
                payload: { sources: validation.failures.map(failure => failure.source) }
            });
            const instance = this.instances.registry.name;
            throw new FatalError(
                instance,
                `Runtime startup failed in ${instance}: ` +
                validation.failures.map(failure => failure.message).join(' | '),
                { cause: validation.failures[0] }
            );
        }
        await this.drive('registry', events.validationPassed, { contracts: validation.contracts.length });

        this.stage = 'graph';
        let graph: NodeGraph;
        try {
            graph = resolveNodeGraph(validation.contracts);
        } catch (error) {
            await this.deliverBestEffort('graph', {
                name: events.fatalError,
                payload: { reason: ErrorSanitizer.describe(error).message }
            });
            throw error;
        }
        this.graph = graph;
        const nodes = graph.order.map(contract => contract.nodeName);
        await this.drive('graph', events.start, { nodes });

        this.stage = 'wiring';
        await this.drive('wiring', events.wireRequested, { nodes });
        let subscriptions: number;
        try {
            const wiring = await wireNodeSubscriptions({
                graph,
                bus: this.bus,
                resources: this.resources,
                inFlight: this.inFlight,
                logger: this.logger,
                ...(this.messageHandler ? { handler: this.messageHandler } : {})
            });
            subscriptions = wiring.subscriptions.length;
        } catch (error) {
            await this.deliverBestEffort('wiring', {
                name: events.wiringFailed,
                payload: { reason: ErrorSanitizer.describe(error).message }
            });
            throw error;
        }
        await this.drive('wiring', events.wired, { subscriptions });

        this.stage = 'graph';
        await this.drive('graph', events.wiringComplete, { subscriptions });

        if (this.fatal) {
            throw new FatalError(this.instances[this.fatal.origin].name, this.fatal.reason);
        }
        for (const role of INSTANCE_ROLES) {
            const instance = this.instances[role];
            if (instance.currentState !== READY_STATES[role]) {
                throw new FatalError(
                    instance.name,
                    `Instance ${instance.name} is in ${instance.currentState}, expected ${READY_STATES[role]}`
                );
            }
        }

        return {
            correlationId: this.correlationId,
            nodes,
            subscriptions,
            readyAt: new Date().toISOString()
        };
    }

    private async runShutdown(reason: string): Promise<ShutdownReport> {
        const previousPhase = this.phaseValue;
        this.phaseValue = 'stopping';
        this.logger.info({ reason, previousPhase }, 'Runtime shutting down');

        const shutdownEvent: FsmEvent = { name: LIFECYCLE_EVENTS.shutdownRequested, payload: { reason } };

        // Stop intake before waiting for the work already accepted.
        await this.deliverBestEffort('graph', shutdownEvent);
        await this.deliverBestEffort('wiring', shutdownEvent);

        const drained = await this.inFlight.waitForIdle(this.settings.drainTimeoutMs);
        if (!drained) {
            this.logger.warn({
                pending: this.inFlight.size,
                drainTimeoutMs: this.settings.drainTimeoutMs
            }, 'Drain timed out with work still in flight');
        }

        await this.deliverBestEffort('graph', {
            name: LIFECYCLE_EVENTS.drainComplete,
            payload: { drainTimedOut: !drained, pending: this.inFlight.size }
        });
        await Promise.all([
            this.deliverBestEffort('registry', shutdownEvent),
            this.deliverBestEffort('loader', shutdownEvent)
        ]);

        const finalStates = {
            loader: this.instances.loader.currentState,
            registry: this.instances.registry.currentState,
            graph: this.instances.graph.currentState,
            wiring: this.instances.wiring.currentState
        };

        try {
            await this.bus.publish(RUNTIME_STOPPED_TOPIC, { reason, drained, finalStates }, { correlationId: this.correlationId });
        } catch (error) {
            this.logger.warn({ err: ErrorSanitizer.describe(error) }, 'Failed to publish runtime stopped event');
        }

        this.phaseValue = 'stopped';
        this.logger.info({ reason, drained, finalStates }, 'Runtime stopped');
        return {
            reason,
            drained,
            drainTimedOut: !drained,
            pendingWork: this.inFlight.size,
            finalStates
        };
    }

    private onStateChanged(role: InstanceRole, notification: StateChangedNotification): void {
        if (notification.stateType !== 'error') {
            return;
        }
        const reason = `${notification.instance} entered ${notification.toState} on ${notification.event}`;
        this.propagateFatal(role, reason).catch((error: unknown) => {
            this.logger.error({ err: ErrorSanitizer.describe(error) }, 'Fatal propagation failed');
        });
    }

    private propagateFatal(origin: InstanceRole, reason: string): Promise<void> {
        if (!this.fatalPropagation) {
            this.fatal = { origin, reason };
            this.fatalPropagation = this.injectFatal(origin, reason);
        }
        return this.fatalPropagation;
    }

    private async injectFatal(origin: InstanceRole, reason: string): Promise<void> {
        this.logger.error({ origin: this.instances[origin].name, reason }, 'Propagating fatal error to all instances');

        const event: FsmEvent = {
            name: LIFECYCLE_EVENTS.fatalError,
            payload: { origin: this.instances[origin].name, reason },
            correlationId: this.correlationId
        };
        await Promise.all(INSTANCE_ROLES.map(role => this.deliverBestEffort(role, event)));

        if (this.phaseValue === 'ready') {
            this.phaseValue = 'failed';
        }
    }

    private async drive(
        role: InstanceRole,
        name: string,
        payload: Readonly<Record<string, unknown>> = {}
    ): Promise<AppliedResult> {
        const instance = this.instances[role];
        const result = await this.deliver(role, { name, payload, correlationId: this.correlationId });

        switch (result.kind) {
            case 'committed':
            case 'reentered':
                return result;
            case 'aborted':
                throw new TransitionAbortedError({
                    instance: instance.name,
                    event: name,
                    fromState: result.fromState,
                    toState: result.toState,
                    failedAction: result.failedAction,
                    reason: result.reason
                });
            case 'no_match':
                throw new FatalError(
                    instance.name,
                    `Instance ${instance.name} in state ${result.state} has no transition for ${name}`
                );
        }
    }

    private async deliver(role: InstanceRole, event: FsmEvent): Promise<TransitionResult> {
        const instance = this.instances[role];
        let attempt = 0;

        for (;;) {
            try {
                return await instance.handle(event);
            } catch (error) {
                if (!(error instanceof BusyError) || attempt >= this.settings.busyRetryLimit) {
                    throw error;
                }
                attempt += 1;
                this.logger.debug({ instance: instance.name, event: event.name, attempt }, 'Instance busy, retrying');
                await delay(this.settings.busyRetryDelayMs);
            }
        }
    }

    private async deliverBestEffort(role: InstanceRole, event: FsmEvent): Promise<TransitionResult | null> {
        const instance = this.instances[role];
        try {
            const result = await this.deliver(role, { correlationId: this.correlationId, ...event });
            if (result.kind === 'aborted') {
                this.logger.error({
                    instance: instance.name,
                    event: event.name,
                    failedAction: result.failedAction,
                    reason: result.reason
                }, 'Best-effort transition aborted');
            } else if (result.kind === 'no_match') {
                this.logger.debug({ instance: instance.name, event: event.name, state: result.state }, 'Event not applicable');
            }
            return result;
        } catch (error) {
            this.logger.error({ instance: instance.name, event: event.name, err: ErrorSanitizer.describe(error) }, 'Event delivery failed');
            return null;
        }
    }

    private toStartupError(error: unknown): FatalError {
        if (error instanceof FatalError) {
            return error;
        }
        const instance = this.instances[this.stage].name;
        return new FatalError(
            instance,
            `Runtime startup failed in ${instance}: ${ErrorSanitizer.describe(error).message}`,
            { cause: error }
        );
    }
}
