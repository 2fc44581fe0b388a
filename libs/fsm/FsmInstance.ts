/**
 * FSM Instance
 *
 * A named, live state machine bound to one contract. Events are applied
 * through the transition engine one at a time; an event that arrives
 * while a transition is running is rejected with BusyError.
 */

import { logger as rootLogger, type Logger } from '../logging/logger.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { formatVersion, type Contract, type StateType } from '../contract/types.js';
import type { TransitionEngine } from '../execution/transitionEngine.js';
import type { FsmEvent, InstanceRuntime, TransitionResult } from '../execution/transitionTypes.js';

export interface StateChangedNotification {
    readonly instance: string;
    readonly fromState: string;
    readonly toState: string;
    readonly stateType: StateType;
    readonly generation: number;
    readonly event: string;
    readonly correlationId: string;
    readonly payload: Readonly<Record<string, unknown>>;
}

export type StateChangedListener = (notification: StateChangedNotification) => void;

export interface TransitionSummary {
    readonly kind: Exclude<TransitionResult['kind'], 'no_match'>;
    readonly event: string;
    readonly fromState: string;
    readonly toState: string;
    readonly generation: number;
    readonly failedActions: readonly string[];
    readonly abortedBy?: string;
    readonly completedAt: string;
}

export interface InstanceSnapshot {
    readonly instance: string;
    readonly nodeName: string;
    readonly contractVersion: string;
    readonly currentState: string;
    readonly stateType: StateType;
    readonly isTerminal: boolean;
    readonly generation: number;
    readonly inTransition: boolean;
    readonly lastTransition: TransitionSummary | null;
}

export interface FsmInstanceOptions {
    readonly contract: Contract;
    readonly engine: TransitionEngine;
    /** Defaults to the contract's node name. */
    readonly name?: string;
    readonly logger?: Logger;
}

export class FsmInstance {
    private readonly runtime: InstanceRuntime;
    private readonly engine: TransitionEngine;
    private readonly logger: Logger;
    private readonly listeners = new Set<StateChangedListener>();
    private lastTransition: TransitionSummary | null = null;

    constructor(options: FsmInstanceOptions) {
        this.engine = options.engine;
        this.runtime = {
            name: options.name ?? options.contract.nodeName,
            contract: options.contract,
            currentState: options.contract.initialState,
            generation: 0,
            inTransition: false
        };
        this.logger = (options.logger ?? rootLogger).child({ component: 'FsmInstance', instance: this.runtime.name });
    }

    get name(): string {
        return this.runtime.name;
    }

    get contract(): Contract {
        return this.runtime.contract;
    }

    get currentState(): string {
        return this.runtime.currentState;
    }

    get generation(): number {
        return this.runtime.generation;
    }

    get inTransition(): boolean {
        return this.runtime.inTransition;
    }

    get stateType(): StateType {
        return this.runtime.contract.stateIndex.get(this.runtime.currentState)?.stateType ?? 'operational';
    }

    get isTerminal(): boolean {
        return this.runtime.contract.stateIndex.get(this.runtime.currentState)?.isTerminal ?? false;
    }

    /**
     * Whether an event would match a transition from the current state.
     */
    canHandle(event: string): boolean {
        return this.engine.resolve(this.runtime.contract, this.runtime.currentState, event) !== undefined;
    }

    async handle(event: string | FsmEvent): Promise<TransitionResult> {
        const normalized: FsmEvent = typeof event === 'string' ? { name: event } : event;
        const result = await this.engine.apply(this.runtime, normalized);

        if (result.kind === 'no_match') {
            return result;
        }

        this.lastTransition = {
            kind: result.kind,
            event: result.event,
            fromState: result.fromState,
            toState: result.toState,
            generation: result.generation,
            failedActions: result.failures.map(record => record.outcome.actionName),
            ...(result.kind === 'aborted' ? { abortedBy: result.failedAction } : {}),
            completedAt: new Date().toISOString()
        };

        if (result.kind === 'committed') {
            this.notify({
                instance: this.runtime.name,
                fromState: result.fromState,
                toState: result.toState,
                stateType: this.stateType,
                generation: result.generation,
                event: result.event,
                correlationId: result.correlationId,
                payload: normalized.payload ?? {}
            });
        }

        return result;
    }

    /**
     * Register a listener for committed state changes. Returns an unsubscribe function.
     */
    onStateChanged(listener: StateChangedListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    snapshot(): InstanceSnapshot {
        return {
            instance: this.runtime.name,
            nodeName: this.runtime.contract.nodeName,
            contractVersion: formatVersion(this.runtime.contract.contractVersion),
            currentState: this.runtime.currentState,
            stateType: this.stateType,
            isTerminal: this.isTerminal,
            generation: this.runtime.generation,
            inTransition: this.runtime.inTransition,
            lastTransition: this.lastTransition
        };
    }

    private notify(notification: StateChangedNotification): void {
        for (const listener of this.listeners) {
            try {
                listener(notification);
            } catch (error) {
                this.logger.error({ err: ErrorSanitizer.describe(error), toState: notification.toState }, 'State change listener failed');
            }
        }
    }
}
