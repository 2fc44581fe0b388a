/**
 * Contract Model
 *
 * Typed, immutable representation of a loaded lifecycle contract.
 * Values of these types are produced only by `parseContract` and are
 * deep-frozen; a reload produces a new value.
 */

export const NODE_TYPES = [
    'ORCHESTRATOR_GENERIC',
    'REDUCER_GENERIC',
    'EFFECT_GENERIC',
    'COMPUTE_GENERIC'
] as const;

export type NodeType = (typeof NODE_TYPES)[number];

export const ACTION_TYPES = [
    'event',
    'logging',
    'persistence',
    'data_capture',
    'alert',
    'cleanup'
] as const;

export type ActionType = (typeof ACTION_TYPES)[number];

export const STATE_TYPES = ['operational', 'error', 'terminal'] as const;

export type StateType = (typeof STATE_TYPES)[number];

/** Source of a transition that applies from any current state. */
export const WILDCARD = '*';

export interface SemVer {
    readonly major: number;
    readonly minor: number;
    readonly patch: number;
}

export type ActionConfigValue = string | number | boolean | null | readonly string[];

export type ActionConfig = Readonly<Record<string, ActionConfigValue>>;

export interface ActionDefinition {
    readonly actionName: string;
    readonly actionType: ActionType;
    readonly isCritical: boolean;
    readonly timeoutMs: number;
    /** Version of the effect this action expects; logged with every outcome. */
    readonly version: SemVer;
    /** Stable sort key applied to every reference list at parse time. */
    readonly executionOrder: number;
    /** Compensating action run when a later critical action aborts the transition. */
    readonly rollbackAction?: string;
    readonly config: ActionConfig;
    readonly description?: string;
}

export interface StateDefinition {
    readonly name: string;
    readonly stateType: StateType;
    readonly isInitial: boolean;
    readonly isTerminal: boolean;
    readonly entryActions: readonly string[];
    readonly exitActions: readonly string[];
    readonly description?: string;
}

export interface TransitionDefinition {
    readonly name: string;
    readonly fromState: string;
    readonly toState: string;
    readonly event: string;
    readonly actions: readonly string[];
}

export interface NodeDependency {
    readonly nodeName: string;
    readonly version: SemVer;
}

export interface EventBusBinding {
    readonly subscribeTopics: readonly string[];
    readonly publishTopics: readonly string[];
}

export interface Contract {
    /** Where the document came from (file path or caller label). */
    readonly source: string;
    readonly nodeName: string;
    readonly nodeType: NodeType;
    readonly contractVersion: SemVer;
    readonly description?: string;
    readonly states: readonly StateDefinition[];
    readonly transitions: readonly TransitionDefinition[];
    readonly actions: ReadonlyMap<string, ActionDefinition>;
    readonly initialState: string;
    readonly dependencies: readonly NodeDependency[];
    readonly eventBus: EventBusBinding;

    readonly stateIndex: ReadonlyMap<string, StateDefinition>;
    /** Exact transitions keyed by `transitionKey(state, event)`. */
    readonly exactTransitions: ReadonlyMap<string, TransitionDefinition>;
    /** Wildcard transitions keyed by event name only; consulted after an exact miss. */
    readonly wildcardTransitions: ReadonlyMap<string, TransitionDefinition>;
}

export function transitionKey(state: string, event: string): string {
    return `${state}\u0000${event}`;
}

export function formatVersion(version: SemVer): string {
    return `${version.major}.${version.minor}.${version.patch}`;
}

/**
 * Read-only view over a map built at parse time. The backing map is held
 * in a private field, so a frozen contract's indexes cannot be changed.
 */
export class FrozenIndex<K, V> implements ReadonlyMap<K, V> {
    readonly #entries: Map<K, V>;

    constructor(entries: Iterable<readonly [K, V]>) {
        this.#entries = new Map(entries);
        Object.freeze(this);
    }

    get size(): number {
        return this.#entries.size;
    }

    get(key: K): V | undefined {
        return this.#entries.get(key);
    }

    has(key: K): boolean {
        return this.#entries.has(key);
    }

    forEach(callback: (value: V, key: K, map: ReadonlyMap<K, V>) => void): void {
        this.#entries.forEach((value, key) => callback(value, key, this));
    }

    entries() {
        return this.#entries.entries();
    }

    keys() {
        return this.#entries.keys();
    }

    values() {
        return this.#entries.values();
    }

    [Symbol.iterator]() {
        return this.#entries[Symbol.iterator]();
    }
}
