/**
 * Action Types
 *
 * Shapes shared by the action executor, the transition engine and the
 * effect handlers.
 */

import type { ActionDefinition, ActionType } from '../contract/types.js';

/**
 * Which part of a transition sequence an action runs in.
 */
export type ActionPhase = 'exit' | 'transition' | 'entry' | 'rollback';

/**
 * Everything an effect handler may know about the transition it runs for.
 */
export interface ActionContext {
    /** Instance name (defaults to the contract's node name). */
    readonly instance: string;
    readonly nodeName: string;
    readonly event: string;
    readonly fromState: string;
    readonly toState: string;
    /** Generation before the transition commits. */
    readonly generation: number;
    /** Generation the instance will hold once the transition commits. */
    readonly nextGeneration: number;
    /** True when a terminal state is re-entered and the actions run a second time. */
    readonly reentry: boolean;
    readonly correlationId: string;
    readonly phase: ActionPhase;
    readonly payload: Readonly<Record<string, unknown>>;
}

/**
 * What a handler may report instead of throwing.
 */
export type EffectResult =
    | { readonly ok: true; readonly detail?: Readonly<Record<string, unknown>> }
    | { readonly ok: false; readonly reason: string };

/**
 * A handler is handed an abort signal that fires when the action's
 * timeout expires. Resolving with nothing counts as success.
 */
export type EffectHandler = (
    action: ActionDefinition,
    context: ActionContext,
    signal: AbortSignal
) => Promise<EffectResult | void>;

export type ActionFailureKind =
    | 'timeout'     // timeout_ms elapsed before the handler settled
    | 'reported'    // handler returned { ok: false }
    | 'thrown'      // handler threw or rejected
    | 'no_handler'; // nothing registered for the action type

export interface ActionFailure {
    readonly kind: ActionFailureKind;
    readonly message: string;
    readonly code?: string;
}

interface OutcomeBase {
    readonly actionName: string;
    readonly actionType: ActionType;
    readonly isCritical: boolean;
    readonly durationMs: number;
}

export interface ActionSuccess extends OutcomeBase {
    readonly status: 'success';
    readonly detail?: Readonly<Record<string, unknown>>;
}

export interface ActionFailureOutcome extends OutcomeBase {
    readonly status: 'failure';
    readonly failure: ActionFailure;
}

export type ActionOutcome = ActionSuccess | ActionFailureOutcome;
