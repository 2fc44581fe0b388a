/**
 * Transition Types
 */

import type { Contract } from '../contract/types.js';
import type { ActionOutcome, ActionPhase } from './actionTypes.js';

/**
 * Mutable state the engine owns for one FSM instance. Only the engine
 * writes to it; everything else reads through FsmInstance.
 */
export interface InstanceRuntime {
    readonly name: string;
    readonly contract: Contract;
    currentState: string;
    generation: number;
    inTransition: boolean;
}

export interface FsmEvent {
    readonly name: string;
    readonly payload?: Readonly<Record<string, unknown>>;
    readonly correlationId?: string;
}

export interface ActionRecord {
    readonly phase: ActionPhase;
    readonly outcome: ActionOutcome;
}

interface ResultBase {
    readonly instance: string;
    readonly event: string;
    readonly correlationId: string;
    readonly generation: number;
}

interface AppliedBase extends ResultBase {
    readonly transition: string;
    readonly fromState: string;
    readonly toState: string;
    /** Every action that ran, in execution order. */
    readonly actions: readonly ActionRecord[];
    /** Non-critical failures that did not stop the transition. */
    readonly failures: readonly ActionRecord[];
}

export interface CommittedResult extends AppliedBase {
    readonly kind: 'committed';
}

/**
 * A terminal state re-entered through a wildcard. Actions ran, the
 * generation did not move and no state change was announced.
 */
export interface ReenteredResult extends AppliedBase {
    readonly kind: 'reentered';
}

export interface AbortedResult extends AppliedBase {
    readonly kind: 'aborted';
    readonly failedAction: string;
    readonly reason: string;
    /** Compensating actions run for the steps that had already succeeded. */
    readonly rollbacks: readonly ActionRecord[];
}

export interface NoMatchResult extends ResultBase {
    readonly kind: 'no_match';
    readonly state: string;
}

export type TransitionResult = CommittedResult | ReenteredResult | AbortedResult | NoMatchResult;

export type AppliedResult = CommittedResult | ReenteredResult;

export function isApplied(result: TransitionResult): result is AppliedResult {
    return result.kind === 'committed' || result.kind === 'reentered';
}
