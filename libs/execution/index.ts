/**
 * Execution Library
 *
 * Action execution and transition application.
 */

// Actions
export type {
    ActionContext,
    ActionFailure,
    ActionFailureKind,
    ActionOutcome,
    ActionPhase,
    EffectHandler,
    EffectResult
} from './actionTypes.js';
export { ActionExecutor } from './actionExecutor.js';
export { EffectRegistry } from './effectRegistry.js';

// Transitions
export type {
    AbortedResult,
    ActionRecord,
    AppliedResult,
    CommittedResult,
    FsmEvent,
    InstanceRuntime,
    NoMatchResult,
    ReenteredResult,
    TransitionResult
} from './transitionTypes.js';
export { isApplied } from './transitionTypes.js';
export { TransitionEngine } from './transitionEngine.js';
