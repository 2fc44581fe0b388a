/**
 * Transition Engine
 *
 * Resolves an event against an instance's contract and applies the
 * matching transition as one atomic step:
 *
 *   exit actions of the source state
 *   ++ the transition's own actions
 *   ++ entry actions of the target state
 *
 * State and generation are written only after the whole sequence has
 * run. A failed critical action aborts the transition, compensates the
 * steps that already succeeded and leaves the instance untouched.
 */

import { randomUUID } from 'node:crypto';

import { getTransitionLogger, logger as rootLogger, type Logger } from '../logging/logger.js';
import { BusyError, FatalError } from '../errors/runtimeErrors.js';
import { transitionKey, type ActionDefinition, type Contract, type TransitionDefinition } from '../contract/types.js';
import type { ActionExecutor } from './actionExecutor.js';
import type { ActionContext, ActionPhase } from './actionTypes.js';
import type {
    AbortedResult,
    ActionRecord,
    FsmEvent,
    InstanceRuntime,
    TransitionResult
} from './transitionTypes.js';

interface PlannedAction {
    readonly phase: ActionPhase;
    readonly action: ActionDefinition;
}

type SequenceOutcome =
    | { readonly completed: true; readonly actions: ActionRecord[]; readonly failures: ActionRecord[] }
    | {
        readonly completed: false;
        readonly actions: ActionRecord[];
        readonly failures: ActionRecord[];
        readonly failed: ActionRecord;
        readonly rollbacks: ActionRecord[];
    };

export class TransitionEngine {
    private readonly logger: Logger;

    constructor(
        private readonly executor: ActionExecutor,
        logger: Logger = rootLogger
    ) {
        this.logger = logger.child({ component: 'TransitionEngine' });
    }

    /**
     * Exact (state, event) match first, then the wildcard for the event.
     * A terminal state only accepts a wildcard that targets itself.
     */
    resolve(contract: Contract, state: string, event: string): TransitionDefinition | undefined {
        const exact = contract.exactTransitions.get(transitionKey(state, event));
        if (exact) {
            return exact;
        }

        const wildcard = contract.wildcardTransitions.get(event);
        if (!wildcard) {
            return undefined;
        }

        const current = contract.stateIndex.get(state);
        if (current?.isTerminal && wildcard.toState !== state) {
            return undefined;
        }
        return wildcard;
    }

    /**
     * The ordered action list a transition from `fromState` would run.
     */
    plan(contract: Contract, transition: TransitionDefinition, fromState: string): PlannedAction[] {
        const source = contract.stateIndex.get(fromState);
        const target = contract.stateIndex.get(transition.toState);
        if (!source || !target) {
            throw new FatalError(contract.nodeName, `Contract ${contract.nodeName} has no state ${source ? transition.toState : fromState}`);
        }

        return [
            ...source.exitActions.map(name => ({ phase: 'exit' as const, action: requireAction(contract, name) })),
            ...transition.actions.map(name => ({ phase: 'transition' as const, action: requireAction(contract, name) })),
            ...target.entryActions.map(name => ({ phase: 'entry' as const, action: requireAction(contract, name) }))
        ];
    }

    /**
     * Apply one event. Throws BusyError, synchronously with respect to the
     * caller's turn, when the instance is already mid-transition.
     */
    async apply(instance: InstanceRuntime, event: FsmEvent): Promise<TransitionResult> {
        if (instance.inTransition) {
            throw new BusyError(instance.name, event.name);
        }

        const correlationId = event.correlationId ?? randomUUID();
        const log = getTransitionLogger({ instance: instance.name, event: event.name, correlationId }, this.logger);
        const { contract } = instance;
        const fromState = instance.currentState;
        const generation = instance.generation;

        const transition = this.resolve(contract, fromState, event.name);
        if (!transition) {
            log.debug({ state: fromState }, 'No transition for event');
            return {
                kind: 'no_match',
                instance: instance.name,
                event: event.name,
                correlationId,
                generation,
                state: fromState
            };
        }

        const reentry = transition.toState === fromState && (contract.stateIndex.get(fromState)?.isTerminal ?? false);

        instance.inTransition = true;
        try {
            const baseContext: Omit<ActionContext, 'phase'> = {
                instance: instance.name,
                nodeName: contract.nodeName,
                event: event.name,
                fromState,
                toState: transition.toState,
                generation,
                nextGeneration: reentry ? generation : generation + 1,
                reentry,
                correlationId,
                payload: event.payload ?? {}
            };

            const outcome = await this.runSequence(contract, this.plan(contract, transition, fromState), baseContext, log);

            const applied = {
                instance: instance.name,
                event: event.name,
                correlationId,
                transition: transition.name,
                fromState,
                toState: transition.toState,
                actions: outcome.actions,
                failures: outcome.failures
            };

            if (!outcome.completed) {
                const failure = outcome.failed.outcome.status === 'failure'
                    ? outcome.failed.outcome.failure.message
                    : 'action failed';
                const aborted: AbortedResult = {
                    ...applied,
                    kind: 'aborted',
                    generation,
                    failedAction: outcome.failed.outcome.actionName,
                    reason: failure,
                    rollbacks: outcome.rollbacks
                };
                log.warn({
                    transition: transition.name,
                    fromState,
                    toState: transition.toState,
                    failedAction: aborted.failedAction,
                    reason: aborted.reason,
                    rollbacks: aborted.rollbacks.length
                }, 'Transition aborted');
                return aborted;
            }

            if (reentry) {
                log.info({ state: fromState, generation }, 'Terminal state re-entered');
                return { ...applied, kind: 'reentered', generation };
            }

            instance.currentState = transition.toState;
            instance.generation = generation + 1;
            log.info({
                transition: transition.name,
                fromState,
                toState: transition.toState,
                generation: instance.generation,
                nonCriticalFailures: outcome.failures.length
            }, 'Transition committed');
            return { ...applied, kind: 'committed', generation: instance.generation };
        } finally {
            instance.inTransition = false;
        }
    }

    private async runSequence(
        contract: Contract,
        plan: readonly PlannedAction[],
        baseContext: Omit<ActionContext, 'phase'>,
        log: Logger
    ): Promise<SequenceOutcome> {
        const actions: ActionRecord[] = [];
        const failures: ActionRecord[] = [];

        for (const step of plan) {
            const outcome = await this.executor.execute(step.action, { ...baseContext, phase: step.phase });
            const record: ActionRecord = { phase: step.phase, outcome };
            actions.push(record);

            if (outcome.status === 'success') {
                continue;
            }
            if (step.action.isCritical) {
                const rollbacks = await this.rollback(contract, plan, actions, baseContext, log);
                return { completed: false, actions, failures, failed: record, rollbacks };
            }
            failures.push(record);
        }

        return { completed: true, actions, failures };
    }

    /**
     * Run the rollback action of every step that succeeded, newest first.
     * Compensation is best effort; a failing rollback is only logged.
     */
    private async rollback(
        contract: Contract,
        plan: readonly PlannedAction[],
        executed: readonly ActionRecord[],
        baseContext: Omit<ActionContext, 'phase'>,
        log: Logger
    ): Promise<ActionRecord[]> {
        const rollbacks: ActionRecord[] = [];

        for (let index = executed.length - 1; index >= 0; index -= 1) {
            const record = executed[index];
            const step = plan[index];
            if (!record || !step || record.outcome.status !== 'success' || !step.action.rollbackAction) {
                continue;
            }

            const compensation = requireAction(contract, step.action.rollbackAction);
            const outcome = await this.executor.execute(compensation, { ...baseContext, phase: 'rollback' });
            rollbacks.push({ phase: 'rollback', outcome });

            if (outcome.status === 'failure') {
                log.error({
                    action: step.action.actionName,
                    rollbackAction: compensation.actionName,
                    failure: outcome.failure
                }, 'Rollback action failed');
            }
        }

        return rollbacks;
    }
}

function requireAction(contract: Contract, name: string): ActionDefinition {
    const action = contract.actions.get(name);
    if (!action) {
        throw new FatalError(contract.nodeName, `Contract ${contract.nodeName} references undeclared action ${name}`);
    }
    return action;
}
