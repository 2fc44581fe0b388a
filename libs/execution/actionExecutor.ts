/**
 * Action Executor
 *
 * Runs a single contract action through its effect handler under the
 * action's timeout. Never throws: every result, including a handler
 * crash, comes back as an ActionOutcome.
 */

import { logger as rootLogger, type Logger } from '../logging/logger.js';
import { ActionTimeoutError } from '../errors/runtimeErrors.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { formatVersion, type ActionDefinition } from '../contract/types.js';
import type { ActionContext, ActionFailure, ActionOutcome, EffectResult } from './actionTypes.js';
import type { EffectRegistry } from './effectRegistry.js';

const SUCCESS: EffectResult = { ok: true };

type Settled =
    | { readonly kind: 'settled'; readonly result: EffectResult }
    | { readonly kind: 'thrown'; readonly error: unknown }
    | { readonly kind: 'timeout' };

export class ActionExecutor {
    private readonly logger: Logger;

    constructor(
        private readonly effects: EffectRegistry,
        logger: Logger = rootLogger
    ) {
        this.logger = logger.child({ component: 'ActionExecutor' });
    }

    async execute(action: ActionDefinition, context: ActionContext): Promise<ActionOutcome> {
        const startedAt = Date.now();
        const handler = this.effects.resolve(action);

        if (!handler) {
            return this.fail(action, context, startedAt, {
                kind: 'no_handler',
                message: `No effect handler registered for action type ${action.actionType}`
            });
        }

        const controller = new AbortController();
        let timer: NodeJS.Timeout | undefined;

        const deadline = new Promise<Settled>((resolve) => {
            timer = setTimeout(() => resolve({ kind: 'timeout' }), action.timeoutMs);
        });

        // Rejections are folded into the value so a handler that settles
        // after the deadline cannot surface as an unhandled rejection.
        const run = Promise.resolve()
            .then(() => handler(action, context, controller.signal))
            .then(
                (result): Settled => ({ kind: 'settled', result: result || SUCCESS }),
                (error: unknown): Settled => ({ kind: 'thrown', error })
            );

        const settled = await Promise.race([run, deadline]);
        clearTimeout(timer);

        switch (settled.kind) {
            case 'timeout': {
                const error = new ActionTimeoutError(action.actionName, action.timeoutMs);
                controller.abort(error);
                return this.fail(action, context, startedAt, {
                    kind: 'timeout',
                    message: error.message,
                    code: error.code
                });
            }
            case 'thrown': {
                const described = ErrorSanitizer.describe(settled.error);
                return this.fail(action, context, startedAt, {
                    kind: 'thrown',
                    message: described.message,
                    ...(described.code !== undefined ? { code: described.code } : {})
                });
            }
            case 'settled': {
                const result = settled.result;
                if (!result.ok) {
                    return this.fail(action, context, startedAt, { kind: 'reported', message: result.reason });
                }

                const outcome: ActionOutcome = {
                    status: 'success',
                    actionName: action.actionName,
                    actionType: action.actionType,
                    isCritical: action.isCritical,
                    durationMs: Date.now() - startedAt,
                    ...(result.detail ? { detail: result.detail } : {})
                };
                this.logger.debug({
                    action: action.actionName,
                    actionVersion: formatVersion(action.version),
                    instance: context.instance,
                    phase: context.phase,
                    durationMs: outcome.durationMs
                }, 'Action completed');
                return outcome;
            }
        }
    }

    private fail(
        action: ActionDefinition,
        context: ActionContext,
        startedAt: number,
        failure: ActionFailure
    ): ActionOutcome {
        const level = action.isCritical ? 'error' : 'warn';
        this.logger[level]({
            action: action.actionName,
            actionType: action.actionType,
            actionVersion: formatVersion(action.version),
            instance: context.instance,
            phase: context.phase,
            correlationId: context.correlationId,
            failure
        }, 'Action failed');

        return {
            status: 'failure',
            actionName: action.actionName,
            actionType: action.actionType,
            isCritical: action.isCritical,
            durationMs: Date.now() - startedAt,
            failure
        };
    }
}
