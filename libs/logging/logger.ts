import { pino, type Logger } from 'pino';

import { REDACT_KEYS, REDACT_CENSOR } from './redactionConfig.js';

export type { Logger } from 'pino';

export const logger = pino({
    level: process.env.LOG_LEVEL ?? 'info',
    base: {
        system: 'lifecycle-runtime'
    },
    redact: {
        paths: REDACT_KEYS,
        censor: REDACT_CENSOR
    }
});

export interface TransitionLogContext {
    readonly instance: string;
    readonly event: string;
    readonly correlationId: string;
}

/**
 * Returns a child logger with transition context attached.
 */
export function getTransitionLogger(context: TransitionLogContext, parent: Logger = logger): Logger {
    return parent.child({
        instance: context.instance,
        event: context.event,
        correlationId: context.correlationId
    });
}
