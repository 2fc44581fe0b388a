import { RuntimeError } from './runtimeErrors.js';

export interface ErrorDescription {
    readonly message: string;
    readonly code?: string;
    readonly stack?: string;
}

/**
 * Normalises arbitrary thrown values before they enter action outcomes or logs.
 * Action effects are external collaborators and may throw anything.
 */
export const ErrorSanitizer = {
    describe: (err: unknown): ErrorDescription => {
        if (err instanceof RuntimeError) {
            return { message: err.message, code: err.code, ...(err.stack ? { stack: err.stack } : {}) };
        }

        if (err instanceof Error) {
            const code = 'code' in err ? err.code : undefined;
            return {
                message: err.message,
                ...(typeof code === 'string' ? { code } : {}),
                ...(err.stack ? { stack: err.stack } : {})
            };
        }

        if (typeof err === 'string') {
            return { message: err };
        }

        if (err && typeof err === 'object' && 'message' in err && typeof err.message === 'string') {
            const code = 'code' in err ? err.code : undefined;
            return {
                message: err.message,
                ...(typeof code === 'string' ? { code } : {})
            };
        }

        return { message: String(err) };
    },

    /**
     * Wraps a non-Error value so it can be used as an `Error` cause.
     */
    toError: (err: unknown): Error => {
        if (err instanceof Error) return err;
        return new Error(ErrorSanitizer.describe(err).message, { cause: err });
    }
};
