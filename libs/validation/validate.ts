import type { ZodIssue, ZodType, ZodTypeDef } from 'zod';

import { logger, type Logger } from '../logging/logger.js';
import type { SchemaIssue } from '../errors/runtimeErrors.js';

export type ValidationResult<T> =
    | { readonly success: true; readonly data: T }
    | { readonly success: false; readonly issues: readonly SchemaIssue[] };

export function toSchemaIssues(issues: readonly ZodIssue[]): SchemaIssue[] {
    return issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message
    }));
}

/**
 * Runs a zod schema and reports issues as `{path, message}` pairs.
 * Callers decide which error to raise; the raw input is never logged.
 */
export function validate<T>(
    schema: ZodType<T, ZodTypeDef, unknown>,
    data: unknown,
    context: string,
    log: Logger = logger
): ValidationResult<T> {
    const result = schema.safeParse(data);

    if (!result.success) {
        const issues = toSchemaIssues(result.error.issues);
        log.warn({ context, errors: issues }, 'Validation failure');
        return { success: false, issues };
    }

    return { success: true, data: result.data };
}
