import { ErrorSanitizer } from '../errors/sanitizer.js';

export type EnvSource = Readonly<Record<string, string | undefined>>;

export type GuardRule =
    | { type: 'required'; name: string; sensitive?: boolean; when?: (env: EnvSource) => boolean }
    | { type: 'forbidIf'; name: string; when: (env: EnvSource) => boolean; message: string }
    | { type: 'assert'; check: (env: EnvSource) => boolean; message: string };

/**
 * Evaluates guard rules against an environment and returns every
 * violation. Callers decide how to fail; nothing here exits the process.
 */
export class ConfigGuard {
    static evaluate(rules: readonly GuardRule[], env: EnvSource): string[] {
        const errors: string[] = [];

        for (const rule of rules) {
            try {
                switch (rule.type) {
                    case 'required': {
                        if (rule.when && !rule.when(env)) {
                            break;
                        }
                        const value = env[rule.name];
                        if (!value || value.trim() === '') {
                            errors.push(`Required env var ${rule.name} is missing`);
                        }
                        break;
                    }

                    case 'forbidIf': {
                        if (rule.when(env)) {
                            errors.push(`${rule.message} (Rule: ${rule.name})`);
                        }
                        break;
                    }

                    case 'assert': {
                        if (!rule.check(env)) {
                            errors.push(rule.message);
                        }
                        break;
                    }
                }
            } catch (err) {
                errors.push(`Check failed for rule: ${ErrorSanitizer.describe(err).message}`);
            }
        }

        return errors;
    }
}
