/**
 * Runtime Configuration
 *
 * Parsed once from the environment at startup. Every violation, schema or
 * guard, is collected and raised together as a single ConfigError.
 */

import { resolve } from 'node:path';
import { z } from 'zod';

import { logger as rootLogger, type Logger } from '../logging/logger.js';
import { ConfigError } from '../errors/runtimeErrors.js';
import type { DatabaseConfig } from '../db/pool.js';
import { validate } from '../validation/validate.js';
import { ConfigGuard, type EnvSource, type GuardRule } from './config-guard.js';

const PositiveInt = z.coerce.number().int().positive();
const NonNegativeInt = z.coerce.number().int().nonnegative();

const EnvSchema = z.object({
    CONTRACTS_DIR: z.string().trim().min(1).default('contracts/nodes'),
    RUNTIME_CONTRACTS_DIR: z.string().trim().min(1).default('contracts/runtime'),
    DRAIN_TIMEOUT_MS: PositiveInt.default(5000),
    BUSY_RETRY_LIMIT: NonNegativeInt.default(3),
    BUSY_RETRY_DELAY_MS: NonNegativeInt.default(25),
    CONTRACT_CACHE_SIZE: PositiveInt.default(256),
    CONTRACT_MAX_BYTES: PositiveInt.default(1024 * 1024),
    SNAPSHOT_STORE: z.enum(['memory', 'postgres']).default('memory'),
    DB_HOST: z.string().optional(),
    DB_PORT: PositiveInt.max(65535).optional(),
    DB_USER: z.string().optional(),
    DB_PASSWORD: z.string().optional(),
    DB_NAME: z.string().optional(),
    DB_POOL_MAX: PositiveInt.default(10),
    DB_CA_CERT: z.string().optional(),
    NODE_ENV: z.string().optional()
});

const usesPostgres = (env: EnvSource): boolean => env.SNAPSHOT_STORE === 'postgres';
const isProtectedEnv = (env: EnvSource): boolean => env.NODE_ENV === 'production' || env.NODE_ENV === 'staging';

export const RUNTIME_CONFIG_GUARDS: readonly GuardRule[] = [
    { type: 'required', name: 'DB_HOST', when: usesPostgres },
    { type: 'required', name: 'DB_PORT', when: usesPostgres },
    { type: 'required', name: 'DB_USER', when: usesPostgres },
    { type: 'required', name: 'DB_PASSWORD', sensitive: true, when: usesPostgres },
    { type: 'required', name: 'DB_NAME', when: usesPostgres },
    {
        type: 'forbidIf',
        name: 'PROTECTED_MEMORY_SNAPSHOTS',
        when: env => isProtectedEnv(env) && !usesPostgres(env),
        message: 'SNAPSHOT_STORE=memory is not allowed in production/staging'
    },
    {
        type: 'assert',
        check: env => !isProtectedEnv(env) || !usesPostgres(env) || !!env.DB_CA_CERT,
        message: 'DB_CA_CERT is required in production/staging'
    }
];

export type SnapshotStoreConfig =
    | { readonly kind: 'memory' }
    | { readonly kind: 'postgres'; readonly database: DatabaseConfig };

export interface RuntimeConfig {
    readonly contractsDir: string;
    readonly runtimeContractsDir: string;
    readonly drainTimeoutMs: number;
    readonly busyRetryLimit: number;
    readonly busyRetryDelayMs: number;
    readonly contractCacheSize: number;
    readonly contractMaxBytes: number;
    readonly snapshotStore: SnapshotStoreConfig;
}

/**
 * Relative directories resolve against `cwd`.
 */
export function loadRuntimeConfig(
    env: EnvSource = process.env,
    cwd: string = process.cwd(),
    log: Logger = rootLogger
): RuntimeConfig {
    const parsed = validate(EnvSchema, env, 'runtime configuration', log);
    const violations = [
        ...(parsed.success ? [] : parsed.issues.map(issue => `${issue.path}: ${issue.message}`)),
        ...ConfigGuard.evaluate(RUNTIME_CONFIG_GUARDS, env)
    ];

    if (!parsed.success || violations.length > 0) {
        log.fatal({ violations, remediation: 'Check environment variables.' }, 'Configuration Guard Violation');
        throw new ConfigError(violations);
    }

    const values = parsed.data;
    return {
        contractsDir: resolve(cwd, values.CONTRACTS_DIR),
        runtimeContractsDir: resolve(cwd, values.RUNTIME_CONTRACTS_DIR),
        drainTimeoutMs: values.DRAIN_TIMEOUT_MS,
        busyRetryLimit: values.BUSY_RETRY_LIMIT,
        busyRetryDelayMs: values.BUSY_RETRY_DELAY_MS,
        contractCacheSize: values.CONTRACT_CACHE_SIZE,
        contractMaxBytes: values.CONTRACT_MAX_BYTES,
        snapshotStore: values.SNAPSHOT_STORE === 'postgres'
            ? {
                kind: 'postgres',
                database: {
                    host: values.DB_HOST ?? '',
                    port: values.DB_PORT ?? 5432,
                    user: values.DB_USER ?? '',
                    password: values.DB_PASSWORD ?? '',
                    database: values.DB_NAME ?? '',
                    poolMax: values.DB_POOL_MAX,
                    ...(values.DB_CA_CERT ? { caCert: values.DB_CA_CERT } : {})
                }
            }
            : { kind: 'memory' }
    };
}
