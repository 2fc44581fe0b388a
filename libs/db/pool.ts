import pg from 'pg';

const { Pool } = pg;

export type Queryable = {
    query<T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]): Promise<pg.QueryResult<T>>;
};

export interface DatabaseConfig {
    readonly host: string;
    readonly port: number;
    readonly user: string;
    readonly password: string;
    readonly database: string;
    readonly poolMax: number;
    /** PEM bundle; when present the connection requires verified TLS. */
    readonly caCert?: string;
}

/**
 * PostgreSQL pool for the snapshot store. Configuration is validated by
 * `loadRuntimeConfig`; nothing here falls back to defaults.
 */
export function createPool(config: DatabaseConfig): pg.Pool {
    return new Pool({
        host: config.host,
        port: config.port,
        user: config.user,
        password: config.password,
        database: config.database,
        max: config.poolMax,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        ssl: config.caCert
            ? { rejectUnauthorized: true, ca: config.caCert }
            : false
    });
}
