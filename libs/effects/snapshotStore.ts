/**
 * Snapshot Store
 *
 * Durable record of an instance's latest state, written by `persistence`
 * actions. Saves are idempotent: writing the same (state, generation)
 * twice leaves the stored record as the first write left it.
 */

import type { Queryable } from '../db/pool.js';

export interface StateSnapshotRecord {
    readonly instance: string;
    readonly nodeName: string;
    readonly state: string;
    readonly generation: number;
    readonly correlationId: string;
    readonly data: Readonly<Record<string, unknown>>;
    readonly savedAt: string;
}

export interface SnapshotStore {
    /** Returns false when an identical (state, generation) record was already stored. */
    save(record: StateSnapshotRecord): Promise<boolean>;
    load(instance: string): Promise<StateSnapshotRecord | null>;
}

export class InMemorySnapshotStore implements SnapshotStore {
    private readonly records = new Map<string, StateSnapshotRecord>();

    async save(record: StateSnapshotRecord): Promise<boolean> {
        const existing = this.records.get(record.instance);
        if (existing && existing.state === record.state && existing.generation === record.generation) {
            return false;
        }
        this.records.set(record.instance, Object.freeze({ ...record }));
        return true;
    }

    async load(instance: string): Promise<StateSnapshotRecord | null> {
        return this.records.get(instance) ?? null;
    }

    get size(): number {
        return this.records.size;
    }
}

interface SnapshotRow {
    instance_name: string;
    node_name: string;
    state: string;
    generation: number;
    correlation_id: string;
    data: Record<string, unknown> | null;
    saved_at: string | Date;
}

/**
 * PostgreSQL-backed store. Expects:
 *
 *   CREATE TABLE fsm_state_snapshots (
 *       instance_name  TEXT PRIMARY KEY,
 *       node_name      TEXT NOT NULL,
 *       state          TEXT NOT NULL,
 *       generation     INTEGER NOT NULL,
 *       correlation_id TEXT NOT NULL,
 *       data           JSONB NOT NULL DEFAULT '{}',
 *       saved_at       TIMESTAMPTZ NOT NULL
 *   );
 */
export class PgSnapshotStore implements SnapshotStore {
    constructor(
        private readonly client: Queryable,
        private readonly table = 'fsm_state_snapshots'
    ) {
        if (!/^[a-z_][a-z0-9_]*$/.test(table)) {
            throw new Error(`Invalid snapshot table name: ${table}`);
        }
    }

    async save(record: StateSnapshotRecord): Promise<boolean> {
        const result = await this.client.query(
            `INSERT INTO ${this.table} (
                instance_name,
                node_name,
                state,
                generation,
                correlation_id,
                data,
                saved_at
            ) VALUES ($1, $2, $3, $4, $5, $6, $7)
            ON CONFLICT (instance_name) DO UPDATE SET
                node_name = EXCLUDED.node_name,
                state = EXCLUDED.state,
                generation = EXCLUDED.generation,
                correlation_id = EXCLUDED.correlation_id,
                data = EXCLUDED.data,
                saved_at = EXCLUDED.saved_at
            WHERE ${this.table}.state <> EXCLUDED.state
               OR ${this.table}.generation <> EXCLUDED.generation`,
            [
                record.instance,
                record.nodeName,
                record.state,
                record.generation,
                record.correlationId,
                JSON.stringify(record.data),
                record.savedAt
            ]
        );
        return (result.rowCount ?? 0) > 0;
    }

    async load(instance: string): Promise<StateSnapshotRecord | null> {
        const result = await this.client.query<SnapshotRow>(
            `SELECT instance_name, node_name, state, generation, correlation_id, data, saved_at
             FROM ${this.table}
             WHERE instance_name = $1`,
            [instance]
        );

        const row = result.rows[0];
        if (!row) {
            return null;
        }
        return {
            instance: row.instance_name,
            nodeName: row.node_name,
            state: row.state,
            generation: row.generation,
            correlationId: row.correlation_id,
            data: row.data ?? {},
            savedAt: row.saved_at instanceof Date ? row.saved_at.toISOString() : row.saved_at
        };
    }
}
