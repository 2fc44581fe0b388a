import type { InstanceSnapshot } from '../fsm/FsmInstance.js';
import type { InstanceRole } from './lifecycleEvents.js';

export type OrchestratorPhase = 'created' | 'starting' | 'ready' | 'failed' | 'stopping' | 'stopped';

export type HealthStatus = 'healthy' | 'degraded' | 'starting' | 'unhealthy' | 'stopped';

export interface HealthSummary {
    readonly status: HealthStatus;
    readonly healthy: boolean;
    readonly phase: OrchestratorPhase;
    readonly reason?: string;
    readonly instances: Readonly<Record<InstanceRole, InstanceSnapshot>>;
    readonly checkedAt: string;
}

/**
 * Collapse per-instance snapshots into one status.
 *
 * - unhealthy: the runtime failed or an instance sits in an error state
 * - degraded: ready, but an instance's last transition aborted or recorded
 *   non-critical failures
 */
export function summarizeHealth(
    phase: OrchestratorPhase,
    instances: Readonly<Record<InstanceRole, InstanceSnapshot>>,
    fatalReason?: string
): HealthSummary {
    const snapshots = Object.values(instances);
    const checkedAt = new Date().toISOString();
    const build = (status: HealthStatus, reason?: string): HealthSummary => ({
        status,
        healthy: status === 'healthy' || status === 'degraded',
        phase,
        ...(reason !== undefined ? { reason } : {}),
        instances,
        checkedAt
    });

    const errored = snapshots.filter(snapshot => snapshot.stateType === 'error');
    if (phase === 'failed' || errored.length > 0) {
        return build(
            'unhealthy',
            fatalReason ?? `Instances in error state: ${errored.map(snapshot => snapshot.instance).join(', ')}`
        );
    }

    if (phase === 'stopping' || phase === 'stopped') {
        return build('stopped');
    }
    if (phase === 'created' || phase === 'starting') {
        return build('starting');
    }

    const troubled = snapshots.filter(snapshot =>
        snapshot.lastTransition !== null &&
        (snapshot.lastTransition.kind === 'aborted' || snapshot.lastTransition.failedActions.length > 0)
    );
    if (troubled.length > 0) {
        return build('degraded', `Recent action failures in: ${troubled.map(snapshot => snapshot.instance).join(', ')}`);
    }

    return build('healthy');
}
