/**
 * Event names and state names shared by the orchestrator and the bundled
 * runtime contracts under contracts/runtime/. Renaming one here means
 * renaming it in the YAML as well.
 */

export const LIFECYCLE_EVENTS = {
    loadRequested: 'load_requested',
    contractsDiscovered: 'contracts_discovered',
    discoveryFailed: 'discovery_failed',
    validateRequested: 'validate_requested',
    validationPassed: 'validation_passed',
    validationFailed: 'validation_failed',
    start: 'start',
    wireRequested: 'wire_requested',
    wired: 'wired',
    wiringFailed: 'wiring_failed',
    wiringComplete: 'wiring_complete',
    shutdownRequested: 'shutdown_requested',
    drainComplete: 'drain_complete',
    fatalError: 'fatal_error'
} as const;

export type LifecycleEvent = (typeof LIFECYCLE_EVENTS)[keyof typeof LIFECYCLE_EVENTS];

export const INSTANCE_ROLES = ['loader', 'registry', 'graph', 'wiring'] as const;

export type InstanceRole = (typeof INSTANCE_ROLES)[number];

/** Node name of the bundled contract each role runs. */
export const RUNTIME_NODE_NAMES: Readonly<Record<InstanceRole, string>> = {
    loader: 'contract_loader_effect',
    registry: 'contract_registry_reducer',
    graph: 'node_graph_reducer',
    wiring: 'event_bus_wiring_effect'
};

/** State each role must hold before the runtime reports ready. */
export const READY_STATES: Readonly<Record<InstanceRole, string>> = {
    loader: 'ready',
    registry: 'ready',
    graph: 'running',
    wiring: 'ready'
};
