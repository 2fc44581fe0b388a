/**
 * Contract Lifecycle Runtime
 */

export * from './errors/runtimeErrors.js';
export { ErrorSanitizer } from './errors/sanitizer.js';
export { logger, getTransitionLogger } from './logging/logger.js';
export type { Logger, TransitionLogContext } from './logging/logger.js';

// Contract model
export * from './contract/types.js';
export { parseContract } from './contract/parseContract.js';
export { analyzeContract } from './contract/analysis.js';
export type { ContractAnalysis } from './contract/analysis.js';
export { ContractLoader, loadContractFile } from './contract/loader.js';
export type { ContractLoaderOptions, DiscoveredDocument } from './contract/loader.js';
export { lintContracts } from './contract/lint.js';
export type { LintResult, LintSummary } from './contract/lint.js';
export { compareVersions, isCompatible } from './contract/version.js';

export * from './execution/index.js';
export * from './effects/index.js';

export { FsmInstance } from './fsm/FsmInstance.js';
export type {
    InstanceSnapshot,
    StateChangedListener,
    StateChangedNotification,
    TransitionSummary
} from './fsm/FsmInstance.js';

export { ContractRegistry } from './registry/contractRegistry.js';
export type { RegistryValidation } from './registry/contractRegistry.js';
export { resolveNodeGraph } from './graph/nodeGraph.js';
export type { NodeGraph } from './graph/nodeGraph.js';
export { validateNodeTopics, wireNodeSubscriptions, WIRING_RESOURCE_GROUP } from './graph/eventBusWiring.js';
export type { NodeMessageHandler, WiringReport } from './graph/eventBusWiring.js';

// Orchestration
export { RuntimeOrchestrator, DEFAULT_ORCHESTRATOR_SETTINGS } from './orchestrator/RuntimeOrchestrator.js';
export type {
    ContractSource,
    OrchestratorSettings,
    ReadyListener,
    RuntimeInstances,
    RuntimeReadyReport,
    ShutdownReport
} from './orchestrator/RuntimeOrchestrator.js';
export { createRuntime, loadRuntimeContracts } from './orchestrator/createRuntime.js';
export type { CreateRuntimeOptions, Runtime } from './orchestrator/createRuntime.js';
export { InFlightTracker } from './orchestrator/inFlight.js';
export { summarizeHealth } from './orchestrator/health.js';
export type { HealthStatus, HealthSummary, OrchestratorPhase } from './orchestrator/health.js';
export { INSTANCE_ROLES, LIFECYCLE_EVENTS, READY_STATES, RUNTIME_NODE_NAMES } from './orchestrator/lifecycleEvents.js';
export type { InstanceRole, LifecycleEvent } from './orchestrator/lifecycleEvents.js';

// Configuration
export { loadRuntimeConfig, RUNTIME_CONFIG_GUARDS } from './bootstrap/config.js';
export type { RuntimeConfig, SnapshotStoreConfig } from './bootstrap/config.js';
export { createPool } from './db/pool.js';
export type { DatabaseConfig, Queryable } from './db/pool.js';
