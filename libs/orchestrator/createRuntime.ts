/**
 * Assembles a runtime from configuration: loads the bundled runtime
 * contracts, builds the effect handlers and the four FSM instances,
 * and hands them to a RuntimeOrchestrator.
 */

import type { Pool } from 'pg';

import { logger as rootLogger, type Logger } from '../logging/logger.js';
import { ContractLoadError } from '../errors/runtimeErrors.js';
import type { RuntimeConfig } from '../bootstrap/config.js';
import { ContractLoader } from '../contract/loader.js';
import { parseContract } from '../contract/parseContract.js';
import type { Contract } from '../contract/types.js';
import { createPool } from '../db/pool.js';
import { LoggingAlertSink, type AlertSink } from '../effects/alertSink.js';
import { InMemoryCaptureStore, type CaptureStore } from '../effects/captureStore.js';
import { InMemoryEventBus, type EventBus } from '../effects/eventBus.js';
import { createEffectRegistry } from '../effects/handlers.js';
import { ResourceRegistry } from '../effects/resources.js';
import { InMemorySnapshotStore, PgSnapshotStore, type SnapshotStore } from '../effects/snapshotStore.js';
import { ActionExecutor } from '../execution/actionExecutor.js';
import type { EffectHandler } from '../execution/actionTypes.js';
import type { EffectRegistry } from '../execution/effectRegistry.js';
import { TransitionEngine } from '../execution/transitionEngine.js';
import { FsmInstance } from '../fsm/FsmInstance.js';
import type { NodeMessageHandler } from '../graph/eventBusWiring.js';
import { resolveNodeGraph } from '../graph/nodeGraph.js';
import { ContractRegistry } from '../registry/contractRegistry.js';
import { InFlightTracker } from './inFlight.js';
import { INSTANCE_ROLES, RUNTIME_NODE_NAMES, type InstanceRole } from './lifecycleEvents.js';
import { RuntimeOrchestrator, type RuntimeInstances } from './RuntimeOrchestrator.js';

export interface CreateRuntimeOptions {
    readonly config: RuntimeConfig;
    readonly bus?: EventBus;
    readonly snapshots?: SnapshotStore;
    readonly captures?: CaptureStore;
    readonly alerts?: AlertSink;
    /** Handlers keyed by action name, replacing the handler for the action's type. */
    readonly effectOverrides?: Readonly<Record<string, EffectHandler>>;
    readonly messageHandler?: NodeMessageHandler;
    readonly logger?: Logger;
}

export interface Runtime {
    readonly orchestrator: RuntimeOrchestrator;
    readonly instances: RuntimeInstances;
    readonly registry: ContractRegistry;
    readonly bus: EventBus;
    readonly resources: ResourceRegistry;
    readonly snapshots: SnapshotStore;
    readonly effects: EffectRegistry;
    /** Release what the runtime opened itself (the database pool). */
    close(): Promise<void>;
}

/**
 * Load and check the runtime's own contracts, keyed by role.
 */
export async function loadRuntimeContracts(
    loader: ContractLoader,
    rootDir: string
): Promise<Readonly<Record<InstanceRole, Contract>>> {
    const documents = await loader.discover();
    const byName = new Map<string, Contract>();
    for (const { path, document } of documents) {
        const contract = parseContract(document, path);
        byName.set(contract.nodeName, contract);
    }

    const pick = (role: InstanceRole): Contract => {
        const contract = byName.get(RUNTIME_NODE_NAMES[role]);
        if (!contract) {
            throw new ContractLoadError(rootDir, `runtime contract ${RUNTIME_NODE_NAMES[role]} not found`);
        }
        return contract;
    };

    const contracts = {
        loader: pick('loader'),
        registry: pick('registry'),
        graph: pick('graph'),
        wiring: pick('wiring')
    };
    resolveNodeGraph(INSTANCE_ROLES.map(role => contracts[role]));
    return contracts;
}

export async function createRuntime(options: CreateRuntimeOptions): Promise<Runtime> {
    const { config } = options;
    const log = options.logger ?? rootLogger;

    const runtimeLoader = new ContractLoader({
        rootDir: config.runtimeContractsDir,
        maxFileBytes: config.contractMaxBytes,
        cacheSize: config.contractCacheSize,
        logger: log
    });
    const runtimeContracts = await loadRuntimeContracts(runtimeLoader, config.runtimeContractsDir);

    let pool: Pool | null = null;
    let snapshots = options.snapshots;
    if (!snapshots) {
        if (config.snapshotStore.kind === 'postgres') {
            pool = createPool(config.snapshotStore.database);
            snapshots = new PgSnapshotStore(pool);
        } else {
            snapshots = new InMemorySnapshotStore();
        }
    }

    const bus = options.bus ?? new InMemoryEventBus({ logger: log });
    const resources = new ResourceRegistry(log);
    const effects = createEffectRegistry({
        bus,
        snapshots,
        captures: options.captures ?? new InMemoryCaptureStore(),
        alerts: options.alerts ?? new LoggingAlertSink(log),
        resources,
        logger: log
    });
    for (const [actionName, handler] of Object.entries(options.effectOverrides ?? {})) {
        effects.override(actionName, handler);
    }

    const engine = new TransitionEngine(new ActionExecutor(effects, log), log);
    const instance = (role: InstanceRole): FsmInstance =>
        new FsmInstance({ contract: runtimeContracts[role], engine, logger: log });
    const instances: RuntimeInstances = {
        loader: instance('loader'),
        registry: instance('registry'),
        graph: instance('graph'),
        wiring: instance('wiring')
    };

    const registry = new ContractRegistry(log);
    const orchestrator = new RuntimeOrchestrator({
        instances,
        source: new ContractLoader({
            rootDir: config.contractsDir,
            maxFileBytes: config.contractMaxBytes,
            cacheSize: config.contractCacheSize,
            logger: log
        }),
        registry,
        bus,
        resources,
        inFlight: new InFlightTracker(),
        settings: {
            drainTimeoutMs: config.drainTimeoutMs,
            busyRetryLimit: config.busyRetryLimit,
            busyRetryDelayMs: config.busyRetryDelayMs
        },
        logger: log,
        ...(options.messageHandler ? { messageHandler: options.messageHandler } : {})
    });

    return {
        orchestrator,
        instances,
        registry,
        bus,
        resources,
        snapshots,
        effects,
        close: async () => {
            if (pool) {
                await pool.end();
            }
        }
    };
}
