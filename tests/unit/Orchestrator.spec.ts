/**
 * Unit Tests: Runtime Orchestrator
 *
 * Runs the bundled runtime contracts end to end against in-memory
 * collaborators: startup, failure propagation, busy retries and shutdown.
 *
 * @see libs/orchestrator/RuntimeOrchestrator.ts
 * @see libs/orchestrator/createRuntime.ts
 */

import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import { fileURLToPath } from 'node:url';
import { stringify } from 'yaml';

import type { RuntimeConfig } from '../../libs/bootstrap/config.js';
import { InMemoryEventBus } from '../../libs/effects/eventBus.js';
import { InMemorySnapshotStore } from '../../libs/effects/snapshotStore.js';
import { RUNTIME_READY_TOPIC, RUNTIME_STOPPED_TOPIC } from '../../libs/effects/topics.js';
import { BusyError, DependencyError, FatalError, SchemaError } from '../../libs/errors/runtimeErrors.js';
import type { NodeMessageHandler } from '../../libs/graph/eventBusWiring.js';
import { WIRING_RESOURCE_GROUP } from '../../libs/graph/eventBusWiring.js';
import { createRuntime, type CreateRuntimeOptions, type Runtime } from '../../libs/orchestrator/createRuntime.js';
import { silentLogger } from '../support/harness.js';

const RUNTIME_DIR = fileURLToPath(new URL('../../contracts/runtime', import.meta.url));
const NODES_DIR = fileURLToPath(new URL('../../contracts/nodes', import.meta.url));

const SUBMIT_ORDER = 'runtime.cmd.order-intake-effect.submit-order.v1';
const INTAKE_OPENED = 'runtime.evt.order-intake-effect.intake-opened.v1';

function testConfig(overrides: Partial<RuntimeConfig> = {}): RuntimeConfig {
    return {
        contractsDir: NODES_DIR,
        runtimeContractsDir: RUNTIME_DIR,
        drainTimeoutMs: 200,
        busyRetryLimit: 10,
        busyRetryDelayMs: 10,
        contractCacheSize: 16,
        contractMaxBytes: 64 * 1024,
        snapshotStore: { kind: 'memory' },
        ...overrides
    };
}

function ledgerDocument(): Record<string, unknown> {
    return {
        node_name: 'order_ledger_reducer',
        node_type: 'REDUCER_GENERIC',
        contract_version: '2.0.1',
        dependencies: [{ node_name: 'order_intake_effect', version: '1.0.0' }],
        states: [
            { state_name: 'empty', is_initial: true },
            { state_name: 'sealed', is_terminal: true }
        ],
        transitions: [{ from_state: 'empty', to_state: 'sealed', event: 'seal' }]
    };
}

describe('RuntimeOrchestrator', () => {
    let bus: InMemoryEventBus;
    let snapshots: InMemorySnapshotStore;
    let runtime: Runtime | undefined;

    async function build(options: Partial<CreateRuntimeOptions> = {}): Promise<Runtime> {
        runtime = await createRuntime({ config: testConfig(), bus, snapshots, logger: silentLogger, ...options });
        return runtime;
    }

    beforeEach(() => {
        bus = new InMemoryEventBus({ logger: silentLogger });
        snapshots = new InMemorySnapshotStore();
        runtime = undefined;
    });

    afterEach(async () => {
        await runtime?.close();
    });

    describe('start', () => {
        it('should bring every runtime instance to its ready state', async () => {
            const { orchestrator, instances, resources } = await build();
            const onReady = mock.fn();
            orchestrator.onReady(onReady);

            const report = await orchestrator.start();

            assert.deepStrictEqual(report.nodes, ['order_intake_effect', 'order_ledger_reducer']);
            assert.strictEqual(report.subscriptions, 2);
            assert.strictEqual(orchestrator.phase, 'ready');
            assert.strictEqual(onReady.mock.callCount(), 1);

            assert.deepStrictEqual(
                [instances.loader, instances.registry, instances.graph, instances.wiring].map(i => [i.currentState, i.generation]),
                [['ready', 2], ['ready', 2], ['running', 2], ['ready', 2]]
            );
            assert.strictEqual(resources.count(WIRING_RESOURCE_GROUP), 2);
            assert.strictEqual(bus.subscriberCount(SUBMIT_ORDER), 1);
            assert.strictEqual(bus.subscriberCount(INTAKE_OPENED), 1);
            assert.strictEqual(bus.published(RUNTIME_READY_TOPIC).length, 1);
            assert.deepStrictEqual(orchestrator.nodeGraph?.order.map(contract => contract.nodeName), report.nodes);
        });

        it('should run contract actions along the way', async () => {
            const { orchestrator } = await build();

            await orchestrator.start();

            const graph = await snapshots.load('node_graph_reducer');
            assert.strictEqual(graph?.state, 'running');
            assert.strictEqual(graph?.generation, 2);
            assert.strictEqual(bus.published('runtime.evt.contract-loader-effect.contracts-discovered.v1').length, 1);
            assert.strictEqual(bus.published('runtime.evt.node-graph-reducer.graph-running.v1').length, 1);
            assert.strictEqual(bus.published('runtime.evt.event-bus-wiring-effect.wiring-ready.v1').length, 1);
        });

        it('should report healthy once ready', async () => {
            const { orchestrator } = await build();
            assert.strictEqual(orchestrator.health().status, 'starting');

            await orchestrator.start();
            const health = orchestrator.health();

            assert.strictEqual(health.status, 'healthy');
            assert.strictEqual(health.healthy, true);
            assert.strictEqual(health.phase, 'ready');
            assert.strictEqual(health.instances.graph.currentState, 'running');
        });

        it('should refuse to start twice', async () => {
            const { orchestrator } = await build();
            await orchestrator.start();

            await assert.rejects(orchestrator.start(), (error: unknown) =>
                error instanceof FatalError && error.message === 'Runtime cannot start from phase ready'
            );
        });

        it('should route subscribed messages to the node handler', async () => {
            const received: string[] = [];
            const messageHandler: NodeMessageHandler = async (node, message) => {
                received.push(`${node.nodeName}:${String(message.payload.orderId)}`);
            };
            const { orchestrator } = await build({ messageHandler });
            await orchestrator.start();

            await bus.publish(SUBMIT_ORDER, { orderId: 'o-9' });

            assert.deepStrictEqual(received, ['order_intake_effect:o-9']);
        });
    });

    describe('startup failures', () => {
        let nodesDir: string;

        beforeEach(async () => {
            nodesDir = await mkdtemp(join(tmpdir(), 'runtime-nodes-'));
        });

        afterEach(async () => {
            await rm(nodesDir, { recursive: true, force: true });
        });

        it('should fail with one FatalError and move every instance to an error state when validation fails', async () => {
            const brokenPath = join(nodesDir, 'broken.yaml');
            await writeFile(join(nodesDir, 'ledger.yaml'), stringify({ ...ledgerDocument(), dependencies: [] }));
            await writeFile(brokenPath, stringify({ ...ledgerDocument(), node_name: 'broken_node', states: [] }));
            const { orchestrator, instances, registry } = await build({ config: testConfig({ contractsDir: nodesDir }) });

            await assert.rejects(orchestrator.start(), (error: unknown) =>
                error instanceof FatalError &&
                error.instance === 'contract_registry_reducer' &&
                error.message.startsWith(`Runtime startup failed in contract_registry_reducer: Contract ${brokenPath} is invalid: states: `) &&
                error.cause instanceof SchemaError
            );

            assert.strictEqual(orchestrator.phase, 'failed');
            assert.strictEqual(registry.size, 0);
            assert.deepStrictEqual(
                [instances.loader, instances.registry, instances.graph, instances.wiring].map(i => [i.currentState, i.stateType]),
                [['error', 'error'], ['error', 'error'], ['failed', 'error'], ['error', 'error']]
            );
            assert.strictEqual(orchestrator.fatalReason, 'contract_registry_reducer entered error on validation_failed');

            const health = orchestrator.health();
            assert.strictEqual(health.status, 'unhealthy');
            assert.strictEqual(health.healthy, false);
            assert.strictEqual(health.reason, 'contract_registry_reducer entered error on validation_failed');
        });

        it('should name the loader when discovery fails', async () => {
            const missing = join(nodesDir, 'missing');
            const { orchestrator, instances } = await build({ config: testConfig({ contractsDir: missing }) });

            await assert.rejects(orchestrator.start(), (error: unknown) =>
                error instanceof FatalError &&
                error.instance === 'contract_loader_effect' &&
                error.message.startsWith(`Runtime startup failed in contract_loader_effect: Failed to load contract ${missing}: `)
            );
            assert.strictEqual(instances.loader.currentState, 'error');
            assert.strictEqual(instances.graph.currentState, 'failed');
            assert.strictEqual(orchestrator.fatalReason, 'contract_loader_effect entered error on discovery_failed');
        });

        it('should name the graph when a dependency is missing', async () => {
            await writeFile(join(nodesDir, 'ledger.yaml'), stringify(ledgerDocument()));
            const { orchestrator, instances } = await build({ config: testConfig({ contractsDir: nodesDir }) });

            await assert.rejects(orchestrator.start(), (error: unknown) =>
                error instanceof FatalError &&
                error.instance === 'node_graph_reducer' &&
                error.message === 'Runtime startup failed in node_graph_reducer: ' +
                    'Node order_ledger_reducer depends on order_intake_effect, which is not registered' &&
                error.cause instanceof DependencyError
            );
            assert.strictEqual(instances.registry.currentState, 'error');
            assert.strictEqual(instances.wiring.currentState, 'error');
        });
    });

    describe('fatal propagation', () => {
        it('should move every instance to an error state and release subscriptions', async () => {
            const { orchestrator, instances, resources } = await build();
            await orchestrator.start();

            await orchestrator.reportFatal('graph', 'ledger corrupted');

            assert.strictEqual(orchestrator.phase, 'failed');
            assert.deepStrictEqual(
                [instances.loader, instances.registry, instances.graph, instances.wiring].map(i => i.currentState),
                ['error', 'error', 'failed', 'error']
            );
            assert.strictEqual(resources.has(WIRING_RESOURCE_GROUP), false);
            assert.strictEqual(bus.subscriberCount(SUBMIT_ORDER), 0);

            const health = orchestrator.health();
            assert.strictEqual(health.status, 'unhealthy');
            assert.strictEqual(health.reason, 'ledger corrupted');
        });

        it('should propagate only once', async () => {
            const { orchestrator, instances } = await build();
            await orchestrator.start();

            await orchestrator.reportFatal('loader', 'first');
            await orchestrator.reportFatal('wiring', 'second');

            assert.strictEqual(orchestrator.fatalReason, 'first');
            assert.strictEqual(instances.graph.generation, 3);
        });
    });

    describe('dispatch', () => {
        it('should retry a busy instance until it is free', async () => {
            const { orchestrator, instances } = await build({
                effectOverrides: { log_discovery_started: async () => { await delay(30); } }
            });
            await orchestrator.start();

            const reload = orchestrator.dispatch('loader', 'load_requested');
            const discovered = orchestrator.dispatch('loader', { name: 'contracts_discovered', payload: { count: 2 } });

            assert.strictEqual((await reload).kind, 'committed');
            assert.strictEqual((await discovered).kind, 'committed');
            assert.strictEqual(instances.loader.currentState, 'ready');
            assert.strictEqual(instances.loader.generation, 4);
        });

        it('should surface BusyError once retries are exhausted', async () => {
            const { orchestrator } = await build({
                config: testConfig({ busyRetryLimit: 0 }),
                effectOverrides: { log_discovery_started: async () => { await delay(30); } }
            });
            await orchestrator.start();

            const reload = orchestrator.dispatch('loader', 'load_requested');

            await assert.rejects(orchestrator.dispatch('loader', 'contracts_discovered'), (error: unknown) =>
                error instanceof BusyError && error.instance === 'contract_loader_effect'
            );
            assert.strictEqual((await reload).kind, 'committed');
        });
    });

    describe('shutdown', () => {
        it('should drain and stop every instance', async () => {
            const { orchestrator, instances } = await build();
            await orchestrator.start();

            const report = await orchestrator.shutdown('operator request');

            assert.deepStrictEqual(report, {
                reason: 'operator request',
                drained: true,
                drainTimedOut: false,
                pendingWork: 0,
                finalStates: { loader: 'stopped', registry: 'stopped', graph: 'stopped', wiring: 'stopped' }
            });
            assert.strictEqual(orchestrator.phase, 'stopped');
            assert.strictEqual(instances.graph.generation, 4);
            assert.deepStrictEqual(instances.graph.snapshot().lastTransition?.failedActions, []);
            assert.strictEqual(bus.subscriberCount(SUBMIT_ORDER), 0);
            assert.strictEqual(bus.published(RUNTIME_STOPPED_TOPIC).length, 1);
            assert.strictEqual(orchestrator.health().status, 'stopped');
        });

        it('should share one run between repeated calls', async () => {
            const { orchestrator } = await build();
            await orchestrator.start();

            const first = orchestrator.shutdown('first');
            const second = orchestrator.shutdown('second');

            assert.strictEqual(first, second);
            assert.strictEqual((await second).reason, 'first');
        });

        it('should report a drain timeout and still stop', async () => {
            let release: () => void = () => undefined;
            const messageHandler: NodeMessageHandler = () => new Promise<void>(resolve => { release = resolve; });
            const { orchestrator, instances } = await build({
                config: testConfig({ drainTimeoutMs: 30 }),
                messageHandler
            });
            await orchestrator.start();
            const delivery = bus.publish(SUBMIT_ORDER, { orderId: 'o-slow' });

            const report = await orchestrator.shutdown();

            assert.strictEqual(report.reason, 'shutdown requested');
            assert.strictEqual(report.drained, false);
            assert.strictEqual(report.drainTimedOut, true);
            assert.strictEqual(report.pendingWork, 1);
            assert.strictEqual(instances.graph.currentState, 'stopped');
            const last = instances.graph.snapshot().lastTransition;
            assert.strictEqual(last?.kind, 'committed');
            assert.strictEqual(last?.event, 'drain_complete');
            assert.deepStrictEqual(last?.failedActions, ['check_drain_completed']);

            release();
            await delivery;
        });

        it('should stop a runtime that failed to start without leaving the error states', async () => {
            const { orchestrator, instances } = await build({ config: testConfig({ contractsDir: join(tmpdir(), 'no-such-runtime-nodes') }) });
            await assert.rejects(orchestrator.start());

            const report = await orchestrator.shutdown();

            assert.deepStrictEqual(report.finalStates, { loader: 'error', registry: 'error', graph: 'failed', wiring: 'error' });
            assert.strictEqual(instances.loader.stateType, 'error');
            assert.strictEqual(orchestrator.phase, 'stopped');
        });
    });
});
