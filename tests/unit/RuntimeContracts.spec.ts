/**
 * Unit Tests: Bundled runtime and node contracts
 *
 * The orchestrator drives the runtime contracts by event name, so these
 * checks keep the YAML and the lifecycle constants in step.
 *
 * @see contracts/runtime
 * @see libs/orchestrator/lifecycleEvents.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { copyFile, mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { analyzeContract } from '../../libs/contract/analysis.js';
import { ContractLoader } from '../../libs/contract/loader.js';
import { parseContract } from '../../libs/contract/parseContract.js';
import type { Contract } from '../../libs/contract/types.js';
import { resolveEventTopic } from '../../libs/effects/handlers.js';
import { ContractLoadError } from '../../libs/errors/runtimeErrors.js';
import { loadRuntimeContracts } from '../../libs/orchestrator/createRuntime.js';
import { INSTANCE_ROLES, LIFECYCLE_EVENTS, READY_STATES, RUNTIME_NODE_NAMES } from '../../libs/orchestrator/lifecycleEvents.js';
import { silentLogger } from '../support/harness.js';

const RUNTIME_DIR = fileURLToPath(new URL('../../contracts/runtime', import.meta.url));
const NODES_DIR = fileURLToPath(new URL('../../contracts/nodes', import.meta.url));

async function loadAll(rootDir: string): Promise<Contract[]> {
    const documents = await new ContractLoader({ rootDir, logger: silentLogger }).discover();
    return documents.map(({ path, document }) => parseContract(document, path));
}

describe('bundled contracts', () => {
    it('should load one contract per runtime role in dependency order', async () => {
        const contracts = await loadRuntimeContracts(new ContractLoader({ rootDir: RUNTIME_DIR, logger: silentLogger }), RUNTIME_DIR);

        for (const role of INSTANCE_ROLES) {
            assert.strictEqual(contracts[role].nodeName, RUNTIME_NODE_NAMES[role]);
            assert.ok(contracts[role].stateIndex.has(READY_STATES[role]), `${role} declares ${READY_STATES[role]}`);
        }
    });

    it('should pass analysis without warnings', async () => {
        const contracts = [...await loadAll(RUNTIME_DIR), ...await loadAll(NODES_DIR)];

        assert.strictEqual(contracts.length, 6);
        for (const contract of contracts) {
            assert.deepStrictEqual(analyzeContract(contract).warnings, [], contract.nodeName);
        }
    });

    it('should handle every lifecycle event somewhere in the runtime contracts', async () => {
        const contracts = await loadAll(RUNTIME_DIR);
        const handled = new Set(contracts.flatMap(contract => contract.transitions.map(transition => transition.event)));

        for (const event of Object.values(LIFECYCLE_EVENTS)) {
            assert.ok(handled.has(event), `no runtime contract handles ${event}`);
        }
    });

    it('should let every runtime instance take fatal and shutdown events from any state', async () => {
        for (const contract of await loadAll(RUNTIME_DIR)) {
            assert.ok(contract.wildcardTransitions.has(LIFECYCLE_EVENTS.fatalError), contract.nodeName);
            assert.ok(contract.wildcardTransitions.has(LIFECYCLE_EVENTS.shutdownRequested), contract.nodeName);
            const fatalTarget = contract.wildcardTransitions.get(LIFECYCLE_EVENTS.fatalError)?.toState ?? '';
            assert.strictEqual(contract.stateIndex.get(fatalTarget)?.stateType, 'error', contract.nodeName);
        }
    });

    it('should declare every topic its event actions publish to', async () => {
        const contracts = [...await loadAll(RUNTIME_DIR), ...await loadAll(NODES_DIR)];

        for (const contract of contracts) {
            for (const action of contract.actions.values()) {
                if (action.actionType !== 'event') continue;
                const topic = resolveEventTopic(action, {
                    instance: contract.nodeName,
                    nodeName: contract.nodeName,
                    event: 'any',
                    fromState: contract.initialState,
                    toState: contract.initialState,
                    generation: 0,
                    nextGeneration: 1,
                    reentry: false,
                    correlationId: 'corr',
                    phase: 'entry',
                    payload: {}
                });
                assert.ok(contract.eventBus.publishTopics.includes(topic), `${contract.nodeName} publishes undeclared ${topic}`);
            }
        }
    });

    it('should fail when a runtime contract is missing', async () => {
        const dir = await mkdtemp(join(tmpdir(), 'runtime-contracts-'));
        try {
            await copyFile(join(RUNTIME_DIR, 'contract_loader_effect.yaml'), join(dir, 'contract_loader_effect.yaml'));

            await assert.rejects(
                loadRuntimeContracts(new ContractLoader({ rootDir: dir, logger: silentLogger }), dir),
                (error: unknown) => error instanceof ContractLoadError &&
                    error.message === `Failed to load contract ${dir}: runtime contract contract_registry_reducer not found`
            );
        } finally {
            await rm(dir, { recursive: true, force: true });
        }
    });
});
