/**
 * Unit Tests: Contract lint
 *
 * @see libs/contract/lint.ts
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { stringify } from 'yaml';

import { ContractLoader } from '../../libs/contract/loader.js';
import { lintContracts } from '../../libs/contract/lint.js';
import { lifecycleDocument, silentLogger } from '../support/harness.js';

describe('lintContracts', () => {
    let root: string;

    beforeEach(async () => {
        root = await mkdtemp(join(tmpdir(), 'contract-lint-'));
    });

    afterEach(async () => {
        await rm(root, { recursive: true, force: true });
    });

    it('should report every file without stopping at the first failure', async () => {
        await writeFile(join(root, 'a_lifecycle.yaml'), stringify(lifecycleDocument()));
        await writeFile(join(root, 'b_copy.yaml'), stringify(lifecycleDocument()));
        await writeFile(join(root, 'c_broken.yaml'), stringify({ ...lifecycleDocument(), node_name: 'broken', states: [] }));
        await writeFile(join(root, 'd_list.yaml'), '- not\n- a\n- mapping\n');
        await writeFile(join(root, 'e_warn.yaml'), stringify({
            node_name: 'orphaned',
            node_type: 'COMPUTE_GENERIC',
            contract_version: '0.1.0',
            states: [
                { state_name: 'idle', is_initial: true },
                { state_name: 'orphan' },
                { state_name: 'done', is_terminal: true }
            ],
            transitions: [{ from_state: 'idle', to_state: 'done', event: 'finish' }]
        }));

        const summary = await lintContracts(root, new ContractLoader({ rootDir: root, logger: silentLogger }));

        assert.deepStrictEqual(summary.results, [
            { path: join(root, 'a_lifecycle.yaml'), nodeName: 'lifecycle_node', errors: [], warnings: [] },
            {
                path: join(root, 'b_copy.yaml'),
                nodeName: 'lifecycle_node',
                errors: [`node_name: node "lifecycle_node" is already declared in ${join(root, 'a_lifecycle.yaml')}`],
                warnings: []
            },
            {
                path: join(root, 'c_broken.yaml'),
                errors: ['states: Array must contain at least 1 element(s)'],
                warnings: []
            },
            {
                path: join(root, 'd_list.yaml'),
                errors: [`Failed to load contract ${join(root, 'd_list.yaml')}: contract root must be a mapping`],
                warnings: []
            },
            {
                path: join(root, 'e_warn.yaml'),
                nodeName: 'orphaned',
                errors: [],
                warnings: [
                    'state "orphan" is unreachable from initial state "idle"',
                    'non-terminal state "orphan" has no outbound transitions'
                ]
            }
        ]);
        assert.strictEqual(summary.failed, 3);
        assert.strictEqual(summary.warned, 1);
    });

    it('should pass the bundled contracts', async () => {
        const bundled = fileURLToPath(new URL('../../contracts', import.meta.url));

        const summary = await lintContracts(bundled, new ContractLoader({ rootDir: bundled, logger: silentLogger }));

        assert.strictEqual(summary.results.length, 6);
        assert.strictEqual(summary.failed, 0);
        assert.strictEqual(summary.warned, 0);
    });
});
