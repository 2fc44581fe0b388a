/**
 * Unit Tests: Contract Loader
 *
 * @see libs/contract/loader.ts
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { stringify } from 'yaml';

import { ContractLoader, loadContractFile } from '../../libs/contract/loader.js';
import { ContractLoadError, SchemaError } from '../../libs/errors/runtimeErrors.js';
import { lifecycleDocument, silentLogger } from '../support/harness.js';

describe('ContractLoader', () => {
    let root: string;

    beforeEach(async () => {
        root = await mkdtemp(join(tmpdir(), 'contract-loader-'));
    });

    afterEach(async () => {
        await rm(root, { recursive: true, force: true });
    });

    it('should discover yaml and yml files recursively in path order', async () => {
        await mkdir(join(root, 'nested'));
        await writeFile(join(root, 'b.yaml'), 'node_name: beta\n');
        await writeFile(join(root, 'a.yml'), 'node_name: alpha\n');
        await writeFile(join(root, 'nested', 'c.YAML'), 'node_name: gamma\n');
        await writeFile(join(root, 'notes.txt'), 'not a contract');

        const loader = new ContractLoader({ rootDir: root, logger: silentLogger });
        const documents = await loader.discover();

        assert.deepStrictEqual(documents.map(document => document.path), [
            join(root, 'a.yml'),
            join(root, 'b.yaml'),
            join(root, 'nested', 'c.YAML')
        ]);
        assert.deepStrictEqual(documents.map(document => document.document.node_name), ['alpha', 'beta', 'gamma']);
    });

    it('should serve unchanged files from cache and re-read modified ones', async () => {
        await writeFile(join(root, 'a.yaml'), 'node_name: alpha\n');
        await writeFile(join(root, 'b.yaml'), 'node_name: beta\n');
        const loader = new ContractLoader({ rootDir: root, logger: silentLogger });

        await loader.discover();
        await loader.discover();
        assert.deepStrictEqual(loader.cacheStats(), { hits: 2, misses: 2, size: 2 });

        await writeFile(join(root, 'a.yaml'), 'node_name: alpha_renamed\n');
        const documents = await loader.discover();

        assert.strictEqual(documents[0]?.document.node_name, 'alpha_renamed');
        assert.deepStrictEqual(loader.cacheStats(), { hits: 3, misses: 3, size: 3 });

        loader.clearCache();
        assert.deepStrictEqual(loader.cacheStats(), { hits: 0, misses: 0, size: 0 });
    });

    it('should reject files above the size limit', async () => {
        const path = join(root, 'big.yaml');
        await writeFile(path, 'node_name: far_too_long_for_the_limit\n');
        const loader = new ContractLoader({ rootDir: root, maxFileBytes: 10, logger: silentLogger });

        await assert.rejects(loader.discover(), (error: unknown) =>
            error instanceof ContractLoadError &&
            error.path === path &&
            error.message === `Failed to load contract ${path}: file is 38 bytes, limit is 10`
        );
    });

    it('should reject a document whose root is not a mapping', async () => {
        const path = join(root, 'list.yaml');
        await writeFile(path, '- one\n- two\n');
        const loader = new ContractLoader({ rootDir: root, logger: silentLogger });

        await assert.rejects(loader.readDocument(path), {
            name: 'ContractLoadError',
            message: `Failed to load contract ${path}: contract root must be a mapping`
        });
    });

    it('should wrap YAML syntax errors', async () => {
        const path = join(root, 'broken.yaml');
        await writeFile(path, 'node_name: [unclosed\n');
        const loader = new ContractLoader({ rootDir: root, logger: silentLogger });

        await assert.rejects(loader.readDocument(path), (error: unknown) =>
            error instanceof ContractLoadError &&
            error.message.startsWith(`Failed to load contract ${path}: YAML parse failure: `)
        );
    });

    it('should fail when the root directory does not exist', async () => {
        const loader = new ContractLoader({ rootDir: join(root, 'missing'), logger: silentLogger });

        await assert.rejects(loader.discover(), (error: unknown) =>
            error instanceof ContractLoadError && error.path === join(root, 'missing')
        );
    });

    it('should load and validate a single contract file', async () => {
        const path = join(root, 'lifecycle.yaml');
        await writeFile(path, stringify(lifecycleDocument()));

        const contract = await loadContractFile(path);

        assert.strictEqual(contract.nodeName, 'lifecycle_node');
        assert.strictEqual(contract.source, path);
        assert.strictEqual(contract.initialState, 'initializing');
    });

    it('should surface schema errors from a single contract file', async () => {
        const path = join(root, 'invalid.yaml');
        await writeFile(path, stringify({ ...lifecycleDocument(), states: [] }));

        await assert.rejects(loadContractFile(path), (error: unknown) =>
            error instanceof SchemaError && error.source === path
        );
    });
});
