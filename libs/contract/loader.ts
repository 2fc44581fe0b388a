/**
 * Contract Loader
 *
 * Discovers contract documents on disk and parses their YAML. Documents
 * handed on are well-formed mappings; schema validation happens in the
 * registry through `parseContract`.
 */

import { readdir, readFile, stat } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';
import { LRUCache } from 'lru-cache';
import { parse as parseYaml } from 'yaml';

import { logger as rootLogger, type Logger } from '../logging/logger.js';
import { ContractLoadError } from '../errors/runtimeErrors.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { parseContract } from './parseContract.js';
import type { Contract } from './types.js';

export const DEFAULT_MAX_FILE_BYTES = 1024 * 1024;
export const DEFAULT_CACHE_SIZE = 256;

const CONTRACT_EXTENSIONS = new Set(['.yaml', '.yml']);

export interface DiscoveredDocument {
    readonly path: string;
    readonly document: Readonly<Record<string, unknown>>;
}

export interface ContractLoaderOptions {
    readonly rootDir: string;
    readonly maxFileBytes?: number;
    readonly cacheSize?: number;
    readonly logger?: Logger;
}

export interface LoaderCacheStats {
    readonly hits: number;
    readonly misses: number;
    readonly size: number;
}

export class ContractLoader {
    private readonly rootDir: string;
    private readonly maxFileBytes: number;
    private readonly logger: Logger;
    // Keyed by path + mtime + size so an edited file is never served stale
    private readonly cache: LRUCache<string, DiscoveredDocument>;
    private hits = 0;
    private misses = 0;

    constructor(options: ContractLoaderOptions) {
        this.rootDir = resolve(options.rootDir);
        this.maxFileBytes = options.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES;
        this.logger = (options.logger ?? rootLogger).child({ component: 'ContractLoader' });
        this.cache = new LRUCache<string, DiscoveredDocument>({
            max: options.cacheSize ?? DEFAULT_CACHE_SIZE
        });
    }

    /**
     * Walk the root directory and parse every `*.yaml` / `*.yml` file, in path order.
     */
    async discover(): Promise<DiscoveredDocument[]> {
        const paths = await this.listFiles();
        const documents: DiscoveredDocument[] = [];
        for (const path of paths) {
            documents.push(await this.readDocument(path));
        }

        this.logger.info({ rootDir: this.rootDir, count: documents.length }, 'Contract discovery complete');
        return documents;
    }

    async readDocument(path: string): Promise<DiscoveredDocument> {
        const absolute = resolve(path);

        const info = await stat(absolute).catch((error: unknown) => {
            throw new ContractLoadError(absolute, ErrorSanitizer.describe(error).message, { cause: error });
        });

        if (!info.isFile()) {
            throw new ContractLoadError(absolute, 'not a regular file');
        }
        if (info.size > this.maxFileBytes) {
            throw new ContractLoadError(absolute, `file is ${info.size} bytes, limit is ${this.maxFileBytes}`);
        }

        const cacheKey = `${absolute}:${info.mtimeMs}:${info.size}`;
        const cached = this.cache.get(cacheKey);
        if (cached) {
            this.hits += 1;
            return cached;
        }
        this.misses += 1;

        const text = await readFile(absolute, 'utf-8');
        let parsed: unknown;
        try {
            parsed = parseYaml(text);
        } catch (error) {
            throw new ContractLoadError(absolute, `YAML parse failure: ${ErrorSanitizer.describe(error).message}`, { cause: error });
        }

        if (!isMapping(parsed)) {
            throw new ContractLoadError(absolute, 'contract root must be a mapping');
        }

        const discovered: DiscoveredDocument = Object.freeze({ path: absolute, document: parsed });
        this.cache.set(cacheKey, discovered);
        this.logger.debug({ path: absolute }, 'Contract document parsed');
        return discovered;
    }

    cacheStats(): LoaderCacheStats {
        return { hits: this.hits, misses: this.misses, size: this.cache.size };
    }

    clearCache(): void {
        this.cache.clear();
        this.hits = 0;
        this.misses = 0;
    }

    /**
     * Contract file paths under the root directory, sorted.
     */
    async listFiles(): Promise<string[]> {
        return this.listContractFiles(this.rootDir);
    }

    private async listContractFiles(dir: string): Promise<string[]> {
        const entries = await readdir(dir, { withFileTypes: true }).catch((error: unknown) => {
            throw new ContractLoadError(dir, ErrorSanitizer.describe(error).message, { cause: error });
        });

        const files: string[] = [];
        for (const entry of entries) {
            const full = join(dir, entry.name);
            if (entry.isDirectory()) {
                files.push(...await this.listContractFiles(full));
            } else if (entry.isFile() && CONTRACT_EXTENSIONS.has(extname(entry.name).toLowerCase())) {
                files.push(full);
            }
        }
        return files.sort();
    }
}

/**
 * Read, parse and validate a single contract file.
 */
export async function loadContractFile(path: string, loader?: ContractLoader): Promise<Contract> {
    const source = loader ?? new ContractLoader({ rootDir: resolve(path, '..') });
    const { path: absolute, document } = await source.readDocument(path);
    return parseContract(document, absolute);
}

function isMapping(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
