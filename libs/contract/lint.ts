/**
 * Contract Lint
 *
 * Loads, validates and analyses every contract under a directory without
 * stopping at the first failure. Used by scripts/validation/lint-contracts.ts.
 */

import { ContractLoadError, SchemaError } from '../errors/runtimeErrors.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { analyzeContract } from './analysis.js';
import { ContractLoader } from './loader.js';
import { parseContract } from './parseContract.js';

export interface LintResult {
    readonly path: string;
    readonly nodeName?: string;
    readonly errors: readonly string[];
    readonly warnings: readonly string[];
}

export interface LintSummary {
    readonly results: readonly LintResult[];
    readonly failed: number;
    readonly warned: number;
}

export async function lintContracts(rootDir: string, loader?: ContractLoader): Promise<LintSummary> {
    const source = loader ?? new ContractLoader({ rootDir });
    const results: LintResult[] = [];
    const owners = new Map<string, string>();

    for (const path of await source.listFiles()) {
        try {
            const { document } = await source.readDocument(path);
            const contract = parseContract(document, path);
            const warnings = [...analyzeContract(contract).warnings];
            const errors: string[] = [];

            const owner = owners.get(contract.nodeName);
            if (owner !== undefined) {
                errors.push(`node_name: node "${contract.nodeName}" is already declared in ${owner}`);
            } else {
                owners.set(contract.nodeName, path);
            }
            results.push({ path, nodeName: contract.nodeName, errors, warnings });
        } catch (error) {
            if (error instanceof SchemaError) {
                results.push({
                    path,
                    errors: error.issues.map(issue => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)),
                    warnings: []
                });
            } else if (error instanceof ContractLoadError) {
                results.push({ path, errors: [error.message], warnings: [] });
            } else {
                results.push({ path, errors: [ErrorSanitizer.describe(error).message], warnings: [] });
            }
        }
    }

    return {
        results,
        failed: results.filter(result => result.errors.length > 0).length,
        warned: results.filter(result => result.warnings.length > 0).length
    };
}
