/**
 * Contract Registry
 *
 * Validates discovered contract documents and holds the accepted set,
 * keyed by node name. A batch is accepted whole or not at all: one
 * invalid document leaves the registry as it was.
 */

import { logger as rootLogger, type Logger } from '../logging/logger.js';
import { DependencyError, SchemaError, VersionMismatchError } from '../errors/runtimeErrors.js';
import { analyzeContract, type ContractAnalysis } from '../contract/analysis.js';
import type { DiscoveredDocument } from '../contract/loader.js';
import { parseContract } from '../contract/parseContract.js';
import { formatVersion, type Contract, type SemVer } from '../contract/types.js';
import { isCompatible } from '../contract/version.js';

export interface RegistryValidation {
    readonly accepted: boolean;
    readonly contracts: readonly Contract[];
    readonly failures: readonly SchemaError[];
    readonly analyses: readonly ContractAnalysis[];
}

export class ContractRegistry {
    private readonly contracts = new Map<string, Contract>();
    private readonly logger: Logger;

    constructor(logger: Logger = rootLogger) {
        this.logger = logger.child({ component: 'ContractRegistry' });
    }

    get size(): number {
        return this.contracts.size;
    }

    /**
     * Parse every document; register the batch only if all of them pass.
     */
    validateAll(documents: readonly DiscoveredDocument[]): RegistryValidation {
        const contracts: Contract[] = [];
        const failures: SchemaError[] = [];
        const seen = new Map<string, string>();

        for (const { path, document } of documents) {
            let contract: Contract;
            try {
                contract = parseContract(document, path);
            } catch (error) {
                if (error instanceof SchemaError) {
                    failures.push(error);
                    continue;
                }
                throw error;
            }

            const previous = seen.get(contract.nodeName);
            if (previous !== undefined) {
                failures.push(new SchemaError(path, [{
                    path: 'node_name',
                    message: `node "${contract.nodeName}" is already declared in ${previous}`
                }]));
                continue;
            }
            seen.set(contract.nodeName, path);
            contracts.push(contract);
        }

        if (failures.length > 0) {
            this.logger.error({
                failures: failures.map(failure => ({ source: failure.source, issues: failure.issues }))
            }, 'Contract validation failed');
            return { accepted: false, contracts: [], failures, analyses: [] };
        }

        const analyses = contracts.map(analyzeContract);
        for (const analysis of analyses) {
            if (analysis.warnings.length > 0) {
                this.logger.warn({ node: analysis.nodeName, warnings: analysis.warnings }, 'Contract analysis warnings');
            }
        }

        this.contracts.clear();
        for (const contract of contracts) {
            this.contracts.set(contract.nodeName, contract);
        }

        this.logger.info({ count: contracts.length }, 'Contracts registered');
        return { accepted: true, contracts, failures: [], analyses };
    }

    /**
     * Add or replace a single contract. Returns the contract it replaced.
     */
    register(contract: Contract): Contract | undefined {
        const previous = this.contracts.get(contract.nodeName);
        this.contracts.set(contract.nodeName, contract);
        return previous;
    }

    get(nodeName: string): Contract | undefined {
        return this.contracts.get(nodeName);
    }

    list(): Contract[] {
        return [...this.contracts.values()].sort((a, b) => a.nodeName.localeCompare(b.nodeName));
    }

    /**
     * Look up a contract that satisfies a version request.
     */
    require(nodeName: string, version: SemVer): Contract {
        const contract = this.contracts.get(nodeName);
        if (!contract) {
            throw new DependencyError(nodeName, `No contract registered for node ${nodeName}`);
        }
        if (!isCompatible(version, contract.contractVersion)) {
            throw new VersionMismatchError(nodeName, formatVersion(version), formatVersion(contract.contractVersion));
        }
        return contract;
    }
}
