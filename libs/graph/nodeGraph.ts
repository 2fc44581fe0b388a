/**
 * Node Graph
 *
 * Orders registered contracts so that every node comes after the nodes
 * it depends on. Ties are broken by node name, so the order is stable
 * for a given set of contracts.
 */

import { DependencyError, VersionMismatchError } from '../errors/runtimeErrors.js';
import { formatVersion, type Contract } from '../contract/types.js';
import { isCompatible } from '../contract/version.js';

export interface NodeGraph {
    readonly order: readonly Contract[];
    /** node name -> names of the nodes that depend on it */
    readonly dependents: ReadonlyMap<string, readonly string[]>;
}

export function resolveNodeGraph(contracts: readonly Contract[]): NodeGraph {
    const byName = new Map(contracts.map(contract => [contract.nodeName, contract]));
    const remaining = new Map<string, number>();
    const dependents = new Map<string, string[]>();

    for (const contract of contracts) {
        remaining.set(contract.nodeName, contract.dependencies.length);

        for (const dependency of contract.dependencies) {
            const target = byName.get(dependency.nodeName);
            if (!target) {
                throw new DependencyError(
                    contract.nodeName,
                    `Node ${contract.nodeName} depends on ${dependency.nodeName}, which is not registered`
                );
            }
            if (!isCompatible(dependency.version, target.contractVersion)) {
                throw new VersionMismatchError(
                    dependency.nodeName,
                    formatVersion(dependency.version),
                    formatVersion(target.contractVersion)
                );
            }

            const list = dependents.get(dependency.nodeName) ?? [];
            list.push(contract.nodeName);
            dependents.set(dependency.nodeName, list);
        }
    }

    const ready = [...remaining].filter(([, count]) => count === 0).map(([name]) => name).sort();
    const order: Contract[] = [];

    while (ready.length > 0) {
        const name = ready.shift();
        const contract = name === undefined ? undefined : byName.get(name);
        if (name === undefined || !contract) {
            break;
        }
        order.push(contract);

        for (const dependent of dependents.get(name) ?? []) {
            const count = (remaining.get(dependent) ?? 0) - 1;
            remaining.set(dependent, count);
            if (count === 0) {
                insertSorted(ready, dependent);
            }
        }
    }

    if (order.length < contracts.length) {
        const cycle = [...remaining]
            .filter(([, count]) => count > 0)
            .map(([name]) => name)
            .sort();
        throw new DependencyError(cycle[0] ?? '', `Dependency cycle among nodes: ${cycle.join(', ')}`);
    }

    for (const list of dependents.values()) {
        list.sort();
    }
    return { order, dependents };
}

function insertSorted(list: string[], value: string): void {
    const index = list.findIndex(item => item > value);
    if (index === -1) {
        list.push(value);
    } else {
        list.splice(index, 0, value);
    }
}
