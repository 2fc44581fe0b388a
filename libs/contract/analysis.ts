/**
 * Structural analysis of a parsed contract.
 *
 * Findings are advisory: a contract with unreachable states still loads,
 * the registry logs the warnings.
 */

import { WILDCARD, type Contract } from './types.js';

export interface ContractAnalysis {
    readonly nodeName: string;
    /** States with no path from the initial state. */
    readonly unreachableStates: readonly string[];
    /** Non-terminal states with no outbound transition (wildcards included). */
    readonly deadEndStates: readonly string[];
    /** Non-terminal states from which no terminal state can be reached. */
    readonly statesWithoutExit: readonly string[];
    /** Terminal states that declare exact outbound transitions. */
    readonly terminalStatesWithExits: readonly string[];
    readonly warnings: readonly string[];
}

export function analyzeContract(contract: Contract): ContractAnalysis {
    const edges = buildEdges(contract);

    const reachable = walk(contract.initialState, state => edges.get(state) ?? []);
    const unreachableStates = contract.states
        .map(state => state.name)
        .filter(name => !reachable.has(name));

    const deadEndStates = contract.states
        .filter(state => !state.isTerminal && (edges.get(state.name)?.length ?? 0) === 0)
        .map(state => state.name);

    const reverse = new Map<string, string[]>();
    for (const [from, targets] of edges) {
        for (const to of targets) {
            const sources = reverse.get(to) ?? [];
            sources.push(from);
            reverse.set(to, sources);
        }
    }
    const canExit = new Set<string>();
    for (const terminal of contract.states.filter(state => state.isTerminal)) {
        for (const name of walk(terminal.name, state => reverse.get(state) ?? [])) {
            canExit.add(name);
        }
    }
    const statesWithoutExit = contract.states
        .filter(state => !state.isTerminal && !canExit.has(state.name))
        .map(state => state.name);

    const terminalStatesWithExits = contract.states
        .filter(state => state.isTerminal && contract.transitions.some(t => t.fromState === state.name))
        .map(state => state.name);

    const warnings = [
        ...unreachableStates.map(name => `state "${name}" is unreachable from initial state "${contract.initialState}"`),
        ...deadEndStates.map(name => `non-terminal state "${name}" has no outbound transitions`),
        ...statesWithoutExit
            .filter(name => !deadEndStates.includes(name))
            .map(name => `state "${name}" is part of a cycle with no path to a terminal state`),
        ...terminalStatesWithExits.map(name => `terminal state "${name}" declares outbound transitions`)
    ];

    return {
        nodeName: contract.nodeName,
        unreachableStates,
        deadEndStates,
        statesWithoutExit,
        terminalStatesWithExits,
        warnings
    };
}

/**
 * Adjacency per state. A wildcard transition contributes an edge from every
 * non-terminal state; from a terminal state it only re-enters that state.
 */
function buildEdges(contract: Contract): Map<string, string[]> {
    const edges = new Map<string, string[]>();
    for (const state of contract.states) {
        edges.set(state.name, []);
    }

    for (const transition of contract.transitions) {
        if (transition.fromState === WILDCARD) {
            for (const state of contract.states) {
                if (!state.isTerminal && state.name !== transition.toState) {
                    edges.get(state.name)?.push(transition.toState);
                }
            }
        } else if (transition.fromState !== transition.toState) {
            edges.get(transition.fromState)?.push(transition.toState);
        }
    }

    return edges;
}

function walk(start: string, next: (state: string) => readonly string[]): Set<string> {
    const seen = new Set<string>([start]);
    const queue = [start];
    while (queue.length > 0) {
        const current = queue.shift();
        if (current === undefined) break;
        for (const target of next(current)) {
            if (!seen.has(target)) {
                seen.add(target);
                queue.push(target);
            }
        }
    }
    return seen;
}
