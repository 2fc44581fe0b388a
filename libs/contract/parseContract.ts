/**
 * Contract parsing and validation.
 *
 * Turns a raw (already YAML-parsed) document into an immutable `Contract`.
 * Pure: never touches the filesystem or network.
 */

import { SchemaError, type SchemaIssue } from '../errors/runtimeErrors.js';
import { validate } from '../validation/validate.js';
import {
    ContractDocumentSchema,
    type ActionDocument,
    type ContractDocument,
    type StateDocument
} from './schema.js';
import {
    FrozenIndex,
    WILDCARD,
    transitionKey,
    type ActionDefinition,
    type Contract,
    type StateDefinition,
    type StateType,
    type TransitionDefinition
} from './types.js';

const INLINE_SOURCE = '<inline>';

/**
 * Parse and validate a contract document.
 *
 * @throws SchemaError when a required field is missing, `node_type` is unknown,
 * a version is not major.minor.patch, or a cross-reference invariant is violated.
 */
export function parseContract(document: unknown, source: string = INLINE_SOURCE): Contract {
    const result = validate(ContractDocumentSchema, document, `contract:${source}`);
    if (!result.success) {
        throw new SchemaError(source, result.issues);
    }

    const doc = result.data;
    const issues = checkCrossReferences(doc);
    if (issues.length > 0) {
        throw new SchemaError(source, issues);
    }

    return buildContract(doc, source);
}

function checkCrossReferences(doc: ContractDocument): SchemaIssue[] {
    const issues: SchemaIssue[] = [];

    const actionNames = new Set<string>();
    doc.actions.forEach((action, index) => {
        if (actionNames.has(action.action_name)) {
            issues.push({ path: `actions.${index}.action_name`, message: `duplicate action "${action.action_name}"` });
        }
        actionNames.add(action.action_name);
    });

    doc.actions.forEach((action, index) => {
        if (action.rollback_action === undefined) return;
        if (action.rollback_action === action.action_name) {
            issues.push({ path: `actions.${index}.rollback_action`, message: 'an action cannot roll itself back' });
        } else if (!actionNames.has(action.rollback_action)) {
            issues.push({
                path: `actions.${index}.rollback_action`,
                message: `references undeclared action "${action.rollback_action}"`
            });
        }
    });

    const stateNames = new Set<string>();
    doc.states.forEach((state, index) => {
        if (stateNames.has(state.state_name)) {
            issues.push({ path: `states.${index}.state_name`, message: `duplicate state "${state.state_name}"` });
        }
        if (state.state_name === WILDCARD) {
            issues.push({ path: `states.${index}.state_name`, message: `"${WILDCARD}" is reserved for wildcard transitions` });
        }
        stateNames.add(state.state_name);

        checkActionList(state.entry_actions, `states.${index}.entry_actions`, actionNames, issues);
        checkActionList(state.exit_actions, `states.${index}.exit_actions`, actionNames, issues);
    });

    const initialStates = doc.states.filter(state => state.is_initial);
    if (initialStates.length !== 1) {
        issues.push({
            path: 'states',
            message: `exactly one initial state is required, found ${initialStates.length}`
        });
    }

    if (!doc.states.some(state => isTerminalDocument(state))) {
        issues.push({ path: 'states', message: 'at least one terminal state is required' });
    }

    const transitionKeys = new Set<string>();
    doc.transitions.forEach((transition, index) => {
        const path = `transitions.${index}`;
        if (transition.from_state !== WILDCARD && !stateNames.has(transition.from_state)) {
            issues.push({
                path: `${path}.from_state`,
                message: `transition ${transition.from_state}->${transition.to_state} references undeclared state "${transition.from_state}"`
            });
        }
        if (transition.to_state === WILDCARD) {
            issues.push({ path: `${path}.to_state`, message: 'wildcard is not allowed as a target state' });
        } else if (!stateNames.has(transition.to_state)) {
            issues.push({
                path: `${path}.to_state`,
                message: `transition ${transition.from_state}->${transition.to_state} references undeclared state "${transition.to_state}"`
            });
        }

        const key = transitionKey(transition.from_state, transition.event);
        if (transitionKeys.has(key)) {
            issues.push({
                path,
                message: `ambiguous transitions for state "${transition.from_state}" on event "${transition.event}"`
            });
        }
        transitionKeys.add(key);

        checkActionList(transition.actions, `${path}.actions`, actionNames, issues);
    });

    const dependencyNames = new Set<string>();
    doc.dependencies.forEach((dependency, index) => {
        if (dependency.node_name === doc.node_name) {
            issues.push({ path: `dependencies.${index}.node_name`, message: 'a node cannot depend on itself' });
        }
        if (dependencyNames.has(dependency.node_name)) {
            issues.push({ path: `dependencies.${index}.node_name`, message: `duplicate dependency "${dependency.node_name}"` });
        }
        dependencyNames.add(dependency.node_name);
    });

    return issues;
}

function checkActionList(
    references: readonly string[],
    path: string,
    declared: ReadonlySet<string>,
    issues: SchemaIssue[]
): void {
    const seen = new Set<string>();
    references.forEach((name, index) => {
        if (!declared.has(name)) {
            issues.push({ path: `${path}.${index}`, message: `references undeclared action "${name}"` });
        }
        if (seen.has(name)) {
            issues.push({ path: `${path}.${index}`, message: `action "${name}" appears more than once in the list` });
        }
        seen.add(name);
    });
}

function isTerminalDocument(state: StateDocument): boolean {
    return state.is_terminal || state.state_type === 'terminal' || state.state_type === 'error';
}

function resolveStateType(state: StateDocument): StateType {
    if (state.state_type !== undefined) return state.state_type;
    return state.is_terminal ? 'terminal' : 'operational';
}

function buildContract(doc: ContractDocument, source: string): Contract {
    const actions = new Map<string, ActionDefinition>();
    for (const action of doc.actions) {
        actions.set(action.action_name, toActionDefinition(action));
    }

    const order = (names: readonly string[]): readonly string[] =>
        Object.freeze(
            [...names].sort((a, b) => (actions.get(a)?.executionOrder ?? 0) - (actions.get(b)?.executionOrder ?? 0))
        );

    const states: StateDefinition[] = doc.states.map(state => Object.freeze({
        name: state.state_name,
        stateType: resolveStateType(state),
        isInitial: state.is_initial,
        isTerminal: isTerminalDocument(state),
        entryActions: order(state.entry_actions),
        exitActions: order(state.exit_actions),
        ...(state.description !== undefined ? { description: state.description } : {})
    }));

    const transitions: TransitionDefinition[] = doc.transitions.map(transition => Object.freeze({
        name: transition.transition_name ?? `${transition.from_state}->${transition.to_state}:${transition.event}`,
        fromState: transition.from_state,
        toState: transition.to_state,
        event: transition.event,
        actions: order(transition.actions)
    }));

    const exactTransitions: [string, TransitionDefinition][] = [];
    const wildcardTransitions: [string, TransitionDefinition][] = [];
    for (const transition of transitions) {
        if (transition.fromState === WILDCARD) {
            wildcardTransitions.push([transition.event, transition]);
        } else {
            exactTransitions.push([transitionKey(transition.fromState, transition.event), transition]);
        }
    }

    const initial = states.find(state => state.isInitial);
    if (!initial) {
        // Unreachable after checkCrossReferences
        throw new SchemaError(source, [{ path: 'states', message: 'exactly one initial state is required, found 0' }]);
    }

    return Object.freeze({
        source,
        nodeName: doc.node_name,
        nodeType: doc.node_type,
        contractVersion: Object.freeze({ ...doc.contract_version }),
        ...(doc.description !== undefined ? { description: doc.description } : {}),
        states: Object.freeze(states),
        transitions: Object.freeze(transitions),
        actions: new FrozenIndex(actions),
        initialState: initial.name,
        dependencies: Object.freeze(doc.dependencies.map(dependency => Object.freeze({
            nodeName: dependency.node_name,
            version: Object.freeze({ ...dependency.version })
        }))),
        eventBus: Object.freeze({
            subscribeTopics: Object.freeze([...doc.event_bus.subscribe_topics]),
            publishTopics: Object.freeze([...doc.event_bus.publish_topics])
        }),
        stateIndex: new FrozenIndex(states.map(state => [state.name, state] as const)),
        exactTransitions: new FrozenIndex(exactTransitions),
        wildcardTransitions: new FrozenIndex(wildcardTransitions)
    });
}

function toActionDefinition(action: ActionDocument): ActionDefinition {
    const config: Record<string, string | number | boolean | null | readonly string[]> = {};
    for (const [key, value] of Object.entries(action.action_config)) {
        config[key] = Array.isArray(value) ? Object.freeze([...value]) : value;
    }

    return Object.freeze({
        actionName: action.action_name,
        actionType: action.action_type,
        isCritical: action.is_critical,
        timeoutMs: action.timeout_ms,
        version: Object.freeze({ ...action.version }),
        executionOrder: action.execution_order,
        ...(action.rollback_action !== undefined ? { rollbackAction: action.rollback_action } : {}),
        config: Object.freeze(config),
        ...(action.description !== undefined ? { description: action.description } : {})
    });
}
