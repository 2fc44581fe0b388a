/**
 * Runtime Error Taxonomy
 * Canonical errors raised by the lifecycle runtime, each with a
 * machine-readable code and an incident id for log correlation.
 */

import crypto from 'node:crypto';

export type RuntimeErrorCode =
    | 'SCHEMA_ERROR'
    | 'CONTRACT_LOAD_ERROR'
    | 'VERSION_MISMATCH'
    | 'DEPENDENCY_ERROR'
    | 'BUSY'
    | 'ACTION_TIMEOUT'
    | 'TRANSITION_ABORTED'
    | 'FATAL_ERROR'
    | 'CONFIG_ERROR';

export class RuntimeError extends Error {
    readonly code: RuntimeErrorCode;
    readonly incidentId: string;
    readonly timestamp: string;

    constructor(code: RuntimeErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'RuntimeError';
        this.code = code;
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        Object.setPrototypeOf(this, RuntimeError.prototype);
    }
}

export interface SchemaIssue {
    readonly path: string;
    readonly message: string;
}

/**
 * Contract failed structural or cross-reference validation.
 * Never reaches an FSM instance.
 */
export class SchemaError extends RuntimeError {
    readonly issues: readonly SchemaIssue[];
    readonly source: string;

    constructor(source: string, issues: readonly SchemaIssue[]) {
        super('SCHEMA_ERROR', `Contract ${source} is invalid: ${formatIssues(issues)}`);
        this.name = 'SchemaError';
        this.source = source;
        this.issues = Object.freeze([...issues]);
        Object.setPrototypeOf(this, SchemaError.prototype);
    }
}

export class ContractLoadError extends RuntimeError {
    readonly path: string;

    constructor(path: string, reason: string, options?: { cause?: unknown }) {
        super('CONTRACT_LOAD_ERROR', `Failed to load contract ${path}: ${reason}`, options);
        this.name = 'ContractLoadError';
        this.path = path;
        Object.setPrototypeOf(this, ContractLoadError.prototype);
    }
}

export class VersionMismatchError extends RuntimeError {
    readonly nodeName: string;
    readonly requested: string;
    readonly loaded: string;

    constructor(nodeName: string, requested: string, loaded: string) {
        super('VERSION_MISMATCH', `Contract ${nodeName} ${requested} was requested but ${loaded} is loaded`);
        this.name = 'VersionMismatchError';
        this.nodeName = nodeName;
        this.requested = requested;
        this.loaded = loaded;
        Object.setPrototypeOf(this, VersionMismatchError.prototype);
    }
}

export class DependencyError extends RuntimeError {
    readonly nodeName: string;

    constructor(nodeName: string, message: string) {
        super('DEPENDENCY_ERROR', message);
        this.name = 'DependencyError';
        this.nodeName = nodeName;
        Object.setPrototypeOf(this, DependencyError.prototype);
    }
}

/**
 * Event delivered while another transition on the same instance is in flight.
 * Callers retry or queue upstream.
 */
export class BusyError extends RuntimeError {
    readonly instance: string;
    readonly event: string;

    constructor(instance: string, event: string) {
        super('BUSY', `Instance ${instance} is in transition; event ${event} rejected`);
        this.name = 'BusyError';
        this.instance = instance;
        this.event = event;
        Object.setPrototypeOf(this, BusyError.prototype);
    }
}

export class ActionTimeoutError extends RuntimeError {
    readonly actionName: string;
    readonly timeoutMs: number;

    constructor(actionName: string, timeoutMs: number) {
        super('ACTION_TIMEOUT', `Action ${actionName} timed out after ${timeoutMs}ms`);
        this.name = 'ActionTimeoutError';
        this.actionName = actionName;
        this.timeoutMs = timeoutMs;
        Object.setPrototypeOf(this, ActionTimeoutError.prototype);
    }
}

export class TransitionAbortedError extends RuntimeError {
    readonly instance: string;
    readonly event: string;
    readonly fromState: string;
    readonly toState: string;
    readonly failedAction: string;

    constructor(details: {
        instance: string;
        event: string;
        fromState: string;
        toState: string;
        failedAction: string;
        reason: string;
    }) {
        super(
            'TRANSITION_ABORTED',
            `Transition ${details.fromState} -> ${details.toState} on ${details.event} in ${details.instance} ` +
            `aborted by critical action ${details.failedAction}: ${details.reason}`
        );
        this.name = 'TransitionAbortedError';
        this.instance = details.instance;
        this.event = details.event;
        this.fromState = details.fromState;
        this.toState = details.toState;
        this.failedAction = details.failedAction;
        Object.setPrototypeOf(this, TransitionAbortedError.prototype);
    }
}

/**
 * Unrecoverable instance-level condition. The orchestrator propagates it
 * to siblings as the wildcard fatal event.
 */
export class FatalError extends RuntimeError {
    readonly instance: string;

    constructor(instance: string, message: string, options?: { cause?: unknown }) {
        super('FATAL_ERROR', message, options);
        this.name = 'FatalError';
        this.instance = instance;
        Object.setPrototypeOf(this, FatalError.prototype);
    }
}

export class ConfigError extends RuntimeError {
    readonly violations: readonly string[];

    constructor(violations: readonly string[]) {
        super('CONFIG_ERROR', `Invalid runtime configuration: ${violations.join('; ')}`);
        this.name = 'ConfigError';
        this.violations = Object.freeze([...violations]);
        Object.setPrototypeOf(this, ConfigError.prototype);
    }
}

export function formatIssues(issues: readonly SchemaIssue[]): string {
    return issues
        .map(issue => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
        .join('; ');
}
