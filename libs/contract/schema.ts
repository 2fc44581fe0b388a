import { z } from 'zod';

import { ACTION_TYPES, NODE_TYPES, STATE_TYPES } from './types.js';

/**
 * Raw contract document schema (snake_case, as authored in YAML).
 * Structural checks only; cross-references are checked by `parseContract`.
 */

const SEMVER_PATTERN = /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)$/;

const VersionPart = z.number().int().nonnegative();

export const SemVerSchema = z.union([
    z.object({
        major: VersionPart,
        minor: VersionPart,
        patch: VersionPart
    }).strict(),
    z.string()
])
    .superRefine((value, ctx) => {
        if (typeof value === 'string' && !SEMVER_PATTERN.test(value)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a major.minor.patch version' });
        }
    })
    .transform(value => {
        if (typeof value !== 'string') {
            return value;
        }
        const [major = 0, minor = 0, patch = 0] = value.split('.').map(Number);
        return { major, minor, patch };
    });

/** Largest delay a Node.js timer honours; longer delays fire after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

const Name = z.string().trim().min(1).max(128);

const ActionConfigValueSchema = z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(z.string())
]);

export const ActionDocumentSchema = z.object({
    action_name: Name,
    action_type: z.enum(ACTION_TYPES),
    is_critical: z.boolean().default(false),
    timeout_ms: z.number().int().positive().max(MAX_TIMEOUT_MS),
    version: SemVerSchema.default({ major: 1, minor: 0, patch: 0 }),
    execution_order: z.number().int().default(0),
    rollback_action: Name.optional(),
    action_config: z.record(ActionConfigValueSchema).default({}),
    description: z.string().optional()
});

export const StateDocumentSchema = z.object({
    state_name: Name,
    state_type: z.enum(STATE_TYPES).optional(),
    is_initial: z.boolean().default(false),
    is_terminal: z.boolean().default(false),
    entry_actions: z.array(Name).default([]),
    exit_actions: z.array(Name).default([]),
    description: z.string().optional()
});

export const TransitionDocumentSchema = z.object({
    transition_name: Name.optional(),
    from_state: Name,
    to_state: Name,
    event: Name,
    actions: z.array(Name).default([])
});

export const ContractDocumentSchema = z.object({
    node_name: Name,
    node_type: z.enum(NODE_TYPES),
    contract_version: SemVerSchema,
    description: z.string().optional(),
    actions: z.array(ActionDocumentSchema).default([]),
    states: z.array(StateDocumentSchema).min(1),
    transitions: z.array(TransitionDocumentSchema).default([]),
    dependencies: z.array(z.object({
        node_name: Name,
        version: SemVerSchema
    })).default([]),
    event_bus: z.object({
        subscribe_topics: z.array(z.string()).default([]),
        publish_topics: z.array(z.string()).default([])
    }).default({})
});

export type ContractDocument = z.infer<typeof ContractDocumentSchema>;
export type ActionDocument = z.infer<typeof ActionDocumentSchema>;
export type StateDocument = z.infer<typeof StateDocumentSchema>;
