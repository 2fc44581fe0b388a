/**
 * Effect Registry
 *
 * Maps action types to the handler that performs them. A handler
 * registered for a specific action name takes precedence over the
 * handler for its type.
 */

import type { ActionDefinition, ActionType } from '../contract/types.js';
import type { EffectHandler } from './actionTypes.js';

export class EffectRegistry {
    private readonly byType = new Map<ActionType, EffectHandler>();
    private readonly byName = new Map<string, EffectHandler>();

    register(actionType: ActionType, handler: EffectHandler): this {
        this.byType.set(actionType, handler);
        return this;
    }

    override(actionName: string, handler: EffectHandler): this {
        this.byName.set(actionName, handler);
        return this;
    }

    resolve(action: ActionDefinition): EffectHandler | undefined {
        return this.byName.get(action.actionName) ?? this.byType.get(action.actionType);
    }

    registeredTypes(): ActionType[] {
        return [...this.byType.keys()];
    }
}
