/**
 * Resource Registry
 *
 * Tracks releasable handles (subscriptions, pools, timers) in named
 * groups so that `cleanup` actions can release them. Releasing a group
 * twice is a no-op the second time.
 */

import { logger as rootLogger, type Logger } from '../logging/logger.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';

export interface ReleasableHandle {
    readonly id: string;
    release(): Promise<void>;
}

export interface ReleaseReport {
    readonly group: string;
    readonly released: readonly string[];
    readonly failed: readonly { readonly id: string; readonly message: string }[];
}

export class ResourceRegistry {
    private readonly groups = new Map<string, Map<string, ReleasableHandle>>();
    private readonly logger: Logger;

    constructor(logger: Logger = rootLogger) {
        this.logger = logger.child({ component: 'ResourceRegistry' });
    }

    register(group: string, handle: ReleasableHandle): void {
        const handles = this.groups.get(group) ?? new Map<string, ReleasableHandle>();
        handles.set(handle.id, handle);
        this.groups.set(group, handles);
    }

    has(group: string): boolean {
        return (this.groups.get(group)?.size ?? 0) > 0;
    }

    count(group: string): number {
        return this.groups.get(group)?.size ?? 0;
    }

    /**
     * Release every handle in a group, newest first. Handles are removed
     * before release runs, so a failing handle is not retried.
     */
    async release(group: string): Promise<ReleaseReport> {
        const handles = this.groups.get(group);
        this.groups.delete(group);

        const released: string[] = [];
        const failed: { id: string; message: string }[] = [];

        for (const handle of [...(handles?.values() ?? [])].reverse()) {
            try {
                await handle.release();
                released.push(handle.id);
            } catch (error) {
                const message = ErrorSanitizer.describe(error).message;
                failed.push({ id: handle.id, message });
                this.logger.warn({ group, handle: handle.id, message }, 'Resource release failed');
            }
        }

        if (released.length > 0 || failed.length > 0) {
            this.logger.info({ group, released: released.length, failed: failed.length }, 'Resource group released');
        }
        return { group, released, failed };
    }
}
