/**
 * Counts work started on behalf of wired subscriptions so that shutdown
 * can wait for it to finish.
 */
export class InFlightTracker {
    private pending = 0;
    private readonly idleWaiters = new Set<() => void>();

    get size(): number {
        return this.pending;
    }

    async track<T>(work: () => Promise<T>): Promise<T> {
        this.pending += 1;
        try {
            return await work();
        } finally {
            this.pending -= 1;
            if (this.pending === 0) {
                for (const wake of [...this.idleWaiters]) {
                    wake();
                }
            }
        }
    }

    /**
     * Resolves true once nothing is in flight, or false when the timeout
     * elapses first.
     */
    waitForIdle(timeoutMs: number): Promise<boolean> {
        if (this.pending === 0) {
            return Promise.resolve(true);
        }

        return new Promise<boolean>((resolve) => {
            const finish = (idle: boolean): void => {
                clearTimeout(timer);
                this.idleWaiters.delete(onIdle);
                resolve(idle);
            };
            const onIdle = (): void => finish(true);
            const timer = setTimeout(() => finish(false), timeoutMs);
            this.idleWaiters.add(onIdle);
        });
    }
}
