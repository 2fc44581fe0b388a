/**
 * Alert Sink
 *
 * Destination for `alert` actions. Alerts carry a dedupe key; raising
 * the same key twice produces a single alert.
 */

import { logger as rootLogger, type Logger } from '../logging/logger.js';

export type AlertSeverity = 'info' | 'warning' | 'critical';

export interface Alert {
    readonly dedupeKey: string;
    readonly severity: AlertSeverity;
    readonly summary: string;
    readonly instance: string;
    readonly state: string;
    readonly correlationId: string;
    readonly raisedAt: string;
}

export interface AlertSink {
    /** Returns false when an alert with the same dedupe key was already raised. */
    raise(alert: Alert): Promise<boolean>;
}

export class InMemoryAlertSink implements AlertSink {
    private readonly alerts = new Map<string, Alert>();

    async raise(alert: Alert): Promise<boolean> {
        if (this.alerts.has(alert.dedupeKey)) {
            return false;
        }
        this.alerts.set(alert.dedupeKey, alert);
        return true;
    }

    raised(): Alert[] {
        return [...this.alerts.values()];
    }
}

/**
 * Writes alerts to the structured log. Used when no external alerting
 * backend is configured.
 */
export class LoggingAlertSink implements AlertSink {
    private readonly seen = new Set<string>();
    private readonly logger: Logger;

    constructor(logger: Logger = rootLogger) {
        this.logger = logger.child({ component: 'AlertSink' });
    }

    async raise(alert: Alert): Promise<boolean> {
        if (this.seen.has(alert.dedupeKey)) {
            return false;
        }
        this.seen.add(alert.dedupeKey);

        const level = alert.severity === 'critical' ? 'error' : alert.severity === 'warning' ? 'warn' : 'info';
        this.logger[level]({ alert }, alert.summary);
        return true;
    }
}
