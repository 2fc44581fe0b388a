import { loadRuntimeConfig } from '../../../libs/bootstrap/config.js';
import { logger } from '../../../libs/logging/logger.js';
import { ErrorSanitizer } from '../../../libs/errors/sanitizer.js';
import { createRuntime } from '../../../libs/orchestrator/createRuntime.js';

const HEALTH_LOG_INTERVAL_MS = 30_000;

async function main(): Promise<void> {
    const config = loadRuntimeConfig(process.env);
    const runtime = await createRuntime({ config });

    let stopping = false;
    let heartbeat: NodeJS.Timeout | undefined;
    const stop = (signal: NodeJS.Signals): void => {
        if (stopping) {
            return;
        }
        stopping = true;
        clearInterval(heartbeat);
        logger.info({ signal }, 'Shutdown signal received');

        runtime.orchestrator.shutdown(`signal ${signal}`)
            .then(async (report) => {
                await runtime.close();
                process.exit(report.drained ? 0 : 1);
            })
            .catch((err: unknown) => {
                logger.fatal({ err: ErrorSanitizer.describe(err) }, 'Shutdown failed');
                process.exit(1);
            });
    };

    process.on('SIGINT', stop);
    process.on('SIGTERM', stop);

    try {
        const report = await runtime.orchestrator.start();
        logger.info({ nodes: report.nodes, subscriptions: report.subscriptions }, 'Runtime host started');

        // Also keeps the event loop alive until a signal arrives.
        heartbeat = setInterval(() => {
            const health = runtime.orchestrator.health();
            logger.info({ status: health.status, phase: health.phase }, 'Runtime health');
        }, HEALTH_LOG_INTERVAL_MS);
    } catch (err) {
        await runtime.orchestrator.shutdown('startup failed');
        await runtime.close();
        throw err;
    }
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});
