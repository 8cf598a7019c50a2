import { loadConfig } from '../../../libs/bootstrap/appConfig.js';
import { ConfigGuard } from '../../../libs/bootstrap/config-guard.js';
import { storageGuards } from '../../../libs/bootstrap/config/db-config.js';
import { createLogger } from '../../../libs/logging/logger.js';
import { CollectorRuntime } from './runtime.js';

const bootstrapLogger = createLogger({ level: 'info' });

async function main(): Promise<void> {
    ConfigGuard.enforce(storageGuards(process.env), process.env, bootstrapLogger);
    const config = loadConfig(process.env);
    const logger = createLogger({ level: config.logLevel, system: config.serviceName });

    const runtime = await CollectorRuntime.create(config, logger, { collectDefaultMetrics: true });
    await runtime.start();
    logger.info({ environment: config.environment }, 'Telemetry collector initialized');

    const onSignal = (signal: NodeJS.Signals): void => {
        logger.info({ signal }, 'Shutdown requested');
        runtime.shutdown().then(
            () => process.exit(0),
            (error: unknown) => {
                logger.error({ error }, 'Shutdown failed');
                process.exit(1);
            }
        );
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
}

main().catch(err => {
    bootstrapLogger.fatal(err);
    process.exit(1);
});
