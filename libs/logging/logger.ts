import pino, { DestinationStream, Level, Logger } from 'pino';

import { REDACT_KEYS, REDACT_CENSOR } from './redactionConfig.js';

export type LogLevel = Level | 'silent';

export interface LoggerConfig {
    /** Minimum level written */
    readonly level: LogLevel;
    /** Value of the `system` field on every line */
    readonly system?: string;
    /** Output stream; stdout when omitted */
    readonly destination?: DestinationStream;
}

export type { Logger };

/**
 * Builds a root logger from explicit configuration.
 * Components receive it (or a child) through their constructors.
 */
export function createLogger(config: LoggerConfig): Logger {
    const options = {
        level: config.level,
        base: {
            system: config.system ?? 'activity-telemetry'
        },
        redact: {
            paths: REDACT_KEYS,
            censor: REDACT_CENSOR
        }
    };

    return config.destination ? pino(options, config.destination) : pino(options);
}

/**
 * Returns a child logger scoped to a component.
 */
export function getComponentLogger(root: Logger, component: string): Logger {
    return root.child({ component });
}

/**
 * Returns a child logger with activity correlation attached.
 */
export function getActivityLogger(
    root: Logger,
    context: { activityName: string; traceId: string; orchestrationId?: string }
): Logger {
    return root.child({
        activity: context.activityName,
        traceId: context.traceId,
        ...(context.orchestrationId ? { orchestrationId: context.orchestrationId } : {})
    });
}

/**
 * Silent logger for tests and tooling.
 */
export function createSilentLogger(): Logger {
    return createLogger({ level: 'silent' });
}
