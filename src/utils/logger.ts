/**
 * Centralized logger using Pino
 * Every module logs through a child logger so runs can be filtered by stage.
 */
import pino from 'pino';
import type { Logger, Level, DestinationStream } from 'pino';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const isDev = nodeEnv === 'development';

// Stream configuration type
interface StreamConfig {
    level: Level;
    stream: DestinationStream;
}

// Pretty output locally, plain JSON lines in CI and on the scheduler
const streams: StreamConfig[] = isDev
    ? [
        {
            level: 'debug', stream: pino.transport({
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname',
                }
            })
        },
    ]
    : [
        { level: 'info', stream: process.stdout },
    ];

// Create the logger instance
const logger: Logger = pino({
    level: process.env.LOG_LEVEL || (isDev ? 'debug' : 'info'),
    formatters: isDev ? {} : {
        level: (label: string) => ({ level: label }),
    },
}, pino.multistream(streams));

// Create child loggers for the pipeline modules
export const jobLogger: Logger = logger.child({ module: 'job' });
export const etlLogger: Logger = logger.child({ module: 'etl' });
export const driveLogger: Logger = logger.child({ module: 'drive' });
export const sheetsLogger: Logger = logger.child({ module: 'sheets' });
export const controlLogger: Logger = logger.child({ module: 'control' });
export const emailLogger: Logger = logger.child({ module: 'email' });
export const forecastLogger: Logger = logger.child({ module: 'forecast' });

// Export the base logger as default
export default logger;

// Helper to log with context
export function logWithContext<T extends Record<string, unknown>>(childLogger: Logger, context: T): Logger {
    return childLogger.child(context);
}
