import pino from 'pino';
import type { BackendId } from './usb-common';
import { resolveLogLevel } from './usb-config';
import type { Diagnostic } from './usb-errors';

const baseOptions: pino.LoggerOptions = {
    level: resolveLogLevel(),
    formatters: {
        level: (label) => {
            return { level: label };
        },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
};

/**
 * Main logger. Writes to stderr so stdout carries only rendered output.
 */
export const logger = process.env['LOG_PRETTY']?.toLowerCase() === 'true'
    ? pino({
        ...baseOptions,
        transport: {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
                destination: 2,
            },
        },
    })
    : pino(baseOptions, pino.destination(2));

export type Logger = pino.Logger;

/**
 * Create child logger with additional context
 */
export const createChildLogger = (context: Record<string, unknown>): Logger => {
    return logger.child(context);
};

export const decoderLogger = createChildLogger({ stage: 'decoder' });
export const topologyLogger = createChildLogger({ stage: 'topology' });
export const reconcilerLogger = createChildLogger({ stage: 'reconciler' });
export const queryLogger = createChildLogger({ stage: 'query' });
export const profilerLogger = createChildLogger({ stage: 'profiler' });

export const backendLogger = (backend: BackendId): Logger => createChildLogger({ stage: 'backend', backend });

/**
 * Log recoverable issues. Provisional matches are routine and go to debug.
 */
export const logDiagnostics = (log: Logger, diagnostics: Diagnostic[]): void => {
    for (const diagnostic of diagnostics) {
        const { kind, message, ...context } = diagnostic;
        if (kind === 'ProvisionalMatch') {
            log.debug({ kind, ...context }, message);
        } else {
            log.warn({ kind, ...context }, message);
        }
    }
};

export const logError = (error: Error, context?: Record<string, unknown>): void => {
    logger.error({
        error: {
            message: error.message,
            stack: error.stack,
            name: error.name,
        },
        ...context,
    }, 'Error occurred');
};
