import { z } from 'zod';
import { BACKEND_IDS, BackendId } from './usb-common';
import { ProfilerError } from './usb-errors';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

/**
 * Backends tried on each platform when USB_PROFILER_BACKENDS is unset
 */
const PLATFORM_BACKENDS: Partial<Record<NodeJS.Platform, BackendId[]>> = {
    linux: ['sysfs', 'libusb'],
    darwin: ['system-profiler', 'libusb'],
    win32: ['pnputil', 'libusb'],
};

export function defaultBackends(platform: NodeJS.Platform): BackendId[] {
    return PLATFORM_BACKENDS[platform] ?? ['libusb'];
}

/**
 * Parse a comma-separated backend list; empty or unset yields undefined
 */
const parseBackendList = (value: string | undefined): string[] | undefined => {
    if (!value) {
        return undefined;
    }
    const items = value.split(',').map((item) => item.trim()).filter(Boolean);
    return items.length > 0 ? items : undefined;
};

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
    backends: z.array(z.enum(BACKEND_IDS)).min(1),
    provisionalMatch: z.enum(['merge', 'separate']).default('merge'),
    timeoutMs: z.coerce.number().int().min(0).default(0),
    sysfsRoot: z.string().min(1).default('/sys/bus/usb/devices'),
    controlTimeoutMs: z.coerce.number().int().positive().default(1000),
    logLevel: z.enum(LOG_LEVELS).default('info'),
    logPretty: z.enum(['true', 'false']).default('false').transform((value) => value === 'true'),
});

export type Config = z.infer<typeof configSchema>;
export type ProvisionalMatchMode = Config['provisionalMatch'];

/**
 * Load and validate configuration from an environment object
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, platform: NodeJS.Platform = process.platform): Config {
    const rawConfig = {
        backends: parseBackendList(env['USB_PROFILER_BACKENDS']) ?? defaultBackends(platform),
        provisionalMatch: env['USB_PROFILER_PROVISIONAL_MATCH'] || undefined,
        timeoutMs: env['USB_PROFILER_TIMEOUT_MS'] || undefined,
        sysfsRoot: env['USB_SYSFS_ROOT'] || undefined,
        controlTimeoutMs: env['USB_CONTROL_TIMEOUT_MS'] || undefined,
        logLevel: env['LOG_LEVEL']?.toLowerCase() || undefined,
        logPretty: env['LOG_PRETTY']?.toLowerCase() || undefined,
    };

    const parsed = configSchema.safeParse(rawConfig);
    if (!parsed.success) {
        const details = parsed.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
        throw new ProfilerError('INVALID_CONFIG', `Configuration validation failed: ${details.join('; ')}`, { details });
    }
    return parsed.data;
}

/**
 * Log level for the shared logger; unlike loadConfig this never throws
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
    const level = env['LOG_LEVEL']?.toLowerCase();
    return LOG_LEVELS.find((candidate) => candidate === level) ?? 'info';
}

let cachedConfig: Config | undefined;

/**
 * Process-wide configuration, loaded from process.env on first use
 */
export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}
