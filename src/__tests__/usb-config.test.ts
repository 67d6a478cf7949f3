import { describe, expect, it } from 'vitest';
import { defaultBackends, loadConfig, resolveLogLevel } from '../usb-config';
import { ProfilerError } from '../usb-errors';

describe('loadConfig', () => {
    it('applies defaults for the platform', () => {
        expect(loadConfig({}, 'linux')).toEqual({
            backends: ['sysfs', 'libusb'],
            provisionalMatch: 'merge',
            timeoutMs: 0,
            sysfsRoot: '/sys/bus/usb/devices',
            controlTimeoutMs: 1000,
            logLevel: 'info',
            logPretty: false,
        });
        expect(defaultBackends('darwin')).toEqual(['system-profiler', 'libusb']);
        expect(defaultBackends('win32')).toEqual(['pnputil', 'libusb']);
        expect(defaultBackends('freebsd')).toEqual(['libusb']);
    });

    it('reads overrides from the environment', () => {
        const config = loadConfig({
            USB_PROFILER_BACKENDS: 'libusb, sysfs',
            USB_PROFILER_PROVISIONAL_MATCH: 'separate',
            USB_PROFILER_TIMEOUT_MS: '2500',
            USB_SYSFS_ROOT: '/tmp/sys',
            LOG_LEVEL: 'DEBUG',
            LOG_PRETTY: 'true',
        }, 'linux');

        expect(config.backends).toEqual(['libusb', 'sysfs']);
        expect(config.provisionalMatch).toBe('separate');
        expect(config.timeoutMs).toBe(2500);
        expect(config.sysfsRoot).toBe('/tmp/sys');
        expect(config.logLevel).toBe('debug');
        expect(config.logPretty).toBe(true);
    });

    it('rejects unknown backends and bad numbers', () => {
        expect(() => loadConfig({ USB_PROFILER_BACKENDS: 'serial' }, 'linux')).toThrow(ProfilerError);
        try {
            loadConfig({ USB_PROFILER_TIMEOUT_MS: '-5' }, 'linux');
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(ProfilerError);
            expect(error instanceof ProfilerError && error.code).toBe('INVALID_CONFIG');
            expect(error instanceof ProfilerError && error.details[0]?.startsWith('timeoutMs:')).toBe(true);
        }
    });

    it('falls back to info for an unknown log level', () => {
        expect(resolveLogLevel({ LOG_LEVEL: 'loud' })).toBe('info');
        expect(resolveLogLevel({ LOG_LEVEL: 'Warn' })).toBe('warn');
    });
});
