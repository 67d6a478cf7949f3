/**
 * Backend capability boundary: one "enumerate now" call per backend
 */

import { BackendId } from '../usb-common';
import type { Config } from '../usb-config';
import type { BackendReport } from '../usb-device-record';
import { LibusbBackend } from './usb-backend-libusb';
import { PnputilBackend } from './usb-backend-pnputil';
import { SysfsBackend } from './usb-backend-sysfs';
import { SystemProfilerBackend } from './usb-backend-system-profiler';

export interface UsbBackend {
    readonly id: BackendId;
    enumerate(): Promise<BackendReport>;
}

/**
 * Instantiate a backend by id with the settings it reads from the config
 */
export function createBackend(id: BackendId, config: Pick<Config, 'sysfsRoot' | 'controlTimeoutMs'>): UsbBackend {
    switch (id) {
        case 'sysfs':
            return new SysfsBackend(config.sysfsRoot);
        case 'libusb':
            return new LibusbBackend(config.controlTimeoutMs);
        case 'system-profiler':
            return new SystemProfilerBackend();
        case 'pnputil':
            return new PnputilBackend();
    }
}
