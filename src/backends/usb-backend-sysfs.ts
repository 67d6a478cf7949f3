/**
 * Linux sysfs backend
 *
 * Reads /sys/bus/usb/devices (or USB_SYSFS_ROOT). Entries named "usbN" are root
 * hubs, "B-P.P" entries are devices; interface entries ("1-2:1.0") are skipped.
 * The kernel's cached "descriptors" file supplies the device descriptor and
 * every configuration block without touching the device.
 */

import { readFile, readdir, readlink, realpath } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { BackendId } from '../usb-common';
import { errorMessage } from '../usb-errors';
import { BackendReport, RawBusReport, RawDeviceReport, parseSpeed } from '../usb-device-record';
import { backendLogger } from '../usb-logger';
import { parsePortPath } from '../usb-port-path';
import type { UsbBackend } from './usb-backend';

const log = backendLogger('sysfs');

async function readAttribute(dir: string, name: string): Promise<string | undefined> {
    try {
        const value = (await readFile(join(dir, name), 'utf8')).trim();
        return value.length > 0 ? value : undefined;
    } catch (error) {
        log.trace({ dir, name, error: errorMessage(error) }, 'attribute not readable');
        return undefined;
    }
}

async function readNumber(dir: string, name: string, radix = 10): Promise<number | undefined> {
    const text = await readAttribute(dir, name);
    if (text === undefined) {
        return undefined;
    }
    const value = parseInt(text, radix);
    return Number.isNaN(value) ? undefined : value;
}

async function readLinkName(dir: string, name: string): Promise<string | undefined> {
    try {
        return basename(await readlink(join(dir, name)));
    } catch (error) {
        log.trace({ dir, name, error: errorMessage(error) }, 'link not readable');
        return undefined;
    }
}

async function readDescriptors(dir: string): Promise<Uint8Array | undefined> {
    try {
        return new Uint8Array(await readFile(join(dir, 'descriptors')));
    } catch (error) {
        log.debug({ dir, error: errorMessage(error) }, 'descriptors not readable');
        return undefined;
    }
}

/**
 * Host controller identity from the root hub's parent device (normally PCI)
 */
async function readHostController(dir: string, bus: RawBusReport): Promise<void> {
    let controllerDir: string;
    try {
        controllerDir = dirname(await realpath(dir));
    } catch (error) {
        log.debug({ dir, error: errorMessage(error) }, 'root hub path not resolvable');
        return;
    }
    const vendorId = await readNumber(controllerDir, 'vendor', 16);
    const deviceId = await readNumber(controllerDir, 'device', 16);
    if (vendorId !== undefined && deviceId !== undefined) {
        bus.hostController = { vendorId, deviceId };
    }
    const driver = await readLinkName(controllerDir, 'driver');
    if (driver !== undefined) {
        bus.hostControllerDriver = driver;
    }
}

async function readDevice(dir: string, bus: number, portPath: number[]): Promise<RawDeviceReport> {
    const report: RawDeviceReport = { bus, portPath, sysPath: dir };
    const descriptors = await readDescriptors(dir);
    if (descriptors) {
        report.descriptors = descriptors;
    }
    const address = await readNumber(dir, 'devnum');
    if (address !== undefined) {
        report.address = address;
    }
    const speed = parseSpeed(await readAttribute(dir, 'speed'));
    if (speed) {
        report.speed = speed;
    }
    const active = await readNumber(dir, 'bConfigurationValue');
    if (active !== undefined) {
        report.activeConfiguration = active;
    }
    const manufacturer = await readAttribute(dir, 'manufacturer');
    if (manufacturer !== undefined) {
        report.manufacturer = manufacturer;
    }
    const product = await readAttribute(dir, 'product');
    if (product !== undefined) {
        report.product = product;
    }
    const serial = await readAttribute(dir, 'serial');
    if (serial !== undefined) {
        report.serial = serial;
    }
    const driver = await readLinkName(dir, 'driver');
    if (driver !== undefined) {
        report.driver = driver;
    }
    return report;
}

export class SysfsBackend implements UsbBackend {
    readonly id: BackendId = 'sysfs';

    constructor(private readonly root: string) {}

    async enumerate(): Promise<BackendReport> {
        const entries = (await readdir(this.root)).sort();
        const buses: RawBusReport[] = [];
        const devices: RawDeviceReport[] = [];

        for (const entry of entries) {
            if (entry.includes(':')) {
                continue;
            }
            const location = parsePortPath(entry);
            if (!location) {
                log.debug({ entry }, 'skipping unrecognised entry');
                continue;
            }
            const dir = join(this.root, entry);
            const busnum = await readNumber(dir, 'busnum');
            const bus = busnum ?? location.bus;
            const report = await readDevice(dir, bus, location.path);
            devices.push(report);

            if (location.path.length === 0) {
                const busReport: RawBusReport = { id: bus };
                if (report.product !== undefined) {
                    busReport.name = report.product;
                }
                await readHostController(dir, busReport);
                buses.push(busReport);
            }
        }

        log.debug({ buses: buses.length, devices: devices.length }, 'sysfs enumerated');
        return { backend: this.id, buses, devices };
    }
}
