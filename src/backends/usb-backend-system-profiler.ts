/**
 * macOS backend: `system_profiler SPUSBDataType -json`
 *
 * Coarse: no descriptor bytes, but bus host controllers and a location id
 * (0xBBPPPPPP / address) that encodes the bus and one port per nibble.
 */

import { execSync } from 'child_process';
import { z } from 'zod';
import { parseBcdVersion } from '../usb-bytes';
import { BackendId } from '../usb-common';
import { ProfilerError } from '../usb-errors';
import { BackendReport, RawBusReport, RawDeviceReport, RawIdentity, parseSpeed } from '../usb-device-record';
import { backendLogger } from '../usb-logger';
import type { UsbBackend } from './usb-backend';

const log = backendLogger('system-profiler');

const APPLE_VENDOR_ID = 0x05ac;

interface ProfilerItem {
    _name?: string;
    location_id?: string;
    vendor_id?: string;
    product_id?: string;
    serial_num?: string;
    manufacturer?: string;
    bcd_device?: string;
    device_speed?: string;
    _items?: ProfilerItem[];
}

const itemSchema: z.ZodType<ProfilerItem> = z.lazy(() => z.object({
    _name: z.string().optional(),
    location_id: z.string().optional(),
    vendor_id: z.string().optional(),
    product_id: z.string().optional(),
    serial_num: z.string().optional(),
    manufacturer: z.string().optional(),
    bcd_device: z.string().optional(),
    device_speed: z.string().optional(),
    _items: z.array(itemSchema).optional(),
}));

const busSchema = z.object({
    _name: z.string().optional(),
    host_controller: z.string().optional(),
    pci_vendor: z.string().optional(),
    pci_device: z.string().optional(),
    _items: z.array(itemSchema).optional(),
});

const outputSchema = z.object({
    SPUSBDataType: z.array(busSchema),
});

/**
 * "0x05ac  (Apple Inc.)", "0x8086 " or "apple_vendor_id"
 */
export function parseProfilerId(text: string | undefined): number | undefined {
    if (!text) {
        return undefined;
    }
    const match = /0x([0-9a-f]{1,4})/i.exec(text);
    if (match) {
        return parseInt(match[1], 16);
    }
    return text.includes('apple_vendor_id') ? APPLE_VENDOR_ID : undefined;
}

/**
 * "0x14320000 / 5": the top byte is the bus, then one port per nibble until a zero
 */
export function parseLocationId(text: string): { bus: number; portPath: number[]; address?: number } | undefined {
    const match = /^\s*0x([0-9a-f]{8})\s*(?:\/\s*(\d+))?/i.exec(text);
    if (!match) {
        return undefined;
    }
    const value = parseInt(match[1], 16);
    const bus = (value >>> 24) & 0xff;
    const portPath: number[] = [];
    for (let shift = 20; shift >= 0; shift -= 4) {
        const port = (value >>> shift) & 0xf;
        if (port === 0) {
            break;
        }
        portPath.push(port);
    }
    const location: { bus: number; portPath: number[]; address?: number } = { bus, portPath };
    if (match[2] !== undefined) {
        location.address = parseInt(match[2], 10);
    }
    return location;
}

function toDeviceReport(item: ProfilerItem, fallbackBus: number): RawDeviceReport {
    const location = item.location_id ? parseLocationId(item.location_id) : undefined;
    const report: RawDeviceReport = { bus: location?.bus ?? fallbackBus };
    if (location && location.portPath.length > 0) {
        report.portPath = location.portPath;
    }
    if (location?.address !== undefined) {
        report.address = location.address;
    }

    const identity: RawIdentity = {};
    const vendorId = parseProfilerId(item.vendor_id);
    const productId = parseProfilerId(item.product_id);
    const deviceVersion = item.bcd_device ? parseBcdVersion(item.bcd_device) : undefined;
    if (vendorId !== undefined) identity.vendorId = vendorId;
    if (productId !== undefined) identity.productId = productId;
    if (deviceVersion !== undefined) identity.deviceVersion = deviceVersion;
    report.identity = identity;

    if (item._name !== undefined) report.product = item._name;
    if (item.manufacturer !== undefined) report.manufacturer = item.manufacturer;
    if (item.serial_num !== undefined) report.serial = item.serial_num;
    const speed = parseSpeed(item.device_speed);
    if (speed) report.speed = speed;
    return report;
}

/**
 * Turn system_profiler JSON into a backend report
 */
export function parseSystemProfilerJson(json: unknown): BackendReport {
    const parsed = outputSchema.safeParse(json);
    if (!parsed.success) {
        throw new ProfilerError('NO_USABLE_BACKEND', `unexpected system_profiler output: ${parsed.error.message}`, {
            attemptedBackends: ['system-profiler'],
        });
    }

    const buses: RawBusReport[] = [];
    const devices: RawDeviceReport[] = [];
    parsed.data.SPUSBDataType.forEach((entry, index) => {
        const items = entry._items ?? [];
        let busId = index;
        for (const item of items) {
            const location = item.location_id ? parseLocationId(item.location_id) : undefined;
            if (location) {
                busId = location.bus;
                break;
            }
        }

        const bus: RawBusReport = { id: busId };
        if (entry._name !== undefined) bus.name = entry._name;
        const vendorId = parseProfilerId(entry.pci_vendor);
        const deviceId = parseProfilerId(entry.pci_device);
        if (vendorId !== undefined && deviceId !== undefined) {
            bus.hostController = { vendorId, deviceId };
        }
        if (entry.host_controller !== undefined) bus.hostControllerDriver = entry.host_controller;
        buses.push(bus);

        const visit = (item: ProfilerItem): void => {
            devices.push(toDeviceReport(item, busId));
            (item._items ?? []).forEach(visit);
        };
        items.forEach(visit);
    });

    return { backend: 'system-profiler', buses, devices };
}

export class SystemProfilerBackend implements UsbBackend {
    readonly id: BackendId = 'system-profiler';

    async enumerate(): Promise<BackendReport> {
        const output = execSync('system_profiler SPUSBDataType -json', {
            encoding: 'utf8',
            maxBuffer: 10 * 1024 * 1024,
        });
        const report = parseSystemProfilerJson(JSON.parse(output));
        log.debug({ buses: report.buses.length, devices: report.devices.length }, 'system_profiler enumerated');
        return report;
    }
}
