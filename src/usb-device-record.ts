/**
 * Device records: the boundary between backends and the core
 *
 * A backend reports what it could read about each device (raw descriptor bytes
 * and/or OS metadata). createDeviceRecord decodes that into a UsbDevice tagged
 * with the backend and how complete its view was.
 */

import { decodeBos } from './usb-bos';
import { decodeHubDescriptor } from './usb-class-descriptors';
import { BackendId, ClassCode, Completeness, KnownAbsentField, UsbBusInfo, UsbDevice, UsbSpeed, getDeviceName } from './usb-common';
import { UsbConfiguration, decodeStringDescriptor, splitDescriptorBlob } from './usb-descriptors';
import { Diagnostic, withDevice } from './usb-errors';
import { HidReportDescriptor, decodeHidReport } from './usb-hid-report';
import { decoderLogger, logDiagnostics } from './usb-logger';
import { formatPortPath } from './usb-port-path';

export interface RawStringDescriptor {
    index: number;
    bytes: Uint8Array;
}

export interface RawHidReport {
    interfaceNumber: number;
    bytes: Uint8Array;
}

/**
 * Identity a coarse backend knows without descriptor bytes
 */
export interface RawIdentity {
    vendorId?: number;
    productId?: number;
    classCode?: ClassCode;
    usbVersion?: number;
    deviceVersion?: number;
}

export interface RawDeviceReport {
    bus: number;
    portPath?: number[];
    address?: number;
    descriptors?: Uint8Array;          // device descriptor + configuration blocks
    bos?: Uint8Array;
    hubDescriptor?: Uint8Array;
    hidReports?: RawHidReport[];
    strings?: RawStringDescriptor[];
    identity?: RawIdentity;
    manufacturer?: string;
    product?: string;
    serial?: string;
    driver?: string;
    sysPath?: string;
    speed?: UsbSpeed;
    activeConfiguration?: number;
}

export type RawBusReport = UsbBusInfo;

export interface BackendReport {
    backend: BackendId;
    buses: RawBusReport[];
    devices: RawDeviceReport[];
}

export interface DeviceRecord {
    device: UsbDevice;
    diagnostics: Diagnostic[];
}

const SPEEDS: Record<string, UsbSpeed> = {
    '1.5': 'low',
    '12': 'full',
    '480': 'high',
    '5000': 'super',
    '10000': 'super-plus',
    '20000': 'super-plus-x2',
    low_speed: 'low',
    full_speed: 'full',
    high_speed: 'high',
    super_speed: 'super',
    super_speed_plus: 'super-plus',
};

/**
 * Map a backend speed string (sysfs Mbit/s or system_profiler names) to UsbSpeed
 */
export function parseSpeed(text: string | undefined): UsbSpeed | undefined {
    if (!text) {
        return undefined;
    }
    return SPEEDS[text.trim().toLowerCase()];
}

export function deviceLabel(device: Pick<RawDeviceReport, 'bus' | 'portPath' | 'address'>): string {
    if (device.portPath) {
        return formatPortPath(device.bus, device.portPath);
    }
    if (device.address !== undefined) {
        return `bus ${device.bus} address ${device.address}`;
    }
    return `bus ${device.bus}`;
}

function decodeStrings(raw: RawStringDescriptor[], diagnostics: Diagnostic[]): Map<number, string> {
    const strings = new Map<number, string>();
    for (const { index, bytes } of raw) {
        if (index === 0) {
            continue;
        }
        const result = decodeStringDescriptor(bytes, index);
        if (!result.ok) {
            diagnostics.push(result.error);
        } else if (result.value.kind === 'string') {
            strings.set(index, result.value.text);
            diagnostics.push(...result.warnings);
        }
    }
    return strings;
}

function nameConfigurations(configurations: UsbConfiguration[], strings: Map<number, string>): void {
    for (const config of configurations) {
        const configName = config.stringIndex > 0 ? strings.get(config.stringIndex) : undefined;
        if (configName !== undefined) {
            config.name = configName;
        }
        for (const iface of config.interfaces) {
            const ifaceName = iface.stringIndex > 0 ? strings.get(iface.stringIndex) : undefined;
            if (ifaceName !== undefined) {
                iface.name = ifaceName;
            }
        }
    }
}

/**
 * Decode one backend report into a device record
 */
export function createDeviceRecord(report: RawDeviceReport, backend: BackendId): DeviceRecord {
    const diagnostics: Diagnostic[] = [];
    const knownAbsent: KnownAbsentField[] = [];
    const device: UsbDevice = {
        bus: report.bus,
        name: '',
        configurations: [],
        knownAbsent,
        provenance: [],
        children: [],
    };
    if (report.portPath) {
        device.portPath = [...report.portPath];
    }
    if (report.address !== undefined) {
        device.address = report.address;
    }

    const strings = decodeStrings(report.strings ?? [], diagnostics);
    let completeness: Completeness = 'coarse';
    let descriptorTruncated = false;
    let hasDeviceDescriptor = false;

    if (report.descriptors) {
        const blob = splitDescriptorBlob(report.descriptors);
        if (blob.device.ok) {
            const descriptor = blob.device.value;
            completeness = 'full';
            hasDeviceDescriptor = true;
            device.vendorId = descriptor.vendorId;
            device.productId = descriptor.productId;
            device.classCode = descriptor.classCode;
            device.usbVersion = descriptor.usbVersion;
            device.deviceVersion = descriptor.deviceVersion;
            device.maxPacketSize0 = descriptor.maxPacketSize0;

            const lookup = (index: number, fallback: string | undefined, field: KnownAbsentField): string | undefined => {
                if (index === 0) {
                    knownAbsent.push(field);
                    return undefined;
                }
                return strings.get(index) ?? fallback;
            };
            device.manufacturer = lookup(descriptor.manufacturerIndex, report.manufacturer, 'manufacturer');
            device.product = lookup(descriptor.productIndex, report.product, 'product');
            device.serial = lookup(descriptor.serialIndex, report.serial, 'serial');

            for (const result of blob.configurations) {
                if (result.ok) {
                    device.configurations.push(result.value);
                    diagnostics.push(...result.warnings);
                    descriptorTruncated = descriptorTruncated || result.truncated;
                } else {
                    diagnostics.push(result.error);
                    descriptorTruncated = true;
                }
            }
            if (descriptor.numConfigurations === 0) {
                knownAbsent.push('configurations');
            }
            if (descriptorTruncated || device.configurations.length < descriptor.numConfigurations) {
                completeness = 'partial';
            }
            if (descriptor.usbVersion < 0x0201 && !report.bos) {
                knownAbsent.push('bos');
            }
        } else {
            diagnostics.push(blob.device.error);
            descriptorTruncated = true;
            completeness = 'partial';
        }
    }

    const identity: RawIdentity = report.identity ?? {};
    device.vendorId = device.vendorId ?? identity.vendorId;
    device.productId = device.productId ?? identity.productId;
    device.classCode = device.classCode ?? identity.classCode;
    device.usbVersion = device.usbVersion ?? identity.usbVersion;
    device.deviceVersion = device.deviceVersion ?? identity.deviceVersion;
    if (!hasDeviceDescriptor) {
        device.manufacturer = report.manufacturer;
        device.product = report.product;
        device.serial = report.serial;
    }
    nameConfigurations(device.configurations, strings);

    if (report.bos) {
        const result = decodeBos(report.bos);
        if (result.ok) {
            device.bos = result.value;
            diagnostics.push(...result.warnings);
        } else {
            diagnostics.push(result.error);
        }
    }
    if (report.hubDescriptor) {
        const result = decodeHubDescriptor(report.hubDescriptor);
        if (result.ok) {
            device.hub = result.value;
        } else {
            diagnostics.push(result.error);
        }
    }
    if (report.hidReports && report.hidReports.length > 0) {
        const reports: HidReportDescriptor[] = [];
        for (const raw of report.hidReports) {
            const result = decodeHidReport(raw.bytes, raw.interfaceNumber);
            if (result.ok) {
                reports.push(result.value);
                diagnostics.push(...result.warnings);
            } else {
                diagnostics.push(result.error);
            }
        }
        device.hidReports = reports;
    }

    device.driver = report.driver;
    device.sysPath = report.sysPath;
    device.speed = report.speed;
    device.activeConfiguration = report.activeConfiguration;
    if (descriptorTruncated) {
        device.descriptorTruncated = true;
    }
    device.name = getDeviceName(device);
    device.provenance = [{ backend, completeness }];

    const labelled = withDevice(diagnostics, deviceLabel(report), backend);
    logDiagnostics(decoderLogger, labelled);
    return { device: stripUndefined(device), diagnostics: labelled };
}

/**
 * Drop optional fields left undefined so records only carry what is known
 */
function stripUndefined(device: UsbDevice): UsbDevice {
    const result: UsbDevice = { ...device };
    for (const key of Object.keys(result)) {
        if (Reflect.get(result, key) === undefined) {
            Reflect.deleteProperty(result, key);
        }
    }
    return result;
}
