/**
 * libusb backend (npm "usb")
 *
 * The only backend that issues control transfers. Each device handle is opened,
 * read and closed within one call; a device that cannot be opened is still
 * reported with the device descriptor libusb cached at enumeration.
 */

import type { getDeviceList } from 'usb';
import { concatBytes, readU16 } from '../usb-bytes';
import { DescriptorType } from '../usb-class-descriptors';
import { HUB_CLASS } from '../usb-class-codes';
import { BackendId } from '../usb-common';
import {
    CONFIGURATION_HEADER_LENGTH,
    DEVICE_DESCRIPTOR_LENGTH,
    UsbConfiguration,
    decodeConfiguration,
    encodeDeviceDescriptor,
} from '../usb-descriptors';
import { errorMessage } from '../usb-errors';
import { BackendReport, RawBusReport, RawDeviceReport, RawHidReport, RawStringDescriptor } from '../usb-device-record';
import { backendLogger } from '../usb-logger';
import type { UsbBackend } from './usb-backend';

type LibusbDevice = ReturnType<typeof getDeviceList>[number];

const log = backendLogger('libusb');

const GET_DESCRIPTOR = 0x06;
const REQUEST_IN_STANDARD_DEVICE = 0x80;
const REQUEST_IN_STANDARD_INTERFACE = 0x81;
const REQUEST_IN_CLASS_DEVICE = 0xa0;
const LANGID_EN_US = 0x0409;
const BOS_HEADER_LENGTH = 5;
const HID_CLASS = 0x03;

function controlIn(device: LibusbDevice, requestType: number, value: number, index: number, length: number): Promise<Uint8Array> {
    return new Promise((resolve, reject) => {
        device.controlTransfer(requestType, GET_DESCRIPTOR, value, index, length, (error, data) => {
            if (error) {
                reject(error);
            } else if (data instanceof Uint8Array) {
                resolve(new Uint8Array(data));
            } else {
                reject(new Error('control transfer returned no data'));
            }
        });
    });
}

/**
 * Run one read; a failing request degrades this field of this device only
 */
async function attempt<T>(what: string, device: LibusbDevice, read: () => Promise<T>): Promise<T | undefined> {
    try {
        return await read();
    } catch (error) {
        log.debug({ bus: device.busNumber, address: device.deviceAddress, what, error: errorMessage(error) }, 'descriptor read failed');
        return undefined;
    }
}

async function readConfiguration(device: LibusbDevice, index: number): Promise<Uint8Array> {
    const value = (DescriptorType.Configuration << 8) | index;
    const header = await controlIn(device, REQUEST_IN_STANDARD_DEVICE, value, 0, CONFIGURATION_HEADER_LENGTH);
    const total = header.length >= 4 ? readU16(header, 2) : header.length;
    return total > header.length ? controlIn(device, REQUEST_IN_STANDARD_DEVICE, value, 0, total) : header;
}

async function readBos(device: LibusbDevice): Promise<Uint8Array> {
    const value = DescriptorType.Bos << 8;
    const header = await controlIn(device, REQUEST_IN_STANDARD_DEVICE, value, 0, BOS_HEADER_LENGTH);
    const total = header.length >= 4 ? readU16(header, 2) : header.length;
    return total > header.length ? controlIn(device, REQUEST_IN_STANDARD_DEVICE, value, 0, total) : header;
}

function stringIndexes(deviceDescriptor: LibusbDevice['deviceDescriptor'], configurations: UsbConfiguration[]): number[] {
    const indexes = new Set<number>([
        deviceDescriptor.iManufacturer,
        deviceDescriptor.iProduct,
        deviceDescriptor.iSerialNumber,
    ]);
    for (const config of configurations) {
        indexes.add(config.stringIndex);
        for (const iface of config.interfaces) {
            indexes.add(iface.stringIndex);
        }
    }
    indexes.delete(0);
    return Array.from(indexes).sort((a, b) => a - b);
}

/**
 * Report descriptor requests for every HID interface, sized from its HID class descriptor
 */
function hidRequests(configurations: UsbConfiguration[]): Array<{ interfaceNumber: number; length: number }> {
    const requests = new Map<number, number>();
    for (const config of configurations) {
        for (const iface of config.interfaces) {
            if (iface.classCode.base !== HID_CLASS || requests.has(iface.number)) {
                continue;
            }
            for (const descriptor of iface.descriptors) {
                if (descriptor.kind !== 'hid') {
                    continue;
                }
                const report = descriptor.reports.find((entry) => entry.descriptorType === DescriptorType.HidReport);
                if (report && report.length > 0) {
                    requests.set(iface.number, report.length);
                }
            }
        }
    }
    return Array.from(requests, ([interfaceNumber, length]) => ({ interfaceNumber, length }));
}

function cachedDescriptor(device: LibusbDevice): Uint8Array {
    const d = device.deviceDescriptor;
    return encodeDeviceDescriptor({
        usbVersion: d.bcdUSB,
        classCode: { base: d.bDeviceClass, sub: d.bDeviceSubClass, protocol: d.bDeviceProtocol },
        maxPacketSize0: d.bMaxPacketSize0,
        vendorId: d.idVendor,
        productId: d.idProduct,
        deviceVersion: d.bcdDevice,
        manufacturerIndex: d.iManufacturer,
        productIndex: d.iProduct,
        serialIndex: d.iSerialNumber,
        numConfigurations: d.bNumConfigurations,
    });
}

export class LibusbBackend implements UsbBackend {
    readonly id: BackendId = 'libusb';

    constructor(private readonly controlTimeoutMs: number) {}

    async enumerate(): Promise<BackendReport> {
        const usb = await import('usb');
        const list = usb.getDeviceList();
        const buses = new Map<number, RawBusReport>();
        const devices: RawDeviceReport[] = [];

        for (const device of list) {
            if (!buses.has(device.busNumber)) {
                buses.set(device.busNumber, { id: device.busNumber });
            }
            devices.push(await this.readDevice(device));
        }

        log.debug({ buses: buses.size, devices: devices.length }, 'libusb enumerated');
        return { backend: this.id, buses: Array.from(buses.values()), devices };
    }

    private async readDevice(device: LibusbDevice): Promise<RawDeviceReport> {
        const report: RawDeviceReport = {
            bus: device.busNumber,
            address: device.deviceAddress,
            descriptors: cachedDescriptor(device),
        };
        if (Array.isArray(device.portNumbers)) {
            report.portPath = [...device.portNumbers];
        }

        try {
            device.open();
        } catch (error) {
            log.debug({ bus: device.busNumber, address: device.deviceAddress, error: errorMessage(error) }, 'device not openable, cached descriptor only');
            return report;
        }

        try {
            device.timeout = this.controlTimeoutMs;
            await this.readOpenDevice(device, report);
        } finally {
            device.close();
        }
        return report;
    }

    private async readOpenDevice(device: LibusbDevice, report: RawDeviceReport): Promise<void> {
        const deviceBytes = await attempt('device', device, () =>
            controlIn(device, REQUEST_IN_STANDARD_DEVICE, DescriptorType.Device << 8, 0, DEVICE_DESCRIPTOR_LENGTH));
        const parts: Uint8Array[] = [deviceBytes ?? cachedDescriptor(device)];

        const usbVersion = device.deviceDescriptor.bcdUSB;
        const configurations: UsbConfiguration[] = [];
        for (let index = 0; index < device.deviceDescriptor.bNumConfigurations; index++) {
            const block = await attempt(`configuration ${index}`, device, () => readConfiguration(device, index));
            if (!block) {
                break;
            }
            parts.push(block);
            const decoded = decodeConfiguration(block, { usbVersion });
            if (decoded.ok) {
                configurations.push(decoded.value);
            }
        }
        report.descriptors = concatBytes(parts);

        if (usbVersion >= 0x0201) {
            const bos = await attempt('bos', device, () => readBos(device));
            if (bos) {
                report.bos = bos;
            }
        }

        if (device.deviceDescriptor.bDeviceClass === HUB_CLASS) {
            const type = usbVersion >= 0x0300 ? DescriptorType.SuperSpeedHub : DescriptorType.Hub;
            const hub = await attempt('hub', device, () => controlIn(device, REQUEST_IN_CLASS_DEVICE, type << 8, 0, 0xff));
            if (hub) {
                report.hubDescriptor = hub;
            }
        }

        const hidReports: RawHidReport[] = [];
        for (const request of hidRequests(configurations)) {
            const bytes = await attempt(`hid report ${request.interfaceNumber}`, device, () =>
                controlIn(device, REQUEST_IN_STANDARD_INTERFACE, DescriptorType.HidReport << 8, request.interfaceNumber, request.length));
            if (bytes) {
                hidReports.push({ interfaceNumber: request.interfaceNumber, bytes });
            }
        }
        if (hidReports.length > 0) {
            report.hidReports = hidReports;
        }

        const strings: RawStringDescriptor[] = [];
        for (const index of stringIndexes(device.deviceDescriptor, configurations)) {
            const bytes = await attempt(`string ${index}`, device, () =>
                controlIn(device, REQUEST_IN_STANDARD_DEVICE, (DescriptorType.String << 8) | index, LANGID_EN_US, 0xff));
            if (bytes) {
                strings.push({ index, bytes });
            }
        }
        if (strings.length > 0) {
            report.strings = strings;
        }
    }
}
