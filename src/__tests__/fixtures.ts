import type { BackendId, UsbDevice } from '../usb-common';
import type { RawDeviceReport } from '../usb-device-record';

export interface DeviceDescriptorFields {
    usbVersion?: number;
    classCode?: [number, number, number];
    maxPacketSize0?: number;
    vendorId: number;
    productId: number;
    deviceVersion?: number;
    manufacturerIndex?: number;
    productIndex?: number;
    serialIndex?: number;
    numConfigurations?: number;
}

const u16 = (value: number): number[] => [value & 0xff, (value >> 8) & 0xff];

export function deviceDescriptor(fields: DeviceDescriptorFields): number[] {
    const [base, sub, protocol] = fields.classCode ?? [0, 0, 0];
    return [
        18, 0x01, ...u16(fields.usbVersion ?? 0x0200), base, sub, protocol, fields.maxPacketSize0 ?? 64,
        ...u16(fields.vendorId), ...u16(fields.productId), ...u16(fields.deviceVersion ?? 0x0100),
        fields.manufacturerIndex ?? 0, fields.productIndex ?? 0, fields.serialIndex ?? 0, fields.numConfigurations ?? 1,
    ];
}

export function stringDescriptor(text: string): number[] {
    const units = Array.from(text).flatMap((char) => u16(char.charCodeAt(0)));
    return [2 + units.length, 0x03, ...units];
}

export function configurationHeader(totalLength: number, numInterfaces: number, attributes = 0x80, maxPower = 50): number[] {
    return [9, 0x02, ...u16(totalLength), numInterfaces, 1, 0, attributes, maxPower];
}

export function interfaceDescriptor(number: number, numEndpoints: number, classCode: [number, number, number], stringIndex = 0): number[] {
    return [9, 0x04, number, 0, numEndpoints, ...classCode, stringIndex];
}

export function endpointDescriptor(address: number, attributes: number, maxPacketSize: number, interval: number): number[] {
    return [7, 0x05, address, attributes, ...u16(maxPacketSize), interval];
}

export function hidClassDescriptor(reportLength: number): number[] {
    return [9, 0x21, 0x11, 0x01, 0x00, 0x01, 0x22, ...u16(reportLength)];
}

/**
 * Boot keyboard: two HID interfaces with two interrupt endpoints each, 64 bytes
 */
export function keyboardConfiguration(): number[] {
    return [
        ...configurationHeader(64, 2, 0xa0, 50),
        ...interfaceDescriptor(0, 2, [3, 1, 1]),
        ...hidClassDescriptor(63),
        ...endpointDescriptor(0x81, 0x03, 8, 10),
        ...endpointDescriptor(0x01, 0x03, 8, 10),
        ...interfaceDescriptor(1, 2, [3, 0, 0]),
        ...endpointDescriptor(0x82, 0x03, 64, 1),
        ...endpointDescriptor(0x02, 0x03, 64, 1),
    ];
}

/**
 * USB 2 hub descriptor for a 4-port hub, individual power switching, port 2 non-removable
 */
export function hubDescriptor(): number[] {
    return [9, 0x29, 4, 0x09, 0x00, 50, 100, 0x04, 0xff];
}

/**
 * Minimal canonical-looking device for topology and query tests
 */
export function makeDevice(bus: number, portPath: number[] | undefined, fields: Partial<UsbDevice> = {}, backend: BackendId = 'sysfs'): UsbDevice {
    const device: UsbDevice = {
        bus,
        name: fields.name ?? (portPath ? `Device ${bus}-${portPath.join('.')}` : `Device on ${bus}`),
        configurations: [],
        knownAbsent: [],
        provenance: [{ backend, completeness: 'full' }],
        children: [],
        ...fields,
    };
    if (portPath) {
        device.portPath = portPath;
    }
    return device;
}

export function rawDevice(bus: number, portPath: number[], fields: Partial<RawDeviceReport> = {}): RawDeviceReport {
    return { bus, portPath, ...fields };
}
