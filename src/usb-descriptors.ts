/**
 * Standard descriptor decoding
 *
 * Device, configuration, interface, endpoint and string descriptors, the split
 * of a per-device descriptor blob, and the single decodeDescriptor entry point.
 * All functions are pure; malformed device data is reported through
 * DecodeResult and never thrown.
 */

import { ClassCode } from './usb-class-codes';
import { concatBytes, readU16, writeU16 } from './usb-bytes';
import { DescriptorType, HubDescriptor, SubDescriptor, decodeHubDescriptor, decodeSubDescriptor } from './usb-class-descriptors';
import { BosDescriptor, decodeBos } from './usb-bos';
import { HidReportDescriptor, decodeHidReport } from './usb-hid-report';
import { Diagnostic, DecodeResult, decodeFailure, decodeOk, malformed, truncated } from './usb-errors';

export interface DeviceDescriptor {
    kind: 'device';
    length: number;
    usbVersion: number;            // BCD
    classCode: ClassCode;
    maxPacketSize0: number;
    vendorId: number;
    productId: number;
    deviceVersion: number;         // BCD
    manufacturerIndex: number;
    productIndex: number;
    serialIndex: number;
    numConfigurations: number;
}

export type TransferType = 'control' | 'isochronous' | 'bulk' | 'interrupt';
export type SyncType = 'none' | 'asynchronous' | 'adaptive' | 'synchronous';
export type UsageType = 'data' | 'feedback' | 'implicit-feedback' | 'reserved';
export type EndpointDirection = 'in' | 'out';

export interface UsbEndpoint {
    length: number;
    address: number;
    number: number;
    direction: EndpointDirection;
    attributes: number;
    transferType: TransferType;
    syncType?: SyncType;                 // isochronous only
    usageType?: UsageType;               // isochronous only
    wMaxPacketSize: number;
    maxPacketSize: number;               // bits 0-10
    transactionsPerMicroframe: number;   // bits 11-12, plus one
    interval: number;
    extra: Uint8Array;                   // header bytes past the standard 7
    descriptors: SubDescriptor[];
}

export interface UsbInterface {
    length: number;
    number: number;
    alternateSetting: number;
    numEndpoints: number;
    classCode: ClassCode;
    stringIndex: number;
    name?: string;
    extra: Uint8Array;
    leading: SubDescriptor[];            // association descriptors preceding this interface
    descriptors: SubDescriptor[];
    endpoints: UsbEndpoint[];
}

export interface UsbConfiguration {
    length: number;
    totalLength: number;
    numInterfaces: number;
    value: number;
    stringIndex: number;
    name?: string;
    attributes: number;
    selfPowered: boolean;
    remoteWakeup: boolean;
    maxPowerRaw: number;
    maxPowerMa: number;
    extra: Uint8Array;
    descriptors: SubDescriptor[];        // before the first interface
    interfaces: UsbInterface[];
    trailing: SubDescriptor[];           // after the last interface's descriptors
}

export type StringDescriptor =
    | { kind: 'string'; text: string }
    | { kind: 'languages'; languageIds: number[] };

export type ExpectedDescriptor =
    | 'device'
    | 'configuration'
    | 'interface'
    | 'endpoint'
    | 'string'
    | 'string-languages'
    | 'bos'
    | 'hub'
    | 'hid-report';

export type AnyDescriptor =
    | DeviceDescriptor
    | UsbConfiguration
    | UsbInterface
    | UsbEndpoint
    | StringDescriptor
    | BosDescriptor
    | HubDescriptor
    | HidReportDescriptor;

export interface DecodeConfigurationOptions {
    usbVersion?: number;   // bcdUSB of the owning device; selects the bMaxPower unit
}

const TRANSFER_TYPES: TransferType[] = ['control', 'isochronous', 'bulk', 'interrupt'];
const SYNC_TYPES: SyncType[] = ['none', 'asynchronous', 'adaptive', 'synchronous'];
const USAGE_TYPES: UsageType[] = ['data', 'feedback', 'implicit-feedback', 'reserved'];

export const DEVICE_DESCRIPTOR_LENGTH = 18;
export const CONFIGURATION_HEADER_LENGTH = 9;
const INTERFACE_LENGTH = 9;
const ENDPOINT_LENGTH = 7;

/**
 * Check the header bytes common to every descriptor
 */
function checkHeader<T>(bytes: Uint8Array, type: number, minLength: number): DecodeResult<T> | undefined {
    if (bytes.length < 2) {
        return decodeFailure(truncated(type, 0, minLength, bytes.length));
    }
    if (bytes[1] !== type) {
        return decodeFailure(malformed(`expected descriptor type 0x${type.toString(16)}, got 0x${bytes[1].toString(16)}`, 0, bytes[1]));
    }
    if (bytes[0] < minLength) {
        return decodeFailure(truncated(type, 0, minLength, bytes[0]));
    }
    if (bytes.length < bytes[0]) {
        return decodeFailure(truncated(type, 0, bytes[0], bytes.length));
    }
    return undefined;
}

export function decodeDeviceDescriptor(bytes: Uint8Array): DecodeResult<DeviceDescriptor> {
    const failure = checkHeader<DeviceDescriptor>(bytes, DescriptorType.Device, DEVICE_DESCRIPTOR_LENGTH);
    if (failure) {
        return failure;
    }
    return decodeOk({
        kind: 'device',
        length: bytes[0],
        usbVersion: readU16(bytes, 2),
        classCode: { base: bytes[4], sub: bytes[5], protocol: bytes[6] },
        maxPacketSize0: bytes[7],
        vendorId: readU16(bytes, 8),
        productId: readU16(bytes, 10),
        deviceVersion: readU16(bytes, 12),
        manufacturerIndex: bytes[14],
        productIndex: bytes[15],
        serialIndex: bytes[16],
        numConfigurations: bytes[17],
    });
}

export function encodeDeviceDescriptor(descriptor: Omit<DeviceDescriptor, 'kind' | 'length'>): Uint8Array {
    const out: number[] = [DEVICE_DESCRIPTOR_LENGTH, DescriptorType.Device];
    writeU16(out, descriptor.usbVersion);
    out.push(descriptor.classCode.base, descriptor.classCode.sub, descriptor.classCode.protocol, descriptor.maxPacketSize0);
    writeU16(out, descriptor.vendorId);
    writeU16(out, descriptor.productId);
    writeU16(out, descriptor.deviceVersion);
    out.push(descriptor.manufacturerIndex, descriptor.productIndex, descriptor.serialIndex, descriptor.numConfigurations);
    return Uint8Array.from(out);
}

export function decodeInterfaceDescriptor(bytes: Uint8Array): DecodeResult<UsbInterface> {
    const failure = checkHeader<UsbInterface>(bytes, DescriptorType.Interface, INTERFACE_LENGTH);
    if (failure) {
        return failure;
    }
    return decodeOk({
        length: bytes[0],
        number: bytes[2],
        alternateSetting: bytes[3],
        numEndpoints: bytes[4],
        classCode: { base: bytes[5], sub: bytes[6], protocol: bytes[7] },
        stringIndex: bytes[8],
        extra: bytes.slice(INTERFACE_LENGTH, bytes[0]),
        leading: [],
        descriptors: [],
        endpoints: [],
    });
}

export function decodeEndpointDescriptor(bytes: Uint8Array): DecodeResult<UsbEndpoint> {
    const failure = checkHeader<UsbEndpoint>(bytes, DescriptorType.Endpoint, ENDPOINT_LENGTH);
    if (failure) {
        return failure;
    }
    const address = bytes[2];
    const attributes = bytes[3];
    const wMaxPacketSize = readU16(bytes, 4);
    const transferType = TRANSFER_TYPES[attributes & 0x03];
    const endpoint: UsbEndpoint = {
        length: bytes[0],
        address,
        number: address & 0x0f,
        direction: (address & 0x80) !== 0 ? 'in' : 'out',
        attributes,
        transferType,
        wMaxPacketSize,
        maxPacketSize: wMaxPacketSize & 0x7ff,
        transactionsPerMicroframe: ((wMaxPacketSize >> 11) & 0x03) + 1,
        interval: bytes[6],
        extra: bytes.slice(ENDPOINT_LENGTH, bytes[0]),
        descriptors: [],
    };
    if (transferType === 'isochronous') {
        endpoint.syncType = SYNC_TYPES[(attributes >> 2) & 0x03];
        endpoint.usageType = USAGE_TYPES[(attributes >> 4) & 0x03];
    }
    return decodeOk(endpoint);
}

/**
 * "3x 1024" style packet size, as shown for high-bandwidth endpoints
 */
export function formatMaxPacketSize(endpoint: Pick<UsbEndpoint, 'maxPacketSize' | 'transactionsPerMicroframe'>): string {
    return `${endpoint.transactionsPerMicroframe}x ${endpoint.maxPacketSize}`;
}

/**
 * Walk a configuration descriptor and its sub-descriptors.
 *
 * The walk stops at the first descriptor that runs past the available bytes or
 * past wTotalLength, returning everything fully contained before it with the
 * truncated flag set. Standard descriptors shorter than their minimum length
 * are kept as opaque bytes with a warning and the walk continues.
 */
export function decodeConfiguration(bytes: Uint8Array, options: DecodeConfigurationOptions = {}): DecodeResult<UsbConfiguration> {
    const failure = checkHeader<UsbConfiguration>(bytes, DescriptorType.Configuration, CONFIGURATION_HEADER_LENGTH);
    if (failure) {
        return failure;
    }

    const headerLength = bytes[0];
    const totalLength = readU16(bytes, 2);
    const attributes = bytes[7];
    const maxPowerRaw = bytes[8];
    const superSpeed = (options.usbVersion ?? 0) >= 0x0300;
    const warnings: Diagnostic[] = [];

    const config: UsbConfiguration = {
        length: headerLength,
        totalLength,
        numInterfaces: bytes[4],
        value: bytes[5],
        stringIndex: bytes[6],
        attributes,
        selfPowered: (attributes & 0x40) !== 0,
        remoteWakeup: (attributes & 0x20) !== 0,
        maxPowerRaw,
        maxPowerMa: maxPowerRaw * (superSpeed ? 8 : 2),
        extra: bytes.slice(CONFIGURATION_HEADER_LENGTH, headerLength),
        descriptors: [],
        interfaces: [],
        trailing: [],
    };

    if (totalLength < headerLength) {
        warnings.push(malformed(`wTotalLength ${totalLength} is shorter than the configuration header`, 2, DescriptorType.Configuration));
    }

    const limit = Math.min(Math.max(totalLength, headerLength), bytes.length);
    let isTruncated = false;
    let currentInterface: UsbInterface | undefined;
    let currentEndpoint: UsbEndpoint | undefined;
    let pending: SubDescriptor[] = [];
    let offset = headerLength;

    const attach = (descriptor: SubDescriptor): void => {
        if (pending.length > 0 || descriptor.kind === 'interface-association') {
            pending.push(descriptor);
        } else if (currentEndpoint) {
            currentEndpoint.descriptors.push(descriptor);
        } else if (currentInterface) {
            currentInterface.descriptors.push(descriptor);
        } else {
            config.descriptors.push(descriptor);
        }
    };

    while (offset < limit) {
        if (limit - offset < 2) {
            warnings.push(truncated(DescriptorType.Configuration, offset, 2, limit - offset));
            isTruncated = true;
            break;
        }
        const length = bytes[offset];
        const type = bytes[offset + 1];
        if (length < 2) {
            warnings.push(malformed(`descriptor at offset ${offset} has invalid length ${length}`, offset, type));
            isTruncated = true;
            break;
        }
        if (offset + length > limit) {
            warnings.push(truncated(type, offset, length, limit - offset));
            isTruncated = true;
            break;
        }

        const slice = bytes.slice(offset, offset + length);
        if (type === DescriptorType.Interface && length >= INTERFACE_LENGTH) {
            const decoded = decodeInterfaceDescriptor(slice);
            if (decoded.ok) {
                currentInterface = decoded.value;
                currentInterface.leading = pending;
                pending = [];
                currentEndpoint = undefined;
                config.interfaces.push(currentInterface);
            }
        } else if (type === DescriptorType.Endpoint && length >= ENDPOINT_LENGTH && currentInterface && pending.length === 0) {
            const decoded = decodeEndpointDescriptor(slice);
            if (decoded.ok) {
                currentEndpoint = decoded.value;
                currentInterface.endpoints.push(currentEndpoint);
            }
        } else if (type === DescriptorType.Interface || type === DescriptorType.Endpoint) {
            if (length < (type === DescriptorType.Interface ? INTERFACE_LENGTH : ENDPOINT_LENGTH)) {
                warnings.push(truncated(type, offset, type === DescriptorType.Interface ? INTERFACE_LENGTH : ENDPOINT_LENGTH, length));
            } else {
                warnings.push(malformed(`endpoint descriptor at offset ${offset} outside an interface`, offset, type));
            }
            attach({ kind: 'opaque', descriptorType: type, bytes: slice });
        } else {
            const { descriptor, warnings: subWarnings } = decodeSubDescriptor(slice, { interfaceClass: currentInterface?.classCode, offset });
            warnings.push(...subWarnings);
            attach(descriptor);
        }
        offset += length;
    }

    if (!isTruncated && totalLength > bytes.length) {
        warnings.push(truncated(DescriptorType.Configuration, 0, totalLength, bytes.length));
        isTruncated = true;
    }
    config.trailing = pending;

    return decodeOk(config, warnings, isTruncated);
}

function subDescriptorBytes(descriptors: SubDescriptor[]): Uint8Array[] {
    return descriptors.map((descriptor) => descriptor.bytes);
}

/**
 * Re-emit the exact byte sequence of a decoded configuration
 */
export function encodeConfiguration(config: UsbConfiguration): Uint8Array {
    const header: number[] = [config.length, DescriptorType.Configuration];
    writeU16(header, config.totalLength);
    header.push(config.numInterfaces, config.value, config.stringIndex, config.attributes, config.maxPowerRaw);

    const parts: Uint8Array[] = [Uint8Array.from(header), config.extra, ...subDescriptorBytes(config.descriptors)];
    for (const iface of config.interfaces) {
        parts.push(...subDescriptorBytes(iface.leading));
        parts.push(Uint8Array.from([
            iface.length, DescriptorType.Interface, iface.number, iface.alternateSetting, iface.numEndpoints,
            iface.classCode.base, iface.classCode.sub, iface.classCode.protocol, iface.stringIndex,
        ]), iface.extra);
        parts.push(...subDescriptorBytes(iface.descriptors));
        for (const endpoint of iface.endpoints) {
            const head: number[] = [endpoint.length, DescriptorType.Endpoint, endpoint.address, endpoint.attributes];
            writeU16(head, endpoint.wMaxPacketSize);
            head.push(endpoint.interval);
            parts.push(Uint8Array.from(head), endpoint.extra, ...subDescriptorBytes(endpoint.descriptors));
        }
    }
    parts.push(...subDescriptorBytes(config.trailing));
    return concatBytes(parts);
}

/**
 * Decode a string descriptor. Index 0 holds the supported LANGID list.
 */
export function decodeStringDescriptor(bytes: Uint8Array, index: number): DecodeResult<StringDescriptor> {
    const failure = checkHeader<StringDescriptor>(bytes, DescriptorType.String, 2);
    if (failure) {
        return failure;
    }
    const length = bytes[0];
    const warnings: Diagnostic[] = length % 2 !== 0
        ? [malformed(`string descriptor has odd length ${length}`, 0, DescriptorType.String)]
        : [];
    const units: number[] = [];
    for (let at = 2; at + 1 < length; at += 2) {
        units.push(readU16(bytes, at));
    }
    if (index === 0) {
        return decodeOk({ kind: 'languages', languageIds: units }, warnings);
    }
    return decodeOk({ kind: 'string', text: String.fromCharCode(...units) }, warnings);
}

export interface DescriptorBlob {
    device: DecodeResult<DeviceDescriptor>;
    configurations: DecodeResult<UsbConfiguration>[];
}

/**
 * Split a per-device blob laid out as the Linux `descriptors` file: the device
 * descriptor followed by each configuration's wTotalLength block.
 */
export function splitDescriptorBlob(bytes: Uint8Array): DescriptorBlob {
    const device = decodeDeviceDescriptor(bytes.subarray(0, Math.min(bytes.length, Math.max(bytes[0] ?? 0, DEVICE_DESCRIPTOR_LENGTH))));
    const configurations: DecodeResult<UsbConfiguration>[] = [];
    if (!device.ok) {
        return { device, configurations };
    }

    let offset = device.value.length;
    while (offset < bytes.length) {
        const remaining = bytes.length - offset;
        const declared = remaining >= 4 ? readU16(bytes, offset + 2) : remaining;
        const blockLength = Math.max(declared, Math.min(bytes[offset], remaining), 1);
        configurations.push(decodeConfiguration(bytes.slice(offset, offset + blockLength), { usbVersion: device.value.usbVersion }));
        offset += blockLength;
    }
    return { device, configurations };
}

/**
 * Decode a single descriptor of the expected type
 */
export function decodeDescriptor(bytes: Uint8Array, expected: ExpectedDescriptor): DecodeResult<AnyDescriptor> {
    switch (expected) {
        case 'device':
            return decodeDeviceDescriptor(bytes);
        case 'configuration':
            return decodeConfiguration(bytes);
        case 'interface':
            return decodeInterfaceDescriptor(bytes);
        case 'endpoint':
            return decodeEndpointDescriptor(bytes);
        case 'string':
            return decodeStringDescriptor(bytes, 1);
        case 'string-languages':
            return decodeStringDescriptor(bytes, 0);
        case 'bos':
            return decodeBos(bytes);
        case 'hub':
            return decodeHubDescriptor(bytes);
        case 'hid-report':
            return decodeHidReport(bytes);
    }
}
