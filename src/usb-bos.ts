/**
 * Binary Object Store (BOS) descriptor and its device capabilities
 */

import { formatUuid, readU16, readU32 } from './usb-bytes';
import { DescriptorType } from './usb-class-descriptors';
import { Diagnostic, DecodeResult, decodeFailure, decodeOk, malformed, truncated } from './usb-errors';

export const WEBUSB_PLATFORM_UUID = '3408b638-09a9-47a0-8bfd-a0768815b665';
export const MS_OS_20_PLATFORM_UUID = 'd8dd60df-4589-4cc7-9cd2-659d9e648a9f';

const CAPABILITY_NAMES: Record<number, string> = {
    0x01: 'Wireless USB',
    0x02: 'USB 2.0 Extension',
    0x03: 'SuperSpeed USB',
    0x04: 'Container ID',
    0x05: 'Platform',
    0x06: 'Power Delivery',
    0x07: 'Battery Info',
    0x08: 'PD Consumer Port',
    0x09: 'PD Provider Port',
    0x0a: 'SuperSpeedPlus',
    0x0b: 'Precision Time Measurement',
    0x0c: 'Wireless USB Ext',
    0x0d: 'Billboard',
    0x0e: 'Authentication',
    0x0f: 'Billboard Ex',
    0x10: 'Configuration Summary',
};

export interface Usb2ExtensionCapability {
    kind: 'usb2-extension';
    attributes: number;
    lpm: boolean;
    besl: boolean;
    baselineBesl?: number;
    deepBesl?: number;
    bytes: Uint8Array;
}

export interface SuperSpeedCapability {
    kind: 'superspeed';
    attributes: number;
    ltm: boolean;
    speedsSupported: number;
    speeds: string[];
    functionalitySupport: number;
    u1ExitLatency: number;
    u2ExitLatency: number;
    bytes: Uint8Array;
}

export interface ContainerIdCapability {
    kind: 'container-id';
    containerId: string;
    bytes: Uint8Array;
}

export interface WebUsbPlatform {
    version: number;
    vendorCode: number;
    landingPageIndex: number;
}

export interface PlatformCapability {
    kind: 'platform';
    uuid: string;
    platformName?: 'WebUSB' | 'Microsoft OS 2.0';
    webUsb?: WebUsbPlatform;
    data: Uint8Array;
    bytes: Uint8Array;
}

export interface SuperSpeedPlusCapability {
    kind: 'superspeed-plus';
    attributes: number;
    sublinkSpeedAttributeCount: number;
    sublinkSpeedIdCount: number;
    functionalitySupport: number;
    sublinkSpeedAttributes: number[];
    bytes: Uint8Array;
}

export interface GenericCapability {
    kind: 'generic';
    capabilityType: number;
    name: string;
    bytes: Uint8Array;
}

export type BosCapability =
    | Usb2ExtensionCapability
    | SuperSpeedCapability
    | ContainerIdCapability
    | PlatformCapability
    | SuperSpeedPlusCapability
    | GenericCapability;

export interface BosDescriptor {
    kind: 'bos';
    totalLength: number;
    numCapabilities: number;
    capabilities: BosCapability[];
    bytes: Uint8Array;
}

const SPEED_BITS: Array<[number, string]> = [
    [0x01, 'low'],
    [0x02, 'full'],
    [0x04, 'high'],
    [0x08, 'super'],
];

function generic(bytes: Uint8Array): GenericCapability {
    const capabilityType = bytes[2];
    return { kind: 'generic', capabilityType, name: capabilityName(capabilityType), bytes };
}

function decodeCapability(bytes: Uint8Array, offset: number, warnings: Diagnostic[]): BosCapability {
    const minimum = (length: number): boolean => {
        if (bytes.length < length) {
            warnings.push(truncated(DescriptorType.DeviceCapability, offset, length, bytes.length));
            return false;
        }
        return true;
    };

    switch (bytes[2]) {
        case 0x02: {
            if (!minimum(7)) {
                return generic(bytes);
            }
            const attributes = readU32(bytes, 3);
            const capability: Usb2ExtensionCapability = {
                kind: 'usb2-extension',
                attributes,
                lpm: (attributes & 0x02) !== 0,
                besl: (attributes & 0x04) !== 0,
                bytes,
            };
            if (attributes & 0x08) {
                capability.baselineBesl = (attributes >> 8) & 0x0f;
            }
            if (attributes & 0x10) {
                capability.deepBesl = (attributes >> 12) & 0x0f;
            }
            return capability;
        }
        case 0x03: {
            if (!minimum(10)) {
                return generic(bytes);
            }
            const speedsSupported = readU16(bytes, 4);
            return {
                kind: 'superspeed',
                attributes: bytes[3],
                ltm: (bytes[3] & 0x02) !== 0,
                speedsSupported,
                speeds: SPEED_BITS.filter(([bit]) => (speedsSupported & bit) !== 0).map(([, name]) => name),
                functionalitySupport: bytes[6],
                u1ExitLatency: bytes[7],
                u2ExitLatency: readU16(bytes, 8),
                bytes,
            };
        }
        case 0x04:
            if (!minimum(20)) {
                return generic(bytes);
            }
            return { kind: 'container-id', containerId: formatUuid(bytes, 4), bytes };
        case 0x05: {
            if (!minimum(20)) {
                return generic(bytes);
            }
            const uuid = formatUuid(bytes, 4);
            const capability: PlatformCapability = { kind: 'platform', uuid, data: bytes.slice(20), bytes };
            if (uuid === WEBUSB_PLATFORM_UUID) {
                capability.platformName = 'WebUSB';
                if (bytes.length >= 24) {
                    capability.webUsb = { version: readU16(bytes, 20), vendorCode: bytes[22], landingPageIndex: bytes[23] };
                }
            } else if (uuid === MS_OS_20_PLATFORM_UUID) {
                capability.platformName = 'Microsoft OS 2.0';
            }
            return capability;
        }
        case 0x0a: {
            if (!minimum(12)) {
                return generic(bytes);
            }
            const attributes = readU32(bytes, 4);
            const attributeCount = (attributes & 0x1f) + 1;
            if (!minimum(12 + attributeCount * 4)) {
                return generic(bytes);
            }
            const sublinkSpeedAttributes: number[] = [];
            for (let i = 0; i < attributeCount; i++) {
                sublinkSpeedAttributes.push(readU32(bytes, 12 + i * 4));
            }
            return {
                kind: 'superspeed-plus',
                attributes,
                sublinkSpeedAttributeCount: attributeCount,
                sublinkSpeedIdCount: ((attributes >> 5) & 0x0f) + 1,
                functionalitySupport: readU16(bytes, 8),
                sublinkSpeedAttributes,
                bytes,
            };
        }
        default:
            return generic(bytes);
    }
}

/**
 * Decode a BOS descriptor and walk its device capabilities
 */
export function decodeBos(bytes: Uint8Array): DecodeResult<BosDescriptor> {
    if (bytes.length < 5) {
        return decodeFailure(truncated(DescriptorType.Bos, 0, 5, bytes.length));
    }
    if (bytes[1] !== DescriptorType.Bos) {
        return decodeFailure(malformed(`expected BOS descriptor, got type 0x${bytes[1].toString(16)}`, 0, bytes[1]));
    }
    if (bytes[0] < 5) {
        return decodeFailure(truncated(DescriptorType.Bos, 0, 5, bytes[0]));
    }

    const totalLength = readU16(bytes, 2);
    const numCapabilities = bytes[4];
    const warnings: Diagnostic[] = [];
    if (totalLength < bytes[0]) {
        warnings.push(malformed(`wTotalLength ${totalLength} is shorter than the BOS header`, 2, DescriptorType.Bos));
    }
    const limit = Math.min(Math.max(totalLength, bytes[0]), bytes.length);
    const capabilities: BosCapability[] = [];
    let isTruncated = totalLength > bytes.length;
    let offset = bytes[0];

    while (offset < limit) {
        const length = bytes[offset];
        if (limit - offset < 3 || length < 3) {
            warnings.push(malformed(`capability at offset ${offset} has invalid length ${length}`, offset, DescriptorType.DeviceCapability));
            isTruncated = true;
            break;
        }
        if (offset + length > limit) {
            warnings.push(truncated(DescriptorType.DeviceCapability, offset, length, limit - offset));
            isTruncated = true;
            break;
        }
        if (bytes[offset + 1] !== DescriptorType.DeviceCapability) {
            warnings.push(malformed(`unexpected descriptor type 0x${bytes[offset + 1].toString(16)} in BOS`, offset, bytes[offset + 1]));
            isTruncated = true;
            break;
        }
        capabilities.push(decodeCapability(bytes.slice(offset, offset + length), offset, warnings));
        offset += length;
    }

    if (!isTruncated && capabilities.length !== numCapabilities) {
        warnings.push(malformed(`BOS declares ${numCapabilities} capabilities, found ${capabilities.length}`, 0, DescriptorType.Bos));
    }
    if (totalLength > bytes.length && warnings.length === 0) {
        warnings.push(truncated(DescriptorType.Bos, 0, totalLength, bytes.length));
    }

    return decodeOk({ kind: 'bos', totalLength, numCapabilities, capabilities, bytes: bytes.slice(0, limit) }, warnings, isTruncated);
}

export function capabilityName(capabilityType: number): string {
    return CAPABILITY_NAMES[capabilityType] ?? 'Unknown';
}
