/**
 * Class-specific and auxiliary descriptors found inside a configuration
 *
 * Decoding is dispatched on the descriptor type and the class of the enclosing
 * interface. Every variant keeps its original bytes so a configuration can be
 * re-encoded exactly; anything not recognised becomes the `opaque` variant.
 */

import { ClassCode } from './usb-class-codes';
import { readU16, readU32, readUnsigned } from './usb-bytes';
import { Diagnostic, DecodeResult, decodeFailure, decodeOk, malformed, truncated } from './usb-errors';

export const DescriptorType = {
    Device: 0x01,
    Configuration: 0x02,
    String: 0x03,
    Interface: 0x04,
    Endpoint: 0x05,
    InterfaceAssociation: 0x0b,
    Bos: 0x0f,
    DeviceCapability: 0x10,
    Hid: 0x21,
    HidReport: 0x22,
    ClassInterface: 0x24,
    ClassEndpoint: 0x25,
    Hub: 0x29,
    SuperSpeedHub: 0x2a,
    SsEndpointCompanion: 0x30,
} as const;

export interface InterfaceAssociationDescriptor {
    kind: 'interface-association';
    firstInterface: number;
    interfaceCount: number;
    classCode: ClassCode;
    functionIndex: number;
    bytes: Uint8Array;
}

export interface SsEndpointCompanionDescriptor {
    kind: 'ss-endpoint-companion';
    maxBurst: number;
    attributes: number;
    bytesPerInterval: number;
    bytes: Uint8Array;
}

export interface HidDescriptor {
    kind: 'hid';
    hidVersion: number;
    countryCode: number;
    reports: Array<{ descriptorType: number; length: number }>;
    bytes: Uint8Array;
}

export type AudioDetail =
    | { kind: 'header'; adcVersion: number; totalLength: number; interfaces: number[] }
    | { kind: 'input-terminal'; terminalId: number; terminalType: number; associatedTerminal: number; channels: number; channelConfig: number; channelNamesIndex: number; terminalIndex: number }
    | { kind: 'output-terminal'; terminalId: number; terminalType: number; associatedTerminal: number; sourceId: number; terminalIndex: number }
    | { kind: 'feature-unit'; unitId: number; sourceId: number; controlSize: number; controls: number[]; featureIndex: number }
    | { kind: 'as-general'; terminalLink: number; delay: number; formatTag: number };

export interface AudioDescriptor {
    kind: 'audio';
    subtype: number;
    subtypeName: string;
    detail?: AudioDetail;
    bytes: Uint8Array;
}

export interface VideoDescriptor {
    kind: 'video';
    subtype: number;
    subtypeName: string;
    detail?: { kind: 'header'; uvcVersion: number; totalLength: number; clockFrequency: number; interfaces: number[] };
    bytes: Uint8Array;
}

export type CdcDetail =
    | { kind: 'header'; cdcVersion: number }
    | { kind: 'call-management'; capabilities: number; dataInterface: number }
    | { kind: 'acm'; capabilities: number }
    | { kind: 'union'; controlInterface: number; subordinateInterfaces: number[] };

export interface CdcDescriptor {
    kind: 'cdc';
    subtype: number;
    subtypeName: string;
    detail?: CdcDetail;
    bytes: Uint8Array;
}

export interface OpaqueDescriptor {
    kind: 'opaque';
    descriptorType: number;
    bytes: Uint8Array;
}

export type SubDescriptor =
    | InterfaceAssociationDescriptor
    | SsEndpointCompanionDescriptor
    | HidDescriptor
    | AudioDescriptor
    | VideoDescriptor
    | CdcDescriptor
    | OpaqueDescriptor;

export interface SubDescriptorContext {
    interfaceClass?: ClassCode;   // class of the enclosing interface, if any
    offset: number;               // offset within the configuration, for diagnostics
}

const AUDIO_CONTROL_SUBTYPES: Record<number, string> = {
    0x01: 'Header',
    0x02: 'Input Terminal',
    0x03: 'Output Terminal',
    0x04: 'Mixer Unit',
    0x05: 'Selector Unit',
    0x06: 'Feature Unit',
    0x07: 'Processing Unit',
    0x08: 'Extension Unit',
    0x0a: 'Clock Source',
    0x0b: 'Clock Selector',
    0x0c: 'Clock Multiplier',
    0x0d: 'Sample Rate Converter',
};

const AUDIO_STREAMING_SUBTYPES: Record<number, string> = {
    0x01: 'AS General',
    0x02: 'Format Type',
    0x03: 'Format Specific',
};

const MIDI_STREAMING_SUBTYPES: Record<number, string> = {
    0x01: 'MS Header',
    0x02: 'MIDI IN Jack',
    0x03: 'MIDI OUT Jack',
    0x04: 'Element',
};

const VIDEO_CONTROL_SUBTYPES: Record<number, string> = {
    0x01: 'Header',
    0x02: 'Input Terminal',
    0x03: 'Output Terminal',
    0x04: 'Selector Unit',
    0x05: 'Processing Unit',
    0x06: 'Extension Unit',
    0x07: 'Encoding Unit',
};

const VIDEO_STREAMING_SUBTYPES: Record<number, string> = {
    0x01: 'Input Header',
    0x02: 'Output Header',
    0x03: 'Still Image Frame',
    0x04: 'Format Uncompressed',
    0x05: 'Frame Uncompressed',
    0x06: 'Format MJPEG',
    0x07: 'Frame MJPEG',
    0x0d: 'Color Format',
    0x10: 'Format Frame Based',
    0x11: 'Frame Frame Based',
};

const CDC_SUBTYPES: Record<number, string> = {
    0x00: 'Header',
    0x01: 'Call Management',
    0x02: 'Abstract Control Management',
    0x03: 'Direct Line Management',
    0x04: 'Telephone Ringer',
    0x05: 'Telephone Call',
    0x06: 'Union',
    0x07: 'Country Selection',
    0x08: 'Telephone Operational Modes',
    0x09: 'USB Terminal',
    0x0a: 'Network Channel Terminal',
    0x0b: 'Protocol Unit',
    0x0c: 'Extension Unit',
    0x0d: 'Multi-Channel Management',
    0x0e: 'CAPI Control Management',
    0x0f: 'Ethernet Networking',
    0x10: 'ATM Networking',
    0x11: 'Wireless Handset Control',
    0x12: 'Mobile Direct Line Model',
    0x13: 'MDLM Detail',
    0x14: 'Device Management Model',
    0x15: 'OBEX',
    0x16: 'Command Set',
    0x17: 'Command Set Detail',
    0x18: 'Telephone Control Model',
    0x19: 'OBEX Service Identifier',
    0x1a: 'NCM',
    0x1b: 'MBIM',
    0x1c: 'MBIM Extended',
};

const AUDIO_CLASS = 0x01;
const CDC_CLASS = 0x02;
const HID_CLASS = 0x03;
const VIDEO_CLASS = 0x0e;

export interface SubDescriptorResult {
    descriptor: SubDescriptor;
    warnings: Diagnostic[];
}

function opaque(bytes: Uint8Array): OpaqueDescriptor {
    return { kind: 'opaque', descriptorType: bytes[1], bytes };
}

/**
 * A too-short descriptor is kept as opaque bytes with a TruncatedDescriptor warning
 */
function tooShort(bytes: Uint8Array, minLength: number, offset: number): SubDescriptorResult {
    return { descriptor: opaque(bytes), warnings: [truncated(bytes[1], offset, minLength, bytes.length)] };
}

function subtypeName(names: Record<number, string>, subtype: number): string {
    return names[subtype] ?? `Unknown (0x${subtype.toString(16).padStart(2, '0')})`;
}

function decodeInterfaceAssociation(bytes: Uint8Array, offset: number): SubDescriptorResult {
    if (bytes.length < 8) {
        return tooShort(bytes, 8, offset);
    }
    return {
        descriptor: {
            kind: 'interface-association',
            firstInterface: bytes[2],
            interfaceCount: bytes[3],
            classCode: { base: bytes[4], sub: bytes[5], protocol: bytes[6] },
            functionIndex: bytes[7],
            bytes,
        },
        warnings: [],
    };
}

function decodeSsEndpointCompanion(bytes: Uint8Array, offset: number): SubDescriptorResult {
    if (bytes.length < 6) {
        return tooShort(bytes, 6, offset);
    }
    return {
        descriptor: {
            kind: 'ss-endpoint-companion',
            maxBurst: bytes[2],
            attributes: bytes[3],
            bytesPerInterval: readU16(bytes, 4),
            bytes,
        },
        warnings: [],
    };
}

function decodeHid(bytes: Uint8Array, offset: number): SubDescriptorResult {
    if (bytes.length < 6) {
        return tooShort(bytes, 6, offset);
    }
    const count = bytes[5];
    const needed = 6 + count * 3;
    if (bytes.length < needed) {
        return tooShort(bytes, needed, offset);
    }
    const reports: HidDescriptor['reports'] = [];
    for (let i = 0; i < count; i++) {
        const at = 6 + i * 3;
        reports.push({ descriptorType: bytes[at], length: readU16(bytes, at + 1) });
    }
    return {
        descriptor: { kind: 'hid', hidVersion: readU16(bytes, 2), countryCode: bytes[4], reports, bytes },
        warnings: [],
    };
}

function decodeAudioControl(bytes: Uint8Array, offset: number, subtype: number, uac1: boolean): SubDescriptorResult {
    const base = { kind: 'audio' as const, subtype, subtypeName: subtypeName(AUDIO_CONTROL_SUBTYPES, subtype), bytes };
    if (!uac1) {
        return { descriptor: base, warnings: [] };
    }
    switch (subtype) {
        case 0x01: {
            const count = bytes.length >= 8 ? bytes[7] : 0;
            if (bytes.length < 8 + count) {
                return tooShort(bytes, 8 + count, offset);
            }
            return {
                descriptor: {
                    ...base,
                    detail: { kind: 'header', adcVersion: readU16(bytes, 3), totalLength: readU16(bytes, 5), interfaces: Array.from(bytes.subarray(8, 8 + count)) },
                },
                warnings: [],
            };
        }
        case 0x02:
            if (bytes.length < 12) {
                return tooShort(bytes, 12, offset);
            }
            return {
                descriptor: {
                    ...base,
                    detail: {
                        kind: 'input-terminal',
                        terminalId: bytes[3],
                        terminalType: readU16(bytes, 4),
                        associatedTerminal: bytes[6],
                        channels: bytes[7],
                        channelConfig: readU16(bytes, 8),
                        channelNamesIndex: bytes[10],
                        terminalIndex: bytes[11],
                    },
                },
                warnings: [],
            };
        case 0x03:
            if (bytes.length < 9) {
                return tooShort(bytes, 9, offset);
            }
            return {
                descriptor: {
                    ...base,
                    detail: {
                        kind: 'output-terminal',
                        terminalId: bytes[3],
                        terminalType: readU16(bytes, 4),
                        associatedTerminal: bytes[6],
                        sourceId: bytes[7],
                        terminalIndex: bytes[8],
                    },
                },
                warnings: [],
            };
        case 0x06: {
            if (bytes.length < 7) {
                return tooShort(bytes, 7, offset);
            }
            const controlSize = bytes[5];
            const controls: number[] = [];
            if (controlSize > 0) {
                // bmaControls runs from byte 6 up to the trailing iFeature byte
                for (let at = 6; at + controlSize <= bytes.length - 1; at += controlSize) {
                    controls.push(readUnsigned(bytes, at, Math.min(controlSize, 4)));
                }
            }
            return {
                descriptor: {
                    ...base,
                    detail: { kind: 'feature-unit', unitId: bytes[3], sourceId: bytes[4], controlSize, controls, featureIndex: bytes[bytes.length - 1] },
                },
                warnings: [],
            };
        }
        default:
            return { descriptor: base, warnings: [] };
    }
}

function decodeAudio(bytes: Uint8Array, offset: number, interfaceClass: ClassCode): SubDescriptorResult {
    if (bytes.length < 3) {
        return tooShort(bytes, 3, offset);
    }
    const subtype = bytes[2];
    const uac1 = interfaceClass.protocol === 0x00;
    switch (interfaceClass.sub) {
        case 0x01:
            return decodeAudioControl(bytes, offset, subtype, uac1);
        case 0x02: {
            const base = { kind: 'audio' as const, subtype, subtypeName: subtypeName(AUDIO_STREAMING_SUBTYPES, subtype), bytes };
            if (!uac1 || subtype !== 0x01) {
                return { descriptor: base, warnings: [] };
            }
            if (bytes.length < 7) {
                return tooShort(bytes, 7, offset);
            }
            return {
                descriptor: { ...base, detail: { kind: 'as-general', terminalLink: bytes[3], delay: bytes[4], formatTag: readU16(bytes, 5) } },
                warnings: [],
            };
        }
        case 0x03:
            return { descriptor: { kind: 'audio', subtype, subtypeName: subtypeName(MIDI_STREAMING_SUBTYPES, subtype), bytes }, warnings: [] };
        default:
            return { descriptor: opaque(bytes), warnings: [] };
    }
}

function decodeVideo(bytes: Uint8Array, offset: number, interfaceClass: ClassCode): SubDescriptorResult {
    if (bytes.length < 3) {
        return tooShort(bytes, 3, offset);
    }
    const subtype = bytes[2];
    if (interfaceClass.sub === 0x02) {
        return { descriptor: { kind: 'video', subtype, subtypeName: subtypeName(VIDEO_STREAMING_SUBTYPES, subtype), bytes }, warnings: [] };
    }
    if (interfaceClass.sub !== 0x01) {
        return { descriptor: opaque(bytes), warnings: [] };
    }
    const base = { kind: 'video' as const, subtype, subtypeName: subtypeName(VIDEO_CONTROL_SUBTYPES, subtype), bytes };
    if (subtype !== 0x01) {
        return { descriptor: base, warnings: [] };
    }
    const count = bytes.length >= 12 ? bytes[11] : 0;
    if (bytes.length < 12 + count) {
        return tooShort(bytes, 12 + count, offset);
    }
    return {
        descriptor: {
            ...base,
            detail: {
                kind: 'header',
                uvcVersion: readU16(bytes, 3),
                totalLength: readU16(bytes, 5),
                clockFrequency: readU32(bytes, 7),
                interfaces: Array.from(bytes.subarray(12, 12 + count)),
            },
        },
        warnings: [],
    };
}

function decodeCdc(bytes: Uint8Array, offset: number): SubDescriptorResult {
    if (bytes.length < 3) {
        return tooShort(bytes, 3, offset);
    }
    const subtype = bytes[2];
    const base = { kind: 'cdc' as const, subtype, subtypeName: subtypeName(CDC_SUBTYPES, subtype), bytes };
    let detail: CdcDetail | undefined;
    switch (subtype) {
        case 0x00:
            if (bytes.length < 5) {
                return tooShort(bytes, 5, offset);
            }
            detail = { kind: 'header', cdcVersion: readU16(bytes, 3) };
            break;
        case 0x01:
            if (bytes.length < 5) {
                return tooShort(bytes, 5, offset);
            }
            detail = { kind: 'call-management', capabilities: bytes[3], dataInterface: bytes[4] };
            break;
        case 0x02:
            if (bytes.length < 4) {
                return tooShort(bytes, 4, offset);
            }
            detail = { kind: 'acm', capabilities: bytes[3] };
            break;
        case 0x06:
            if (bytes.length < 5) {
                return tooShort(bytes, 5, offset);
            }
            detail = { kind: 'union', controlInterface: bytes[3], subordinateInterfaces: Array.from(bytes.subarray(4)) };
            break;
    }
    return { descriptor: detail ? { ...base, detail } : base, warnings: [] };
}

/**
 * Decode one descriptor found inside a configuration that is not an interface
 * or endpoint header. The caller guarantees bytes.length === bLength >= 2.
 */
export function decodeSubDescriptor(bytes: Uint8Array, context: SubDescriptorContext): SubDescriptorResult {
    const type = bytes[1];
    const { interfaceClass, offset } = context;

    switch (type) {
        case DescriptorType.InterfaceAssociation:
            return decodeInterfaceAssociation(bytes, offset);
        case DescriptorType.SsEndpointCompanion:
            return decodeSsEndpointCompanion(bytes, offset);
        case DescriptorType.Hid:
            if (interfaceClass?.base === HID_CLASS) {
                return decodeHid(bytes, offset);
            }
            break;
        case DescriptorType.ClassInterface:
            if (interfaceClass?.base === AUDIO_CLASS) {
                return decodeAudio(bytes, offset, interfaceClass);
            }
            if (interfaceClass?.base === VIDEO_CLASS) {
                return decodeVideo(bytes, offset, interfaceClass);
            }
            if (interfaceClass?.base === CDC_CLASS) {
                return decodeCdc(bytes, offset);
            }
            break;
    }
    return { descriptor: opaque(bytes), warnings: [] };
}

export type PowerSwitching = 'ganged' | 'per-port' | 'none';
export type OverCurrentProtection = 'ganged' | 'per-port' | 'none';

export interface HubDescriptor {
    kind: 'hub';
    superSpeed: boolean;
    numPorts: number;
    characteristics: number;
    powerSwitching: PowerSwitching;
    compound: boolean;
    overCurrent: OverCurrentProtection;
    ttThinkTime?: number;          // full-speed bit times, USB 2 hubs only
    portIndicators?: boolean;      // USB 2 hubs only
    powerOnToPowerGoodMs: number;
    controllerCurrentMa: number;
    headerDecodeLatency?: number;  // SuperSpeed hubs only
    hubDelayNs?: number;           // SuperSpeed hubs only
    portRemovable: boolean[];      // index 0 is port 1
    bytes: Uint8Array;
}

/**
 * Decode a hub class descriptor (0x29 USB 2, 0x2a SuperSpeed)
 */
export function decodeHubDescriptor(bytes: Uint8Array): DecodeResult<HubDescriptor> {
    if (bytes.length < 2) {
        return decodeFailure(truncated(DescriptorType.Hub, 0, 7, bytes.length));
    }
    const type = bytes[1];
    if (type !== DescriptorType.Hub && type !== DescriptorType.SuperSpeedHub) {
        return decodeFailure(malformed(`expected hub descriptor, got type 0x${type.toString(16)}`, 0, type));
    }
    const superSpeed = type === DescriptorType.SuperSpeedHub;
    const length = Math.min(bytes[0], bytes.length);
    const numPorts = length >= 3 ? bytes[2] : 0;
    const removableBytes = superSpeed ? 2 : Math.ceil((numPorts + 1) / 8);
    const minLength = superSpeed ? 12 : 7 + removableBytes;
    if (length < minLength) {
        return decodeFailure(truncated(type, 0, minLength, length));
    }

    const characteristics = readU16(bytes, 3);
    const switching = characteristics & 0x03;
    const overCurrent = (characteristics >> 3) & 0x03;
    const removableAt = superSpeed ? 10 : 7;
    const portRemovable: boolean[] = [];
    for (let port = 1; port <= numPorts; port++) {
        const byte = bytes[removableAt + (port >> 3)];
        // a set bit marks the device on that port as non-removable
        portRemovable.push(((byte >> (port & 7)) & 1) === 0);
    }

    const descriptor: HubDescriptor = {
        kind: 'hub',
        superSpeed,
        numPorts,
        characteristics,
        powerSwitching: switching === 0 ? 'ganged' : switching === 1 ? 'per-port' : 'none',
        compound: (characteristics & 0x04) !== 0,
        overCurrent: overCurrent === 0 ? 'ganged' : overCurrent === 1 ? 'per-port' : 'none',
        powerOnToPowerGoodMs: bytes[5] * 2,
        controllerCurrentMa: superSpeed ? bytes[6] * 4 : bytes[6],
        portRemovable,
        bytes: bytes.slice(0, length),
    };
    if (superSpeed) {
        descriptor.headerDecodeLatency = bytes[7];
        descriptor.hubDelayNs = readU16(bytes, 8);
    } else {
        descriptor.ttThinkTime = (((characteristics >> 5) & 0x03) + 1) * 8;
        descriptor.portIndicators = (characteristics & 0x80) !== 0;
    }
    return decodeOk(descriptor);
}
