/**
 * HID report descriptor tokenizer
 *
 * Splits a report descriptor into items. Short items carry a 0, 1, 2 or 4 byte
 * little-endian payload; long items (prefix 0xfe) are kept with their raw data.
 * Usage pages and collections are not interpreted.
 */

import { readUnsigned } from './usb-bytes';
import { DescriptorType } from './usb-class-descriptors';
import { Diagnostic, DecodeResult, decodeOk, truncated } from './usb-errors';

export type HidItemType = 'main' | 'global' | 'local' | 'reserved' | 'long';

export interface HidReportItem {
    offset: number;
    type: HidItemType;
    tag: number;
    name: string;
    size: number;          // payload bytes
    value: number;         // unsigned little-endian payload (0 for long items)
    data: Uint8Array;
}

export interface HidReportDescriptor {
    kind: 'hid-report';
    interfaceNumber?: number;
    items: HidReportItem[];
    bytes: Uint8Array;
}

const ITEM_TYPES: HidItemType[] = ['main', 'global', 'local', 'reserved'];

const MAIN_TAGS: Record<number, string> = {
    0x8: 'Input',
    0x9: 'Output',
    0xa: 'Collection',
    0xb: 'Feature',
    0xc: 'End Collection',
};

const GLOBAL_TAGS: Record<number, string> = {
    0x0: 'Usage Page',
    0x1: 'Logical Minimum',
    0x2: 'Logical Maximum',
    0x3: 'Physical Minimum',
    0x4: 'Physical Maximum',
    0x5: 'Unit Exponent',
    0x6: 'Unit',
    0x7: 'Report Size',
    0x8: 'Report ID',
    0x9: 'Report Count',
    0xa: 'Push',
    0xb: 'Pop',
};

const LOCAL_TAGS: Record<number, string> = {
    0x0: 'Usage',
    0x1: 'Usage Minimum',
    0x2: 'Usage Maximum',
    0x3: 'Designator Index',
    0x4: 'Designator Minimum',
    0x5: 'Designator Maximum',
    0x7: 'String Index',
    0x8: 'String Minimum',
    0x9: 'String Maximum',
    0xa: 'Delimiter',
};

const TAG_NAMES: Record<HidItemType, Record<number, string>> = {
    main: MAIN_TAGS,
    global: GLOBAL_TAGS,
    local: LOCAL_TAGS,
    reserved: {},
    long: {},
};

function itemName(type: HidItemType, tag: number): string {
    return TAG_NAMES[type][tag] ?? 'Reserved';
}

/**
 * Tokenize a report descriptor. An item whose payload runs past the end stops
 * the walk with a truncation warning; items before it are kept.
 */
export function decodeHidReport(bytes: Uint8Array, interfaceNumber?: number): DecodeResult<HidReportDescriptor> {
    const items: HidReportItem[] = [];
    const warnings: Diagnostic[] = [];
    let isTruncated = false;
    let offset = 0;

    while (offset < bytes.length) {
        const prefix = bytes[offset];

        if (prefix === 0xfe) {
            if (offset + 3 > bytes.length) {
                warnings.push(truncated(DescriptorType.HidReport, offset, 3, bytes.length - offset));
                isTruncated = true;
                break;
            }
            const size = bytes[offset + 1];
            const end = offset + 3 + size;
            if (end > bytes.length) {
                warnings.push(truncated(DescriptorType.HidReport, offset, 3 + size, bytes.length - offset));
                isTruncated = true;
                break;
            }
            items.push({ offset, type: 'long', tag: bytes[offset + 2], name: 'Long Item', size, value: 0, data: bytes.slice(offset + 3, end) });
            offset = end;
            continue;
        }

        const sizeCode = prefix & 0x03;
        const size = sizeCode === 3 ? 4 : sizeCode;
        const type = ITEM_TYPES[(prefix >> 2) & 0x03];
        const tag = (prefix >> 4) & 0x0f;
        const end = offset + 1 + size;
        if (end > bytes.length) {
            warnings.push(truncated(DescriptorType.HidReport, offset, 1 + size, bytes.length - offset));
            isTruncated = true;
            break;
        }
        items.push({
            offset,
            type,
            tag,
            name: itemName(type, tag),
            size,
            value: size > 0 ? readUnsigned(bytes, offset + 1, size) : 0,
            data: bytes.slice(offset + 1, end),
        });
        offset = end;
    }

    const descriptor: HidReportDescriptor = { kind: 'hid-report', items, bytes: bytes.slice() };
    if (interfaceNumber !== undefined) {
        descriptor.interfaceNumber = interfaceNumber;
    }
    return decodeOk(descriptor, warnings, isTruncated);
}
