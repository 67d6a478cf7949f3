/**
 * Little-endian field access and formatting helpers shared by the descriptor decoders
 */

export function readU16(bytes: Uint8Array, offset: number): number {
    return bytes[offset] | (bytes[offset + 1] << 8);
}

export function readU32(bytes: Uint8Array, offset: number): number {
    return (bytes[offset] | (bytes[offset + 1] << 8) | (bytes[offset + 2] << 16) | (bytes[offset + 3] << 24)) >>> 0;
}

/**
 * Read an unsigned little-endian value of 1 to 4 bytes
 */
export function readUnsigned(bytes: Uint8Array, offset: number, size: number): number {
    let value = 0;
    for (let i = size - 1; i >= 0; i--) {
        value = value * 256 + bytes[offset + i];
    }
    return value;
}

export function writeU16(target: number[], value: number): void {
    target.push(value & 0xff, (value >> 8) & 0xff);
}

export function concatBytes(parts: Uint8Array[]): Uint8Array {
    const total = parts.reduce((sum, part) => sum + part.length, 0);
    const result = new Uint8Array(total);
    let offset = 0;
    for (const part of parts) {
        result.set(part, offset);
        offset += part.length;
    }
    return result;
}

export function toHex(bytes: Uint8Array): string {
    return Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join('');
}

/**
 * Parse a hex string (even length, no separators); returns undefined on bad input
 */
export function fromHex(hex: string): Uint8Array | undefined {
    if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
        return undefined;
    }
    const bytes = new Uint8Array(hex.length / 2);
    for (let i = 0; i < bytes.length; i++) {
        bytes[i] = parseInt(hex.substring(i * 2, i * 2 + 2), 16);
    }
    return bytes;
}

/**
 * Format a BCD version field as M.mm (0x0210 -> "2.10")
 */
export function formatBcdVersion(bcd: number): string {
    const major = (bcd >> 8) & 0xff;
    const minor = bcd & 0xff;
    return `${major.toString(16)}.${minor.toString(16).padStart(2, '0')}`;
}

/**
 * Parse "2.10" or "1.0" back into a BCD version field
 */
export function parseBcdVersion(text: string): number | undefined {
    const match = /^\s*([0-9]{1,2})\.([0-9]{1,2})\s*$/.exec(text);
    if (!match) {
        return undefined;
    }
    const major = parseInt(match[1], 16);
    const minor = parseInt(match[2].padEnd(2, '0'), 16);
    return (major << 8) | minor;
}

export function formatHex16(value: number): string {
    return value.toString(16).padStart(4, '0');
}

/**
 * Format a 16-byte little-endian GUID as 8-4-4-4-12
 */
export function formatUuid(bytes: Uint8Array, offset: number): string {
    const hex = (start: number, end: number) => toHex(bytes.subarray(offset + start, offset + end));
    const data1 = readU32(bytes, offset).toString(16).padStart(8, '0');
    const data2 = readU16(bytes, offset + 4).toString(16).padStart(4, '0');
    const data3 = readU16(bytes, offset + 6).toString(16).padStart(4, '0');
    return `${data1}-${data2}-${data3}-${hex(8, 10)}-${hex(10, 16)}`;
}
