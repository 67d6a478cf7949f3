/**
 * USB-IF class code table and vendor names
 *
 * Loaded once from data/usb-ids.json, validated, then frozen. Nothing
 * writes to these tables after module load.
 */

import { z } from 'zod';
import usbIds from './data/usb-ids.json';
import { formatHex16 } from './usb-bytes';

export interface ClassCode {
    base: number;
    sub: number;
    protocol: number;
}

export const HUB_CLASS = 0x09;
export const VENDOR_SPECIFIC_CLASS = 0xff;

const byteSchema = z.number().int().min(0).max(255);

const usbIdsSchema = z.object({
    classes: z.array(z.object({
        id: byteSchema,
        key: z.string().regex(/^[a-z0-9]+(-[a-z0-9]+)*$/),
        name: z.string(),
        subclasses: z.array(z.object({
            id: byteSchema,
            name: z.string(),
            protocols: z.array(z.object({ id: byteSchema, name: z.string() })).optional(),
        })),
    })),
    vendors: z.record(z.string().regex(/^[0-9a-f]{4}$/), z.string()),
});

interface SubclassEntry {
    name: string;
    protocols: ReadonlyMap<number, string>;
}

export interface ClassEntry {
    id: number;
    key: string;
    name: string;
    subclasses: ReadonlyMap<number, SubclassEntry>;
}

export interface ClassCodeNames {
    base: string;
    subclass: string;
    protocol: string;
}

const table = usbIdsSchema.parse(usbIds);

const CLASSES: ReadonlyMap<number, ClassEntry> = new Map(table.classes.map((entry): [number, ClassEntry] => [
    entry.id,
    Object.freeze({
        id: entry.id,
        key: entry.key,
        name: entry.name,
        subclasses: new Map(entry.subclasses.map((sub): [number, SubclassEntry] => [
            sub.id,
            Object.freeze({ name: sub.name, protocols: new Map((sub.protocols ?? []).map((p): [number, string] => [p.id, p.name])) }),
        ])),
    }),
]));

const CLASS_KEYS: ReadonlyMap<string, number> = new Map(table.classes.map((entry): [string, number] => [entry.key, entry.id]));

const VENDORS: Readonly<Record<string, string>> = Object.freeze({ ...table.vendors });

export function getClassEntry(base: number): ClassEntry | undefined {
    return CLASSES.get(base);
}

/**
 * Symbolic kebab-case name for a base class ("hid", "mass-storage")
 */
export function classKey(base: number): string | undefined {
    return CLASSES.get(base)?.key;
}

export function classFromKey(key: string): number | undefined {
    return CLASS_KEYS.get(key.toLowerCase());
}

export function classKeys(): string[] {
    return Array.from(CLASS_KEYS.keys());
}

function fallbackName(value: number, base: number): string {
    return value === VENDOR_SPECIFIC_CLASS || base === VENDOR_SPECIFIC_CLASS ? 'Vendor Specific' : 'Undefined';
}

/**
 * Resolve a class triplet to names. Never fails: unknown parts fall back to
 * "Vendor Specific" (0xff) or "Undefined".
 */
export function resolveClassCode(code: ClassCode): ClassCodeNames {
    const entry = CLASSES.get(code.base);
    const sub = entry?.subclasses.get(code.sub);
    return {
        base: entry?.name ?? fallbackName(code.base, code.base),
        subclass: sub?.name ?? fallbackName(code.sub, code.base),
        protocol: sub?.protocols.get(code.protocol) ?? fallbackName(code.protocol, code.base),
    };
}

/**
 * "09/00/02" style triplet
 */
export function formatClassCode(code: ClassCode): string {
    return [code.base, code.sub, code.protocol].map((v) => v.toString(16).padStart(2, '0')).join('/');
}

export function getVendorName(vendorId: number): string | undefined {
    return VENDORS[formatHex16(vendorId)];
}
