/**
 * Canonical tree <-> plain JSON
 *
 * Unknown fields are omitted, never null. Descriptor data travels as raw
 * lowercase hex next to its decoded view, and deserializing re-decodes the
 * raw bytes, so serialize(deserialize(serialize(tree))) equals serialize(tree).
 */

import { z } from 'zod';
import { decodeBos } from './usb-bos';
import { fromHex, toHex } from './usb-bytes';
import { decodeHubDescriptor } from './usb-class-descriptors';
import {
    BACKEND_IDS,
    ClassCode,
    FieldSources,
    MERGE_FIELDS,
    UsbBus,
    UsbDevice,
    UsbTree,
} from './usb-common';
import { UsbConfiguration, UsbEndpoint, UsbInterface, decodeConfiguration, encodeConfiguration } from './usb-descriptors';
import { ProfilerError } from './usb-errors';
import { decodeHidReport } from './usb-hid-report';
import { indexTree } from './usb-topology';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export interface SerializedEndpoint {
    address: number;
    number: number;
    direction: string;
    transferType: string;
    syncType?: string;
    usageType?: string;
    maxPacketSize: number;
    transactionsPerMicroframe: number;
    interval: number;
    descriptors?: JsonObject[];
}

export interface SerializedInterface {
    number: number;
    alternateSetting: number;
    classCode: ClassCode;
    name?: string;
    leading?: JsonObject[];
    descriptors?: JsonObject[];
    endpoints: SerializedEndpoint[];
}

export interface SerializedConfiguration {
    value: number;
    attributes: number;
    selfPowered: boolean;
    remoteWakeup: boolean;
    maxPowerMa: number;
    name?: string;
    descriptors?: JsonObject[];
    interfaces: SerializedInterface[];
    raw: string;
}

export interface SerializedDevice {
    bus: number;
    portPath?: number[];
    address?: number;
    vendorId?: number;
    productId?: number;
    classCode?: ClassCode;
    usbVersion?: number;
    deviceVersion?: number;
    maxPacketSize0?: number;
    manufacturer?: string;
    product?: string;
    serial?: string;
    name: string;
    speed?: string;
    driver?: string;
    sysPath?: string;
    configurations: SerializedConfiguration[];
    activeConfiguration?: number;
    bos?: JsonObject;
    hub?: JsonObject;
    hidReports?: JsonObject[];
    descriptorTruncated?: boolean;
    knownAbsent?: string[];
    provenance: Array<{ backend: string; completeness: string }>;
    fieldSources?: Record<string, string>;
    provisional?: boolean;
    detached?: boolean;
    branchPosition?: number;
    children: SerializedDevice[];
}

export interface SerializedBus {
    id: number;
    name?: string;
    hostController?: { vendorId: number; deviceId: number };
    hostControllerDriver?: string;
    rootHub?: SerializedDevice;
    devices: SerializedDevice[];
}

export interface SerializedTree {
    buses: SerializedBus[];
}

function toJsonValue(value: unknown): JsonValue {
    if (value instanceof Uint8Array) {
        return toHex(value);
    }
    if (Array.isArray(value)) {
        return value.map(toJsonValue);
    }
    if (value !== null && typeof value === 'object') {
        return toJsonObject(value);
    }
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return value;
    }
    return null;
}

/**
 * Decoded view of a descriptor: byte arrays become hex, undefined fields vanish
 */
function toJsonObject(value: object): JsonObject {
    const result: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
        if (entry !== undefined) {
            result[key] = toJsonValue(entry);
        }
    }
    return result;
}

function views(descriptors: object[]): JsonObject[] | undefined {
    return descriptors.length > 0 ? descriptors.map(toJsonObject) : undefined;
}

function serializeEndpoint(endpoint: UsbEndpoint): SerializedEndpoint {
    const descriptors = views(endpoint.descriptors);
    return {
        address: endpoint.address,
        number: endpoint.number,
        direction: endpoint.direction,
        transferType: endpoint.transferType,
        ...(endpoint.syncType !== undefined && { syncType: endpoint.syncType }),
        ...(endpoint.usageType !== undefined && { usageType: endpoint.usageType }),
        maxPacketSize: endpoint.maxPacketSize,
        transactionsPerMicroframe: endpoint.transactionsPerMicroframe,
        interval: endpoint.interval,
        ...(descriptors && { descriptors }),
    };
}

function serializeInterface(iface: UsbInterface): SerializedInterface {
    const leading = views(iface.leading);
    const descriptors = views(iface.descriptors);
    return {
        number: iface.number,
        alternateSetting: iface.alternateSetting,
        classCode: { ...iface.classCode },
        ...(iface.name !== undefined && { name: iface.name }),
        ...(leading && { leading }),
        ...(descriptors && { descriptors }),
        endpoints: iface.endpoints.map(serializeEndpoint),
    };
}

function serializeConfiguration(config: UsbConfiguration): SerializedConfiguration {
    const descriptors = views([...config.descriptors, ...config.trailing]);
    return {
        value: config.value,
        attributes: config.attributes,
        selfPowered: config.selfPowered,
        remoteWakeup: config.remoteWakeup,
        maxPowerMa: config.maxPowerMa,
        ...(config.name !== undefined && { name: config.name }),
        ...(descriptors && { descriptors }),
        interfaces: config.interfaces.map(serializeInterface),
        raw: toHex(encodeConfiguration(config)),
    };
}

function serializeDevice(device: UsbDevice): SerializedDevice {
    return {
        bus: device.bus,
        ...(device.portPath && { portPath: [...device.portPath] }),
        ...(device.address !== undefined && { address: device.address }),
        ...(device.vendorId !== undefined && { vendorId: device.vendorId }),
        ...(device.productId !== undefined && { productId: device.productId }),
        ...(device.classCode && { classCode: { ...device.classCode } }),
        ...(device.usbVersion !== undefined && { usbVersion: device.usbVersion }),
        ...(device.deviceVersion !== undefined && { deviceVersion: device.deviceVersion }),
        ...(device.maxPacketSize0 !== undefined && { maxPacketSize0: device.maxPacketSize0 }),
        ...(device.manufacturer !== undefined && { manufacturer: device.manufacturer }),
        ...(device.product !== undefined && { product: device.product }),
        ...(device.serial !== undefined && { serial: device.serial }),
        name: device.name,
        ...(device.speed !== undefined && { speed: device.speed }),
        ...(device.driver !== undefined && { driver: device.driver }),
        ...(device.sysPath !== undefined && { sysPath: device.sysPath }),
        configurations: device.configurations.map(serializeConfiguration),
        ...(device.activeConfiguration !== undefined && { activeConfiguration: device.activeConfiguration }),
        ...(device.bos && { bos: toJsonObject(device.bos) }),
        ...(device.hub && { hub: toJsonObject(device.hub) }),
        ...(device.hidReports && { hidReports: device.hidReports.map(toJsonObject) }),
        ...(device.descriptorTruncated && { descriptorTruncated: true }),
        ...(device.knownAbsent.length > 0 && { knownAbsent: [...device.knownAbsent] }),
        provenance: device.provenance.map((p) => ({ backend: p.backend, completeness: p.completeness })),
        ...(device.fieldSources && { fieldSources: { ...device.fieldSources } }),
        ...(device.provisional && { provisional: true }),
        ...(device.detached && { detached: true }),
        ...(device.branchPosition !== undefined && { branchPosition: device.branchPosition }),
        children: device.children.map(serializeDevice),
    };
}

function serializeBus(bus: UsbBus): SerializedBus {
    return {
        id: bus.id,
        ...(bus.name !== undefined && { name: bus.name }),
        ...(bus.hostController && { hostController: { ...bus.hostController } }),
        ...(bus.hostControllerDriver !== undefined && { hostControllerDriver: bus.hostControllerDriver }),
        ...(bus.rootHub && { rootHub: serializeDevice(bus.rootHub) }),
        devices: bus.devices.map(serializeDevice),
    };
}

export function serializeTree(tree: Pick<UsbTree, 'buses'>): SerializedTree {
    return { buses: tree.buses.map(serializeBus) };
}

const u8 = z.number().int().min(0).max(0xff);
const u16 = z.number().int().min(0).max(0xffff);
const hexSchema = z.string().regex(/^([0-9a-f]{2})*$/, 'expected lowercase hex bytes');
const classCodeSchema = z.object({ base: u8, sub: u8, protocol: u8 });

const configurationSchema = z.object({
    name: z.string().optional(),
    interfaces: z.array(z.object({ name: z.string().optional() })),
    raw: hexSchema,
});

type ParsedConfiguration = z.infer<typeof configurationSchema>;

interface ParsedDevice {
    bus: number;
    portPath?: number[];
    address?: number;
    vendorId?: number;
    productId?: number;
    classCode?: ClassCode;
    usbVersion?: number;
    deviceVersion?: number;
    maxPacketSize0?: number;
    manufacturer?: string;
    product?: string;
    serial?: string;
    name: string;
    speed?: UsbDevice['speed'];
    driver?: string;
    sysPath?: string;
    configurations: ParsedConfiguration[];
    activeConfiguration?: number;
    bos?: { bytes: string };
    hub?: { bytes: string };
    hidReports?: Array<{ bytes: string; interfaceNumber?: number }>;
    descriptorTruncated?: boolean;
    knownAbsent?: UsbDevice['knownAbsent'];
    provenance: UsbDevice['provenance'];
    fieldSources?: Record<string, UsbDevice['provenance'][number]['backend']>;
    provisional?: boolean;
    detached?: boolean;
    branchPosition?: number;
    children: ParsedDevice[];
}

const deviceSchema: z.ZodType<ParsedDevice> = z.lazy(() => z.object({
    bus: z.number().int().min(0),
    portPath: z.array(z.number().int().positive()).optional(),
    address: z.number().int().min(0).optional(),
    vendorId: u16.optional(),
    productId: u16.optional(),
    classCode: classCodeSchema.optional(),
    usbVersion: u16.optional(),
    deviceVersion: u16.optional(),
    maxPacketSize0: u8.optional(),
    manufacturer: z.string().optional(),
    product: z.string().optional(),
    serial: z.string().optional(),
    name: z.string(),
    speed: z.enum(['low', 'full', 'high', 'super', 'super-plus', 'super-plus-x2']).optional(),
    driver: z.string().optional(),
    sysPath: z.string().optional(),
    configurations: z.array(configurationSchema),
    activeConfiguration: u8.optional(),
    bos: z.object({ bytes: hexSchema }).optional(),
    hub: z.object({ bytes: hexSchema }).optional(),
    hidReports: z.array(z.object({ bytes: hexSchema, interfaceNumber: u8.optional() })).optional(),
    descriptorTruncated: z.boolean().optional(),
    knownAbsent: z.array(z.enum(['manufacturer', 'product', 'serial', 'configurations', 'bos'])).optional(),
    provenance: z.array(z.object({ backend: z.enum(BACKEND_IDS), completeness: z.enum(['full', 'partial', 'coarse']) })),
    fieldSources: z.record(z.string(), z.enum(BACKEND_IDS)).optional(),
    provisional: z.boolean().optional(),
    detached: z.boolean().optional(),
    branchPosition: z.number().int().min(0).optional(),
    children: z.array(deviceSchema),
}));

const treeSchema = z.object({
    buses: z.array(z.object({
        id: z.number().int().min(0),
        name: z.string().optional(),
        hostController: z.object({ vendorId: u16, deviceId: u16 }).optional(),
        hostControllerDriver: z.string().optional(),
        rootHub: deviceSchema.optional(),
        devices: z.array(deviceSchema),
    })),
});

function invalid(message: string): ProfilerError {
    return new ProfilerError('INVALID_SERIALIZED_TREE', message);
}

function bytesOf(hex: string, what: string): Uint8Array {
    const bytes = fromHex(hex);
    if (!bytes) {
        throw invalid(`${what}: invalid hex`);
    }
    return bytes;
}

function restoreConfiguration(parsed: ParsedConfiguration, usbVersion: number | undefined, label: string): UsbConfiguration {
    const result = decodeConfiguration(bytesOf(parsed.raw, label), { usbVersion });
    if (!result.ok) {
        throw invalid(`${label}: ${result.error.message}`);
    }
    const config = result.value;
    if (parsed.name !== undefined) {
        config.name = parsed.name;
    }
    config.interfaces.forEach((iface, i) => {
        const name = parsed.interfaces[i]?.name;
        if (name !== undefined) {
            iface.name = name;
        }
    });
    return config;
}

function restoreFieldSources(parsed: NonNullable<ParsedDevice['fieldSources']>): FieldSources {
    const sources: FieldSources = {};
    for (const [key, backend] of Object.entries(parsed)) {
        const field = MERGE_FIELDS.find((candidate) => candidate === key);
        if (!field) {
            throw invalid(`unknown field source '${key}'`);
        }
        sources[field] = backend;
    }
    return sources;
}

function restoreDevice(parsed: ParsedDevice): UsbDevice {
    const label = parsed.portPath ? `device ${parsed.bus}-${parsed.portPath.join('.') || '0'}` : `device on bus ${parsed.bus}`;
    const device: UsbDevice = {
        bus: parsed.bus,
        name: parsed.name,
        configurations: parsed.configurations.map((config, i) => restoreConfiguration(config, parsed.usbVersion, `${label} configuration ${i}`)),
        knownAbsent: parsed.knownAbsent ? [...parsed.knownAbsent] : [],
        provenance: parsed.provenance.map((p) => ({ ...p })),
        children: parsed.children.map(restoreDevice),
    };
    if (parsed.portPath) device.portPath = [...parsed.portPath];
    if (parsed.address !== undefined) device.address = parsed.address;
    if (parsed.vendorId !== undefined) device.vendorId = parsed.vendorId;
    if (parsed.productId !== undefined) device.productId = parsed.productId;
    if (parsed.classCode) device.classCode = { ...parsed.classCode };
    if (parsed.usbVersion !== undefined) device.usbVersion = parsed.usbVersion;
    if (parsed.deviceVersion !== undefined) device.deviceVersion = parsed.deviceVersion;
    if (parsed.maxPacketSize0 !== undefined) device.maxPacketSize0 = parsed.maxPacketSize0;
    if (parsed.manufacturer !== undefined) device.manufacturer = parsed.manufacturer;
    if (parsed.product !== undefined) device.product = parsed.product;
    if (parsed.serial !== undefined) device.serial = parsed.serial;
    if (parsed.speed !== undefined) device.speed = parsed.speed;
    if (parsed.driver !== undefined) device.driver = parsed.driver;
    if (parsed.sysPath !== undefined) device.sysPath = parsed.sysPath;
    if (parsed.activeConfiguration !== undefined) device.activeConfiguration = parsed.activeConfiguration;
    if (parsed.bos) {
        const result = decodeBos(bytesOf(parsed.bos.bytes, `${label} bos`));
        if (!result.ok) {
            throw invalid(`${label} bos: ${result.error.message}`);
        }
        device.bos = result.value;
    }
    if (parsed.hub) {
        const result = decodeHubDescriptor(bytesOf(parsed.hub.bytes, `${label} hub`));
        if (!result.ok) {
            throw invalid(`${label} hub: ${result.error.message}`);
        }
        device.hub = result.value;
    }
    if (parsed.hidReports) {
        device.hidReports = parsed.hidReports.map((report) => {
            const result = decodeHidReport(bytesOf(report.bytes, `${label} hid report`), report.interfaceNumber);
            if (!result.ok) {
                throw invalid(`${label} hid report: ${result.error.message}`);
            }
            return result.value;
        });
    }
    if (parsed.descriptorTruncated) device.descriptorTruncated = true;
    if (parsed.fieldSources) device.fieldSources = restoreFieldSources(parsed.fieldSources);
    if (parsed.provisional) device.provisional = true;
    if (parsed.detached) device.detached = true;
    if (parsed.branchPosition !== undefined) device.branchPosition = parsed.branchPosition;
    return device;
}

/**
 * Validate a serialized tree and rebuild the canonical tree from it
 */
export function deserializeTree(json: unknown): UsbTree {
    const parsed = treeSchema.safeParse(json);
    if (!parsed.success) {
        const details = parsed.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
        throw new ProfilerError('INVALID_SERIALIZED_TREE', `Serialized tree validation failed: ${details.join('; ')}`, { details });
    }

    const buses: UsbBus[] = parsed.data.buses.map((bus) => {
        const restored: UsbBus = { id: bus.id, devices: bus.devices.map(restoreDevice) };
        if (bus.name !== undefined) restored.name = bus.name;
        if (bus.hostController) restored.hostController = { ...bus.hostController };
        if (bus.hostControllerDriver !== undefined) restored.hostControllerDriver = bus.hostControllerDriver;
        if (bus.rootHub) restored.rootHub = restoreDevice(bus.rootHub);
        return restored;
    });
    return indexTree(buses);
}
