/**
 * Source reconciler - merges per-backend trees into one canonical tree
 *
 * Devices are matched across backends by (bus, port path), then (bus, address),
 * then (vendor, product, serial) as a provisional match. Each field is taken
 * from the highest-priority backend that actually supplied it, so a backend
 * that lacks a field never erases another backend's value.
 */

import {
    BackendId,
    FieldSources,
    HostController,
    KnownAbsentField,
    MERGE_FIELDS,
    MergeField,
    UsbBusInfo,
    UsbDevice,
    UsbTree,
    flattenDevices,
    getDeviceName,
} from './usb-common';
import type { ProvisionalMatchMode } from './usb-config';
import { Diagnostic, IdentityConflictDiagnostic } from './usb-errors';
import { logDiagnostics, reconcilerLogger } from './usb-logger';
import { formatPortPath } from './usb-port-path';
import { buildTopology } from './usb-topology';

export interface BackendTree {
    backend: BackendId;
    tree: UsbTree;
}

export interface ReconcileOptions {
    provisionalMatch?: ProvisionalMatchMode;
}

export interface ReconcileResult {
    tree: UsbTree;
    diagnostics: Diagnostic[];
}

export interface CanonicalRecord {
    device: UsbDevice;
    fieldSources: FieldSources;
}

type PriorityField = MergeField | 'portPath';

// Descriptor fields: the backend that issued control transfers knows best
const DESCRIPTOR_PRIORITY: readonly BackendId[] = ['libusb', 'sysfs', 'system-profiler', 'pnputil'];
// Driver binding and device paths: the OS-native backend
const OS_PRIORITY: readonly BackendId[] = ['sysfs', 'pnputil', 'libusb', 'system-profiler'];
// Bus and host controller identity
const HOST_PRIORITY: readonly BackendId[] = ['system-profiler', 'sysfs', 'pnputil', 'libusb'];
// Address, speed and placement
const ADDRESS_PRIORITY: readonly BackendId[] = ['sysfs', 'libusb', 'system-profiler', 'pnputil'];

export const FIELD_PRIORITY: Readonly<Record<PriorityField, readonly BackendId[]>> = {
    vendorId: DESCRIPTOR_PRIORITY,
    productId: DESCRIPTOR_PRIORITY,
    classCode: DESCRIPTOR_PRIORITY,
    usbVersion: DESCRIPTOR_PRIORITY,
    deviceVersion: DESCRIPTOR_PRIORITY,
    maxPacketSize0: DESCRIPTOR_PRIORITY,
    manufacturer: DESCRIPTOR_PRIORITY,
    product: DESCRIPTOR_PRIORITY,
    serial: DESCRIPTOR_PRIORITY,
    configurations: DESCRIPTOR_PRIORITY,
    activeConfiguration: OS_PRIORITY,
    bos: DESCRIPTOR_PRIORITY,
    hub: DESCRIPTOR_PRIORITY,
    hidReports: DESCRIPTOR_PRIORITY,
    descriptorTruncated: DESCRIPTOR_PRIORITY,
    driver: OS_PRIORITY,
    sysPath: OS_PRIORITY,
    address: ADDRESS_PRIORITY,
    speed: ADDRESS_PRIORITY,
    portPath: ADDRESS_PRIORITY,
};

export const BUS_PRIORITY: readonly BackendId[] = HOST_PRIORITY;

interface Member {
    backend: BackendId;
    device: UsbDevice;
}

interface Entry {
    members: Member[];
    provisional: boolean;
}

function isPresent(value: unknown): boolean {
    return value !== undefined && !(Array.isArray(value) && value.length === 0);
}

function byPriority<T extends { backend: BackendId }>(items: T[], priority: readonly BackendId[]): T[] {
    const rank = (backend: BackendId): number => {
        const index = priority.indexOf(backend);
        return index === -1 ? priority.length : index;
    };
    return [...items].sort((a, b) => rank(a.backend) - rank(b.backend));
}

function copyField<K extends keyof UsbDevice>(target: UsbDevice, source: UsbDevice, field: K): void {
    target[field] = source[field];
}

function deviceLabel(device: UsbDevice): string {
    if (device.portPath) {
        return formatPortPath(device.bus, device.portPath);
    }
    return device.address !== undefined ? `bus ${device.bus} address ${device.address}` : `bus ${device.bus}`;
}

function checkIdentity(members: Member[], field: 'vendorId' | 'productId', chosen: BackendId | undefined): IdentityConflictDiagnostic | undefined {
    const values = members
        .filter((member) => member.device[field] !== undefined)
        .map((member) => ({ backend: member.backend, value: member.device[field] ?? 0 }));
    const distinct = new Set(values.map((v) => v.value));
    if (distinct.size < 2 || !chosen) {
        return undefined;
    }
    return {
        kind: 'IdentityConflict',
        message: `backends disagree on ${field}: ${values.map((v) => `${v.backend}=${v.value.toString(16).padStart(4, '0')}`).join(', ')}; using ${chosen}`,
        device: deviceLabel(members[0].device),
        field,
        values,
        chosen,
    };
}

/**
 * Merge the members of one identity group into a canonical device
 */
function mergeEntry(entry: Entry, diagnostics: Diagnostic[]): UsbDevice {
    const placement = byPriority(entry.members, FIELD_PRIORITY.portPath);
    const withPath = placement.find((member) => member.device.portPath !== undefined);
    const anchor = withPath ?? placement[0];

    const merged: UsbDevice = {
        bus: anchor.device.bus,
        name: '',
        configurations: [],
        knownAbsent: [],
        provenance: entry.members.flatMap((member) => member.device.provenance),
        children: [],
    };
    if (withPath) {
        copyField(merged, withPath.device, 'portPath');
    }

    const fieldSources: FieldSources = {};
    for (const field of MERGE_FIELDS) {
        const source = byPriority(entry.members, FIELD_PRIORITY[field]).find((member) => isPresent(member.device[field]));
        if (source) {
            copyField(merged, source.device, field);
            fieldSources[field] = source.backend;
        }
    }

    for (const field of ['vendorId', 'productId'] as const) {
        const conflict = checkIdentity(entry.members, field, fieldSources[field]);
        if (conflict) {
            diagnostics.push(conflict);
        }
    }

    const absent = new Set<KnownAbsentField>(entry.members.flatMap((member) => member.device.knownAbsent));
    merged.knownAbsent = Array.from(absent).filter((field) => !isPresent(merged[field]));
    if (entry.provisional) {
        merged.provisional = true;
    }
    merged.fieldSources = fieldSources;
    merged.name = getDeviceName(merged);
    return merged;
}

function mergeBuses(trees: BackendTree[]): UsbBusInfo[] {
    const byId = new Map<number, Array<{ backend: BackendId; bus: UsbBusInfo }>>();
    for (const { backend, tree } of trees) {
        for (const bus of tree.buses) {
            const list = byId.get(bus.id) ?? [];
            list.push({ backend, bus });
            byId.set(bus.id, list);
        }
    }

    const buses: UsbBusInfo[] = [];
    for (const [id, sources] of byId) {
        const ordered = byPriority(sources, BUS_PRIORITY);
        const name = ordered.find((s) => s.bus.name !== undefined)?.bus.name;
        const hostController: HostController | undefined = ordered.find((s) => s.bus.hostController !== undefined)?.bus.hostController;
        const hostControllerDriver = ordered.find((s) => s.bus.hostControllerDriver !== undefined)?.bus.hostControllerDriver;
        const bus: UsbBusInfo = { id };
        if (name !== undefined) {
            bus.name = name;
        }
        if (hostController) {
            bus.hostController = { ...hostController };
        }
        if (hostControllerDriver !== undefined) {
            bus.hostControllerDriver = hostControllerDriver;
        }
        buses.push(bus);
    }
    return buses;
}

/**
 * Merge per-backend trees into the canonical tree
 */
export function reconcile(trees: BackendTree[], options: ReconcileOptions = {}): ReconcileResult {
    const mode = options.provisionalMatch ?? 'merge';
    const diagnostics: Diagnostic[] = [];
    const entries: Entry[] = [];
    const byPath = new Map<string, Entry>();
    const byAddress = new Map<string, Entry>();
    const byIdentity = new Map<string, Entry[]>();

    const hasBackend = (entry: Entry, backend: BackendId): boolean => entry.members.some((m) => m.backend === backend);
    const hasPath = (entry: Entry): boolean => entry.members.some((m) => m.device.portPath !== undefined);
    const identityKey = (device: UsbDevice): string | undefined => (
        device.vendorId !== undefined && device.productId !== undefined && device.serial
            ? `${device.vendorId}:${device.productId}:${device.serial}`
            : undefined
    );

    // Placed records (port path or address) are matched first, so a weak
    // match sees every candidate whatever the backend order.
    const placed: Member[] = [];
    const unplaced: Member[] = [];
    for (const { backend, tree } of trees) {
        for (const device of flattenDevices(tree)) {
            const list = device.portPath !== undefined || device.address !== undefined ? placed : unplaced;
            list.push({ backend, device });
        }
    }

    const addMember = (entry: Entry | undefined, member: Member): Entry => {
        let target = entry && !hasBackend(entry, member.backend) ? entry : undefined;
        if (!target) {
            target = { members: [], provisional: false };
            entries.push(target);
        }
        target.members.push(member);
        return target;
    };
    const indexIdentity = (entry: Entry, device: UsbDevice): void => {
        const key = identityKey(device);
        if (!key) {
            return;
        }
        const list = byIdentity.get(key) ?? [];
        if (!list.includes(entry)) {
            list.push(entry);
        }
        byIdentity.set(key, list);
    };

    for (const member of placed) {
        const { device } = member;
        const pathKey = device.portPath ? `${device.bus}:${device.portPath.join('.')}` : undefined;
        const addressKey = device.address !== undefined ? `${device.bus}:${device.address}` : undefined;

        let entry: Entry | undefined;
        if (pathKey) {
            entry = byPath.get(pathKey);
            if (!entry && addressKey) {
                const candidate = byAddress.get(addressKey);
                entry = candidate && !hasPath(candidate) ? candidate : undefined;
            }
        } else if (addressKey) {
            entry = byAddress.get(addressKey);
        }

        entry = addMember(entry, member);
        if (pathKey && !byPath.has(pathKey)) {
            byPath.set(pathKey, entry);
        }
        if (addressKey && !byAddress.has(addressKey)) {
            byAddress.set(addressKey, entry);
        }
        indexIdentity(entry, device);
    }

    for (const member of unplaced) {
        const { backend, device } = member;
        const key = identityKey(device);
        const candidate = key ? byIdentity.get(key)?.find((c) => !hasBackend(c, backend)) : undefined;

        let entry: Entry | undefined;
        if (candidate) {
            const merge = mode === 'merge';
            diagnostics.push({
                kind: 'ProvisionalMatch',
                message: merge
                    ? `${device.name} matched on vendor, product and serial only`
                    : `${device.name} left separate despite matching vendor, product and serial`,
                device: deviceLabel(device),
                backend,
                backends: [...candidate.members.map((m) => m.backend), backend],
                merged: merge,
            });
            if (merge) {
                entry = candidate;
                entry.provisional = true;
            }
        }

        entry = addMember(entry, member);
        indexIdentity(entry, device);
    }

    const merged = entries.map((entry) => mergeEntry(entry, diagnostics));
    logDiagnostics(reconcilerLogger, diagnostics);
    reconcilerLogger.debug({ backends: trees.map((t) => t.backend), devices: merged.length }, 'trees reconciled');

    const { tree, diagnostics: topologyDiagnostics } = buildTopology(merged, mergeBuses(trees));
    return { tree, diagnostics: [...diagnostics, ...topologyDiagnostics] };
}

/**
 * Every canonical device with the backend that supplied each merged field
 */
export function getCanonicalRecords(tree: Pick<UsbTree, 'buses'>): CanonicalRecord[] {
    return flattenDevices(tree).map((device) => ({ device, fieldSources: device.fieldSources ?? {} }));
}
