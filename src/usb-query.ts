/**
 * Query engine - filter, sort and group over the canonical tree
 *
 * The passes always run in that order and never modify their input: every
 * pass returns new bus and device nodes. Filtering keeps the ancestors of a
 * matching device so the result is still a coherent tree.
 */

import { classFromKey, classKeys } from './usb-class-codes';
import { UsbBus, UsbDevice, UsbTree, isHub } from './usb-common';
import { ProfilerError } from './usb-errors';
import { queryLogger } from './usb-logger';
import { indexTree } from './usb-topology';

export interface VidPidFilter {
    vendorId: number;
    productId?: number;    // undefined matches any product
}

export interface BusDeviceFilter {
    bus?: number;
    address?: number;
}

export interface DeviceFilter {
    vidPid?: VidPidFilter;
    busDevice?: BusDeviceFilter;
    name?: string;          // case-sensitive substring
    serial?: string;        // case-sensitive substring
    classCode?: number;     // base class, matched against the device and all its interfaces
    hideEmptyBranches?: boolean;
}

export const SORT_KEYS = ['device-number', 'branch-position', 'no-sort'] as const;
export type SortKey = typeof SORT_KEYS[number];

export const GROUP_KEYS = ['no-group', 'bus'] as const;
export type GroupKey = typeof GROUP_KEYS[number];

export interface Query {
    filter?: DeviceFilter;
    sort?: SortKey;
    group?: GroupKey;
}

export interface BusGroup {
    bus: UsbBus;
    devices: UsbDevice[];
}

export type QueryResult =
    | { kind: 'tree'; tree: UsbTree }
    | { kind: 'grouped'; groups: BusGroup[] };

function invalidQuery(message: string): ProfilerError {
    return new ProfilerError('INVALID_QUERY', message);
}

function parseHexId(text: string, what: string): number {
    if (!/^(0x)?[0-9a-fA-F]{1,4}$/.test(text)) {
        throw invalidQuery(`invalid ${what} id '${text}'`);
    }
    return parseInt(text.replace(/^0x/, ''), 16);
}

function parseDecimal(text: string, what: string): number {
    if (!/^\d+$/.test(text)) {
        throw invalidQuery(`invalid ${what} '${text}'`);
    }
    return parseInt(text, 10);
}

/**
 * Parse "VID[:PID]" hex ("1d6b:0002", "1d6b", "1d6b:")
 */
export function parseVidPidFilter(text: string): VidPidFilter {
    const [vendor, product, ...rest] = text.trim().split(':');
    if (rest.length > 0 || !vendor) {
        throw invalidQuery(`invalid vendor/product filter '${text}'`);
    }
    const filter: VidPidFilter = { vendorId: parseHexId(vendor, 'vendor') };
    if (product) {
        filter.productId = parseHexId(product, 'product');
    }
    return filter;
}

/**
 * Parse "[bus:]devnum" decimal ("1:3", "3", "1:")
 */
export function parseBusDeviceFilter(text: string): BusDeviceFilter {
    const trimmed = text.trim();
    if (!trimmed.includes(':')) {
        return { address: parseDecimal(trimmed, 'device number') };
    }
    const [bus, address, ...rest] = trimmed.split(':');
    if (rest.length > 0 || (!bus && !address)) {
        throw invalidQuery(`invalid bus/device filter '${text}'`);
    }
    const filter: BusDeviceFilter = {};
    if (bus) {
        filter.bus = parseDecimal(bus, 'bus number');
    }
    if (address) {
        filter.address = parseDecimal(address, 'device number');
    }
    return filter;
}

/**
 * Map a symbolic class name ("hid", "mass-storage") to its base class value
 */
export function parseClassFilter(text: string): number {
    const base = classFromKey(text.trim().replace(/_/g, '-'));
    if (base === undefined) {
        throw invalidQuery(`unknown class '${text}', expected one of: ${classKeys().join(', ')}`);
    }
    return base;
}

export function parseSortKey(text: string): SortKey {
    const key = SORT_KEYS.find((candidate) => candidate === text.trim());
    if (!key) {
        throw invalidQuery(`invalid sort key '${text}', expected one of: ${SORT_KEYS.join(', ')}`);
    }
    return key;
}

export function parseGroupKey(text: string): GroupKey {
    const key = GROUP_KEYS.find((candidate) => candidate === text.trim());
    if (!key) {
        throw invalidQuery(`invalid group key '${text}', expected one of: ${GROUP_KEYS.join(', ')}`);
    }
    return key;
}

function hasPredicates(filter: DeviceFilter): boolean {
    return filter.vidPid !== undefined
        || filter.busDevice !== undefined
        || filter.name !== undefined
        || filter.serial !== undefined
        || filter.classCode !== undefined;
}

function hasClass(device: UsbDevice, base: number): boolean {
    if (device.classCode?.base === base) {
        return true;
    }
    return device.configurations.some((config) => config.interfaces.some((iface) => iface.classCode.base === base));
}

/**
 * True when the device satisfies every predicate set in the filter
 */
export function matchesFilter(device: UsbDevice, filter: DeviceFilter): boolean {
    if (filter.vidPid) {
        if (device.vendorId !== filter.vidPid.vendorId) {
            return false;
        }
        if (filter.vidPid.productId !== undefined && device.productId !== filter.vidPid.productId) {
            return false;
        }
    }
    if (filter.busDevice) {
        if (filter.busDevice.bus !== undefined && device.bus !== filter.busDevice.bus) {
            return false;
        }
        if (filter.busDevice.address !== undefined && device.address !== filter.busDevice.address) {
            return false;
        }
    }
    if (filter.name !== undefined && !device.name.includes(filter.name)) {
        return false;
    }
    if (filter.serial !== undefined && !(device.serial ?? '').includes(filter.serial)) {
        return false;
    }
    if (filter.classCode !== undefined && !hasClass(device, filter.classCode)) {
        return false;
    }
    return true;
}

/**
 * Structure-preserving filter. A device survives if it matches or any
 * descendant does; hideEmptyBranches additionally prunes hubs left without
 * children (unless they matched themselves) and buses left without devices.
 */
export function filterTree(tree: Pick<UsbTree, 'buses'>, filter: DeviceFilter): UsbTree {
    const active = hasPredicates(filter);
    const hide = filter.hideEmptyBranches === true;

    const visit = (device: UsbDevice): UsbDevice | undefined => {
        const children = device.children.map(visit).filter((child): child is UsbDevice => child !== undefined);
        const matched = matchesFilter(device, filter);
        if (!matched && children.length === 0) {
            return undefined;
        }
        if (hide && children.length === 0 && isHub(device) && !(active && matched)) {
            return undefined;
        }
        return { ...device, children };
    };

    const buses: UsbBus[] = [];
    for (const bus of tree.buses) {
        if (filter.busDevice?.bus !== undefined && bus.id !== filter.busDevice.bus) {
            continue;
        }
        const devices = bus.devices.map(visit).filter((device): device is UsbDevice => device !== undefined);
        if (hide && devices.length === 0) {
            continue;
        }
        buses.push({ ...bus, devices });
    }
    return indexTree(buses);
}

function compareOptional(a: number | undefined, b: number | undefined): number {
    if (a === undefined || b === undefined) {
        return a === b ? 0 : a === undefined ? 1 : -1;
    }
    return a - b;
}

/**
 * Stable per-sibling-group sort; the tree shape is unchanged
 */
export function sortTree(tree: Pick<UsbTree, 'buses'>, key: SortKey): UsbTree {
    if (key === 'no-sort') {
        return indexTree(tree.buses.map((bus) => ({ ...bus })));
    }
    const compare = (a: UsbDevice, b: UsbDevice): number => key === 'device-number'
        ? compareOptional(a.address, b.address)
        : compareOptional(a.branchPosition, b.branchPosition);
    const sortLevel = (devices: UsbDevice[]): UsbDevice[] => [...devices]
        .sort(compare)
        .map((device) => ({ ...device, children: sortLevel(device.children) }));

    return indexTree(tree.buses.map((bus) => ({ ...bus, devices: sortLevel(bus.devices) })));
}

/**
 * Flatten each bus into a depth-first device list. One-way: the grouped
 * form cannot be turned back into a tree.
 */
export function groupByBus(tree: Pick<UsbTree, 'buses'>): BusGroup[] {
    return tree.buses.map((bus) => {
        const devices: UsbDevice[] = [];
        const visit = (device: UsbDevice): void => {
            devices.push(device);
            device.children.forEach(visit);
        };
        bus.devices.forEach(visit);
        return { bus, devices };
    });
}

/**
 * Run filter -> sort -> group
 */
export function applyQuery(tree: UsbTree, query: Query = {}): QueryResult {
    const filtered = query.filter ? filterTree(tree, query.filter) : tree;
    const sorted = sortTree(filtered, query.sort ?? 'no-sort');
    queryLogger.debug({ sort: query.sort ?? 'no-sort', group: query.group ?? 'no-group', devices: sorted.allDevices.size }, 'query applied');
    if (query.group === 'bus') {
        return { kind: 'grouped', groups: groupByBus(sorted) };
    }
    return { kind: 'tree', tree: sorted };
}
