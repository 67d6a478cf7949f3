/**
 * Topology builder - Bus -> hub -> device tree from flat device records
 *
 * Each device hangs under the device whose port path is its immediate prefix.
 * Nothing is dropped: devices whose parent is missing, that repeat a port path,
 * or that have no port path at all are attached under the bus root and flagged
 * as detached.
 */

import { UsbBus, UsbBusInfo, UsbDevice, UsbTree, flattenDevices } from './usb-common';
import { DanglingPortPathDiagnostic, DanglingReason, Diagnostic } from './usb-errors';
import { logDiagnostics, topologyLogger } from './usb-logger';
import { PortPath, comparePortPaths, comparePortPathsDepthFirst, formatPortPath, isPortPathPrefix, parentPortPath, portPathsEqual } from './usb-port-path';

export { flattenDevices } from './usb-common';

export interface TopologyResult {
    tree: UsbTree;
    diagnostics: Diagnostic[];
}

const pathKey = (path: PortPath): string => path.join('.');

/**
 * Copy a record into a fresh node: no children, no placement flags
 */
function cloneRecord(record: UsbDevice): UsbDevice {
    const node: UsbDevice = { ...record, children: [] };
    delete node.detached;
    delete node.branchPosition;
    return node;
}

function appendChild(list: UsbDevice[], node: UsbDevice): void {
    node.branchPosition = list.length;
    list.push(node);
}

function dangling(node: UsbDevice, reason: DanglingReason): DanglingPortPathDiagnostic {
    const label = node.portPath ? formatPortPath(node.bus, node.portPath) : `bus ${node.bus}`;
    const messages: Record<DanglingReason, string> = {
        'missing-parent': `parent hub of ${label} not found, attached to bus root`,
        'duplicate': `port path ${label} reported twice, attached to bus root`,
        'no-port-path': `${node.name} has no port path, attached to bus root`,
    };
    const diagnostic: DanglingPortPathDiagnostic = {
        kind: 'DanglingPortPath',
        message: messages[reason],
        device: label,
        bus: node.bus,
        reason,
    };
    if (node.portPath) {
        diagnostic.portPath = [...node.portPath];
    }
    return diagnostic;
}

/**
 * Build the device index keyed by port-path string ("1-2.3", root hub "1-0").
 * Detached devices without a usable path get a "<bus>-detached.<n>" key.
 */
export function indexTree(buses: UsbBus[]): UsbTree {
    const allDevices = new Map<string, UsbDevice>();
    let detachedCount = 0;
    for (const device of flattenDevices({ buses })) {
        let key = device.portPath ? formatPortPath(device.bus, device.portPath) : `${device.bus}-detached.${++detachedCount}`;
        if (allDevices.has(key)) {
            key = `${device.bus}-detached.${++detachedCount}`;
        }
        allDevices.set(key, device);
    }
    return { buses, allDevices };
}

/**
 * Build one tree from the records of a single source.
 * Input records are not modified.
 */
export function buildTopology(records: UsbDevice[], buses: UsbBusInfo[] = []): TopologyResult {
    const diagnostics: Diagnostic[] = [];
    const busMap = new Map<number, UsbBus>();
    const ensureBus = (id: number): UsbBus => {
        let bus = busMap.get(id);
        if (!bus) {
            bus = { id, devices: [] };
            busMap.set(id, bus);
        }
        return bus;
    };

    for (const info of buses) {
        if (!busMap.has(info.id)) {
            busMap.set(info.id, { ...info, devices: [] });
        }
    }

    const byBus = new Map<number, UsbDevice[]>();
    for (const record of records) {
        ensureBus(record.bus);
        const list = byBus.get(record.bus) ?? [];
        list.push(cloneRecord(record));
        byBus.set(record.bus, list);
    }

    for (const [busId, nodes] of byBus) {
        const bus = ensureBus(busId);
        const placed = new Map<string, UsbDevice>();
        const attachDetached = (node: UsbDevice, reason: DanglingReason): void => {
            node.detached = true;
            appendChild(bus.devices, node);
            diagnostics.push(dangling(node, reason));
        };

        const withPath: Array<{ node: UsbDevice; path: number[] }> = [];
        const withoutPath: UsbDevice[] = [];
        for (const node of nodes) {
            if (node.portPath) {
                withPath.push({ node, path: node.portPath });
            } else {
                withoutPath.push(node);
            }
        }
        withPath.sort((a, b) => comparePortPaths(a.path, b.path));

        for (const { node, path } of withPath) {
            const key = pathKey(path);
            if (placed.has(key)) {
                attachDetached(node, 'duplicate');
                continue;
            }
            placed.set(key, node);

            const parentPath = parentPortPath(path);
            if (parentPath === undefined) {
                bus.rootHub = node;
            } else if (parentPath.length === 0) {
                appendChild(bus.devices, node);
            } else {
                const parent = placed.get(pathKey(parentPath));
                if (parent) {
                    appendChild(parent.children, node);
                } else {
                    attachDetached(node, 'missing-parent');
                }
            }
        }

        for (const node of withoutPath) {
            attachDetached(node, 'no-port-path');
        }
    }

    const orderedBuses = Array.from(busMap.values()).sort((a, b) => a.id - b.id);
    logDiagnostics(topologyLogger, diagnostics);
    topologyLogger.debug({ buses: orderedBuses.length, devices: records.length }, 'topology built');
    return { tree: indexTree(orderedBuses), diagnostics };
}

/**
 * Find a device by bus and port path; the empty path addresses the root hub
 */
export function getDeviceByPortPath(tree: UsbTree, bus: number, path: PortPath): UsbDevice | undefined {
    if (path.length === 0) {
        return tree.buses.find((b) => b.id === bus)?.rootHub;
    }
    const device = tree.allDevices.get(formatPortPath(bus, path));
    return device && device.portPath && portPathsEqual(device.portPath, path) ? device : undefined;
}

/**
 * All devices on a bus at or below a port path prefix (e.g. [1, 3] returns the hub at 1-1.3 and everything under it)
 */
export function getDevicesByPortPathPrefix(tree: UsbTree, bus: number, prefix: PortPath): UsbDevice[] {
    const results: Array<{ device: UsbDevice; path: number[] }> = [];
    for (const device of tree.allDevices.values()) {
        if (device.bus === bus && device.portPath && isPortPathPrefix(prefix, device.portPath)) {
            results.push({ device, path: device.portPath });
        }
    }
    results.sort((a, b) => comparePortPathsDepthFirst(a.path, b.path));
    return results.map(({ device }) => device);
}

/**
 * Number of devices in the tree, root hubs included
 */
export function countDevices(tree: Pick<UsbTree, 'buses'>): number {
    return flattenDevices(tree).length;
}
