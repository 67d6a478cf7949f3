/**
 * Plain-text rendering of the canonical tree and the device table
 */

import { formatHex16 } from './usb-bytes';
import { resolveClassCode } from './usb-class-codes';
import { UsbBus, UsbDevice, UsbTree, formatVidPid, isHub, isRootHub } from './usb-common';
import { formatPortPath } from './usb-port-path';
import type { BusGroup, QueryResult } from './usb-query';

export interface DeviceTableRow {
    vidPid: string;
    name: string;
    className: string;
    serial: string;
    driver: string;
    portPath: string;
    isHub: boolean;
}

function portLabel(device: UsbDevice): string {
    return device.portPath ? formatPortPath(device.bus, device.portPath) : `${device.bus}-?`;
}

/**
 * Base-class name of the device, or of its first interface when the device
 * defers classification to its interfaces
 */
export function getDeviceClassName(device: UsbDevice): string | undefined {
    if (device.classCode && device.classCode.base !== 0) {
        return resolveClassCode(device.classCode).base;
    }
    const first = device.configurations[0]?.interfaces[0];
    if (first) {
        return resolveClassCode(first.classCode).base;
    }
    return device.classCode ? resolveClassCode(device.classCode).base : undefined;
}

function deviceLine(device: UsbDevice): string {
    const vidPid = formatVidPid(device);
    const vidPidStr = vidPid ? ` (${vidPid})` : '';
    const serialStr = device.serial ? ` [S/N: ${device.serial}]` : '';
    const driverStr = device.driver ? ` <${device.driver}>` : '';
    const flags = [device.detached && 'detached', device.provisional && 'provisional'].filter(Boolean);
    const flagStr = flags.length > 0 ? ` (${flags.join(', ')})` : '';
    return `[${portLabel(device)}]: ${device.name}${vidPidStr}${serialStr}${driverStr}${flagStr}`;
}

function busLine(bus: UsbBus): string {
    const name = bus.name ? `: ${bus.name}` : '';
    let host = '';
    if (bus.hostController) {
        const ids = `${formatHex16(bus.hostController.vendorId)}:${formatHex16(bus.hostController.deviceId)}`;
        host = ` [${ids}${bus.hostControllerDriver ? ` ${bus.hostControllerDriver}` : ''}]`;
    } else if (bus.hostControllerDriver) {
        host = ` [${bus.hostControllerDriver}]`;
    }
    return `Bus ${bus.id}${name}${host}`;
}

function countConnected(buses: UsbBus[]): number {
    let count = 0;
    const visit = (device: UsbDevice): void => {
        count++;
        device.children.forEach(visit);
    };
    buses.forEach((bus) => bus.devices.forEach(visit));
    return count;
}

function formatTree(tree: Pick<UsbTree, 'buses'>): string[] {
    const lines = ['USB Device Tree', `Connected Devices: ${countConnected(tree.buses)}`, ''];

    function printDevice(dev: UsbDevice, prefix: string, isLast: boolean): void {
        const connector = isLast ? '\\--' : '|--';
        lines.push(`${prefix}${connector}${deviceLine(dev)}`);
        const childPrefix = prefix + (isLast ? '    ' : '|   ');
        for (let i = 0; i < dev.children.length; i++) {
            printDevice(dev.children[i], childPrefix, i === dev.children.length - 1);
        }
    }

    for (const bus of tree.buses) {
        const root = bus.rootHub ? ` - ${bus.rootHub.name}` : '';
        lines.push(`\\---${busLine(bus)}${root}`);
        for (let i = 0; i < bus.devices.length; i++) {
            printDevice(bus.devices[i], '    ', i === bus.devices.length - 1);
        }
        lines.push('');
    }
    return lines;
}

function formatGroups(groups: BusGroup[]): string[] {
    const connected = groups.reduce((sum, group) => sum + group.devices.length, 0);
    const lines = ['USB Devices by Bus', `Connected Devices: ${connected}`, ''];
    for (const group of groups) {
        lines.push(busLine(group.bus));
        for (const device of group.devices) {
            lines.push(`    ${deviceLine(device)}`);
        }
        lines.push('');
    }
    return lines;
}

/**
 * Render a tree or query result as lines
 */
export function formatUsbTree(input: Pick<UsbTree, 'buses'> | QueryResult): string[] {
    if ('kind' in input) {
        return input.kind === 'grouped' ? formatGroups(input.groups) : formatTree(input.tree);
    }
    return formatTree(input);
}

/**
 * Get device table data (root hubs excluded), depth-first per bus
 */
export function getDeviceTable(tree: Pick<UsbTree, 'buses'>): DeviceTableRow[] {
    const rows: DeviceTableRow[] = [];

    function collectDevices(dev: UsbDevice): void {
        if (!isRootHub(dev)) {
            rows.push({
                vidPid: formatVidPid(dev) ?? '',
                name: dev.name,
                className: getDeviceClassName(dev) ?? '',
                serial: dev.serial ?? '',
                driver: dev.driver ?? '',
                portPath: portLabel(dev),
                isHub: isHub(dev),
            });
        }
        for (const child of dev.children) {
            collectDevices(child);
        }
    }

    for (const bus of tree.buses) {
        for (const dev of bus.devices) {
            collectDevices(dev);
        }
    }
    return rows;
}

export function formatDeviceTable(rows: DeviceTableRow[]): string[] {
    const lines = [
        'VID:PID    | Name                                     | Class                    | Serial           | Driver           | Port Path',
        '-'.repeat(132),
    ];
    for (const row of rows) {
        const vidPid = (row.vidPid || '-').padEnd(10);
        const name = row.name.substring(0, 40).padEnd(40);
        const className = (row.className || '-').substring(0, 24).padEnd(24);
        const serial = (row.serial || '-').padEnd(16);
        const driver = (row.driver || '-').padEnd(16);
        const hub = row.isHub ? ' [HUB]' : '';
        lines.push(`${vidPid} | ${name} | ${className} | ${serial} | ${driver} | ${row.portPath}${hub}`);
    }
    return lines;
}
