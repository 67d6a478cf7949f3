/**
 * USB Topology Common Definitions and Helpers
 */

import type { BosDescriptor } from './usb-bos';
import { ClassCode, HUB_CLASS, getVendorName } from './usb-class-codes';
import type { HubDescriptor } from './usb-class-descriptors';
import type { UsbConfiguration } from './usb-descriptors';
import type { HidReportDescriptor } from './usb-hid-report';
import { formatHex16 } from './usb-bytes';

export type { ClassCode } from './usb-class-codes';

export const BACKEND_IDS = ['sysfs', 'libusb', 'system-profiler', 'pnputil'] as const;
export type BackendId = typeof BACKEND_IDS[number];

export type Completeness = 'full' | 'partial' | 'coarse';

export interface Provenance {
    backend: BackendId;
    completeness: Completeness;    // full: all descriptors read; coarse: OS metadata only
}

export type UsbSpeed = 'low' | 'full' | 'high' | 'super' | 'super-plus' | 'super-plus-x2';

export type KnownAbsentField = 'manufacturer' | 'product' | 'serial' | 'configurations' | 'bos';

/**
 * Fields the reconciler merges, each with its own backend priority
 */
export const MERGE_FIELDS = [
    'vendorId',
    'productId',
    'classCode',
    'usbVersion',
    'deviceVersion',
    'maxPacketSize0',
    'manufacturer',
    'product',
    'serial',
    'configurations',
    'activeConfiguration',
    'bos',
    'hub',
    'hidReports',
    'descriptorTruncated',
    'driver',
    'sysPath',
    'address',
    'speed',
] as const;
export type MergeField = typeof MERGE_FIELDS[number];

export type FieldSources = Partial<Record<MergeField, BackendId>>;

export interface UsbDevice {
    bus: number;
    portPath?: number[];           // [] for the root hub; absent from coarse backends
    address?: number;              // reused across hotplug, not an identity
    vendorId?: number;
    productId?: number;
    classCode?: ClassCode;
    usbVersion?: number;           // BCD
    deviceVersion?: number;        // BCD
    maxPacketSize0?: number;
    manufacturer?: string;
    product?: string;
    serial?: string;
    name: string;
    speed?: UsbSpeed;
    driver?: string;
    sysPath?: string;
    configurations: UsbConfiguration[];
    activeConfiguration?: number;
    bos?: BosDescriptor;
    hub?: HubDescriptor;
    hidReports?: HidReportDescriptor[];
    descriptorTruncated?: boolean;
    knownAbsent: KnownAbsentField[];
    provenance: Provenance[];
    fieldSources?: FieldSources;   // set on reconciled devices
    provisional?: boolean;         // merged on vendor/product/serial alone
    detached?: boolean;            // parent could not be found when the tree was built
    branchPosition?: number;       // index in the parent's child list at construction
    children: UsbDevice[];
}

export interface HostController {
    vendorId: number;
    deviceId: number;
}

export interface UsbBusInfo {
    id: number;
    name?: string;
    hostController?: HostController;
    hostControllerDriver?: string;
}

export interface UsbBus extends UsbBusInfo {
    rootHub?: UsbDevice;
    devices: UsbDevice[];
}

export interface UsbTree {
    buses: UsbBus[];
    allDevices: Map<string, UsbDevice>;
}

export function isHub(device: UsbDevice): boolean {
    return device.classCode?.base === HUB_CLASS || device.hub !== undefined;
}

export function isRootHub(device: UsbDevice): boolean {
    return device.portPath !== undefined && device.portPath.length === 0;
}

export function formatVidPid(device: Pick<UsbDevice, 'vendorId' | 'productId'>): string | undefined {
    if (device.vendorId === undefined || device.productId === undefined) {
        return undefined;
    }
    return `${formatHex16(device.vendorId)}:${formatHex16(device.productId)}`;
}

/**
 * Display name: product string, then vendor table, then vid:pid
 */
export function getDeviceName(device: Pick<UsbDevice, 'vendorId' | 'productId' | 'product'>): string {
    if (device.product && device.product.trim()) {
        return device.product.trim();
    }
    const vendor = device.vendorId !== undefined ? getVendorName(device.vendorId) : undefined;
    if (vendor) {
        return `${vendor} Device`;
    }
    return formatVidPid(device) ?? 'Unknown Device';
}

/**
 * Every device in the tree, root hubs included, in depth-first order
 */
export function flattenDevices(tree: Pick<UsbTree, 'buses'>): UsbDevice[] {
    const result: UsbDevice[] = [];
    const visit = (device: UsbDevice): void => {
        result.push(device);
        for (const child of device.children) {
            visit(child);
        }
    };
    for (const bus of tree.buses) {
        if (bus.rootHub) {
            result.push(bus.rootHub);
        }
        for (const device of bus.devices) {
            visit(device);
        }
    }
    return result;
}
