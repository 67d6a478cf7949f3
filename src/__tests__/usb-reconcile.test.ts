import { describe, expect, it } from 'vitest';
import type { BackendId, UsbBusInfo, UsbDevice } from '../usb-common';
import { BackendTree, getCanonicalRecords, reconcile } from '../usb-reconcile';
import { buildTopology } from '../usb-topology';
import { makeDevice } from './fixtures';

function backendTree(backend: BackendId, devices: UsbDevice[], buses: UsbBusInfo[] = []): BackendTree {
    return { backend, tree: buildTopology(devices, buses).tree };
}

describe('reconcile', () => {
    it('merges devices at the same port path and keeps each field from the best source', () => {
        const sysfs = backendTree('sysfs', [
            makeDevice(1, [], { vendorId: 0x1d6b, productId: 0x0002, name: 'xHCI Host Controller' }),
            makeDevice(1, [2], { vendorId: 0x0781, productId: 0x5581, address: 3, driver: 'usb-storage' }),
        ], [{ id: 1, name: 'xHCI Host Controller', hostControllerDriver: 'xhci_hcd' }]);
        const pnputil = backendTree('pnputil', [
            makeDevice(1, [2], { vendorId: 0x0781, productId: 0x5581, serial: 'ABC123', driver: 'USBSTOR' }, 'pnputil'),
        ], [{ id: 1, name: 'USB Root Hub (USB 3.0)' }]);

        const { tree, diagnostics } = reconcile([sysfs, pnputil]);

        expect(diagnostics).toEqual([]);
        expect(tree.buses).toHaveLength(1);
        expect(tree.buses[0]).toMatchObject({ id: 1, name: 'xHCI Host Controller', hostControllerDriver: 'xhci_hcd' });
        expect(tree.buses[0].rootHub?.vendorId).toBe(0x1d6b);

        const stick = tree.buses[0].devices[0];
        expect(stick.serial).toBe('ABC123');
        expect(stick.driver).toBe('usb-storage');
        expect(stick.address).toBe(3);
        expect(stick.fieldSources).toEqual({
            vendorId: 'sysfs',
            productId: 'sysfs',
            serial: 'pnputil',
            driver: 'sysfs',
            address: 'sysfs',
        });
        expect(stick.provenance.map((p) => p.backend)).toEqual(['sysfs', 'pnputil']);
        expect(tree.allDevices.size).toBe(2);
    });

    it('prefers the descriptor backend and reports disagreeing ids', () => {
        const { tree, diagnostics } = reconcile([
            backendTree('sysfs', [makeDevice(1, [1], { vendorId: 0x0781, productId: 0x5581 })]),
            backendTree('libusb', [makeDevice(1, [1], { vendorId: 0x0782, productId: 0x5581 }, 'libusb')]),
        ]);

        expect(tree.buses[0].devices[0].vendorId).toBe(0x0782);
        expect(diagnostics).toEqual([{
            kind: 'IdentityConflict',
            message: 'backends disagree on vendorId: sysfs=0781, libusb=0782; using libusb',
            device: '1-1',
            field: 'vendorId',
            values: [{ backend: 'sysfs', value: 0x0781 }, { backend: 'libusb', value: 0x0782 }],
            chosen: 'libusb',
        }]);
    });

    it('matches a backend without port paths by bus and address', () => {
        const { tree } = reconcile([
            backendTree('sysfs', [makeDevice(1, [4], { address: 9 })]),
            backendTree('system-profiler', [makeDevice(1, undefined, { address: 9, speed: 'high' }, 'system-profiler')]),
        ]);

        expect(tree.allDevices.size).toBe(1);
        const device = tree.buses[0].devices[0];
        expect(device.portPath).toEqual([4]);
        expect(device.speed).toBe('high');
        expect(device.detached).toBeUndefined();
    });

    it('merges on vendor, product and serial as a flagged provisional match', () => {
        const { tree, diagnostics } = reconcile([
            backendTree('sysfs', [makeDevice(1, [3], { vendorId: 0x1234, productId: 0x5678, serial: 'SN1' })]),
            backendTree('pnputil', [makeDevice(1, undefined, { vendorId: 0x1234, productId: 0x5678, serial: 'SN1' }, 'pnputil')]),
        ]);

        expect(tree.allDevices.size).toBe(1);
        expect(tree.buses[0].devices[0].provisional).toBe(true);
        expect(diagnostics).toEqual([expect.objectContaining({
            kind: 'ProvisionalMatch',
            backends: ['sysfs', 'pnputil'],
            merged: true,
        })]);
    });

    it('makes the same provisional match whichever backend comes first', () => {
        const placed = backendTree('sysfs', [makeDevice(1, [3], { vendorId: 0x1234, productId: 0x5678, serial: 'SN1' })]);
        const coarse = backendTree('pnputil', [makeDevice(1, undefined, { vendorId: 0x1234, productId: 0x5678, serial: 'SN1' }, 'pnputil')]);

        for (const trees of [[placed, coarse], [coarse, placed]]) {
            const { tree, diagnostics } = reconcile(trees);
            expect(tree.allDevices.size).toBe(1);
            expect(tree.buses[0].devices[0]).toMatchObject({ portPath: [3], provisional: true });
            expect(tree.buses[0].devices[0].detached).toBeUndefined();
            expect(diagnostics).toEqual([expect.objectContaining({
                kind: 'ProvisionalMatch',
                device: 'bus 1',
                backends: ['sysfs', 'pnputil'],
                merged: true,
            })]);
        }
    });

    it('keeps provisional matches apart when configured to', () => {
        const { tree, diagnostics } = reconcile([
            backendTree('sysfs', [makeDevice(1, [3], { vendorId: 0x1234, productId: 0x5678, serial: 'SN1' })]),
            backendTree('pnputil', [makeDevice(1, undefined, { vendorId: 0x1234, productId: 0x5678, serial: 'SN1' }, 'pnputil')]),
        ], { provisionalMatch: 'separate' });

        expect(tree.allDevices.size).toBe(2);
        expect(tree.buses[0].devices.map((d) => d.detached ?? false)).toEqual([false, true]);
        expect(diagnostics.map((d) => d.kind)).toEqual(['ProvisionalMatch', 'DanglingPortPath']);
    });

    it('takes vendor and product from one backend and the serial from a coarse one', () => {
        const { tree, diagnostics } = reconcile([
            backendTree('libusb', [makeDevice(1, [3], { vendorId: 0x1d6b, productId: 0x0002 }, 'libusb')]),
            backendTree('pnputil', [makeDevice(1, [3], { serial: 'ABC123' }, 'pnputil')]),
        ]);

        expect(diagnostics).toEqual([]);
        expect(tree.allDevices.size).toBe(1);
        const [record] = getCanonicalRecords(tree);
        expect(record.device).toMatchObject({ vendorId: 0x1d6b, productId: 0x0002, serial: 'ABC123', portPath: [3] });
        expect(record.fieldSources).toEqual({ vendorId: 'libusb', productId: 'libusb', serial: 'pnputil' });
    });

    it('drops known-absent markers once another backend supplies the field', () => {
        const { tree } = reconcile([
            backendTree('sysfs', [makeDevice(1, [1], { knownAbsent: ['serial', 'bos'] })]),
            backendTree('pnputil', [makeDevice(1, [1], { serial: 'XYZ' }, 'pnputil')]),
        ]);
        const [record] = getCanonicalRecords(tree);
        expect(record.device.knownAbsent).toEqual(['bos']);
        expect(record.fieldSources.serial).toBe('pnputil');
    });
});
