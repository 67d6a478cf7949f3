import { describe, expect, it } from 'vitest';
import { createDeviceRecord } from '../usb-device-record';
import { applyQuery } from '../usb-query';
import { buildTopology } from '../usb-topology';
import { formatDeviceTable, formatUsbTree, getDeviceClassName, getDeviceTable } from '../usb-tree';
import { deviceDescriptor, keyboardConfiguration, makeDevice, rawDevice } from './fixtures';

const HUB = { base: 9, sub: 0, protocol: 1 };

function sampleTree() {
    return buildTopology([
        makeDevice(1, [], { name: 'Root Hub', classCode: HUB }),
        makeDevice(1, [1], { name: 'Hub', vendorId: 0x05e3, productId: 0x0610, classCode: HUB, driver: 'hub' }),
        makeDevice(1, [1, 2], { name: 'Keyboard', vendorId: 0x046d, productId: 0xc31c, driver: 'usbhid' }),
        makeDevice(1, [1, 4], { name: 'Drive', vendorId: 0x0781, productId: 0x5581, serial: 'ABC123', driver: 'usb-storage' }),
        makeDevice(1, [2], { name: 'Webcam', provisional: true }),
    ], [
        { id: 1, name: 'xHCI Host Controller', hostController: { vendorId: 0x8086, deviceId: 0xa36d }, hostControllerDriver: 'xhci_hcd' },
        { id: 2 },
    ]).tree;
}

describe('formatUsbTree', () => {
    it('draws buses and hubs with branch connectors', () => {
        expect(formatUsbTree(sampleTree())).toEqual([
            'USB Device Tree',
            'Connected Devices: 4',
            '',
            '\\---Bus 1: xHCI Host Controller [8086:a36d xhci_hcd] - Root Hub',
            '    |--[1-1]: Hub (05e3:0610) <hub>',
            '    |   |--[1-1.2]: Keyboard (046d:c31c) <usbhid>',
            '    |   \\--[1-1.4]: Drive (0781:5581) [S/N: ABC123] <usb-storage>',
            '    \\--[1-2]: Webcam (provisional)',
            '',
            '\\---Bus 2',
            '',
        ]);
    });

    it('lists grouped query results per bus', () => {
        expect(formatUsbTree(applyQuery(sampleTree(), { filter: { name: 'r' }, group: 'bus' }))).toEqual([
            'USB Devices by Bus',
            'Connected Devices: 3',
            '',
            'Bus 1: xHCI Host Controller [8086:a36d xhci_hcd]',
            '    [1-1]: Hub (05e3:0610) <hub>',
            '    [1-1.2]: Keyboard (046d:c31c) <usbhid>',
            '    [1-1.4]: Drive (0781:5581) [S/N: ABC123] <usb-storage>',
            '',
            'Bus 2',
            '',
        ]);
    });
});

describe('device table', () => {
    it('collects rows depth-first without the root hub', () => {
        const rows = getDeviceTable(sampleTree());
        expect(rows.map((row) => row.portPath)).toEqual(['1-1', '1-1.2', '1-1.4', '1-2']);
        expect(rows[0]).toEqual({
            vidPid: '05e3:0610',
            name: 'Hub',
            className: 'Hub',
            serial: '',
            driver: 'hub',
            portPath: '1-1',
            isHub: true,
        });
    });

    it('pads columns and marks hubs', () => {
        const lines = formatDeviceTable(getDeviceTable(sampleTree()));
        expect(lines).toHaveLength(6);
        expect(lines[1]).toBe('-'.repeat(132));
        expect(lines[2]).toBe(`05e3:0610  | ${'Hub'.padEnd(40)} | ${'Hub'.padEnd(24)} | ${'-'.padEnd(16)} | ${'hub'.padEnd(16)} | 1-1 [HUB]`);
        expect(lines[4]).toBe(`0781:5581  | ${'Drive'.padEnd(40)} | ${'-'.padEnd(24)} | ${'ABC123'.padEnd(16)} | ${'usb-storage'.padEnd(16)} | 1-1.4`);
        expect(lines[5]).toBe(`${'-'.padEnd(10)} | ${'Webcam'.padEnd(40)} | ${'-'.padEnd(24)} | ${'-'.padEnd(16)} | ${'-'.padEnd(16)} | 1-2`);
    });
});

describe('getDeviceClassName', () => {
    it('names the device class, or the first interface class when the device defers to its interfaces', () => {
        const keyboard = createDeviceRecord(rawDevice(1, [3], {
            descriptors: Uint8Array.from([
                ...deviceDescriptor({ vendorId: 0x046d, productId: 0xc31c }),
                ...keyboardConfiguration(),
            ]),
        }), 'sysfs').device;

        expect(getDeviceClassName(keyboard)).toBe('Human Interface Device');
        expect(getDeviceClassName(makeDevice(1, [1], { classCode: { base: 9, sub: 0, protocol: 1 } }))).toBe('Hub');
        expect(getDeviceClassName(makeDevice(1, [2], { classCode: { base: 0x42, sub: 0, protocol: 0 } }))).toBe('Undefined');
        expect(getDeviceClassName(makeDevice(1, [4]))).toBeUndefined();
    });
});
