import { describe, expect, it } from 'vitest';
import { toHex } from '../usb-bytes';
import { createDeviceRecord } from '../usb-device-record';
import { ProfilerError } from '../usb-errors';
import { deserializeTree, serializeTree } from '../usb-serialize';
import { buildTopology } from '../usb-topology';
import {
    deviceDescriptor,
    hubDescriptor,
    keyboardConfiguration,
    makeDevice,
    rawDevice,
    stringDescriptor,
} from './fixtures';

function sampleTree() {
    const hub = createDeviceRecord(rawDevice(1, [1], {
        address: 2,
        descriptors: Uint8Array.from([
            ...deviceDescriptor({ usbVersion: 0x0210, classCode: [9, 0, 1], vendorId: 0x05e3, productId: 0x0610, productIndex: 1 }),
            ...keyboardConfiguration(),
        ]),
        strings: [{ index: 1, bytes: Uint8Array.from(stringDescriptor('USB2.1 Hub')) }],
        hubDescriptor: Uint8Array.from(hubDescriptor()),
        bos: Uint8Array.from([5, 0x0f, 12, 0, 1, 7, 0x10, 0x02, 0x06, 0x00, 0x00, 0x00]),
        hidReports: [{ interfaceNumber: 0, bytes: Uint8Array.from([0x05, 0x01, 0xc0]) }],
        speed: 'high',
    }), 'sysfs').device;
    return buildTopology([
        makeDevice(1, [], { name: 'Root Hub' }),
        hub,
        makeDevice(1, [1, 2], { name: 'Mouse', serial: 'M-1', fieldSources: { serial: 'pnputil' } }),
    ], [{ id: 1, name: 'xHCI Host Controller', hostController: { vendorId: 0x8086, deviceId: 0xa36d } }]).tree;
}

describe('serializeTree', () => {
    it('omits unknown fields and keeps descriptor bytes as hex', () => {
        const json = serializeTree(sampleTree());
        const bus = json.buses[0];

        expect(bus.hostController).toEqual({ vendorId: 0x8086, deviceId: 0xa36d });
        expect(bus.rootHub).toEqual({
            bus: 1,
            portPath: [],
            name: 'Root Hub',
            configurations: [],
            provenance: [{ backend: 'sysfs', completeness: 'full' }],
            children: [],
        });

        const hub = bus.devices[0];
        expect(hub.name).toBe('USB2.1 Hub');
        expect(hub.knownAbsent).toEqual(['manufacturer', 'serial']);
        expect('serial' in hub).toBe(false);
        expect(hub.configurations[0].raw).toBe(toHex(Uint8Array.from(keyboardConfiguration())));
        expect(hub.configurations[0].interfaces[0].descriptors).toEqual([{
            kind: 'hid',
            hidVersion: 0x0111,
            countryCode: 0,
            reports: [{ descriptorType: 0x22, length: 63 }],
            bytes: '092111010001223f00',
        }]);
        expect(hub.configurations[0].interfaces[0].endpoints[0]).toEqual({
            address: 0x81,
            number: 1,
            direction: 'in',
            transferType: 'interrupt',
            maxPacketSize: 8,
            transactionsPerMicroframe: 1,
            interval: 10,
        });
        expect(hub.hub?.['bytes']).toBe('0929040900326404ff');
        expect(hub.children[0]).toMatchObject({ name: 'Mouse', serial: 'M-1', fieldSources: { serial: 'pnputil' }, branchPosition: 0 });
    });
});

describe('deserializeTree', () => {
    it('rebuilds an equivalent tree from JSON text', () => {
        const original = sampleTree();
        const first = serializeTree(original);
        const restored = deserializeTree(JSON.parse(JSON.stringify(first)));

        expect(serializeTree(restored)).toEqual(first);
        expect(Array.from(restored.allDevices.keys())).toEqual(['1-0', '1-1', '1-1.2']);

        const hub = restored.allDevices.get('1-1');
        expect(hub?.configurations).toEqual(original.allDevices.get('1-1')?.configurations);
        expect(hub?.hub?.portRemovable).toEqual([true, false, true, true]);
        expect(hub?.bos?.capabilities[0]).toMatchObject({ kind: 'usb2-extension', lpm: true });
        expect(hub?.hidReports?.[0].interfaceNumber).toBe(0);
    });

    it('keeps a BOS whose total length is shorter than its header', () => {
        const record = createDeviceRecord(rawDevice(1, [1], { bos: Uint8Array.from([5, 0x0f, 3, 0, 0]) }), 'libusb');
        expect(record.diagnostics).toEqual([expect.objectContaining({
            kind: 'MalformedDescriptor',
            message: 'wTotalLength 3 is shorter than the BOS header',
            offset: 2,
        })]);

        const first = serializeTree(buildTopology([record.device]).tree);
        expect(first.buses[0].devices[0].bos?.['bytes']).toBe('050f030000');

        const restored = deserializeTree(JSON.parse(JSON.stringify(first)));
        expect(serializeTree(restored)).toEqual(first);
        expect(restored.allDevices.get('1-1')?.bos?.totalLength).toBe(3);
    });

    function expectInvalid(json: unknown, message: string): void {
        try {
            deserializeTree(json);
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(ProfilerError);
            expect(error instanceof ProfilerError && error.code).toBe('INVALID_SERIALIZED_TREE');
            expect(error instanceof Error && error.message).toBe(message);
        }
    }

    const device = (fields: Record<string, unknown>) => ({
        bus: 1,
        portPath: [1],
        name: 'Widget',
        configurations: [],
        provenance: [{ backend: 'sysfs', completeness: 'full' }],
        children: [],
        ...fields,
    });

    it('rejects a document of the wrong shape', () => {
        expectInvalid({ buses: [{ id: 1 }] }, 'Serialized tree validation failed: buses.0.devices: Required');
    });

    it('rejects configuration bytes that do not decode', () => {
        expectInvalid(
            { buses: [{ id: 1, devices: [device({ configurations: [{ raw: '0902', interfaces: [] }] })] }] },
            'device 1-1 configuration 0: descriptor 0x02 at offset 0 needs 9 bytes, got 2',
        );
    });

    it('rejects field sources for fields that are never merged', () => {
        expectInvalid(
            { buses: [{ id: 1, devices: [device({ fieldSources: { color: 'sysfs' } })] }] },
            "unknown field source 'color'",
        );
    });
});
