import { describe, expect, it } from 'vitest';
import { decodeBos, WEBUSB_PLATFORM_UUID } from '../usb-bos';
import { formatBcdVersion, formatUuid, parseBcdVersion } from '../usb-bytes';
import { classFromKey, formatClassCode, resolveClassCode } from '../usb-class-codes';
import { decodeHubDescriptor, decodeSubDescriptor } from '../usb-class-descriptors';
import {
    decodeConfiguration,
    decodeDescriptor,
    decodeDeviceDescriptor,
    decodeEndpointDescriptor,
    decodeStringDescriptor,
    encodeConfiguration,
    encodeDeviceDescriptor,
    formatMaxPacketSize,
    splitDescriptorBlob,
} from '../usb-descriptors';
import { decodeHidReport } from '../usb-hid-report';
import {
    configurationHeader,
    deviceDescriptor,
    endpointDescriptor,
    hubDescriptor,
    interfaceDescriptor,
    keyboardConfiguration,
} from './fixtures';

const bytes = (values: number[]): Uint8Array => Uint8Array.from(values);

describe('device descriptor', () => {
    it('decodes identity, version and string indexes', () => {
        const raw = deviceDescriptor({
            vendorId: 0x1d6b,
            productId: 0x0002,
            deviceVersion: 0x0515,
            manufacturerIndex: 3,
            productIndex: 2,
            serialIndex: 1,
        });
        const result = decodeDeviceDescriptor(bytes(raw));

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value).toEqual({
            kind: 'device',
            length: 18,
            usbVersion: 0x0200,
            classCode: { base: 0, sub: 0, protocol: 0 },
            maxPacketSize0: 64,
            vendorId: 0x1d6b,
            productId: 0x0002,
            deviceVersion: 0x0515,
            manufacturerIndex: 3,
            productIndex: 2,
            serialIndex: 1,
            numConfigurations: 1,
        });
        const { kind, length, ...fields } = result.value;
        expect(kind).toBe('device');
        expect(length).toBe(18);
        expect(Array.from(encodeDeviceDescriptor(fields))).toEqual(raw);
    });

    it('reports a truncated descriptor instead of throwing', () => {
        const raw = deviceDescriptor({ vendorId: 0x046d, productId: 0xc52b }).slice(0, 10);
        const result = decodeDeviceDescriptor(bytes(raw));

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error).toMatchObject({
            kind: 'TruncatedDescriptor',
            descriptorType: 1,
            expectedLength: 18,
            actualLength: 10,
        });
    });

    it('rejects a descriptor of the wrong type', () => {
        const result = decodeDescriptor(bytes([9, 0x02, 9, 0, 0, 1, 0, 0x80, 50]), 'device');
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe('MalformedDescriptor');
    });
});

describe('configuration descriptor', () => {
    it('decodes interfaces, class descriptors and endpoints', () => {
        const result = decodeConfiguration(bytes(keyboardConfiguration()));

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.truncated).toBe(false);
        expect(result.warnings).toEqual([]);

        const config = result.value;
        expect(config.totalLength).toBe(64);
        expect(config.remoteWakeup).toBe(true);
        expect(config.selfPowered).toBe(false);
        expect(config.maxPowerMa).toBe(100);
        expect(config.interfaces.map((iface) => iface.number)).toEqual([0, 1]);
        expect(config.interfaces[0].classCode).toEqual({ base: 3, sub: 1, protocol: 1 });
        expect(config.interfaces[0].descriptors).toHaveLength(1);
        expect(config.interfaces[0].descriptors[0]).toMatchObject({
            kind: 'hid',
            hidVersion: 0x0111,
            countryCode: 0,
            reports: [{ descriptorType: 0x22, length: 63 }],
        });
        expect(config.interfaces[0].endpoints.map((ep) => ep.address)).toEqual([0x81, 0x01]);
        expect(config.interfaces[1].endpoints.map((ep) => ep.maxPacketSize)).toEqual([64, 64]);
    });

    it('keeps everything before a descriptor that runs past the supplied bytes', () => {
        const result = decodeConfiguration(bytes(keyboardConfiguration().slice(0, 40)));

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.truncated).toBe(true);
        expect(result.value.interfaces).toHaveLength(1);
        expect(result.value.interfaces[0].descriptors.map((d) => d.kind)).toEqual(['hid']);
        expect(result.value.interfaces[0].endpoints.map((ep) => ep.address)).toEqual([0x81]);
        expect(result.warnings).toHaveLength(1);
        expect(result.warnings[0]).toMatchObject({
            kind: 'TruncatedDescriptor',
            descriptorType: 5,
            offset: 34,
            expectedLength: 7,
            actualLength: 6,
        });
    });

    it('re-encodes to the exact input bytes', () => {
        const raw = keyboardConfiguration();
        const result = decodeConfiguration(bytes(raw));
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(Array.from(encodeConfiguration(result.value))).toEqual(raw);
    });

    it('re-encodes vendor bytes and unknown descriptors untouched', () => {
        const raw = [
            ...configurationHeader(9 + 9 + 5 + 7, 1, 0xc0, 0),
            ...interfaceDescriptor(0, 1, [0xff, 0x42, 0x01]),
            5, 0x41, 0xde, 0xad, 0xbe,
            ...endpointDescriptor(0x81, 0x02, 512, 0),
        ];
        const result = decodeConfiguration(bytes(raw));
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.selfPowered).toBe(true);
        expect(result.value.interfaces[0].descriptors).toEqual([
            { kind: 'opaque', descriptorType: 0x41, bytes: bytes([5, 0x41, 0xde, 0xad, 0xbe]) },
        ]);
        expect(Array.from(encodeConfiguration(result.value))).toEqual(raw);
    });

    it('uses the 8 mA power unit for SuperSpeed devices', () => {
        const result = decodeConfiguration(bytes(configurationHeader(9, 0, 0x80, 50)), { usbVersion: 0x0310 });
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.maxPowerMa).toBe(400);
    });

    it('attaches an interface association descriptor to the following interface', () => {
        const iad = [8, 0x0b, 0, 2, 0x0e, 0x03, 0x00, 4];
        const raw = [
            ...configurationHeader(9 + 8 + 9 + 9, 2),
            ...iad,
            ...interfaceDescriptor(0, 0, [0x0e, 0x01, 0x00]),
            ...interfaceDescriptor(1, 0, [0x0e, 0x02, 0x00]),
        ];
        const result = decodeConfiguration(bytes(raw));
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.interfaces[0].leading).toEqual([{
            kind: 'interface-association',
            firstInterface: 0,
            interfaceCount: 2,
            classCode: { base: 0x0e, sub: 0x03, protocol: 0 },
            functionIndex: 4,
            bytes: bytes(iad),
        }]);
        expect(Array.from(encodeConfiguration(result.value))).toEqual(raw);
    });
});

describe('endpoint descriptor', () => {
    it('splits packet size and transactions per microframe', () => {
        const result = decodeEndpointDescriptor(bytes([7, 0x05, 0x83, 0x05, 0x00, 0x14, 1]));
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        const endpoint = result.value;
        expect(endpoint.number).toBe(3);
        expect(endpoint.direction).toBe('in');
        expect(endpoint.transferType).toBe('isochronous');
        expect(endpoint.syncType).toBe('asynchronous');
        expect(endpoint.usageType).toBe('data');
        expect(endpoint.maxPacketSize).toBe(1024);
        expect(endpoint.transactionsPerMicroframe).toBe(3);
        expect(formatMaxPacketSize(endpoint)).toBe('3x 1024');
    });

    it('leaves sync and usage unset for non-isochronous endpoints', () => {
        const result = decodeEndpointDescriptor(bytes(endpointDescriptor(0x02, 0x02, 512, 0)));
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.direction).toBe('out');
        expect(result.value.transferType).toBe('bulk');
        expect(result.value.syncType).toBeUndefined();
        expect(result.value.usageType).toBeUndefined();
    });
});

describe('string descriptor', () => {
    it('decodes UTF-16LE text', () => {
        const result = decodeStringDescriptor(bytes([6, 0x03, 0x48, 0x00, 0x69, 0x00]), 1);
        expect(result.ok && result.value).toEqual({ kind: 'string', text: 'Hi' });
    });

    it('decodes string zero as a language list', () => {
        const result = decodeStringDescriptor(bytes([4, 0x03, 0x09, 0x04]), 0);
        expect(result.ok && result.value).toEqual({ kind: 'languages', languageIds: [0x0409] });
    });
});

describe('descriptor blob', () => {
    it('splits the device descriptor from each configuration block', () => {
        const blob = [...deviceDescriptor({ vendorId: 0x046d, productId: 0xc31c }), ...keyboardConfiguration()];
        const { device, configurations } = splitDescriptorBlob(bytes(blob));
        expect(device.ok && device.value.vendorId).toBe(0x046d);
        expect(configurations).toHaveLength(1);
        expect(configurations[0].ok && configurations[0].value.interfaces).toHaveLength(2);
    });

    it('decodes a short trailing block as truncated', () => {
        const blob = [...deviceDescriptor({ vendorId: 0x046d, productId: 0xc31c }), ...keyboardConfiguration().slice(0, 40)];
        const { configurations } = splitDescriptorBlob(bytes(blob));
        expect(configurations).toHaveLength(1);
        expect(configurations[0].ok && configurations[0].truncated).toBe(true);
    });
});

describe('class-specific descriptors', () => {
    it('decodes a CDC union descriptor inside a communications interface', () => {
        const { descriptor, warnings } = decodeSubDescriptor(bytes([5, 0x24, 0x06, 0, 1]), {
            interfaceClass: { base: 0x02, sub: 0x02, protocol: 0x01 },
            offset: 18,
        });
        expect(warnings).toEqual([]);
        expect(descriptor).toMatchObject({
            kind: 'cdc',
            subtype: 6,
            subtypeName: 'Union',
            detail: { kind: 'union', controlInterface: 0, subordinateInterfaces: [1] },
        });
    });

    it('keeps a too-short class descriptor as opaque with a warning', () => {
        const { descriptor, warnings } = decodeSubDescriptor(bytes([4, 0x24, 0x00, 0x10]), {
            interfaceClass: { base: 0x02, sub: 0x02, protocol: 0x01 },
            offset: 27,
        });
        expect(descriptor).toEqual({ kind: 'opaque', descriptorType: 0x24, bytes: bytes([4, 0x24, 0x00, 0x10]) });
        expect(warnings).toEqual([expect.objectContaining({ kind: 'TruncatedDescriptor', offset: 27, expectedLength: 5 })]);
    });

    it('decodes a USB 2 hub descriptor', () => {
        const result = decodeHubDescriptor(bytes(hubDescriptor()));
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value).toMatchObject({
            kind: 'hub',
            superSpeed: false,
            numPorts: 4,
            powerSwitching: 'per-port',
            compound: false,
            overCurrent: 'per-port',
            ttThinkTime: 8,
            portIndicators: false,
            powerOnToPowerGoodMs: 100,
            controllerCurrentMa: 100,
            portRemovable: [true, false, true, true],
        });
    });

    it('decodes BOS capabilities and recognises WebUSB', () => {
        const usb2Extension = [7, 0x10, 0x02, 0x06, 0x00, 0x00, 0x00];
        const webUsb = [
            24, 0x10, 0x05, 0x00,
            0x38, 0xb6, 0x08, 0x34, 0xa9, 0x09, 0xa0, 0x47, 0x8b, 0xfd, 0xa0, 0x76, 0x88, 0x15, 0xb6, 0x65,
            0x00, 0x01, 0x01, 0x01,
        ];
        const raw = [5, 0x0f, 36, 0, 2, ...usb2Extension, ...webUsb];
        const result = decodeBos(bytes(raw));

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.warnings).toEqual([]);
        expect(result.value.capabilities[0]).toMatchObject({ kind: 'usb2-extension', lpm: true, besl: true });
        expect(result.value.capabilities[1]).toMatchObject({
            kind: 'platform',
            uuid: WEBUSB_PLATFORM_UUID,
            platformName: 'WebUSB',
            webUsb: { version: 0x0100, vendorCode: 1, landingPageIndex: 1 },
        });
    });

    it('warns when the BOS capability count does not match', () => {
        const result = decodeBos(bytes([5, 0x0f, 12, 0, 2, 7, 0x10, 0x02, 0x02, 0x00, 0x00, 0x00]));
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.capabilities).toHaveLength(1);
        expect(result.warnings.map((w) => w.kind)).toEqual(['MalformedDescriptor']);
    });
});

describe('HID report descriptor', () => {
    it('tokenizes short items', () => {
        const raw = [0x05, 0x01, 0x09, 0x06, 0xa1, 0x01, 0x26, 0xff, 0x00, 0xc0];
        const result = decodeHidReport(bytes(raw), 0);

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.interfaceNumber).toBe(0);
        expect(result.value.items.map(({ type, name, size, value }) => ({ type, name, size, value }))).toEqual([
            { type: 'global', name: 'Usage Page', size: 1, value: 1 },
            { type: 'local', name: 'Usage', size: 1, value: 6 },
            { type: 'main', name: 'Collection', size: 1, value: 1 },
            { type: 'global', name: 'Logical Maximum', size: 2, value: 255 },
            { type: 'main', name: 'End Collection', size: 0, value: 0 },
        ]);
    });

    it('stops at an item whose payload is missing', () => {
        const result = decodeHidReport(bytes([0x09, 0x02, 0x05]));
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.truncated).toBe(true);
        expect(result.value.items).toHaveLength(1);
        expect(result.warnings[0]).toMatchObject({ kind: 'TruncatedDescriptor', offset: 2, expectedLength: 2, actualLength: 1 });
    });
});

describe('class codes', () => {
    it('resolves known triplets to names', () => {
        expect(resolveClassCode({ base: 9, sub: 0, protocol: 2 })).toEqual({
            base: 'Hub',
            subclass: 'Unused',
            protocol: 'TT per port',
        });
    });

    it('falls back for vendor-specific and unknown values', () => {
        expect(resolveClassCode({ base: 0xff, sub: 0x42, protocol: 0x01 })).toEqual({
            base: 'Vendor Specific',
            subclass: 'Vendor Specific',
            protocol: 'Vendor Specific',
        });
        expect(resolveClassCode({ base: 9, sub: 7, protocol: 0 }).subclass).toBe('Undefined');
    });

    it('formats triplets and maps symbolic keys', () => {
        expect(formatClassCode({ base: 9, sub: 0, protocol: 2 })).toBe('09/00/02');
        expect(classFromKey('Mass-Storage')).toBe(8);
        expect(classFromKey('no-such-class')).toBeUndefined();
    });
});

describe('byte helpers', () => {
    it('formats and parses BCD versions', () => {
        expect(formatBcdVersion(0x0210)).toBe('2.10');
        expect(formatBcdVersion(0x0100)).toBe('1.00');
        expect(parseBcdVersion('2.10')).toBe(0x0210);
        expect(parseBcdVersion('1.0')).toBe(0x0100);
        expect(parseBcdVersion('v2')).toBeUndefined();
    });

    it('formats a little-endian GUID', () => {
        const guid = bytes([0x38, 0xb6, 0x08, 0x34, 0xa9, 0x09, 0xa0, 0x47, 0x8b, 0xfd, 0xa0, 0x76, 0x88, 0x15, 0xb6, 0x65]);
        expect(formatUuid(guid, 0)).toBe(WEBUSB_PLATFORM_UUID);
    });
});
