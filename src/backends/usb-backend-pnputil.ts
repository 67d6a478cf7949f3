/**
 * Windows backend: connected USB devices from pnputil and the registry
 *
 * A PowerShell script lists every connected device node with its parent and
 * "Port_#" location; walking the parent chain up to a root hub gives the port
 * path. Root hubs are numbered as buses in discovery order.
 */

import { execSync } from 'child_process';
import { unlinkSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { HUB_CLASS } from '../usb-class-codes';
import { BackendId } from '../usb-common';
import { errorMessage } from '../usb-errors';
import { BackendReport, RawBusReport, RawDeviceReport, RawIdentity } from '../usb-device-record';
import { backendLogger } from '../usb-logger';
import type { UsbBackend } from './usb-backend';

const log = backendLogger('pnputil');

const HUB_SERVICES = new Set(['usbhub', 'usbhub3']);

const PS_SCRIPT = `
$ErrorActionPreference = 'SilentlyContinue'

$connectedDevices = @{}
foreach ($class in @("USB", "USBDevice")) {
    $pnpOutput = pnputil /enum-devices /class $class /connected 2>$null
    foreach ($line in $pnpOutput -split "\`n") {
        if ($line -match "Instance ID:\\s*(.+)") {
            $connectedDevices[$matches[1].Trim().ToUpper()] = $true
        }
    }
}

$usbPath = "HKLM:\\SYSTEM\\CurrentControlSet\\Enum\\USB"

Get-ChildItem $usbPath | ForEach-Object {
    $vidPidKey = $_.PSChildName
    Get-ChildItem $_.PSPath | ForEach-Object {
        $instanceId = $_.PSChildName
        $props = Get-ItemProperty $_.PSPath
        $instancePath = "USB\\$vidPidKey\\$instanceId"

        if (-not $connectedDevices[$instancePath.ToUpper()]) { return }
        if ($vidPidKey -match "&MI_\\d+") { return }

        $parentPath = ""
        $pnpDevOutput = pnputil /enum-devices /instanceid "$instancePath" /relations 2>$null
        $parentLine = ($pnpDevOutput | Select-String "Parent:" | Select-Object -First 1)
        if ($parentLine) {
            $parentPath = ($parentLine -replace "^\\s*Parent:\\s*", "").Trim()
        }

        $portNumber = 0
        if ($props.LocationInformation -match "Port_#(\\d+)") {
            $portNumber = [int]$matches[1]
        }

        $vidVal = ""
        $pidVal = ""
        if ($vidPidKey -match "VID_([0-9A-Fa-f]{4})&PID_([0-9A-Fa-f]{4})") {
            $vidVal = $matches[1]
            $pidVal = $matches[2]
        } elseif ($vidPidKey -match "^ROOT_HUB") {
            $vidVal = "ROOT"
        }

        $name = if ($props.FriendlyName) { $props.FriendlyName } elseif ($props.DeviceDesc) { $props.DeviceDesc } else { $vidPidKey }

        Write-Output "DEVICE|$instancePath|$vidVal|$pidVal|$instanceId|$parentPath|$portNumber|$($props.Service)|$name"
    }
}
`;

export interface PnputilDevice {
    instancePath: string;
    vid: string;            // "ROOT" for root hubs
    pid: string;
    instanceId: string;
    parentPath: string | null;
    portNumber: number;     // 0 when the location is unknown
    service: string;
    name: string;
}

/**
 * Parse the script's "DEVICE|..." lines
 */
export function parseDeviceLines(output: string): PnputilDevice[] {
    const devices: PnputilDevice[] = [];
    for (const line of output.split('\n')) {
        const trimmed = line.trim();
        if (!trimmed.startsWith('DEVICE|')) {
            continue;
        }
        const parts = trimmed.split('|');
        if (parts.length < 9) {
            continue;
        }
        const [, instancePath, vid, pid, instanceId, parentPath, portNum, service, ...nameParts] = parts;
        devices.push({
            instancePath,
            vid: vid.toUpperCase(),
            pid: pid.toUpperCase(),
            instanceId,
            parentPath: parentPath && !parentPath.startsWith('PCI\\') ? parentPath : null,
            portNumber: parseInt(portNum, 10) || 0,
            service,
            name: nameParts.join('|'),
        });
    }
    return devices;
}

/**
 * Instance ids without '&' and of plausible length are the device's serial number
 */
export function serialFromInstanceId(instanceId: string): string | undefined {
    const looksLikeSerial = !instanceId.includes('&') && instanceId.length >= 4 && instanceId.length <= 32;
    return looksLikeSerial ? instanceId : undefined;
}

/**
 * Clean up inf-style names ("@usb.inf,%usb\\roothub%;USB Root Hub")
 */
export function cleanDeviceDescription(rawName: string): string | undefined {
    if (!rawName.startsWith('@')) {
        return rawName || undefined;
    }
    const lower = rawName.toLowerCase();
    if (lower.includes('roothub')) {
        return 'USB Root Hub';
    }
    if (lower.includes('hub')) {
        return 'USB Hub';
    }
    if (lower.includes('composite')) {
        return 'USB Composite Device';
    }
    return undefined;
}

function isRootHubEntry(device: PnputilDevice): boolean {
    return device.vid === 'ROOT';
}

/**
 * Turn parsed device lines into a backend report
 */
export function parsePnputilOutput(output: string): BackendReport {
    const entries = parseDeviceLines(output);
    const byPath = new Map<string, PnputilDevice>();
    for (const entry of entries) {
        byPath.set(entry.instancePath.toUpperCase(), entry);
    }

    const busOf = new Map<PnputilDevice, number>();
    const buses: RawBusReport[] = [];
    for (const entry of entries) {
        if (isRootHubEntry(entry)) {
            const id = buses.length + 1;
            busOf.set(entry, id);
            const bus: RawBusReport = { id };
            const name = cleanDeviceDescription(entry.name);
            if (name !== undefined) {
                bus.name = name;
            }
            buses.push(bus);
        }
    }

    const locate = (entry: PnputilDevice): { bus: number; portPath: number[] } | undefined => {
        const ports: number[] = [];
        const seen = new Set<PnputilDevice>();
        let current: PnputilDevice | undefined = entry;
        while (current && !seen.has(current)) {
            seen.add(current);
            const bus = busOf.get(current);
            if (bus !== undefined) {
                return { bus, portPath: ports.reverse() };
            }
            if (current.portNumber <= 0) {
                return undefined;
            }
            ports.push(current.portNumber);
            current = current.parentPath ? byPath.get(current.parentPath.toUpperCase()) : undefined;
        }
        return undefined;
    };

    const fallbackBus = buses.length > 0 ? buses[0].id : 0;
    const devices: RawDeviceReport[] = entries.map((entry) => {
        const location = locate(entry);
        if (!location) {
            log.debug({ instancePath: entry.instancePath, parentPath: entry.parentPath }, 'no route to a root hub');
        }
        const report: RawDeviceReport = { bus: location?.bus ?? fallbackBus };
        if (location) {
            report.portPath = location.portPath;
        }

        const identity: RawIdentity = {};
        if (/^[0-9A-F]{4}$/.test(entry.vid) && /^[0-9A-F]{4}$/.test(entry.pid)) {
            identity.vendorId = parseInt(entry.vid, 16);
            identity.productId = parseInt(entry.pid, 16);
        }
        const isHub = isRootHubEntry(entry) || HUB_SERVICES.has(entry.service.toLowerCase());
        if (isHub) {
            identity.classCode = { base: HUB_CLASS, sub: 0, protocol: 0 };
        }
        report.identity = identity;

        const product = cleanDeviceDescription(entry.name);
        if (product !== undefined) {
            report.product = product;
        }
        const serial = isRootHubEntry(entry) ? undefined : serialFromInstanceId(entry.instanceId);
        if (serial !== undefined) {
            report.serial = serial;
        }
        if (entry.service) {
            report.driver = entry.service;
        }
        return report;
    });

    return { backend: 'pnputil', buses, devices };
}

export class PnputilBackend implements UsbBackend {
    readonly id: BackendId = 'pnputil';

    async enumerate(): Promise<BackendReport> {
        const tmpFile = join(tmpdir(), `usb-profile-${Date.now()}.ps1`);
        writeFileSync(tmpFile, PS_SCRIPT);

        try {
            const output = execSync(
                `powershell -ExecutionPolicy Bypass -File "${tmpFile}"`,
                { encoding: 'utf8', maxBuffer: 10 * 1024 * 1024 }
            );
            const report = parsePnputilOutput(output);
            log.debug({ buses: report.buses.length, devices: report.devices.length }, 'pnputil enumerated');
            return report;
        } finally {
            try {
                unlinkSync(tmpFile);
            } catch (error) {
                log.warn({ tmpFile, error: errorMessage(error) }, 'could not remove script file');
            }
        }
    }
}
