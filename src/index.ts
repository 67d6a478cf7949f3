/**
 * USB Topology Profiler - Main Entry Point
 * Library exports plus the `usb-profile` command line
 */

import { readFileSync } from 'fs';
import { parseArgs } from 'util';
import { createBackend } from './backends/usb-backend';
import { BACKEND_IDS, UsbTree } from './usb-common';
import { Config, loadConfig } from './usb-config';
import { ProfilerError, formatDiagnostic } from './usb-errors';
import { logError, logger } from './usb-logger';
import { profileWithTimeout } from './usb-profiler';
import {
    DeviceFilter,
    Query,
    applyQuery,
    parseBusDeviceFilter,
    parseClassFilter,
    parseGroupKey,
    parseSortKey,
    parseVidPidFilter,
} from './usb-query';
import { deserializeTree, serializeTree } from './usb-serialize';
import { formatDeviceTable, formatUsbTree, getDeviceTable } from './usb-tree';

export * from './usb-common';
export * from './usb-errors';
export * from './usb-bytes';
export * from './usb-port-path';
export * from './usb-class-codes';
export * from './usb-descriptors';
export * from './usb-class-descriptors';
export * from './usb-bos';
export * from './usb-hid-report';
export * from './usb-device-record';
export * from './usb-topology';
export * from './usb-reconcile';
export * from './usb-query';
export * from './usb-serialize';
export * from './usb-profiler';
export * from './usb-tree';
export { loadConfig, getConfig, defaultBackends } from './usb-config';
export type { Config, ProvisionalMatchMode, LogLevel } from './usb-config';
export { createBackend } from './backends/usb-backend';
export type { UsbBackend } from './backends/usb-backend';
export { parseSystemProfilerJson, parseLocationId } from './backends/usb-backend-system-profiler';
export { parsePnputilOutput } from './backends/usb-backend-pnputil';

const USAGE = `Usage: usb-profile [options]

  -d, --vidpid <vid[:pid]>   only devices with this vendor/product id (hex)
  -s, --show <[bus:]devnum>  only devices with this bus and/or device number
      --name <text>          only devices whose name contains text
      --serial <text>        only devices whose serial contains text
      --class <name>         only devices with this class (e.g. hid, mass-storage)
      --hide-empty           drop hubs and buses left without devices
      --sort <key>           device-number | branch-position | no-sort
      --group <key>          no-group | bus
      --backend <ids>        comma list of backends (${BACKEND_IDS.join(', ')})
      --timeout <ms>         abort the pass after ms milliseconds
      --from <file>          render a tree previously written with --json
      --json                 print the tree as JSON
      --table                print a device table instead of the tree
  -h, --help                 show this help`;

function buildQuery(values: {
    vidpid?: string;
    show?: string;
    name?: string;
    serial?: string;
    class?: string;
    'hide-empty'?: boolean;
    sort?: string;
    group?: string;
}): Query {
    const filter: DeviceFilter = {};
    if (values.vidpid) filter.vidPid = parseVidPidFilter(values.vidpid);
    if (values.show) filter.busDevice = parseBusDeviceFilter(values.show);
    if (values.name !== undefined) filter.name = values.name;
    if (values.serial !== undefined) filter.serial = values.serial;
    if (values.class) filter.classCode = parseClassFilter(values.class);
    if (values['hide-empty']) filter.hideEmptyBranches = true;

    const query: Query = { filter };
    if (values.sort) query.sort = parseSortKey(values.sort);
    if (values.group) query.group = parseGroupKey(values.group);
    return query;
}

async function main(): Promise<void> {
    const { values } = parseArgs({
        options: {
            vidpid: { type: 'string', short: 'd' },
            show: { type: 'string', short: 's' },
            name: { type: 'string' },
            serial: { type: 'string' },
            class: { type: 'string' },
            'hide-empty': { type: 'boolean' },
            sort: { type: 'string' },
            group: { type: 'string' },
            backend: { type: 'string' },
            timeout: { type: 'string' },
            from: { type: 'string' },
            json: { type: 'boolean' },
            table: { type: 'boolean' },
            help: { type: 'boolean', short: 'h' },
        },
    });

    if (values.help) {
        console.log(USAGE);
        return;
    }

    const env = { ...process.env };
    if (values.backend) env['USB_PROFILER_BACKENDS'] = values.backend;
    if (values.timeout) env['USB_PROFILER_TIMEOUT_MS'] = values.timeout;
    const config: Config = loadConfig(env);
    const query = buildQuery(values);

    let tree: UsbTree;
    if (values.from) {
        tree = deserializeTree(JSON.parse(readFileSync(values.from, 'utf8')));
    } else {
        const result = await profileWithTimeout({
            config,
            backends: config.backends.map((id) => createBackend(id, config)),
        }, config.timeoutMs);
        for (const diagnostic of result.diagnostics) {
            logger.debug(formatDiagnostic(diagnostic));
        }
        tree = result.tree;
    }

    const result = applyQuery(tree, query);

    if (values.json || values.table) {
        const ungrouped = result.kind === 'tree' ? result : applyQuery(tree, { ...query, group: 'no-group' });
        if (ungrouped.kind !== 'tree') {
            return;
        }
        const lines = values.json
            ? [JSON.stringify(serializeTree(ungrouped.tree), null, 2)]
            : formatDeviceTable(getDeviceTable(ungrouped.tree));
        for (const line of lines) {
            console.log(line);
        }
        return;
    }

    for (const line of formatUsbTree(result)) {
        console.log(line);
    }
}

// Run if executed directly
if (require.main === module) {
    main().catch((error: unknown) => {
        const err = error instanceof Error ? error : new Error(String(error));
        logError(err, error instanceof ProfilerError ? { code: error.code, attemptedBackends: error.attemptedBackends } : undefined);
        console.error(`usb-profile: ${err.message}`);
        process.exit(1);
    });
}
