/**
 * Profiling pass: enumerate -> decode -> per-backend topology -> reconcile
 *
 * Backends run one after another; reconciliation only starts once every
 * backend has either produced its report or been recorded as unavailable.
 */

import { UsbBackend, createBackend } from './backends/usb-backend';
import { BackendId, UsbTree } from './usb-common';
import { Config, getConfig } from './usb-config';
import { BackendUnavailableDiagnostic, Diagnostic, ProfilerError, errorMessage } from './usb-errors';
import { BackendReport, createDeviceRecord } from './usb-device-record';
import { logDiagnostics, profilerLogger } from './usb-logger';
import { BackendTree, reconcile } from './usb-reconcile';
import { buildTopology } from './usb-topology';

export interface ProfileOptions {
    config?: Config;
    backends?: UsbBackend[];       // overrides the configured backend list
}

export interface ProfileResult {
    tree: UsbTree;
    diagnostics: Diagnostic[];
    backends: {
        attempted: BackendId[];
        succeeded: BackendId[];
    };
}

// A device left detached by its own backend is detached again in the canonical rebuild
function danglingKey(diagnostic: Diagnostic): string | undefined {
    return diagnostic.kind === 'DanglingPortPath' ? `${diagnostic.device ?? ''}|${diagnostic.reason}` : undefined;
}

/**
 * Decode one backend report and build its tree
 */
export function buildBackendTree(report: BackendReport): { tree: BackendTree; diagnostics: Diagnostic[] } {
    const diagnostics: Diagnostic[] = [];
    const devices = report.devices.map((raw) => {
        const record = createDeviceRecord(raw, report.backend);
        diagnostics.push(...record.diagnostics);
        return record.device;
    });
    const topology = buildTopology(devices, report.buses);
    diagnostics.push(...topology.diagnostics.map((diagnostic) => ({ ...diagnostic, backend: report.backend })));
    return { tree: { backend: report.backend, tree: topology.tree }, diagnostics };
}

/**
 * Run one profiling pass
 */
export async function profile(options: ProfileOptions = {}): Promise<ProfileResult> {
    const config = options.config ?? getConfig();
    const backends = options.backends ?? config.backends.map((id) => createBackend(id, config));

    const diagnostics: Diagnostic[] = [];
    const trees: BackendTree[] = [];
    const attempted: BackendId[] = [];
    const succeeded: BackendId[] = [];

    for (const backend of backends) {
        attempted.push(backend.id);
        let report: BackendReport;
        try {
            report = await backend.enumerate();
        } catch (error) {
            const unavailable: BackendUnavailableDiagnostic = {
                kind: 'BackendUnavailable',
                message: `${backend.id} backend unavailable: ${errorMessage(error)}`,
                backend: backend.id,
            };
            logDiagnostics(profilerLogger, [unavailable]);
            diagnostics.push(unavailable);
            continue;
        }
        succeeded.push(backend.id);
        const built = buildBackendTree({ ...report, backend: backend.id });
        trees.push(built.tree);
        diagnostics.push(...built.diagnostics);
    }

    if (trees.length === 0) {
        throw new ProfilerError('NO_USABLE_BACKEND', `No backend could enumerate (attempted: ${attempted.join(', ') || 'none'})`, {
            attemptedBackends: attempted,
        });
    }

    const reconciled = reconcile(trees, { provisionalMatch: config.provisionalMatch });
    const reported = new Set(diagnostics.map(danglingKey).filter((key) => key !== undefined));
    diagnostics.push(...reconciled.diagnostics.filter((diagnostic) => {
        const key = danglingKey(diagnostic);
        return key === undefined || !reported.has(key);
    }));
    profilerLogger.info({
        attempted,
        succeeded,
        devices: reconciled.tree.allDevices.size,
        diagnostics: diagnostics.length,
    }, 'profiling pass complete');

    return { tree: reconciled.tree, diagnostics, backends: { attempted, succeeded } };
}

/**
 * Run a pass that rejects with PROFILE_TIMEOUT after `timeoutMs`; 0 disables the limit
 */
export async function profileWithTimeout(options: ProfileOptions, timeoutMs: number): Promise<ProfileResult> {
    if (timeoutMs <= 0) {
        return profile(options);
    }
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            reject(new ProfilerError('PROFILE_TIMEOUT', `Profiling pass exceeded ${timeoutMs} ms`));
        }, timeoutMs);
    });
    try {
        return await Promise.race([profile(options), timeout]);
    } finally {
        clearTimeout(timer);
    }
}
