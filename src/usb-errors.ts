/**
 * Diagnostics and errors
 *
 * Device-supplied bytes and backend inconsistencies never throw: they become
 * Diagnostic values carried next to the partial result. Only conditions that
 * leave nothing to return are raised as ProfilerError.
 */

import type { BackendId } from './usb-common';

interface DiagnosticBase {
    message: string;
    device?: string;           // port path or bus/address label of the affected device
    backend?: BackendId;
}

export interface TruncatedDescriptorDiagnostic extends DiagnosticBase {
    kind: 'TruncatedDescriptor';
    descriptorType: number;
    offset: number;
    expectedLength: number;
    actualLength: number;
}

export interface MalformedDescriptorDiagnostic extends DiagnosticBase {
    kind: 'MalformedDescriptor';
    descriptorType?: number;
    offset: number;
}

export type DanglingReason = 'missing-parent' | 'duplicate' | 'no-port-path';

export interface DanglingPortPathDiagnostic extends DiagnosticBase {
    kind: 'DanglingPortPath';
    bus: number;
    portPath?: number[];
    reason: DanglingReason;
}

export interface IdentityConflictDiagnostic extends DiagnosticBase {
    kind: 'IdentityConflict';
    field: 'vendorId' | 'productId';
    values: Array<{ backend: BackendId; value: number }>;
    chosen: BackendId;
}

export interface ProvisionalMatchDiagnostic extends DiagnosticBase {
    kind: 'ProvisionalMatch';
    backends: BackendId[];
    merged: boolean;
}

export interface BackendUnavailableDiagnostic extends DiagnosticBase {
    kind: 'BackendUnavailable';
    backend: BackendId;
}

export type Diagnostic =
    | TruncatedDescriptorDiagnostic
    | MalformedDescriptorDiagnostic
    | DanglingPortPathDiagnostic
    | IdentityConflictDiagnostic
    | ProvisionalMatchDiagnostic
    | BackendUnavailableDiagnostic;

export type DecodeFailure = TruncatedDescriptorDiagnostic | MalformedDescriptorDiagnostic;

export type DecodeResult<T> =
    | { ok: true; value: T; truncated: boolean; warnings: Diagnostic[] }
    | { ok: false; error: DecodeFailure };

export function decodeOk<T>(value: T, warnings: Diagnostic[] = [], truncated = false): DecodeResult<T> {
    return { ok: true, value, truncated, warnings };
}

export function decodeFailure<T>(error: DecodeFailure): DecodeResult<T> {
    return { ok: false, error };
}

export function truncated(descriptorType: number, offset: number, expectedLength: number, actualLength: number): TruncatedDescriptorDiagnostic {
    return {
        kind: 'TruncatedDescriptor',
        message: `descriptor 0x${descriptorType.toString(16).padStart(2, '0')} at offset ${offset} needs ${expectedLength} bytes, got ${actualLength}`,
        descriptorType,
        offset,
        expectedLength,
        actualLength,
    };
}

export function malformed(message: string, offset: number, descriptorType?: number): MalformedDescriptorDiagnostic {
    return { kind: 'MalformedDescriptor', message, offset, descriptorType };
}

/**
 * Attach the device label (and backend) to diagnostics produced without that context
 */
export function withDevice<T extends Diagnostic>(diagnostics: T[], device: string, backend?: BackendId): T[] {
    return diagnostics.map((d) => ({ ...d, device: d.device ?? device, backend: d.backend ?? backend }));
}

/**
 * One-line human readable form, used by the CLI
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
    const where = [diagnostic.backend, diagnostic.device].filter(Boolean).join(' ');
    return where ? `${diagnostic.kind} [${where}]: ${diagnostic.message}` : `${diagnostic.kind}: ${diagnostic.message}`;
}

export type ProfilerErrorCode =
    | 'NO_USABLE_BACKEND'
    | 'PROFILE_TIMEOUT'
    | 'INVALID_QUERY'
    | 'INVALID_SERIALIZED_TREE'
    | 'INVALID_CONFIG';

export interface ProfilerErrorOptions {
    attemptedBackends?: BackendId[];
    details?: string[];
    cause?: unknown;
}

export class ProfilerError extends Error {
    readonly code: ProfilerErrorCode;
    readonly attemptedBackends: BackendId[];
    readonly details: string[];

    constructor(code: ProfilerErrorCode, message: string, options: ProfilerErrorOptions = {}) {
        super(message, { cause: options.cause });
        this.name = 'ProfilerError';
        this.code = code;
        this.attemptedBackends = options.attemptedBackends ?? [];
        this.details = options.details ?? [];
    }
}

export function isProfilerError(error: unknown): error is ProfilerError {
    return error instanceof ProfilerError;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
