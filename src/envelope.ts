/**
 * Response envelope printed by every command.
 *
 * Success: {schema_version, ok: true, command, result}
 * Failure: {schema_version, ok: false, command, error: {code, message, details}}
 *
 * JSON mode prints the envelope as one line with sorted keys; human mode prints
 * `lines` (success) or `Error [CODE]: message` (failure).
 */

import { stableStringify } from './output_writer';
import { StructuredError } from './structured_error';

export const SCHEMA_VERSION = 'v1';

export interface SuccessEnvelope {
    schema_version: typeof SCHEMA_VERSION;
    ok: true;
    command: string;
    result: Record<string, unknown>;
}

export interface FailureEnvelope {
    schema_version: typeof SCHEMA_VERSION;
    ok: false;
    command: string;
    error: StructuredError;
}

export type Envelope = SuccessEnvelope | FailureEnvelope;

/** What a command hands back to the CLI: the envelope result plus its human rendering. */
export interface CommandOutput {
    command: string;
    result: Record<string, unknown>;
    lines: string[];
}

export function successEnvelope(command: string, result: Record<string, unknown>): SuccessEnvelope {
    return { schema_version: SCHEMA_VERSION, ok: true, command, result };
}

export function failureEnvelope(command: string, error: StructuredError): FailureEnvelope {
    return { schema_version: SCHEMA_VERSION, ok: false, command, error };
}

export function renderJson(envelope: Envelope): string {
    return stableStringify(envelope);
}

export function renderHuman(envelope: Envelope, lines: readonly string[]): string[] {
    if (envelope.ok) return [...lines];
    return [`Error [${envelope.error.code}]: ${envelope.error.message}`];
}

export function exitCodeFor(envelope: Envelope): number {
    return envelope.ok ? 0 : 1;
}
