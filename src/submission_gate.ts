// submission_gate.ts - the only path to the external write
//
// Checks run in a fixed order and stop at the first failure:
//   confirm flag -> token present -> idempotency replay -> file -> token consume
//   -> course policy -> dry run -> transport write -> ledger
// A replay returns the stored snapshot without consulting the token at all.

import * as fs from 'fs';
import { ConfirmTokenIssuer, TokenBinding } from './confirm_tokens';
import { HistoryStore } from './history_store';
import { IdempotencyLedger } from './idempotency_ledger';
import { SubmissionTransport } from './lms_client';
import { createLogger } from './logger';
import { stableStringify } from './output_writer';
import { evaluateSubmitPolicy, PolicyFile, policyForCourse, violationError } from './policy';
import { isRecord } from './schema_validator';
import { ErrorFactory, toStudyflowError } from './structured_error';

const log = createLogger('submission-gate');

export interface SubmitRequest {
    /** Assignment id (digits) or run id (run_...). */
    target: string;
    file: string;
    confirm: boolean;
    confirmToken: string | null;
    idempotencyKey: string | null;
    dryRun: boolean;
}

export type SubmitTarget =
    | { kind: 'assignment'; assignmentId: string }
    | { kind: 'run'; runId: string };

export interface SubmitOutcome {
    replayed: boolean;
    simulated: boolean;
    result: Record<string, unknown>;
    /** Serialized result; identical across replays of the same key. */
    snapshot: string;
}

export interface SubmissionGateDeps {
    store: HistoryStore;
    tokens: ConfirmTokenIssuer;
    ledger: IdempotencyLedger;
    transport: SubmissionTransport;
    policy: PolicyFile;
    now?: () => Date;
}

const ASSIGNMENT_ID_RE = /^\d+$/;
const RUN_ID_RE = /^run_[A-Za-z0-9]+$/;

export function parseSubmitTarget(target: string): SubmitTarget {
    const value = target.trim();
    if (ASSIGNMENT_ID_RE.test(value)) return { kind: 'assignment', assignmentId: value };
    if (RUN_ID_RE.test(value)) return { kind: 'run', runId: value };
    throw ErrorFactory.validation(`Submit target must be an assignment id or a run id, got '${target}'`, {
        target,
    });
}

function bindingFor(target: SubmitTarget): TokenBinding {
    return target.kind === 'run' ? { runId: target.runId } : { assignmentId: target.assignmentId };
}

function parseSnapshot(snapshot: string): Record<string, unknown> {
    const parsed: unknown = JSON.parse(snapshot);
    if (!isRecord(parsed)) {
        throw new Error('Stored submission snapshot is not an object');
    }
    return parsed;
}

function assertRegularFile(file: string): void {
    let stat: fs.Stats;
    try {
        stat = fs.statSync(file);
    } catch {
        throw ErrorFactory.validation(`File not found: ${file}`, { file });
    }
    if (!stat.isFile()) {
        throw ErrorFactory.validation(`Not a regular file: ${file}`, { file });
    }
}

export class SubmissionGate {
    private readonly now: () => Date;

    constructor(private readonly deps: SubmissionGateDeps) {
        this.now = deps.now ?? (() => new Date());
    }

    async submit(req: SubmitRequest): Promise<SubmitOutcome> {
        const target = parseSubmitTarget(req.target);

        if (!req.confirm) throw ErrorFactory.confirmFlagMissing();

        const token = req.confirmToken?.trim() ?? '';
        if (token === '') throw ErrorFactory.confirmTokenMissing();

        const key = req.idempotencyKey?.trim() || null;
        if (key !== null) {
            const prior = this.deps.ledger.lookup(key);
            if (prior) {
                log.info('Idempotency replay', { key, run_id: prior.runId });
                return {
                    replayed: true,
                    simulated: false,
                    result: parseSnapshot(prior.resultSnapshot),
                    snapshot: prior.resultSnapshot,
                };
            }
        }

        // Before consumption: a mistyped path must not burn the token.
        assertRegularFile(req.file);

        const consumed = this.deps.tokens.validateAndConsume(token, bindingFor(target));
        if (!consumed.ok) throw ErrorFactory.confirmTokenRejected(consumed.reason);
        const { runId, assignmentId, issuedAt } = consumed.record;

        const run = this.deps.store.getRun(runId);
        const rule = policyForCourse(this.deps.policy, run?.courseId ?? null);
        const violation = evaluateSubmitPolicy(rule, { dryRun: req.dryRun, tokenIssuedAt: issuedAt, now: this.now() });
        if (violation) {
            log.warn('Submit blocked by course policy', { rule: violation.rule, run_id: runId });
            throw violationError(violation);
        }

        if (req.dryRun) {
            const result = {
                assignment_id: assignmentId,
                run_id: runId,
                file: req.file,
                status: 'dry_run',
                simulated: true,
                message: 'Dry run only. No submission sent.',
            };
            return { replayed: false, simulated: true, result, snapshot: stableStringify(result) };
        }

        const receipt = await this.deps.transport.submitFile(assignmentId, req.file).catch((e: unknown) => {
            throw toStudyflowError(e);
        });

        const result = {
            assignment_id: assignmentId,
            run_id: runId,
            file: req.file,
            status: receipt.status,
            message: receipt.message,
            simulated: false,
            submitted_at: this.now().toISOString(),
        };
        const snapshot = stableStringify(result);
        log.info('Submission sent', { run_id: runId, status: receipt.status });

        if (key === null) {
            return { replayed: false, simulated: false, result, snapshot };
        }

        // Another invocation may have recorded the key first; its snapshot wins.
        const entry = this.deps.ledger.record(key, runId, snapshot);
        return {
            replayed: false,
            simulated: false,
            result: parseSnapshot(entry.record.resultSnapshot),
            snapshot: entry.record.resultSnapshot,
        };
    }
}
