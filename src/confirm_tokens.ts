// confirm_tokens.ts - short-lived, single-use confirm tokens bound to a run

import crypto from 'crypto';
import { ERRORS, HistoryStore, HistoryStoreError } from './history_store';
import { createLogger } from './logger';
import { ConfirmTokenRecord } from './run_types';
import { TokenFailureReason } from './structured_error';

const log = createLogger('confirm-tokens');

const TOKEN_PREFIX = 'rvw_';
const TOKEN_BYTES = 18;
const MAX_ISSUE_ATTEMPTS = 3;

export interface IssuedToken {
    confirm_token: string;
    run_id: string;
    assignment_id: string;
    issued_at: string;
    expires_at: string;
}

/** What submit names: the run itself, or the assignment the run was reviewed for. */
export type TokenBinding = { runId: string } | { assignmentId: string };

export type ConsumeResult =
    | { ok: true; record: ConfirmTokenRecord }
    | { ok: false; reason: TokenFailureReason };

export interface ConfirmTokenIssuerOptions {
    store: HistoryStore;
    ttlMinutes: number;
    now?: () => Date;
}

export function hashToken(token: string): string {
    return crypto.createHash('sha256').update(token, 'utf8').digest('hex');
}

function bindingMatches(record: ConfirmTokenRecord, binding: TokenBinding): boolean {
    return 'runId' in binding
        ? record.runId === binding.runId
        : record.assignmentId === binding.assignmentId;
}

export class ConfirmTokenIssuer {
    private readonly store: HistoryStore;
    private readonly ttlMs: number;
    private readonly now: () => Date;

    constructor(opts: ConfirmTokenIssuerOptions) {
        if (!Number.isFinite(opts.ttlMinutes) || opts.ttlMinutes <= 0) {
            throw new Error(`Token TTL must be positive, got ${opts.ttlMinutes}`);
        }
        this.store = opts.store;
        this.ttlMs = opts.ttlMinutes * 60_000;
        this.now = opts.now ?? (() => new Date());
    }

    issue(runId: string, assignmentId: string): IssuedToken {
        const issued = this.now();
        const record: Omit<ConfirmTokenRecord, 'tokenHash'> = {
            runId,
            assignmentId,
            issuedAt: issued.toISOString(),
            expiresAt: new Date(issued.getTime() + this.ttlMs).toISOString(),
            consumed: false,
            consumedAt: null,
        };

        for (let attempt = 1; ; attempt++) {
            const token = TOKEN_PREFIX + crypto.randomBytes(TOKEN_BYTES).toString('base64url');
            try {
                this.store.insertConfirmToken({ ...record, tokenHash: hashToken(token) });
            } catch (e) {
                if (attempt < MAX_ISSUE_ATTEMPTS && e instanceof HistoryStoreError && e.code === ERRORS.DUPLICATE_TOKEN) {
                    continue;
                }
                throw e;
            }

            log.info('Confirm token issued', { run_id: runId, expires_at: record.expiresAt });
            return {
                confirm_token: token,
                run_id: runId,
                assignment_id: assignmentId,
                issued_at: record.issuedAt,
                expires_at: record.expiresAt,
            };
        }
    }

    /**
     * Check and consume in one IMMEDIATE transaction. Order of checks:
     * NOT_FOUND, EXPIRED (regardless of consumption), ALREADY_CONSUMED, RUN_MISMATCH.
     * Only a token that passes every check is marked consumed.
     */
    validateAndConsume(token: string, binding: TokenBinding): ConsumeResult {
        const tokenHash = hashToken(token);
        const at = this.now();

        const result = this.store.immediate((): ConsumeResult => {
            const record = this.store.getConfirmToken(tokenHash);
            if (!record) return { ok: false, reason: 'NOT_FOUND' };

            if (at.getTime() > Date.parse(record.expiresAt)) {
                return { ok: false, reason: 'EXPIRED' };
            }
            if (record.consumed) return { ok: false, reason: 'ALREADY_CONSUMED' };
            if (!bindingMatches(record, binding)) return { ok: false, reason: 'RUN_MISMATCH' };

            const consumedAt = at.toISOString();
            if (!this.store.markTokenConsumed(tokenHash, consumedAt)) {
                return { ok: false, reason: 'ALREADY_CONSUMED' };
            }
            return { ok: true, record: { ...record, consumed: true, consumedAt } };
        });

        if (result.ok) {
            log.info('Confirm token consumed', { run_id: result.record.runId });
        } else {
            log.warn('Confirm token rejected', { reason: result.reason });
        }
        return result;
    }

    /** Read-only view of a token's stored record. */
    inspect(token: string): ConfirmTokenRecord | null {
        return this.store.getConfirmToken(hashToken(token));
    }
}
