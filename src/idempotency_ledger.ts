// idempotency_ledger.ts - submit outcomes keyed by caller-supplied idempotency key

import { HistoryStore } from './history_store';
import { createLogger } from './logger';
import { IdempotencyRecord } from './run_types';

const log = createLogger('idempotency-ledger');

export interface LedgerEntry {
    record: IdempotencyRecord;
    /** false when the key was already owned by an earlier submission */
    created: boolean;
}

export class IdempotencyLedger {
    constructor(
        private readonly store: HistoryStore,
        private readonly now: () => Date = () => new Date()
    ) {}

    lookup(key: string): IdempotencyRecord | null {
        return this.store.getIdempotencyRecord(key);
    }

    /**
     * Get-or-create. A record is never overwritten: when the key already exists
     * the stored snapshot wins and is what the caller must return.
     */
    record(key: string, runId: string, resultSnapshot: string): LedgerEntry {
        const entry = this.store.getOrCreateIdempotencyRecord({
            idempotencyKey: key,
            runId,
            resultSnapshot,
            createdAt: this.now().toISOString(),
        });
        if (!entry.created) {
            log.warn('Idempotency key already recorded; keeping the first snapshot', { key, run_id: entry.record.runId });
        }
        return entry;
    }
}
