import { describe, test, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import path from 'path';
import { HistoryStore } from '../src/history_store';
import { makeTempDir, openStore, removeDir } from './helpers';

function newRun(store: HistoryStore, runId: string, assignmentId = '12345', createdAt = '2026-03-01T12:00:00.000Z') {
    return store.createRun({
        runId,
        assignmentId,
        courseId: '77',
        mode: 'outline',
        goal: null,
        inputFile: null,
        createdAt,
    });
}

describe('HistoryStore', () => {
    let home: string;
    let store: HistoryStore;

    beforeEach(() => {
        home = makeTempDir();
        store = openStore(home);
    });

    afterEach(() => {
        store.close();
        removeDir(home);
    });

    test('applies the schema once and reopens cleanly', () => {
        assert.equal(store.schemaVersion(), 1);
        newRun(store, 'run_aaaa000000000001');
        store.close();

        store = new HistoryStore(path.join(home, 'state.db'));
        assert.equal(store.schemaVersion(), 1);
        assert.equal(store.getRun('run_aaaa000000000001')?.state, 'queued');
    });

    test('creates runs in queued state with no artifacts', () => {
        const run = newRun(store, 'run_aaaa000000000001');
        assert.equal(run.state, 'queued');
        assert.deepEqual(run.artifactPaths, {});
        assert.equal(run.createdAt, run.updatedAt);
        assert.equal(store.getRun('run_missing'), null);
    });

    test('compare-and-set only moves a run out of the expected state', () => {
        newRun(store, 'run_aaaa000000000001');
        const paths = { 'plan.json': '/tmp/plan.json' };

        assert.equal(
            store.compareAndSetRunState('run_aaaa000000000001', 'queued', 'planning', paths, '2026-03-01T12:01:00.000Z'),
            true
        );
        assert.equal(
            store.compareAndSetRunState('run_aaaa000000000001', 'queued', 'planning', {}, '2026-03-01T12:02:00.000Z'),
            false
        );

        const run = store.getRun('run_aaaa000000000001');
        assert.equal(run?.state, 'planning');
        assert.deepEqual(run?.artifactPaths, paths);
        assert.equal(run?.updatedAt, '2026-03-01T12:01:00.000Z');
    });

    test('findLatestRun returns the most recently updated run for the assignment', () => {
        newRun(store, 'run_aaaa000000000001', '12345', '2026-03-01T10:00:00.000Z');
        newRun(store, 'run_aaaa000000000002', '12345', '2026-03-01T11:00:00.000Z');
        newRun(store, 'run_aaaa000000000003', '99999', '2026-03-01T12:00:00.000Z');
        store.compareAndSetRunState('run_aaaa000000000001', 'queued', 'planning', {}, '2026-03-01T11:30:00.000Z');

        assert.equal(store.findLatestRun('12345')?.runId, 'run_aaaa000000000001');
        assert.equal(store.findLatestRun('55555'), null);
        assert.deepEqual(
            store.listRuns(2).map((r) => r.runId),
            ['run_aaaa000000000003', 'run_aaaa000000000001']
        );
    });

    test('marks a token consumed at most once', () => {
        newRun(store, 'run_aaaa000000000001');
        const tokenHash = 'a'.repeat(64);
        store.insertConfirmToken({
            tokenHash,
            runId: 'run_aaaa000000000001',
            assignmentId: '12345',
            issuedAt: '2026-03-01T12:00:00.000Z',
            expiresAt: '2026-03-01T12:10:00.000Z',
            consumed: false,
            consumedAt: null,
        });

        assert.equal(store.markTokenConsumed(tokenHash, '2026-03-01T12:05:00.000Z'), true);
        assert.equal(store.markTokenConsumed(tokenHash, '2026-03-01T12:06:00.000Z'), false);

        const record = store.getConfirmToken(tokenHash);
        assert.equal(record?.consumed, true);
        assert.equal(record?.consumedAt, '2026-03-01T12:05:00.000Z');
    });

    test('rejects a duplicate token hash', () => {
        newRun(store, 'run_aaaa000000000001');
        const record = {
            tokenHash: 'b'.repeat(64),
            runId: 'run_aaaa000000000001',
            assignmentId: '12345',
            issuedAt: '2026-03-01T12:00:00.000Z',
            expiresAt: '2026-03-01T12:10:00.000Z',
            consumed: false,
            consumedAt: null,
        };
        store.insertConfirmToken(record);
        assert.throws(() => store.insertConfirmToken(record), { name: 'HistoryStoreError', code: 'DUPLICATE_TOKEN' });
    });

    test('idempotency get-or-create keeps the first snapshot', () => {
        newRun(store, 'run_aaaa000000000001');
        const first = store.getOrCreateIdempotencyRecord({
            idempotencyKey: 'key-1',
            runId: 'run_aaaa000000000001',
            resultSnapshot: '{"status":"stubbed"}',
            createdAt: '2026-03-01T12:00:00.000Z',
        });
        const second = store.getOrCreateIdempotencyRecord({
            idempotencyKey: 'key-1',
            runId: 'run_aaaa000000000001',
            resultSnapshot: '{"status":"other"}',
            createdAt: '2026-03-01T12:05:00.000Z',
        });

        assert.equal(first.created, true);
        assert.equal(second.created, false);
        assert.equal(second.record.resultSnapshot, '{"status":"stubbed"}');
        assert.equal(store.getIdempotencyRecord('key-1')?.createdAt, '2026-03-01T12:00:00.000Z');
    });

    test('filters feedback by course and assignment, newest first', () => {
        const a = store.storeFeedback({ feedbackText: 'Cite primary sources', courseId: '77', assignmentId: null, source: 'ta' });
        const b = store.storeFeedback({ feedbackText: 'Tighten the thesis', courseId: '77', assignmentId: '12345', source: null });
        store.storeFeedback({ feedbackText: 'Other course', courseId: '88', assignmentId: null, source: null });

        assert.deepEqual(
            store.listFeedback({ courseId: '77' }, 10).map((f) => f.id),
            [b, a]
        );
        assert.deepEqual(
            store.listFeedback({ courseId: '77', assignmentId: '12345' }, 10).map((f) => f.feedbackText),
            ['Tighten the thesis']
        );
        assert.equal(store.listFeedback({}, 2).length, 2);
    });

    test('summarizes runs, tokens and error codes', () => {
        newRun(store, 'run_aaaa000000000001');
        newRun(store, 'run_aaaa000000000002');
        for (const [from, to] of [['queued', 'planning'], ['planning', 'drafting'], ['drafting', 'reviewing'], ['reviewing', 'ready']] as const) {
            store.compareAndSetRunState('run_aaaa000000000001', from, to, {}, '2026-03-01T12:00:00.000Z');
        }
        store.logAction('error', 'CONFIRM_REQUIRED');
        store.logAction('error', 'CONFIRM_REQUIRED');
        store.logAction('error', 'VALIDATION');
        store.logAction('do', 'id=12345');
        assert.deepEqual(
            store.recentActions(2).map((a) => [a.command, a.payload]),
            [['do', 'id=12345'], ['error', 'VALIDATION']]
        );

        const summary = store.metricsSummary();
        assert.equal(summary.total_runs, 2);
        assert.equal(summary.ready_runs, 1);
        assert.equal(summary.in_progress_runs, 1);
        assert.deepEqual(summary.by_mode, { outline: { ready: 1, in_progress: 1 } });
        assert.equal(summary.tokens_issued, 0);
        assert.equal(summary.tokens_consumed, 0);
        assert.deepEqual(summary.common_error_codes, [
            { code: 'CONFIRM_REQUIRED', count: 2 },
            { code: 'VALIDATION', count: 1 },
        ]);
    });
});
