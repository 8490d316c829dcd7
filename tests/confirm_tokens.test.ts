import { describe, test, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { ConfirmTokenIssuer, hashToken } from '../src/confirm_tokens';
import { HistoryStore } from '../src/history_store';
import { FakeClock, MINUTE_MS, makeTempDir, openStore, removeDir } from './helpers';

describe('ConfirmTokenIssuer', () => {
    let home: string;
    let clock: FakeClock;
    let store: HistoryStore;
    let tokens: ConfirmTokenIssuer;

    beforeEach(() => {
        home = makeTempDir();
        clock = new FakeClock();
        store = openStore(home, clock);
        store.createRun({
            runId: 'run_aaaa000000000001',
            assignmentId: '12345',
            courseId: '77',
            mode: 'outline',
            goal: null,
            inputFile: null,
            createdAt: clock.now().toISOString(),
        });
        tokens = new ConfirmTokenIssuer({ store, ttlMinutes: 10, now: clock.now });
    });

    afterEach(() => {
        store.close();
        removeDir(home);
    });

    test('issues an opaque token and stores only its hash', () => {
        const issued = tokens.issue('run_aaaa000000000001', '12345');

        assert.match(issued.confirm_token, /^rvw_[A-Za-z0-9_-]{24}$/);
        assert.equal(issued.issued_at, '2026-03-01T12:00:00.000Z');
        assert.equal(issued.expires_at, '2026-03-01T12:10:00.000Z');

        const record = store.getConfirmToken(hashToken(issued.confirm_token));
        assert.equal(record?.runId, 'run_aaaa000000000001');
        assert.equal(record?.consumed, false);
        assert.equal(store.getConfirmToken(issued.confirm_token), null);
    });

    test('two issues never share a token', () => {
        const a = tokens.issue('run_aaaa000000000001', '12345');
        const b = tokens.issue('run_aaaa000000000001', '12345');
        assert.notEqual(a.confirm_token, b.confirm_token);
    });

    test('rejects a non-positive ttl', () => {
        assert.throws(() => new ConfirmTokenIssuer({ store, ttlMinutes: 0 }), /TTL must be positive/);
    });

    test('consumes a valid token exactly once', () => {
        const { confirm_token } = tokens.issue('run_aaaa000000000001', '12345');
        clock.advance(MINUTE_MS);

        const first = tokens.validateAndConsume(confirm_token, { runId: 'run_aaaa000000000001' });
        assert.equal(first.ok, true);
        if (first.ok) assert.equal(first.record.consumedAt, '2026-03-01T12:01:00.000Z');

        assert.deepEqual(tokens.validateAndConsume(confirm_token, { runId: 'run_aaaa000000000001' }), {
            ok: false,
            reason: 'ALREADY_CONSUMED',
        });
    });

    test('accepts a token at its expiry instant and rejects it after', () => {
        const a = tokens.issue('run_aaaa000000000001', '12345');
        const b = tokens.issue('run_aaaa000000000001', '12345');

        clock.advance(10 * MINUTE_MS);
        assert.equal(tokens.validateAndConsume(a.confirm_token, { assignmentId: '12345' }).ok, true);

        clock.advance(1);
        assert.deepEqual(tokens.validateAndConsume(b.confirm_token, { assignmentId: '12345' }), {
            ok: false,
            reason: 'EXPIRED',
        });
        assert.equal(tokens.inspect(b.confirm_token)?.consumed, false);
    });

    test('reports EXPIRED for a consumed token once it has expired', () => {
        const { confirm_token } = tokens.issue('run_aaaa000000000001', '12345');
        assert.equal(tokens.validateAndConsume(confirm_token, { runId: 'run_aaaa000000000001' }).ok, true);

        clock.advance(11 * MINUTE_MS);
        assert.deepEqual(tokens.validateAndConsume(confirm_token, { runId: 'run_aaaa000000000001' }), {
            ok: false,
            reason: 'EXPIRED',
        });
    });

    test('rejects a token bound to another run or assignment without consuming it', () => {
        const { confirm_token } = tokens.issue('run_aaaa000000000001', '12345');

        assert.deepEqual(tokens.validateAndConsume(confirm_token, { runId: 'run_bbbb000000000002' }), {
            ok: false,
            reason: 'RUN_MISMATCH',
        });
        assert.deepEqual(tokens.validateAndConsume(confirm_token, { assignmentId: '99999' }), {
            ok: false,
            reason: 'RUN_MISMATCH',
        });
        assert.equal(tokens.inspect(confirm_token)?.consumed, false);
        assert.equal(tokens.validateAndConsume(confirm_token, { assignmentId: '12345' }).ok, true);
    });

    test('reports NOT_FOUND for an unknown token', () => {
        assert.deepEqual(tokens.validateAndConsume('rvw_unknown', { assignmentId: '12345' }), {
            ok: false,
            reason: 'NOT_FOUND',
        });
    });
});
