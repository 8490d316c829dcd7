import { describe, test, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs';
import path from 'path';
import { ConfirmTokenIssuer } from '../src/confirm_tokens';
import { HistoryStore } from '../src/history_store';
import { IdempotencyLedger } from '../src/idempotency_ledger';
import { LmsClientError, SubmissionReceipt } from '../src/lms_client';
import { PolicyFile } from '../src/policy';
import { StudyflowError } from '../src/structured_error';
import { parseSubmitTarget, SubmissionGate, SubmitRequest } from '../src/submission_gate';
import { FakeClock, FakeLms, MINUTE_MS, makeAssignment, makeTempDir, openStore, removeDir } from './helpers';

const RUN_ID = 'run_aaaa000000000001';

function failsWith(kind: string, details: Record<string, unknown> = {}) {
    return (e: unknown) => {
        if (!(e instanceof StudyflowError) || e.kind !== kind) return false;
        return Object.entries(details).every(([k, v]) => e.details[k] === v);
    };
}

describe('parseSubmitTarget', () => {
    test('distinguishes assignment ids from run ids', () => {
        assert.deepEqual(parseSubmitTarget('12345'), { kind: 'assignment', assignmentId: '12345' });
        assert.deepEqual(parseSubmitTarget(RUN_ID), { kind: 'run', runId: RUN_ID });
        assert.throws(() => parseSubmitTarget('essay-1'), failsWith('VALIDATION'));
    });
});

describe('SubmissionGate', () => {
    let home: string;
    let clock: FakeClock;
    let store: HistoryStore;
    let tokens: ConfirmTokenIssuer;
    let lms: FakeLms;
    let file: string;

    function gate(policy: PolicyFile = {}): SubmissionGate {
        return new SubmissionGate({
            store,
            tokens,
            ledger: new IdempotencyLedger(store, clock.now),
            transport: lms,
            policy,
            now: clock.now,
        });
    }

    function request(overrides: Partial<SubmitRequest> = {}): SubmitRequest {
        return {
            target: '12345',
            file,
            confirm: true,
            confirmToken: tokens.issue(RUN_ID, '12345').confirm_token,
            idempotencyKey: null,
            dryRun: false,
            ...overrides,
        };
    }

    beforeEach(() => {
        home = makeTempDir();
        clock = new FakeClock();
        store = openStore(home, clock);
        store.createRun({
            runId: RUN_ID,
            assignmentId: '12345',
            courseId: '77',
            mode: 'draft',
            goal: null,
            inputFile: null,
            createdAt: clock.now().toISOString(),
        });
        tokens = new ConfirmTokenIssuer({ store, ttlMinutes: 10, now: clock.now });
        lms = new FakeLms(makeAssignment());
        file = path.join(home, 'essay.md');
        fs.writeFileSync(file, '# Essay\n');
    });

    afterEach(() => {
        store.close();
        removeDir(home);
    });

    test('submits once with a valid token', async () => {
        const outcome = await gate().submit(request());

        assert.equal(outcome.replayed, false);
        assert.deepEqual(outcome.result, {
            assignment_id: '12345',
            run_id: RUN_ID,
            file,
            status: 'stubbed',
            message: 'Submission flow placeholder. Human-confirmed execution only.',
            simulated: false,
            submitted_at: '2026-03-01T12:00:00.000Z',
        });
        assert.deepEqual(lms.submitCalls, [{ assignmentId: '12345', filePath: file }]);
    });

    test('refuses without --confirm and leaves the token and ledger alone', async () => {
        const req = request({ confirm: false, idempotencyKey: 'essay-1-final' });
        await assert.rejects(gate().submit(req), failsWith('CONFIRM_REQUIRED', { reason: 'CONFIRM_FLAG_MISSING' }));

        assert.equal(lms.submitCalls.length, 0);
        assert.equal(tokens.inspect(req.confirmToken ?? '')?.consumed, false);
        assert.equal(store.getIdempotencyRecord('essay-1-final'), null);
    });

    test('refuses without a token', async () => {
        await assert.rejects(
            gate().submit(request({ confirmToken: '  ' })),
            failsWith('CONFIRM_REQUIRED', { reason: 'TOKEN_MISSING' })
        );
    });

    test('rejects a malformed target before anything else', async () => {
        await assert.rejects(gate().submit(request({ target: 'essay', confirm: false })), failsWith('VALIDATION'));
    });

    test('a missing file does not consume the token', async () => {
        const req = request({ file: path.join(home, 'missing.md') });
        await assert.rejects(gate().submit(req), failsWith('VALIDATION'));
        assert.equal(tokens.inspect(req.confirmToken ?? '')?.consumed, false);
    });

    test('a token cannot be used twice', async () => {
        const req = request();
        await gate().submit(req);
        await assert.rejects(gate().submit(req), failsWith('CONFIRM_REQUIRED', { reason: 'ALREADY_CONSUMED' }));
        assert.equal(lms.submitCalls.length, 1);
    });

    test('an expired token is rejected and stays unconsumed', async () => {
        const req = request();
        clock.advance(11 * MINUTE_MS);

        await assert.rejects(gate().submit(req), failsWith('CONFIRM_REQUIRED', { reason: 'EXPIRED' }));
        assert.equal(tokens.inspect(req.confirmToken ?? '')?.consumed, false);
    });

    test('a token issued for another run is rejected', async () => {
        await assert.rejects(
            gate().submit(request({ target: 'run_bbbb000000000002' })),
            failsWith('CONFIRM_REQUIRED', { reason: 'RUN_MISMATCH' })
        );
    });

    test('replays the stored result for a known idempotency key', async () => {
        const req = request({ idempotencyKey: 'essay-1-final' });
        const first = await gate().submit(req);
        clock.advance(MINUTE_MS);

        const second = await gate().submit(req);
        assert.equal(second.replayed, true);
        assert.equal(second.snapshot, first.snapshot);
        assert.deepEqual(second.result, first.result);
        assert.equal(lms.submitCalls.length, 1);
    });

    test('a dry run spends the token, sends nothing and records no idempotency entry', async () => {
        const req = request({ dryRun: true, idempotencyKey: 'dry-key' });
        const outcome = await gate().submit(req);

        assert.equal(outcome.simulated, true);
        assert.equal(outcome.result.status, 'dry_run');
        assert.equal(outcome.result.message, 'Dry run only. No submission sent.');
        assert.equal(store.getIdempotencyRecord('dry-key'), null);
        assert.equal(lms.submitCalls.length, 0);
        assert.equal(tokens.inspect(req.confirmToken ?? '')?.consumed, true);
    });

    test('two store handles racing on one token submit exactly once', async () => {
        const otherStore = openStore(home, clock);
        try {
            const otherTokens = new ConfirmTokenIssuer({ store: otherStore, ttlMinutes: 10, now: clock.now });
            const otherGate = new SubmissionGate({
                store: otherStore,
                tokens: otherTokens,
                ledger: new IdempotencyLedger(otherStore, clock.now),
                transport: lms,
                policy: {},
                now: clock.now,
            });
            const req = request();

            const settled = await Promise.allSettled([gate().submit(req), otherGate.submit(req)]);
            const fulfilled = settled.filter((s) => s.status === 'fulfilled');
            const rejected = settled.flatMap((s) => (s.status === 'rejected' ? [s.reason] : []));

            assert.equal(fulfilled.length, 1);
            assert.equal(rejected.length, 1);
            assert.ok(failsWith('CONFIRM_REQUIRED', { reason: 'ALREADY_CONSUMED' })(rejected[0]));
            assert.equal(lms.submitCalls.length, 1);
        } finally {
            otherStore.close();
        }
    });

    test('course policy can disable submission', async () => {
        const policy = { courses: { '77': { disable_submit: true } } };
        await assert.rejects(
            gate(policy).submit(request({ dryRun: true })),
            failsWith('POLICY_VIOLATION', { rule: 'POLICY_SUBMIT_DISABLED' })
        );
    });

    test('course policy can require a dry run', async () => {
        const policy = { default: { dry_run_only: true } };
        await assert.rejects(gate(policy).submit(request()), failsWith('POLICY_VIOLATION', { rule: 'POLICY_DRY_RUN_ONLY' }));

        const outcome = await gate(policy).submit(request({ dryRun: true }));
        assert.equal(outcome.simulated, true);
    });

    test('course policy can limit the token age', async () => {
        const req = request();
        clock.advance(6 * MINUTE_MS);

        await assert.rejects(
            gate({ default: { max_review_token_age_minutes: 5 } }).submit(req),
            failsWith('POLICY_VIOLATION', { rule: 'POLICY_REVIEW_TOKEN_TOO_OLD' })
        );
        assert.equal(lms.submitCalls.length, 0);
    });

    test('maps a transport failure into the error taxonomy', async () => {
        lms.submitFile = async (): Promise<SubmissionReceipt> => {
            throw new LmsClientError('http error 403 calling submissions', 'forbidden', 'submissions', 403);
        };
        await assert.rejects(gate().submit(request()), failsWith('PERMISSION', { status_code: 403 }));
    });
});
