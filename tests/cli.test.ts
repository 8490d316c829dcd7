import { describe, test, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs';
import path from 'path';
import { commandName, HELP_LINES, parseArgs, StudyflowCLI } from '../src/cli';
import { StudyflowError } from '../src/structured_error';
import { FakeClock, FakeLms, makeAssignment, makeTempDir, removeDir } from './helpers';

class CapturedIO {
    readonly out: string[] = [];
    readonly err: string[] = [];
    readonly stdout = (line: string): void => {
        this.out.push(line);
    };
    readonly stderr = (line: string): void => {
        this.err.push(line);
    };
}

describe('parseArgs', () => {
    test('splits positionals, values and switches', () => {
        const parsed = parseArgs(['do', '12345', '--mode', 'outline', '--goal=be concise', '--json']);
        assert.deepEqual(parsed.positionals, ['do', '12345']);
        assert.equal(parsed.values.get('--mode'), 'outline');
        assert.equal(parsed.values.get('--goal'), 'be concise');
        assert.ok(parsed.switches.has('--json'));
    });

    test('rejects unknown options and missing values', () => {
        assert.throws(() => parseArgs(['do', '--force']), (e: unknown) => e instanceof StudyflowError && e.message === 'Unknown option: --force');
        assert.throws(() => parseArgs(['submit', '1', '--file']), (e: unknown) => e instanceof StudyflowError && e.message === '--file requires a value');
        assert.throws(() => parseArgs(['submit', '1', '--file', '--confirm']), /--file requires a value/);
        assert.throws(
            () => parseArgs(['init', '--write-templates']),
            (e: unknown) => e instanceof StudyflowError && e.message === 'Unknown option: --write-templates'
        );
        assert.ok(parseArgs(['init', '--no-write-templates']).switches.has('--no-write-templates'));
    });

    test('joins command groups', () => {
        assert.equal(commandName(['runs', 'tail']), 'runs.tail');
        assert.equal(commandName(['do', '1']), 'do');
        assert.equal(commandName([]), 'help');
    });
});

describe('StudyflowCLI', () => {
    let home: string;
    let io: CapturedIO;
    let clock: FakeClock;
    let lms: FakeLms;

    function cli(): StudyflowCLI {
        return new StudyflowCLI({
            env: { STUDYFLOW_HOME: home, CANVAS_BASE_URL: 'https://canvas.example.test', CANVAS_API_TOKEN: 'test-secret' },
            io,
            lmsFactory: () => lms,
            now: clock.now,
        });
    }

    function invoke(...args: string[]): Promise<number> {
        return cli().run(['node', 'studyflow', ...args]);
    }

    async function invokeJson(...args: string[]): Promise<Record<string, unknown>> {
        const before = io.out.length;
        await invoke('--json', ...args);
        assert.equal(io.out.length, before + 1);
        const parsed: unknown = JSON.parse(io.out[before]);
        assert.ok(typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed));
        return Object.fromEntries(Object.entries(parsed));
    }

    function field(obj: unknown, key: string): unknown {
        assert.ok(typeof obj === 'object' && obj !== null);
        return Object.fromEntries(Object.entries(obj))[key];
    }

    beforeEach(() => {
        home = makeTempDir();
        io = new CapturedIO();
        clock = new FakeClock();
        lms = new FakeLms(makeAssignment());
    });

    afterEach(() => {
        removeDir(home);
    });

    test('prints help without touching the store', async () => {
        assert.equal(await invoke(), 0);
        assert.deepEqual(io.out, [...HELP_LINES]);
        assert.equal(fs.existsSync(path.join(home, 'state.db')), false);
    });

    test('reports an unknown command as VALIDATION on stderr', async () => {
        assert.equal(await invoke('frobnicate'), 1);
        assert.deepEqual(io.err, ['Error [VALIDATION]: Unknown command: frobnicate. Run `studyflow help`.']);
        assert.deepEqual(io.out, []);
    });

    test('a parse error still yields a JSON envelope', async () => {
        const envelope = await invokeJson('do', '12345', '--bogus');
        assert.equal(envelope.ok, false);
        assert.equal(envelope.command, 'cli');
        assert.equal(field(envelope.error, 'code'), 'VALIDATION');
    });

    test('--quiet suppresses success output but not errors', async () => {
        assert.equal(await invoke('--quiet', 'auth', 'status'), 0);
        assert.deepEqual(io.out, []);
        assert.equal(await invoke('--quiet', 'runs', 'show', 'run_missing'), 1);
        assert.deepEqual(io.err, ['Error [NOT_FOUND]: Run not found: run_missing']);
    });

    test('do, review, submit and an idempotent replay end to end', async () => {
        const done = await invokeJson('do', '12345', '--mode', 'draft', '--goal', 'explain evaporation');
        assert.equal(done.ok, true);
        assert.equal(field(done.result, 'state'), 'ready');
        const runId = String(field(done.result, 'run_id'));

        const reviewed = await invokeJson('review', '12345');
        const token = String(field(reviewed.result, 'confirm_token'));
        assert.equal(field(reviewed.result, 'run_id'), runId);

        const file = path.join(home, 'essay.md');
        fs.writeFileSync(file, '# Essay\n');
        const submitArgs = ['submit', runId, '--file', file, '--confirm', '--confirm-token', token, '--idempotency-key', 'final-1'];

        const before = io.out.length;
        assert.equal(await invoke('--json', ...submitArgs), 0);
        assert.equal(await invoke('--json', ...submitArgs), 0);
        assert.equal(io.out.length, before + 2);
        assert.equal(io.out[before + 1], io.out[before]);
        assert.equal(lms.submitCalls.length, 1);

        const submitted = await invokeJson('runs', 'show', runId);
        assert.equal(field(field(submitted.result, 'run'), 'state'), 'ready');
    });

    test('submit without --confirm is refused with exit code 1', async () => {
        const file = path.join(home, 'essay.md');
        fs.writeFileSync(file, '# Essay\n');

        assert.equal(await invoke('submit', '12345', '--file', file, '--confirm-token', 'rvw_x'), 1);
        assert.deepEqual(io.err, ['Error [CONFIRM_REQUIRED]: Refusing to submit without explicit --confirm.']);
        assert.equal(lms.submitCalls.length, 0);
    });

    test('auth set-mode persists the mode for later commands', async () => {
        const set = await invokeJson('auth', 'set-mode', 'oauth_placeholder');
        assert.equal(set.command, 'auth.set-mode');
        assert.equal(field(set.result, 'auth_mode'), 'oauth_placeholder');

        const status = await invokeJson('auth', 'status');
        assert.equal(field(status.result, 'auth_mode'), 'oauth_placeholder');

        const missing = await invokeJson('auth', 'set-mode');
        assert.equal(field(missing.error, 'message'), 'Usage: studyflow auth set-mode <token|oauth_placeholder>');
    });

    test('rejects a non-integer --limit', async () => {
        const envelope = await invokeJson('runs', 'tail', '--limit', 'ten');
        assert.equal(field(envelope.error, 'message'), "--limit must be an integer, got 'ten'");
    });
});
