/**
 * CLI entry point for studyflow.
 *
 * Parses argv, builds the command service over the local store and prints one
 * envelope per invocation: a single JSON line on stdout with --json, otherwise
 * the command's human-readable lines. Errors go to stderr in human mode.
 */

import { CommandService, LmsClient } from './commands';
import { LIMITS, loadSettings, Settings } from './config';
import { CommandOutput, Envelope, exitCodeFor, failureEnvelope, renderHuman, renderJson, successEnvelope } from './envelope';
import { HistoryStore } from './history_store';
import { clearCorrelation, createLogger } from './logger';
import { ErrorFactory, toStudyflowError } from './structured_error';

const log = createLogger('cli');

type Env = Record<string, string | undefined>;

export interface CliIO {
    stdout(line: string): void;
    stderr(line: string): void;
}

export interface CliOptions {
    env?: Env;
    io?: CliIO;
    lmsFactory?: (settings: Settings) => LmsClient;
    now?: () => Date;
}

/* -------------------------------------------------------------------------- */
/* Argument parsing                                                           */
/* -------------------------------------------------------------------------- */

const VALUE_FLAGS = new Set([
    '--base-url',
    '--token',
    '--days',
    '--mode',
    '--goal',
    '--resume',
    '--input-file',
    '--run',
    '--file',
    '--confirm-token',
    '--idempotency-key',
    '--limit',
    '--text',
    '--course-id',
    '--assignment-id',
    '--source',
]);

const BOOLEAN_FLAGS = new Set(['--json', '--quiet', '--confirm', '--dry-run', '--no-write-templates']);

export interface ParsedArgs {
    positionals: string[];
    values: Map<string, string>;
    switches: Set<string>;
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
    const positionals: string[] = [];
    const values = new Map<string, string>();
    const switches = new Set<string>();

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (!arg.startsWith('--')) {
            positionals.push(arg);
            continue;
        }

        const eq = arg.indexOf('=');
        const name = eq === -1 ? arg : arg.slice(0, eq);

        if (VALUE_FLAGS.has(name)) {
            const value = eq === -1 ? argv[++i] : arg.slice(eq + 1);
            if (value === undefined || (eq === -1 && value.startsWith('--'))) {
                throw ErrorFactory.validation(`${name} requires a value`);
            }
            values.set(name, value);
        } else if (BOOLEAN_FLAGS.has(name) && eq === -1) {
            switches.add(name);
        } else {
            throw ErrorFactory.validation(`Unknown option: ${arg}`);
        }
    }

    return { positionals, values, switches };
}

function intOption(parsed: ParsedArgs, flag: string, fallback: number): number {
    const raw = parsed.values.get(flag);
    if (raw === undefined) return fallback;
    if (!/^-?\d+$/.test(raw.trim())) {
        throw ErrorFactory.validation(`${flag} must be an integer, got '${raw}'`);
    }
    return parseInt(raw, 10);
}

function requirePositional(parsed: ParsedArgs, index: number, usage: string): string {
    const value = parsed.positionals[index];
    if (value === undefined) throw ErrorFactory.validation(`Usage: ${usage}`);
    return value;
}

const GROUPS = new Set(['auth', 'courses', 'assignments', 'assignment', 'runs', 'feedback', 'metrics', 'agent']);

/** `auth status` -> `auth.status`; single-word commands stay as they are. */
export function commandName(positionals: readonly string[]): string {
    const first = positionals[0] ?? 'help';
    if (GROUPS.has(first) && positionals[1] !== undefined) return `${first}.${positionals[1]}`;
    return first;
}

export const HELP_LINES: readonly string[] = [
    'studyflow - LMS study assistant with human-confirmed submission',
    '',
    'USAGE:',
    '  studyflow [--json] [--quiet] <command> [options]',
    '',
    'COMMANDS:',
    '  init [--base-url <url>] [--token <token>] [--no-write-templates]',
    '  auth status',
    '  auth login --token <token> [--base-url <url>]',
    '  auth set-mode <token|oauth_placeholder>',
    '  courses list',
    `  assignments due [--days N]          (default ${LIMITS.DUE_DAYS_DEFAULT})`,
    '  assignment show <assignment_id>',
    '  do <assignment_id> --mode <tutor|outline|draft|polish> [--goal <text>] [--resume <run_id>] [--input-file <path>]',
    '  review <assignment_id> [--run <run_id>]',
    '  submit <assignment_id|run_id> --file <path> --confirm --confirm-token <token> [--idempotency-key <key>] [--dry-run]',
    '  runs show <run_id>',
    `  runs tail [--limit N]               (default ${LIMITS.RUNS_TAIL_DEFAULT}, max ${LIMITS.RUNS_TAIL_MAX})`,
    '  feedback add --text <text> [--course-id <id>] [--assignment-id <id>] [--source <label>]',
    '  feedback list [--course-id <id>] [--assignment-id <id>]',
    '  metrics summary',
    '  agent capabilities',
    '  help',
];

/* -------------------------------------------------------------------------- */
/* CLI                                                                        */
/* -------------------------------------------------------------------------- */

const CONSOLE_IO: CliIO = {
    stdout: (line) => process.stdout.write(line + '\n'),
    stderr: (line) => process.stderr.write(line + '\n'),
};

class StudyflowCLI {
    private readonly env: Env;
    private readonly io: CliIO;

    constructor(private readonly opts: CliOptions = {}) {
        this.env = opts.env ?? process.env;
        this.io = opts.io ?? CONSOLE_IO;
    }

    /** `args` is the full process argv (node, script, ...). Resolves to the exit code. */
    async run(args: string[]): Promise<number> {
        const argv = args.slice(2);
        const json = argv.includes('--json');
        const quiet = argv.includes('--quiet');

        let parsed: ParsedArgs;
        try {
            parsed = parseArgs(argv);
        } catch (e) {
            return this.print(failureEnvelope('cli', toStudyflowError(e).toStructured()), [], json, quiet);
        }

        const command = commandName(parsed.positionals);
        if (command === 'help') {
            return this.print(successEnvelope('help', { usage: [...HELP_LINES] }), [...HELP_LINES], json, quiet);
        }

        let store: HistoryStore;
        let settings: Settings;
        try {
            settings = loadSettings(this.env);
            store = new HistoryStore(settings.dbPath, { now: this.opts.now });
        } catch (e) {
            return this.print(failureEnvelope(command, toStudyflowError(e).toStructured()), [], json, quiet);
        }

        try {
            const service = new CommandService({
                settings,
                store,
                lmsFactory: this.opts.lmsFactory,
                now: this.opts.now,
            });
            const { envelope, lines } = await service.execute(command, () => this.dispatch(service, command, parsed));
            return this.print(envelope, lines, json, quiet);
        } finally {
            store.close();
            clearCorrelation();
        }
    }

    private dispatch(service: CommandService, command: string, parsed: ParsedArgs): Promise<CommandOutput> {
        const v = (flag: string): string | null => parsed.values.get(flag) ?? null;

        switch (command) {
            case 'init':
                return service.init({
                    baseUrl: v('--base-url'),
                    token: v('--token'),
                    writeTemplates: !parsed.switches.has('--no-write-templates'),
                });
            case 'auth.status':
                return service.authStatus();
            case 'auth.login':
                return service.authLogin(v('--token'), v('--base-url'));
            case 'auth.set-mode':
                return service.authSetMode(requirePositional(parsed, 2, 'studyflow auth set-mode <token|oauth_placeholder>'));
            case 'courses.list':
                return service.coursesList();
            case 'assignments.due':
                return service.assignmentsDue(intOption(parsed, '--days', LIMITS.DUE_DAYS_DEFAULT));
            case 'assignment.show':
                return service.assignmentShow(requirePositional(parsed, 2, 'studyflow assignment show <assignment_id>'));
            case 'do':
                return service.do({
                    assignmentId: requirePositional(parsed, 1, 'studyflow do <assignment_id> --mode <mode>'),
                    mode: v('--mode') ?? '',
                    goal: v('--goal'),
                    resume: v('--resume'),
                    inputFile: v('--input-file'),
                });
            case 'review':
                return service.review(requirePositional(parsed, 1, 'studyflow review <assignment_id> [--run <run_id>]'), v('--run'));
            case 'submit':
                return service.submit({
                    target: requirePositional(parsed, 1, 'studyflow submit <assignment_id|run_id> --file <path> --confirm --confirm-token <token>'),
                    file: v('--file'),
                    confirm: parsed.switches.has('--confirm'),
                    confirmToken: v('--confirm-token'),
                    idempotencyKey: v('--idempotency-key'),
                    dryRun: parsed.switches.has('--dry-run'),
                });
            case 'runs.show':
                return service.runsShow(requirePositional(parsed, 2, 'studyflow runs show <run_id>'));
            case 'runs.tail':
                return service.runsTail(intOption(parsed, '--limit', LIMITS.RUNS_TAIL_DEFAULT));
            case 'feedback.add':
                return service.feedbackAdd({
                    text: v('--text'),
                    courseId: v('--course-id'),
                    assignmentId: v('--assignment-id'),
                    source: v('--source'),
                });
            case 'feedback.list':
                return service.feedbackList(v('--course-id'), v('--assignment-id'));
            case 'metrics.summary':
                return service.metricsSummary();
            case 'agent.capabilities':
                return service.agentCapabilities();
            default:
                return Promise.reject(
                    ErrorFactory.validation(`Unknown command: ${parsed.positionals.join(' ')}. Run \`studyflow help\`.`)
                );
        }
    }

    private print(envelope: Envelope, lines: readonly string[], json: boolean, quiet: boolean): number {
        if (json) {
            this.io.stdout(renderJson(envelope));
        } else if (!envelope.ok) {
            for (const line of renderHuman(envelope, lines)) this.io.stderr(line);
        } else if (!quiet) {
            for (const line of renderHuman(envelope, lines)) this.io.stdout(line);
        }
        const code = exitCodeFor(envelope);
        log.debug('Command finished', { command: envelope.command, exit_code: code });
        return code;
    }
}

export { StudyflowCLI };
