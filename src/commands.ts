// commands.ts - one method per CLI command; each returns a CommandOutput or throws StudyflowError
//
// Collaborators (store, LMS, clock) are injected so the whole command surface
// runs in-process against fakes. execute() is the single place where failures
// become a FailureEnvelope and are written to the action log.

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { ConfirmTokenIssuer } from './confirm_tokens';
import { AUTH_MODES, ConfigFile, isAuthMode, LIMITS, loadConfigFile, maskToken, saveConfigFile, Settings } from './config';
import { CommandOutput, Envelope, failureEnvelope, successEnvelope } from './envelope';
import { HistoryStore } from './history_store';
import { IdempotencyLedger } from './idempotency_ledger';
import { AssignmentSource, CanvasClient, LmsAssignment, SubmissionTransport } from './lms_client';
import { createLogger, setCorrelation } from './logger';
import { atomicWriteFileSync, stableStringifyPretty } from './output_writer';
import { enforceDoPolicy, loadPolicy, POLICY_TEMPLATE, policyForCourse } from './policy';
import { RubricScorer } from './rubric_scorer';
import { isWorkflowMode, RunRecord, runToJson, WORKFLOW_MODES } from './run_types';
import { isRecord } from './schema_validator';
import { modeSummary } from './stage_content';
import { ErrorFactory, StudyflowError, toStudyflowError } from './structured_error';
import { SubmissionGate } from './submission_gate';
import { WorkflowMachine } from './workflow_machine';

const log = createLogger('commands');

export type LmsClient = AssignmentSource & SubmissionTransport;

export interface CommandServiceDeps {
    settings: Settings;
    store: HistoryStore;
    /** Builds the LMS client on first use; defaults to CanvasClient from settings. */
    lmsFactory?: (settings: Settings) => LmsClient;
    scorer?: RubricScorer;
    now?: () => Date;
    lockTimeoutMs?: number;
}

export interface ExecutionResult {
    envelope: Envelope;
    lines: string[];
}

/* -------------------------------------------------------------------------- */
/* Argument shapes                                                            */
/* -------------------------------------------------------------------------- */

export interface InitArgs {
    baseUrl: string | null;
    token: string | null;
    writeTemplates: boolean;
}

export interface DoArgs {
    assignmentId: string;
    mode: string;
    goal: string | null;
    resume: string | null;
    inputFile: string | null;
}

export interface SubmitArgs {
    target: string;
    file: string | null;
    confirm: boolean;
    confirmToken: string | null;
    idempotencyKey: string | null;
    dryRun: boolean;
}

export interface FeedbackArgs {
    text: string | null;
    courseId: string | null;
    assignmentId: string | null;
    source: string | null;
}

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

const NUMERIC_ID_RE = /^\d+$/;

function requireNumericId(value: string | null | undefined, label: string): string {
    const v = (value ?? '').trim();
    if (!NUMERIC_ID_RE.test(v)) {
        throw ErrorFactory.validation(`${label} must be a numeric id, got '${value ?? ''}'`, { [label]: value ?? null });
    }
    return v;
}

function optionalNumericId(value: string | null, label: string): string | null {
    return value === null ? null : requireNumericId(value, label);
}

export function newRunId(): string {
    return `run_${uuidv4().replace(/-/g, '').slice(0, 16)}`;
}

export function defaultLmsFactory(settings: Settings): LmsClient {
    if (settings.authMode === 'oauth_placeholder' && !settings.canvasApiToken) {
        throw ErrorFactory.oauthNotAvailable();
    }
    if (!settings.canvasBaseUrl || !settings.canvasApiToken) {
        throw ErrorFactory.missingCredentials();
    }
    return new CanvasClient({
        baseUrl: settings.canvasBaseUrl,
        apiToken: settings.canvasApiToken,
        timeoutMs: settings.httpTimeoutMs,
        maxAttempts: settings.httpMaxAttempts,
        retryBackoffMs: LIMITS.HTTP_RETRY_BACKOFF_MS,
        cacheMaxEntries: LIMITS.LMS_CACHE_MAX_ENTRIES,
        cacheTtlMs: LIMITS.LMS_CACHE_TTL_MS,
    });
}

function assignmentToJson(a: LmsAssignment): Record<string, unknown> {
    return {
        id: a.id,
        course_id: a.courseId,
        name: a.name,
        description: a.description,
        due_at: a.dueAt,
        points_possible: a.pointsPossible,
        rubric: a.rubric,
    };
}

/* -------------------------------------------------------------------------- */
/* Command service                                                            */
/* -------------------------------------------------------------------------- */

export class CommandService {
    private readonly settings: Settings;
    private readonly store: HistoryStore;
    private readonly lmsFactory: (settings: Settings) => LmsClient;
    private readonly now: () => Date;
    private readonly machine: WorkflowMachine;
    private readonly tokens: ConfirmTokenIssuer;
    private readonly ledger: IdempotencyLedger;
    private lms: LmsClient | null = null;

    constructor(deps: CommandServiceDeps) {
        this.settings = deps.settings;
        this.store = deps.store;
        this.lmsFactory = deps.lmsFactory ?? defaultLmsFactory;
        this.now = deps.now ?? (() => new Date());
        this.machine = new WorkflowMachine({
            store: deps.store,
            artifactsRoot: deps.settings.artifactsRoot,
            scorer: deps.scorer,
            now: this.now,
            lockTimeoutMs: deps.lockTimeoutMs,
        });
        this.tokens = new ConfirmTokenIssuer({ store: deps.store, ttlMinutes: deps.settings.tokenTtlMinutes, now: this.now });
        this.ledger = new IdempotencyLedger(deps.store, this.now);
    }

    /** Run one command and fold any failure into the envelope. Never throws. */
    async execute(command: string, fn: () => Promise<CommandOutput>): Promise<ExecutionResult> {
        setCorrelation({ command });
        try {
            const out = await fn();
            return { envelope: successEnvelope(out.command, out.result), lines: out.lines };
        } catch (e) {
            const err = toStudyflowError(e);
            if (err.kind === 'INTERNAL') {
                log.error(err.message, { code: err.kind, details: err.details, cause: describeCause(err.cause) });
            } else {
                log.info(err.message, { code: err.kind });
            }
            this.recordError(err);
            const envelope = failureEnvelope(command, err.toStructured());
            return { envelope, lines: [] };
        }
    }

    private recordError(err: StudyflowError): void {
        try {
            this.store.logAction('error', err.kind);
        } catch (logErr) {
            log.warn('Could not record error in action log', { error: describeCause(logErr) });
        }
    }

    private client(): LmsClient {
        if (!this.lms) this.lms = this.lmsFactory(this.settings);
        return this.lms;
    }

    private feedbackHints(assignment: LmsAssignment): string[] {
        let rows = this.store.listFeedback({ courseId: assignment.courseId, assignmentId: assignment.id }, LIMITS.FEEDBACK_HINTS);
        if (rows.length === 0 && assignment.courseId !== null) {
            rows = this.store.listFeedback({ courseId: assignment.courseId }, LIMITS.FEEDBACK_HINTS);
        }
        return rows.map((r) => r.feedbackText);
    }

    /* ---------------------------------------------------------------------- */
    /* init / auth                                                            */
    /* ---------------------------------------------------------------------- */

    async init(args: InitArgs): Promise<CommandOutput> {
        const config: ConfigFile = loadConfigFile(this.settings.configPath);
        if (args.baseUrl) config.canvas_base_url = args.baseUrl.replace(/\/+$/, '');
        if (args.token) config.auth = { ...config.auth, mode: 'token', token: args.token };
        fs.mkdirSync(this.settings.homeDir, { recursive: true });
        saveConfigFile(this.settings.configPath, config);

        const templates: string[] = [];
        if (args.writeTemplates && !fs.existsSync(this.settings.policyPath)) {
            const warnings: string[] = [];
            atomicWriteFileSync({
                filePath: this.settings.policyPath,
                content: stableStringifyPretty(POLICY_TEMPLATE),
                mode: 0o644,
                fsyncMode: 'BEST_EFFORT',
                warnings,
            });
            templates.push(this.settings.policyPath);
        }

        this.store.logAction('init', `templates=${templates.length}`);
        return {
            command: 'init',
            result: { config_path: this.settings.configPath, templates },
            lines: [`Initialized config at ${this.settings.configPath}`, ...templates.map((t) => `Template: ${t}`)],
        };
    }

    async authStatus(): Promise<CommandOutput> {
        const configured = Boolean(this.settings.canvasBaseUrl && this.settings.canvasApiToken);
        const token = maskToken(this.settings.canvasApiToken);
        return {
            command: 'auth.status',
            result: {
                auth_mode: this.settings.authMode,
                canvas_base_url: this.settings.canvasBaseUrl,
                token,
                configured,
            },
            lines: [
                `Auth mode: ${this.settings.authMode}`,
                `Canvas base URL: ${this.settings.canvasBaseUrl ?? 'not configured'}`,
                `API token: ${token}`,
            ],
        };
    }

    async authLogin(token: string | null, baseUrl: string | null): Promise<CommandOutput> {
        if (!token || token.trim() === '') {
            throw ErrorFactory.validation('auth login requires --token <token>.');
        }
        const config = loadConfigFile(this.settings.configPath);
        config.auth = { ...config.auth, mode: 'token', token: token.trim() };
        if (baseUrl) config.canvas_base_url = baseUrl.replace(/\/+$/, '');
        fs.mkdirSync(this.settings.homeDir, { recursive: true });
        saveConfigFile(this.settings.configPath, config);

        this.store.logAction('auth.login', 'mode=token');
        return {
            command: 'auth.login',
            result: { auth_mode: 'token', config_path: this.settings.configPath, token: maskToken(token.trim()) },
            lines: [`Saved API token to ${this.settings.configPath}`],
        };
    }

    async authSetMode(mode: string | null): Promise<CommandOutput> {
        if (!mode || !isAuthMode(mode)) {
            throw ErrorFactory.validation(`Mode must be one of: ${AUTH_MODES.join(', ')}.`, { mode });
        }
        const config = loadConfigFile(this.settings.configPath);
        config.auth = { ...config.auth, mode };
        fs.mkdirSync(this.settings.homeDir, { recursive: true });
        saveConfigFile(this.settings.configPath, config);

        this.store.logAction('auth.set-mode', `mode=${mode}`);
        return {
            command: 'auth.set-mode',
            result: { auth_mode: mode, config_path: this.settings.configPath },
            lines: [`Auth mode set to ${mode} (${this.settings.configPath})`],
        };
    }

    /* ---------------------------------------------------------------------- */
    /* LMS reads                                                              */
    /* ---------------------------------------------------------------------- */

    async coursesList(): Promise<CommandOutput> {
        const courses = await this.client().listCourses();
        this.store.logAction('courses.list', `count=${courses.length}`);
        return {
            command: 'courses.list',
            result: { courses: courses.map((c) => ({ id: c.id, name: c.name, course_code: c.courseCode })) },
            lines: courses.length > 0 ? courses.map((c) => `${c.id}  ${c.name}`) : ['No active courses found.'],
        };
    }

    async assignmentsDue(days: number): Promise<CommandOutput> {
        if (!Number.isInteger(days) || days < 1) {
            throw ErrorFactory.validation(`--days must be an integer >= 1, got ${days}`);
        }
        const assignments = await this.client().listAssignmentsDue(days);
        this.store.logAction('assignments.due', `days=${days},count=${assignments.length}`);
        return {
            command: 'assignments.due',
            result: { days, assignments: assignments.map(assignmentToJson) },
            lines: assignments.length > 0
                ? assignments.map((a) => `${a.id}  ${a.name}  due ${a.dueAt ?? 'n/a'}`)
                : [`No assignments due in the next ${days} days.`],
        };
    }

    async assignmentShow(assignmentId: string): Promise<CommandOutput> {
        const id = requireNumericId(assignmentId, 'assignment_id');
        const assignment = await this.client().getAssignment(id);
        this.store.logAction('assignment.show', `id=${id}`);
        return {
            command: 'assignment.show',
            result: { assignment: assignmentToJson(assignment) },
            lines: [`${assignment.name} (id ${assignment.id})`, `Due: ${assignment.dueAt ?? 'n/a'}`],
        };
    }

    /* ---------------------------------------------------------------------- */
    /* do                                                                     */
    /* ---------------------------------------------------------------------- */

    async do(args: DoArgs): Promise<CommandOutput> {
        const assignmentId = requireNumericId(args.assignmentId, 'assignment_id');
        const mode = args.mode;
        if (!isWorkflowMode(mode)) {
            throw ErrorFactory.validation(`Mode must be one of: ${WORKFLOW_MODES.join(', ')}.`, { mode });
        }

        let resumed: RunRecord | null = null;
        let inputFile: string | null = null;
        if (args.resume) {
            if (args.goal !== null || args.inputFile !== null) {
                throw ErrorFactory.validation('--goal and --input-file cannot be combined with --resume.');
            }
            resumed = this.store.getRun(args.resume);
            if (!resumed) throw ErrorFactory.notFound(`Workflow run not found: ${args.resume}`, { run_id: args.resume });
            if (resumed.assignmentId !== assignmentId) {
                throw ErrorFactory.validation('--resume run assignment_id does not match the provided assignment_id.');
            }
            if (resumed.mode !== mode) {
                throw ErrorFactory.validation('--resume run mode does not match --mode.');
            }
            setCorrelation({ runId: resumed.runId });
            if (resumed.state === 'ready') {
                return this.doOutput(resumed, [], true, [`Workflow already ready. run_id=${resumed.runId}`]);
            }
        } else {
            if (mode === 'polish' && !args.inputFile) {
                throw ErrorFactory.validation('--mode polish requires --input-file.');
            }
            if (args.inputFile) {
                inputFile = path.resolve(args.inputFile);
                if (!fs.existsSync(inputFile) || !fs.statSync(inputFile).isFile()) {
                    throw ErrorFactory.validation(`Input file not found: ${args.inputFile}`, { input_file: args.inputFile });
                }
            }
        }

        const assignment = await this.client().getAssignment(assignmentId);
        enforceDoPolicy(policyForCourse(loadPolicy(this.settings.policyPath), assignment.courseId), mode);

        const run = resumed ?? this.store.createRun({
            runId: newRunId(),
            assignmentId,
            courseId: assignment.courseId,
            mode,
            goal: args.goal,
            inputFile,
            createdAt: this.now().toISOString(),
        });
        setCorrelation({ runId: run.runId });

        const outcome = await this.machine.run(run, { assignment, feedbackHints: this.feedbackHints(assignment) });

        this.store.logAction('do', `id=${assignmentId},mode=${mode},run_id=${run.runId},resume=${resumed !== null}`);
        return this.doOutput(outcome.run, outcome.written, resumed !== null, [
            `Workflow complete: run_id=${run.runId}`,
            'Artifacts written for human review. No auto-submit performed.',
        ]);
    }

    private doOutput(run: RunRecord, written: string[], resumed: boolean, lines: string[]): CommandOutput {
        return {
            command: 'do',
            result: {
                run_id: run.runId,
                assignment_id: run.assignmentId,
                state: run.state,
                mode: run.mode,
                goal: run.goal,
                resumed,
                artifacts: run.artifactPaths,
                written,
                summary: modeSummary(run.mode, run.goal),
            },
            lines,
        };
    }

    /* ---------------------------------------------------------------------- */
    /* review / submit                                                        */
    /* ---------------------------------------------------------------------- */

    async review(assignmentId: string, runId: string | null): Promise<CommandOutput> {
        const id = requireNumericId(assignmentId, 'assignment_id');
        const run = runId ? this.store.getRun(runId) : this.store.findLatestRun(id);
        if (!run) {
            throw runId
                ? ErrorFactory.notFound(`Workflow run not found: ${runId}`, { run_id: runId })
                : ErrorFactory.notFound(`No workflow run found for assignment ${id}. Run \`studyflow do\` first.`, {
                      assignment_id: id,
                  });
        }
        setCorrelation({ runId: run.runId });
        if (run.assignmentId !== id) {
            throw ErrorFactory.validation(`Run ${run.runId} belongs to assignment ${run.assignmentId}, not ${id}.`);
        }
        if (run.state !== 'ready') {
            throw ErrorFactory.validation(
                `Run ${run.runId} is in state '${run.state}', not ready. Finish it with \`studyflow do ${id} --mode ${run.mode} --resume ${run.runId}\`.`,
                { run_id: run.runId, state: run.state }
            );
        }

        await this.client().getAssignment(id);
        const rubricScores = this.readRubricScores(run);
        const issued = this.tokens.issue(run.runId, id);

        this.store.logAction('review', `id=${id},run_id=${run.runId}`);
        return {
            command: 'review',
            result: { ...issued, rubric_scores: rubricScores },
            lines: [
                `Review complete for assignment ${id} (run ${run.runId}).`,
                `Confirm token (short-lived): ${issued.confirm_token}`,
                `Expires at: ${issued.expires_at}`,
            ],
        };
    }

    private readRubricScores(run: RunRecord): unknown[] {
        const reviewPath = run.artifactPaths['review.json'];
        if (!reviewPath) throw new Error(`review.json missing for ${run.runId}`);
        const parsed: unknown = JSON.parse(fs.readFileSync(reviewPath, 'utf-8'));
        if (!isRecord(parsed) || !Array.isArray(parsed.rubric_scores)) {
            throw new Error(`review.json for ${run.runId} has no rubric_scores`);
        }
        return parsed.rubric_scores;
    }

    async submit(args: SubmitArgs): Promise<CommandOutput> {
        if (!args.file) throw ErrorFactory.validation('submit requires --file <path>.');

        const gate = new SubmissionGate({
            store: this.store,
            tokens: this.tokens,
            ledger: this.ledger,
            transport: {
                submitFile: (assignmentId, filePath) => this.client().submitFile(assignmentId, filePath),
            },
            policy: loadPolicy(this.settings.policyPath),
            now: this.now,
        });

        const outcome = await gate.submit({
            target: args.target,
            file: path.resolve(args.file),
            confirm: args.confirm,
            confirmToken: args.confirmToken,
            idempotencyKey: args.idempotencyKey,
            dryRun: args.dryRun,
        });

        this.store.logAction(
            'submit',
            `target=${args.target},dry_run=${args.dryRun},replayed=${outcome.replayed},key=${args.idempotencyKey ?? ''}`
        );

        const lines = outcome.replayed
            ? ['Idempotency replay: returning previous submission result.']
            : outcome.simulated
              ? ['Dry run only. No submission sent.']
              : [`Submission result: ${String(outcome.result.status)}`];
        return { command: 'submit', result: outcome.result, lines };
    }

    /* ---------------------------------------------------------------------- */
    /* runs                                                                   */
    /* ---------------------------------------------------------------------- */

    async runsShow(runId: string): Promise<CommandOutput> {
        const run = this.store.getRun(runId);
        if (!run) throw ErrorFactory.notFound(`Run not found: ${runId}`, { run_id: runId });
        return {
            command: 'runs.show',
            result: { run: runToJson(run) },
            lines: [`Run ${run.runId}: ${run.state} (${run.mode}, assignment ${run.assignmentId})`],
        };
    }

    async runsTail(limit: number): Promise<CommandOutput> {
        if (!Number.isInteger(limit) || limit < 1 || limit > LIMITS.RUNS_TAIL_MAX) {
            throw ErrorFactory.validation(`--limit must be an integer between 1 and ${LIMITS.RUNS_TAIL_MAX}, got ${limit}`);
        }
        const runs = this.store.listRuns(limit);
        return {
            command: 'runs.tail',
            result: { runs: runs.map(runToJson) },
            lines: runs.length > 0 ? runs.map((r) => `${r.runId} ${r.state} ${r.mode}`) : ['No runs found.'],
        };
    }

    /* ---------------------------------------------------------------------- */
    /* feedback / metrics / agent                                             */
    /* ---------------------------------------------------------------------- */

    async feedbackAdd(args: FeedbackArgs): Promise<CommandOutput> {
        const text = args.text?.trim() ?? '';
        if (text === '') throw ErrorFactory.validation('feedback add requires --text <feedback>.');
        const id = this.store.storeFeedback({
            feedbackText: text,
            courseId: optionalNumericId(args.courseId, 'course_id'),
            assignmentId: optionalNumericId(args.assignmentId, 'assignment_id'),
            source: args.source,
        });
        this.store.logAction('feedback.add', `id=${id}`);
        return { command: 'feedback.add', result: { id }, lines: [`Saved feedback #${id}`] };
    }

    async feedbackList(courseId: string | null, assignmentId: string | null): Promise<CommandOutput> {
        const rows = this.store.listFeedback(
            {
                courseId: optionalNumericId(courseId, 'course_id'),
                assignmentId: optionalNumericId(assignmentId, 'assignment_id'),
            },
            LIMITS.FEEDBACK_LIST
        );
        return {
            command: 'feedback.list',
            result: {
                feedback: rows.map((r) => ({
                    id: r.id,
                    course_id: r.courseId,
                    assignment_id: r.assignmentId,
                    feedback_text: r.feedbackText,
                    source: r.source,
                    created_at: r.createdAt,
                })),
            },
            lines: rows.length > 0 ? rows.map((r) => `#${r.id} ${r.feedbackText}`) : ['No feedback found.'],
        };
    }

    async metricsSummary(): Promise<CommandOutput> {
        const summary = this.store.metricsSummary();
        return {
            command: 'metrics.summary',
            result: { ...summary },
            lines: [
                `Total runs: ${summary.total_runs}`,
                `Ready: ${summary.ready_runs} In progress: ${summary.in_progress_runs}`,
                `Confirm tokens issued: ${summary.tokens_issued} consumed: ${summary.tokens_consumed}`,
            ],
        };
    }

    async agentCapabilities(): Promise<CommandOutput> {
        return {
            command: 'agent.capabilities',
            result: { commands: AGENT_CAPABILITIES },
            lines: ['Use --json for machine-readable capabilities.'],
        };
    }
}

function describeCause(e: unknown): string | undefined {
    if (e === undefined) return undefined;
    return e instanceof Error ? e.message : String(e);
}

type Risk = 'low' | 'medium' | 'high';

interface Capability {
    name: string;
    risk: Risk;
    confirmation_required: boolean;
    permissions: string[];
}

export const AGENT_CAPABILITIES: readonly Capability[] = [
    { name: 'courses.list', risk: 'low', confirmation_required: false, permissions: ['canvas:read'] },
    { name: 'assignments.due', risk: 'low', confirmation_required: false, permissions: ['canvas:read'] },
    { name: 'assignment.show', risk: 'low', confirmation_required: false, permissions: ['canvas:read'] },
    { name: 'do', risk: 'medium', confirmation_required: false, permissions: ['canvas:read', 'local:state', 'local:artifacts'] },
    { name: 'review', risk: 'medium', confirmation_required: false, permissions: ['canvas:read', 'local:state'] },
    { name: 'submit', risk: 'high', confirmation_required: true, permissions: ['canvas:write', 'local:state'] },
    { name: 'runs.show', risk: 'low', confirmation_required: false, permissions: ['local:state'] },
    { name: 'runs.tail', risk: 'low', confirmation_required: false, permissions: ['local:state'] },
    { name: 'feedback.add', risk: 'low', confirmation_required: false, permissions: ['local:state'] },
    { name: 'feedback.list', risk: 'low', confirmation_required: false, permissions: ['local:state'] },
    { name: 'metrics.summary', risk: 'low', confirmation_required: false, permissions: ['local:state'] },
];
