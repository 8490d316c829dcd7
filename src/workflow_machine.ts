// workflow_machine.ts - linear run workflow: queued -> planning -> drafting -> reviewing -> ready
//
// GUARANTEES:
// - advance() does exactly the work of the current state, then persists the
//   successor with a compare-and-set on the previous state
// - Any failure inside a stage leaves the persisted state untouched (INTERNAL)
// - Stage files are staged beside their targets and renamed into place only
//   after the compare-and-set succeeds; a stale advance changes no artifact
// - A ready run is never touched: no files, no updated_at bump
// - No stage performs the submission side effect
//
// run() holds <run dir>/.lock for the whole loop so two invocations cannot
// drive the same run at once.

import crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { TIMEOUTS } from './config';
import { HistoryStore } from './history_store';
import { LmsAssignment } from './lms_client';
import { createLogger, setCorrelation } from './logger';
import {
    acquireRunLock,
    atomicWriteFileSync,
    errnoCode,
    LockHandle,
    LockHeldError,
    releaseRunLock,
    stableStringifyPretty,
} from './output_writer';
import { DeterministicRubricScorer, optimizeDraftForRubric, parseRubricCriteria, RubricScorer } from './rubric_scorer';
import { ActiveState, ArtifactName, ArtifactPaths, RunRecord, WorkflowState } from './run_types';
import {
    buildPlan,
    buildSources,
    generateModeOutput,
    injectInlineCitations,
    MAX_FEEDBACK_HINTS,
    modeSummary,
    SUBMIT_CHECKLIST,
} from './stage_content';
import { ErrorFactory } from './structured_error';

const log = createLogger('workflow');

/* -------------------------------------------------------------------------- */
/* Transitions                                                                */
/* -------------------------------------------------------------------------- */

const SUCCESSOR: Readonly<Record<ActiveState, WorkflowState>> = {
    queued: 'planning',
    planning: 'drafting',
    drafting: 'reviewing',
    reviewing: 'ready',
};

export function isTerminal(state: WorkflowState): state is 'ready' {
    return state === 'ready';
}

/** Total over the non-terminal states; `ready` has no successor. */
export function successorOf(state: WorkflowState): WorkflowState {
    if (isTerminal(state)) {
        throw new Error('ready is terminal and has no successor state');
    }
    return SUCCESSOR[state];
}

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

/** Inputs a stage may need beyond the run record itself. */
export interface StageContext {
    assignment: LmsAssignment;
    feedbackHints: readonly string[];
}

export interface AdvanceResult {
    run: RunRecord;
    written: ArtifactName[];
}

export interface RunResult extends AdvanceResult {
    transitions: number;
}

export interface WorkflowMachineOptions {
    store: HistoryStore;
    artifactsRoot: string;
    scorer?: RubricScorer;
    now?: () => Date;
    lockTimeoutMs?: number;
    lockStaleMs?: number;
}

interface StageFile {
    name: ArtifactName;
    content: string;
}

interface StagedFile {
    name: ArtifactName;
    stagedPath: string;
    finalPath: string;
}

function discardStaged(stagedPath: string, warnings: string[]): void {
    try {
        fs.unlinkSync(stagedPath);
    } catch (e) {
        const code = errnoCode(e);
        if (code !== 'ENOENT') warnings.push(`STAGED_CLEANUP_FAILED(${code ?? 'UNKNOWN'}) on ${stagedPath}`);
    }
}

const REVIEW_NOTE = 'Deterministic MVP scorer; verify against official rubric before submission.';

/* -------------------------------------------------------------------------- */
/* Machine                                                                    */
/* -------------------------------------------------------------------------- */

export class WorkflowMachine {
    private readonly store: HistoryStore;
    private readonly artifactsRoot: string;
    private readonly scorer: RubricScorer;
    private readonly now: () => Date;
    private readonly lockTimeoutMs: number;
    private readonly lockStaleMs: number;

    constructor(opts: WorkflowMachineOptions) {
        this.store = opts.store;
        this.artifactsRoot = opts.artifactsRoot;
        this.scorer = opts.scorer ?? new DeterministicRubricScorer();
        this.now = opts.now ?? (() => new Date());
        this.lockTimeoutMs = opts.lockTimeoutMs ?? TIMEOUTS.RUN_LOCK_WAIT_MS;
        this.lockStaleMs = opts.lockStaleMs ?? TIMEOUTS.RUN_LOCK_STALE_MS;
    }

    artifactDir(runId: string): string {
        return path.join(this.artifactsRoot, runId);
    }

    /**
     * Execute the current state's work and persist its successor.
     * `ready` returns the run as is with nothing written.
     */
    advance(run: RunRecord, ctx: StageContext): AdvanceResult {
        const state = run.state;
        if (isTerminal(state)) return { run, written: [] };

        setCorrelation({ runId: run.runId, stage: state });
        const next = successorOf(state);

        const staged: StagedFile[] = [];
        const warnings: string[] = [];
        try {
            const files = this.stageFiles(state, run, ctx);
            const artifactPaths: ArtifactPaths = { ...run.artifactPaths };
            const dir = this.artifactDir(run.runId);
            const suffix = crypto.randomBytes(4).toString('hex');

            for (const file of files) {
                const finalPath = path.join(dir, file.name);
                const stagedPath = `${finalPath}.pending.${suffix}`;
                atomicWriteFileSync({ filePath: stagedPath, content: file.content, mode: 0o644, fsyncMode: 'BEST_EFFORT', warnings });
                staged.push({ name: file.name, stagedPath, finalPath });
                artifactPaths[file.name] = finalPath;
            }

            const updatedAt = this.now().toISOString();
            this.store.immediate(() => {
                if (!this.store.compareAndSetRunState(run.runId, state, next, artifactPaths, updatedAt)) {
                    throw new Error(`run is no longer in state '${state}'`);
                }
                // A failed rename throws out of the transaction and rolls the state back.
                for (const file of staged) fs.renameSync(file.stagedPath, file.finalPath);
            });
            staged.length = 0;

            log.info('State advanced', { from: state, to: next, artifacts: files.map((f) => f.name) });
            return {
                run: { ...run, state: next, artifactPaths, updatedAt },
                written: files.map((f) => f.name),
            };
        } catch (e) {
            log.error('Stage failed; state unchanged', { state, error: e instanceof Error ? e.message : String(e) });
            throw ErrorFactory.stageFailed(run.runId, state, e);
        } finally {
            for (const file of staged) discardStaged(file.stagedPath, warnings);
            for (const w of warnings) log.debug(w);
        }
    }

    /**
     * Advance until ready. The persisted record is re-read under the run lock,
     * so a resumed run continues from wherever the last invocation stopped.
     */
    async run(run: RunRecord, ctx: StageContext): Promise<RunResult> {
        if (isTerminal(run.state)) {
            return { run, written: [], transitions: 0 };
        }

        const warnings: string[] = [];
        const lock = await this.lockRun(run.runId, warnings);

        try {
            let current = this.store.getRun(run.runId);
            if (!current) throw ErrorFactory.notFound(`Workflow run not found: ${run.runId}`, { run_id: run.runId });

            const written: ArtifactName[] = [];
            let transitions = 0;
            while (!isTerminal(current.state)) {
                const step = this.advance(current, ctx);
                current = step.run;
                written.push(...step.written);
                transitions++;
            }
            return { run: current, written, transitions };
        } finally {
            releaseRunLock(lock, warnings);
            for (const w of warnings) log.debug(w);
            setCorrelation({ stage: '' });
        }
    }

    private async lockRun(runId: string, warnings: string[]): Promise<LockHandle> {
        try {
            return await acquireRunLock({
                lockPath: path.join(this.artifactDir(runId), '.lock'),
                timeoutMs: this.lockTimeoutMs,
                staleTtlMs: this.lockStaleMs,
                identityJson: { run_id: runId },
                warnings,
            });
        } catch (e) {
            if (e instanceof LockHeldError) {
                throw ErrorFactory.validation('run is locked by another invocation', { run_id: runId });
            }
            throw e;
        }
    }

    /* ---------------------------------------------------------------------- */
    /* Stage work                                                             */
    /* ---------------------------------------------------------------------- */

    private stageFiles(state: ActiveState, run: RunRecord, ctx: StageContext): StageFile[] {
        const generatedAt = this.now().toISOString();

        switch (state) {
            case 'queued':
                return [
                    { name: 'plan.json', content: stableStringifyPretty(buildPlan(ctx.assignment, run.mode, run.goal, generatedAt)) },
                ];

            case 'planning': {
                const polishInput = run.mode === 'polish' && run.inputFile
                    ? fs.readFileSync(run.inputFile, 'utf-8')
                    : null;
                const output = generateModeOutput(run.mode, ctx.assignment, {
                    goal: run.goal,
                    feedbackHints: ctx.feedbackHints,
                    polishInput,
                });
                const sources = buildSources(ctx.assignment, output.draft, generatedAt);
                return [
                    { name: 'draft.md', content: injectInlineCitations(output.draft, sources) },
                    { name: 'sources.json', content: stableStringifyPretty(sources) },
                ];
            }

            case 'drafting': {
                const draftPath = run.artifactPaths['draft.md'];
                if (!draftPath) throw new Error('draft.md has not been written for this run');
                const draft = fs.readFileSync(draftPath, 'utf-8');
                const criteria = parseRubricCriteria(ctx.assignment);
                const review = {
                    rubric_scores: this.scorer.score(criteria, draft),
                    optimization: optimizeDraftForRubric(criteria, draft, this.scorer),
                    scorer: this.scorer.name,
                    notes: REVIEW_NOTE,
                    goal: run.goal,
                    draft_sha256: crypto.createHash('sha256').update(draft, 'utf8').digest('hex'),
                };
                const evidence = {
                    assignment_id: run.assignmentId,
                    assignment_name: ctx.assignment.name,
                    course_id: run.courseId,
                    mode: run.mode,
                    goal: run.goal,
                    summary: modeSummary(run.mode, run.goal),
                    feedback_hints_used: ctx.feedbackHints.slice(0, MAX_FEEDBACK_HINTS),
                    generated_at: generatedAt,
                };
                return [
                    { name: 'review.json', content: stableStringifyPretty(review) },
                    { name: 'evidence.json', content: stableStringifyPretty(evidence) },
                ];
            }

            case 'reviewing':
                return [{ name: 'submit_checklist.md', content: SUBMIT_CHECKLIST }];
        }
    }
}
