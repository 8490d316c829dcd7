/**
 * Shared record types for runs, confirm tokens and the idempotency ledger.
 */

export const WORKFLOW_STATES = ['queued', 'planning', 'drafting', 'reviewing', 'ready'] as const;
export type WorkflowState = (typeof WORKFLOW_STATES)[number];
export type ActiveState = Exclude<WorkflowState, 'ready'>;

export const WORKFLOW_MODES = ['tutor', 'outline', 'draft', 'polish'] as const;
export type WorkflowMode = (typeof WORKFLOW_MODES)[number];

/** In creation order. */
export const ARTIFACT_NAMES = [
    'plan.json',
    'draft.md',
    'sources.json',
    'review.json',
    'evidence.json',
    'submit_checklist.md',
] as const;
export type ArtifactName = (typeof ARTIFACT_NAMES)[number];

export type ArtifactPaths = Partial<Record<ArtifactName, string>>;

export interface RunRecord {
    runId: string;
    assignmentId: string;
    courseId: string | null;
    mode: WorkflowMode;
    state: WorkflowState;
    goal: string | null;
    inputFile: string | null;
    artifactPaths: ArtifactPaths;
    createdAt: string;
    updatedAt: string;
}

export interface ConfirmTokenRecord {
    tokenHash: string;
    runId: string;
    assignmentId: string;
    issuedAt: string;
    expiresAt: string;
    consumed: boolean;
    consumedAt: string | null;
}

export interface IdempotencyRecord {
    idempotencyKey: string;
    runId: string;
    /** Exact serialized result returned by the first successful submission. */
    resultSnapshot: string;
    createdAt: string;
}

export function isWorkflowState(value: string): value is WorkflowState {
    return (WORKFLOW_STATES as readonly string[]).includes(value);
}

export function isWorkflowMode(value: string): value is WorkflowMode {
    return (WORKFLOW_MODES as readonly string[]).includes(value);
}

export function isArtifactName(value: string): value is ArtifactName {
    return (ARTIFACT_NAMES as readonly string[]).includes(value);
}

/** Snake-case view used in envelopes and `runs show`. */
export function runToJson(run: RunRecord): Record<string, unknown> {
    return {
        run_id: run.runId,
        assignment_id: run.assignmentId,
        course_id: run.courseId,
        mode: run.mode,
        state: run.state,
        goal: run.goal,
        input_file: run.inputFile,
        artifact_paths: run.artifactPaths,
        created_at: run.createdAt,
        updated_at: run.updatedAt,
    };
}
