// stage_content.ts - text and JSON bodies written by the workflow stages
//
// Everything here is a pure function of its inputs (timestamps are passed in),
// so a re-run of a stage over the same inputs writes the same artifact.

import { LIMITS } from './config';
import { LmsAssignment } from './lms_client';
import { WorkflowMode } from './run_types';

export const MAX_FEEDBACK_HINTS = LIMITS.FEEDBACK_HINTS;
export const MAX_SOURCE_CLAIMS = LIMITS.SOURCE_CLAIMS_MAX;
const CLAIM_MIN_CHARS = 50;

/* -------------------------------------------------------------------------- */
/* plan.json                                                                  */
/* -------------------------------------------------------------------------- */

export interface ScheduleBlock {
    label: string;
    start: string;
    end: string;
}

export interface PlanStep {
    step: number;
    instruction: string;
}

const SCHEDULE = [
    { label: 'Research', daysBefore: 5 },
    { label: 'Draft', daysBefore: 3 },
    { label: 'Revise', daysBefore: 1 },
    { label: 'Final QA', daysBefore: 0 },
] as const;

const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;

/** Work blocks counted back from the due date; empty when the due date is unknown. */
export function deriveScheduleBlocks(dueAt: string | null): ScheduleBlock[] {
    if (!dueAt) return [];
    const due = Date.parse(dueAt);
    if (Number.isNaN(due)) return [];

    return SCHEDULE.map(({ label, daysBefore }) => {
        const start = due - daysBefore * DAY_MS - 2 * HOUR_MS;
        return {
            label,
            start: new Date(start).toISOString(),
            end: new Date(start + HOUR_MS).toISOString(),
        };
    });
}

export function planSteps(assignment: Pick<LmsAssignment, 'name'>): PlanStep[] {
    return [
        `Understand requirements for '${assignment.name}'`,
        'Break prompt into subtasks and acceptance criteria',
        'Collect references/materials',
        'Draft response in your own words',
        'Revise for clarity and citation compliance',
        'Final human review before submission',
    ].map((instruction, i) => ({ step: i + 1, instruction }));
}

export function buildPlan(
    assignment: LmsAssignment,
    mode: WorkflowMode,
    goal: string | null,
    generatedAt: string
): Record<string, unknown> {
    const plan: Record<string, unknown> = {
        assignment_id: assignment.id,
        assignment_name: assignment.name,
        course_id: assignment.courseId,
        due_at: assignment.dueAt,
        mode,
        goal,
        steps: planSteps(assignment),
        generated_at: generatedAt,
    };
    const blocks = deriveScheduleBlocks(assignment.dueAt);
    if (blocks.length > 0) plan.schedule_blocks = blocks;
    return plan;
}

/* -------------------------------------------------------------------------- */
/* draft.md                                                                   */
/* -------------------------------------------------------------------------- */

export interface ModeOutput {
    draft: string;
    summary: string;
}

export interface ModeInput {
    goal: string | null;
    feedbackHints: readonly string[];
    /** Text of --input-file; polish only. */
    polishInput: string | null;
}

function hintsSection(hints: readonly string[]): string {
    if (hints.length === 0) return '';
    const lines = hints.slice(0, MAX_FEEDBACK_HINTS).map((h) => `- ${h}`);
    return '\n## Instructor feedback memory\n' + lines.join('\n') + '\n';
}

const MODE_SUMMARIES: Record<WorkflowMode, string> = {
    tutor: 'Tutor mode generated guided steps, reflective questions, and study hints.',
    outline: 'Outline mode generated structured sections with goals.',
    polish: 'Polish mode improved provided draft and included revision rationale.',
    draft: 'Draft mode generated a first-pass response.',
};

export function modeSummary(mode: WorkflowMode, goal: string | null): string {
    const summary = MODE_SUMMARIES[mode];
    return goal ? `${summary} Goal emphasis: ${goal}.` : summary;
}

export function generateModeOutput(mode: WorkflowMode, assignment: LmsAssignment, input: ModeInput): ModeOutput {
    const title = assignment.name;
    const goalLine = input.goal ? `\n**Goal:** ${input.goal}\n` : '';
    const hints = hintsSection(input.feedbackHints);

    switch (mode) {
        case 'tutor':
            return {
                draft:
                    `# Study guide for: ${title}\n` +
                    `${goalLine}\n` +
                    '## Guided steps\n' +
                    '1. Restate the assignment requirements in your own words.\n' +
                    '2. Identify what evidence or examples are required.\n' +
                    '3. Draft a thesis and test it against the prompt.\n' +
                    '4. Build an outline with claim -> support -> explanation.\n' +
                    '5. Self-check for rubric alignment before writing final prose.\n\n' +
                    '## Questions to answer\n' +
                    '- What is the core claim you want to make?\n' +
                    '- Which strongest two pieces of evidence support it?\n' +
                    '- Where could a reader disagree, and how will you address that?\n\n' +
                    hints +
                    '## Study hints\n' +
                    '- Use short work sprints and revise between sprints.\n' +
                    '- Keep a rubric checklist visible while drafting.\n' +
                    '- Explain each paragraph out loud to verify understanding.\n',
                summary: modeSummary(mode, input.goal),
            };

        case 'outline':
            return {
                draft:
                    `# Outline for: ${title}\n` +
                    `${goalLine}\n` +
                    '## Section 1: Introduction\n' +
                    '- Goal: frame the prompt and present a clear thesis.\n\n' +
                    '## Section 2: Key point A\n' +
                    '- Goal: support thesis with strongest evidence/example.\n\n' +
                    '## Section 3: Key point B\n' +
                    '- Goal: expand analysis and address implications/counterpoint.\n\n' +
                    '## Section 4: Conclusion\n' +
                    '- Goal: synthesize argument and reinforce significance.\n' +
                    hints,
                summary: modeSummary(mode, input.goal),
            };

        case 'polish': {
            const base = (input.polishInput ?? assignment.description).trim()
                || '(No input text provided; generated a revision scaffold.)';
            return {
                draft:
                    `# Polished draft for: ${title}\n` +
                    `${goalLine}\n` +
                    `${base}\n\n` +
                    '---\n' +
                    '## Rationale for revisions\n' +
                    '- Improved clarity with tighter topic sentences.\n' +
                    '- Strengthened flow using explicit transitions.\n' +
                    '- Elevated tone for academic consistency.\n' +
                    hints,
                summary: modeSummary(mode, input.goal),
            };
        }

        case 'draft':
            return {
                draft:
                    `# First draft for: ${title}\n` +
                    `${goalLine}\n` +
                    'This draft addresses the prompt directly, presents a main claim, ' +
                    'and supports that claim with evidence and explanation. ' +
                    'Expand each paragraph with assignment-specific details ' +
                    'and citations where required.\n' +
                    hints,
                summary: modeSummary(mode, input.goal),
            };
    }
}

/* -------------------------------------------------------------------------- */
/* sources.json                                                               */
/* -------------------------------------------------------------------------- */

export interface EvidenceLink {
    placeholder: string;
    type: 'source_placeholder';
    note: string;
}

export interface SourceClaim {
    claim_id: string;
    text: string;
    evidence_links: EvidenceLink[];
}

export interface SourcesDocument {
    assignment: string;
    citation_style: 'placeholder';
    generated_at: string;
    claims: SourceClaim[];
}

/** Long declarative lines become claims needing a citation. claim_id is the 1-based line number. */
export function buildSources(assignment: Pick<LmsAssignment, 'name'>, draft: string, generatedAt: string): SourcesDocument {
    const claims: SourceClaim[] = [];
    const lines = draft.split('\n');

    for (let i = 0; i < lines.length && claims.length < MAX_SOURCE_CLAIMS; i++) {
        const text = lines[i].trim();
        if (text.length <= CLAIM_MIN_CHARS || !text.endsWith('.')) continue;
        claims.push({
            claim_id: `C${i + 1}`,
            text,
            evidence_links: [
                {
                    placeholder: `[${claims.length + 1}]`,
                    type: 'source_placeholder',
                    note: 'Replace with course reading, lecture, or credible reference.',
                },
            ],
        });
    }

    return {
        assignment: assignment.name,
        citation_style: 'placeholder',
        generated_at: generatedAt,
        claims,
    };
}

/** Append each claim's placeholder to the first line containing it. */
export function injectInlineCitations(draft: string, sources: SourcesDocument): string {
    if (sources.claims.length === 0) return draft;
    const lines = draft.split('\n');

    for (const claim of sources.claims) {
        const placeholder = claim.evidence_links[0]?.placeholder ?? '[1]';
        const idx = lines.findIndex((line) => line.includes(claim.text) && !line.includes(placeholder));
        if (idx >= 0) lines[idx] = `${lines[idx]} ${placeholder}`;
    }
    return lines.join('\n');
}

/* -------------------------------------------------------------------------- */
/* submit_checklist.md                                                        */
/* -------------------------------------------------------------------------- */

export const SUBMIT_CHECKLIST =
    '# Submit checklist\n\n' +
    '- [ ] I reviewed the draft for accuracy and originality.\n' +
    '- [ ] I verified rubric criteria coverage.\n' +
    '- [ ] I ran my own final edits and citations check.\n' +
    '- [ ] I will submit manually using review + submit safeguards.\n';
