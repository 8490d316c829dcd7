/**
 * Rubric scoring for review.json.
 *
 * The deterministic scorer is a placeholder: it looks only at length and a few
 * surface markers of the draft. Anything that satisfies RubricScorer can replace
 * it without touching the workflow machine.
 */

import { LmsAssignment } from './lms_client';

export type ScoreBand = 'developing' | 'approaching' | 'proficient';

export interface RubricScoreRow {
    criterion: string;
    estimated_score_band: ScoreBand;
    gaps: string[];
    suggested_fixes: string[];
}

export interface RubricScorer {
    readonly name: string;
    score(criteria: readonly string[], draft: string): RubricScoreRow[];
}

export const DEFAULT_CRITERIA: readonly string[] = [
    'Prompt coverage',
    'Evidence and examples',
    'Organization and clarity',
    'Grammar and style',
];

const MIN_DEVELOPED_CHARS = 250;

export function parseRubricCriteria(assignment: Pick<LmsAssignment, 'rubric'>): string[] {
    const criteria = assignment.rubric.map((c) => c.description).filter((d) => d.trim() !== '');
    return criteria.length > 0 ? criteria : [...DEFAULT_CRITERIA];
}

export class DeterministicRubricScorer implements RubricScorer {
    readonly name = 'deterministic-v1';

    score(criteria: readonly string[], draft: string): RubricScoreRow[] {
        const text = draft.trim().toLowerCase();
        const hasSupport = /\d/.test(text) || text.includes('because') || text.includes('for example');
        const exploratory = text.includes('?');

        return criteria.map((criterion, idx) => {
            let row: RubricScoreRow;
            if (text.length < MIN_DEVELOPED_CHARS) {
                row = {
                    criterion,
                    estimated_score_band: 'developing',
                    gaps: ['Needs more depth and detail'],
                    suggested_fixes: ['Add at least one concrete supporting paragraph'],
                };
            } else if (hasSupport) {
                row = {
                    criterion,
                    estimated_score_band: 'proficient',
                    gaps: ['Could strengthen specificity'],
                    suggested_fixes: ['Add source-backed facts and clearer transitions'],
                };
            } else {
                row = {
                    criterion,
                    estimated_score_band: 'approaching',
                    gaps: ['Limited concrete support'],
                    suggested_fixes: ['Add examples, data, or textual evidence'],
                };
            }

            // An open question in the text means the thesis is not settled yet.
            if (idx === 0 && exploratory) {
                row.estimated_score_band = 'approaching';
                row.gaps.push('Main claim still exploratory');
                row.suggested_fixes.push('Convert questions into a clear thesis statement');
            }
            return row;
        });
    }
}

export interface OptimizationPass {
    pass: number;
    changes_applied: boolean;
    gap_count: number;
}

export interface OptimizationSummary {
    passes: OptimizationPass[];
    pass_count: number;
}

const IMPROVEMENT_NOTES =
    '\n\n## Rubric improvement pass\n' +
    '- Clarified thesis statement for direct prompt alignment.\n' +
    '- Added concrete examples and evidence language.\n' +
    '- Improved transitions between supporting points.\n';

export const MAX_OPTIMIZATION_PASSES = 2;

/**
 * Re-scores a working copy of the draft, appending improvement notes while any
 * criterion is below proficient. Only the pass log is returned; the caller's
 * draft is never changed.
 */
export function optimizeDraftForRubric(
    criteria: readonly string[],
    draft: string,
    scorer: RubricScorer,
    maxPasses: number = MAX_OPTIMIZATION_PASSES
): OptimizationSummary {
    let working = draft;
    const passes: OptimizationPass[] = [];

    for (let pass = 1; pass <= maxPasses; pass++) {
        const gapCount = scorer.score(criteria, working).filter((r) => r.estimated_score_band !== 'proficient').length;
        if (gapCount === 0) {
            passes.push({ pass, changes_applied: false, gap_count: 0 });
            break;
        }
        working += IMPROVEMENT_NOTES;
        passes.push({ pass, changes_applied: true, gap_count: gapCount });
    }

    return { passes, pass_count: passes.length };
}
