/**
 * Course policy: per-course guardrails read from policy.json.
 *
 * Shape: `{ default: Rule, courses: { "<course_id>": Rule } }`. A course entry
 * replaces the default rule entirely; it is not merged with it.
 */

import * as fs from 'fs';
import { SchemaValidator, JsonSchema, ValidationError, formatValidationErrors } from './schema_validator';
import { ErrorFactory, StudyflowError } from './structured_error';
import { WORKFLOW_MODES, WorkflowMode } from './run_types';

export interface PolicyRule {
    allowed_modes?: WorkflowMode[];
    dry_run_only?: boolean;
    disable_submit?: boolean;
    max_review_token_age_minutes?: number;
}

export interface PolicyFile {
    default?: PolicyRule;
    courses?: Record<string, PolicyRule>;
}

export type PolicyRuleName = 'POLICY_BLOCKED_MODE' | 'POLICY_SUBMIT_DISABLED' | 'POLICY_DRY_RUN_ONLY' | 'POLICY_REVIEW_TOKEN_TOO_OLD';

export interface PolicyViolation {
    rule: PolicyRuleName;
    message: string;
    details: Record<string, unknown>;
}

export const POLICY_TEMPLATE: PolicyFile = {
    default: {
        allowed_modes: [...WORKFLOW_MODES],
        dry_run_only: true,
        max_review_token_age_minutes: 10,
    },
    courses: {},
};

const RULE_SCHEMA: JsonSchema = {
    type: 'object',
    properties: {
        allowed_modes: { type: 'array', items: { type: 'string', enum: WORKFLOW_MODES } },
        dry_run_only: { type: 'boolean' },
        disable_submit: { type: 'boolean' },
        max_review_token_age_minutes: { type: 'number', minimum: 0 },
    },
};

const POLICY_SCHEMA: JsonSchema = {
    type: 'object',
    properties: {
        default: RULE_SCHEMA,
        courses: { type: 'object', additionalProperties: RULE_SCHEMA },
    },
};

const validator = new SchemaValidator();
validator.registerSchema('policy_v1', POLICY_SCHEMA);

function isPolicyFile(value: unknown, errors: ValidationError[]): value is PolicyFile {
    const result = validator.validate(value, 'policy_v1');
    errors.push(...result.errors);
    return result.valid;
}

/** Missing file means no policy. A file that is present must parse and validate. */
export function loadPolicy(policyPath: string): PolicyFile {
    if (!fs.existsSync(policyPath)) return {};

    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(policyPath, 'utf-8'));
    } catch (e) {
        throw ErrorFactory.validation(`Policy file is not valid JSON: ${policyPath}`, {
            policy_path: policyPath,
            cause: e instanceof Error ? e.message : String(e),
        });
    }

    const errors: ValidationError[] = [];
    if (!isPolicyFile(parsed, errors)) {
        throw ErrorFactory.validation(`Policy file failed validation: ${formatValidationErrors(errors)}`, {
            policy_path: policyPath,
            errors,
        });
    }
    return parsed;
}

export function policyForCourse(policy: PolicyFile, courseId: string | null): PolicyRule {
    if (courseId !== null) {
        const rule = policy.courses?.[courseId];
        if (rule) return rule;
    }
    return policy.default ?? {};
}

/** Throws POLICY_VIOLATION when the course does not allow `mode`. An empty list allows everything. */
export function enforceDoPolicy(rule: PolicyRule, mode: WorkflowMode): void {
    const allowed = rule.allowed_modes;
    if (allowed && allowed.length > 0 && !allowed.includes(mode)) {
        throw ErrorFactory.policyViolation(
            'POLICY_BLOCKED_MODE',
            `POLICY_BLOCKED_MODE: mode '${mode}' is not allowed for this course`,
            { mode, allowed_modes: allowed }
        );
    }
}

export function evaluateSubmitPolicy(
    rule: PolicyRule,
    params: { dryRun: boolean; tokenIssuedAt: string; now: Date }
): PolicyViolation | null {
    if (rule.disable_submit === true) {
        return {
            rule: 'POLICY_SUBMIT_DISABLED',
            message: 'POLICY_SUBMIT_DISABLED: submissions are disabled by course policy',
            details: {},
        };
    }
    if (rule.dry_run_only === true && !params.dryRun) {
        return {
            rule: 'POLICY_DRY_RUN_ONLY',
            message: 'POLICY_DRY_RUN_ONLY: policy requires --dry-run for this course',
            details: {},
        };
    }

    const maxAge = rule.max_review_token_age_minutes;
    if (params.dryRun || maxAge === undefined) return null;

    const ageMinutes = (params.now.getTime() - Date.parse(params.tokenIssuedAt)) / 60_000;
    if (ageMinutes > maxAge) {
        return {
            rule: 'POLICY_REVIEW_TOKEN_TOO_OLD',
            message: 'POLICY_REVIEW_TOKEN_TOO_OLD: review token is older than policy allows',
            details: { max_review_token_age_minutes: maxAge, token_age_minutes: Math.round(ageMinutes * 100) / 100 },
        };
    }
    return null;
}

export function violationError(v: PolicyViolation): StudyflowError {
    return ErrorFactory.policyViolation(v.rule, v.message, v.details);
}
