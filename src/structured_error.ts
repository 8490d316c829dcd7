/**
 * Structured errors for the command envelope.
 *
 * Every failure that leaves the core is a StudyflowError carrying one kind from
 * the fixed taxonomy below, a human-readable message and optional details. The
 * command layer turns it into `{code, message, details}` without reinterpreting it.
 */

import { LmsClientError } from './lms_client';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorKind =
    // Upstream LMS
    | 'AUTH'
    | 'PERMISSION'
    | 'NOT_FOUND'
    | 'RATE_LIMIT'
    | 'NETWORK_TIMEOUT'

    // Guardrails
    | 'CONFIRM_REQUIRED'
    | 'POLICY_VIOLATION'

    // Input / local failures
    | 'VALIDATION'
    | 'INTERNAL';

export type TokenFailureReason = 'NOT_FOUND' | 'EXPIRED' | 'ALREADY_CONSUMED' | 'RUN_MISMATCH';

export interface StructuredError {
    code: ErrorKind;
    message: string;
    details: Record<string, unknown>;
}

export class StudyflowError extends Error {
    constructor(
        public readonly kind: ErrorKind,
        message: string,
        public readonly details: Record<string, unknown> = {},
        cause?: unknown
    ) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'StudyflowError';
    }

    toStructured(): StructuredError {
        return createStructuredError(this.kind, this.message, this.details);
    }
}

/* -------------------------------------------------------------------------- */
/* Error Builders                                                             */
/* -------------------------------------------------------------------------- */

export function createStructuredError(
    code: ErrorKind,
    message: string,
    details: Record<string, unknown> = {}
): StructuredError {
    return { code, message, details };
}

/**
 * Translate anything thrown below the command layer into the taxonomy.
 * LMS transport errors are mapped by type; everything unrecognised is INTERNAL.
 */
export function toStudyflowError(e: unknown): StudyflowError {
    if (e instanceof StudyflowError) return e;

    if (e instanceof LmsClientError) {
        const details: Record<string, unknown> = { endpoint: e.endpoint };
        if (e.statusCode !== null) details.status_code = e.statusCode;
        switch (e.errorType) {
            case 'unauthorized':
                return new StudyflowError('AUTH', `LMS rejected the credentials: ${e.message}`, details, e);
            case 'forbidden':
                return new StudyflowError('PERMISSION', `LMS denied access: ${e.message}`, details, e);
            case 'not_found':
                return new StudyflowError('NOT_FOUND', `LMS record not found: ${e.message}`, details, e);
            case 'rate_limited':
                return new StudyflowError('RATE_LIMIT', `LMS rate limit reached: ${e.message}`, details, e);
            case 'timeout':
            case 'network':
                return new StudyflowError('NETWORK_TIMEOUT', `LMS unreachable: ${e.message}`, details, e);
            default:
                return new StudyflowError('INTERNAL', `LMS API error: ${e.message}`, details, e);
        }
    }

    const message = e instanceof Error ? e.message : String(e);
    return new StudyflowError('INTERNAL', message || 'Unexpected failure', {}, e);
}

/* -------------------------------------------------------------------------- */
/* Error Factory Methods                                                      */
/* -------------------------------------------------------------------------- */

export class ErrorFactory {
    static validation(message: string, details: Record<string, unknown> = {}): StudyflowError {
        return new StudyflowError('VALIDATION', message, details);
    }

    static notFound(message: string, details: Record<string, unknown> = {}): StudyflowError {
        return new StudyflowError('NOT_FOUND', message, details);
    }

    static confirmFlagMissing(): StudyflowError {
        return new StudyflowError('CONFIRM_REQUIRED', 'Refusing to submit without explicit --confirm.', {
            reason: 'CONFIRM_FLAG_MISSING',
        });
    }

    static confirmTokenMissing(): StudyflowError {
        return new StudyflowError('CONFIRM_REQUIRED', 'Missing --confirm-token. Run review first.', {
            reason: 'TOKEN_MISSING',
        });
    }

    static confirmTokenRejected(reason: TokenFailureReason): StudyflowError {
        const messages: Record<TokenFailureReason, string> = {
            NOT_FOUND: 'Confirm token is unknown. Run review first.',
            EXPIRED: 'Confirm token has expired. Run review again.',
            ALREADY_CONSUMED: 'Confirm token was already used. Run review again.',
            RUN_MISMATCH: 'Confirm token was issued for a different run or assignment.',
        };
        return new StudyflowError('CONFIRM_REQUIRED', messages[reason], { reason });
    }

    static policyViolation(rule: string, message: string, details: Record<string, unknown> = {}): StudyflowError {
        return new StudyflowError('POLICY_VIOLATION', message, { rule, ...details });
    }

    static stageFailed(runId: string, state: string, cause: unknown): StudyflowError {
        const reason = cause instanceof Error ? cause.message : String(cause);
        return new StudyflowError(
            'INTERNAL',
            `Workflow stage '${state}' failed for ${runId}: ${reason}`,
            { run_id: runId, state },
            cause
        );
    }

    static oauthNotAvailable(): StudyflowError {
        return new StudyflowError(
            'AUTH',
            'Auth mode is oauth_placeholder; switch to token mode and login for now.',
            { auth_mode: 'oauth_placeholder' }
        );
    }

    static missingCredentials(): StudyflowError {
        return new StudyflowError(
            'VALIDATION',
            'Missing CANVAS_BASE_URL and/or CANVAS_API_TOKEN. Run `studyflow auth login` or `studyflow init`.'
        );
    }
}
