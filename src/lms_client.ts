// lms_client.ts - Canvas REST data source and submission transport

import { LRUCache } from 'lru-cache';
import { createLogger } from './logger';

const log = createLogger('lms-client');

// ============================================================================
// Types
// ============================================================================

export interface LmsCourse {
    id: string;
    name: string;
    courseCode: string | null;
}

export interface RubricCriterion {
    description: string;
    points: number | null;
}

export interface LmsAssignment {
    id: string;
    courseId: string | null;
    name: string;
    description: string;
    dueAt: string | null;
    pointsPossible: number | null;
    rubric: RubricCriterion[];
}

export interface SubmissionReceipt {
    status: string;
    message: string;
}

/** Read side of the LMS. Every method fails with LmsClientError. */
export interface AssignmentSource {
    listCourses(): Promise<LmsCourse[]>;
    listAssignmentsDue(days: number): Promise<LmsAssignment[]>;
    getAssignment(assignmentId: string): Promise<LmsAssignment>;
}

/** The single write operation. Never retried. */
export interface SubmissionTransport {
    submitFile(assignmentId: string, filePath: string): Promise<SubmissionReceipt>;
}

export type LmsErrorType =
    | 'unauthorized'
    | 'forbidden'
    | 'not_found'
    | 'rate_limited'
    | 'timeout'
    | 'network'
    | 'http'
    | 'invalid_response';

export class LmsClientError extends Error {
    constructor(
        message: string,
        public readonly errorType: LmsErrorType,
        public readonly endpoint: string,
        public readonly statusCode: number | null = null
    ) {
        super(message);
        this.name = 'LmsClientError';
    }
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface CanvasClientConfig {
    baseUrl: string;
    apiToken: string;
    timeoutMs?: number;
    maxAttempts?: number;
    retryBackoffMs?: readonly number[];
    cacheMaxEntries?: number;
    cacheTtlMs?: number;
    fetchImpl?: FetchLike;
    sleep?: (ms: number) => Promise<void>;
    now?: () => Date;
}

// ============================================================================
// Frozen constants
// ============================================================================

const FROZEN = {
    API_PREFIX: '/api/v1/',
    DEFAULT_TIMEOUT_MS: 15_000,
    DEFAULT_MAX_ATTEMPTS: 3,
    DEFAULT_RETRY_BACKOFF_MS: [400, 1000] as readonly number[],
    RETRYABLE_STATUS: [429, 500, 502, 503, 504] as readonly number[],
    PER_PAGE: 100,
    MAX_PAGES: 50,
    ERROR_SNIPPET_MAX_CHARS: 300,
} as const;

type AttemptResult =
    | { ok: true; body: unknown; next: string | null }
    | { ok: false; error: LmsClientError; retryable: boolean; retryAfterMs: number | null };

interface CachedPage {
    body: unknown;
    next: string | null;
}

// ============================================================================
// Response parsing
// ============================================================================

function asRecord(value: unknown): Record<string, unknown> | null {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
        ? Object.fromEntries(Object.entries(value))
        : null;
}

function idString(value: unknown): string | null {
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    if (typeof value === 'string' && value.trim() !== '') return value.trim();
    return null;
}

function optionalString(value: unknown): string | null {
    return typeof value === 'string' && value !== '' ? value : null;
}

function optionalNumber(value: unknown): number | null {
    return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function parseRubric(value: unknown): RubricCriterion[] {
    if (!Array.isArray(value)) return [];
    const criteria: RubricCriterion[] = [];
    for (const item of value) {
        const rec = asRecord(item);
        if (!rec) continue;
        const description =
            optionalString(rec.description) ?? optionalString(rec.criterion) ?? optionalString(rec.long_description);
        if (description) {
            criteria.push({ description, points: optionalNumber(rec.points) });
        }
    }
    return criteria;
}

export function parseAssignment(value: unknown, endpoint: string): LmsAssignment {
    const rec = asRecord(value);
    const id = rec ? idString(rec.id) : null;
    if (!rec || id === null) {
        throw new LmsClientError('assignment payload has no id', 'invalid_response', endpoint);
    }
    return {
        id,
        courseId: idString(rec.course_id),
        name: optionalString(rec.name) ?? 'Untitled Assignment',
        description: typeof rec.description === 'string' ? rec.description : '',
        dueAt: optionalString(rec.due_at),
        pointsPossible: optionalNumber(rec.points_possible),
        rubric: parseRubric(rec.rubric),
    };
}

export function parseCourse(value: unknown): LmsCourse | null {
    const rec = asRecord(value);
    const id = rec ? idString(rec.id) : null;
    if (!rec || id === null) return null;
    return {
        id,
        name: optionalString(rec.name) ?? 'Unnamed course',
        courseCode: optionalString(rec.course_code),
    };
}

function nextLink(linkHeader: string | null): string | null {
    if (!linkHeader) return null;
    const match = linkHeader.match(/<([^>]+)>;\s*rel="next"/);
    return match ? match[1] : null;
}

function sanitizeSnippet(text: string): string {
    return text
        .replace(/Bearer\s+[A-Za-z0-9._~-]+/gi, 'Bearer [redacted]')
        .slice(0, FROZEN.ERROR_SNIPPET_MAX_CHARS);
}

function parseRetryAfter(header: string | null): number | null {
    if (!header || !/^\d+$/.test(header.trim())) return null;
    return parseInt(header.trim(), 10) * 1000;
}

// ============================================================================
// Canvas client
// ============================================================================

export class CanvasClient implements AssignmentSource, SubmissionTransport {
    private readonly baseUrl: string;
    private readonly apiToken: string;
    private readonly timeoutMs: number;
    private readonly maxAttempts: number;
    private readonly retryBackoffMs: readonly number[];
    private readonly fetchImpl: FetchLike;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly now: () => Date;
    private readonly cache: LRUCache<string, CachedPage>;

    constructor(config: CanvasClientConfig) {
        if (!config.baseUrl || !config.apiToken) {
            throw new Error('CanvasClient requires baseUrl and apiToken');
        }
        this.baseUrl = config.baseUrl.replace(/\/+$/, '');
        this.apiToken = config.apiToken;
        this.timeoutMs = config.timeoutMs ?? FROZEN.DEFAULT_TIMEOUT_MS;
        this.maxAttempts = Math.max(1, config.maxAttempts ?? FROZEN.DEFAULT_MAX_ATTEMPTS);
        this.retryBackoffMs = config.retryBackoffMs ?? FROZEN.DEFAULT_RETRY_BACKOFF_MS;
        this.fetchImpl = config.fetchImpl ?? ((input, init) => fetch(input, init));
        this.sleep = config.sleep ?? ((ms) => new Promise((r) => setTimeout(r, ms)));
        this.now = config.now ?? (() => new Date());
        this.cache = new LRUCache<string, CachedPage>({
            max: config.cacheMaxEntries ?? 500,
            ttl: config.cacheTtlMs ?? 60_000,
        });
    }

    async listCourses(): Promise<LmsCourse[]> {
        const items = await this.getAllPages('courses', { enrollment_state: 'active' });
        const courses: LmsCourse[] = [];
        for (const item of items) {
            const course = parseCourse(item);
            if (course) courses.push(course);
        }
        return courses;
    }

    async listAssignmentsDue(days: number): Promise<LmsAssignment[]> {
        const endDate = new Date(this.now().getTime() + days * 86_400_000).toISOString();
        const courses = await this.listCourses();
        const assignments: LmsAssignment[] = [];
        for (const course of courses) {
            const endpoint = `courses/${course.id}/assignments`;
            const items = await this.getAllPages(endpoint, { bucket: 'upcoming', end_date: endDate });
            for (const item of items) {
                const assignment = parseAssignment(item, endpoint);
                assignments.push({ ...assignment, courseId: assignment.courseId ?? course.id });
            }
        }
        return assignments;
    }

    async getAssignment(assignmentId: string): Promise<LmsAssignment> {
        const endpoint = `assignments/${encodeURIComponent(assignmentId)}`;
        const page = await this.getPage(this.url(endpoint, {}), endpoint);
        return parseAssignment(page.body, endpoint);
    }

    async submitFile(assignmentId: string, filePath: string): Promise<SubmissionReceipt> {
        // The upload + submission endpoints are not wired yet; the human-confirmed path is exercised end to end.
        log.info('Submission transport stub invoked', { assignment_id: assignmentId, file: filePath });
        return {
            status: 'stubbed',
            message: 'Submission flow placeholder. Human-confirmed execution only.',
        };
    }

    /* ---------------------------------------------------------------------- */
    /* HTTP                                                                   */
    /* ---------------------------------------------------------------------- */

    private url(endpoint: string, params: Record<string, string>): string {
        const query = new URLSearchParams({ ...params, per_page: String(FROZEN.PER_PAGE) });
        return `${this.baseUrl}${FROZEN.API_PREFIX}${endpoint.replace(/^\/+/, '')}?${query.toString()}`;
    }

    private async getAllPages(endpoint: string, params: Record<string, string>): Promise<unknown[]> {
        const items: unknown[] = [];
        let url: string | null = this.url(endpoint, params);
        let pages = 0;

        while (url && pages < FROZEN.MAX_PAGES) {
            const page: CachedPage = await this.getPage(url, endpoint);
            if (!Array.isArray(page.body)) {
                throw new LmsClientError(`expected a list from ${endpoint}`, 'invalid_response', endpoint);
            }
            items.push(...page.body);
            url = page.next;
            pages++;
        }

        if (url) {
            log.warn('Pagination limit reached', { endpoint, pages });
        }
        return items;
    }

    private async getPage(url: string, endpoint: string): Promise<CachedPage> {
        const cached = this.cache.get(url);
        if (cached) return cached;

        for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
            const res = await this.tryOnce(url, endpoint);

            if (res.ok) {
                const page = { body: res.body, next: res.next };
                this.cache.set(url, page);
                return page;
            }

            if (!res.retryable || attempt === this.maxAttempts) {
                throw res.error;
            }

            const backoff = res.retryAfterMs ?? this.retryBackoffMs[attempt - 1] ?? 1000;
            log.debug('Retrying LMS request', { endpoint, attempt, backoff_ms: backoff, error: res.error.errorType });
            await this.sleep(backoff);
        }

        throw new LmsClientError(`request to ${endpoint} was never attempted`, 'network', endpoint);
    }

    private async tryOnce(url: string, endpoint: string): Promise<AttemptResult> {
        const ac = new AbortController();
        const tid = setTimeout(() => ac.abort(), this.timeoutMs);

        try {
            const resp = await this.fetchImpl(url, {
                method: 'GET',
                headers: {
                    Accept: 'application/json',
                    Authorization: `Bearer ${this.apiToken}`,
                },
                signal: ac.signal,
            });

            const bodyText = await resp.text();

            if (!resp.ok) {
                const status = resp.status;
                const message = `http error ${status} calling ${endpoint}: ${sanitizeSnippet(bodyText)}`;
                const errorType: LmsErrorType =
                    status === 401 ? 'unauthorized'
                    : status === 403 ? 'forbidden'
                    : status === 404 ? 'not_found'
                    : status === 429 ? 'rate_limited'
                    : 'http';
                return {
                    ok: false,
                    error: new LmsClientError(message, errorType, endpoint, status),
                    retryable: FROZEN.RETRYABLE_STATUS.includes(status),
                    retryAfterMs: parseRetryAfter(resp.headers.get('Retry-After')),
                };
            }

            let body: unknown;
            try {
                body = JSON.parse(bodyText);
            } catch {
                return {
                    ok: false,
                    error: new LmsClientError(`response from ${endpoint} is not JSON`, 'invalid_response', endpoint, resp.status),
                    retryable: false,
                    retryAfterMs: null,
                };
            }

            return { ok: true, body, next: nextLink(resp.headers.get('Link')) };
        } catch (e) {
            const isTimeout = e instanceof Error && e.name === 'AbortError';
            const message = isTimeout
                ? `timeout after ${this.timeoutMs}ms calling ${endpoint}`
                : `network error calling ${endpoint}: ${e instanceof Error ? e.message : String(e)}`;
            return {
                ok: false,
                error: new LmsClientError(message, isTimeout ? 'timeout' : 'network', endpoint),
                retryable: true,
                retryAfterMs: null,
            };
        } finally {
            clearTimeout(tid);
        }
    }
}
