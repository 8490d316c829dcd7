// Shared fixtures: temp homes, a controllable clock and an in-process LMS.

import fs from 'fs';
import os from 'os';
import path from 'path';
import type { LmsClient } from '../src/commands';
import type { Settings } from '../src/config';
import { HistoryStore } from '../src/history_store';
import { LmsAssignment, LmsClientError, LmsCourse, SubmissionReceipt } from '../src/lms_client';

export function makeTempDir(prefix = 'studyflow-test-'): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

export class FakeClock {
    constructor(private t: number = Date.parse('2026-03-01T12:00:00.000Z')) {}

    now = (): Date => new Date(this.t);

    advance(ms: number): void {
        this.t += ms;
    }
}

export const MINUTE_MS = 60_000;

export function testSettings(home: string, overrides: Partial<Settings> = {}): Settings {
    return {
        homeDir: home,
        configPath: path.join(home, 'config.json'),
        policyPath: path.join(home, 'policy.json'),
        dbPath: path.join(home, 'state.db'),
        artifactsRoot: path.join(home, 'artifacts'),
        authMode: 'token',
        canvasBaseUrl: 'https://canvas.example.test',
        canvasApiToken: 'test-secret',
        tokenTtlMinutes: 10,
        httpTimeoutMs: 1000,
        httpMaxAttempts: 1,
        ...overrides,
    };
}

export function makeAssignment(overrides: Partial<LmsAssignment> = {}): LmsAssignment {
    return {
        id: '12345',
        courseId: '77',
        name: 'Essay 1',
        description: 'Write about the water cycle.',
        dueAt: null,
        pointsPossible: 100,
        rubric: [],
        ...overrides,
    };
}

export class FakeLms implements LmsClient {
    readonly assignments = new Map<string, LmsAssignment>();
    courses: LmsCourse[] = [{ id: '77', name: 'Earth Science', courseCode: 'ES-101' }];
    getAssignmentCalls = 0;
    readonly submitCalls: Array<{ assignmentId: string; filePath: string }> = [];

    constructor(...assignments: LmsAssignment[]) {
        for (const a of assignments) this.assignments.set(a.id, a);
    }

    async listCourses(): Promise<LmsCourse[]> {
        return this.courses;
    }

    async listAssignmentsDue(_days: number): Promise<LmsAssignment[]> {
        return [...this.assignments.values()];
    }

    async getAssignment(assignmentId: string): Promise<LmsAssignment> {
        this.getAssignmentCalls++;
        const found = this.assignments.get(assignmentId);
        if (!found) {
            throw new LmsClientError(`http error 404 calling assignments/${assignmentId}`, 'not_found', `assignments/${assignmentId}`, 404);
        }
        return found;
    }

    async submitFile(assignmentId: string, filePath: string): Promise<SubmissionReceipt> {
        this.submitCalls.push({ assignmentId, filePath });
        return { status: 'stubbed', message: 'Submission flow placeholder. Human-confirmed execution only.' };
    }
}

export function openStore(home: string, clock?: FakeClock): HistoryStore {
    return new HistoryStore(path.join(home, 'state.db'), { now: clock?.now });
}
