// history_store.ts - local state for runs, confirm tokens, the idempotency ledger,
// the action history and feedback memory.
//
// GUARANTEES:
// - Forward-only schema migrations (schema_version), applied inside one transaction
// - Run state changes are compare-and-set on the previous state
// - Token consumption and idempotency-record creation are single IMMEDIATE
//   transactions, so concurrent invocations cannot both win
// - Nothing is ever deleted: expired/consumed tokens stay for traceability
//
// CONTRACT: Synchronous API (better-sqlite3 blocks by design)

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import {
  ArtifactPaths,
  ConfirmTokenRecord,
  IdempotencyRecord,
  RunRecord,
  WorkflowMode,
  WorkflowState,
  isArtifactName,
  isWorkflowMode,
  isWorkflowState,
} from './run_types';

/* -------------------------------------------------------------------------- */
/* Errors                                                                     */
/* -------------------------------------------------------------------------- */

export class HistoryStoreError extends Error {
  constructor(message: string, public readonly code: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'HistoryStoreError';
  }
}

export const ERRORS = {
  INFRA_ERROR: 'INFRA_ERROR',
  RUN_NOT_FOUND: 'RUN_NOT_FOUND',
  CORRUPT_ROW: 'CORRUPT_ROW',
  DUPLICATE_TOKEN: 'DUPLICATE_TOKEN',
} as const;

/* -------------------------------------------------------------------------- */
/* Constants                                                                  */
/* -------------------------------------------------------------------------- */

const SCHEMA_VERSION = 1;

/* -------------------------------------------------------------------------- */
/* Row shapes                                                                 */
/* -------------------------------------------------------------------------- */

interface RunRow {
  run_id: string;
  assignment_id: string;
  course_id: string | null;
  mode: string;
  state: string;
  goal: string | null;
  input_file: string | null;
  artifact_paths: string;
  created_at: string;
  updated_at: string;
}

interface TokenRow {
  token_hash: string;
  run_id: string;
  assignment_id: string;
  issued_at: string;
  expires_at: string;
  consumed: number;
  consumed_at: string | null;
}

interface IdempotencyRow {
  idempotency_key: string;
  run_id: string;
  result_snapshot: string;
  created_at: string;
}

interface FeedbackRow {
  id: number;
  course_id: string | null;
  assignment_id: string | null;
  feedback_text: string;
  source: string | null;
  created_at: string;
}

export interface NewRun {
  runId: string;
  assignmentId: string;
  courseId: string | null;
  mode: WorkflowMode;
  goal: string | null;
  inputFile: string | null;
  createdAt: string;
}

export interface FeedbackEntry {
  id: number;
  courseId: string | null;
  assignmentId: string | null;
  feedbackText: string;
  source: string | null;
  createdAt: string;
}

export interface FeedbackFilter {
  courseId?: string | null;
  assignmentId?: string | null;
}

export interface MetricsSummary {
  total_runs: number;
  ready_runs: number;
  in_progress_runs: number;
  by_mode: Record<string, { ready: number; in_progress: number }>;
  submissions_recorded: number;
  tokens_issued: number;
  tokens_consumed: number;
  common_error_codes: Array<{ code: string; count: number }>;
}

export interface HistoryStoreOptions {
  now?: () => Date;
}

/* -------------------------------------------------------------------------- */
/* Row mapping                                                                */
/* -------------------------------------------------------------------------- */

function parseArtifactPaths(raw: string, runId: string): ArtifactPaths {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new HistoryStoreError(`Corrupt artifact_paths for ${runId}`, ERRORS.CORRUPT_ROW, e);
  }
  const paths: ArtifactPaths = {};
  if (typeof parsed === 'object' && parsed !== null) {
    for (const [name, value] of Object.entries(parsed)) {
      if (isArtifactName(name) && typeof value === 'string') {
        paths[name] = value;
      }
    }
  }
  return paths;
}

function toRunRecord(row: RunRow): RunRecord {
  if (!isWorkflowMode(row.mode) || !isWorkflowState(row.state)) {
    throw new HistoryStoreError(
      `Corrupt run row ${row.run_id}: mode=${row.mode} state=${row.state}`,
      ERRORS.CORRUPT_ROW
    );
  }
  return {
    runId: row.run_id,
    assignmentId: row.assignment_id,
    courseId: row.course_id,
    mode: row.mode,
    state: row.state,
    goal: row.goal,
    inputFile: row.input_file,
    artifactPaths: parseArtifactPaths(row.artifact_paths, row.run_id),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toTokenRecord(row: TokenRow): ConfirmTokenRecord {
  return {
    tokenHash: row.token_hash,
    runId: row.run_id,
    assignmentId: row.assignment_id,
    issuedAt: row.issued_at,
    expiresAt: row.expires_at,
    consumed: row.consumed === 1,
    consumedAt: row.consumed_at,
  };
}

function toIdempotencyRecord(row: IdempotencyRow): IdempotencyRecord {
  return {
    idempotencyKey: row.idempotency_key,
    runId: row.run_id,
    resultSnapshot: row.result_snapshot,
    createdAt: row.created_at,
  };
}

function toFeedbackEntry(row: FeedbackRow): FeedbackEntry {
  return {
    id: row.id,
    courseId: row.course_id,
    assignmentId: row.assignment_id,
    feedbackText: row.feedback_text,
    source: row.source,
    createdAt: row.created_at,
  };
}

const RUN_COLUMNS =
  'run_id, assignment_id, course_id, mode, state, goal, input_file, artifact_paths, created_at, updated_at';

/* -------------------------------------------------------------------------- */
/* History Store                                                              */
/* -------------------------------------------------------------------------- */

export class HistoryStore {
  private readonly db: Database.Database;
  private readonly now: () => Date;

  constructor(dbPath: string, opts: HistoryStoreOptions = {}) {
    this.now = opts.now ?? (() => new Date());

    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    try {
      this.db = new Database(dbPath);
    } catch (e) {
      throw new HistoryStoreError(`Cannot open state database at ${dbPath}`, ERRORS.INFRA_ERROR, e);
    }
    this.configureDatabase();
    this.runMigrations();
    this.integrityCheck();
  }

  close(): void {
    this.db.close();
  }

  /**
   * Run `fn` inside a BEGIN IMMEDIATE transaction: the write lock is taken up
   * front, so a read-then-write inside `fn` is atomic across processes.
   */
  immediate<T>(fn: () => T): T {
    return this.db.transaction(fn).immediate();
  }

  /* ------------------------------------------------------------------------ */
  /* SQLite Configuration                                                     */
  /* ------------------------------------------------------------------------ */

  private configureDatabase(): void {
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('busy_timeout = 5000');
  }

  /* ------------------------------------------------------------------------ */
  /* Migrations                                                               */
  /* ------------------------------------------------------------------------ */

  private runMigrations(): void {
    const tx = this.db.transaction(() => {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS schema_version (
          version INTEGER PRIMARY KEY,
          applied_at TEXT DEFAULT CURRENT_TIMESTAMP
        ) STRICT
      `);

      const row = this.db
        .prepare<[], { version: number }>(`SELECT version FROM schema_version ORDER BY version DESC LIMIT 1`)
        .get();

      const current = row?.version ?? 0;

      if (current < 1) {
        this.db.exec(`
          CREATE TABLE IF NOT EXISTS runs (
            run_id TEXT PRIMARY KEY,
            assignment_id TEXT NOT NULL,
            course_id TEXT,
            mode TEXT NOT NULL,
            state TEXT NOT NULL,
            goal TEXT,
            input_file TEXT,
            artifact_paths TEXT NOT NULL DEFAULT '{}',
            created_at TEXT NOT NULL,
            updated_at TEXT NOT NULL,
            CHECK(mode IN ('tutor','outline','draft','polish')),
            CHECK(state IN ('queued','planning','drafting','reviewing','ready'))
          ) STRICT;

          CREATE TABLE IF NOT EXISTS confirm_tokens (
            token_hash TEXT PRIMARY KEY,
            run_id TEXT NOT NULL,
            assignment_id TEXT NOT NULL,
            issued_at TEXT NOT NULL,
            expires_at TEXT NOT NULL,
            consumed INTEGER NOT NULL DEFAULT 0,
            consumed_at TEXT,
            FOREIGN KEY (run_id) REFERENCES runs(run_id),
            CHECK(length(token_hash) = 64),
            CHECK(consumed IN (0,1))
          ) STRICT;

          CREATE TABLE IF NOT EXISTS idempotency_records (
            idempotency_key TEXT PRIMARY KEY,
            run_id TEXT NOT NULL,
            result_snapshot TEXT NOT NULL,
            created_at TEXT NOT NULL,
            FOREIGN KEY (run_id) REFERENCES runs(run_id)
          ) STRICT;

          CREATE TABLE IF NOT EXISTS history (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            ts TEXT NOT NULL,
            command TEXT NOT NULL,
            payload TEXT NOT NULL DEFAULT ''
          ) STRICT;

          CREATE TABLE IF NOT EXISTS feedback_memory (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            course_id TEXT,
            assignment_id TEXT,
            feedback_text TEXT NOT NULL,
            source TEXT,
            created_at TEXT NOT NULL
          ) STRICT;

          CREATE INDEX IF NOT EXISTS idx_runs_assignment ON runs(assignment_id, updated_at);
          CREATE INDEX IF NOT EXISTS idx_runs_updated ON runs(updated_at);
          CREATE INDEX IF NOT EXISTS idx_tokens_run ON confirm_tokens(run_id);
          CREATE INDEX IF NOT EXISTS idx_history_command ON history(command);
          CREATE INDEX IF NOT EXISTS idx_feedback_course ON feedback_memory(course_id, assignment_id);
        `);

        this.db.prepare(`INSERT INTO schema_version (version) VALUES (1)`).run();
      }

      // Future migrations: add only, never remove.
    });

    tx();
  }

  /* ------------------------------------------------------------------------ */
  /* Integrity                                                                */
  /* ------------------------------------------------------------------------ */

  private integrityCheck(): void {
    const result = this.db.prepare<[], { quick_check: string }>('PRAGMA quick_check').get();
    if (result?.quick_check !== 'ok') {
      throw new HistoryStoreError(
        `Database integrity check failed: ${result?.quick_check ?? 'no result'}`,
        ERRORS.INFRA_ERROR
      );
    }
  }

  schemaVersion(): number {
    const row = this.db
      .prepare<[], { version: number }>(`SELECT version FROM schema_version ORDER BY version DESC LIMIT 1`)
      .get();
    return row?.version ?? 0;
  }

  /* ------------------------------------------------------------------------ */
  /* Runs                                                                     */
  /* ------------------------------------------------------------------------ */

  createRun(input: NewRun): RunRecord {
    this.db.prepare(
      `INSERT INTO runs (run_id, assignment_id, course_id, mode, state, goal, input_file, artifact_paths, created_at, updated_at)
       VALUES (?, ?, ?, ?, 'queued', ?, ?, '{}', ?, ?)`
    ).run(
      input.runId,
      input.assignmentId,
      input.courseId,
      input.mode,
      input.goal,
      input.inputFile,
      input.createdAt,
      input.createdAt
    );

    const created = this.getRun(input.runId);
    if (!created) throw new HistoryStoreError(`Run vanished after insert: ${input.runId}`, ERRORS.INFRA_ERROR);
    return created;
  }

  getRun(runId: string): RunRecord | null {
    const row = this.db
      .prepare<[string], RunRow>(`SELECT ${RUN_COLUMNS} FROM runs WHERE run_id = ?`)
      .get(runId);
    return row ? toRunRecord(row) : null;
  }

  findLatestRun(assignmentId: string): RunRecord | null {
    const row = this.db
      .prepare<[string], RunRow>(
        `SELECT ${RUN_COLUMNS} FROM runs WHERE assignment_id = ? ORDER BY updated_at DESC, rowid DESC LIMIT 1`
      )
      .get(assignmentId);
    return row ? toRunRecord(row) : null;
  }

  listRuns(limit: number): RunRecord[] {
    return this.db
      .prepare<[number], RunRow>(`SELECT ${RUN_COLUMNS} FROM runs ORDER BY updated_at DESC, rowid DESC LIMIT ?`)
      .all(limit)
      .map(toRunRecord);
  }

  /**
   * Move a run from `expected` to `next`, replacing its artifact map.
   * Returns false (and changes nothing) when the run is no longer in `expected`.
   */
  compareAndSetRunState(
    runId: string,
    expected: WorkflowState,
    next: WorkflowState,
    artifactPaths: ArtifactPaths,
    updatedAt: string
  ): boolean {
    const info = this.db.prepare(
      `UPDATE runs SET state = ?, artifact_paths = ?, updated_at = ? WHERE run_id = ? AND state = ?`
    ).run(next, JSON.stringify(artifactPaths), updatedAt, runId, expected);
    return info.changes === 1;
  }

  /* ------------------------------------------------------------------------ */
  /* Confirm tokens                                                           */
  /* ------------------------------------------------------------------------ */

  insertConfirmToken(record: ConfirmTokenRecord): void {
    try {
      this.db.prepare(
        `INSERT INTO confirm_tokens (token_hash, run_id, assignment_id, issued_at, expires_at, consumed, consumed_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      ).run(
        record.tokenHash,
        record.runId,
        record.assignmentId,
        record.issuedAt,
        record.expiresAt,
        record.consumed ? 1 : 0,
        record.consumedAt
      );
    } catch (e) {
      if (e instanceof Database.SqliteError && e.code === 'SQLITE_CONSTRAINT_PRIMARYKEY') {
        throw new HistoryStoreError('Confirm token collision', ERRORS.DUPLICATE_TOKEN, e);
      }
      throw e;
    }
  }

  getConfirmToken(tokenHash: string): ConfirmTokenRecord | null {
    const row = this.db
      .prepare<[string], TokenRow>(
        `SELECT token_hash, run_id, assignment_id, issued_at, expires_at, consumed, consumed_at
         FROM confirm_tokens WHERE token_hash = ?`
      )
      .get(tokenHash);
    return row ? toTokenRecord(row) : null;
  }

  /** Conditional flip: only an unconsumed token can be marked. */
  markTokenConsumed(tokenHash: string, consumedAt: string): boolean {
    const info = this.db.prepare(
      `UPDATE confirm_tokens SET consumed = 1, consumed_at = ? WHERE token_hash = ? AND consumed = 0`
    ).run(consumedAt, tokenHash);
    return info.changes === 1;
  }

  /* ------------------------------------------------------------------------ */
  /* Idempotency ledger                                                       */
  /* ------------------------------------------------------------------------ */

  getIdempotencyRecord(key: string): IdempotencyRecord | null {
    const row = this.db
      .prepare<[string], IdempotencyRow>(
        `SELECT idempotency_key, run_id, result_snapshot, created_at FROM idempotency_records WHERE idempotency_key = ?`
      )
      .get(key);
    return row ? toIdempotencyRecord(row) : null;
  }

  /**
   * Insert the record unless the key exists, then read back whatever is stored.
   * `created` is false when another submission already owns the key.
   */
  getOrCreateIdempotencyRecord(record: IdempotencyRecord): { record: IdempotencyRecord; created: boolean } {
    return this.immediate(() => {
      const info = this.db.prepare(
        `INSERT OR IGNORE INTO idempotency_records (idempotency_key, run_id, result_snapshot, created_at)
         VALUES (?, ?, ?, ?)`
      ).run(record.idempotencyKey, record.runId, record.resultSnapshot, record.createdAt);

      const stored = this.getIdempotencyRecord(record.idempotencyKey);
      if (!stored) {
        throw new HistoryStoreError(`Idempotency record missing after insert: ${record.idempotencyKey}`, ERRORS.INFRA_ERROR);
      }
      return { record: stored, created: info.changes === 1 };
    });
  }

  /* ------------------------------------------------------------------------ */
  /* Action history                                                           */
  /* ------------------------------------------------------------------------ */

  logAction(command: string, payload = ''): void {
    this.db.prepare(`INSERT INTO history (ts, command, payload) VALUES (?, ?, ?)`)
      .run(this.now().toISOString(), command, payload);
  }

  recentActions(limit: number): Array<{ ts: string; command: string; payload: string }> {
    return this.db
      .prepare<[number], { ts: string; command: string; payload: string }>(
        `SELECT ts, command, payload FROM history ORDER BY id DESC LIMIT ?`
      )
      .all(limit);
  }

  /* ------------------------------------------------------------------------ */
  /* Feedback memory                                                          */
  /* ------------------------------------------------------------------------ */

  storeFeedback(entry: { feedbackText: string; courseId: string | null; assignmentId: string | null; source: string | null }): number {
    const info = this.db.prepare(
      `INSERT INTO feedback_memory (course_id, assignment_id, feedback_text, source, created_at) VALUES (?, ?, ?, ?, ?)`
    ).run(entry.courseId, entry.assignmentId, entry.feedbackText, entry.source, this.now().toISOString());
    return Number(info.lastInsertRowid);
  }

  listFeedback(filter: FeedbackFilter, limit: number): FeedbackEntry[] {
    const clauses: string[] = [];
    const values: Array<string | number> = [];
    if (filter.courseId) {
      clauses.push('course_id = ?');
      values.push(filter.courseId);
    }
    if (filter.assignmentId) {
      clauses.push('assignment_id = ?');
      values.push(filter.assignmentId);
    }
    const where = clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : '';
    values.push(limit);

    return this.db
      .prepare<Array<string | number>, FeedbackRow>(
        `SELECT id, course_id, assignment_id, feedback_text, source, created_at FROM feedback_memory${where}
         ORDER BY created_at DESC, id DESC LIMIT ?`
      )
      .all(...values)
      .map(toFeedbackEntry);
  }

  /* ------------------------------------------------------------------------ */
  /* Metrics                                                                  */
  /* ------------------------------------------------------------------------ */

  metricsSummary(): MetricsSummary {
    const runRows = this.db
      .prepare<[], { mode: string; state: string; n: number }>(
        `SELECT mode, state, COUNT(*) AS n FROM runs GROUP BY mode, state`
      )
      .all();

    const byMode: MetricsSummary['by_mode'] = {};
    let total = 0;
    let ready = 0;
    for (const row of runRows) {
      const bucket = byMode[row.mode] ?? { ready: 0, in_progress: 0 };
      if (row.state === 'ready') {
        bucket.ready += row.n;
        ready += row.n;
      } else {
        bucket.in_progress += row.n;
      }
      byMode[row.mode] = bucket;
      total += row.n;
    }

    const tokens = this.db
      .prepare<[], { issued: number; consumed: number | null }>(
        `SELECT COUNT(*) AS issued, SUM(consumed) AS consumed FROM confirm_tokens`
      )
      .get();
    const submissions = this.db
      .prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM idempotency_records`)
      .get();
    const errors = this.db
      .prepare<[], { payload: string; c: number }>(
        `SELECT payload, COUNT(*) AS c FROM history WHERE command = 'error' AND payload != ''
         GROUP BY payload ORDER BY c DESC, payload ASC LIMIT 10`
      )
      .all();

    return {
      total_runs: total,
      ready_runs: ready,
      in_progress_runs: total - ready,
      by_mode: byMode,
      submissions_recorded: submissions?.n ?? 0,
      tokens_issued: tokens?.issued ?? 0,
      tokens_consumed: tokens?.consumed ?? 0,
      common_error_codes: errors.map((e) => ({ code: e.payload, count: e.c })),
    };
  }
}
