/**
 * Structured Logger for studyflow
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when STUDYFLOW_LOG_JSON=1
 * - Optional file output via STUDYFLOW_LOG_FILE
 * - Module context (component name) on every line
 * - Run correlation (command, run id, stage) propagated through all entries
 *
 * Console output always goes to stderr: stdout is reserved for the command envelope.
 *
 * Environment:
 *   STUDYFLOW_LOG_LEVEL  = debug|info|warn|error (default: warn)
 *   STUDYFLOW_LOG_JSON   = 1 (default: text)
 *   STUDYFLOW_LOG_FILE   = path (optional, appends)
 *   STUDYFLOW_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function parseLevel(raw: string | undefined): number {
    const value = (raw || 'warn').toLowerCase();
    if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') {
        return LEVEL_ORDER[value];
    }
    return LEVEL_ORDER.warn;
}

const MIN_LEVEL: number = parseLevel(process.env.STUDYFLOW_LOG_LEVEL);
const DEBUG_OVERRIDE = process.env.STUDYFLOW_DEBUG === '1' || process.env.STUDYFLOW_DEBUG === 'true';
const EFFECTIVE_MIN = DEBUG_OVERRIDE ? 0 : MIN_LEVEL;

const JSON_MODE = process.env.STUDYFLOW_LOG_JSON === '1';
const LOG_FILE = process.env.STUDYFLOW_LOG_FILE || '';

/* -------------------------------------------------------------------------- */
/* Run Correlation Context (singleton, one invocation per process)            */
/* -------------------------------------------------------------------------- */

let _command: string = '';
let _runId: string = '';
let _stage: string = '';

/** Set the active correlation context. Called by the command layer and the workflow machine. */
export function setCorrelation(opts: { command?: string; runId?: string; stage?: string }): void {
    if (opts.command !== undefined) _command = opts.command;
    if (opts.runId !== undefined) _runId = opts.runId;
    if (opts.stage !== undefined) _stage = opts.stage;
}

export function clearCorrelation(): void {
    _command = '';
    _runId = '';
    _stage = '';
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < EFFECTIVE_MIN) return;

    const ts = new Date().toISOString();

    if (JSON_MODE) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (_command) entry.command = _command;
        if (_runId) entry.run_id = _runId;
        if (_stage) entry.stage = _stage;
        if (data) entry.data = data;
        writeOutput(JSON.stringify(entry));
    } else {
        const ctx = _runId ? ` [${_runId}${_stage ? ':' + _stage : ''}]` : (_command ? ` [${_command}]` : '');
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
        const line = data
            ? `${prefix} ${message} ${JSON.stringify(data)}`
            : `${prefix} ${message}`;
        writeOutput(line);
    }
}

function writeOutput(line: string): void {
    process.stderr.write(line + '\n');

    if (LOG_FILE) {
        try {
            fs.appendFileSync(LOG_FILE, line + '\n');
        } catch (e) {
            process.stderr.write(`[logger] cannot append to ${LOG_FILE}: ${String(e)}\n`);
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Logger interface                                                           */
/* -------------------------------------------------------------------------- */

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
    child(component: string): Logger;
}

export function createLogger(component: string): Logger {
    return {
        debug: (msg, data) => emit('debug', component, msg, data),
        info:  (msg, data) => emit('info',  component, msg, data),
        warn:  (msg, data) => emit('warn',  component, msg, data),
        error: (msg, data) => emit('error', component, msg, data),
        child: (sub) => createLogger(`${component}:${sub}`),
    };
}
