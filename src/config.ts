/**
 * Shared Configuration
 *
 * Centralized settings for the studyflow CLI.
 * Values come from STUDYFLOW_HOME/config.json and can be overridden via environment variables.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { atomicWriteFileSync } from './output_writer';
import { SchemaValidator, JsonSchema, ValidationError, formatValidationErrors } from './schema_validator';
import { ErrorFactory } from './structured_error';

// Timeouts (milliseconds)
export const TIMEOUTS = {
    HTTP_REQUEST_MS: 15_000,
    RUN_LOCK_WAIT_MS: 2_000,
    RUN_LOCK_STALE_MS: 600_000,   // 10 minutes
} as const;

export const LIMITS = {
    HTTP_MAX_ATTEMPTS: 3,
    HTTP_RETRY_BACKOFF_MS: [400, 1000],
    LMS_CACHE_MAX_ENTRIES: 500,
    LMS_CACHE_TTL_MS: 60_000,
    DUE_DAYS_DEFAULT: 14,
    RUNS_TAIL_DEFAULT: 10,
    RUNS_TAIL_MAX: 200,
    FEEDBACK_HINTS: 3,
    FEEDBACK_LIST: 50,
    SOURCE_CLAIMS_MAX: 5,
} as const;

// Confirm tokens are deliberately short-lived
export const DEFAULT_TOKEN_TTL_MINUTES = 10;

export const AUTH_MODES = ['token', 'oauth_placeholder'] as const;
export type AuthMode = (typeof AUTH_MODES)[number];

export function isAuthMode(value: string): value is AuthMode {
    return AUTH_MODES.some((m) => m === value);
}

/* -------------------------------------------------------------------------- */
/* Config file                                                                */
/* -------------------------------------------------------------------------- */

export interface ConfigFile {
    canvas_base_url?: string;
    auth?: {
        mode?: AuthMode;
        token?: string;
    };
    token_ttl_minutes?: number;
    http_timeout_ms?: number;
}

const CONFIG_SCHEMA: JsonSchema = {
    type: 'object',
    properties: {
        canvas_base_url: { type: 'string', pattern: '^https?://' },
        auth: {
            type: 'object',
            properties: {
                mode: { type: 'string', enum: AUTH_MODES },
                token: { type: 'string' },
            },
        },
        token_ttl_minutes: { type: 'number', minimum: 1, maximum: 1440 },
        http_timeout_ms: { type: 'number', minimum: 100 },
    },
};

const validator = new SchemaValidator();
validator.registerSchema('config_v1', CONFIG_SCHEMA);

export function loadConfigFile(configPath: string): ConfigFile {
    if (!fs.existsSync(configPath)) return {};

    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (e) {
        throw ErrorFactory.validation(`Config file is not valid JSON: ${configPath}`, {
            config_path: configPath,
            cause: e instanceof Error ? e.message : String(e),
        });
    }

    const errors: ValidationError[] = [];
    if (!isConfigFile(parsed, errors)) {
        throw ErrorFactory.validation(
            `Config file failed validation: ${formatValidationErrors(errors)}`,
            { config_path: configPath, errors }
        );
    }
    return parsed;
}

function isConfigFile(value: unknown, errors: ValidationError[]): value is ConfigFile {
    const result = validator.validate(value, 'config_v1');
    errors.push(...result.errors);
    return result.valid;
}

export function saveConfigFile(configPath: string, config: ConfigFile): void {
    const warnings: string[] = [];
    atomicWriteFileSync({
        filePath: configPath,
        content: JSON.stringify(config, null, 2) + '\n',
        mode: 0o600,
        fsyncMode: 'BEST_EFFORT',
        warnings,
    });
}

/* -------------------------------------------------------------------------- */
/* Settings                                                                   */
/* -------------------------------------------------------------------------- */

export interface Settings {
    homeDir: string;
    configPath: string;
    policyPath: string;
    dbPath: string;
    artifactsRoot: string;
    authMode: AuthMode;
    canvasBaseUrl: string | null;
    canvasApiToken: string | null;
    tokenTtlMinutes: number;
    httpTimeoutMs: number;
    httpMaxAttempts: number;
}

type Env = Record<string, string | undefined>;

function envInt(env: Env, name: string, fallback: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = parseInt(raw, 10);
    return Number.isFinite(value) && value > 0 ? value : fallback;
}

export function resolveHomeDir(env: Env = process.env): string {
    return env.STUDYFLOW_HOME || path.join(os.homedir(), '.studyflow');
}

export function loadSettings(env: Env = process.env): Settings {
    const homeDir = resolveHomeDir(env);
    const configPath = path.join(homeDir, 'config.json');
    const file = loadConfigFile(configPath);

    return {
        homeDir,
        configPath,
        policyPath: path.join(homeDir, 'policy.json'),
        dbPath: path.join(homeDir, 'state.db'),
        artifactsRoot: path.join(homeDir, 'artifacts'),
        authMode: file.auth?.mode ?? 'token',
        canvasBaseUrl: env.CANVAS_BASE_URL || file.canvas_base_url || null,
        canvasApiToken: env.CANVAS_API_TOKEN || file.auth?.token || null,
        tokenTtlMinutes: envInt(env, 'STUDYFLOW_TOKEN_TTL_MINUTES', file.token_ttl_minutes ?? DEFAULT_TOKEN_TTL_MINUTES),
        httpTimeoutMs: envInt(env, 'STUDYFLOW_HTTP_TIMEOUT_MS', file.http_timeout_ms ?? TIMEOUTS.HTTP_REQUEST_MS),
        httpMaxAttempts: envInt(env, 'STUDYFLOW_HTTP_MAX_ATTEMPTS', LIMITS.HTTP_MAX_ATTEMPTS),
    };
}

/**
 * Mask a credential for display: first and last two characters only.
 */
export function maskToken(token: string | null): string {
    if (!token) return 'not configured';
    if (token.length < 6) return 'configured';
    return `configured (${token.slice(0, 2)}***${token.slice(-2)})`;
}
