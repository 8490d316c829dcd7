// src/output_writer/lock.ts

import * as fs from "fs";
import * as path from "path";
import { errnoCode } from "./atomic_write";

export interface LockHandle {
    fd: number;
    lockPath: string;
}

export class LockHeldError extends Error {
    readonly code = "LOCK_HELD";

    constructor(public readonly lockPath: string) {
        super(`LOCK_HELD: ${lockPath}`);
        this.name = "LockHeldError";
    }
}

interface LockIdentity {
    pid?: unknown;
    started_ms?: unknown;
}

function sleep(ms: number): Promise<void> {
    return new Promise((r) => setTimeout(r, ms));
}

function backoff(attempt: number): number {
    // 50,100,200,400,800,... capped at 1000
    const v = 50 * Math.pow(2, attempt);
    return Math.min(v, 1000);
}

function readIdentity(lockPath: string): LockIdentity | null {
    try {
        const parsed: unknown = JSON.parse(fs.readFileSync(lockPath, "utf8"));
        if (typeof parsed !== "object" || parsed === null) return null;
        const record: Record<string, unknown> = Object.fromEntries(Object.entries(parsed));
        return { pid: record.pid, started_ms: record.started_ms };
    } catch {
        return null;
    }
}

function pidAlive(pid: number): boolean {
    try {
        // signal 0 only probes for existence
        process.kill(pid, 0);
        return true;
    } catch (e) {
        // EPERM: exists but owned by someone else
        return errnoCode(e) === "EPERM";
    }
}

function lockMtimeMs(lockPath: string): number | null {
    try {
        return fs.statSync(lockPath).mtimeMs;
    } catch (e) {
        if (errnoCode(e) === "ENOENT") return null;
        throw e;
    }
}

function removeIfPresent(lockPath: string): void {
    try {
        fs.unlinkSync(lockPath);
    } catch (e) {
        if (errnoCode(e) !== "ENOENT") throw e;
    }
}

/**
 * Exclusive lock file (O_CREAT | O_EXCL). A lock whose owner PID is gone, or that
 * is older than staleTtlMs, is broken and re-acquired. A lock with no readable
 * identity is judged by its file mtime. Waits with exponential
 * backoff up to timeoutMs, then throws LockHeldError.
 */
export async function acquireRunLock(params: {
    lockPath: string;
    timeoutMs: number;
    warnings: string[];
    identityJson: Record<string, unknown>;
    staleTtlMs?: number;
}): Promise<LockHandle> {
    const { lockPath, timeoutMs, warnings, identityJson } = params;

    fs.mkdirSync(path.dirname(lockPath), { recursive: true, mode: 0o755 });

    const started = Date.now();
    let attempt = 0;
    const STALE_LOCK_MS = params.staleTtlMs ?? 600000; // 10 minutes default

    while (true) {
        try {
            const fd = fs.openSync(lockPath, "wx");

            const lockData = {
                ...identityJson,
                pid: process.pid,
                started_utc: new Date().toISOString(),
                started_ms: Date.now(),
            };
            try {
                fs.writeSync(fd, JSON.stringify(lockData, null, 2));
            } catch (writeErr) {
                // An empty lock would block later runs until it ages out.
                fs.closeSync(fd);
                removeIfPresent(lockPath);
                throw writeErr;
            }

            return { fd, lockPath };
        } catch (e) {
            if (errnoCode(e) !== "EEXIST") throw e;

            const identity = readIdentity(lockPath);
            if (identity === null) {
                // Unreadable: the owner may still be writing its identity, so
                // only the file age can mark it stale.
                const mtimeMs = lockMtimeMs(lockPath);
                if (mtimeMs === null) continue;
                const lockAge = Date.now() - mtimeMs;
                if (lockAge > STALE_LOCK_MS) {
                    warnings.push(`STALE_LOCK(UNREADABLE) ${lockPath} age=${lockAge}ms`);
                    removeIfPresent(lockPath);
                    continue;
                }
                warnings.push(`LOCK_UNREADABLE ${lockPath}`);
            } else {
                const lockAge = Date.now() - (typeof identity.started_ms === "number" ? identity.started_ms : 0);
                let isStale = false;

                if (typeof identity.pid === "number" && !pidAlive(identity.pid)) {
                    isStale = true;
                    warnings.push(`STALE_LOCK(PID_DEAD) ${lockPath} pid=${identity.pid}`);
                }

                if (!isStale && lockAge > STALE_LOCK_MS) {
                    isStale = true;
                    warnings.push(`STALE_LOCK(AGE) ${lockPath} age=${lockAge}ms`);
                }

                if (isStale) {
                    removeIfPresent(lockPath);
                    continue;
                }
            }

            const elapsed = Date.now() - started;
            if (elapsed >= timeoutMs) {
                throw new LockHeldError(lockPath);
            }

            const wait = backoff(attempt++);
            warnings.push(`LOCK_RETRY after ${wait}ms on ${lockPath}`);
            await sleep(wait);
        }
    }
}

export function releaseRunLock(handle: LockHandle, warnings: string[]): void {
    try {
        fs.closeSync(handle.fd);
    } catch (e) {
        warnings.push(`LOCK_CLOSE_FAILED(${errnoCode(e) || "UNKNOWN"}) ${handle.lockPath}`);
    }
    removeIfPresent(handle.lockPath);
}
