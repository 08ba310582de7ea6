/**
 * sysindex Runtime Host — StateIO
 *
 * Injectable JSON state and JSONL log access, rooted at one home directory.
 *
 *   FileStateIO   — files under `<home>/state/` and `<home>/logs/`
 *   MemoryStateIO — in-process maps, for tests and embedded use
 *
 * State files hold the authoritative cluster metadata, which several
 * sysindex processes may update at once. Writes therefore replace a file in
 * one rename, and a read-check-write sequence runs under withLock().
 */

import {
  appendFileSync,
  closeSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  rmSync,
  statSync,
  writeFileSync,
  writeSync,
} from 'node:fs';
import { join } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** A state file exists but its content cannot be used. */
export class StateFileError extends Error {
  constructor(
    readonly filename: string,
    reason: string,
  ) {
    super(`invalid ${filename}: ${reason}`);
    this.name = 'StateFileError';
  }
}

/** Another holder kept the lock on a state file for longer than allowed. */
export class StateLockTimeoutError extends Error {
  constructor(
    readonly filename: string,
    readonly waitMs: number,
  ) {
    super(`lock on ${filename} not acquired within ${waitMs}ms`);
    this.name = 'StateLockTimeoutError';
  }
}

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

export interface StateIO {
  /**
   * Parsed content of a state file, or undefined when the file does not
   * exist. The value is unchecked; callers validate its shape.
   *
   * @throws StateFileError when the file is not valid JSON
   */
  readJson(filename: string): unknown;

  /** Replace a state file with `value` serialized as JSON. */
  writeJson(filename: string, value: unknown): void;

  /**
   * Run `critical` while holding the exclusive lock for `filename`.
   *
   * `critical` is synchronous, so the lock is held for one uninterrupted
   * block and never across an await.
   */
  withLock<R>(filename: string, critical: () => R): Promise<R>;

  /** Append one line (a newline is added) to a log file. */
  appendLine(logfilename: string, line: string): void;

  /** Raw content of a log file, or '' when it does not exist. */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

export interface FileStateIOOptions {
  /** How long withLock() waits for a held lock. Default 15000. */
  readonly lockWaitMs?: number;
  /** Age after which a lock file is treated as abandoned. Default 10000. */
  readonly lockStaleMs?: number;
}

const LOCK_RETRY_MS = 10;

/**
 * StateIO over a home directory.
 *
 * - writeJson writes `<file>.<pid>.tmp` and renames it over the target, so a
 *   reader sees the old content or the new, never a prefix.
 * - withLock holds `<file>.lock`, created with O_EXCL. A lock file older than
 *   lockStaleMs belongs to a process that died inside its critical section
 *   and is removed.
 */
export class FileStateIO implements StateIO {
  private readonly lockWaitMs: number;
  private readonly lockStaleMs: number;

  constructor(
    private readonly homeDir: string,
    options: FileStateIOOptions = {},
  ) {
    this.lockWaitMs = options.lockWaitMs ?? 15_000;
    this.lockStaleMs = options.lockStaleMs ?? 10_000;
  }

  readJson(filename: string): unknown {
    let raw: string;
    try {
      raw = readFileSync(this.statePath(filename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) return undefined;
      throw err;
    }
    try {
      return JSON.parse(raw);
    } catch {
      throw new StateFileError(filename, 'not valid JSON');
    }
  }

  writeJson(filename: string, value: unknown): void {
    mkdirSync(this.statePath(), { recursive: true });
    const target = this.statePath(filename);
    const staging = `${target}.${process.pid}.tmp`;
    writeFileSync(staging, JSON.stringify(value, null, 2), 'utf-8');
    renameSync(staging, target);
  }

  async withLock<R>(filename: string, critical: () => R): Promise<R> {
    mkdirSync(this.statePath(), { recursive: true });
    const lockPath = this.statePath(`${filename}.lock`);
    const deadline = Date.now() + this.lockWaitMs;

    for (;;) {
      const fd = tryCreateExclusive(lockPath);
      if (fd !== null) {
        try {
          return critical();
        } finally {
          closeSync(fd);
          rmSync(lockPath, { force: true });
        }
      }
      if (lockAgeMs(lockPath) > this.lockStaleMs) {
        rmSync(lockPath, { force: true });
        continue;
      }
      if (Date.now() >= deadline) {
        throw new StateLockTimeoutError(filename, this.lockWaitMs);
      }
      await sleep(LOCK_RETRY_MS);
    }
  }

  appendLine(logfilename: string, line: string): void {
    mkdirSync(this.logPath(), { recursive: true });
    appendFileSync(this.logPath(logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(this.logPath(logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) return '';
      throw err;
    }
  }

  private statePath(filename?: string): string {
    return filename === undefined ? join(this.homeDir, 'state') : join(this.homeDir, 'state', filename);
  }

  private logPath(logfilename?: string): string {
    return logfilename === undefined ? join(this.homeDir, 'logs') : join(this.homeDir, 'logs', logfilename);
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * StateIO kept in memory.
 *
 * State is held as JSON text, so a read returns a fresh value with the shape
 * FileStateIO would return. withLock needs no bookkeeping: the critical
 * section is synchronous and nothing else in the process can interleave.
 */
export class MemoryStateIO implements StateIO {
  private readonly files = new Map<string, string>();
  private readonly logs = new Map<string, string[]>();

  readJson(filename: string): unknown {
    const text = this.files.get(filename);
    return text === undefined ? undefined : JSON.parse(text);
  }

  writeJson(filename: string, value: unknown): void {
    this.files.set(filename, JSON.stringify(value));
  }

  async withLock<R>(_filename: string, critical: () => R): Promise<R> {
    return critical();
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /** Lines appended to a log, in order. Not part of StateIO. */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    return lines.length === 0 ? '' : lines.join('\n') + '\n';
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function isNodeError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

/** Open `path` with O_CREAT|O_EXCL. Null when it already exists. */
function tryCreateExclusive(path: string): number | null {
  try {
    const fd = openSync(path, 'wx');
    writeSync(fd, String(process.pid));
    return fd;
  } catch (err: unknown) {
    if (isNodeError(err, 'EEXIST')) return null;
    throw err;
  }
}

/** Milliseconds since the lock file was written; 0 if it has just gone. */
function lockAgeMs(path: string): number {
  try {
    return Date.now() - statSync(path).mtimeMs;
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return 0;
    throw err;
  }
}
