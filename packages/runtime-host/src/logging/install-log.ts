/**
 * sysindex Runtime Host — Install Event Log
 *
 * One JSONL line per install attempt in `logs/install-events.jsonl`.
 *
 * The installer itself never logs. Callers (the CLI) record the attempt
 * after the installer reports completion.
 *
 * readInstallLog() is the matching reader: malformed lines and a partial
 * trailing line (a write cut short) are dropped and counted, duplicate
 * event_ids keep their first occurrence, and events come back ordered by
 * (timestamp, event_id).
 */

import { randomUUID } from 'node:crypto';
import type { StateIO } from '../state/state-io.js';

export const INSTALL_LOG_FILE = 'install-events.jsonl';

export type InstallOperation = 'primary' | 'template' | 'both';
export type InstallResult = 'ok' | 'failed';

export interface InstallEvent {
  readonly event_id: string;
  /** ISO 8601 time the attempt finished. */
  readonly timestamp: string;
  readonly operation: InstallOperation;
  readonly result: InstallResult;
  /** Failure message, null on success. */
  readonly error: string | null;
  /** state_version of the authoritative store after the attempt. */
  readonly state_version: number;
}

/** Receives install events. */
export interface InstallLogSink {
  append(entry: Omit<InstallEvent, 'event_id'>): void;
}

/** Appends each install event as a JSONL line via the injected StateIO. */
export class FileInstallLogSink implements InstallLogSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly idFn: () => string = randomUUID,
  ) {}

  append(entry: Omit<InstallEvent, 'event_id'>): void {
    const event: InstallEvent = { event_id: this.idFn(), ...entry };
    this.stateIO.appendLine(INSTALL_LOG_FILE, JSON.stringify(event));
  }
}

// ---------------------------------------------------------------------------
// Reader
// ---------------------------------------------------------------------------

export interface InstallLogReadResult {
  readonly events: ReadonlyArray<InstallEvent>;
  /** Lines that were not valid install events. */
  readonly malformed: number;
  readonly duplicates: number;
  /** True when the file did not end with a newline; its last line was dropped. */
  readonly partialTrailingLine: boolean;
}

const OPERATIONS: ReadonlySet<string> = new Set<InstallOperation>(['primary', 'template', 'both']);
const RESULTS: ReadonlySet<string> = new Set<InstallResult>(['ok', 'failed']);

function parseEvent(line: string): InstallEvent | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null) {
    return null;
  }
  const fields = new Map<string, unknown>(Object.entries(parsed));
  const eventId = fields.get('event_id');
  const timestamp = fields.get('timestamp');
  const operation = fields.get('operation');
  const result = fields.get('result');
  const error = fields.get('error');
  const stateVersion = fields.get('state_version');
  if (
    typeof eventId !== 'string' ||
    typeof timestamp !== 'string' ||
    typeof operation !== 'string' ||
    !OPERATIONS.has(operation) ||
    typeof result !== 'string' ||
    !RESULTS.has(result) ||
    !(error === null || typeof error === 'string') ||
    typeof stateVersion !== 'number'
  ) {
    return null;
  }
  return {
    event_id: eventId,
    timestamp,
    operation: operation === 'primary' ? 'primary' : operation === 'template' ? 'template' : 'both',
    result: result === 'ok' ? 'ok' : 'failed',
    error,
    state_version: stateVersion,
  };
}

/** Read and parse the install log of a home directory. */
export function readInstallLog(stateIO: StateIO): InstallLogReadResult {
  const raw = stateIO.readLogRaw(INSTALL_LOG_FILE);
  if (raw.length === 0) {
    return { events: [], malformed: 0, duplicates: 0, partialTrailingLine: false };
  }

  const partialTrailingLine = !raw.endsWith('\n');
  const lines = raw.split('\n');
  const complete = (partialTrailingLine ? lines.slice(0, -1) : lines).filter((l) => l.length > 0);

  const seen = new Set<string>();
  const events: InstallEvent[] = [];
  let malformed = 0;
  let duplicates = 0;

  for (const line of complete) {
    const event = parseEvent(line);
    if (event === null) {
      malformed++;
      continue;
    }
    if (seen.has(event.event_id)) {
      duplicates++;
      continue;
    }
    seen.add(event.event_id);
    events.push(event);
  }

  events.sort((a, b) => {
    if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? -1 : 1;
    if (a.event_id !== b.event_id) return a.event_id < b.event_id ? -1 : 1;
    return 0;
  });

  return { events, malformed, duplicates, partialTrailingLine };
}
