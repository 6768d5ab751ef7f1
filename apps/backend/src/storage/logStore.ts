import { existsSync, mkdirSync, appendFileSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import crypto from 'node:crypto';
import { LogEventSchema, type LogEvent, type LogEventType, type LogLevel } from '@mapsync/shared';

// ─── Config ──────────────────────────────────────────────

const LOG_FILE_NAME = 'sync-log.jsonl';
const DEFAULT_CAPACITY = 1_000;

export interface LogStoreOptions {
  /** Directory for the JSONL file. Memory only when omitted. */
  dir?: string;
  /** Events kept in memory */
  capacity?: number;
}

export function createLogEvent(
  type: LogEventType,
  payload: unknown,
  level: LogLevel = 'INFO',
  room?: string,
): LogEvent {
  return {
    id: crypto.randomUUID(),
    timestamp: Date.now(),
    type,
    room,
    payload,
    level,
  };
}

/**
 * Operator diagnostics: a bounded in-memory ring, optionally mirrored to
 * an append-only JSONL file.
 */
export class LogStore {
  private readonly events: LogEvent[] = [];
  private readonly capacity: number;
  private readonly file: string | null;

  constructor(options: LogStoreOptions = {}) {
    this.capacity = options.capacity ?? DEFAULT_CAPACITY;
    this.file = options.dir ? join(options.dir, LOG_FILE_NAME) : null;
    if (options.dir && !existsSync(options.dir)) {
      mkdirSync(options.dir, { recursive: true });
    }
  }

  append(event: LogEvent): void {
    this.events.push(event);
    if (this.events.length > this.capacity) {
      this.events.splice(0, this.events.length - this.capacity);
    }
    if (this.file) {
      appendFileSync(this.file, JSON.stringify(event) + '\n', 'utf-8');
    }
  }

  record(type: LogEventType, payload: unknown, level: LogLevel = 'INFO', room?: string): LogEvent {
    const event = createLogEvent(type, payload, level, room);
    this.append(event);
    return event;
  }

  /** Latest events, oldest first, optionally for one room. */
  readLatest(limit = 100, room?: string): LogEvent[] {
    const matching = room === undefined ? this.events : this.events.filter((e) => e.room === room);
    return matching.slice(Math.max(0, matching.length - limit));
  }

  count(): number {
    return this.events.length;
  }

  /** Read every event persisted to disk, skipping lines that do not parse. */
  readPersisted(): LogEvent[] {
    if (!this.file || !existsSync(this.file)) return [];
    const lines = readFileSync(this.file, 'utf-8').split('\n').filter(Boolean);
    const events: LogEvent[] = [];
    for (const line of lines) {
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch {
        continue; // truncated write
      }
      const parsed = LogEventSchema.safeParse(raw);
      if (parsed.success) events.push({ ...parsed.data, payload: parsed.data.payload });
    }
    return events;
  }
}
