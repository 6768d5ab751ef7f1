import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { appendFileSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { LogStore } from '../src/storage/logStore.js';

describe('LogStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'mapsync-logs-'));
  });
  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('keeps only the newest events in memory', () => {
    const logs = new LogStore({ capacity: 3 });
    for (let i = 0; i < 5; i += 1) logs.record('PUBLISH', { i }, 'INFO', 'ops');
    expect(logs.count()).toBe(3);
    expect(logs.readLatest(10).map((e) => e.payload)).toEqual([{ i: 2 }, { i: 3 }, { i: 4 }]);
  });

  it('filters by room and limit', () => {
    const logs = new LogStore();
    logs.record('MEMBER_JOINED', {}, 'INFO', 'a');
    logs.record('MEMBER_JOINED', {}, 'INFO', 'b');
    logs.record('MEMBER_LEFT', {}, 'INFO', 'a');
    expect(logs.readLatest(10, 'a').map((e) => e.type)).toEqual(['MEMBER_JOINED', 'MEMBER_LEFT']);
    expect(logs.readLatest(1, 'a').map((e) => e.type)).toEqual(['MEMBER_LEFT']);
  });

  it('persists to JSONL and skips lines that do not parse', () => {
    const logs = new LogStore({ dir });
    logs.record('PROTOCOL_ERROR', { reason: 'invalid_json' }, 'WARN');
    appendFileSync(join(dir, 'sync-log.jsonl'), '{"truncated\n');
    logs.record('ERROR', { reason: 'boom' }, 'ERROR', 'ops');

    const persisted = logs.readPersisted();
    expect(persisted.map((e) => e.type)).toEqual(['PROTOCOL_ERROR', 'ERROR']);
    expect(persisted[1].room).toBe('ops');
  });

  it('reads back a persisted line that carries no payload', () => {
    const logs = new LogStore({ dir });
    appendFileSync(
      join(dir, 'sync-log.jsonl'),
      '{"id":"evt-1","timestamp":1,"type":"PUBLISH","level":"INFO"}\n',
    );

    const persisted = logs.readPersisted();
    expect(persisted).toHaveLength(1);
    expect(persisted[0].id).toBe('evt-1');
    expect(persisted[0].payload).toBeUndefined();
  });
});
