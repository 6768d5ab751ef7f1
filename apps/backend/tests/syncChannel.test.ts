import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  THEME_PRESETS,
  createLocationTable,
  parseServerFrame,
  sceneFingerprint,
  type ServerEventFrame,
  type ServerFrame,
} from '@mapsync/shared';
import { LogStore } from '../src/storage/logStore.js';
import type { RoomMember } from '../src/sync/room.js';
import { SyncChannel, type ChannelConfig } from '../src/sync/syncChannel.js';

const config: ChannelConfig = { roomDrainGraceMs: 1_000, updateThrottleMs: 50, maxMembersPerRoom: 3 };

class RecordingMember implements RoomMember {
  readonly frames: ServerFrame[] = [];
  constructor(readonly id: string) {}
  send(frame: ServerFrame): void {
    this.frames.push(frame);
  }
  events(): ServerEventFrame[] {
    return this.frames.filter((f): f is ServerEventFrame => f.type === 'event');
  }
}

function makeChannel(logs = new LogStore()): SyncChannel {
  return new SyncChannel({ config, locations: createLocationTable(), logs });
}

describe('SyncChannel', () => {
  let channel: SyncChannel;

  beforeEach(() => {
    channel = makeChannel();
  });
  afterEach(() => {
    channel.close();
  });

  describe('join', () => {
    it('creates the room and sends an empty full_state to the joiner only', async () => {
      const a = new RecordingMember('a');
      const result = await channel.join('ops', a);

      expect(result).toEqual({ ok: true, members: 1, revision: 0 });
      expect(a.events()).toHaveLength(1);
      expect(a.events()[0]).toMatchObject({ room: 'ops', revision: 0, event: 'full_state' });
      expect(channel.listRooms()[0]).toMatchObject({ roomKey: 'ops', state: 'active', members: 1 });
    });

    it('gives a cold joiner the current groups and theme', async () => {
      await channel.publishFullState('ops', {
        groups: [
          { id: 'edge', style: 'operational', nodes: ['sjc', 'lhr'] },
          { id: 'core', style: 'info', nodes: ['fra'] },
        ],
        theme: 'dark',
      });

      const late = new RecordingMember('late');
      await channel.join('ops', late);

      const [frame] = late.events();
      expect(frame.event).toBe('full_state');
      if (frame.event !== 'full_state') return;
      expect(frame.payload.marker_groups.map((g) => g.id)).toEqual(['edge', 'core']);
      expect(frame.payload.marker_groups[0].nodes).toHaveLength(2);
      expect(frame.payload.theme).toEqual(THEME_PRESETS.dark);
    });

    it('sends legacy off-frame nodes in a frame the wire schema accepts', async () => {
      const legacy = new SyncChannel({ config, locations: createLocationTable(), logs: new LogStore(), legacy: true });
      await legacy.publishFullState('ops', { groups: [{ id: 'edge', nodes: ['sjc', 'nowhere'] }] });

      const member = new RecordingMember('a');
      await legacy.join('ops', member);
      legacy.close();

      const parsed = parseServerFrame(JSON.parse(JSON.stringify(member.events()[0])));
      expect(parsed.ok).toBe(true);
      if (!parsed.ok || parsed.value.type !== 'event' || parsed.value.event !== 'full_state') return;
      expect(parsed.value.payload.marker_groups[0].nodes[1]).toMatchObject({ coordinates: [0, -190], id: 'nowhere' });
    });

    it('rejects joins beyond the member limit', async () => {
      for (const id of ['a', 'b', 'c']) await channel.join('ops', new RecordingMember(id));
      const d = new RecordingMember('d');
      expect(await channel.join('ops', d)).toEqual({ ok: false, reason: 'room_full' });
      expect(d.frames).toEqual([]);
    });
  });

  describe('broadcast', () => {
    it('delivers one producer\'s events to every member in order', async () => {
      const a = new RecordingMember('a');
      const b = new RecordingMember('b');
      await channel.join('ops', a);
      await channel.join('ops', b);

      await channel.publishFullState('ops', { groups: [{ id: 'edge', nodes: ['sjc'] }] });
      const pending = [
        channel.publishMarkerAdd('ops', 'edge', 'lhr'),
        channel.publishMarkerAdd('ops', 'edge', 'fra'),
        channel.publishMarkerRemove('ops', 'edge', 'sjc'),
      ];
      await Promise.all(pending);

      for (const member of [a, b]) {
        const incremental = member.events().slice(1);
        expect(incremental.map((f) => f.event)).toEqual(['group_update', 'marker_add', 'marker_add', 'marker_remove']);
        expect(incremental.map((f) => f.revision)).toEqual([1, 2, 3, 4]);
      }
    });

    it('does not emit anything for no-op changes', async () => {
      const a = new RecordingMember('a');
      await channel.join('ops', a);
      await channel.publishFullState('ops', { groups: [{ id: 'edge', nodes: ['sjc'] }] });

      const again = await channel.publishMarkerAdd('ops', 'edge', 'sjc');
      const removed = await channel.publishMarkerRemove('ops', 'edge', 'nope');

      expect(again.value?.revisions).toEqual([]);
      expect(removed.revisions).toEqual([]);
      expect(a.events()).toHaveLength(2);
    });

    it('drops a member whose send throws and keeps serving the rest', async () => {
      const good = new RecordingMember('good');
      const bad: RoomMember = {
        id: 'bad',
        send: vi.fn((frame: ServerFrame) => {
          if (frame.type === 'event' && frame.event !== 'full_state') throw new Error('socket is not open');
        }),
      };
      await channel.join('ops', good);
      await channel.join('ops', bad);

      await channel.publishThemeChange('ops', { land: '#000000' });
      await channel.publishThemeChange('ops', { land: '#111111' });

      expect(good.events().map((f) => f.event)).toEqual(['full_state', 'theme_change', 'theme_change']);
      expect(bad.send).toHaveBeenCalledTimes(2);
      expect(channel.stats()).toEqual({ rooms: 1, members: 1 });
    });

    it('reports skipped nodes without rejecting the group', async () => {
      const result = await channel.publishFullState('ops', {
        groups: [
          {
            id: 'edge',
            nodes: ['sjc', { lat: 200, lng: 0 }, 'lhr', { lat: 200, lng: 1 }, 'fra'],
          },
        ],
      });
      expect(result.errors).toHaveLength(2);
      expect(channel.snapshot('ops')?.groups[0].nodes).toHaveLength(3);
    });

    it('rejects changes to unknown groups', async () => {
      const result = await channel.publishVisibilityToggle('ops', 'ghost', false);
      expect(result.ok).toBe(false);
      expect(result.error?.code).toBe('unknown_group');
    });
  });

  describe('handleSyncRequest', () => {
    it('answers in_sync when fingerprints match', async () => {
      const a = new RecordingMember('a');
      await channel.join('ops', a);
      const scene = channel.snapshot('ops');
      if (!scene) throw new Error('room missing');
      expect(await channel.handleSyncRequest('ops', 'a', sceneFingerprint(scene))).toBe('in_sync');
      expect(a.events()).toHaveLength(1);
    });

    it('pushes full state to the requester only when fingerprints differ', async () => {
      const a = new RecordingMember('a');
      const b = new RecordingMember('b');
      await channel.join('ops', a);
      await channel.join('ops', b);

      expect(await channel.handleSyncRequest('ops', 'a', '0xstale')).toBe('state_updated');
      expect(a.events()).toHaveLength(2);
      expect(b.events()).toHaveLength(1);
    });

    it('acknowledges requests from non-members and for unknown rooms', async () => {
      await channel.join('ops', new RecordingMember('a'));
      expect(await channel.handleSyncRequest('ops', 'stranger', '0xstale')).toBe('sync_acknowledged');
      expect(await channel.handleSyncRequest('nowhere', 'a', '0xstale')).toBe('sync_acknowledged');
      expect(channel.snapshot('nowhere')).toBeUndefined();
    });
  });

  it('answers health checks without creating rooms', () => {
    expect(channel.handleHealthCheck().status).toBe('pong');
    expect(channel.stats()).toEqual({ rooms: 0, members: 0 });
  });

  describe('leave and draining', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });
    afterEach(() => {
      vi.useRealTimers();
    });

    it('treats repeated leaves as no-ops', async () => {
      await channel.join('ops', new RecordingMember('a'));
      expect(await channel.leave('ops', 'a')).toBe(true);
      expect(await channel.leave('ops', 'a')).toBe(false);
      expect(await channel.leave('elsewhere', 'a')).toBe(false);
    });

    it('discards an empty room after the grace period', async () => {
      await channel.join('ops', new RecordingMember('a'));
      await channel.leave('ops', 'a');
      expect(channel.listRooms()[0].state).toBe('draining');

      await vi.advanceTimersByTimeAsync(1_000);
      expect(channel.listRooms()).toEqual([]);
    });

    it('keeps a draining room that gets a new member', async () => {
      await channel.join('ops', new RecordingMember('a'));
      await channel.leave('ops', 'a');
      await vi.advanceTimersByTimeAsync(500);
      await channel.join('ops', new RecordingMember('b'));
      await vi.advanceTimersByTimeAsync(1_000);

      expect(channel.listRooms()[0]).toMatchObject({ state: 'active', members: 1 });
    });

    it('keeps a room open while a producer holds it', async () => {
      const producer = await channel.producer('ops');
      await producer.publishFullState({ groups: [{ id: 'edge', nodes: ['sjc'] }] });
      await vi.advanceTimersByTimeAsync(5_000);
      expect(channel.snapshot('ops')?.groups).toHaveLength(1);

      await producer.release();
      await producer.release();
      expect(channel.listRooms()[0]).toMatchObject({ state: 'draining', producers: 0 });
      await vi.advanceTimersByTimeAsync(1_000);
      expect(channel.snapshot('ops')).toBeUndefined();
    });
  });

  it('records diagnostics per room', async () => {
    const logs = new LogStore();
    const local = makeChannel(logs);
    await local.join('ops', new RecordingMember('a'));
    await local.publishFullState('ops', { groups: [{ id: 'edge', nodes: ['nowhere'] }] });

    const types = logs.readLatest(10, 'ops').map((e) => e.type);
    expect(types).toEqual(['ROOM_CREATED', 'MEMBER_JOINED', 'VALIDATION_SKIP', 'PUBLISH']);
    local.close();
  });
});
