import { describe, expect, it } from 'vitest';
import { ManualClock } from './clock';
import { RoomRegistry } from './roomManager';

const member = (sessionId: string) => ({ sessionId, name: sessionId, joinedAt: 0 });

describe('RoomRegistry', () => {
  it('creates a blank room on first use and reuses it afterwards', () => {
    const registry = new RoomRegistry(new ManualClock(500));

    const room = registry.getOrCreate('R1');

    expect(room).toMatchObject({
      roomId: 'R1',
      mediaId: null,
      position: 0,
      playing: false,
      hostId: null,
      lastUpdate: 500,
    });
    expect(room.members.size).toBe(0);
    expect(registry.getOrCreate('R1')).toBe(room);
    expect(registry.size).toBe(1);
  });

  it('removes a room only when it is empty', () => {
    const registry = new RoomRegistry(new ManualClock());
    const room = registry.getOrCreate('R1');
    room.members.set('A', member('A'));

    expect(registry.removeIfEmpty('R1')).toBe(false);

    room.members.delete('A');
    expect(registry.removeIfEmpty('R1')).toBe(true);
    expect(registry.has('R1')).toBe(false);
  });

  it('allocates distinct hex room ids', () => {
    const registry = new RoomRegistry(new ManualClock());

    const ids = new Set(Array.from({ length: 20 }, () => registry.create().roomId));

    expect(ids.size).toBe(20);
    ids.forEach((id) => expect(id).toMatch(/^[0-9a-f]{8}$/));
  });

  it('keeps an empty room through locked tasks until it is removed explicitly', async () => {
    const clock = new ManualClock(0);
    const registry = new RoomRegistry(clock);
    const allocated = registry.create();

    clock.advance(250);
    await registry.withExistingRoom(allocated.roomId, () => 'read');

    expect(registry.get(allocated.roomId)).toBe(allocated);
    expect(allocated.lastActivity).toBe(250);

    await registry.withRoom('R1', (room) => {
      room.members.set('A', member('A'));
    });
    await registry.withExistingRoom('R1', (room) => {
      room.members.delete('A');
      registry.removeIfEmpty('R1');
    });
    expect(registry.has('R1')).toBe(false);
  });

  it('does not create rooms through withExistingRoom', async () => {
    const registry = new RoomRegistry(new ManualClock());

    const result = await registry.withExistingRoom('missing', () => 'ran');

    expect(result).toBeUndefined();
    expect(registry.has('missing')).toBe(false);
  });

  it('serializes a leave and a join racing on the same room', async () => {
    const registry = new RoomRegistry(new ManualClock());
    await registry.withRoom('R1', (room) => {
      room.members.set('A', member('A'));
    });
    const original = registry.get('R1');

    const leave = registry.withExistingRoom('R1', async (room) => {
      await Promise.resolve();
      room.members.delete('A');
      registry.removeIfEmpty('R1');
    });
    const join = registry.withRoom('R1', (room) => {
      room.members.set('B', member('B'));
      return room;
    });

    await leave;
    const joined = await join;

    // the leave emptied and dropped the old room before the join ran
    expect(joined).not.toBe(original);
    expect(registry.get('R1')).toBe(joined);
    expect(Array.from(joined.members.keys())).toEqual(['B']);
  });

  it('sweeps allocated rooms that stayed empty past the timeout', () => {
    const clock = new ManualClock(0);
    const registry = new RoomRegistry(clock);
    const idle = registry.create();
    const busy = registry.getOrCreate('busy');
    busy.members.set('A', member('A'));

    clock.advance(10_000);
    const fresh = registry.create();

    expect(registry.sweep(5_000)).toEqual([idle.roomId]);
    expect(registry.has(fresh.roomId)).toBe(true);
    expect(registry.has('busy')).toBe(true);
  });
});
