import { systemClock } from './clock';
import type { Clock } from './clock';
import { KeyedLock } from './roomLock';
import type { RoomState } from './types';
import { generateRoomCode, logProduction } from './utils';

export const createRoomState = (roomId: string, now: number): RoomState => ({
  roomId,
  mediaId: null,
  position: 0,
  playing: false,
  lastUpdate: now,
  hostId: null,
  members: new Map(),
  createdAt: now,
  lastActivity: now,
});

/**
 * Process-wide room table. Rooms are created lazily and dropped when the last
 * member leaves; nothing survives a restart. Rooms allocated through `create`
 * stay until someone joins and leaves them, or until `sweep` finds them idle.
 *
 * Every mutation goes through `withRoom` / `withExistingRoom`, which hold the
 * room's lock for the whole task, so a join can never observe its room being
 * removed underneath it. Removal itself is the caller's call: only a leave
 * runs `removeIfEmpty`, from inside the locked task.
 */
export class RoomRegistry {
  private readonly rooms = new Map<string, RoomState>();
  private readonly lock = new KeyedLock();

  constructor(private readonly clock: Clock = systemClock) {}

  get(roomId: string): RoomState | undefined {
    return this.rooms.get(roomId);
  }

  has(roomId: string): boolean {
    return this.rooms.has(roomId);
  }

  get size(): number {
    return this.rooms.size;
  }

  roomIds(): string[] {
    return Array.from(this.rooms.keys());
  }

  getOrCreate(roomId: string): RoomState {
    let room = this.rooms.get(roomId);
    if (!room) {
      room = createRoomState(roomId, this.clock.now());
      this.rooms.set(roomId, room);
      logProduction('info', `🏠 Room created: ${roomId}`);
    }
    return room;
  }

  /** Allocates a room under a fresh id before anyone connects. */
  create(): RoomState {
    let roomId = generateRoomCode();
    while (this.rooms.has(roomId)) {
      roomId = generateRoomCode();
    }
    return this.getOrCreate(roomId);
  }

  removeIfEmpty(roomId: string): boolean {
    const room = this.rooms.get(roomId);
    if (!room || room.members.size > 0) return false;

    this.rooms.delete(roomId);
    logProduction('info', `Empty room deleted: ${roomId}`);
    return true;
  }

  withRoom<T>(roomId: string, task: (room: RoomState) => T | Promise<T>): Promise<T> {
    return this.lock.run<T>(roomId, () => this.runTask(this.getOrCreate(roomId), task));
  }

  withExistingRoom<T>(roomId: string, task: (room: RoomState) => T | Promise<T>): Promise<T | undefined> {
    return this.lock.run<T | undefined>(roomId, async () => {
      const room = this.rooms.get(roomId);
      if (!room) return undefined;
      return this.runTask(room, task);
    });
  }

  /**
   * Drops rooms that were allocated but have stayed empty for longer than
   * `maxIdleMs`. Rooms with work queued on their lock are left alone.
   */
  sweep(maxIdleMs: number): string[] {
    const now = this.clock.now();
    const removed: string[] = [];

    for (const [roomId, room] of this.rooms.entries()) {
      if (room.members.size > 0 || this.lock.isLocked(roomId)) continue;
      if (now - room.lastActivity <= maxIdleMs) continue;

      this.rooms.delete(roomId);
      removed.push(roomId);
    }

    if (removed.length > 0) {
      logProduction('info', `🧹 Cleaned up ${removed.length} idle rooms`, { rooms: removed });
    }
    return removed;
  }

  private async runTask<T>(room: RoomState, task: (room: RoomState) => T | Promise<T>): Promise<T> {
    try {
      return await task(room);
    } finally {
      room.lastActivity = this.clock.now();
    }
  }
}
