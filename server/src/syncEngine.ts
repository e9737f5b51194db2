import { systemClock } from './clock';
import type { Clock } from './clock';
import { InvalidArgumentError, NotAuthorizedError } from './errors';
import type {
  MemberJoinedMessage,
  PauseBroadcast,
  PlayBroadcast,
  Role,
  RoomMember,
  RoomState,
  SeekBroadcast,
  StateMessage,
} from './types';

/** Live position in seconds, accounting for time elapsed since the last update. */
export const effectivePosition = (room: RoomState, now: number): number => {
  if (!room.playing) return room.position;
  const elapsedMs = Math.max(now - room.lastUpdate, 0);
  return room.position + elapsedMs / 1000;
};

export const roleOf = (room: RoomState, sessionId: string): Role =>
  room.hostId === sessionId ? 'host' : 'member';

export interface JoinOptions {
  wantHost: boolean;
  mediaId?: string;
}

export interface JoinResult {
  role: Role;
  snapshot: StateMessage;
  announcement: MemberJoinedMessage;
}

export interface LeaveResult {
  member: RoomMember | null;
  hostCleared: boolean;
}

/**
 * Applies protocol commands to a room and derives what goes out on the wire.
 * Callers hold the room's lock; nothing here suspends.
 */
export class SyncEngine {
  constructor(private readonly clock: Clock = systemClock) {}

  now(): number {
    return this.clock.now();
  }

  snapshot(room: RoomState): StateMessage {
    const now = this.clock.now();
    return {
      type: 'state',
      media_id: room.mediaId,
      position: effectivePosition(room, now),
      playing: room.playing,
      host_id: room.hostId,
      members: Array.from(room.members.values()).map((member) => ({
        id: member.sessionId,
        name: member.name,
        role: roleOf(room, member.sessionId),
      })),
      server_ts: now,
    };
  }

  join(room: RoomState, sessionId: string, name: string, options: JoinOptions): JoinResult {
    room.members.set(sessionId, { sessionId, name, joinedAt: this.clock.now() });

    // a second host request is a silent downgrade, not a failure
    if (room.hostId === null && options.wantHost) {
      room.hostId = sessionId;
    }

    if (options.mediaId && room.mediaId === null) {
      room.mediaId = options.mediaId;
    }

    return {
      role: roleOf(room, sessionId),
      snapshot: this.snapshot(room),
      announcement: { type: 'member_joined', id: sessionId, name },
    };
  }

  /** Returns true when the session now holds the host role. */
  claimHost(room: RoomState, sessionId: string): boolean {
    if (!room.members.has(sessionId)) return false;
    if (room.hostId === null) {
      room.hostId = sessionId;
    }
    return room.hostId === sessionId;
  }

  leave(room: RoomState, sessionId: string): LeaveResult {
    const member = room.members.get(sessionId) ?? null;
    room.members.delete(sessionId);

    // playback keeps running for the others; only the controller goes away
    const hostCleared = room.hostId === sessionId;
    if (hostCleared) {
      room.hostId = null;
    }

    return { member, hostCleared };
  }

  requireHost(room: RoomState, sessionId: string): void {
    if (room.hostId !== sessionId) {
      throw new NotAuthorizedError();
    }
  }

  setMedia(room: RoomState, mediaId: unknown): StateMessage {
    if (typeof mediaId !== 'string') {
      throw new InvalidArgumentError('set_media requires a media_id string');
    }
    const trimmed = mediaId.trim();
    if (trimmed === '') {
      throw new InvalidArgumentError('media_id must not be empty');
    }

    room.mediaId = trimmed;
    room.position = 0;
    room.playing = false;
    room.lastUpdate = this.clock.now();
    return this.snapshot(room);
  }

  play(room: RoomState): PlayBroadcast {
    const now = this.clock.now();
    // fold elapsed time in before re-stamping, so a repeated play loses nothing
    room.position = effectivePosition(room, now);
    room.playing = true;
    room.lastUpdate = now;
    return { type: 'play', position: room.position, timestamp: now };
  }

  pause(room: RoomState): PauseBroadcast {
    const now = this.clock.now();
    room.position = effectivePosition(room, now);
    room.playing = false;
    room.lastUpdate = now;
    return { type: 'pause', position: room.position };
  }

  seek(room: RoomState, position: unknown): SeekBroadcast {
    if (typeof position !== 'number') {
      throw new InvalidArgumentError('seek requires a numeric position');
    }
    if (!Number.isFinite(position) || position < 0) {
      throw new InvalidArgumentError('position must be a non-negative number');
    }

    const now = this.clock.now();
    room.position = position;
    room.lastUpdate = now;
    return { type: 'seek', position, playing: room.playing, timestamp: now };
  }
}
