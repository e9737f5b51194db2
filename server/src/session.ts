import type { Broadcaster, Recipient } from './broadcaster';
import { DeliveryFailure, ProtocolError, SyncError } from './errors';
import { parseClientMessage } from './protocol';
import type { RoomRegistry } from './roomManager';
import { roleOf } from './syncEngine';
import type { SyncEngine } from './syncEngine';
import type {
  ClientMessage,
  ErrorMessage,
  JoinMessage,
  PlaybackBroadcast,
  Role,
  RoomState,
  ServerMessage,
} from './types';
import { generateSessionId, logProduction } from './utils';

export interface SessionTransport extends Recipient {
  close(reason: string): void;
}

export interface SyncContext {
  registry: RoomRegistry;
  engine: SyncEngine;
  broadcaster: Broadcaster;
  maxNameLength: number;
}

export type SessionStatus = 'connected' | 'disconnected';

const toErrorMessage = (error: SyncError): ErrorMessage => ({
  type: 'error',
  code: error.code,
  message: error.message,
});

/** Anything that goes wrong before a successful join ends the connection. */
const asProtocolError = (error: unknown): unknown =>
  error instanceof SyncError && !(error instanceof ProtocolError)
    ? new ProtocolError(`expected join: ${error.message}`)
    : error;

/**
 * One connected client. Frames are handled strictly one after another through
 * the inbox, so a command sent right behind `join` waits for the join to land.
 */
export class ConnectionSession {
  name = 'guest';
  roomId: string | null = null;
  role: Role = 'member';
  status: SessionStatus = 'connected';

  private inbox: Promise<void> = Promise.resolve();

  constructor(
    private readonly transport: SessionTransport,
    private readonly context: SyncContext,
    readonly id: string = generateSessionId(),
  ) {}

  receive(raw: unknown): Promise<void> {
    return this.enqueue(() => this.handle(raw));
  }

  /** For frames the transport could not even hand over as a message. */
  reject(reason: string): Promise<void> {
    return this.enqueue(() => this.fail(new ProtocolError(reason)));
  }

  disconnect(reason = 'transport closed'): Promise<void> {
    if (this.status === 'disconnected') return this.inbox;

    this.status = 'disconnected';
    logProduction('info', `👤 Session disconnected: ${this.name} (${this.id}) - ${reason}`);
    return this.enqueue(() => this.leaveRoom(), true);
  }

  private enqueue(task: () => Promise<void>, runWhenDisconnected = false): Promise<void> {
    const next = this.inbox
      .then(async () => {
        if (this.status === 'disconnected' && !runWhenDisconnected) return;
        await task();
      })
      .catch((error: unknown) => {
        logProduction('error', `Session ${this.id} task failed:`, error);
      });

    this.inbox = next;
    return next;
  }

  private async handle(raw: unknown): Promise<void> {
    try {
      const message = parseClientMessage(raw, this.context.maxNameLength);
      await this.dispatch(message);
    } catch (error) {
      await this.fail(this.roomId === null ? asProtocolError(error) : error);
    }
  }

  private async dispatch(message: ClientMessage): Promise<void> {
    const { engine } = this.context;

    if (this.roomId === null) {
      if (message.type !== 'join') {
        throw new ProtocolError(`${message.type} received before join`);
      }
      return this.join(message);
    }

    const roomId = this.roomId;
    switch (message.type) {
      case 'join':
        return this.rejoin(roomId, message);
      case 'set_media': {
        const mediaId = message.media_id;
        return this.command(roomId, (room) => engine.setMedia(room, mediaId));
      }
      case 'play':
        return this.command(roomId, (room) => engine.play(room));
      case 'pause':
        return this.command(roomId, (room) => engine.pause(room));
      case 'seek': {
        const position = message.position;
        return this.command(roomId, (room) => engine.seek(room, position));
      }
      case 'sync':
        return this.resync(roomId);
      case 'ping':
        return this.deliver({ type: 'pong', t: message.t ?? null, server_ts: engine.now() });
      case 'leave':
        return this.close('left room');
    }
  }

  private async join(message: JoinMessage): Promise<void> {
    const { registry, engine, broadcaster } = this.context;

    await registry.withRoom(message.room, async (room) => {
      const result = engine.join(room, this.id, message.name, {
        wantHost: message.want_host,
        mediaId: message.media_id,
      });

      this.roomId = room.roomId;
      this.name = message.name;
      this.role = result.role;
      broadcaster.register(this.id, this.transport);

      logProduction('info', `👥 ${this.name} joined room: ${room.roomId} as ${this.role} (${room.members.size} total)`);

      await this.deliver({ type: 'welcome', client_id: this.id, room: room.roomId, host_id: room.hostId });
      await this.deliver(result.snapshot);
      await broadcaster.broadcast(room, result.announcement, this.id);
    });
  }

  /** A repeated join is how an existing member claims a vacant host role. */
  private async rejoin(roomId: string, message: JoinMessage): Promise<void> {
    if (message.room !== roomId) {
      throw new ProtocolError(`already joined room ${roomId}`);
    }

    const { registry, engine, broadcaster } = this.context;
    await registry.withExistingRoom(roomId, async (room) => {
      const wasHost = room.hostId === this.id;
      if (message.want_host) {
        engine.claimHost(room, this.id);
      }
      this.role = roleOf(room, this.id);

      const snapshot = engine.snapshot(room);
      await this.deliver(snapshot);

      if (this.role === 'host' && !wasHost) {
        logProduction('info', `👑 ${this.name} claimed host in room ${roomId}`);
        await broadcaster.broadcast(room, snapshot, this.id);
      }
    });
  }

  private async command(roomId: string, apply: (room: RoomState) => PlaybackBroadcast): Promise<void> {
    const { registry, engine, broadcaster } = this.context;

    await registry.withExistingRoom(roomId, async (room) => {
      engine.requireHost(room, this.id);
      const payload = apply(room);
      const report = await broadcaster.broadcast(room, payload, this.id);
      logProduction('info', `✅ Host sync: ${payload.type} in ${roomId} to ${report.delivered.length} participants`);
    });
  }

  private async resync(roomId: string): Promise<void> {
    const { registry, engine } = this.context;
    await registry.withExistingRoom(roomId, (room) => this.deliver(engine.snapshot(room)));
  }

  private async leaveRoom(): Promise<void> {
    const roomId = this.roomId;
    if (roomId === null) return;

    const { registry, engine, broadcaster } = this.context;
    await registry.withExistingRoom(roomId, async (room) => {
      const { member, hostCleared } = engine.leave(room, this.id);
      broadcaster.unregister(this.id);
      this.roomId = null;
      this.role = 'member';

      if (registry.removeIfEmpty(roomId)) return;

      if (member) {
        await broadcaster.broadcast(room, { type: 'member_left', id: this.id, name: member.name });
      }
      if (hostCleared) {
        logProduction('info', `Host left room ${roomId}; playback frozen until a new host claims it`);
        await broadcaster.broadcast(room, engine.snapshot(room));
      }
    });

    this.roomId = null;
    broadcaster.unregister(this.id);
  }

  private async close(reason: string): Promise<void> {
    this.status = 'disconnected';
    await this.leaveRoom();
    this.transport.close(reason);
  }

  private async fail(error: unknown): Promise<void> {
    if (error instanceof ProtocolError) {
      logProduction('warn', `🚫 Protocol error from ${this.id}: ${error.message}`);
      await this.deliver(toErrorMessage(error));
      await this.close(error.message);
      return;
    }

    if (error instanceof SyncError) {
      logProduction('warn', `Rejected command from ${this.id}: ${error.message}`, { code: error.code });
      await this.deliver(toErrorMessage(error));
      return;
    }

    logProduction('error', `Unexpected error handling message from ${this.id}:`, error);
    await this.deliver({ type: 'error', code: 'internal_error', message: 'Internal server error' });
  }

  private async deliver(message: ServerMessage): Promise<void> {
    try {
      await this.transport.send(message);
    } catch (error) {
      logProduction('warn', `📡 ${new DeliveryFailure(this.id, error).message}`);
    }
  }
}
