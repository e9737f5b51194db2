import { Broadcaster } from './broadcaster';
import { ManualClock } from './clock';
import { RoomRegistry } from './roomManager';
import { ConnectionSession } from './session';
import type { SessionTransport, SyncContext } from './session';
import { SyncEngine } from './syncEngine';
import type { ServerMessage } from './types';

type MessageOfType<T extends ServerMessage['type']> = Extract<ServerMessage, { type: T }>;

/** In-process stand-in for a socket: records frames instead of sending them. */
export class FakeTransport implements SessionTransport {
  readonly sent: ServerMessage[] = [];
  closedWith: string | null = null;
  failing = false;

  send(message: ServerMessage): void {
    if (this.failing) {
      throw new Error('connection reset');
    }
    this.sent.push(message);
  }

  close(reason: string): void {
    this.closedWith = reason;
  }

  ofType<T extends ServerMessage['type']>(type: T): Array<MessageOfType<T>> {
    return this.sent.filter((message): message is MessageOfType<T> => message.type === type);
  }

  types(): string[] {
    return this.sent.map((message) => message.type);
  }

  clear(): void {
    this.sent.length = 0;
  }
}

export interface TestClient {
  session: ConnectionSession;
  transport: FakeTransport;
}

export const createTestContext = (start = 1_000_000) => {
  const clock = new ManualClock(start);
  const context: SyncContext = {
    registry: new RoomRegistry(clock),
    engine: new SyncEngine(clock),
    broadcaster: new Broadcaster(),
    maxNameLength: 40,
  };

  let counter = 0;
  const connect = (id = `s${++counter}`): TestClient => {
    const transport = new FakeTransport();
    return { session: new ConnectionSession(transport, context, id), transport };
  };

  const join = async (
    client: TestClient,
    room: string,
    name: string,
    wantHost = false,
    mediaId?: string,
  ): Promise<void> => {
    await client.session.receive({ type: 'join', room, name, want_host: wantHost, media_id: mediaId });
  };

  return { clock, context, connect, join };
};
