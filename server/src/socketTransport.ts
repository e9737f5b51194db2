import type { Server, Socket } from 'socket.io';
import { ConnectionSession } from './session';
import type { SessionTransport, SyncContext } from './session';
import type { ClientToServerEvents, ServerToClientEvents } from './types';
import { logProduction } from './utils';

export type SyncServer = Server<ClientToServerEvents, ServerToClientEvents>;
export type SyncSocket = Socket<ClientToServerEvents, ServerToClientEvents>;

export const createSocketTransport = (socket: SyncSocket): SessionTransport => ({
  send: (message) => {
    if (!socket.connected) {
      throw new Error(`socket ${socket.id} is disconnected`);
    }
    socket.emit('message', message);
  },
  close: (reason) => {
    logProduction('info', `🔌 Closing socket ${socket.id}: ${reason}`);
    socket.disconnect(true);
  },
});

/**
 * Every protocol frame travels on the `message` event; any other event name
 * from a client is treated as a protocol violation.
 */
export const attachSyncHandlers = (io: SyncServer, context: SyncContext): void => {
  io.on('connection', (socket) => {
    const session = new ConnectionSession(createSocketTransport(socket), context);
    logProduction('info', `👤 User connected: ${socket.id} (session ${session.id})`);

    socket.on('message', (payload) => {
      void session.receive(payload);
    });

    socket.onAny((event: string) => {
      if (event !== 'message') {
        void session.reject(`unsupported event: ${event}`);
      }
    });

    socket.on('disconnect', (reason) => {
      void session.disconnect(reason);
    });

    socket.on('error', (error) => {
      logProduction('error', `Socket error for ${socket.id}:`, error.message);
    });
  });
};
