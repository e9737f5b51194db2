import type { SyncContext } from './session';
import { logProduction } from './utils';

/**
 * Pushes a fresh drift-compensated snapshot to every member of every playing
 * room. Returns the number of rooms that were re-synced.
 */
export const resyncPlayingRooms = async (context: SyncContext): Promise<number> => {
  const { registry, engine, broadcaster } = context;
  let count = 0;

  for (const roomId of registry.roomIds()) {
    const synced = await registry.withExistingRoom(roomId, async (room) => {
      if (!room.playing || room.members.size === 0) return false;
      await broadcaster.broadcast(room, engine.snapshot(room));
      return true;
    });
    if (synced) count++;
  }

  return count;
};

export interface MaintenanceOptions {
  resyncIntervalMs: number;
  sweepIntervalMs: number;
  emptyRoomTimeoutMs: number;
}

export const startMaintenance = (context: SyncContext, options: MaintenanceOptions): (() => void) => {
  const timers: Array<ReturnType<typeof setInterval>> = [];

  if (options.resyncIntervalMs > 0) {
    timers.push(setInterval(() => {
      resyncPlayingRooms(context).catch((error: unknown) => {
        logProduction('error', 'Periodic resync failed:', error);
      });
    }, options.resyncIntervalMs));
  }

  if (options.sweepIntervalMs > 0) {
    timers.push(setInterval(() => {
      context.registry.sweep(options.emptyRoomTimeoutMs);
    }, options.sweepIntervalMs));
  }

  timers.forEach((timer) => timer.unref());

  return () => {
    timers.forEach((timer) => clearInterval(timer));
  };
};
