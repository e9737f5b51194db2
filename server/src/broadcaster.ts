import { DeliveryFailure } from './errors';
import type { RoomState, ServerMessage } from './types';
import { logProduction } from './utils';

export interface Recipient {
  send(message: ServerMessage): void | Promise<void>;
}

export interface DeliveryReport {
  delivered: string[];
  failed: string[];
}

/**
 * Fans messages out to the members of a room. Rooms only hold session ids, so
 * live recipients are looked up in the directory kept here.
 */
export class Broadcaster {
  private readonly recipients = new Map<string, Recipient>();

  register(sessionId: string, recipient: Recipient): void {
    this.recipients.set(sessionId, recipient);
  }

  unregister(sessionId: string): void {
    this.recipients.delete(sessionId);
  }

  get size(): number {
    return this.recipients.size;
  }

  async broadcast(room: RoomState, payload: ServerMessage, excludeId?: string): Promise<DeliveryReport> {
    const targets = Array.from(room.members.keys()).filter((id) => id !== excludeId);

    const results = await Promise.allSettled(
      targets.map(async (sessionId) => {
        const recipient = this.recipients.get(sessionId);
        if (!recipient) {
          throw new Error('no live connection');
        }
        await recipient.send(payload);
      }),
    );

    const report: DeliveryReport = { delivered: [], failed: [] };
    results.forEach((result, index) => {
      const sessionId = targets[index];
      if (result.status === 'fulfilled') {
        report.delivered.push(sessionId);
        return;
      }

      report.failed.push(sessionId);
      const failure = new DeliveryFailure(sessionId, result.reason);
      logProduction('warn', `📡 ${failure.message}`, { roomId: room.roomId, type: payload.type });
    });

    return report;
  }
}
