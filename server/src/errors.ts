import type { ErrorCode } from './types';

export class SyncError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'SyncError';
  }
}

/** Malformed or out-of-sequence message. The connection gets closed. */
export class ProtocolError extends SyncError {
  constructor(message: string) {
    super('protocol_error', message);
    this.name = 'ProtocolError';
  }
}

export class NotAuthorizedError extends SyncError {
  constructor(message = 'Only the host can control playback') {
    super('not_authorized', message);
    this.name = 'NotAuthorizedError';
  }
}

export class InvalidArgumentError extends SyncError {
  constructor(message: string) {
    super('invalid_argument', message);
    this.name = 'InvalidArgumentError';
  }
}

/** Never sent to a client; only logged by the broadcaster. */
export class DeliveryFailure extends Error {
  constructor(
    public readonly recipientId: string,
    public readonly reason: unknown,
  ) {
    super(`Delivery to ${recipientId} failed: ${reason instanceof Error ? reason.message : String(reason)}`);
    this.name = 'DeliveryFailure';
  }
}
