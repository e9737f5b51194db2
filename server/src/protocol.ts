import { ProtocolError } from './errors';
import type { ClientMessage, JoinMessage } from './types';
import { validateRoomCode } from './utils';

const DEFAULT_NAME = 'guest';

type Fields = Record<string, unknown>;

const isRecord = (value: unknown): value is Fields =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const parseJoin = (fields: Fields, maxNameLength: number): JoinMessage => {
  const { room, name, want_host: wantHost, media_id: mediaId } = fields;

  const roomId = typeof room === 'string' ? room.trim() : '';
  if (!validateRoomCode(roomId)) {
    throw new ProtocolError('join requires a valid room id');
  }
  if (name !== undefined && typeof name !== 'string') {
    throw new ProtocolError('name must be a string');
  }
  if (wantHost !== undefined && typeof wantHost !== 'boolean') {
    throw new ProtocolError('want_host must be a boolean');
  }
  if (mediaId !== undefined && mediaId !== null && typeof mediaId !== 'string') {
    throw new ProtocolError('media_id must be a string');
  }

  const displayName = (name ?? '').trim().slice(0, maxNameLength) || DEFAULT_NAME;
  const seedMedia = typeof mediaId === 'string' ? mediaId.trim() : '';

  const message: JoinMessage = {
    type: 'join',
    room: roomId,
    name: displayName,
    want_host: wantHost ?? false,
  };
  if (seedMedia) {
    message.media_id = seedMedia;
  }
  return message;
};

/**
 * Validates the shape of a raw frame from a client and raises a ProtocolError
 * when it is off. Playback command arguments are passed through as they came;
 * SyncEngine checks them once the sender's host role is confirmed.
 */
export const parseClientMessage = (raw: unknown, maxNameLength: number): ClientMessage => {
  if (!isRecord(raw)) {
    throw new ProtocolError('message must be an object');
  }

  const rawType = raw.type;
  const type = typeof rawType === 'string' ? rawType : undefined;
  switch (type) {
    case 'join':
      return parseJoin(raw, maxNameLength);

    case 'set_media':
      return { type, media_id: raw.media_id };
    case 'seek':
      return { type, position: raw.position };

    case 'ping': {
      const t = raw.t;
      return typeof t === 'number' ? { type, t } : { type };
    }

    case 'play':
      return { type };
    case 'pause':
      return { type };
    case 'sync':
      return { type };
    case 'leave':
      return { type };

    default:
      throw new ProtocolError(type ? `unknown message type: ${type}` : 'message type must be a string');
  }
};
