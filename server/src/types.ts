export type Role = 'member' | 'host';

export interface RoomMember {
  sessionId: string;
  name: string;
  joinedAt: number;
}

export interface RoomState {
  roomId: string;
  mediaId: string | null;
  /** Seconds into the media at the moment captured by `lastUpdate`. */
  position: number;
  playing: boolean;
  /** Clock ms when `position` / `playing` were last authoritative. */
  lastUpdate: number;
  hostId: string | null;
  members: Map<string, RoomMember>;
  createdAt: number;
  lastActivity: number;
}

// Client -> server

export interface JoinMessage {
  type: 'join';
  room: string;
  name: string;
  want_host: boolean;
  media_id?: string;
}

// Command arguments stay unchecked until the sender is known to be the host.
export interface SetMediaMessage {
  type: 'set_media';
  media_id: unknown;
}

export interface SeekMessage {
  type: 'seek';
  position: unknown;
}

export interface PingMessage {
  type: 'ping';
  t?: number;
}

export type ClientMessage =
  | JoinMessage
  | SetMediaMessage
  | SeekMessage
  | PingMessage
  | { type: 'play' }
  | { type: 'pause' }
  | { type: 'sync' }
  | { type: 'leave' };

export type ClientMessageType = ClientMessage['type'];

// Server -> client

export interface MemberSummary {
  id: string;
  name: string;
  role: Role;
}

export interface WelcomeMessage {
  type: 'welcome';
  client_id: string;
  room: string;
  host_id: string | null;
}

export interface StateMessage {
  type: 'state';
  media_id: string | null;
  position: number;
  playing: boolean;
  host_id: string | null;
  members: MemberSummary[];
  server_ts: number;
}

export interface PlayBroadcast {
  type: 'play';
  position: number;
  timestamp: number;
}

export interface PauseBroadcast {
  type: 'pause';
  position: number;
}

export interface SeekBroadcast {
  type: 'seek';
  position: number;
  playing: boolean;
  timestamp: number;
}

export interface MemberJoinedMessage {
  type: 'member_joined';
  id: string;
  name: string;
}

export interface MemberLeftMessage {
  type: 'member_left';
  id: string;
  name: string;
}

export interface PongMessage {
  type: 'pong';
  t: number | null;
  server_ts: number;
}

export type ErrorCode = 'protocol_error' | 'not_authorized' | 'invalid_argument' | 'internal_error';

export interface ErrorMessage {
  type: 'error';
  code: ErrorCode;
  message: string;
}

export type PlaybackBroadcast = StateMessage | PlayBroadcast | PauseBroadcast | SeekBroadcast;

export type ServerMessage =
  | WelcomeMessage
  | PlaybackBroadcast
  | MemberJoinedMessage
  | MemberLeftMessage
  | PongMessage
  | ErrorMessage;

// Socket.IO event maps
export interface ServerToClientEvents {
  message: (payload: ServerMessage) => void;
}

export interface ClientToServerEvents {
  message: (payload: unknown) => void;
}
