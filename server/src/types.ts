export type Role = 'host' | 'guest';

export interface PlaybackState {
  trackIndex: number | null;     // null when the playlist has nothing selected
  isPlaying: boolean;
  positionAnchorSeconds: number;
  anchorTimestamp: number;       // ms since epoch
}

// PlaybackState plus the extrapolated position at serverTime
export interface PlaybackView extends PlaybackState {
  position: number;
  serverTime: number;
}

export interface CatalogTrack {
  id: string;
  title: string;
  artist: string;
  duration: number;              // seconds, 0 when unknown
  streamUrl: string;
  thumbnail?: string;
}

export interface PlaylistEntry {
  entryId: string;
  trackId: string;
  title: string;
  duration: number;
  streamUrl: string;
  addedBy: string;
  addedAt: number;
}

export interface ChatEntry {
  sender: string;
  text: string;
  timestamp: number;
  isHost: boolean;
}

export interface Participant {
  connectionId: string;
  displayName: string;
  role: Role;
  joinedAt: number;
}

export interface SessionSnapshot {
  sessionId: string;
  playback: PlaybackView;
  playlist: PlaylistEntry[];
  chat: ChatEntry[];
  participants: Participant[];
  hostId: string | null;
  you: { connectionId: string; role: Role } | null;
}

export type ErrorReason = 'permission_denied' | 'invalid_reference' | 'malformed_message' | 'internal_error';

export type TransportCommand =
  | { action: 'play' }
  | { action: 'pause' }
  | { action: 'seek'; position: number }
  | { action: 'setTrack'; trackIndex: number };

export type PlaylistCommand =
  | { action: 'add'; trackId: string }
  | { action: 'remove'; entryId: string }
  | { action: 'reorder'; entryId: string; newIndex: number };

// client -> server
export interface JoinMessage {
  type: 'join';
  sessionId: string;
  displayName: string;
  requestedRole?: Role;
}

export interface TransportMessage {
  type: 'transport';
  action: TransportCommand['action'];
  position?: number;
  trackIndex?: number;
}

export interface PlaylistMessage {
  type: 'playlist';
  action: PlaylistCommand['action'];
  trackId?: string;
  entryId?: string;
  newIndex?: number;
}

export interface ChatMessage {
  type: 'chat';
  text: string;
}

export type ClientMessage = JoinMessage | TransportMessage | PlaylistMessage | ChatMessage;

// server -> client
export interface StateSnapshotMessage {
  type: 'state_snapshot';
  session: SessionSnapshot;
}

export interface PlaybackUpdateMessage {
  type: 'playback_update';
  sessionId: string;
  playback: PlaybackView;
}

export interface PlaylistUpdateMessage {
  type: 'playlist_update';
  sessionId: string;
  playlist: PlaylistEntry[];
  trackIndex: number | null;
}

export interface ChatBroadcastMessage {
  type: 'chat_message';
  sessionId: string;
  entry: ChatEntry;
}

export interface RosterUpdateMessage {
  type: 'roster_update';
  sessionId: string;
  participants: Participant[];
  hostId: string | null;
}

export interface ErrorMessage {
  type: 'error';
  reason: ErrorReason;
  message: string;
}

export type SessionEvent =
  | PlaybackUpdateMessage
  | PlaylistUpdateMessage
  | ChatBroadcastMessage
  | RosterUpdateMessage;

export type ServerMessage = StateSnapshotMessage | SessionEvent | ErrorMessage;
