import { EventEmitter } from 'events';
import WebSocket from 'ws';
import { currentPosition } from '../../server/src/clock';
import { ServerMessageSchema } from '../../server/src/schemas';
import {
  ClientMessage,
  ErrorReason,
  Role,
  ServerMessage,
  SessionSnapshot
} from '../../server/src/types';

type ServerMessageOf<T extends ServerMessage['type']> = Extract<ServerMessage, { type: T }>;

export interface JamClientOptions {
  reconnectDelayMs?: number;   // 0 disables reconnecting
  chatTail?: number;
}

/** A server `error` frame answering a request the client awaits. */
export class JamClientError extends Error {
  constructor(readonly reason: ErrorReason, message: string) {
    super(message);
    this.name = 'JamClientError';
  }
}

/**
 * Keeps a local copy of one session: the snapshot received on join, patched by every
 * broadcast after it. After a dropped connection it reconnects and rejoins, and the
 * fresh snapshot replaces the local copy wholesale.
 */
export class JamClient {
  private ws: WebSocket | null = null;
  private state: 'idle' | 'connecting' | 'ready' | 'closed' = 'idle';
  private queue: string[] = [];
  private readonly emitter = new EventEmitter();
  private session: SessionSnapshot | null = null;
  private membership: { sessionId: string; displayName: string; requestedRole?: Role } | null = null;
  private clockOffset = 0;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private closing = false;

  constructor(
    private readonly url: string,
    private readonly options: JamClientOptions = {}
  ) {}

  on<T extends ServerMessage['type']>(type: T, listener: (msg: ServerMessageOf<T>) => void): this {
    this.emitter.on(type, listener);
    return this;
  }

  off<T extends ServerMessage['type']>(type: T, listener: (msg: ServerMessageOf<T>) => void): this {
    this.emitter.off(type, listener);
    return this;
  }

  once<T extends ServerMessage['type']>(type: T): Promise<ServerMessageOf<T>> {
    return new Promise(resolve => {
      this.emitter.once(type, (msg: ServerMessageOf<T>) => resolve(msg));
    });
  }

  get snapshot(): SessionSnapshot | null {
    return this.session;
  }

  /** Extrapolated position in seconds, corrected by the last observed server clock. */
  position(now: number = Date.now()): number {
    if (!this.session) return 0;
    return currentPosition(this.session.playback, now + this.clockOffset);
  }

  /** Resolves with the session snapshot, or rejects with the first error the server sends back. */
  join(sessionId: string, displayName: string, requestedRole?: Role): Promise<SessionSnapshot> {
    const joined = new Promise<SessionSnapshot>((resolve, reject) => {
      const onSnapshot = (msg: ServerMessageOf<'state_snapshot'>) => {
        this.emitter.off('error', onError);
        this.membership = { sessionId, displayName, requestedRole };
        resolve(msg.session);
      };
      const onError = (msg: ServerMessageOf<'error'>) => {
        this.emitter.off('state_snapshot', onSnapshot);
        reject(new JamClientError(msg.reason, msg.message));
      };
      this.emitter.once('state_snapshot', onSnapshot);
      this.emitter.once('error', onError);
    });
    this.send({ type: 'join', sessionId, displayName, requestedRole });
    return joined;
  }

  listenerCount(type: ServerMessage['type']): number {
    return this.emitter.listenerCount(type);
  }

  play() { this.send({ type: 'transport', action: 'play' }); }
  pause() { this.send({ type: 'transport', action: 'pause' }); }
  seek(position: number) { this.send({ type: 'transport', action: 'seek', position }); }
  setTrack(trackIndex: number) { this.send({ type: 'transport', action: 'setTrack', trackIndex }); }

  addTrack(trackId: string) { this.send({ type: 'playlist', action: 'add', trackId }); }
  removeEntry(entryId: string) { this.send({ type: 'playlist', action: 'remove', entryId }); }
  moveEntry(entryId: string, newIndex: number) { this.send({ type: 'playlist', action: 'reorder', entryId, newIndex }); }

  chat(text: string) { this.send({ type: 'chat', text }); }

  disconnect() {
    this.closing = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.ws?.close();
    this.ws = null;
    this.state = 'closed';
    this.queue.length = 0;
  }

  private connect(): void {
    if (this.state === 'ready' || this.state === 'connecting') return;

    this.state = 'connecting';
    this.closing = false;
    const ws = new WebSocket(this.url);
    this.ws = ws;

    ws.on('open', () => {
      this.state = 'ready';
      this.queue.forEach(frame => ws.send(frame));
      this.queue.length = 0;
    });

    ws.on('message', raw => {
      let data: unknown;
      try {
        data = JSON.parse(raw.toString());
      } catch (err) {
        console.error('WS parse', err);
        return;
      }
      const parsed = ServerMessageSchema.safeParse(data);
      if (!parsed.success) {
        console.error('WS unexpected message', parsed.error.issues);
        return;
      }
      this.apply(parsed.data);
    });

    ws.on('close', () => {
      this.state = 'closed';
      if (this.ws === ws) this.ws = null;
      this.scheduleReconnect();
    });
    ws.on('error', err => console.error('WS error', err));
  }

  private scheduleReconnect(): void {
    const delay = this.options.reconnectDelayMs ?? 1000;
    if (this.closing || delay <= 0 || !this.membership) return;
    const { sessionId, displayName, requestedRole } = this.membership;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.send({ type: 'join', sessionId, displayName, requestedRole });
    }, delay);
  }

  private send(msg: ClientMessage) {
    const data = JSON.stringify(msg);
    if (this.state !== 'ready' || !this.ws) {
      this.connect();
      this.queue.push(data);
    } else {
      this.ws.send(data);
    }
  }

  private apply(msg: ServerMessage) {
    const session = this.session;
    switch (msg.type) {
      case 'state_snapshot':
        this.session = msg.session;
        this.clockOffset = msg.session.playback.serverTime - Date.now();
        break;
      case 'playback_update':
        if (session) session.playback = msg.playback;
        this.clockOffset = msg.playback.serverTime - Date.now();
        break;
      case 'playlist_update':
        if (session) {
          session.playlist = msg.playlist;
          session.playback = { ...session.playback, trackIndex: msg.trackIndex };
        }
        break;
      case 'chat_message':
        if (session) {
          session.chat.push(msg.entry);
          const tail = this.options.chatTail ?? 100;
          if (session.chat.length > tail) session.chat.splice(0, session.chat.length - tail);
        }
        break;
      case 'roster_update':
        if (session) {
          session.participants = msg.participants;
          session.hostId = msg.hostId;
          const me = session.you && msg.participants.find(p => p.connectionId === session.you?.connectionId);
          if (me && session.you) session.you = { connectionId: me.connectionId, role: me.role };
        }
        break;
      case 'error':
        // EventEmitter throws on an 'error' nobody listens for
        if (this.emitter.listenerCount('error') === 0) {
          console.warn('WS server error', msg.reason, msg.message);
          return;
        }
        break;
    }
    this.emitter.emit(msg.type, msg);
  }
}
