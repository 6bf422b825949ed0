import { Catalog } from './catalog';
import { anchorAt, Clock, currentPosition, emptyPlayback, remainingSeconds, systemClock } from './clock';
import { invalidReference, malformedMessage, permissionDenied } from './errors';
import { logger, Logger } from './logging';
import {
  ChatEntry,
  Participant,
  PlaybackState,
  PlaybackView,
  PlaylistCommand,
  PlaylistEntry,
  Role,
  SessionEvent,
  SessionSnapshot,
  TransportCommand
} from './types';

export interface EmitOptions {
  exclude?: string;
}

export type SessionSink = (event: SessionEvent, options?: EmitOptions) => void;

export interface SessionOptions {
  catalog: Catalog;
  emit: SessionSink;
  clock?: Clock;
  chatMaxLength?: number;
  chatRetention?: number;
}

export const DEFAULT_CHAT_MAX_LENGTH = 500;
export const DEFAULT_CHAT_RETENTION = 100;

/**
 * One shared listening context. Every mutator is synchronous once its inputs are
 * resolved, so a reader on the event loop sees either the state before a command or
 * the state after it. Rejected commands throw a SessionError and change nothing.
 * Accepted commands hand their resulting events to `emit`.
 */
export class Session {
  private playback: PlaybackState;
  private readonly playlist: PlaylistEntry[] = [];
  private readonly chatLog: ChatEntry[] = [];
  // Map iteration order is join order, which the promotion policy relies on
  private readonly participants = new Map<string, Participant>();
  private hostConnectionId: string | null = null;
  private entrySeq = 0;
  private readonly clock: Clock;
  private readonly catalog: Catalog;
  private readonly emit: SessionSink;
  private readonly chatMaxLength: number;
  private readonly chatRetention: number;
  private readonly log: Logger;

  lastActivity: number;

  constructor(
    readonly id: string,
    options: SessionOptions
  ) {
    this.catalog = options.catalog;
    this.emit = options.emit;
    this.clock = options.clock ?? systemClock;
    this.chatMaxLength = options.chatMaxLength ?? DEFAULT_CHAT_MAX_LENGTH;
    this.chatRetention = options.chatRetention ?? DEFAULT_CHAT_RETENTION;
    this.log = logger.scoped(`session ${id}`);
    const now = this.clock();
    this.playback = emptyPlayback(now);
    this.lastActivity = now;
  }

  get hostId(): string | null {
    return this.hostConnectionId;
  }

  get size(): number {
    return this.participants.size;
  }

  isEmpty(): boolean {
    return this.participants.size === 0;
  }

  roleOf(connectionId: string): Role | undefined {
    return this.participants.get(connectionId)?.role;
  }

  join(connectionId: string, displayName: string, requestedRole?: Role): SessionSnapshot {
    const now = this.clock();
    this.lastActivity = now;

    const existing = this.participants.get(connectionId);
    if (existing) {
      existing.displayName = displayName;
      this.log.debug(`${connectionId} rejoined as ${existing.role}`);
    } else {
      const role: Role = this.hostConnectionId === null ? 'host' : 'guest';
      if (requestedRole === 'host' && role === 'guest') {
        this.log.info(`${connectionId} asked for host but ${this.hostConnectionId} holds it`);
      }
      this.participants.set(connectionId, { connectionId, displayName, role, joinedAt: now });
      if (role === 'host') this.hostConnectionId = connectionId;
      this.log.info(`${displayName} (${connectionId}) joined as ${role}`);
    }

    this.emit(this.rosterEvent(), { exclude: connectionId });
    return this.snapshot(connectionId);
  }

  leave(connectionId: string): boolean {
    const departing = this.participants.get(connectionId);
    if (!departing) return false;

    this.participants.delete(connectionId);
    this.lastActivity = this.clock();

    if (this.hostConnectionId === connectionId) {
      this.hostConnectionId = null;
      let successor: Participant | undefined;
      for (const p of this.participants.values()) {
        if (!successor || p.joinedAt < successor.joinedAt) successor = p;
      }
      if (successor) {
        successor.role = 'host';
        this.hostConnectionId = successor.connectionId;
        this.log.info(`promoted ${successor.displayName} (${successor.connectionId}) to host`);
      } else {
        this.log.info(`host left, no guests remain`);
      }
    }

    this.log.info(`${departing.displayName} (${connectionId}) left, ${this.participants.size} remain`);
    this.emit(this.rosterEvent(), { exclude: connectionId });
    return true;
  }

  applyTransportCommand(connectionId: string, cmd: TransportCommand): PlaybackView {
    this.requireHost(connectionId, cmd.action);
    const now = this.clock();
    this.lastActivity = now;
    this.tick(now);

    if (cmd.action === 'setTrack') {
      if (cmd.trackIndex >= this.playlist.length) {
        throw invalidReference(`No playlist entry at index ${cmd.trackIndex}`);
      }
      this.playback = anchorAt(cmd.trackIndex, 0, true, now);
    } else {
      const { trackIndex } = this.playback;
      if (trackIndex === null) {
        throw invalidReference('Nothing is selected to play');
      }
      const position = currentPosition(this.playback, now);
      switch (cmd.action) {
        case 'play':
          this.playback = anchorAt(trackIndex, position, true, now);
          break;
        case 'pause':
          this.playback = anchorAt(trackIndex, position, false, now);
          break;
        case 'seek': {
          const duration = this.playlist[trackIndex]?.duration ?? 0;
          const target = duration > 0 ? Math.min(cmd.position, duration) : cmd.position;
          this.playback = anchorAt(trackIndex, Math.max(0, target), this.playback.isPlaying, now);
          break;
        }
      }
    }

    this.log.debug(`transport ${cmd.action} ->`, this.playback);
    const view = this.playbackView(now);
    this.emit({ type: 'playback_update', sessionId: this.id, playback: view });
    return view;
  }

  async applyPlaylistCommand(connectionId: string, cmd: PlaylistCommand): Promise<PlaylistEntry[]> {
    const participant = this.requireParticipant(connectionId);

    switch (cmd.action) {
      case 'add': {
        const track = await this.catalog.lookup(cmd.trackId);
        if (!track) throw invalidReference(`Unknown track ${cmd.trackId}`);
        const now = this.clock();
        this.entrySeq++;
        this.playlist.push({
          entryId: `e${this.entrySeq}`,
          trackId: track.id,
          title: track.title,
          duration: track.duration,
          streamUrl: track.streamUrl,
          addedBy: participant.displayName,
          addedAt: now
        });
        this.lastActivity = now;
        this.emitPlaylist();
        break;
      }

      case 'remove': {
        this.requireHost(connectionId, 'remove');
        const index = this.indexOfEntry(cmd.entryId);
        const now = this.clock();
        this.lastActivity = now;
        this.tick(now);
        const { trackIndex } = this.playback;
        this.playlist.splice(index, 1);

        if (trackIndex !== null && index < trackIndex) {
          this.playback = { ...this.playback, trackIndex: trackIndex - 1 };
          this.emitPlaylist();
        } else if (trackIndex === index) {
          this.playback = index < this.playlist.length
            ? anchorAt(index, 0, this.playback.isPlaying, now)
            : emptyPlayback(now);
          this.emitPlaylist();
          this.emit({ type: 'playback_update', sessionId: this.id, playback: this.playbackView(now) });
        } else {
          this.emitPlaylist();
        }
        break;
      }

      case 'reorder': {
        this.requireHost(connectionId, 'reorder');
        const from = this.indexOfEntry(cmd.entryId);
        if (cmd.newIndex >= this.playlist.length) {
          throw invalidReference(`Index ${cmd.newIndex} is outside the playlist`);
        }
        const now = this.clock();
        this.lastActivity = now;
        this.tick(now);
        const currentId = this.currentEntry()?.entryId;
        const [moved] = this.playlist.splice(from, 1);
        this.playlist.splice(cmd.newIndex, 0, moved);
        if (currentId !== undefined) {
          this.playback = { ...this.playback, trackIndex: this.indexOfEntry(currentId) };
        }
        this.emitPlaylist();
        break;
      }
    }

    return this.playlistCopy();
  }

  postChat(connectionId: string, text: string): ChatEntry {
    const participant = this.requireParticipant(connectionId);
    const trimmed = text.trim();
    if (trimmed.length === 0) {
      throw malformedMessage('Chat text is empty');
    }

    const now = this.clock();
    this.lastActivity = now;
    const entry: ChatEntry = {
      sender: participant.displayName,
      text: Array.from(trimmed).slice(0, this.chatMaxLength).join(''),
      timestamp: now,
      isHost: participant.role === 'host'
    };
    this.chatLog.push(entry);
    if (this.chatLog.length > this.chatRetention) {
      this.chatLog.splice(0, this.chatLog.length - this.chatRetention);
    }

    this.emit({ type: 'chat_message', sessionId: this.id, entry: { ...entry } });
    return entry;
  }

  /**
   * End-of-track check. Each finished track hands over to the next one anchored at
   * the instant it ended; a finished last track leaves the session paused at its
   * start. Returns whether playback changed.
   */
  tick(now: number = this.clock()): boolean {
    let state = this.playback;
    while (state.isPlaying && state.trackIndex !== null) {
      const entry = this.playlist[state.trackIndex];
      if (!entry) break;
      const remaining = remainingSeconds(state, entry.duration, now);
      if (remaining > 0) break;

      const endedAt = now + remaining * 1000;
      const next = state.trackIndex + 1;
      state = next < this.playlist.length
        ? anchorAt(next, 0, true, endedAt)
        : anchorAt(state.trackIndex, 0, false, endedAt);
    }

    if (state === this.playback) return false;

    this.playback = state;
    this.log.debug(`auto-advanced to track ${state.trackIndex}, playing=${state.isPlaying}`);
    this.emit({ type: 'playback_update', sessionId: this.id, playback: this.playbackView(now) });
    return true;
  }

  snapshot(connectionId?: string): SessionSnapshot {
    const now = this.clock();
    this.tick(now);
    const you = connectionId !== undefined ? this.participants.get(connectionId) : undefined;
    return {
      sessionId: this.id,
      playback: this.playbackView(now),
      playlist: this.playlistCopy(),
      chat: this.chatLog.map(c => ({ ...c })),
      participants: this.roster(),
      hostId: this.hostConnectionId,
      you: you ? { connectionId: you.connectionId, role: you.role } : null
    };
  }

  private playbackView(now: number): PlaybackView {
    return { ...this.playback, position: currentPosition(this.playback, now), serverTime: now };
  }

  private currentEntry(): PlaylistEntry | undefined {
    const { trackIndex } = this.playback;
    return trackIndex === null ? undefined : this.playlist[trackIndex];
  }

  private indexOfEntry(entryId: string): number {
    const index = this.playlist.findIndex(e => e.entryId === entryId);
    if (index === -1) throw invalidReference(`Unknown playlist entry ${entryId}`);
    return index;
  }

  private requireParticipant(connectionId: string): Participant {
    const participant = this.participants.get(connectionId);
    if (!participant) throw invalidReference(`${connectionId} is not part of session ${this.id}`);
    return participant;
  }

  private requireHost(connectionId: string, action: string): Participant {
    const participant = this.requireParticipant(connectionId);
    if (participant.role !== 'host') {
      this.log.warn(`guest ${connectionId} attempted ${action}`);
      throw permissionDenied(`Only the host may ${action}`);
    }
    return participant;
  }

  private roster(): Participant[] {
    return [...this.participants.values()].map(p => ({ ...p }));
  }

  private playlistCopy(): PlaylistEntry[] {
    return this.playlist.map(e => ({ ...e }));
  }

  private rosterEvent(): SessionEvent {
    return {
      type: 'roster_update',
      sessionId: this.id,
      participants: this.roster(),
      hostId: this.hostConnectionId
    };
  }

  private emitPlaylist(): void {
    this.emit({
      type: 'playlist_update',
      sessionId: this.id,
      playlist: this.playlistCopy(),
      trackIndex: this.playback.trackIndex
    });
  }
}
