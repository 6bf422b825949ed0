import { z } from 'zod';
import { malformedMessage } from './errors';
import { PlaylistCommand, PlaylistMessage, TransportCommand, TransportMessage } from './types';

export const RoleSchema = z.enum(['host', 'guest']);

// client → server
export const JoinSchema = z.object({
  type: z.literal('join'),
  sessionId: z.string().min(1).max(64),
  displayName: z.string().trim().min(1).max(32),
  requestedRole: RoleSchema.optional()
});

export const TransportSchema = z.object({
  type: z.literal('transport'),
  action: z.enum(['play', 'pause', 'seek', 'setTrack']),
  position: z.number().finite().nonnegative().optional(),
  trackIndex: z.number().int().nonnegative().optional()
});

export const PlaylistSchema = z.object({
  type: z.literal('playlist'),
  action: z.enum(['add', 'remove', 'reorder']),
  trackId: z.string().min(1).optional(),
  entryId: z.string().min(1).optional(),
  newIndex: z.number().int().nonnegative().optional()
});

export const ChatSchema = z.object({
  type: z.literal('chat'),
  text: z.string()
});

export const ClientMessageSchema = z.discriminatedUnion('type', [
  JoinSchema,
  TransportSchema,
  PlaylistSchema,
  ChatSchema
]);

// server → client
export const PlaybackViewSchema = z.object({
  trackIndex: z.number().int().nullable(),
  isPlaying: z.boolean(),
  positionAnchorSeconds: z.number(),
  anchorTimestamp: z.number(),
  position: z.number(),
  serverTime: z.number()
});

export const PlaylistEntrySchema = z.object({
  entryId: z.string(),
  trackId: z.string(),
  title: z.string(),
  duration: z.number(),
  streamUrl: z.string(),
  addedBy: z.string(),
  addedAt: z.number()
});

export const ChatEntrySchema = z.object({
  sender: z.string(),
  text: z.string(),
  timestamp: z.number(),
  isHost: z.boolean()
});

export const ParticipantSchema = z.object({
  connectionId: z.string(),
  displayName: z.string(),
  role: RoleSchema,
  joinedAt: z.number()
});

export const ServerMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('state_snapshot'),
    session: z.object({
      sessionId: z.string(),
      playback: PlaybackViewSchema,
      playlist: z.array(PlaylistEntrySchema),
      chat: z.array(ChatEntrySchema),
      participants: z.array(ParticipantSchema),
      hostId: z.string().nullable(),
      you: z.object({ connectionId: z.string(), role: RoleSchema }).nullable()
    })
  }),
  z.object({
    type: z.literal('playback_update'),
    sessionId: z.string(),
    playback: PlaybackViewSchema
  }),
  z.object({
    type: z.literal('playlist_update'),
    sessionId: z.string(),
    playlist: z.array(PlaylistEntrySchema),
    trackIndex: z.number().int().nullable()
  }),
  z.object({
    type: z.literal('chat_message'),
    sessionId: z.string(),
    entry: ChatEntrySchema
  }),
  z.object({
    type: z.literal('roster_update'),
    sessionId: z.string(),
    participants: z.array(ParticipantSchema),
    hostId: z.string().nullable()
  }),
  z.object({
    type: z.literal('error'),
    reason: z.enum(['permission_denied', 'invalid_reference', 'malformed_message', 'internal_error']),
    message: z.string()
  })
]);

export function toTransportCommand(msg: TransportMessage): TransportCommand {
  switch (msg.action) {
    case 'play':
      return { action: 'play' };
    case 'pause':
      return { action: 'pause' };
    case 'seek':
      if (msg.position === undefined) throw malformedMessage('seek requires position');
      return { action: 'seek', position: msg.position };
    case 'setTrack':
      if (msg.trackIndex === undefined) throw malformedMessage('setTrack requires trackIndex');
      return { action: 'setTrack', trackIndex: msg.trackIndex };
  }
}

export function toPlaylistCommand(msg: PlaylistMessage): PlaylistCommand {
  switch (msg.action) {
    case 'add':
      if (msg.trackId === undefined) throw malformedMessage('add requires trackId');
      return { action: 'add', trackId: msg.trackId };
    case 'remove':
      if (msg.entryId === undefined) throw malformedMessage('remove requires entryId');
      return { action: 'remove', entryId: msg.entryId };
    case 'reorder':
      if (msg.entryId === undefined || msg.newIndex === undefined) {
        throw malformedMessage('reorder requires entryId and newIndex');
      }
      return { action: 'reorder', entryId: msg.entryId, newIndex: msg.newIndex };
  }
}
