import { ClientMessageSchema, ServerMessageSchema, toPlaylistCommand, toTransportCommand } from '../src/schemas';
import { SessionError } from '../src/errors';

describe('Zod message validation', () => {
  it('accepts a valid join', () => {
    const valid = { type: 'join', sessionId: 'abc', displayName: 'Hana' };
    expect(() => ClientMessageSchema.parse(valid)).not.toThrow();
  });

  it('trims display names and rejects blank ones', () => {
    const parsed = ClientMessageSchema.parse({ type: 'join', sessionId: 'abc', displayName: '  Hana ' });
    expect(parsed).toEqual({ type: 'join', sessionId: 'abc', displayName: 'Hana' });
    expect(() => ClientMessageSchema.parse({ type: 'join', sessionId: 'abc', displayName: '   ' })).toThrow();
  });

  it('rejects malformed messages', () => {
    expect(() => ClientMessageSchema.parse({ type: 'join', sessionId: 42 })).toThrow();
    expect(() => ClientMessageSchema.parse({ type: 'transport', action: 'seek', position: -1 })).toThrow();
    expect(() => ClientMessageSchema.parse({ type: 'playlist', action: 'add', newIndex: 1.5 })).toThrow();
    expect(() => ClientMessageSchema.parse({ type: 'shout', text: 'hi' })).toThrow();
  });

  it('accepts every server message the session produces', () => {
    const error = { type: 'error', reason: 'permission_denied', message: 'Only the host may play' };
    expect(ServerMessageSchema.parse(error)).toEqual(error);
    expect(() => ServerMessageSchema.parse({ type: 'error', reason: 'teapot', message: '' })).toThrow();
  });
});

describe('command conversion', () => {
  it('builds transport commands', () => {
    expect(toTransportCommand({ type: 'transport', action: 'seek', position: 12 })).toEqual({ action: 'seek', position: 12 });
    expect(toTransportCommand({ type: 'transport', action: 'setTrack', trackIndex: 2 })).toEqual({ action: 'setTrack', trackIndex: 2 });
    expect(toTransportCommand({ type: 'transport', action: 'pause', position: 5 })).toEqual({ action: 'pause' });
  });

  it('builds playlist commands', () => {
    expect(toPlaylistCommand({ type: 'playlist', action: 'reorder', entryId: 'e1', newIndex: 0 }))
      .toEqual({ action: 'reorder', entryId: 'e1', newIndex: 0 });
  });

  it('reports missing fields as malformed', () => {
    expect(() => toTransportCommand({ type: 'transport', action: 'setTrack' })).toThrow(SessionError);
    expect(() => toPlaylistCommand({ type: 'playlist', action: 'reorder', entryId: 'e1' })).toThrow('reorder requires entryId and newIndex');
  });
});
