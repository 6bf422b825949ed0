import { Catalog } from '../src/catalog';
import { SessionHub } from '../src/hub';
import { deferred, fakeClock, FakeTransport, ofType, testCatalog } from './helpers';

describe('SessionHub', () => {
  function setup() {
    const transport = new FakeTransport();
    const time = fakeClock();
    const hub = new SessionHub(transport, { catalog: testCatalog(), clock: time.now, reapAfterMs: 0 });
    const send = async (connectionId: string, msg: object) => {
      await hub.handleFrame(connectionId, JSON.stringify(msg));
      await hub.router.flush();
    };
    return { transport, time, hub, send };
  }

  async function withHostAndGuest() {
    const ctx = setup();
    await ctx.send('h', { type: 'join', sessionId: 'jam', displayName: 'Hana' });
    await ctx.send('g', { type: 'join', sessionId: 'jam', displayName: 'Gil' });
    return ctx;
  }

  it('answers a join with a snapshot and tells the others', async () => {
    const { transport } = await withHostAndGuest();

    const [hostSnap] = ofType(transport.messagesOf('h'), 'state_snapshot');
    expect(hostSnap.session.you).toEqual({ connectionId: 'h', role: 'host' });

    const guestMessages = transport.messagesOf('g');
    expect(guestMessages.map(m => m.type)).toEqual(['state_snapshot']);
    expect(ofType(guestMessages, 'state_snapshot')[0].session.you?.role).toBe('guest');

    const [roster] = ofType(transport.messagesOf('h'), 'roster_update');
    expect(roster.participants.map(p => p.connectionId)).toEqual(['h', 'g']);
  });

  it('reports malformed input to the sender only', async () => {
    const { transport, hub, send } = await withHostAndGuest();
    transport.clear();

    await hub.handleFrame('g', '{not json');
    await send('g', { type: 'transport', action: 'rewind' });
    await send('h', { type: 'transport', action: 'seek' });
    await hub.router.flush();

    expect(ofType(transport.messagesOf('g'), 'error').map(e => e.reason)).toEqual(['malformed_message', 'malformed_message']);
    expect(transport.messagesOf('h')).toEqual([
      { type: 'error', reason: 'malformed_message', message: 'seek requires position' }
    ]);
  });

  it('refuses commands from connections that have not joined', async () => {
    const { transport, send } = setup();
    await send('x', { type: 'chat', text: 'hello' });
    expect(transport.messagesOf('x')).toEqual([
      { type: 'error', reason: 'invalid_reference', message: 'Join a session first' }
    ]);
  });

  it('denies guest transport and leaves everyone else undisturbed', async () => {
    const { transport, send } = await withHostAndGuest();
    await send('h', { type: 'playlist', action: 'add', trackId: 't1' });
    transport.clear();

    await send('g', { type: 'transport', action: 'setTrack', trackIndex: 0 });
    expect(ofType(transport.messagesOf('g'), 'error')[0].reason).toBe('permission_denied');
    expect(transport.messagesOf('h')).toEqual([]);
  });

  it('broadcasts accepted commands to every member', async () => {
    const { transport, send } = await withHostAndGuest();
    transport.clear();

    await send('g', { type: 'playlist', action: 'add', trackId: 't2' });
    await send('h', { type: 'transport', action: 'setTrack', trackIndex: 0 });
    await send('g', { type: 'chat', text: 'nice' });

    for (const id of ['h', 'g']) {
      expect(transport.messagesOf(id).map(m => m.type)).toEqual(['playlist_update', 'playback_update', 'chat_message']);
    }
    const [update] = ofType(transport.messagesOf('g'), 'playback_update');
    expect(update.playback).toMatchObject({ trackIndex: 0, isPlaying: true, position: 0 });
  });

  it('promotes a guest when the host disconnects', async () => {
    const { transport, hub } = await withHostAndGuest();
    transport.clear();

    await hub.disconnect('h');
    await hub.router.flush();

    expect(hub.registry.lookup('h')).toBeUndefined();
    const [roster] = ofType(transport.messagesOf('g'), 'roster_update');
    expect(roster.hostId).toBe('g');
    expect(transport.messagesOf('h')).toEqual([]);
  });

  it('drops a connection whose send fails', async () => {
    const { transport, hub, send } = await withHostAndGuest();
    transport.failing.add('g');
    transport.clear();

    await send('h', { type: 'chat', text: 'anyone there?' });
    await new Promise(resolve => setImmediate(resolve));
    await hub.router.flush();

    expect(transport.closed).toEqual(['g']);
    expect(hub.registry.connectionsOf('jam')).toEqual(['h']);
    expect(transport.messagesOf('h').map(m => m.type)).toEqual(['chat_message', 'roster_update']);
  });

  it('moves a connection that joins another session', async () => {
    const { hub, send } = await withHostAndGuest();
    await send('g', { type: 'join', sessionId: 'other', displayName: 'Gil' });

    expect(hub.registry.lookup('g')?.sessionId).toBe('other');
    expect(hub.manager.get('jam')?.size).toBe(1);
    expect(hub.manager.get('other')?.hostId).toBe('g');
  });

  it('does not seat a connection that closed while its join was queued', async () => {
    const transport = new FakeTransport();
    const gate = deferred();
    const base = testCatalog();
    const catalog: Catalog = {
      lookup: async trackId => {
        await gate.promise;
        return base.lookup(trackId);
      },
      list: () => base.list()
    };
    const hub = new SessionHub(transport, { catalog, clock: fakeClock().now });
    await hub.handleFrame('h', JSON.stringify({ type: 'join', sessionId: 'jam', displayName: 'Hana' }));
    await hub.router.flush();
    transport.clear();

    const adding = hub.handleFrame('h', JSON.stringify({ type: 'playlist', action: 'add', trackId: 't1' }));
    const joining = hub.handleFrame('x', JSON.stringify({ type: 'join', sessionId: 'jam', displayName: 'Ghost' }));
    await hub.disconnect('x');
    gate.resolve();
    await Promise.all([adding, joining]);
    await hub.router.flush();

    expect(hub.registry.lookup('x')).toBeUndefined();
    expect(hub.manager.get('jam')?.snapshot().participants.map(p => p.displayName)).toEqual(['Hana']);
    expect(transport.messagesOf('h').map(m => m.type)).toEqual(['playlist_update']);
    expect(transport.messagesOf('x')).toEqual([]);

    await hub.handleFrame('x2', JSON.stringify({ type: 'join', sessionId: 'jam', displayName: 'Gil' }));
    await hub.router.flush();
    expect(ofType(transport.messagesOf('h'), 'roster_update')[0].participants.map(p => p.displayName)).toEqual(['Hana', 'Gil']);
  });

  it('refuses to rejoin a reaped session', async () => {
    const { transport, hub, send } = setup();
    await send('h', { type: 'join', sessionId: 'jam', displayName: 'Hana' });
    await hub.disconnect('h');
    await new Promise(resolve => setImmediate(resolve));
    expect(hub.manager.reap()).toEqual(['jam']);

    await send('h2', { type: 'join', sessionId: 'jam', displayName: 'Hana' });
    expect(transport.messagesOf('h2')).toEqual([
      { type: 'error', reason: 'invalid_reference', message: 'Session jam has ended' }
    ]);
  });

  it('wires transport callbacks on attach', async () => {
    const { transport, hub } = setup();
    hub.attach('c1');
    transport.messageHandlers.get('c1')?.(JSON.stringify({ type: 'join', sessionId: 'jam', displayName: 'Hana' }));
    await new Promise(resolve => setImmediate(resolve));
    await hub.router.flush();
    expect(hub.registry.lookup('c1')?.sessionId).toBe('jam');

    transport.closeHandlers.get('c1')?.();
    await new Promise(resolve => setImmediate(resolve));
    expect(hub.registry.lookup('c1')).toBeUndefined();
  });
});
