import { FrameSender } from '../src/broadcast';
import { ManifestCatalog } from '../src/catalog';
import { SessionError } from '../src/errors';
import { Transport } from '../src/hub';
import { ServerMessageSchema } from '../src/schemas';
import { EmitOptions, Session, SessionOptions } from '../src/session';
import { CatalogTrack, ServerMessage, SessionEvent } from '../src/types';

export const T0 = 1_700_000_000_000;

export const tracks: CatalogTrack[] = [
  { id: 't1', title: 'One', artist: 'Band A', duration: 100, streamUrl: 'https://cdn.test/t1.mp3' },
  { id: 't2', title: 'Two', artist: 'Band A', duration: 50, streamUrl: 'https://cdn.test/t2.mp3' },
  { id: 't3', title: 'Three', artist: 'Band B', duration: 0, streamUrl: 'https://cdn.test/t3.mp3' }
];

export const testCatalog = () => new ManifestCatalog(tracks);

export function fakeClock(start = T0) {
  let current = start;
  return {
    now: () => current,
    advance(ms: number) {
      current += ms;
    },
    set(ms: number) {
      current = ms;
    }
  };
}

export interface Emitted {
  event: SessionEvent;
  options?: EmitOptions;
}

export function makeSession(overrides: Partial<SessionOptions> = {}) {
  const time = fakeClock();
  const events: Emitted[] = [];
  const session = new Session('s1', {
    catalog: testCatalog(),
    clock: time.now,
    emit: (event, options) => {
      events.push({ event, options });
    },
    ...overrides
  });
  return { session, time, events };
}

export function reasonOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof SessionError) return error.reason;
    throw error;
  }
  return undefined;
}

export async function asyncReasonOf(promise: Promise<unknown>): Promise<string | undefined> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof SessionError) return error.reason;
    throw error;
  }
  return undefined;
}

export function ofType<T extends ServerMessage['type']>(
  messages: ServerMessage[],
  type: T
): Extract<ServerMessage, { type: T }>[] {
  return messages.filter((m): m is Extract<ServerMessage, { type: T }> => m.type === type);
}

export function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

export class FakeSender implements FrameSender {
  readonly frames = new Map<string, string[]>();
  readonly failing = new Set<string>();
  readonly rejecting = new Set<string>();
  readonly gates = new Map<string, Promise<void>>();

  async send(connectionId: string, frame: string): Promise<boolean> {
    const gate = this.gates.get(connectionId);
    if (gate) await gate;
    if (this.rejecting.has(connectionId)) throw new Error('socket exploded');
    if (this.failing.has(connectionId)) return false;
    const list = this.frames.get(connectionId) ?? [];
    list.push(frame);
    this.frames.set(connectionId, list);
    return true;
  }

  typesOf(connectionId: string): string[] {
    return (this.frames.get(connectionId) ?? []).map(f => ServerMessageSchema.parse(JSON.parse(f)).type);
  }
}

export class FakeTransport implements Transport {
  readonly received = new Map<string, ServerMessage[]>();
  readonly failing = new Set<string>();
  readonly closed: string[] = [];
  readonly messageHandlers = new Map<string, (frame: string) => void>();
  readonly closeHandlers = new Map<string, () => void>();

  async send(connectionId: string, frame: string): Promise<boolean> {
    if (this.failing.has(connectionId)) return false;
    const list = this.received.get(connectionId) ?? [];
    list.push(ServerMessageSchema.parse(JSON.parse(frame)));
    this.received.set(connectionId, list);
    return true;
  }

  onMessage(connectionId: string, handler: (frame: string) => void): void {
    this.messageHandlers.set(connectionId, handler);
  }

  onClose(connectionId: string, handler: () => void): void {
    this.closeHandlers.set(connectionId, handler);
  }

  close(connectionId: string): void {
    this.closed.push(connectionId);
  }

  messagesOf(connectionId: string): ServerMessage[] {
    return this.received.get(connectionId) ?? [];
  }

  clear(): void {
    this.received.clear();
  }
}
