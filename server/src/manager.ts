import { randomUUID } from 'crypto';
import { Catalog } from './catalog';
import { Clock, systemClock } from './clock';
import { invalidReference } from './errors';
import { logger } from './logging';
import { EmitOptions, Session } from './session';
import { SessionEvent } from './types';

export interface SessionManagerOptions {
  catalog: Catalog;
  publish: (sessionId: string, event: SessionEvent, options?: EmitOptions) => void;
  clock?: Clock;
  chatMaxLength?: number;
  chatRetention?: number;
  scanIntervalMs?: number;
  reapAfterMs?: number;
  idFactory?: () => string;
}

const noop = () => undefined;

/** Process-wide table of live sessions. Sessions never share a lock. */
export class SessionManager {
  private readonly sessions = new Map<string, Session>();
  private readonly retired = new Set<string>();
  private readonly queues = new Map<string, Promise<void>>();
  private readonly clock: Clock;
  private readonly idFactory: () => string;
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly options: SessionManagerOptions) {
    this.clock = options.clock ?? systemClock;
    this.idFactory = options.idFactory ?? (() => randomUUID().slice(0, 8));
  }

  get size(): number {
    return this.sessions.size;
  }

  get(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  ids(): string[] {
    return [...this.sessions.keys()];
  }

  create(): Session {
    let id = this.idFactory();
    while (this.sessions.has(id) || this.retired.has(id)) {
      id = this.idFactory();
    }
    return this.getOrCreate(id);
  }

  getOrCreate(sessionId: string): Session {
    const existing = this.sessions.get(sessionId);
    if (existing) return existing;
    if (this.retired.has(sessionId)) {
      throw invalidReference(`Session ${sessionId} has ended`);
    }

    const session = new Session(sessionId, {
      catalog: this.options.catalog,
      clock: this.clock,
      chatMaxLength: this.options.chatMaxLength,
      chatRetention: this.options.chatRetention,
      emit: (event, emitOptions) => this.options.publish(sessionId, event, emitOptions)
    });
    this.sessions.set(sessionId, session);
    logger.info(`Created session ${sessionId}, ${this.sessions.size} active`);
    return session;
  }

  /**
   * Serializes work against one session: `op` starts only after every op queued
   * before it for the same id has settled. Other sessions are unaffected.
   */
  run<T>(sessionId: string, op: () => T | Promise<T>): Promise<T> {
    const previous = this.queues.get(sessionId) ?? Promise.resolve();
    const result = previous.then(op);
    const tail: Promise<void> = result.then(noop, noop).then(() => {
      if (this.queues.get(sessionId) === tail) this.queues.delete(sessionId);
    });
    this.queues.set(sessionId, tail);
    return result;
  }

  scan(now: number = this.clock()): number {
    let advanced = 0;
    for (const session of this.sessions.values()) {
      if (session.tick(now)) advanced++;
    }
    return advanced;
  }

  reap(now: number = this.clock()): string[] {
    const reapAfterMs = this.options.reapAfterMs ?? 30_000;
    const reaped: string[] = [];
    for (const [id, session] of this.sessions) {
      if (!session.isEmpty() || this.queues.has(id)) continue;
      if (now - session.lastActivity < reapAfterMs) continue;
      this.sessions.delete(id);
      this.retired.add(id);
      reaped.push(id);
    }
    if (reaped.length > 0) {
      logger.info(`Reaped ${reaped.length} empty sessions (${reaped.join(', ')}), ${this.sessions.size} active`);
    }
    return reaped;
  }

  start(): void {
    if (this.timer) return;
    const interval = this.options.scanIntervalMs ?? 1000;
    this.timer = setInterval(() => {
      this.scan();
      this.reap();
    }, interval);
    this.timer.unref();
    logger.debug(`Session scan running every ${interval}ms`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
