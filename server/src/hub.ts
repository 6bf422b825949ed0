import { BroadcastRouter, FrameSender } from './broadcast';
import { Catalog } from './catalog';
import { Clock } from './clock';
import { invalidReference, SessionError } from './errors';
import { logger } from './logging';
import { SessionManager } from './manager';
import { ConnectionRegistry } from './registry';
import { ClientMessageSchema, toPlaylistCommand, toTransportCommand } from './schemas';
import { Session } from './session';
import { ClientMessage, ErrorReason } from './types';

/** The duplex channel layer: discrete text frames per connection. */
export interface Transport extends FrameSender {
  onMessage(connectionId: string, handler: (frame: string) => void): void;
  onClose(connectionId: string, handler: () => void): void;
  close(connectionId: string): void;
}

export interface HubOptions {
  catalog: Catalog;
  clock?: Clock;
  chatMaxLength?: number;
  chatRetention?: number;
  scanIntervalMs?: number;
  reapAfterMs?: number;
  idFactory?: () => string;
}

/**
 * Routes inbound frames: attribute to a session, validate, apply under that
 * session's serialization point, and answer rejections to the sender only.
 */
export class SessionHub {
  readonly manager: SessionManager;
  readonly registry: ConnectionRegistry;
  readonly router: BroadcastRouter;
  // frames still being dispatched, per connection
  private readonly inflight = new Map<string, number>();
  // connections that closed while frames were in flight
  private readonly closed = new Set<string>();

  constructor(
    private readonly transport: Transport,
    options: HubOptions
  ) {
    this.registry = new ConnectionRegistry(sessionId => this.manager.get(sessionId));
    this.router = new BroadcastRouter(this.registry, transport, connectionId => this.drop(connectionId));
    this.manager = new SessionManager({
      ...options,
      publish: (sessionId, event, emitOptions) => {
        this.router.publish(sessionId, event, emitOptions);
      }
    });
  }

  attach(connectionId: string): void {
    this.transport.onMessage(connectionId, frame => {
      this.handleFrame(connectionId, frame).catch(error => {
        logger.error(`Unhandled failure processing frame from ${connectionId}:`, error);
      });
    });
    this.transport.onClose(connectionId, () => {
      this.disconnect(connectionId).catch(error => {
        logger.error(`Failed to clean up ${connectionId}:`, error);
      });
    });
  }

  async handleFrame(connectionId: string, frame: string): Promise<void> {
    logger.debug(`Received message from ${connectionId}: ${frame.substring(0, 100)}${frame.length > 100 ? '...' : ''}`);

    let data: unknown;
    try {
      data = JSON.parse(frame);
    } catch {
      this.reject(connectionId, 'malformed_message', 'Invalid JSON');
      return;
    }

    const parsed = ClientMessageSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      this.reject(connectionId, 'malformed_message', `${where}${issue?.message ?? 'Invalid message'}`);
      return;
    }

    this.inflight.set(connectionId, (this.inflight.get(connectionId) ?? 0) + 1);
    try {
      await this.dispatch(connectionId, parsed.data);
    } catch (error) {
      if (this.closed.has(connectionId)) {
        logger.debug(`Discarding ${parsed.data.type} failure for closed ${connectionId}`);
      } else if (error instanceof SessionError) {
        this.reject(connectionId, error.reason, error.message);
      } else {
        logger.error(`Error processing ${parsed.data.type} from ${connectionId}:`, error);
        this.reject(connectionId, 'internal_error', 'Command could not be processed');
      }
    } finally {
      const remaining = (this.inflight.get(connectionId) ?? 1) - 1;
      if (remaining > 0) {
        this.inflight.set(connectionId, remaining);
      } else {
        this.inflight.delete(connectionId);
        this.closed.delete(connectionId);
      }
    }
  }

  async disconnect(connectionId: string): Promise<void> {
    if (this.inflight.has(connectionId)) {
      this.closed.add(connectionId);
    }
    const binding = this.registry.lookup(connectionId);
    if (binding) {
      await this.manager.run(binding.sessionId, () => this.registry.unregister(connectionId));
    }
    this.router.forget(connectionId);
    logger.info(`Client ${connectionId} disconnected${binding ? ` from session ${binding.sessionId}` : ''}`);
  }

  start(): void {
    this.manager.start();
  }

  stop(): void {
    this.manager.stop();
  }

  private async dispatch(connectionId: string, msg: ClientMessage): Promise<void> {
    logger.info(`Processing ${msg.type} message from ${connectionId}`);

    if (msg.type === 'join') {
      const previous = this.registry.lookup(connectionId);
      if (previous && previous.sessionId !== msg.sessionId) {
        await this.manager.run(previous.sessionId, () => this.registry.unregister(connectionId));
      }
      await this.manager.run(msg.sessionId, () => {
        if (this.closed.has(connectionId)) {
          logger.debug(`Skipping join of ${msg.sessionId} for closed ${connectionId}`);
          return;
        }
        const session = this.manager.getOrCreate(msg.sessionId);
        const snapshot = session.join(connectionId, msg.displayName, msg.requestedRole);
        this.registry.register(connectionId, msg.sessionId);
        this.router.sendTo(connectionId, { type: 'state_snapshot', session: snapshot });
      });
      return;
    }

    const binding = this.registry.lookup(connectionId);
    if (!binding) {
      throw invalidReference('Join a session first');
    }
    const { sessionId } = binding;

    await this.manager.run(sessionId, async () => {
      const session = this.requireSession(sessionId);
      switch (msg.type) {
        case 'transport':
          session.applyTransportCommand(connectionId, toTransportCommand(msg));
          break;
        case 'playlist':
          await session.applyPlaylistCommand(connectionId, toPlaylistCommand(msg));
          break;
        case 'chat':
          session.postChat(connectionId, msg.text);
          break;
      }
    });
  }

  private requireSession(sessionId: string): Session {
    const session = this.manager.get(sessionId);
    if (!session) throw invalidReference(`Session ${sessionId} not found`);
    return session;
  }

  private drop(connectionId: string): void {
    this.transport.close(connectionId);
    this.disconnect(connectionId).catch(error => {
      logger.error(`Failed to drop ${connectionId}:`, error);
    });
  }

  private reject(connectionId: string, reason: ErrorReason, message: string): void {
    logger.warn(`Rejecting message from ${connectionId}: ${reason} (${message})`);
    this.router.sendTo(connectionId, { type: 'error', reason, message });
  }
}
