import { logger } from './logging';
import { ConnectionRegistry } from './registry';
import { ServerMessage, SessionEvent } from './types';

/** Sends one encoded frame; resolves false (or rejects) when the channel is gone. */
export interface FrameSender {
  send(connectionId: string, frame: string): Promise<boolean>;
}

export interface PublishOptions {
  exclude?: string;
}

/**
 * Session fan-out. Each connection has its own outbound chain: frames reach a
 * recipient in the order they were published, and a stalled recipient only holds
 * up its own chain.
 */
export class BroadcastRouter {
  private readonly outbound = new Map<string, Promise<void>>();
  private readonly failed = new Set<string>();

  constructor(
    private readonly registry: ConnectionRegistry,
    private readonly sender: FrameSender,
    private readonly onSendFailure: (connectionId: string) => void
  ) {}

  publish(sessionId: string, event: SessionEvent, options: PublishOptions = {}): number {
    const recipients = this.registry
      .connectionsOf(sessionId)
      .filter(id => id !== options.exclude);

    if (recipients.length === 0) {
      logger.debug(`No recipients for ${event.type} in session ${sessionId}`);
      return 0;
    }

    // Encoded once, before anything else can touch the session
    const frame = JSON.stringify(event);
    for (const connectionId of recipients) {
      this.enqueue(connectionId, frame, event.type);
    }
    logger.info(`Broadcasting ${event.type} to session ${sessionId} (${recipients.length} clients, ${frame.length} bytes)`);
    return recipients.length;
  }

  sendTo(connectionId: string, message: ServerMessage): void {
    this.enqueue(connectionId, JSON.stringify(message), message.type);
  }

  /** Resolves once every frame queued so far has been attempted. */
  async flush(): Promise<void> {
    await Promise.all([...this.outbound.values()]);
  }

  forget(connectionId: string): void {
    this.outbound.delete(connectionId);
    this.failed.delete(connectionId);
  }

  private enqueue(connectionId: string, frame: string, type: string): void {
    const previous = this.outbound.get(connectionId) ?? Promise.resolve();
    const queued: Promise<void> = previous
      .then(() => this.deliver(connectionId, frame, type))
      .finally(() => {
        if (this.outbound.get(connectionId) === queued) {
          this.outbound.delete(connectionId);
        }
      });
    this.outbound.set(connectionId, queued);
  }

  private async deliver(connectionId: string, frame: string, type: string): Promise<void> {
    if (this.failed.has(connectionId)) return;

    let ok: boolean;
    try {
      ok = await this.sender.send(connectionId, frame);
    } catch (error) {
      logger.error(`Failed to send ${type} to client ${connectionId}:`, error);
      ok = false;
    }

    if (ok) {
      logger.debug(`Sent ${type} to client ${connectionId} (${frame.length} bytes)`);
      return;
    }

    // No retry: a straggler is dropped and the rest of the session moves on
    this.failed.add(connectionId);
    logger.warn(`Dropping client ${connectionId} after failed send of ${type}`);
    try {
      this.onSendFailure(connectionId);
    } catch (error) {
      logger.error(`Failed to drop client ${connectionId}:`, error);
    }
  }
}
