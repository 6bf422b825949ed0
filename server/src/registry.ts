import { logger } from './logging';
import { Session } from './session';

export interface ConnectionBinding {
  connectionId: string;
  sessionId: string;
}

/**
 * Connection → session bookkeeping. Holds ids only; a Session is reached through
 * the resolver and is only ever changed through its own methods.
 */
export class ConnectionRegistry {
  private readonly byConnection = new Map<string, ConnectionBinding>();
  private readonly bySession = new Map<string, Set<string>>();

  constructor(private readonly resolve: (sessionId: string) => Session | undefined) {}

  register(connectionId: string, sessionId: string): void {
    const previous = this.byConnection.get(connectionId);
    if (previous) {
      if (previous.sessionId === sessionId) return;
      logger.debug(`Connection ${connectionId} moving from ${previous.sessionId} to ${sessionId}`);
      this.unregister(connectionId);
    }

    this.byConnection.set(connectionId, { connectionId, sessionId });
    let members = this.bySession.get(sessionId);
    if (!members) {
      members = new Set();
      this.bySession.set(sessionId, members);
    }
    members.add(connectionId);
    logger.debug(`Registered ${connectionId} in session ${sessionId}, now has ${members.size} connections`);
  }

  // Leaves the session before the mapping goes, so the router never sees a half-removed connection
  unregister(connectionId: string): ConnectionBinding | undefined {
    const binding = this.byConnection.get(connectionId);
    if (!binding) return undefined;

    this.resolve(binding.sessionId)?.leave(connectionId);

    this.byConnection.delete(connectionId);
    const members = this.bySession.get(binding.sessionId);
    if (members) {
      members.delete(connectionId);
      if (members.size === 0) this.bySession.delete(binding.sessionId);
    }
    logger.debug(`Unregistered ${connectionId} from session ${binding.sessionId}`);
    return binding;
  }

  lookup(connectionId: string): ConnectionBinding | undefined {
    return this.byConnection.get(connectionId);
  }

  connectionsOf(sessionId: string): string[] {
    return [...(this.bySession.get(sessionId) ?? [])];
  }

  get size(): number {
    return this.byConnection.size;
  }
}
