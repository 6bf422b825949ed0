import { IncomingMessage } from 'http';
import { WebSocket, WebSocketServer } from 'ws';
import { logger } from './logging';
import { Transport } from './hub';

// Pending bytes past which a recipient counts as unreachable
const MAX_BUFFERED_BYTES = 1 << 20;

export class WebSocketTransport implements Transport {
  private readonly sockets = new Map<string, WebSocket>();
  private connectionCounter = 0;

  constructor(private readonly wss: WebSocketServer) {}

  listen(onConnection: (connectionId: string) => void): void {
    this.wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
      this.connectionCounter++;
      const connectionId = `conn_${this.connectionCounter}`;
      this.sockets.set(connectionId, ws);

      const ip = req.socket.remoteAddress || 'unknown';
      logger.info(`New WebSocket connection: ${connectionId} from ${ip}`);

      ws.once('close', (code, reason) => {
        logger.info(`WebSocket ${connectionId} closed with code ${code}, reason: ${reason.toString() || 'none'}`);
        this.sockets.delete(connectionId);
      });
      ws.on('error', error => {
        logger.error(`WebSocket ${connectionId} error:`, error);
      });

      onConnection(connectionId);
    });
  }

  get connections(): number {
    return this.sockets.size;
  }

  send(connectionId: string, frame: string): Promise<boolean> {
    const ws = this.sockets.get(connectionId);
    if (!ws || ws.readyState !== WebSocket.OPEN) return Promise.resolve(false);
    if (ws.bufferedAmount > MAX_BUFFERED_BYTES) {
      logger.warn(`Client ${connectionId} has ${ws.bufferedAmount} bytes pending`);
      return Promise.resolve(false);
    }

    return new Promise(resolve => {
      ws.send(frame, error => {
        if (error) {
          logger.error(`Failed to send message to client ${connectionId}:`, error);
          resolve(false);
        } else {
          resolve(true);
        }
      });
    });
  }

  onMessage(connectionId: string, handler: (frame: string) => void): void {
    this.sockets.get(connectionId)?.on('message', raw => handler(raw.toString()));
  }

  onClose(connectionId: string, handler: () => void): void {
    this.sockets.get(connectionId)?.once('close', () => handler());
  }

  close(connectionId: string): void {
    this.sockets.get(connectionId)?.terminate();
  }
}
