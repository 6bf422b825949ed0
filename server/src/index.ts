import express from 'express';
import http from 'http';
import cors from 'cors';
import { createExpressMiddleware } from '@trpc/server/adapters/express';
import { WebSocketServer } from 'ws';
import { Catalog, ManifestCatalog } from './catalog';
import { Clock } from './clock';
import { loadConfig } from './config';
import { SessionHub } from './hub';
import { logger, LOG_LEVEL } from './logging';
import { appRouter } from './router';
import { WebSocketTransport } from './transport';

export interface JamServerOptions {
  catalog: Catalog;
  clock?: Clock;
  chatMaxLength?: number;
  chatRetention?: number;
  scanIntervalMs?: number;
  reapAfterMs?: number;
}

export interface JamServer {
  app: express.Express;
  server: http.Server;
  hub: SessionHub;
  transport: WebSocketTransport;
  close(): Promise<void>;
}

export function createJamServer(options: JamServerOptions): JamServer {
  const app = express();
  app.use(cors());

  const server = http.createServer(app);
  const wss = new WebSocketServer({ server });
  const transport = new WebSocketTransport(wss);
  const hub = new SessionHub(transport, options);
  transport.listen(connectionId => hub.attach(connectionId));

  // curl http://localhost:3001/health
  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'ok',
      sessions: hub.manager.size,
      connections: transport.connections,
      timestamp: new Date().toISOString(),
      logLevel: LOG_LEVEL
    });
  });

  app.use('/trpc', createExpressMiddleware({
    router: appRouter,
    createContext: () => ({ hub, catalog: options.catalog })
  }));

  server.on('listening', () => hub.start());
  server.on('close', () => hub.stop());

  logger.info(`WebSocket server created (LOG_LEVEL: ${LOG_LEVEL})`);

  const close = () => new Promise<void>((resolve, reject) => {
    hub.stop();
    for (const client of wss.clients) client.terminate();
    wss.close();
    server.close(err => (err ? reject(err) : resolve()));
  });

  return { app, server, hub, transport, close };
}

async function main(): Promise<void> {
  const config = loadConfig();
  const catalog = await ManifestCatalog.fromFile(config.manifestPath);
  const { server, close } = createJamServer({ catalog, ...config });

  server.listen(config.port, () => {
    logger.info(`WebSocket server listening on port ${config.port}`);
    logger.info(`Health check available at http://localhost:${config.port}/health`);
    logger.info(`Server process ID: ${process.pid}`);
    logger.info(`Node.js version: ${process.version}`);
    logger.info(`Log level: ${LOG_LEVEL} (change with --log=debug or LOG_LEVEL=debug environment variable)`);
    logger.info('Ready to accept connections');
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal} signal, shutting down gracefully`);
    close().then(
      () => {
        logger.info('Server closed, exiting process');
        process.exit(0);
      },
      error => {
        logger.error('Error during shutdown:', error);
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception:', error);
    // Keep the server running despite uncaught exceptions
  });
}

if (require.main === module) {
  main().catch(error => {
    logger.error('Failed to start server:', error);
    process.exit(1);
  });
}
