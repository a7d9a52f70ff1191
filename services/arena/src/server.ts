import 'dotenv/config';
import type { Server } from 'node:http';
import { createApp } from './app.js';
import { loadConfig } from './config.js';

const config = loadConfig();
const app = createApp(config);

let httpServer: Server | null = null;
let shuttingDown = false;

function startServer() {
  httpServer = app.listen(config.port, config.host, () => {
    const address = httpServer?.address();
    if (!address || typeof address === 'string') {
      console.log(`[server] Arena listening on port ${config.port}`);
      return;
    }
    const addressText = address.address;
    const isWildcardHost = addressText === '::' || addressText === '0.0.0.0';
    const displayHost = isWildcardHost ? 'localhost' : addressText;
    console.log(`[server] Arena listening on http://${displayHost}:${address.port}`);
  });

  httpServer.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      console.error(
        `[server] Port ${config.port} is already in use. Stop the other process or set PORT to an available value.`
      );
    } else {
      console.error('[server] HTTP server error', err);
    }
    shutdown('HTTP server failed to start', 1).catch(() => process.exit(1));
  });
}

async function shutdown(reason: string, exitCode = 0) {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  console.info(`[server] ${reason}`);

  const server = httpServer;
  httpServer = null;
  if (server) {
    try {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    } catch (err) {
      console.warn('[server] Error while closing HTTP server', err);
      exitCode = exitCode || 1;
    }
  }

  process.exit(exitCode);
}

const handleSignal = (signal: NodeJS.Signals) => {
  shutdown(`Received ${signal}, shutting down...`).catch((err) => {
    console.error('[server] Error while shutting down', err);
    process.exit(1);
  });
};

process.once('SIGINT', handleSignal);
process.once('SIGTERM', handleSignal);

startServer();
