import fs from 'fs';
import http from 'http';
import https from 'https';
import path from 'path';
import { createApp } from './app';
import type { ServerConfig } from './config';
import { RendezvousEngine } from './engine';
import { createLogger } from './logger';

const logger = createLogger('Server');

/**
 * Directory holding package.json. Found by walking up from this file so the
 * same code works from the sources and from the build output.
 */
export function findProjectRoot(start: string = __dirname): string {
  let dir = start;
  while (!fs.existsSync(path.join(dir, 'package.json'))) {
    const parent = path.dirname(dir);
    if (parent === dir) throw new Error(`No package.json above ${start}`);
    dir = parent;
  }
  return dir;
}

export function readVersion(root: string): string {
  const pkg: unknown = JSON.parse(fs.readFileSync(path.join(root, 'package.json'), 'utf8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

function listen(server: http.Server | https.Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });
}

/**
 * Starts the HTTP server and, when configured, the HTTPS server. Both share
 * one engine, so a sender on HTTP can pair with a receiver on HTTPS.
 */
export async function start(config: ServerConfig, root: string = findProjectRoot()): Promise<Array<http.Server | https.Server>> {
  const version = readVersion(root);
  const indexHtml = fs.readFileSync(path.join(root, 'backend', 'views', 'index.html'), 'utf8');
  const app = createApp({ engine: new RendezvousEngine(), version, indexHtml });

  const servers: Array<http.Server | https.Server> = [];

  const httpServer = http.createServer(app);
  servers.push(httpServer);

  let httpsServer: https.Server | undefined;
  if (config.https) {
    httpsServer = https.createServer(
      {
        cert: fs.readFileSync(config.https.crtPath),
        key: fs.readFileSync(config.https.keyPath),
      },
      app,
    );
    servers.push(httpsServer);
  }

  for (const server of servers) {
    // Transfers last as long as the sender keeps sending.
    server.requestTimeout = 0;
    server.on('clientError', (err, socket) => {
      logger.debug(`Client error: ${err.message}`);
      socket.destroy();
    });
  }

  await listen(httpServer, config.httpPort, config.host);
  logger.info(`HTTP server is running on ${config.host}:${config.httpPort}...`);
  if (httpsServer && config.https) {
    await listen(httpsServer, config.https.port, config.host);
    logger.info(`HTTPS server is running on ${config.host}:${config.https.port}...`);
  }

  return servers;
}
