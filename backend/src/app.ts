import express, { type ErrorRequestHandler, type Express } from 'express';
import type { RendezvousEngine } from './engine';
import { createLogger, type Logger } from './logger';
import { messages } from './messages';
import { createReservedHandlers, reservedPaths } from './reserved';
import { sendPlain } from './respond';

export interface AppOptions {
  engine: RendezvousEngine;
  version: string;
  indexHtml: string;
  logger?: Logger;
}

export const PREFLIGHT_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, HEAD, POST, PUT, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type, Content-Disposition',
  'Access-Control-Max-Age': '86400',
  'Content-Length': '0',
} as const;

/**
 * Builds the Express application. Requests are classified in this order:
 *
 * 1. OPTIONS on any path: CORS preflight.
 * 2. Reserved paths: static pages for GET/HEAD, 400 for POST/PUT, 405 otherwise.
 * 3. Any other path: GET/HEAD receive, POST/PUT send, 405 otherwise.
 *
 * Paths are matched exactly as received, so `/help/` and `/Help` are
 * ordinary paths.
 */
export function createApp(options: AppOptions): Express {
  const { engine } = options;
  const logger = options.logger ?? createLogger('HTTP');

  const app = express();
  app.disable('x-powered-by');
  app.set('etag', false);
  app.set('case sensitive routing', true);
  app.set('strict routing', true);

  app.use((req, res, next) => {
    if (req.method !== 'OPTIONS') {
      next();
      return;
    }
    res.status(200).set(PREFLIGHT_HEADERS).end();
  });

  const handlers = createReservedHandlers({ version: options.version, indexHtml: options.indexHtml });
  const reserved = express.Router({ caseSensitive: true, strict: true });
  reserved.get(reservedPaths.index, handlers.index);
  reserved.get(reservedPaths.noscript, handlers.noscript);
  reserved.get(reservedPaths.version, handlers.version);
  reserved.get(reservedPaths.help, handlers.help);
  reserved.get(reservedPaths.robots, handlers.robots);
  reserved.get(reservedPaths.favicon, handlers.favicon);
  reserved.all(Object.values(reservedPaths), (req, res) => {
    if (req.method === 'POST' || req.method === 'PUT') {
      sendPlain(res, 400, messages.reservedSend);
    } else {
      sendPlain(res, 405, messages.unsupportedMethod(req.method));
    }
  });
  app.use(reserved);

  app.use((req, res, next) => {
    const { path } = req;
    logger.trace(`${req.method} ${req.originalUrl}`);

    switch (req.method) {
      case 'GET':
      case 'HEAD':
        engine.handleReceiver(path, req, res).catch(next);
        return;
      case 'POST':
      case 'PUT':
        engine.handleSender(path, req, res).catch(next);
        return;
      default:
        sendPlain(res, 405, messages.unsupportedMethod(req.method));
    }
  });

  const onError: ErrorRequestHandler = (err, req, res, _next) => {
    logger.error(`Unhandled error on ${req.method} ${req.originalUrl}`, err);
    if (res.headersSent) {
      res.destroy();
      return;
    }
    sendPlain(res, 500, messages.internalError);
  };
  app.use(onError);

  return app;
}
