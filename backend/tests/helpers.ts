import http from 'http';
import { createApp } from '../src/app';
import { RendezvousEngine } from '../src/engine';
import { createLogger } from '../src/logger';

export const TEST_VERSION = '1.2.3';
export const TEST_INDEX = '<!DOCTYPE html><title>index</title>';

export interface TestRelay {
  baseUrl: string;
  engine: RendezvousEngine;
  close: () => Promise<void>;
}

/** Runs the relay on an ephemeral loopback port. */
export async function startRelay(): Promise<TestRelay> {
  const engine = new RendezvousEngine();
  const app = createApp({
    engine,
    version: TEST_VERSION,
    indexHtml: TEST_INDEX,
    logger: createLogger('HTTP', 'error'),
  });
  const server = http.createServer(app);
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    engine,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface OpenRequest {
  request: http.ClientRequest;
  response: Promise<http.IncomingMessage>;
  /** Errors raised on the request or its response, kept for assertions */
  errors: Error[];
}

/**
 * Starts a request whose body the test writes piece by piece with
 * `request.write()` and finishes with `request.end()`.
 */
export function openRequest(method: string, url: string, headers: http.OutgoingHttpHeaders = {}): OpenRequest {
  const errors: Error[] = [];
  const request = http.request(url, { method, headers });
  request.on('error', (err) => errors.push(err));

  const response = new Promise<http.IncomingMessage>((resolve) => {
    request.on('response', (res) => {
      res.on('error', (err) => errors.push(err));
      resolve(res);
    });
  });
  request.flushHeaders();

  return { request, response, errors };
}

export async function readText(res: http.IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of res) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf8');
}

export interface Collected {
  /** Text received so far */
  readonly text: string;
  /** Resolves when the response closed, whether or not it completed */
  readonly closed: Promise<void>;
}

/** Accumulates a response body as it streams in. */
export function collect(res: http.IncomingMessage): Collected {
  let text = '';
  res.setEncoding('utf8');
  res.on('data', (chunk: string) => {
    text += chunk;
  });
  const closed = new Promise<void>((resolve) => res.once('close', () => resolve()));
  return {
    get text() {
      return text;
    },
    closed,
  };
}
