import type { IncomingMessage } from 'http';
import type { Request, Response } from 'express';
import { PassThrough } from 'stream';
import { ReceiverAbortedError, SenderAbortedError } from './errors';
import { createLogger, type Logger } from './logger';
import { messages, receiverRejection, senderRejection } from './messages';
import { PathRegistry } from './registry';
import { PLAIN_TEXT, sendPlain } from './respond';
import { ResponseSender } from './response-sender';
import { Transfer } from './transfer';
import type { ReceiverHandle, SenderHandle, TransferPayload } from './types';

export const MAX_RECEIVERS = 2 ** 31 - 1;

const FORWARDED_HEADERS = {
  'content-type': 'Content-Type',
  'content-length': 'Content-Length',
  'content-disposition': 'Content-Disposition',
} as const;

/**
 * Reads the `n` query value. Absent means one receiver; anything other than a
 * single decimal integer in 1..2^31-1 is invalid and yields null.
 */
export function parseReceiverCount(value: unknown): number | null {
  if (value === undefined) return 1;
  if (typeof value !== 'string' || !/^[0-9]+$/.test(value)) return null;
  const n = Number(value);
  return n >= 1 && n <= MAX_RECEIVERS ? n : null;
}

/** Headers every receiver gets, taken from the sending request. */
export function forwardedHeaders(req: IncomingMessage): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [key, name] of Object.entries(FORWARDED_HEADERS)) {
    const value = req.headers[key];
    if (typeof value === 'string') headers[name] = value;
  }
  headers['Access-Control-Allow-Origin'] = '*';
  headers['Access-Control-Expose-Headers'] = 'Content-Length, Content-Type';
  headers['X-Robots-Tag'] = 'none';
  return headers;
}

export function createReceiverHandle(
  id: number,
  method: ReceiverHandle['method'],
  requested: number | null,
): ReceiverHandle {
  let resolveCompletion!: (delivered: boolean) => void;
  const completion = new Promise<boolean>((resolve) => {
    resolveCompletion = resolve;
  });
  return {
    id,
    method,
    requested,
    transfer: new Transfer<TransferPayload>(),
    completion,
    complete: (delivered) => resolveCompletion(delivered),
  };
}

/** Writes a chunk and waits for the body to drain, or to be destroyed. */
function pushChunk(body: PassThrough, chunk: Buffer): Promise<void> {
  if (body.destroyed || body.write(chunk)) return Promise.resolve();
  return new Promise((resolve) => {
    const done = () => {
      body.off('drain', done);
      body.off('close', done);
      resolve();
    };
    body.once('drain', done);
    body.once('close', done);
  });
}

/**
 * Pairs senders with receivers on the same path and streams the sender's
 * request body to every receiver.
 *
 * Flow for a pairing:
 * 1. Whoever arrives last commits the pairing in the registry.
 * 2. The sender gets the receivers through its `pairing` transfer and hands
 *    each receiver `(status, headers, body)` through the receiver's transfer.
 * 3. The sender copies its request into every body, one chunk at a time,
 *    waiting for the slowest receiver before reading on.
 * 4. Once every receiver finished or dropped out, the path is released and
 *    the sender gets its closing line.
 */
export class RendezvousEngine {
  private nextId = 1;

  constructor(
    readonly registry: PathRegistry = new PathRegistry(),
    private readonly logger: Logger = createLogger('Engine'),
  ) {}

  async handleSender(path: string, req: Request, res: Response): Promise<void> {
    const n = parseReceiverCount(req.query.n);
    if (n === null) {
      sendPlain(res, 400, messages.invalidN);
      return;
    }

    const out = new ResponseSender(res);
    const sender: SenderHandle = { id: this.nextId++, response: out, pairing: new Transfer() };
    const registration = this.registry.registerSender(path, sender, n);

    if (registration.type === 'reject') {
      this.logger.debug(`Sender #${sender.id} rejected on ${path}: ${registration.reason}`);
      sendPlain(res, 400, senderRejection(registration.reason));
      return;
    }

    out.sendStatus(200);
    out.sendHeaders({ 'Content-Type': PLAIN_TEXT, 'Access-Control-Allow-Origin': '*' });

    const connected = registration.type === 'commit' ? registration.receivers.length : registration.connected;
    this.inform(out, messages.waiting(n));
    if (connected > 0) this.inform(out, messages.alreadyConnected(connected));

    let receivers: ReceiverHandle[];
    if (registration.type === 'commit') {
      receivers = registration.receivers;
    } else {
      this.logger.debug(`Sender #${sender.id} waiting on ${path} for ${n} receiver(s)`);
      out.onClose(() => {
        this.registry.unregisterSender(path, sender);
        sender.pairing.cancel(new SenderAbortedError());
      });

      const paired = await sender.pairing.receive();
      if (paired === undefined) {
        this.logger.info(`Sender #${sender.id} left ${path} before receivers connected`);
        return;
      }
      receivers = paired;
    }

    let delivered: number | null;
    try {
      delivered = await this.relay(path, req, out, receivers);
    } finally {
      this.registry.release(path);
    }
    if (delivered === null) return;

    const total = receivers.length;
    if (delivered === 0) {
      this.logger.warn(`Transfer on ${path} aborted by every receiver`);
      await this.finish(out, messages.aborted);
      return;
    }
    this.logger.info(`Transfer on ${path} finished: ${delivered}/${total} receiver(s) served`);
    const aborted = total - delivered;
    await this.finish(out, aborted > 0 ? messages.partiallyAborted(aborted, total) + messages.sent : messages.sent);
  }

  async handleReceiver(path: string, req: Request, res: Response): Promise<void> {
    const { n } = req.query;
    const requested = n === undefined ? null : parseReceiverCount(n);
    if (n !== undefined && requested === null) {
      sendPlain(res, 400, messages.invalidN);
      return;
    }

    const receiver = createReceiverHandle(this.nextId++, req.method === 'HEAD' ? 'HEAD' : 'GET', requested);
    const registration = this.registry.registerReceiver(path, receiver);

    if (registration.type === 'reject') {
      this.logger.debug(`Receiver #${receiver.id} rejected on ${path}: ${registration.reason}`);
      sendPlain(res, 400, receiverRejection(registration.reason, path));
      return;
    }

    const out = new ResponseSender(res);
    out.onClose(() => {
      this.registry.unregisterReceiver(path, receiver);
      receiver.transfer.cancel(new ReceiverAbortedError());
    });

    if (registration.type === 'commit') {
      this.inform(registration.sender.response, messages.receiverConnected);
      registration.sender.pairing.send(registration.receivers);
    } else {
      this.logger.debug(`Receiver #${receiver.id} waiting on ${path}`);
      if (registration.sender !== null) {
        this.inform(registration.sender.response, messages.receiverConnected);
      }
    }

    const payload = await receiver.transfer.receive();
    if (payload === undefined) {
      this.logger.info(`Receiver #${receiver.id} left ${path} before the transfer started`);
      receiver.complete(false);
      return;
    }
    await this.deliver(path, receiver, payload, out);
  }

  /**
   * Sender side of a committed pairing. Resolves with the number of receivers
   * that got the whole body, or null when the sender itself went away.
   */
  private async relay(
    path: string,
    req: IncomingMessage,
    out: ResponseSender,
    receivers: ReceiverHandle[],
  ): Promise<number | null> {
    const n = receivers.length;
    const headers = forwardedHeaders(req);
    const bodies: PassThrough[] = [];

    for (const receiver of receivers) {
      // Cancelled between the commit and now: its handler completes it.
      if (receiver.transfer.used) continue;

      const body = receiver.method === 'HEAD' ? null : new PassThrough();
      if (body !== null) {
        body.on('error', (err) => this.logger.trace(`Body of receiver #${receiver.id} closed: ${err.message}`));
        bodies.push(body);
      }
      receiver.transfer.send({ status: 200, headers, body });
    }

    this.logger.info(`Transfer on ${path} started with ${n} receiver(s)`);
    this.inform(out, messages.startSending(n));

    // The copy loop may be parked on a receiver's backpressure, so the sender
    // leaving is watched on the request itself.
    let senderGone = false;
    const cutOff = (reason: string) => {
      if (senderGone) return;
      senderGone = true;
      this.logger.warn(`Sender on ${path} aborted: ${reason}`);
      for (const body of bodies) body.destroy(new SenderAbortedError());
      out.abort();
    };
    const onClose = () => {
      if (!req.complete) cutOff('connection closed');
    };
    const onError = (err: Error) => cutOff(err.message);
    req.on('close', onClose);
    req.on('error', onError);
    if (req.destroyed) onClose();

    try {
      let live = bodies;
      for await (const chunk of req) {
        if (senderGone) break;
        live = live.filter((body) => !body.destroyed);
        // Everyone left: keep reading so the sender is not stuck on a full socket.
        if (live.length === 0) continue;
        await Promise.all(live.map((body) => pushChunk(body, chunk)));
      }
      if (senderGone) return null;
      for (const body of live) {
        if (!body.destroyed) body.end();
      }
    } catch (err) {
      cutOff(err instanceof Error ? err.message : String(err));
      return null;
    } finally {
      req.off('close', onClose);
      req.off('error', onError);
    }

    const results = await Promise.all(receivers.map((receiver) => receiver.completion));
    return results.filter(Boolean).length;
  }

  /** Receiver side of a committed pairing. */
  private async deliver(
    path: string,
    receiver: ReceiverHandle,
    payload: TransferPayload,
    out: ResponseSender,
  ): Promise<void> {
    const { body } = payload;
    const { signal } = receiver.transfer;
    const onAbort = () => body?.destroy(new ReceiverAbortedError());
    if (signal.aborted) onAbort();
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      out.sendStatus(payload.status);
      out.sendHeaders(payload.headers);
      out.flushHeaders();
      if (body !== null) {
        for await (const chunk of body) {
          await out.writeChunk(chunk);
        }
      }
      await out.end();
      receiver.complete(true);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Receiver #${receiver.id} on ${path} aborted: ${reason}`);
      if (body !== null && !body.destroyed) body.destroy(new ReceiverAbortedError());
      out.abort();
      receiver.complete(false);
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  /** Informational line for a sender. Lines are tiny, so backpressure is not awaited. */
  private inform(out: ResponseSender, line: string): void {
    if (out.closed) return;
    out.writeChunk(line).catch((err: unknown) => {
      this.logger.debug(`Could not inform sender: ${err instanceof Error ? err.message : String(err)}`);
    });
  }

  private async finish(out: ResponseSender, line: string): Promise<void> {
    try {
      await out.end(line);
    } catch (err) {
      this.logger.debug(`Sender went away before the final line: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}
