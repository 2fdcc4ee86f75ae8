import type { ServerResponse } from 'http';
import { HeadersFlushedError, ResponseClosedError } from './errors';

/**
 * Lets a handler that does not own a response write to it in steps:
 * status and headers first, then the body chunk by chunk.
 *
 * Headers are flushed by `flushHeaders()` or by the first `writeChunk()`;
 * after that `sendStatus()` and `sendHeaders()` throw.
 */
export class ResponseSender {
  private headersFlushed = false;
  private closedEarly = false;

  constructor(readonly res: ServerResponse) {
    res.on('close', () => {
      if (!res.writableFinished) this.closedEarly = true;
    });
  }

  /** True when the client went away before the response finished. */
  get closed(): boolean {
    return this.closedEarly || this.res.destroyed;
  }

  /** Runs `listener` once if the connection closes before the response finishes. */
  onClose(listener: () => void): void {
    this.res.once('close', () => {
      if (!this.res.writableFinished) listener();
    });
  }

  sendStatus(code: number, reason?: string): void {
    this.assertHeadersPending();
    this.res.statusCode = code;
    if (reason !== undefined) this.res.statusMessage = reason;
  }

  sendHeaders(headers: Record<string, string>): void {
    this.assertHeadersPending();
    for (const [name, value] of Object.entries(headers)) {
      this.res.setHeader(name, value);
    }
  }

  flushHeaders(): void {
    if (this.headersFlushed) return;
    this.headersFlushed = true;
    this.res.flushHeaders();
  }

  /**
   * Writes one chunk. Resolves once the socket can take more data, so awaiting
   * every call keeps at most one chunk buffered.
   */
  async writeChunk(chunk: Uint8Array | string): Promise<void> {
    if (this.closed) throw new ResponseClosedError();
    this.headersFlushed = true;
    if (this.res.write(chunk)) return;

    await new Promise<void>((resolve, reject) => {
      const onDrain = () => {
        this.res.off('close', onClose);
        resolve();
      };
      const onClose = () => {
        this.res.off('drain', onDrain);
        reject(new ResponseClosedError());
      };
      this.res.once('drain', onDrain);
      this.res.once('close', onClose);
    });
  }

  /** Ends the response and resolves when it has been handed to the socket. */
  end(chunk?: string): Promise<void> {
    this.headersFlushed = true;
    if (this.closed) return Promise.reject(new ResponseClosedError());
    return new Promise((resolve, reject) => {
      const onFinish = () => {
        this.res.off('close', onClose);
        resolve();
      };
      const onClose = () => {
        this.res.off('finish', onFinish);
        if (this.res.writableFinished) resolve();
        else reject(new ResponseClosedError());
      };
      this.res.once('finish', onFinish);
      this.res.once('close', onClose);
      if (chunk === undefined) this.res.end();
      else this.res.end(chunk);
    });
  }

  abort(err?: Error): void {
    this.headersFlushed = true;
    if (!this.res.destroyed) this.res.destroy(err);
  }

  private assertHeadersPending(): void {
    if (this.headersFlushed || this.res.headersSent) throw new HeadersFlushedError();
  }
}
