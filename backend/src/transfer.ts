import { TransferError } from './errors';

type TransferState = 'pending' | 'sent' | 'received' | 'cancelled';

/**
 * One-shot handoff between the task that produces a value and the task
 * suspended waiting for it.
 *
 * - `send` works once; any later call throws.
 * - the first `receive` resolves with the value, or with `undefined` if the
 *   transfer was cancelled first; later calls resolve `undefined`.
 * - `cancel` from either side aborts `signal`, so the other side can observe
 *   it even after the value was handed over.
 */
export class Transfer<T> {
  private state: TransferState = 'pending';
  private receiving = false;
  private readonly controller = new AbortController();

  private readonly settled: Promise<T | undefined>;
  private resolveSettled!: (value: T | undefined) => void;

  constructor() {
    this.settled = new Promise((resolve) => {
      this.resolveSettled = resolve;
    });
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get used(): boolean {
    return this.state !== 'pending';
  }

  send(value: T): void {
    if (this.state === 'cancelled') {
      throw new TransferError('Transfer has been cancelled');
    }
    if (this.state !== 'pending') {
      throw new TransferError('Transfer has already been sent');
    }
    this.state = 'sent';
    this.resolveSettled(value);
  }

  receive(): Promise<T | undefined> {
    if (this.receiving) return Promise.resolve(undefined);
    this.receiving = true;
    return this.settled.then((value) => {
      if (this.state === 'sent') this.state = 'received';
      return value;
    });
  }

  cancel(reason?: Error): void {
    if (this.state === 'pending') {
      this.state = 'cancelled';
      this.resolveSettled(undefined);
    }
    if (!this.controller.signal.aborted) {
      this.controller.abort(reason);
    }
  }
}
