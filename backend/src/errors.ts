export class RelayError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A one-shot transfer was used twice, or used after being cancelled. */
export class TransferError extends RelayError {}

export class HeadersFlushedError extends RelayError {
  constructor() {
    super('Headers have already been sent');
  }
}

export class ResponseClosedError extends RelayError {
  constructor() {
    super('Response was closed before it finished');
  }
}

export class SenderAbortedError extends RelayError {
  constructor() {
    super('Sender aborted the transfer');
  }
}

export class ReceiverAbortedError extends RelayError {
  constructor() {
    super('Receiver aborted the transfer');
  }
}

export class ConfigError extends RelayError {}
