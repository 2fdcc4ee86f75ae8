import type { Readable } from 'stream';
import type { ResponseSender } from './response-sender';
import type { Transfer } from './transfer';

/**
 * What a sender hands to each receiver once a pairing is committed.
 * `body` is null for receivers that only asked for the headers (HEAD).
 */
export interface TransferPayload {
  status: number;
  headers: Record<string, string>;
  body: Readable | null;
}

/**
 * A sender registered on a path.
 */
export interface SenderHandle {
  id: number;
  /** Response of the sending request, used for the informational lines */
  response: ResponseSender;
  /** Fired with the receivers when the pairing is committed */
  pairing: Transfer<ReceiverHandle[]>;
}

/**
 * A receiver registered on a path.
 */
export interface ReceiverHandle {
  id: number;
  method: 'GET' | 'HEAD';
  /** The `n` the receiver asked for, null when it did not pass one */
  requested: number | null;
  transfer: Transfer<TransferPayload>;
  /** Resolves true once the whole body was written, false if the receiver went away */
  completion: Promise<boolean>;
  complete: (delivered: boolean) => void;
}

/**
 * Registry record for a path. A path without a record is empty.
 * `expected` of waiting receivers stays null until a sender or a receiver
 * passing `n` fixes it.
 */
export type PathSlot =
  | { kind: 'sender-waiting'; sender: SenderHandle; expected: number; receivers: ReceiverHandle[] }
  | { kind: 'receiver-waiting'; receivers: ReceiverHandle[]; expected: number | null }
  | { kind: 'in-progress'; expected: number };

export type RejectReason =
  | 'reserved-path'
  | 'already-sender'
  | 'too-many-receivers'
  | 'mismatched-n'
  | 'in-progress';

export type SenderRegistration =
  | { type: 'commit'; receivers: ReceiverHandle[] }
  | { type: 'wait'; connected: number }
  | { type: 'reject'; reason: RejectReason };

export type ReceiverRegistration =
  | { type: 'commit'; sender: SenderHandle; receivers: ReceiverHandle[] }
  | { type: 'wait'; sender: SenderHandle | null }
  | { type: 'reject'; reason: RejectReason };
