import type { RejectReason } from './types';

/**
 * Lines written to senders and rejected clients. Clients parse these, so
 * changing a line is a change of the public interface.
 */
export const messages = {
  waiting: (n: number) => `[INFO] Waiting for ${n} receiver(s)...\n`,
  alreadyConnected: (k: number) => `[INFO] ${k} receiver(s) has/have been connected.\n`,
  receiverConnected: '[INFO] A receiver was connected.\n',
  startSending: (n: number) => `[INFO] Start sending to ${n} receiver(s)!\n`,
  partiallyAborted: (aborted: number, n: number) => `[WARN] ${aborted} of ${n} receiver(s) aborted.\n`,
  sent: '[INFO] Sent successfully!\n',
  aborted: '[INFO] Sending aborted.\n',

  invalidN: '[ERROR] Invalid n query parameter.\n',
  mismatchedN: '[ERROR] The number of receivers has been mismatched.\n',
  anotherSender: '[ERROR] The path has been used by another sender.\n',
  receiversLimit: '[ERROR] The number of receivers has reached limit.\n',
  reservedSend: '[ERROR] Cannot send to the reserved path.\n',
  reservedReceive: '[ERROR] Cannot receive from the reserved path.\n',
  established: (path: string) => `[ERROR] Connection on '${path}' has been established already.\n`,
  unsupportedMethod: (method: string) => `[ERROR] Unsupported method: ${method}.\n`,
  internalError: '[ERROR] Internal server error.\n',
} as const;

export function senderRejection(reason: RejectReason): string {
  switch (reason) {
    case 'reserved-path':
      return messages.reservedSend;
    case 'mismatched-n':
      return messages.mismatchedN;
    case 'too-many-receivers':
      return messages.receiversLimit;
    case 'already-sender':
    case 'in-progress':
      return messages.anotherSender;
  }
}

export function receiverRejection(reason: RejectReason, path: string): string {
  switch (reason) {
    case 'reserved-path':
      return messages.reservedReceive;
    case 'mismatched-n':
      return messages.mismatchedN;
    case 'too-many-receivers':
      return messages.receiversLimit;
    case 'already-sender':
      return messages.anotherSender;
    case 'in-progress':
      return messages.established(path);
  }
}
