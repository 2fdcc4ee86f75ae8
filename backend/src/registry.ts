import { isReservedPath } from './reserved';
import type {
  PathSlot,
  ReceiverHandle,
  ReceiverRegistration,
  SenderHandle,
  SenderRegistration,
} from './types';

function statedCount(receivers: ReceiverHandle[]): number | null {
  return receivers.find((r) => r.requested !== null)?.requested ?? null;
}

/**
 * Who is currently registered on which path.
 *
 * Every method runs to completion synchronously, so a read-modify-write of a
 * slot is never interleaved with another registration. The registry keeps
 * handles only; bodies never pass through it.
 */
export class PathRegistry {
  private readonly slots = new Map<string, PathSlot>();

  get size(): number {
    return this.slots.size;
  }

  get(path: string): PathSlot | undefined {
    return this.slots.get(path);
  }

  registerSender(path: string, sender: SenderHandle, n: number): SenderRegistration {
    if (isReservedPath(path)) return { type: 'reject', reason: 'reserved-path' };

    const slot = this.slots.get(path);
    if (slot === undefined) {
      this.slots.set(path, { kind: 'sender-waiting', sender, expected: n, receivers: [] });
      return { type: 'wait', connected: 0 };
    }

    switch (slot.kind) {
      case 'sender-waiting':
        return { type: 'reject', reason: 'already-sender' };
      case 'in-progress':
        return { type: 'reject', reason: 'in-progress' };
      case 'receiver-waiting': {
        if ((slot.expected !== null && slot.expected !== n) || slot.receivers.length > n) {
          return { type: 'reject', reason: 'mismatched-n' };
        }
        if (slot.receivers.length === n) {
          this.slots.set(path, { kind: 'in-progress', expected: n });
          return { type: 'commit', receivers: slot.receivers };
        }
        this.slots.set(path, {
          kind: 'sender-waiting',
          sender,
          expected: n,
          receivers: slot.receivers,
        });
        return { type: 'wait', connected: slot.receivers.length };
      }
    }
  }

  /**
   * A receiver that did not pass `n` joins whatever count the sender or the
   * other receivers asked for.
   */
  registerReceiver(path: string, receiver: ReceiverHandle): ReceiverRegistration {
    if (isReservedPath(path)) return { type: 'reject', reason: 'reserved-path' };

    const n = receiver.requested;
    const slot = this.slots.get(path);
    if (slot === undefined) {
      this.slots.set(path, { kind: 'receiver-waiting', receivers: [receiver], expected: n });
      return { type: 'wait', sender: null };
    }

    switch (slot.kind) {
      case 'in-progress':
        return { type: 'reject', reason: 'in-progress' };
      case 'receiver-waiting': {
        if (n !== null && slot.expected !== null && slot.expected !== n) {
          return { type: 'reject', reason: 'mismatched-n' };
        }
        const expected = slot.expected ?? n;
        if (expected !== null && slot.receivers.length >= expected) {
          return { type: 'reject', reason: 'too-many-receivers' };
        }
        slot.receivers.push(receiver);
        slot.expected = expected;
        return { type: 'wait', sender: null };
      }
      case 'sender-waiting': {
        if (n !== null && slot.expected !== n) return { type: 'reject', reason: 'mismatched-n' };
        const receivers = [...slot.receivers, receiver];
        if (receivers.length === slot.expected) {
          this.slots.set(path, { kind: 'in-progress', expected: slot.expected });
          return { type: 'commit', sender: slot.sender, receivers };
        }
        slot.receivers = receivers;
        return { type: 'wait', sender: slot.sender };
      }
    }
  }

  /**
   * Drops a sender that left before its pairing was committed.
   * Receivers that queued behind it keep waiting for the next sender.
   */
  unregisterSender(path: string, sender: SenderHandle): void {
    const slot = this.slots.get(path);
    if (slot?.kind !== 'sender-waiting' || slot.sender !== sender) return;

    if (slot.receivers.length === 0) {
      this.slots.delete(path);
    } else {
      this.slots.set(path, {
        kind: 'receiver-waiting',
        receivers: slot.receivers,
        expected: statedCount(slot.receivers),
      });
    }
  }

  /** Drops a receiver that left before its pairing was committed. */
  unregisterReceiver(path: string, receiver: ReceiverHandle): void {
    const slot = this.slots.get(path);
    if (slot === undefined || slot.kind === 'in-progress') return;

    const receivers = slot.receivers.filter((r) => r !== receiver);
    if (receivers.length === slot.receivers.length) return;

    if (slot.kind === 'sender-waiting') {
      slot.receivers = receivers;
    } else if (receivers.length === 0) {
      this.slots.delete(path);
    } else {
      slot.receivers = receivers;
      slot.expected = statedCount(receivers);
    }
  }

  release(path: string): void {
    this.slots.delete(path);
  }
}
