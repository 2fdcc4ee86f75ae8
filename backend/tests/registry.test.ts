import { IncomingMessage, ServerResponse } from 'http';
import { Socket } from 'net';
import { PathRegistry } from '../src/registry';
import { ResponseSender } from '../src/response-sender';
import { Transfer } from '../src/transfer';
import type { ReceiverHandle, SenderHandle } from '../src/types';

let nextId = 1;

function sender(): SenderHandle {
  const res = new ServerResponse(new IncomingMessage(new Socket()));
  return { id: nextId++, response: new ResponseSender(res), pairing: new Transfer() };
}

function receiver(requested: number | null = null): ReceiverHandle {
  return {
    id: nextId++,
    method: 'GET',
    requested,
    transfer: new Transfer(),
    completion: Promise.resolve(true),
    complete: () => undefined,
  };
}

describe('PathRegistry', () => {
  let registry: PathRegistry;

  beforeEach(() => {
    registry = new PathRegistry();
  });

  describe('sender first', () => {
    it('waits for receivers', () => {
      const s = sender();
      expect(registry.registerSender('/a', s, 1)).toEqual({ type: 'wait', connected: 0 });
      expect(registry.get('/a')).toEqual({ kind: 'sender-waiting', sender: s, expected: 1, receivers: [] });
    });

    it('commits when the last expected receiver arrives', () => {
      const s = sender();
      const r1 = receiver();
      const r2 = receiver();
      registry.registerSender('/a', s, 2);

      expect(registry.registerReceiver('/a', r1)).toEqual({ type: 'wait', sender: s });
      expect(registry.registerReceiver('/a', r2)).toEqual({ type: 'commit', sender: s, receivers: [r1, r2] });
      expect(registry.get('/a')).toEqual({ kind: 'in-progress', expected: 2 });
    });

    it('rejects a second sender', () => {
      registry.registerSender('/a', sender(), 1);
      expect(registry.registerSender('/a', sender(), 1)).toEqual({ type: 'reject', reason: 'already-sender' });
    });

    it('rejects a receiver asking for another count', () => {
      registry.registerSender('/a', sender(), 2);
      expect(registry.registerReceiver('/a', receiver(3))).toEqual({ type: 'reject', reason: 'mismatched-n' });
      expect(registry.registerReceiver('/a', receiver(2))).toMatchObject({ type: 'wait' });
    });
  });

  describe('receivers first', () => {
    it('commits when the sender arrives', () => {
      const r = receiver();
      expect(registry.registerReceiver('/a', r)).toEqual({ type: 'wait', sender: null });
      expect(registry.registerSender('/a', sender(), 1)).toEqual({ type: 'commit', receivers: [r] });
      expect(registry.get('/a')?.kind).toBe('in-progress');
    });

    it('lets the sender wait when fewer receivers are queued than it expects', () => {
      const r = receiver();
      const s = sender();
      registry.registerReceiver('/a', r);
      expect(registry.registerSender('/a', s, 3)).toEqual({ type: 'wait', connected: 1 });
      expect(registry.get('/a')).toEqual({ kind: 'sender-waiting', sender: s, expected: 3, receivers: [r] });
    });

    it('rejects a sender whose count disagrees with the receivers', () => {
      const r = receiver(2);
      registry.registerReceiver('/a', r);
      expect(registry.registerSender('/a', sender(), 3)).toEqual({ type: 'reject', reason: 'mismatched-n' });
      expect(registry.get('/a')).toEqual({ kind: 'receiver-waiting', receivers: [r], expected: 2 });
    });

    it('rejects a sender expecting fewer receivers than are queued', () => {
      registry.registerReceiver('/a', receiver());
      registry.registerReceiver('/a', receiver());
      registry.registerReceiver('/a', receiver());
      expect(registry.registerSender('/a', sender(), 2)).toEqual({ type: 'reject', reason: 'mismatched-n' });
    });

    it('rejects receivers beyond the stated count', () => {
      registry.registerReceiver('/a', receiver(1));
      expect(registry.registerReceiver('/a', receiver())).toEqual({ type: 'reject', reason: 'too-many-receivers' });
      expect(registry.registerReceiver('/a', receiver(1))).toEqual({
        type: 'reject',
        reason: 'too-many-receivers',
      });
    });

    it('fixes the count from the first receiver that states one', () => {
      registry.registerReceiver('/a', receiver());
      registry.registerReceiver('/a', receiver(2));
      expect(registry.get('/a')).toMatchObject({ kind: 'receiver-waiting', expected: 2 });
      expect(registry.registerReceiver('/a', receiver())).toEqual({ type: 'reject', reason: 'too-many-receivers' });
    });

    it('rejects receivers stating different counts', () => {
      registry.registerReceiver('/a', receiver(2));
      expect(registry.registerReceiver('/a', receiver(3))).toEqual({ type: 'reject', reason: 'mismatched-n' });
    });
  });

  it('refuses everything while a transfer is in progress', () => {
    registry.registerSender('/a', sender(), 1);
    registry.registerReceiver('/a', receiver());
    expect(registry.registerSender('/a', sender(), 1)).toEqual({ type: 'reject', reason: 'in-progress' });
    expect(registry.registerReceiver('/a', receiver())).toEqual({ type: 'reject', reason: 'in-progress' });
  });

  it('refuses reserved paths', () => {
    expect(registry.registerSender('/help', sender(), 1)).toEqual({ type: 'reject', reason: 'reserved-path' });
    expect(registry.registerReceiver('/', receiver())).toEqual({ type: 'reject', reason: 'reserved-path' });
    expect(registry.size).toBe(0);
  });

  it('treats trailing-slash and case variants as distinct paths', () => {
    registry.registerSender('/a', sender(), 1);
    expect(registry.registerSender('/a/', sender(), 1)).toEqual({ type: 'wait', connected: 0 });
    expect(registry.registerSender('/A', sender(), 1)).toEqual({ type: 'wait', connected: 0 });
    expect(registry.registerSender('/help/', sender(), 1)).toEqual({ type: 'wait', connected: 0 });
    expect(registry.size).toBe(4);
  });

  it('makes the path reusable after release', () => {
    registry.registerSender('/a', sender(), 1);
    registry.registerReceiver('/a', receiver());
    registry.release('/a');

    expect(registry.get('/a')).toBeUndefined();
    expect(registry.registerReceiver('/a', receiver())).toEqual({ type: 'wait', sender: null });
  });

  describe('unregister', () => {
    it('removes a lone waiting sender', () => {
      const s = sender();
      registry.registerSender('/a', s, 1);
      registry.unregisterSender('/a', s);
      expect(registry.get('/a')).toBeUndefined();
    });

    it('leaves queued receivers waiting when the sender leaves', () => {
      const s = sender();
      const r1 = receiver();
      const r2 = receiver(3);
      registry.registerSender('/a', s, 3);
      registry.registerReceiver('/a', r1);
      registry.registerReceiver('/a', r2);
      registry.unregisterSender('/a', s);

      expect(registry.get('/a')).toEqual({ kind: 'receiver-waiting', receivers: [r1, r2], expected: 3 });
    });

    it('forgets the sender count when no queued receiver stated one', () => {
      const s = sender();
      const r = receiver();
      registry.registerSender('/a', s, 2);
      registry.registerReceiver('/a', r);
      registry.unregisterSender('/a', s);

      expect(registry.get('/a')).toEqual({ kind: 'receiver-waiting', receivers: [r], expected: null });
    });

    it('ignores a sender that is not the registered one', () => {
      const s = sender();
      registry.registerSender('/a', s, 1);
      registry.unregisterSender('/a', sender());
      expect(registry.get('/a')).toMatchObject({ kind: 'sender-waiting', sender: s });
    });

    it('removes a waiting receiver and deletes the emptied slot', () => {
      const r1 = receiver();
      const r2 = receiver();
      registry.registerReceiver('/a', r1);
      registry.registerReceiver('/a', r2);

      registry.unregisterReceiver('/a', r1);
      expect(registry.get('/a')).toEqual({ kind: 'receiver-waiting', receivers: [r2], expected: null });

      registry.unregisterReceiver('/a', r2);
      expect(registry.get('/a')).toBeUndefined();
    });

    it('keeps the sender when one of its receivers leaves', () => {
      const s = sender();
      const r = receiver();
      registry.registerSender('/a', s, 2);
      registry.registerReceiver('/a', r);
      registry.unregisterReceiver('/a', r);

      expect(registry.get('/a')).toEqual({ kind: 'sender-waiting', sender: s, expected: 2, receivers: [] });
    });

    it('does not touch a transfer in progress', () => {
      const s = sender();
      const r = receiver();
      registry.registerSender('/a', s, 1);
      registry.registerReceiver('/a', r);

      registry.unregisterSender('/a', s);
      registry.unregisterReceiver('/a', r);
      expect(registry.get('/a')).toEqual({ kind: 'in-progress', expected: 1 });
    });
  });
});
