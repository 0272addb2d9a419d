import { describe, it, expect } from 'vitest';
import { BrokerContext } from '../context.js';
import { AlpacaClient } from '../providers/alpaca/AlpacaClient.js';
import type { Order } from '../models.js';
import { fakeHost, limitBuy } from './fixtures.js';

function deferred() {
  let resolve!: () => void;
  const promise = new Promise<void>((r) => { resolve = r; });
  return { promise, resolve };
}

function client(paper: boolean): AlpacaClient {
  return new AlpacaClient({ apiKey: 'test-key', apiSecret: 'test-secret', paper, host: fakeHost([]).host });
}

describe('BrokerContext', () => {
  it('starts without a client', () => {
    const ctx = new BrokerContext();
    expect(ctx.client).toBeNull();
    expect(ctx.isReady).toBe(false);
    expect(ctx.orders.size).toBe(0);
  });

  it('replaces the client wholesale', () => {
    const ctx = new BrokerContext();
    const paper = client(true);
    const live = client(false);

    ctx.installClient(paper);
    expect(ctx.client).toBe(paper);

    ctx.installClient(live);
    expect(ctx.client).toBe(live);
    expect(ctx.isReady).toBe(true);
  });

  it('records orders by id, keeping the latest snapshot', () => {
    const ctx = new BrokerContext();
    const order: Order = {
      id: 'ord-1',
      request: limitBuy(),
      status: 'Submitted',
      created_at: '2024-03-01T14:30:00.000Z',
      updated_at: '2024-03-01T14:30:00.000Z',
      filled_quantity: 0,
      average_filled_price: null,
      extensions: null,
      persona_id: 'persona-7',
    };

    ctx.recordOrder(order);
    ctx.recordOrder({ ...order, status: 'Filled', filled_quantity: 10 });

    expect(ctx.orders.size).toBe(1);
    expect(ctx.orders.get('ord-1')?.status).toBe('Filled');
  });

  describe('withLock', () => {
    it('runs one holder at a time, in arrival order', async () => {
      const ctx = new BrokerContext();
      const gate = deferred();
      const events: string[] = [];

      const first = ctx.withLock(async () => {
        events.push('first:start');
        await gate.promise;
        events.push('first:end');
        return 1;
      });
      const second = ctx.withLock(async () => {
        events.push('second:start');
        return 2;
      });

      await Promise.resolve();
      expect(events).toEqual(['first:start']);

      gate.resolve();
      expect(await Promise.all([first, second])).toEqual([1, 2]);
      expect(events).toEqual(['first:start', 'first:end', 'second:start']);
    });

    it('releases the lock when the holder throws', async () => {
      const ctx = new BrokerContext();

      const failed = ctx.withLock(async () => {
        throw new Error('holder failed');
      });
      const next = ctx.withLock(async (c) => c.isReady);

      await expect(failed).rejects.toThrow('holder failed');
      await expect(next).resolves.toBe(false);
    });
  });
});
