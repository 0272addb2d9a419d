/**
 * Broker context
 *
 * State shared by the entry points of one plugin instance: the configured
 * client (absent until a successful initialize) and the cache of submitted
 * orders. Owned by whoever creates the plugin and passed in explicitly.
 */

import type { Order } from './models.js';
import type { AlpacaClient } from './providers/alpaca/AlpacaClient.js';

export class BrokerContext {
  private lock = Promise.resolve();
  private _client: AlpacaClient | null = null;
  private readonly _orders = new Map<string, Order>();

  get client(): AlpacaClient | null {
    return this._client;
  }

  get isReady(): boolean {
    return this._client !== null;
  }

  /** Last-known snapshot of every order submitted through this context, by broker id */
  get orders(): ReadonlyMap<string, Order> {
    return this._orders;
  }

  /** Replace the client wholesale. Clients are never modified in place. */
  installClient(client: AlpacaClient): void {
    this._client = client;
  }

  recordOrder(order: Order): void {
    this._orders.set(order.id, order);
  }

  /**
   * Serialize access: one entry point holds the context at a time. The lock
   * is released whether `fn` resolves or throws.
   */
  async withLock<T>(fn: (ctx: BrokerContext) => Promise<T>): Promise<T> {
    const prev = this.lock;
    let release!: () => void;
    this.lock = new Promise<void>((r) => { release = r; });
    await prev;
    try {
      return await fn(this);
    } finally {
      release();
    }
  }
}
