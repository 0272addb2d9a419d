import { vi } from 'vitest';
import { httpRequestSchema, type HostHttp, type HttpRequest } from '../http.js';
import type { OrderRequest } from '../models.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export interface CannedReply {
  status: number;
  /** Serialized with JSON.stringify unless already a string */
  body?: unknown;
  error?: string;
}

/**
 * In-process stand-in for the host HTTP capability. Replies are consumed in
 * order; every request the plugin makes is decoded into `requests`.
 */
export function fakeHost(replies: CannedReply[]) {
  const queue = [...replies];
  const requests: HttpRequest[] = [];

  const host = vi.fn<HostHttp>(async (payload) => {
    requests.push(httpRequestSchema.parse(JSON.parse(decoder.decode(payload))));
    const next = queue.shift();
    if (!next) throw new Error('no canned reply left');
    return encoder.encode(JSON.stringify({
      status: next.status,
      headers: {},
      body: typeof next.body === 'string' ? next.body : JSON.stringify(next.body ?? null),
      error: next.error ?? null,
    }));
  });

  return { host, requests };
}

export function ok(body: unknown): CannedReply {
  return { status: 200, body };
}

export function encodeJson(value: unknown): Uint8Array {
  return encoder.encode(JSON.stringify(value));
}

export function decodeJson(bytes: Uint8Array): unknown {
  return JSON.parse(decoder.decode(bytes));
}

// ==================== Alpaca payloads ====================

export const ACCOUNT_RAW = {
  id: 'acct-uuid-1',
  account_number: 'PA100200',
  status: 'ACTIVE',
  currency: 'USD',
  cash: '1000.5',
  portfolio_value: '5000',
  buying_power: '2000',
  equity: '5000.25',
  last_equity: '4900',
  daytrade_count: 2,
  pattern_day_trader: false,
  shorting_enabled: true,
};

export const LONG_POSITION_RAW = {
  symbol: 'AAPL',
  qty: '10',
  avg_entry_price: '150',
  current_price: '160',
  market_value: '1600',
  unrealized_pl: '100',
  unrealized_plpc: '0.25',
  side: 'long',
};

export const SHORT_POSITION_RAW = {
  symbol: 'TSLA',
  qty: '10',
  avg_entry_price: '200',
  current_price: '190',
  market_value: '-1900',
  unrealized_pl: '100',
  unrealized_plpc: '0.5',
  side: 'short',
};

export function orderRaw(overrides: Record<string, unknown> = {}) {
  return {
    id: 'ord-1',
    client_order_id: 'echoed-id',
    status: 'new',
    symbol: 'AAPL',
    qty: '10',
    side: 'buy',
    type: 'limit',
    filled_qty: '0',
    filled_avg_price: null,
    limit_price: '101.5',
    stop_price: null,
    created_at: '2024-03-01T14:30:00Z',
    updated_at: '2024-03-01T14:30:01.5Z',
    ...overrides,
  };
}

export function limitBuy(overrides: Partial<OrderRequest> = {}): OrderRequest {
  return {
    symbol_id: 'AAPL',
    quantity: 10,
    side: 'Buy',
    order_type: 'Limit',
    limit_price: 101.5,
    persona_id: 'persona-7',
    ...overrides,
  };
}
