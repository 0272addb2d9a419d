/**
 * Alpaca Markets REST client
 *
 * Maps the host's account / position / order model onto Alpaca's Trading API
 * (https://docs.alpaca.markets/). All network I/O goes through the host HTTP
 * capability; one call here is one or two exchanges, never retried.
 *
 * Alpaca response format reference:
 * - Account: { id, account_number, status, currency, cash, equity, buying_power, ... }
 * - Position: { symbol, side, qty, avg_entry_price, current_price, unrealized_pl, unrealized_plpc, ... }
 * - Order: { id, client_order_id, symbol, side, type, qty, filled_qty, filled_avg_price, status, ... }
 *
 * Amounts come over as decimal strings. A field that doesn't parse becomes 0
 * rather than failing the call.
 */

import { randomBytes } from 'node:crypto';
import type { z } from 'zod';
import type { Logger } from '../../../../core/logger.js';
import { silentLogger } from '../../../../core/logger.js';
import {
  describeError,
  execute,
  isSuccess,
  parseJsonBody,
  type HostHttp,
  type HttpMethod,
  type HttpResponse,
} from '../../http.js';
import type {
  AccountSummary,
  Extensions,
  Order,
  OrderRequest,
  OrderSide,
  OrderStatus,
  OrderType,
  Position,
} from '../../models.js';
import { lookupOrderStatus } from './order-status.js';
import {
  alpacaAccountSchema,
  alpacaOrderSchema,
  alpacaPositionSchema,
  type AlpacaCreateOrderBody,
  type AlpacaOrderRaw,
} from './types.js';

export const LIVE_API_URL = 'https://api.alpaca.markets';
export const PAPER_API_URL = 'https://paper-api.alpaca.markets';
export const BROKER_ID = 'broker-alpaca';

const REQUEST_TIMEOUT_MS = 30_000;

export interface AlpacaClientConfig {
  apiKey: string;
  apiSecret: string;
  paper: boolean;
  host: HostHttp;
  logger?: Logger;
}

export class AlpacaApiError extends Error {
  constructor(
    public status: number,
    public detail: string,
  ) {
    super(`API error ${status}: ${detail}`);
    this.name = 'AlpacaApiError';
  }
}

// ==================== Field parsing ====================

const DECIMAL_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Decimal string -> finite number, or null when absent or malformed */
export function parseOptionalAmount(raw: string | null | undefined): number | null {
  if (raw == null || !DECIMAL_RE.test(raw)) return null;
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

/** Decimal string -> finite number, 0 when malformed */
export function parseAmount(raw: string | null | undefined): number {
  return parseOptionalAmount(raw) ?? 0;
}

const EXPONENT_RE = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;

/** Number -> plain decimal string, never exponent notation */
export function formatDecimal(value: number): string {
  const text = String(value);
  const match = EXPONENT_RE.exec(text);
  if (!match) return text;

  const [, sign, lead, fraction = '', exp] = match;
  const digits = lead + fraction;
  const exponent = Number(exp);
  if (exponent < 0) {
    return `${sign}0.${'0'.repeat(-exponent - 1)}${digits}`;
  }
  return `${sign}${digits.padEnd(exponent + 1, '0')}`;
}

const RFC3339_RE = /^(\d{4})-(\d{2})-(\d{2})[Tt ]\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:[Zz]|[+-]\d{2}:\d{2})$/;

function isCalendarDate(year: number, month: number, day: number): boolean {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

/** RFC 3339 -> ISO string; anything else reads as the current time */
export function parseTimestamp(raw: string): string {
  const match = RFC3339_RE.exec(raw);
  if (match && isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]))) {
    const date = new Date(raw.slice(0, 10) + 'T' + raw.slice(11).toUpperCase());
    if (!Number.isNaN(date.getTime())) return date.toISOString();
  }
  return new Date().toISOString();
}

// ==================== Enum tokens ====================

const SIDE_TOKENS: Record<OrderSide, AlpacaCreateOrderBody['side']> = {
  Buy: 'buy',
  Sell: 'sell',
};

const TYPE_TOKENS: Record<OrderType, AlpacaCreateOrderBody['type']> = {
  Market: 'market',
  Limit: 'limit',
  Stop: 'stop',
  StopLimit: 'stop_limit',
};

function orderTypeFromToken(token: string): OrderType {
  switch (token) {
    case 'limit':
      return 'Limit';
    case 'stop':
      return 'Stop';
    case 'stop_limit':
      return 'StopLimit';
    default:
      return 'Market';
  }
}

/** Idempotency token: "KL" + 64 random bits as lowercase hex */
export function generateClientOrderId(): string {
  return `KL${randomBytes(8).toString('hex')}`;
}

// ==================== Client ====================

export class AlpacaClient {
  readonly paper: boolean;
  readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly apiSecret: string;
  private readonly host: HostHttp;
  private readonly logger: Logger;

  constructor(config: AlpacaClientConfig) {
    this.apiKey = config.apiKey;
    this.apiSecret = config.apiSecret;
    this.paper = config.paper;
    this.baseUrl = config.paper ? PAPER_API_URL : LIVE_API_URL;
    this.host = config.host;
    this.logger = config.logger ?? silentLogger();
  }

  /** Account plus its positions. A positions failure leaves the list empty. */
  async getAccount(): Promise<AccountSummary> {
    const account = await this.apiGet('/v2/account', alpacaAccountSchema);

    let positions: Position[] = [];
    try {
      positions = await this.getPositions();
    } catch (err) {
      this.logger.warn({ err: describeError(err) }, 'positions unavailable, reporting account without them');
    }

    const extensions: Extensions = {
      account_id: account.id,
      status: account.status,
    };
    if (account.pattern_day_trader != null) {
      extensions.pattern_day_trader = account.pattern_day_trader;
    }
    if (account.daytrade_count != null) {
      extensions.daytrade_count = account.daytrade_count;
    }

    return {
      id: account.account_number,
      name: `Alpaca ${this.paper ? 'Paper' : 'Live'}`,
      broker_id: BROKER_ID,
      is_paper: this.paper,
      balance: {
        currency: account.currency,
        total_equity: parseAmount(account.equity),
        available_cash: parseAmount(account.cash),
        buying_power: parseAmount(account.buying_power),
        locked_cash: 0,
      },
      positions,
      updated_at: new Date().toISOString(),
      extensions,
    };
  }

  /** Alpaca has one account per key pair */
  async listAccounts(): Promise<AccountSummary[]> {
    return [await this.getAccount()];
  }

  async getPositions(): Promise<Position[]> {
    const positions = await this.apiGet('/v2/positions', alpacaPositionSchema.array());

    return positions.map((p) => {
      const direction = p.side === 'short' ? -1 : 1;
      return {
        symbol_id: p.symbol,
        quantity: parseAmount(p.qty) * direction,
        average_price: parseAmount(p.avg_entry_price),
        current_price: parseAmount(p.current_price),
        unrealized_pnl: parseAmount(p.unrealized_pl),
        unrealized_pnl_percent: parseAmount(p.unrealized_plpc) * 100,
      };
    });
  }

  async submitOrder(order: OrderRequest): Promise<Order> {
    const clientOrderId = generateClientOrderId();

    const body: AlpacaCreateOrderBody = {
      symbol: order.symbol_id,
      qty: formatDecimal(order.quantity),
      side: SIDE_TOKENS[order.side],
      type: TYPE_TOKENS[order.order_type],
      time_in_force: 'day',
      client_order_id: clientOrderId,
    };
    if (order.limit_price != null) {
      body.limit_price = formatDecimal(order.limit_price);
    }
    if (order.stop_price != null) {
      body.stop_price = formatDecimal(order.stop_price);
    }

    const resp = await this.apiPost('/v2/orders', body, alpacaOrderSchema);

    return {
      ...this.mapOrderState(resp),
      request: { ...order },
      extensions: {
        client_order_id: clientOrderId,
        alpaca_status: resp.status,
      },
      persona_id: order.persona_id,
    };
  }

  async cancelOrder(orderId: string): Promise<void> {
    await this.send('DELETE', `/v2/orders/${encodeURIComponent(orderId)}`, null);
  }

  /**
   * Fetch an order by id. The request is rebuilt from what Alpaca echoes back:
   * time in force, reference price and the persona are not recoverable.
   */
  async getOrder(orderId: string): Promise<Order> {
    const resp = await this.apiGet(`/v2/orders/${encodeURIComponent(orderId)}`, alpacaOrderSchema);

    return {
      ...this.mapOrderState(resp),
      request: {
        symbol_id: resp.symbol,
        quantity: parseAmount(resp.qty),
        side: resp.side === 'buy' ? 'Buy' : 'Sell',
        order_type: orderTypeFromToken(resp.type),
        limit_price: parseOptionalAmount(resp.limit_price),
        stop_price: parseOptionalAmount(resp.stop_price),
        reference_price: null,
        time_in_force: null,
        extensions: null,
        persona_id: '',
      },
      extensions: {
        client_order_id: resp.client_order_id,
        alpaca_status: resp.status,
      },
      persona_id: '',
    };
  }

  // ==================== Internal methods ====================

  private mapOrderState(resp: AlpacaOrderRaw) {
    return {
      id: resp.id,
      status: this.mapOrderStatus(resp.status),
      created_at: parseTimestamp(resp.created_at),
      updated_at: parseTimestamp(resp.updated_at),
      filled_quantity: parseAmount(resp.filled_qty),
      average_filled_price: parseOptionalAmount(resp.filled_avg_price),
    };
  }

  private mapOrderStatus(token: string): OrderStatus {
    const lookup = lookupOrderStatus(token);
    if (!lookup.known) {
      this.logger.warn({ token: lookup.token, fallback: lookup.status }, 'unknown Alpaca order status');
    }
    return lookup.status;
  }

  private defaultHeaders(): Record<string, string> {
    return {
      'Accept': 'application/json',
      'Content-Type': 'application/json',
      'APCA-API-KEY-ID': this.apiKey,
      'APCA-API-SECRET-KEY': this.apiSecret,
    };
  }

  /** One exchange; non-2xx (including transport failure) throws AlpacaApiError */
  private async send(method: HttpMethod, path: string, body: string | null): Promise<HttpResponse> {
    const response = await execute(this.host, {
      method,
      url: `${this.baseUrl}${path}`,
      headers: this.defaultHeaders(),
      body,
      timeout_ms: REQUEST_TIMEOUT_MS,
    });

    if (!isSuccess(response)) {
      throw new AlpacaApiError(response.status, response.error ?? response.body);
    }
    return response;
  }

  private async apiGet<S extends z.ZodTypeAny>(path: string, schema: S): Promise<z.infer<S>> {
    return parseJsonBody(await this.send('GET', path, null), schema);
  }

  private async apiPost<S extends z.ZodTypeAny>(path: string, body: unknown, schema: S): Promise<z.infer<S>> {
    return parseJsonBody(await this.send('POST', path, JSON.stringify(body)), schema);
  }
}
