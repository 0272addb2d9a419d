/**
 * Alpaca REST wire shapes
 *
 * Only the fields the adapter consumes. Amounts and quantities arrive as
 * decimal strings and are left as strings here; parsing happens in the client.
 * Unknown fields are dropped on decode.
 */

import { z } from 'zod';

/** GET /v2/account */
export const alpacaAccountSchema = z.object({
  id: z.string(),
  account_number: z.string(),
  status: z.string(),
  currency: z.string(),
  cash: z.string(),
  portfolio_value: z.string(),
  buying_power: z.string(),
  equity: z.string(),
  last_equity: z.string(),
  daytrade_count: z.number().int().nullish(),
  pattern_day_trader: z.boolean().nullish(),
});

/** GET /v2/positions (array of these) */
export const alpacaPositionSchema = z.object({
  symbol: z.string(),
  qty: z.string(),
  avg_entry_price: z.string(),
  current_price: z.string(),
  market_value: z.string(),
  unrealized_pl: z.string(),
  unrealized_plpc: z.string(),
  side: z.string(),
});

/** POST /v2/orders and GET /v2/orders/{id} */
export const alpacaOrderSchema = z.object({
  id: z.string(),
  client_order_id: z.string(),
  status: z.string(),
  symbol: z.string(),
  qty: z.string(),
  side: z.string(),
  type: z.string(),
  filled_qty: z.string(),
  filled_avg_price: z.string().nullish(),
  limit_price: z.string().nullish(),
  stop_price: z.string().nullish(),
  created_at: z.string(),
  updated_at: z.string(),
});

export type AlpacaOrderRaw = z.infer<typeof alpacaOrderSchema>;

/** POST /v2/orders body */
export interface AlpacaCreateOrderBody {
  symbol: string;
  qty: string;
  side: 'buy' | 'sell';
  type: 'market' | 'limit' | 'stop' | 'stop_limit';
  time_in_force: 'day';
  limit_price?: string;
  stop_price?: string;
  client_order_id: string;
}
