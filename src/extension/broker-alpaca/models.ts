/**
 * Host platform models
 *
 * Account / position / order shapes exchanged with the host over the plugin
 * boundary. Keys are snake_case and enums travel as their variant names,
 * matching the host's JSON encoding.
 */

import { z } from 'zod';

// ==================== Extensions ====================

export type ExtensionValue = string | number | boolean;

/** Broker-specific metadata the adapter attaches to accounts and orders */
export type Extensions = Record<string, ExtensionValue>;

/** Host-supplied order metadata: arbitrary JSON, passed through untouched */
export const requestExtensionsSchema = z.record(z.string(), z.unknown());

// ==================== Enums ====================

export const orderSideSchema = z.enum(['Buy', 'Sell']);
export type OrderSide = z.infer<typeof orderSideSchema>;

export const orderTypeSchema = z.enum(['Market', 'Limit', 'Stop', 'StopLimit']);
export type OrderType = z.infer<typeof orderTypeSchema>;

export type OrderStatus =
  | 'Submitted'
  | 'PartiallyFilled'
  | 'Filled'
  | 'Canceled'
  | 'Rejected';

// ==================== Portfolio ====================

export interface AccountBalance {
  currency: string;
  total_equity: number;
  available_cash: number;
  buying_power: number;
  locked_cash: number;
}

export interface Position {
  symbol_id: string;
  /** Negative for short positions */
  quantity: number;
  average_price: number;
  current_price: number;
  unrealized_pnl: number;
  unrealized_pnl_percent: number;
}

export interface AccountSummary {
  id: string;
  name: string;
  broker_id: string;
  is_paper: boolean;
  balance: AccountBalance;
  positions: Position[];
  /** RFC 3339 */
  updated_at: string;
  extensions: Extensions | null;
}

// ==================== Orders ====================

export const orderRequestSchema = z.object({
  symbol_id: z.string(),
  quantity: z.number(),
  side: orderSideSchema,
  order_type: orderTypeSchema,
  limit_price: z.number().nullish(),
  stop_price: z.number().nullish(),
  reference_price: z.number().nullish(),
  time_in_force: z.string().nullish(),
  extensions: requestExtensionsSchema.nullish(),
  persona_id: z.string(),
});

export type OrderRequest = z.infer<typeof orderRequestSchema>;

export interface Order {
  id: string;
  request: OrderRequest;
  status: OrderStatus;
  created_at: string;
  updated_at: string;
  filled_quantity: number;
  average_filled_price: number | null;
  extensions: Extensions | null;
  persona_id: string;
}
