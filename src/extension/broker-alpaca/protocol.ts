/**
 * Plugin boundary protocol
 *
 * Request and response payloads for each entry point. Requests are decoded
 * with zod; a payload that doesn't match is a host-side contract violation.
 */

import { z } from 'zod';
import type { AccountSummary, Order, Position } from './models.js';
import { orderRequestSchema } from './models.js';

export const ENTRY_POINTS = [
  'initialize',
  'get_accounts',
  'get_positions',
  'submit_order',
  'cancel_order',
] as const;

export type EntryPointName = (typeof ENTRY_POINTS)[number];

export function isEntryPointName(name: string): name is EntryPointName {
  return ENTRY_POINTS.some((entry) => entry === name);
}

// ==================== Requests ====================

/** Fields of the wrong type read as missing rather than failing the decode */
export const initializeRequestSchema = z.object({
  api_key: z.string().optional().catch(undefined),
  api_secret: z.string().optional().catch(undefined),
  is_paper: z.boolean().optional().catch(undefined),
});

/** get_accounts / get_positions take no parameters; any payload is accepted */
export const emptyRequestSchema = z.unknown();

export const submitOrderRequestSchema = z.object({
  order: orderRequestSchema,
});

export const cancelOrderRequestSchema = z.object({
  order_id: z.string(),
});

export type InitializeRequest = z.infer<typeof initializeRequestSchema>;
export type SubmitOrderRequest = z.infer<typeof submitOrderRequestSchema>;
export type CancelOrderRequest = z.infer<typeof cancelOrderRequestSchema>;

// ==================== Responses ====================

export type InitializeResponse =
  | { success: true; message: string }
  | { success: false; error: string; requires_auth: true };

export interface GetAccountsResponse {
  accounts: AccountSummary[];
}

export interface GetPositionsResponse {
  positions: Position[];
}

export interface SubmitOrderResponse {
  order: Order;
}

export type CancelOrderResponse =
  | { success: true; order_id: string }
  | { success: false; error: string };
