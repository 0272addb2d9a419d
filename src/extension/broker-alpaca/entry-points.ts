/**
 * Plugin entry points
 *
 * The five functions the host calls. Each takes a JSON-encoded request and
 * answers with a JSON-encoded response. Broker failures and a missing
 * configuration never reject: they come back as error-flagged payloads (an
 * "Error: ..." account, an empty position list, a Rejected order) and are
 * logged. Only a request the host encoded wrongly rejects, with
 * PluginContractError.
 */

import type { z } from 'zod';
import type { Logger } from '../../core/logger.js';
import { silentLogger } from '../../core/logger.js';
import { BrokerContext } from './context.js';
import { describeError, type HostHttp } from './http.js';
import type { AccountSummary, Order, OrderRequest } from './models.js';
import {
  cancelOrderRequestSchema,
  emptyRequestSchema,
  initializeRequestSchema,
  submitOrderRequestSchema,
  type CancelOrderResponse,
  type EntryPointName,
  type GetAccountsResponse,
  type GetPositionsResponse,
  type InitializeResponse,
  type SubmitOrderResponse,
} from './protocol.js';
import { AlpacaClient, BROKER_ID } from './providers/alpaca/AlpacaClient.js';

export type EntryPoint = (request: Uint8Array) => Promise<Uint8Array>;

export type BrokerPlugin = Record<EntryPointName, EntryPoint>;

export interface BrokerPluginOptions {
  /** HTTP capability every client created by initialize will use */
  host: HostHttp;
  /** Defaults to a fresh context owned by this plugin */
  context?: BrokerContext;
  logger?: Logger;
}

export class PluginContractError extends Error {
  constructor(
    public entryPoint: EntryPointName,
    public detail: string,
  ) {
    super(`Malformed ${entryPoint} request: ${detail}`);
    this.name = 'PluginContractError';
  }
}

const NOT_INITIALIZED = 'Plugin not initialized';
const NOT_INITIALIZED_ACCOUNT = 'Plugin not initialized. Provide api_key and api_secret.';
const MISSING_CREDENTIALS = 'Missing required configuration: api_key and api_secret';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

// ==================== Codec ====================

function decodeRequest<S extends z.ZodTypeAny>(
  entryPoint: EntryPointName,
  request: Uint8Array,
  schema: S,
): z.infer<S> {
  const text = decoder.decode(request);
  let raw: unknown;
  try {
    raw = text.trim() === '' ? {} : JSON.parse(text);
  } catch (err) {
    throw new PluginContractError(entryPoint, describeError(err));
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new PluginContractError(entryPoint, describeError(parsed.error));
  }
  return parsed.data;
}

function encodeResponse(response: unknown): Uint8Array {
  return encoder.encode(JSON.stringify(response));
}

// ==================== Error payloads ====================

export function createErrorAccount(error: string): AccountSummary {
  return {
    id: 'error',
    name: `Error: ${error}`,
    broker_id: BROKER_ID,
    is_paper: true,
    balance: {
      currency: 'USD',
      total_equity: 0,
      available_cash: 0,
      buying_power: 0,
      locked_cash: 0,
    },
    positions: [],
    updated_at: new Date().toISOString(),
    extensions: null,
  };
}

export function createErrorOrder(request: OrderRequest, error: string): Order {
  const now = new Date();
  return {
    id: `error_${now.getTime()}`,
    request,
    status: 'Rejected',
    created_at: now.toISOString(),
    updated_at: now.toISOString(),
    filled_quantity: 0,
    average_filled_price: null,
    extensions: { error },
    persona_id: request.persona_id,
  };
}

// ==================== Plugin ====================

export function createBrokerPlugin(options: BrokerPluginOptions): BrokerPlugin {
  const context = options.context ?? new BrokerContext();
  const logger = options.logger ?? silentLogger();

  return {
    initialize: async (request) => {
      const req = decodeRequest('initialize', request, initializeRequestSchema);

      const response = await context.withLock(async (ctx): Promise<InitializeResponse> => {
        const paper = req.is_paper ?? true;

        if (!req.api_key || !req.api_secret) {
          logger.warn('initialize rejected: api_key and api_secret are required');
          return { success: false, error: MISSING_CREDENTIALS, requires_auth: true };
        }

        ctx.installClient(new AlpacaClient({
          apiKey: req.api_key,
          apiSecret: req.api_secret,
          paper,
          host: options.host,
          logger,
        }));
        logger.info({ paper }, 'client configured');

        return {
          success: true,
          message: `Alpaca plugin initialized (${paper ? 'paper' : 'live'})`,
        };
      });

      return encodeResponse(response);
    },

    get_accounts: async (request) => {
      decodeRequest('get_accounts', request, emptyRequestSchema);

      const response = await context.withLock(async ({ client }): Promise<GetAccountsResponse> => {
        if (!client) {
          return { accounts: [createErrorAccount(NOT_INITIALIZED_ACCOUNT)] };
        }

        try {
          return { accounts: await client.listAccounts() };
        } catch (err) {
          const error = describeError(err);
          logger.warn({ err: error }, 'failed to fetch accounts');
          return { accounts: [createErrorAccount(error)] };
        }
      });

      return encodeResponse(response);
    },

    get_positions: async (request) => {
      decodeRequest('get_positions', request, emptyRequestSchema);

      const response = await context.withLock(async ({ client }): Promise<GetPositionsResponse> => {
        if (!client) return { positions: [] };

        try {
          return { positions: await client.getPositions() };
        } catch (err) {
          logger.warn({ err: describeError(err) }, 'failed to fetch positions');
          return { positions: [] };
        }
      });

      return encodeResponse(response);
    },

    submit_order: async (request) => {
      const req = decodeRequest('submit_order', request, submitOrderRequestSchema);

      const response = await context.withLock(async (ctx): Promise<SubmitOrderResponse> => {
        const client = ctx.client;
        if (!client) {
          return { order: createErrorOrder(req.order, NOT_INITIALIZED) };
        }

        try {
          const placed = await client.submitOrder(req.order);
          const order = placed.persona_id === ''
            ? { ...placed, persona_id: req.order.persona_id }
            : placed;
          ctx.recordOrder(order);
          logger.info({ orderId: order.id, status: order.status }, 'order submitted');
          return { order };
        } catch (err) {
          const error = describeError(err);
          logger.warn({ err: error, symbol: req.order.symbol_id }, 'order failed');
          return { order: createErrorOrder(req.order, error) };
        }
      });

      return encodeResponse(response);
    },

    cancel_order: async (request) => {
      const req = decodeRequest('cancel_order', request, cancelOrderRequestSchema);

      const response = await context.withLock(async ({ client }): Promise<CancelOrderResponse> => {
        if (!client) return { success: false, error: NOT_INITIALIZED };

        try {
          await client.cancelOrder(req.order_id);
          return { success: true, order_id: req.order_id };
        } catch (err) {
          const error = describeError(err);
          logger.warn({ err: error, orderId: req.order_id }, 'cancel failed');
          return { success: false, error };
        }
      });

      return encodeResponse(response);
    },
  };
}
