import type { OrderStatus } from '../../models.js';

/**
 * Upstream order status token -> host status.
 *
 * `rejected` collapses into Canceled alongside `canceled` and `expired`, so
 * the host cannot tell a broker rejection from a cancellation. The host's
 * Rejected status is only produced locally, for orders that never reached
 * the broker.
 */
export const ALPACA_ORDER_STATUS: Readonly<Record<string, OrderStatus>> = Object.freeze({
  new: 'Submitted',
  accepted: 'Submitted',
  pending_new: 'Submitted',
  partially_filled: 'PartiallyFilled',
  filled: 'Filled',
  canceled: 'Canceled',
  expired: 'Canceled',
  rejected: 'Canceled',
});

/** Status reported for tokens missing from the table */
export const UNKNOWN_STATUS_FALLBACK: OrderStatus = 'Submitted';

export type StatusLookup =
  | { known: true; status: OrderStatus }
  | { known: false; status: OrderStatus; token: string };

export function lookupOrderStatus(token: string): StatusLookup {
  if (Object.prototype.hasOwnProperty.call(ALPACA_ORDER_STATUS, token)) {
    return { known: true, status: ALPACA_ORDER_STATUS[token] };
  }
  return { known: false, status: UNKNOWN_STATUS_FALLBACK, token };
}
