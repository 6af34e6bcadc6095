/**
 * Core domain types for the order pipeline.
 *
 * An order travels through the queue as a free-form JSON object. Only
 * `order_status` is interpreted; every other field passes through untouched.
 */

export const ORDER_STATUSES = [
  'ORDERED',
  'PREPARING',
  'PREPARED',
  'DELIVERED',
  'CANCELLED',
] as const;

export type OrderStatus = (typeof ORDER_STATUSES)[number];

/**
 * Canonical order event as carried on the wire.
 *
 * `order_status` is always present but may hold anything a producer wrote;
 * {@link isOrderStatus} decides whether it is actionable. `client_id` names
 * the live connection that should hear about this order. It is stamped at
 * admission; events without a usable one route to the default client.
 */
export interface OrderEvent {
  readonly order_status: unknown;
  readonly [field: string]: unknown;
}

export function isOrderStatus(value: unknown): value is OrderStatus {
  return ORDER_STATUSES.some((status) => status === value);
}

/** Returns a copy of `event` carrying the new status. The input is not mutated. */
export function withStatus(event: OrderEvent, status: OrderStatus): OrderEvent {
  return { ...event, order_status: status };
}

/** The event's `client_id` when it is a non-empty string. */
export function clientIdOf(event: OrderEvent): string | undefined {
  const id = event['client_id'];
  return typeof id === 'string' && id !== '' ? id : undefined;
}
