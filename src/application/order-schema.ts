import { z } from 'zod';
import { DecodeError, type OrderEvent } from '../domain/index.js';

/**
 * Inbound order body accepted by the HTTP boundary.
 *
 * Orders are free-form: any JSON object is accepted and forwarded as-is.
 * `order_status` is overwritten at admission, so it is not validated here.
 */
export const orderInputSchema = z
  .record(z.string(), z.unknown())
  .refine((body) => body['client_id'] === undefined || typeof body['client_id'] === 'string', {
    message: 'client_id must be a string',
    path: ['client_id'],
  });

export type OrderInput = z.infer<typeof orderInputSchema>;

/**
 * Shape every queue payload must satisfy before dispatch: a JSON object
 * carrying an `order_status` key. The value itself is not checked here;
 * the processor drops statuses it does not know, so only payloads that
 * cannot be an order at all are requeued.
 */
export const orderEventSchema = z
  .object({ order_status: z.unknown() })
  .passthrough()
  .refine((event) => event.order_status !== undefined, {
    message: 'Required',
    path: ['order_status'],
  });

/**
 * Decodes a raw queue body into an OrderEvent.
 *
 * @throws DecodeError when the body is not UTF-8 JSON, not an object, or
 *   lacks `order_status`.
 */
export function decodeOrderEvent(body: Buffer): OrderEvent {
  let raw: unknown;
  try {
    raw = JSON.parse(body.toString('utf-8'));
  } catch (err: unknown) {
    throw new DecodeError('Payload is not valid JSON', { cause: err });
  }

  const parsed = orderEventSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join(', ');
    throw new DecodeError(`Payload is not an order event (${detail})`);
  }

  return { ...parsed.data, order_status: parsed.data.order_status };
}
