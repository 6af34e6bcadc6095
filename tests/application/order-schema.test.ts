import { describe, it, expect } from 'vitest';
import { decodeOrderEvent, orderInputSchema } from '../../src/application/order-schema.js';
import { DecodeError } from '../../src/domain/index.js';

describe('decodeOrderEvent', () => {
  it('decodes an order and keeps free-form fields', () => {
    const event = decodeOrderEvent(
      Buffer.from('{"order_no":42,"order_status":"ORDERED","items":["margherita"]}'),
    );

    expect(event).toEqual({ order_no: 42, order_status: 'ORDERED', items: ['margherita'] });
  });

  it('keeps a string client_id', () => {
    const event = decodeOrderEvent(Buffer.from('{"order_status":"PREPARED","client_id":"table-7"}'));
    expect(event.client_id).toBe('table-7');
  });

  it('accepts unknown status strings (the processor decides what to do)', () => {
    const event = decodeOrderEvent(Buffer.from('{"order_status":"REFUNDED"}'));
    expect(event.order_status).toBe('REFUNDED');
  });

  it('rejects invalid JSON', () => {
    expect(() => decodeOrderEvent(Buffer.from('{"order_status":'))).toThrow(DecodeError);
    expect(() => decodeOrderEvent(Buffer.from('{"order_status":'))).toThrow('Payload is not valid JSON');
  });

  it('rejects a JSON array', () => {
    expect(() => decodeOrderEvent(Buffer.from('[{"order_status":"ORDERED"}]'))).toThrow(DecodeError);
  });

  it('rejects a payload without order_status', () => {
    expect(() => decodeOrderEvent(Buffer.from('{"order_no":1}'))).toThrow(/order_status/);
  });

  it('keeps a non-string order_status for the processor to drop', () => {
    expect(decodeOrderEvent(Buffer.from('{"order_status":5}'))).toEqual({ order_status: 5 });
    expect(decodeOrderEvent(Buffer.from('{"order_status":null}'))).toEqual({ order_status: null });
  });

  it('passes a non-string client_id through untouched', () => {
    expect(decodeOrderEvent(Buffer.from('{"order_status":"ORDERED","client_id":42}'))).toEqual({
      order_status: 'ORDERED',
      client_id: 42,
    });
  });

  it('names the missing key in the error', () => {
    expect(() => decodeOrderEvent(Buffer.from('{"order_no":1}'))).toThrow(
      'Payload is not an order event (order_status: Required)',
    );
  });

  it('reports the DECODE_FAILED code', () => {
    try {
      decodeOrderEvent(Buffer.from('null'));
      expect.unreachable();
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(DecodeError);
      expect(err instanceof DecodeError && err.code).toBe('DECODE_FAILED');
    }
  });
});

describe('orderInputSchema', () => {
  it('accepts any JSON object', () => {
    expect(orderInputSchema.safeParse({ pizza: 'quattro formaggi', qty: 2 }).success).toBe(true);
    expect(orderInputSchema.safeParse({}).success).toBe(true);
  });

  it('rejects non-objects', () => {
    expect(orderInputSchema.safeParse([1, 2]).success).toBe(false);
    expect(orderInputSchema.safeParse('pizza').success).toBe(false);
    expect(orderInputSchema.safeParse(null).success).toBe(false);
  });

  it('rejects a non-string client_id', () => {
    const result = orderInputSchema.safeParse({ client_id: 12 });
    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.path).toEqual(['client_id']);
  });
});
