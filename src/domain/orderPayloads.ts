import { RequestBody } from './types';
import { RandomSource, pick, randomInt } from '../orchestration/random';

/**
 * Order payload builders for POST /api/order
 */

export interface OrderItem {
  name: string;
  qty: number;
}

export interface OrderPayload {
  items: OrderItem[];
  deliverTo: { name: string };
  restaurant: { name: string };
}

/**
 * The closed set of malformed order shapes used for error injection
 */
export enum MalformedOrderShape {
  EMPTY_ITEMS = 'EMPTY_ITEMS',
  MISSING_DELIVERY_DETAILS = 'MISSING_DELIVERY_DETAILS',
  INVALID_JSON_TEXT = 'INVALID_JSON_TEXT',
  WRONG_FIELD_TYPE = 'WRONG_FIELD_TYPE',
  MISSING_BODY = 'MISSING_BODY',
}

export const MALFORMED_ORDER_SHAPES: readonly MalformedOrderShape[] = Object.values(MalformedOrderShape);

export const INVALID_JSON_TEXT = '{ this is not valid json }';

export function buildValidOrder(random: RandomSource): OrderPayload {
  return {
    items: [
      { name: 'Pizza', qty: randomInt(random, 1, 3) },
      { name: 'Salad', qty: 1 },
    ],
    deliverTo: { name: 'Test User' },
    restaurant: { name: 'Demo' },
  };
}

export function buildMalformedOrder(shape: MalformedOrderShape): RequestBody {
  switch (shape) {
    case MalformedOrderShape.EMPTY_ITEMS:
      return { kind: 'json', value: { items: [] } };
    case MalformedOrderShape.MISSING_DELIVERY_DETAILS:
      return { kind: 'json', value: { deliverTo: {} } };
    case MalformedOrderShape.INVALID_JSON_TEXT:
      return { kind: 'text', value: INVALID_JSON_TEXT };
    case MalformedOrderShape.WRONG_FIELD_TYPE:
      return { kind: 'json', value: { items: [{ qty: 'not-an-int' }] } };
    case MalformedOrderShape.MISSING_BODY:
      return { kind: 'none' };
  }
}

/**
 * Draw one malformed shape uniformly
 */
export function pickMalformedOrder(random: RandomSource): {
  shape: MalformedOrderShape;
  body: RequestBody;
} {
  const shape = pick(random, MALFORMED_ORDER_SHAPES);
  return { shape, body: buildMalformedOrder(shape) };
}

function toText(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

/**
 * Serialize a request body for the wire. Never throws: values JSON cannot
 * represent fall back to their text form.
 */
export function serializeBody(body: RequestBody): string | undefined {
  switch (body.kind) {
    case 'none':
      return undefined;
    case 'text':
      return body.value;
    case 'json':
      try {
        const json: string | undefined = JSON.stringify(body.value);
        return json ?? toText(body.value);
      } catch {
        return toText(body.value);
      }
  }
}
