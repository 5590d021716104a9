import { ENDPOINT_NAMES, EndpointName, RequestSpec, isEndpointName } from './types';
import { buildValidOrder, pickMalformedOrder } from './orderPayloads';
import { RandomSource, pick } from '../orchestration/random';
import { UnknownEndpointError } from '../infra/validation';
import restaurantIds from './restaurants.json';

/**
 * ENDPOINT CATALOG
 *
 * Every logical endpoint knows how to build a well-formed ("good") request and a
 * deliberately broken ("bad") one. Builders are pure functions of the context;
 * no definition is ever mutated.
 */

export interface BuildContext {
  baseUrl: string;
  headers: Readonly<Record<string, string>>;
  random: RandomSource;
}

export interface EndpointDefinition {
  readonly name: EndpointName;
  readonly description: string;
  /**
   * False for endpoints whose bad variant is the good one
   */
  readonly hasBadVariant: boolean;
  buildGood(ctx: BuildContext): RequestSpec;
  buildBad(ctx: BuildContext): RequestSpec;
}

export const KNOWN_RESTAURANT_IDS: readonly string[] = restaurantIds;
export const UNKNOWN_RESTAURANT_ID = 'invalid_restaurant';

export const BOGUS_PATH = '/api/nope';
export const SEVERE_BOGUS_PATH = '/totally-invalid';

function get(
  endpoint: EndpointName,
  variant: RequestSpec['variant'],
  ctx: BuildContext,
  path: string
): RequestSpec {
  return {
    endpoint,
    variant,
    method: 'GET',
    url: `${ctx.baseUrl}${path}`,
    headers: { ...ctx.headers },
    body: { kind: 'none' },
  };
}

function orderHeaders(ctx: BuildContext): Record<string, string> {
  const headers = { ...ctx.headers };
  const hasContentType = Object.keys(headers).some((key) => key.toLowerCase() === 'content-type');
  if (!hasContentType) {
    headers['Content-Type'] = 'application/json';
  }
  return headers;
}

const getRoot: EndpointDefinition = {
  name: 'get_root',
  description: 'Front page',
  hasBadVariant: false,
  buildGood: (ctx) => get('get_root', 'good', ctx, '/'),
  buildBad: (ctx) => get('get_root', 'good', ctx, '/'),
};

const getList: EndpointDefinition = {
  name: 'get_list',
  description: 'List restaurants',
  hasBadVariant: false,
  buildGood: (ctx) => get('get_list', 'good', ctx, '/api/restaurant'),
  buildBad: (ctx) => get('get_list', 'good', ctx, '/api/restaurant'),
};

const getOne: EndpointDefinition = {
  name: 'get_one',
  description: 'Fetch one restaurant by id',
  hasBadVariant: true,
  buildGood: (ctx) =>
    get('get_one', 'good', ctx, `/api/restaurant/${pick(ctx.random, KNOWN_RESTAURANT_IDS)}`),
  buildBad: (ctx) => get('get_one', 'bad', ctx, `/api/restaurant/${UNKNOWN_RESTAURANT_ID}`),
};

const postOrder: EndpointDefinition = {
  name: 'post_order',
  description: 'Checkout an order',
  hasBadVariant: true,
  buildGood: (ctx) => ({
    endpoint: 'post_order',
    variant: 'good',
    method: 'POST',
    url: `${ctx.baseUrl}/api/order`,
    headers: orderHeaders(ctx),
    body: { kind: 'json', value: buildValidOrder(ctx.random) },
  }),
  buildBad: (ctx) => ({
    endpoint: 'post_order',
    variant: 'bad',
    method: 'POST',
    url: `${ctx.baseUrl}/api/order`,
    headers: orderHeaders(ctx),
    body: pickMalformedOrder(ctx.random).body,
  }),
};

const bogus: EndpointDefinition = {
  name: 'bogus',
  description: 'Unregistered paths',
  hasBadVariant: true,
  buildGood: (ctx) => get('bogus', 'good', ctx, BOGUS_PATH),
  buildBad: (ctx) => get('bogus', 'bad', ctx, SEVERE_BOGUS_PATH),
};

export const ENDPOINT_CATALOG: { readonly [K in EndpointName]: EndpointDefinition } = {
  get_root: getRoot,
  get_list: getList,
  get_one: getOne,
  post_order: postOrder,
  bogus,
};

export function getEndpoint(name: string): EndpointDefinition {
  if (!isEndpointName(name)) {
    throw new UnknownEndpointError(name);
  }
  return ENDPOINT_CATALOG[name];
}

export function buildRequest(name: string, injectError: boolean, ctx: BuildContext): RequestSpec {
  const endpoint = getEndpoint(name);
  return injectError ? endpoint.buildBad(ctx) : endpoint.buildGood(ctx);
}

export function listEndpoints(): EndpointDefinition[] {
  return ENDPOINT_NAMES.map((name) => ENDPOINT_CATALOG[name]);
}
