import { HttpHeaders, HttpMethod, InboundCall } from "./http";

export type QueryParams = Readonly<Record<string, string | string[]>>;

export interface Request {
  readonly method: HttpMethod;
  readonly path: string;
  readonly queryString: string;
  readonly params: QueryParams;
  readonly headers: Readonly<HttpHeaders>;
  readonly body?: string;
  /** Per-call scratch space for middleware, e.g. timing metadata. */
  readonly state: Map<string, unknown>;
}

/**
 * Parses an urlencoded query string. Keys seen once map to a string, repeated
 * keys keep every value in order. Pairs with an empty value are dropped.
 */
export function parseQueryString(queryString: string): QueryParams {
  const collected = new Map<string, string[]>();
  for (const [key, value] of new URLSearchParams(queryString)) {
    if (value === "") continue;
    const values = collected.get(key);
    if (values) {
      values.push(value);
    } else {
      collected.set(key, [value]);
    }
  }

  // fromEntries defines own properties, so keys like `__proto__` survive
  const params = Object.fromEntries(
    [...collected].map(([key, values]): [string, string | string[]] => [
      key,
      values.length === 1 ? values[0] : values,
    ])
  );
  return Object.freeze(params);
}

export function createRequest(call: InboundCall): Request {
  const queryString = call.queryString ?? "";
  const request: Request = {
    method: call.method,
    path: call.path,
    queryString,
    params: parseQueryString(queryString),
    headers: Object.freeze({ ...call.headers }),
    state: new Map(),
  };
  if (call.body !== undefined) {
    return Object.freeze({ ...request, body: call.body });
  }
  return Object.freeze(request);
}

/** First value of a query parameter, or `fallback` when it is absent. */
export function param(
  request: Request,
  name: string,
  fallback: string
): string;
export function param(request: Request, name: string): string | undefined;
export function param(
  request: Request,
  name: string,
  fallback?: string
): string | undefined {
  if (!Object.hasOwn(request.params, name)) return fallback;
  const value = request.params[name];
  if (Array.isArray(value)) return value[0] ?? fallback;
  return value ?? fallback;
}
