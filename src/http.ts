import { IncomingMessage, STATUS_CODES } from "node:http";

export const HttpMethods = ["GET", "POST", "PUT", "PATCH", "DELETE"] as const;

export type HttpMethod = typeof HttpMethods[number] | string;

export type HttpHeaders = Record<string, string | string[]>;

/** One response header. A list of pairs keeps order and allows repeats. */
export type HeaderPair = [name: string, value: string];

export type Awaitable<T> = T | Promise<T>;

/**
 * What the hosting runtime hands to the dispatcher for one call.
 */
export interface InboundCall {
  method: HttpMethod;
  path: string;
  queryString?: string;
  headers?: HttpHeaders;
  body?: string;
}

export function statusLine(code: number): string {
  return `${code} ${STATUS_CODES[code] ?? "Unknown"}`;
}

export function parseStatusLine(status: string): {
  code: number;
  reason: string;
} {
  const match = /^(\d{3})(?:\s+(.*))?$/.exec(status.trim());
  if (!match) {
    throw new Error(`malformed status line: ${status}`);
  }
  const code = Number(match[1]);
  return { code, reason: match[2] ?? STATUS_CODES[code] ?? "" };
}

/** Splits a request target such as `/user?name=John` into path and query. */
export function splitTarget(target: string): {
  path: string;
  queryString: string;
} {
  const index = target.indexOf("?");
  if (index === -1) {
    return { path: target, queryString: "" };
  }
  return { path: target.slice(0, index), queryString: target.slice(index + 1) };
}

export function headersOf(message: IncomingMessage): HttpHeaders {
  const headers: [string, string | string[]][] = [];
  for (const [key, value] of Object.entries(message.headers)) {
    if (value !== undefined) headers.push([key.toLowerCase(), value]);
  }
  return Object.fromEntries(headers);
}
