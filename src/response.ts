import { HeaderPair, statusLine } from "./http";

export const DEFAULT_CONTENT_TYPE = "text/html";

export class Response {
  status: string;
  headers: HeaderPair[];
  body: Buffer;

  constructor(
    body: string | Uint8Array = "",
    status = "200 OK",
    headers: HeaderPair[] = [["Content-Type", DEFAULT_CONTENT_TYPE]]
  ) {
    this.status = status;
    this.headers = headers;
    this.body = toBuffer(body);
  }

  static html(body: string, code = 200): Response {
    return new Response(body, statusLine(code));
  }

  static json(data: unknown, code = 200): Response {
    // JSON.stringify gives undefined for undefined, functions and symbols
    const body = JSON.stringify(data) ?? "null";
    return new Response(body, statusLine(code), [
      ["Content-Type", "application/json"],
    ]);
  }

  get statusCode(): number {
    return Number.parseInt(this.status, 10);
  }

  setBody(body: string | Uint8Array): this {
    this.body = toBuffer(body);
    return this;
  }

  /** Case-insensitive lookup of the first header with this name. */
  header(name: string): string | undefined {
    const lower = name.toLowerCase();
    return this.headers.find(([key]) => key.toLowerCase() === lower)?.[1];
  }

  /** Replaces every header with this name by a single value. */
  setHeader(name: string, value: string): this {
    const lower = name.toLowerCase();
    this.headers = this.headers.filter(([key]) => key.toLowerCase() !== lower);
    this.headers.push([name, value]);
    return this;
  }

  addHeader(name: string, value: string): this {
    this.headers.push([name, value]);
    return this;
  }

  text(): string {
    return this.body.toString("utf-8");
  }
}

function toBuffer(body: string | Uint8Array): Buffer {
  if (typeof body === "string") {
    return Buffer.from(body, "utf-8");
  }
  return Buffer.isBuffer(body) ? body : Buffer.from(body);
}

export type HandlerResult = string | Uint8Array | Response;

type Classified =
  | { kind: "text"; body: string }
  | { kind: "bytes"; body: Uint8Array }
  | { kind: "response"; response: Response };

function classify(result: HandlerResult): Classified {
  if (result instanceof Response) {
    return { kind: "response", response: result };
  } else if (typeof result === "string") {
    return { kind: "text", body: result };
  }
  return { kind: "bytes", body: result };
}

/** Turns whatever a handler returned into the one Response sent back. */
export function normalizeResult(result: HandlerResult): Response {
  const classified = classify(result);
  switch (classified.kind) {
    case "response":
      return classified.response;
    case "text":
    case "bytes":
      return new Response(classified.body);
  }
}
