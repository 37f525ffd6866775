import { once } from "node:events";
import { createServer, IncomingMessage, ServerResponse } from "node:http";
import { AddressInfo } from "node:net";

import { Dispatcher } from "./dispatcher";
import { headersOf, InboundCall, parseStatusLine, splitTarget } from "./http";
import { defaultLogger, Logger } from "./logger";
import { Response } from "./response";

export interface HttpServer {
  debug(debug: boolean): this;
  start(): Promise<void>;
  stop(): Promise<void>;
  /** Base URL of the listening socket; throws before `start()`. */
  url(): URL;
}

export type Parsers = {
  Request: (
    req: IncomingMessage
  ) => Promise<Pick<InboundCall, "method" | "path" | "queryString">>;
  Headers: (req: IncomingMessage) => Promise<InboundCall["headers"]>;
  Body: (req: IncomingMessage) => Promise<InboundCall["body"]>;
};

export interface HttpServerOptions {
  dispatcher: Dispatcher;
  port?: number;
  host?: string;
  logger?: Logger;
  requestParser?: Parsers["Request"];
  headersParser?: Parsers["Headers"];
  bodyParser?: Parsers["Body"];
}

export const defaultHeadersParser: Parsers["Headers"] = async (req) => {
  return headersOf(req);
};

export const defaultBodyParser: Parsers["Body"] = async (req) => {
  let data: string | undefined;
  for await (const chunk of req) {
    if (data == undefined) data = "";
    data += chunk;
  }
  return data;
};

export const defaultRequestParser: Parsers["Request"] = async (req) => {
  return {
    method: req.method ?? "GET",
    ...splitTarget(req.url ?? "/"),
  };
};

export function sendResponse(
  response: Response,
  serverResponse: ServerResponse
): void {
  const { code, reason } = parseStatusLine(response.status);
  const headers: string[] = [];
  for (const [name, value] of response.headers) {
    if (name.toLowerCase() === "content-length") continue;
    headers.push(name, value);
  }
  headers.push("Content-Length", response.body.byteLength.toString());

  serverResponse.writeHead(code, reason, headers);
  serverResponse.end(response.body);
}

export function createHttpServer({
  dispatcher,
  port = 0,
  host = "localhost",
  logger = defaultLogger(),
  requestParser = defaultRequestParser,
  headersParser = defaultHeadersParser,
  bodyParser = defaultBodyParser,
}: HttpServerOptions): HttpServer {
  const server = createServer();
  const context = { debug: false };

  const onRequest = async (req: IncomingMessage, res: ServerResponse) => {
    if (context.debug) {
      logger.debug("raw request", req.url, req.method, req.headers);
    }
    const call: InboundCall = {
      ...(await requestParser(req)),
      headers: await headersParser(req),
      body: await bodyParser(req),
    };
    if (context.debug) {
      logger.debug("parsed request", call);
    }
    const response = await dispatcher.handle(call);
    if (context.debug) {
      logger.debug("response", response.status, response.headers);
    }
    sendResponse(response, res);
  };

  server.on("request", (req: IncomingMessage, res: ServerResponse) => {
    onRequest(req, res).catch((error: unknown) => {
      logger.error("failed to serve request", req.method, req.url, error);
      if (!res.headersSent) {
        res.writeHead(500, { "content-type": "text/plain" });
      }
      res.end();
    });
  });

  const instance: HttpServer = {
    async start() {
      dispatcher.seal();
      server.listen(port, host);
      await once(server, "listening");
      logger.info(`listening on ${instance.url().href}`);
    },
    debug(debug) {
      context.debug = debug;
      return this;
    },
    async stop() {
      if (!server.listening) return;
      const closed = once(server, "close");
      server.close();
      server.closeIdleConnections();
      await closed;
    },
    url() {
      const address = server.address();
      if (address === null || typeof address === "string") {
        throw new Error("server is not listening on a TCP port");
      }
      return new URL(`http://${formatHost(address)}:${address.port}/`);
    },
  };

  return instance;
}

function formatHost(address: AddressInfo): string {
  return address.family === "IPv6" ? `[${address.address}]` : address.address;
}
