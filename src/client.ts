import { request as http, IncomingMessage } from "node:http";
import { request as https } from "node:https";
import { headersOf, HttpHeaders } from "./http";

export type ClientResponse = {
  status: number;
  statusText: string;
  headers: HttpHeaders;
  body: string;
  raw: IncomingMessage;
};

export async function readBody(raw: IncomingMessage): Promise<string> {
  let body = "";
  for await (const chunk of raw) {
    body += chunk;
  }
  return body;
}

export async function httpRequest(
  url: URL,
  method: string,
  body?: unknown,
  headers?: HttpHeaders
): Promise<ClientResponse> {
  let payload: string | undefined;
  const options = {
    method,
    headers: {
      ...headers,
    },
  };
  if (body !== undefined) {
    let contentType = "text/plain";
    if (typeof body === "string") {
      payload = body;
    } else {
      payload = JSON.stringify(body);
      contentType = "application/json";
    }
    options.headers = {
      ...options.headers,
      "Content-Type": contentType,
      "Content-Length": Buffer.byteLength(payload).toString(),
    };
  }
  return new Promise<ClientResponse>((resolve, reject) => {
    const handleIncomingMessage = (raw: IncomingMessage) => {
      readBody(raw)
        .then((text) =>
          resolve({
            status: raw.statusCode ?? 0,
            statusText: raw.statusMessage ?? "",
            headers: headersOf(raw),
            body: text,
            raw,
          })
        )
        .catch(reject);
    };

    const request = url.protocol === "https:" ? https : http;
    const req = request(url, options, handleIncomingMessage);
    req.on("error", reject);
    if (payload !== undefined) {
      req.write(payload);
    }
    req.end();
  });
}

export async function httpGet(url: URL): Promise<ClientResponse> {
  return httpRequest(url, "GET");
}

export async function httpPost(
  url: URL,
  data: unknown
): Promise<ClientResponse> {
  return httpRequest(url, "POST", data);
}
