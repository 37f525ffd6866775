import { inspect } from "node:util";

import { HttpError, NotFoundError } from "./errors";
import { Awaitable, HttpMethod, InboundCall, statusLine } from "./http";
import { defaultLogger, Logger } from "./logger";
import { Middleware, MiddlewareChain } from "./middleware";
import { createRequest, Request } from "./request";
import { HandlerResult, normalizeResult, Response } from "./response";
import { Router } from "./router";
import { StaticFileResolver } from "./static-files";
import { TemplateContext, TemplateRenderer } from "./templates";

export const NOT_FOUND_BODY = "<h1>404 - Page Not Found</h1>";
export const STATIC_NOT_FOUND_BODY =
  "<h1>404 Not Found</h1><p>Static file not found.</p>";

export type Handler = (
  request: Request,
  app: Dispatcher
) => Awaitable<HandlerResult>;

export interface Dispatcher {
  readonly router: Router<Handler>;
  readonly middleware: MiddlewareChain;
  route(path: string, handler: Handler, methods?: readonly HttpMethod[]): this;
  use(middleware: Middleware): this;
  /** Freezes routes and middleware; called by the server before it listens. */
  seal(): this;
  handle(call: InboundCall): Promise<Response>;
  /** Renders a template, wrapped in the layout template when one is set. */
  render(templateId: string, context?: TemplateContext): Promise<string>;
}

export interface DispatcherOptions {
  logger?: Logger;
  staticFiles?: StaticFileResolver;
  templates?: TemplateRenderer;
  layout?: string;
  /**
   * HTML-escape exception messages placed in error bodies. Turning this off
   * reflects the raw message, which lets a handler error inject markup.
   */
  escapeErrorMessages?: boolean;
}

const htmlEscapes: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => htmlEscapes[ch] ?? ch);
}

// String() throws for values with no toString, e.g. null-prototype objects.
function describeThrown(error: unknown): string {
  try {
    return String(error);
  } catch {
    return inspect(error);
  }
}

export function formatErrorAsResponse(
  error: unknown,
  escape = true
): Response {
  if (error instanceof HttpError && error.body !== undefined) {
    return Response.html(error.body, error.statusCode);
  }
  if (error instanceof NotFoundError) {
    return Response.html(NOT_FOUND_BODY, 404);
  }
  let message = "";
  let status = 500;
  if (error instanceof HttpError) {
    message = error.message;
    status = error.statusCode;
  } else if (error instanceof Error) {
    message = error.message;
  } else {
    message = describeThrown(error);
  }
  const shown = escape ? escapeHtml(message) : message;
  return new Response(`<h1>Error:</h1><p>${shown}</p>`, statusLine(status));
}

export function createDispatcher({
  logger = defaultLogger(),
  staticFiles,
  templates,
  layout,
  escapeErrorMessages = true,
}: DispatcherOptions = {}): Dispatcher {
  const router = new Router<Handler>();
  const middleware = new MiddlewareChain();

  const serveStatic = async (
    resolver: StaticFileResolver,
    request: Request
  ): Promise<Response> => {
    const file = await resolver.serve(request.path);
    if (!file) {
      throw new NotFoundError(
        `no static file for ${request.path}`,
        STATIC_NOT_FOUND_BODY
      );
    }
    return new Response(file.data, statusLine(200), [
      ["Content-Type", file.mimeType],
    ]);
  };

  const dispatcher: Dispatcher = {
    router,
    middleware,
    route(path, handler, methods) {
      router.register(path, handler, methods);
      return this;
    },
    use(mw) {
      middleware.add(mw);
      return this;
    },
    seal() {
      router.seal();
      middleware.seal();
      return this;
    },
    async handle(call) {
      const request = createRequest(call);
      try {
        await middleware.runBefore(request);

        let response: Response;
        if (staticFiles && request.path.startsWith(staticFiles.prefix)) {
          response = await serveStatic(staticFiles, request);
        } else {
          const handler = router.resolve(request.path, request.method);
          if (!handler) {
            throw new NotFoundError(
              `no route for ${request.method} ${request.path}`
            );
          }
          response = normalizeResult(await handler(request, dispatcher));
        }

        return await middleware.runAfter(request, response);
      } catch (error: unknown) {
        if (!(error instanceof NotFoundError)) {
          logger.error(`${request.method} ${request.path} failed`, error);
        }
        return formatErrorAsResponse(error, escapeErrorMessages);
      }
    },
    async render(templateId, context = {}) {
      if (!templates) {
        throw new Error(
          `cannot render ${templateId}: no template renderer configured`
        );
      }
      const content = await templates.render(templateId, context);
      if (!layout) return content;
      const title =
        typeof context.title === "string" ? context.title : "My Framework";
      return templates.render(layout, { title, content });
    },
  };

  return dispatcher;
}
