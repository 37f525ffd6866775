import { setTimeout as sleep } from "node:timers/promises";
import { resolve } from "node:path";

import { Type } from "@sinclair/typebox";

import { Config, defaultConfig } from "./config";
import { createDispatcher, Dispatcher, escapeHtml } from "./dispatcher";
import { defaultLogger, Logger } from "./logger";
import { loggingMiddleware, securityHeadersMiddleware } from "./middleware";
import { Response } from "./response";
import { createStaticFiles } from "./static-files";
import { fileTemplateSource, TemplateEngine } from "./templates";
import { typedRoute } from "./typed-route";

export const projectRoot = resolve(__dirname, "..");

export const USERS = ["Alice", "Bob", "Charlie", "Diana"];

export interface AppOptions {
  config?: Pick<
    Config,
    "staticDir" | "staticPrefix" | "templateDir" | "escapeErrorMessages"
  >;
  logger?: Logger;
  clock?: () => Date;
  slowDelayMs?: number;
}

const UserQuery = Type.Object({
  name: Type.Optional(Type.String()),
  age: Type.Optional(Type.String({ pattern: "^[0-9]+$" })),
});

/**
 * The demo site: templated pages, a query-driven page, a JSON endpoint and a
 * deliberately slow route, behind request logging and security headers.
 */
export function createApp({
  config = defaultConfig,
  logger = defaultLogger(),
  clock = () => new Date(),
  slowDelayMs = 2000,
}: AppOptions = {}): Dispatcher {
  const app = createDispatcher({
    logger,
    escapeErrorMessages: config.escapeErrorMessages,
    staticFiles: createStaticFiles({
      dir: resolve(projectRoot, config.staticDir),
      prefix: config.staticPrefix,
    }),
    templates: new TemplateEngine(
      fileTemplateSource(resolve(projectRoot, config.templateDir))
    ),
    layout: "base.html",
  });

  app.use(loggingMiddleware(logger));
  app.use(securityHeadersMiddleware());

  app.route("/", (_request, app) =>
    app.render("home.html", {
      title: "Home",
      site_name: "tiny-dispatch",
      current_time: clock().toISOString(),
      user_count: USERS.length,
    })
  );

  app.route("/users", (_request, app) =>
    app.render("users.html", {
      title: "Users",
      users: USERS,
      user_count: USERS.length,
    })
  );

  app.route("/request", (request) =>
    [
      "<h1>Request details</h1>",
      `<p>Request method: ${escapeHtml(request.method)}</p>`,
      `<p>Request path: ${escapeHtml(request.path)}</p>`,
      '<p>Try <a href="/user?name=John&amp;age=25">' +
        "/user?name=John&amp;age=25</a> or " +
        '<a href="/api/data">/api/data</a></p>',
    ].join("\n")
  );

  app.route(
    "/user",
    typedRoute(UserQuery, (request, params) =>
      [
        "<h1>User Information</h1>",
        `<p>Name: ${escapeHtml(params.name ?? "Anonymous")}</p>`,
        `<p>Age: ${escapeHtml(params.age ?? "Unknown")}</p>`,
      ].join("\n")
    )
  );

  app.route("/api/data", (request) =>
    Response.json({
      message: "Hello from the API!",
      method: request.method,
      path: request.path,
      params: request.params,
    })
  );

  app.route("/echo", (request) => new Response(request.body ?? "", "200 OK", [
    ["Content-Type", "text/plain"],
  ]), ["POST", "PUT"]);

  app.route("/slow", async () => {
    await sleep(slowDelayMs);
    return `<h1>Slow Page</h1><p>This took ${slowDelayMs}ms to load.</p>`;
  });

  return app;
}
