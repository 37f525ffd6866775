import { Awaitable } from "./http";
import { Logger } from "./logger";
import { Request } from "./request";
import { Response } from "./response";

/**
 * A hook pair around dispatch. `before` runs outermost-first, `after` runs
 * innermost-first, so the first middleware added wraps all the others.
 *
 * `after` may mutate the response in place, or return a replacement.
 */
export interface Middleware {
  name?: string;
  before?(request: Request): Awaitable<void>;
  after?(request: Request, response: Response): Awaitable<Response | void>;
}

export class MiddlewareChain {
  private readonly middlewares: Middleware[] = [];
  private sealed = false;

  add(middleware: Middleware): this {
    if (this.sealed) {
      throw new Error("cannot add middleware: chain is sealed");
    }
    this.middlewares.push(middleware);
    return this;
  }

  async runBefore(request: Request): Promise<void> {
    for (const middleware of this.middlewares) {
      if (middleware.before) {
        await middleware.before(request);
      }
    }
  }

  async runAfter(request: Request, response: Response): Promise<Response> {
    let current = response;
    for (let i = this.middlewares.length - 1; i >= 0; i--) {
      const middleware = this.middlewares[i];
      if (middleware.after) {
        const replaced = await middleware.after(request, current);
        if (replaced) current = replaced;
      }
    }
    return current;
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  get length(): number {
    return this.middlewares.length;
  }
}

const START_TIME = "startTime";

export const loggingMiddleware = (
  logger: Logger,
  now: () => number = () => performance.now()
): Middleware => ({
  name: "logging",
  before(request) {
    const timestamp = new Date().toISOString();
    logger.info(`[${timestamp}] ${request.method} ${request.path}`);
    request.state.set(START_TIME, now());
  },
  after(request, response) {
    const started = request.state.get(START_TIME);
    const elapsed = typeof started === "number" ? now() - started : 0;
    logger.info(
      `${request.method} ${request.path} ${response.statusCode} ` +
        `took ${elapsed.toFixed(3)}ms`
    );
  },
});

export const securityHeadersMiddleware = (): Middleware => ({
  name: "security-headers",
  after(_request, response) {
    response.addHeader("X-Content-Type-Options", "nosniff");
    response.addHeader("X-Frame-Options", "DENY");
  },
});
