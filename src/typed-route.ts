import { Static, TSchema } from "@sinclair/typebox";
import { TypeCompiler } from "@sinclair/typebox/compiler";

import { Dispatcher, Handler } from "./dispatcher";
import { BadInputError } from "./errors";
import { Awaitable } from "./http";
import { Request } from "./request";
import { HandlerResult } from "./response";

export type TypedHandler<Params extends TSchema> = (
  request: Request,
  params: Static<Params>,
  app: Dispatcher
) => Awaitable<HandlerResult>;

/**
 * Wraps a handler so its query parameters are checked against a TypeBox
 * schema first. A request that fails the check is answered with a 400.
 */
export function typedRoute<Params extends TSchema>(
  schema: Params,
  handler: TypedHandler<Params>
): Handler {
  const validator = TypeCompiler.Compile(schema);
  return (request, app) => {
    const params: unknown = request.params;
    if (!validator.Check(params)) {
      const problems = [...validator.Errors(params)].map(
        (error) => `${error.path || "/"}: ${error.message}`
      );
      throw new BadInputError(
        `Invalid query parameters: ${problems.join(", ")}`
      );
    }
    return handler(request, params, app);
  };
}
