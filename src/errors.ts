export class HttpError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public body?: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** No route (or static file) answers the request. */
export class NotFoundError extends HttpError {
  constructor(message: string, body?: string) {
    super(404, message, body);
  }
}

export class BadInputError extends HttpError {
  constructor(message: string) {
    super(400, message);
  }
}

export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * True when `error` carries one of the given `code`s. Checks the shape rather
 * than `instanceof Error`: fs errors may come from another realm.
 */
export function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string" &&
    codes.includes(error.code)
  );
}
