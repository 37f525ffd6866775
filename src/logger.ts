import { inspect } from "node:util";

export interface Logger {
  log(...args: unknown[]): void;
  info(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  error(...args: unknown[]): void;
  fatal(...args: unknown[]): void;
  trace(...args: unknown[]): void;
}

type Level = Exclude<keyof Logger, "log">;

const format = (args: unknown[]): string[] =>
  args.map((x) => {
    if (typeof x === "string") {
      return x;
    } else if (x != undefined) {
      return inspect(x);
    } else {
      return `${x}`;
    }
  });

const write =
  (level?: Level) =>
  (...args: unknown[]) => {
    const line = format(args);
    if (level === "error" || level === "fatal") {
      console.error(`[${level}]`, ...line);
    } else if (level) {
      console.log(`[${level}]`, ...line);
    } else {
      console.log(...line);
    }
  };

export const defaultLogger = (): Logger => {
  const logger = {
    log: write(),
    info: write("info"),
    debug: write("debug"),
    error: write("error"),
    fatal: write("fatal"),
    trace: write("trace"),
  };

  return logger;
};

export const silentLogger = (): Logger => {
  const noop = () => {
    // discard
  };
  return {
    log: noop,
    info: noop,
    debug: noop,
    error: noop,
    fatal: noop,
    trace: noop,
  };
};
