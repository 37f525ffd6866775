import { Static, Type } from "@sinclair/typebox";
import { TypeCompiler } from "@sinclair/typebox/compiler";

import { ConfigError } from "./errors";

export const ConfigSchema = Type.Object({
  port: Type.Integer({ minimum: 0, maximum: 65535 }),
  host: Type.String({ minLength: 1 }),
  debug: Type.Boolean(),
  staticDir: Type.String({ minLength: 1 }),
  staticPrefix: Type.String({ pattern: "^/.*/$" }),
  templateDir: Type.String({ minLength: 1 }),
  escapeErrorMessages: Type.Boolean(),
});

export type Config = Static<typeof ConfigSchema>;

const validator = TypeCompiler.Compile(ConfigSchema);

export const defaultConfig: Config = {
  port: 8000,
  host: "localhost",
  debug: false,
  staticDir: "static",
  staticPrefix: "/static/",
  templateDir: "templates",
  escapeErrorMessages: true,
};

type Env = Record<string, string | undefined>;

function flag(value: string | undefined, fallback: boolean): boolean | string {
  if (value === undefined || value === "") return fallback;
  const lowered = value.toLowerCase();
  if (["1", "true", "yes", "on"].includes(lowered)) return true;
  if (["0", "false", "no", "off"].includes(lowered)) return false;
  return value;
}

function integer(value: string | undefined, fallback: number): number | string {
  if (value === undefined || value === "") return fallback;
  return /^\d+$/.test(value) ? Number(value) : value;
}

/**
 * Reads settings from the environment over `defaultConfig` and validates the
 * result. Unparseable values are passed through as strings so the schema check
 * reports them.
 */
export function loadConfig(
  env: Env = process.env,
  overrides: Partial<Config> = {}
): Config {
  const candidate: unknown = {
    port: integer(env.PORT, defaultConfig.port),
    host: env.HOST || defaultConfig.host,
    debug: flag(env.DEBUG, defaultConfig.debug),
    staticDir: env.STATIC_DIR || defaultConfig.staticDir,
    staticPrefix: env.STATIC_PREFIX || defaultConfig.staticPrefix,
    templateDir: env.TEMPLATE_DIR || defaultConfig.templateDir,
    escapeErrorMessages: flag(
      env.ESCAPE_ERRORS,
      defaultConfig.escapeErrorMessages
    ),
    ...overrides,
  };

  if (!validator.Check(candidate)) {
    throw new ConfigError(
      [...validator.Errors(candidate)].map(
        (error) => `${error.path}: ${error.message}`
      )
    );
  }
  return candidate;
}
