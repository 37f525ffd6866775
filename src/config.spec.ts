import { defaultConfig, loadConfig } from "./config";
import { ConfigError } from "./errors";

const problemsOf = (env: Record<string, string>): string[] => {
  try {
    loadConfig(env);
  } catch (error: unknown) {
    if (error instanceof ConfigError) return error.problems;
    throw error;
  }
  throw new Error("expected loadConfig to fail");
};

describe("loadConfig", () => {
  it("should use the defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual(defaultConfig);
  });

  it("should read values from the environment", () => {
    const config = loadConfig({
      PORT: "9000",
      HOST: "0.0.0.0",
      DEBUG: "true",
      STATIC_DIR: "public",
      STATIC_PREFIX: "/assets/",
      TEMPLATE_DIR: "views",
      ESCAPE_ERRORS: "0",
    });

    expect(config).toEqual({
      port: 9000,
      host: "0.0.0.0",
      debug: true,
      staticDir: "public",
      staticPrefix: "/assets/",
      templateDir: "views",
      escapeErrorMessages: false,
    });
  });

  it("should apply overrides last", () => {
    expect(loadConfig({ PORT: "9000" }, { port: 0 }).port).toBe(0);
  });

  it("should reject a port that is not a number", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow(ConfigError);
    expect(
      problemsOf({ PORT: "abc" }).some((p) => p.startsWith("/port: "))
    ).toBe(true);
  });

  it("should reject a port out of range", () => {
    expect(
      problemsOf({ PORT: "70000" }).some((p) => p.startsWith("/port: "))
    ).toBe(true);
  });

  it("should reject flags it cannot read", () => {
    expect(
      problemsOf({ DEBUG: "maybe" }).some((p) => p.startsWith("/debug: "))
    ).toBe(true);
  });

  it("should reject a static prefix without slashes", () => {
    const problems = problemsOf({ STATIC_PREFIX: "static" });

    expect(problems.some((p) => p.startsWith("/staticPrefix: "))).toBe(true);
  });
});
