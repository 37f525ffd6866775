export * from "./http";
export * from "./errors";
export * from "./logger";
export * from "./request";
export * from "./response";
export * from "./router";
export * from "./middleware";
export * from "./dispatcher";
export * from "./typed-route";
export * from "./static-files";
export * from "./templates";
export * from "./config";
export * from "./server";
export * from "./client";
export * from "./test-client";
export { createApp } from "./app";
