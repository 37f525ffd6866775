import { createApp } from "./app";
import { loadConfig } from "./config";
import { defaultLogger } from "./logger";
import { createHttpServer } from "./server";

async function main(): Promise<void> {
  const logger = defaultLogger();
  const config = loadConfig();

  const app = createApp({ config, logger });
  const server = createHttpServer({
    dispatcher: app,
    port: config.port,
    host: config.host,
    logger,
  }).debug(config.debug);

  await server.start();

  const shutdown = () => {
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.fatal("shutdown failed", error);
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  defaultLogger().fatal(error);
  process.exitCode = 1;
});
