import { createApp } from "./app.js";
import { config } from "./config.js";
import { buildServices } from "./infra/container.js";
import { logger } from "./logger.js";

const startSweeper = (sweep: () => Promise<unknown>, intervalMs: number) => {
  if (intervalMs <= 0) {
    return () => undefined;
  }
  const timer = setInterval(() => {
    sweep().catch((error: unknown) => logger.error({ err: error }, "completion sweep failed"));
  }, intervalMs);
  timer.unref();
  return () => clearInterval(timer);
};

buildServices(config, logger)
  .then((services) => {
    const server = createApp(services).listen(config.port, () => {
      logger.info({ port: config.port }, "API listening");
    });
    const stopSweeper = startSweeper(services.sweeper.sweep, config.completionSweepIntervalMs);

    const shutdown = (signal: string) => {
      logger.info({ signal }, "shutting down");
      stopSweeper();
      server.close(() => process.exit(0));
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, "failed to start");
    process.exit(1);
  });
