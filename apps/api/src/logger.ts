import { pino } from "pino";
import { config } from "./config.js";

// name: identifies this service in aggregated output
// level: "silent" under tests, "debug" in development, "info" in production
export const makeLogger = (level: string) =>
  pino({
    name: "campus-housing-api",
    level
  });

export type Logger = ReturnType<typeof makeLogger>;

export const logger = makeLogger(config.logLevel);
