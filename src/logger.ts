import Pino from "pino";
import type { LogLevel } from "./config";

export const logger = Pino({
  name: "auctions",
  level: "info",
});

export function setLogLevel(level: LogLevel) {
  logger.level = level;
}
