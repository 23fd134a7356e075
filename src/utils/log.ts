import pino, { type Logger } from "pino";
import { getCurrentVersion, LOG_LEVEL } from "@/config";

export type { Logger };

// stderr keeps stdout free for the CLI's JSON output
export const logger: Logger = pino(
  {
    name: "pgn-analyzer",
    level: LOG_LEVEL,
    base: { version: getCurrentVersion() },
  },
  pino.destination(2),
);

export function info(message: string) {
  logger.info(message);
}

export function error(message: string) {
  logger.error(message);
}
