import { IS_DEV } from "@/config";
import { logger } from "./log";

export function devLog(...args: unknown[]) {
  if (!IS_DEV) return;
  logger.debug(args.map((a) => (typeof a === "string" ? a : JSON.stringify(a))).join(" "));
}

export function devWarn(...args: unknown[]) {
  if (!IS_DEV) return;
  logger.warn(args.map((a) => (typeof a === "string" ? a : JSON.stringify(a))).join(" "));
}
