import pino, { type Logger } from "pino";
import { LOGGER_NAME } from "./constants";
import { environment } from "./environment";

export type { Logger };

let root: Logger | null = null;

/** Package logger. Level comes from LINEAR_HASH_LOG_LEVEL (silent by default). */
export function get_logger(): Logger {
  if (root === null) {
    root = pino({ name: LOGGER_NAME, level: environment().LINEAR_HASH_LOG_LEVEL });
  }
  return root;
}
