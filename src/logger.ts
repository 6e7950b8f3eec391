import pino, { type Logger } from "pino";
import { getConfig } from "./config";

export type { Logger };

let root: Logger | undefined;

function rootLogger(): Logger {
  if (!root) {
    root = pino({ name: "amm", level: getConfig().logLevel });
  }
  return root;
}

/** Component logger, e.g. createLogger("exchange") */
export function createLogger(component: string, bindings: Record<string, unknown> = {}): Logger {
  return rootLogger().child({ component, ...bindings });
}
