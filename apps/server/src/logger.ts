import { pino, type Logger } from "pino";

export type { Logger };

export function createLogger(level = "info"): Logger {
  return pino({ level, base: { app: "docqa" } });
}

/** For tests and tooling that should stay quiet. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
