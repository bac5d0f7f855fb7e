import pino, { type Logger } from "pino";

import type { Env } from "./env.js";

export type { Logger };

// stdout carries the table; logs go to stderr, synchronously so nothing is lost on exit.
export function createLogger(env: Env): Logger {
  return pino(
    {
      name: "wordfreq",
      level: env.LOG_LEVEL,
      base: null,
    },
    pino.destination({ fd: 2, sync: true }),
  );
}
