import { z } from "zod";

import { ConfigError } from "../core/errors.js";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export const EnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default("warn"),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue?.path.join(".") || "environment";
    throw new ConfigError(`invalid ${path}: ${issue?.message ?? "invalid value"}`);
  }
  return parsed.data;
}
