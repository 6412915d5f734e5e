import pino from "pino";
import { z } from "zod";

const EnvSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

/** Reads LOG_LEVEL from an environment, defaulting to info. Throws ZodError on an unknown level. */
export function resolveLogLevel(env: NodeJS.ProcessEnv): pino.LevelWithSilent {
  return EnvSchema.parse(env).LOG_LEVEL;
}

function createPinoLogger(): pino.Logger {
  if (process.env.VITEST) {
    return pino({ level: "silent" });
  }
  return pino({ level: resolveLogLevel(process.env) });
}

const pinoInstance = createPinoLogger();

/** Per-module log level overrides, set at runtime via logger.setLogConfig() */
let logLevelOverrides: Record<string, string> = {};

export const logger = Object.assign(pinoInstance, {
  setLogConfig(overrides: Record<string, string>): void {
    logLevelOverrides = overrides;
  },

  /** Create a child logger with per-module log level from config */
  createChild(module: string): pino.Logger {
    const level = logLevelOverrides[module];
    const child = pinoInstance.child({ module });
    if (level) {
      child.level = level;
    }
    return child;
  },
});
