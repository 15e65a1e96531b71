import pino from "pino";
import { logLevelFromEnv } from "../config/env";

export const logger = pino({
  level: logLevelFromEnv(),
  formatters: {
    level: (label: string) => {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function createLogger(module: string): pino.Logger {
  return logger.child({ module });
}
