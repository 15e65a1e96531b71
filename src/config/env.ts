import path from "path";
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const LogLevelSchema = z
  .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
  .default("info");

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(5045),
  METADATA_DIR: z.string().min(1).optional(),
  LOG_LEVEL: LogLevelSchema,
});

export interface AppConfig {
  port: number;
  metadataDir: string;
  logLevel: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  return {
    port: parsed.data.PORT,
    metadataDir: path.resolve(
      parsed.data.METADATA_DIR ?? path.join("data", "metadata")
    ),
    logLevel: parsed.data.LOG_LEVEL,
  };
}

/**
 * Log level for the root logger, read before the full configuration is
 * validated. An invalid value falls back to "info"; loadConfig reports it.
 */
export function logLevelFromEnv(env: NodeJS.ProcessEnv = process.env): string {
  const parsed = LogLevelSchema.safeParse(env.LOG_LEVEL);
  return parsed.success ? parsed.data : "info";
}
