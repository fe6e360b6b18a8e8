import { ConfigError, LOG_LEVELS, type LogLevel } from "@importline/core";
import { z } from "zod";

export interface ImportlineConfig {
  logLevel: LogLevel;
  excludedKeys: string[];
  removedKeys: string[];
}

const DEFAULT_CONFIG: Pick<ImportlineConfig, "logLevel"> = {
  logLevel: "info",
};

const ConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS),
  excludedKeys: z.array(z.string().min(1)),
  removedKeys: z.array(z.string().min(1)),
});

export function parseKeyList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((key) => key.trim())
    .filter((key) => key.length > 0);
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): ImportlineConfig {
  const result = ConfigSchema.safeParse({
    logLevel: env.IMPORTLINE_LOG_LEVEL || DEFAULT_CONFIG.logLevel,
    excludedKeys: parseKeyList(env.IMPORTLINE_EXCLUDE),
    removedKeys: parseKeyList(env.IMPORTLINE_REMOVED),
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`);
  }

  return result.data;
}
