/**
 * Runtime configuration, read once from the environment at server start.
 */

import { z } from "zod";
import { LOG_LEVEL_NAMES, logLevelFromName, type LogLevel } from "./logger.js";

const EnvSchema = z.object({
  SYSEX_MCP_LOG_LEVEL: z
    .string()
    .default("warning")
    .refine((value) => LOG_LEVEL_NAMES.includes(value.toLowerCase()), {
      message: `Must be one of: ${LOG_LEVEL_NAMES.join(", ")}`,
    })
    .describe("Verbosity of stderr logging."),
});

export interface ServerConfig {
  logLevel: LogLevel;
}

/**
 * Parse server configuration from an environment record.
 * @throws {Error} listing every invalid variable.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return { logLevel: logLevelFromName(parsed.data.SYSEX_MCP_LOG_LEVEL) };
}
