/**
 * Log level flags.
 *
 * Usage: `shouldLog(LogLevel.Debug) && console.error(...)`. Everything is
 * written to stderr; stdout belongs to the MCP stdio transport.
 */

export enum LogLevel {
  Off =     0x00000000,
  Error =   0x00000001,
  Warning = 0x00000002,
  Info =    0x00000004,
  Debug =   0x00000008,
  Midi =    0x00000010,
  All =     0xFFFFFFFF
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  off: LogLevel.Off,
  error: LogLevel.Error,
  warning: LogLevel.Error | LogLevel.Warning,
  info: LogLevel.Error | LogLevel.Warning | LogLevel.Info,
  debug: LogLevel.Error | LogLevel.Warning | LogLevel.Info | LogLevel.Debug,
  midi: LogLevel.All,
  all: LogLevel.All,
};

let logLevel: LogLevel = LEVEL_NAMES.warning;

export function setLogLevel(level: LogLevel): void
{
  logLevel = level;
}

export function getLogLevel(): LogLevel
{
  return logLevel;
}

/** Masks compare unsigned, so `All` (0xFFFFFFFF) matches itself. */
export function shouldLog(level: LogLevel): boolean
{
  return ((level & logLevel) >>> 0) === (level >>> 0);
}

/** Names accepted by {@link logLevelFromName}, most quiet first. */
export const LOG_LEVEL_NAMES = Object.keys(LEVEL_NAMES);

/**
 * Map a level name to the mask that enables it and every more severe level.
 * "warning" therefore enables Error and Warning.
 */
export function logLevelFromName(name: string): LogLevel
{
  const key = name.toLowerCase();
  if (!Object.hasOwn(LEVEL_NAMES, key)) {
    throw new Error(`Unknown log level "${name}". Available levels: ${LOG_LEVEL_NAMES.join(", ")}`);
  }
  return LEVEL_NAMES[key];
}
