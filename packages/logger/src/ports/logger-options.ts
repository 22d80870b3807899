import type { LogLevelName } from "./log-level"

/**
 * Policy shared by all logger adapters.
 */
export type LoggerOptions = {
  /**
   * Minimum level to emit. "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Human-readable output for local development. Leave off in production,
   * where JSON lines are expected.
   */
  prettify?: boolean
}
