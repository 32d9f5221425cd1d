import type { Logger } from "./types"

function noop() {}

/**
 * Logger that discards everything. The default for every client.
 */
export const noopLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
}

export interface ConsoleLoggerOptions {
  /**
   * Emit debug lines.
   */
  debug?: boolean

  /**
   * Prefix for every line.
   */
  prefix?: string
}

/**
 * Logger backed by `console`. Debug output is off unless enabled.
 */
export function createConsoleLogger(
  options: ConsoleLoggerOptions = {}
): Logger {
  const { debug = false, prefix = `[surgekit]` } = options

  return {
    debug: debug
      ? (message, ...args) => console.debug(`${prefix} ${message}`, ...args)
      : noop,
    info: (message, ...args) => console.info(`${prefix} ${message}`, ...args),
    warn: (message, ...args) => console.warn(`${prefix} ${message}`, ...args),
    error: (message, ...args) =>
      console.error(`${prefix} ${message}`, ...args),
  }
}
