/**
 * Process-wide registry and default logger, plus shortcuts that configure
 * the default logger.
 *
 * @module
 *
 * @example
 * ```typescript
 * import { logger, logfile, loglevel } from "loghelm";
 *
 * logger.info("Application started");
 * logfile("/var/log/app/app.log", { maxBytes: 1_000_000, backupCount: 3 });
 * loglevel("warning");
 * ```
 *
 * @see {@link Log} for the logging interface
 * @see {@link configureLogger} for reconfiguration rules
 */

import {
  DEFAULT_LOGGER_NAME,
  SETUP_LOGGER_NAME,
  type Severity,
} from "./config";
import type { Formatter } from "./formatter";
import { Log } from "./log";
import {
  addSyslog,
  type ConfigureOptions,
  enableJson,
  type LogfileOptions,
  setFormatter,
  setLevel,
  setLogfile,
  type SyslogOptions,
} from "./reconcile";
import { LoggerRegistry } from "./registry";

export { Log, LoggerRegistry };

export const registry = new LoggerRegistry();

/** The default logger. Reset in place, never replaced. */
export const logger: Log = registry.reset(DEFAULT_LOGGER_NAME);

/**
 * Gets the logger registered under `name`, creating it without
 * destinations if needed. Defaults to the default logger.
 */
export const getLogger = (name: string = DEFAULT_LOGGER_NAME): Log =>
  registry.get(name);

/**
 * Configures and returns a logger; repeated calls with the same name return
 * the same instance.
 *
 * @example
 * ```typescript
 * const log = setupLogger({ name: "worker", logfile: "/tmp/worker.log" });
 * ```
 */
export const setupLogger = (
  options: ConfigureOptions & { name?: string } = {},
): Log => registry.configure(options.name ?? SETUP_LOGGER_NAME, options);

export const resetDefaultLogger = (): Log =>
  registry.reset(DEFAULT_LOGGER_NAME);

export const loglevel = (level: Severity = "debug", updateCustom = false) =>
  setLevel(logger, level, { updateCustom });

export const formatter = (value: Formatter, updateCustom = false) =>
  setFormatter(logger, value, { updateCustom });

export const json = (
  enable = true,
  options: { ensureAscii?: boolean; updateCustom?: boolean } = {},
) => enableJson(logger, enable, options);

export const logfile = (filename: string | null, options?: LogfileOptions) =>
  setLogfile(logger, filename, options);

export const syslog = (options?: SyslogOptions) => addSyslog(logger, options);
