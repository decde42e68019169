import { ROOT_LOGGER_NAME } from "./config";
import { Log } from "./log";
import {
  type ConfigureOptions,
  configureLogger,
  resetLogger,
} from "./reconcile";

/**
 * Keeps one {@link Log} per name.
 *
 * @class
 * @example
 * ```typescript
 * const registry = new LoggerRegistry();
 * const log = registry.configure("worker", { logfile: "/tmp/worker.log" });
 * registry.get("worker") === log; // true
 * ```
 *
 * Configuration calls are synchronous and are not meant to interleave on
 * the same name.
 */
export class LoggerRegistry {
  private readonly loggers = new Map<string, Log>();

  get(name: string): Log {
    let log = this.loggers.get(name);
    if (!log) {
      log = new Log(name);
      this.loggers.set(name, log);
    }
    return log;
  }

  has(name: string): boolean {
    return this.loggers.has(name);
  }

  names(): string[] {
    return [...this.loggers.keys()];
  }

  /**
   * Creates or retrieves the logger and reconciles it with `options`.
   * `isRoot` selects the root logger whatever the name.
   */
  configure(name: string, options: ConfigureOptions = {}): Log {
    const log = this.get(options.isRoot === true ? ROOT_LOGGER_NAME : name);
    return configureLogger(log, options);
  }

  /**
   * Returns the logger to its initial state, creating it if needed: default
   * options, no formatter override, one internal stderr destination.
   */
  reset(name: string): Log {
    return resetLogger(this.get(name));
  }
}
