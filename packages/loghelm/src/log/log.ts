import { inspect } from "util";
import type { Severity } from "./config";
import type { Destination } from "./destination";
import { LogEvent, type StackBoundary } from "./event";
import type { Formatter } from "./formatter";
import { isAtLeast } from "./severity";
import type { TextLike } from "../utils/safe-text";

/**
 * Named logger: a severity threshold plus the destinations events go to.
 *
 * @class
 * @example
 * ```typescript
 * const log = registry.configure("api", { level: "info" });
 * log.info("Listening on %d", 8080);
 *
 * try {
 *   await connect();
 * } catch (error) {
 *   log.exception(error, "Database unavailable");
 * }
 * ```
 *
 * Instances are obtained from a {@link LoggerRegistry}, which keeps one per
 * name. Logging calls are synchronous and never throw because of
 * formatting; sink failures surface as {@link SinkError}.
 *
 * @see {@link configureLogger} for reconciling destinations
 */
export class Log {
  readonly name: string;
  /** Last formatter set explicitly; used for destinations created later. */
  activeFormatter: Formatter | null = null;
  /**
   * Level the logger was configured with. The threshold can be lower when
   * a destination with a custom level asks for more.
   */
  configuredLevel: Severity = "debug";
  private _threshold: Severity = "debug";
  private readonly _destinations: Destination[] = [];

  constructor(name: string) {
    this.name = name;
  }

  get threshold(): Severity {
    return this._threshold;
  }

  setThreshold(level: Severity): void {
    this._threshold = level;
  }

  get destinations(): readonly Destination[] {
    return [...this._destinations];
  }

  addDestination(destination: Destination): void {
    if (!this._destinations.includes(destination)) {
      this._destinations.push(destination);
    }
  }

  /**
   * Detaches a destination without closing it.
   * @returns Whether the destination was attached
   */
  removeDestination(destination: Destination): boolean {
    const index = this._destinations.indexOf(destination);
    if (index === -1) return false;
    this._destinations.splice(index, 1);
    return true;
  }

  isEnabledFor(severity: Severity): boolean {
    return isAtLeast(severity, this._threshold);
  }

  debug(message: TextLike, ...args: unknown[]): void {
    this.emit("debug", message, args, this.debug);
  }

  info(message: TextLike, ...args: unknown[]): void {
    this.emit("info", message, args, this.info);
  }

  warning(message: TextLike, ...args: unknown[]): void {
    this.emit("warning", message, args, this.warning);
  }

  warn(message: TextLike, ...args: unknown[]): void {
    this.emit("warning", message, args, this.warn);
  }

  error(message: TextLike, ...args: unknown[]): void {
    this.emit("error", message, args, this.error);
  }

  critical(message: TextLike, ...args: unknown[]): void {
    this.emit("critical", message, args, this.critical);
  }

  /**
   * Logs at error severity with the error's stack as exception trace.
   * Without `message`, the error's own message is used.
   */
  exception(error: unknown, message?: TextLike, ...args: unknown[]): void {
    const trace =
      error instanceof Error
        ? error.stack ?? `${error.name}: ${error.message}`
        : `Non-Error exception: ${inspect(error)}`;
    const template =
      message ?? (error instanceof Error ? error.message : inspect(error));
    this.emit(
      "error",
      template,
      message === undefined ? [] : args,
      this.exception,
      trace,
    );
  }

  log(severity: Severity, message: TextLike, ...args: unknown[]): void {
    this.emit(severity, message, args, this.log);
  }

  private emit(
    severity: Severity,
    template: TextLike,
    args: unknown[],
    boundary: StackBoundary,
    exceptionTrace?: TextLike,
  ): void {
    if (!this.isEnabledFor(severity)) return;

    const event = new LogEvent({
      severity,
      loggerName: this.name,
      template,
      args,
      callSite: LogEvent.captureCallSite(boundary),
      exceptionTrace,
    });
    for (const destination of this._destinations) {
      if (destination.accepts(event)) {
        destination.handle(event);
      }
    }
  }
}
