import { basename, extname } from "path";
import { fileURLToPath } from "url";
import { format } from "util";
import { isMainThread, threadId } from "worker_threads";
import type { Severity } from "./config";
import { splitSafeLines, type TextLike, toSafeText } from "../utils/safe-text";

export interface CallSite {
  path: string;
  filename: string;
  module: string;
  function: string;
  line: number;
}

export type StackBoundary = (...args: never[]) => unknown;

export interface LogEventInit {
  severity: Severity;
  loggerName: string;
  template: TextLike;
  args?: readonly unknown[];
  callSite?: CallSite;
  exceptionTrace?: TextLike;
}

const FRAME_PATTERN = /^\s*at\s+(?:(.*?)\s+\()?(.+?):(\d+):(\d+)\)?$/;

/**
 * Snapshot of a single logging call.
 *
 * @class
 * @example
 * ```typescript
 * const event = new LogEvent({
 *   severity: "info",
 *   loggerName: "api",
 *   template: "Listening on %d",
 *   args: [8080],
 * });
 * event.message; // "Listening on 8080"
 * ```
 *
 * The message is expanded on first access and cached. Expansion can throw
 * (a `toString` that throws, for instance); formatters catch that.
 *
 * @see {@link Formatter.format} for rendering
 */
export class LogEvent {
  static readonly UNKNOWN_CALL_SITE: CallSite = {
    path: "(unknown file)",
    filename: "(unknown file)",
    module: "(unknown)",
    function: "(unknown function)",
    line: 0,
  };

  /**
   * Reads the frame just above `boundary` from the V8 stack.
   */
  static captureCallSite(boundary: StackBoundary): CallSite {
    const holder: { stack?: string } = {};
    Error.captureStackTrace(holder, boundary);
    return LogEvent.parseFrame(holder.stack?.split("\n")[1]);
  }

  static parseFrame(frame: string | undefined): CallSite {
    const match = frame ? FRAME_PATTERN.exec(frame) : null;
    if (!match) return LogEvent.UNKNOWN_CALL_SITE;

    const [, fn, location, line] = match;
    const path = location.startsWith("file://")
      ? fileURLToPath(location)
      : location;
    return {
      path,
      filename: basename(path),
      module: basename(path, extname(path)),
      function: fn || "<anonymous>",
      line: Number(line),
    };
  }

  readonly timestamp: Date;
  readonly severity: Severity;
  readonly loggerName: string;
  readonly template: TextLike;
  readonly args: readonly unknown[];
  readonly callSite: CallSite;
  readonly exceptionTrace?: TextLike;
  readonly processId: number;
  readonly processName: string;
  readonly threadName: string;

  private _message: string | null = null;

  constructor(init: LogEventInit) {
    this.timestamp = new Date();
    this.severity = init.severity;
    this.loggerName = init.loggerName;
    this.template = init.template;
    this.args = init.args ?? [];
    this.callSite = init.callSite ?? LogEvent.UNKNOWN_CALL_SITE;
    this.exceptionTrace = init.exceptionTrace;
    this.processId = process.pid;
    this.processName = process.title;
    this.threadName = isMainThread ? "MainThread" : `Thread-${threadId}`;
  }

  get message(): string {
    return (this._message ??= this.renderMessage());
  }

  get exceptionLines(): string[] | undefined {
    return this.exceptionTrace === undefined
      ? undefined
      : splitSafeLines(this.exceptionTrace);
  }

  private renderMessage(): string {
    const template = toSafeText(this.template);
    if (!this.args.length) return template;
    return format(
      template,
      ...this.args.map((arg) =>
        arg instanceof Uint8Array ? toSafeText(arg) : arg,
      ),
    );
  }
}
