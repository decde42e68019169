import type { Severity, StreamTarget } from "./config";
import type { LogEvent } from "./event";
import { type Formatter, TextFormatter } from "./formatter";
import { isAtLeast } from "./severity";
import { SinkError } from "../utils/errors";

export type DestinationKind = "stream" | "rotating_file" | "syslog";

export interface DestinationOptions {
  level?: Severity;
  /**
   * Protects the level from blanket level changes. Defaults to `true` when
   * `level` is given.
   */
  customLevel?: boolean;
  formatter?: Formatter;
  /** Created and owned by the reconciliation engine. */
  internal?: boolean;
}

/**
 * One output target with its own severity filter and formatter.
 *
 * A destination only narrows what its logger lets through: an event is
 * written when it passes the logger threshold and {@link accepts}.
 */
export abstract class Destination {
  abstract readonly kind: DestinationKind;
  readonly isInternal: boolean;
  private _level: Severity;
  private _isCustomLevel: boolean;
  private _formatter: Formatter;

  constructor(options: DestinationOptions = {}) {
    this.isInternal = options.internal ?? false;
    this._level = options.level ?? "debug";
    this._isCustomLevel = options.customLevel ?? options.level !== undefined;
    this._formatter = this.prepareFormatter(
      options.formatter ?? new TextFormatter(),
    );
  }

  get level(): Severity {
    return this._level;
  }

  get isCustomLevel(): boolean {
    return this._isCustomLevel;
  }

  get formatter(): Formatter {
    return this._formatter;
  }

  setLevel(level: Severity, options: { custom?: boolean } = {}): void {
    this._level = level;
    if (options.custom !== undefined) {
      this._isCustomLevel = options.custom;
    }
  }

  setFormatter(formatter: Formatter): void {
    this._formatter = this.prepareFormatter(formatter);
  }

  accepts(event: LogEvent): boolean {
    return isAtLeast(event.severity, this._level);
  }

  handle(event: LogEvent): void {
    this.write(this._formatter.format(event), event);
  }

  abstract write(rendered: string, event: LogEvent): void;

  close(): void {}

  protected prepareFormatter(formatter: Formatter): Formatter {
    return formatter;
  }
}

export interface WritableTarget {
  write(chunk: string): unknown;
}

/**
 * Writes newline-terminated lines to `stderr`, `stdout` or any writable.
 * Named targets are resolved on every write.
 */
export class StreamDestination extends Destination {
  readonly kind = "stream";
  readonly target: StreamTarget | WritableTarget;

  constructor(
    target: StreamTarget | WritableTarget = "stderr",
    options: DestinationOptions = {},
  ) {
    super(options);
    this.target = target;
  }

  get streamName(): StreamTarget | undefined {
    return typeof this.target === "string" ? this.target : undefined;
  }

  write(rendered: string): void {
    const stream =
      typeof this.target === "string" ? process[this.target] : this.target;
    try {
      stream.write(`${rendered}\n`);
    } catch (error) {
      throw new SinkError("write-failed", "Failed to write log line", error);
    }
  }
}

export const isStreamDestination = (
  destination: Destination,
): destination is StreamDestination => destination.kind === "stream";
