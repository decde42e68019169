import * as fs from "fs";
import path from "path";
import type { FileMode } from "./config";
import { Destination, type DestinationOptions } from "./destination";
import type { Formatter } from "./formatter";
import { SinkError } from "../utils/errors";

export interface RotatingFileOptions extends DestinationOptions {
  /** Size at which the active file is rotated. `0` disables rotation. */
  maxBytes?: number;
  /** Number of `.N` backups kept. `0` disables rotation. */
  backupCount?: number;
  mode?: FileMode;
  encoding?: BufferEncoding;
}

/**
 * Appends lines to a file and rotates it by size.
 *
 * @class
 * @example
 * ```typescript
 * const destination = new RotatingFileDestination("/var/log/app/app.log", {
 *   maxBytes: 1_000_000,
 *   backupCount: 3,
 * });
 * // app.log, app.log.1, app.log.2, app.log.3
 * ```
 *
 * The parent directory is created when missing. All file operations are
 * synchronous, so a write never sees a half-rotated file. An empty active
 * file is never rotated.
 */
export class RotatingFileDestination extends Destination {
  readonly kind = "rotating_file";
  readonly filename: string;
  readonly maxBytes: number;
  readonly backupCount: number;
  readonly encoding: BufferEncoding;
  private fd: number | null = null;
  private size = 0;

  constructor(filename: string, options: RotatingFileOptions = {}) {
    super(options);
    this.filename = path.resolve(filename);
    this.maxBytes = options.maxBytes ?? 0;
    this.backupCount = options.backupCount ?? 0;
    this.encoding = options.encoding ?? "utf8";

    this.ensureDirectory();
    this.open(options.mode ?? "a");
  }

  /** Path of the `index`-th backup, e.g. `app.log.2`. */
  backupPath(index: number): string {
    return `${this.filename}.${index}`;
  }

  write(rendered: string): void {
    const data = Buffer.from(`${rendered}\n`, this.encoding);
    if (this.shouldRollover(data.length)) {
      this.rollover();
    }

    try {
      const fd = this.fd ?? this.open("a");
      fs.writeSync(fd, data);
      this.size += data.length;
    } catch (error) {
      throw new SinkError(
        "write-failed",
        `Failed to write to ${this.filename}`,
        error,
      );
    }
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    fs.closeSync(fd);
  }

  protected prepareFormatter(formatter: Formatter): Formatter {
    return formatter.withoutColor();
  }

  private shouldRollover(incoming: number): boolean {
    if (this.maxBytes <= 0 || this.backupCount <= 0) return false;
    return this.size > 0 && this.size + incoming >= this.maxBytes;
  }

  private rollover(): void {
    this.close();
    try {
      for (let index = this.backupCount - 1; index > 0; index--) {
        this.moveIfExists(this.backupPath(index), this.backupPath(index + 1));
      }
      this.moveIfExists(this.filename, this.backupPath(1));
    } catch (error) {
      throw new SinkError(
        "rotate-failed",
        `Failed to rotate ${this.filename}`,
        error,
      );
    }
    this.open("w");
  }

  private moveIfExists(source: string, destination: string): void {
    if (!fs.existsSync(source)) return;
    fs.rmSync(destination, { force: true });
    fs.renameSync(source, destination);
  }

  private ensureDirectory(): void {
    const directory = path.dirname(this.filename);
    try {
      fs.mkdirSync(directory, { recursive: true });
    } catch (error) {
      throw new SinkError(
        "directory-failed",
        `Failed to create log directory ${directory}`,
        error,
      );
    }
  }

  private open(mode: FileMode): number {
    try {
      const fd = fs.openSync(this.filename, mode);
      this.fd = fd;
      this.size = fs.fstatSync(fd).size;
      return fd;
    } catch (error) {
      throw new SinkError(
        "open-failed",
        `Failed to open ${this.filename}`,
        error,
      );
    }
  }
}

export const isRotatingFileDestination = (
  destination: Destination,
): destination is RotatingFileDestination =>
  destination.kind === "rotating_file";
