import type { LogEvent } from "./event";
import { type Formatter, levelFields, renderFallback } from "./formatter";
import { type DateTemplate, formatTimestamp } from "./timestamp";

export interface JsonFormatterOptions {
  /** Escape every non-ASCII character as `\uXXXX`. Defaults to raw UTF-8. */
  ensureAscii?: boolean;
  dateTemplate?: DateTemplate;
  syslogSeverityNames?: boolean;
}

export const JSON_FIELDS = [
  "timestamp",
  "filename",
  "function",
  "levelName",
  "levelNo",
  "line",
  "module",
  "message",
  "loggerName",
  "path",
  "processId",
  "processName",
  "threadName",
] as const;
export type JsonField = (typeof JSON_FIELDS)[number];

export type JsonRecord = Record<JsonField, string | number> & {
  exception?: string;
};

const escapeNonAscii = (json: string): string =>
  json.replace(
    /[\u0080-\uffff]/g,
    (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, "0")}`,
  );

/**
 * Renders each event as one flat JSON object.
 *
 * @example
 * ```typescript
 * new JsonFormatter().format(event);
 * // {"timestamp":"2024-01-01T00:00:00.000+00:00","filename":"server.ts",...}
 * ```
 */
export class JsonFormatter implements Formatter {
  readonly ensureAscii: boolean;
  private readonly dateTemplate: DateTemplate;
  private readonly syslogSeverityNames: boolean;

  constructor(options: JsonFormatterOptions = {}) {
    this.ensureAscii = options.ensureAscii ?? false;
    this.dateTemplate = options.dateTemplate ?? "iso";
    this.syslogSeverityNames = options.syslogSeverityNames ?? false;
  }

  format(event: LogEvent): string {
    try {
      const json = JSON.stringify(this.toRecord(event));
      return this.ensureAscii ? escapeNonAscii(json) : json;
    } catch (error) {
      return renderFallback(error, event);
    }
  }

  withoutColor(): JsonFormatter {
    return this;
  }

  toRecord(event: LogEvent): JsonRecord {
    const { callSite } = event;
    const record: JsonRecord = {
      timestamp: formatTimestamp(event.timestamp, this.dateTemplate),
      filename: callSite.filename,
      function: callSite.function,
      ...levelFields(event, this.syslogSeverityNames),
      line: callSite.line,
      module: callSite.module,
      message: event.message,
      loggerName: event.loggerName,
      path: callSite.path,
      processId: event.processId,
      processName: event.processName,
      threadName: event.threadName,
    };

    const exceptionLines = event.exceptionLines;
    if (exceptionLines) {
      record.exception = exceptionLines.join("\n");
    }
    return record;
  }
}
