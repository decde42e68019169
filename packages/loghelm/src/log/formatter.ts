import pc from "picocolors";
import { inspect } from "util";
import type { Severity } from "./config";
import type { LogEvent } from "./event";
import {
  SEVERITY_RANKS,
  severityName,
  syslogSeverity,
} from "./severity";
import { type DateTemplate, formatTimestamp } from "./timestamp";
import {
  type ColorName,
  type Colors,
  supportsColor,
} from "../utils/color-support";
import { describeError } from "../utils/errors";

/**
 * Renders one event into one line (plus continuation lines).
 * Implementations never throw; see {@link renderFallback}.
 */
export interface Formatter {
  format(event: LogEvent): string;
  /** The same rendering without terminal colour codes, for files and syslog. */
  withoutColor(): Formatter;
}

export const DEFAULT_TEMPLATE =
  "{color}[{levelChar} {timestamp} {module}:{line}]{endColor} {message}";

export const DEFAULT_COLORS: Partial<Record<Severity, ColorName>> = {
  debug: "cyan",
  info: "green",
  warning: "yellow",
  error: "red",
};

const CONTINUATION_INDENT = "    ";
const PLACEHOLDER_PATTERN = /\{(\w+)\}/g;
const COLOR_SECTION_PATTERN = /^([\s\S]*?)\{color\}([\s\S]*?)\{endColor\}([\s\S]*)$/;

export interface TextFormatterOptions {
  color?: boolean;
  template?: string;
  dateTemplate?: DateTemplate;
  colors?: Partial<Record<Severity, ColorName>>;
  syslogSeverityNames?: boolean;
  colorSupport?: () => boolean;
}

/**
 * Result of a formatter that failed: names the error and dumps the record.
 */
export const renderFallback = (error: unknown, event: LogEvent): string => {
  let contents: string;
  try {
    contents = inspect(event, { depth: 2, breakLength: Infinity });
  } catch (inspectError) {
    contents = `<uninspectable record: ${describeError(inspectError)}>`;
  }
  return `Bad message (${describeError(error)}): ${contents}`;
};

export const levelFields = (event: LogEvent, syslogNames: boolean) => {
  if (syslogNames) {
    const { name, code } = syslogSeverity(event.severity);
    return { levelName: name, levelNo: code };
  }
  return {
    levelName: severityName(event.severity),
    levelNo: SEVERITY_RANKS[event.severity],
  };
};

const substitute = (text: string, fields: Record<string, string>): string =>
  text.replace(PLACEHOLDER_PATTERN, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(fields, key) ? fields[key] : match,
  );

/**
 * Single-line text formatter.
 *
 * @class
 * @example
 * ```typescript
 * const formatter = new TextFormatter({ color: false });
 * formatter.format(event);
 * // [I 240101 00:00:00 server:42] Listening on 8080
 * ```
 *
 * The part of the template between `{color}` and `{endColor}` is painted
 * with the colour mapped to the record's severity. Exception traces are
 * appended line by line, and every line after the first is indented by
 * four spaces so it stays attached to its header.
 */
export class TextFormatter implements Formatter {
  private readonly options: TextFormatterOptions;
  private readonly template: string;
  private readonly dateTemplate?: DateTemplate;
  private readonly colors: Partial<Record<Severity, ColorName>>;
  private readonly paint: Colors | null;

  constructor(options: TextFormatterOptions = {}) {
    this.options = options;
    this.template = options.template ?? DEFAULT_TEMPLATE;
    this.dateTemplate = options.dateTemplate;
    this.colors = options.colors ?? DEFAULT_COLORS;
    const colorSupport = options.colorSupport ?? supportsColor;
    this.paint =
      (options.color ?? true) && colorSupport() ? pc.createColors(true) : null;
  }

  get colorEnabled(): boolean {
    return this.paint !== null;
  }

  format(event: LogEvent): string {
    try {
      return this.render(event);
    } catch (error) {
      return renderFallback(error, event);
    }
  }

  withoutColor(): TextFormatter {
    return this.paint
      ? new TextFormatter({ ...this.options, color: false })
      : this;
  }

  private render(event: LogEvent): string {
    let formatted = this.renderTemplate(event);

    const exceptionLines = event.exceptionLines;
    if (exceptionLines) {
      formatted = [formatted.trimEnd(), ...exceptionLines].join("\n");
    }
    return formatted.replace(/\n/g, `\n${CONTINUATION_INDENT}`);
  }

  private renderTemplate(event: LogEvent): string {
    const fields = this.fields(event);
    const match = COLOR_SECTION_PATTERN.exec(this.template);
    const colorName = this.colors[event.severity];
    if (!match || !this.paint || !colorName) {
      return substitute(this.template, fields);
    }

    const [, before, section, after] = match;
    return (
      substitute(before, fields) +
      this.paint[colorName](substitute(section, fields)) +
      substitute(after, fields)
    );
  }

  private fields(event: LogEvent): Record<string, string> {
    const { callSite } = event;
    const { levelName, levelNo } = levelFields(
      event,
      this.options.syslogSeverityNames ?? false,
    );

    return {
      color: "",
      endColor: "",
      levelChar: levelName.charAt(0),
      levelName,
      levelNo: String(levelNo),
      timestamp: formatTimestamp(event.timestamp, this.dateTemplate),
      module: callSite.module,
      function: callSite.function,
      line: String(callSite.line),
      filename: callSite.filename,
      path: callSite.path,
      loggerName: event.loggerName,
      message: event.message,
      processId: String(event.processId),
      processName: event.processName,
      threadName: event.threadName,
    };
  }
}
