import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  DEFAULT_TEMPLATE,
  renderFallback,
  TextFormatter,
} from "@/log/formatter";
import { makeEvent } from "../helpers";

const throwingArg = {
  toString(): string {
    throw new Error("boom");
  },
};

describe("TextFormatter", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-01-01T00:00:00.000Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("renders the default template", () => {
    const formatter = new TextFormatter({ color: false });
    expect(formatter.format(makeEvent())).toBe(
      "[I 240101 00:00:00 server:42] hello",
    );
  });

  it("uses the first letter of the severity name", () => {
    const formatter = new TextFormatter({ color: false });
    expect(formatter.format(makeEvent({ severity: "critical" }))).toBe(
      "[C 240101 00:00:00 server:42] hello",
    );
  });

  describe("colors", () => {
    it("paints the color section when color is supported", () => {
      const formatter = new TextFormatter({ colorSupport: () => true });

      expect(formatter.colorEnabled).toBe(true);
      expect(formatter.format(makeEvent({ severity: "warning" }))).toBe(
        "\x1b[33m[W 240101 00:00:00 server:42]\x1b[39m hello",
      );
    });

    it.each([
      ["debug", "\x1b[36m", "\x1b[39m"],
      ["info", "\x1b[32m", "\x1b[39m"],
      ["error", "\x1b[31m", "\x1b[39m"],
    ] as const)("paints %s records", (severity, open, close) => {
      const formatter = new TextFormatter({ colorSupport: () => true });
      const line = formatter.format(makeEvent({ severity }));

      expect(line.startsWith(open)).toBe(true);
      expect(line).toContain(`]${close} hello`);
    });

    it("leaves critical records unpainted", () => {
      const formatter = new TextFormatter({ colorSupport: () => true });
      expect(formatter.format(makeEvent({ severity: "critical" }))).toBe(
        "[C 240101 00:00:00 server:42] hello",
      );
    });

    it("does not paint without color support", () => {
      const formatter = new TextFormatter({ colorSupport: () => false });

      expect(formatter.colorEnabled).toBe(false);
      expect(formatter.format(makeEvent())).toBe(
        "[I 240101 00:00:00 server:42] hello",
      );
    });

    it("accepts a custom color map", () => {
      const formatter = new TextFormatter({
        colorSupport: () => true,
        colors: { info: "magenta" },
      });
      expect(formatter.format(makeEvent())).toBe(
        "\x1b[35m[I 240101 00:00:00 server:42]\x1b[39m hello",
      );
    });

    it("withoutColor returns a plain copy", () => {
      const formatter = new TextFormatter({ colorSupport: () => true });
      const plain = formatter.withoutColor();

      expect(plain).not.toBe(formatter);
      expect(plain.colorEnabled).toBe(false);
      expect(plain.format(makeEvent())).toBe(
        "[I 240101 00:00:00 server:42] hello",
      );
    });

    it("withoutColor returns the same formatter when already plain", () => {
      const formatter = new TextFormatter({ color: false });
      expect(formatter.withoutColor()).toBe(formatter);
    });
  });

  describe("templates", () => {
    it("substitutes every record field", () => {
      const formatter = new TextFormatter({
        color: false,
        template:
          "{levelName}|{levelNo}|{loggerName}|{function}|{filename}|{path}|{threadName}",
      });
      expect(formatter.format(makeEvent())).toBe(
        "INFO|20|test|start|server.ts|/srv/app/server.ts|MainThread",
      );
    });

    it("substitutes process fields", () => {
      const formatter = new TextFormatter({
        color: false,
        template: "{processId} {processName}",
      });
      expect(formatter.format(makeEvent())).toBe(
        `${process.pid} ${process.title}`,
      );
    });

    it("keeps unknown placeholders literally", () => {
      const formatter = new TextFormatter({
        color: false,
        template: "{message} {unknown}",
      });
      expect(formatter.format(makeEvent())).toBe("hello {unknown}");
    });

    it("uses syslog severity names when asked", () => {
      const formatter = new TextFormatter({
        color: false,
        template: "{levelChar} {levelName} {levelNo}",
        syslogSeverityNames: true,
      });
      expect(formatter.format(makeEvent({ severity: "warning" }))).toBe(
        "W WRN 4",
      );
    });

    it("formats timestamps with named date templates", () => {
      const formatter = new TextFormatter({
        color: false,
        template: "{timestamp}",
        dateTemplate: "iso",
      });
      expect(formatter.format(makeEvent())).toBe(
        "2024-01-01T00:00:00.000+00:00",
      );
    });

    it("formats timestamps with date-fns patterns", () => {
      const formatter = new TextFormatter({
        color: false,
        template: "{timestamp}",
        dateTemplate: "yyyy/MM/dd",
      });
      expect(formatter.format(makeEvent())).toBe("2024/01/01");
    });

    it("exposes the default template", () => {
      expect(DEFAULT_TEMPLATE).toBe(
        "{color}[{levelChar} {timestamp} {module}:{line}]{endColor} {message}",
      );
    });
  });

  describe("multi-line output", () => {
    it("indents continuation lines of the message", () => {
      const formatter = new TextFormatter({ color: false });
      expect(
        formatter.format(makeEvent({ template: "line one\nline two" })),
      ).toBe("[I 240101 00:00:00 server:42] line one\n    line two");
    });

    it("appends the exception trace", () => {
      const formatter = new TextFormatter({ color: false });
      const event = makeEvent({
        severity: "error",
        exceptionTrace: "Error: boom\n    at run (/srv/app/run.ts:1:1)",
      });

      expect(formatter.format(event)).toBe(
        "[E 240101 00:00:00 server:42] hello\n" +
          "    Error: boom\n" +
          "        at run (/srv/app/run.ts:1:1)",
      );
    });

    it("trims trailing whitespace before the trace", () => {
      const formatter = new TextFormatter({
        color: false,
        template: "{message}   ",
      });
      const event = makeEvent({ exceptionTrace: "Error: boom" });

      expect(formatter.format(event)).toBe("hello\n    Error: boom");
    });
  });

  describe("fallback", () => {
    it("never throws when the message cannot be rendered", () => {
      const formatter = new TextFormatter({ color: false });
      const event = makeEvent({ template: "%s", args: [throwingArg] });

      expect(formatter.format(event)).toMatch(
        /^Bad message \(Error: boom\): LogEvent \{/,
      );
    });

    it("describes non-Error failures", () => {
      expect(renderFallback("nope", makeEvent())).toMatch(
        /^Bad message \('nope'\): LogEvent \{/,
      );
    });
  });
});
