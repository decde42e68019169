import * as fs from "fs";
import os from "os";
import path from "path";
import { type CallSite, LogEvent, type LogEventInit } from "@/log/event";
import { TextFormatter } from "@/log/formatter";
import type { SyslogTransport } from "@/log/syslog-destination";

export const TEST_CALL_SITE: CallSite = {
  path: "/srv/app/server.ts",
  filename: "server.ts",
  module: "server",
  function: "start",
  line: 42,
};

export const makeEvent = (init: Partial<LogEventInit> = {}) =>
  new LogEvent({
    severity: "info",
    loggerName: "test",
    template: "hello",
    callSite: TEST_CALL_SITE,
    ...init,
  });

export const createMemoryTarget = () => {
  const chunks: string[] = [];
  return {
    chunks,
    write(chunk: string) {
      chunks.push(chunk);
      return true;
    },
  };
};

export const plainFormatter = (template = "{levelName} {message}") =>
  new TextFormatter({ color: false, template });

export const createTempDir = () =>
  fs.mkdtempSync(path.join(os.tmpdir(), "loghelm-"));

export const readText = (file: string) => fs.readFileSync(file, "utf8");

export const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
};

export class MemorySyslogTransport implements SyslogTransport {
  readonly messages: string[] = [];
  closed = false;

  send(message: Buffer): void {
    this.messages.push(message.toString("utf8"));
  }

  close(): void {
    this.closed = true;
  }
}

const ANSI_PATTERN = /\x1b\[\d+m/g;

export const stripAnsi = (text: string) => text.replace(ANSI_PATTERN, "");
