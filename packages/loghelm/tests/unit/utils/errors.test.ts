import { describe, expect, it } from "vitest";
import { z } from "zod";
import {
  describeError,
  formatZodError,
  LoggerError,
  SinkError,
} from "@/utils/errors";

describe("errors", () => {
  it("names errors after their class", () => {
    expect(new LoggerError("x").name).toBe("LoggerError");
    expect(new SinkError("write-failed", "x").name).toBe("SinkError");
  });

  it("keeps the error type", () => {
    const error = new SinkError("open-failed", "Failed to open");

    expect(error).toBeInstanceOf(LoggerError);
    expect(error.type).toBe("open-failed");
    expect(error.message).toBe("Failed to open");
  });

  it("describes the cause of sink errors", () => {
    const cause = new Error("disk full");
    const error = new SinkError("write-failed", "Failed to write", cause);

    expect(error.message).toBe("Failed to write: Error: disk full");
    expect(error.cause).toBe(cause);
  });

  it("rejects unknown error types", () => {
    expect(
      () => new SinkError(JSON.parse('"exploded"'), "Failed"),
    ).toThrow(z.ZodError);
  });

  describe("describeError", () => {
    it("uses the name and message of errors", () => {
      expect(describeError(new TypeError("bad"))).toBe("TypeError: bad");
    });

    it("inspects other values", () => {
      expect(describeError({ code: 1 })).toBe("{ code: 1 }");
    });
  });

  describe("formatZodError", () => {
    it("lists each issue under the label", () => {
      const schema = z.object({ port: z.number() });
      const result = schema.safeParse({ port: "x" });
      if (result.success) throw new Error("Expected parse to fail");

      expect(formatZodError(result.error, "Bad config")).toBe(
        'Bad config\nport: Expected number, received string (received: "string")',
      );
    });

    it("omits the path for top-level issues", () => {
      const result = z.string().safeParse(1);
      if (result.success) throw new Error("Expected parse to fail");

      expect(formatZodError(result.error, "Bad value")).toBe(
        'Bad value\nExpected string, received number (received: "number")',
      );
    });
  });
});
