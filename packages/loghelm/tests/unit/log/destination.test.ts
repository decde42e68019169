import { afterEach, describe, expect, it, vi } from "vitest";
import { isStreamDestination, StreamDestination } from "@/log/destination";
import { JsonFormatter } from "@/log/json-formatter";
import { SinkError } from "@/utils/errors";
import {
  captureError,
  createMemoryTarget,
  makeEvent,
  plainFormatter,
} from "../helpers";

describe("StreamDestination", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes one newline-terminated line per event", () => {
    const target = createMemoryTarget();
    const destination = new StreamDestination(target, {
      formatter: plainFormatter(),
    });

    destination.handle(makeEvent());
    destination.handle(makeEvent({ severity: "error", template: "bad" }));

    expect(target.chunks).toEqual(["INFO hello\n", "ERROR bad\n"]);
  });

  it("resolves named streams on every write", () => {
    const write = vi
      .spyOn(process.stdout, "write")
      .mockImplementation(() => true);
    const destination = new StreamDestination("stdout", {
      formatter: plainFormatter(),
    });

    destination.handle(makeEvent());

    expect(destination.streamName).toBe("stdout");
    expect(write).toHaveBeenCalledWith("INFO hello\n");
  });

  it("has no stream name for custom targets", () => {
    const destination = new StreamDestination(createMemoryTarget());
    expect(destination.streamName).toBeUndefined();
  });

  it("defaults to stderr", () => {
    expect(new StreamDestination().streamName).toBe("stderr");
  });

  it("wraps write failures in a SinkError", () => {
    const destination = new StreamDestination(
      {
        write() {
          throw new Error("EPIPE");
        },
      },
      { formatter: plainFormatter() },
    );

    const error = captureError(() => destination.handle(makeEvent()));

    expect(error).toBeInstanceOf(SinkError);
    expect(error).toMatchObject({
      type: "write-failed",
      message: "Failed to write log line: Error: EPIPE",
    });
  });

  describe("levels", () => {
    it("accepts everything by default", () => {
      const destination = new StreamDestination(createMemoryTarget());

      expect(destination.level).toBe("debug");
      expect(destination.isCustomLevel).toBe(false);
      expect(destination.accepts(makeEvent({ severity: "debug" }))).toBe(true);
    });

    it("filters events below its level", () => {
      const destination = new StreamDestination(createMemoryTarget(), {
        level: "warning",
      });

      expect(destination.accepts(makeEvent({ severity: "info" }))).toBe(false);
      expect(destination.accepts(makeEvent({ severity: "warning" }))).toBe(
        true,
      );
      expect(destination.accepts(makeEvent({ severity: "critical" }))).toBe(
        true,
      );
    });

    it("treats an explicit level as custom", () => {
      const destination = new StreamDestination(createMemoryTarget(), {
        level: "info",
      });
      expect(destination.isCustomLevel).toBe(true);
    });

    it("lets customLevel override the implied flag", () => {
      const destination = new StreamDestination(createMemoryTarget(), {
        level: "info",
        customLevel: false,
      });
      expect(destination.isCustomLevel).toBe(false);
    });

    it("updates the custom flag only when asked", () => {
      const destination = new StreamDestination(createMemoryTarget());

      destination.setLevel("error");
      expect(destination.isCustomLevel).toBe(false);

      destination.setLevel("info", { custom: true });
      expect(destination.level).toBe("info");
      expect(destination.isCustomLevel).toBe(true);
    });
  });

  it("swaps formatters", () => {
    const target = createMemoryTarget();
    const destination = new StreamDestination(target, {
      formatter: plainFormatter(),
    });
    const formatter = new JsonFormatter();

    destination.setFormatter(formatter);
    destination.handle(makeEvent());

    expect(destination.formatter).toBe(formatter);
    expect(JSON.parse(target.chunks[0]).message).toBe("hello");
  });

  it("is internal only when created so", () => {
    expect(new StreamDestination().isInternal).toBe(false);
    expect(new StreamDestination("stderr", { internal: true }).isInternal).toBe(
      true,
    );
  });

  it("is recognized by isStreamDestination", () => {
    expect(isStreamDestination(new StreamDestination())).toBe(true);
  });
});
