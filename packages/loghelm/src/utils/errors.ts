import { inspect } from "util";
import { z, ZodError } from "zod";

export class LoggerError extends Error {
  type?: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

const SinkErrorTypeSchema = z.enum([
  "directory-failed",
  "open-failed",
  "rotate-failed",
  "send-failed",
  "write-failed",
]);
export type SinkErrorType = z.infer<typeof SinkErrorTypeSchema>;

/**
 * Raised when a destination cannot reach its sink. Never caught by the
 * library: losing log output silently is worse than failing.
 */
export class SinkError extends LoggerError {
  type: SinkErrorType;

  constructor(type: SinkErrorType, message: string, cause?: unknown) {
    super(
      cause === undefined ? message : `${message}: ${describeError(cause)}`,
      { cause },
    );
    this.type = SinkErrorTypeSchema.parse(type);
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? `${error.name}: ${error.message}` : inspect(error);

export const formatZodError = <T>(
  error: ZodError<T>,
  label: string,
): string => {
  const errorsString = error.errors
    .map((err) => {
      const path = err.path.join(".");
      const prefix = path ? `${path}: ` : "";
      const receivedInfo =
        "received" in err ? ` (received: ${JSON.stringify(err.received)})` : "";
      return `${prefix}${err.message}${receivedInfo}`;
    })
    .join("\n");

  return `${label}\n${errorsString}`;
};
