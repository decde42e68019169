import { z } from "zod";

/**
 * Severity and configuration types and schemas.
 *
 * @example
 * ```typescript
 * const options: ConfigureOptions = {
 *   level: "info",
 *   logfile: "/var/log/app/app.log",
 *   maxBytes: 1_000_000,
 *   backupCount: 3,
 * };
 * ```
 *
 * @see {@link configureLogger} for usage
 */
export const SEVERITIES = [
  "debug",
  "info",
  "warning",
  "error",
  "critical",
] as const;
export const SeveritySchema = z.enum(SEVERITIES);
export type Severity = z.infer<typeof SeveritySchema>;

export const LOG_STREAMS = ["stderr", "stdout", "none"] as const;
export const LogStreamSchema = z.enum(LOG_STREAMS);
export type LogStream = z.infer<typeof LogStreamSchema>;
export type StreamTarget = Exclude<LogStream, "none">;

export const FILE_MODES = ["a", "w"] as const;
export type FileMode = (typeof FILE_MODES)[number];

export const DEFAULT_LOGGER_NAME = "loghelm_default";
export const ROOT_LOGGER_NAME = "root";
export const SETUP_LOGGER_NAME = "loghelm";

const LOGHELM_ENV_PREFIX = "LOGHELM_";
export const getLoghelmEnvName = (key: string) => `${LOGHELM_ENV_PREFIX}${key}`;

const encodingSchema = z.custom<BufferEncoding>(
  (value) => typeof value === "string" && Buffer.isEncoding(value),
  { message: "Unsupported encoding" },
);

export const ConfigureOptionsSchema = z.object({
  logfile: z.string().nullable().default(null),
  level: SeveritySchema.default("debug"),
  maxBytes: z.number().int().nonnegative().default(0),
  backupCount: z.number().int().nonnegative().default(0),
  fileLevel: SeveritySchema.nullable().default(null),
  fileMode: z.enum(FILE_MODES).default("a"),
  encoding: encodingSchema.default("utf8"),
  logStream: LogStreamSchema.default("stderr"),
  isRoot: z.boolean().default(false),
  json: z.boolean().default(false),
  jsonEnsureAscii: z.boolean().default(false),
  syncCustomDestinations: z.boolean().default(true),
});

export type ConfigureOptionsInput = z.input<typeof ConfigureOptionsSchema>;
export type ParsedConfigureOptions = z.infer<typeof ConfigureOptionsSchema>;
