import { z } from "zod";
import {
  ConfigureOptionsSchema,
  type ConfigureOptionsInput,
  type FileMode,
  type ParsedConfigureOptions,
  type Severity,
} from "./config";
import {
  type Destination,
  isStreamDestination,
  StreamDestination,
} from "./destination";
import {
  isRotatingFileDestination,
  RotatingFileDestination,
} from "./file-destination";
import { type Formatter, TextFormatter } from "./formatter";
import { JsonFormatter } from "./json-formatter";
import type { Log } from "./log";
import { compareSeverity, minSeverity } from "./severity";
import {
  DEFAULT_SYSLOG_FACILITY,
  resolveFacility,
  SYSLOG_FACILITIES,
  SyslogDestination,
  type SyslogFacility,
  type SyslogTransport,
} from "./syslog-destination";
import { formatZodError } from "../utils/errors";

export interface ConfigureOptions extends ConfigureOptionsInput {
  formatter?: Formatter | null;
}

export interface UpdateOptions {
  /** Also update destinations the application attached itself. */
  updateCustom?: boolean;
}

export interface LogfileOptions {
  formatter?: Formatter;
  mode?: FileMode;
  maxBytes?: number;
  backupCount?: number;
  encoding?: BufferEncoding;
  /** Custom level for the file; protected from {@link setLevel}. */
  level?: Severity;
  disableStream?: boolean;
}

export interface SyslogOptions {
  facility?: SyslogFacility | string;
  disableStream?: boolean;
  level?: Severity;
  transport?: SyslogTransport;
}

const INVALID_CONFIG_LABEL =
  "Invalid logger configuration, using defaults for:";

const LogfileOptionsSchema = ConfigureOptionsSchema.pick({
  maxBytes: true,
  backupCount: true,
  fileMode: true,
  encoding: true,
});

/**
 * Parses `input` with `schema`. Top-level keys that fail validation are
 * dropped so their defaults apply; the issues are returned as text.
 */
const parseLenient = <T extends z.AnyZodObject>(
  schema: T,
  input: object,
): { options: z.infer<T>; problems?: string } => {
  const result = schema.safeParse(input);
  if (result.success) return { options: result.data };

  const invalidKeys = new Set(
    result.error.issues.map((issue) => issue.path[0]),
  );
  const sanitized = Object.fromEntries(
    Object.entries(input).filter(([key]) => !invalidKeys.has(key)),
  );
  const retry = schema.safeParse(sanitized);
  return {
    options: retry.success ? retry.data : schema.parse({}),
    problems: formatZodError(result.error, INVALID_CONFIG_LABEL),
  };
};

export const parseConfigureOptions = (
  input: ConfigureOptions = {},
): { options: ParsedConfigureOptions; problems?: string } =>
  parseLenient(ConfigureOptionsSchema, input);

const detach = (log: Log, destination: Destination): void => {
  log.removeDestination(destination);
  destination.close();
};

/**
 * Removes the internal file and syslog destinations, and the internal
 * stream destinations when `streams` is set.
 */
const detachInternal = (log: Log, options: { streams: boolean }): void => {
  for (const destination of log.destinations) {
    if (!destination.isInternal) continue;
    if (isStreamDestination(destination) && !options.streams) continue;
    detach(log, destination);
  }
};

/** Lowers the logger threshold so a destination at `level` sees its events. */
const admit = (log: Log, level: Severity): void => {
  if (compareSeverity(level, log.threshold) < 0) {
    log.setThreshold(level);
  }
};

const applyFormatter = (
  log: Log,
  formatter: Formatter,
  { updateCustom = false }: UpdateOptions,
): void => {
  for (const destination of log.destinations) {
    if (destination.isInternal || updateCustom) {
      destination.setFormatter(formatter);
    }
  }
};

/**
 * Reconciles the destinations of `log` with `input`.
 *
 * Internal file destinations are always replaced. The internal stream
 * destination is kept when it targets the requested stream, so calling
 * this twice with the same options leaves one stream and one file
 * destination. Destinations the application attached are never removed;
 * unless `syncCustomDestinations` is false they follow the new formatter
 * and, when their level is not custom, the new level.
 *
 * Invalid option values fall back to their defaults and are reported as a
 * warning through `log` itself.
 */
export const configureLogger = (
  log: Log,
  input: ConfigureOptions = {},
): Log => {
  const { options, problems } = parseConfigureOptions(input);
  const { level, fileLevel, logStream } = options;

  log.configuredLevel = level;
  // The logger gate must let through everything a destination wants
  log.setThreshold(fileLevel ? minSeverity(level, fileLevel) : level);

  if (input.formatter) {
    log.activeFormatter = input.formatter;
  }
  const formatter: Formatter = options.json
    ? new JsonFormatter({ ensureAscii: options.jsonEnsureAscii })
    : input.formatter ?? new TextFormatter();

  let stream: StreamDestination | undefined;
  for (const destination of log.destinations) {
    if (!destination.isInternal) {
      if (options.syncCustomDestinations) {
        if (!destination.isCustomLevel) destination.setLevel(level);
        destination.setFormatter(formatter);
      }
      continue;
    }

    if (isRotatingFileDestination(destination)) {
      detach(log, destination);
      continue;
    }
    if (isStreamDestination(destination)) {
      if (stream || destination.streamName !== logStream) {
        detach(log, destination);
        continue;
      }
      stream = destination;
    }
    destination.setLevel(level);
    destination.setFormatter(formatter);
  }

  if (logStream !== "none" && !stream) {
    log.addDestination(
      new StreamDestination(logStream, {
        level,
        customLevel: false,
        formatter,
        internal: true,
      }),
    );
  }

  if (options.logfile) {
    log.addDestination(
      new RotatingFileDestination(options.logfile, {
        level: fileLevel ?? level,
        customLevel: fileLevel !== null,
        formatter,
        internal: true,
        maxBytes: options.maxBytes,
        backupCount: options.backupCount,
        mode: options.fileMode,
        encoding: options.encoding,
      }),
    );
  }

  if (problems) {
    log.warning(problems);
  }
  return log;
};

/**
 * Detaches every destination, closing the internal ones, and reconfigures
 * `log` with default options.
 */
export const resetLogger = (log: Log): Log => {
  for (const destination of log.destinations) {
    log.removeDestination(destination);
    if (destination.isInternal) destination.close();
  }
  log.setThreshold("debug");
  log.configuredLevel = "debug";
  log.activeFormatter = null;
  return configureLogger(log);
};

/**
 * Sets the configured level and the level of the internal destinations.
 * Destinations with a custom level keep it, even with `updateCustom`, and
 * the threshold stays low enough for them.
 */
export const setLevel = (
  log: Log,
  level: Severity,
  { updateCustom = false }: UpdateOptions = {},
): void => {
  log.configuredLevel = level;
  log.setThreshold(level);
  for (const destination of log.destinations) {
    if (destination.isCustomLevel) {
      admit(log, destination.level);
    } else if (destination.isInternal || updateCustom) {
      destination.setLevel(level);
    }
  }
};

export const setFormatter = (
  log: Log,
  formatter: Formatter,
  options: UpdateOptions = {},
): void => {
  applyFormatter(log, formatter, options);
  log.activeFormatter = formatter;
};

/**
 * Swaps in the JSON formatter, or the default text formatter when
 * `enable` is false. The choice is not remembered: destinations created
 * later use the active formatter.
 */
export const enableJson = (
  log: Log,
  enable = true,
  {
    ensureAscii = false,
    ...options
  }: UpdateOptions & { ensureAscii?: boolean } = {},
): void => {
  applyFormatter(
    log,
    enable ? new JsonFormatter({ ensureAscii }) : new TextFormatter(),
    options,
  );
};

/**
 * Replaces the internal file destination of `log`. Passing `null` only
 * removes it.
 */
export const setLogfile = (
  log: Log,
  filename: string | null,
  input: LogfileOptions = {},
): RotatingFileDestination | undefined => {
  const { options, problems } = parseLenient(LogfileOptionsSchema, {
    maxBytes: input.maxBytes,
    backupCount: input.backupCount,
    fileMode: input.mode,
    encoding: input.encoding,
  });

  detachInternal(log, { streams: input.disableStream ?? false });

  if (input.formatter) {
    log.activeFormatter = input.formatter;
  }
  const formatter =
    input.formatter ?? log.activeFormatter ?? new TextFormatter();
  applyFormatter(log, formatter, {});

  let destination: RotatingFileDestination | undefined;
  if (filename) {
    const { level } = input;
    if (level) admit(log, level);
    destination = new RotatingFileDestination(filename, {
      level: level ?? log.configuredLevel,
      customLevel: level !== undefined,
      formatter,
      internal: true,
      maxBytes: options.maxBytes,
      backupCount: options.backupCount,
      mode: options.fileMode,
      encoding: options.encoding,
    });
    log.addDestination(destination);
  }

  if (problems) {
    log.warning(problems);
  }
  return destination;
};

/**
 * Sends `log` to syslog. Removes the internal file destination and, unless
 * `disableStream` is false, the internal stream destination.
 */
export const addSyslog = (
  log: Log,
  {
    facility = DEFAULT_SYSLOG_FACILITY,
    disableStream = true,
    level,
    transport,
  }: SyslogOptions = {},
): SyslogDestination => {
  detachInternal(log, { streams: disableStream });
  if (level) admit(log, level);

  const code = resolveFacility(facility);
  const destination = new SyslogDestination({
    facility: code ?? SYSLOG_FACILITIES[DEFAULT_SYSLOG_FACILITY],
    transport,
    level: level ?? log.configuredLevel,
    customLevel: level !== undefined,
    formatter: log.activeFormatter ?? undefined,
    internal: true,
  });
  log.addDestination(destination);

  if (code === undefined) {
    log.warning(
      'Unknown syslog facility %s, using "%s"',
      JSON.stringify(facility),
      DEFAULT_SYSLOG_FACILITY,
    );
  }
  return destination;
};
