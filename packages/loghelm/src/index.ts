export {
  formatter,
  getLogger,
  json,
  Log,
  logfile,
  logger,
  LoggerRegistry,
  loglevel,
  registry,
  resetDefaultLogger,
  setupLogger,
  syslog,
} from "./log";
export {
  DEFAULT_LOGGER_NAME,
  ROOT_LOGGER_NAME,
  SEVERITIES,
  type LogStream,
  type Severity,
} from "./log/config";
export {
  Destination,
  StreamDestination,
  type DestinationKind,
  type DestinationOptions,
  type WritableTarget,
} from "./log/destination";
export { LogEvent, type CallSite } from "./log/event";
export {
  RotatingFileDestination,
  type RotatingFileOptions,
} from "./log/file-destination";
export {
  DEFAULT_COLORS,
  DEFAULT_TEMPLATE,
  TextFormatter,
  type Formatter,
  type TextFormatterOptions,
} from "./log/formatter";
export { logFunctionCall } from "./log/function-call";
export {
  JsonFormatter,
  JSON_FIELDS,
  type JsonFormatterOptions,
} from "./log/json-formatter";
export {
  addSyslog,
  configureLogger,
  enableJson,
  resetLogger,
  setFormatter,
  setLevel,
  setLogfile,
  type ConfigureOptions,
  type LogfileOptions,
  type SyslogOptions,
  type UpdateOptions,
} from "./log/reconcile";
export {
  compareSeverity,
  severityName,
  syslogSeverity,
  SEVERITY_RANKS,
} from "./log/severity";
export {
  SYSLOG_FACILITIES,
  SyslogDestination,
  UdpSyslogTransport,
  type SyslogFacilityName,
  type SyslogTransport,
} from "./log/syslog-destination";
export {
  DEFAULT_DATE_TEMPLATE,
  NAMED_DATE_TEMPLATES,
  type DateTemplate,
} from "./log/timestamp";
export { LoggerError, SinkError } from "./utils/errors";
