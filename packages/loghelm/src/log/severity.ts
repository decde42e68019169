import type { Severity } from "./config";

/**
 * Integer rank of each severity. Lower rank is more verbose.
 */
export const SEVERITY_RANKS: Record<Severity, number> = {
  debug: 10,
  info: 20,
  warning: 30,
  error: 40,
  critical: 50,
};

export interface SyslogSeverity {
  name: string;
  code: number;
}

const SYSLOG_SEVERITIES: Record<Severity, SyslogSeverity> = {
  debug: { name: "DBG", code: 7 },
  info: { name: "INF", code: 6 },
  warning: { name: "WRN", code: 4 },
  error: { name: "ERR", code: 3 },
  critical: { name: "CRIT", code: 2 },
};

export const compareSeverity = (a: Severity, b: Severity): number =>
  SEVERITY_RANKS[a] - SEVERITY_RANKS[b];

export const isAtLeast = (severity: Severity, minimum: Severity): boolean =>
  compareSeverity(severity, minimum) >= 0;

export const minSeverity = (a: Severity, b: Severity): Severity =>
  compareSeverity(a, b) <= 0 ? a : b;

export const severityName = (severity: Severity): string =>
  severity.toUpperCase();

export const syslogSeverity = (severity: Severity): SyslogSeverity =>
  SYSLOG_SEVERITIES[severity];
