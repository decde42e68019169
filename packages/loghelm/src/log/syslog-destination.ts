import { createSocket, type Socket } from "dgram";
import { Destination, type DestinationOptions } from "./destination";
import type { LogEvent } from "./event";
import { type Formatter, TextFormatter } from "./formatter";
import { syslogSeverity } from "./severity";
import { SinkError } from "../utils/errors";

export const SYSLOG_FACILITIES = {
  kern: 0,
  user: 1,
  mail: 2,
  daemon: 3,
  auth: 4,
  syslog: 5,
  lpr: 6,
  news: 7,
  uucp: 8,
  cron: 9,
  authpriv: 10,
  ftp: 11,
  local0: 16,
  local1: 17,
  local2: 18,
  local3: 19,
  local4: 20,
  local5: 21,
  local6: 22,
  local7: 23,
} as const;
export type SyslogFacilityName = keyof typeof SYSLOG_FACILITIES;
export type SyslogFacility = SyslogFacilityName | number;

export const DEFAULT_SYSLOG_FACILITY: SyslogFacilityName = "user";
export const SYSLOG_TEMPLATE = "{message}";

const isFacilityName = (value: string): value is SyslogFacilityName =>
  Object.prototype.hasOwnProperty.call(SYSLOG_FACILITIES, value);

/**
 * Resolves a facility name or number to its code. Returns `undefined` for
 * unknown names and out of range numbers.
 */
export const resolveFacility = (
  facility: string | number,
): number | undefined => {
  if (typeof facility === "number") {
    return Number.isInteger(facility) && facility >= 0 && facility <= 23
      ? facility
      : undefined;
  }
  const name = facility.toLowerCase();
  return isFacilityName(name) ? SYSLOG_FACILITIES[name] : undefined;
};

/**
 * Delivers one encoded syslog message. Failures that happen after `send`
 * returns are thrown from the following `send`.
 */
export interface SyslogTransport {
  send(message: Buffer): void;
  close(): void;
}

export class UdpSyslogTransport implements SyslogTransport {
  private socket: Socket | null = null;
  private failure: Error | null = null;

  constructor(
    readonly host = "localhost",
    readonly port = 514,
  ) {}

  send(message: Buffer): void {
    const failure = this.failure;
    if (failure) {
      this.failure = null;
      throw failure;
    }
    this.getSocket().send(message, this.port, this.host, (error) => {
      if (error) this.failure = error;
    });
  }

  close(): void {
    this.socket?.close();
    this.socket = null;
  }

  private getSocket(): Socket {
    if (!this.socket) {
      const socket = createSocket("udp4");
      socket.on("error", (error) => {
        this.failure = error;
      });
      socket.unref();
      this.socket = socket;
    }
    return this.socket;
  }
}

export interface SyslogDestinationOptions extends DestinationOptions {
  facility?: number;
  transport?: SyslogTransport;
}

/**
 * Forwards events to syslog as `<PRI>message` datagrams, where PRI combines
 * the facility with the syslog code of the event severity.
 */
export class SyslogDestination extends Destination {
  readonly kind = "syslog";
  readonly facility: number;
  private readonly transport: SyslogTransport;

  constructor(options: SyslogDestinationOptions = {}) {
    super({
      ...options,
      formatter:
        options.formatter ?? new TextFormatter({ template: SYSLOG_TEMPLATE }),
    });
    this.facility =
      options.facility ?? SYSLOG_FACILITIES[DEFAULT_SYSLOG_FACILITY];
    this.transport = options.transport ?? new UdpSyslogTransport();
  }

  priority(event: LogEvent): number {
    return this.facility * 8 + syslogSeverity(event.severity).code;
  }

  write(rendered: string, event: LogEvent): void {
    try {
      this.transport.send(
        Buffer.from(`<${this.priority(event)}>${rendered}`, "utf8"),
      );
    } catch (error) {
      throw new SinkError(
        "send-failed",
        "Failed to send syslog message",
        error,
      );
    }
  }

  close(): void {
    this.transport.close();
  }

  protected prepareFormatter(formatter: Formatter): Formatter {
    return formatter.withoutColor();
  }
}
