import pc from "picocolors";
import { getLoghelmEnvName } from "../log/config";

export type Colors = ReturnType<typeof pc.createColors>;
export type ColorName = Exclude<keyof Colors, "isColorSupported">;

export const FORCE_COLOR_ENV = getLoghelmEnvName("FORCE_COLOR");

/**
 * Whether log lines written to stderr should carry colour codes.
 * `LOGHELM_FORCE_COLOR=1` wins over terminal detection.
 */
export const supportsColor = (): boolean => {
  if (process.env[FORCE_COLOR_ENV] === "1") return true;
  return pc.isColorSupported && Boolean(process.stderr.isTTY);
};
