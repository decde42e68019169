import { inspect } from "util";

export type TextLike = string | Uint8Array;

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decodes raw bytes as UTF-8. Bytes that are not valid UTF-8 are rendered
 * with `util.inspect` instead.
 */
export const toSafeText = (value: TextLike): string => {
  if (typeof value === "string") return value;
  try {
    return utf8.decode(value);
  } catch {
    return inspect(value);
  }
};

/**
 * Splits on `\n` before decoding, so one undecodable line does not affect
 * its neighbours.
 */
export const splitSafeLines = (value: TextLike): string[] => {
  if (typeof value === "string") return value.split("\n");

  const lines: string[] = [];
  let start = 0;
  for (let i = 0; i <= value.length; i++) {
    if (i === value.length || value[i] === 0x0a) {
      lines.push(toSafeText(value.subarray(start, i)));
      start = i + 1;
    }
  }
  return lines;
};
