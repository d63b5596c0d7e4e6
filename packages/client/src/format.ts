/**
 * Response formatting — Minecraft color codes
 *
 * Servers mark colors with "§" followed by one code byte. Depending on the
 * display mode these are kept, removed, or turned into ANSI escapes.
 *
 * Replies are handled as bytes, not text: whatever the server sent reaches
 * stdout unchanged apart from the color codes, valid UTF-8 or not.
 */

export type ColorMode = "ansi" | "strip" | "raw";

export interface DisplayOptions {
  /** Print nothing at all */
  silent: boolean;
  colors: ColorMode;
}

/** "§" in UTF-8 */
export const SECTION_SIGN = Buffer.from([0xc2, 0xa7]);

export const ANSI_RESET = "\u001b[0m";

const RESET_BYTES = Buffer.from(ANSI_RESET, "ascii");
const NEWLINE = 0x0a;
const EMPTY = Buffer.alloc(0);

/** Color code → ANSI escape. Unlisted codes are dropped from the output. */
const ANSI_BY_CODE: Readonly<Record<string, string>> = {
  "0": "\u001b[0;30m",   // black
  "1": "\u001b[0;34m",   // dark blue
  "2": "\u001b[0;32m",   // dark green
  "3": "\u001b[0;36m",   // dark aqua
  "4": "\u001b[0;31m",   // dark red
  "5": "\u001b[0;35m",   // dark purple
  "6": "\u001b[0;33m",   // gold
  "7": "\u001b[0;37m",   // gray
  "8": "\u001b[0;1;30m", // dark gray
  "9": "\u001b[0;1;34m", // blue
  a: "\u001b[0;1;32m",   // green
  b: "\u001b[0;1;36m",   // aqua
  c: "\u001b[0;1;31m",   // red
  d: "\u001b[0;1;35m",   // light purple
  e: "\u001b[0;1;33m",   // yellow
  f: "\u001b[0;1;37m",   // white
  n: "\u001b[4m",        // underline
  r: ANSI_RESET,
};

/** A "§" at `i` with a code byte after it */
function isColorCode(body: Buffer, i: number): boolean {
  return i + 2 < body.length && body[i] === 0xc2 && body[i + 1] === 0xa7;
}

/**
 * Remove every "§x" sequence. A "§" with nothing after it is kept.
 */
export function stripColorCodes(body: Buffer): Buffer {
  const parts: Buffer[] = [];
  let start = 0;
  for (let i = 0; i < body.length; i++) {
    if (isColorCode(body, i)) {
      parts.push(body.subarray(start, i));
      i += 2;
      start = i + 1;
    }
  }
  parts.push(body.subarray(start));
  return Buffer.concat(parts);
}

/**
 * Replace color codes with ANSI escapes, reset before every line break,
 * and reset once more at the end.
 */
export function translateColorCodes(body: Buffer): Buffer {
  const parts: Buffer[] = [];
  let start = 0;
  for (let i = 0; i < body.length; i++) {
    if (isColorCode(body, i)) {
      parts.push(body.subarray(start, i));
      const ansi = ANSI_BY_CODE[String.fromCharCode(body.readUInt8(i + 2))];
      if (ansi) parts.push(Buffer.from(ansi, "ascii"));
      i += 2;
      start = i + 1;
    } else if (body[i] === NEWLINE) {
      parts.push(body.subarray(start, i), RESET_BYTES);
      start = i;
    }
  }
  parts.push(body.subarray(start), RESET_BYTES);
  return Buffer.concat(parts);
}

/**
 * Turn a response body into exactly the bytes written to stdout.
 * Returns an empty buffer when nothing should be printed.
 */
export function formatResponse(body: Buffer, options: DisplayOptions): Buffer {
  if (options.silent || body.length === 0) return EMPTY;

  if (options.colors === "raw") return body;

  const visible = stripColorCodes(body);
  const text = options.colors === "strip" ? visible : translateColorCodes(body);
  // The check looks at the visible text in every mode. The ANSI form always
  // ends in a reset, so checking it instead would add a newline even after a
  // reply that already ends with one.
  return visible[visible.length - 1] === NEWLINE ? text : Buffer.concat([text, Buffer.from("\n")]);
}
