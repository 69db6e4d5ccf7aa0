import { EncodingError } from "../errors/shData.errors";
import type { XmlScalar } from "../types/shData.types";

const ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
};

const SIGNIFICANT_CHARS = /[&<>"']/g;

const isXmlChar = (codePoint: number): boolean =>
  codePoint === 0x9 ||
  codePoint === 0xa ||
  codePoint === 0xd ||
  (codePoint >= 0x20 && codePoint <= 0xd7ff) ||
  (codePoint >= 0xe000 && codePoint <= 0xfffd) ||
  (codePoint >= 0x10000 && codePoint <= 0x10ffff);

const NAME_START_CHARS =
  ":A-Z_a-z\\u{C0}-\\u{D6}\\u{D8}-\\u{F6}\\u{F8}-\\u{2FF}\\u{370}-\\u{37D}\\u{37F}-\\u{1FFF}" +
  "\\u{200C}-\\u{200D}\\u{2070}-\\u{218F}\\u{2C00}-\\u{2FEF}\\u{3001}-\\u{D7FF}" +
  "\\u{F900}-\\u{FDCF}\\u{FDF0}-\\u{FFFD}\\u{10000}-\\u{EFFFF}";
const NAME_CHARS = `${NAME_START_CHARS}\\-.0-9\\u{B7}\\u{300}-\\u{36F}\\u{203F}-\\u{2040}`;
const XML_NAME = new RegExp(`^[${NAME_START_CHARS}][${NAME_CHARS}]*$`, "u");

/**
 * True when `name` matches the XML 1.0 Name production.
 */
export const isXmlName = (name: string): boolean => XML_NAME.test(name);

const formatCodePoint = (codePoint: number): string =>
  `U+${codePoint.toString(16).toUpperCase().padStart(4, "0")}`;

/**
 * Throws EncodingError on the first code point outside the XML 1.0 Char range.
 */
export const assertXmlChars = (raw: string, field = "value"): void => {
  // for..of walks code points, so a valid surrogate pair arrives as one value
  // and a lone surrogate arrives on its own
  for (const char of raw) {
    const codePoint = char.codePointAt(0) ?? 0;
    if (!isXmlChar(codePoint)) {
      throw new EncodingError(
        `Illegal XML character ${formatCodePoint(codePoint)} in ${field}`,
        [{ field, message: `contains ${formatCodePoint(codePoint)}` }],
      );
    }
  }
};

export const escapeXmlValue = (raw: string): string =>
  raw.replace(SIGNIFICANT_CHARS, (char) => ENTITIES[char] ?? char);

const toText = (raw: XmlScalar, field: string): string => {
  if (typeof raw === "boolean") return raw ? "true" : "false";
  if (typeof raw === "number") {
    if (!Number.isFinite(raw)) {
      throw new EncodingError(`Non-finite number in ${field}`, [
        { field, message: `cannot encode ${raw}` },
      ]);
    }
    // Integers past 2^53 have already lost digits, and String() switches
    // to exponent form from 1e21 and below 1e-6
    const text = String(raw);
    if ((Number.isInteger(raw) && !Number.isSafeInteger(raw)) || /e/i.test(text)) {
      throw new EncodingError(`Number in ${field} has no exact decimal form`, [
        { field, message: `cannot encode ${text}` },
      ]);
    }
    return text;
  }
  return raw;
};

/**
 * Element text that has been checked and escaped. The private constructor
 * keeps `of` as the only way into a rendered tree.
 */
export class EscapedText {
  private constructor(public readonly value: string) {}

  static of(raw: XmlScalar, field = "value"): EscapedText {
    const text = toText(raw, field);
    assertXmlChars(text, field);
    return new EscapedText(escapeXmlValue(text));
  }

  toString(): string {
    return this.value;
  }
}
