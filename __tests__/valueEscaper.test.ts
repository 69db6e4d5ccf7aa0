import { describe, it, expect } from "vitest";
import { EncodingError } from "../src/errors/shData.errors";
import { assertXmlChars, EscapedText, escapeXmlValue, isXmlName } from "../src/utils/valueEscaper";

describe("escapeXmlValue", () => {
  it("escapes all five XML-significant characters", () => {
    expect(escapeXmlValue(`a & b < c > d "e" 'f'`)).toBe(
      "a &amp; b &lt; c &gt; d &quot;e&quot; &apos;f&apos;",
    );
  });

  it("escapes an existing entity reference again", () => {
    expect(escapeXmlValue("&amp;")).toBe("&amp;amp;");
  });

  it("leaves plain text untouched", () => {
    expect(escapeXmlValue("sip:+15550001@ims.example.org")).toBe("sip:+15550001@ims.example.org");
  });
});

describe("assertXmlChars", () => {
  it("accepts tab, newline and carriage return", () => {
    expect(() => assertXmlChars("a\tb\nc\rd")).not.toThrow();
  });

  it("accepts characters outside the basic multilingual plane", () => {
    expect(() => assertXmlChars("café \u{1F600}")).not.toThrow();
  });

  it("rejects C0 control characters", () => {
    expect(() => assertXmlChars("+1555\u0001", "msisdn")).toThrow(EncodingError);
    expect(() => assertXmlChars("+1555\u0001", "msisdn")).toThrow(
      "Illegal XML character U+0001 in msisdn",
    );
  });

  it("rejects a lone surrogate", () => {
    expect(() => assertXmlChars("x\uD800y")).toThrow("Illegal XML character U+D800 in value");
  });

  it("rejects U+FFFE", () => {
    expect(() => assertXmlChars("\uFFFE")).toThrow("Illegal XML character U+FFFE in value");
  });

  it("reports the field and code point in details", () => {
    try {
      assertXmlChars("\u001B", "Sh-Data/PublicIdentifiers/MSISDN");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(EncodingError);
      if (error instanceof EncodingError) {
        expect(error.code).toBe("ENCODING_ERROR");
        expect(error.details).toEqual([
          { field: "Sh-Data/PublicIdentifiers/MSISDN", message: "contains U+001B" },
        ]);
      }
    }
  });
});

describe("EscapedText", () => {
  it("renders booleans and numbers in their XML form", () => {
    expect(EscapedText.of(true).value).toBe("true");
    expect(EscapedText.of(false).value).toBe("false");
    expect(EscapedText.of(42).value).toBe("42");
    expect(EscapedText.of(0).value).toBe("0");
  });

  it("escapes string input", () => {
    expect(EscapedText.of("<x & y>").value).toBe("&lt;x &amp; y&gt;");
    expect(String(EscapedText.of("'"))).toBe("&apos;");
  });

  it("rejects numbers without an exact decimal form", () => {
    expect(() => EscapedText.of(1e21, "age")).toThrow("Number in age has no exact decimal form");
    expect(() => EscapedText.of(2 ** 53)).toThrow(EncodingError);
    expect(() => EscapedText.of(1e-7)).toThrow(EncodingError);
    expect(EscapedText.of(Number.MAX_SAFE_INTEGER).value).toBe("9007199254740991");
    expect(EscapedText.of(1.5).value).toBe("1.5");
  });

  it("rejects non-finite numbers", () => {
    expect(() => EscapedText.of(Number.NaN, "timer")).toThrow("Non-finite number in timer");
    expect(() => EscapedText.of(Number.POSITIVE_INFINITY)).toThrow(EncodingError);
  });
});

describe("isXmlName", () => {
  it("accepts the element names used in Sh-Data", () => {
    expect(isXmlName("Sh-Data")).toBe(true);
    expect(isXmlName("S-CSCFName")).toBe(true);
    expect(isXmlName("ns:Tag_1.a")).toBe(true);
  });

  it("rejects names with spaces, a leading digit or no characters", () => {
    expect(isXmlName("Bad Name")).toBe(false);
    expect(isXmlName("1st")).toBe(false);
    expect(isXmlName("-lead")).toBe(false);
    expect(isXmlName("")).toBe(false);
  });
});
