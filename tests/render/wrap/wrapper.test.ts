import { describe, expect, it } from "@jest/globals";

import { InvalidWidthError } from "../../../src/render/wrap/errors.js";
import { scanSpans } from "../../../src/render/wrap/scanner.js";
import {
  measureLines,
  visibleLineWidths,
  visibleWidth,
  wrap,
  wrapWithConfiguration,
} from "../../../src/render/wrap/wrapper.js";

const LONG_URL = "https://example.com/very/long/path/segment";

describe("wrap", () => {
  it("breaks prose at spaces", () => {
    expect(
      wrap(
        "The Great American Novel by Mark Twain is one of the most famous books in literature.",
        30,
      ),
    ).toBe(
      "The Great American Novel by\nMark Twain is one of the most\nfamous books in literature.",
    );
  });

  it("returns text that already fits unchanged", () => {
    expect(wrap("Short line", 50)).toBe("Short line");
  });

  it("counts only visible characters and keeps tags whole", () => {
    expect(
      wrap("<error>Failed to add book: Title already exists.</error>", 20),
    ).toBe("<error>Failed to add book:\nTitle already\nexists.</error>");
  });

  it("lets an unbreakable URL overflow its own line", () => {
    expect(wrap(`Visit ${LONG_URL} for details`, 15)).toBe(
      `Visit\n${LONG_URL}\nfor details`,
    );
  });

  it("cuts URLs like ordinary words when allowed", () => {
    expect(wrap(`Visit ${LONG_URL} for details`, 15, true)).toBe(
      "Visit\nhttps://example\n.com/very/long/\npath/segment\nfor details",
    );
  });

  it("returns an empty string for empty input", () => {
    expect(wrap("", 10)).toBe("");
  });

  it("leaves the input untouched when width is 0", () => {
    const text = "  several   spaced\twords <info>and tags</info>  ";
    expect(wrap(text, 0)).toBe(text);
    expect(wrap(text)).toBe(text);
  });

  it("rejects negative and fractional widths", () => {
    expect(() => wrap("text", -1)).toThrow(InvalidWidthError);
    expect(() => wrap("text", 2.5)).toThrow(
      "Wrap width must be a non-negative integer (received 2.5).",
    );
  });

  it("hard-splits words longer than the width", () => {
    expect(wrap("abcdefghij", 4)).toBe("abcd\nefgh\nij");
  });

  it("keeps a tag beside the word it touches", () => {
    expect(wrap("<b>abcd</b> efg", 4)).toBe("<b>abcd</b>\nefg");
  });

  it("never breaks before a tag that follows a space", () => {
    expect(wrap("<b>abcd </b>", 4)).toBe("<b>abcd</b>");
  });

  it("ignores tag length when measuring", () => {
    expect(wrap("<fg=magenta;options=bold>hi</>", 3)).toBe(
      "<fg=magenta;options=bold>hi</>",
    );
  });

  it("treats explicit line breaks as hard boundaries", () => {
    expect(wrap("one\ntwo three", 20)).toBe("one\ntwo three");
    expect(wrap("one\n\ntwo", 20)).toBe("one\n\ntwo");
  });

  it("treats a lone carriage return as a line break", () => {
    expect(wrap("one\rtwo three", 20)).toBe("one\ntwo three");
  });

  it("joins lines with CRLF when the input uses it", () => {
    expect(wrap("one two\r\nthree", 5)).toBe("one\r\ntwo\r\nthree");
  });

  it("keeps indentation that fits and drops indentation that does not", () => {
    expect(wrap("  indented words here", 10)).toBe("  indented\nwords here");
    expect(wrap("      ab", 4)).toBe("ab");
  });

  it("trims whitespace at the end of a line", () => {
    expect(wrap("ab   ", 10)).toBe("ab");
    expect(wrap("alpha   beta", 6)).toBe("alpha\nbeta");
  });

  it("degrades an unterminated tag to plain text", () => {
    expect(wrap("a <b c", 3)).toBe("a\n<b\nc");
  });

  it("reads width and URL cutting from a configuration", () => {
    expect(
      wrapWithConfiguration(`Visit ${LONG_URL}`, {
        width: 15,
        allowCutUrls: false,
      }),
    ).toBe(`Visit\n${LONG_URL}`);
  });

  describe("properties", () => {
    const samples = [
      "Lorem ipsum dolor sit amet, consectetur adipiscing elit, sed do eiusmod.",
      "<info>Build finished</info> in <comment>12s</comment>; see https://ci.example.org/builds/4471/logs for output.",
      "<fg=red;options=bold>stacked <question>nested</question> markup</> with trailing words",
      "supercalifragilisticexpialidocious and friends",
    ];
    const widths = [1, 5, 12, 40];

    const visibleCharacters = (text: string): string =>
      scanSpans(text, { detectUrls: false })
        .filter((span) => span.kind !== "tag")
        .map((span) => span.raw)
        .join("")
        .replace(/\s+/gu, "");

    const tagsOf = (text: string): string[] =>
      scanSpans(text, { detectUrls: false })
        .filter((span) => span.kind === "tag")
        .map((span) => span.raw);

    it.each(samples.flatMap((text) => widths.map((width) => [text, width])))(
      "preserves content and tag order (%s at %i)",
      (text, width) => {
        const wrapped = wrap(String(text), Number(width));
        expect(visibleCharacters(wrapped)).toBe(
          visibleCharacters(String(text)),
        );
        expect(tagsOf(wrapped)).toEqual(tagsOf(String(text)));
      },
    );

    it.each(samples.flatMap((text) => widths.map((width) => [text, width])))(
      "keeps every line within the width when URLs may be cut (%s at %i)",
      (text, width) => {
        const wrapped = wrap(String(text), Number(width), true);
        for (const columns of visibleLineWidths(wrapped)) {
          expect(columns).toBeLessThanOrEqual(Number(width));
        }
      },
    );

    it("only overflows on lines holding a whole URL", () => {
      const text = samples[1] ?? "";
      const overflowing = measureLines(wrap(text, 12))
        .filter((line) => line.width > 12)
        .map((line) => line.raw);
      expect(overflowing).toEqual(["https://ci.example.org/builds/4471/logs"]);
    });
  });
});

describe("visibleWidth", () => {
  it("skips tags and counts code points", () => {
    expect(visibleWidth("<info>héllo</info> ✓")).toBe(7);
    expect(visibleWidth("a</nope>")).toBe(8);
  });
});

describe("measureLines", () => {
  it("carries open tags across line breaks", () => {
    expect(measureLines("<info>aaaa\nbbbb\ncccc</info> d")).toEqual([
      { raw: "<info>aaaa", width: 4, openAtStart: [], openAtEnd: ["info"] },
      { raw: "bbbb", width: 4, openAtStart: ["info"], openAtEnd: ["info"] },
      { raw: "cccc</info> d", width: 6, openAtStart: ["info"], openAtEnd: [] },
    ]);
  });

  it("splits at LF, CRLF and a lone CR", () => {
    expect(measureLines("ab\r\ncd\re").map((line) => line.raw)).toEqual([
      "ab",
      "cd",
      "e",
    ]);
  });

  it("returns one empty line for empty input", () => {
    expect(measureLines("")).toEqual([
      { raw: "", width: 0, openAtStart: [], openAtEnd: [] },
    ]);
  });
});

describe("visibleLineWidths", () => {
  it("does not count a closer whose opener is on an earlier line", () => {
    const wrapped = wrap("<info>aaaa bbbb</info>", 5);

    expect(wrapped).toBe("<info>aaaa\nbbbb</info>");
    expect(visibleLineWidths(wrapped)).toEqual([4, 4]);
  });
});
