import { describe, expect, it } from "vitest";
import { detectDelimiterFromText, parseCsvToRows, parseDsvRaw } from "./csv.js";

describe("parseDsvRaw", () => {
  it("handles quotes, escaped quotes and delimiters inside quotes", () => {
    expect(parseDsvRaw(`a,"b,c","say ""hi"""\r\n1,2,3\n`, ",")).toEqual([
      ["a", "b,c", `say "hi"`],
      ["1", "2", "3"],
    ]);
  });
});

describe("detectDelimiterFromText", () => {
  it("prefers the delimiter with a stable column count", () => {
    expect(detectDelimiterFromText("a;b;c\n1,5;2;3\n4;5;6\n")).toBe(";");
    expect(detectDelimiterFromText("a\tb\n1\t2\n")).toBe("\t");
    expect(detectDelimiterFromText("a,b\n1,2\n")).toBe(",");
  });
});

describe("parseCsvToRows", () => {
  it("skips the preamble above the header row", () => {
    const text = [
      "Meter export",
      "Serial;123",
      "U L1 avg. 10 min [V];Pst L1 instant. 10 min",
      "230,1;0,5",
      "231;",
    ].join("\n");
    expect(parseCsvToRows(text, { headerRow: 2 })).toEqual([
      { "U L1 avg. 10 min [V]": "230,1", "Pst L1 instant. 10 min": "0,5" },
      { "U L1 avg. 10 min [V]": "231", "Pst L1 instant. 10 min": null },
    ]);
  });

  it("keeps duplicate headers apart", () => {
    expect(parseCsvToRows("a,a\n1,2\n")).toEqual([{ a: "1", a_1: "2" }]);
  });

  it("returns no rows when the header row is past the end", () => {
    expect(parseCsvToRows("a,b\n1,2\n", { headerRow: 5 })).toEqual([]);
  });
});
