import { describe, expect, it } from "vitest";
import { fromRawTable, isNumericColumn, toRawTable } from "./table.js";

describe("fromRawTable", () => {
  it("unions keys in first-seen order and fills absent cells with null", () => {
    expect(fromRawTable([{ a: 1 }, { b: "x", a: 2 }])).toEqual({
      columns: ["a", "b"],
      rows: [
        [1, null],
        [2, "x"],
      ],
    });
  });

  it("converts back to row objects", () => {
    const table = fromRawTable([{ a: 1 }, { b: "x" }]);
    expect(toRawTable(table)).toEqual([
      { a: 1, b: null },
      { a: null, b: "x" },
    ]);
  });
});

describe("isNumericColumn", () => {
  it("ignores missing cells", () => {
    const table = { columns: ["a", "b"], rows: [[1, "1"], [null, 2]] };
    expect(isNumericColumn(table, 0)).toBe(true);
    expect(isNumericColumn(table, 1)).toBe(false);
  });
});
