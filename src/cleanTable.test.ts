import { describe, expect, it, vi } from "vitest";
import {
  cleanTable,
  coerceNumericColumns,
  dropDuplicateRows,
  fillGaps,
  interpolateLinear,
  normalizeColumnLabels,
  pruneEmpty,
  sortByTimestamp,
} from "./cleanTable.js";
import type { RawTable, Table } from "./types.js";

describe("normalizeColumnLabels", () => {
  it("normalizes, deduplicates and drops placeholder columns", () => {
    const t: Table = { columns: ["Value", "value ", "Unnamed: 2"], rows: [["1", "2", "z"]] };
    expect(normalizeColumnLabels(t)).toEqual({ columns: ["value", "value_1"], rows: [["1", "2"]] });
  });
});

describe("pruneEmpty", () => {
  it("drops blank columns and blank rows", () => {
    const t: Table = {
      columns: ["a", "b", "c"],
      rows: [
        ["1", null, "x"],
        [null, "  ", ""],
        ["2", "", null],
      ],
    };
    expect(pruneEmpty(t)).toEqual({
      columns: ["a", "c"],
      rows: [
        ["1", "x"],
        ["2", null],
      ],
    });
  });
});

describe("coerceNumericColumns", () => {
  it("coerces only numeric-labeled columns", () => {
    const t: Table = { columns: ["u_l1_avg_10_min_v", "site"], rows: [["230.1 V", "A1"], ["x", "B2"]] };
    expect(coerceNumericColumns(t, "tendencia")).toEqual({
      columns: ["u_l1_avg_10_min_v", "site"],
      rows: [
        [230.1, "A1"],
        [null, "B2"],
      ],
    });
  });
});

describe("interpolateLinear", () => {
  it("fills interior gaps linearly, carries the last value, keeps leading gaps", () => {
    expect(interpolateLinear([null, 1, null, null, 4, null])).toEqual([null, 1, 2, 3, 4, 4]);
  });
});

describe("fillGaps", () => {
  const t: Table = {
    columns: ["n", "s"],
    rows: [
      [1, "a"],
      [null, null],
      [3, "b"],
      [null, null],
    ],
  };

  it("interpolates numeric columns only", () => {
    expect(fillGaps(t, "linear_interpolation").rows).toEqual([
      [1, "a"],
      [2, null],
      [3, "b"],
      [3, null],
    ]);
  });

  it("forward-fills every column", () => {
    expect(fillGaps(t, "forward_fill").rows).toEqual([
      [1, "a"],
      [1, "a"],
      [3, "b"],
      [3, "b"],
    ]);
  });

  it("backward-fills every column", () => {
    expect(fillGaps(t, "backward_fill").rows).toEqual([
      [1, "a"],
      [3, "b"],
      [3, "b"],
      [null, null],
    ]);
  });

  it("drops rows with any missing cell", () => {
    expect(fillGaps(t, "remove").rows).toEqual([
      [1, "a"],
      [3, "b"],
    ]);
  });

  it("does not touch the input", () => {
    fillGaps(t, "forward_fill");
    expect(t.rows[1]).toEqual([null, null]);
  });
});

describe("dropDuplicateRows", () => {
  it("keeps the first occurrence", () => {
    const t: Table = { columns: ["a", "b"], rows: [[1, "x"], [2, "y"], [1, "x"], ["1", "x"]] };
    expect(dropDuplicateRows(t).rows).toEqual([[1, "x"], [2, "y"], ["1", "x"]]);
  });
});

describe("sortByTimestamp", () => {
  it("sorts parseable rows chronologically and keeps unparseable rows after them", () => {
    const t: Table = {
      columns: ["date", "v"],
      rows: [["2024-01-03", 1], ["2024-01-01", 2], ["bad", 3], ["2024-01-02", 4]],
    };
    expect(sortByTimestamp(t, 0).rows.map((r) => r[1])).toEqual([2, 4, 1, 3]);
  });

  it("returns the input when nothing parses", () => {
    const t: Table = { columns: ["date"], rows: [["x"], [null]] };
    expect(sortByTimestamp(t, 0)).toBe(t);
  });
});

describe("cleanTable", () => {
  it("returns an empty table for empty or missing input", () => {
    expect(cleanTable(null, "tendencia")).toEqual({ columns: [], rows: [] });
    expect(cleanTable(undefined, "tendencia")).toEqual({ columns: [], rows: [] });
    expect(cleanTable([], "tendencia")).toEqual({ columns: [], rows: [] });
  });

  it("collapses rows that only differed by a filled gap", () => {
    const raw: RawTable = [
      { "Level": 1, "Site": "x" },
      { "Level": null, "Site": "x" },
      { "Level": 1, "Site": "x" },
    ];
    expect(cleanTable(raw, "tendencia")).toEqual({ columns: ["level", "site"], rows: [[1, "x"]] });
  });

  it("sorts trend rows by time and drops negative voltage readings", () => {
    const raw: RawTable = [
      { "Date": 45002, "Voltage L1 [V]": "121.0" },
      { "Date": 45000, "Voltage L1 [V]": "-5" },
      { "Date": 45001, "Voltage L1 [V]": "119.5" },
    ];
    expect(cleanTable(raw, "tendencia")).toEqual({
      columns: ["date", "voltage_l1_v"],
      rows: [
        [45001, 119.5],
        [45002, 121],
      ],
    });
  });

  it("enforces integer harmonic orders and wraps phase angles in power-harmonic files", () => {
    const raw: RawTable = [
      { "Harmonic order": 2.5, "Phase angle": 190 },
      { "Harmonic order": 0, "Phase angle": 10 },
      { "Harmonic order": 3.4, "Phase angle": -200 },
      { "Harmonic order": 0.4, "Phase angle": 0 },
    ];
    expect(cleanTable(raw, "armonicos_potencia")).toEqual({
      columns: ["harmonic_order", "phase_angle"],
      rows: [
        [2, -170],
        [3, 160],
        [0, 0],
      ],
    });
  });

  it("keeps voltage-harmonic rows whose order rounds to zero", () => {
    const raw: RawTable = [
      { "Harmonic order": 0.4, "U L1 avg. 10 min [V]": 120 },
      { "Harmonic order": 3, "U L1 avg. 10 min [V]": 121 },
    ];
    expect(cleanTable(raw, "armonicos_voltaje")).toEqual({
      columns: ["harmonic_order", "u_l1_avg_10_min_v"],
      rows: [
        [0, 120],
        [3, 121],
      ],
    });
  });

  it("drops negative amplitudes in voltage-harmonic files", () => {
    const raw: RawTable = [
      { "Harmonic": 3, "Amplitude": -1 },
      { "Harmonic": 5, "Amplitude": 2 },
    ];
    expect(cleanTable(raw, "armonicos_voltaje").rows).toEqual([[5, 2]]);
  });

  it("removes a column whose every cell failed coercion", () => {
    const raw: RawTable = [
      { "Time": "n/a", "U L1 avg. 10 min [V]": 120 },
      { "Time": "n/a", "U L1 avg. 10 min [V]": 121 },
    ];
    expect(cleanTable(raw, "tendencia")).toEqual({ columns: ["u_l1_avg_10_min_v"], rows: [[120], [121]] });
  });

  it("is idempotent when a placeholder label carries a leading underscore", () => {
    const raw: RawTable = [
      { "_Unnamed: 3": 5, "Level": 1 },
      { "_Unnamed: 3": 6, "Level": 2 },
    ];
    const once = cleanTable(raw, "tendencia");
    expect(once).toEqual({ columns: ["level"], rows: [[1], [2]] });
    expect(cleanTable(once, "tendencia")).toEqual(once);
  });

  it("coerces text timestamps before sorting, so ISO strings leave row order unchanged", () => {
    const debug = vi.fn();
    const logger = { debug, info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const raw: RawTable = [
      { "Time": "2024-01-02T00:00", "U L1 avg. 10 min [V]": 121 },
      { "Time": "2024-01-01T00:00", "U L1 avg. 10 min [V]": 120 },
    ];
    expect(cleanTable(raw, "tendencia", "linear_interpolation", { logger })).toEqual({
      columns: ["u_l1_avg_10_min_v"],
      rows: [[121], [120]],
    });
    expect(debug).toHaveBeenCalledWith('no parseable timestamps in "time", row order unchanged');
  });

  it("never leaves uppercase or placeholder labels", () => {
    const raw: RawTable = [{ "Unnamed: 0": 1, "Pst L1 Instant. 10 min": "0.4", "__EMPTY": "x", "(Site)": "A" }];
    const { columns } = cleanTable(raw, "tendencia");
    expect(columns).toEqual(["pst_l1_instant_10_min", "site"]);
  });

  it("does not throw on ragged, untyped input", () => {
    const raw: RawTable = [{ a: "x" }, { b: 5 }, { a: null, b: "7 kV" }];
    expect(cleanTable(raw, "desconocido")).toEqual({
      columns: ["a", "b"],
      rows: [
        ["x", null],
        [null, 5],
        [null, "7 kV"],
      ],
    });
  });

  it("is idempotent", () => {
    const raw: RawTable = [
      { "Time": 3, "U L1 avg. 10 min [V]": "121 V", "Pst L1 instant. 10 min": "0,5", "Note": "ok" },
      { "Time": 1, "U L1 avg. 10 min [V]": null, "Pst L1 instant. 10 min": "1.2", "Note": null },
      { "Time": 2, "U L1 avg. 10 min [V]": "119.5", "Pst L1 instant. 10 min": "x", "Note": "ok" },
      { "Time": 2, "U L1 avg. 10 min [V]": "119.5", "Pst L1 instant. 10 min": "x", "Note": "ok" },
      { "Time": 4, "U L1 avg. 10 min [V]": "", "Pst L1 instant. 10 min": null, "Note": "" },
    ];
    const once = cleanTable(raw, "tendencia");
    expect(cleanTable(once, "tendencia")).toEqual(once);
  });
});
