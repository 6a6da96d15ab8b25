import * as XLSX from "xlsx";
import { describe, expect, it } from "vitest";
import { analyzeFileFromBuffer, detectFileType, silentLogger } from "./index.js";

const now = () => new Date(Date.UTC(2024, 5, 1, 12));

const csvBytes = (text: string): ArrayBuffer => {
  const encoded = new TextEncoder().encode(text);
  const bytes = new Uint8Array(encoded.length);
  bytes.set(encoded);
  return bytes.buffer;
};

/** Workbook laid out like a meter export: 16 preamble lines, labels on row 17. */
const meterWorkbook = (): ArrayBuffer => {
  const preamble = Array.from({ length: 16 }, (_, i) => [`preamble ${i + 1}`]);
  const sheet = XLSX.utils.aoa_to_sheet([
    ...preamble,
    ["Time", "P H 1 L1", "P H 3 L1"],
    [1, 5, -1],
    [2, 6, 2],
  ]);
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, sheet, "Datos");
  const out: unknown = XLSX.write(wb, { type: "array", bookType: "xlsx" });
  if (!(out instanceof ArrayBuffer)) throw new Error("expected ArrayBuffer");
  return out;
};

describe("detectFileType", () => {
  it("reads the type from the file name", () => {
    expect(detectFileType("Tendencia_Mayo.xlsx")).toBe("tendencia");
    expect(detectFileType("ARMONICOS_L1.xls")).toBe("armonicos_potencia");
    expect(detectFileType("registro.csv")).toBe("tendencia");
  });
});

describe("analyzeFileFromBuffer", () => {
  it("analyzes a CSV trend export", async () => {
    const text = [
      "Time,U L1 avg. 10 min [V],Pst L1 instant. 10 min",
      "1,120,0.5",
      "2,120,1.5",
      "3,150,0.2",
      "",
    ].join("\n");
    const result = await analyzeFileFromBuffer(csvBytes(text), "medicion_tendencia.csv", {
      config: { headerRow: 0 },
      logger: silentLogger,
      now,
    });
    expect(result.error).toBeUndefined();
    expect(result.filename).toBe("medicion_tendencia.csv");
    expect(result.processedAt).toBe("2024-06-01T12:00:00.000Z");
    expect(result.totalMeasurements).toBe(3);
    expect(result.voltageDeviations[0]).toMatchObject({ fase: "L1", voltaje_promedio: 130, violaciones: 1 });
    expect(result.flickers[0]).toMatchObject({ fase: "L1", violaciones: 1 });
    expect(result.thdAnalysis).toEqual([]);
  });

  it("reads workbook labels from the default header row", async () => {
    const result = await analyzeFileFromBuffer(meterWorkbook(), "armonicos.xlsx", { logger: silentLogger, now });
    expect(result.fileType).toBe("armonicos_potencia");
    expect(result.harmonicBaseMeasurements).toBe(2150);
    expect(result.harmonicsAnalysis).toHaveLength(1);
    expect(result.harmonicsAnalysis[0]).toMatchObject({
      orden_armonico: 3,
      fase: "L1",
      valores_negativos: 1,
      total_valores_archivo: 2,
      total_mediciones: 2150,
    });
  });

  it("honors an explicit file type", async () => {
    const result = await analyzeFileFromBuffer(meterWorkbook(), "armonicos.xlsx", {
      fileType: "armonicos_voltaje",
      logger: silentLogger,
      now,
    });
    expect(result.fileType).toBe("armonicos_voltaje");
    expect(result.meta.analysisPath).toBe("trend");
    expect(result.harmonicsAnalysis).toEqual([]);
  });

  it("returns a read error for a missing sheet", async () => {
    const result = await analyzeFileFromBuffer(meterWorkbook(), "armonicos.xlsx", {
      sheetName: "Nope",
      logger: silentLogger,
      now,
    });
    expect(result.error).toEqual({ code: "E_READ_FAILED", message: 'error processing file: sheet "Nope" not found' });
    expect(result.totalMeasurements).toBe(0);
    expect(result.filename).toBe("armonicos.xlsx");
  });

  it("returns an empty-file error when only labels are present", async () => {
    const result = await analyzeFileFromBuffer(csvBytes("Time,Value\n"), "tendencia.csv", {
      config: { headerRow: 0 },
      logger: silentLogger,
      now,
    });
    expect(result.error).toEqual({ code: "E_EMPTY_FILE", message: "file is empty or has no valid data" });
  });

  it("rejects an invalid configuration", async () => {
    await expect(
      analyzeFileFromBuffer(csvBytes("a\n1\n"), "x.csv", { config: { thdLimit: -1 }, logger: silentLogger })
    ).rejects.toThrow();
  });
});
