import { Readable } from "stream";
import ExcelJS from "exceljs";
import { describe, it, expect } from "vitest";

import { defaultInputValues } from "@shared/input-parameters";
import { runAnalysis } from "../analysis";
import { exportReportExcel, exportReportPDF } from "../exportService";

const TITLE = "Test Plant";

async function readWorkbook(buffer: Buffer): Promise<ExcelJS.Workbook> {
  const wb = new ExcelJS.Workbook();
  await wb.xlsx.read(Readable.from([buffer]));
  return wb;
}

describe("exportReportExcel", () => {
  it("writes one sheet per report section", async () => {
    const wb = await readWorkbook(await exportReportExcel(runAnalysis(defaultInputValues()), TITLE));

    expect(wb.worksheets.map(ws => ws.name)).toEqual([
      "Summary",
      "State Points",
      "Energy Balance",
      "Process Summary",
      "Assumptions",
    ]);
  });

  it("keeps summary values numeric", async () => {
    const wb = await readWorkbook(await exportReportExcel(runAnalysis(defaultInputValues()), TITLE));
    const ws = wb.getWorksheet("Summary");

    expect(ws?.getCell("A1").value).toBe(TITLE);
    expect(ws?.getCell("A2").value).toBe("Metric");
    expect(ws?.getCell("A3").value).toBe("Net Power");
    expect(Number(ws?.getCell("B3").value)).toBeCloseTo(205.9068, 3);
    expect(ws?.getCell("C3").value).toBe("kW");
  });

  it("lists state points in cycle order with kelvin and celsius", async () => {
    const wb = await readWorkbook(await exportReportExcel(runAnalysis(defaultInputValues()), TITLE));
    const ws = wb.getWorksheet("State Points");

    expect(ws?.getCell("A1").value).toBe("Gas Turbine Cycle — State Points");
    expect(ws?.getCell("A3").value).toBe("1 – Compressor Inlet");
    expect(Number(ws?.getCell("B3").value)).toBeCloseTo(25, 9);
    expect(ws?.getCell("C3").value).toBe(298.15);
    expect(ws?.getCell("A6").value).toBe("4 – Turbine Outlet");
    // Steam table follows after one blank row
    expect(ws?.getCell("A8").value).toBe("HTC Steam Cycle — State Points");
    expect(ws?.getCell("A10").value).toBe("1 – Pump Inlet");
  });

  it("writes N/A for undefined metrics and lists why", async () => {
    const report = runAnalysis({ ...defaultInputValues(), tankAMass: 0, tankBMass: 0 });
    const wb = await readWorkbook(await exportReportExcel(report, TITLE));
    const ws = wb.getWorksheet("Summary");

    // Row 3 + card index: htcEfficiency is the third card, overallEfficiency the fourth
    expect(ws?.getCell("B5").value).toBe("N/A");
    expect(ws?.getCell("B6").value).toBe("N/A");
    // 9 cards end at row 11; the next table starts after one blank row
    expect(ws?.getCell("A13").value).toBe("Undefined Results");
    expect(ws?.getCell("A15").value).toBe("htcRankine.thermalEfficiency");
    expect(ws?.getCell("A16").value).toBe("combined.overallEfficiency");
  });
});

describe("exportReportPDF", () => {
  it("renders a complete PDF document", async () => {
    const buffer = await exportReportPDF(runAnalysis(defaultInputValues()), TITLE);
    const text = buffer.toString("latin1");

    expect(text.startsWith("%PDF-")).toBe(true);
    expect(text.trimEnd().endsWith("%%EOF")).toBe(true);
  });

  it("renders degenerate reports too", async () => {
    const report = runAnalysis({ ...defaultInputValues(), tankAMass: 0, tankBMass: 0 });
    const buffer = await exportReportPDF(report, TITLE);

    expect(buffer.subarray(0, 5).toString("latin1")).toBe("%PDF-");
  });
});
