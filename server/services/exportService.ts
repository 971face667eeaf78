import PDFDocument from "pdfkit";
import ExcelJS from "exceljs";
import type { Report, ReportRow, StatePointTable } from "@shared/schema";
import { kelvinToCelsius } from "@shared/thermo-library";

function sanitize(text: string): string {
  if (!text) return "";
  return text
    .replace(/[\u2018\u2019\u201A]/g, "'")
    .replace(/[\u201C\u201D\u201E]/g, '"')
    .replace(/\u2026/g, "...")
    .replace(/\u2013/g, "-")
    .replace(/\u2014/g, "--")
    .replace(/\u00A0/g, " ")
    .replace(/\u03B7/g, "eta")
    .replace(/\u03B3/g, "gamma")
    .replace(/\u1E22/g, "H-dot");
}

const STATE_HEADERS = ["State", "T (°C)", "T (K)", "P (kPa)", "h (kJ/kg)", "s (kJ/kg·K)"];

function stateTableRows(table: StatePointTable): string[][] {
  return table.rows.map(r => [r.state, r.temperatureC, r.temperatureK, r.pressure, r.enthalpy, r.entropy]);
}

function reportRows(rows: ReportRow[]): string[][] {
  return rows.map(r => [r.label, r.display]);
}

// ---------------------------------------------------------------------------
// PDF
// ---------------------------------------------------------------------------

function drawTable(
  doc: InstanceType<typeof PDFDocument>,
  headers: string[],
  rows: string[][],
  startX: number,
  startY: number,
  colWidths: number[],
  options?: { fontSize?: number; headerBg?: string }
): number {
  const fontSize = options?.fontSize || 8;
  const headerBg = options?.headerBg || "#323F4F";
  const minRowHeight = 16;
  const cellPadding = 3;
  const pageHeight = 792;
  const tableWidth = colWidths.reduce((a, b) => a + b, 0);
  let y = startY;

  const measureRowHeight = (cells: string[], bold: boolean): number => {
    let maxH = minRowHeight;
    for (let i = 0; i < cells.length; i++) {
      doc.font(bold ? "Helvetica-Bold" : "Helvetica").fontSize(fontSize);
      const textH = doc.heightOfString(sanitize(cells[i] || ""), { width: colWidths[i] - cellPadding * 2 });
      maxH = Math.max(maxH, textH + cellPadding * 2);
    }
    return maxH;
  };

  const drawRow = (cells: string[], bold: boolean, bgColor?: string) => {
    const rowH = measureRowHeight(cells, bold);
    if (y + rowH > pageHeight - 60) {
      doc.addPage();
      y = 50;
      drawRow(headers, true, headerBg);
    }
    if (bgColor) {
      doc.rect(startX, y, tableWidth, rowH).fill(bgColor);
    }
    let x = startX;
    for (let i = 0; i < cells.length; i++) {
      doc.font(bold ? "Helvetica-Bold" : "Helvetica")
        .fontSize(fontSize)
        .fillColor(bgColor === headerBg ? "#FFFFFF" : "#44546A")
        .text(sanitize(cells[i] || ""), x + cellPadding, y + cellPadding, {
          width: colWidths[i] - cellPadding * 2,
          lineBreak: true,
        });
      x += colWidths[i];
    }
    doc.rect(startX, y, tableWidth, rowH).lineWidth(0.5).strokeColor("#CFD1D4").stroke();
    y += rowH;
  };

  drawRow(headers, true, headerBg);
  rows.forEach((row, idx) => {
    drawRow(row.map(cell => cell ?? "-"), false, idx % 2 === 1 ? "#E9E9EB" : undefined);
  });
  return y;
}

function addSectionHeader(doc: InstanceType<typeof PDFDocument>, title: string, y: number, leftMargin: number, contentWidth: number): number {
  if (y > 700) {
    doc.addPage();
    y = 50;
  }
  doc.font("Helvetica-Bold").fontSize(12).fillColor("#00B050")
    .text(sanitize(title), leftMargin, y, { width: contentWidth });
  y += 20;
  doc.moveTo(leftMargin, y).lineTo(leftMargin + contentWidth, y).lineWidth(0.5).strokeColor("#CFD1D4").stroke();
  y += 8;
  return y;
}

export function exportReportPDF(report: Report, title: string): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({ size: "letter", margins: { top: 50, bottom: 50, left: 50, right: 50 } });
    const chunks: Buffer[] = [];
    doc.on("data", (chunk: Buffer) => chunks.push(chunk));
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", reject);

    const leftMargin = 50;
    const contentWidth = 512;

    doc.font("Helvetica-Bold").fontSize(18).fillColor("#323F4F")
      .text("AD-HTC Cycle Analysis Report", leftMargin, 50, { align: "center", width: contentWidth });
    doc.font("Helvetica").fontSize(10).fillColor("#8496B0")
      .text(sanitize(title), leftMargin, 75, { align: "center", width: contentWidth })
      .text(`Generated: ${new Date().toLocaleDateString("en-US")}`, leftMargin, 88, { align: "center", width: contentWidth });

    let y = 115;

    y = addSectionHeader(doc, "Summary", y, leftMargin, contentWidth);
    y = drawTable(doc, ["Metric", "Value", "Unit"],
      report.summaryCards.map(c => [c.label, c.display, c.available ? c.unit : ""]),
      leftMargin, y, [200, 162, 150]);
    y += 15;

    if (report.degenerate.length > 0) {
      y = addSectionHeader(doc, "Undefined Results", y, leftMargin, contentWidth);
      y = drawTable(doc, ["Metric", "Reason"],
        report.degenerate.map(f => [f.metric, f.message]), leftMargin, y, [160, 352]);
      y += 15;
    }

    for (const table of [report.stateTables.gasTurbine, report.stateTables.steamCycle]) {
      y = addSectionHeader(doc, table.title, y, leftMargin, contentWidth);
      y = drawTable(doc, STATE_HEADERS, stateTableRows(table), leftMargin, y, [122, 70, 70, 80, 85, 85]);
      y += 15;
    }

    y = addSectionHeader(doc, "Energy Balance", y, leftMargin, contentWidth);
    y = drawTable(doc, ["Component", "Value"], reportRows(report.energyBalance), leftMargin, y, [300, 212]);
    y += 15;

    y = addSectionHeader(doc, "AD & HTC Process Summary", y, leftMargin, contentWidth);
    y = drawTable(doc, ["Parameter", "Value"], reportRows(report.processSummary), leftMargin, y, [300, 212]);
    y += 15;

    if (report.assumptions.length > 0) {
      y = addSectionHeader(doc, "Model Assumptions", y, leftMargin, contentWidth);
      y = drawTable(doc, ["Parameter", "Value", "Source"],
        report.assumptions.map(a => [a.parameter, a.value, a.source]), leftMargin, y, [230, 132, 150]);
      y += 15;
    }

    if (report.warnings.length > 0) {
      y = addSectionHeader(doc, "Input Warnings", y, leftMargin, contentWidth);
      drawTable(doc, ["Section", "Severity", "Message"],
        report.warnings.map(w => [w.section, w.severity, w.message]), leftMargin, y, [90, 70, 352]);
    }

    doc.end();
  });
}

// ---------------------------------------------------------------------------
// Excel
// ---------------------------------------------------------------------------

const XL_HEADER_FILL: ExcelJS.FillPattern = { type: "pattern", pattern: "solid", fgColor: { argb: "FF323F4F" } };
const XL_HEADER_FONT: Partial<ExcelJS.Font> = { bold: true, color: { argb: "FFFFFFFF" }, size: 11 };
const XL_SECTION_FILL: ExcelJS.FillPattern = { type: "pattern", pattern: "solid", fgColor: { argb: "FF00B050" } };
const XL_SECTION_FONT: Partial<ExcelJS.Font> = { bold: true, color: { argb: "FFFFFFFF" }, size: 12 };
const XL_BORDER_THIN: Partial<ExcelJS.Borders> = {
  top: { style: "thin", color: { argb: "FFCFD1D4" } },
  bottom: { style: "thin", color: { argb: "FFCFD1D4" } },
  left: { style: "thin", color: { argb: "FFCFD1D4" } },
  right: { style: "thin", color: { argb: "FFCFD1D4" } },
};
const XL_ALT_ROW_FILL: ExcelJS.FillPattern = { type: "pattern", pattern: "solid", fgColor: { argb: "FFE9E9EB" } };

function xlApplyTableHeaders(ws: ExcelJS.Worksheet, row: number, headers: string[], widths?: number[]): void {
  const r = ws.getRow(row);
  headers.forEach((h, i) => {
    const cell = r.getCell(i + 1);
    cell.value = h;
    cell.fill = XL_HEADER_FILL;
    cell.font = XL_HEADER_FONT;
    cell.alignment = { horizontal: "center", vertical: "middle", wrapText: true };
    cell.border = XL_BORDER_THIN;
  });
  r.height = 22;
  if (widths) {
    widths.forEach((w, i) => { ws.getColumn(i + 1).width = w; });
  }
}

function xlAddSectionTitle(ws: ExcelJS.Worksheet, row: number, title: string, colSpan: number): void {
  const r = ws.getRow(row);
  const cell = r.getCell(1);
  cell.value = title;
  cell.fill = XL_SECTION_FILL;
  cell.font = XL_SECTION_FONT;
  cell.alignment = { horizontal: "left", vertical: "middle" };
  for (let c = 2; c <= colSpan; c++) {
    const fc = r.getCell(c);
    fc.fill = XL_SECTION_FILL;
    fc.border = XL_BORDER_THIN;
  }
  if (colSpan > 1) ws.mergeCells(row, 1, row, colSpan);
  r.height = 26;
}

function xlAddDataRow(ws: ExcelJS.Worksheet, row: number, values: (string | number)[], isAlt: boolean): void {
  const r = ws.getRow(row);
  values.forEach((v, i) => {
    const cell = r.getCell(i + 1);
    cell.value = v;
    cell.border = XL_BORDER_THIN;
    cell.alignment = { vertical: "middle", wrapText: true, horizontal: i === 0 ? "left" : "center" };
    if (isAlt) cell.fill = XL_ALT_ROW_FILL;
  });
  r.height = 18;
}

/** Writes a titled table starting at `startRow` and returns the next free row. */
function xlAddTable(
  ws: ExcelJS.Worksheet,
  startRow: number,
  title: string,
  headers: string[],
  rows: (string | number)[][],
  widths?: number[],
): number {
  let r = startRow;
  xlAddSectionTitle(ws, r, title, headers.length);
  r++;
  xlApplyTableHeaders(ws, r, headers, widths);
  r++;
  rows.forEach((values, idx) => {
    xlAddDataRow(ws, r, values, idx % 2 === 1);
    r++;
  });
  return r + 1;
}

export async function exportReportExcel(report: Report, title: string): Promise<Buffer> {
  const wb = new ExcelJS.Workbook();
  wb.creator = "AD-HTC Cycle Analyzer";
  wb.created = new Date();

  // Summary: raw numbers so the workbook stays usable for further calculation
  const wsSummary = wb.addWorksheet("Summary", { properties: { tabColor: { argb: "FF44546A" } } });
  let sr = xlAddTable(wsSummary, 1, title, ["Metric", "Value", "Unit"],
    report.summaryCards.map(c => [c.label, c.available ? c.value : "N/A", c.unit]),
    [28, 18, 12]);
  if (report.degenerate.length > 0) {
    sr = xlAddTable(wsSummary, sr, "Undefined Results", ["Metric", "Reason", ""],
      report.degenerate.map(f => [f.metric, f.message, ""]));
  }
  if (report.warnings.length > 0) {
    xlAddTable(wsSummary, sr, "Input Warnings", ["Section", "Message", "Severity"],
      report.warnings.map(w => [w.section, w.message, w.severity]));
  }

  const wsStates = wb.addWorksheet("State Points", { properties: { tabColor: { argb: "FF00B050" } } });
  let str = 1;
  for (const [table, points] of [
    [report.stateTables.gasTurbine, report.brayton.statePoints],
    [report.stateTables.steamCycle, report.rankine.statePoints],
  ] as const) {
    str = xlAddTable(wsStates, str, table.title, STATE_HEADERS,
      points.map(sp => [
        `${sp.index} – ${sp.label}`,
        kelvinToCelsius(sp.temperature),
        sp.temperature,
        sp.pressure,
        sp.enthalpy,
        sp.entropy,
      ]),
      [24, 12, 12, 12, 14, 14]);
  }

  const wsEnergy = wb.addWorksheet("Energy Balance");
  xlAddTable(wsEnergy, 1, "Energy Balance", ["Component", "Value", "Unit"],
    report.energyBalance.map(r => [r.label, r.value, r.unit]), [32, 18, 12]);

  const wsProcess = wb.addWorksheet("Process Summary");
  xlAddTable(wsProcess, 1, "AD & HTC Process Summary", ["Parameter", "Value", "Unit"],
    report.processSummary.map(r => [r.label, r.value, r.unit]), [32, 18, 12]);

  const wsAssumptions = wb.addWorksheet("Assumptions");
  xlAddTable(wsAssumptions, 1, "Model Assumptions", ["Parameter", "Value", "Source"],
    report.assumptions.map(a => [a.parameter, a.value, a.source]), [55, 24, 32]);

  const buffer = await wb.xlsx.writeBuffer();
  return Buffer.from(buffer);
}
