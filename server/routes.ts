/**
 * REST API routes for the AD-HTC cycle analyzer.
 *
 * - Input parameter descriptors and effective model assumptions
 * - One-shot analysis of an input set into a report
 * - Excel and PDF export of the same report
 */
import type { Express, Request, Response } from "express";
import type { Server } from "http";
import { z } from "zod";
import type { ModelAssumptions, Report } from "@shared/schema";
import { defaultInputValues, INPUT_PARAMETERS, inputGroupLabels, inputGroupOrder } from "@shared/input-parameters";
import { describeAssumptions, mergeAssumptions } from "@shared/thermo-library";
import { runAnalysis } from "./services/analysis";
import { exportReportExcel, exportReportPDF } from "./services/exportService";
import { InvalidInputError, parseAnalysisRequest } from "./validation";

const REPORT_TITLE = "AD-HTC Fuel-Enhanced Power Gas Cycle";

export interface RouteOptions {
  // Defaults merged with ANALYSIS_ASSUMPTIONS
  assumptions: ModelAssumptions;
}

/** Sends 400 for input errors and returns true; leaves anything else to the caller. */
function sendInputError(res: Response, error: unknown): boolean {
  if (error instanceof InvalidInputError) {
    res.status(400).json({ error: error.message, issues: error.issues });
    return true;
  }
  if (error instanceof z.ZodError) {
    res.status(400).json({ error: "Invalid input", issues: error.errors });
    return true;
  }
  return false;
}

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  options: RouteOptions,
): Promise<Server> {
  const analyze = (body: unknown): Report => {
    const { payload, overrides } = parseAnalysisRequest(body);
    return runAnalysis(payload, mergeAssumptions(options.assumptions, overrides));
  };

  // =========================================================================
  // Reference data
  // =========================================================================

  app.get("/api/inputs", (_req: Request, res: Response) => {
    const groups = inputGroupOrder.map(group => ({
      key: group,
      label: inputGroupLabels[group],
      parameters: INPUT_PARAMETERS
        .filter(p => p.group === group)
        .sort((a, b) => a.sortOrder - b.sortOrder),
    }));
    res.json({ groups, defaults: defaultInputValues() });
  });

  app.get("/api/assumptions", (_req: Request, res: Response) => {
    res.json({
      assumptions: options.assumptions,
      entries: describeAssumptions(options.assumptions),
    });
  });

  // =========================================================================
  // Analysis
  // =========================================================================

  app.post("/api/analysis", (req: Request, res: Response) => {
    try {
      res.json(analyze(req.body));
    } catch (error) {
      if (sendInputError(res, error)) return;
      console.error("Error running analysis:", error);
      res.status(500).json({ error: "Failed to run analysis" });
    }
  });

  app.post("/api/analysis/export-excel", async (req: Request, res: Response) => {
    try {
      const report = analyze(req.body);
      const xlsxBuffer = await exportReportExcel(report, REPORT_TITLE);
      res.set({
        "Content-Type": "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
        "Content-Disposition": `attachment; filename="AD-HTC-Analysis.xlsx"`,
        "Content-Length": xlsxBuffer.length.toString(),
      });
      res.send(xlsxBuffer);
    } catch (error) {
      if (sendInputError(res, error)) return;
      console.error("Error exporting analysis Excel:", error);
      res.status(500).json({ error: "Failed to export analysis Excel" });
    }
  });

  app.post("/api/analysis/export-pdf", async (req: Request, res: Response) => {
    try {
      const report = analyze(req.body);
      const pdfBuffer = await exportReportPDF(report, REPORT_TITLE);
      res.set({
        "Content-Type": "application/pdf",
        "Content-Disposition": `attachment; filename="AD-HTC-Analysis.pdf"`,
        "Content-Length": pdfBuffer.length.toString(),
      });
      res.send(pdfBuffer);
    } catch (error) {
      if (sendInputError(res, error)) return;
      console.error("Error exporting analysis PDF:", error);
      res.status(500).json({ error: "Failed to export analysis PDF" });
    }
  });

  return httpServer;
}
