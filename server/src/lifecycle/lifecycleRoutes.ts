/**
 * Device Lifecycle API Routes
 * Upload installation / incident / return data and get the reconciled view back
 */

import { Router, type Request, type Response } from "express";
import multer from "multer";
import type { LifecycleAppConfig, SourceTables } from "@shared/schema";
import { parseTableFile, parseWorkbook } from "../../file-parser";
import { withConfigOverride } from "../../lifecycle-config";
import { ConfigurationError, SourceTableError } from "./errors";
import { LifecyclePipeline } from "./pipeline";
import { PipelineCache } from "./pipelineCache";
import { fixedClock, systemClock } from "./engines/metricsCalculator";
import { renderLifecycleWorkbook } from "./render/lifecycleWorkbook";
import type { LifecycleRunResult, ReferenceClock } from "./lifecycleContract";

const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: 50 * 1024 * 1024 }, // 50MB limit
});

const uploadFields = upload.fields([
  { name: "file", maxCount: 1 },
  { name: "installations", maxCount: 1 },
  { name: "incidents", maxCount: 1 },
  { name: "returns", maxCount: 1 },
]);

class BadRequestError extends Error {
  constructor(
    public code: string,
    message: string
  ) {
    super(message);
    this.name = "BadRequestError";
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// REQUEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

function uploadedFile(req: Request, field: string): Express.Multer.File | undefined {
  const files = req.files;
  if (!files || Array.isArray(files)) return undefined;
  return files[field]?.[0];
}

function bodyField(req: Request, field: string): string | undefined {
  const value: unknown = req.body?.[field];
  return typeof value === "string" && value.trim() !== "" ? value : undefined;
}

function readTables(req: Request, appConfig: LifecycleAppConfig): SourceTables {
  const workbook = uploadedFile(req, "file");
  if (workbook) {
    return parseWorkbook(workbook.buffer, appConfig.sheets);
  }

  const installations = uploadedFile(req, "installations");
  const incidents = uploadedFile(req, "incidents");
  const returns = uploadedFile(req, "returns");
  if (!installations || !incidents || !returns) {
    throw new BadRequestError(
      "MISSING_FILES",
      "Upload one workbook as 'file', or three files as 'installations', 'incidents' and 'returns'"
    );
  }

  return {
    installations: parseTableFile(installations.buffer, installations.originalname, "installations"),
    incidents: parseTableFile(incidents.buffer, incidents.originalname, "incidents"),
    returns: parseTableFile(returns.buffer, returns.originalname, "returns"),
  };
}

function readOverride(req: Request): unknown {
  const text = bodyField(req, "config");
  if (text === undefined) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    throw new BadRequestError("INVALID_CONFIG_JSON", "The 'config' field is not valid JSON");
  }
}

function readClock(req: Request): ReferenceClock {
  const referenceDate = bodyField(req, "referenceDate");
  if (referenceDate === undefined) return systemClock;
  if (!/^\d{4}-\d{2}-\d{2}$/.test(referenceDate)) {
    throw new BadRequestError("INVALID_REFERENCE_DATE", "referenceDate must be formatted yyyy-MM-dd");
  }
  try {
    return fixedClock(referenceDate);
  } catch (error) {
    throw new BadRequestError("INVALID_REFERENCE_DATE", error instanceof Error ? error.message : String(error));
  }
}

function sendError(res: Response, error: unknown) {
  if (error instanceof BadRequestError) {
    return res.status(400).json({ error: "Bad Request", code: error.code, message: error.message });
  }
  if (error instanceof SourceTableError) {
    return res.status(400).json({
      error: "Bad Request",
      code: "SOURCE_TABLE_ERROR",
      message: error.message,
      source: error.source,
      issues: error.issues,
    });
  }
  if (error instanceof ConfigurationError) {
    return res.status(422).json({
      error: "Unprocessable Entity",
      code: "CONFIGURATION_ERROR",
      message: error.message,
      missingFields: error.missingFields,
      issues: error.issues,
    });
  }
  console.error("[Lifecycle] Unexpected error:", error);
  return res.status(500).json({ error: "Internal Server Error", message: "Lifecycle analysis failed" });
}

// ═══════════════════════════════════════════════════════════════════════════════
// ROUTER
// ═══════════════════════════════════════════════════════════════════════════════

export function createLifecycleRouter(appConfig: LifecycleAppConfig, cache = new PipelineCache()): Router {
  const router = Router();

  function analyze(req: Request): LifecycleRunResult {
    const tables = readTables(req, appConfig);
    const config = withConfigOverride(appConfig.pipeline, readOverride(req));
    const pipeline = new LifecyclePipeline(config, readClock(req), cache);
    return pipeline.run(tables);
  }

  /**
   * POST /api/lifecycle/analyze
   * Reconciled device table, aggregates, summary and run report as JSON
   */
  router.post("/analyze", uploadFields, (req: Request, res: Response) => {
    try {
      const result = analyze(req);
      res.json({
        fingerprint: result.fingerprint,
        summary: result.summary,
        aggregates: result.aggregates,
        incidentAggregates: result.incidentAggregates,
        report: result.report,
        columns: result.table.columns,
        rows: result.table.rows,
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/lifecycle/export
   * Same analysis, delivered as an .xlsx workbook
   */
  router.post("/export", uploadFields, (req: Request, res: Response) => {
    try {
      const result = analyze(req);
      const workbook = renderLifecycleWorkbook(result);
      res.setHeader("Content-Type", "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet");
      res.setHeader("Content-Disposition", `attachment; filename="device-lifecycle-${result.report.referenceDate}.xlsx"`);
      res.send(workbook);
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
