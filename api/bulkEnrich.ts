import express, { Router, type NextFunction, type Request, type Response } from "express";
import multer from "multer";
import { z } from "zod";
import { parseBool } from "../config.js";
import { prepareBulkJob, startBulkJob } from "../services/bulkJobs.js";
import type { AppContext } from "../services/context.js";
import { errorMessage, ValidationError } from "../services/errors.js";
import { parseInputTable } from "../services/excelService.js";
import { createRequestLogger } from "../services/logger.js";
import type { BatchJob } from "../types.js";
import { describeIssues, type HandlerResult } from "./enrich.js";

const MAX_UPLOAD_BYTES = 25 * 1024 * 1024;

export const BulkFieldsSchema = z.object({
  filename: z.string().trim().min(1, "filename is required"),
  include_images: z.string().optional(),
  batch_size: z.coerce.number().int().positive().default(50)
});

export type StartJob = (job: BatchJob, context: AppContext) => void;

/** Upload fields (`filename`, `include_images`, `batch_size`) and the file bytes. */
export interface BulkUpload {
  fields: unknown;
  file: unknown;
}

function isMultipart(req: { headers: { "content-type"?: string } }): boolean {
  return (req.headers["content-type"] ?? "").toLowerCase().startsWith("multipart/");
}

/**
 * Multipart uploads carry the sheet in a `file` part and the options as
 * form fields. Any other body is the sheet itself, with `filename` and the
 * options in the query string.
 */
export function uploadFromRequest(req: Request): BulkUpload {
  if (req.file) {
    return {
      fields: { ...req.query, ...req.body, filename: req.file.originalname },
      file: req.file.buffer
    };
  }
  if (isMultipart(req)) {
    return { fields: { ...req.query, ...req.body }, file: undefined };
  }
  return { fields: req.query, file: req.body };
}

/**
 * Accept an uploaded sheet and schedule it. `filename` decides whether it
 * is read as CSV or XLSX.
 */
export function handleBulkEnrich(
  upload: BulkUpload,
  context: AppContext,
  start: StartJob = startBulkJob
): HandlerResult {
  const requestId = `bulk-${Math.floor(Date.now() / 1000)}`;
  const log = createRequestLogger("api", requestId);

  try {
    const file = upload.file;
    if (!Buffer.isBuffer(file) || file.length === 0) {
      throw new ValidationError("Request body must contain the uploaded file");
    }

    const fields = BulkFieldsSchema.safeParse(upload.fields);
    if (!fields.success) {
      throw new ValidationError(describeIssues(fields.error));
    }

    const accepted = prepareBulkJob(
      parseInputTable(file, fields.data.filename),
      {
        includeImages: parseBool(fields.data.include_images, false),
        batchSize: fields.data.batch_size
      },
      context
    );

    log.info(
      {
        taskId: accepted.job.jobId,
        rows: accepted.totalRows,
        windowSize: accepted.job.windowSize
      },
      "Accepted bulk enrichment"
    );
    start(accepted.job, context);

    return {
      status: 200,
      body: {
        status: "processing",
        task_id: accepted.job.jobId,
        message: `Processing ${accepted.totalRows} rows in the background`,
        total_rows: accepted.totalRows,
        estimated_time_seconds: accepted.estimatedTimeSeconds
      }
    };
  } catch (err) {
    if (err instanceof ValidationError) {
      return { status: err.status, body: { error: err.message } };
    }
    log.error({ err: errorMessage(err) }, "Error starting bulk process");
    return { status: 500, body: { error: `Error processing file: ${errorMessage(err)}` } };
  }
}

export function createBulkEnrichRouter(context: AppContext, start: StartJob = startBulkJob): Router {
  const router = Router();
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: MAX_UPLOAD_BYTES } });

  router.post(
    "/",
    upload.single("file"),
    express.raw({ type: (req) => !isMultipart(req), limit: MAX_UPLOAD_BYTES }),
    (req: Request, res: Response) => {
      const result = handleBulkEnrich(uploadFromRequest(req), context, start);
      res.status(result.status).json(result.body);
    }
  );

  // Malformed multipart bodies and oversized uploads.
  router.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = err instanceof multer.MulterError ? 400 : 500;
    res.status(status).json({ error: `Error processing file: ${errorMessage(err)}` });
  });

  return router;
}
