import { randomUUID } from "node:crypto";
import type { BatchJob, InputTable } from "../types.js";
import { processBulkTable } from "./bulkPipeline.js";
import { enrichmentDeps, type AppContext } from "./context.js";
import { enrichProduct } from "./enrichProduct.js";
import { errorMessage, ValidationError } from "./errors.js";
import { resolveColumn, writeOutputTable } from "./excelService.js";
import { createLogger } from "./logger.js";
import { TokenAccumulator } from "./tokenAccumulator.js";

const log = createLogger({ component: "bulk-jobs" });

// Rough per-row cost of one enrichment, used for the acceptance estimate.
const ESTIMATED_SECONDS_PER_ROW = 2;

export interface BulkJobOptions {
  includeImages: boolean;
  batchSize: number;
}

export interface AcceptedJob {
  job: BatchJob;
  totalRows: number;
  estimatedTimeSeconds: number;
}

export function newTaskId(now: number = Date.now()): string {
  return `task-${Math.floor(now / 1000)}-${randomUUID().slice(0, 8)}`;
}

/**
 * Validate an uploaded table and freeze it into a job. Throws
 * ValidationError before anything is scheduled.
 */
export function prepareBulkJob(
  table: InputTable,
  options: BulkJobOptions,
  context: AppContext,
  jobId: string = newTaskId()
): AcceptedJob {
  const mpnColumn = resolveColumn(table.columns, "mpn");
  if (!mpnColumn) {
    throw new ValidationError("Missing required column: mfg_part_number");
  }
  if (table.rows.length === 0) {
    throw new ValidationError("Uploaded file has no data rows");
  }
  if (!Number.isInteger(options.batchSize) || options.batchSize < 1) {
    throw new ValidationError("batch_size must be a positive integer");
  }

  const { maxRowsToProcess, maxBatchSize } = context.settings;
  const rows = table.rows.slice(0, maxRowsToProcess).map((row) => ({ ...row }));

  return {
    job: {
      jobId,
      table: { columns: [...table.columns], rows },
      mpnColumn,
      includeImages: options.includeImages,
      windowSize: Math.min(options.batchSize, maxBatchSize)
    },
    totalRows: rows.length,
    estimatedTimeSeconds: rows.length * ESTIMATED_SECONDS_PER_ROW
  };
}

/** Run a job to completion in the foreground. */
export async function runBulkJob(job: BatchJob, context: AppContext): Promise<string> {
  const accumulator = new TokenAccumulator();
  const deps = enrichmentDeps(context, accumulator);

  return processBulkTable(job, {
    enrich: (request) => enrichProduct(request, deps),
    accumulator,
    trackTokens: context.settings.enableTokenTracking,
    persist: (matrix, jobId) => writeOutputTable(matrix, context.settings.outputDir, jobId)
  });
}

/**
 * Detach a job from the request that accepted it. The outcome is only
 * visible in the artifact and the logs.
 */
export function startBulkJob(job: BatchJob, context: AppContext): void {
  setImmediate(() => {
    runBulkJob(job, context)
      .then((artifactPath) => {
        if (!artifactPath) {
          log.error({ jobId: job.jobId }, "Bulk job finished without an artifact");
        }
      })
      .catch((err: unknown) => {
        log.error({ jobId: job.jobId, err: errorMessage(err) }, "Bulk job crashed");
      });
  });
}
