import type { BatchJob, CellValue, EnrichmentRecord, EnrichmentRequest, InputRow } from "../types.js";
import type { EnrichFn } from "./enrichProduct.js";
import { errorMessage } from "./errors.js";
import { resolveColumn } from "./excelService.js";
import { createLogger } from "./logger.js";
import { OutputTable } from "./outputTable.js";
import type { TokenAccumulator } from "./tokenAccumulator.js";

export type PersistFn = (matrix: CellValue[][], jobId: string) => Promise<string>;

export interface BulkPipelineDeps {
  // Must feed `accumulator`; the summary row is read from it.
  enrich: EnrichFn;
  accumulator: TokenAccumulator;
  trackTokens: boolean;
  persist: PersistFn;
}

export const RESULT_COLUMNS = [
  "attributes_json",
  "confidence",
  "processing_time",
  "raw_gemini_response",
  "requested_attributes",
  "input_tokens",
  "output_tokens",
  "total_tokens",
  "cost_inr"
] as const;

export const ERROR_COLUMN = "error";
export const SUMMARY_COLUMN = "is_summary";
export const SUMMARY_MPN = "SUMMARY";

export function attributeColumn(name: string): string {
  return `attr_${name.toLowerCase().replace(/ /g, "_")}`;
}

export function parseAttributeList(cell: string | undefined): string[] {
  if (!cell) return [];
  return cell
    .split(",")
    .map((attr) => attr.trim())
    .filter(Boolean);
}

function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) return "";
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  return JSON.stringify(value);
}

interface RowColumns {
  mpn: string;
  manufacturer?: string;
  category?: string;
  subcategory?: string;
  attributes?: string;
}

function rowRequest(
  row: InputRow,
  columns: RowColumns,
  job: BatchJob,
  index: number
): EnrichmentRequest {
  const optional = (column?: string) => (column && row[column] ? row[column] : undefined);

  return {
    mpn: row[columns.mpn] ?? "",
    manufacturer: optional(columns.manufacturer),
    category: optional(columns.category),
    subcategory: optional(columns.subcategory),
    attributesToExtract: parseAttributeList(optional(columns.attributes)),
    includeImages: job.includeImages,
    requestId: `${job.jobId}-row${index}`
  };
}

function writeResult(table: OutputTable, index: number, record: EnrichmentRecord): void {
  if (record.imageUrl) {
    table.set(index, "image_url", record.imageUrl);
  }
  table.set(index, "raw_gemini_response", record.rawModelResponse ?? "");
  if (record.requestedAttributes.length > 0) {
    table.set(index, "requested_attributes", record.requestedAttributes.join(","));
  }

  table.set(index, "input_tokens", record.tokenUsage.inputTokens);
  table.set(index, "output_tokens", record.tokenUsage.outputTokens);
  table.set(index, "total_tokens", record.tokenUsage.totalTokens);
  table.set(index, "cost_inr", record.tokenUsage.costInr);

  table.set(index, "attributes_json", JSON.stringify(record.attributes));
  table.set(index, "confidence", record.confidence);
  table.set(index, "processing_time", record.processingTimeSeconds);

  const requested = new Set(record.requestedAttributes);
  for (const [name, value] of Object.entries(record.attributes)) {
    if (requested.size === 0 || requested.has(name)) {
      table.set(index, attributeColumn(name), toCell(value));
    }
  }
}

/**
 * Run a bulk job: rows are enriched in windows of `job.windowSize`, each
 * window launched at once and fully settled before the next begins. A row
 * that throws gets an `error` cell and the run carries on.
 *
 * Returns the artifact path, or "" when the artifact could not be written.
 */
export async function processBulkTable(job: BatchJob, deps: BulkPipelineDeps): Promise<string> {
  const log = createLogger({ component: "bulk", correlationId: job.jobId });
  const { rows, columns } = job.table;
  const totalRows = rows.length;

  if (!Number.isInteger(job.windowSize) || job.windowSize < 1) {
    throw new RangeError(`windowSize must be a positive integer, got ${job.windowSize}`);
  }

  log.info({ rows: totalRows, windowSize: job.windowSize }, "Starting bulk processing");

  const table = new OutputTable(columns, rows);
  if (job.includeImages) {
    table.ensureColumn("image_url");
  }
  RESULT_COLUMNS.forEach((column) => table.ensureColumn(column));

  const rowColumns: RowColumns = {
    mpn: job.mpnColumn,
    manufacturer: resolveColumn(columns, "manufacturer"),
    category: resolveColumn(columns, "category"),
    subcategory: resolveColumn(columns, "subcategory"),
    attributes: resolveColumn(columns, "attributes")
  };

  deps.accumulator.reset();

  for (let windowStart = 0; windowStart < totalRows; windowStart += job.windowSize) {
    const windowEnd = Math.min(windowStart + job.windowSize, totalRows);
    log.info({ windowStart, windowEnd }, "Processing window");

    const indices: number[] = [];
    for (let i = windowStart; i < windowEnd; i++) indices.push(i);

    const outcomes = await Promise.allSettled(
      indices.map(async (i) => deps.enrich(rowRequest(rows[i], rowColumns, job, i)))
    );

    outcomes.forEach((outcome, offset) => {
      const index = indices[offset];
      if (outcome.status === "rejected") {
        const message = errorMessage(outcome.reason);
        log.error({ row: index, err: message }, "Error processing row");
        table.set(index, ERROR_COLUMN, message);
        return;
      }
      writeResult(table, index, outcome.value);
    });
  }

  const totals = deps.trackTokens
    ? deps.accumulator.snapshot()
    : { totalInputTokens: 0, totalOutputTokens: 0, totalTokens: 0, totalCostInr: 0 };

  if (table.rowCount > 0) {
    table.fill(SUMMARY_COLUMN, false);
    table.appendRow({
      [job.mpnColumn]: SUMMARY_MPN,
      input_tokens: totals.totalInputTokens,
      output_tokens: totals.totalOutputTokens,
      total_tokens: totals.totalTokens,
      cost_inr: totals.totalCostInr,
      [SUMMARY_COLUMN]: true
    });
  }

  try {
    const artifactPath = await deps.persist(table.toMatrix(), job.jobId);
    log.info(
      {
        path: artifactPath,
        rows: totalRows,
        inputTokens: totals.totalInputTokens,
        outputTokens: totals.totalOutputTokens,
        totalTokens: totals.totalTokens,
        costInr: Number(totals.totalCostInr.toFixed(6))
      },
      "Bulk processing complete"
    );
    return artifactPath;
  } catch (err) {
    log.error({ err: errorMessage(err) }, "Error saving results");
    return "";
  }
}
