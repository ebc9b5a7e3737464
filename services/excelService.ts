import { existsSync, readFileSync } from "fs";
import { mkdir, writeFile } from "fs/promises";
import path from "path";
import * as XLSX from "xlsx";
import { ValidationError } from "./errors.js";
import type { CellValue, InputRow, InputTable } from "../types.js";

export const COLUMN_ALIASES = {
  mpn: ["mfg_part_number", "mpn", "part number", "mfg part number", "sku"],
  manufacturer: ["manufacturer_name", "manufacturer", "mfg", "brand"],
  category: ["category_gen", "category"],
  subcategory: ["sub_category_gen", "subcategory", "sub_category"],
  attributes: ["attributes_to_extract", "attributes"]
} as const;

export type ColumnRole = keyof typeof COLUMN_ALIASES;

export function resolveColumn(columns: readonly string[], role: ColumnRole): string | undefined {
  const aliases: readonly string[] = COLUMN_ALIASES[role];
  for (const alias of aliases) {
    const found = columns.find((c) => c.toLowerCase().trim() === alias);
    if (found) return found;
  }
  return undefined;
}

function cellText(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value).trim();
}

/** Blank headers become `column_<n>`; repeats become `<name>_2`, `<name>_3`... */
function uniqueHeaders(cells: readonly unknown[]): string[] {
  const seen = new Set<string>();
  return cells.map((cell, i) => {
    const base = cellText(cell) || `column_${i + 1}`;
    let name = base;
    for (let n = 2; seen.has(name); n++) {
      name = `${base}_${n}`;
    }
    seen.add(name);
    return name;
  });
}

function sheetToTable(workbook: XLSX.WorkBook): InputTable {
  const firstSheetName = workbook.SheetNames[0];
  const worksheet = firstSheetName ? workbook.Sheets[firstSheetName] : undefined;
  if (!worksheet) {
    return { columns: [], rows: [] };
  }

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
    header: 1,
    defval: "",
    raw: false,
    blankrows: false
  });
  if (matrix.length === 0) {
    return { columns: [], rows: [] };
  }

  const columns = uniqueHeaders(matrix[0]);
  const rows = matrix.slice(1).map((cells) => {
    const row: InputRow = {};
    columns.forEach((column, i) => {
      row[column] = cellText(cells[i]);
    });
    return row;
  });

  return { columns, rows };
}

/**
 * Parse an uploaded CSV or XLSX file. CSV cells are read as text so part
 * numbers such as `00123` keep their leading zeros.
 */
export function parseInputTable(buffer: Buffer, filename: string): InputTable {
  const lower = filename.toLowerCase();
  let workbook: XLSX.WorkBook;

  try {
    if (lower.endsWith(".csv")) {
      workbook = XLSX.read(buffer.toString("utf8"), { type: "string", raw: true });
    } else if (lower.endsWith(".xlsx")) {
      workbook = XLSX.read(buffer, { type: "buffer" });
    } else {
      throw new ValidationError("Only CSV or XLSX files are supported");
    }
  } catch (err) {
    if (err instanceof ValidationError) throw err;
    throw new ValidationError(`Failed to parse ${filename}`);
  }

  return sheetToTable(workbook);
}

export function readInputTableFile(filePath: string): InputTable {
  return parseInputTable(readFileSync(filePath), path.basename(filePath));
}

/** Local time as YYYYMMDD_HHMMSS. */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function outputPath(outputDir: string, jobId: string, now: Date = new Date()): string {
  return path.join(outputDir, `enriched_data_${formatTimestamp(now)}_${jobId}.xlsx`);
}

/**
 * Write a header-first matrix as the artifact workbook and return its path.
 */
export async function writeOutputTable(
  matrix: CellValue[][],
  outputDir: string,
  jobId: string,
  now: Date = new Date()
): Promise<string> {
  const worksheet = XLSX.utils.aoa_to_sheet(matrix);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, worksheet, "Enriched Parts");

  const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  const target = outputPath(outputDir, jobId, now);

  await mkdir(outputDir, { recursive: true });
  await writeFile(target, buffer);
  return target;
}

/** Read an artifact back as a header-first matrix of raw cell values. */
export function readOutputTable(filePath: string): CellValue[][] {
  if (!existsSync(filePath)) {
    throw new Error(`Output file not found: ${filePath}`);
  }
  const workbook = XLSX.read(readFileSync(filePath), { type: "buffer" });
  const firstSheetName = workbook.SheetNames[0];
  const worksheet = firstSheetName ? workbook.Sheets[firstSheetName] : undefined;
  if (!worksheet) return [];
  return XLSX.utils.sheet_to_json<CellValue[]>(worksheet, { header: 1, defval: "" });
}
