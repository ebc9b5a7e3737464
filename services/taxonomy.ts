import { existsSync } from "fs";
import { readInputTableFile } from "./excelService.js";
import { createLogger } from "./logger.js";

const log = createLogger({ component: "taxonomy" });

/**
 * Default attribute lists per category/subcategory pair, used when a
 * request does not name the attributes it wants.
 */
export class Taxonomy {
  constructor(private readonly entries: ReadonlyMap<string, readonly string[]> = new Map()) {}

  static key(category: string, subcategory: string): string {
    return `${category.trim().toLowerCase()}|${subcategory.trim().toLowerCase()}`;
  }

  get size(): number {
    return this.entries.size;
  }

  attributesFor(category?: string | null, subcategory?: string | null): string[] {
    if (!category || !subcategory) return [];
    return [...(this.entries.get(Taxonomy.key(category, subcategory)) ?? [])];
  }
}

/**
 * Load a taxonomy sheet with `category`, `subcategory` and `attribute`
 * columns, one attribute per row. A missing file yields an empty taxonomy.
 */
export function loadTaxonomy(filePath: string): Taxonomy {
  if (!existsSync(filePath)) {
    log.warn({ path: filePath }, "Taxonomy file not found; attribute defaults disabled");
    return new Taxonomy();
  }

  const table = readInputTableFile(filePath);
  const find = (name: string) => table.columns.find((c) => c.toLowerCase().trim() === name);
  const categoryCol = find("category");
  const subcategoryCol = find("subcategory");
  const attributeCol = find("attribute");

  if (!categoryCol || !subcategoryCol || !attributeCol) {
    log.warn({ path: filePath, columns: table.columns }, "Taxonomy sheet is missing required columns");
    return new Taxonomy();
  }

  const entries = new Map<string, string[]>();
  for (const row of table.rows) {
    const attribute = row[attributeCol];
    if (!row[categoryCol] || !row[subcategoryCol] || !attribute) continue;

    const key = Taxonomy.key(row[categoryCol], row[subcategoryCol]);
    const list = entries.get(key) ?? [];
    if (!list.includes(attribute)) list.push(attribute);
    entries.set(key, list);
  }

  log.info({ path: filePath, pairs: entries.size }, "Loaded taxonomy");
  return new Taxonomy(entries);
}
