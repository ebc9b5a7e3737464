import type { CellValue, InputRow } from "../types.js";

/**
 * Sparse result table for one bulk run.
 *
 * Rows hold only the cells that were written; the column registry keeps
 * first-seen order and never shrinks. `toMatrix` fills the gaps with ""
 * so every row has every column at persistence time.
 */
export class OutputTable {
  private readonly columns: string[] = [];
  private readonly known = new Set<string>();
  private readonly rows: Array<Map<string, CellValue>> = [];

  constructor(columns: readonly string[] = [], sourceRows: readonly InputRow[] = []) {
    columns.forEach((column) => this.ensureColumn(column));
    for (const source of sourceRows) {
      this.appendRow(source);
    }
  }

  get rowCount(): number {
    return this.rows.length;
  }

  ensureColumn(column: string): void {
    if (this.known.has(column)) return;
    this.known.add(column);
    this.columns.push(column);
  }

  set(rowIndex: number, column: string, value: CellValue): void {
    const row = this.rows[rowIndex];
    if (!row) {
      throw new RangeError(`Row ${rowIndex} is outside the table (0..${this.rows.length - 1})`);
    }
    this.ensureColumn(column);
    row.set(column, value);
  }

  get(rowIndex: number, column: string): CellValue {
    return this.rows[rowIndex]?.get(column) ?? "";
  }

  /** Set `column` to `value` on every row that has no value for it yet. */
  fill(column: string, value: CellValue): void {
    this.ensureColumn(column);
    for (const row of this.rows) {
      if (!row.has(column)) row.set(column, value);
    }
  }

  appendRow(values: Record<string, CellValue>): number {
    const row = new Map<string, CellValue>();
    for (const [column, value] of Object.entries(values)) {
      this.ensureColumn(column);
      row.set(column, value);
    }
    this.rows.push(row);
    return this.rows.length - 1;
  }

  /** Header row followed by one dense row per table row. */
  toMatrix(): CellValue[][] {
    return [
      [...this.columns],
      ...this.rows.map((row) => this.columns.map((column) => row.get(column) ?? ""))
    ];
  }
}
