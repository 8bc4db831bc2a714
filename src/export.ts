import * as XLSX from "xlsx";
import { valueToText } from "./feedValue.js";
import type { FeedRecord } from "./record.js";
import type { ExportRow, FeedResult } from "./types.js";

/**
 * Module: Tabular Export
 * Purpose: Flatten a validated feed into one row per record for CSV / spreadsheet download.
 */
export const EXPORT_COLUMNS = [
  "index",
  "id",
  "title",
  "price",
  "availability",
  "inventory_quantity",
  "errors",
  "warnings",
] as const satisfies readonly (keyof ExportRow)[];

const MESSAGE_SEPARATOR = " | ";
const REPORT_SHEET = "Validation";

/**
 * Build export rows for the records that were evaluated (all of them unless the run was aborted).
 * `index` is 1-based; messages are joined with " | ".
 */
export function buildExportRows(records: readonly FeedRecord[], result: FeedResult): ExportRow[] {
  return result.records.map((r) => {
    const record = records[r.index];
    const field = (name: string): string => valueToText(record?.get(name));
    return {
      index: r.index + 1,
      id: field("id"),
      title: field("title"),
      price: field("price"),
      availability: field("availability"),
      inventory_quantity: field("inventory_quantity"),
      errors: r.errors.join(MESSAGE_SEPARATOR),
      warnings: r.warnings.join(MESSAGE_SEPARATOR),
    };
  });
}

const toSheet = (rows: readonly ExportRow[]): XLSX.WorkSheet =>
  XLSX.utils.json_to_sheet([...rows], { header: [...EXPORT_COLUMNS] });

/** CSV text with a header row; no trailing newline. */
export function exportRowsToCsv(rows: readonly ExportRow[]): string {
  return XLSX.utils.sheet_to_csv(toSheet(rows));
}

/** XLSX workbook bytes with a single "Validation" sheet. */
export function exportRowsToXlsx(rows: readonly ExportRow[]): Uint8Array {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, toSheet(rows), REPORT_SHEET);
  const out: unknown = XLSX.write(workbook, { type: "array", bookType: "xlsx" });
  if (out instanceof ArrayBuffer) return new Uint8Array(out);
  if (out instanceof Uint8Array) return out;
  throw new Error("xlsx writer returned an unexpected value");
}
