import * as fs from "fs";
import * as path from "path";
import { ExportTable, ExportValue, StatsStore, TableDump } from "../../store";

export const EXPORT_TABLES: readonly ExportTable[] = ["weekly", "daily", "github"];

export type ExportFormat = "csv" | "json";

export function parseExportTable(value: string): ExportTable {
  const table = EXPORT_TABLES.find((name) => name === value);
  if (!table) {
    throw new Error(
      `Unknown table type: ${value}. Use 'weekly', 'daily', or 'github'`
    );
  }
  return table;
}

function escapeCsvCell(value: ExportValue): string {
  if (value == null) return "";
  const t = String(value);
  if (t.includes('"') || t.includes(",") || t.includes("\n") || t.includes("\r")) {
    return `"${t.replace(/"/g, '""')}"`;
  }
  return t;
}

export function toCsv(dump: TableDump): string {
  const lines = [
    dump.columns.map(escapeCsvCell).join(","),
    ...dump.rows.map((row) =>
      dump.columns.map((column) => escapeCsvCell(row[column] ?? null)).join(",")
    ),
  ];
  return lines.map((line) => `${line}\n`).join("");
}

export function toJson(dump: TableDump): string {
  return JSON.stringify(dump.rows, null, 2);
}

/**
 * Writes one table to `output` as CSV or JSON.
 */
export async function exportTable(
  store: Pick<StatsStore, "dumpTable">,
  format: ExportFormat,
  table: ExportTable,
  output: string
): Promise<void> {
  const dump = await store.dumpTable(table);
  const content = format === "csv" ? toCsv(dump) : toJson(dump);

  try {
    fs.mkdirSync(path.dirname(path.resolve(output)), { recursive: true });
    fs.writeFileSync(output, content);
  } catch (error) {
    throw new Error(`failed to create file at ${output}`, { cause: error });
  }

  console.log(`Exported to ${output}.`);
}
