import fs from "node:fs/promises";
import path from "node:path";
import { parse as parseCsv } from "csv-parse/sync";

export type CsvTable = {
  headers: string[];
  rows: Record<string, string>[];
};

export function parseCsvText(raw: string): CsvTable {
  let headers: string[] = [];
  const rows = parseCsv(raw, {
    columns: (header: string[]) => {
      headers = header;
      return header;
    },
    skip_empty_lines: true,
    bom: true,
    relax_column_count: true,
    trim: true
  }) as Record<string, string>[];
  return { headers, rows };
}

export async function readRowsFromCsv(filePath: string): Promise<CsvTable> {
  const raw = await fs.readFile(filePath, "utf8");
  return parseCsvText(raw);
}

export async function ensureDirForFile(filePath: string) {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
}

export async function writeJson(filePath: string, data: unknown) {
  await ensureDirForFile(filePath);
  await fs.writeFile(filePath, JSON.stringify(data, null, 2) + "\n", "utf8");
}

export async function writeText(filePath: string, text: string) {
  await ensureDirForFile(filePath);
  await fs.writeFile(filePath, text, "utf8");
}
