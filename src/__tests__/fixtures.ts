import { mkdtemp, rm } from "node:fs/promises";
import { writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { createLogger } from "../logger.js";
import { serializeCsvTable } from "../services/csvTable.js";
import { COLUMNS, REQUIRED_COLUMNS, type Table } from "../types.js";

export type RowSpec = {
  originalForm: string;
  preCorrection: string;
  candidates: string;
  corrected?: string;
};

export const SAMPLE_ROWS: RowSpec[] = [
  { originalForm: "发", preCorrection: "發", candidates: "[發,120] [髮,45]" },
  { originalForm: "后", preCorrection: "後", candidates: "[後,300] [后,80]" },
  { originalForm: "干", preCorrection: "幹 乾", candidates: "[乾,50] [幹,50] [干,10]" },
  { originalForm: "面", preCorrection: "麵", candidates: "[麵,12] [面,40]" },
  { originalForm: "云", preCorrection: "雲", candidates: "[雲,9]" }
];

export const silentLogger = createLogger({ level: "silent" });

export function buildTable(rows: RowSpec[]): Table {
  return {
    columns: [...REQUIRED_COLUMNS],
    records: rows.map((row) => ({
      [COLUMNS.originalForm]: row.originalForm,
      [COLUMNS.preCorrection]: row.preCorrection,
      [COLUMNS.corrected]: row.corrected ?? "",
      [COLUMNS.candidates]: row.candidates
    }))
  };
}

export function writeTable(filePath: string, table: Table): string {
  writeFileSync(filePath, serializeCsvTable(table), "utf8");
  return filePath;
}

export async function createTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "candidate-review-"));
}

export async function removeTempDir(dir: string | undefined): Promise<void> {
  if (dir) {
    await rm(dir, { recursive: true, force: true });
  }
}
