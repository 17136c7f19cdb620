import { mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import path from "node:path";
import type { Logger } from "pino";
import { ProgressPersistError, RowIndexError } from "../errors.js";
import {
  COLUMNS,
  REQUIRED_COLUMNS,
  type ProgressRow,
  type Table,
  type TableRecord
} from "../types.js";
import { CsvFormatError, cloneTable, parseCsvTable, serializeCsvTable } from "./csvTable.js";
import { loadTaskTable } from "./taskStore.js";

export type ProgressStoreOptions = {
  progressFile: string;
  tasksFile: string;
  logger?: Logger;
};

function toProgressRow(record: TableRecord): ProgressRow {
  return {
    originalForm: record[COLUMNS.originalForm] ?? "",
    preCorrection: record[COLUMNS.preCorrection] ?? "",
    corrected: record[COLUMNS.corrected] ?? "",
    candidates: record[COLUMNS.candidates] ?? ""
  };
}

function readProgressFile(filePath: string): string | null {
  try {
    return readFileSync(filePath, "utf8");
  } catch (error) {
    const code = (error as { code?: string }).code;
    if (code === "ENOENT") {
      return null;
    }
    throw new Error(`Failed to read progress file: ${filePath}`, { cause: error });
  }
}

function parseProgressTable(raw: string, filePath: string): Table {
  let table: Table;
  try {
    table = parseCsvTable(raw);
  } catch (error) {
    if (error instanceof CsvFormatError) {
      throw new CsvFormatError(`${filePath}: ${error.message}`);
    }
    throw error;
  }

  for (const column of REQUIRED_COLUMNS) {
    if (!table.columns.includes(column)) {
      table.columns.push(column);
    }
  }
  for (const record of table.records) {
    for (const column of REQUIRED_COLUMNS) {
      record[column] = record[column] ?? "";
    }
  }
  return table;
}

/**
 * The mutable annotation table. Rows keep the order of the source dataset and
 * every write rewrites the whole file.
 */
export class ProgressStore {
  readonly filePath: string;
  private readonly table: Table;
  private readonly logger?: Logger;

  constructor(filePath: string, table: Table, logger?: Logger) {
    this.filePath = filePath;
    this.table = cloneTable(table);
    this.logger = logger;
  }

  static loadOrInit(options: ProgressStoreOptions): ProgressStore {
    const raw = readProgressFile(options.progressFile);
    if (raw !== null) {
      const table = parseProgressTable(raw, options.progressFile);
      options.logger?.info(
        { progressFile: options.progressFile, rows: table.records.length },
        "Loaded progress file"
      );
      return new ProgressStore(options.progressFile, table, options.logger);
    }

    const tasks = loadTaskTable(options.tasksFile);
    const table = cloneTable(tasks);
    for (const record of table.records) {
      record[COLUMNS.corrected] = "";
    }

    const store = new ProgressStore(options.progressFile, table, options.logger);
    store.persist();
    options.logger?.info(
      { tasksFile: options.tasksFile, progressFile: options.progressFile, rows: store.rowCount },
      "Initialized progress file from task file"
    );
    return store;
  }

  get rowCount(): number {
    return this.table.records.length;
  }

  get columns(): readonly string[] {
    return this.table.columns;
  }

  get annotatedCount(): number {
    return this.table.records.filter((record) => record[COLUMNS.corrected] !== "").length;
  }

  firstUnannotatedIndex(): number {
    return this.table.records.findIndex((record) => record[COLUMNS.corrected] === "");
  }

  getRow(index: number): ProgressRow {
    return toProgressRow(this.recordAt(index));
  }

  rows(): ProgressRow[] {
    return this.table.records.map(toProgressRow);
  }

  setAnnotation(index: number, value: string): void {
    this.recordAt(index)[COLUMNS.corrected] = value;
  }

  toCsv(): string {
    return serializeCsvTable(this.table);
  }

  persist(): void {
    const tempFile = `${this.filePath}.tmp`;
    try {
      mkdirSync(path.dirname(path.resolve(this.filePath)), { recursive: true });
      writeFileSync(tempFile, this.toCsv(), "utf8");
      renameSync(tempFile, this.filePath);
    } catch (error) {
      rmSync(tempFile, { force: true });
      this.logger?.error({ err: error, progressFile: this.filePath }, "Failed to persist progress");
      throw new ProgressPersistError(this.filePath, { cause: error });
    }
  }

  private recordAt(index: number): TableRecord {
    const record = Number.isInteger(index) ? this.table.records[index] : undefined;
    if (index < 0 || !record) {
      throw new RowIndexError(index, this.rowCount);
    }
    return record;
  }
}
