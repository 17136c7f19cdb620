import { readFileSync } from "node:fs";
import { TaskStoreError } from "../errors.js";
import { REQUIRED_COLUMNS, type Table } from "../types.js";
import { CsvFormatError, parseCsvTable } from "./csvTable.js";

function readTaskFile(filePath: string): string {
  try {
    return readFileSync(filePath, "utf8");
  } catch (error) {
    const code = (error as { code?: string }).code;
    if (code === "ENOENT") {
      throw new TaskStoreError(`Task file not found: ${filePath}`, { cause: error });
    }
    throw new TaskStoreError(`Failed to read task file: ${filePath}`, { cause: error });
  }
}

/** Loads the read-only source dataset. Every failure here is fatal for the process. */
export function loadTaskTable(filePath: string): Table {
  let table: Table;
  try {
    table = parseCsvTable(readTaskFile(filePath));
  } catch (error) {
    if (error instanceof CsvFormatError) {
      throw new TaskStoreError(`Task file is not valid CSV: ${filePath}: ${error.message}`, {
        cause: error
      });
    }
    throw error;
  }

  for (const column of REQUIRED_COLUMNS) {
    if (!table.columns.includes(column)) {
      throw new TaskStoreError(`${filePath} is missing required column: ${column}`);
    }
  }
  return table;
}
