import Papa from "papaparse";
import type { Table, TableRecord } from "../types.js";

const BYTE_ORDER_MARK = "\uFEFF";

export class CsvFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CsvFormatError";
  }
}

function stripByteOrderMark(text: string): string {
  return text.startsWith(BYTE_ORDER_MARK) ? text.slice(1) : text;
}

/**
 * Decodes a header-row CSV into a table of string cells.
 *
 * Short rows are padded with empty cells and surplus fields are dropped;
 * only broken quoting is rejected. A column with an empty header, such as a
 * written-out row index, is kept under the name `""`.
 */
export function parseCsvTable(text: string): Table {
  const parsed = Papa.parse<TableRecord>(stripByteOrderMark(text), {
    header: true,
    delimiter: ",",
    skipEmptyLines: true,
    dynamicTyping: false
  });

  const quoteError = parsed.errors.find((error) => error.type === "Quotes");
  if (quoteError) {
    const row = quoteError.row === undefined ? "" : ` (row ${quoteError.row + 1})`;
    throw new CsvFormatError(`${quoteError.message}${row}`);
  }

  const columns = parsed.meta.fields ?? [];
  const records = parsed.data.map((raw) => {
    const record: TableRecord = {};
    for (const column of columns) {
      const value = raw[column];
      record[column] = typeof value === "string" ? value : "";
    }
    return record;
  });

  return { columns, records };
}

export function serializeCsvTable(table: Table): string {
  const body = Papa.unparse(
    {
      fields: table.columns,
      data: table.records.map((record) => table.columns.map((column) => record[column] ?? ""))
    },
    { newline: "\n" }
  );
  return `${body}\n`;
}

export function cloneTable(table: Table): Table {
  return {
    columns: [...table.columns],
    records: table.records.map((record) => ({ ...record }))
  };
}
