import { describe, expect, it } from "vitest";
import { CsvFormatError, parseCsvTable, serializeCsvTable } from "../services/csvTable.js";

describe("csvTable", () => {
  it("quotes cells that contain commas and ends with a newline", () => {
    const csv = serializeCsvTable({
      columns: ["原形", "候选项"],
      records: [{ 原形: "发", 候选项: "[發,120] [髮,45]" }]
    });
    expect(csv).toBe('原形,候选项\n发,"[發,120] [髮,45]"\n');
  });

  it("reads back what it writes", () => {
    const table = {
      columns: ["原形", "校对后"],
      records: [
        { 原形: "干", 校对后: "乾 幹" },
        { 原形: "云", 校对后: "" }
      ]
    };
    expect(parseCsvTable(serializeCsvTable(table))).toEqual(table);
  });

  it("drops a leading byte order mark", () => {
    const table = parseCsvTable("\uFEFF原形,校对前\n发,發\n");
    expect(table.columns).toEqual(["原形", "校对前"]);
    expect(table.records).toEqual([{ 原形: "发", 校对前: "發" }]);
  });

  it("pads short rows with empty cells", () => {
    const table = parseCsvTable("a,b,c\n1,2\n");
    expect(table.records).toEqual([{ a: "1", b: "2", c: "" }]);
  });

  it("keeps a column whose header is empty", () => {
    const table = parseCsvTable(",原形\n0,发\n1,后\n");

    expect(table.columns).toEqual(["", "原形"]);
    expect(table.records[1]).toEqual({ "": "1", 原形: "后" });
    expect(serializeCsvTable(table)).toBe(",原形\n0,发\n1,后\n");
  });

  it("splits on commas only", () => {
    const table = parseCsvTable("原形;校对前\n发;發\n");

    expect(table.columns).toEqual(["原形;校对前"]);
    expect(table.records).toEqual([{ "原形;校对前": "发;發" }]);
  });

  it("rejects unterminated quotes", () => {
    expect(() => parseCsvTable('a,b\n"x,y\n')).toThrow(CsvFormatError);
  });
});
