import type { ReadParquetOptions } from "../../io";
import { Table } from "../../table";
import type { Row } from "../../types";
import { normalizeExternalCell } from "./shared";

export async function readParquetFile(path: string, options: ReadParquetOptions = {}): Promise<Table> {
  const parquet = await import("parquetjs-lite");
  const reader = await parquet.ParquetReader.openFile(path);
  const records: Row[] = [];
  const selected = options.columns && options.columns.length > 0 ? options.columns : undefined;

  try {
    const cursor = reader.getCursor(selected);
    let next = await cursor.next();
    while (next) {
      records.push(normalizeParquetRow(next));
      next = await cursor.next();
    }
  } finally {
    await reader.close();
  }

  const table = new Table(records);
  return selected ? table.select(selected) : table;
}

function normalizeParquetRow(raw: Record<string, unknown>): Row {
  const row: Row = {};
  for (const [column, value] of Object.entries(raw)) {
    row[column] = normalizeExternalCell(value);
  }
  return row;
}
