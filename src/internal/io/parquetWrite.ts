import type { ParquetFieldDefinition, ParquetPrimitiveType } from "parquetjs-lite";
import { ReshapeError } from "../../errors";
import type { ToParquetOptions } from "../../table";
import type { Column } from "../../types";
import { cellAt } from "../column/vector";
import type { TableLike } from "./tableLike";

export async function writeParquetFrame(table: TableLike, options: ToParquetOptions): Promise<void> {
  if (!options.path) {
    throw new ReshapeError("to_parquet requires a file path.");
  }

  const parquet = await import("parquetjs-lite");
  const columns = table.columns.map((_, position) => table.column(position));
  const schemaDef: Record<string, ParquetFieldDefinition> = {};
  table.columns.forEach((name, position) => {
    const column = columns[position];
    if (column && !(name in schemaDef)) {
      schemaDef[name] = { type: parquetTypeFor(column), optional: true };
    }
  });

  const schema = new parquet.ParquetSchema(schemaDef);
  const writer = await parquet.ParquetWriter.openFile(schema, options.path);

  try {
    for (let row = 0; row < table.nrow; row += 1) {
      const record: Record<string, unknown> = {};
      table.columns.forEach((name, position) => {
        const column = columns[position];
        if (column && !(name in record)) {
          record[name] = parquetCell(column, row);
        }
      });
      await writer.appendRow(record);
    }
  } finally {
    await writer.close();
  }
}

function parquetTypeFor(column: Column): ParquetPrimitiveType {
  switch (column.type) {
    case "integer":
    case "real":
      return "DOUBLE";
    case "boolean":
      return "BOOLEAN";
    case "date":
      return "TIMESTAMP_MILLIS";
    default:
      return "UTF8";
  }
}

function parquetCell(column: Column, row: number): unknown {
  const value = cellAt(column, row);
  if (value === null || value === undefined) {
    return undefined;
  }
  if (Array.isArray(value)) {
    return JSON.stringify(value);
  }
  return column.type === "text" || column.type === "factor" ? String(value) : value;
}
