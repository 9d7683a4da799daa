import { as_column } from "../../column";
import { ColumnTypeError } from "../../errors";
import type { Cell, Column, ColumnInput, Row } from "../../types";
import { columnFromCells, columnLength, sliceColumn } from "../column/vector";

export interface TableParts {
  names: string[];
  columns: Column[];
  nrow: number;
}

export function normalizeRecords(records: Row[], forcedColumns?: string[]): TableParts {
  const names = forcedColumns ? [...forcedColumns] : [];
  const seen = new Set(names);

  for (const record of records) {
    for (const column of Object.keys(record)) {
      if (!seen.has(column)) {
        seen.add(column);
        names.push(column);
      }
    }
  }

  const columns = names.map((name) => {
    const cells: Cell[] = records.map((record) => record[name] ?? null);
    return columnFromCells(cells, undefined, name);
  });
  return { names, columns, nrow: records.length };
}

/** Length-1 inputs are recycled; any other length mismatch is an error. */
export function normalizeColumnar(data: Record<string, ColumnInput>): TableParts {
  const names = Object.keys(data);
  const raw = names.map((name) => as_column(data[name] ?? [], name));
  const nrow = commonLength(raw, names);
  const columns = raw.map((column) => recycle(column, nrow));
  return { names, columns, nrow };
}

export function commonLength(columns: Column[], names: string[]): number {
  const lengths = new Set(columns.map(columnLength).filter((length) => length !== 1));
  if (lengths.size > 1) {
    const detail = columns.map((column, position) => `\`${names[position] ?? position}\` (${columnLength(column)})`);
    throw new ColumnTypeError(`Columns must share one length; got ${detail.join(", ")}.`);
  }
  const [length] = [...lengths];
  if (length !== undefined) {
    return length;
  }
  return columns.length > 0 ? 1 : 0;
}

export function recycle(column: Column, length: number): Column {
  if (columnLength(column) === length) {
    return column;
  }
  return sliceColumn(column, Array.from({ length }, () => 0));
}
