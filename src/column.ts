import { ColumnTypeError } from "./errors";
import { cloneColumn, columnCells, columnFromCells } from "./internal/column/vector";
import type {
  BooleanColumn,
  Cell,
  Column,
  ColumnInput,
  DateColumn,
  FactorColumn,
  IntegerColumn,
  ListColumn,
  RealColumn,
  TextColumn,
} from "./types";
import { compareCellValues, isMissing } from "./utils";

type Maybe<T> = T | null | undefined;

const COLUMN_TYPES: string[] = ["integer", "real", "text", "boolean", "date", "factor", "list"];

export interface FactorOptions {
  levels?: string[];
  ordered?: boolean;
}

export function integer(values: Array<Maybe<number>>): IntegerColumn {
  const out = values.map((value) => (isMissing(value) ? null : value));
  const bad = out.find((value) => value !== null && !Number.isInteger(value));
  if (bad !== undefined) {
    throw new ColumnTypeError(`Integer columns can't hold ${bad}.`);
  }
  return { type: "integer", values: out };
}

export function real(values: Array<Maybe<number>>): RealColumn {
  return { type: "real", values: values.map((value) => (isMissing(value) ? null : value)) };
}

export function text(values: Array<Maybe<string>>): TextColumn {
  return { type: "text", values: values.map((value) => (isMissing(value) ? null : value)) };
}

export function boolean(values: Array<Maybe<boolean>>): BooleanColumn {
  return { type: "boolean", values: values.map((value) => (isMissing(value) ? null : value)) };
}

export function date(values: Array<Maybe<Date>>): DateColumn {
  return {
    type: "date",
    values: values.map((value) => (isMissing(value) ? null : new Date(value.getTime()))),
  };
}

/**
 * Categorical column. Without explicit `levels` the sorted distinct values are used;
 * values outside the levels become missing.
 */
export function factor(values: Array<Maybe<string>>, options: FactorOptions = {}): FactorColumn {
  const levels =
    options.levels ??
    [...new Set(values.filter((value): value is string => !isMissing(value)))].sort(compareCellValues);
  const known = new Set(levels);
  return {
    type: "factor",
    values: values.map((value) => (isMissing(value) || !known.has(value) ? null : value)),
    levels: [...levels],
    ordered: options.ordered ?? false,
  };
}

export function list(values: Array<Cell[] | Column | null | undefined>): ListColumn {
  return {
    type: "list",
    values: values.map((value) => {
      if (isMissing(value)) {
        return null;
      }
      return Array.isArray(value) ? columnFromCells(value) : cloneColumn(value);
    }),
  };
}

export function isColumn(value: unknown): value is Column {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  if (!("type" in value) || !("values" in value)) {
    return false;
  }
  return (
    typeof value.type === "string" &&
    COLUMN_TYPES.includes(value.type) &&
    Array.isArray(value.values)
  );
}

export function as_column(input: ColumnInput, label = "value"): Column {
  return isColumn(input) ? cloneColumn(input) : columnFromCells(input, undefined, label);
}

export function column_values(column: Column): Cell[] {
  return columnCells(column);
}
