import { ValuesFnError } from "../../errors";
import type { AggName, Cell, Column, ValuesFn } from "../../types";
import { isCellValue, isMissing, isPlainObject, numericValues, range } from "../../utils";
import { buildColumnComparer } from "../column/ordering";
import { cellAt, columnCells, columnFromCells, isAllMissing, missingLike, sliceColumn } from "../column/vector";
import type { CellGroups } from "./keys";

export type ValuesFnLookup = (valuesColumn: string) => ValuesFn | undefined;

const AGG_NAMES: readonly string[] = ["sum", "mean", "min", "max", "count", "first", "last", "list"];

function isAggName(value: string): value is AggName {
  return AGG_NAMES.includes(value);
}

function checkValuesFn(value: unknown, arg: string): ValuesFn {
  if (typeof value === "string") {
    if (!isAggName(value)) {
      throw new ValuesFnError(
        `\`${arg}\` names an unknown aggregation "${value}"; use one of ${AGG_NAMES.join(", ")}.`
      );
    }
    return value;
  }
  if (typeof value === "function") {
    const fn = value;
    return (values: Cell[], column: Column): Cell => {
      const result: unknown = Reflect.apply(fn, undefined, [values, column]);
      return toSummaryCell(result, arg);
    };
  }
  throw new ValuesFnError(`\`${arg}\` must be a function or an aggregation name.`);
}

/** Validates `values_fn` up front; the lookup answers per values column. */
export function normalizeValuesFn(input: unknown): ValuesFnLookup {
  if (input === undefined || input === null) {
    return () => undefined;
  }
  if (typeof input === "function" || typeof input === "string") {
    const fn = checkValuesFn(input, "values_fn");
    return () => fn;
  }
  if (isPlainObject(input)) {
    const byColumn = new Map<string, ValuesFn>();
    for (const [column, entry] of Object.entries(input)) {
      byColumn.set(column, checkValuesFn(entry, `values_fn.${column}`));
    }
    return (valuesColumn) => byColumn.get(valuesColumn);
  }
  throw new ValuesFnError(
    "`values_fn` must be a function, an aggregation name, or a mapping of column names to them."
  );
}

function toSummaryCell(result: unknown, label: string): Cell {
  if (isCellValue(result)) {
    return result;
  }
  if (Array.isArray(result)) {
    return result.map((entry: unknown) => toSummaryCell(entry, label));
  }
  throw new ValuesFnError(`\`${label}\` must result in a single summary value per key.`);
}

function extreme(column: Column, pick: "min" | "max"): Cell {
  const present = range(column.values.length).filter((position) => column.values[position] !== null);
  if (present.length === 0) {
    return null;
  }
  const sorted = present.sort(buildColumnComparer(column));
  const position = pick === "min" ? sorted[0] : sorted.at(-1);
  return position === undefined ? null : cellAt(column, position);
}

export function runAggregation(values: Cell[], column: Column, aggfunc: ValuesFn): Cell {
  if (typeof aggfunc === "function") {
    return aggfunc(values, column);
  }

  switch (aggfunc) {
    case "count":
      return values.filter((value) => !isMissing(value)).length;
    case "min":
    case "max":
      return extreme(column, aggfunc);
    case "first":
      return values[0] ?? null;
    case "last":
      return values.at(-1) ?? null;
    case "list":
      return [...values];
    case "sum":
    case "mean": {
      const numbers = numericValues(values);
      if (numbers.length === 0) {
        return null;
      }
      const total = numbers.reduce((acc, value) => acc + value, 0);
      return aggfunc === "sum" ? total : total / numbers.length;
    }
  }
}

/** The zero-length column an aggregation's results are typed as, whatever the data. */
export function aggregationPrototype(aggfunc: ValuesFn, source: Column): Column {
  if (typeof aggfunc === "function") {
    return missingLike(source, 0);
  }
  switch (aggfunc) {
    case "count":
      return { type: "integer", values: [] };
    case "mean":
      return { type: "real", values: [] };
    case "sum":
      return { type: source.type === "integer" ? "integer" : "real", values: [] };
    case "list":
      return { type: "list", values: [missingLike(source, 0)] };
    case "min":
    case "max":
    case "first":
    case "last":
      return missingLike(source, 0);
  }
}

export interface ReducedValues {
  /** One element per occupied cell. */
  column: Column;
  /** Cell index (`row * ncol + col`) of each element. */
  cells: number[];
  /** Duplicates were collected into nested sequences. */
  collapsed: boolean;
  /** The source carried no values, so a fill may set the column type. */
  adoptsFill: boolean;
}

/**
 * Reduces every cell group to one value. A supplied function runs on every group,
 * singletons included; without one, duplicates turn the whole values column into
 * a list column.
 */
export function reduceCells(
  source: Column,
  groups: CellGroups,
  fn: ValuesFn | undefined,
  label: string
): ReducedValues {
  const cells = [...groups.cells.keys()];
  const members = [...groups.cells.values()];

  if (fn !== undefined) {
    const results = members.map((rows) => {
      const slice = sliceColumn(source, rows);
      return runAggregation(columnCells(slice), slice, fn);
    });
    return {
      column: columnFromCells(results, aggregationPrototype(fn, source), label),
      cells,
      collapsed: false,
      adoptsFill: false,
    };
  }

  if (groups.duplicated === 0) {
    return {
      column: sliceColumn(source, members.map((rows) => rows[0] ?? null)),
      cells,
      collapsed: false,
      adoptsFill: source.type === "boolean" && isAllMissing(source),
    };
  }

  return {
    column: { type: "list", values: members.map((rows) => sliceColumn(source, rows)) },
    cells,
    collapsed: true,
    adoptsFill: false,
  };
}
