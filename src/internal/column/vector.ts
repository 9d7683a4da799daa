import { ColumnTypeError, ValuesFillError } from "../../errors";
import type { Cell, CellValue, Column, FactorColumn } from "../../types";
import { inferCellsType, isMissing } from "../../utils";

export function columnLength(column: Column): number {
  return column.values.length;
}

export function cloneColumn(column: Column): Column {
  return sliceColumn(column, column.values.map((_, index) => index));
}

/** Same type (and levels) as `column`, `length` missing values. */
export function missingLike(column: Column, length: number): Column {
  return sliceColumn(column, Array.from({ length }, () => null));
}

function pick<T>(values: T[], indices: Array<number | null>): Array<T | null> {
  return indices.map((index) => (index === null ? null : values[index] ?? null));
}

/** Gathers rows by position; a `null` position yields a missing cell. */
export function sliceColumn(column: Column, indices: Array<number | null>): Column {
  switch (column.type) {
    case "integer":
      return { type: "integer", values: pick(column.values, indices) };
    case "real":
      return { type: "real", values: pick(column.values, indices) };
    case "text":
      return { type: "text", values: pick(column.values, indices) };
    case "boolean":
      return { type: "boolean", values: pick(column.values, indices) };
    case "date":
      return {
        type: "date",
        values: pick(column.values, indices).map((value) =>
          value === null ? null : new Date(value.getTime())
        ),
      };
    case "factor":
      return {
        type: "factor",
        values: pick(column.values, indices),
        levels: [...column.levels],
        ordered: column.ordered,
      };
    case "list":
      return {
        type: "list",
        values: pick(column.values, indices).map((value) =>
          value === null ? null : cloneColumn(value)
        ),
      };
  }
}

export function cellAt(column: Column, index: number): Cell {
  if (column.type === "list") {
    const nested = column.values[index];
    return nested ? columnCells(nested) : null;
  }
  return column.values[index] ?? null;
}

export function columnCells(column: Column): Cell[] {
  return column.values.map((_, index) => cellAt(column, index));
}

export function isAllMissing(column: Column): boolean {
  return column.values.every((value) => value === null);
}

/** Builds a typed column from plain cells, keeping `hint`'s type where every cell fits it. */
export function columnFromCells(cells: Cell[], hint?: Column, label = "value"): Column {
  if (hint) {
    const cast = castCells(cells, hint);
    if (cast) {
      return cast;
    }
  }

  const type = inferCellsType(cells);
  switch (type) {
    case "integer":
    case "real":
      return { type, values: cells.map((cell) => (typeof cell === "number" ? cell : null)) };
    case "text":
      return { type, values: cells.map((cell) => (typeof cell === "string" ? cell : null)) };
    case "boolean":
      return { type, values: cells.map((cell) => (typeof cell === "boolean" ? cell : null)) };
    case "date":
      return {
        type,
        values: cells.map((cell) => (cell instanceof Date ? new Date(cell.getTime()) : null)),
      };
    case "list":
      return {
        type,
        values: cells.map((cell) =>
          Array.isArray(cell) ? columnFromCells(cell, listHint(hint), label) : null
        ),
      };
    case "factor":
    case "mixed":
      throw new ColumnTypeError(`Can't combine the values of \`${label}\` into one column type.`);
  }
}

function listHint(hint: Column | undefined): Column | undefined {
  if (!hint || hint.type !== "list") {
    return hint;
  }
  return hint.values.find((value): value is Column => value !== null);
}

function castCells(cells: Cell[], hint: Column): Column | undefined {
  if (cells.every((cell) => isMissing(cell))) {
    return missingLike(hint, cells.length);
  }

  switch (hint.type) {
    case "integer":
    case "real": {
      if (!cells.every((cell) => isMissing(cell) || typeof cell === "number")) {
        return undefined;
      }
      const values = cells.map((cell) => (typeof cell === "number" ? cell : null));
      const integral = values.every((value) => value === null || Number.isInteger(value));
      return { type: hint.type === "integer" && integral ? "integer" : "real", values };
    }
    case "text":
      return cells.every((cell) => isMissing(cell) || typeof cell === "string")
        ? { type: "text", values: cells.map((cell) => (typeof cell === "string" ? cell : null)) }
        : undefined;
    case "factor": {
      const levels = new Set(hint.levels);
      if (!cells.every((cell) => isMissing(cell) || (typeof cell === "string" && levels.has(cell)))) {
        return undefined;
      }
      return {
        type: "factor",
        values: cells.map((cell) => (typeof cell === "string" ? cell : null)),
        levels: [...hint.levels],
        ordered: hint.ordered,
      };
    }
    case "boolean":
      return cells.every((cell) => isMissing(cell) || typeof cell === "boolean")
        ? { type: "boolean", values: cells.map((cell) => (typeof cell === "boolean" ? cell : null)) }
        : undefined;
    case "date":
      return cells.every((cell) => isMissing(cell) || cell instanceof Date)
        ? {
            type: "date",
            values: cells.map((cell) => (cell instanceof Date ? new Date(cell.getTime()) : null)),
          }
        : undefined;
    case "list":
      return undefined;
  }
}

function unionLevels(factors: FactorColumn[]): string[] {
  const levels: string[] = [];
  const seen = new Set<string>();
  for (const factor of factors) {
    for (const level of factor.levels) {
      if (!seen.has(level)) {
        seen.add(level);
        levels.push(level);
      }
    }
  }
  return levels;
}

/** The zero-length column every input can be cast to; throws when the types don't mix. */
export function commonPrototype(columns: Column[], label = "value"): Column {
  const informative = columns.filter((column) => !(column.type === "boolean" && isAllMissing(column)));
  if (informative.length === 0) {
    return { type: "boolean", values: [] };
  }

  const types = new Set(informative.map((column) => column.type));
  if (types.size === 1) {
    const first = informative[0];
    if (first && first.type === "factor") {
      const factors = informative.filter((column): column is FactorColumn => column.type === "factor");
      const levels = unionLevels(factors);
      const ordered =
        factors.every((factor) => factor.ordered) &&
        factors.every((factor) => factor.levels.join("\u0000") === levels.join("\u0000"));
      return { type: "factor", values: [], levels, ordered };
    }
    return missingLike(first ?? { type: "boolean", values: [] }, 0);
  }

  if (types.size === 2 && types.has("integer") && types.has("real")) {
    return { type: "real", values: [] };
  }
  if ([...types].every((type) => type === "text" || type === "factor")) {
    return { type: "text", values: [] };
  }

  throw new ColumnTypeError(
    `Can't combine \`${label}\` columns of types ${[...types].join(" and ")}.`
  );
}

/** Casts `column` to `prototype`'s type; callers get the prototype from `commonPrototype`. */
export function castColumn(column: Column, prototype: Column, label = "value"): Column {
  if (column.type === "boolean" && isAllMissing(column)) {
    return missingLike(prototype, column.values.length);
  }

  switch (prototype.type) {
    case "real":
      if (column.type === "integer" || column.type === "real") {
        return { type: "real", values: [...column.values] };
      }
      break;
    case "text":
      if (column.type === "text" || column.type === "factor") {
        return { type: "text", values: [...column.values] };
      }
      break;
    case "factor":
      if (column.type === "factor") {
        return {
          type: "factor",
          values: [...column.values],
          levels: [...prototype.levels],
          ordered: prototype.ordered,
        };
      }
      break;
    default:
      if (column.type === prototype.type) {
        return cloneColumn(column);
      }
  }

  throw new ColumnTypeError(`Can't convert \`${label}\` from ${column.type} to ${prototype.type}.`);
}

export function concatColumns(columns: Column[], label = "value"): Column {
  const prototype = commonPrototype(columns, label);
  const cast = columns.map((column) => castColumn(column, prototype, label));
  const positions: Array<[number, number]> = [];
  cast.forEach((column, which) => {
    for (let index = 0; index < column.values.length; index += 1) {
      positions.push([which, index]);
    }
  });

  const cells = positions.map(([which, index]) => {
    const column = cast[which];
    return column ? cellAt(column, index) : null;
  });
  if (cells.length === 0) {
    return prototype;
  }
  const combined = castCells(cells, prototype);
  return combined ?? columnFromCells(cells, undefined, label);
}

function describeFill(value: CellValue): string {
  return value instanceof Date ? "date" : typeof value;
}

/**
 * Writes `fill` into `positions`, widening the column only as far as the fill needs:
 * integral numbers keep an integer column, strings add factor levels. With `adopt`,
 * an all-missing boolean column takes the fill's type instead.
 */
export function fillPositions(
  column: Column,
  positions: number[],
  fill: CellValue,
  label: string,
  adopt = false
): Column {
  if (positions.length === 0 || isMissing(fill)) {
    return column;
  }

  const incompatible = (): ValuesFillError =>
    new ValuesFillError(
      `Can't fill \`${label}\` (${column.type}) with a \`values_fill\` of type ${describeFill(fill)}.`
    );

  if (column.type === "list") {
    const values = [...column.values];
    const wrapped = columnFromCells([fill]);
    for (const position of positions) {
      values[position] = cloneColumn(wrapped);
    }
    return { type: "list", values };
  }

  if (adopt && column.type === "boolean" && isAllMissing(column) && typeof fill !== "boolean") {
    const cells: Cell[] = column.values.map(() => null);
    for (const position of positions) {
      cells[position] = fill;
    }
    return columnFromCells(cells, undefined, label);
  }

  switch (column.type) {
    case "integer":
    case "real": {
      if (typeof fill !== "number") {
        throw incompatible();
      }
      const values = [...column.values];
      for (const position of positions) {
        values[position] = fill;
      }
      const type = column.type === "integer" && Number.isInteger(fill) ? "integer" : "real";
      return { type, values };
    }
    case "text": {
      if (typeof fill !== "string") {
        throw incompatible();
      }
      const values = [...column.values];
      for (const position of positions) {
        values[position] = fill;
      }
      return { type: "text", values };
    }
    case "factor": {
      if (typeof fill !== "string") {
        throw incompatible();
      }
      const values = [...column.values];
      for (const position of positions) {
        values[position] = fill;
      }
      const levels = column.levels.includes(fill) ? [...column.levels] : [...column.levels, fill];
      return { type: "factor", values, levels, ordered: column.ordered };
    }
    case "boolean": {
      if (typeof fill !== "boolean") {
        throw incompatible();
      }
      const values = [...column.values];
      for (const position of positions) {
        values[position] = fill;
      }
      return { type: "boolean", values };
    }
    case "date": {
      if (!(fill instanceof Date)) {
        throw incompatible();
      }
      const values = [...column.values];
      for (const position of positions) {
        values[position] = new Date(fill.getTime());
      }
      return { type: "date", values };
    }
  }
}
