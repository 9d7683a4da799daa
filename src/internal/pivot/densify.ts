import { ValuesFillError } from "../../errors";
import type { CellValue, Column } from "../../types";
import { isCellValue, isPlainObject } from "../../utils";
import { fillPositions, sliceColumn } from "../column/vector";
import type { ReducedValues } from "./aggregate";

export type ValuesFillLookup = (valuesColumn: string) => CellValue;

/** Validates `values_fill` up front; the lookup answers per values column. */
export function normalizeValuesFill(input: unknown): ValuesFillLookup {
  if (isCellValue(input)) {
    return () => input;
  }
  if (isPlainObject(input)) {
    const byColumn = new Map<string, CellValue>();
    for (const [column, entry] of Object.entries(input)) {
      if (!isCellValue(entry)) {
        throw new ValuesFillError(`\`values_fill.${column}\` must be a single value.`);
      }
      byColumn.set(column, entry);
    }
    return (valuesColumn) => byColumn.get(valuesColumn);
  }
  throw new ValuesFillError(
    "`values_fill` must be a single value or a mapping of column names to values."
  );
}

/**
 * Spreads reduced cells into `ncol` columns of `nrow` rows. Only cells no input row
 * reached get `fill`; missing values that came from the data stay missing.
 */
export function densify(
  reduced: ReducedValues,
  nrow: number,
  fill: CellValue,
  labels: string[]
): Column[] {
  const ncol = labels.length;
  const slots = labels.map(() => new Array<number | null>(nrow).fill(null));

  reduced.cells.forEach((cell, element) => {
    const col = cell % ncol;
    const row = Math.floor(cell / ncol);
    const slot = slots[col];
    if (slot) {
      slot[row] = element;
    }
  });

  return slots.map((slot, col) => {
    const absent: number[] = [];
    slot.forEach((element, row) => {
      if (element === null) {
        absent.push(row);
      }
    });
    return fillPositions(
      sliceColumn(reduced.column, slot),
      absent,
      fill,
      labels[col] ?? "value",
      reduced.adoptsFill
    );
  });
}
