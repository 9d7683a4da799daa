import type { Column } from "../../types";
import { compareCellValues, range } from "../../utils";
import { cellKey } from "./keys";

export type RowComparer = (leftPosition: number, rightPosition: number) => number;

/** Ascending, missing last; factors follow their declared level order. */
export function buildColumnComparer(column: Column): RowComparer {
  switch (column.type) {
    case "factor": {
      const rank = new Map(column.levels.map((level, position) => [level, position]));
      const values = column.values;
      return (leftPosition, rightPosition) => {
        const left = values[leftPosition] ?? null;
        const right = values[rightPosition] ?? null;
        if (left === null || right === null) {
          return compareCellValues(left, right);
        }
        return (rank.get(left) ?? rank.size) - (rank.get(right) ?? rank.size);
      };
    }
    case "list":
      return (leftPosition, rightPosition) =>
        cellKey(column, leftPosition).localeCompare(cellKey(column, rightPosition));
    default: {
      const values = column.values;
      return (leftPosition, rightPosition) =>
        compareCellValues(values[leftPosition] ?? null, values[rightPosition] ?? null);
    }
  }
}

export function compareRows(comparers: RowComparer[]): RowComparer {
  return (leftPosition, rightPosition) => {
    for (const comparer of comparers) {
      const compared = comparer(leftPosition, rightPosition);
      if (compared !== 0) {
        return compared;
      }
    }
    return 0;
  };
}

/** Stable sort of `positions` (default: every row) by the given key columns. */
export function orderRows(columns: Column[], positions?: number[]): number[] {
  const length = columns[0]?.values.length ?? 0;
  const ordered = positions ? [...positions] : range(length);
  const comparer = compareRows(columns.map(buildColumnComparer));
  return ordered.sort(comparer);
}
