import type { Column } from "../../types";
import { range } from "../../utils";
import { rowKey } from "../column/keys";
import type { GroupSlice } from "../table/groups";

export interface IdIndex {
  /** Output row of every input row. */
  rowOf: number[];
  /** One input row per output row, in output order. */
  firsts: number[];
}

/**
 * Enumerates distinct id keys in first-appearance order. With group slices the
 * rows are visited group by group, so output rows come out grouped.
 */
export function indexIds(idColumns: Column[], nrow: number, groups?: GroupSlice[]): IdIndex {
  const slices = groups ?? [{ first: 0, positions: range(nrow) }];
  const rowByKey = new Map<string, number>();
  const rowOf = new Array<number>(nrow).fill(0);
  const firsts: number[] = [];

  for (const slice of slices) {
    for (const position of slice.positions) {
      const key = rowKey(idColumns, position);
      let row = rowByKey.get(key);
      if (row === undefined) {
        row = firsts.length;
        rowByKey.set(key, row);
        firsts.push(position);
      }
      rowOf[position] = row;
    }
  }

  return { rowOf, firsts };
}

export interface CellGroups {
  ncol: number;
  /** Input rows of every occupied cell, keyed by `row * ncol + col`, in first-seen order. */
  cells: Map<number, number[]>;
  /** How many cells hold more than one input row. */
  duplicated: number;
}

/**
 * Places input rows into (id row, spec row) cells. `specKeys` are the key columns of
 * the spec rows drawing from one values column; rows whose names key matches none of
 * them are left out.
 */
export function groupCells(
  namesColumns: Column[],
  specKeys: Column[],
  ncol: number,
  ids: IdIndex
): CellGroups {
  const colByKey = new Map<string, number>();
  for (let col = 0; col < ncol; col += 1) {
    const key = rowKey(specKeys, col);
    if (!colByKey.has(key)) {
      colByKey.set(key, col);
    }
  }

  const cells = new Map<number, number[]>();
  let duplicated = 0;
  ids.rowOf.forEach((row, position) => {
    const col = colByKey.get(rowKey(namesColumns, position));
    if (col === undefined) {
      return;
    }
    const cell = row * ncol + col;
    const members = cells.get(cell);
    if (!members) {
      cells.set(cell, [position]);
      return;
    }
    if (members.length === 1) {
      duplicated += 1;
    }
    members.push(position);
  });

  return { ncol, cells, duplicated };
}
