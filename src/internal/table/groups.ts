import type { Column } from "../../types";
import { range } from "../../utils";
import { rowKey } from "../column/keys";
import { orderRows } from "../column/ordering";

export interface GroupSlice {
  /** Position of the group's first row; its key cells identify the group. */
  first: number;
  positions: number[];
}

/**
 * Partitions rows by the key columns. Groups come back in ascending key order,
 * rows keep their input order inside a group.
 */
export function groupSlices(keyColumns: Column[], nrow: number): GroupSlice[] {
  if (keyColumns.length === 0) {
    return [{ first: 0, positions: range(nrow) }];
  }

  const groups = new Map<string, GroupSlice>();
  for (let position = 0; position < nrow; position += 1) {
    const key = rowKey(keyColumns, position);
    const group = groups.get(key);
    if (!group) {
      groups.set(key, { first: position, positions: [position] });
    } else {
      group.positions.push(position);
    }
  }

  const byFirst = new Map([...groups.values()].map((group) => [group.first, group]));
  return orderRows(keyColumns, [...byFirst.keys()]).flatMap((first) => {
    const group = byFirst.get(first);
    return group ? [group] : [];
  });
}
