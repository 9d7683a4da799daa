import type { Column } from "../../types";
import { distinctRowPositions } from "../column/keys";
import { orderRows } from "../column/ordering";
import { sliceColumn } from "../column/vector";

export interface GridUnit {
  names: string[];
  columns: Column[];
  nrow: number;
}

/** Cartesian product of the units; the first unit varies slowest. */
export function cartesian(units: GridUnit[]): GridUnit {
  const total = units.reduce((product, unit) => product * unit.nrow, 1);
  const names: string[] = [];
  const columns: Column[] = [];

  units.forEach((unit, position) => {
    const each = units.slice(position + 1).reduce((product, later) => product * later.nrow, 1);
    const indices = Array.from({ length: total }, (_, row) =>
      unit.nrow === 0 ? null : Math.floor(row / each) % unit.nrow
    );
    names.push(...unit.names);
    columns.push(...unit.columns.map((column) => sliceColumn(column, indices)));
  });

  return { names, columns, nrow: total };
}

/** Distinct rows in ascending order (missing last, factors by level). */
export function sortedDistinct(unit: GridUnit): GridUnit {
  const positions = orderRows(unit.columns, distinctRowPositions(unit.columns, unit.nrow));
  return {
    names: [...unit.names],
    columns: unit.columns.map((column) => sliceColumn(column, positions)),
    nrow: positions.length,
  };
}

/**
 * The values a single column contributes to a complete grid: every declared level
 * for a factor (plus missing when the data has it), otherwise its sorted distinct values.
 */
export function completeValues(unit: GridUnit): GridUnit {
  const [column] = unit.columns;
  if (unit.columns.length !== 1 || !column || column.type !== "factor") {
    return sortedDistinct(unit);
  }

  const values: Array<string | null> = [...column.levels];
  if (column.values.some((value) => value === null)) {
    values.push(null);
  }
  return {
    names: [...unit.names],
    columns: [{ type: "factor", values, levels: [...column.levels], ordered: column.ordered }],
    nrow: values.length,
  };
}
