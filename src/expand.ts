import { as_column } from "./column";
import { concatColumns, sliceColumn } from "./internal/column/vector";
import { commonLength, recycle } from "./internal/table/core";
import { cartesian, completeValues, sortedDistinct, type GridUnit } from "./internal/table/grid";
import type { GroupSlice } from "./internal/table/groups";
import { repair_names, type NameRepair } from "./names";
import { Table } from "./table";
import type { Column, ColumnInput } from "./types";
import { range } from "./utils";

/** A named input vector; `null` entries are dropped. */
export type GridVector = ColumnInput | null | undefined;

/** A table contributes its rows as one unit; each record entry is its own unit. */
export type GridInput = Table | Record<string, GridVector>;

export interface GridOptions {
  name_repair?: NameRepair;
}

export class NestingSpec {
  readonly columns: string[];

  constructor(columns: string[]) {
    this.columns = [...columns];
  }
}

/** Only the combinations of `columns` present in the data. */
export function nesting_of(...columns: string[]): NestingSpec {
  return new NestingSpec(columns);
}

export type ExpandSpec = string | NestingSpec | Record<string, GridVector>;

export type ExpandOptions = GridOptions;

function tableUnit(table: Table): GridUnit {
  return {
    names: table.columns,
    columns: range(table.ncol).map((position) => table.column(position)),
    nrow: table.nrow,
  };
}

function recordUnits(record: Record<string, GridVector>): GridUnit[] {
  const units: GridUnit[] = [];
  for (const [name, vector] of Object.entries(record)) {
    if (vector === null || vector === undefined) {
      continue;
    }
    const column = as_column(vector, name);
    units.push({ names: [name], columns: [column], nrow: column.values.length });
  }
  return units;
}

function toUnits(inputs: GridInput | GridInput[]): GridUnit[] {
  const list = Array.isArray(inputs) ? inputs : [inputs];
  return list.flatMap((input) => (input instanceof Table ? [tableUnit(input)] : recordUnits(input)));
}

function toTable(unit: GridUnit, repair: NameRepair, groups: string[] = []): Table {
  const { names } = repair_names(unit.names, repair, "name_repair");
  return Table.from_columns(names, unit.columns, { nrow: unit.nrow, groups });
}

/** Every combination of the inputs; the first input varies slowest. */
export function expand_grid(inputs: GridInput | GridInput[] = [], options: GridOptions = {}): Table {
  return toTable(cartesian(toUnits(inputs)), options.name_repair ?? "check_unique");
}

/** Like `expand_grid`, over the sorted distinct values of each input. */
export function crossing(inputs: GridInput | GridInput[] = [], options: GridOptions = {}): Table {
  return toTable(cartesian(toUnits(inputs).map(completeValues)), options.name_repair ?? "check_unique");
}

function nestUnits(units: GridUnit[]): GridUnit {
  if (units.length === 0) {
    return { names: [], columns: [], nrow: 0 };
  }
  const names = units.flatMap((unit) => unit.names);
  const columns = units.flatMap((unit) => unit.columns);
  const nrow = commonLength(columns, names);
  return sortedDistinct({ names, columns: columns.map((column) => recycle(column, nrow)), nrow });
}

/** The distinct combinations that occur, sorted. */
export function nesting(inputs: GridInput | GridInput[] = [], options: GridOptions = {}): Table {
  return toTable(nestUnits(toUnits(inputs)), options.name_repair ?? "check_unique");
}

function specUnits(table: Table, spec: ExpandSpec): GridUnit[] {
  if (typeof spec === "string") {
    return [completeValues({ names: [spec], columns: [table.column(spec)], nrow: table.nrow })];
  }
  if (spec instanceof NestingSpec) {
    return [
      nestUnits([
        { names: spec.columns, columns: spec.columns.map((name) => table.column(name)), nrow: table.nrow },
      ]),
    ];
  }
  return recordUnits(spec).map(completeValues);
}

/**
 * Completes the table's values: bare column names cross their values, `nesting_of`
 * keeps observed combinations. Grouped tables expand within each group.
 */
export function expand(table: Table, specs: ExpandSpec[] = [], options: ExpandOptions = {}): Table {
  const groups = table.groups;
  const groupColumns = groups.map((group) => table.column(group));
  const slices = table.group_rows();
  // a grouped table without rows still yields typed columns
  const runs: GroupSlice[] = slices.length > 0 ? slices : [{ first: 0, positions: [] }];

  const pieces = runs.map((slice) => {
    const rows = table.slice(slice.positions);
    const grid = cartesian(specs.flatMap((spec) => specUnits(rows, spec)));
    const keys = groupColumns.map((column) =>
      sliceColumn(column, new Array<number>(grid.nrow).fill(slice.first))
    );
    return { columns: [...keys, ...grid.columns], names: [...groups, ...grid.names], nrow: grid.nrow };
  });

  const [first] = pieces;
  const names = first?.names ?? groups;
  const width = names.length;
  const total = slices.length > 0 ? pieces.reduce((sum, piece) => sum + piece.nrow, 0) : 0;
  const columns = range(width).map((position): Column => {
    const combined = concatColumns(
      pieces.flatMap((piece) => {
        const column = piece.columns[position];
        return column ? [column] : [];
      }),
      names[position] ?? "value"
    );
    return slices.length > 0 ? combined : sliceColumn(combined, []);
  });

  return toTable({ names, columns, nrow: total }, options.name_repair ?? "check_unique", groups);
}
