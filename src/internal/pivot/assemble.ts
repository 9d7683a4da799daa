import { repair_names, type NameRepair, type Rename } from "../../names";
import { Table } from "../../table";
import type { Column } from "../../types";

export interface NamedColumns {
  names: string[];
  columns: Column[];
}

export interface AssembledTable {
  table: Table;
  renamed: Rename[];
}

/**
 * Id columns first, then value columns. Names are repaired as one sequence, so a
 * value column colliding with an id column is a repair concern; group keys follow
 * their id column through any rename.
 */
export function assemble(
  ids: NamedColumns,
  values: NamedColumns,
  nrow: number,
  repair: NameRepair,
  groups: string[]
): AssembledTable {
  const { names, renamed } = repair_names([...ids.names, ...values.names], repair);
  const repairedGroups = groups.map((group) => {
    const position = ids.names.indexOf(group);
    return position >= 0 ? names[position] ?? group : group;
  });

  return {
    table: Table.from_columns(names, [...ids.columns, ...values.columns], {
      nrow,
      groups: repairedGroups,
    }),
    renamed,
  };
}
