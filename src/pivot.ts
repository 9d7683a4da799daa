import { ColumnSelectionError, ReshapeError } from "./errors";
import { normalizeValuesFn, reduceCells } from "./internal/pivot/aggregate";
import { assemble } from "./internal/pivot/assemble";
import { densify, normalizeValuesFill } from "./internal/pivot/densify";
import { groupCells, indexIds } from "./internal/pivot/keys";
import { buildLongerSpec, pivotLongerSpec } from "./internal/pivot/longer";
import { buildWiderSpec, checkSpec, type CheckedSpec } from "./internal/pivot/spec";
import { sliceColumn } from "./internal/column/vector";
import { describeRenames, type NameRepair } from "./names";
import { resolve_columns, resolve_names, type ColumnSelector } from "./select";
import { Table } from "./table";
import type { Column, ValuesFill, ValuesFnInput } from "./types";
import { range } from "./utils";

export interface PivotWarning {
  kind: "values_not_unique" | "names_repaired";
  /** The values column whose cells were collapsed. */
  values_from?: string;
  /** Output columns affected. */
  columns: string[];
  /** Number of (id, column) cells fed by more than one row. */
  duplicates?: number;
  message: string;
}

export interface WiderResult {
  table: Table;
  warnings: PivotWarning[];
}

export interface BuildWiderSpecOptions {
  names_from?: ColumnSelector;
  values_from?: ColumnSelector;
  names_prefix?: string;
  names_sep?: string;
  /** Template such as `"{key}_{.value}"`; overrides prefix and separator. */
  names_glue?: string;
  names_sort?: boolean;
  names_vary?: "fastest" | "slowest";
  names_expand?: boolean;
  names_repair?: NameRepair;
}

export interface PivotWiderSpecOptions {
  id_cols?: ColumnSelector;
  names_repair?: NameRepair;
  values_fill?: ValuesFill;
  values_fn?: ValuesFnInput;
  on_warning?: (warning: PivotWarning) => void;
}

export type PivotWiderOptions = BuildWiderSpecOptions & PivotWiderSpecOptions;

export interface BuildLongerSpecOptions {
  cols: ColumnSelector;
  names_to?: string | string[];
  names_prefix?: string;
  names_sep?: string | RegExp;
  names_pattern?: RegExp;
  values_to?: string;
}

export interface PivotLongerSpecOptions {
  values_drop_na?: boolean;
  names_repair?: NameRepair;
}

export type PivotLongerOptions = BuildLongerSpecOptions & PivotLongerSpecOptions;

/** Validates a spec and returns it with `.name` and `.value` first. */
export function check_spec(spec: unknown): Table {
  return checkSpec(spec).spec;
}

interface WiderLayout {
  spec: Table;
  /** Columns read as names or values, whether or not the spec mentions them. */
  used: string[];
}

function widerSpec(table: Table, options: BuildWiderSpecOptions, namesRequired: boolean): WiderLayout {
  const vary = options.names_vary ?? "fastest";
  if (vary !== "fastest" && vary !== "slowest") {
    throw new ReshapeError('`names_vary` must be one of "fastest" or "slowest".');
  }
  const valuesFrom = resolve_names(table, options.values_from ?? "value", {
    arg: "values_from",
    required: true,
  });
  const namesFrom = resolve_names(table, options.names_from ?? "name", {
    arg: "names_from",
    required: namesRequired,
  });

  const spec = buildWiderSpec(table, {
    namesFrom,
    valuesFrom,
    prefix: options.names_prefix ?? "",
    sep: options.names_sep ?? "_",
    glue: options.names_glue,
    sort: options.names_sort ?? false,
    vary,
    expand: options.names_expand ?? false,
    repair: options.names_repair ?? "check_unique",
  });
  return { spec, used: [...namesFrom, ...valuesFrom] };
}

export function build_wider_spec(table: Table, options: BuildWiderSpecOptions = {}): Table {
  return widerSpec(table, options, false).spec;
}

function idPositions(
  table: Table,
  checked: CheckedSpec,
  idCols: ColumnSelector | undefined,
  exclude: string[]
): number[] {
  const used = new Set([...checked.keyNames, ...checked.values, ...exclude]);
  const selected =
    idCols === undefined
      ? range(table.ncol).filter((position) => !used.has(table.columns[position] ?? ""))
      : resolve_columns(table, idCols, { arg: "id_cols" });

  const clashes = selected.map((position) => table.columns[position] ?? "").filter((name) => used.has(name));
  if (clashes.length > 0) {
    throw new ColumnSelectionError(
      `\`id_cols\` can't select columns used as names or values: ${clashes.map((name) => `\`${name}\``).join(", ")}.`
    );
  }

  const leading = table.groups
    .map((group) => table.columns.indexOf(group))
    .filter((position) => !selected.includes(position));
  return [...leading, ...selected];
}

function notUniqueWarning(valuesFrom: string, columns: string[], duplicates: number): PivotWarning {
  return {
    kind: "values_not_unique",
    values_from: valuesFrom,
    columns,
    duplicates,
    message: [
      `Values from \`${valuesFrom}\` are not uniquely identified; output will contain list-cols.`,
      '* Use `values_fn: "list"` to suppress this warning.',
      '* Use `values_fn: "sum"` or another summary to summarise duplicates.',
    ].join("\n"),
  };
}

export function pivot_wider_spec(
  table: Table,
  spec: Table,
  options: PivotWiderSpecOptions = {}
): WiderResult {
  return widen(table, spec, options, []);
}

function widen(table: Table, spec: Table, options: PivotWiderSpecOptions, exclude: string[]): WiderResult {
  const checked = checkSpec(spec);
  const fnFor = normalizeValuesFn(options.values_fn);
  const fillFor = normalizeValuesFill(options.values_fill ?? null);
  const repair = options.names_repair ?? "check_unique";

  for (const name of [...checked.keyNames, ...checked.values]) {
    if (!table.has(name)) {
      throw new ColumnSelectionError(`Column \`${name}\` doesn't exist.`);
    }
  }
  const ids = idPositions(table, checked, options.id_cols, exclude);

  const warnings: PivotWarning[] = [];
  const warn = (warning: PivotWarning): void => {
    warnings.push(warning);
    options.on_warning?.(warning);
  };

  const idColumns = ids.map((position) => table.column(position));
  const index = indexIds(idColumns, table.nrow, table.groups.length > 0 ? table.group_rows() : undefined);
  const nrow = index.firsts.length;
  const namesColumns = checked.keyNames.map((name) => table.column(name));

  const specRows = checked.spec.nrow;
  const valueColumns: Column[] = new Array<Column>(specRows);
  for (const valuesFrom of new Set(checked.values)) {
    const rows = range(specRows).filter((row) => checked.values[row] === valuesFrom);
    const labels = rows.map((row) => checked.names[row] ?? "");
    const groups = groupCells(
      namesColumns,
      checked.keyColumns.map((column) => sliceColumn(column, rows)),
      rows.length,
      index
    );

    const reduced = reduceCells(table.column(valuesFrom), groups, fnFor(valuesFrom), valuesFrom);
    if (reduced.collapsed) {
      warn(notUniqueWarning(valuesFrom, labels, groups.duplicated));
    }

    const filled = densify(reduced, nrow, fillFor(valuesFrom), labels);
    rows.forEach((row, position) => {
      const column = filled[position];
      if (column) {
        valueColumns[row] = column;
      }
    });
  }

  const { table: out, renamed } = assemble(
    {
      names: ids.map((position) => table.columns[position] ?? ""),
      columns: idColumns.map((column) => sliceColumn(column, index.firsts)),
    },
    { names: checked.names, columns: valueColumns },
    nrow,
    repair,
    table.groups
  );

  if (renamed.length > 0) {
    warn({
      kind: "names_repaired",
      columns: renamed.map((rename) => rename.to),
      message: describeRenames(renamed),
    });
  }
  return { table: out, warnings };
}

export function pivot_wider(table: Table, options: PivotWiderOptions = {}): WiderResult {
  const { spec, used } = widerSpec(table, options, true);
  return widen(table, spec, options, used);
}

export function build_longer_spec(table: Table, options: BuildLongerSpecOptions): Table {
  const cols = resolve_names(table, options.cols, { arg: "cols", required: true });
  const namesTo = options.names_to ?? "name";
  return buildLongerSpec({
    cols,
    namesTo: Array.isArray(namesTo) ? namesTo : [namesTo],
    prefix: options.names_prefix,
    sep: options.names_sep,
    pattern: options.names_pattern,
    valuesTo: options.values_to ?? "value",
  });
}

export function pivot_longer_spec(
  table: Table,
  spec: Table,
  options: PivotLongerSpecOptions = {}
): Table {
  return pivotLongerSpec(table, spec, {
    dropNa: options.values_drop_na ?? false,
    repair: options.names_repair ?? "check_unique",
  });
}

export function pivot_longer(table: Table, options: PivotLongerOptions): Table {
  return pivot_longer_spec(table, build_longer_spec(table, options), options);
}
