import { text } from "../../column";
import { ColumnSelectionError, ReshapeError } from "../../errors";
import { repair_names, type NameRepair } from "../../names";
import { Table } from "../../table";
import type { Column } from "../../types";
import { range } from "../../utils";
import { distinctRowPositions, rowKey } from "../column/keys";
import { concatColumns, sliceColumn } from "../column/vector";
import { checkSpec, NAME_COLUMN, VALUE_COLUMN } from "./spec";

export interface LongerSpecSettings {
  cols: string[];
  namesTo: string[];
  prefix?: string;
  sep?: string | RegExp;
  pattern?: RegExp;
  valuesTo: string;
}

function splitName(name: string, settings: LongerSpecSettings): Array<string | null> {
  const width = settings.namesTo.length;

  if (settings.pattern) {
    settings.pattern.lastIndex = 0;
    const match = settings.pattern.exec(name);
    if (!match) {
      return new Array<string | null>(width).fill(null);
    }
    return range(width).map((position) => match[position + 1] ?? null);
  }

  if (width <= 1) {
    return [name];
  }
  if (settings.sep === undefined) {
    throw new ReshapeError(
      "With several `names_to` entries, supply one of `names_sep` or `names_pattern`."
    );
  }
  const pieces = name.split(settings.sep);
  return range(width).map((position) => pieces[position] ?? null);
}

export function buildLongerSpec(settings: LongerSpecSettings): Table {
  const { prefix, namesTo } = settings;
  const parts = settings.cols.map((name) => {
    const stripped = prefix && name.startsWith(prefix) ? name.slice(prefix.length) : name;
    return splitName(stripped, settings);
  });

  const valuePosition = namesTo.indexOf(VALUE_COLUMN);
  const values = parts.map((row) =>
    valuePosition >= 0 ? row[valuePosition] ?? "NA" : settings.valuesTo
  );

  const keyNames: string[] = [];
  const keyColumns: Column[] = [];
  namesTo.forEach((name, position) => {
    if (name !== VALUE_COLUMN) {
      keyNames.push(name);
      keyColumns.push(text(parts.map((row) => row[position] ?? null)));
    }
  });

  return Table.from_columns(
    [NAME_COLUMN, VALUE_COLUMN, ...keyNames],
    [text(settings.cols), text(values), ...keyColumns],
    { nrow: settings.cols.length }
  );
}

export interface LongerSettings {
  dropNa: boolean;
  repair: NameRepair;
}

/**
 * One output row per (input row, key combination); each distinct `.value` becomes
 * a column gathered from the source columns the spec points it at.
 */
export function pivotLongerSpec(table: Table, spec: unknown, settings: LongerSettings): Table {
  const checked = checkSpec(spec);
  const sources = new Set(checked.names);
  for (const name of checked.names) {
    if (!table.has(name)) {
      throw new ColumnSelectionError(`Column \`${name}\` doesn't exist.`);
    }
  }

  const specRows = checked.spec.nrow;
  const comboRows = distinctRowPositions(checked.keyColumns, specRows);
  const comboKeys = comboRows.map((row) => rowKey(checked.keyColumns, row));
  const combos = comboRows.length;
  const nrow = table.nrow;

  const valueNames = [...new Set(checked.values)];
  const gathered = valueNames.map((value) => {
    const sourceByCombo = new Map<string, string>();
    range(specRows).forEach((row) => {
      if (checked.values[row] === value) {
        sourceByCombo.set(rowKey(checked.keyColumns, row), checked.names[row] ?? "");
      }
    });
    const pieces = comboKeys.map((key): Column => {
      const source = sourceByCombo.get(key);
      return source === undefined
        ? { type: "boolean", values: new Array<boolean | null>(nrow).fill(null) }
        : table.column(source);
    });
    // pieces are stacked combination-major; output is row-major
    const stacked = concatColumns(pieces, value);
    return sliceColumn(
      stacked,
      range(nrow * combos).map((position) => (position % combos) * nrow + Math.floor(position / combos))
    );
  });

  let positions = range(nrow * combos);
  if (settings.dropNa) {
    positions = positions.filter((position) =>
      gathered.some((column) => column.values[position] !== null)
    );
  }

  const idPositions = range(table.ncol).filter((position) => !sources.has(table.columns[position] ?? ""));
  const idNames = idPositions.map((position) => table.columns[position] ?? "");
  const idColumns = idPositions.map((position) =>
    sliceColumn(
      table.column(position),
      positions.map((out) => Math.floor(out / combos))
    )
  );
  const keyColumns = checked.keyColumns.map((column) =>
    sliceColumn(
      column,
      positions.map((out) => comboRows[out % combos] ?? null)
    )
  );
  const valueColumns = gathered.map((column) => sliceColumn(column, positions));

  const { names } = repair_names([...idNames, ...checked.keyNames, ...valueNames], settings.repair);
  return Table.from_columns(names, [...idColumns, ...keyColumns, ...valueColumns], {
    nrow: positions.length,
    groups: table.groups.flatMap((group) => {
      const position = idNames.indexOf(group);
      return position >= 0 ? [names[position] ?? group] : [];
    }),
  });
}
