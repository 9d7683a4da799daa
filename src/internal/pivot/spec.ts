import { text } from "../../column";
import { SpecError } from "../../errors";
import { repair_names, type NameRepair } from "../../names";
import { Table } from "../../table";
import type { Cell, Column } from "../../types";
import { formatCell } from "../../utils";
import { distinctRowPositions } from "../column/keys";
import { orderRows } from "../column/ordering";
import { cellAt, sliceColumn } from "../column/vector";
import { cartesian, completeValues } from "../table/grid";

export const NAME_COLUMN = ".name";
export const VALUE_COLUMN = ".value";

export interface CheckedSpec {
  /** The spec with `.name` and `.value` moved first. */
  spec: Table;
  names: string[];
  values: string[];
  keyNames: string[];
  keyColumns: Column[];
}

export function checkSpec(spec: unknown): CheckedSpec {
  if (!(spec instanceof Table)) {
    throw new SpecError("not_table", "`spec` must be a table.");
  }
  if (!spec.has(NAME_COLUMN) || !spec.has(VALUE_COLUMN)) {
    throw new SpecError("missing_columns", "`spec` must have `.name` and `.value` columns.");
  }

  const nameColumn = spec.column(NAME_COLUMN);
  if (nameColumn.type !== "text") {
    throw new SpecError("name_not_text", "The `.name` column must be a text column.");
  }
  const names = nameColumn.values;
  if (names.some((name) => name === null) || new Set(names).size !== names.length) {
    throw new SpecError("name_not_unique", "The `.name` column must be unique.");
  }

  const valueColumn = spec.column(VALUE_COLUMN);
  if (valueColumn.type !== "text") {
    throw new SpecError("value_not_text", "The `.value` column must be a text column.");
  }

  const keyNames = spec.columns.filter((name) => name !== NAME_COLUMN && name !== VALUE_COLUMN);
  const keyColumns = keyNames.map((name) => spec.column(name));
  return {
    spec: Table.from_columns(
      [NAME_COLUMN, VALUE_COLUMN, ...keyNames],
      [nameColumn, valueColumn, ...keyColumns],
      { nrow: spec.nrow }
    ),
    names: names.map((name) => name ?? ""),
    values: valueColumn.values.map((value) => value ?? "NA"),
    keyNames,
    keyColumns,
  };
}

export interface WiderSpecSettings {
  namesFrom: string[];
  valuesFrom: string[];
  prefix: string;
  sep: string;
  glue?: string;
  sort: boolean;
  vary: "fastest" | "slowest";
  expand: boolean;
  repair: NameRepair;
}

function cellText(cell: Cell): string {
  return Array.isArray(cell) ? JSON.stringify(cell) : formatCell(cell);
}

const GLUE_TOKEN = /\{\{|\}\}|\{([^{}]*)\}/gu;

export function renderGlue(template: string, fields: Map<string, string>): string {
  return template.replace(GLUE_TOKEN, (match: string, field: string | undefined) => {
    if (match === "{{") {
      return "{";
    }
    if (match === "}}") {
      return "}";
    }
    const name = (field ?? "").trim();
    const value = fields.get(name);
    if (value === undefined) {
      throw new SpecError(
        "glue_field",
        `\`names_glue\` refers to \`${name}\`, which is neither a names column nor \`.value\`.`
      );
    }
    return value;
  });
}

function keyCombinations(keyColumns: Column[], nrow: number, settings: WiderSpecSettings): Column[] {
  if (settings.expand) {
    const units = keyColumns.map((column, position) =>
      completeValues({ names: [settings.namesFrom[position] ?? ""], columns: [column], nrow })
    );
    return cartesian(units).columns;
  }

  const distinct = distinctRowPositions(keyColumns, nrow);
  const positions = settings.sort ? orderRows(keyColumns, distinct) : distinct;
  return keyColumns.map((column) => sliceColumn(column, positions));
}

export function buildWiderSpec(table: Table, settings: WiderSpecSettings): Table {
  const { valuesFrom } = settings;

  if (settings.namesFrom.length === 0) {
    const names = repair_names(valuesFrom, settings.repair).names;
    return Table.from_columns([NAME_COLUMN, VALUE_COLUMN], [text(names), text(valuesFrom)], {
      nrow: valuesFrom.length,
    });
  }

  const keys = keyCombinations(
    settings.namesFrom.map((name) => table.column(name)),
    table.nrow,
    settings
  );
  const combos = keys[0]?.values.length ?? 0;

  const rows: Array<{ combo: number; value: string }> = [];
  if (settings.vary === "fastest") {
    for (const value of valuesFrom) {
      for (let combo = 0; combo < combos; combo += 1) {
        rows.push({ combo, value });
      }
    }
  } else {
    for (let combo = 0; combo < combos; combo += 1) {
      for (const value of valuesFrom) {
        rows.push({ combo, value });
      }
    }
  }

  const candidates = rows.map(({ combo, value }) => {
    const parts = keys.map((column) => cellText(cellAt(column, combo)));
    if (settings.glue !== undefined) {
      const fields = new Map(settings.namesFrom.map((name, position) => [name, parts[position] ?? "NA"]));
      fields.set(VALUE_COLUMN, value);
      return renderGlue(settings.glue, fields);
    }
    const name = `${settings.prefix}${parts.join(settings.sep)}`;
    return valuesFrom.length > 1 ? `${value}${settings.sep}${name}` : name;
  });

  const names = repair_names(candidates, settings.repair).names;
  const comboOfRow = rows.map((row) => row.combo);
  return Table.from_columns(
    [NAME_COLUMN, VALUE_COLUMN, ...settings.namesFrom],
    [text(names), text(rows.map((row) => row.value)), ...keys.map((column) => sliceColumn(column, comboOfRow))],
    { nrow: rows.length }
  );
}
