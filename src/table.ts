import { writeFileSync } from "node:fs";
import { ColumnSelectionError, ReshapeError } from "./errors";
import { expand, type ExpandOptions, type ExpandSpec } from "./expand";
import { rowKey } from "./internal/column/keys";
import { orderRows } from "./internal/column/ordering";
import { cellAt, cloneColumn, columnLength, sliceColumn } from "./internal/column/vector";
import { writeExcelFrame } from "./internal/io/excelWrite";
import { writeParquetFrame } from "./internal/io/parquetWrite";
import { escapeCsvValue, serializeCell } from "./internal/io/shared";
import { normalizeColumnar, normalizeRecords, type TableParts } from "./internal/table/core";
import { groupSlices, type GroupSlice } from "./internal/table/groups";
import {
  build_longer_spec,
  build_wider_spec,
  pivot_longer,
  pivot_longer_spec,
  pivot_wider,
  pivot_wider_spec,
  type BuildLongerSpecOptions,
  type BuildWiderSpecOptions,
  type PivotLongerOptions,
  type PivotLongerSpecOptions,
  type PivotWiderOptions,
  type PivotWiderSpecOptions,
  type WiderResult,
} from "./pivot";
import { resolve_names, type ColumnSelector } from "./select";
import type { Cell, Column, ColumnInput, ColumnType, Row } from "./types";
import { range } from "./utils";

export interface TableOptions {
  /** Column order for record input; keys not listed are appended. */
  columns?: string[];
  groups?: string[];
  /** Row count of a table without columns. */
  nrow?: number;
}

export interface FromColumnsOptions {
  nrow?: number;
  groups?: string[];
}

export interface ToCSVOptions {
  path?: string;
  sep?: string;
  header?: boolean;
}

export interface ToJSONOptions {
  path?: string;
  orient?: "records" | "list";
  /** One record per line. */
  lines?: boolean;
  space?: number;
}

export interface ToExcelOptions {
  path?: string;
  sheet_name?: string;
}

export interface ToParquetOptions {
  path?: string;
}

export class Table {
  private _names: string[] = [];
  private _columns: Column[] = [];
  private _nrow = 0;
  private _groups: string[] = [];

  constructor(data: Row[] | Record<string, ColumnInput> = [], options: TableOptions = {}) {
    const parts = Array.isArray(data) ? normalizeRecords(data, options.columns) : normalizeColumnar(data);
    const nrow = parts.columns.length === 0 && options.nrow !== undefined ? options.nrow : parts.nrow;
    this.init({ ...parts, nrow }, options.groups ?? []);
  }

  static from_records(records: Row[], options: TableOptions = {}): Table {
    return new Table(records, options);
  }

  static from_dict(data: Record<string, ColumnInput>, options: TableOptions = {}): Table {
    return new Table(data, options);
  }

  /** Builds a table from typed columns, which are copied. Names may repeat. */
  static from_columns(names: string[], columns: Column[], options: FromColumnsOptions = {}): Table {
    if (names.length !== columns.length) {
      throw new ReshapeError(`Got ${names.length} names for ${columns.length} columns.`);
    }
    const lengths = new Set(columns.map(columnLength));
    if (lengths.size > 1) {
      throw new ReshapeError("All columns of a table must have the same length.");
    }
    const [length] = [...lengths];
    const nrow = length ?? options.nrow ?? 0;

    const table = new Table();
    table.init({ names: [...names], columns: columns.map(cloneColumn), nrow }, options.groups ?? []);
    return table;
  }

  private init(parts: TableParts, groups: string[]): void {
    for (const group of groups) {
      if (!parts.names.includes(group)) {
        throw new ColumnSelectionError(`Group column \`${group}\` doesn't exist.`);
      }
    }
    this._names = parts.names;
    this._columns = parts.columns;
    this._nrow = parts.nrow;
    this._groups = [...new Set(groups)];
  }

  get columns(): string[] {
    return [...this._names];
  }

  get shape(): [number, number] {
    return [this._nrow, this._columns.length];
  }

  get nrow(): number {
    return this._nrow;
  }

  get ncol(): number {
    return this._columns.length;
  }

  get empty(): boolean {
    return this._nrow === 0;
  }

  get groups(): string[] {
    return [...this._groups];
  }

  types(): ColumnType[] {
    return this._columns.map((column) => column.type);
  }

  dtypes(): Record<string, ColumnType> {
    const out: Record<string, ColumnType> = {};
    this._names.forEach((name, position) => {
      const column = this._columns[position];
      if (column && !(name in out)) {
        out[name] = column.type;
      }
    });
    return out;
  }

  has(name: string): boolean {
    return this._names.includes(name);
  }

  /** A copy of the column; names resolve to their first occurrence. */
  column(ref: string | number): Column {
    return cloneColumn(this.columnAt(this.positionOf(ref)));
  }

  get(ref: string | number): Cell[] {
    const column = this.columnAt(this.positionOf(ref));
    return range(this._nrow).map((index) => cellAt(column, index));
  }

  to_records(): Row[] {
    return range(this._nrow).map((index) => {
      const row: Row = {};
      this._names.forEach((name, position) => {
        const column = this._columns[position];
        if (column && !(name in row)) {
          row[name] = cellAt(column, index);
        }
      });
      return row;
    });
  }

  to_dict(orient: "records" | "list" = "records"): Row[] | Record<string, Cell[]> {
    if (orient === "records") {
      return this.to_records();
    }
    const out: Record<string, Cell[]> = {};
    this._names.forEach((name, position) => {
      if (!(name in out)) {
        out[name] = this.get(position);
      }
    });
    return out;
  }

  values(): Cell[][] {
    return range(this._nrow).map((index) => this._columns.map((column) => cellAt(column, index)));
  }

  select(selector: ColumnSelector): Table {
    const names = resolve_names(this, selector);
    const positions = names.map((name) => this.positionOf(name));
    return Table.from_columns(
      names,
      positions.map((position) => this.columnAt(position)),
      { nrow: this._nrow, groups: this._groups.filter((group) => names.includes(group)) }
    );
  }

  /** Rows by position; `null` positions produce all-missing rows. */
  slice(positions: Array<number | null>): Table {
    return Table.from_columns(
      this._names,
      this._columns.map((column) => sliceColumn(column, positions)),
      { nrow: positions.length, groups: this._groups }
    );
  }

  head(n = 5): Table {
    return this.slice(range(Math.min(Math.max(0, n), this._nrow)));
  }

  tail(n = 5): Table {
    const count = Math.min(Math.max(0, n), this._nrow);
    return this.slice(range(count).map((offset) => this._nrow - count + offset));
  }

  rename(columns: Record<string, string>): Table {
    const names = this._names.map((name) => columns[name] ?? name);
    const groups = this._groups.map((group) => columns[group] ?? group);
    return Table.from_columns(names, this._columns, { nrow: this._nrow, groups });
  }

  sort_values(by: string | string[]): Table {
    const keys = (Array.isArray(by) ? by : [by]).map((name) => this.columnAt(this.positionOf(name)));
    return this.slice(orderRows(keys, range(this._nrow)));
  }

  distinct(selector?: ColumnSelector): Table {
    const source = selector === undefined ? this : this.select(selector);
    const keys = source._columns;
    const seen = new Set<string>();
    const keep: number[] = [];
    for (let index = 0; index < source._nrow; index += 1) {
      const key = rowKey(keys, index);
      if (!seen.has(key)) {
        seen.add(key);
        keep.push(index);
      }
    }
    return source.slice(keep);
  }

  group_by(...columns: string[]): Table {
    for (const column of columns) {
      this.positionOf(column);
    }
    return Table.from_columns(this._names, this._columns, { nrow: this._nrow, groups: columns });
  }

  ungroup(): Table {
    return Table.from_columns(this._names, this._columns, { nrow: this._nrow });
  }

  /** Row positions of each group, groups in ascending key order. */
  group_rows(): GroupSlice[] {
    const keys = this._groups.map((group) => this.columnAt(this.positionOf(group)));
    return groupSlices(keys, this._nrow);
  }

  build_wider_spec(options: BuildWiderSpecOptions = {}): Table {
    return build_wider_spec(this, options);
  }

  pivot_wider(options: PivotWiderOptions = {}): WiderResult {
    return pivot_wider(this, options);
  }

  pivot_wider_spec(spec: Table, options: PivotWiderSpecOptions = {}): WiderResult {
    return pivot_wider_spec(this, spec, options);
  }

  build_longer_spec(options: BuildLongerSpecOptions): Table {
    return build_longer_spec(this, options);
  }

  pivot_longer(options: PivotLongerOptions): Table {
    return pivot_longer(this, options);
  }

  pivot_longer_spec(spec: Table, options: PivotLongerSpecOptions = {}): Table {
    return pivot_longer_spec(this, spec, options);
  }

  expand(specs: ExpandSpec[] = [], options: ExpandOptions = {}): Table {
    return expand(this, specs, options);
  }

  to_csv(options: ToCSVOptions = {}): string {
    const sep = options.sep ?? ",";
    const includeHeader = options.header ?? true;
    const lines: string[] = [];

    if (includeHeader) {
      lines.push(this._names.map((name) => escapeCsvValue(name, sep)).join(sep));
    }
    for (let index = 0; index < this._nrow; index += 1) {
      lines.push(
        this._columns.map((column) => escapeCsvValue(serializeCell(cellAt(column, index)), sep)).join(sep)
      );
    }

    const csv = `${lines.join("\n")}\n`;
    if (options.path) {
      writeFileSync(options.path, csv, "utf8");
    }
    return csv;
  }

  to_json(options: ToJSONOptions = {}): string {
    if (options.lines && options.orient && options.orient !== "records") {
      throw new ReshapeError("JSON lines format only supports orient 'records'.");
    }
    const json = options.lines
      ? this.to_records()
          .map((record) => JSON.stringify(record))
          .join("\n")
      : JSON.stringify(this.to_dict(options.orient ?? "records"), null, options.space ?? 2);
    if (options.path) {
      writeFileSync(options.path, json, "utf8");
    }
    return json;
  }

  to_excel(options: ToExcelOptions): void {
    writeExcelFrame(this, options);
  }

  async to_parquet(options: ToParquetOptions): Promise<void> {
    await writeParquetFrame(this, options);
  }

  private positionOf(ref: string | number): number {
    if (typeof ref === "number") {
      if (!Number.isInteger(ref) || ref < 0 || ref >= this._columns.length) {
        throw new ColumnSelectionError(`Can't select column ${ref}; the table has ${this._columns.length} columns.`);
      }
      return ref;
    }
    const position = this._names.indexOf(ref);
    if (position < 0) {
      throw new ColumnSelectionError(`Column \`${ref}\` doesn't exist.`);
    }
    return position;
  }

  private columnAt(position: number): Column {
    const column = this._columns[position];
    if (!column) {
      throw new ColumnSelectionError(`Can't select column ${position}.`);
    }
    return column;
  }
}
