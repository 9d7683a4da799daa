export type CellValue = string | number | boolean | null | undefined | Date;

/** A plain JS cell; arrays are nested sequences (list-column elements). */
export type Cell = CellValue | Cell[];

export type Row = Record<string, Cell>;

export type ColumnType = "integer" | "real" | "text" | "boolean" | "date" | "factor" | "list";

export interface IntegerColumn {
  type: "integer";
  values: Array<number | null>;
}

export interface RealColumn {
  type: "real";
  values: Array<number | null>;
}

export interface TextColumn {
  type: "text";
  values: Array<string | null>;
}

export interface BooleanColumn {
  type: "boolean";
  values: Array<boolean | null>;
}

export interface DateColumn {
  type: "date";
  values: Array<Date | null>;
}

export interface FactorColumn {
  type: "factor";
  values: Array<string | null>;
  levels: string[];
  ordered: boolean;
}

export interface ListColumn {
  type: "list";
  values: Array<Column | null>;
}

export type Column =
  | IntegerColumn
  | RealColumn
  | TextColumn
  | BooleanColumn
  | DateColumn
  | FactorColumn
  | ListColumn;

export type ColumnInput = Column | Cell[];

export type AggName = "sum" | "mean" | "min" | "max" | "count" | "first" | "last" | "list";

export type AggFn = (values: Cell[], column: Column) => Cell;

export type ValuesFn = AggName | AggFn;

export type ValuesFnInput = ValuesFn | Record<string, ValuesFn>;

export type ValuesFill = CellValue | Record<string, CellValue>;
