export {
  Table,
  type FromColumnsOptions,
  type TableOptions,
  type ToCSVOptions,
  type ToExcelOptions,
  type ToJSONOptions,
  type ToParquetOptions,
} from "./table";
export {
  as_column,
  boolean,
  column_values,
  date,
  factor,
  integer,
  isColumn,
  list,
  real,
  text,
  type FactorOptions,
} from "./column";
export {
  build_longer_spec,
  build_wider_spec,
  check_spec,
  pivot_longer,
  pivot_longer_spec,
  pivot_wider,
  pivot_wider_spec,
  type BuildLongerSpecOptions,
  type BuildWiderSpecOptions,
  type PivotLongerOptions,
  type PivotLongerSpecOptions,
  type PivotWarning,
  type PivotWiderOptions,
  type PivotWiderSpecOptions,
  type WiderResult,
} from "./pivot";
export {
  crossing,
  expand,
  expand_grid,
  nesting,
  nesting_of,
  NestingSpec,
  type ExpandOptions,
  type ExpandSpec,
  type GridInput,
  type GridOptions,
  type GridVector,
} from "./expand";
export {
  all_of,
  any_of,
  contains,
  ends_with,
  everything,
  matches,
  not,
  resolve_columns,
  resolve_names,
  span,
  starts_with,
  where,
  type ColumnPredicate,
  type ColumnSelector,
  type ResolveOptions,
  type Schema,
  type SelectorHelper,
} from "./select";
export {
  describeRenames,
  repair_names,
  type NameRepair,
  type NameRepairFn,
  type Rename,
  type RepairedNames,
} from "./names";
export {
  ColumnSelectionError,
  ColumnTypeError,
  NameRepairError,
  ReshapeError,
  SpecError,
  ValuesFillError,
  ValuesFnError,
  type SpecErrorReason,
} from "./errors";
export {
  parse_csv,
  parse_json,
  read_csv,
  read_csv_sync,
  read_excel,
  read_excel_sync,
  read_json,
  read_json_sync,
  read_parquet,
  to_csv,
  to_excel,
  to_json,
  to_parquet,
  type ReadCSVOptions,
  type ReadExcelOptions,
  type ReadJSONOptions,
  type ReadParquetOptions,
} from "./io";
export type {
  AggFn,
  AggName,
  BooleanColumn,
  Cell,
  CellValue,
  Column,
  ColumnInput,
  ColumnType,
  DateColumn,
  FactorColumn,
  IntegerColumn,
  ListColumn,
  RealColumn,
  Row,
  TextColumn,
  ValuesFill,
  ValuesFn,
  ValuesFnInput,
} from "./types";
