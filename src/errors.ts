export class ReshapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A selector matched nothing, or named a column the table doesn't have. */
export class ColumnSelectionError extends ReshapeError {}

export type SpecErrorReason =
  | "not_table"
  | "missing_columns"
  | "name_not_text"
  | "name_not_unique"
  | "value_not_text"
  | "glue_field";

export class SpecError extends ReshapeError {
  readonly reason: SpecErrorReason;

  constructor(reason: SpecErrorReason, message: string) {
    super(message);
    this.reason = reason;
  }
}

export class ColumnTypeError extends ReshapeError {}

export class ValuesFnError extends ReshapeError {}

export class ValuesFillError extends ReshapeError {}

export class NameRepairError extends ReshapeError {
  readonly names: string[];

  constructor(message: string, names: string[]) {
    super(message);
    this.names = names;
  }
}
