import type { Column } from "../../types";

/** The read-only surface the writers need; `Table` satisfies it. */
export interface TableLike {
  readonly columns: string[];
  readonly nrow: number;
  column(ref: number): Column;
}
