import { ColumnSelectionError } from "./errors";
import type { Column } from "./types";
import { range } from "./utils";

/** What a selector is evaluated against; `Table` satisfies it. */
export interface Schema {
  readonly columns: string[];
  column(ref: number): Column;
}

export type ColumnPredicate = (name: string, column: Column) => boolean;

export interface SelectorHelper {
  readonly kind: "helper";
  readonly label: string;
  resolve(schema: Schema): number[];
}

export type ColumnSelector = string | number | SelectorHelper | ColumnPredicate | ColumnSelector[];

export interface ResolveOptions {
  /** Argument name used in error messages. */
  arg?: string;
  /** Throw when nothing matches. */
  required?: boolean;
}

function helper(label: string, resolve: (schema: Schema) => number[]): SelectorHelper {
  return { kind: "helper", label, resolve };
}

function matching(schema: Schema, predicate: (name: string) => boolean): number[] {
  return range(schema.columns.length).filter((position) => predicate(schema.columns[position] ?? ""));
}

export function everything(): SelectorHelper {
  return helper("everything()", (schema) => range(schema.columns.length));
}

export function starts_with(prefix: string): SelectorHelper {
  return helper(`starts_with("${prefix}")`, (schema) =>
    matching(schema, (name) => name.startsWith(prefix))
  );
}

export function ends_with(suffix: string): SelectorHelper {
  return helper(`ends_with("${suffix}")`, (schema) => matching(schema, (name) => name.endsWith(suffix)));
}

export function contains(text: string): SelectorHelper {
  return helper(`contains("${text}")`, (schema) => matching(schema, (name) => name.includes(text)));
}

export function matches(pattern: RegExp): SelectorHelper {
  return helper(`matches(${String(pattern)})`, (schema) =>
    matching(schema, (name) => {
      pattern.lastIndex = 0;
      return pattern.test(name);
    })
  );
}

/** Every name must exist. */
export function all_of(names: string[]): SelectorHelper {
  return helper("all_of()", (schema) => names.map((name) => positionOf(schema, name)));
}

/** Names the table doesn't have are skipped. */
export function any_of(names: string[]): SelectorHelper {
  return helper("any_of()", (schema) =>
    names.map((name) => schema.columns.indexOf(name)).filter((position) => position >= 0)
  );
}

/** Inclusive run of columns between two names or positions. */
export function span(from: string | number, to: string | number): SelectorHelper {
  return helper(`span(${String(from)}, ${String(to)})`, (schema) => {
    const start = positionOf(schema, from);
    const end = positionOf(schema, to);
    const low = Math.min(start, end);
    const out = range(Math.abs(end - start) + 1).map((offset) => low + offset);
    return start <= end ? out : out.reverse();
  });
}

export function where(predicate: (column: Column) => boolean): SelectorHelper {
  return helper("where()", (schema) =>
    range(schema.columns.length).filter((position) => predicate(schema.column(position)))
  );
}

export function not(selector: ColumnSelector): SelectorHelper {
  return helper("not()", (schema) => {
    const excluded = new Set(resolve_columns(schema, selector));
    return range(schema.columns.length).filter((position) => !excluded.has(position));
  });
}

function positionOf(schema: Schema, ref: string | number): number {
  if (typeof ref === "number") {
    if (!Number.isInteger(ref) || ref < 0 || ref >= schema.columns.length) {
      throw new ColumnSelectionError(
        `Can't select column ${ref}; the table has ${schema.columns.length} columns.`
      );
    }
    return ref;
  }
  const position = schema.columns.indexOf(ref);
  if (position < 0) {
    throw new ColumnSelectionError(`Column \`${ref}\` doesn't exist.`);
  }
  return position;
}

function collect(schema: Schema, selector: ColumnSelector, out: number[]): void {
  if (Array.isArray(selector)) {
    for (const entry of selector) {
      collect(schema, entry, out);
    }
    return;
  }
  if (typeof selector === "string" || typeof selector === "number") {
    out.push(positionOf(schema, selector));
    return;
  }
  if (typeof selector === "function") {
    for (let position = 0; position < schema.columns.length; position += 1) {
      if (selector(schema.columns[position] ?? "", schema.column(position))) {
        out.push(position);
      }
    }
    return;
  }
  out.push(...selector.resolve(schema));
}

/** Ordered, de-duplicated column positions (first occurrence wins). */
export function resolve_columns(
  schema: Schema,
  selector: ColumnSelector,
  options: ResolveOptions = {}
): number[] {
  const positions: number[] = [];
  collect(schema, selector, positions);
  const distinct = [...new Set(positions)];

  if (options.required && distinct.length === 0) {
    throw new ColumnSelectionError(`\`${options.arg ?? "cols"}\` must select at least one column.`);
  }
  return distinct;
}

export function resolve_names(
  schema: Schema,
  selector: ColumnSelector,
  options: ResolveOptions = {}
): string[] {
  return resolve_columns(schema, selector, options).map((position) => schema.columns[position] ?? "");
}
