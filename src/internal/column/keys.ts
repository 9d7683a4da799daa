import type { CellValue, Column } from "../../types";

// Integer/real share the numeric tag and text/factor share the string tag,
// so a key matches across those types. Two missing values are equal.
export function keyFragment(value: CellValue): string {
  if (value === null || value === undefined) {
    return "n:;";
  }
  if (typeof value === "number") {
    return `d:${value};`;
  }
  if (typeof value === "boolean") {
    return `b:${value ? 1 : 0};`;
  }
  if (value instanceof Date) {
    return `t:${value.getTime()};`;
  }
  return `s${value.length}:${value};`;
}

export function cellKey(column: Column, index: number): string {
  if (column.type !== "list") {
    return keyFragment(column.values[index]);
  }
  const nested = column.values[index];
  if (!nested) {
    return "n:;";
  }
  let key = `l${nested.values.length}[`;
  for (let position = 0; position < nested.values.length; position += 1) {
    key += cellKey(nested, position);
  }
  return `${key}];`;
}

export function rowKey(columns: Column[], index: number): string {
  let key = "";
  for (const column of columns) {
    key += cellKey(column, index);
  }
  return key;
}

/** Row positions of the first occurrence of each distinct key, in order. */
export function distinctRowPositions(columns: Column[], length: number): number[] {
  const seen = new Set<string>();
  const out: number[] = [];
  for (let index = 0; index < length; index += 1) {
    const key = rowKey(columns, index);
    if (!seen.has(key)) {
      seen.add(key);
      out.push(index);
    }
  }
  return out;
}
