import type { Cell, CellValue } from "../../types";
import { isMissing } from "../../utils";

export function stripBom(text: string): string {
  if (text.charCodeAt(0) === 0xfeff) {
    return text.slice(1);
  }
  return text;
}

/** Flattens a cell for text formats; nested sequences become JSON arrays. */
export function serializeCell(value: Cell): CellValue {
  if (Array.isArray(value)) {
    return JSON.stringify(value);
  }
  return value;
}

export function escapeCsvValue(value: CellValue, sep: string): string {
  if (isMissing(value)) {
    return "";
  }
  const text = value instanceof Date ? value.toISOString() : String(value);
  const needsQuoting = text.includes(sep) || text.includes("\n") || text.includes('"');
  if (!needsQuoting) {
    return text;
  }
  return `"${text.replaceAll('"', '""')}"`;
}

export function coerceJsonCell(value: unknown): Cell {
  if (
    value === null ||
    value === undefined ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((entry: unknown) => coerceJsonCell(entry));
  }
  return JSON.stringify(value);
}

export function normalizeExternalCell(value: unknown): CellValue {
  if (
    value === null ||
    value === undefined ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    value instanceof Date
  ) {
    return value;
  }

  if (typeof value === "bigint") {
    const asNumber = Number(value);
    return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
  }

  return JSON.stringify(value);
}
