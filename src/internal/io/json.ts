import { ReshapeError } from "../../errors";
import type { ReadJSONOptions } from "../../io";
import { Table } from "../../table";
import type { Cell, Row } from "../../types";
import { isPlainObject } from "../../utils";
import { coerceJsonCell, stripBom } from "./shared";

export function parseJsonText(text: string, options: ReadJSONOptions = {}): Table {
  if (options.lines) {
    return parseJsonLines(text, options);
  }

  const parsed: unknown = JSON.parse(stripBom(text));
  const orient = options.orient ?? inferJsonOrient(parsed);
  return orient === "records" ? tableFromRecords(parsed) : tableFromColumnar(parsed);
}

function toRow(entry: unknown, where: string): Row {
  if (!isPlainObject(entry)) {
    throw new ReshapeError(`JSON ${where} is not an object.`);
  }
  const row: Row = {};
  for (const [column, value] of Object.entries(entry)) {
    row[column] = coerceJsonCell(value);
  }
  return row;
}

function parseJsonLines(text: string, options: ReadJSONOptions): Table {
  if (options.orient && options.orient !== "records") {
    throw new ReshapeError("JSON lines format only supports orient 'records'.");
  }

  const records = stripBom(text)
    .split(/\r?\n/u)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line, position) => {
      const parsed: unknown = JSON.parse(line);
      return toRow(parsed, `lines entry at line ${position + 1}`);
    });

  return new Table(records);
}

function tableFromRecords(parsed: unknown): Table {
  if (!Array.isArray(parsed)) {
    throw new ReshapeError("JSON orient 'records' expects an array of objects.");
  }
  return new Table(parsed.map((entry: unknown, position) => toRow(entry, `records entry at position ${position}`)));
}

function tableFromColumnar(parsed: unknown): Table {
  if (!isPlainObject(parsed)) {
    throw new ReshapeError("JSON orient 'list' expects an object of arrays.");
  }
  const columnar: Record<string, Cell[]> = {};
  for (const [column, values] of Object.entries(parsed)) {
    if (!Array.isArray(values)) {
      throw new ReshapeError(`JSON column '${column}' is not an array.`);
    }
    columnar[column] = values.map((value: unknown) => coerceJsonCell(value));
  }
  return new Table(columnar);
}

function inferJsonOrient(input: unknown): "records" | "list" {
  if (Array.isArray(input)) {
    return "records";
  }
  if (isPlainObject(input)) {
    return "list";
  }
  throw new ReshapeError("Unable to infer JSON orient; expected an array or object root.");
}
