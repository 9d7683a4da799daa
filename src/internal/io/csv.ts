import { as_column } from "../../column";
import type { ReadCSVOptions } from "../../io";
import { Table } from "../../table";
import type { CellValue } from "../../types";
import { stripBom } from "./shared";

const DEFAULT_NA = ["", "NaN", "NA", "null", "None"];

const NUMBER = /^[+-]?\d+(\.\d+)?([eE][+-]?\d+)?$/u;

/** Splits CSV text into records of raw fields; blank lines are skipped. */
function tokenizeCsv(text: string, sep: string): string[][] {
  const records: string[][] = [];
  let fields: string[] = [];
  let field = "";
  let quoted = false;
  let position = 0;

  const endRecord = (): void => {
    fields.push(field);
    if (fields.length > 1 || field.trim().length > 0) {
      records.push(fields);
    }
    fields = [];
    field = "";
  };

  while (position < text.length) {
    const char = text.charAt(position);
    position += 1;

    if (quoted) {
      if (char !== '"') {
        field += char;
      } else if (text.charAt(position) === '"') {
        field += '"';
        position += 1;
      } else {
        quoted = false;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === sep) {
      fields.push(field);
      field = "";
    } else if (char === "\n") {
      endRecord();
    } else if (char !== "\r") {
      field += char;
    }
  }

  if (field.length > 0 || fields.length > 0) {
    endRecord();
  }
  return records;
}

function parseField(raw: string, na: Set<string>): CellValue {
  const trimmed = raw.trim();
  const lowered = trimmed.toLowerCase();
  if (na.has(lowered)) {
    return null;
  }
  if (lowered === "true" || lowered === "false") {
    return lowered === "true";
  }
  if (NUMBER.test(trimmed) && Number.isFinite(Number(trimmed))) {
    return Number(trimmed);
  }
  return trimmed;
}

/** Parses CSV into a table, inferring one type per column. */
export function parseCsvText(text: string, options: ReadCSVOptions = {}): Table {
  const records = tokenizeCsv(stripBom(text), options.sep ?? ",");
  const header = options.header ?? true;
  const na = new Set((options.na_values ?? DEFAULT_NA).map((value) => value.trim().toLowerCase()));

  const [first] = records;
  if (!first) {
    return new Table([], { columns: options.names });
  }

  const names =
    options.names && options.names.length > 0
      ? [...options.names]
      : header
        ? first.map((name) => name.trim())
        : [];
  const body = header ? records.slice(1) : records;

  const width = Math.max(names.length, ...body.map((record) => record.length));
  while (names.length < width) {
    names.push(`col_${names.length}`);
  }

  const columns = names.map((name, position) =>
    as_column(
      body.map((record) => parseField(record[position] ?? "", na)),
      name
    )
  );
  return Table.from_columns(names, columns, { nrow: body.length });
}
