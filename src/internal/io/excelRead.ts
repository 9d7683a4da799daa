import { readFile } from "node:fs/promises";
import { readFileSync } from "node:fs";
import * as XLSX from "xlsx";
import { ReshapeError } from "../../errors";
import type { ReadExcelOptions } from "../../io";
import { Table } from "../../table";
import type { Row } from "../../types";
import { normalizeExternalCell } from "./shared";

export async function readExcelFile(path: string, options: ReadExcelOptions = {}): Promise<Table> {
  const bytes = await readFile(path);
  return parseExcelBytes(bytes, options);
}

export function readExcelFileSync(path: string, options: ReadExcelOptions = {}): Table {
  const bytes = readFileSync(path);
  return parseExcelBytes(bytes, options);
}

function parseExcelBytes(bytes: Uint8Array, options: ReadExcelOptions): Table {
  const workbook = XLSX.read(bytes, {
    type: "array",
    cellDates: true,
  });

  const sheet = selectSheet(workbook, options.sheet_name);
  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    defval: null,
    blankrows: false,
  });

  const [first] = matrix;
  if (!first) {
    return new Table([], { columns: options.names });
  }

  const header = options.header ?? true;
  let columns: string[];
  let startRow = 0;

  if (options.names && options.names.length > 0) {
    columns = [...options.names];
    startRow = header ? 1 : 0;
  } else if (header) {
    columns = first.map((value) => String(value ?? "").trim());
    startRow = 1;
  } else {
    columns = first.map((_, position) => `col_${position}`);
  }

  const rows: Row[] = [];
  for (const source of matrix.slice(startRow)) {
    while (source.length > columns.length) {
      columns.push(`col_${columns.length}`);
    }

    const row: Row = {};
    columns.forEach((column, position) => {
      row[column] = normalizeExternalCell(source[position]);
    });
    rows.push(row);
  }

  return new Table(rows, { columns });
}

function selectSheet(workbook: XLSX.WorkBook, sheetName?: string | number): XLSX.WorkSheet {
  const name =
    sheetName === undefined
      ? workbook.SheetNames[0]
      : typeof sheetName === "number"
        ? workbook.SheetNames[sheetName]
        : sheetName;

  const sheet = name === undefined ? undefined : workbook.Sheets[name];
  if (!sheet) {
    if (sheetName === undefined) {
      throw new ReshapeError("Workbook has no sheets.");
    }
    throw new ReshapeError(
      typeof sheetName === "number"
        ? `Workbook does not contain sheet index ${sheetName}.`
        : `Workbook does not contain sheet '${sheetName}'.`
    );
  }
  return sheet;
}
