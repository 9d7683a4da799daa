import * as XLSX from "xlsx";
import { ReshapeError } from "../../errors";
import type { ToExcelOptions } from "../../table";
import type { CellValue } from "../../types";
import { cellAt } from "../column/vector";
import { serializeCell } from "./shared";
import type { TableLike } from "./tableLike";

export function writeExcelFrame(table: TableLike, options: ToExcelOptions): void {
  if (!options.path) {
    throw new ReshapeError("to_excel requires a file path.");
  }

  const columns = table.columns.map((_, position) => table.column(position));
  const matrix: CellValue[][] = [[...table.columns]];
  for (let row = 0; row < table.nrow; row += 1) {
    matrix.push(columns.map((column) => serializeCell(cellAt(column, row))));
  }

  const sheet = XLSX.utils.aoa_to_sheet(matrix);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, options.sheet_name ?? "Sheet1");
  XLSX.writeFile(workbook, options.path);
}
