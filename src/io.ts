import { readFileSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { parseCsvText } from "./internal/io/csv";
import { readExcelFile, readExcelFileSync } from "./internal/io/excelRead";
import { parseJsonText } from "./internal/io/json";
import { readParquetFile } from "./internal/io/parquetRead";
import type { Table, ToCSVOptions, ToExcelOptions, ToJSONOptions, ToParquetOptions } from "./table";

export interface ReadCSVOptions {
  sep?: string;
  header?: boolean;
  names?: string[];
  /** Tokens read as missing, compared case-insensitively. */
  na_values?: string[];
}

export interface ReadJSONOptions {
  orient?: "records" | "list";
  lines?: boolean;
}

export interface ReadExcelOptions {
  sheet_name?: string | number;
  header?: boolean;
  names?: string[];
}

export interface ReadParquetOptions {
  columns?: string[];
}

export async function read_csv(path: string, options: ReadCSVOptions = {}): Promise<Table> {
  const text = await readFile(path, "utf8");
  return parse_csv(text, options);
}

export function read_csv_sync(path: string, options: ReadCSVOptions = {}): Table {
  return parse_csv(readFileSync(path, "utf8"), options);
}

export function parse_csv(text: string, options: ReadCSVOptions = {}): Table {
  return parseCsvText(text, options);
}

export function to_csv(table: Table, options: ToCSVOptions = {}): string {
  return table.to_csv(options);
}

export async function read_json(path: string, options: ReadJSONOptions = {}): Promise<Table> {
  const text = await readFile(path, "utf8");
  return parse_json(text, options);
}

export function read_json_sync(path: string, options: ReadJSONOptions = {}): Table {
  return parse_json(readFileSync(path, "utf8"), options);
}

export function parse_json(text: string, options: ReadJSONOptions = {}): Table {
  return parseJsonText(text, options);
}

export function to_json(table: Table, options: ToJSONOptions = {}): string {
  return table.to_json(options);
}

export async function read_excel(path: string, options: ReadExcelOptions = {}): Promise<Table> {
  return readExcelFile(path, options);
}

export function read_excel_sync(path: string, options: ReadExcelOptions = {}): Table {
  return readExcelFileSync(path, options);
}

export function to_excel(table: Table, options: ToExcelOptions): void {
  table.to_excel(options);
}

export async function read_parquet(path: string, options: ReadParquetOptions = {}): Promise<Table> {
  return readParquetFile(path, options);
}

export async function to_parquet(table: Table, options: ToParquetOptions): Promise<void> {
  await table.to_parquet(options);
}
