import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { InputColumns } from "../config/types";
import { ValidationError } from "../core/errors";
import type { Logger } from "../observability";
import type { InputRecord } from "../types";
import { parseCsv } from "./csv";
import { readWorkbookTable, type SheetTable, WORKBOOK_EXTENSIONS } from "./workbook";

export const REGISTRATION_TOKEN_FORMAT = /^[A-Z]{3}-\d+\/\d+$/;
export const EMAIL_FORMAT = /^[a-zA-Z0-9_.+-]+@[a-zA-Z0-9-]+\.[a-zA-Z0-9-.]+$/;

const inputRowSchema = z.object({
  registrationToken: z
    .string()
    .trim()
    .min(1, "Registration number cannot be empty")
    .regex(REGISTRATION_TOKEN_FORMAT, "Invalid registration number format (expected XXX-#####/##)"),
  contactEmail: z.string().trim().min(1, "Email cannot be empty").regex(EMAIL_FORMAT, "Invalid email format"),
});

const jsonInputSchema = z.array(z.record(z.unknown()));

export interface RawInputRow {
  registrationToken: string;
  contactEmail: string;
}

export interface RejectedRow {
  sourceIndex: number;
  issues: string[];
}

export interface LoadedInput {
  records: InputRecord[];
  rejected: RejectedRow[];
}

function cellValue(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number") {
    return String(value);
  }
  return "";
}

const TEXT_EXTENSIONS = [".csv", ".json"] as const;
const SUPPORTED_EXTENSIONS: readonly string[] = [...TEXT_EXTENSIONS, ...WORKBOOK_EXTENSIONS];

function mapColumns({ headers, rows }: SheetTable, columns: InputColumns): RawInputRow[] {
  const tokenIndex = headers.indexOf(columns.registrationToken);
  const emailIndex = headers.indexOf(columns.contactEmail);
  const missing = [
    tokenIndex < 0 ? columns.registrationToken : undefined,
    emailIndex < 0 ? columns.contactEmail : undefined,
  ].filter((column): column is string => column !== undefined);
  if (missing.length > 0) {
    throw new ValidationError(`Missing input column(s): ${missing.join(", ")}`, missing);
  }

  return rows.map((row) => ({
    registrationToken: row[tokenIndex] ?? "",
    contactEmail: row[emailIndex] ?? "",
  }));
}

function readJsonRows(content: string, columns: InputColumns): RawInputRow[] {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new ValidationError(`Input file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = jsonInputSchema.safeParse(json);
  if (!parsed.success) {
    throw new ValidationError("JSON input must be an array of objects", parsed.error.issues.map((issue) => issue.message));
  }
  return parsed.data.map((row) => ({
    registrationToken: cellValue(row[columns.registrationToken]),
    contactEmail: cellValue(row[columns.contactEmail]),
  }));
}

/** Validates raw rows; rejected rows are reported, never returned as records. */
export function validateRows(rows: readonly RawInputRow[]): LoadedInput {
  const records: InputRecord[] = [];
  const rejected: RejectedRow[] = [];

  rows.forEach((row, sourceIndex) => {
    const parsed = inputRowSchema.safeParse(row);
    if (parsed.success) {
      records.push(Object.freeze({ ...parsed.data, sourceIndex }));
      return;
    }
    rejected.push({ sourceIndex, issues: parsed.error.issues.map((issue) => issue.message) });
  });

  return { records, rejected };
}

async function readText(absolutePath: string): Promise<string> {
  try {
    return await fs.promises.readFile(absolutePath, "utf-8");
  } catch (error) {
    throw new ValidationError(`Cannot read input file ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

async function readRawRows(
  absolutePath: string,
  extension: string,
  columns: InputColumns,
  sheetName?: string,
): Promise<RawInputRow[]> {
  if (extension === ".csv") {
    return mapColumns(parseCsv(await readText(absolutePath)), columns);
  }
  if (extension === ".json") {
    return readJsonRows(await readText(absolutePath), columns);
  }
  return mapColumns(await readWorkbookTable(absolutePath, sheetName), columns);
}

/** Loads `.csv`, `.json`, `.xlsx` or `.xlsm` input; `sheetName` picks a workbook sheet. */
export async function loadInputFile(
  filePath: string,
  columns: InputColumns,
  logger: Logger,
  sheetName?: string,
): Promise<LoadedInput> {
  const absolutePath = path.resolve(filePath);
  const extension = path.extname(absolutePath).toLowerCase();
  if (!SUPPORTED_EXTENSIONS.includes(extension)) {
    throw new ValidationError(`Unsupported input file type "${extension}"; expected .csv, .json, .xlsx or .xlsm`);
  }

  const rows = await readRawRows(absolutePath, extension, columns, sheetName);
  const loaded = validateRows(rows);

  for (const row of loaded.rejected) {
    logger.warn("input_row_rejected", { sourceIndex: row.sourceIndex, issues: row.issues });
  }
  logger.info("input_loaded", {
    path: absolutePath,
    rows: rows.length,
    accepted: loaded.records.length,
    rejected: loaded.rejected.length,
  });
  return loaded;
}
