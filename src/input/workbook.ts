import { Workbook, type Worksheet } from "exceljs";
import { errorMessage, ValidationError } from "../core/errors";

export const WORKBOOK_EXTENSIONS = [".xlsx", ".xlsm"] as const;

export interface SheetTable {
  headers: string[];
  rows: string[][];
}

function pickWorksheet(workbook: Workbook, filePath: string, sheetName?: string): Worksheet {
  if (sheetName) {
    const named = workbook.getWorksheet(sheetName);
    if (!named) {
      throw new ValidationError(`Worksheet "${sheetName}" not found in ${filePath}`);
    }
    return named;
  }

  const first = workbook.worksheets[0];
  if (!first) {
    throw new ValidationError(`Workbook ${filePath} has no worksheets`);
  }
  return first;
}

/**
 * Reads one worksheet (the first unless named) as a header row plus data rows
 * of displayed cell text. Rows without any text are dropped, like blank CSV lines.
 */
export async function readWorkbookTable(filePath: string, sheetName?: string): Promise<SheetTable> {
  const workbook = new Workbook();
  try {
    await workbook.xlsx.readFile(filePath);
  } catch (error) {
    throw new ValidationError(`Cannot read workbook ${filePath}: ${errorMessage(error)}`);
  }

  const sheet = pickWorksheet(workbook, filePath, sheetName);
  const width = sheet.columnCount;
  const textsOf = (rowNumber: number): string[] => {
    const row = sheet.getRow(rowNumber);
    const texts: string[] = [];
    for (let column = 1; column <= width; column += 1) {
      texts.push(row.getCell(column).text.trim());
    }
    return texts;
  };

  const headers = textsOf(1);
  const rows: string[][] = [];
  for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber += 1) {
    const texts = textsOf(rowNumber);
    if (texts.some((text) => text.length > 0)) {
      rows.push(texts);
    }
  }
  return { headers, rows };
}
