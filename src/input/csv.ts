export interface ParsedCsv {
  headers: string[];
  rows: string[][];
}

function normalizeCell(value: string): string {
  return value.replace(/\uFEFF/g, "").replace(/\r/g, "").trim();
}

/** Splits CSV text into rows; quoted cells may hold commas, quotes and line breaks. */
export function parseCsvRows(content: string): string[][] {
  const rows: string[][] = [];
  let currentRow: string[] = [];
  let currentCell = "";
  let inQuotes = false;

  for (let i = 0; i < content.length; i++) {
    const char = content[i];
    const next = content[i + 1];

    if (char === '"') {
      if (inQuotes && next === '"') {
        currentCell += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }

    if (!inQuotes && char === ",") {
      currentRow.push(currentCell);
      currentCell = "";
      continue;
    }

    if (!inQuotes && (char === "\n" || char === "\r")) {
      if (char === "\r" && next === "\n") {
        i++;
      }
      currentRow.push(currentCell);
      rows.push(currentRow);
      currentRow = [];
      currentCell = "";
      continue;
    }

    currentCell += char;
  }

  if (currentCell.length > 0 || currentRow.length > 0) {
    currentRow.push(currentCell);
    rows.push(currentRow);
  }

  return rows;
}

/** First non-empty row is the header; blank rows are dropped. */
export function parseCsv(content: string): ParsedCsv {
  const rows = parseCsvRows(content)
    .map((row) => row.map((cell) => normalizeCell(cell)))
    .filter((row) => row.some((cell) => cell.length > 0));

  if (rows.length === 0) {
    return { headers: [], rows: [] };
  }
  return { headers: rows[0], rows: rows.slice(1) };
}

export function escapeCsvCell(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvRow(cells: readonly string[]): string {
  return cells.map((cell) => escapeCsvCell(cell)).join(",");
}
