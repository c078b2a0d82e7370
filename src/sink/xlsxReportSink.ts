import fs from "node:fs";
import path from "node:path";
import { Workbook, type Worksheet } from "exceljs";
import type { StatusResult } from "../types";
import { BaseSink } from "./baseSink";
import { REPORT_COLUMNS, toReportRow } from "./csvReportSink";

export const RESULTS_SHEET = "Results";

function resultsSheet(workbook: Workbook): Worksheet {
  const existing = workbook.getWorksheet(RESULTS_SHEET);
  if (existing) {
    return existing;
  }
  const sheet = workbook.addWorksheet(RESULTS_SHEET);
  sheet.addRow([...REPORT_COLUMNS]);
  return sheet;
}

/** Widest text in each column plus two characters. */
function fitColumnWidths(sheet: Worksheet): void {
  for (let column = 1; column <= REPORT_COLUMNS.length; column += 1) {
    let widest = 0;
    sheet.getColumn(column).eachCell({ includeEmpty: false }, (cell) => {
      widest = Math.max(widest, cell.text.length);
    });
    sheet.getColumn(column).width = widest + 2;
  }
}

/** One workbook per run with a single results sheet; later batches append rows. */
export class XlsxReportSink extends BaseSink {
  readonly name = "xlsx";
  private readonly reportPath: string;

  constructor(reportsDir: string, runId: string) {
    super();
    this.reportPath = path.join(path.resolve(reportsDir), `status_report_${runId}.xlsx`);
  }

  describeTarget(): string {
    return this.reportPath;
  }

  async publishResults(results: readonly StatusResult[]): Promise<void> {
    if (results.length === 0) {
      return;
    }

    const workbook = new Workbook();
    if (fs.existsSync(this.reportPath)) {
      await workbook.xlsx.readFile(this.reportPath);
    }
    const sheet = resultsSheet(workbook);
    sheet.addRows(results.map((result) => toReportRow(result)));
    fitColumnWidths(sheet);

    await fs.promises.mkdir(path.dirname(this.reportPath), { recursive: true });
    await workbook.xlsx.writeFile(this.reportPath);
  }
}
