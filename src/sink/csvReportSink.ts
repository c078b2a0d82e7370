import fs from "node:fs";
import path from "node:path";
import { formatCsvRow } from "../input/csv";
import type { StatusResult } from "../types";
import { BaseSink } from "./baseSink";

export const REPORT_COLUMNS = [
  "Número de Solicitud",
  "Email",
  "Nombre Completo (Cirílico)",
  "Nombre Completo (Latino)",
  "País",
  "Estado de Solicitud",
  "Mensaje de Estado",
  "Nivel de Educación",
  "Programa Educativo",
  "Facultad Preparatoria",
  "Fecha de Consulta",
  "Error",
] as const;

/** `2025-03-01T09:15:42.120Z` becomes `2025-03-01 09:15:42` (UTC). */
export function formatQueryTimestamp(iso: string): string {
  const parsed = new Date(iso);
  if (Number.isNaN(parsed.getTime())) {
    return iso;
  }
  return parsed.toISOString().slice(0, 19).replace("T", " ");
}

export function toReportRow(result: StatusResult): string[] {
  return [
    result.registrationToken,
    result.contactEmail,
    result.cyrillicName ?? "",
    result.latinName ?? "",
    result.country ?? "",
    result.statusLabel ?? "",
    result.statusMessage ?? "",
    result.educationLevel ?? "",
    result.educationProgram ?? "",
    result.preparatoryFaculty ?? "",
    formatQueryTimestamp(result.retrievedAt),
    result.errorMessage,
  ];
}

/** One spreadsheet-friendly CSV per run; later batches of the same run are appended. */
export class CsvReportSink extends BaseSink {
  readonly name = "csv";
  private readonly reportPath: string;

  constructor(reportsDir: string, runId: string) {
    super();
    this.reportPath = path.join(path.resolve(reportsDir), `status_report_${runId}.csv`);
  }

  describeTarget(): string {
    return this.reportPath;
  }

  async publishResults(results: readonly StatusResult[]): Promise<void> {
    if (results.length === 0) {
      return;
    }

    await fs.promises.mkdir(path.dirname(this.reportPath), { recursive: true });
    const lines = results.map((result) => formatCsvRow(toReportRow(result)));
    if (!fs.existsSync(this.reportPath)) {
      lines.unshift(formatCsvRow(REPORT_COLUMNS));
    }
    await fs.promises.appendFile(this.reportPath, lines.join("\n") + "\n", "utf-8");
  }
}
