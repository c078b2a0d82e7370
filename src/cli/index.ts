import { loadConfig } from "../config";
import type { AppConfig, BrowserEngine, ReportSinkType } from "../config/types";
import { type CheckOptions, runCheck, runReport, runStatus } from "../core/commands";
import { createFetch } from "../core/fetch";
import { createRunId, describeError, Logger, MetricsRegistry } from "../observability";
import { createSink } from "../sink";
import { createStore } from "../store";

export type CommandName = "check" | "report" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  inputPath?: string;
  reportRunId?: string;
  configPath?: string;
  headed: boolean;
  browserEngine?: BrowserEngine;
  maxRetries?: number;
  delaySeconds?: number;
  manualOnly: boolean;
  noManual: boolean;
  limit?: number;
  sink?: ReportSinkType;
  sheet?: string;
}

const HELP_TEXT = `
Usage:
  status-tracker <command> [options]

Commands:
  check <input>                 Query the portal for every applicant in a
                                .csv, .json, .xlsx or .xlsm file
  report [--run <id>]           Re-export stored results (latest run by default)
  status                        Show result store statistics

Options:
  --config <path>        Optional path to JSON config file
  --headed               Show the browser window
  --browser <engine>     chromium, firefox or webkit
  --max-retries <n>      Attempts per applicant
  --delay <seconds>      Base delay between requests
  --manual-only          Solve every CAPTCHA by hand
  --no-manual            Never ask for a CAPTCHA by hand
  --limit <n>            Process at most n applicants (check)
  --sheet <name>         Workbook sheet to read (check; first sheet by default)
  --sink <type>          Report format: csv, xlsx, jsonl or http
  --run <id>             Run to export (report)
  -h, --help             Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "check" || raw === "report" || raw === "status") {
    return raw;
  }
  return undefined;
}

function optionValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  if (index < 0) {
    return undefined;
  }
  const value = argv[index + 1];
  return value && !value.startsWith("--") ? value : undefined;
}

function numericOption(argv: string[], flag: string, parse: (raw: string) => number): number | undefined {
  const raw = optionValue(argv, flag);
  if (raw === undefined) {
    return undefined;
  }
  const parsed = parse(raw);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function parseBrowser(raw: string | undefined): BrowserEngine | undefined {
  if (raw === "chromium" || raw === "firefox" || raw === "webkit") {
    return raw;
  }
  return undefined;
}

function parseSink(raw: string | undefined): ReportSinkType | undefined {
  if (raw === "csv" || raw === "xlsx" || raw === "jsonl" || raw === "http") {
    return raw;
  }
  return undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const inputPath = command === "check" ? argv[1] : undefined;
  if (command === "check" && (!inputPath || inputPath.startsWith("--"))) {
    return "help";
  }

  return {
    command,
    inputPath,
    reportRunId: optionValue(argv, "--run"),
    configPath: optionValue(argv, "--config"),
    headed: argv.includes("--headed"),
    browserEngine: parseBrowser(optionValue(argv, "--browser")),
    maxRetries: numericOption(argv, "--max-retries", (raw) => Number.parseInt(raw, 10)),
    delaySeconds: numericOption(argv, "--delay", (raw) => Number.parseFloat(raw)),
    manualOnly: argv.includes("--manual-only"),
    noManual: argv.includes("--no-manual"),
    limit: numericOption(argv, "--limit", (raw) => Number.parseInt(raw, 10)),
    sink: parseSink(optionValue(argv, "--sink")),
    sheet: optionValue(argv, "--sheet"),
  };
}

/** Flags win over the file and environment layers. */
export function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  return {
    ...config,
    headless: parsed.headed ? false : config.headless,
    browserEngine: parsed.browserEngine ?? config.browserEngine,
    maxRetryAttempts: parsed.maxRetries !== undefined ? Math.max(1, parsed.maxRetries) : config.maxRetryAttempts,
    requestDelaySeconds: parsed.delaySeconds !== undefined ? Math.max(0, parsed.delaySeconds) : config.requestDelaySeconds,
    manualCaptchaOnly: parsed.manualOnly || config.manualCaptchaOnly,
    manualCaptcha: parsed.noManual ? false : config.manualCaptcha,
    reportSink: parsed.sink ?? config.reportSink,
    inputSheet: parsed.sheet ?? config.inputSheet,
  };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(getHelpText());
    return 0;
  }

  const config = applyCliOverrides(loadConfig(parsed.configPath), parsed);
  const runId = createRunId();
  const fetchFn = createFetch(config.ignoreHttpsErrors);
  const store = createStore(config);
  const sink = createSink(config, runId, fetchFn);
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, minLevel: config.logLevel });
  const context = { runId, config, store, sink, logger, metrics, fetchFn };

  logger.info("command_start", {
    command: parsed.command,
    inputPath: parsed.inputPath,
    headless: config.headless,
    browserEngine: config.browserEngine,
    maxRetryAttempts: config.maxRetryAttempts,
    manualCaptcha: config.manualCaptcha,
    manualCaptchaOnly: config.manualCaptchaOnly,
    reportSink: config.reportSink,
  });

  const sigint: { handler?: () => void } = {};
  let exitCode = 0;

  try {
    switch (parsed.command) {
      case "check": {
        const options: CheckOptions = {
          limit: parsed.limit,
          onStart: (coordinator) => {
            const handler = (): void => coordinator.stop();
            sigint.handler = handler;
            process.on("SIGINT", handler);
          },
        };
        const summary = await runCheck({ ...context, logger: logger.child("check") }, parsed.inputPath ?? "", options);
        exitCode = summary.failed > 0 || summary.stopped ? 1 : 0;
        break;
      }
      case "report": {
        const written = await runReport({ ...context, logger: logger.child("report") }, parsed.reportRunId);
        exitCode = written === undefined ? 1 : 0;
        break;
      }
      case "status":
        await runStatus({ ...context, logger: logger.child("status") });
        break;
    }

    logger.info("command_complete", { command: parsed.command, exitCode });
    return exitCode;
  } catch (error) {
    logger.error("command_failed", { command: parsed.command, ...describeError(error) });
    return 1;
  } finally {
    if (sigint.handler) {
      process.removeListener("SIGINT", sigint.handler);
    }
    await store.close();
    metrics.logSummary(logger);
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
