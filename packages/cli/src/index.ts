import { Command, InvalidArgumentError, Option } from "commander";
import type { Granularity } from "@deliverypulse/core";
import type { ReportFormat } from "@deliverypulse/reporter";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { LOG_LEVELS, createStderrLogger, parseLogLevel, type LogLevel } from "./application/logger.js";
import { runReportCommand } from "./application/run-report-command.js";

const readPackageVersion = (): string => {
  const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), "../package.json");
  const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, "utf8"));
  if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
    return parsed.version;
  }

  return "0.0.0";
};

const parseHour = (value: string): number => {
  const hour = Number.parseInt(value, 10);
  if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
    throw new InvalidArgumentError("expected an hour between 0 and 23");
  }

  return hour;
};

const program = new Command();

program
  .name("deliverypulse")
  .description("Delivery performance reports from harvested repository activity")
  .version(readPackageVersion());

program
  .command("report")
  .argument("<activity>", "path to a harvested activity export (JSON with commits and pullRequests)")
  .requiredOption("--start <date>", "start of the reporting period (ISO 8601)")
  .addOption(
    new Option("--granularity <granularity>", "period length: daily, weekly, monthly")
      .choices(["daily", "weekly", "monthly"])
      .default("weekly"),
  )
  .option("--history <path>", "earlier period metrics or saved JSON reports, as a JSON array")
  .option("--time-zone <zone>", "IANA time zone for the after-hours check", "UTC")
  .addOption(new Option("--workday-start <hour>", "first working hour (0-23)").argParser(parseHour))
  .addOption(new Option("--workday-end <hour>", "first hour after the working day (0-23)").argParser(parseHour))
  .addOption(
    new Option("--format <mode>", "output format: text, json, md")
      .choices(["text", "json", "md"])
      .default("text"),
  )
  .option("--output <path>", "write the report to a file instead of stdout")
  .addOption(
    new Option(
      "--log-level <level>",
      "log verbosity: silent, error, warn, info, debug (logs are written to stderr)",
    )
      .choices(LOG_LEVELS)
      .default(parseLogLevel(process.env["DELIVERYPULSE_LOG_LEVEL"])),
  )
  .action(
    async (
      activityPath: string,
      options: {
        start: string;
        granularity: Granularity;
        history?: string;
        timeZone: string;
        workdayStart?: number;
        workdayEnd?: number;
        format: ReportFormat;
        output?: string;
        logLevel: LogLevel;
      },
    ) => {
      const logger = createStderrLogger(options.logLevel);
      const result = await runReportCommand(
        activityPath,
        {
          start: options.start,
          granularity: options.granularity,
          format: options.format,
          timeZone: options.timeZone,
          ...(options.workdayStart === undefined ? {} : { workdayStartHour: options.workdayStart }),
          ...(options.workdayEnd === undefined ? {} : { workdayEndHour: options.workdayEnd }),
          ...(options.history === undefined ? {} : { historyPath: options.history }),
          ...(options.output === undefined ? {} : { outputPath: options.output }),
        },
        logger,
      );

      if (result.rendered === null) {
        const { failure } = result.outcome;
        logger.error(`report failed during ${failure.stage}: ${failure.code}`);
        process.exitCode = 1;
        return;
      }

      if (options.output === undefined) {
        process.stdout.write(`${result.rendered}\n`);
      }
    },
  );

if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

const executablePath = process.argv[0] ?? "";
const scriptPath = process.argv[1] ?? "";

const argv =
  process.argv[2] === "--"
    ? [executablePath, scriptPath, ...process.argv.slice(3)]
    : process.argv;

if (argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

try {
  await program.parseAsync(argv);
} catch (error) {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`[deliverypulse] ERROR ${message}\n`);
  process.exitCode = 1;
}
