import { readFile, writeFile } from "node:fs/promises";
import {
  DEFAULT_ACTIVITY_CONFIG,
  createPeriod,
  formatPeriodLabel,
  InMemoryActivitySource,
} from "@deliverypulse/activity";
import type { Granularity, HistoricalPeriodMetrics } from "@deliverypulse/core";
import { runPipeline, type PipelineOutcome, type PipelineProgressEvent } from "@deliverypulse/pipeline";
import { formatReport, type ReportFormat } from "@deliverypulse/reporter";
import { createSilentLogger, type Logger } from "./logger.js";
import { parseActivityDocument, parseHistoryDocument } from "./parse-activity-document.js";

export type ReportCommandOptions = {
  start: string;
  granularity: Granularity;
  format: ReportFormat;
  timeZone: string;
  workdayStartHour?: number;
  workdayEndHour?: number;
  historyPath?: string;
  outputPath?: string;
};

export type ReportCommandResult =
  | { outcome: Extract<PipelineOutcome, { status: "done" }>; rendered: string }
  | { outcome: Extract<PipelineOutcome, { status: "failed" }>; rendered: null };

export const createPipelineProgressReporter = (
  logger: Logger,
): ((event: PipelineProgressEvent) => void) => {
  let droppedRecords = 0;

  return (event) => {
    switch (event.stage) {
      case "stage_started":
        logger.debug(`pipeline: ${event.pipelineStage} started`);
        break;
      case "stage_completed":
        logger.info(`pipeline: ${event.pipelineStage} completed`);
        break;
      case "stage_failed":
        logger.error(`pipeline: ${event.pipelineStage} failed (${event.code}): ${event.message}`);
        break;
      case "events_dropped":
        droppedRecords += 1;
        logger.debug(`ingestion: dropped ${event.kind} #${event.index} (${event.reason})`);
        break;
      case "ingestion_summary":
        logger.info(
          `ingestion: accepted ${event.counts.acceptedCommits} commits and ${event.counts.acceptedPullRequests} pull requests`,
        );
        if (droppedRecords > 0) {
          logger.warn(`ingestion: dropped ${droppedRecords} records (run with --log-level debug for details)`);
        }
        break;
    }
  };
};

const loadHistory = async (
  historyPath: string | undefined,
  logger: Logger,
): Promise<readonly HistoricalPeriodMetrics[]> => {
  if (historyPath === undefined) {
    return [];
  }

  logger.info(`loading history: ${historyPath}`);
  const history = parseHistoryDocument(await readFile(historyPath, "utf8"));
  logger.debug(`history: ${history.length} earlier periods`);
  return history;
};

export const runReportCommand = async (
  activityPath: string,
  options: ReportCommandOptions,
  logger: Logger = createSilentLogger(),
): Promise<ReportCommandResult> => {
  const period = createPeriod(options.start, options.granularity);
  logger.info(`reporting period ${formatPeriodLabel(period)}`);

  logger.info(`loading activity: ${activityPath}`);
  const activity = parseActivityDocument(await readFile(activityPath, "utf8"));
  const history = await loadHistory(options.historyPath, logger);

  const outcome = runPipeline({
    period,
    source: new InMemoryActivitySource(activity),
    history,
    config: {
      activity: {
        workday: {
          startHour: options.workdayStartHour ?? DEFAULT_ACTIVITY_CONFIG.workday.startHour,
          endHour: options.workdayEndHour ?? DEFAULT_ACTIVITY_CONFIG.workday.endHour,
          timeZone: options.timeZone,
        },
      },
    },
    onProgress: createPipelineProgressReporter(logger),
  });

  if (outcome.status === "failed") {
    return { outcome, rendered: null };
  }

  const rendered = formatReport(outcome.report, options.format);
  if (options.outputPath !== undefined) {
    await writeFile(options.outputPath, rendered, "utf8");
    logger.info(`report written: ${options.outputPath}`);
  }

  return { outcome, rendered };
};
