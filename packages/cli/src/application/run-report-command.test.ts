import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { Logger } from "./logger.js";
import { createPipelineProgressReporter, runReportCommand } from "./run-report-command.js";

const createRecordingLogger = (): { logger: Logger; lines: string[] } => {
  const lines: string[] = [];
  return {
    lines,
    logger: {
      error: (message) => lines.push(`error ${message}`),
      warn: (message) => lines.push(`warn ${message}`),
      info: (message) => lines.push(`info ${message}`),
      debug: (message) => lines.push(`debug ${message}`),
    },
  };
};

describe("createPipelineProgressReporter", () => {
  it("summarizes dropped records after ingestion", () => {
    const { logger, lines } = createRecordingLogger();
    const report = createPipelineProgressReporter(logger);

    report({ stage: "events_dropped", kind: "commit", index: 3, reason: "missing_sha" });
    report({
      stage: "ingestion_summary",
      counts: {
        acceptedCommits: 2,
        acceptedPullRequests: 1,
        droppedMalformedCommits: 1,
        droppedMalformedPullRequests: 0,
        droppedOutOfRangeCommits: 0,
        droppedOutOfRangePullRequests: 0,
      },
    });
    report({ stage: "stage_failed", pipelineStage: "analyzing", code: "boom", message: "analysis broke" });

    expect(lines).toEqual([
      "debug ingestion: dropped commit #3 (missing_sha)",
      "info ingestion: accepted 2 commits and 1 pull requests",
      "warn ingestion: dropped 1 records (run with --log-level debug for details)",
      "error pipeline: analyzing failed (boom): analysis broke",
    ]);
  });
});

describe("runReportCommand", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "deliverypulse-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("renders a report for an activity export", async () => {
    const activityPath = join(directory, "activity.json");
    const outputPath = join(directory, "report.json");
    await writeFile(
      activityPath,
      JSON.stringify({
        commits: [
          { sha: "c1", author: "alice", timestamp: "2024-03-05T10:00:00Z", additions: 12, deletions: 3 },
          { sha: "c2", author: "bob", timestamp: "2024-03-06T23:30:00Z", additions: 5, deletions: 0 },
        ],
        pullRequests: [
          {
            number: 1,
            author: "alice",
            createdAt: "2024-03-05T08:00:00Z",
            mergedAt: "2024-03-05T12:00:00Z",
            ciStatus: "success",
          },
        ],
      }),
      "utf8",
    );

    const result = await runReportCommand(activityPath, {
      start: "2024-03-04T00:00:00Z",
      granularity: "weekly",
      format: "json",
      timeZone: "UTC",
      outputPath,
    });

    expect(result.outcome.status).toBe("done");
    expect(result.rendered).not.toBeNull();
    const written: unknown = JSON.parse(await readFile(outputPath, "utf8"));
    expect(written).toMatchObject({
      schemaVersion: "deliverypulse.report.v1",
      metrics: { totalCommits: 2, totalChurn: 20, leadTimeHours: 4, deployFrequency: 1, changeFailureRate: 0 },
      risk: { afterHoursCommitShas: ["c2"] },
    });
  });

  it("reports a failed run when the time zone is unknown", async () => {
    const activityPath = join(directory, "activity.json");
    await writeFile(
      activityPath,
      JSON.stringify({ commits: [{ sha: "c1", author: "alice", timestamp: "2024-03-05T10:00:00Z" }] }),
      "utf8",
    );

    const result = await runReportCommand(activityPath, {
      start: "2024-03-04T00:00:00Z",
      granularity: "weekly",
      format: "text",
      timeZone: "Not/AZone",
    });

    expect(result.rendered).toBeNull();
    expect(result.outcome.status).toBe("failed");
    if (result.outcome.status === "failed") {
      expect(result.outcome.failure.stage).toBe("harvesting");
    }
  });
});
