import {
  InMemoryActivitySource,
  createPeriod,
  type ActivitySource,
  type HarvestedActivity,
  type HarvestedCommit,
  type HarvestedPullRequest,
} from "@deliverypulse/activity";
import type { HistoricalPeriodMetrics, Period } from "@deliverypulse/core";
import { computePeriodMetrics } from "@deliverypulse/metrics";
import { ReportConsistencyError } from "@deliverypulse/reporter";
import { describe, expect, it } from "vitest";
import { createPipelineContext } from "../domain/pipeline-context.js";
import { runPipeline, type PipelineProgressEvent } from "./run-pipeline.js";
import { PipelinePreconditionError, analyzeStage, harvestStage, summarizeStage } from "./stages.js";

const period = createPeriod("2024-03-04T00:00:00.000Z", "weekly");
const generatedAt = "2024-03-11T06:00:00.000Z";

const commitRecord = (sha: string, author: string, day: number, additions = 15, deletions = 5): HarvestedCommit => ({
  sha,
  author,
  timestamp: new Date(Date.UTC(2024, 2, day, 10)).toISOString(),
  additions,
  deletions,
  files: [`src/${author}.ts`],
  message: "update module",
});

const mergedPullRequest = (number: number, leadHours: number, ciStatus: string): HarvestedPullRequest => ({
  number,
  author: "alice",
  createdAt: "2024-03-05T00:00:00.000Z",
  mergedAt: new Date(Date.UTC(2024, 2, 5) + leadHours * 3_600_000).toISOString(),
  additions: 10,
  deletions: 2,
  filesChanged: 1,
  ciStatus,
  reviews: [{ reviewer: "bob", submittedAt: "2024-03-05T02:00:00.000Z" }],
});

const scenarioActivity = (): HarvestedActivity => {
  const commits: HarvestedCommit[] = [];
  for (let index = 0; index < 7; index += 1) {
    commits.push(commitRecord(`alice-${index}`, "alice", 4 + (index % 5)));
    commits.push(commitRecord(`bob-${index}`, "bob", 4 + (index % 5)));
  }
  commits.push(commitRecord("carol-big", "carol", 6, 400, 50));
  for (let index = 1; index < 6; index += 1) {
    commits.push(commitRecord(`carol-${index}`, "carol", 4 + (index % 5)));
  }

  return {
    commits,
    pullRequests: [
      mergedPullRequest(1, 10, "success"),
      mergedPullRequest(2, 12, "success"),
      mergedPullRequest(3, 8, "failure"),
      mergedPullRequest(4, 20, "success"),
      mergedPullRequest(5, 22, "passed"),
    ],
  };
};

const emptySource = new InMemoryActivitySource({ commits: [], pullRequests: [] });

const historyEntry = (iso: string, totalChurn: number): HistoricalPeriodMetrics => ({
  period: createPeriod(iso, "weekly"),
  metrics: { ...computePeriodMetrics([], []), totalChurn, totalAdditions: totalChurn },
});

describe("runPipeline", () => {
  it("reports a busy week end to end", () => {
    const outcome = runPipeline({ period, source: new InMemoryActivitySource(scenarioActivity()), generatedAt });

    if (outcome.status !== "done") {
      throw new Error(`pipeline failed: ${outcome.failure.code}`);
    }
    const { report } = outcome;
    expect(outcome.trail).toEqual(["idle", "harvesting", "analyzing", "summarizing", "done"]);
    expect(report.metrics.totalCommits).toBe(20);
    expect(report.metrics.totalChurn).toBe(830);
    expect(report.metrics.leadTimeHours).toBeCloseTo(14.4, 10);
    expect(report.metrics.deployFrequency).toBe(5);
    expect(report.metrics.changeFailureRate).toBe(20);
    expect(report.metrics.reviewLatencyHours).toBe(2);
    expect(report.risk.riskyCommitShas).toEqual(["carol-big"]);
    expect(report.risk.riskyCommitPercentage).toBe(5);
    expect(report.authors["carol"]?.riskyCommitCount).toBe(1);
    expect(report.reviewInfluence).toEqual([
      { reviewerId: "bob", reviewedAuthors: ["alice"], reviewedPullRequests: 5 },
    ]);
    expect(report.forecasts.map((forecast) => forecast.available)).toEqual([false, false]);
    expect(report.generatedAt).toBe(generatedAt);
  });

  it("flags a small night commit as after hours only", () => {
    const source = new InMemoryActivitySource({
      commits: [
        { sha: "night", author: "alice", timestamp: "2024-03-05T02:00:00.000Z", additions: 20, deletions: 10 },
      ],
      pullRequests: [],
    });

    const outcome = runPipeline({ period, source, generatedAt });

    expect(outcome.status).toBe("done");
    if (outcome.status === "done") {
      expect(outcome.report.risk.afterHoursCommitShas).toEqual(["night"]);
      expect(outcome.report.risk.riskyCommitShas).toEqual([]);
      expect(outcome.report.authors["alice"]?.afterHoursCommitCount).toBe(1);
    }
  });

  it("reports an empty period the same way every time", () => {
    const first = runPipeline({ period, source: emptySource, generatedAt });
    const second = runPipeline({ period, source: emptySource, generatedAt });

    expect(first).toEqual(second);
    if (first.status !== "done") {
      throw new Error("expected a report");
    }
    expect(first.report.metrics.totalCommits).toBe(0);
    expect(first.report.metrics.changeFailureRate).toBeNull();
    expect(first.report.risk.riskyCommitPercentage).toBe(0);
    expect(first.report.risk.afterHoursPercentage).toBe(0);
    expect(first.report.authors).toEqual({});
  });

  it("counts and announces dropped records", () => {
    const events: PipelineProgressEvent[] = [];
    const source = new InMemoryActivitySource({
      commits: [
        commitRecord("kept", "alice", 5),
        commitRecord("early", "alice", 1),
        { sha: "broken", author: "alice", timestamp: "not a date" },
      ],
      pullRequests: [{ number: 7, author: "alice", createdAt: "2024-03-05T00:00:00.000Z", mergedAt: "2024-03-04T00:00:00.000Z" }],
    });

    const outcome = runPipeline({ period, source, generatedAt, onProgress: (event) => events.push(event) });

    expect(outcome.status).toBe("done");
    if (outcome.status === "done") {
      expect(outcome.report.ingestion).toEqual({
        acceptedCommits: 1,
        acceptedPullRequests: 0,
        droppedMalformedCommits: 1,
        droppedMalformedPullRequests: 1,
        droppedOutOfRangeCommits: 1,
        droppedOutOfRangePullRequests: 0,
      });
    }
    expect(events.filter((event) => event.stage === "events_dropped")).toEqual([
      { stage: "events_dropped", kind: "commit", index: 1, reason: "out_of_period" },
      { stage: "events_dropped", kind: "commit", index: 2, reason: "invalid_timestamp" },
      { stage: "events_dropped", kind: "pull_request", index: 0, reason: "merged_before_created" },
    ]);
    expect(events.filter((event) => event.stage === "stage_completed")).toHaveLength(3);
  });

  it("fails at harvesting when the source throws", () => {
    const events: PipelineProgressEvent[] = [];
    const source: ActivitySource = {
      readActivity: (_target: Period) => {
        throw new Error("hosting unavailable");
      },
    };

    const outcome = runPipeline({ period, source, onProgress: (event) => events.push(event) });

    expect(outcome).toEqual({
      status: "failed",
      failure: { stage: "harvesting", code: "harvesting_failed", message: "hosting unavailable" },
      trail: ["idle", "harvesting", "failed"],
    });
    expect(events).toEqual([
      { stage: "stage_started", pipelineStage: "harvesting" },
      { stage: "stage_failed", pipelineStage: "harvesting", code: "harvesting_failed", message: "hosting unavailable" },
    ]);
  });

  it("fails the stage whose progress observer throws", () => {
    const outcome = runPipeline({
      period,
      source: emptySource,
      generatedAt,
      onProgress: (event) => {
        if (event.stage === "stage_completed" && event.pipelineStage === "analyzing") {
          throw new Error("log sink closed");
        }
      },
    });

    expect(outcome).toEqual({
      status: "failed",
      failure: { stage: "analyzing", code: "analyzing_failed", message: "log sink closed" },
      trail: ["idle", "harvesting", "analyzing", "failed"],
    });
  });

  it("forecasts and compares against earlier periods", () => {
    const source = new InMemoryActivitySource({ commits: [commitRecord("c1", "alice", 5, 40, 0)], pullRequests: [] });
    const history = [
      historyEntry("2024-02-26T00:00:00.000Z", 30),
      historyEntry("2024-02-12T00:00:00.000Z", 10),
      historyEntry("2024-02-19T00:00:00.000Z", 20),
    ];

    const outcome = runPipeline({ period, source, history, generatedAt });

    if (outcome.status !== "done") {
      throw new Error("expected a report");
    }
    const [churn, leadTime] = outcome.report.forecasts;
    expect(churn).toMatchObject({ available: true, metric: "churn", historyLength: 4, confidence: "medium" });
    if (churn?.available) {
      expect(churn.prediction).toBeCloseTo(50, 9);
      expect(churn.period).toEqual(createPeriod("2024-03-11T00:00:00.000Z", "weekly"));
    }
    expect(leadTime).toMatchObject({ available: false, metric: "leadTime", reason: "insufficient_data" });
    expect(outcome.report.deltas?.totalChurn.previous).toBe(30);
    expect(outcome.report.deltas?.totalChurn.delta).toBe(10);
    expect(outcome.report.deltas?.totalChurn.percentChange).toBeCloseTo(100 / 3, 10);
  });

  it("passes configuration through to the analysis", () => {
    const source = new InMemoryActivitySource({ commits: [commitRecord("c1", "alice", 5, 40, 0)], pullRequests: [] });

    const outcome = runPipeline({
      period,
      source,
      generatedAt,
      config: {
        activity: { workday: { startHour: 12, endHour: 18, timeZone: "UTC" } },
        risk: { churnSpike: { fixedThreshold: 30, statisticalMinCommits: 5, stdDevMultiplier: 2 } },
      },
    });

    if (outcome.status !== "done") {
      throw new Error("expected a report");
    }
    expect(outcome.report.risk.afterHoursCommitShas).toEqual(["c1"]);
    expect(outcome.report.risk.riskyCommitShas).toEqual(["c1"]);
  });
});

describe("stages", () => {
  it("refuses to analyze before harvesting", () => {
    const context = createPipelineContext(period, []);

    expect(() => analyzeStage(context, {})).toThrow(PipelinePreconditionError);
    expect(() => summarizeStage(context, generatedAt)).toThrow(PipelinePreconditionError);
  });

  it("surfaces a reconciliation failure from the summary stage", () => {
    const context = createPipelineContext(period, []);
    harvestStage(context, new InMemoryActivitySource(scenarioActivity()), {});
    analyzeStage(context, {});
    const analysis = context.analysis;
    if (analysis === null) {
      throw new Error("expected analysis output");
    }
    context.analysis = {
      ...analysis,
      summary: { ...analysis.summary, metrics: { ...analysis.summary.metrics, totalChurn: 1 } },
    };

    expect(() => summarizeStage(context, generatedAt)).toThrow(ReportConsistencyError);
    expect(context.report).toBeNull();
  });
});
