import { formatPeriodLabel } from "@deliverypulse/activity";
import type {
  ForecastOutcome,
  MetricDelta,
  MetricDeltas,
  PerformanceReport,
  RatedIndicator,
  RiskFlag,
} from "@deliverypulse/core";
import { formatSigned, formatValue } from "./domain.js";

const deltaKeys: readonly (keyof MetricDeltas)[] = [
  "totalCommits",
  "totalChurn",
  "leadTimeHours",
  "deployFrequency",
  "changeFailureRate",
  "mttrHours",
];

const describeFlag = (flag: RiskFlag): string => {
  switch (flag.check) {
    case "churn_spike":
      return `churn_spike ${flag.commitSha} (${flag.authorId}) churn=${flag.churn} threshold=${formatValue(flag.threshold)}`;
    case "after_hours":
      return `after_hours ${flag.commitSha} (${flag.authorId}) at ${new Date(flag.timestampMs).toISOString()}`;
    case "outlier_author":
      return `outlier_author ${flag.authorId} churn=${flag.churn} threshold=${formatValue(flag.threshold)}`;
  }
};

const describeForecast = (forecast: ForecastOutcome): string => {
  if (!forecast.available) {
    return `${forecast.metric}: insufficient data (${forecast.historyLength} point(s))`;
  }

  return `${forecast.metric}: ${formatValue(forecast.prediction)} (${forecast.direction}, ${forecast.confidence} confidence, ${forecast.method}, last=${formatValue(forecast.lastObserved)})`;
};

const describeRating = (indicator: RatedIndicator): string =>
  `${indicator.rating} (${formatValue(indicator.value)})`;

const describeDelta = (delta: MetricDelta): string =>
  `${formatValue(delta.previous)} -> ${formatValue(delta.current)} (${formatSigned(delta.delta)}, ${formatSigned(delta.percentChange, "%")})`;

export const renderTextReport = (report: PerformanceReport): string => {
  const lines: string[] = [];
  lines.push("Delivery Summary");
  lines.push(`  period: ${formatPeriodLabel(report.period)}`);
  lines.push(`  generatedAt: ${report.generatedAt}`);
  lines.push(`  commits: ${report.metrics.totalCommits}`);
  lines.push(`  churn: ${report.metrics.totalChurn} (+${report.metrics.totalAdditions} / -${report.metrics.totalDeletions})`);
  lines.push(`  filesTouched: ${report.metrics.filesTouched}`);
  lines.push(`  leadTimeHours: ${formatValue(report.metrics.leadTimeHours)}`);
  lines.push(`  deployFrequency: ${report.metrics.deployFrequency}`);
  lines.push(`  changeFailureRate: ${formatValue(report.metrics.changeFailureRate, "%")}`);
  lines.push(`  mttrHours: ${formatValue(report.metrics.mttrHours)}`);
  lines.push(`  reviewLatencyHours: ${formatValue(report.metrics.reviewLatencyHours)}`);

  lines.push("");
  lines.push("Delivery Ratings");
  lines.push(`  deploymentFrequency: ${describeRating(report.ratings.deploymentFrequency)}`);
  lines.push(`  leadTime: ${describeRating(report.ratings.leadTime)}`);
  lines.push(`  changeFailureRate: ${describeRating(report.ratings.changeFailureRate)}`);
  lines.push(`  meanTimeToRecovery: ${describeRating(report.ratings.meanTimeToRecovery)}`);
  lines.push(`  overall: ${report.ratings.overall}`);

  lines.push("");
  lines.push("Authors");
  const authors = Object.values(report.authors);
  if (authors.length === 0) {
    lines.push("  none");
  }
  for (const author of authors) {
    lines.push(
      `  - ${author.authorId} | commits=${author.commitCount} churn=${author.totalChurn} avgChurn=${formatValue(author.averageChurnPerCommit)} risky=${author.riskyCommitCount} afterHours=${author.afterHoursCommitCount}`,
    );
  }

  lines.push("");
  lines.push("Risk");
  lines.push(`  riskyCommits: ${formatValue(report.risk.riskyCommitPercentage, "%")}`);
  lines.push(`  afterHoursCommits: ${formatValue(report.risk.afterHoursPercentage, "%")}`);
  lines.push(
    `  churnThreshold: ${formatValue(report.risk.churnThresholds.effective)} (fixed=${formatValue(report.risk.churnThresholds.fixed)}, statistical=${formatValue(report.risk.churnThresholds.statistical)})`,
  );
  lines.push(`  outlierAuthorThreshold: ${formatValue(report.risk.outlierAuthorThreshold)}`);
  lines.push(`  flags: ${report.risk.flags.length === 0 ? "none" : report.risk.flags.length}`);
  for (const flag of report.risk.flags) {
    lines.push(`    - ${describeFlag(flag)}`);
  }

  lines.push("");
  lines.push("Forecasts");
  for (const forecast of report.forecasts) {
    lines.push(`  - ${describeForecast(forecast)}`);
  }

  if (report.deltas !== null) {
    const deltas = report.deltas;
    lines.push("");
    lines.push("Change Since Previous Period");
    for (const key of deltaKeys) {
      lines.push(`  ${key}: ${describeDelta(deltas[key])}`);
    }
  }

  if (report.reviewInfluence.length > 0) {
    lines.push("");
    lines.push("Review Influence");
    for (const entry of report.reviewInfluence) {
      lines.push(`  - ${entry.reviewerId} reviewed ${entry.reviewedPullRequests} PR(s) for ${entry.reviewedAuthors.join(", ")}`);
    }
  }

  lines.push("");
  lines.push("Ingestion");
  lines.push(`  accepted: commits=${report.ingestion.acceptedCommits} pullRequests=${report.ingestion.acceptedPullRequests}`);
  lines.push(
    `  malformed: commits=${report.ingestion.droppedMalformedCommits} pullRequests=${report.ingestion.droppedMalformedPullRequests}`,
  );
  lines.push(
    `  outOfPeriod: commits=${report.ingestion.droppedOutOfRangeCommits} pullRequests=${report.ingestion.droppedOutOfRangePullRequests}`,
  );

  return lines.join("\n");
};

const code = (value: string | number): string => `\`${value}\``;

export const renderMarkdownReport = (report: PerformanceReport): string => {
  const lines: string[] = [];
  lines.push("# Delivery Report");
  lines.push("");
  lines.push(`- period: ${code(formatPeriodLabel(report.period))}`);
  lines.push(`- generated: ${code(report.generatedAt)}`);

  lines.push("");
  lines.push("## Delivery Metrics");
  lines.push("| metric | value | rating |");
  lines.push("| --- | --- | --- |");
  lines.push(`| commits | ${report.metrics.totalCommits} | |`);
  lines.push(`| churn | ${report.metrics.totalChurn} | |`);
  lines.push(`| files touched | ${report.metrics.filesTouched} | |`);
  lines.push(`| deploy frequency | ${report.metrics.deployFrequency} | ${report.ratings.deploymentFrequency.rating} |`);
  lines.push(`| lead time (h) | ${formatValue(report.metrics.leadTimeHours)} | ${report.ratings.leadTime.rating} |`);
  lines.push(
    `| change failure rate | ${formatValue(report.metrics.changeFailureRate, "%")} | ${report.ratings.changeFailureRate.rating} |`,
  );
  lines.push(`| MTTR (h) | ${formatValue(report.metrics.mttrHours)} | ${report.ratings.meanTimeToRecovery.rating} |`);
  lines.push(`| review latency (h) | ${formatValue(report.metrics.reviewLatencyHours)} | |`);
  lines.push("");
  lines.push(`Overall rating: **${report.ratings.overall}**`);

  lines.push("");
  lines.push("## Authors");
  const authors = Object.values(report.authors);
  if (authors.length === 0) {
    lines.push("- none");
  } else {
    lines.push("| author | commits | churn | avg churn | risky | after hours |");
    lines.push("| --- | --- | --- | --- | --- | --- |");
    for (const author of authors) {
      lines.push(
        `| ${author.authorId} | ${author.commitCount} | ${author.totalChurn} | ${formatValue(author.averageChurnPerCommit)} | ${author.riskyCommitCount} | ${author.afterHoursCommitCount} |`,
      );
    }
  }

  lines.push("");
  lines.push("## Risk");
  lines.push(`- risky commits: ${code(formatValue(report.risk.riskyCommitPercentage, "%"))}`);
  lines.push(`- after-hours commits: ${code(formatValue(report.risk.afterHoursPercentage, "%"))}`);
  lines.push(`- churn threshold: ${code(formatValue(report.risk.churnThresholds.effective))}`);
  for (const flag of report.risk.flags) {
    lines.push(`- ${code(describeFlag(flag))}`);
  }

  lines.push("");
  lines.push("## Forecasts");
  for (const forecast of report.forecasts) {
    lines.push(`- ${describeForecast(forecast)}`);
  }

  if (report.deltas !== null) {
    const deltas = report.deltas;
    lines.push("");
    lines.push("## Change Since Previous Period");
    for (const key of deltaKeys) {
      lines.push(`- ${key}: ${describeDelta(deltas[key])}`);
    }
  }

  if (report.reviewInfluence.length > 0) {
    lines.push("");
    lines.push("## Review Influence");
    for (const entry of report.reviewInfluence) {
      lines.push(`- **${entry.reviewerId}**: ${entry.reviewedPullRequests} PR(s) for ${entry.reviewedAuthors.map((author) => code(author)).join(", ")}`);
    }
  }

  lines.push("");
  lines.push("## Ingestion");
  lines.push(`- accepted commits: ${code(report.ingestion.acceptedCommits)}`);
  lines.push(`- accepted pull requests: ${code(report.ingestion.acceptedPullRequests)}`);
  lines.push(
    `- dropped: ${code(report.ingestion.droppedMalformedCommits + report.ingestion.droppedMalformedPullRequests)} malformed, ${code(report.ingestion.droppedOutOfRangeCommits + report.ingestion.droppedOutOfRangePullRequests)} outside the period`,
  );

  return lines.join("\n");
};
