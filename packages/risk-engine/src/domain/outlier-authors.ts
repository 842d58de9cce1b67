import type { CommitEvent, RiskFlag } from "@deliverypulse/core";
import type { OutlierAuthorConfig } from "../config.js";
import { average, commitChurn, standardDeviation } from "./math.js";

export type OutlierAuthorFlag = Extract<RiskFlag, { check: "outlier_author" }>;

export type AuthorChurn = {
  authorId: string;
  totalChurn: number;
};

export type OutlierAuthorResult = {
  threshold: number | null;
  flags: readonly OutlierAuthorFlag[];
};

export const aggregateAuthorChurn = (commits: readonly CommitEvent[]): readonly AuthorChurn[] => {
  const churnByAuthor = new Map<string, number>();
  for (const commit of commits) {
    churnByAuthor.set(commit.authorId, (churnByAuthor.get(commit.authorId) ?? 0) + commitChurn(commit));
  }

  return [...churnByAuthor.entries()]
    .map(([authorId, totalChurn]) => ({ authorId, totalChurn }))
    .sort((a, b) => a.authorId.localeCompare(b.authorId));
};

export const detectOutlierAuthors = (
  authors: readonly AuthorChurn[],
  config: OutlierAuthorConfig,
): OutlierAuthorResult => {
  const minAuthors = Math.max(2, config.minAuthors);
  if (authors.length < minAuthors) {
    return { threshold: null, flags: [] };
  }

  const churns = authors.map((author) => author.totalChurn);
  const threshold = average(churns) + config.stdDevMultiplier * standardDeviation(churns);

  const flags: OutlierAuthorFlag[] = authors
    .filter((author) => author.totalChurn > threshold)
    .map((author): OutlierAuthorFlag => ({
      check: "outlier_author",
      authorId: author.authorId,
      churn: author.totalChurn,
      threshold,
    }));

  return { threshold, flags };
};
