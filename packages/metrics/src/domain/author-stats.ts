import type { AuthorStats, CommitCategory, CommitEvent } from "@deliverypulse/core";

type AuthorAccumulator = {
  commitCount: number;
  totalAdditions: number;
  totalDeletions: number;
  filesChanged: number;
  riskyCommitCount: number;
  afterHoursCommitCount: number;
  categoryCounts: Record<CommitCategory, number>;
};

const emptyAccumulator = (): AuthorAccumulator => ({
  commitCount: 0,
  totalAdditions: 0,
  totalDeletions: 0,
  filesChanged: 0,
  riskyCommitCount: 0,
  afterHoursCommitCount: 0,
  categoryCounts: { fix: 0, feat: 0, refactor: 0, other: 0 },
});

/**
 * Groups commits by exact author identity. Authors without commits in the
 * period do not appear.
 */
export const computeAuthorStats = (
  commits: readonly CommitEvent[],
  riskyCommitShas: ReadonlySet<string>,
): readonly AuthorStats[] => {
  const byAuthor = new Map<string, AuthorAccumulator>();

  for (const commit of commits) {
    const current = byAuthor.get(commit.authorId) ?? emptyAccumulator();
    current.commitCount += 1;
    current.totalAdditions += commit.additions;
    current.totalDeletions += commit.deletions;
    current.filesChanged += commit.filesChanged;
    current.categoryCounts[commit.category] += 1;

    if (riskyCommitShas.has(commit.sha)) {
      current.riskyCommitCount += 1;
    }

    if (commit.isAfterHours) {
      current.afterHoursCommitCount += 1;
    }

    byAuthor.set(commit.authorId, current);
  }

  return [...byAuthor.entries()]
    .map(([authorId, stats]) => {
      const totalChurn = stats.totalAdditions + stats.totalDeletions;
      return {
        authorId,
        commitCount: stats.commitCount,
        totalAdditions: stats.totalAdditions,
        totalDeletions: stats.totalDeletions,
        totalChurn,
        averageChurnPerCommit: totalChurn / stats.commitCount,
        filesChanged: stats.filesChanged,
        riskyCommitCount: stats.riskyCommitCount,
        afterHoursCommitCount: stats.afterHoursCommitCount,
        categoryCounts: { ...stats.categoryCounts },
      };
    })
    .sort((a, b) => a.authorId.localeCompare(b.authorId));
};
