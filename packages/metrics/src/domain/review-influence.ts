import type { PullRequestEvent, ReviewInfluence } from "@deliverypulse/core";

export const buildReviewInfluence = (pullRequests: readonly PullRequestEvent[]): readonly ReviewInfluence[] => {
  const authorsByReviewer = new Map<string, Set<string>>();
  const reviewCountByReviewer = new Map<string, number>();

  for (const pullRequest of pullRequests) {
    for (const reviewerId of pullRequest.reviewers) {
      if (reviewerId === pullRequest.authorId) {
        continue;
      }

      const authors = authorsByReviewer.get(reviewerId) ?? new Set<string>();
      authors.add(pullRequest.authorId);
      authorsByReviewer.set(reviewerId, authors);
      reviewCountByReviewer.set(reviewerId, (reviewCountByReviewer.get(reviewerId) ?? 0) + 1);
    }
  }

  return [...authorsByReviewer.entries()]
    .map(([reviewerId, authors]) => ({
      reviewerId,
      reviewedAuthors: [...authors].sort((a, b) => a.localeCompare(b)),
      reviewedPullRequests: reviewCountByReviewer.get(reviewerId) ?? 0,
    }))
    .sort(
      (a, b) => b.reviewedPullRequests - a.reviewedPullRequests || a.reviewerId.localeCompare(b.reviewerId),
    );
};
