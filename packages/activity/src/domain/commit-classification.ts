import type { CommitCategory } from "@deliverypulse/core";
import { DEFAULT_ACTIVITY_CONFIG, type CategoryKeywords } from "./activity-types.js";

const CATEGORY_PRECEDENCE = ["fix", "feat", "refactor"] as const;

const tokenize = (message: string): ReadonlySet<string> =>
  new Set(
    message
      .toLowerCase()
      .split(/[^a-z0-9]+/)
      .filter((token) => token.length > 0),
  );

export const classifyCommitMessage = (
  message: string,
  keywords: CategoryKeywords = DEFAULT_ACTIVITY_CONFIG.categoryKeywords,
): CommitCategory => {
  const tokens = tokenize(message);

  for (const category of CATEGORY_PRECEDENCE) {
    if (keywords[category].some((keyword) => tokens.has(keyword.toLowerCase()))) {
      return category;
    }
  }

  return "other";
};
