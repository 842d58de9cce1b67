import { describe, expect, it } from "vitest";
import { DEFAULT_ACTIVITY_CONFIG } from "../domain/activity-types.js";
import {
  normalizeCiStatus,
  parseHarvestedCommit,
  parseHarvestedPullRequest,
  parseTimestamp,
} from "./harvest-record-parser.js";

describe("parseHarvestedCommit", () => {
  it("normalizes a complete record and derives category and after-hours", () => {
    const parsed = parseHarvestedCommit(
      {
        sha: "a1",
        author: "alice",
        timestamp: "2024-03-04T02:00:00Z",
        additions: 12,
        deletions: 3,
        files: ["src/a.ts", "src/b.ts", "src/a.ts"],
        message: "fix: guard against empty input",
      },
      DEFAULT_ACTIVITY_CONFIG,
    );

    expect(parsed).toEqual({
      ok: true,
      event: {
        sha: "a1",
        authorId: "alice",
        timestampMs: Date.UTC(2024, 2, 4, 2, 0),
        additions: 12,
        deletions: 3,
        filesChanged: 2,
        filePaths: ["src/a.ts", "src/b.ts"],
        message: "fix: guard against empty input",
        category: "fix",
        isAfterHours: true,
      },
    });
    expect(parsed.ok && Object.isFrozen(parsed.event)).toBe(true);
  });

  it("keeps author identities exactly as given", () => {
    const parsed = parseHarvestedCommit(
      { sha: "a2", author: "Alice", timestamp: Date.UTC(2024, 2, 4, 10) },
      DEFAULT_ACTIVITY_CONFIG,
    );

    expect(parsed.ok && parsed.event.authorId).toBe("Alice");
  });

  it("reports the first missing required field", () => {
    expect(parseHarvestedCommit({ author: "alice", timestamp: 1 }, DEFAULT_ACTIVITY_CONFIG)).toEqual({
      ok: false,
      reason: "missing_sha",
    });
    expect(parseHarvestedCommit({ sha: "a3", author: "  " }, DEFAULT_ACTIVITY_CONFIG)).toEqual({
      ok: false,
      reason: "missing_author",
    });
    expect(
      parseHarvestedCommit({ sha: "a3", author: "alice", timestamp: "yesterday" }, DEFAULT_ACTIVITY_CONFIG),
    ).toEqual({ ok: false, reason: "invalid_timestamp" });
    expect(
      parseHarvestedCommit(
        { sha: "a3", author: "alice", timestamp: 1, additions: -4 },
        DEFAULT_ACTIVITY_CONFIG,
      ),
    ).toEqual({ ok: false, reason: "invalid_line_counts" });
  });
});

describe("parseHarvestedPullRequest", () => {
  it("normalizes ci status and orders review timestamps", () => {
    const parsed = parseHarvestedPullRequest({
      number: 42,
      author: "bob",
      createdAt: "2024-03-04T10:00:00Z",
      mergedAt: "2024-03-05T10:00:00Z",
      additions: 40,
      deletions: 5,
      filesChanged: 3,
      ciStatus: "failure",
      reviews: [
        { reviewer: "carol", submittedAt: "2024-03-04T16:00:00Z" },
        { reviewer: "alice", submittedAt: "2024-03-04T12:00:00Z" },
        { reviewer: "carol", submittedAt: "2024-03-03T12:00:00Z" },
        "not a review",
      ],
    });

    expect(parsed).toEqual({
      ok: true,
      event: {
        number: 42,
        authorId: "bob",
        createdAtMs: Date.UTC(2024, 2, 4, 10),
        mergedAtMs: Date.UTC(2024, 2, 5, 10),
        additions: 40,
        deletions: 5,
        filesChanged: 3,
        ciOutcome: "fail",
        reviewTimestampsMs: [Date.UTC(2024, 2, 4, 12), Date.UTC(2024, 2, 4, 16)],
        reviewers: ["alice", "carol"],
      },
    });
  });

  it("treats a missing merge timestamp as an open pull request", () => {
    const parsed = parseHarvestedPullRequest({ number: 7, author: "bob", createdAt: 1_000, mergedAt: null });

    expect(parsed.ok && parsed.event.mergedAtMs).toBeNull();
    expect(parsed.ok && parsed.event.ciOutcome).toBe("unknown");
  });

  it("rejects inconsistent timestamps", () => {
    expect(
      parseHarvestedPullRequest({ number: 8, author: "bob", createdAt: 2_000, mergedAt: 1_000 }),
    ).toEqual({ ok: false, reason: "merged_before_created" });
    expect(
      parseHarvestedPullRequest({ number: 8, author: "bob", createdAt: 2_000, mergedAt: "soon" }),
    ).toEqual({ ok: false, reason: "invalid_merged_timestamp" });
    expect(parseHarvestedPullRequest({ author: "bob", createdAt: 2_000 })).toEqual({
      ok: false,
      reason: "missing_number",
    });
  });
});

describe("normalizeCiStatus", () => {
  it("maps hosting service vocabularies onto pass, fail and unknown", () => {
    expect(normalizeCiStatus("success")).toBe("pass");
    expect(normalizeCiStatus("PASSED")).toBe("pass");
    expect(normalizeCiStatus("failure")).toBe("fail");
    expect(normalizeCiStatus("error")).toBe("fail");
    expect(normalizeCiStatus("pending")).toBe("unknown");
    expect(normalizeCiStatus(undefined)).toBe("unknown");
  });
});

describe("parseTimestamp", () => {
  it("accepts epoch milliseconds, ISO strings and dates", () => {
    expect(parseTimestamp(1_700_000_000_000)).toBe(1_700_000_000_000);
    expect(parseTimestamp("2024-03-04T00:00:00Z")).toBe(Date.UTC(2024, 2, 4));
    expect(parseTimestamp(new Date(Date.UTC(2024, 2, 4)))).toBe(Date.UTC(2024, 2, 4));
    expect(parseTimestamp("")).toBeNull();
    expect(parseTimestamp(Number.NaN)).toBeNull();
  });
});
