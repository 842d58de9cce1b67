export {
  DEFAULT_ACTIVITY_CONFIG,
  type ActivityConfig,
  type CategoryKeywords,
  type HarvestedActivity,
  type HarvestedCommit,
  type HarvestedPullRequest,
  type HarvestedReview,
  type WorkdayWindow,
} from "./domain/activity-types.js";
export {
  createPeriod,
  formatPeriodLabel,
  nextPeriod,
  periodContains,
  periodDurationDays,
  previousPeriod,
} from "./domain/period.js";
export { classifyCommitMessage } from "./domain/commit-classification.js";
export { isAfterHours, localHour } from "./domain/after-hours.js";
export {
  normalizeCiStatus,
  parseHarvestedCommit,
  parseHarvestedPullRequest,
  parseTimestamp,
  type MalformedReason,
  type ParsedRecord,
} from "./parsing/harvest-record-parser.js";
export { InMemoryActivitySource, type ActivitySource } from "./application/activity-source.js";
export {
  ingestActivity,
  type DroppedRecordKind,
  type IngestActivityInput,
  type IngestionProgressEvent,
  type IngestionResult,
} from "./application/ingest-activity.js";
