import type { Period } from "@deliverypulse/core";
import type { HarvestedActivity } from "../domain/activity-types.js";

/**
 * Hands over activity that is already materialized in memory. Reaching the
 * hosting service and caching are the implementer's concern.
 */
export interface ActivitySource {
  readActivity(period: Period): HarvestedActivity;
}

export class InMemoryActivitySource implements ActivitySource {
  constructor(private readonly activity: HarvestedActivity) {}

  readActivity(_period: Period): HarvestedActivity {
    return this.activity;
  }
}
