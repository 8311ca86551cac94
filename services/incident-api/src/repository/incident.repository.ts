import type { DetectionType, IncidentRecord } from "../types.js";

export interface CountRow<K> {
  key: K;
  count: number;
}

export interface SummaryRow {
  totalDetections: number;
  totalAlerts: number;
  avgConfidence: number | null;
}

/**
 * Persistence seam for incidents. Exactly one implementation is chosen at
 * startup; the unavailable one makes every call a no-op.
 */
export interface IncidentRepository {
  readonly available: boolean;
  /** Resolves to the new incident id, or null when nothing was stored. */
  save(record: IncidentRecord): Promise<string | null>;
  summarize(alertTypes: readonly DetectionType[]): Promise<SummaryRow>;
  countByDetectionType(): Promise<Array<CountRow<string>>>;
  /** Buckets by hour of day (0-23) in the given IANA time zone. */
  countByHour(timeZone: string): Promise<Array<CountRow<number>>>;
  countByLocation(): Promise<Array<CountRow<string>>>;
}

export const EMPTY_SUMMARY: SummaryRow = {
  totalDetections: 0,
  totalAlerts: 0,
  avgConfidence: null,
};
