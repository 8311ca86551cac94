import type { CountRow, SummaryRow } from "./repository/incident.repository.js";
import type { IncidentReport, IncidentSummary, LocationScore } from "./types.js";

const HOURS_PER_DAY = 24;
const MAX_SCORE = 100;
const PENALTY_PER_ISSUE = 5;

export const FALLBACK_LOCATIONS = [
  "Main Library",
  "Student Cafeteria",
  "Engineering Block",
  "Sports Complex",
  "Hostel Block A",
] as const;

export function scoreLocation(issueCount: number): number {
  return Math.max(0, MAX_SCORE - PENALTY_PER_ISSUE * issueCount);
}

// Matches a value sitting exactly halfway between two tenths, e.g. 88.25.
const EXACT_TIE = /^(\d+)\.(\d)50*$/;

/** One decimal, ties to the even tenth (88.25 -> 88.2, 88.75 -> 88.8). */
export function formatConfidence(average: number | null): string {
  if (!average) {
    return "0%";
  }
  const tie = EXACT_TIE.exec(average.toFixed(20));
  if (tie && Number(tie[2]) % 2 === 0) {
    return `${tie[1]}.${tie[2]}%`;
  }
  return `${average.toFixed(1)}%`;
}

export function buildSummary(row: SummaryRow): IncidentSummary {
  return {
    totalDetections: row.totalDetections,
    totalAlerts: row.totalAlerts,
    avgConfidence: formatConfidence(row.avgConfidence),
  };
}

export function buildDetectionTypes(rows: Array<CountRow<string>>): Record<string, number> {
  const histogram: Record<string, number> = {};
  for (const row of rows) {
    histogram[row.key] = row.count;
  }
  return histogram;
}

export function buildHourlyData(rows: Array<CountRow<number>>): number[] {
  const hours = new Array<number>(HOURS_PER_DAY).fill(0);
  for (const row of rows) {
    if (Number.isInteger(row.key) && row.key >= 0 && row.key < HOURS_PER_DAY) {
      hours[row.key] = row.count;
    }
  }
  return hours;
}

/** Busiest locations first; equal counts fall back to name order. */
export function buildHeatmap(rows: Array<CountRow<string>>): LocationScore[] {
  return [...rows]
    .sort((a, b) => b.count - a.count || a.key.localeCompare(b.key))
    .map((row) => ({ location: row.key, score: scoreLocation(row.count) }));
}

export function fallbackReport(generatedAt: Date): IncidentReport {
  return {
    generatedAt: generatedAt.toISOString(),
    summary: { totalDetections: 0, totalAlerts: 0, avgConfidence: "0%" },
    detectionTypes: {},
    hourlyData: new Array<number>(HOURS_PER_DAY).fill(0),
    heatmapData: FALLBACK_LOCATIONS.map((location) => ({ location, score: MAX_SCORE })),
  };
}

export function hourOfDay(date: Date, timeZone: string): number {
  const formatter = new Intl.DateTimeFormat("en-US", { hour: "numeric", hourCycle: "h23", timeZone });
  const hour = formatter.formatToParts(date).find((part) => part.type === "hour");
  return Number(hour?.value ?? 0) % HOURS_PER_DAY;
}
