import type { IncidentSummary, LocationScore } from "../types.js";

export class ReportsResponseDto {
  generatedAt!: string;
  summary!: IncidentSummary;
  detectionTypes!: Record<string, number>;
  hourlyData!: number[];
  heatmapData!: LocationScore[];
}
