export const DETECTION_TYPES = [
  "Litter Detected",
  "Overflowing Bin",
  "Spill Detected",
  "Scattered Trash",
  "Debris Found",
  "Graffiti",
] as const;

export type DetectionType = (typeof DETECTION_TYPES)[number];

export const ALERT_TYPES: readonly DetectionType[] = ["Overflowing Bin", "Spill Detected", "Graffiti"];

export const DEFAULT_LOCATION = "Unknown Zone";

export type IncidentStatus = "Unresolved";

export interface DetectionResult {
  detectionType: DetectionType;
  confidence: number;
  isAlert: boolean;
}

export interface IncidentRecord {
  detectionType: DetectionType;
  confidence: number;
  locationId: string;
  timestamp: Date;
  status: IncidentStatus;
  evidencePath: string;
}

export interface IncidentSummary {
  totalDetections: number;
  totalAlerts: number;
  avgConfidence: string;
}

export interface LocationScore {
  location: string;
  score: number;
}

export interface IncidentReport {
  generatedAt: string;
  summary: IncidentSummary;
  detectionTypes: Record<string, number>;
  hourlyData: number[];
  heatmapData: LocationScore[];
}

export function isAlert(detectionType: string): boolean {
  return ALERT_TYPES.some((type) => type === detectionType);
}
