export type DetectionType =
  | 'Litter Detected'
  | 'Overflowing Bin'
  | 'Spill Detected'
  | 'Scattered Trash'
  | 'Debris Found'
  | 'Graffiti';

export interface DetectAndReportRequest {
  image: Blob;
  fileName?: string;
  locationId?: string;
}

export interface DetectAndReportResponse {
  success: true;
  incident_id: string | null;
  location: string;
  detection_type: DetectionType;
  confidence: number;
  is_alert: boolean;
}

export interface ReportSummary {
  totalDetections: number;
  totalAlerts: number;
  avgConfidence: string;
}

export interface LocationScore {
  location: string;
  score: number;
}

export interface ReportsResponse {
  generatedAt: string;
  summary: ReportSummary;
  detectionTypes: Record<string, number>;
  hourlyData: number[];
  heatmapData: LocationScore[];
}

export interface ApiErrorResponse {
  success: false;
  message: string;
}
