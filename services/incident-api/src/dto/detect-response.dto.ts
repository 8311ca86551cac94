import type { DetectionType } from "../types.js";

export class DetectResponseDto {
  success!: true;
  incident_id!: string | null;
  location!: string;
  detection_type!: DetectionType;
  confidence!: number;
  is_alert!: boolean;
}
