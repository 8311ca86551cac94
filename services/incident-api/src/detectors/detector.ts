import type { DetectionResult } from "../types.js";

export interface DetectionInput {
  evidencePath: string;
  buffer: Buffer;
  contentType: string;
}

/**
 * Anything that can turn an uploaded image into a labelled detection.
 * Callers rely only on the label, the confidence (0-100) and the derived alert flag.
 */
export interface IncidentDetector {
  detect(input: DetectionInput): Promise<DetectionResult>;
}
