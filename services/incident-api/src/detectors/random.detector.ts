import { DETECTION_TYPES, isAlert } from "../types.js";
import type { DetectionResult } from "../types.js";
import type { DetectionInput, IncidentDetector } from "./detector.js";

const MIN_CONFIDENCE = 85;
const CONFIDENCE_SPREAD = 15;

export type RandomSource = () => number;

/**
 * Stand-in for a real model: picks a label uniformly and a confidence
 * uniformly in [85, 100], rounded to one decimal.
 */
export class RandomIncidentDetector implements IncidentDetector {
  constructor(private readonly random: RandomSource = Math.random) {}

  async detect(_input: DetectionInput): Promise<DetectionResult> {
    const index = Math.min(Math.floor(this.random() * DETECTION_TYPES.length), DETECTION_TYPES.length - 1);
    const detectionType = DETECTION_TYPES[index];
    const confidence = Math.round((MIN_CONFIDENCE + this.random() * CONFIDENCE_SPREAD) * 10) / 10;

    return {
      detectionType,
      confidence,
      isAlert: isAlert(detectionType),
    };
  }
}
