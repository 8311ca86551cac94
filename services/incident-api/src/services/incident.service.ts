import { Inject, Injectable, Logger } from "@nestjs/common";

import type { DetectResponseDto } from "../dto/detect-response.dto.js";
import type { IncidentDetector } from "../detectors/detector.js";
import { EvidenceStorageError, InferenceError, errorMessage } from "../errors.js";
import type { IncidentRepository } from "../repository/incident.repository.js";
import type { EvidenceStorage, StoredEvidence } from "../storage/evidence.storage.js";
import { buildEvidenceFileName } from "../storage/filename.js";
import { DEFAULT_LOCATION } from "../types.js";
import type { DetectionResult, IncidentRecord } from "../types.js";
import { EVIDENCE_STORAGE, INCIDENT_DETECTOR, INCIDENT_REPOSITORY } from "../tokens.js";

export interface UploadedImage {
  buffer: Buffer;
  mimetype: string;
}

export function resolveLocation(locationId: string | string[] | undefined): string {
  const first = Array.isArray(locationId) ? locationId[0] : locationId;
  const trimmed = first?.trim();
  return trimmed ? trimmed : DEFAULT_LOCATION;
}

@Injectable()
export class IncidentService {
  private readonly logger = new Logger(IncidentService.name);

  constructor(
    @Inject(EVIDENCE_STORAGE) private readonly storage: EvidenceStorage,
    @Inject(INCIDENT_DETECTOR) private readonly detector: IncidentDetector,
    @Inject(INCIDENT_REPOSITORY) private readonly repository: IncidentRepository,
  ) {}

  async detectAndReport(image: UploadedImage, locationId?: string | string[]): Promise<DetectResponseDto> {
    const location = resolveLocation(locationId);
    const receivedAt = new Date();

    const evidence = await this.storeEvidence(image, location, receivedAt);
    const result = await this.runDetection(image, evidence);
    const incidentId = await this.logIncident({
      detectionType: result.detectionType,
      confidence: result.confidence,
      locationId: location,
      timestamp: receivedAt,
      status: "Unresolved",
      evidencePath: evidence.path,
    });

    return {
      success: true,
      incident_id: incidentId,
      location,
      detection_type: result.detectionType,
      confidence: result.confidence,
      is_alert: result.isAlert,
    };
  }

  private async storeEvidence(image: UploadedImage, location: string, receivedAt: Date): Promise<StoredEvidence> {
    const fileName = buildEvidenceFileName(location, receivedAt);
    try {
      return await this.storage.store(fileName, image.buffer, image.mimetype || "application/octet-stream");
    } catch (error) {
      this.logger.error(`Failed to store evidence ${fileName}: ${errorMessage(error)}`);
      throw new EvidenceStorageError(`Failed to store evidence image: ${errorMessage(error)}`);
    }
  }

  private async runDetection(image: UploadedImage, evidence: StoredEvidence): Promise<DetectionResult> {
    try {
      return await this.detector.detect({
        evidencePath: evidence.path,
        buffer: image.buffer,
        contentType: evidence.contentType,
      });
    } catch (error) {
      this.logger.error(`Inference failed for ${evidence.path}: ${errorMessage(error)}`);
      throw new InferenceError(`AI model inference failed: ${errorMessage(error)}`);
    }
  }

  private async logIncident(record: IncidentRecord): Promise<string | null> {
    if (!this.repository.available) {
      this.logger.warn(`Incident store unavailable; ${record.detectionType} at ${record.locationId} not persisted`);
      return null;
    }
    try {
      return await this.repository.save(record);
    } catch (error) {
      this.logger.error(`Failed to persist incident for ${record.locationId}: ${errorMessage(error)}`);
      return null;
    }
  }
}
