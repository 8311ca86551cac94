import { Inject, Injectable, Logger } from "@nestjs/common";

import {
  buildDetectionTypes,
  buildHeatmap,
  buildHourlyData,
  buildSummary,
  fallbackReport,
} from "../analytics.js";
import type { AppConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import type { IncidentRepository } from "../repository/incident.repository.js";
import { ALERT_TYPES } from "../types.js";
import type { IncidentReport } from "../types.js";
import { APP_CONFIG, INCIDENT_REPOSITORY } from "../tokens.js";

@Injectable()
export class AnalyticsService {
  private readonly logger = new Logger(AnalyticsService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(INCIDENT_REPOSITORY) private readonly repository: IncidentRepository,
  ) {}

  async getReport(now: Date = new Date()): Promise<IncidentReport> {
    if (!this.repository.available) {
      return fallbackReport(now);
    }

    try {
      const [summary, types, hours, locations] = await Promise.all([
        this.repository.summarize(ALERT_TYPES),
        this.repository.countByDetectionType(),
        this.repository.countByHour(this.config.reportTimeZone),
        this.repository.countByLocation(),
      ]);

      return {
        generatedAt: now.toISOString(),
        summary: buildSummary(summary),
        detectionTypes: buildDetectionTypes(types),
        hourlyData: buildHourlyData(hours),
        heatmapData: buildHeatmap(locations),
      };
    } catch (error) {
      this.logger.error(`Incident aggregation failed, serving defaults: ${errorMessage(error)}`);
      return fallbackReport(now);
    }
  }
}
