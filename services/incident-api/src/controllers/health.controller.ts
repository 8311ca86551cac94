import { Controller, Get, Header, Inject } from "@nestjs/common";

import type { AppConfig } from "../config.js";
import type { IncidentRepository } from "../repository/incident.repository.js";
import { APP_CONFIG, INCIDENT_REPOSITORY } from "../tokens.js";

@Controller()
export class HealthController {
  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(INCIDENT_REPOSITORY) private readonly repository: IncidentRepository,
  ) {}

  @Get()
  @Header("Content-Type", "text/plain; charset=utf-8")
  health(): string {
    const store = this.repository.available
      ? `connected to ${this.config.database.dbName}`
      : "unavailable";
    return `Campus Cleanliness Monitoring API is running (store: ${store}).`;
  }
}
