import { Logger, Module, ValidationPipe } from "@nestjs/common";

import { DetectController } from "./controllers/detect.controller.js";
import { HealthController } from "./controllers/health.controller.js";
import { ReportsController } from "./controllers/reports.controller.js";
import { loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { RandomIncidentDetector } from "./detectors/random.detector.js";
import { errorMessage } from "./errors.js";
import type { IncidentRepository } from "./repository/incident.repository.js";
import { MongoIncidentRepository } from "./repository/mongo.repository.js";
import { UnavailableIncidentRepository } from "./repository/unavailable.repository.js";
import { AnalyticsService } from "./services/analytics.service.js";
import { IncidentService } from "./services/incident.service.js";
import { LocalEvidenceStorage } from "./storage/local.storage.js";
import { APP_CONFIG, EVIDENCE_STORAGE, INCIDENT_DETECTOR, INCIDENT_REPOSITORY } from "./tokens.js";

const logger = new Logger("IncidentStore");

export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    transform: true,
  });
}

const configProvider = {
  provide: APP_CONFIG,
  useFactory: () => loadConfig(),
};

const storageProvider = {
  provide: EVIDENCE_STORAGE,
  inject: [APP_CONFIG],
  useFactory: async (config: AppConfig) => {
    const storage = new LocalEvidenceStorage(config.uploadDir);
    await storage.init();
    return storage;
  },
};

const detectorProvider = {
  provide: INCIDENT_DETECTOR,
  useFactory: () => new RandomIncidentDetector(),
};

export async function selectIncidentRepository(config: AppConfig): Promise<IncidentRepository> {
  const { uri } = config.database;
  if (!uri) {
    logger.warn("MONGO_URI not set; incidents will not be persisted");
    return new UnavailableIncidentRepository();
  }
  const repository = MongoIncidentRepository.fromUri(uri, config.database);
  try {
    await repository.init();
    return repository;
  } catch (error) {
    logger.error(`Could not connect to MongoDB, running without a store: ${errorMessage(error)}`);
    await repository.close().catch((closeError: unknown) => {
      logger.warn(`Failed to close MongoDB connection: ${errorMessage(closeError)}`);
    });
    return new UnavailableIncidentRepository();
  }
}

const repositoryProvider = {
  provide: INCIDENT_REPOSITORY,
  inject: [APP_CONFIG],
  useFactory: (config: AppConfig) => selectIncidentRepository(config),
};

@Module({
  imports: [],
  controllers: [HealthController, DetectController, ReportsController],
  providers: [
    configProvider,
    storageProvider,
    detectorProvider,
    repositoryProvider,
    IncidentService,
    AnalyticsService,
  ],
})
export class AppModule {}
