import { Injectable, Logger } from "@nestjs/common";
import type { OnModuleDestroy } from "@nestjs/common";
import mongoose from "mongoose";
import type { Connection, Model } from "mongoose";

import type { DatabaseConfig } from "../config.js";
import type { DetectionType, IncidentRecord } from "../types.js";
import { EMPTY_SUMMARY } from "./incident.repository.js";
import type { CountRow, IncidentRepository, SummaryRow } from "./incident.repository.js";
import { bindIncidentModel } from "./incident.model.js";
import type { IncidentDocument } from "./incident.model.js";
import {
  detectionTypePipeline,
  hourlyPipeline,
  locationPipeline,
  summaryPipeline,
} from "./pipelines.js";
import type { GroupCount, SummaryAggregate } from "./pipelines.js";

const toRows = <K>(groups: Array<GroupCount<K>>): Array<CountRow<K>> =>
  groups.map((group) => ({ key: group._id, count: group.count }));

@Injectable()
export class MongoIncidentRepository implements IncidentRepository, OnModuleDestroy {
  readonly available = true;
  private readonly logger = new Logger(MongoIncidentRepository.name);
  private readonly incidents: Model<IncidentDocument>;
  private initialized = false;

  constructor(private readonly connection: Connection, private readonly config: DatabaseConfig) {
    this.incidents = bindIncidentModel(connection, config.collection);
  }

  static fromUri(uri: string, config: DatabaseConfig): MongoIncidentRepository {
    const connection = mongoose.createConnection(uri, {
      dbName: config.dbName,
      serverSelectionTimeoutMS: config.connectTimeoutMs,
    });
    return new MongoIncidentRepository(connection, config);
  }

  /** Waits for the initial connection and pings the server once. */
  async init(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await this.connection.asPromise();
    const db = this.connection.db;
    if (!db) {
      throw new Error("MongoDB connection has no database handle");
    }
    await db.admin().ping();
    this.initialized = true;
    this.logger.log(`MongoDB incident repository ready (${this.config.dbName}.${this.config.collection})`);
  }

  async save(record: IncidentRecord): Promise<string | null> {
    const created = await this.incidents.create({
      detection_type: record.detectionType,
      confidence: record.confidence,
      location_id: record.locationId,
      timestamp: record.timestamp,
      status: record.status,
      evidence_path: record.evidencePath,
    });
    return String(created._id);
  }

  async summarize(alertTypes: readonly DetectionType[]): Promise<SummaryRow> {
    const [summary] = await this.incidents.aggregate<SummaryAggregate>(summaryPipeline(alertTypes)).exec();
    if (!summary) {
      return { ...EMPTY_SUMMARY };
    }
    return {
      totalDetections: summary.totalDetections,
      totalAlerts: summary.totalAlerts,
      avgConfidence: summary.avgConfidence,
    };
  }

  async countByDetectionType(): Promise<Array<CountRow<string>>> {
    return toRows(await this.incidents.aggregate<GroupCount<string>>(detectionTypePipeline()).exec());
  }

  async countByHour(timeZone: string): Promise<Array<CountRow<number>>> {
    return toRows(await this.incidents.aggregate<GroupCount<number>>(hourlyPipeline(timeZone)).exec());
  }

  async countByLocation(): Promise<Array<CountRow<string>>> {
    return toRows(await this.incidents.aggregate<GroupCount<string>>(locationPipeline()).exec());
  }

  async close(): Promise<void> {
    await this.connection.close();
  }

  async onModuleDestroy(): Promise<void> {
    await this.close();
  }
}
