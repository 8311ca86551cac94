import { Injectable } from "@nestjs/common";

import { hourOfDay } from "../analytics.js";
import type { DetectionType, IncidentRecord } from "../types.js";
import type { CountRow, IncidentRepository, SummaryRow } from "./incident.repository.js";

function countBy<K>(records: IncidentRecord[], keyOf: (record: IncidentRecord) => K): Array<CountRow<K>> {
  const counts = new Map<K, number>();
  for (const record of records) {
    const key = keyOf(record);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return Array.from(counts, ([key, count]) => ({ key, count }));
}

@Injectable()
export class InMemoryIncidentRepository implements IncidentRepository {
  readonly available = true;
  private readonly store = new Map<string, IncidentRecord>();
  private sequence = 0;

  async save(record: IncidentRecord): Promise<string | null> {
    this.sequence += 1;
    const id = `incident-${this.sequence}`;
    this.store.set(id, { ...record, timestamp: new Date(record.timestamp) });
    return id;
  }

  async find(id: string): Promise<IncidentRecord | undefined> {
    const value = this.store.get(id);
    return value ? { ...value, timestamp: new Date(value.timestamp) } : undefined;
  }

  async summarize(alertTypes: readonly DetectionType[]): Promise<SummaryRow> {
    const records = this.records();
    if (records.length === 0) {
      return { totalDetections: 0, totalAlerts: 0, avgConfidence: null };
    }
    const total = records.reduce((sum, record) => sum + record.confidence, 0);
    return {
      totalDetections: records.length,
      totalAlerts: records.filter((record) => alertTypes.includes(record.detectionType)).length,
      avgConfidence: total / records.length,
    };
  }

  async countByDetectionType(): Promise<Array<CountRow<string>>> {
    return countBy(this.records(), (record) => record.detectionType);
  }

  async countByHour(timeZone: string): Promise<Array<CountRow<number>>> {
    return countBy(this.records(), (record) => hourOfDay(record.timestamp, timeZone));
  }

  async countByLocation(): Promise<Array<CountRow<string>>> {
    return countBy(this.records(), (record) => record.locationId);
  }

  private records(): IncidentRecord[] {
    return Array.from(this.store.values());
  }
}
