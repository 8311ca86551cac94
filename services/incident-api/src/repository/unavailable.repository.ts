import type { IncidentRecord } from "../types.js";
import { EMPTY_SUMMARY } from "./incident.repository.js";
import type { CountRow, IncidentRepository, SummaryRow } from "./incident.repository.js";

export class UnavailableIncidentRepository implements IncidentRepository {
  readonly available = false;

  async save(_record: IncidentRecord): Promise<string | null> {
    return null;
  }

  async summarize(): Promise<SummaryRow> {
    return { ...EMPTY_SUMMARY };
  }

  async countByDetectionType(): Promise<Array<CountRow<string>>> {
    return [];
  }

  async countByHour(): Promise<Array<CountRow<number>>> {
    return [];
  }

  async countByLocation(): Promise<Array<CountRow<string>>> {
    return [];
  }
}
