import { Injectable } from "@nestjs/common";

import type { EvidenceStorage, StoredEvidence } from "./evidence.storage.js";

@Injectable()
export class InMemoryEvidenceStorage implements EvidenceStorage {
  private readonly records = new Map<string, StoredEvidence & { data: Buffer }>();

  async store(fileName: string, buffer: Buffer, contentType: string): Promise<StoredEvidence> {
    const record: StoredEvidence & { data: Buffer } = {
      fileName,
      path: `memory://${fileName}`,
      contentType,
      size: buffer.length,
      data: Buffer.from(buffer),
    };
    this.records.set(fileName, record);
    return {
      fileName: record.fileName,
      path: record.path,
      contentType: record.contentType,
      size: record.size,
    };
  }

  get(fileName: string): (StoredEvidence & { data: Buffer }) | undefined {
    return this.records.get(fileName);
  }

  list(): string[] {
    return Array.from(this.records.keys());
  }
}
