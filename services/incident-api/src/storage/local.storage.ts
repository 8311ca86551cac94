import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { Injectable, Logger } from "@nestjs/common";

import type { EvidenceStorage, StoredEvidence } from "./evidence.storage.js";

@Injectable()
export class LocalEvidenceStorage implements EvidenceStorage {
  private readonly logger = new Logger(LocalEvidenceStorage.name);
  private initialized = false;

  constructor(private readonly directory: string) {}

  async init(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await mkdir(this.directory, { recursive: true });
    this.initialized = true;
    this.logger.log(`Evidence directory ready at ${path.resolve(this.directory)}`);
  }

  async store(fileName: string, buffer: Buffer, contentType: string): Promise<StoredEvidence> {
    if (!this.initialized) {
      await this.init();
    }
    const target = path.join(this.directory, fileName);
    await writeFile(target, buffer);
    this.logger.debug(`Stored ${buffer.length} bytes of evidence at ${target}`);
    return {
      fileName,
      path: target,
      contentType,
      size: buffer.length,
    };
  }
}
