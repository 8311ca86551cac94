export interface StoredEvidence {
  fileName: string;
  path: string;
  contentType: string;
  size: number;
}

export interface EvidenceStorage {
  store(fileName: string, buffer: Buffer, contentType: string): Promise<StoredEvidence>;
}
