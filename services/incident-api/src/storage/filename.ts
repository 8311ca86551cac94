import { randomBytes } from "node:crypto";

const EVIDENCE_EXTENSION = ".jpg";

/**
 * Reduces an arbitrary string to a safe single path segment: ASCII letters,
 * digits, `_`, `.` and `-` only, whitespace and separators folded to `_`,
 * no leading or trailing dots or underscores.
 */
export function sanitizeFileName(name: string): string {
  const ascii = name.normalize("NFKD").replace(/[^\u0000-\u007f]/g, "");
  const words = ascii.replace(/[/\\]/g, " ").trim().split(/\s+/);
  return words
    .join("_")
    .replace(/[^A-Za-z0-9_.-]/g, "")
    .replace(/^[._]+|[._]+$/g, "");
}

const pad = (value: number): string => String(value).padStart(2, "0");

export function formatTimestamp(at: Date): string {
  const date = `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}`;
  const time = `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`;
  return `${date}_${time}`;
}

export function randomSuffix(): string {
  return randomBytes(3).toString("hex");
}

export function buildEvidenceFileName(locationId: string, at: Date, suffix: string = randomSuffix()): string {
  return sanitizeFileName(`${locationId}_${formatTimestamp(at)}_${suffix}${EVIDENCE_EXTENSION}`);
}
