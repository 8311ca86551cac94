import { Schema } from "mongoose";
import type { Connection, Model } from "mongoose";

import { DETECTION_TYPES } from "../types.js";

export interface IncidentDocument {
  detection_type: string;
  confidence: number;
  location_id: string;
  timestamp: Date;
  status: string;
  evidence_path: string;
}

export const incidentSchema = new Schema<IncidentDocument>(
  {
    detection_type: { type: String, enum: [...DETECTION_TYPES], required: true, index: true },
    confidence: { type: Number, required: true, min: 85, max: 100 },
    location_id: { type: String, required: true, index: true },
    timestamp: { type: Date, required: true, default: Date.now, index: true },
    status: { type: String, required: true, default: "Unresolved" },
    evidence_path: { type: String, required: true },
  },
  {
    versionKey: false,
  },
);

export function bindIncidentModel(connection: Connection, collection: string): Model<IncidentDocument> {
  return connection.model<IncidentDocument>("Incident", incidentSchema, collection);
}
