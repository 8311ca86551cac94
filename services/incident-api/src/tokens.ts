export const APP_CONFIG = "APP_CONFIG";
export const INCIDENT_REPOSITORY = "INCIDENT_REPOSITORY";
export const EVIDENCE_STORAGE = "EVIDENCE_STORAGE";
export const INCIDENT_DETECTOR = "INCIDENT_DETECTOR";
