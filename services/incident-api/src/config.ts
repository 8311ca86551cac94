import { z } from "zod";

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const isTimeZone = (value: string): boolean => {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: value });
    return true;
  } catch {
    return false;
  }
};

export const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  MONGO_URI: optionalString,
  MONGO_DB_NAME: z.string().trim().min(1).default("CampusCleanlinessDB"),
  MONGO_COLLECTION: z.string().trim().min(1).default("incidents"),
  MONGO_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  UPLOAD_DIR: z.string().trim().min(1).default("uploads"),
  REPORT_TIMEZONE: optionalString.refine((value) => value === undefined || isTimeZone(value), {
    message: "REPORT_TIMEZONE must be an IANA time zone",
  }),
  CORS_ORIGIN: z.string().trim().min(1).default("*"),
});

export interface DatabaseConfig {
  uri?: string;
  dbName: string;
  collection: string;
  connectTimeoutMs: number;
}

export interface AppConfig {
  port: number;
  database: DatabaseConfig;
  uploadDir: string;
  reportTimeZone: string;
  corsOrigin: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const values = parsed.data;
  return {
    port: values.PORT,
    database: {
      uri: values.MONGO_URI,
      dbName: values.MONGO_DB_NAME,
      collection: values.MONGO_COLLECTION,
      connectTimeoutMs: values.MONGO_CONNECT_TIMEOUT_MS,
    },
    uploadDir: values.UPLOAD_DIR,
    reportTimeZone: values.REPORT_TIMEZONE ?? Intl.DateTimeFormat().resolvedOptions().timeZone,
    corsOrigin: values.CORS_ORIGIN,
  };
}
