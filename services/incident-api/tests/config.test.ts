import { describe, expect, it } from "vitest";

import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config).toEqual({
      port: 5000,
      database: {
        uri: undefined,
        dbName: "CampusCleanlinessDB",
        collection: "incidents",
        connectTimeoutMs: 5000,
      },
      uploadDir: "uploads",
      reportTimeZone: Intl.DateTimeFormat().resolvedOptions().timeZone,
      corsOrigin: "*",
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      PORT: "8081",
      MONGO_URI: " mongodb://db.internal:27017/ ",
      MONGO_DB_NAME: "CleanlinessStaging",
      MONGO_COLLECTION: "reports",
      MONGO_CONNECT_TIMEOUT_MS: "1500",
      UPLOAD_DIR: "/var/lib/evidence",
      REPORT_TIMEZONE: "Asia/Kolkata",
      CORS_ORIGIN: "https://dashboard.example.test",
    });

    expect(config.port).toBe(8081);
    expect(config.database).toEqual({
      uri: "mongodb://db.internal:27017/",
      dbName: "CleanlinessStaging",
      collection: "reports",
      connectTimeoutMs: 1500,
    });
    expect(config.uploadDir).toBe("/var/lib/evidence");
    expect(config.reportTimeZone).toBe("Asia/Kolkata");
    expect(config.corsOrigin).toBe("https://dashboard.example.test");
  });

  it("treats a blank MONGO_URI as unset", () => {
    expect(loadConfig({ MONGO_URI: "  " }).database.uri).toBeUndefined();
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ PORT: "not-a-port" })).toThrow(/Invalid configuration: PORT/);
    expect(() => loadConfig({ REPORT_TIMEZONE: "Mars/Olympus_Mons" })).toThrow(
      "REPORT_TIMEZONE: REPORT_TIMEZONE must be an IANA time zone",
    );
  });
});
