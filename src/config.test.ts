import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      databaseUrl: null,
      port: 3000,
      authSecret: "dev-secret",
      signalCacheTtlMs: 24 * 60 * 60 * 1000,
      signalCacheEnabled: true,
      referenceDate: null,
      logLevel: "info",
    });
  });

  it("prefers the non-pooling connection string", () => {
    const config = loadConfig({
      DATABASE_URL: "postgres://localhost/db",
      POSTGRES_URL_NON_POOLING: "postgres://localhost/direct",
    });

    expect(config.databaseUrl).toBe("postgres://localhost/direct");
  });

  it("parses overrides and treats empty values as unset", () => {
    const config = loadConfig({
      PORT: "8080",
      SIGNAL_CACHE_TTL_HOURS: "2",
      SIGNAL_CACHE_ENABLED: "false",
      REFERENCE_DATE: "2025-05-15",
      LOG_LEVEL: "",
    });

    expect(config.port).toBe(8080);
    expect(config.signalCacheTtlMs).toBe(2 * 60 * 60 * 1000);
    expect(config.signalCacheEnabled).toBe(false);
    expect(config.referenceDate).toBe("2025-05-15");
    expect(config.logLevel).toBe("info");
  });

  it("fails fast on invalid values", () => {
    expect(() => loadConfig({ REFERENCE_DATE: "15/05/2025" })).toThrow();
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow();
  });
});
