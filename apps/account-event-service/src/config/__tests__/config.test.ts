import { loadConfig } from "../index";
import { createLogger } from "../logger";

describe("loadConfig", () => {
  it("should apply defaults for an empty environment", () => {
    const cfg = loadConfig({});

    expect(cfg.port).toBe(3000);
    expect(cfg.nodeEnv).toBe("development");
    expect(cfg.logLevel).toBe("info");
    expect(cfg.salesforce).toEqual({
      instanceUrl: "",
      accessToken: "",
      apiVersion: "v59.0",
      timeoutMs: 10_000,
    });
    expect(cfg.events).toEqual({
      queue: "account-events",
      source: "account-event-service",
      publishTimeoutMs: 5_000,
      publishRetries: 0,
      publishRetryDelayMs: 200,
    });
    expect(cfg.idempotencyTtlMs).toBe(86_400_000);
  });

  it("should read values from the environment", () => {
    const cfg = loadConfig({
      PORT: "8080",
      NODE_ENV: "production",
      SALESFORCE_INSTANCE_URL: "https://example.my.salesforce.test",
      SALESFORCE_ACCESS_TOKEN: "test-token",
      SALESFORCE_API_VERSION: "v60.0",
      RECORD_TIMEOUT_MS: "2500",
      ACCOUNT_EVENTS_QUEUE: "accounts-prod",
      EVENT_SOURCE: "crm-intake",
      PUBLISH_RETRIES: "2",
    });

    expect(cfg.port).toBe(8080);
    expect(cfg.nodeEnv).toBe("production");
    expect(cfg.salesforce.instanceUrl).toBe("https://example.my.salesforce.test");
    expect(cfg.salesforce.apiVersion).toBe("v60.0");
    expect(cfg.salesforce.timeoutMs).toBe(2500);
    expect(cfg.events.queue).toBe("accounts-prod");
    expect(cfg.events.source).toBe("crm-intake");
    expect(cfg.events.publishRetries).toBe(2);
  });

  it("should accept any NODE_ENV value", () => {
    expect(loadConfig({ NODE_ENV: "staging" }).nodeEnv).toBe("staging");
  });

  it("should treat blank variables as unset", () => {
    expect(loadConfig({ PORT: "  ", ACCOUNT_EVENTS_QUEUE: "" }).events.queue).toBe("account-events");
  });

  it("should name the offending variable", () => {
    expect(() => loadConfig({ RECORD_TIMEOUT_MS: "soon" })).toThrow(/RECORD_TIMEOUT_MS/);
    expect(() => loadConfig({ SALESFORCE_API_VERSION: "59" })).toThrow(
      "Invalid configuration: SALESFORCE_API_VERSION: expected a version like v59.0"
    );
  });

  it("should reject an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(/LOG_LEVEL/);
  });
});

describe("createLogger", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("should prefix messages with the tag", () => {
    const info = jest.spyOn(console, "log").mockImplementation(() => undefined);

    createLogger("pipeline", "info").info("Responded", { statusCode: 200 });

    expect(info).toHaveBeenCalledWith("[pipeline] Responded", { statusCode: 200 });
  });

  it("should drop messages below the level", () => {
    const debug = jest.spyOn(console, "debug").mockImplementation(() => undefined);
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);

    const log = createLogger("pipeline", "warn");
    log.debug("noise");
    log.warn("careful");

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[pipeline] careful");
  });
});
