import { MAX_EVICTION_INTERVAL_MINUTES, loadGuardPolicy, loadServiceConfig } from "../config";
import { ConfigurationError } from "../guard/errors";
import { DEFAULT_POLICY } from "../guard/policy";

describe("loadGuardPolicy", () => {
  it("falls back to the defaults", () => {
    expect(loadGuardPolicy({})).toEqual(DEFAULT_POLICY);
  });

  it("reads overrides from the environment", () => {
    const policy = loadGuardPolicy({
      DIVERSITY_SIMILARITY_THRESHOLD: "0.8",
      DIVERSITY_MAX_ATTEMPTS_REROLL: "3",
      DIVERSITY_WEIGHT_TITLE: "0",
      DIVERSITY_FINAL_OUTCOME: "fail",
      USE_EMBEDDINGS: "yes",
    });
    expect(policy.similarityThreshold).toBe(0.8);
    expect(policy.maxAttemptsReroll).toBe(3);
    expect(policy.weights).toEqual({ ingredients: 0.55, title: 0, structure: 0.1, tags: 0.1 });
    expect(policy.finalOutcome).toBe("fail");
    expect(policy.useEmbeddings).toBe(true);
  });

  it("treats blank values as unset", () => {
    expect(loadGuardPolicy({ DIVERSITY_WINDOW_DAYS: "  " }).windowDays).toBe(7);
  });

  it("names the variable that failed to parse", () => {
    expect(() => loadGuardPolicy({ DIVERSITY_WINDOW_DAYS: "abc" })).toThrow(
      'DIVERSITY_WINDOW_DAYS: must be a number (got "abc")',
    );
    expect(() => loadGuardPolicy({ USE_EMBEDDINGS: "maybe" })).toThrow(ConfigurationError);
    expect(() => loadGuardPolicy({ DIVERSITY_FINAL_OUTCOME: "explode" })).toThrow(
      'DIVERSITY_FINAL_OUTCOME: must be one of: surface_last, fail (got "explode")',
    );
  });

  it("runs range checks on parsed values", () => {
    expect(() => loadGuardPolicy({ DIVERSITY_PER_COMBO_CAP: "0" })).toThrow(
      "perComboCap: must be an integer >= 1 (got 0)",
    );
  });
});

describe("loadServiceConfig", () => {
  it("defaults to the in-memory store", () => {
    const config = loadServiceConfig({});
    expect(config.port).toBe(3001);
    expect(config.store).toBe("memory");
    expect(config.temperature).toBe(0.6);
    expect(config.embeddings).toBeUndefined();
    expect(config.evictionIntervalMinutes).toBe(60);
  });

  it("requires DATABASE_URL for the postgres store", () => {
    expect(() => loadServiceConfig({ DIVERSITY_STORE: "postgres" })).toThrow(
      "DATABASE_URL: required when DIVERSITY_STORE=postgres",
    );
    const config = loadServiceConfig({ DIVERSITY_STORE: "postgres", DATABASE_URL: "postgres://localhost/test" });
    expect(config.databaseUrl).toBe("postgres://localhost/test");
  });

  it("builds embeddings settings only when a URL is set", () => {
    const config = loadServiceConfig({ EMBEDDINGS_URL: "http://localhost:8080/v1/embeddings", EMBEDDINGS_API_KEY: "test-secret" });
    expect(config.embeddings).toEqual({
      url: "http://localhost:8080/v1/embeddings",
      apiKey: "test-secret",
      model: "text-embedding-3-small",
    });
  });

  it("rejects a temperature above 1", () => {
    expect(() => loadServiceConfig({ RECIPE_TEMPERATURE: "1.5" })).toThrow(
      "RECIPE_TEMPERATURE: must be between 0 and 1",
    );
  });

  it("keeps the eviction interval within what a timer can hold", () => {
    expect(MAX_EVICTION_INTERVAL_MINUTES).toBe(35791);
    expect(loadServiceConfig({ DIVERSITY_EVICTION_INTERVAL_MINUTES: "35791" }).evictionIntervalMinutes).toBe(35791);
    expect(() => loadServiceConfig({ DIVERSITY_EVICTION_INTERVAL_MINUTES: "35792" })).toThrow(
      "DIVERSITY_EVICTION_INTERVAL_MINUTES: must be positive and at most 35791 (got 35792)",
    );
    expect(() => loadServiceConfig({ DIVERSITY_EVICTION_INTERVAL_MINUTES: "0" })).toThrow(ConfigurationError);
  });
});
