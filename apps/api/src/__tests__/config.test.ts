import { describe, it, expect } from "vitest";
import { DEFAULT_SEED, loadConfig } from "../services/config.js";
import { ConfigurationError } from "../services/errors.js";

describe("loadConfig", () => {
  it("falls back to defaults on an empty environment", () => {
    expect(loadConfig({})).toEqual({
      oracle: { provider: "mock", model: undefined, apiKey: undefined, timeoutMs: 15_000 },
      acceptThreshold: 0.8,
      maxTravelHours: 6,
      seed: DEFAULT_SEED,
      concurrency: 1,
      demonstrations: 2,
      multiCandidate: false,
      selfInstructRounds: 1,
      trainingPoolPath: undefined,
      benchmarkPoolPath: undefined,
      dataDir: undefined,
    });
  });

  it("treats blank variables as unset", () => {
    const config = loadConfig({ SYNTH_SEED: "   ", SYNTH_CONCURRENCY: "" });
    expect(config.seed).toBe(DEFAULT_SEED);
    expect(config.concurrency).toBe(1);
  });

  it("parses numbers and booleans", () => {
    const config = loadConfig({
      SYNTH_CONCURRENCY: "4",
      SYNTH_ACCEPT_THRESHOLD: "0.75",
      SYNTH_MULTI_CANDIDATE: "yes",
      SYNTH_SELF_INSTRUCT_ROUNDS: "3",
      SYNTH_TRAINING_POOL: " ./pools/training.json ",
    });
    expect(config.concurrency).toBe(4);
    expect(config.acceptThreshold).toBe(0.75);
    expect(config.multiCandidate).toBe(true);
    expect(config.selfInstructRounds).toBe(3);
    expect(config.trainingPoolPath).toBe("./pools/training.json");
  });

  it("requires a key for a hosted provider", () => {
    expect(() => loadConfig({ SYNTH_ORACLE_PROVIDER: "gemini" })).toThrow(ConfigurationError);
    expect(() => loadConfig({ SYNTH_ORACLE_PROVIDER: "openai" })).toThrow(/OPENAI_API_KEY/);
  });

  it("accepts GOOGLE_API_KEY for gemini", () => {
    const config = loadConfig({
      SYNTH_ORACLE_PROVIDER: "gemini",
      GOOGLE_API_KEY: "test-secret",
      GEMINI_MODEL: "test-model",
    });
    expect(config.oracle).toEqual({
      provider: "gemini",
      model: "test-model",
      apiKey: "test-secret",
      timeoutMs: 15_000,
    });
  });

  it("names every invalid variable", () => {
    let caught: unknown;
    try {
      loadConfig({ SYNTH_CONCURRENCY: "0", SYNTH_MULTI_CANDIDATE: "maybe", SYNTH_ORACLE_PROVIDER: "local" });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    const message = caught instanceof Error ? caught.message : "";
    expect(message).toMatch(/^\[CONFIGURATION\] invalid environment: /);
    expect(message).toContain("SYNTH_CONCURRENCY");
    expect(message).toContain("SYNTH_MULTI_CANDIDATE");
    expect(message).toContain("SYNTH_ORACLE_PROVIDER");
  });

  it("rejects a non-numeric timeout", () => {
    expect(() => loadConfig({ SYNTH_ORACLE_TIMEOUT_MS: "soon" })).toThrow(/SYNTH_ORACLE_TIMEOUT_MS/);
  });
});
