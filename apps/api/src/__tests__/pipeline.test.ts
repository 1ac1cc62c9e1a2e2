import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import type { PoolRow } from "../schemas/index.js";
import {
  FeeReasonablenessVerifier,
  ReviewCallbackVerifier,
  addIssues,
  withFields,
  type AuxiliaryVerifier,
} from "../services/curation/index.js";
import { ConfigurationError, GenerationFailedError, NotInitializedError } from "../services/errors.js";
import { loadConfig } from "../services/config.js";
import { buildSeedPool } from "../services/pipeline/seed_pool.js";
import {
  SynthesisService,
  createSynthesisService,
  type SynthesisServiceConfig,
} from "../services/pipeline/synthesis_service.js";
import { InMemoryPoolLoader, RunReportRepository } from "../storage/index.js";

const FIXED_NOW = Date.UTC(2024, 2, 1, 6, 0, 0);

const training = buildSeedPool({ size: 50, seed: "pipeline-training" });
const benchmark = buildSeedPool({ size: 200, seed: "pipeline-benchmark" });

interface ServiceParts {
  training?: PoolRow[];
  reports?: RunReportRepository;
  verifiers?: AuxiliaryVerifier[];
}

function service(config: SynthesisServiceConfig = {}, parts: ServiceParts = {}) {
  return new SynthesisService(
    {
      trainingPool: new InMemoryPoolLoader(parts.training ?? training, "training"),
      benchmarkPool: new InMemoryPoolLoader(benchmark, "benchmark"),
      reports: parts.reports,
      verifiers: parts.verifiers,
    },
    { seed: "pipeline", ...config, orchestrator: { clock: () => FIXED_NOW, ...config.orchestrator } }
  );
}

describe("SynthesisService", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("refuses to generate before initialize", async () => {
    const s = service();
    expect(s.isInitialized).toBe(false);
    await expect(s.generate(1)).rejects.toThrow(NotInitializedError);
    expect(() => s.learnedStatistics).toThrow(NotInitializedError);
  });

  it("fails initialization on an empty training pool", async () => {
    await expect(service({}, { training: [] }).initialize()).rejects.toThrow(
      new ConfigurationError('training pool "training" is empty')
    );
  });

  it("generates the requested number of curated records", async () => {
    const s = service();
    await s.initialize();
    expect(s.oracleName).toBe("mock");
    expect(s.learnedStatistics.sampleCount).toBe(50);

    const output = await s.generate(10);

    expect(output.samples).toHaveLength(10);
    expect(output.statistics.requested).toBe(10);
    expect(output.statistics.accepted).toBe(10);
    expect(output.statistics.aborted).toBe(false);
    expect(output.statistics.abort_reason).toBeUndefined();
    expect(output.statistics.demonstrations_added).toBe(0);
    expect(output.statistics.attempts).toBeGreaterThanOrEqual(10);
    expect(output.statistics.attempts).toBeLessThanOrEqual(20);

    const indices = output.samples.map((r) => r.meta.generation_index);
    expect(indices).toEqual([...indices].sort((a, b) => a - b));
    for (const record of output.samples) {
      expect(record.meta.quality_score ?? 0).toBeGreaterThanOrEqual(0.8);
      expect(record.meta.quality_weight ?? -1).toBeGreaterThanOrEqual(0);
    }

    expect(output.weighted_samples).toHaveLength(10);
    const weights = output.weighted_samples.map((r) => r.meta.quality_weight ?? 0);
    expect(weights).toEqual([...weights].sort((a, b) => b - a));
    const { high, medium, low } = output.quality_tiers;
    expect(high.length + medium.length + low.length).toBe(10);

    const { direct, indirect } = output.evaluation;
    expect(direct.empty).toBe(false);
    const scores = [
      direct.faithfulness,
      direct.diversity,
      direct.overall,
      indirect.overall,
      ...Object.values(indirect.open_evaluation),
    ];
    expect(scores).toHaveLength(8);
    for (const score of scores) {
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(1);
    }
  });

  it("fills the run with several workers", async () => {
    const s = service({ orchestrator: { concurrency: 3 } });
    await s.initialize();
    const output = await s.generate(7);

    expect(output.samples).toHaveLength(7);
    const indices = new Set(output.samples.map((r) => r.meta.generation_index));
    expect(indices.size).toBe(7);
  });

  it("replays a run from the same seed", async () => {
    const first = service();
    const second = service();
    await first.initialize();
    await second.initialize();

    const a = await first.generate(5);
    const b = await second.generate(5);
    expect(a.samples.map((r) => r.fields)).toEqual(b.samples.map((r) => r.fields));
  });

  it("returns an empty aborted result when cancelled up front", async () => {
    const s = service();
    await s.initialize();
    const controller = new AbortController();
    controller.abort();

    const output = await s.generate(5, undefined, { signal: controller.signal });
    expect(output.samples).toEqual([]);
    expect(output.statistics.attempts).toBe(0);
    expect(output.statistics.aborted).toBe(true);
    expect(output.statistics.abort_reason).toBe("cancelled");
    expect(output.evaluation.direct.empty).toBe(true);
    expect(output.evaluation.indirect.empty).toBe(true);
  });

  it("returns an empty result for a count of zero", async () => {
    const s = service();
    await s.initialize();
    const output = await s.generate(0);
    expect(output.samples).toEqual([]);
    expect(output.statistics.attempts).toBe(0);
    expect(output.statistics.aborted).toBe(false);
  });

  it("rejects a negative or fractional count", async () => {
    const s = service();
    await s.initialize();
    await expect(s.generate(-1)).rejects.toThrow(ConfigurationError);
    await expect(s.generate(1.5)).rejects.toThrow(ConfigurationError);
  });

  it("fails when no attempt is accepted", async () => {
    const s = service({ acceptThreshold: 1.01 });
    await s.initialize();
    await expect(s.generate(3)).rejects.toThrow(GenerationFailedError);
  });

  it("steers the mix toward the target distribution", async () => {
    const s = service();
    await s.initialize();
    const output = await s.generate(6, { vehicle: { truck: 1 } });
    expect(output.statistics.accepted_distribution.vehicle.truck).toBe(6);
  });

  it("runs the auxiliary verifiers when asked", async () => {
    const s = service();
    await s.initialize({ useAuxiliary: true });
    const output = await s.generate(4);
    expect(output.samples).toHaveLength(4);
  });

  it("keeps verifier flags on the curated records", async () => {
    const reviewer = new ReviewCallbackVerifier((records) =>
      records.map((record) => addIssues(record, ["reviewer: suspicious"]))
    );
    const s = service({}, { verifiers: [new FeeReasonablenessVerifier(0), reviewer] });
    await s.initialize({ useAuxiliary: true });
    const output = await s.generate(4);

    expect(output.samples).toHaveLength(4);
    for (const record of output.samples) {
      const issues = record.meta.validation_issues;
      expect(issues[issues.length - 1]).toBe("reviewer: suspicious");
      expect(issues.filter((issue) => issue === "reviewer: suspicious")).toHaveLength(1);
    }
  });

  it("re-derives labels after a verifier changes raw fields", async () => {
    const reviewer = new ReviewCallbackVerifier((records) =>
      records.map((record) =>
        withFields(record, {
          ...record.fields,
          vehicle_type: "1",
          axle_count: "2",
          total_weight: "3000",
          pass_state: "2",
        })
      )
    );
    const s = service({}, { verifiers: [reviewer] });
    await s.initialize({ useAuxiliary: true });
    const output = await s.generate(3, { vehicle: { truck: 1 } });

    for (const record of output.samples) {
      expect(record.fields.vehicle_category).toBe("passenger");
      expect(record.fields.scenario).toBe("anomalous");
    }
  });

  it("measures coverage against the requested target", async () => {
    const s = service();
    await s.initialize();
    const output = await s.generate(6, {
      vehicle: { truck: 1 },
      time: { evening_peak: 1 },
      scenario: { normal: 1 },
    });
    expect(output.evaluation.direct.details.coverage).toBe(1);
  });

  it("feeds accepted records back into the demonstrations between rounds", async () => {
    const s = service({ orchestrator: { selfInstructRounds: 2 } });
    await s.initialize();
    const output = await s.generate(10);

    expect(output.samples).toHaveLength(10);
    expect(output.statistics.demonstrations_added).toBe(1);
    expect(console.log).toHaveBeenCalledWith(
      "[Orchestrator] Round 1: added 1 accepted record(s) to the demonstration pool (51 total)"
    );
  });
});

describe("run reports", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "gantry-runs-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("stores a report per run when a repository is attached", async () => {
    const reports = new RunReportRepository(join(dir, "runs.json"));
    const s = service({}, { reports });
    await s.initialize();
    await s.generate(3);

    const stored = await reports.list();
    expect(stored).toHaveLength(1);
    expect(stored[0].requested).toBe(3);
    expect(stored[0].accepted).toBe(3);
  });

  it("wires reports from the configured data directory", async () => {
    const config = loadConfig({ SYNTH_DATA_DIR: dir, SYNTH_SEED: "factory" });
    const s = createSynthesisService(config, {
      trainingPool: new InMemoryPoolLoader(training, "training"),
      benchmarkPool: new InMemoryPoolLoader(benchmark, "benchmark"),
    });
    await s.initialize();
    await s.generate(2);

    expect(await new RunReportRepository(join(dir, "runs.json")).count()).toBe(1);
  });
});
