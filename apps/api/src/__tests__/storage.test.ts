import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import type { CreateRunReportInput, GenerationStatistics } from "../schemas/index.js";
import { emptyDirectEvaluation, emptyIndirectEvaluation } from "../services/evaluation/index.js";
import { InMemoryPoolLoader, JsonPoolLoader, RunReportRepository } from "../storage/index.js";
import { passengerFields, truckFields } from "./helpers.js";

function statistics(overrides: Partial<GenerationStatistics> = {}): GenerationStatistics {
  return {
    requested: 10,
    attempts: 12,
    accepted: 8,
    rejected: 4,
    recovered: 0,
    demonstrations_added: 0,
    fallback_groups: {},
    rejection_issues: {},
    aborted: false,
    accepted_distribution: { vehicle: {}, time: {}, scenario: {} },
    observed_distribution: { vehicle: {}, time: {}, scenario: {} },
    mean_quality_score: 0.9,
    mean_weight: 1,
    duration_ms: 25,
    ...overrides,
  };
}

function reportInput(startedAt: string, overrides: Partial<CreateRunReportInput> = {}): CreateRunReportInput {
  return {
    requested: 10,
    accepted: 8,
    quality_tiers: { high: 0, medium: 8, low: 0 },
    statistics: statistics(),
    evaluation: { direct: emptyDirectEvaluation(), indirect: emptyIndirectEvaluation() },
    started_at: startedAt,
    ...overrides,
  };
}

describe("RunReportRepository", () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "gantry-synth-"));
    filePath = join(dir, "runs.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("stores reports with generated ids and writes through", async () => {
    const repo = new RunReportRepository(filePath);
    const report = await repo.create(reportInput("2024-03-01T08:00:00.000Z"));

    expect(report.run_id).toMatch(/^[0-9a-f-]{36}$/);
    expect(await repo.get(report.run_id)).toEqual(report);

    const reloaded = new RunReportRepository(filePath);
    expect(await reloaded.count()).toBe(1);
    expect((await reloaded.get(report.run_id))?.requested).toBe(10);
  });

  it("lists recent runs first and finds aborted ones", async () => {
    const repo = new RunReportRepository(filePath);
    const older = await repo.create(reportInput("2024-03-01T08:00:00.000Z"));
    const newer = await repo.create(
      reportInput("2024-03-02T08:00:00.000Z", {
        requested: 10,
        accepted: 2,
        statistics: statistics({ accepted: 2, aborted: true, abort_reason: "cancelled" }),
      })
    );

    expect((await repo.recent()).map((r) => r.run_id)).toEqual([newer.run_id, older.run_id]);
    expect((await repo.recent(1)).map((r) => r.run_id)).toEqual([newer.run_id]);
    expect((await repo.findAborted()).map((r) => r.run_id)).toEqual([newer.run_id]);
    expect(await repo.getSummary()).toEqual({ runs: 2, acceptanceRate: 0.5, meanOverall: 0 });
  });

  it("deletes a report", async () => {
    const repo = new RunReportRepository(filePath);
    const report = await repo.create(reportInput("2024-03-01T08:00:00.000Z"));
    expect(await repo.delete(report.run_id)).toBe(true);
    expect(await repo.delete(report.run_id)).toBe(false);
    expect(JSON.parse(await readFile(filePath, "utf-8"))).toEqual([]);
  });

  it("rejects an invalid report before writing", async () => {
    const repo = new RunReportRepository(filePath);
    await expect(repo.create(reportInput("not a date"))).rejects.toThrow();
    expect(await repo.count()).toBe(0);
  });

  it("refuses a collection file that fails validation", async () => {
    await writeFile(filePath, JSON.stringify([{ run_id: "nope" }]), "utf-8");
    await expect(new RunReportRepository(filePath).list()).rejects.toThrow(/Schema validation failed/);
  });
});

describe("pool loaders", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "gantry-pool-"));
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("skips invalid rows and warns once", async () => {
    const loader = new InMemoryPoolLoader([passengerFields(), { pay_fee: "lots" }, truckFields()], "training");
    const rows = await loader.load();

    expect(rows).toHaveLength(2);
    expect(rows[1].vehicle_type).toBe("15");
    expect(console.warn).toHaveBeenCalledWith("[Pool] training: skipped 1 invalid row(s)");
  });

  it("returns frozen copies and honours the limit", async () => {
    const source = [passengerFields(), truckFields()];
    const rows = await new InMemoryPoolLoader(source).load(1);

    expect(rows).toHaveLength(1);
    expect(Object.isFrozen(rows[0])).toBe(true);
    expect(rows[0]).not.toBe(source[0]);
    expect(rows[0]).toEqual(source[0]);
  });

  it("reads an array or a records object from JSON", async () => {
    const arrayFile = join(dir, "array.json");
    const objectFile = join(dir, "object.json");
    await writeFile(arrayFile, JSON.stringify([passengerFields()]), "utf-8");
    await writeFile(objectFile, JSON.stringify({ records: [passengerFields(), truckFields()] }), "utf-8");

    expect(await new JsonPoolLoader(arrayFile).load()).toHaveLength(1);
    expect(await new JsonPoolLoader(objectFile).load()).toHaveLength(2);
  });

  it("rejects a file of the wrong shape", async () => {
    const file = join(dir, "bad.json");
    await writeFile(file, JSON.stringify({ rows: [] }), "utf-8");
    await expect(new JsonPoolLoader(file).load()).rejects.toThrow(/neither an array nor/);
  });
});
