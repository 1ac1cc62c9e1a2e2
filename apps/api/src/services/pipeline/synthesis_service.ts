/**
 * Synthesis Service
 *
 * The surface callers use. `initialize()` loads the training and benchmark
 * pools, learns statistics and wires every component once; `generate()`
 * runs the orchestrator and, when a repository is attached, stores a run
 * report.
 *
 * This component does NOT:
 * - Load .env (entry points do)
 * - Route HTTP requests or authenticate callers
 */

import type { FieldGroup, FieldGroupSchema, TextGenerationOracle } from "../generation/index.js";
import {
  DemonstrationSelector,
  LLMOracle,
  MockOracle,
  RuleGenerator,
  SampleDecomposer,
  createFieldGroupSchema,
} from "../generation/index.js";
import {
  FeeReasonablenessVerifier,
  LabelEnhancer,
  Reweighter,
  SampleFilter,
  StatisticalReferenceVerifier,
  VehicleConsistencyVerifier,
  composeVerifiers,
  type AuxiliaryVerifier,
} from "../curation/index.js";
import { BenchmarkComparator, DirectEvaluator, IndirectEvaluator } from "../evaluation/index.js";
import { computeLearnedStatistics, type LearnedStatistics } from "../statistics/index.js";
import { getGantrySectionMap, type GantrySectionMap } from "../domain/gantry_sections.js";
import { SectionDateMap } from "../domain/section_dates.js";
import { DEFAULT_ACCEPT_THRESHOLD, TRAVEL_TIME_HOURS } from "../domain/constants.js";
import { ConfigurationError, NotInitializedError } from "../errors.js";
import type { SynthConfig } from "../config.js";
import type { TargetDistribution } from "../../schemas/index.js";
import {
  InMemoryPoolLoader,
  JsonPoolLoader,
  RunReportRepository,
  getCollectionPath,
  type PoolLoader,
} from "../../storage/index.js";
import { PipelineOrchestrator } from "./orchestrator.js";
import { buildSeedPool } from "./seed_pool.js";
import type { InitializeOptions, OrchestratorConfig, RunOptions, SynthesisOutput } from "./types.js";

export interface SynthesisServiceConfig {
  acceptThreshold?: number;
  maxTravelHours?: number;
  /** Per-group oracle timeout in ms (default: 15000) */
  oracleTimeoutMs?: number;
  seed?: string | number;
  orchestrator?: OrchestratorConfig;
}

export type OracleFactory = (schema: FieldGroupSchema, rules: RuleGenerator) => TextGenerationOracle;

export interface SynthesisServiceDeps {
  trainingPool: PoolLoader;
  benchmarkPool: PoolLoader;
  /** An oracle, or a factory given the schema and rules; defaults to the mock oracle */
  oracle?: TextGenerationOracle | OracleFactory;
  sections?: GantrySectionMap;
  fieldGroups?: readonly FieldGroup[];
  /** Verifiers used when initialized with useAuxiliary; defaults to the rule-based ones */
  verifiers?: readonly AuxiliaryVerifier[];
  reports?: RunReportRepository;
}

const DEFAULT_CONFIG: Required<SynthesisServiceConfig> = {
  acceptThreshold: DEFAULT_ACCEPT_THRESHOLD,
  maxTravelHours: TRAVEL_TIME_HOURS.max,
  oracleTimeoutMs: 15_000,
  seed: "synthesis",
  orchestrator: {},
};

interface InitializedPipeline {
  orchestrator: PipelineOrchestrator;
  stats: LearnedStatistics;
  oracle: TextGenerationOracle;
}

export class SynthesisService {
  private readonly config: Required<SynthesisServiceConfig>;
  private readonly schema: FieldGroupSchema;
  private readonly sections: GantrySectionMap;
  private pipeline: InitializedPipeline | null = null;

  constructor(private readonly deps: SynthesisServiceDeps, config: SynthesisServiceConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    // Schema problems surface here, before any pool is read
    this.schema = createFieldGroupSchema(deps.fieldGroups);
    this.sections = deps.sections ?? getGantrySectionMap();
  }

  get isInitialized(): boolean {
    return this.pipeline !== null;
  }

  /** Statistics learned from the training pool */
  get learnedStatistics(): LearnedStatistics {
    return this.require().stats;
  }

  get oracleName(): string {
    return this.require().oracle.name;
  }

  async initialize(options: InitializeOptions = {}): Promise<void> {
    const { trainingPool, benchmarkPool } = this.deps;
    const [training, benchmark] = await Promise.all([
      trainingPool.load(options.trainingLimit),
      benchmarkPool.load(options.benchmarkLimit),
    ]);
    if (training.length === 0) {
      throw new ConfigurationError(`training pool "${trainingPool.name}" is empty`);
    }
    if (benchmark.length === 0) {
      throw new ConfigurationError(`benchmark pool "${benchmarkPool.name}" is empty`);
    }

    const { acceptThreshold, maxTravelHours, seed } = this.config;
    const stats = computeLearnedStatistics(training);
    const sectionDates = SectionDateMap.fromRows(training);
    const rules = new RuleGenerator({ sections: this.sections, stats, maxTravelHours, sectionDates });
    const oracle = this.resolveOracle(rules);

    const filter = new SampleFilter(stats, { acceptThreshold, maxTravelHours });
    const comparator = new BenchmarkComparator(benchmark);
    const verifier = options.useAuxiliary
      ? composeVerifiers(...(this.deps.verifiers ?? defaultVerifiers(stats)))
      : undefined;

    const orchestrator = new PipelineOrchestrator(
      {
        selector: new DemonstrationSelector(training, { seed: `${seed}:demonstrations` }),
        decomposer: new SampleDecomposer(
          { schema: this.schema, oracle, rules },
          {
            timeoutMs: this.config.oracleTimeoutMs,
            seed: `${seed}:decomposer`,
            verbose: this.config.orchestrator.verbose ?? false,
          }
        ),
        filter,
        enhancer: new LabelEnhancer(this.sections, { maxTravelHours }),
        reweighter: new Reweighter(),
        direct: new DirectEvaluator(
          { filter, comparator, sections: this.sections, sectionDates },
          { acceptThreshold, seed: `${seed}:diversity` }
        ),
        indirect: new IndirectEvaluator(comparator, { maxTravelHours }),
        stats,
        verifier,
      },
      { seed: `${seed}:orchestrator`, ...this.config.orchestrator }
    );

    this.pipeline = { orchestrator, stats, oracle };
    console.log(
      `[SynthesisService] Initialized: ${training.length} training rows, ${benchmark.length} benchmark rows, ` +
        `oracle ${oracle.name}${verifier ? `, verifier ${verifier.name}` : ""}`
    );
  }

  async generate(
    count: number,
    targetDistribution?: TargetDistribution,
    options: Omit<RunOptions, "targetDistribution"> = {}
  ): Promise<SynthesisOutput> {
    const { orchestrator } = this.require();
    if (!Number.isInteger(count) || count < 0) {
      throw new ConfigurationError(`count must be a non-negative integer, got ${count}`);
    }

    const startedAt = new Date().toISOString();
    const output = await orchestrator.run(count, { ...options, targetDistribution });

    if (this.deps.reports) {
      const report = await this.deps.reports.create({
        requested: count,
        accepted: output.samples.length,
        quality_tiers: {
          high: output.quality_tiers.high.length,
          medium: output.quality_tiers.medium.length,
          low: output.quality_tiers.low.length,
        },
        statistics: output.statistics,
        evaluation: output.evaluation,
        started_at: startedAt,
      });
      console.log(`[SynthesisService] Run report ${report.run_id.substring(0, 8)}... saved`);
    }
    return output;
  }

  private require(): InitializedPipeline {
    if (!this.pipeline) throw new NotInitializedError();
    return this.pipeline;
  }

  private resolveOracle(rules: RuleGenerator): TextGenerationOracle {
    const { oracle } = this.deps;
    if (oracle === undefined) {
      return new MockOracle(this.schema, rules, { seed: `${this.config.seed}:oracle` });
    }
    return typeof oracle === "function" ? oracle(this.schema, rules) : oracle;
  }
}

function defaultVerifiers(stats: LearnedStatistics): AuxiliaryVerifier[] {
  return [
    new VehicleConsistencyVerifier(),
    new FeeReasonablenessVerifier(),
    new StatisticalReferenceVerifier(stats),
  ];
}

// =============================================================================
// Factory
// =============================================================================

/** Seed pool sizes used when no pool file is configured */
const SEED_TRAINING_SIZE = 400;
const SEED_BENCHMARK_SIZE = 800;

/**
 * Build a service from runtime configuration. Pool paths fall back to seed
 * pools; a data directory turns on run reports.
 */
export function createSynthesisService(
  config: SynthConfig,
  overrides: Partial<SynthesisServiceDeps> = {}
): SynthesisService {
  const trainingPool =
    overrides.trainingPool ??
    (config.trainingPoolPath
      ? new JsonPoolLoader(config.trainingPoolPath)
      : new InMemoryPoolLoader(
          buildSeedPool({ size: SEED_TRAINING_SIZE, seed: `${config.seed}:training` }),
          "seed:training"
        ));
  const benchmarkPool =
    overrides.benchmarkPool ??
    (config.benchmarkPoolPath
      ? new JsonPoolLoader(config.benchmarkPoolPath)
      : new InMemoryPoolLoader(
          buildSeedPool({ size: SEED_BENCHMARK_SIZE, seed: `${config.seed}:benchmark` }),
          "seed:benchmark"
        ));

  const { provider, model, apiKey, timeoutMs } = config.oracle;
  const oracle =
    overrides.oracle ?? (provider === "mock" ? undefined : new LLMOracle({ provider, model, apiKey }));
  const reports =
    overrides.reports ??
    (config.dataDir ? new RunReportRepository(getCollectionPath("runs", config.dataDir)) : undefined);

  return new SynthesisService(
    { ...overrides, trainingPool, benchmarkPool, oracle, reports },
    {
      acceptThreshold: config.acceptThreshold,
      maxTravelHours: config.maxTravelHours,
      oracleTimeoutMs: timeoutMs,
      seed: config.seed,
      orchestrator: {
        concurrency: config.concurrency,
        demonstrations: config.demonstrations,
        multiCandidate: config.multiCandidate,
        selfInstructRounds: config.selfInstructRounds,
      },
    }
  );
}
