/**
 * Pipeline Orchestrator
 *
 * Runs one generation request end to end:
 *
 *   scheduler → selector → decomposer → filter             (per attempt, in workers)
 *   enhancer → verifier → enhancer → filter → reweighter   (once, over accepted records)
 *   direct + indirect evaluation                           (once)
 *
 * Every run gets a fresh scheduler, so runs never share distribution state.
 * Attempts stop when enough records are accepted, when the attempt budget
 * is spent, or when the caller aborts. Whatever was accepted by then is
 * curated and evaluated.
 *
 * With `selfInstructRounds` above 1 the request is filled in rounds. After
 * each round but the last, the best newly accepted records join a run-local
 * copy of the demonstration pool, so later rounds can learn from them.
 *
 * This component does NOT:
 * - Load pools or build components (the synthesis service does)
 * - Persist anything
 */

import type {
  DistributionCounts,
  GenerationCondition,
  GenerationStatistics,
  SynthRecord,
  TargetDistribution,
} from "../../schemas/index.js";
import {
  addIssues,
  runVerifier,
  withMeta,
  type AuxiliaryVerifier,
  type LabelEnhancer,
  type Reweighter,
  type SampleFilter,
} from "../curation/index.js";
import type { DirectEvaluator, IndirectEvaluator } from "../evaluation/index.js";
import { GenerationFailedError } from "../errors.js";
import { DatasetScheduler, type DemonstrationSelector, type SampleDecomposer } from "../generation/index.js";
import { mean } from "../statistics/math.js";
import type { LearnedStatistics } from "../statistics/index.js";
import type { OrchestratorConfig, RunOptions, SynthesisOutput } from "./types.js";

const DEFAULT_CONFIG: Required<OrchestratorConfig> = {
  concurrency: 1,
  attemptMultiplier: 2,
  maxAttemptsPerCondition: 3,
  demonstrations: 2,
  multiCandidate: false,
  recoverRejected: true,
  selfInstructRounds: 1,
  feedbackShare: 0.2,
  maxFeedback: 50,
  verbose: false,
  seed: "orchestrator",
  clock: Date.now,
};

export interface OrchestratorDeps {
  selector: DemonstrationSelector;
  decomposer: SampleDecomposer;
  filter: SampleFilter;
  enhancer: LabelEnhancer;
  reweighter: Reweighter;
  direct: DirectEvaluator;
  indirect: IndirectEvaluator;
  stats?: LearnedStatistics;
  verifier?: AuxiliaryVerifier;
}

/** Mutable state of one run, shared by its workers */
interface RunState {
  scheduler: DatasetScheduler;
  /** Starts as the shared selector; replaced when a round feeds records back */
  selector: DemonstrationSelector;
  accepted: SynthRecord[];
  attempts: number;
  inFlight: number;
  rejected: number;
  recovered: number;
  fallbackGroups: Map<string, number>;
  rejectionIssues: Map<string, number>;
  conditionFailures: Map<string, number>;
  demonstrationsAdded: number;
  abortReason: string | null;
}

function conditionKey(condition: GenerationCondition): string {
  return `${condition.vehicle_category}|${condition.time_period}|${condition.scenario}`;
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

/** Issue text up to the first colon, so counts group by kind */
function issueKind(issue: string): string {
  const colon = issue.indexOf(":");
  return colon === -1 ? issue : issue.slice(0, colon);
}

export class PipelineOrchestrator {
  private readonly config: Required<OrchestratorConfig>;

  constructor(private readonly deps: OrchestratorDeps, config: OrchestratorConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async run(count: number, options: RunOptions = {}): Promise<SynthesisOutput> {
    const started = this.config.clock();
    const state: RunState = {
      scheduler: new DatasetScheduler(options.targetDistribution, {
        seed: `${this.config.seed}:scheduler`,
        clock: this.config.clock,
      }),
      selector: this.deps.selector,
      accepted: [],
      attempts: 0,
      inFlight: 0,
      rejected: 0,
      recovered: 0,
      fallbackGroups: new Map(),
      rejectionIssues: new Map(),
      conditionFailures: new Map(),
      demonstrationsAdded: 0,
      abortReason: null,
    };

    if (count > 0) {
      const maxAttempts = Math.max(count, Math.ceil(count * this.config.attemptMultiplier));
      const deadline = options.timeoutMs !== undefined ? started + options.timeoutMs : Infinity;
      console.log(
        `[Orchestrator] Generating ${count} record(s), at most ${maxAttempts} attempts, ` +
          `${this.config.concurrency} worker(s)`
      );

      const rounds = Math.max(1, Math.min(count, Math.floor(this.config.selfInstructRounds)));
      for (let round = 1; round <= rounds; round++) {
        const goal = Math.min(count, Math.ceil((count * round) / rounds));
        const before = state.accepted.length;

        // Workers stop claiming once accepted + in flight covers the goal;
        // if some of those in-flight attempts are rejected, another pass starts.
        while (
          state.accepted.length < goal &&
          state.attempts < maxAttempts &&
          !this.shouldStop(state, options.signal, deadline)
        ) {
          const workers = Array.from({ length: this.config.concurrency }, () =>
            this.worker(state, count, goal, maxAttempts, options.signal, deadline)
          );
          await Promise.all(workers);
        }

        if (state.accepted.length < goal) break;
        if (round < rounds) this.feedBack(state, state.accepted.slice(before), round);
      }
    }

    const accepted = [...state.accepted].sort((a, b) => a.meta.generation_index - b.meta.generation_index);
    if (count > 0 && accepted.length === 0 && state.abortReason === null) {
      throw new GenerationFailedError(count, state.attempts);
    }

    const output = await this.curateAndEvaluate(accepted, options.targetDistribution);
    const statistics = this.statistics(count, state, output.samples, started);
    console.log(
      `[Orchestrator] Accepted ${statistics.accepted}/${count} after ${statistics.attempts} attempts` +
        (statistics.aborted ? ` (aborted: ${statistics.abort_reason})` : "")
    );
    return { ...output, statistics };
  }

  private shouldStop(state: RunState, signal: AbortSignal | undefined, deadline: number): boolean {
    if (state.abortReason !== null) return true;
    if (signal?.aborted) {
      state.abortReason = "cancelled";
    } else if (this.config.clock() >= deadline) {
      state.abortReason = "timeout";
    }
    return state.abortReason !== null;
  }

  private async worker(
    state: RunState,
    count: number,
    goal: number,
    maxAttempts: number,
    signal: AbortSignal | undefined,
    deadline: number
  ): Promise<void> {
    while (
      state.accepted.length + state.inFlight < goal &&
      state.attempts < maxAttempts &&
      !this.shouldStop(state, signal, deadline)
    ) {
      const index = state.attempts++;
      state.inFlight++;
      try {
        await this.attempt(state, count, index);
      } finally {
        state.inFlight--;
      }
    }
  }

  private async attempt(state: RunState, count: number, index: number): Promise<void> {
    const gapCondition = state.scheduler.nextCondition();
    const key = conditionKey(gapCondition);
    const exhausted = (state.conditionFailures.get(key) ?? 0) >= this.config.maxAttemptsPerCondition;
    const condition = exhausted ? state.scheduler.sampleCondition() : gapCondition;

    const demonstrations = state.selector.select(
      condition,
      this.config.demonstrations,
      this.config.multiCandidate
    );
    const generated = await this.deps.decomposer.decompose(condition, demonstrations, index);
    for (const group of generated.meta.fallback_groups) increment(state.fallbackGroups, group);

    let { record, evaluation } = this.deps.filter.score(generated);
    let ok = this.deps.filter.accepts(evaluation);

    if (!ok && this.config.recoverRejected) {
      const retry = this.deps.filter.score(this.deps.enhancer.enhance(record));
      if (this.deps.filter.accepts(retry.evaluation)) {
        ({ record, evaluation } = retry);
        ok = true;
        state.recovered++;
      }
    }

    state.scheduler.update(record, ok);

    if (ok) {
      if (!exhausted) state.conditionFailures.delete(key);
      if (state.accepted.length < count) state.accepted.push(record);
    } else {
      if (!exhausted) increment(state.conditionFailures, key);
      state.rejected++;
      for (const issue of evaluation.issues) increment(state.rejectionIssues, issueKind(issue));
    }

    if (this.config.verbose) {
      console.log(
        `[Orchestrator] #${index} ${conditionKey(condition)}${exhausted ? " (sampled)" : ""}: ` +
          `${ok ? "accepted" : "rejected"} score=${evaluation.score.toFixed(3)}` +
          (generated.meta.fallback_groups.length > 0 ? ` fallback=${generated.meta.fallback_groups.join(",")}` : "")
      );
    }
  }

  /**
   * Add the highest-scoring records of a finished round to the run's
   * demonstration pool.
   */
  private feedBack(state: RunState, fresh: readonly SynthRecord[], round: number): void {
    const take = Math.min(this.config.maxFeedback, Math.ceil(fresh.length * this.config.feedbackShare));
    if (take <= 0) return;
    const best = fresh
      .map((record, index) => ({ record, index }))
      .sort((a, b) => (b.record.meta.quality_score ?? 0) - (a.record.meta.quality_score ?? 0) || a.index - b.index)
      .slice(0, take)
      .map(({ record }) => record.fields);
    state.selector = state.selector.extend(best);
    state.demonstrationsAdded += best.length;
    console.log(
      `[Orchestrator] Round ${round}: added ${best.length} accepted record(s) to the demonstration pool ` +
        `(${state.selector.poolSize} total)`
    );
  }

  private async curateAndEvaluate(
    accepted: readonly SynthRecord[],
    target?: TargetDistribution
  ): Promise<Omit<SynthesisOutput, "statistics">> {
    // Issues from the attempt-time score are stale once the enhancer has run
    const enhanced = this.deps.enhancer
      .enhanceAll(accepted)
      .map((record) => withMeta(record, { validation_issues: [] }));
    const verified = await runVerifier(this.deps.verifier, enhanced);

    // Verifier corrections get labels re-derived; verifier issues are kept
    const rescored = this.deps.enhancer.enhanceAll(verified).map((record) => {
      const { record: scored } = this.deps.filter.score(record);
      return addIssues(scored, record.meta.validation_issues);
    });
    const { samples, weighted, tiers } = this.deps.reweighter.apply(rescored, this.deps.stats);

    return {
      samples,
      weighted_samples: weighted,
      quality_tiers: tiers,
      evaluation: {
        direct: this.deps.direct.evaluate(samples, target),
        indirect: this.deps.indirect.evaluate(samples),
      },
    };
  }

  private statistics(
    requested: number,
    state: RunState,
    samples: readonly SynthRecord[],
    started: number
  ): GenerationStatistics {
    const snapshot = state.scheduler.snapshot();
    const accepted: DistributionCounts = snapshot.accepted;
    const observed: DistributionCounts = snapshot.observed;

    return {
      requested,
      attempts: state.attempts,
      accepted: samples.length,
      rejected: state.rejected,
      recovered: state.recovered,
      demonstrations_added: state.demonstrationsAdded,
      fallback_groups: Object.fromEntries(state.fallbackGroups),
      rejection_issues: Object.fromEntries(state.rejectionIssues),
      aborted: state.abortReason !== null,
      ...(state.abortReason !== null ? { abort_reason: state.abortReason } : {}),
      accepted_distribution: accepted,
      observed_distribution: observed,
      mean_quality_score: samples.length > 0 ? mean(samples.map((r) => r.meta.quality_score ?? 0)) : 0,
      mean_weight: samples.length > 0 ? mean(samples.map((r) => r.meta.quality_weight ?? 0)) : 0,
      duration_ms: Math.max(0, this.config.clock() - started),
    };
  }
}
