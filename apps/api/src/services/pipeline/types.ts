/**
 * Pipeline Layer - Type Definitions
 */

import type {
  EvaluationResult,
  GenerationStatistics,
  SynthRecord,
  TargetDistribution,
} from "../../schemas/index.js";
import type { QualityTiers } from "../curation/index.js";

export interface OrchestratorConfig {
  /** Async workers generating in parallel (default: 1) */
  concurrency?: number;
  /** Attempts allowed per requested record (default: 2) */
  attemptMultiplier?: number;
  /** Consecutive failures of one gap-selected condition before sampling instead (default: 3) */
  maxAttemptsPerCondition?: number;
  /** Demonstrations per prompt (default: 2) */
  demonstrations?: number;
  multiCandidate?: boolean;
  /** Try the enhancer on rejected records before giving up on them (default: true) */
  recoverRejected?: boolean;
  /** Rounds the request is filled in; accepted records feed the demonstration pool between rounds (default: 1) */
  selfInstructRounds?: number;
  /** Share of a round's accepted records fed back (default: 0.2) */
  feedbackShare?: number;
  /** Most records fed back after one round (default: 50) */
  maxFeedback?: number;
  /** Log every attempt (default: false) */
  verbose?: boolean;
  seed?: string | number;
  /** Epoch-ms clock for base_time and durations */
  clock?: () => number;
}

export interface RunOptions {
  targetDistribution?: TargetDistribution;
  /** Checked between attempts; an attempt in flight always finishes */
  signal?: AbortSignal;
  /** Stop starting new attempts after this many ms */
  timeoutMs?: number;
}

export interface SynthesisOutput {
  /** Curated records in generation order */
  samples: SynthRecord[];
  /** The same records, descending by quality weight */
  weighted_samples: SynthRecord[];
  quality_tiers: QualityTiers<SynthRecord>;
  evaluation: EvaluationResult;
  statistics: GenerationStatistics;
}

export interface InitializeOptions {
  /** Training pool rows to load (default: all) */
  trainingLimit?: number;
  /** Benchmark pool rows to load (default: all) */
  benchmarkLimit?: number;
  /** Run auxiliary verifiers during curation (default: false) */
  useAuxiliary?: boolean;
}
