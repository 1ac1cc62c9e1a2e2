/**
 * Generation Layer - Type Definitions
 */

import type { z } from "zod";
import type {
  GantryFieldName,
  GantryFields,
  GenerationCondition,
  RecordFields,
} from "../../schemas/index.js";

// =============================================================================
// Field groups
// =============================================================================

export type GroupPayload = Partial<GantryFields>;

/**
 * One unit of generation: the oracle is asked for `fields` once every group
 * in `requires` has been filled in.
 */
export interface FieldGroup {
  readonly name: string;
  readonly fields: readonly GantryFieldName[];
  readonly requires: readonly string[];
  /** Validates the oracle's reply for this group */
  readonly payload: z.ZodType<GroupPayload, z.ZodTypeDef, unknown>;
}

export interface FieldGroupSchema {
  readonly groups: ReadonlyMap<string, FieldGroup>;
  /** Topological order, ties broken by declaration order */
  readonly order: readonly FieldGroup[];
}

// =============================================================================
// Oracle
// =============================================================================

/**
 * External text-generation service. Resolves to whatever the service
 * returned (already JSON-decoded where possible); every reply is validated
 * by the caller before use.
 */
export interface TextGenerationOracle {
  readonly name: string;
  generate(prompt: string, signal?: AbortSignal): Promise<unknown>;
}

// =============================================================================
// Prompts
// =============================================================================

export interface FieldGroupPromptInput {
  group: string;
  fields: string[];
  condition: GenerationCondition;
  partial_record: RecordFields;
  demonstrations: RecordFields[];
}

// =============================================================================
// Demonstrations
// =============================================================================

export type DemonstrationSet =
  | { kind: "single"; records: readonly Readonly<RecordFields>[] }
  | { kind: "multi"; candidates: readonly (readonly Readonly<RecordFields>[])[] };

export interface DemonstrationSelectorConfig {
  /** Seed for tie-breaks and candidate-set draws */
  seed?: string | number;
  /** Number of candidate sets in multi-candidate mode */
  candidateSets?: number;
}

// =============================================================================
// Decomposer
// =============================================================================

export interface DecomposerConfig {
  /** Per-call oracle timeout in ms */
  timeoutMs?: number;
  /** Seed for rule fallback draws */
  seed?: string | number;
  /** Log every oracle call */
  verbose?: boolean;
}

// =============================================================================
// Scheduler
// =============================================================================

export interface SchedulerConfig {
  seed?: string | number;
  /** Epoch-ms clock used for base_time; defaults to Date.now */
  clock?: () => number;
}
