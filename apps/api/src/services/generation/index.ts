/**
 * Generation Layer - Main Export
 *
 * This layer:
 * - Declares the field groups and their order
 * - Talks to the text-generation oracle (hosted or mock)
 * - Selects demonstrations and decomposes one record per call
 * - Schedules conditions against a target distribution
 *
 * This layer does NOT:
 * - Score, repair or weight records (curation does)
 * - Measure the dataset (evaluation does)
 */

export { createFieldGroupSchema, DEFAULT_FIELD_GROUPS } from "./field_groups.js";
export { RuleGenerator, type RuleGeneratorDeps } from "./rule_generator.js";
export { buildFieldGroupPrompt, parseFieldGroupPrompt, loadPromptTemplate } from "./prompt_builder.js";
export { LLMOracle, type LLMOracleConfig } from "./oracle.js";
export { MockOracle, type MockOracleConfig } from "./mock_oracle.js";
export { DemonstrationSelector, vote, resolveDemonstrations } from "./demonstration_selector.js";
export { SampleDecomposer, type DecomposerDeps } from "./decomposer.js";
export {
  DatasetScheduler,
  DEFAULT_TARGET_DISTRIBUTION,
  type SchedulerSnapshot,
} from "./scheduler.js";

export type {
  FieldGroup,
  FieldGroupSchema,
  GroupPayload,
  TextGenerationOracle,
  FieldGroupPromptInput,
  DemonstrationSet,
  DemonstrationSelectorConfig,
  DecomposerConfig,
  SchedulerConfig,
} from "./types.js";
