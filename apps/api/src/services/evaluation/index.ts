/**
 * Evaluation Layer - Main Export
 *
 * This layer:
 * - Compares a record set with the benchmark pool
 * - Scores faithfulness and diversity (direct)
 * - Scores benchmark resemblance and proxy-task utility (indirect)
 *
 * This layer does NOT:
 * - Modify records
 * - Decide whether a run succeeded
 */

export { BenchmarkComparator, type BenchmarkScore } from "./benchmark_comparator.js";
export {
  DirectEvaluator,
  DIVERSITY_FIELDS,
  emptyDirectEvaluation,
  type DirectEvaluatorDeps,
} from "./direct_evaluator.js";
export { IndirectEvaluator, emptyIndirectEvaluation } from "./indirect_evaluator.js";
export { BENCHMARK_WEIGHTS, OPEN_EVALUATION_TASKS } from "./types.js";
export type {
  ComparatorConfig,
  CategoricalField,
  DirectEvaluatorConfig,
  IndirectEvaluatorConfig,
  OpenEvaluationTask,
} from "./types.js";
