/**
 * Statistics - Main Export
 */

export {
  computeLearnedStatistics,
  predictFee,
  NUMERIC_FIELDS,
  MIN_USEFUL_CORRELATION,
} from "./learned_statistics.js";
export type {
  LearnedStatistics,
  CategoryStats,
  FieldStats,
  FeeRegression,
  NumericField,
} from "./learned_statistics.js";
export * from "./math.js";
