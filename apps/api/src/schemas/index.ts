/**
 * Gantry Synthesis Data Schemas
 *
 * These schemas define the record fields, field-group payloads, generation
 * conditions and persisted run reports. Every value that crosses a boundary
 * (oracle response, pool file, run report) is validated against them.
 */

import { z } from "zod";
import { CANONICAL_TIMESTAMP, normalizeTimestamp, parseTimestamp } from "../services/domain/time.js";
import { SCENARIOS, TIME_PERIODS, VEHICLE_CATEGORIES } from "../services/domain/constants.js";

// =============================================================================
// Field value helpers
// =============================================================================

/** Digit strings arrive as numbers from some sources */
function digitString(pattern: RegExp) {
  return z
    .union([z.string(), z.number().int().nonnegative()])
    .transform((value) => String(value).trim())
    .pipe(z.string().regex(pattern));
}

const integer = z
  .union([z.number(), z.string().trim().regex(/^-?\d+(\.0+)?$/).transform(Number)])
  .pipe(z.number().int());

const timestamp = z
  .string()
  .transform(normalizeTimestamp)
  .pipe(
    z
      .string()
      .regex(CANONICAL_TIMESTAMP)
      .refine((value) => parseTimestamp(value) !== null, "not a calendar date")
  );

// =============================================================================
// 1. Labels
// =============================================================================

export const VehicleCategorySchema = z.enum(VEHICLE_CATEGORIES);
export const TimePeriodSchema = z.enum(TIME_PERIODS);
export const ScenarioSchema = z.enum(SCENARIOS);

export const DerivedLabelsSchema = z.object({
  vehicle_category: VehicleCategorySchema,
  time_period: TimePeriodSchema,
  scenario: ScenarioSchema,
});

export type DerivedLabels = z.infer<typeof DerivedLabelsSchema>;

// =============================================================================
// 2. Gantry fields (format only)
// =============================================================================

export const FIELD_SCHEMAS = {
  gantry_transaction_id: z.string().trim().regex(/^[0-9A-Z]{10,64}$/),
  pass_id: z.string().trim().regex(/^[0-9A-Z]{20,40}$/),
  gantry_id: z.string().trim().regex(/^[GS]\d{18}$/),
  section_id: z.string().trim().regex(/^[GS]\d{10}$/),
  section_name: z.string().trim().min(1),
  transaction_time: timestamp,
  entrance_time: timestamp,
  vehicle_type: digitString(/^\d{1,2}$/),
  axle_count: digitString(/^\d$/),
  total_weight: digitString(/^\d{1,6}$/),
  vehicle_sign: z.string().trim().regex(/^0x[0-9a-f]{2}$/i),
  gantry_type: digitString(/^\d$/),
  media_type: digitString(/^\d$/),
  transaction_type: digitString(/^\d{2}$/),
  pass_state: digitString(/^\d$/),
  cpu_card_type: digitString(/^\d{1,2}$/),
  pay_fee: integer,
  discount_fee: integer,
  fee_mileage: digitString(/^\d{1,7}$/),
} as const;

export type GantryFieldName = keyof typeof FIELD_SCHEMAS;

export const GANTRY_FIELD_NAMES = Object.keys(FIELD_SCHEMAS).filter(
  (name): name is GantryFieldName => name in FIELD_SCHEMAS
);

export const GantryFieldsSchema = z.object(FIELD_SCHEMAS);
export type GantryFields = z.infer<typeof GantryFieldsSchema>;

export type FieldValue = string | number;

/** All fields optional: records are built group by group */
export type RecordFields = Partial<GantryFields & DerivedLabels>;

function copyField<K extends GantryFieldName>(
  target: Partial<GantryFields>,
  source: Partial<GantryFields>,
  key: K
): void {
  if (source[key] !== undefined) target[key] = source[key];
}

/** Subset of `source` restricted to `fields`, skipping absent values */
export function pickFields(
  source: Partial<GantryFields>,
  fields: readonly GantryFieldName[]
): Partial<GantryFields> {
  const out: Partial<GantryFields> = {};
  for (const field of fields) copyField(out, source, field);
  return out;
}

// =============================================================================
// 3. Field-group payloads (oracle ingestion boundary)
// =============================================================================

export const IdentityGroupSchema = z.object({
  gantry_transaction_id: FIELD_SCHEMAS.gantry_transaction_id,
  pass_id: FIELD_SCHEMAS.pass_id,
  gantry_id: FIELD_SCHEMAS.gantry_id,
  section_id: FIELD_SCHEMAS.section_id,
  section_name: FIELD_SCHEMAS.section_name,
});

export const TimeGroupSchema = z.object({
  transaction_time: FIELD_SCHEMAS.transaction_time,
  entrance_time: FIELD_SCHEMAS.entrance_time,
});

export const VehicleGroupSchema = z.object({
  vehicle_type: FIELD_SCHEMAS.vehicle_type,
  axle_count: FIELD_SCHEMAS.axle_count,
  total_weight: FIELD_SCHEMAS.total_weight.refine((w) => Number(w) > 0, "weight must be positive"),
  vehicle_sign: FIELD_SCHEMAS.vehicle_sign,
});

export const StatusGroupSchema = z.object({
  gantry_type: FIELD_SCHEMAS.gantry_type,
  media_type: FIELD_SCHEMAS.media_type,
  transaction_type: FIELD_SCHEMAS.transaction_type,
  pass_state: FIELD_SCHEMAS.pass_state,
  cpu_card_type: FIELD_SCHEMAS.cpu_card_type,
});

export const FeeGroupSchema = z
  .object({
    pay_fee: FIELD_SCHEMAS.pay_fee.pipe(z.number().nonnegative()),
    discount_fee: FIELD_SCHEMAS.discount_fee.pipe(z.number().nonnegative()),
    fee_mileage: FIELD_SCHEMAS.fee_mileage,
  })
  .refine((fee) => fee.discount_fee <= fee.pay_fee, "discount exceeds payable fee");

// =============================================================================
// 4. Record metadata
// =============================================================================

const FieldValueSchema = z.union([z.string(), z.number()]);

export const CorrectionEntrySchema = z.object({
  field: z.string(),
  old: FieldValueSchema.nullable(),
  new: FieldValueSchema.nullable(),
  reason: z.string(),
});

export const RecordMetaSchema = z.object({
  quality_score: z.number().min(0).max(1).optional(),
  quality_weight: z.number().nonnegative().optional(),
  validation_issues: z.array(z.string()),
  correction_log: z.array(CorrectionEntrySchema),
  fallback_groups: z.array(z.string()),
  generation_index: z.number().int(),
});

export type CorrectionEntry = z.infer<typeof CorrectionEntrySchema>;
export type RecordMeta = z.infer<typeof RecordMetaSchema>;

export interface SynthRecord {
  readonly fields: Readonly<RecordFields>;
  readonly meta: Readonly<RecordMeta>;
}

/** Pool files hold loosely typed rows; every field is optional */
export const PoolRowSchema = GantryFieldsSchema.partial();
export type PoolRow = z.infer<typeof PoolRowSchema>;

// =============================================================================
// 5. Generation condition and target distribution
// =============================================================================

export const GenerationConditionSchema = z.object({
  vehicle_category: VehicleCategorySchema,
  time_period: TimePeriodSchema,
  scenario: ScenarioSchema,
  base_time: timestamp,
});

export type GenerationCondition = Readonly<z.infer<typeof GenerationConditionSchema>>;

const share = z.number().nonnegative().finite();

export const TargetDistributionSchema = z.object({
  vehicle: z.record(VehicleCategorySchema, share).optional(),
  time: z.record(TimePeriodSchema, share).optional(),
  scenario: z.record(ScenarioSchema, share).optional(),
});

export type TargetDistribution = z.infer<typeof TargetDistributionSchema>;

export const DIMENSIONS = ["vehicle", "time", "scenario"] as const;
export type Dimension = (typeof DIMENSIONS)[number];

const tally = z.number().nonnegative();

export const DistributionCountsSchema = z.object({
  vehicle: z.record(VehicleCategorySchema, tally),
  time: z.record(TimePeriodSchema, tally),
  scenario: z.record(ScenarioSchema, tally),
});

export type DistributionCounts = z.infer<typeof DistributionCountsSchema>;

// =============================================================================
// 6. Evaluation
// =============================================================================

export const BenchmarkBreakdownSchema = z.object({
  distribution: z.number().min(0).max(1),
  statistical: z.number().min(0).max(1),
  hourly: z.number().min(0).max(1),
  correlation: z.number().min(0).max(1),
});

export const DirectEvaluationSchema = z.object({
  faithfulness: z.number().min(0).max(1),
  diversity: z.number().min(0).max(1),
  overall: z.number().min(0).max(1),
  empty: z.boolean(),
  details: z.object({
    constraint_pass_rate: z.number().min(0).max(1),
    benchmark_similarity: z.number().min(0).max(1),
    benchmark: BenchmarkBreakdownSchema,
    unique_ratio: z.number().min(0).max(1),
    pairwise_dissimilarity: z.number().min(0).max(1),
    coverage: z.number().min(0).max(1),
  }),
});

export const IndirectEvaluationSchema = z.object({
  benchmark_similarity: z.number().min(0).max(1),
  open_evaluation: z.record(z.number().min(0).max(1)),
  overall: z.number().min(0).max(1),
  empty: z.boolean(),
});

export const EvaluationResultSchema = z.object({
  direct: DirectEvaluationSchema,
  indirect: IndirectEvaluationSchema,
});

export type BenchmarkBreakdown = z.infer<typeof BenchmarkBreakdownSchema>;
export type DirectEvaluation = z.infer<typeof DirectEvaluationSchema>;
export type IndirectEvaluation = z.infer<typeof IndirectEvaluationSchema>;
export type EvaluationResult = z.infer<typeof EvaluationResultSchema>;

// =============================================================================
// 7. Generation statistics and run report
// =============================================================================

export const GenerationStatisticsSchema = z.object({
  requested: z.number().int().nonnegative(),
  attempts: z.number().int().nonnegative(),
  accepted: z.number().int().nonnegative(),
  rejected: z.number().int().nonnegative(),
  recovered: z.number().int().nonnegative(),
  demonstrations_added: z.number().int().nonnegative(),
  fallback_groups: z.record(z.number().int().nonnegative()),
  rejection_issues: z.record(z.number().int().nonnegative()),
  aborted: z.boolean(),
  abort_reason: z.string().optional(),
  accepted_distribution: DistributionCountsSchema,
  observed_distribution: DistributionCountsSchema,
  mean_quality_score: z.number().min(0).max(1),
  mean_weight: z.number().nonnegative(),
  duration_ms: z.number().nonnegative(),
});

export type GenerationStatistics = z.infer<typeof GenerationStatisticsSchema>;

export const QualityTierCountsSchema = z.object({
  high: z.number().int().nonnegative(),
  medium: z.number().int().nonnegative(),
  low: z.number().int().nonnegative(),
});

export const RunReportSchema = z.object({
  run_id: z.string().uuid(),
  requested: z.number().int().nonnegative(),
  accepted: z.number().int().nonnegative(),
  quality_tiers: QualityTierCountsSchema,
  statistics: GenerationStatisticsSchema,
  evaluation: EvaluationResultSchema,
  started_at: z.string().datetime(),
  finished_at: z.string().datetime(),
});

export type RunReport = z.infer<typeof RunReportSchema>;

export const CreateRunReportInputSchema = RunReportSchema.omit({
  run_id: true,
  finished_at: true,
});

export type CreateRunReportInput = z.infer<typeof CreateRunReportInputSchema>;
