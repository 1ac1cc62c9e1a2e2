/**
 * Sample-Wise Decomposer
 *
 * Builds one record by asking the oracle for each field group in schema
 * order. Every reply is validated against the group's schema before it
 * touches the record. A timeout, a rejected call or an invalid reply sends
 * that group (and only that group) to the rule generator, and the record's
 * metadata says so.
 *
 * This component does NOT:
 * - Decide what to generate (the scheduler does)
 * - Judge record quality (the filter does)
 * - Overwrite a field once an earlier group has set it
 */

import {
  pickFields,
  type CorrectionEntry,
  type GantryFields,
  type GenerationCondition,
  type RecordFields,
  type SynthRecord,
} from "../../schemas/index.js";
import { createRng, type Rng } from "../domain/rng.js";
import { OracleError, describeError } from "../errors.js";
import { resolveDemonstrations } from "./demonstration_selector.js";
import { buildFieldGroupPrompt } from "./prompt_builder.js";
import type { RuleGenerator } from "./rule_generator.js";
import type {
  DecomposerConfig,
  DemonstrationSet,
  FieldGroup,
  FieldGroupSchema,
  GroupPayload,
  TextGenerationOracle,
} from "./types.js";

const DEFAULT_CONFIG: Required<DecomposerConfig> = {
  timeoutMs: 15_000,
  seed: "decomposer",
  verbose: false,
};

export interface DecomposerDeps {
  schema: FieldGroupSchema;
  oracle: TextGenerationOracle;
  rules: RuleGenerator;
}

export class SampleDecomposer {
  private readonly config: Required<DecomposerConfig>;
  private readonly rng: Rng;

  constructor(private readonly deps: DecomposerDeps, config: DecomposerConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.rng = createRng(this.config.seed);
  }

  async decompose(
    condition: GenerationCondition,
    demonstrations: DemonstrationSet | readonly Readonly<RecordFields>[],
    generationIndex = 0
  ): Promise<SynthRecord> {
    const examples = resolveDemonstrations(demonstrations);
    const recordRng = this.rng.fork(`record-${generationIndex}`);

    let fields: Partial<GantryFields> = {};
    const correctionLog: CorrectionEntry[] = [];
    const fallbackGroups: string[] = [];

    for (const group of this.deps.schema.order) {
      let payload: GroupPayload;
      try {
        payload = await this.askOracle(group, condition, fields, examples);
      } catch (error) {
        const cause = describeError(error);
        console.warn(`[Decomposer] Group "${group.name}" fell back to rules: ${cause}`);
        payload = this.deps.rules.generate(group, condition, fields, recordRng.fork(group.name));
        fallbackGroups.push(group.name);
        correctionLog.push({ field: group.name, old: null, new: null, reason: `fallback: ${cause}` });
      }
      // Earlier groups win on any overlap
      fields = { ...pickFields(payload, group.fields), ...fields };
    }

    return {
      fields: Object.freeze(fields),
      meta: Object.freeze({
        validation_issues: [],
        correction_log: correctionLog,
        fallback_groups: fallbackGroups,
        generation_index: generationIndex,
      }),
    };
  }

  private async askOracle(
    group: FieldGroup,
    condition: GenerationCondition,
    partial: Readonly<Partial<GantryFields>>,
    examples: readonly Readonly<RecordFields>[]
  ): Promise<GroupPayload> {
    const prompt = buildFieldGroupPrompt(group, condition, partial, examples);
    const raw = await this.withTimeout(group.name, (signal) => this.deps.oracle.generate(prompt, signal));

    const parsed = group.payload.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
        .join("; ");
      throw new OracleError("invalid", `invalid ${group.name} reply: ${detail}`);
    }

    const missing = group.fields.filter((field) => parsed.data[field] === undefined);
    if (missing.length > 0) {
      throw new OracleError("invalid", `${group.name} reply lacks ${missing.join(", ")}`);
    }

    if (this.config.verbose) {
      console.log(`[Decomposer] ${this.deps.oracle.name} filled "${group.name}"`);
    }
    return parsed.data;
  }

  /**
   * Run an oracle call under the configured timeout. The race also covers
   * oracles that ignore the abort signal.
   */
  private async withTimeout<T>(groupName: string, call: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    const timeout = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        "abort",
        () => reject(new OracleError("timeout", `oracle timed out on "${groupName}" after ${this.config.timeoutMs}ms`)),
        { once: true }
      );
    });
    const timer = setTimeout(() => controller.abort(), this.config.timeoutMs);
    try {
      return await Promise.race([call(controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
