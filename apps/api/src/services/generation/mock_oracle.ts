/**
 * Mock Oracle
 *
 * Deterministic stand-in for a hosted model. It reads the INPUT block of
 * the prompt and answers with the rule generator's values, so demos and
 * tests run offline. It can be told to fail whole groups, to corrupt a
 * share of its answers, or to answer slowly.
 */

import { createRng, type Rng } from "../domain/rng.js";
import { sleep } from "../llm_utils.js";
import { parseFieldGroupPrompt } from "./prompt_builder.js";
import type { RuleGenerator } from "./rule_generator.js";
import type { FieldGroupSchema, TextGenerationOracle } from "./types.js";

export interface MockOracleConfig {
  seed?: string | number;
  /** Groups whose calls always reject */
  failGroups?: readonly string[];
  /** Share of answers (0..1) returned with one field garbled */
  corruptionRate?: number;
  /** Delay before answering, in ms */
  latencyMs?: number;
}

export class MockOracle implements TextGenerationOracle {
  readonly name = "mock";
  private readonly rng: Rng;
  private readonly failGroups: ReadonlySet<string>;
  private calls = 0;

  constructor(
    private readonly schema: FieldGroupSchema,
    private readonly rules: RuleGenerator,
    private readonly config: MockOracleConfig = {}
  ) {
    this.rng = createRng(config.seed ?? "mock-oracle");
    this.failGroups = new Set(config.failGroups ?? []);
  }

  /** Number of prompts answered or rejected so far */
  get callCount(): number {
    return this.calls;
  }

  async generate(prompt: string, signal?: AbortSignal): Promise<unknown> {
    this.calls++;
    const input = parseFieldGroupPrompt(prompt);

    if (this.config.latencyMs) {
      await sleep(this.config.latencyMs, signal);
    }

    if (this.failGroups.has(input.group)) {
      throw new Error(`mock oracle refuses group "${input.group}"`);
    }
    const group = this.schema.groups.get(input.group);
    if (!group) {
      throw new Error(`mock oracle has no group "${input.group}"`);
    }

    const callRng = this.rng.fork(`call-${this.calls}`);
    const payload: Record<string, unknown> = {
      ...this.rules.generate(group, input.condition, input.partial_record, callRng),
    };

    const rate = this.config.corruptionRate ?? 0;
    if (rate > 0 && callRng.next() < rate) {
      payload[group.fields[0]] = "<unreadable>";
    }
    return payload;
  }
}
