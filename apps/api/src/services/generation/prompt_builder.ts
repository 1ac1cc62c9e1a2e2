/**
 * Prompt Builder
 *
 * Renders one oracle prompt per field group from prompts/field_group.md,
 * the generation condition, the record built so far and the selected
 * demonstrations. The machine-readable part always follows an `INPUT:`
 * line and ends at the next `---` separator.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import {
  GenerationConditionSchema,
  PoolRowSchema,
  pickFields,
  type GenerationCondition,
  type RecordFields,
} from "../../schemas/index.js";
import { packagePath } from "../domain/gantry_sections.js";
import { extractJSON } from "../llm_utils.js";
import type { FieldGroup, FieldGroupPromptInput } from "./types.js";

const INPUT_MARKER = "INPUT:\n";
const SEPARATOR = "\n---\n";

let cachedTemplate: string | null = null;

export function loadPromptTemplate(): string {
  if (cachedTemplate === null) {
    cachedTemplate = readFileSync(packagePath("prompts", "field_group.md"), "utf-8");
  }
  return cachedTemplate;
}

export function buildFieldGroupPrompt(
  group: FieldGroup,
  condition: GenerationCondition,
  partial: Readonly<RecordFields>,
  demonstrations: readonly Readonly<RecordFields>[],
  template: string = loadPromptTemplate()
): string {
  const input: FieldGroupPromptInput = {
    group: group.name,
    fields: [...group.fields],
    condition,
    partial_record: { ...partial },
    demonstrations: demonstrations.map((d) => pickFields(d, group.fields)),
  };

  return `
${template.trim()}
${SEPARATOR}
${INPUT_MARKER}${JSON.stringify(input, null, 2)}
${SEPARATOR}
Respond with valid JSON only. No markdown, no explanation.
`;
}

const PromptInputSchema = z.object({
  group: z.string(),
  fields: z.array(z.string()),
  condition: GenerationConditionSchema,
  partial_record: PoolRowSchema,
  demonstrations: z.array(PoolRowSchema),
});

/**
 * Recover the structured input from a rendered prompt.
 */
export function parseFieldGroupPrompt(prompt: string): FieldGroupPromptInput {
  const start = prompt.indexOf(INPUT_MARKER);
  if (start < 0) {
    throw new Error("prompt has no INPUT block");
  }
  const body = prompt.slice(start + INPUT_MARKER.length);
  const end = body.indexOf(SEPARATOR);
  return PromptInputSchema.parse(extractJSON(end < 0 ? body : body.slice(0, end)));
}
