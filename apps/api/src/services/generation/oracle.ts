/**
 * Hosted Text-Generation Oracle
 *
 * Sends a field-group prompt to Gemini or OpenAI and returns the JSON found
 * in the reply. Rate-limit responses are retried by fetchWithRetry; any
 * other failure rejects with an OracleError for the decomposer to absorb.
 *
 * This component does NOT:
 * - Validate field values (the decomposer does, per group)
 * - Fall back to rules
 */

import { OracleError, describeError } from "../errors.js";
import { extractJSON, fetchWithRetry, isObject, type RetryConfig } from "../llm_utils.js";
import type { TextGenerationOracle } from "./types.js";

export interface LLMOracleConfig {
  provider: "gemini" | "openai";
  model?: string;
  apiKey?: string;
  temperature?: number;
  maxOutputTokens?: number;
  retry?: RetryConfig;
}

const DEFAULT_MODELS = {
  gemini: "gemini-2.0-flash",
  openai: "gpt-4o-mini",
} as const;

const SYSTEM_PROMPT =
  "You generate synthetic highway toll-gantry transaction fields. Output valid JSON only.";

export class LLMOracle implements TextGenerationOracle {
  readonly name: string;
  private readonly config: LLMOracleConfig;
  private readonly model: string;

  constructor(config: LLMOracleConfig) {
    this.config = { temperature: 0.7, maxOutputTokens: 1024, ...config };
    this.model = config.model ?? DEFAULT_MODELS[config.provider];
    this.name = `${config.provider}:${this.model}`;
  }

  async generate(prompt: string, signal?: AbortSignal): Promise<unknown> {
    let text: string;
    try {
      text =
        this.config.provider === "gemini"
          ? await this.callGemini(prompt, signal)
          : await this.callOpenAI(prompt, signal);
    } catch (error) {
      if (error instanceof OracleError) throw error;
      throw new OracleError("transport", `${this.name} request failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    try {
      return extractJSON(text);
    } catch (error) {
      throw new OracleError("malformed", describeError(error), { cause: error });
    }
  }

  private requireKey(): string {
    const key = this.config.apiKey;
    if (!key) {
      throw new OracleError("transport", `${this.config.provider} API key not set`);
    }
    return key;
  }

  private async callGemini(prompt: string, signal?: AbortSignal): Promise<string> {
    const url =
      `https://generativelanguage.googleapis.com/v1beta/models/${this.model}:generateContent` +
      `?key=${this.requireKey()}`;

    const response = await fetchWithRetry(
      url,
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          systemInstruction: { parts: [{ text: SYSTEM_PROMPT }] },
          contents: [{ parts: [{ text: prompt }] }],
          generationConfig: {
            temperature: this.config.temperature,
            maxOutputTokens: this.config.maxOutputTokens,
            responseMimeType: "application/json",
          },
        }),
        signal,
      },
      this.config.retry
    );

    if (!response.ok) {
      const errorText = await response.text();
      throw new OracleError("transport", `Gemini API error: ${response.status} - ${errorText}`);
    }

    const data: unknown = await response.json();
    const text = geminiText(data);
    if (!text) {
      throw new OracleError("malformed", "No text in Gemini response");
    }
    return text;
  }

  private async callOpenAI(prompt: string, signal?: AbortSignal): Promise<string> {
    const response = await fetchWithRetry(
      "https://api.openai.com/v1/chat/completions",
      {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.requireKey()}`,
        },
        body: JSON.stringify({
          model: this.model,
          messages: [
            { role: "system", content: SYSTEM_PROMPT },
            { role: "user", content: prompt },
          ],
          temperature: this.config.temperature,
          max_tokens: this.config.maxOutputTokens,
          response_format: { type: "json_object" },
        }),
        signal,
      },
      this.config.retry
    );

    if (!response.ok) {
      const errorText = await response.text();
      throw new OracleError("transport", `OpenAI API error: ${response.status} - ${errorText}`);
    }

    const data: unknown = await response.json();
    const text = openAIText(data);
    if (!text) {
      throw new OracleError("malformed", "No text in OpenAI response");
    }
    return text;
  }
}

function geminiText(data: unknown): string | undefined {
  if (!isObject(data) || !Array.isArray(data.candidates)) return undefined;
  const candidate: unknown = data.candidates[0];
  if (!isObject(candidate) || !isObject(candidate.content)) return undefined;
  const parts = candidate.content.parts;
  if (!Array.isArray(parts)) return undefined;
  const first: unknown = parts[0];
  return isObject(first) && typeof first.text === "string" ? first.text : undefined;
}

function openAIText(data: unknown): string | undefined {
  if (!isObject(data) || !Array.isArray(data.choices)) return undefined;
  const choice: unknown = data.choices[0];
  if (!isObject(choice) || !isObject(choice.message)) return undefined;
  return typeof choice.message.content === "string" ? choice.message.content : undefined;
}
