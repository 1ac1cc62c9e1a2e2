/**
 * Runtime configuration from environment variables.
 *
 * Entry points load `.env` with dotenv first; this module only reads the
 * resulting environment and validates it. Blank variables count as unset.
 */

import { z } from "zod";
import { ConfigurationError } from "./errors.js";

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === "" ? undefined : value.trim()));

function numberVar(fallback: number, bounds: { min: number; max?: number; int?: boolean }) {
  let schema = z.number().min(bounds.min);
  if (bounds.max !== undefined) schema = schema.max(bounds.max);
  if (bounds.int) schema = schema.int();
  return optionalText.pipe(z.coerce.number().pipe(schema).optional()).transform((v) => v ?? fallback);
}

const booleanVar = optionalText.pipe(
  z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .optional()
    .transform((v) => v === "true" || v === "1" || v === "yes")
);

export const EnvSchema = z.object({
  SYNTH_ORACLE_PROVIDER: optionalText.pipe(z.enum(["mock", "gemini", "openai"]).default("mock")),
  GEMINI_API_KEY: optionalText,
  GOOGLE_API_KEY: optionalText,
  GEMINI_MODEL: optionalText,
  OPENAI_API_KEY: optionalText,
  OPENAI_MODEL: optionalText,
  SYNTH_ORACLE_TIMEOUT_MS: numberVar(15_000, { min: 1, int: true }),
  SYNTH_ACCEPT_THRESHOLD: numberVar(0.8, { min: 0, max: 1 }),
  SYNTH_MAX_TRAVEL_HOURS: numberVar(6, { min: 0.5 }),
  SYNTH_SEED: optionalText,
  SYNTH_CONCURRENCY: numberVar(1, { min: 1, max: 64, int: true }),
  SYNTH_DEMONSTRATIONS: numberVar(2, { min: 0, max: 20, int: true }),
  SYNTH_MULTI_CANDIDATE: booleanVar,
  SYNTH_SELF_INSTRUCT_ROUNDS: numberVar(1, { min: 1, max: 20, int: true }),
  SYNTH_TRAINING_POOL: optionalText,
  SYNTH_BENCHMARK_POOL: optionalText,
  SYNTH_DATA_DIR: optionalText,
});

export type OracleProvider = "mock" | "gemini" | "openai";

export interface SynthConfig {
  oracle: {
    provider: OracleProvider;
    model?: string;
    apiKey?: string;
    timeoutMs: number;
  };
  acceptThreshold: number;
  maxTravelHours: number;
  seed: string;
  concurrency: number;
  demonstrations: number;
  multiCandidate: boolean;
  selfInstructRounds: number;
  trainingPoolPath?: string;
  benchmarkPoolPath?: string;
  dataDir?: string;
}

export const DEFAULT_SEED = "gantry-synth";

/**
 * Validate the environment and build the runtime configuration.
 * Throws ConfigurationError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SynthConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`invalid environment: ${problems}`, { cause: parsed.error });
  }

  const e = parsed.data;
  const provider = e.SYNTH_ORACLE_PROVIDER;

  const apiKey =
    provider === "gemini"
      ? e.GEMINI_API_KEY ?? e.GOOGLE_API_KEY
      : provider === "openai"
        ? e.OPENAI_API_KEY
        : undefined;
  if (provider !== "mock" && !apiKey) {
    throw new ConfigurationError(
      provider === "gemini"
        ? "Gemini API key not set (GEMINI_API_KEY or GOOGLE_API_KEY)"
        : "OpenAI API key not set (OPENAI_API_KEY)"
    );
  }

  return {
    oracle: {
      provider,
      model: provider === "gemini" ? e.GEMINI_MODEL : provider === "openai" ? e.OPENAI_MODEL : undefined,
      apiKey,
      timeoutMs: e.SYNTH_ORACLE_TIMEOUT_MS,
    },
    acceptThreshold: e.SYNTH_ACCEPT_THRESHOLD,
    maxTravelHours: e.SYNTH_MAX_TRAVEL_HOURS,
    seed: e.SYNTH_SEED ?? DEFAULT_SEED,
    concurrency: e.SYNTH_CONCURRENCY,
    demonstrations: e.SYNTH_DEMONSTRATIONS,
    multiCandidate: e.SYNTH_MULTI_CANDIDATE,
    selfInstructRounds: e.SYNTH_SELF_INSTRUCT_ROUNDS,
    trainingPoolPath: e.SYNTH_TRAINING_POOL,
    benchmarkPoolPath: e.SYNTH_BENCHMARK_POOL,
    dataDir: e.SYNTH_DATA_DIR,
  };
}
