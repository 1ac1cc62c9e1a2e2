/**
 * Shared Oracle Utilities
 *
 * Retry with exponential backoff for hosted text-generation APIs and
 * JSON extraction from free-form model replies.
 *
 * Used by: generation/oracle.ts, generation/mock_oracle.ts
 */

// =============================================================================
// Retry with Exponential Backoff
// =============================================================================

export interface RetryConfig {
  /** Max number of retries (default: 2) */
  maxRetries?: number;
  /** Base delay in ms (default: 1000) */
  baseDelay?: number;
  /** Maximum delay in ms (default: 10000) */
  maxDelay?: number;
}

const DEFAULT_RETRY: Required<RetryConfig> = {
  maxRetries: 2,
  baseDelay: 1000,
  maxDelay: 10000,
};

const RETRYABLE_STATUS = new Set([429, 503]);

/**
 * Fetch with retry on 429 (rate limit) and 503 (overloaded). Honors a
 * Retry-After header or a Gemini RetryInfo hint. Aborting `init.signal`
 * also cancels the wait between attempts.
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit,
  config: RetryConfig = {}
): Promise<Response> {
  const opts = { ...DEFAULT_RETRY, ...config };

  for (let attempt = 0; ; attempt++) {
    const response = await fetch(url, init);
    if (!RETRYABLE_STATUS.has(response.status) || attempt >= opts.maxRetries) {
      return response;
    }

    const hinted = await retryHintMs(response);
    const delay = Math.min(hinted ?? opts.baseDelay * 2 ** attempt, opts.maxDelay);

    console.log(
      `[Oracle] ${response.status} on attempt ${attempt + 1}/${opts.maxRetries + 1}. ` +
        `Retrying in ${Math.round(delay / 1000)}s...`
    );
    await sleep(delay, init.signal ?? undefined);
  }
}

async function retryHintMs(response: Response): Promise<number | null> {
  const header = response.headers.get("Retry-After");
  if (header) {
    const seconds = parseInt(header, 10);
    if (!isNaN(seconds)) return seconds * 1000 + 1000;
  }

  const body: unknown = await response
    .clone()
    .json()
    .catch(() => null);
  const delay = findRetryDelay(body);
  if (delay) {
    const seconds = parseFloat(delay.replace("s", ""));
    if (!isNaN(seconds) && seconds > 0) return seconds * 1000 + 1000;
  }
  return null;
}

function findRetryDelay(body: unknown): string | null {
  if (!isObject(body) || !isObject(body.error)) return null;
  const details = body.error.details;
  if (!Array.isArray(details)) return null;
  for (const detail of details) {
    if (
      isObject(detail) &&
      typeof detail["@type"] === "string" &&
      detail["@type"].includes("RetryInfo") &&
      typeof detail.retryDelay === "string"
    ) {
      return detail.retryDelay;
    }
  }
  return null;
}

// =============================================================================
// JSON Extraction
// =============================================================================

/**
 * Extract a JSON value from a reply that may contain:
 * - Markdown code fences (```json ... ```)
 * - Prose before the JSON
 * - A truncated object (closed by repair)
 */
export function extractJSON(response: string): unknown {
  let text = response.trim();

  const fenced = /```(?:json)?\s*([\s\S]*?)(?:```|$)/.exec(text);
  if (fenced) {
    text = fenced[1].trim();
  }

  try {
    return JSON.parse(text);
  } catch {
    // fall through to the scanning strategies
  }

  const starts = [text.indexOf("{"), text.indexOf("[")].filter((i) => i >= 0);
  if (starts.length === 0) {
    throw new Error(`No JSON object found in response: ${text.substring(0, 200)}...`);
  }

  const candidate = text.substring(Math.min(...starts));
  try {
    return JSON.parse(candidate);
  } catch {
    return repairAndParse(candidate);
  }
}

/**
 * Close an unterminated string and any open braces or brackets.
 */
function repairAndParse(text: string): unknown {
  let repaired = text.trim();
  const closers: string[] = [];
  let inString = false;

  for (let i = 0; i < repaired.length; i++) {
    const ch = repaired[i];
    if (ch === '"' && repaired[i - 1] !== "\\") {
      inString = !inString;
      continue;
    }
    if (inString) continue;
    if (ch === "{") closers.push("}");
    else if (ch === "[") closers.push("]");
    else if (ch === "}" || ch === "]") closers.pop();
  }

  if (inString) repaired += '"';
  repaired = repaired.replace(/,\s*$/, "");
  repaired += closers.reverse().join("");

  try {
    return JSON.parse(repaired);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(
      `Failed to parse or repair JSON: ${reason}\n` +
        `Original (first 300 chars): ${text.substring(0, 300)}`
    );
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
