import { WaveSentinelError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type LlmProvider = "openai" | "anthropic";

export type LlmCompletionOptions = {
  /** JSON schema the reply must match; switches the provider into structured output. */
  schema?: Record<string, unknown>;
  temperature?: number;
  timeoutMs?: number;
};

export type LlmUsage = {
  inputTokens: number;
  outputTokens: number;
};

export type LlmCompletionResult = {
  text: string;
  /** Raw JSON when a schema was requested. Callers validate it themselves. */
  parsed?: unknown;
  finishReason: string | null;
  usage: LlmUsage;
};

/** What a repair tier needs from a model: one prompt in, one reply and its token usage out. */
export interface LlmClient {
  complete(prompt: string, options?: LlmCompletionOptions): Promise<LlmCompletionResult>;
}

// Local servers often omit usage; their tier is priced at zero anyway.
export const EMPTY_USAGE: LlmUsage = Object.freeze({ inputTokens: 0, outputTokens: 0 });

export class LlmError extends WaveSentinelError {}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

const PROVIDERS: Record<LlmProvider, { label: string; envVar: string; clientName: string }> = {
  openai: { label: "OpenAI", envVar: "OPENAI_API_KEY", clientName: "OpenAiClient" },
  anthropic: { label: "Anthropic", envVar: "ANTHROPIC_API_KEY", clientName: "AnthropicClient" },
};

export function createMissingApiKeyError(provider: LlmProvider, cause?: unknown): UserFacingError {
  const { label, envVar, clientName } = PROVIDERS[provider];
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: `${label} API key missing.`,
    message: `${label} API key is missing or invalid.`,
    hint: `Set ${envVar} or pass apiKey to ${clientName}.`,
    cause,
  });
}

/** The reply arrived but cannot be used: no content, or structured output that is not JSON. */
export function createResponseError(
  provider: LlmProvider,
  message: string,
  options: { structured?: boolean; cause?: unknown } = {},
): UserFacingError {
  const label = PROVIDERS[provider].label;
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.task,
    title: options.structured ? `${label} structured output invalid.` : `${label} response invalid.`,
    message,
    hint: options.structured
      ? "Retry the request or simplify the schema."
      : "Retry the request or check the provider status.",
    cause: options.cause,
  });
}

export function ensureJsonObject(
  value: unknown,
  errorFactory: () => Error = () => new LlmError("Structured output schema must be a plain JSON object."),
): asserts value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    throw errorFactory();
  }
}

// =============================================================================
// REQUESTS
// =============================================================================

/**
 * How a provider's SDK reports a failure. `api` covers HTTP and connection
 * errors (status is undefined for the latter); `sdk` covers the SDK's own
 * validation errors, which never succeed on retry.
 */
export type ProviderFailure = { kind: "api"; status?: number } | { kind: "sdk" } | { kind: "other" };

export type RequestPolicy = {
  provider: LlmProvider;
  maxRetries: number;
  classify: (error: unknown) => ProviderFailure;
};

const RETRIABLE_STATUS_CODES = new Set([408, 409, 425, 429, 500, 502, 503, 504]);

// SDK retries are turned off; this loop is the only one, with backoff of 250ms doubling up to 4s.
export async function requestWithRetries<T>(policy: RequestPolicy, send: () => Promise<T>): Promise<T> {
  const attempts = Math.max(1, policy.maxRetries);
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await send();
    } catch (err) {
      const failure = policy.classify(err);
      if (attempt >= attempts || !isRetriable(failure, err)) {
        throw toClientError(policy.provider, failure, err);
      }
      await delay(250 * 2 ** (Math.min(attempt, 5) - 1));
    }
  }
}

function isRetriable(failure: ProviderFailure, error: unknown): boolean {
  switch (failure.kind) {
    case "api":
      return failure.status === undefined || RETRIABLE_STATUS_CODES.has(failure.status);
    case "sdk":
      return false;
    case "other":
      return error instanceof Error && /timeout|ETIMEDOUT/i.test(error.message);
  }
}

function toClientError(provider: LlmProvider, failure: ProviderFailure, error: unknown): Error {
  const label = PROVIDERS[provider].label;
  if (failure.kind === "api" && (failure.status === 401 || failure.status === 403)) {
    return createMissingApiKeyError(provider, error);
  }

  const detail = error instanceof Error ? error.message : "unknown error";
  if (failure.kind === "api") {
    const rateLimited = failure.status === 429 ? ` Rate limited by ${label}.` : "";
    return new LlmError(
      `${label} request failed (status ${failure.status ?? "none"}): ${detail}${rateLimited}`,
      error,
    );
  }
  return new LlmError(`${label} request failed: ${detail}`, error);
}

function delay(durationMs: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, durationMs));
}
