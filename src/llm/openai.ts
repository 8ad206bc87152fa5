import OpenAI, { type ClientOptions } from "openai";
import { APIError, OpenAIError } from "openai/error";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";

import {
  EMPTY_USAGE,
  createMissingApiKeyError,
  createResponseError,
  ensureJsonObject,
  requestWithRetries,
  type LlmClient,
  type LlmCompletionOptions,
  type LlmCompletionResult,
  type ProviderFailure,
  type RequestPolicy,
} from "./client.js";

// The slice of a ChatCompletion the client reads; the SDK's response type satisfies it.
export type OpenAiResponse = {
  choices: Array<{
    message: { content: string | null };
    finish_reason: string | null;
  }>;
  usage?: { prompt_tokens: number; completion_tokens: number } | null;
};

export type OpenAiTransport = {
  create: (
    body: ChatCompletionCreateParamsNonStreaming,
    options?: OpenAI.RequestOptions,
  ) => Promise<OpenAiResponse>;
};

export type OpenAiClientOptions = {
  model: string;
  apiKey?: string;
  // Any OpenAI-compatible server; the local tier points this at Ollama or llama.cpp.
  baseURL?: string;
  defaultTemperature?: number;
  defaultTimeoutMs?: number;
  maxRetries?: number;
  fetch?: ClientOptions["fetch"];
  transport?: OpenAiTransport;
};

/** Chat-completions client for OpenAI and every server that speaks its wire format. */
export class OpenAiClient implements LlmClient {
  private readonly transport: OpenAiTransport;
  private readonly policy: RequestPolicy;

  constructor(private readonly options: OpenAiClientOptions) {
    this.policy = { provider: "openai", maxRetries: options.maxRetries ?? 3, classify: classifyOpenAiFailure };
    this.transport = options.transport ?? connect(options);
  }

  async complete(prompt: string, options: LlmCompletionOptions = {}): Promise<LlmCompletionResult> {
    const body: ChatCompletionCreateParamsNonStreaming = {
      model: this.options.model,
      messages: [{ role: "user", content: prompt }],
      temperature: options.temperature ?? this.options.defaultTemperature ?? 0,
      stream: false,
    };
    if (options.schema !== undefined) {
      ensureJsonObject(options.schema);
      body.response_format = {
        type: "json_schema",
        json_schema: { name: "structured_output", schema: options.schema, strict: true },
      };
    }

    const timeout = options.timeoutMs ?? this.options.defaultTimeoutMs ?? 60_000;
    const response = await requestWithRetries(this.policy, () => this.transport.create(body, { timeout }));

    const [choice] = response.choices;
    const text = choice?.message.content ?? "";
    if (!text) {
      throw createResponseError("openai", "OpenAI response did not include assistant content.", { cause: response });
    }

    return {
      text,
      parsed: options.schema ? parseStructured(text) : undefined,
      finishReason: choice?.finish_reason ?? null,
      usage: response.usage
        ? { inputTokens: response.usage.prompt_tokens, outputTokens: response.usage.completion_tokens }
        : EMPTY_USAGE,
    };
  }
}

function connect(options: OpenAiClientOptions): OpenAiTransport {
  const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
  if (!apiKey) {
    throw createMissingApiKeyError("openai");
  }

  const client = new OpenAI({ apiKey, baseURL: options.baseURL, fetch: options.fetch, maxRetries: 0 });
  return { create: (body, requestOptions) => client.chat.completions.create(body, requestOptions) };
}

function classifyOpenAiFailure(error: unknown): ProviderFailure {
  if (error instanceof APIError) return { kind: "api", status: error.status };
  if (error instanceof OpenAIError) return { kind: "sdk" };
  return { kind: "other" };
}

function parseStructured(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text.trim());
    return parsed;
  } catch (err) {
    throw createResponseError("openai", "OpenAI returned invalid JSON for structured output.", {
      structured: true,
      cause: err,
    });
  }
}
