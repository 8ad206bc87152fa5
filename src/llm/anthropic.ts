import Anthropic, { APIError, AnthropicError } from "@anthropic-ai/sdk";
import type {
  MessageCreateParamsNonStreaming,
  Tool,
} from "@anthropic-ai/sdk/resources/messages/messages";

import {
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

// =============================================================================
// TYPES
// =============================================================================

export type AnthropicRequestOptions = {
  timeout?: number;
};

// The slice of a Message the client reads; the SDK's response type satisfies it.
export type AnthropicResponse = {
  content: Array<{ type: string; text?: unknown; input?: unknown }>;
  stop_reason: string | null;
  usage: { input_tokens: number; output_tokens: number };
};

export type AnthropicTransport = {
  create: (
    body: MessageCreateParamsNonStreaming,
    options?: AnthropicRequestOptions,
  ) => Promise<AnthropicResponse>;
};

export type AnthropicClientOptions = {
  model: string;
  apiKey?: string;
  baseURL?: string;
  defaultTemperature?: number;
  defaultTimeoutMs?: number;
  defaultMaxTokens?: number;
  maxRetries?: number;
  transport?: AnthropicTransport;
};

const DEFAULT_MAX_TOKENS = 8192;
const STRUCTURED_OUTPUT_TOOL = "structured_output";

// =============================================================================
// CLIENT
// =============================================================================

/**
 * Messages-API client. Structured output is requested by forcing a single tool
 * whose input schema is the caller's schema; the tool input is the reply.
 */
export class AnthropicClient implements LlmClient {
  private readonly transport: AnthropicTransport;
  private readonly policy: RequestPolicy;

  constructor(private readonly options: AnthropicClientOptions) {
    this.policy = { provider: "anthropic", maxRetries: options.maxRetries ?? 3, classify: classifyAnthropicFailure };
    this.transport = options.transport ?? connect(options);
  }

  async complete(prompt: string, options: LlmCompletionOptions = {}): Promise<LlmCompletionResult> {
    const body: MessageCreateParamsNonStreaming = {
      model: this.options.model,
      messages: [{ role: "user", content: prompt }],
      max_tokens: this.options.defaultMaxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: options.temperature ?? this.options.defaultTemperature ?? 0,
      stream: false,
    };
    if (options.schema !== undefined) {
      ensureJsonObject(options.schema);
      body.tools = [structuredOutputTool(options.schema)];
      body.tool_choice = { type: "tool", name: STRUCTURED_OUTPUT_TOOL };
    }

    const timeout = options.timeoutMs ?? this.options.defaultTimeoutMs ?? 120_000;
    const response = await requestWithRetries(this.policy, () => this.transport.create(body, { timeout }));
    const finishReason = response.stop_reason;
    const usage = { inputTokens: response.usage.input_tokens, outputTokens: response.usage.output_tokens };

    if (options.schema) {
      const input = toolInput(response);
      return { text: JSON.stringify(input), parsed: input, finishReason, usage };
    }

    const text = response.content
      .map((block) => (block.type === "text" && typeof block.text === "string" ? block.text : ""))
      .join("")
      .trim();
    if (!text) {
      throw createResponseError("anthropic", "Anthropic response did not include assistant content.", {
        cause: response,
      });
    }
    return { text, finishReason, usage };
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function connect(options: AnthropicClientOptions): AnthropicTransport {
  const apiKey = options.apiKey ?? process.env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw createMissingApiKeyError("anthropic");
  }

  const client = new Anthropic({ apiKey, baseURL: options.baseURL, maxRetries: 0 });
  return { create: (body, requestOptions) => client.messages.create(body, requestOptions) };
}

function classifyAnthropicFailure(error: unknown): ProviderFailure {
  if (error instanceof APIError) return { kind: "api", status: error.status };
  if (error instanceof AnthropicError) return { kind: "sdk" };
  return { kind: "other" };
}

function structuredOutputTool(schema: Record<string, unknown>): Tool {
  return {
    name: STRUCTURED_OUTPUT_TOOL,
    description: "Return JSON that matches the provided schema.",
    input_schema: { ...schema, type: "object" },
  };
}

function toolInput(message: AnthropicResponse): Record<string, unknown> {
  const block = message.content.find((candidate) => candidate.type === "tool_use");
  if (!block) {
    throw createResponseError(
      "anthropic",
      "Anthropic response did not include a tool_use block for structured output.",
      { structured: true, cause: message },
    );
  }

  const input = block.input;
  ensureJsonObject(input, () =>
    createResponseError("anthropic", "Anthropic tool input was not a JSON object.", { structured: true }),
  );
  return input;
}
