import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import {
  HumanMessage,
  SystemMessage,
  isAIMessage,
  type AIMessage,
  type BaseMessage,
} from "@langchain/core/messages";
import type { z } from "zod";
import {
  ExternalServiceError,
  createLogger,
  errorMessage,
} from "@watch-audit/shared";
import type { ApiKeys } from "../config/analyzerConfig.js";
import {
  createChatModel,
  type ChatModelOptions,
} from "../config/modelFactory.js";
import { resolveProvider } from "../config/models.js";

const log = createLogger({ service: "model-client" });

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface GenerationRequest {
  model: string;
  prompt: string;
  systemInstruction?: string | undefined;
  /** When set, the model is asked for output matching this schema. */
  schema?: z.AnyZodObject | undefined;
  schemaName?: string | undefined;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface GenerationResult {
  model: string;
  text: string;
  usage: TokenUsage;
}

/**
 * One outbound generation call. Implementations never retry; a failed call
 * rejects with an {@link ExternalServiceError} carrying the causal message.
 */
export interface ModelClient {
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

// ---------------------------------------------------------------------------
// Response helpers
// ---------------------------------------------------------------------------

/**
 * Extracts the response text from an AIMessage. Structured-output calls come
 * back as a tool call, whose arguments are re-serialized so the caller
 * validates the same way for every provider.
 */
export function extractTextFromResponse(response: AIMessage): string {
  const toolCall = response.tool_calls?.[0];
  if (toolCall) {
    return JSON.stringify(toolCall.args);
  }

  if (typeof response.content === "string") {
    return response.content;
  }

  if (Array.isArray(response.content)) {
    return response.content
      .filter(
        (block): block is { type: "text"; text: string } =>
          typeof block === "object" &&
          block !== null &&
          "type" in block &&
          block.type === "text",
      )
      .map((block) => block.text)
      .join("");
  }

  return "";
}

export function extractUsage(response: AIMessage): TokenUsage {
  return {
    inputTokens: response.usage_metadata?.input_tokens ?? 0,
    outputTokens: response.usage_metadata?.output_tokens ?? 0,
  };
}

// ---------------------------------------------------------------------------
// LangChain-backed client
// ---------------------------------------------------------------------------

export interface LangChainModelClientOptions {
  apiKeys: Readonly<ApiKeys>;
  temperature?: number | undefined;
  maxTokens?: number | undefined;
  createModel?: (options: ChatModelOptions) => BaseChatModel;
}

export class LangChainModelClient implements ModelClient {
  private readonly models = new Map<string, BaseChatModel>();
  private readonly createModel: (options: ChatModelOptions) => BaseChatModel;

  constructor(private readonly options: LangChainModelClientOptions) {
    this.createModel = options.createModel ?? createChatModel;
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const messages: BaseMessage[] = [];
    if (request.systemInstruction) {
      messages.push(new SystemMessage(request.systemInstruction));
    }
    messages.push(new HumanMessage(request.prompt));

    let raw: BaseMessage;
    try {
      const model = this.modelFor(request.model);
      if (request.schema) {
        const structured = model.withStructuredOutput(request.schema, {
          includeRaw: true,
          name: request.schemaName ?? "structured_output",
        });
        const output = await structured.invoke(messages);
        raw = output.raw;
      } else {
        raw = await model.invoke(messages);
      }
    } catch (error) {
      log.warn("Model call failed", {
        model: request.model,
        error: errorMessage(error),
      });
      throw new ExternalServiceError(errorMessage(error), {
        cause: error instanceof Error ? error : undefined,
        context: { model: request.model },
      });
    }

    if (!isAIMessage(raw)) {
      throw new ExternalServiceError("Model returned no response", {
        context: { model: request.model },
      });
    }

    const text = extractTextFromResponse(raw);
    if (!text.trim()) {
      throw new ExternalServiceError("Model returned an empty response", {
        context: { model: request.model },
      });
    }

    return { model: request.model, text, usage: extractUsage(raw) };
  }

  private modelFor(name: string): BaseChatModel {
    const cached = this.models.get(name);
    if (cached) return cached;

    const provider = resolveProvider(name);
    const model = this.createModel({
      model: name,
      provider,
      apiKey:
        provider === "anthropic"
          ? this.options.apiKeys.anthropic
          : this.options.apiKeys.google,
      temperature: this.options.temperature,
      maxTokens: this.options.maxTokens,
    });
    this.models.set(name, model);
    return model;
  }
}

// ---------------------------------------------------------------------------
// Fallback
// ---------------------------------------------------------------------------

/**
 * Calls the requested model and, if that fails, tries `fallbackModel` exactly
 * once. The fallback's failure propagates.
 */
export async function generateWithFallback(
  client: ModelClient,
  request: GenerationRequest,
  fallbackModel: string,
): Promise<GenerationResult> {
  try {
    return await client.generate(request);
  } catch (error) {
    if (fallbackModel === request.model) throw error;
    log.warn("Primary model failed, trying fallback", {
      model: request.model,
      fallbackModel,
      error: errorMessage(error),
    });
    return client.generate({ ...request, model: fallbackModel });
  }
}
