import { ChatAnthropic } from "@langchain/anthropic";
import { ChatGoogleGenerativeAI } from "@langchain/google-genai";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { resolveProvider, type ModelProvider } from "./models.js";

export interface ChatModelOptions {
  model: string;
  apiKey?: string | undefined;
  temperature?: number | undefined;
  maxTokens?: number | undefined;
  provider?: ModelProvider | undefined;
}

/**
 * Creates a chat model instance for the configured provider.
 *
 * Supports "google" (default for gemini models) and "anthropic" (claude
 * models). Only this function (and this file) imports concrete provider
 * classes.
 */
export function createChatModel(config: ChatModelOptions): BaseChatModel {
  const provider = config.provider ?? resolveProvider(config.model);

  switch (provider) {
    case "anthropic":
      return new ChatAnthropic({
        model: config.model,
        ...(config.apiKey !== undefined && { apiKey: config.apiKey }),
        ...(config.temperature !== undefined && {
          temperature: config.temperature,
        }),
        ...(config.maxTokens !== undefined && { maxTokens: config.maxTokens }),
      });
    case "google":
    default:
      return new ChatGoogleGenerativeAI({
        model: config.model,
        ...(config.apiKey !== undefined && { apiKey: config.apiKey }),
        ...(config.temperature !== undefined && {
          temperature: config.temperature,
        }),
        ...(config.maxTokens !== undefined && {
          maxOutputTokens: config.maxTokens,
        }),
      });
  }
}
