import { createAnthropic } from "@ai-sdk/anthropic";
import { createOpenAI } from "@ai-sdk/openai";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { createOllama } from "ollama-ai-provider-v2";
import type { LanguageModel } from "ai";
import type { ProviderName } from "../config";

export const defaultBaseUrls: Readonly<
  Partial<Record<ProviderName, string>>
> = {
  deepseek: "https://api.deepseek.com",
  ollama: process.env["OLLAMA_BASE_URL"] ?? "http://localhost:11434/api",
  lmstudio: process.env["LMSTUDIO_BASE_URL"] ?? "http://localhost:1234/v1",
};

export type ModelSettings = {
  readonly provider: ProviderName;
  readonly modelId: string;
  readonly apiKey?: string;
  readonly baseUrl?: string;
};

/**
 * Builds a language model bound to an explicit credential. Provider factories
 * are created per call so no key is read from the process environment here.
 */
export function getModel(settings: ModelSettings): LanguageModel {
  const { provider, modelId, apiKey } = settings;
  const baseURL = settings.baseUrl ?? defaultBaseUrls[provider];

  switch (provider) {
    case "deepseek":
      return createOpenAICompatible({
        name: "deepseek",
        baseURL: baseURL ?? "https://api.deepseek.com",
        apiKey,
      })(modelId);
    case "openai":
      return createOpenAI({ apiKey, baseURL })(modelId);
    case "anthropic":
      return createAnthropic({ apiKey, baseURL })(modelId);
    case "gemini":
      return createGoogleGenerativeAI({ apiKey, baseURL })(modelId);
    case "ollama":
      return createOllama({ baseURL })(modelId);
    case "lmstudio":
      return createOpenAICompatible({
        name: "lmstudio",
        baseURL: baseURL ?? "http://localhost:1234/v1",
      })(modelId);
    default: {
      const _exhaustive: never = provider;
      throw new Error(`unknown provider: ${_exhaustive}`);
    }
  }
}
