import type { AppConfig, Secrets } from "../config";
import type { SummarizeOptions } from "./summarizer";

/**
 * Combines the llm config section with the resolved credential.
 */
export function summarizeOptionsFrom(
  config: AppConfig,
  secrets: Secrets,
): SummarizeOptions {
  return {
    provider: config.llm.provider,
    model: config.llm.model,
    apiKey: secrets.apiKey,
    baseUrl: config.llm.baseUrl,
    language: config.llm.language,
    timeoutMs: config.llm.timeoutMs,
  };
}
