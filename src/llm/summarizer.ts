// pattern: Imperative Shell
import { generateText } from "ai";
import type { Logger } from "pino";
import type { ProviderName } from "../config";
import { apiKeyEnvVars } from "../config/secrets";
import type { CategoryBuffers } from "../pipeline/types";
import { getModel } from "./providers";
import { BRIEFING_SYSTEM_PROMPT, buildBriefingPrompt } from "./prompt";

export const BRIEFING_TEMPERATURE = 1.3;

export type SummarizeError =
  | { readonly kind: "MissingCredential"; readonly message: string }
  | { readonly kind: "BackendError"; readonly message: string };

export type SummarizeResult =
  | { readonly success: true; readonly report: string }
  | { readonly success: false; readonly error: SummarizeError };

export type SummarizeOptions = {
  readonly provider: ProviderName;
  readonly model: string;
  readonly apiKey?: string;
  readonly baseUrl?: string;
  readonly language: string;
  readonly timeoutMs: number;
};

/**
 * Asks the backend for the briefing report in one request.
 *
 * No retry and no streaming. The completion is returned verbatim; whether it
 * actually contains the requested sections is not checked.
 */
export async function summarize(
  request: CategoryBuffers,
  options: SummarizeOptions,
  logger: Logger,
): Promise<SummarizeResult> {
  const keyVar = apiKeyEnvVars[options.provider];
  if (keyVar && !options.apiKey) {
    const message = `${keyVar} is not set`;
    logger.error({ provider: options.provider }, message);
    return { success: false, error: { kind: "MissingCredential", message } };
  }

  logger.info(
    { provider: options.provider, model: options.model },
    "requesting briefing from backend",
  );

  try {
    const model = getModel({
      provider: options.provider,
      modelId: options.model,
      apiKey: options.apiKey,
      baseUrl: options.baseUrl,
    });

    const response = await generateText({
      model,
      system: BRIEFING_SYSTEM_PROMPT,
      prompt: buildBriefingPrompt(request, options.language),
      temperature: BRIEFING_TEMPERATURE,
      maxRetries: 0,
      abortSignal: AbortSignal.timeout(options.timeoutMs),
    });

    if (!response.text.trim()) {
      throw new Error("backend returned an empty completion");
    }

    logger.info({ reportChars: response.text.length }, "briefing received");
    return { success: true, report: response.text };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(
      { provider: options.provider, error: message },
      "backend request failed",
    );
    return { success: false, error: { kind: "BackendError", message } };
  }
}
