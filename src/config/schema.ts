import { z } from "zod";

export const providerNames = [
  "deepseek",
  "openai",
  "anthropic",
  "gemini",
  "ollama",
  "lmstudio",
] as const;

export const deliveryFormats = ["plain", "html"] as const;

const feedUrlListSchema = z.array(z.string().url()).default([]);

export const appConfigSchema = z.object({
  llm: z
    .object({
      provider: z.enum(providerNames).default("deepseek"),
      model: z.string().min(1).default("deepseek-chat"),
      baseUrl: z.string().url().optional(),
      language: z.string().min(1).default("Simplified Chinese"),
      timeoutMs: z.number().int().positive().default(300_000),
    })
    .default({}),
  sources: z.object({
    tech: feedUrlListSchema,
    finance: feedUrlListSchema,
    papers: feedUrlListSchema,
  }),
  papers: z
    .object({
      endpoint: z
        .string()
        .url()
        .default("https://huggingface.co/api/daily_papers"),
      linkBaseUrl: z.string().url().default("https://huggingface.co/papers"),
      maxItems: z.number().int().positive().default(5),
    })
    .default({}),
  fetch: z
    .object({
      maxItemsPerSource: z.number().int().positive().default(3),
      summaryMaxLength: z.number().int().positive().default(200),
      maxConcurrency: z.number().int().positive().default(1),
      timeoutMs: z.number().int().positive().default(10_000),
    })
    .default({}),
  briefing: z
    .object({
      maxCategoryChars: z.number().int().positive().default(4000),
      format: z.enum(deliveryFormats).default("html"),
      subjectPrefix: z.string().min(1).default("[AI Daily]"),
    })
    .default({}),
  schedule: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type ProviderName = AppConfig["llm"]["provider"];
export type DeliveryFormat = AppConfig["briefing"]["format"];
