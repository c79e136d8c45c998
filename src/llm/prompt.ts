// pattern: Functional Core
import type { CategoryBuffers } from "../pipeline/types";

export const BRIEFING_SYSTEM_PROMPT =
  "You are a helpful, professional briefing assistant.";

/**
 * Section headings the report must use, in order.
 */
export const BRIEFING_SECTIONS = [
  "## 🏦 Markets (market sentiment and the key stories)",
  "## 🚀 Technology (big-company moves, new hardware and software)",
  "## 📑 Papers (the most valuable AI papers from Hugging Face and arXiv)",
  "## 💡 Insight (one or two sentences of your own analysis based on all of the above)",
] as const;

/**
 * Builds the single instruction sent to the backend. The category blocks are
 * embedded as given; callers truncate them first.
 */
export function buildBriefingPrompt(
  buffers: CategoryBuffers,
  language: string,
): string {
  return [
    "You are a professional technology and finance intelligence analyst.",
    "Write today's briefing for me from the raw data collected below.",
    "",
    "[Requirements]",
    `1. Language: ${language}.`,
    "2. Format: clean Markdown.",
    "3. Structure, using exactly these section headings:",
    ...BRIEFING_SECTIONS.map((section) => `   ${section}`),
    "4. Tone: concise, analytical and neutral.",
    "",
    "[Raw data]",
    "=== Technology news ===",
    buffers.tech,
    "",
    "=== Finance news ===",
    buffers.finance,
    "",
    "=== Papers ===",
    buffers.papers,
  ].join("\n");
}
