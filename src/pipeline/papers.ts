// pattern: Imperative Shell
import { z } from "zod";
import type { Logger } from "pino";
import { truncate } from "./truncate";
import type { FeedItem } from "./types";

export const PAPERS_HEADER = "--- Hugging Face Daily Papers ---\n";

const optionalText = z.string().optional().catch(undefined);

// Each field is read on its own so one malformed field never drops the entry.
const paperEntrySchema = z
  .object({
    title: optionalText,
    summary: optionalText,
    paper: z
      .object({
        id: optionalText,
        title: optionalText,
        summary: optionalText,
      })
      .optional()
      .catch(undefined),
  })
  .catch({});

export type PaperEntry = z.infer<typeof paperEntrySchema>;

export type PaperFetchOptions = {
  readonly linkBaseUrl: string;
  readonly summaryMaxLength: number;
  readonly timeoutMs: number;
};

export function toPaperItem(
  entry: PaperEntry,
  options: Pick<PaperFetchOptions, "linkBaseUrl" | "summaryMaxLength">,
): FeedItem {
  const summary = truncate(
    entry.summary ?? entry.paper?.summary ?? "No summary",
    options.summaryMaxLength,
  ).replace(/\r?\n/g, " ");
  const paperId = entry.paper?.id;
  const baseUrl = options.linkBaseUrl.replace(/\/+$/, "");

  return {
    title: entry.title ?? entry.paper?.title ?? "No Title",
    summary,
    link: paperId ? `${baseUrl}/${paperId}` : "No Link",
  };
}

export function formatPaperItem(item: FeedItem): string {
  return (
    `Title: ${item.title}\n` +
    `Link: ${item.link}\n` +
    `Summary: ${item.summary}...\n\n`
  );
}

/**
 * Fetches the curated paper listing and serializes the first `maxItems`
 * entries under {@link PAPERS_HEADER}.
 *
 * Never rejects: a non-200 status, a network error or an unexpected body
 * each yield a one-line placeholder so the briefing still has something to
 * say about papers.
 */
export async function fetchPapers(
  endpoint: string,
  maxItems: number,
  logger: Logger,
  options: PaperFetchOptions,
): Promise<string> {
  let response: Response;
  try {
    response = await fetch(endpoint, {
      signal: AbortSignal.timeout(options.timeoutMs),
      headers: {
        "User-Agent": "DailyBriefing/1.0 (paper listing reader)",
        Accept: "application/json",
      },
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn({ endpoint, error: message }, "paper listing fetch failed");
    return `Error fetching paper listing: ${message}`;
  }

  if (response.status !== 200) {
    await response.body?.cancel();
    logger.warn(
      { endpoint, status: response.status },
      "paper listing returned non-200",
    );
    return `Paper listing unavailable (HTTP ${response.status}).`;
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn({ endpoint, error: message }, "paper listing body is not JSON");
    return "Paper listing returned an unexpected payload.";
  }

  if (!Array.isArray(body)) {
    logger.warn({ endpoint }, "paper listing body is not an array");
    return "Paper listing returned an unexpected payload.";
  }

  const entries = body
    .slice(0, maxItems)
    .map((raw: unknown) => toPaperItem(paperEntrySchema.parse(raw), options));

  logger.info(
    { endpoint, paperCount: entries.length },
    "paper listing fetched",
  );
  return PAPERS_HEADER + entries.map(formatPaperItem).join("");
}
