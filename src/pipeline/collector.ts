// pattern: Imperative Shell
import type { Logger } from "pino";
import { fetchFeeds } from "./feeds";
import { fetchPapers } from "./papers";
import type { CategoryBuffers, CategorySources, FetchOptions } from "./types";

export type CollectOptions = FetchOptions & {
  readonly maxItemsPerSource: number;
  readonly papers: {
    readonly endpoint: string;
    readonly linkBaseUrl: string;
    readonly maxItems: number;
  };
};

/**
 * Runs every fetcher and groups the output by category. The papers block is
 * the paper listing followed by the papers feeds.
 */
export async function collectCategoryBuffers(
  sources: CategorySources,
  options: CollectOptions,
  logger: Logger,
): Promise<CategoryBuffers> {
  const tech = await fetchFeeds(
    sources.tech,
    options.maxItemsPerSource,
    logger,
    options,
  );
  const finance = await fetchFeeds(
    sources.finance,
    options.maxItemsPerSource,
    logger,
    options,
  );
  const listing = await fetchPapers(
    options.papers.endpoint,
    options.papers.maxItems,
    logger,
    {
      linkBaseUrl: options.papers.linkBaseUrl,
      summaryMaxLength: options.summaryMaxLength,
      timeoutMs: options.timeoutMs,
    },
  );
  const paperFeeds = await fetchFeeds(
    sources.papers,
    options.maxItemsPerSource,
    logger,
    options,
  );

  logger.info(
    {
      techChars: tech.length,
      financeChars: finance.length,
      papersChars: listing.length + 1 + paperFeeds.length,
    },
    "sources collected",
  );

  return { tech, finance, papers: `${listing}\n${paperFeeds}` };
}
