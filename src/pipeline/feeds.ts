// pattern: Imperative Shell
import Parser from "rss-parser";
import pLimit from "p-limit";
import type { Logger } from "pino";
import { truncate } from "./truncate";
import type { FeedItem, FetchOptions } from "./types";

type CustomItem = {
  dcDescription?: string;
};

export type FeedParser = Parser<Record<string, unknown>, CustomItem>;

let parserInstance: FeedParser | null = null;

export function createParser(): FeedParser {
  return new Parser<Record<string, unknown>, CustomItem>({
    customFields: {
      item: [["dc:description", "dcDescription"]],
    },
  });
}

export function getParserInstance(): FeedParser {
  if (!parserInstance) {
    parserInstance = createParser();
  }
  return parserInstance;
}

export function setParserInstance(parser: FeedParser): void {
  parserInstance = parser;
}

export function resetParser(): void {
  parserInstance = null;
}

// Wrapper tags feeds commonly put around summaries. Anything else stays.
const WRAPPER_TAG_PATTERN =
  /<\/?(?:p|div|span|br|b|i|strong|em)(?:\s[^>]*)?\/?>/gi;

export function stripWrapperTags(text: string): string {
  return text.replace(WRAPPER_TAG_PATTERN, "");
}

export function formatFeedItem(item: FeedItem): string {
  return (
    `- ${item.title}\n` +
    `  Summary: ${item.summary}...\n` +
    `  Link: ${item.link}\n\n`
  );
}

/**
 * Downloads one feed document. The timeout covers the whole exchange,
 * body included, and aborting it tears down the connection.
 */
async function downloadFeed(url: string, timeoutMs: number): Promise<string> {
  const response = await fetch(url, {
    signal: AbortSignal.timeout(timeoutMs),
    headers: {
      "User-Agent": "DailyBriefing/1.0 (feed reader)",
      Accept: "application/rss+xml, application/atom+xml, application/xml",
    },
  });

  if (!response.ok) {
    await response.body?.cancel();
    throw new Error(`HTTP ${response.status}: ${response.statusText}`);
  }

  return response.text();
}

async function fetchFeedBlock(
  url: string,
  maxItems: number,
  options: FetchOptions,
  logger: Logger,
): Promise<string> {
  try {
    const xml = await downloadFeed(url, options.timeoutMs);
    const feed = await getParserInstance().parseString(xml);
    logger.info({ feedUrl: url, feedTitle: feed.title ?? url }, "feed fetched");

    return feed.items
      .slice(0, maxItems)
      .map((entry) => {
        const rawSummary =
          entry.summary ??
          entry.content ??
          entry.contentSnippet ??
          entry.dcDescription ??
          "";
        return formatFeedItem({
          title: entry.title ?? "No Title",
          summary: truncate(
            stripWrapperTags(rawSummary),
            options.summaryMaxLength,
          ),
          link: entry.link ?? "",
        });
      })
      .join("");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn({ feedUrl: url, error: message }, "feed fetch failed");
    return "";
  }
}

/**
 * Fetches every feed in `urls` and serializes up to `maxItemsPerSource`
 * entries of each into one text block.
 *
 * A failing source contributes nothing and is logged; this never rejects.
 * Blocks appear in the order of `urls` whatever the concurrency.
 *
 * @returns The concatenated block, or `""` when every source failed
 */
export async function fetchFeeds(
  urls: ReadonlyArray<string>,
  maxItemsPerSource: number,
  logger: Logger,
  options: FetchOptions,
): Promise<string> {
  const limit = pLimit(options.maxConcurrency);

  const blocks = await Promise.all(
    urls.map((url) =>
      limit(() => fetchFeedBlock(url, maxItemsPerSource, options, logger)),
    ),
  );

  return blocks.join("");
}
