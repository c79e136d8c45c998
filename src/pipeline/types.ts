export const categories = ["tech", "finance", "papers"] as const;

export type Category = (typeof categories)[number];

/**
 * One entry pulled from a feed or the paper listing, already cleaned and
 * truncated. Lives only until it is serialized into a text block.
 */
export type FeedItem = {
  readonly title: string;
  readonly summary: string;
  readonly link: string;
};

/**
 * One text block per category. Blocks may be empty when every source of a
 * category failed; that is valid input downstream.
 */
export type CategoryBuffers = Readonly<Record<Category, string>>;

export type CategorySources = Readonly<Record<Category, ReadonlyArray<string>>>;

export type FetchOptions = {
  readonly summaryMaxLength: number;
  readonly timeoutMs: number;
  readonly maxConcurrency: number;
};
