// pattern: Functional Core
import { truncate } from "./truncate";
import type { CategoryBuffers } from "./types";

/**
 * Cuts every category block down to its first `maxChars` characters,
 * counted as code points. Plain prefix cut, so the last item of a block may
 * end mid-word. Applying it twice gives the same result as applying it once.
 */
export function aggregate(
  results: CategoryBuffers,
  maxChars: number,
): CategoryBuffers {
  return {
    tech: truncate(results.tech, maxChars),
    finance: truncate(results.finance, maxChars),
    papers: truncate(results.papers, maxChars),
  };
}
