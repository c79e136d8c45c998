// pattern: Functional Core

/**
 * First `maxLength` code points of `text`. Counting code points keeps
 * surrogate pairs whole, so an emoji is either kept or dropped entirely.
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return Array.from(text).slice(0, maxLength).join("");
}
