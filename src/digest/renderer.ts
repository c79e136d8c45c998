// pattern: Functional Core
import { Marked } from "marked";
import type { DeliveryFormat } from "../config";

export type FormattedBody = Readonly<{
  plainTextBody: string;
  htmlBody?: string;
}>;

export const HTML_FALLBACK_NOTICE =
  "This briefing is formatted as HTML. Please open it in a mail client that can display HTML.";

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

// Raw HTML inside the report is shown as text, never passed through.
const markdown = new Marked({
  gfm: true,
  renderer: {
    html({ text }) {
      return escapeHtml(text);
    },
  },
});

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local calendar date as `YYYY-MM-DD`. */
export function formatDate(date: Date): string {
  const month = pad(date.getMonth() + 1);
  return `${date.getFullYear()}-${month}-${pad(date.getDate())}`;
}

/** Local wall-clock time as `YYYY-MM-DD HH:mm`. */
export function formatTimestamp(date: Date): string {
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}`;
  return `${formatDate(date)} ${time}`;
}

export function renderMarkdown(report: string): string {
  return markdown.parse(report, { async: false });
}

const STYLES = `
    body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", "Helvetica Neue", Arial, "PingFang SC", "Microsoft YaHei", sans-serif; line-height: 1.6; color: #333333; background-color: #f6f8fa; margin: 0; padding: 20px; }
    .container { max-width: 800px; margin: 0 auto; background-color: #ffffff; padding: 24px 32px; border-radius: 8px; }
    h1 { color: #1a73e8; border-bottom: 2px solid #1a73e8; padding-bottom: 8px; }
    h2 { color: #2c3e50; border-left: 4px solid #1a73e8; padding-left: 10px; margin-top: 28px; }
    h3 { color: #34495e; }
    strong { color: #c0392b; }
    blockquote { margin: 16px 0; padding: 8px 16px; color: #555555; background-color: #f1f3f4; border-left: 4px solid #dfe2e5; }
    a { color: #1a73e8; text-decoration: none; }
    ul, ol { padding-left: 24px; }
    .footer { margin-top: 32px; padding-top: 12px; border-top: 1px solid #eaecef; font-size: 12px; color: #999999; text-align: center; }`;

/**
 * Wraps rendered report HTML in the mail document template.
 */
export function wrapHtmlDocument(content: string, generatedAt: Date): string {
  return [
    "<!DOCTYPE html>",
    "<html>",
    "<head>",
    '<meta charset="utf-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1">',
    "<title>Daily Briefing</title>",
    `<style>${STYLES}\n</style>`,
    "</head>",
    "<body>",
    '<div class="container">',
    content,
    '<div class="footer">' +
      `Generated automatically at ${formatTimestamp(generatedAt)}` +
      "</div>",
    "</div>",
    "</body>",
    "</html>",
  ].join("\n");
}

/**
 * Turns the backend report into mail body parts.
 *
 * - `plain`: the report as is, no HTML part
 * - `html`: Markdown rendered into the styled template; the text part carries
 *   {@link HTML_FALLBACK_NOTICE}
 */
export function formatBriefing(
  report: string,
  mode: DeliveryFormat,
  now: Date = new Date(),
): FormattedBody {
  switch (mode) {
    case "plain":
      return { plainTextBody: report };
    case "html":
      return {
        plainTextBody: HTML_FALLBACK_NOTICE,
        htmlBody: wrapHtmlDocument(renderMarkdown(report), now),
      };
    default: {
      const _exhaustive: never = mode;
      throw new Error(`unknown delivery format: ${_exhaustive}`);
    }
  }
}
