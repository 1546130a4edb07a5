import { load } from "cheerio";

const WHITESPACE_PATTERN = /\s+/g;

const IMG_PATTERN =
  /<img [^>]*?(?:alt="([^"]*?)"[^>]*)?src="([^"]*?)"(?:[^>]*?alt="([^"]*?)")?[^>]*?\/>/g;
const LINK_PATTERN = /<a [^>]*href="([^"]*?)"[^>]*?>(.*?)<\/a>/g;
const LINE_BREAK_PATTERN = /<br[^>]*>|<\/p>/g;
const TAG_PATTERN = /<[^>]*>/g;
const BLANK_LINES_PATTERN = /[\n\r]{2,}/g;

/** Collapses every whitespace run (newlines included) to one space and trims. */
export function collapseWhitespace(text: string): string {
  return text.replace(WHITESPACE_PATTERN, " ").trim();
}

/**
 * Reduces a markup snippet to readable text.
 *
 * `<img src alt/>` becomes `[IMG: src, alt]`, links become `text (href)`,
 * `<br>` and `</p>` become line breaks and all other tags are dropped.
 * Entities are decoded.
 */
export function stripHtml(html: string): string {
  const text = html
    .replace(IMG_PATTERN, "[IMG: $2, $1$3]")
    .replace(LINK_PATTERN, "$2 ($1)")
    .replace(LINE_BREAK_PATTERN, "\n")
    .replace(TAG_PATTERN, "")
    .replace(BLANK_LINES_PATTERN, "\n\n");

  // no tags are left, cheerio is only used to decode entities
  const decoded = load(text, null, false).root().text();
  return decoded.replace(/\u00a0/g, " ").trim();
}
