export type Category = "hollywood" | "bollywood" | "south";

export const CATEGORIES: readonly Category[] = ["hollywood", "bollywood", "south"];

export interface ParsedCaption {
  title: string;
  year: string | null;
}

// a standalone year; a letter, mark, digit or "_" on either side makes it part of a word
const WORD_EDGE_BEFORE = "(?<![\\p{L}\\p{M}\\p{N}_])";
const WORD_EDGE_AFTER = "(?![\\p{L}\\p{M}\\p{N}_])";
const YEAR_PATTERN = new RegExp(`${WORD_EDGE_BEFORE}(19|20)\\d{2}${WORD_EDGE_AFTER}`, "u");
const BRACKETED = /\[.*?\]|\(.*?\)|\{.*?\}/g;
// anything that is not a word character or whitespace, unicode aware
const NON_WORD = /[^\p{L}\p{M}\p{N}_\s]/gu;

const SOUTH_KEYWORDS = ["tamil", "telugu", "malayalam", "kannada"];

function capitalize(word: string) {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/**
 * Pulls a display title and a release year out of a free-text post caption.
 *
 * "Inception (2010) [Hindi Dubbed]" -> { title: "Inception", year: "2010" }
 */
export function parseCaption(caption?: string | null): ParsedCaption {
  if (!caption) {
    return { title: "", year: null };
  }

  const yearMatch = caption.match(YEAR_PATTERN);
  const year = yearMatch ? yearMatch[0] : null;

  let text = caption.toLowerCase();
  if (year) {
    text = text.replace(new RegExp(`${WORD_EDGE_BEFORE}${year}${WORD_EDGE_AFTER}`, "gu"), " ");
  }
  text = text
    .replace(BRACKETED, " ")
    .replace(NON_WORD, " ")
    .replace(/\s+/g, " ")
    .trim();

  const title = text ? text.split(" ").map(capitalize).join(" ") : "";
  return { title, year };
}

export function detectCategory(caption?: string | null): Category {
  const c = (caption ?? "").toLowerCase();
  if (SOUTH_KEYWORDS.some((k) => c.includes(k))) return "south";
  if (c.includes("dubbed") || c.includes("dual audio")) return "hollywood";
  if (c.includes("hindi")) return "bollywood";
  return "hollywood";
}
