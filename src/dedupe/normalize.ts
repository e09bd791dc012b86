/**
 * Title normalization for similarity scoring.
 */

import { STOP_WORDS } from "../config/discipline/defaults.js";

const STRUCTURAL_MARKER = /^(?:chapter|section|unit|part|module|lesson)\s+(?:\d+|[ivxlc]+)(?:\.\d+)*\b\s*[.:)\-–]?\s*/i;
const NUMBERING = /^\d+(?:\.\d+)*[.)]?\s+/;
const APOSTROPHES = /['’‘`]/g;

export interface NormalizedTitle {
  /** Lower-cased title without numbering or boilerplate */
  readonly text: string;
  /** Content words: alphanumeric, apostrophes dropped, stop words removed */
  readonly words: ReadonlySet<string>;
  /** The raw title carried a section number or structural marker */
  readonly hadNumbering: boolean;
}

/**
 * Remove leading chapter/section markers and decimal numbering.
 */
export function stripNumbering(title: string): { text: string; stripped: boolean } {
  let text = title.trim();
  let stripped = false;
  for (;;) {
    const next = text.replace(STRUCTURAL_MARKER, "").replace(NUMBERING, "");
    if (next === text) {
      return { text, stripped };
    }
    text = next.trim();
    stripped = true;
  }
}

/**
 * Remove the first matching boilerplate prefix ("introduction to").
 * Prefixes are expected lower-case; `text` must be lower-case too.
 */
export function stripBoilerplate(text: string, prefixes: readonly string[]): string {
  for (const prefix of prefixes) {
    if (text.startsWith(`${prefix} `)) {
      return text.slice(prefix.length + 1).trim();
    }
  }
  return text;
}

export function contentWords(text: string): Set<string> {
  const words = new Set<string>();
  for (const token of text.toLowerCase().replace(APOSTROPHES, "").split(/[^\p{L}\p{N}]+/u)) {
    if (token !== "" && !STOP_WORDS.has(token)) {
      words.add(token);
    }
  }
  return words;
}

/**
 * Normalize a raw heading. When stripping leaves nothing, the lower-cased
 * raw title is used instead.
 */
export function normalizeTitle(title: string, boilerplatePrefixes: readonly string[]): NormalizedTitle {
  const { text: unnumbered, stripped } = stripNumbering(title);
  const lowered = unnumbered.toLowerCase().replace(/\s+/g, " ").replace(/’/g, "'");
  const cleaned = stripBoilerplate(lowered, boilerplatePrefixes);
  const text = cleaned !== "" ? cleaned : title.trim().toLowerCase();

  return {
    text,
    words: contentWords(text),
    hadNumbering: stripped,
  };
}
