/**
 * Normalization of free text (PR bodies, Jira descriptions, task
 * descriptions) into strings that are safe to send to an embedding provider.
 */

export const EMPTY_CONTENT_PLACEHOLDER = "Empty content";
export const EMPTY_AFTER_CLEANING_PLACEHOLDER = "Empty content after cleaning";
export const MAX_EMBEDDING_CHARS = 8000;
export const TRUNCATION_MARKER = "... [truncated]";

// Unicode category C (control, format, surrogate, private use, unassigned),
// except tab, newline and carriage return.
const CONTROL_CHARS = /[^\P{C}\t\n\r]/gu;

const INVISIBLE_SEPARATORS = /[\u200B-\u200F\u2028-\u202F\uFEFF]/g;

// ASCII whitespace, the information separators U+001C-U+001F, NEL and the
// Unicode space separators. U+FEFF is a format character, not whitespace.
const WHITESPACE = "\\t\\n\\v\\f\\r\\x1c-\\x20\\x85\\xa0\\u1680\\u2000-\\u200a\\u2028\\u2029\\u202f\\u205f\\u3000";
const WHITESPACE_RUN = new RegExp(`[${WHITESPACE}]+`, "g");
const EDGE_WHITESPACE = new RegExp(`^[${WHITESPACE}]+|[${WHITESPACE}]+$`, "g");

/** Remove leading and trailing whitespace. */
export function stripWhitespace(text: string): string {
  return text.replace(EDGE_WHITESPACE, "");
}

const LONE_SURROGATES =
  /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/**
 * Drop anything that cannot be encoded as UTF-8.
 * Lone surrogates are the only such code units a JS string can hold.
 */
export function toWellFormedUtf8(text: string): string {
  return text.replace(LONE_SURROGATES, "");
}

/**
 * Clean text for embedding. Never throws and never returns an empty string.
 *
 * NFKD, strip control/format characters and invisible separators, collapse
 * whitespace, drop unencodable code units, then cap at 8000 code points.
 */
export function cleanText(text: string | null | undefined): string {
  if (!text || !stripWhitespace(text)) return EMPTY_CONTENT_PLACEHOLDER;

  let cleaned = text.normalize("NFKD");
  cleaned = cleaned.replace(CONTROL_CHARS, "");
  cleaned = cleaned.replace(INVISIBLE_SEPARATORS, "");
  cleaned = cleaned.replace(WHITESPACE_RUN, " ");
  cleaned = toWellFormedUtf8(cleaned);

  const codePoints = Array.from(cleaned);
  if (codePoints.length > MAX_EMBEDDING_CHARS) {
    cleaned = codePoints.slice(0, MAX_EMBEDDING_CHARS).join("") + TRUNCATION_MARKER;
  }

  return stripWhitespace(cleaned) || EMPTY_AFTER_CLEANING_PLACEHOLDER;
}
