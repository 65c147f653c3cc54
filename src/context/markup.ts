/** Strip `<!-- ... -->` blocks, e.g. unfilled PR template guidance. */
export const stripHtmlComments = (content: string): string =>
  content.replace(/<!--[\s\S]*?-->/g, "");

/**
 * Strip Jira wiki markup that carries no meaning once flattened:
 * `{code}`, `{quote}`, `{color:red}` style macros and `[~user]` mentions.
 */
export function stripJiraMarkup(content: string): string {
  return content.replace(/\{[^}]+\}/g, "").replace(/\[~[^\]]+\]/g, "");
}

const WORD_TOKEN = /[\p{L}\p{N}_]+/gu;

/** Number of word tokens (runs of letters, digits and `_` in any script). */
export function countWordTokens(text: string): number {
  return text.match(WORD_TOKEN)?.length ?? 0;
}
