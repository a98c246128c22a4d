const TOKEN_PATTERN = /[\p{L}\p{N}_]+/gu;

/**
 * Turns free text into an FTS5 MATCH expression: every word becomes a
 * quoted prefix term, alternatives joined with OR.
 * @returns null when the text holds no searchable word
 */
export function buildMatchQuery(text: string): string | null {
  const tokens = text.match(TOKEN_PATTERN);
  if (!tokens) return null;
  const unique = [...new Set(tokens.map((token) => token.toLowerCase()))];
  return unique.map((token) => `"${token}"*`).join(" OR ");
}
