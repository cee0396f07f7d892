/**
 * Token estimation for knowledge context budgeting.
 * The model call itself lives outside this engine, so a fixed
 * characters-per-token ratio is enough: 4 chars ≈ 1 token for English text.
 */
export const DEFAULT_CHARS_PER_TOKEN = 4;

export function estimateTokens(text: string, charsPerToken: number = DEFAULT_CHARS_PER_TOKEN): number {
  if (!text) return 0;
  return Math.round(text.length / charsPerToken);
}
