/**
 * Word classification for word-wise cursor motion.
 *
 * A word is a run of ASCII letters; digits, underscores, punctuation and
 * whitespace all separate words.
 */

export function isWordChar(ch: string): boolean {
  if (ch.length !== 1) return false;
  const code = ch.charCodeAt(0);
  return (code >= 65 && code <= 90) || (code >= 97 && code <= 122);
}
