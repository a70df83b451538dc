const isUpper = (char: string): boolean => /^\p{Lu}$/u.test(char);

/**
 * Lowercase one code point, keeping it one code point. `İ` lowercases to `i`
 * plus a combining dot in full case mapping; only the `i` is kept.
 */
const toLower = (char: string): string => {
  const [lower] = Array.from(char.toLowerCase());
  return lower ?? char;
};

/**
 * Convert an exported identifier to its unexported form, keeping leading
 * acronyms in one case:
 *
 * - `MyFunc` -> `myFunc`
 * - `HTTPServer` -> `httpServer` (not `hTTPServer`)
 * - `ID` -> `id`
 * - `HTTPs` -> `https`
 * - `APIURLPath` -> `apiurlPath`
 */
export function toUnexported(name: string): string {
  if (name === '') {
    return name;
  }

  const chars = Array.from(name);
  if (chars.length === 1) {
    return toLower(chars[0]);
  }

  const firstLower = chars.findIndex(char => !isUpper(char));

  // All uppercase: an acronym on its own
  if (firstLower === -1) {
    return chars.map(toLower).join('');
  }

  let toLowerCount = firstLower;

  // With several leading capitals, the last one starts the next word
  // ("HTTPServer"), unless only one lowercase letter follows ("HTTPs")
  if (firstLower > 1 && isUpper(chars[firstLower - 1]) && firstLower < chars.length - 1) {
    toLowerCount = firstLower - 1;
  }

  for (let i = 0; i < toLowerCount; i++) {
    chars[i] = toLower(chars[i]);
  }

  return chars.join('');
}
