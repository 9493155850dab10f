/**
 * Splits a typed line into words. Single or double quotes group words, `"Shared Documents"` is
 * one word without its quotes.
 */
export function splitCommandLine(line: string): string[] {
  const words: string[] = [];
  const pattern = /"([^"]*)"|'([^']*)'|(\S+)/g;
  for (const match of line.matchAll(pattern)) {
    words.push(match[1] ?? match[2] ?? match[3] ?? '');
  }
  return words;
}

/** `search  annual report ` gives `{ word: 'search', argument: 'annual report' }`. */
export function splitCommandWord(line: string): { word: string; argument: string } {
  const trimmed = line.trim();
  const spaceIndex = trimmed.search(/\s/);
  if (spaceIndex < 0) return { word: trimmed.toLowerCase(), argument: '' };
  return {
    word: trimmed.slice(0, spaceIndex).toLowerCase(),
    argument: trimmed.slice(spaceIndex + 1).trim(),
  };
}
