import { readFileSync } from "node:fs";

/**
 * Reads a word-frequency list: one word per line, most frequent first.
 * A word's rank is the 1-based line of its first occurrence.
 */
export function parseWordRanks(text: string): Map<string, number> {
  const ranks = new Map<string, number>();

  text.split("\n").forEach((line, index) => {
    const word = line.trim();
    if (word.length > 0 && !ranks.has(word)) {
      ranks.set(word, index + 1);
    }
  });

  return ranks;
}

export function loadWordRanks(path: string): Map<string, number> {
  return parseWordRanks(readFileSync(path, "utf-8"));
}
