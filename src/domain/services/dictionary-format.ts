import { Chord, InvalidKeyTokenError } from "../entities/chord";

export const LINE_SEPARATOR = "\n";
export const FIELD_SEPARATOR = ":";

export type DictionaryEntry = readonly [chord: Chord, word: string];

export interface ParsedDictionary {
  readonly entries: DictionaryEntry[];
  readonly droppedLines: number;
}

/**
 * Reads `<chord>: <word>` records. Lines without a separator or with a
 * chord that does not parse are skipped and counted, never reported.
 * Blank lines are skipped without being counted.
 */
export function parseDictionaryText(text: string): ParsedDictionary {
  const entries: DictionaryEntry[] = [];
  let droppedLines = 0;

  for (const line of text.split(LINE_SEPARATOR)) {
    const entry = parseLine(line);
    if (entry) {
      entries.push(entry);
    } else if (line.trim().length > 0) {
      droppedLines += 1;
    }
  }

  return { entries, droppedLines };
}

export function formatDictionaryLine(chord: Chord, word: string): string {
  return `${chord.toString()}${FIELD_SEPARATOR} ${word}${LINE_SEPARATOR}`;
}

export function serializeDictionary(entries: readonly DictionaryEntry[]): string {
  return entries.map(([chord, word]) => formatDictionaryLine(chord, word)).join("");
}

function parseLine(line: string): DictionaryEntry | null {
  const separatorIndex = line.indexOf(FIELD_SEPARATOR);
  if (separatorIndex === -1) {
    return null;
  }

  try {
    const chord = Chord.parse(line.slice(0, separatorIndex));
    return [chord, line.slice(separatorIndex + 1).trim()];
  } catch (error) {
    if (error instanceof InvalidKeyTokenError) {
      return null;
    }
    throw error;
  }
}
