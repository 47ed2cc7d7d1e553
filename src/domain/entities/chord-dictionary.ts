import { Chord } from "./chord";
import {
  LINE_SEPARATOR,
  parseDictionaryText,
  serializeDictionary,
  type DictionaryEntry,
} from "../services/dictionary-format";

export class InvalidWordError extends Error {
  readonly word: string;

  constructor(word: string) {
    super("Words must fit on one line of the dictionary file.");
    this.name = "InvalidWordError";
    this.word = word;
  }
}

interface StoredEntry {
  readonly chord: Chord;
  readonly word: string;
}

/**
 * Chord to word mapping, iterated in ascending canonical-chord order.
 * Keys are held by canonical string, so equal key sets share one entry.
 */
export class ChordDictionary {
  private readonly store = new Map<string, StoredEntry>();

  static fromEntries(entries: Iterable<DictionaryEntry>): ChordDictionary {
    const dictionary = new ChordDictionary();
    for (const [chord, word] of entries) {
      dictionary.insert(chord, word);
    }
    return dictionary;
  }

  /** Best-effort: malformed lines are dropped, later duplicates win. */
  static fromText(text: string): ChordDictionary {
    return ChordDictionary.fromEntries(parseDictionaryText(text).entries);
  }

  get size(): number {
    return this.store.size;
  }

  /**
   * Returns the word previously bound to `chord`, if any. Throws
   * {@link InvalidWordError} for a word holding a line break, since each
   * binding is stored as one line.
   */
  insert(chord: Chord, word: string): string | undefined {
    const trimmed = word.trim();
    if (trimmed.includes(LINE_SEPARATOR)) {
      throw new InvalidWordError(word);
    }

    const key = chord.toString();
    const previous = this.store.get(key);
    this.store.set(key, { chord: chord.clone(), word: trimmed });
    return previous?.word;
  }

  remove(chord: Chord): string | undefined {
    const key = chord.toString();
    const removed = this.store.get(key);
    this.store.delete(key);
    return removed?.word;
  }

  get(chord: Chord): string | undefined {
    return this.store.get(chord.toString())?.word;
  }

  has(chord: Chord): boolean {
    return this.store.has(chord.toString());
  }

  /** A fresh sorted copy on every call; chords are cloned. */
  entries(): DictionaryEntry[] {
    return Array.from(this.store.values())
      .sort((left, right) => Chord.compare(left.chord, right.chord))
      .map(({ chord, word }) => [chord.clone(), word] as const);
  }

  toText(): string {
    return serializeDictionary(this.entries());
  }
}
