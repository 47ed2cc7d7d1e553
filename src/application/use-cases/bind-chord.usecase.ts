import { Chord } from "../../domain/entities/chord";
import type { ChordDictionary } from "../../domain/entities/chord-dictionary";
import type { ChordBrowser } from "../../domain/services/chord-browser";
import type { DictionaryRepository } from "../ports/dictionary-repository";

// Keys the dictionary file can hold.
const STORABLE_KEY = /^[A-Z]$/u;

export class InvalidChordError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidChordError";
  }
}

interface BindChordUseCaseDependencies {
  readonly dictionary: ChordDictionary;
  readonly repository: DictionaryRepository;
  readonly browser: ChordBrowser;
}

interface BindChordRequest {
  readonly chord: string;
  readonly word: string;
}

export interface BindChordResponse {
  readonly chord: string;
  readonly word: string;
  readonly previousWord?: string;
  readonly guidance: string;
}

export class BindChordUseCase {
  private readonly dictionary: ChordDictionary;
  private readonly repository: DictionaryRepository;
  private readonly browser: ChordBrowser;

  constructor({ dictionary, repository, browser }: BindChordUseCaseDependencies) {
    this.dictionary = dictionary;
    this.repository = repository;
    this.browser = browser;
  }

  execute({ chord: expression, word }: BindChordRequest): BindChordResponse {
    const chord = Chord.parse(expression);
    if (chord.isEmpty()) {
      throw new InvalidChordError("A chord needs at least one key.");
    }
    const unstorable = chord.keys().filter((key) => !STORABLE_KEY.test(key));
    if (unstorable.length > 0) {
      throw new InvalidChordError(
        `Only the letters A-Z can be bound; found ${unstorable.map((key) => `"${key}"`).join(", ")}.`,
      );
    }

    const previousWord = this.dictionary.insert(chord, word);
    try {
      this.repository.save(this.dictionary);
    } catch (error) {
      // Keep memory in step with the file that failed to update.
      if (previousWord === undefined) {
        this.dictionary.remove(chord);
      } else {
        this.dictionary.insert(chord, previousWord);
      }
      throw error;
    }
    this.browser.refresh();

    const canonical = chord.toString();
    const bound = this.dictionary.get(chord) ?? word.trim();
    if (previousWord === undefined) {
      return { chord: canonical, word: bound, guidance: `Bound ${canonical} to "${bound}".` };
    }

    return {
      chord: canonical,
      word: bound,
      previousWord,
      guidance: `Rebound ${canonical} from "${previousWord}" to "${bound}".`,
    };
  }
}
