import { Chord } from "../../domain/entities/chord";
import type { ChordDictionary } from "../../domain/entities/chord-dictionary";
import type { ChordBrowser } from "../../domain/services/chord-browser";
import type { DictionaryRepository } from "../ports/dictionary-repository";

interface UnbindChordUseCaseDependencies {
  readonly dictionary: ChordDictionary;
  readonly repository: DictionaryRepository;
  readonly browser: ChordBrowser;
}

interface UnbindChordRequest {
  readonly chord: string;
}

export interface UnbindChordResponse {
  readonly chord: string;
  readonly removedWord?: string;
  readonly guidance: string;
}

export class UnbindChordUseCase {
  private readonly dictionary: ChordDictionary;
  private readonly repository: DictionaryRepository;
  private readonly browser: ChordBrowser;

  constructor({ dictionary, repository, browser }: UnbindChordUseCaseDependencies) {
    this.dictionary = dictionary;
    this.repository = repository;
    this.browser = browser;
  }

  execute({ chord: expression }: UnbindChordRequest): UnbindChordResponse {
    const chord = Chord.parse(expression);
    const canonical = chord.toString();
    const removedWord = this.dictionary.remove(chord);

    if (removedWord === undefined) {
      const name = chord.isEmpty() ? "The empty chord" : canonical;
      return { chord: canonical, guidance: `${name} is not bound.` };
    }

    try {
      this.repository.save(this.dictionary);
    } catch (error) {
      this.dictionary.insert(chord, removedWord);
      throw error;
    }
    this.browser.refresh();

    return {
      chord: canonical,
      removedWord,
      guidance: `Unbound ${canonical} from "${removedWord}".`,
    };
  }
}
