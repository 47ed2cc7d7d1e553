import { Chord } from "../../domain/entities/chord";
import type { ChordDictionary } from "../../domain/entities/chord-dictionary";

interface LookupChordUseCaseDependencies {
  readonly dictionary: ChordDictionary;
}

interface LookupChordRequest {
  readonly chord: string;
}

export interface LookupChordResponse {
  readonly chord: string;
  readonly word?: string;
}

export class LookupChordUseCase {
  private readonly dictionary: ChordDictionary;

  constructor({ dictionary }: LookupChordUseCaseDependencies) {
    this.dictionary = dictionary;
  }

  execute({ chord: expression }: LookupChordRequest): LookupChordResponse {
    const chord = Chord.parse(expression);
    const word = this.dictionary.get(chord);
    return word === undefined
      ? { chord: chord.toString() }
      : { chord: chord.toString(), word };
  }
}
