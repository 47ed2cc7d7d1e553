import type { ChordDictionary } from "../../domain/entities/chord-dictionary";

export class DictionaryStorageError extends Error {
  readonly location: string;

  constructor(message: string, location: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DictionaryStorageError";
    this.location = location;
  }
}

/**
 * Whole-dictionary persistence. Both calls block until done and throw
 * {@link DictionaryStorageError} when the underlying storage fails.
 */
export interface DictionaryRepository {
  readonly location: string;
  load(): ChordDictionary;
  save(dictionary: ChordDictionary): void;
}
