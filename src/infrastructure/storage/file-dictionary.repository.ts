import { readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import {
  DictionaryStorageError,
  type DictionaryRepository,
} from "../../application/ports/dictionary-repository";
import { ChordDictionary } from "../../domain/entities/chord-dictionary";
import { parseDictionaryText } from "../../domain/services/dictionary-format";
import type { ILogger } from "../logging/logger";

interface FileDictionaryRepositoryOptions {
  readonly path: string;
  readonly logger: ILogger;
  readonly atomicSave?: boolean;
  readonly allowMissing?: boolean;
}

export class FileDictionaryRepository implements DictionaryRepository {
  readonly location: string;
  private readonly logger: ILogger;
  private readonly atomicSave: boolean;
  private readonly allowMissing: boolean;

  constructor({ path, logger, atomicSave = true, allowMissing = false }: FileDictionaryRepositoryOptions) {
    this.location = path;
    this.logger = logger;
    this.atomicSave = atomicSave;
    this.allowMissing = allowMissing;
  }

  load(): ChordDictionary {
    let text: string;
    try {
      text = readFileSync(this.location, "utf-8");
    } catch (error) {
      if (this.allowMissing && isMissingFile(error)) {
        this.logger.warn("Dictionary file not found, starting empty", { path: this.location });
        return new ChordDictionary();
      }
      throw new DictionaryStorageError(
        `Cannot read dictionary file ${this.location}`,
        this.location,
        { cause: error },
      );
    }

    const { entries, droppedLines } = parseDictionaryText(text);
    const dictionary = ChordDictionary.fromEntries(entries);
    if (droppedLines > 0) {
      this.logger.debug("Skipped malformed dictionary lines", { path: this.location, droppedLines });
    }
    this.logger.info("Dictionary loaded", { path: this.location, entries: dictionary.size });
    return dictionary;
  }

  save(dictionary: ChordDictionary): void {
    const content = dictionary.toText();
    try {
      if (this.atomicSave) {
        this.writeAtomically(content);
      } else {
        writeFileSync(this.location, content, "utf-8");
      }
    } catch (error) {
      throw new DictionaryStorageError(
        `Cannot write dictionary file ${this.location}`,
        this.location,
        { cause: error },
      );
    }
    this.logger.debug("Dictionary saved", { path: this.location, entries: dictionary.size });
  }

  private writeAtomically(content: string): void {
    const temporary = join(
      dirname(this.location),
      `.${basename(this.location)}.${process.pid}.tmp`,
    );
    try {
      writeFileSync(temporary, content, "utf-8");
      renameSync(temporary, this.location);
    } catch (error) {
      rmSync(temporary, { force: true });
      throw error;
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
