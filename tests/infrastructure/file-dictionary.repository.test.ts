import { mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DictionaryStorageError } from "../../src/application/ports/dictionary-repository";
import { Chord } from "../../src/domain/entities/chord";
import { ChordDictionary } from "../../src/domain/entities/chord-dictionary";
import type { ILogger } from "../../src/infrastructure/logging/logger";
import { FileDictionaryRepository } from "../../src/infrastructure/storage/file-dictionary.repository";

function createLogger(): ILogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("FileDictionaryRepository", () => {
  let directory: string;
  let path: string;
  let logger: ILogger;

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), "chord-dictionary-"));
    path = join(directory, "chords.txt");
    logger = createLogger();
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  it("round-trips a dictionary through the file", () => {
    const dictionary = new ChordDictionary();
    dictionary.insert(Chord.parse("T+H+E"), "the");
    dictionary.insert(Chord.parse("B"), "be");
    dictionary.insert(Chord.parse("A+B"), "about");

    const repository = new FileDictionaryRepository({ path, logger });
    repository.save(dictionary);
    const reloaded = repository.load();

    expect(readFileSync(path, "utf-8")).toBe("A+B: about\nB: be\nE+H+T: the\n");
    expect(reloaded.entries().map(([chord, word]) => `${chord}=${word}`)).toEqual([
      "A+B=about",
      "B=be",
      "E+H+T=the",
    ]);
  });

  it("loads the parseable lines of a damaged file", () => {
    writeFileSync(path, "W+E: we\nthis line has no separator\n", "utf-8");

    const dictionary = new FileDictionaryRepository({ path, logger }).load();

    expect(dictionary.size).toBe(1);
    expect(dictionary.get(Chord.parse("E+W"))).toBe("we");
    expect(logger.debug).toHaveBeenCalledWith("Skipped malformed dictionary lines", {
      path,
      droppedLines: 1,
    });
  });

  it("replaces existing content on save", () => {
    writeFileSync(path, "Q: old\nZ: stale\n", "utf-8");
    const dictionary = new ChordDictionary();
    dictionary.insert(Chord.parse("N+E+W"), "new");

    new FileDictionaryRepository({ path, logger, atomicSave: false }).save(dictionary);

    expect(readFileSync(path, "utf-8")).toBe("E+N+W: new\n");
  });

  it("leaves no temp file behind after an atomic save", () => {
    new FileDictionaryRepository({ path, logger }).save(new ChordDictionary());

    expect(readdirSync(directory)).toEqual(["chords.txt"]);
    expect(readFileSync(path, "utf-8")).toBe("");
  });

  it("fails with a storage error when the file is missing", () => {
    const repository = new FileDictionaryRepository({ path, logger });

    expect(() => repository.load()).toThrow(DictionaryStorageError);
    expect(() => repository.load()).toThrow(`Cannot read dictionary file ${path}`);
  });

  it("starts empty when a missing file is allowed", () => {
    const dictionary = new FileDictionaryRepository({ path, logger, allowMissing: true }).load();

    expect(dictionary.size).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith("Dictionary file not found, starting empty", { path });
  });

  it("fails with a storage error when the destination cannot be written", () => {
    const unwritable = join(directory, "missing", "chords.txt");
    const dictionary = new ChordDictionary();
    dictionary.insert(Chord.parse("U+P"), "up");

    for (const atomicSave of [true, false]) {
      const repository = new FileDictionaryRepository({ path: unwritable, logger, atomicSave });
      expect(() => repository.save(dictionary)).toThrow(DictionaryStorageError);
    }
    expect(readdirSync(directory)).toEqual([]);
  });
});
