import { describe, expect, it } from "vitest";
import { Chord } from "../../src/domain/entities/chord";
import { ChordDictionary, InvalidWordError } from "../../src/domain/entities/chord-dictionary";

function snapshot(dictionary: ChordDictionary): [string, string][] {
  return dictionary.entries().map(([chord, word]) => [chord.toString(), word]);
}

describe("ChordDictionary", () => {
  it("signals a rebind with the previous word", () => {
    const dictionary = new ChordDictionary();
    expect(dictionary.insert(Chord.parse("T+H+E"), "the")).toBeUndefined();
    expect(dictionary.insert(Chord.parse("e+h+t"), "then")).toBe("the");
    expect(dictionary.size).toBe(1);
    expect(dictionary.get(Chord.parse("E+H+T"))).toBe("then");
  });

  it("removes bindings and ignores unknown chords", () => {
    const dictionary = new ChordDictionary();
    dictionary.insert(Chord.parse("A+N+D"), "and");

    expect(dictionary.remove(Chord.parse("X"))).toBeUndefined();
    expect(dictionary.remove(Chord.parse("D+N+A"))).toBe("and");
    expect(dictionary.has(Chord.parse("A+D+N"))).toBe(false);
    expect(dictionary.size).toBe(0);
  });

  it("iterates in ascending canonical order", () => {
    const dictionary = new ChordDictionary();
    dictionary.insert(Chord.parse("B"), "be");
    dictionary.insert(Chord.parse("A+B"), "about");
    dictionary.insert(Chord.parse("A"), "a");

    expect(snapshot(dictionary)).toEqual([
      ["A", "a"],
      ["A+B", "about"],
      ["B", "be"],
    ]);
  });

  it("hands out independent snapshots", () => {
    const dictionary = new ChordDictionary();
    const chord = Chord.parse("O+F");
    dictionary.insert(chord, "of");
    chord.insert("X");

    const [first] = dictionary.entries();
    first?.[0].insert("Z");

    expect(snapshot(dictionary)).toEqual([["F+O", "of"]]);
  });

  it("trims words on insert", () => {
    const dictionary = new ChordDictionary();
    dictionary.insert(Chord.parse("I+S"), "  is \t");
    expect(dictionary.get(Chord.parse("I+S"))).toBe("is");
  });

  it("refuses words that would span several lines", () => {
    const dictionary = new ChordDictionary();
    dictionary.insert(Chord.parse("A"), "a");

    expect(() => dictionary.insert(Chord.parse("A"), "x\ny")).toThrow(InvalidWordError);
    expect(() => dictionary.insert(Chord.parse("B"), "x\ny")).toThrow(InvalidWordError);
    expect(snapshot(dictionary)).toEqual([["A", "a"]]);
  });

  it("round-trips words with a carriage return inside", () => {
    const dictionary = new ChordDictionary();
    dictionary.insert(Chord.parse("A"), "x\ry");
    dictionary.insert(Chord.parse("B"), "be\n");

    expect(snapshot(ChordDictionary.fromText(dictionary.toText()))).toEqual([
      ["A", "x\ry"],
      ["B", "be"],
    ]);
  });

  it("serializes one line per entry", () => {
    const dictionary = new ChordDictionary();
    dictionary.insert(Chord.parse("T+O"), "to");
    dictionary.insert(Chord.parse("I+N"), "in");

    expect(dictionary.toText()).toBe("I+N: in\nO+T: to\n");
  });

  it("reproduces the same mapping from its own text", () => {
    const dictionary = new ChordDictionary();
    dictionary.insert(Chord.parse("W+I+T+H"), "with");
    dictionary.insert(Chord.parse("T+I+M+E"), "time: now");
    dictionary.insert(Chord.parse("Y+O+U"), "you");

    const reloaded = ChordDictionary.fromText(dictionary.toText());
    expect(snapshot(reloaded)).toEqual(snapshot(dictionary));
  });

  it("loads best-effort and lets later duplicates win", () => {
    const dictionary = ChordDictionary.fromText(
      ["A+T: at", "no separator here", "AT+X: broken", "t+a: ate", ""].join("\n"),
    );

    expect(snapshot(dictionary)).toEqual([["A+T", "ate"]]);
  });
});
