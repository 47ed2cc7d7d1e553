import type { ChordDictionary } from "../entities/chord-dictionary";
import { compareCodePoints } from "../entities/chord";

export interface BrowserRow {
  readonly rank?: number;
  readonly word: string;
  readonly chord: string;
}

export type BrowserKey =
  | { readonly kind: "char"; readonly char: string; readonly ctrl?: boolean }
  | { readonly kind: "backspace" }
  | { readonly kind: "up" }
  | { readonly kind: "down" }
  | { readonly kind: "other" };

export type KeyOutcome = "continue" | "quit";

interface ChordBrowserOptions {
  readonly dictionary: ChordDictionary;
  readonly ranks?: ReadonlyMap<string, number>;
}

/**
 * Search and selection state behind the chord browser. Rows are rebuilt from
 * a dictionary snapshot whenever the search text changes or on refresh().
 */
export class ChordBrowser {
  private readonly dictionary: ChordDictionary;
  private readonly ranks: ReadonlyMap<string, number>;
  private searchText = "";
  private currentRows: BrowserRow[] = [];
  private selectedIndex: number | undefined;

  constructor({ dictionary, ranks = new Map() }: ChordBrowserOptions) {
    this.dictionary = dictionary;
    this.ranks = ranks;
    this.refresh();
  }

  get search(): string {
    return this.searchText;
  }

  get rows(): readonly BrowserRow[] {
    return this.currentRows;
  }

  get selected(): number | undefined {
    return this.selectedIndex;
  }

  get selectedRow(): BrowserRow | undefined {
    return this.selectedIndex === undefined
      ? undefined
      : this.currentRows[this.selectedIndex];
  }

  setSearch(text: string): void {
    this.searchText = text;
    this.refresh();
  }

  typeCharacter(char: string): void {
    this.setSearch(this.searchText + char);
  }

  backspace(): void {
    this.setSearch(Array.from(this.searchText).slice(0, -1).join(""));
  }

  clearSearch(): void {
    this.setSearch("");
  }

  selectNext(): void {
    if (this.currentRows.length === 0) {
      return;
    }
    this.selectedIndex =
      this.selectedIndex === undefined
        ? 0
        : Math.min(this.selectedIndex + 1, this.currentRows.length - 1);
  }

  // Moving up from the first row drops the selection.
  selectPrevious(): void {
    if (this.selectedIndex === undefined) {
      return;
    }
    this.selectedIndex = this.selectedIndex > 0 ? this.selectedIndex - 1 : undefined;
  }

  handleKey(key: BrowserKey): KeyOutcome {
    switch (key.kind) {
      case "char":
        if (key.ctrl) {
          if (key.char === "c") {
            return "quit";
          }
          if (key.char === "h") {
            this.clearSearch();
          }
        } else {
          this.typeCharacter(key.char);
        }
        break;
      case "backspace":
        this.backspace();
        break;
      case "up":
        this.selectPrevious();
        break;
      case "down":
        this.selectNext();
        break;
      case "other":
        break;
    }
    return "continue";
  }

  refresh(): void {
    this.currentRows = this.buildRows().filter((row) =>
      row.word.includes(this.searchText),
    );

    if (this.selectedIndex !== undefined) {
      this.selectedIndex =
        this.currentRows.length === 0
          ? undefined
          : Math.min(this.selectedIndex, this.currentRows.length - 1);
    }
  }

  private buildRows(): BrowserRow[] {
    const rows: BrowserRow[] = [];
    const boundWords = new Set<string>();

    for (const [chord, word] of this.dictionary.entries()) {
      boundWords.add(word);
      rows.push(this.createRow(word, chord.toString()));
    }

    for (const word of this.ranks.keys()) {
      if (!boundWords.has(word)) {
        rows.push(this.createRow(word, ""));
      }
    }

    return rows.sort(
      (left, right) =>
        compareCodePoints(left.word, right.word) ||
        compareCodePoints(left.chord, right.chord),
    );
  }

  private createRow(word: string, chord: string): BrowserRow {
    const rank = this.ranks.get(word);
    return rank === undefined ? { word, chord } : { rank, word, chord };
  }
}
