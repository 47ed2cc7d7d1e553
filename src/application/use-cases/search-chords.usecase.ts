import type { BrowserRow, ChordBrowser } from "../../domain/services/chord-browser";

interface SearchChordsUseCaseDependencies {
  readonly browser: ChordBrowser;
}

interface SearchChordsRequest {
  readonly search: string;
  readonly limit: number;
}

export interface SearchChordsResponse {
  readonly rows: BrowserRow[];
  readonly total: number;
  readonly guidance: string;
}

export class SearchChordsUseCase {
  private readonly browser: ChordBrowser;

  constructor({ browser }: SearchChordsUseCaseDependencies) {
    this.browser = browser;
  }

  execute({ search, limit }: SearchChordsRequest): SearchChordsResponse {
    this.browser.setSearch(search);
    const total = this.browser.rows.length;

    return {
      rows: this.browser.rows.slice(0, limit),
      total,
      guidance: this.buildGuidance(search, total, limit),
    };
  }

  private buildGuidance(search: string, total: number, limit: number): string {
    if (total === 0) {
      return search.length === 0
        ? "The dictionary is empty."
        : `No words contain "${search}".`;
    }

    if (total > limit) {
      return `Showing ${limit} of ${total} rows. Narrow the search to see the rest.`;
    }

    return "";
  }
}
