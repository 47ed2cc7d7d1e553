import { BindChordUseCase } from "../application/use-cases/bind-chord.usecase";
import { LookupChordUseCase } from "../application/use-cases/lookup-chord.usecase";
import { SearchChordsUseCase } from "../application/use-cases/search-chords.usecase";
import { UnbindChordUseCase } from "../application/use-cases/unbind-chord.usecase";
import { ChordBrowser } from "../domain/services/chord-browser";
import type { ConfigManager } from "../infrastructure/config/config-manager";
import { loadWordRanks } from "../infrastructure/data/word-rank.adapter";
import type { ILogger } from "../infrastructure/logging/logger";
import { FileDictionaryRepository } from "../infrastructure/storage/file-dictionary.repository";

export interface ChordUseCases {
  readonly search: SearchChordsUseCase;
  readonly lookup: LookupChordUseCase;
  readonly bind: BindChordUseCase;
  readonly unbind: UnbindChordUseCase;
  readonly dictionaryPath: string;
}

/**
 * Loads the dictionary (and the optional word ranking) once and wires every
 * use case to that single in-memory copy.
 */
export function buildChordUseCases(config: ConfigManager, logger: ILogger): ChordUseCases {
  const dictionaryConfig = config.getDictionaryConfig();
  const repository = new FileDictionaryRepository({
    path: dictionaryConfig.path,
    atomicSave: dictionaryConfig.atomicSave,
    allowMissing: dictionaryConfig.allowMissing,
    logger,
  });
  const dictionary = repository.load();

  const { path: rankPath } = config.getRankingConfig();
  const ranks = rankPath ? loadWordRanks(rankPath) : new Map<string, number>();
  if (rankPath) {
    logger.info("Word ranking loaded", { path: rankPath, words: ranks.size });
  }

  const browser = new ChordBrowser({ dictionary, ranks });

  return {
    search: new SearchChordsUseCase({ browser }),
    lookup: new LookupChordUseCase({ dictionary }),
    bind: new BindChordUseCase({ dictionary, repository, browser }),
    unbind: new UnbindChordUseCase({ dictionary, repository, browser }),
    dictionaryPath: repository.location,
  };
}
