import { buildChordUseCases } from "../bootstrap/chord-use-cases";
import { ConfigManager } from "../infrastructure/config/config-manager";
import { ErrorHandler } from "../infrastructure/error/error-handler";
import { ConsoleLogger, parseLogLevel } from "../infrastructure/logging/logger";
import { startMcpServer } from "../interface/mcp/chord-dictionary-server";

/**
 * `chord-dictionary [dictionary-file]`: the positional argument overrides
 * CHORDS_DICTIONARY_PATH.
 */
export async function runCli(
  argv: readonly string[] = process.argv.slice(2),
  env: Record<string, string | undefined> = process.env,
): Promise<void> {
  try {
    const config = ConfigManager.fromEnvironment(env);
    const [dictionaryPath] = argv;
    if (dictionaryPath) {
      config.updateConfig({ dictionary: { path: dictionaryPath } });
    }

    const logger = new ConsoleLogger(parseLogLevel(config.getLoggingConfig().level));
    const useCases = buildChordUseCases(config, logger.child("dictionary"));
    await startMcpServer({
      useCases,
      errorHandler: new ErrorHandler(logger.child("tools")),
      resultLimit: config.getBrowserConfig().resultLimit,
    });
    logger.info("Chord dictionary server ready", { path: useCases.dictionaryPath });
  } catch (error) {
    console.error("Failed to start chord dictionary server", error);
    process.exit(1);
  }
}
