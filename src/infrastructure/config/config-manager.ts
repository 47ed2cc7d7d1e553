import { z } from 'zod';

/**
 * Application configuration interface
 */
export interface AppConfig {
	dictionary: DictionaryConfig;
	ranking: RankingConfig;
	browser: BrowserConfig;
	logging: LoggingConfig;
}

/**
 * Dictionary file configuration
 */
export interface DictionaryConfig {
	path: string;
	/** Write to a sibling temp file and rename it over the dictionary */
	atomicSave: boolean;
	/** Start from an empty dictionary when the file does not exist yet */
	allowMissing: boolean;
}

/**
 * Word-frequency list used for the rank column
 */
export interface RankingConfig {
	path?: string;
}

export interface BrowserConfig {
	resultLimit: number;
}

/**
 * Logging configuration
 */
export interface LoggingConfig {
	level: 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';
}

/**
 * Default application configuration
 */
export const DEFAULT_APP_CONFIG: AppConfig = {
	dictionary: {
		path: 'chords.txt',
		atomicSave: true,
		allowMissing: false
	},
	ranking: {},
	browser: {
		resultLimit: 50
	},
	logging: {
		level: 'INFO'
	}
};

const booleanFlag = z
	.enum(['true', 'false', '1', '0'])
	.transform((value) => value === 'true' || value === '1');

const environmentSchema = z.object({
	CHORDS_DICTIONARY_PATH: z.string().trim().min(1).optional(),
	CHORDS_RANK_PATH: z.string().trim().min(1).optional(),
	CHORDS_ATOMIC_SAVE: booleanFlag.optional(),
	CHORDS_ALLOW_MISSING: booleanFlag.optional(),
	CHORDS_RESULT_LIMIT: z.coerce.number().int().min(1).max(500).optional(),
	LOG_LEVEL: z
		.string()
		.transform((value) => value.toUpperCase())
		.pipe(z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']))
		.optional()
});

export type ConfigOverrides = {
	[K in keyof AppConfig]?: Partial<AppConfig[K]>;
};

/**
 * Configuration manager for centralized configuration access
 */
export class ConfigManager {
	private config: AppConfig;

	constructor(customConfig?: ConfigOverrides) {
		this.config = this.mergeConfig(DEFAULT_APP_CONFIG, customConfig);
	}

	/**
	 * Get the complete configuration
	 */
	getConfig(): AppConfig {
		return { ...this.config };
	}

	getDictionaryConfig(): DictionaryConfig {
		return { ...this.config.dictionary };
	}

	getRankingConfig(): RankingConfig {
		return { ...this.config.ranking };
	}

	getBrowserConfig(): BrowserConfig {
		return { ...this.config.browser };
	}

	getLoggingConfig(): LoggingConfig {
		return { ...this.config.logging };
	}

	/**
	 * Update configuration at runtime (command-line overrides, tests)
	 */
	updateConfig(updates: ConfigOverrides): void {
		this.config = this.mergeConfig(this.config, updates);
	}

	/**
	 * Create configuration from environment variables.
	 * Throws a ZodError naming every invalid variable.
	 */
	static fromEnvironment(env: Record<string, string | undefined> = {}): ConfigManager {
		const parsed = environmentSchema.parse(env);

		const dictionary: Partial<DictionaryConfig> = {};
		if (parsed.CHORDS_DICTIONARY_PATH !== undefined) {
			dictionary.path = parsed.CHORDS_DICTIONARY_PATH;
		}
		if (parsed.CHORDS_ATOMIC_SAVE !== undefined) {
			dictionary.atomicSave = parsed.CHORDS_ATOMIC_SAVE;
		}
		if (parsed.CHORDS_ALLOW_MISSING !== undefined) {
			dictionary.allowMissing = parsed.CHORDS_ALLOW_MISSING;
		}

		const envConfig: ConfigOverrides = { dictionary };
		if (parsed.CHORDS_RANK_PATH !== undefined) {
			envConfig.ranking = { path: parsed.CHORDS_RANK_PATH };
		}
		if (parsed.CHORDS_RESULT_LIMIT !== undefined) {
			envConfig.browser = { resultLimit: parsed.CHORDS_RESULT_LIMIT };
		}
		if (parsed.LOG_LEVEL !== undefined) {
			envConfig.logging = { level: parsed.LOG_LEVEL };
		}

		return new ConfigManager(envConfig);
	}

	/**
	 * Deep merge configuration objects
	 */
	private mergeConfig(base: AppConfig, override?: ConfigOverrides): AppConfig {
		if (!override) return base;

		return {
			dictionary: { ...base.dictionary, ...override.dictionary },
			ranking: { ...base.ranking, ...override.ranking },
			browser: { ...base.browser, ...override.browser },
			logging: { ...base.logging, ...override.logging }
		};
	}
}
