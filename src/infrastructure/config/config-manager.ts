import { z } from 'zod';

/**
 * Application configuration interface
 */
export interface AppConfig {
	data: DataConfig;
	similarity: SimilarityConfig;
	search: SearchConfig;
	logging: LoggingConfig;
}

/**
 * Where the ASJP table lives
 */
export interface DataConfig {
	asjpPath: string;
}

/**
 * Distance computation settings
 */
export interface SimilarityConfig {
	vowelWeight: number;
	nearestLimit: number;
}

/**
 * Language search settings
 */
export interface SearchConfig {
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
	data: {
		asjpPath: 'data/asjp.tab',
	},
	similarity: {
		vowelWeight: 1.0,
		nearestLimit: 5,
	},
	search: {
		resultLimit: 5,
	},
	logging: {
		level: 'INFO',
	},
};

type ConfigOverrides = { [K in keyof AppConfig]?: Partial<AppConfig[K]> };

const environmentSchema = z.object({
	ASJP_DATA_PATH: z.string().min(1).default(DEFAULT_APP_CONFIG.data.asjpPath),
	VOWEL_WEIGHT: z.coerce
		.number()
		.nonnegative('VOWEL_WEIGHT must not be negative')
		.default(DEFAULT_APP_CONFIG.similarity.vowelWeight),
	NEAREST_LIMIT: z.coerce.number().int().positive().default(DEFAULT_APP_CONFIG.similarity.nearestLimit),
	SEARCH_RESULT_LIMIT: z.coerce.number().int().positive().default(DEFAULT_APP_CONFIG.search.resultLimit),
	LOG_LEVEL: z
		.string()
		.transform((value) => value.toUpperCase())
		.pipe(z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']))
		.default(DEFAULT_APP_CONFIG.logging.level),
});

/**
 * Configuration manager for centralized configuration access
 */
export class ConfigManager {
	private readonly config: AppConfig;

	constructor(customConfig?: ConfigOverrides) {
		this.config = this.mergeConfig(DEFAULT_APP_CONFIG, customConfig);
	}

	/**
	 * Get the complete configuration
	 */
	getConfig(): AppConfig {
		return { ...this.config };
	}

	getDataConfig(): DataConfig {
		return { ...this.config.data };
	}

	getSimilarityConfig(): SimilarityConfig {
		return { ...this.config.similarity };
	}

	getSearchConfig(): SearchConfig {
		return { ...this.config.search };
	}

	getLoggingConfig(): LoggingConfig {
		return { ...this.config.logging };
	}

	/**
	 * Create configuration from environment variables. Empty strings count as
	 * unset; malformed values throw a ZodError naming the variable.
	 */
	static fromEnvironment(env: Record<string, string | undefined> = {}): ConfigManager {
		const present = Object.fromEntries(
			Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
		);
		const parsed = environmentSchema.parse(present);

		return new ConfigManager({
			data: { asjpPath: parsed.ASJP_DATA_PATH },
			similarity: {
				vowelWeight: parsed.VOWEL_WEIGHT,
				nearestLimit: parsed.NEAREST_LIMIT,
			},
			search: { resultLimit: parsed.SEARCH_RESULT_LIMIT },
			logging: { level: parsed.LOG_LEVEL },
		});
	}

	/**
	 * Deep merge configuration objects
	 */
	private mergeConfig(base: AppConfig, override?: ConfigOverrides): AppConfig {
		if (!override) return base;

		return {
			data: { ...base.data, ...override.data },
			similarity: { ...base.similarity, ...override.similarity },
			search: { ...base.search, ...override.search },
			logging: { ...base.logging, ...override.logging },
		};
	}
}
