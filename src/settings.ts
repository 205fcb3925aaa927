import { InvalidSettingsError } from "./errors";
import { isLogThreshold, LogThreshold } from "./logging/logger";

export interface StemmerSettings {
	/** Schema version for future migrations */
	version: number;
	/**
	 * Maximum number of cached stems. `null` keeps every entry for the
	 * lifetime of the process; a positive integer turns on LRU eviction.
	 */
	cacheMaxEntries: number | null;
	/** Number of concurrent workers used by `stemWordsParallel` */
	parallelism: number;
	/** Words handed to a worker at a time */
	chunkSize: number;
	logLevel: LogThreshold;
	/** Locale for error and log messages */
	locale: string;
}

export const DEFAULT_SETTINGS: StemmerSettings = {
	version: 1,
	cacheMaxEntries: null,
	parallelism: 4,
	chunkSize: 256,
	logLevel: "warn",
	locale: "en",
};

let active: StemmerSettings = DEFAULT_SETTINGS;

/**
 * Merge overrides over the defaults and validate the result.
 */
export function resolveSettings(overrides: Partial<StemmerSettings> = {}): StemmerSettings {
	const settings: StemmerSettings = Object.assign({}, DEFAULT_SETTINGS, overrides);
	const { locale } = settings;

	if (settings.cacheMaxEntries !== null && !isPositiveInteger(settings.cacheMaxEntries)) {
		throw new InvalidSettingsError("cacheMaxEntries", settings.cacheMaxEntries, locale);
	}
	if (!isPositiveInteger(settings.parallelism)) {
		throw new InvalidSettingsError("parallelism", settings.parallelism, locale);
	}
	if (!isPositiveInteger(settings.chunkSize)) {
		throw new InvalidSettingsError("chunkSize", settings.chunkSize, locale);
	}
	if (!isLogThreshold(settings.logLevel)) {
		throw new InvalidSettingsError("logLevel", settings.logLevel, locale);
	}
	return settings;
}

/**
 * Read overrides from `STEMMER_*` environment variables.
 * Unset or empty variables keep their defaults.
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): StemmerSettings {
	const overrides: Partial<StemmerSettings> = {};
	if (env.STEMMER_LOCALE) {
		overrides.locale = env.STEMMER_LOCALE;
	}
	const locale = overrides.locale ?? DEFAULT_SETTINGS.locale;

	const maxEntries = env.STEMMER_CACHE_MAX_ENTRIES;
	if (maxEntries) {
		overrides.cacheMaxEntries =
			maxEntries === "unbounded"
				? null
				: parseNumber("cacheMaxEntries", maxEntries, locale);
	}
	if (env.STEMMER_PARALLELISM) {
		overrides.parallelism = parseNumber("parallelism", env.STEMMER_PARALLELISM, locale);
	}
	if (env.STEMMER_CHUNK_SIZE) {
		overrides.chunkSize = parseNumber("chunkSize", env.STEMMER_CHUNK_SIZE, locale);
	}
	const logLevel = env.STEMMER_LOG_LEVEL;
	if (logLevel) {
		if (!isLogThreshold(logLevel)) {
			throw new InvalidSettingsError("logLevel", logLevel, locale);
		}
		overrides.logLevel = logLevel;
	}
	return resolveSettings(overrides);
}

/**
 * Set the settings used by stemmers created afterwards, and by the shared
 * cache if it has not been created yet.
 */
export function configureStemming(overrides: Partial<StemmerSettings>): StemmerSettings {
	active = resolveSettings(overrides);
	return active;
}

export function currentSettings(): StemmerSettings {
	return active;
}

function isPositiveInteger(value: number): boolean {
	return Number.isInteger(value) && value > 0;
}

function parseNumber(setting: string, raw: string, locale: string): number {
	const value = Number(raw.trim());
	if (!Number.isFinite(value)) {
		throw new InvalidSettingsError(setting, raw, locale);
	}
	return value;
}
