export { CachedStemmer } from "./stemming/cached-stemmer";
export type { CachedStemmerOptions } from "./stemming/cached-stemmer";
export {
	SUPPORTED_LANGUAGES,
	isSupportedLanguage,
	normalizeLanguage,
} from "./stemming/languages";
export type { Language } from "./stemming/languages";
export { snowballStem } from "./stemming/snowball-algorithm";
export { stemParallel, stemSequential } from "./stemming/batch";
export type { ParallelOptions } from "./stemming/batch";
export { StemCache, sharedStemCache } from "./cache/stem-cache";
export type { StemCacheOptions } from "./cache/stem-cache";
export { cacheKey } from "./cache/cache-key";
export type { CacheKey } from "./cache/cache-key";
export { InvalidLanguageError, InvalidSettingsError } from "./errors";
export {
	DEFAULT_SETTINGS,
	configureStemming,
	currentSettings,
	resolveSettings,
	settingsFromEnv,
} from "./settings";
export type { StemmerSettings } from "./settings";
export { ConsoleLogger, silentLogger, LOG_THRESHOLDS } from "./logging/logger";
export type { LogContext, LogLevel, LogThreshold, Logger } from "./logging/logger";
export type { CacheStats, StemAlgorithm, Stemmer } from "./types";
