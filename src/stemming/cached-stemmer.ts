import type { StemAlgorithm, Stemmer } from "../types";
import { sharedStemCache, StemCache } from "../cache/stem-cache";
import { InvalidLanguageError } from "../errors";
import { getTranslation } from "../i18n";
import { ConsoleLogger, Logger } from "../logging/logger";
import { currentSettings, resolveSettings, StemmerSettings } from "../settings";
import { ParallelOptions, stemParallel, stemSequential } from "./batch";
import { Language, normalizeLanguage } from "./languages";
import { snowballStem } from "./snowball-algorithm";

export interface CachedStemmerOptions {
	/** Defaults to the Snowball stemmer for the language. */
	algorithm?: StemAlgorithm;
	/** Defaults to the process-wide shared cache. */
	cache?: StemCache;
	logger?: Logger;
	/** Overrides applied on top of the configured settings. */
	settings?: Partial<StemmerSettings>;
}

/**
 * Stemmer bound to one language.
 *
 * Holds no cache of its own: every lookup goes through the shared cache,
 * so two stemmers for the same language see each other's results.
 */
export class CachedStemmer implements Stemmer {
	readonly language: Language;
	private readonly algorithm: StemAlgorithm;
	private readonly cache: StemCache | undefined;
	private readonly logger: Logger;
	private readonly parallel: ParallelOptions;
	private readonly locale: string;

	/**
	 * @throws InvalidLanguageError when the language is not supported.
	 * Matching is case-insensitive; there is no fallback language.
	 */
	constructor(language: string, options: CachedStemmerOptions = {}) {
		const settings = options.settings
			? resolveSettings({ ...currentSettings(), ...options.settings })
			: currentSettings();
		this.logger = options.logger ?? new ConsoleLogger(settings.logLevel);
		this.locale = settings.locale;

		const normalized = normalizeLanguage(language);
		if (!normalized) {
			this.logger.debug(getTranslation(this.locale, "log.language-rejected"), { language });
			throw new InvalidLanguageError(language, this.locale);
		}

		this.language = normalized;
		this.algorithm = options.algorithm ?? snowballStem;
		this.cache = options.cache;
		this.parallel = {
			concurrency: settings.parallelism,
			chunkSize: settings.chunkSize,
		};
		this.logger.debug(getTranslation(this.locale, "log.stemmer-created"), {
			language: this.language,
		});
	}

	stemWord(word: string): string {
		return this.store().getOrCompute(this.language, word, this.algorithm);
	}

	stemWords(words: readonly string[]): string[] {
		return stemSequential(words, (word) => this.stemWord(word));
	}

	async stemWordsParallel(words: readonly string[]): Promise<string[]> {
		this.logger.debug(getTranslation(this.locale, "log.parallel-dispatch"), {
			language: this.language,
			words: words.length,
			...this.parallel,
		});
		return stemParallel(words, (word) => this.stemWord(word), this.parallel);
	}

	// The shared cache is only created once something is stemmed.
	private store(): StemCache {
		return this.cache ?? sharedStemCache();
	}
}
