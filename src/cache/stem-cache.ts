import type { Language } from "../stemming/languages";
import type { CacheStats } from "../types";
import { getTranslation } from "../i18n";
import { ConsoleLogger, Logger } from "../logging/logger";
import { currentSettings } from "../settings";
import { cacheKey, CacheKey } from "./cache-key";

export interface StemCacheOptions {
	/** `null` or omitted keeps every entry. */
	maxEntries?: number | null;
	logger?: Logger;
	locale?: string;
}

/**
 * Maps (language, word) to its stem.
 *
 * Entries are only written after the stem has been computed, so a lookup
 * either misses or sees a complete value. JavaScript runs each `Map`
 * operation to completion, so concurrent async callers never observe a
 * half-written entry. Two callers missing the same key may both compute;
 * the algorithm is pure, so the stored value is the same either way.
 *
 * Without `maxEntries` the cache only grows. With it, the least recently
 * used entry is dropped once the limit is exceeded (Map keeps insertion
 * order, and a hit re-inserts the entry at the end).
 */
export class StemCache {
	private readonly entries = new Map<CacheKey, string>();
	private readonly maxEntries: number | null;
	private readonly logger: Logger;
	private readonly locale: string;
	private hits = 0;
	private misses = 0;
	private evictions = 0;

	constructor(options: StemCacheOptions = {}) {
		this.maxEntries = options.maxEntries ?? null;
		this.logger = options.logger ?? new ConsoleLogger();
		this.locale = options.locale ?? "en";
	}

	getOrCompute(
		language: Language,
		word: string,
		compute: (language: Language, word: string) => string,
	): string {
		const key = cacheKey(language, word);
		const cached = this.entries.get(key);
		if (cached !== undefined) {
			this.hits++;
			if (this.maxEntries !== null) {
				this.entries.delete(key);
				this.entries.set(key, cached);
			}
			return cached;
		}

		this.misses++;
		const stem = compute(language, word);
		this.entries.set(key, stem);
		this.prune();
		return stem;
	}

	has(language: Language, word: string): boolean {
		return this.entries.has(cacheKey(language, word));
	}

	get size(): number {
		return this.entries.size;
	}

	stats(): CacheStats {
		return {
			hits: this.hits,
			misses: this.misses,
			evictions: this.evictions,
			size: this.entries.size,
		};
	}

	private prune(): void {
		if (this.maxEntries === null) return;
		while (this.entries.size > this.maxEntries) {
			const oldest = this.entries.keys().next();
			if (oldest.done) return;
			this.entries.delete(oldest.value);
			this.evictions++;
			this.logger.debug(getTranslation(this.locale, "log.cache-evicted"), {
				key: oldest.value,
			});
		}
	}
}

let shared: StemCache | undefined;

/**
 * The process-wide cache behind every stemmer.
 * Created on first use from the settings in effect at that moment.
 */
export function sharedStemCache(): StemCache {
	if (!shared) {
		const settings = currentSettings();
		const logger = new ConsoleLogger(settings.logLevel);
		shared = new StemCache({
			maxEntries: settings.cacheMaxEntries,
			logger,
			locale: settings.locale,
		});
		logger.debug(getTranslation(settings.locale, "log.cache-created"), {
			maxEntries: settings.cacheMaxEntries,
		});
	}
	return shared;
}
