import type { Language } from "./stemming/languages";

/**
 * A stemming algorithm for a set of languages.
 * Must be pure: the same language and word always produce the same root.
 */
export type StemAlgorithm = (language: Language, word: string) => string;

/**
 * Interface for language-bound stemmers.
 */
export interface Stemmer {
	readonly language: Language;
	/** Reduces a word to its stem. */
	stemWord(word: string): string;
	/** Stems every word in order. `result[i]` is the stem of `words[i]`. */
	stemWords(words: readonly string[]): string[];
	/** Same output as `stemWords`, computed by concurrent workers. */
	stemWordsParallel(words: readonly string[]): Promise<string[]>;
}

/**
 * Counters reported by the stem cache.
 */
export interface CacheStats {
	hits: number;
	misses: number;
	/** Only non-zero when a capacity is configured. */
	evictions: number;
	size: number;
}
