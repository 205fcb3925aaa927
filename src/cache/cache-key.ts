import type { Language } from "../stemming/languages";

/**
 * Address of a cached stem. Language identifiers never contain ":", so
 * everything after the first ":" is the word exactly as the caller gave it.
 */
export type CacheKey = `${Language}:${string}`;

export function cacheKey(language: Language, word: string): CacheKey {
	return `${language}:${word}`;
}
