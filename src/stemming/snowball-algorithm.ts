import snowballFactory, { SnowballStemmer } from "snowball-stemmers";
import type { StemAlgorithm } from "../types";
import type { Language } from "./languages";

const stemmers = new Map<Language, SnowballStemmer>();

function snowballFor(language: Language): SnowballStemmer {
	let stemmer = stemmers.get(language);
	if (!stemmer) {
		stemmer = snowballFactory.newStemmer(language);
		stemmers.set(language, stemmer);
	}
	return stemmer;
}

/**
 * Normalize ё → е (and Ё → Е).
 * The Snowball Russian stemmer does not recognize ё, so words like
 * "костылём" are left unstemmed. Replacing ё with е before stemming
 * fixes this and is standard practice for Russian text processing.
 */
function normalizeYo(word: string): string {
	return word.replace(/ё/g, "е").replace(/Ё/g, "Е");
}

/**
 * Default algorithm: the Snowball stemmer for the language.
 */
export const snowballStem: StemAlgorithm = (language, word) => {
	if (word.length === 0) return word;
	const input = language === "russian" ? normalizeYo(word) : word;
	return snowballFor(language).stem(input);
};
