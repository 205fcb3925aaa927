/**
 * Languages with a Snowball algorithm available to the stemmer.
 */
export const SUPPORTED_LANGUAGES = [
	"arabic",
	"danish",
	"dutch",
	"english",
	"finnish",
	"french",
	"german",
	"hungarian",
	"italian",
	"norwegian",
	"portuguese",
	"romanian",
	"russian",
	"spanish",
	"swedish",
	"tamil",
	"turkish",
] as const;

export type Language = (typeof SUPPORTED_LANGUAGES)[number];

const supported: ReadonlySet<string> = new Set(SUPPORTED_LANGUAGES);

export function isSupportedLanguage(value: string): value is Language {
	return supported.has(value);
}

/**
 * Lowercases the identifier and checks it against the registry.
 * Returns undefined for anything unsupported; there is no default language.
 */
export function normalizeLanguage(value: string): Language | undefined {
	const lower = value.toLowerCase();
	return isSupportedLanguage(lower) ? lower : undefined;
}
