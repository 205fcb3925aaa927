import { en } from "./en";
import { ru } from "./ru";

export type TranslationKey = keyof typeof en;

const locales: Record<string, Partial<typeof en>> = {
	en,
	ru,
};

/**
 * Get a translation for a specific locale.
 * Falls back to English if the key is not translated or the locale is unknown.
 * `{name}` placeholders are replaced from `params`; unknown ones are left as is.
 */
export function getTranslation(
	locale: string,
	key: TranslationKey,
	params: Record<string, string> = {},
): string {
	return interpolate(lookup(locale, key), params);
}

/**
 * Locales with a message table, e.g. "ru-RU" resolves to "ru".
 */
export function resolveLocale(locale: string): string {
	if (locales[locale]) return locale;
	const base = locale.split(/[-_]/)[0]!.toLowerCase();
	return locales[base] ? base : "en";
}

function lookup(locale: string, key: TranslationKey): string {
	const translations = locales[resolveLocale(locale)];
	if (translations) {
		const value = translations[key];
		if (value !== undefined) {
			return value;
		}
	}
	return en[key];
}

function interpolate(template: string, params: Record<string, string>): string {
	return template.replace(/\{(\w+)\}/g, (match, name: string) =>
		Object.prototype.hasOwnProperty.call(params, name) ? params[name]! : match,
	);
}
