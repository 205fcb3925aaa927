import { SUPPORTED_LANGUAGES } from "./stemming/languages";
import { getTranslation } from "./i18n";

export class InvalidLanguageError extends Error {
	readonly language: string;
	readonly supported: readonly string[] = SUPPORTED_LANGUAGES;

	constructor(language: string, locale = "en") {
		super(
			getTranslation(locale, "error.invalid-language", {
				language,
				supported: SUPPORTED_LANGUAGES.join(", "),
			}),
		);
		this.name = "InvalidLanguageError";
		this.language = language;
	}
}

export class InvalidSettingsError extends Error {
	readonly setting: string;

	constructor(setting: string, value: unknown, locale = "en") {
		super(
			getTranslation(locale, "error.invalid-setting", {
				setting,
				value: String(value),
			}),
		);
		this.name = "InvalidSettingsError";
		this.setting = setting;
	}
}
