export const en = {
	"error.invalid-language":
		"Unsupported language: {language}. Supported languages: {supported}",
	"error.invalid-setting": "Invalid value for setting {setting}: {value}",
	"log.stemmer-created": "Stemmer created",
	"log.language-rejected": "Rejected unsupported language",
	"log.parallel-dispatch": "Dispatching parallel stemming batch",
	"log.cache-created": "Stem cache created",
	"log.cache-evicted": "Evicted least recently used stem",
};
