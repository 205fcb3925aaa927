import type { en } from "./en";

export const ru: Partial<typeof en> = {
	"error.invalid-language":
		"Неподдерживаемый язык: {language}. Поддерживаемые языки: {supported}",
	"error.invalid-setting": "Недопустимое значение параметра {setting}: {value}",
	"log.stemmer-created": "Стеммер создан",
	"log.language-rejected": "Отклонён неподдерживаемый язык",
	"log.parallel-dispatch": "Запуск параллельного стемминга",
	"log.cache-created": "Кэш основ создан",
};
