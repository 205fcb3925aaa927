import { describe, it, expect } from "vitest";
import {
	CachedStemmer,
	InvalidLanguageError,
	SUPPORTED_LANGUAGES,
	StemCache,
	silentLogger,
	stemParallel,
} from "../src/index";

describe("public API", () => {
	it("stems through the package entry point", async () => {
		const stemmer = new CachedStemmer("english", {
			cache: new StemCache({ logger: silentLogger }),
		});
		expect(stemmer.stemWords(["happiness", "computations"])).toEqual(["happi", "comput"]);
		expect(await stemmer.stemWordsParallel(["fruitlessly"])).toEqual(["fruitless"]);
	});

	it("exposes the error and registry", () => {
		expect(SUPPORTED_LANGUAGES).toContain("spanish");
		expect(() => new CachedStemmer("invalid_lang", { logger: silentLogger })).toThrow(
			InvalidLanguageError,
		);
	});

	it("exposes the batch executor", async () => {
		expect(await stemParallel(["a"], (w) => w + "!", { concurrency: 1, chunkSize: 1 })).toEqual(["a!"]);
	});
});
