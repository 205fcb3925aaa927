declare module "snowball-stemmers" {
	export interface SnowballStemmer {
		stem(word: string): string;
	}
	export interface SnowballFactory {
		newStemmer(algorithm: string): SnowballStemmer;
		algorithms(): string[];
	}
	const factory: SnowballFactory;
	export default factory;
}
