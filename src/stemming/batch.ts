import { setImmediate as yieldToEventLoop } from "node:timers/promises";

export interface ParallelOptions {
	/** Number of workers running at once */
	concurrency: number;
	/** Words a worker stems before yielding to the event loop */
	chunkSize: number;
}

export function stemSequential(
	words: readonly string[],
	stemOne: (word: string) => string,
): string[] {
	return words.map((word) => stemOne(word));
}

/**
 * Stem words with a pool of workers pulling chunks from a shared cursor.
 *
 * Each result is written at the index of its input, so the output order
 * does not depend on which worker finished first. Workers share whatever
 * `stemOne` closes over (normally the stem cache) and may hit the same
 * word at the same time.
 */
export async function stemParallel(
	words: readonly string[],
	stemOne: (word: string) => string,
	{ concurrency, chunkSize }: ParallelOptions,
): Promise<string[]> {
	const roots = new Array<string>(words.length);
	const chunkCount = Math.ceil(words.length / chunkSize);
	let nextChunk = 0;

	const worker = async (): Promise<void> => {
		while (nextChunk < chunkCount) {
			const start = nextChunk++ * chunkSize;
			const end = Math.min(start + chunkSize, words.length);
			for (let i = start; i < end; i++) {
				roots[i] = stemOne(words[i]!);
			}
			await yieldToEventLoop();
		}
	};

	const workerCount = Math.min(concurrency, chunkCount);
	await Promise.all(Array.from({ length: workerCount }, () => worker()));
	return roots;
}
