/** Ordered from most to least verbose. */
export const LOG_THRESHOLDS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogThreshold = (typeof LOG_THRESHOLDS)[number];

export type LogLevel = Exclude<LogThreshold, "silent">;

export type LogContext = Record<string, unknown>;

export interface Logger {
	debug(message: string, context?: LogContext): void;
	info(message: string, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
	error(message: string, context?: LogContext): void;
}

const thresholds: ReadonlySet<string> = new Set(LOG_THRESHOLDS);

export function isLogThreshold(value: string): value is LogThreshold {
	return thresholds.has(value);
}

/**
 * Writes to the console, dropping messages below the threshold.
 * Lines look like `[stemmer] warn: message {"key":"value"}`.
 */
export class ConsoleLogger implements Logger {
	private readonly threshold: LogThreshold;
	private readonly sink: Pick<Console, LogLevel>;

	constructor(threshold: LogThreshold = "warn", sink: Pick<Console, LogLevel> = console) {
		this.threshold = threshold;
		this.sink = sink;
	}

	debug(message: string, context?: LogContext): void {
		this.write("debug", message, context);
	}

	info(message: string, context?: LogContext): void {
		this.write("info", message, context);
	}

	warn(message: string, context?: LogContext): void {
		this.write("warn", message, context);
	}

	error(message: string, context?: LogContext): void {
		this.write("error", message, context);
	}

	private write(level: LogLevel, message: string, context?: LogContext): void {
		if (LOG_THRESHOLDS.indexOf(level) < LOG_THRESHOLDS.indexOf(this.threshold)) return;
		const line = `[stemmer] ${level}: ${message}`;
		this.sink[level](context ? `${line} ${JSON.stringify(context)}` : line);
	}
}

const noop = (): void => {};

export const silentLogger: Logger = {
	debug: noop,
	info: noop,
	warn: noop,
	error: noop,
};
