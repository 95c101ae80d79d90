import {configure, getConsoleSink, type LogLevel, type Sink} from "@logtape/logtape";

export interface LoggingOptions {
	/** Lowest level logged for the ["spaserve"] category (default: "info") */
	level?: LogLevel;
	/** Named sinks to log to (default: a console sink) */
	sinks?: Record<string, Sink>;
	/** Whether to reset an existing LogTape configuration (default: true) */
	reset?: boolean;
}

/**
 * Configure LogTape for the ["spaserve"] logger category. The packages never
 * call this themselves; it is up to the program embedding them.
 *
 * LogTape's own meta logger is kept at warning level.
 */
export async function configureLogging(
	options: LoggingOptions = {},
): Promise<void> {
	const {
		level = "info",
		sinks = {console: getConsoleSink()},
		reset = true,
	} = options;
	const sinkNames = Object.keys(sinks);

	await configure({
		reset,
		sinks,
		loggers: [
			{category: ["spaserve"], lowestLevel: level, sinks: sinkNames},
			{category: ["logtape", "meta"], lowestLevel: "warning", sinks: sinkNames},
		],
	});
}
