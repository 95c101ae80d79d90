import {type LogLevel, parseLogLevel} from "@logtape/logtape";
import {fileURLToPath} from "url";

export interface Config {
	port: number;
	host: string;
	/** Directory holding the SPA bundle */
	root: string;
	/** Index document, relative to root */
	index: string;
	logLevel: LogLevel;
}

const DEFAULT_ROOT = fileURLToPath(new URL("../public", import.meta.url));

/**
 * Read the server configuration from environment variables
 *
 * @throws TypeError for malformed PORT or LOG_LEVEL values
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	const port = env.PORT ? Number(env.PORT) : 3000;
	if (!Number.isInteger(port) || port < 0 || port > 65535) {
		throw new TypeError(`Invalid PORT: ${env.PORT}`);
	}

	return {
		port,
		host: env.HOST || "localhost",
		root: env.SPA_ROOT || DEFAULT_ROOT,
		index: env.SPA_INDEX || "index.html",
		logLevel: parseLogLevel(env.LOG_LEVEL || "info"),
	};
}
