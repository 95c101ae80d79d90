/**
 * Basic - serve an SPA bundle from a directory
 *
 *   SPA_ROOT=./dist PORT=8080 npm start --workspace examples/basic
 *
 * Put it behind a path-rewriting reverse proxy that sets X-Forwarded-Prefix
 * and the bundle's base element follows along.
 */

import {getLogger} from "@logtape/logtape";
import {NodeFileSystemBackend} from "@spaserve/filesystem";
import {SPAHandler, configureLogging} from "@spaserve/spa";
import {createServer} from "@spaserve/spa/node";
import {loadConfig} from "./config.js";

const logger = getLogger(["spaserve", "example"]);

const config = loadConfig();
await configureLogging({level: config.logLevel});

const handler = new SPAHandler(
	new NodeFileSystemBackend(config.root),
	config.index,
	{
		indexRewriter: (_request, index) =>
			index.replace("</body>", "<!-- served by spaserve --></body>"),
	},
);

const server = createServer((request) => handler.fetch(request), {
	port: config.port,
	host: config.host,
});
await server.listen();
logger.info("Serving {root} at {url}", {root: config.root, url: server.url});

const shutdown = async () => {
	logger.info("Shutting down");
	await server.close();
	process.exit(0);
};

process.on("SIGINT", () => void shutdown());
process.on("SIGTERM", () => void shutdown());
