/**
 * Node.js HTTP adapter: runs a web-standard handler behind `node:http`
 */

import * as Http from "http";
import type {AddressInfo} from "net";
import {getLogger} from "@logtape/logtape";
import {BadRequest, normalizeError} from "@spaserve/http-errors";

const logger = getLogger(["spaserve", "node"]);

export type Handler = (request: Request) => Promise<Response>;

export interface ServerOptions {
	/** Port to listen on (default: 3000, 0 picks a free one) */
	port?: number;
	/** Host to bind to (default: "localhost") */
	host?: string;
}

export interface Server {
	listen(): Promise<void>;
	close(): Promise<void>;
	address(): {port: number; host: string};
	/** Base URL of the server; reflects the actual port once listening */
	readonly url: string;
	readonly ready: boolean;
}

/**
 * Convert a Node.js request to a Web API Request
 */
async function toRequest(req: Http.IncomingMessage): Promise<Request> {
	let url: URL;
	try {
		url = new URL(`http://${req.headers.host ?? "localhost"}${req.url ?? "/"}`);
	} catch (error) {
		throw new BadRequest("Malformed request URL", {cause: error});
	}

	const headers = new Headers();
	for (const [name, value] of Object.entries(req.headers)) {
		if (Array.isArray(value)) {
			for (const item of value) {
				headers.append(name, item);
			}
		} else if (value !== undefined) {
			headers.set(name, value);
		}
	}

	const method = req.method ?? "GET";
	const body =
		method === "GET" || method === "HEAD" ? undefined : await readBody(req);

	return new Request(url, {method, headers, body});
}

async function readBody(req: Http.IncomingMessage) {
	const chunks: Buffer[] = [];
	for await (const chunk of req) {
		chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
	}
	return new Uint8Array(Buffer.concat(chunks));
}

/**
 * Write a Web API Response to a Node.js response
 */
async function writeResponse(
	response: Response,
	res: Http.ServerResponse,
): Promise<void> {
	res.statusCode = response.status;
	res.statusMessage = response.statusText;
	response.headers.forEach((value, key) => {
		res.setHeader(key, value);
	});

	if (!response.body) {
		res.end();
		return;
	}

	const reader = response.body.getReader();
	for (;;) {
		const {done, value} = await reader.read();
		if (done) {
			break;
		}
		res.write(value);
	}
	res.end();
}

/**
 * Create a `node:http` request listener that delegates to `handler`. Anything
 * escaping the handler is answered with a generic error response.
 */
export function createRequestListener(
	handler: Handler,
): (req: Http.IncomingMessage, res: Http.ServerResponse) => Promise<void> {
	return async (req, res) => {
		let response: Response;
		try {
			response = await handler(await toRequest(req));
		} catch (error) {
			const httpError = normalizeError(error);
			logger.error("Request error: {error}", {error});
			response = httpError.toResponse();
		}

		try {
			await writeResponse(response, res);
		} catch (error) {
			logger.error("Failed to write response: {error}", {error});
			res.destroy();
		}
	};
}

/**
 * Create an HTTP server for `handler`
 */
export function createServer(
	handler: Handler,
	options: ServerOptions = {},
): Server {
	const host = options.host ?? "localhost";
	let port = options.port ?? 3000;

	const listener = createRequestListener(handler);
	const httpServer = Http.createServer((req, res) => {
		listener(req, res).catch((error: unknown) => {
			logger.error("Unhandled request error: {error}", {error});
		});
	});

	let isListening = false;

	return {
		async listen() {
			return new Promise<void>((resolve, reject) => {
				httpServer.once("error", reject);
				httpServer.listen(port, host, () => {
					httpServer.off("error", reject);
					const address = httpServer.address();
					if (isAddressInfo(address)) {
						port = address.port;
					}
					isListening = true;
					logger.info("Server listening", {url: `http://${host}:${port}`});
					resolve();
				});
			});
		},
		async close() {
			return new Promise<void>((resolve, reject) => {
				httpServer.close((error) => {
					isListening = false;
					if (error) {
						reject(error);
					} else {
						resolve();
					}
				});
			});
		},
		address: () => ({port, host}),
		get url() {
			return `http://${host}:${port}`;
		},
		get ready() {
			return isListening;
		},
	};
}

function isAddressInfo(
	address: string | AddressInfo | null,
): address is AddressInfo {
	return typeof address === "object" && address !== null;
}
