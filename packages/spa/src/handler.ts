/**
 * SPAHandler serves a single page application: static assets where they
 * exist, the index document everywhere else. The index document's base
 * element is rewritten on the fly to the path prefix the client actually
 * requested the SPA under, so one bundle can be deployed behind any prefix.
 */

import {getLogger} from "@logtape/logtape";
import type {FileContents, FileSystemBackend} from "@spaserve/filesystem";
import {normalizeError} from "@spaserve/http-errors";
import {serveContent, serveFile} from "@spaserve/staticfiles";
import {basename} from "./base.js";
import {cleanPath, requestPath} from "./path.js";
import {getProxyContext} from "./proxy.js";
import {rewriteBaseHref} from "./rewrite.js";

const logger = getLogger(["spaserve", "handler"]);

/** The index is always HTML, whatever its file is called */
const INDEX_CONTENT_NAME = "index.html";

const decoder = new TextDecoder();
const encoder = new TextEncoder();

// ============================================================================
// Types
// ============================================================================

/**
 * Application-specific post-processing of the index document, called after
 * the base element has been rewritten. The returned text is served verbatim.
 */
export type IndexRewriter = (request: Request, index: string) => string;

export interface SPAHandlerOptions {
	indexRewriter?: IndexRewriter;
}

// ============================================================================
// SPAHandler
// ============================================================================

/**
 * Web-standard request handler for single page applications
 *
 * @example
 * ```typescript
 * const handler = new SPAHandler(new NodeFileSystemBackend("dist"), "index.html");
 * const response = await handler.fetch(request);
 * ```
 */
export class SPAHandler {
	readonly #backend: FileSystemBackend;
	readonly #index: string;
	readonly #indexRewriter?: IndexRewriter;

	/**
	 * @param backend Asset tree to serve from
	 * @param index Path of the index document inside the asset tree; it is
	 * cleaned and made unrooted
	 */
	constructor(
		backend: FileSystemBackend,
		index: string,
		options: SPAHandlerOptions = {},
	) {
		this.#backend = backend;
		this.#index = cleanPath("/" + index).slice(1);
		this.#indexRewriter = options.indexRewriter;
	}

	/** Unrooted path of the index document */
	get index(): string {
		return this.#index;
	}

	/**
	 * Handle a request. Never rejects: failures are answered with a generic
	 * error response.
	 */
	async fetch(request: Request): Promise<Response> {
		try {
			const path = requestPath(request);
			const response = await this.serveStaticAsset(request, path);
			if (response) {
				return response;
			}
			logger.debug("No static asset at {path}, serving {index}", {
				path,
				index: this.#index,
			});
			return await this.serveIndex(request, path);
		} catch (error) {
			return errorResponse(request, error);
		}
	}

	/**
	 * Serve the plain file at `cleanedPath`, if there is one.
	 *
	 * @param cleanedPath Rooted request path, already cleaned
	 * @returns null when the index document should be served instead
	 */
	async serveStaticAsset(
		request: Request,
		cleanedPath: string,
	): Promise<Response | null> {
		const path = cleanedPath.slice(1);
		if (path === "") {
			// The root always gets the index document
			return null;
		}

		try {
			const stat = await this.#backend.stat(path);
			if (stat?.kind !== "file") {
				return null;
			}
		} catch (error) {
			return errorResponse(request, error);
		}
		return serveFile(request, this.#backend, path);
	}

	/**
	 * Serve the index document with its base element pointing at the base
	 * path derived from the request.
	 *
	 * @param cleanedPath Rooted request path, already cleaned
	 */
	async serveIndex(request: Request, cleanedPath: string): Promise<Response> {
		const base = basename(cleanedPath, getProxyContext(request.headers));

		let file: FileContents;
		try {
			file = await this.#backend.readFile(this.#index);
		} catch (error) {
			return errorResponse(request, error);
		}

		let html = rewriteBaseHref(decoder.decode(file.content), base);
		if (this.#indexRewriter) {
			html = this.#indexRewriter(request, html);
		}

		return serveContent(request, {
			name: INDEX_CONTENT_NAME,
			content: encoder.encode(html),
			lastModified: file.lastModified,
		});
	}
}

/**
 * Create an SPA handler
 */
export function createSPAHandler(
	backend: FileSystemBackend,
	index: string,
	options?: SPAHandlerOptions,
): SPAHandler {
	return new SPAHandler(backend, index, options);
}

/**
 * Answer a failure with a generic response, keeping the details for the log
 */
function errorResponse(request: Request, error: unknown): Response {
	const httpError = normalizeError(error);
	const {pathname} = new URL(request.url);
	const properties = {method: request.method, pathname, error};
	if (httpError.status >= 500) {
		logger.error("Failed to handle {method} {pathname}: {error}", properties);
	} else {
		logger.warn("Refused {method} {pathname}: {error}", properties);
	}
	return httpError.toResponse();
}
