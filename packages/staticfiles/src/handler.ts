import {getLogger} from "@logtape/logtape";
import type {FileSystemBackend} from "@spaserve/filesystem";
import {normalizeError} from "@spaserve/http-errors";
import {serveContent} from "./content.js";

const logger = getLogger(["spaserve", "staticfiles"]);

const INDEX_PAGE = "/index.html";

/**
 * Serve a single file from a backend.
 *
 * Requests for a file named `index.html` are redirected to the containing
 * directory, so index documents are only ever reached by their directory URL.
 *
 * @param path Backend path of the file to serve, already cleaned
 */
export async function serveFile(
	request: Request,
	backend: FileSystemBackend,
	path: string,
): Promise<Response> {
	if (("/" + path).endsWith(INDEX_PAGE)) {
		const url = new URL(request.url);
		return localRedirect(url, directoryLocation(url.pathname));
	}

	try {
		const {content, lastModified} = await backend.readFile(path);
		const name = path.slice(path.lastIndexOf("/") + 1);
		return serveContent(request, {name, content, lastModified});
	} catch (error) {
		const httpError = normalizeError(error);
		if (httpError.status >= 500) {
			logger.error("Failed to read {path}: {error}", {path, error});
		} else {
			logger.warn("Refused to serve {path}: {error}", {path, error});
		}
		return httpError.toResponse();
	}
}

/**
 * Relative reference from the request URL to the directory holding the file.
 * Trailing slashes of the raw URL each add a level to climb.
 */
function directoryLocation(pathname: string): string {
	const trailing = pathname.length - pathname.replace(/\/+$/, "").length;
	return trailing === 0 ? "./" : "../".repeat(trailing);
}

/**
 * Redirect relative to the current URL, keeping its query string
 */
function localRedirect(url: URL, location: string): Response {
	return new Response(null, {
		status: 301,
		headers: {Location: location + url.search},
	});
}
