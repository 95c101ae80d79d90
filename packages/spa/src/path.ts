/**
 * Lexical URL path handling
 */

import * as Path from "path";
import {BadRequest} from "@spaserve/http-errors";

/**
 * Lexically clean a slash-separated path: collapse repeated separators,
 * resolve "." and ".." elements and drop any trailing slash except on the
 * root. ".." elements of a rooted path never climb above the root. An empty
 * path becomes ".".
 *
 * Works on the path text only; nothing is looked up.
 */
export function cleanPath(path: string): string {
	const normalized = Path.posix.normalize(path);
	return stripTrailingSlash(normalized);
}

/**
 * Join path elements with slashes and clean the result. Empty elements are
 * skipped; joining only empty elements gives "".
 */
export function joinPath(...elements: string[]): string {
	const nonEmpty = elements.filter((element) => element !== "");
	if (nonEmpty.length === 0) {
		return "";
	}
	return stripTrailingSlash(Path.posix.join(...nonEmpty));
}

function stripTrailingSlash(path: string): string {
	return path.length > 1 && path.endsWith("/") ? path.slice(0, -1) : path;
}

/**
 * Percent-decode a URL path, rejecting malformed escapes
 *
 * @throws BadRequest
 */
export function decodePath(path: string): string {
	try {
		return decodeURIComponent(path);
	} catch (error) {
		throw new BadRequest("Malformed URL path", {cause: error});
	}
}

/**
 * The rooted and cleaned path of a request. This is the only place where
 * request paths are sanitized; everything downstream relies on it.
 *
 * @throws BadRequest for malformed percent escapes
 */
export function requestPath(request: Request): string {
	const {pathname} = new URL(request.url);
	return cleanPath("/" + decodePath(pathname));
}
