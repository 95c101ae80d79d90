/**
 * Base path resolution
 *
 * Works out the URL path prefix an SPA is served under from the client's point
 * of view, given the (cleaned) path of the request we see and whatever
 * forwarding information reverse proxies passed down to us. Everything here is
 * a pure function of its inputs.
 */

import {cleanPath, joinPath} from "./path.js";
import type {ProxyContext} from "./proxy.js";

/**
 * Placeholder origin for resolving forwarded URIs that carry no scheme and
 * host; only their path is of interest.
 */
const PLACEHOLDER_ORIGIN = "http://localhost";

/**
 * The path of a request as it was when it hit the first proxy in a chain.
 * Without usable forwarding information this is the request path itself.
 *
 * @param requestPath Rooted and cleaned request path
 */
export function originalRequestPath(
	requestPath: string,
	proxy: ProxyContext,
): string {
	// A rewritten request path: the original one was the stripped prefix
	// followed by what we see now
	if (proxy.forwardedPrefix) {
		return joinPath(cleanPath("/" + proxy.forwardedPrefix), requestPath);
	}

	// Some proxies pass the full original URI, others only its path
	const forwardedURI = proxy.forwardedURI;
	if (forwardedURI) {
		if (forwardedURI.startsWith("/")) {
			return cleanPath(forwardedURI);
		}
		const path = forwardedURIPath(forwardedURI);
		if (path !== null) {
			return cleanPath("/" + path);
		}
	}

	return requestPath;
}

function forwardedURIPath(uri: string): string | null {
	try {
		return decodeURIComponent(new URL(uri, PLACEHOLDER_ORIGIN).pathname);
	} catch {
		return null;
	}
}

/**
 * The base path of the SPA from the client's perspective. Always ends with a
 * slash. When the request path is not a suffix of the original request path,
 * the base cannot be derived and "/" is returned.
 *
 * @param requestPath Rooted and cleaned request path
 */
export function basename(requestPath: string, proxy: ProxyContext): string {
	let original = originalRequestPath(requestPath, proxy);

	// The proxy may have redirected /foo to /foo/ before rewriting the path
	// to /
	if (requestPath.endsWith("/") && !original.endsWith("/")) {
		original += "/";
	}

	let base = "";
	if (original.endsWith(requestPath)) {
		base = original.slice(0, original.length - requestPath.length);
	}

	return base.endsWith("/") ? base : base + "/";
}
