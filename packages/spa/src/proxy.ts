/** Path prefix stripped by a path-rewriting reverse proxy */
export const FORWARDED_PREFIX_HEADER = "X-Forwarded-Prefix";

/**
 * Original URI, or just the original path, of a request when it hit the first
 * path-rewriting reverse proxy
 */
export const FORWARDED_URI_HEADER = "X-Forwarded-Uri";

/**
 * Forwarding information passed down by reverse proxies. Empty header values
 * count as absent.
 */
export interface ProxyContext {
	forwardedPrefix?: string;
	forwardedURI?: string;
}

export function getProxyContext(headers: Headers): ProxyContext {
	const context: ProxyContext = {};
	const forwardedPrefix = headers.get(FORWARDED_PREFIX_HEADER);
	if (forwardedPrefix) {
		context.forwardedPrefix = forwardedPrefix;
	}
	const forwardedURI = headers.get(FORWARDED_URI_HEADER);
	if (forwardedURI) {
		context.forwardedURI = forwardedURI;
	}
	return context;
}
