/**
 * @spaserve/spa - Serve single page applications behind any path prefix
 */

export {
	createSPAHandler,
	type IndexRewriter,
	SPAHandler,
	type SPAHandlerOptions,
} from "./handler.js";
export {basename, originalRequestPath} from "./base.js";
export {cleanPath, decodePath, joinPath, requestPath} from "./path.js";
export {
	FORWARDED_PREFIX_HEADER,
	FORWARDED_URI_HEADER,
	getProxyContext,
	type ProxyContext,
} from "./proxy.js";
export {rewriteBaseHref} from "./rewrite.js";
export {configureLogging, type LoggingOptions} from "./logging.js";
