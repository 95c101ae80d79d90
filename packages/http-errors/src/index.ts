/**
 * Standard HTTP error classes with native cause support, and normalization of
 * arbitrary errors into responses that never leak internal details
 */

/** HTTP status codes and their default messages */
const STATUS_CODE_DEFAULTS: Record<number, string> = {
	// 4xx Client Errors
	400: "Bad Request",
	403: "Forbidden",
	404: "Not Found",
	412: "Precondition Failed",
	416: "Range Not Satisfiable",

	// 5xx Server Errors
	500: "Internal Server Error",
};

const HTTP_ERROR = Symbol.for("spaserve.http-error");

/** Options for creating HTTP errors */
export interface HTTPErrorOptions {
	/** Original error that caused this HTTP error */
	cause?: unknown;
	/** Custom headers to include in the error */
	headers?: Record<string, string>;
	/** Whether the error message should be exposed to clients (defaults based on status) */
	expose?: boolean;
}

/** Base HTTP error class */
export class HTTPError extends Error {
	readonly status: number;
	readonly expose: boolean;
	readonly headers?: Record<string, string>;

	constructor(
		status: number,
		message?: string,
		options: HTTPErrorOptions = {},
	) {
		const defaultMessage = STATUS_CODE_DEFAULTS[status] || "Unknown Error";
		super(message || defaultMessage, {cause: options.cause});

		this.name = this.constructor.name;
		this.status = status;
		this.expose = options.expose ?? status < 500; // Expose client errors by default
		this.headers = options.headers;
	}

	/**
	 * Convert error to a plain text HTTP Response. Unexposed errors only ever
	 * carry the status text.
	 */
	toResponse(): Response {
		const headers = new Headers(this.headers);
		headers.set("Content-Type", "text/plain; charset=utf-8");
		headers.set("X-Content-Type-Options", "nosniff");

		const statusText = STATUS_CODE_DEFAULTS[this.status] || "Unknown Error";
		const body = this.expose ? this.message : statusText;
		return new Response(body, {
			status: this.status,
			statusText,
			headers,
		});
	}
}

Object.defineProperty(HTTPError.prototype, HTTP_ERROR, {value: true});

/**
 * Check if a value is an HTTP error
 */
export function isHTTPError(value: unknown): value is HTTPError {
	return typeof value === "object" && value !== null && HTTP_ERROR in value;
}

// Common 4xx client error classes
export class BadRequest extends HTTPError {
	constructor(message?: string, options?: HTTPErrorOptions) {
		super(400, message, options);
	}
}

export class Forbidden extends HTTPError {
	constructor(message?: string, options?: HTTPErrorOptions) {
		super(403, message, options);
	}
}

export class NotFound extends HTTPError {
	constructor(message?: string, options?: HTTPErrorOptions) {
		super(404, message, options);
	}
}

// Common 5xx server error classes
export class InternalServerError extends HTTPError {
	constructor(message?: string, options?: HTTPErrorOptions) {
		super(500, message, options);
	}
}

const NOT_FOUND_NAMES = new Set(["NotFoundError"]);
const FORBIDDEN_NAMES = new Set(["NotAllowedError", "SecurityError"]);
const NOT_FOUND_CODES = new Set(["ENOENT", "ENOTDIR"]);
const FORBIDDEN_CODES = new Set(["EACCES", "EPERM"]);

function stringProperty(
	error: unknown,
	key: "name" | "code",
): string | undefined {
	if (typeof error === "object" && error !== null && key in error) {
		const value: unknown = Reflect.get(error, key);
		return typeof value === "string" ? value : undefined;
	}
	return undefined;
}

/**
 * Map any error onto a generic HTTP error. Missing entries become 404,
 * access violations 403 and everything else 500. The resulting error carries
 * only the default status message; the original error is kept as `cause` for
 * logging and never rendered.
 *
 * HTTP errors pass through unchanged.
 */
export function normalizeError(error: unknown): HTTPError {
	if (isHTTPError(error)) {
		return error;
	}

	const name = stringProperty(error, "name");
	const code = stringProperty(error, "code");
	if (
		(name && NOT_FOUND_NAMES.has(name)) ||
		(code && NOT_FOUND_CODES.has(code))
	) {
		return new NotFound(undefined, {cause: error});
	}
	if (
		(name && FORBIDDEN_NAMES.has(name)) ||
		(code && FORBIDDEN_CODES.has(code))
	) {
		return new Forbidden(undefined, {cause: error});
	}
	return new InternalServerError(undefined, {cause: error});
}
