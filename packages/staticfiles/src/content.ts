/**
 * Serve a blob of content with the HTTP semantics expected of static files:
 * content type detection, Last-Modified validation and byte ranges.
 */

import Mime from "mime";
import {HTTPError} from "@spaserve/http-errors";

// ============================================================================
// Types
// ============================================================================

/**
 * Content to serve
 */
export interface ServableContent {
	/** File name used to detect the content type */
	name: string;
	content: Uint8Array;
	/** Modification time in milliseconds since the epoch; 0 means unknown */
	lastModified?: number;
}

interface ByteRange {
	start: number;
	/** Inclusive */
	end: number;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Detect the content type from a file name. Text types are always utf-8.
 */
export function contentType(name: string): string {
	const type = Mime.getType(name);
	if (!type) {
		return "application/octet-stream";
	}
	return type.startsWith("text/") ? `${type}; charset=utf-8` : type;
}

/** HTTP dates only carry seconds */
function truncateToSeconds(time: number): number {
	return Math.floor(time / 1000) * 1000;
}

function parseHTTPDate(value: string | null): number | null {
	if (!value) return null;
	const time = Date.parse(value);
	return Number.isNaN(time) ? null : time;
}

/**
 * Parse a Range header against a resource of the given size.
 *
 * @returns the single range to serve, null when the header should be ignored
 * (multiple ranges), or "unsatisfiable" for malformed and out-of-bounds ranges
 */
function parseRange(
	header: string,
	size: number,
): ByteRange | "unsatisfiable" | null {
	const match = /^bytes=(.*)$/.exec(header.trim());
	if (!match) {
		return "unsatisfiable";
	}

	const specs = match[1].split(",");
	if (specs.length > 1) {
		return null;
	}

	const spec = specs[0].trim();
	const dash = spec.indexOf("-");
	if (dash === -1) {
		return "unsatisfiable";
	}

	const first = spec.slice(0, dash).trim();
	const last = spec.slice(dash + 1).trim();
	if (!/^\d*$/.test(first) || !/^\d*$/.test(last)) {
		return "unsatisfiable";
	}

	if (first === "") {
		// Suffix range: the last N bytes
		if (last === "") {
			return "unsatisfiable";
		}
		const length = Math.min(parseInt(last, 10), size);
		if (length === 0) {
			return "unsatisfiable";
		}
		return {start: size - length, end: size - 1};
	}

	const start = parseInt(first, 10);
	if (start >= size) {
		return "unsatisfiable";
	}
	if (last === "") {
		return {start, end: size - 1};
	}

	const end = parseInt(last, 10);
	if (end < start) {
		return "unsatisfiable";
	}
	return {start, end: Math.min(end, size - 1)};
}

/**
 * If-Range only keeps the range when the validator still matches. Entity tags
 * are never generated here, so only a matching date qualifies.
 */
function ifRangeMatches(request: Request, lastModified: number): boolean {
	const ifRange = request.headers.get("If-Range");
	if (ifRange === null) {
		return true;
	}
	if (ifRange.startsWith('"') || ifRange.startsWith("W/")) {
		return false;
	}
	const date = parseHTTPDate(ifRange);
	return lastModified > 0 && date === lastModified;
}

// ============================================================================
// serveContent
// ============================================================================

/**
 * Build the response for a piece of content.
 *
 * Answers conditional requests (If-Modified-Since, If-Unmodified-Since) and
 * single byte ranges; multiple ranges are served as the full content.
 */
export function serveContent(
	request: Request,
	{name, content, lastModified = 0}: ServableContent,
): Response {
	const size = content.byteLength;
	const modified = lastModified > 0 ? truncateToSeconds(lastModified) : 0;
	const isGetOrHead = request.method === "GET" || request.method === "HEAD";

	const headers = new Headers({
		"Content-Type": contentType(name),
		"Accept-Ranges": "bytes",
	});
	if (modified > 0) {
		headers.set("Last-Modified", new Date(modified).toUTCString());
	}

	// Preconditions
	if (modified > 0) {
		const unmodifiedSince = parseHTTPDate(
			request.headers.get("If-Unmodified-Since"),
		);
		if (unmodifiedSince !== null && modified > unmodifiedSince) {
			return new HTTPError(412).toResponse();
		}

		const modifiedSince = parseHTTPDate(
			request.headers.get("If-Modified-Since"),
		);
		if (isGetOrHead && modifiedSince !== null && modified <= modifiedSince) {
			return new Response(null, {
				status: 304,
				headers: {"Last-Modified": new Date(modified).toUTCString()},
			});
		}
	}

	let status = 200;
	let body = content;
	const rangeHeader = request.headers.get("Range");
	if (isGetOrHead && rangeHeader !== null && ifRangeMatches(request, modified)) {
		const range = parseRange(rangeHeader, size);
		if (range === "unsatisfiable") {
			return new HTTPError(416, undefined, {
				headers: {"Content-Range": `bytes */${size}`},
			}).toResponse();
		}
		if (range) {
			status = 206;
			body = content.subarray(range.start, range.end + 1);
			headers.set("Content-Range", `bytes ${range.start}-${range.end}/${size}`);
		}
	}

	headers.set("Content-Length", String(body.byteLength));
	return new Response(request.method === "HEAD" ? null : body.slice(), {
		status,
		headers,
	});
}
