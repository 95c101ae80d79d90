/**
 * Core filesystem backend interface and types
 */

// ============================================================================
// CORE TYPES
// ============================================================================

/**
 * Kind of an entry in a filesystem backend. Anything that is neither a plain
 * file nor a directory (sockets, devices, fifos...) is reported as "other".
 */
export type EntryKind = "file" | "directory" | "other";

/**
 * Metadata for a single entry
 */
export interface FileStat {
	kind: EntryKind;
	/** Size in bytes (0 for directories) */
	size: number;
	/** Modification time in milliseconds since the epoch */
	lastModified: number;
}

/**
 * Contents of a file together with its modification time
 */
export interface FileContents {
	content: Uint8Array;
	lastModified: number;
}

// ============================================================================
// BACKEND INTERFACE
// ============================================================================

/**
 * Read-only storage backend that abstracts a hierarchical byte store
 * across different storage types (memory, local disk, ...).
 *
 * Paths are slash-separated and relative to the backend root. A leading "/" is
 * tolerated and ignored. Implementations must be safe for concurrent reads.
 */
export interface FileSystemBackend {
	/**
	 * Look up an entry
	 * @param path Path to the entry
	 * @returns Entry metadata if it exists, null if not found
	 * @throws NotAllowedError if access is denied
	 */
	stat(path: string): Promise<FileStat | null>;

	/**
	 * Read file content as bytes
	 * @param path Path to the file
	 * @throws NotFoundError if the file doesn't exist
	 * @throws NotAllowedError if access is denied
	 */
	readFile(path: string): Promise<FileContents>;
}

/**
 * Split a backend path into its components, rejecting anything that could
 * address an entry outside the backend root.
 */
export function splitPath(path: string): string[] {
	if (path.includes("\0")) {
		throw new DOMException(
			"Invalid path: contains null bytes",
			"NotAllowedError",
		);
	}

	const parts = path.split("/").filter((part) => part !== "" && part !== ".");
	if (parts.includes("..")) {
		throw new DOMException(
			"Invalid path: contains path traversal",
			"NotAllowedError",
		);
	}

	return parts;
}
