/**
 * In-memory filesystem implementation
 *
 * Provides MemoryFileSystemBackend, a read-only asset tree held in plain maps.
 * Handy for tests and for bundles embedded into the program itself.
 */

import {
	type FileContents,
	type FileStat,
	type FileSystemBackend,
	splitPath,
} from "./types.js";

/**
 * In-memory file data
 */
interface MemoryFile {
	name: string;
	content: Uint8Array;
	lastModified: number;
}

/**
 * In-memory directory data
 */
interface MemoryDirectory {
	name: string;
	files: Map<string, MemoryFile>;
	directories: Map<string, MemoryDirectory>;
}

/**
 * Initial contents of a memory backend, keyed by unrooted path
 *
 * @example
 * ```typescript
 * new MemoryFileSystemBackend({
 *   "index.html": "<!doctype html>...",
 *   "static/js/app.js": "console.log('hello');",
 * });
 * ```
 */
export type MemoryFiles = Record<string, string | Uint8Array>;

/**
 * In-memory storage backend that implements FileSystemBackend
 */
export class MemoryFileSystemBackend implements FileSystemBackend {
	#root: MemoryDirectory;

	/**
	 * @param files Files to populate the tree with; intermediate directories
	 * are created as needed
	 * @param lastModified Modification time given to every file
	 */
	constructor(files: MemoryFiles = {}, lastModified = Date.now()) {
		this.#root = {name: "", files: new Map(), directories: new Map()};

		const encoder = new TextEncoder();
		for (const [path, content] of Object.entries(files)) {
			const parts = splitPath(path);
			const name = parts.pop();
			if (!name) {
				throw new DOMException(`Invalid file path: ${path}`, "SyntaxError");
			}

			let dir = this.#root;
			for (const part of parts) {
				let next = dir.directories.get(part);
				if (!next) {
					next = {name: part, files: new Map(), directories: new Map()};
					dir.directories.set(part, next);
				}
				dir = next;
			}

			dir.files.set(name, {
				name,
				content: typeof content === "string" ? encoder.encode(content) : content,
				lastModified,
			});
		}
	}

	async stat(path: string): Promise<FileStat | null> {
		const entry = this.#resolvePath(path);
		if (!entry) return null;

		if ("content" in entry) {
			return {
				kind: "file",
				size: entry.content.byteLength,
				lastModified: entry.lastModified,
			};
		}
		return {kind: "directory", size: 0, lastModified: 0};
	}

	async readFile(path: string): Promise<FileContents> {
		const entry = this.#resolvePath(path);
		if (!entry || !("content" in entry)) {
			throw new DOMException("File not found", "NotFoundError");
		}
		return {
			content: entry.content,
			lastModified: entry.lastModified,
		};
	}

	#resolvePath(path: string): MemoryFile | MemoryDirectory | null {
		const parts = splitPath(path);
		const finalName = parts.pop();
		if (finalName === undefined) {
			return this.#root;
		}

		let current = this.#root;

		// Navigate through directories
		for (const part of parts) {
			const nextDir = current.directories.get(part);
			if (!nextDir) return null;
			current = nextDir;
		}

		// Try as file first
		return (
			current.files.get(finalName) ??
			current.directories.get(finalName) ??
			null
		);
	}
}
