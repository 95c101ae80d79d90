/**
 * Node.js filesystem implementation
 *
 * Provides NodeFileSystemBackend for read access to a directory on disk
 * using Node.js fs module.
 */

import * as FS from "fs/promises";
import * as Path from "path";
import {
	type FileContents,
	type FileStat,
	type FileSystemBackend,
	splitPath,
} from "./types.js";

/** Type guard for Node.js errors with error codes */
function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && "code" in error;
}

function isPermissionError(error: unknown): boolean {
	return (
		isErrnoException(error) &&
		(error.code === "EACCES" || error.code === "EPERM")
	);
}

/**
 * Node.js storage backend that implements FileSystemBackend
 */
export class NodeFileSystemBackend implements FileSystemBackend {
	#rootPath: string;

	constructor(rootPath: string) {
		this.#rootPath = Path.resolve(rootPath);
	}

	async stat(filePath: string): Promise<FileStat | null> {
		try {
			const fullPath = this.#resolvePath(filePath);
			const stats = await FS.stat(fullPath);

			return {
				kind: stats.isFile()
					? "file"
					: stats.isDirectory()
						? "directory"
						: "other",
				size: stats.size,
				lastModified: stats.mtimeMs,
			};
		} catch (error) {
			if (
				isErrnoException(error) &&
				(error.code === "ENOENT" || error.code === "ENOTDIR")
			) {
				return null;
			}
			if (isPermissionError(error)) {
				throw new DOMException("Permission denied", "NotAllowedError");
			}
			throw error;
		}
	}

	async readFile(filePath: string): Promise<FileContents> {
		const fullPath = this.#resolvePath(filePath);
		let handle: FS.FileHandle;
		try {
			handle = await FS.open(fullPath, "r");
		} catch (error) {
			if (
				isErrnoException(error) &&
				(error.code === "ENOENT" || error.code === "ENOTDIR")
			) {
				throw new DOMException("File not found", "NotFoundError");
			}
			if (isPermissionError(error)) {
				throw new DOMException("Permission denied", "NotAllowedError");
			}
			throw error;
		}

		// Read content and stats from the same handle, then release it
		try {
			const [buffer, stats] = await Promise.all([
				handle.readFile(),
				handle.stat(),
			]);
			return {
				content: new Uint8Array(buffer),
				lastModified: stats.mtimeMs,
			};
		} finally {
			await handle.close();
		}
	}

	#resolvePath(relativePath: string): string {
		const parts = splitPath(relativePath);
		if (parts.length === 0) {
			return this.#rootPath;
		}

		const resolvedPath = Path.resolve(this.#rootPath, ...parts);

		// Ensure the resolved path is still within our root directory
		if (
			resolvedPath !== this.#rootPath &&
			!resolvedPath.startsWith(this.#rootPath + Path.sep)
		) {
			throw new DOMException(
				"Invalid path: outside of root directory",
				"NotAllowedError",
			);
		}

		return resolvedPath;
	}
}
