export {
	type EntryKind,
	type FileContents,
	type FileStat,
	type FileSystemBackend,
	splitPath,
} from "./types.js";
export {MemoryFileSystemBackend, type MemoryFiles} from "./memory.js";
export {NodeFileSystemBackend} from "./node.js";
