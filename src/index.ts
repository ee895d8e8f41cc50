/**
 * Value-semantic filesystem paths for POSIX and Windows text.
 *
 * @remarks
 *
 * The primary entry points are:
 *
 * - {@link PureFilePath} for lexical operations (parse, join, parent, filename, rendering) without touching
 *   the filesystem.
 * - {@link FilePath} for paths that also query and mutate the filesystem through a {@link FileSystemAdapter}.
 *
 * A path is a list of segments, an absoluteness flag and the {@link Dialect} it was parsed with. Both
 * dialects can be parsed and rendered on any host:
 *
 * 1. `posix`: `/` separates segments; a leading `/` makes the path absolute.
 * 2. `windows`: `/` and `\` separate segments; only the drive form (`C:\`) is absolute.
 *
 * Set `NODE_DEBUG=filepath` to trace the OS failures that probes turn into sentinels.
 */

import {
	DialectMismatchError,
	ErrnoError,
	FilesystemError,
	InvalidOperandError,
	PathOperationError,
} from "./errors.js";
import { NodeFileSystem } from "./os.js";
import { FilePath } from "./path.js";
import { PureFilePath } from "./purepath.js";

export {
	type Dialect,
	type DialectRules,
	dialectRules,
	isAbsoluteText,
	isSeparator,
	matchDrive,
	nativeDialect,
	POSIX,
	WINDOWS,
} from "./dialect.js";
export {
	DialectMismatchError,
	ErrnoError,
	FilesystemError,
	InvalidOperandError,
	PathOperationError,
	type PathOperationReason,
} from "./errors.js";
export { formatPath, formatWidePath } from "./format.js";
export type {
	FileKind,
	FileStat,
	FileSystemAdapter,
	OsResult,
} from "./os.js";
export { NodeFileSystem } from "./os.js";
export {
	decodePathText,
	type ParsedPath,
	type PathText,
	parsePath,
	splitSegments,
} from "./parser.js";
export { FilePath } from "./path.js";
export type { PathLike } from "./purepath.js";
export { PureFilePath } from "./purepath.js";
export { err, ok, type Result, unwrap } from "./result.js";

export default {
	PureFilePath,
	FilePath,
	NodeFileSystem,
	ErrnoError,
	FilesystemError,
	PathOperationError,
	DialectMismatchError,
	InvalidOperandError,
};
