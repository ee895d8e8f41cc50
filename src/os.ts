/**
 * Operating-system collaborators behind {@link FilePath}.
 *
 * @remarks
 *
 * The path value never calls `node:fs` directly. Every syscall goes through a {@link FileSystemAdapter},
 * which answers with an {@link OsResult}: either the payload or an {@link ErrnoError} carrying the OS error
 * code. {@link FilePath} then maps these results onto its two error styles (sentinel probes and raising
 * operations).
 *
 * {@link NodeFileSystem} is the implementation for Node hosts. Node already abstracts the platform, so a
 * single implementation serves both POSIX and Windows hosts.
 */

import fs from "node:fs";
import { debuglog } from "node:util";
import { ErrnoError, toErrnoError } from "./errors.js";
import { err, ok, type Result } from "./result.js";

export { ErrnoError } from "./errors.js";

export const debug = debuglog("filepath");

export type OsResult<T> = Result<T, ErrnoError>;

export type FileKind = "file" | "directory" | "other";

/**
 * Subset of stat information the path layer consumes.
 */
export type FileStat = {
	kind: FileKind;
	size: number;
};

/**
 * Raw OS primitives consumed by {@link FilePath}.
 *
 * @remarks
 *
 * All paths are OS path text. Implementations must not throw: failures are returned as `{ ok: false }`.
 */
export interface FileSystemAdapter {
	/** Kind and size of the entry, following symlinks. */
	stat(path: string): OsResult<FileStat>;
	/** Resolves to the definitive absolute form. Fails when the path does not exist. */
	canonicalize(path: string): OsResult<string>;
	/** Entry names of a directory, in enumeration order. */
	readDirectory(path: string): OsResult<string[]>;
	truncate(path: string, length: number): OsResult<void>;
	removeFile(path: string): OsResult<void>;
	createDirectory(path: string): OsResult<void>;
	currentDirectory(): OsResult<string>;
	executablePath(): OsResult<string>;
}

function attempt<T>(syscall: string, path: string | undefined, fn: () => T): OsResult<T> {
	try {
		return ok(fn());
	} catch (error) {
		const mapped = toErrnoError(error, path);
		debug("%s %s failed: %s", syscall, path ?? "", mapped.code);
		return err(mapped);
	}
}

function kindOf(stats: fs.Stats): FileKind {
	if (stats.isFile()) return "file";
	if (stats.isDirectory()) return "directory";
	return "other";
}

/**
 * {@link FileSystemAdapter} backed by synchronous `node:fs` calls and `process`.
 *
 * @remarks
 *
 * Directories are created with owner-only permissions (`0o700`). Directory enumeration uses
 * `fs.readdirSync`, which never reports the `.` and `..` entries.
 */
export class NodeFileSystem implements FileSystemAdapter {
	stat(path: string): OsResult<FileStat> {
		return attempt("stat", path, () => {
			const stats = fs.statSync(path);
			return { kind: kindOf(stats), size: stats.size };
		});
	}

	canonicalize(path: string): OsResult<string> {
		return attempt("realpath", path, () => fs.realpathSync.native(path));
	}

	readDirectory(path: string): OsResult<string[]> {
		return attempt("scandir", path, () => fs.readdirSync(path));
	}

	truncate(path: string, length: number): OsResult<void> {
		// fs.truncateSync clamps a negative length to 0
		if (!Number.isSafeInteger(length) || length < 0) {
			return err(
				new ErrnoError(`EINVAL: invalid length ${length}, truncate '${path}'`, "EINVAL", {
					path,
					syscall: "truncate",
				}),
			);
		}
		return attempt("truncate", path, () => fs.truncateSync(path, length));
	}

	removeFile(path: string): OsResult<void> {
		return attempt("unlink", path, () => fs.unlinkSync(path));
	}

	createDirectory(path: string): OsResult<void> {
		return attempt("mkdir", path, () => {
			fs.mkdirSync(path, { mode: 0o700 });
		});
	}

	currentDirectory(): OsResult<string> {
		return attempt("getcwd", undefined, () => process.cwd());
	}

	executablePath(): OsResult<string> {
		return attempt("readlink", undefined, () => process.execPath);
	}
}
