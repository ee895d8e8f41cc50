import { isSeparator, nativeDialect, POSIX, WINDOWS } from "./dialect.js";
import { FilesystemError } from "./errors.js";
import {
	debug,
	type FileStat,
	type FileSystemAdapter,
	NodeFileSystem,
	type OsResult,
} from "./os.js";
import type { ParsedPath, PathText } from "./parser.js";
import { type PathLike, PureFilePath } from "./purepath.js";
import { err, ok, type Result, unwrap } from "./result.js";
import { toPromise } from "./util.js";

/**
 * Concrete path that layers filesystem queries and mutations on top of {@link PureFilePath}.
 *
 * @remarks
 *
 * Operations fall into two classes that are never mixed:
 *
 * - Probes ({@link FilePath.existsSync}, {@link FilePath.isFileSync}, {@link FilePath.isDirectorySync},
 *   {@link FilePath.fileSizeSync}, {@link FilePath.createDirectorySync}, {@link FilePath.removeFileSync},
 *   {@link FilePath.resizeFileSync}, {@link FilePath.listChildrenSync}) never throw. Any OS failure collapses
 *   into `false`, `-1` or `[]`.
 * - Raising operations ({@link FilePath.makeAbsoluteSync}, {@link FilePath.cwd},
 *   {@link FilePath.executablePath}) throw {@link FilesystemError}. Their `try*` companions return the same
 *   error inside a {@link Result}.
 *
 * Each filesystem method has a synchronous form suffixed with `Sync` and an asynchronous twin returning a
 * promise. Syscalls go through the static {@link FilePath.adapter}, which defaults to {@link NodeFileSystem}.
 * Path text handed to the adapter is rendered in the native dialect.
 *
 * @example Listing the text files next to the running script
 * ```ts
 * import { FilePath } from "filepath-ts";
 *
 * const here = FilePath.cwd();
 * for (const child of here.listChildrenSync()) {
 *   if (child.isFileSync() && child.name.endsWith(".txt")) {
 *     console.log(child.toString(), child.fileSizeSync());
 *   }
 * }
 * ```
 */
export class FilePath extends PureFilePath {
	static adapter: FileSystemAdapter = new NodeFileSystem();

	/**
	 * Replaces the adapter used by every {@link FilePath}.
	 *
	 * @returns The previous adapter, so callers can restore it.
	 */
	static useAdapter(adapter: FileSystemAdapter): FileSystemAdapter {
		const previous = FilePath.adapter;
		FilePath.adapter = adapter;
		return previous;
	}

	static override posix(text: PathText = ""): FilePath {
		return new FilePath(text, POSIX);
	}

	static override windows(text: PathText = ""): FilePath {
		return new FilePath(text, WINDOWS);
	}

	protected override withParts(parts: ParsedPath): FilePath {
		return new FilePath(parts);
	}

	override join(relative: PathLike): FilePath {
		return this.withParts(this.joinedParts(relative));
	}

	override joinpath(...relatives: PathLike[]): FilePath {
		let result: FilePath = this;
		for (const relative of relatives) {
			result = result.join(relative);
		}
		return result;
	}

	/**
	 * Returns the parent of the path.
	 *
	 * @remarks
	 *
	 * The step itself is lexical (see {@link PureFilePath.parent}). When the path is absolute the result is then
	 * canonicalized, flattening any `..` against the real hierarchy, so the parent must exist.
	 *
	 * @throws {@link FilesystemError} When the path is absolute and its parent cannot be canonicalized.
	 */
	override get parent(): FilePath {
		const lexical = this.withParts(this.parentParts());
		return lexical.isAbsolute ? lexical.makeAbsoluteSync() : lexical;
	}

	/**
	 * Returns the text after the last `.` of the final segment, but only for directories.
	 *
	 * @remarks
	 *
	 * The result is `""` whenever {@link FilePath.isDirectorySync} is `false`, so a regular file named
	 * `notes.txt` has no extension while a directory named `archive.d` has `"d"`. The returned text has no
	 * leading dot.
	 */
	extension(): string {
		if (!this.isDirectorySync()) return "";
		const name = this.name;
		const idx = name.lastIndexOf(".");
		return idx === -1 ? "" : name.slice(idx + 1);
	}

	private osText(): string {
		return this.toText(nativeDialect);
	}

	private settle<T>(operation: string, result: OsResult<T>): OsResult<T> {
		if (!result.ok) {
			debug("%s(%s) -> %s", operation, this.osText(), result.error.code);
		}
		return result;
	}

	private statFor(operation: string): OsResult<FileStat> {
		return this.settle(operation, FilePath.adapter.stat(this.osText()));
	}

	/**
	 * Checks for path existence synchronously.
	 *
	 * @returns `true` if the path exists; `false` when it does not or cannot be checked.
	 */
	existsSync(): boolean {
		return this.statFor("exists").ok;
	}

	exists(): Promise<boolean> {
		return toPromise(() => this.existsSync());
	}

	isFileSync(): boolean {
		const stat = this.statFor("isFile");
		return stat.ok && stat.value.kind === "file";
	}

	isFile(): Promise<boolean> {
		return toPromise(() => this.isFileSync());
	}

	isDirectorySync(): boolean {
		const stat = this.statFor("isDirectory");
		return stat.ok && stat.value.kind === "directory";
	}

	isDirectory(): Promise<boolean> {
		return toPromise(() => this.isDirectorySync());
	}

	/**
	 * Size of a regular file in bytes.
	 *
	 * @returns The size, or `-1` when the path is not a regular file or cannot be inspected.
	 */
	fileSizeSync(): number {
		const stat = this.statFor("fileSize");
		if (!stat.ok || stat.value.kind !== "file") return -1;
		return stat.value.size;
	}

	fileSize(): Promise<number> {
		return toPromise(() => this.fileSizeSync());
	}

	/**
	 * Creates the directory (not its parents).
	 *
	 * @returns `true` on success; `false` when it already exists or cannot be created.
	 */
	createDirectorySync(): boolean {
		return this.settle(
			"createDirectory",
			FilePath.adapter.createDirectory(this.osText()),
		).ok;
	}

	createDirectory(): Promise<boolean> {
		return toPromise(() => this.createDirectorySync());
	}

	removeFileSync(): boolean {
		return this.settle("removeFile", FilePath.adapter.removeFile(this.osText()))
			.ok;
	}

	removeFile(): Promise<boolean> {
		return toPromise(() => this.removeFileSync());
	}

	/**
	 * Truncates or extends the file to `length` bytes.
	 *
	 * @returns `true` on success; `false` when the file is missing or cannot be resized, or when `length` is
	 * not a non-negative safe integer.
	 */
	resizeFileSync(length: number): boolean {
		if (!Number.isSafeInteger(length) || length < 0) {
			debug("resizeFile(%s) -> invalid length %d", this.osText(), length);
			return false;
		}
		return this.settle(
			"resizeFile",
			FilePath.adapter.truncate(this.osText(), length),
		).ok;
	}

	resizeFile(length: number): Promise<boolean> {
		return toPromise(() => this.resizeFileSync(length));
	}

	/**
	 * Lists the entries of the directory as paths joined onto this one.
	 *
	 * @remarks
	 *
	 * The listing is materialized eagerly in the adapter's enumeration order. Entry names become single
	 * segments without re-parsing, so the children keep this path's dialect. A name containing a separator of
	 * that dialect cannot be held as one segment and is left out.
	 *
	 * @returns The children, or `[]` when the path is not a directory or cannot be enumerated.
	 */
	listChildrenSync(): FilePath[] {
		if (!this.isDirectorySync()) return [];
		const names = this.settle(
			"listChildren",
			FilePath.adapter.readDirectory(this.osText()),
		);
		if (!names.ok) return [];
		const representable = names.value.filter((name) => {
			if (!Array.from(name).some((char) => isSeparator(char, this.dialect))) return true;
			debug("listChildren(%s) -> skipped %s", this.osText(), name);
			return false;
		});
		return representable.map((name) =>
			this.withParts({
				segments: [...this.segments, name],
				isAbsolute: this.isAbsolute,
				dialect: this.dialect,
			}),
		);
	}

	listChildren(): Promise<FilePath[]> {
		return toPromise(() => this.listChildrenSync());
	}

	/**
	 * Canonicalizes the path without throwing.
	 */
	tryMakeAbsolute(): Result<FilePath, FilesystemError> {
		return lift("makeAbsolute", FilePath.adapter.canonicalize(this.osText()));
	}

	/**
	 * Resolves the path to its definitive absolute form through the OS.
	 *
	 * @remarks
	 *
	 * Symlinks and `..` segments are resolved by the OS, so the path must exist. The result is parsed in the
	 * native dialect.
	 *
	 * @throws {@link FilesystemError} When the path does not exist or cannot be resolved.
	 */
	makeAbsoluteSync(): FilePath {
		return unwrap(this.tryMakeAbsolute());
	}

	makeAbsolute(): Promise<FilePath> {
		return toPromise(() => this.makeAbsoluteSync());
	}

	static tryCwd(): Result<FilePath, FilesystemError> {
		return lift("currentDirectory", FilePath.adapter.currentDirectory());
	}

	/**
	 * Current working directory of the process.
	 *
	 * @throws {@link FilesystemError} When the OS cannot report it.
	 */
	static cwd(): FilePath {
		return unwrap(FilePath.tryCwd());
	}

	static tryExecutablePath(): Result<FilePath, FilesystemError> {
		return lift("executablePath", FilePath.adapter.executablePath());
	}

	/**
	 * Absolute path of the running executable.
	 *
	 * @throws {@link FilesystemError} When the OS cannot report it.
	 */
	static executablePath(): FilePath {
		return unwrap(FilePath.tryExecutablePath());
	}
}

function lift(
	operation: string,
	result: OsResult<string>,
): Result<FilePath, FilesystemError> {
	if (!result.ok) return err(new FilesystemError(operation, result.error));
	return ok(new FilePath(result.value, nativeDialect));
}
