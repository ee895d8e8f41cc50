import { type Dialect, isSeparator, nativeDialect, POSIX, WINDOWS } from "./dialect.js";
import { DialectMismatchError, InvalidOperandError } from "./errors.js";
import { formatPath, formatWidePath } from "./format.js";
import { type ParsedPath, type PathText, parsePath } from "./parser.js";

/**
 * Union of inputs accepted where a relative operand is expected.
 *
 * @remarks
 *
 * Text is parsed in the dialect of the value it is combined with.
 */
export type PathLike = PathText | PureFilePath;

function isParsedPath(value: PathText | ParsedPath): value is ParsedPath {
	return (
		typeof value !== "string" &&
		!(value instanceof Uint8Array) &&
		!(value instanceof Uint16Array)
	);
}

/**
 * Rejects parts holding an empty segment or a segment that contains a separator of their dialect.
 *
 * @remarks
 *
 * A drive token such as `C:` holds no separator, so it passes as segment zero of a Windows value.
 */
function checkParts(parts: ParsedPath): ParsedPath {
	for (const segment of parts.segments) {
		if (segment === "") {
			throw new InvalidOperandError(segment, "path segments must not be empty");
		}
		if (Array.from(segment).some((char) => isSeparator(char, parts.dialect))) {
			throw new InvalidOperandError(
				segment,
				`path segment ${JSON.stringify(segment)} contains a ${parts.dialect} separator`,
			);
		}
	}
	return parts;
}

/**
 * Immutable, segmented filesystem path that never performs I/O.
 *
 * @remarks
 *
 * A value holds ordered, non-empty segments, an absoluteness flag and the {@link Dialect} it was parsed
 * with. Runs of separators collapse while parsing, so `"/a//b"` and `"/a/b"` produce the same value. Every
 * operation returns a new instance; the segment array is frozen.
 *
 * Use {@link FilePath} when the path must also be checked against or applied to the real filesystem.
 *
 * @example Building a path without touching the filesystem
 * ```ts
 * import { PureFilePath } from "filepath-ts";
 *
 * const project = PureFilePath.posix("/srv/app");
 * const config = project.join("config/app.json");
 *
 * console.log(config.toText("posix")); // '/srv/app/config/app.json'
 * console.log(config.isAbsolute); // true
 * ```
 */
export class PureFilePath {
	readonly segments: readonly string[];
	readonly isAbsolute: boolean;
	readonly dialect: Dialect;

	/**
	 * @param source - Path text, or already-parsed parts.
	 * @param dialect - Dialect used to parse text. Ignored when `source` is already parsed.
	 * @throws {@link InvalidOperandError} When parsed parts hold an empty segment or one containing a separator.
	 */
	constructor(source: PathText | ParsedPath = "", dialect: Dialect = nativeDialect) {
		const parts = isParsedPath(source) ? checkParts(source) : parsePath(source, dialect);
		this.segments = Object.freeze([...parts.segments]);
		this.isAbsolute = parts.isAbsolute;
		this.dialect = parts.dialect;
	}

	static posix(text: PathText = ""): PureFilePath {
		return new PureFilePath(text, POSIX);
	}

	static windows(text: PathText = ""): PureFilePath {
		return new PureFilePath(text, WINDOWS);
	}

	/**
	 * Builds a value of the same concrete type from parts.
	 *
	 * @remarks
	 *
	 * Subclasses override this so derived values (join, parent) keep their type.
	 */
	protected withParts(parts: ParsedPath): PureFilePath {
		return new PureFilePath(parts);
	}

	protected coerce(other: PathLike): PureFilePath {
		return other instanceof PureFilePath
			? other
			: new PureFilePath(other, this.dialect);
	}

	/**
	 * Appends a relative path to this one.
	 *
	 * @remarks
	 *
	 * The result keeps this value's dialect and absoluteness. Text operands are parsed in this value's dialect,
	 * so a dialect mismatch can only come from a path value.
	 *
	 * @param relative - Path to append. Must be relative and of the same dialect.
	 * @returns A new path whose segments are this value's followed by the operand's.
	 * @throws {@link InvalidOperandError} When `relative` is absolute.
	 * @throws {@link DialectMismatchError} When `relative` was parsed with another dialect.
	 */
	join(relative: PathLike): PureFilePath {
		return this.withParts(this.joinedParts(relative));
	}

	/**
	 * Alias of {@link PureFilePath.join} accepting several operands, applied left to right.
	 */
	joinpath(...relatives: PathLike[]): PureFilePath {
		let result: PureFilePath = this;
		for (const relative of relatives) {
			result = result.join(relative);
		}
		return result;
	}

	protected joinedParts(relative: PathLike): ParsedPath {
		const other = this.coerce(relative);
		if (other.isAbsolute) {
			throw new InvalidOperandError(other.toText(other.dialect));
		}
		if (other.dialect !== this.dialect) {
			throw new DialectMismatchError(this.dialect, other.dialect);
		}
		return {
			segments: [...this.segments, ...other.segments],
			isAbsolute: this.isAbsolute,
			dialect: this.dialect,
		};
	}

	/**
	 * Parts of the lexical parent.
	 *
	 * @remarks
	 *
	 * A trailing `.` or `..` is never resolved: a further `..` is appended instead, so `a/b/..` becomes
	 * `a/b/../..`. The empty path gains a single `..`.
	 */
	protected parentParts(): ParsedPath {
		const last = this.segments.at(-1);
		const segments =
			last === undefined || last === "." || last === ".."
				? [...this.segments, ".."]
				: this.segments.slice(0, -1);
		return { segments, isAbsolute: this.isAbsolute, dialect: this.dialect };
	}

	/**
	 * Returns the lexical parent of the path.
	 *
	 * @remarks
	 *
	 * No filesystem access happens here, even for absolute values. {@link FilePath.parent} additionally
	 * canonicalizes absolute results.
	 */
	get parent(): PureFilePath {
		return this.withParts(this.parentParts());
	}

	/**
	 * Final segment, or `""` when the path has none.
	 *
	 * @remarks
	 *
	 * On Windows a bare drive path returns the drive token (`"C:"`).
	 */
	get name(): string {
		return this.segments.at(-1) ?? "";
	}

	filename(): string {
		return this.name;
	}

	isEmpty(): boolean {
		return this.segments.length === 0;
	}

	equals(other: PureFilePath): boolean {
		return (
			this.dialect === other.dialect &&
			this.isAbsolute === other.isAbsolute &&
			this.segments.length === other.segments.length &&
			this.segments.every((segment, i) => segment === other.segments[i])
		);
	}

	/**
	 * Renders the path as text using the separator of `target`.
	 *
	 * @remarks
	 *
	 * The leading `/` depends on this value's own dialect, not on `target`. See {@link formatPath}.
	 */
	toText(target: Dialect = nativeDialect): string {
		return formatPath(this, target);
	}

	/**
	 * Renders the path as UTF-16 code units.
	 */
	toWideText(target: Dialect = nativeDialect): Uint16Array {
		return formatWidePath(this, target);
	}

	toString(): string {
		return this.toText();
	}

	valueOf(): string {
		return this.toString();
	}

	toJSON(): string {
		return this.toString();
	}

	[Symbol.toPrimitive](): string {
		return this.toString();
	}
}
