import nodepath from "node:path";

/**
 * Textual path convention a value was parsed with.
 *
 * @remarks
 *
 * `"posix"` paths use `/` only and are absolute when they begin with `/`. `"windows"` paths accept both
 * `/` and `\` and are absolute only in the drive-letter form (`C:\`).
 */
export type Dialect = "posix" | "windows";

export const POSIX: Dialect = "posix";
export const WINDOWS: Dialect = "windows";

/**
 * Dialect of the running host.
 *
 * @remarks
 *
 * Derived from {@link nodepath.sep} once at module evaluation time. Constructors and renderers default to
 * this value when no dialect is requested.
 */
export const nativeDialect: Dialect = nodepath.sep === "\\" ? WINDOWS : POSIX;

export type DialectRules = {
	readonly separators: readonly string[];
	readonly preferredSeparator: string;
};

export const dialectRules: Readonly<Record<Dialect, DialectRules>> = {
	posix: { separators: ["/"], preferredSeparator: "/" },
	windows: { separators: ["/", "\\"], preferredSeparator: "\\" },
};

export function isSeparator(char: string, dialect: Dialect): boolean {
	return dialectRules[dialect].separators.includes(char);
}

function isAsciiLetter(char: string): boolean {
	return /^[A-Za-z]$/.test(char);
}

/**
 * Returns the drive token (`"C:"`) when `text` opens with a drive letter, a colon and a separator.
 *
 * @remarks
 *
 * Only single ASCII letters qualify. `"C:foo"` has no root separator and is therefore not a drive form.
 */
export function matchDrive(text: string): string | undefined {
	if (text.length < 3) return undefined;
	const letter = text.charAt(0);
	if (!isAsciiLetter(letter) || text.charAt(1) !== ":") return undefined;
	if (!isSeparator(text.charAt(2), WINDOWS)) return undefined;
	return text.slice(0, 2);
}

export function isAbsoluteText(text: string, dialect: Dialect): boolean {
	if (dialect === POSIX) return text.startsWith("/");
	return matchDrive(text) !== undefined;
}
