import {
	type Dialect,
	isAbsoluteText,
	isSeparator,
	matchDrive,
	POSIX,
	WINDOWS,
} from "./dialect.js";

/**
 * Raw input accepted by the parser.
 *
 * @remarks
 *
 * Strings are used as-is. `Uint8Array` (including Node `Buffer`) holds UTF-8 bytes, the same encoding Node's
 * filesystem APIs accept for buffer paths. `Uint16Array` holds UTF-16 code units, the wide form.
 */
export type PathText = string | Uint8Array | Uint16Array;

/**
 * Decomposed form of a path: the fields every path value is built from.
 */
export type ParsedPath = {
	readonly segments: readonly string[];
	readonly isAbsolute: boolean;
	readonly dialect: Dialect;
};

const utf8Decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

const loneSurrogate =
	/[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Transcodes path input to the string form segments are stored in.
 *
 * @returns The decoded text, or `undefined` when the bytes are not valid UTF-8 or the code units contain a
 * lone surrogate.
 */
export function decodePathText(input: PathText): string | undefined {
	if (typeof input === "string") return input;
	if (input instanceof Uint16Array) {
		let text = "";
		// chunked to stay under the argument limit of fromCharCode
		for (let offset = 0; offset < input.length; offset += 4096) {
			text += String.fromCharCode(...input.subarray(offset, offset + 4096));
		}
		return loneSurrogate.test(text) ? undefined : text;
	}
	try {
		return utf8Decoder.decode(input);
	} catch {
		return undefined;
	}
}

/**
 * Splits `text` on runs of the dialect's separators.
 *
 * @remarks
 *
 * Consecutive separators form a single boundary, so no empty segment is ever produced. Leading and trailing
 * separators are absorbed.
 */
export function splitSegments(text: string, dialect: Dialect): string[] {
	const segments: string[] = [];
	let start = 0;
	for (let i = 0; i <= text.length; i += 1) {
		if (i < text.length && !isSeparator(text.charAt(i), dialect)) continue;
		if (i > start) segments.push(text.slice(start, i));
		start = i + 1;
	}
	return segments;
}

/**
 * Parses path text in the given dialect.
 *
 * @remarks
 *
 * POSIX text is absolute when it starts with `/`. Windows text is absolute only in the drive form: the
 * drive (`C:`) becomes segment zero and the rest after the root separator is split on `/` and `\`.
 * Other leading Windows separators are absorbed and leave the path relative. Input that cannot be decoded
 * yields an empty relative path.
 */
export function parsePath(input: PathText, dialect: Dialect): ParsedPath {
	const text = decodePathText(input);
	if (text === undefined) return { segments: [], isAbsolute: false, dialect };

	if (dialect === WINDOWS) {
		const drive = matchDrive(text);
		if (drive !== undefined) {
			return {
				segments: [drive, ...splitSegments(text.slice(3), WINDOWS)],
				isAbsolute: true,
				dialect,
			};
		}
		return { segments: splitSegments(text, WINDOWS), isAbsolute: false, dialect };
	}

	return {
		segments: splitSegments(text, POSIX),
		isAbsolute: isAbsoluteText(text, POSIX),
		dialect,
	};
}
