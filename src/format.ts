import { type Dialect, dialectRules, POSIX } from "./dialect.js";
import type { ParsedPath } from "./parser.js";

/**
 * Renders path parts as text in the target dialect.
 *
 * @remarks
 *
 * The root `/` is written only when the value is absolute and its own dialect is POSIX; the target dialect
 * does not affect it. A Windows drive path rendered as POSIX text therefore reads `C:/Users`, and a POSIX
 * absolute path rendered as Windows text reads `/usr\bin`. Segments are joined with the target's preferred
 * separator without re-validation.
 *
 * @param parts - Segments, absoluteness and dialect of the value.
 * @param target - Dialect whose separator joins the segments.
 * @returns The rendered text. An empty value renders as `""`, the bare POSIX root as `/`.
 */
export function formatPath(parts: ParsedPath, target: Dialect): string {
	const sep = dialectRules[target].preferredSeparator;
	let text = parts.isAbsolute && parts.dialect === POSIX ? "/" : "";
	for (const segment of parts.segments) {
		text += segment + sep;
	}
	if (parts.segments.length > 0) text = text.slice(0, -sep.length);
	return text;
}

/**
 * Renders path parts as UTF-16 code units.
 */
export function formatWidePath(parts: ParsedPath, target: Dialect): Uint16Array {
	const text = formatPath(parts, target);
	const units = new Uint16Array(text.length);
	for (let i = 0; i < text.length; i += 1) {
		units[i] = text.charCodeAt(i);
	}
	return units;
}
