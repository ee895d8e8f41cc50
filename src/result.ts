/**
 * Outcome of an operation that either produces a value or an error, without throwing.
 *
 * @remarks
 *
 * Used for the raising class of filesystem operations (`makeAbsolute`, `cwd`, `executablePath`) and by
 * {@link FileSystemAdapter} primitives. Probe operations never return this shape: they answer with plain
 * sentinels instead.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
	return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
	return { ok: false, error };
}

/**
 * Returns the carried value, or throws the carried error.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
	if (result.ok) return result.value;
	throw result.error;
}
