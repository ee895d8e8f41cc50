/**
 * Wrap a synchronous factory so it always yields a {@link Promise}.
 *
 * @remarks
 *
 * Every filesystem method on {@link FilePath} has an asynchronous twin that delegates to the synchronous
 * implementation. Thrown errors become rejections, so `await path.makeAbsolute()` rejects with the same
 * {@link FilesystemError} that `makeAbsoluteSync()` throws.
 *
 * @param factory - Synchronous function producing a value.
 * @returns A promise that resolves with the factory result or rejects with the thrown error.
 */
export function toPromise<T>(factory: () => T): Promise<T> {
	try {
		return Promise.resolve(factory());
	} catch (error) {
		return Promise.reject(error);
	}
}
