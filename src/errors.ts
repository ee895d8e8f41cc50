import nodeos from "node:os";

/**
 * Small ErrnoError class that matches Node's ErrnoException shape.
 *
 * @remarks
 *
 * Produced by {@link FileSystemAdapter} implementations whenever an OS primitive fails. Use
 * {@link toErrnoError} to convert whatever a Node call threw.
 */
export class ErrnoError extends Error implements NodeJS.ErrnoException {
	errno?: number;
	// NodeJS.ErrnoException declares `code?: string`, keep that shape while
	// accepting numeric codes, which are mapped to errno.
	code?: string;
	path?: string;
	syscall?: string;

	constructor(
		message: string,
		code?: string | number,
		fields?: { path?: string; syscall?: string; errno?: number },
	) {
		super(message);
		this.name = "ErrnoError";

		if (code !== undefined) {
			this.code = String(code);
			const n = fields?.errno ?? mapCodeToErrno(code);
			if (n !== undefined) this.errno = n;
		}

		if (fields?.path !== undefined) this.path = fields.path;
		if (fields?.syscall !== undefined) this.syscall = fields.syscall;
	}
}

function mapCodeToErrno(code: string | number): number | undefined {
	if (typeof code === "number") return code;
	const entry = Object.entries(nodeos.constants.errno).find(
		([name]) => name === code,
	);
	return entry?.[1];
}

function readStringField(value: object, key: string): string | undefined {
	const field: unknown = Reflect.get(value, key);
	return typeof field === "string" ? field : undefined;
}

function readNumberField(value: object, key: string): number | undefined {
	const field: unknown = Reflect.get(value, key);
	return typeof field === "number" ? field : undefined;
}

/**
 * Converts a value thrown by a Node filesystem call into an {@link ErrnoError}.
 *
 * @param thrown - The caught value.
 * @param path - Path the failing call was made with, used when the error does not carry one.
 */
export function toErrnoError(thrown: unknown, path?: string): ErrnoError {
	if (thrown instanceof ErrnoError) return thrown;
	if (typeof thrown === "object" && thrown !== null) {
		const message =
			thrown instanceof Error ? thrown.message : String(thrown);
		const fields: { path?: string; syscall?: string; errno?: number } = {};
		const errPath = readStringField(thrown, "path") ?? path;
		if (errPath !== undefined) fields.path = errPath;
		const syscall = readStringField(thrown, "syscall");
		if (syscall !== undefined) fields.syscall = syscall;
		// Node reports errno as a negative number on libuv errors
		const errno = readNumberField(thrown, "errno");
		if (errno !== undefined) fields.errno = Math.abs(errno);
		const error = new ErrnoError(
			message,
			readStringField(thrown, "code") ?? "EIO",
			fields,
		);
		error.cause = thrown;
		return error;
	}
	return new ErrnoError(String(thrown), "EIO", path === undefined ? {} : { path });
}

/**
 * Fatal filesystem failure raised by `makeAbsolute`, `cwd` and `executablePath`.
 *
 * @remarks
 *
 * Carries the name of the failing operation and the originating OS error code. The underlying
 * {@link ErrnoError} is kept as `cause`.
 */
export class FilesystemError extends Error implements NodeJS.ErrnoException {
	readonly operation: string;
	code?: string;
	errno?: number;
	path?: string;

	constructor(operation: string, source: ErrnoError) {
		const subject = source.path === undefined ? "" : ` for ${source.path}`;
		super(
			`${operation} failed${subject}: ${source.code ?? "unknown error"}`,
			{ cause: source },
		);
		this.name = "FilesystemError";
		this.operation = operation;
		if (source.code !== undefined) this.code = source.code;
		if (source.errno !== undefined) this.errno = source.errno;
		if (source.path !== undefined) this.path = source.path;
	}
}

/**
 * Reason a path combination was rejected.
 */
export type PathOperationReason = "DialectMismatch" | "InvalidOperand";

/**
 * Usage error raised by {@link PureFilePath.join}.
 */
export class PathOperationError extends Error {
	readonly reason: PathOperationReason;

	constructor(reason: PathOperationReason, message: string) {
		super(message);
		this.name = "PathOperationError";
		this.reason = reason;
	}
}

/**
 * Raised when joining values parsed with different dialects.
 */
export class DialectMismatchError extends PathOperationError {
	constructor(base: string, other: string) {
		super(
			"DialectMismatch",
			`cannot join a ${other} path onto a ${base} path`,
		);
		this.name = "DialectMismatchError";
	}
}

/**
 * Raised when the right-hand operand of a join is absolute, or when parts handed to a path constructor
 * hold a segment that parsing could never produce.
 */
export class InvalidOperandError extends PathOperationError {
	constructor(operand: string, message = `expected a relative path, got ${operand}`) {
		super("InvalidOperand", message);
		this.name = "InvalidOperandError";
	}
}
