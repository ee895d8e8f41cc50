import fs from "node:fs";
import os from "node:os";
import nodepath from "node:path";
import { ErrnoError } from "../src/errors.js";
import type { FileStat, FileSystemAdapter, OsResult } from "../src/os.js";
import { err, ok } from "../src/result.js";

export type Sandbox = {
	root: string;
	cleanup: () => void;
	reset: () => void;
};

export function makeSandbox(prefix = "filepath-ts-"): Sandbox {
	// realpath so canonicalized results compare equal on hosts where tmpdir is a symlink
	const base = fs.realpathSync(fs.mkdtempSync(nodepath.join(os.tmpdir(), prefix)));
	const cleanup = () => {
		fs.rmSync(base, { recursive: true, force: true });
	};

	function setup() {
		// base/
		//   fileA          "hello A\n"
		//   dirB/
		//     fileB        "hello B\n"
		//   dirC/
		//     dirD/
		//       fileD      "hello D\n"
		//     novel.txt    "lorem ipsum\n"
		//   archive.d/
		fs.mkdirSync(nodepath.join(base, "dirB"), { recursive: true });
		fs.mkdirSync(nodepath.join(base, "dirC", "dirD"), { recursive: true });
		fs.mkdirSync(nodepath.join(base, "archive.d"), { recursive: true });
		fs.writeFileSync(nodepath.join(base, "fileA"), "hello A\n", "utf8");
		fs.writeFileSync(nodepath.join(base, "dirB", "fileB"), "hello B\n", "utf8");
		fs.writeFileSync(
			nodepath.join(base, "dirC", "dirD", "fileD"),
			"hello D\n",
			"utf8",
		);
		fs.writeFileSync(
			nodepath.join(base, "dirC", "novel.txt"),
			"lorem ipsum\n",
			"utf8",
		);
	}

	const reset = () => {
		cleanup();
		fs.mkdirSync(base, { recursive: true });
		setup();
	};

	setup();

	return { root: base, cleanup, reset };
}

function failure(code: string, path?: string): OsResult<never> {
	return err(
		new ErrnoError(`${code}: stub failure`, code, path === undefined ? {} : { path }),
	);
}

/**
 * Adapter whose every primitive fails with `code`, for exercising error mapping without a real OS failure.
 */
export function makeFailingAdapter(code = "EACCES"): FileSystemAdapter {
	return {
		stat: (path) => failure(code, path),
		canonicalize: (path) => failure(code, path),
		readDirectory: (path) => failure(code, path),
		truncate: (path) => failure(code, path),
		removeFile: (path) => failure(code, path),
		createDirectory: (path) => failure(code, path),
		currentDirectory: () => failure(code),
		executablePath: () => failure(code),
	};
}

/**
 * Read-only adapter answering from fixed tables, recording every path it is queried with.
 */
export function makeTableAdapter(
	entries: Record<string, FileStat>,
	listings: Record<string, string[]> = {},
): FileSystemAdapter & { calls: string[] } {
	const calls: string[] = [];
	const lookup = <T>(path: string, value: T | undefined): OsResult<T> => {
		calls.push(path);
		return value === undefined ? failure("ENOENT", path) : ok(value);
	};
	return {
		calls,
		stat: (path) => lookup(path, entries[path]),
		canonicalize: (path) => lookup(path, entries[path] ? path : undefined),
		readDirectory: (path) => lookup(path, listings[path]),
		truncate: (path) => failure("EROFS", path),
		removeFile: (path) => failure("EROFS", path),
		createDirectory: (path) => failure("EROFS", path),
		currentDirectory: () => ok("/work"),
		executablePath: () => ok("/usr/bin/node"),
	};
}
