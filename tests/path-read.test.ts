import nodepath from "node:path";
import { afterAll, describe, expect, test } from "vitest";
import { FilePath, FilesystemError, PureFilePath } from "../src/index.js";
import { makeSandbox } from "./helpers.js";

const sandbox = makeSandbox();
const base = new FilePath(sandbox.root);

afterAll(() => {
	sandbox.cleanup();
});

describe("FilePath probes (sync)", () => {
	test("existsSync on base path", () => {
		expect(base.existsSync()).toBe(true);
	});

	test("existsSync on missing file returns false", () => {
		expect(base.join("missing.txt").existsSync()).toBe(false);
	});

	test("isDirectorySync and isFileSync", () => {
		expect(base.join("dirB").isDirectorySync()).toBe(true);
		expect(base.join("dirB").isFileSync()).toBe(false);
		expect(base.join("fileA").isFileSync()).toBe(true);
		expect(base.join("fileA").isDirectorySync()).toBe(false);
		expect(base.join("nope").isFileSync()).toBe(false);
		expect(base.join("nope").isDirectorySync()).toBe(false);
	});

	test("fileSizeSync of a regular file", () => {
		expect(base.join("fileA").fileSizeSync()).toBe(8);
		expect(base.joinpath("dirC", "novel.txt").fileSizeSync()).toBe(12);
	});

	test("fileSizeSync of a missing path is negative and does not throw", () => {
		expect(base.join("missing.bin").fileSizeSync()).toBe(-1);
	});

	test("fileSizeSync of a directory is negative", () => {
		expect(base.join("dirB").fileSizeSync()).toBe(-1);
	});
});

describe("FilePath extension", () => {
	test("regular files report no extension", () => {
		const novel = base.joinpath("dirC", "novel.txt");
		expect(novel.isDirectorySync()).toBe(false);
		expect(novel.extension()).toBe("");
	});

	test("missing paths report no extension", () => {
		expect(base.join("ghost.md").extension()).toBe("");
	});

	test("directories report the text after the last dot", () => {
		expect(base.join("archive.d").extension()).toBe("d");
	});

	test("directories without a dot report no extension", () => {
		expect(base.join("dirB").extension()).toBe("");
	});
});

describe("FilePath listChildren", () => {
	test("lists entries as joined paths", () => {
		const names = base
			.join("dirC")
			.listChildrenSync()
			.map((child) => child.name)
			.sort();
		expect(names).toEqual(["dirD", "novel.txt"]);
	});

	test("children are FilePath values under the parent", () => {
		const [child] = base.join("dirB").listChildrenSync();
		expect(child).toBeInstanceOf(FilePath);
		expect(child?.toString()).toBe(nodepath.join(sandbox.root, "dirB", "fileB"));
		expect(child?.isAbsolute).toBe(true);
		expect(child?.isFileSync()).toBe(true);
	});

	test("a regular file has no children", () => {
		expect(base.join("fileA").listChildrenSync()).toEqual([]);
	});

	test("a missing path has no children", () => {
		expect(base.join("missing").listChildrenSync()).toEqual([]);
	});
});

describe("FilePath makeAbsolute and parent", () => {
	test("makeAbsoluteSync resolves .. segments", () => {
		const resolved = base.joinpath("dirC", "dirD", "..", "novel.txt").makeAbsoluteSync();
		expect(resolved.toString()).toBe(nodepath.join(sandbox.root, "dirC", "novel.txt"));
	});

	test("makeAbsoluteSync throws FilesystemError for a missing path", () => {
		const missing = base.join("missing");
		expect(() => missing.makeAbsoluteSync()).toThrow(FilesystemError);
		try {
			missing.makeAbsoluteSync();
		} catch (error) {
			expect(error).toBeInstanceOf(FilesystemError);
			if (error instanceof FilesystemError) {
				expect(error.operation).toBe("makeAbsolute");
				expect(error.code).toBe("ENOENT");
				expect(error.path).toBe(nodepath.join(sandbox.root, "missing"));
			}
		}
	});

	test("tryMakeAbsolute returns the error instead of throwing", () => {
		const result = base.join("missing").tryMakeAbsolute();
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.code).toBe("ENOENT");
	});

	test("parent of an absolute path is canonicalized", () => {
		const parent = base.joinpath("dirC", "dirD", "fileD").parent;
		expect(parent.toString()).toBe(nodepath.join(sandbox.root, "dirC", "dirD"));
		expect(parent).toBeInstanceOf(FilePath);
	});

	test("parent of an absolute path ending in .. is flattened", () => {
		const parent = base.joinpath("dirC", "dirD", "..").parent;
		expect(parent.toString()).toBe(sandbox.root);
	});

	test("parent of an absolute path fails when the parent does not exist", () => {
		const deep = base.joinpath("missing", "child");
		expect(() => deep.parent).toThrow(FilesystemError);
	});

	test("parent of a relative path stays lexical", () => {
		const parent = FilePath.posix("a/b/..").parent;
		expect(parent.segments).toEqual(["a", "b", "..", ".."]);
		expect(parent).toBeInstanceOf(FilePath);
	});

	test("pure parent of the same value does not canonicalize", () => {
		const pure = new PureFilePath(nodepath.join(sandbox.root, "missing", "child"));
		expect(pure.parent.name).toBe("missing");
	});
});

describe("FilePath process locations", () => {
	test("cwd matches process.cwd", () => {
		expect(FilePath.cwd().toString()).toBe(process.cwd());
	});

	test("executablePath matches process.execPath", () => {
		const exe = FilePath.executablePath();
		expect(exe.isAbsolute).toBe(true);
		expect(exe.toString()).toBe(process.execPath);
	});
});

describe("FilePath probes (async)", () => {
	test("exists, isFile, isDirectory, fileSize", async () => {
		await expect(base.exists()).resolves.toBe(true);
		await expect(base.join("fileA").isFile()).resolves.toBe(true);
		await expect(base.join("dirB").isDirectory()).resolves.toBe(true);
		await expect(base.join("fileA").fileSize()).resolves.toBe(8);
	});

	test("listChildren resolves to the same entries", async () => {
		const children = await base.join("dirB").listChildren();
		expect(children.map((c) => c.name)).toEqual(["fileB"]);
	});

	test("makeAbsolute rejects for a missing path", async () => {
		await expect(base.join("missing").makeAbsolute()).rejects.toBeInstanceOf(
			FilesystemError,
		);
	});
});
