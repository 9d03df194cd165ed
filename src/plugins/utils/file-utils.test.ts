/**
 * Unit tests for file system utilities.
 */

import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileSystemUtils } from "./file-utils.js";

let dir: string;

beforeEach(async () => {
	dir = await mkdtemp(join(tmpdir(), "file-utils-"));
});

afterEach(async () => {
	await rm(dir, { recursive: true, force: true });
});

describe("FileSystemUtils.isFile / isDirectory", () => {
	test("distinguishes files, directories and missing paths", async () => {
		await writeFile(join(dir, "lib.so"), "x");

		expect(await FileSystemUtils.isFile(join(dir, "lib.so"))).toBe(true);
		expect(await FileSystemUtils.isDirectory(join(dir, "lib.so"))).toBe(false);
		expect(await FileSystemUtils.isDirectory(dir)).toBe(true);
		expect(await FileSystemUtils.isFile(dir)).toBe(false);
		expect(await FileSystemUtils.isFile(join(dir, "missing"))).toBe(false);
		expect(await FileSystemUtils.isDirectory(join(dir, "missing"))).toBe(false);
	});
});

describe("FileSystemUtils.cleanDirectory", () => {
	test("empties an existing directory", async () => {
		await mkdir(join(dir, "out", "nested"), { recursive: true });
		await writeFile(join(dir, "out", "stale.kt"), "stale");
		await writeFile(join(dir, "out", "nested", "stale.kt"), "stale");

		await FileSystemUtils.cleanDirectory(join(dir, "out"));

		expect(await FileSystemUtils.isDirectory(join(dir, "out"))).toBe(true);
		expect(await FileSystemUtils.listFiles(join(dir, "out"), "**/*")).toEqual([]);
	});

	test("creates a missing directory", async () => {
		await FileSystemUtils.cleanDirectory(join(dir, "a", "b"));

		expect(await FileSystemUtils.isDirectory(join(dir, "a", "b"))).toBe(true);
	});
});

describe("FileSystemUtils.remove", () => {
	test("ignores missing paths", async () => {
		await expect(FileSystemUtils.remove(join(dir, "missing"))).resolves.toBeUndefined();
	});
});

describe("FileSystemUtils.copyFileTo / copyFileInto", () => {
	test("creates parent directories", async () => {
		await writeFile(join(dir, "lib.a"), "static");

		const copied = await FileSystemUtils.copyFileTo(join(dir, "lib.a"), join(dir, "x", "y", "renamed.a"));

		expect(copied).toBe(join(dir, "x", "y", "renamed.a"));
		expect(await readFile(copied, "utf-8")).toBe("static");
	});

	test("keeps the base name", async () => {
		await writeFile(join(dir, "lib.a"), "static");

		const copied = await FileSystemUtils.copyFileInto(join(dir, "lib.a"), join(dir, "dest"));

		expect(copied).toBe(join(dir, "dest", "lib.a"));
	});
});

describe("FileSystemUtils.copyDirectory", () => {
	test("copies a tree and returns sorted relative paths", async () => {
		await mkdir(join(dir, "src", "x86_64"), { recursive: true });
		await mkdir(join(dir, "src", "arm64-v8a"), { recursive: true });
		await writeFile(join(dir, "src", "x86_64", "lib.so"), "x86_64");
		await writeFile(join(dir, "src", "arm64-v8a", "lib.so"), "arm64");

		const copied = await FileSystemUtils.copyDirectory(join(dir, "src"), join(dir, "dest"));

		expect(copied).toEqual([join("arm64-v8a", "lib.so"), join("x86_64", "lib.so")]);
		expect(await readFile(join(dir, "dest", "x86_64", "lib.so"), "utf-8")).toBe("x86_64");
	});

	test("creates the destination for an empty source", async () => {
		await mkdir(join(dir, "empty"));

		expect(await FileSystemUtils.copyDirectory(join(dir, "empty"), join(dir, "dest"))).toEqual([]);
		expect(await FileSystemUtils.isDirectory(join(dir, "dest"))).toBe(true);
	});

	test("throws when the source is not a directory", async () => {
		await expect(FileSystemUtils.copyDirectory(join(dir, "missing"), join(dir, "dest"))).rejects.toThrow(
			"Copy source is not a directory",
		);
	});
});

describe("FileSystemUtils.listFiles", () => {
	test("filters by pattern", async () => {
		await writeFile(join(dir, "b.swift"), "");
		await writeFile(join(dir, "a.swift"), "");
		await writeFile(join(dir, "a.h"), "");

		expect(await FileSystemUtils.listFiles(dir, "**/*.swift")).toEqual(["a.swift", "b.swift"]);
	});

	test("returns nothing for a missing directory", async () => {
		expect(await FileSystemUtils.listFiles(join(dir, "missing"), "**/*")).toEqual([]);
	});
});

describe("FileSystemUtils.builderVersion", () => {
	test("returns the package version", () => {
		expect(FileSystemUtils.builderVersion()).toBe("0.1.0");
	});
});
