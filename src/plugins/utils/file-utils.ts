/**
 * File system utilities for the Native Bindings Builder.
 *
 * @remarks
 * This module provides the {@link FileSystemUtils} class used by every stage that
 * lays files out: existence checks, clearing destination directories before a
 * package is assembled, recursive copies and glob listings.
 *
 * @packageDocumentation
 */

import { existsSync, readFileSync } from "node:fs";
import { copyFile, mkdir, rm, stat } from "node:fs/promises";
import { basename, dirname, join, relative } from "node:path";
import { glob } from "glob";

/**
 * File system utilities for build operations.
 *
 * @example
 * Clear a layout and copy bindings into it:
 * ```typescript
 * import { FileSystemUtils } from 'native-bindings-builder';
 *
 * await FileSystemUtils.cleanDirectory('bindings-android/lib/src/main/kotlin');
 * await FileSystemUtils.copyDirectory('ffi/kotlin/uniffi', 'bindings-android/lib/src/main/kotlin/uniffi');
 * ```
 *
 * @public
 */
// biome-ignore lint/complexity/noStaticOnlyClass: Intentional static-only class for API organization
export class FileSystemUtils {
	/**
	 * Checks whether a path exists and is a directory.
	 */
	static async isDirectory(path: string): Promise<boolean> {
		const stats = await stat(path).catch(() => undefined);
		return stats?.isDirectory() ?? false;
	}

	/**
	 * Checks whether a path exists and is a regular file.
	 */
	static async isFile(path: string): Promise<boolean> {
		const stats = await stat(path).catch(() => undefined);
		return stats?.isFile() ?? false;
	}

	/**
	 * Removes a file or directory tree. Missing paths are ignored.
	 */
	static async remove(path: string): Promise<void> {
		await rm(path, { recursive: true, force: true });
	}

	/**
	 * Deletes a directory and recreates it empty.
	 *
	 * @remarks
	 * Used before every layout is populated so stale files from a previous run with
	 * different inputs cannot leak into a new package.
	 */
	static async cleanDirectory(dir: string): Promise<void> {
		await rm(dir, { recursive: true, force: true });
		await mkdir(dir, { recursive: true });
	}

	/**
	 * Copies a single file, creating the destination's parent directories.
	 *
	 * @param from - Source file
	 * @param to - Destination file path
	 * @returns The destination path
	 */
	static async copyFileTo(from: string, to: string): Promise<string> {
		await mkdir(dirname(to), { recursive: true });
		await copyFile(from, to);
		return to;
	}

	/**
	 * Copies a file into a directory, keeping its base name.
	 *
	 * @returns The destination path
	 */
	static async copyFileInto(from: string, dir: string): Promise<string> {
		return FileSystemUtils.copyFileTo(from, join(dir, basename(from)));
	}

	/**
	 * Recursively copies the files of a directory.
	 *
	 * @param from - Source directory
	 * @param to - Destination directory (created when missing)
	 * @returns Copied files, relative to `to`, sorted
	 * @throws Error if `from` is not a directory
	 */
	static async copyDirectory(from: string, to: string): Promise<string[]> {
		if (!(await FileSystemUtils.isDirectory(from))) {
			throw new Error(`Copy source is not a directory: ${from}`);
		}

		const files = await glob("**/*", { cwd: from, nodir: true, dot: true });
		const copied: string[] = [];

		for (const file of files) {
			const destFile = await FileSystemUtils.copyFileTo(join(from, file), join(to, file));
			copied.push(relative(to, destFile));
		}

		await mkdir(to, { recursive: true });
		return copied.sort();
	}

	/**
	 * Lists files under a directory matching a glob pattern.
	 *
	 * @param dir - Directory to search (missing directories yield no files)
	 * @param pattern - Glob pattern relative to `dir`
	 * @returns Matching files, relative to `dir`, sorted
	 */
	static async listFiles(dir: string, pattern: string): Promise<string[]> {
		if (!(await FileSystemUtils.isDirectory(dir))) {
			return [];
		}
		const files = await glob(pattern, { cwd: dir, nodir: true });
		return files.sort();
	}

	/**
	 * Reads this package's version from its package.json.
	 *
	 * @remarks
	 * Resolved relative to this module, which sits three directories below the package
	 * root both in `src/` and in `dist/`.
	 *
	 * @returns The version, or `"0.0.0"` when it cannot be read
	 */
	static builderVersion(): string {
		const packageJsonPath = new URL("../../../package.json", import.meta.url);
		if (!existsSync(packageJsonPath)) {
			return "0.0.0";
		}
		try {
			const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, "utf-8"));
			if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
				return parsed.version;
			}
		} catch {
			// Fall through to the default
		}
		return "0.0.0";
	}
}
