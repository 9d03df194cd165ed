/**
 * Logging utilities for the Native Bindings Builder.
 *
 * @remarks
 * RSlib-style logging with colored, fixed-width level prefixes followed by a
 * bracketed tag naming the tool or stage that produced the line. All logging is
 * suppressed in test environments to keep test output clean.
 *
 */

import { stat } from "node:fs/promises";
import { relative } from "node:path";
import colors from "picocolors";

const cyan: typeof colors.cyan = colors.cyan;
const dim: typeof colors.dim = colors.dim;
const bold: typeof colors.bold = colors.bold;
const red: typeof colors.red = colors.red;
const yellow: typeof colors.yellow = colors.yellow;
const green: typeof colors.green = colors.green;
const magenta: typeof colors.magenta = colors.magenta;

/**
 * Timer interface for measuring execution time.
 *
 * @internal
 */
export interface Timer {
	/**
	 * Returns elapsed time in milliseconds since timer creation.
	 */
	elapsed: () => number;

	/**
	 * Returns formatted elapsed time string.
	 */
	format: () => string;
}

/**
 * Logger interface for pipeline components.
 *
 * @internal
 */
export interface Logger {
	info: (message: string) => void;
	warn: (message: string) => void;
	error: (message: string) => void;
	/**
	 * Logs a success message with optional filename highlight.
	 */
	success: (message: string, filename?: string) => void;
	ready: (message: string) => void;
}

/**
 * Stage logger with helpers for files and target mappings.
 *
 * @internal
 */
export interface StageLogger extends Logger {
	/**
	 * Logs a file operation with a list of affected files.
	 */
	fileOp: (message: string, files: readonly string[]) => void;

	/**
	 * Logs a name-to-value mapping (e.g. triple to ABI).
	 */
	entries: (message: string, entries: Record<string, string>) => void;
}

/**
 * File entry for the file table display.
 *
 * @internal
 */
export interface FileEntry {
	path: string;
	size: number;
}

type Level = "info" | "warn" | "error" | "ready";

const LEVEL_COLORS: Record<Level, (s: string) => string> = {
	info: cyan,
	warn: yellow,
	error: red,
	ready: green,
};

/**
 * Centralized logging and formatting utilities for the pipeline.
 *
 * @example
 * ```typescript
 * import { BuildLogger } from 'native-bindings-builder';
 *
 * const logger = BuildLogger.createLogger('lipo');
 * logger.info('Merging 2 architecture(s)');
 * // Output: info    [lipo] Merging 2 architecture(s)
 *
 * const stageLogger = BuildLogger.createStageLogger('ios-universal');
 * stageLogger.ready('built in 1.50 s');
 * // Output: ready   [ios-universal] built in 1.50 s
 * ```
 *
 * @internal
 */
// biome-ignore lint/complexity/noStaticOnlyClass: Intentional static-only class for API organization
export class BuildLogger {
	/**
	 * Prefix width to match RSlib-style output.
	 */
	private static readonly PREFIX_WIDTH = 8;

	/**
	 * Determines if the current process is running under a test runner.
	 *
	 * @remarks
	 * Checks `NODE_ENV=test`, `VITEST=true`, `JEST_WORKER_ID`, runner names in
	 * `process.argv`, and test file names passed as arguments.
	 */
	static isTestEnvironment(): boolean {
		if (process.env.NODE_ENV === "test" || process.env.VITEST === "true" || process.env.JEST_WORKER_ID !== undefined) {
			return true;
		}

		return process.argv.some(
			(arg) =>
				arg.includes("vitest") ||
				arg.includes("jest") ||
				arg.endsWith(".test.ts") ||
				arg.endsWith(".test.js") ||
				arg.endsWith(".spec.ts") ||
				arg.endsWith(".spec.js"),
		);
	}

	/**
	 * Formats elapsed time in milliseconds to a human-readable string.
	 *
	 * @example
	 * ```typescript
	 * BuildLogger.formatTime(150);   // "150ms"
	 * BuildLogger.formatTime(2500);  // "2.50 s"
	 * ```
	 */
	static formatTime(ms: number): string {
		if (ms < 1000) {
			return `${ms}ms`;
		}
		return `${(ms / 1000).toFixed(2)} s`;
	}

	/**
	 * Formats a file size in bytes to a human-readable string.
	 *
	 * @remarks
	 * Native libraries routinely exceed a megabyte, so sizes of 1 MiB and above are
	 * shown in `MB`.
	 *
	 * @example
	 * ```typescript
	 * BuildLogger.formatSize(512);      // "512 B"
	 * BuildLogger.formatSize(1536);     // "1.50 kB"
	 * BuildLogger.formatSize(3145728);  // "3.00 MB"
	 * ```
	 */
	static formatSize(bytes: number): string {
		if (bytes < 1024) {
			return `${bytes} B`;
		}
		if (bytes < 1024 * 1024) {
			return `${(bytes / 1024).toFixed(2)} kB`;
		}
		return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
	}

	static createTimer(): Timer {
		const start = Date.now();
		return {
			elapsed: () => Date.now() - start,
			format: () => BuildLogger.formatTime(Date.now() - start),
		};
	}

	private static createPrefix(level: Level): string {
		return LEVEL_COLORS[level](level.padEnd(BuildLogger.PREFIX_WIDTH));
	}

	/**
	 * Builds a {@link Logger} that writes `<level><tag> <message>` lines.
	 */
	private static createTaggedLogger(tag: string, readyStyle: (s: string) => string): Logger {
		const isTest = BuildLogger.isTestEnvironment();
		const emit = (level: Level, message: string): void => {
			if (!isTest) {
				console.log(`${BuildLogger.createPrefix(level)}${tag}${message}`);
			}
		};

		return {
			info: (message) => emit("info", message),
			warn: (message) => emit("warn", message),
			error: (message) => emit("error", message),
			success: (message, filename) => emit("info", `${green(message)}${filename ? ` ${cyan(filename)}` : ""}`),
			ready: (message) => emit("ready", readyStyle(message)),
		};
	}

	/**
	 * Creates a logger with a dimmed bracketed prefix.
	 *
	 * @param prefix - The tool or component name (e.g. `"cargo"`)
	 *
	 * @example
	 * ```typescript
	 * const logger = BuildLogger.createLogger('uniffi-bindgen');
	 * logger.info('Generating kotlin bindings...');
	 * // Output: info    [uniffi-bindgen] Generating kotlin bindings...
	 * ```
	 */
	static createLogger(prefix: string): Logger {
		return BuildLogger.createTaggedLogger(`${dim(`[${prefix}]`)} `, (s) => s);
	}

	/**
	 * Creates a stage logger tagged with the stage name in cyan.
	 *
	 * @param stage - The stage name (e.g. `"bindings-android"`)
	 */
	static createStageLogger(stage: string): StageLogger {
		const isTest = BuildLogger.isTestEnvironment();
		const tag = `${cyan(`[${stage}]`)} `;
		const base = BuildLogger.createTaggedLogger(tag, bold);

		return {
			...base,
			fileOp: (message, files) => {
				if (!isTest) {
					const coloredFiles = files.map((f) => cyan(f)).join(", ");
					console.log(`${BuildLogger.createPrefix("info")}${tag}${message}: ${coloredFiles}`);
				}
			},
			entries: (message, entries) => {
				if (!isTest) {
					const coloredEntries = Object.entries(entries)
						.map(([name, value]) => `${cyan(name)} => ${value}`)
						.join(", ");
					console.log(`${BuildLogger.createPrefix("info")}${tag}${message}: ${coloredEntries}`);
				}
			},
		};
	}

	/**
	 * Collects file sizes for the file table.
	 *
	 * @remarks
	 * Paths that do not exist are skipped. Displayed paths are relative to `cwd`.
	 *
	 * @param files - Absolute file paths
	 * @param cwd - Directory displayed paths are relative to
	 */
	static async collectFileInfo(files: readonly string[], cwd: string = process.cwd()): Promise<FileEntry[]> {
		const entries: FileEntry[] = [];

		for (const file of files) {
			try {
				const stats = await stat(file);
				if (stats.isFile()) {
					entries.push({ path: relative(cwd, file), size: stats.size });
				}
			} catch {
				// Missing outputs are reported by the stage itself
			}
		}

		return entries;
	}

	static printBanner(version: string): void {
		if (BuildLogger.isTestEnvironment()) return;
		console.log();
		console.log(`${magenta("Native Bindings Builder")} ${dim(`v${version}`)}`);
		console.log();
	}

	/**
	 * Prints a table of files and sizes, largest last.
	 *
	 * @param files - File entries
	 */
	static printFileTable(files: FileEntry[]): void {
		if (BuildLogger.isTestEnvironment()) return;
		if (files.length === 0) return;

		const sorted = [...files].sort((a, b) => a.size - b.size);
		const pathWidth = Math.max(...sorted.map((f) => f.path.length), 30);

		console.log();
		console.log(`${dim("File").padEnd(pathWidth + 4)}${dim("Size")}`);

		let totalSize = 0;
		for (const file of sorted) {
			console.log(`${dim(file.path.padEnd(pathWidth))}    ${green(BuildLogger.formatSize(file.size))}`);
			totalSize += file.size;
		}

		console.log();
		console.log(`${dim("Total:".padEnd(pathWidth))}    ${bold(green(BuildLogger.formatSize(totalSize)))}`);
	}

	/**
	 * Prints the closing summary line.
	 *
	 * @example
	 * ```typescript
	 * BuildLogger.printSummary(['python', 'web'], 1500);
	 * // Output: ready   Built 2 stage(s) in 1.50 s
	 * ```
	 */
	static printSummary(stages: readonly string[], totalTime: number): void {
		if (BuildLogger.isTestEnvironment()) return;
		console.log();
		console.log(
			`${BuildLogger.createPrefix("ready")}${bold(`Built ${stages.length} stage(s) in ${BuildLogger.formatTime(totalTime)}`)}`,
		);
	}
}
