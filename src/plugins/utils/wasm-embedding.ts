/**
 * WASM embedding transform.
 *
 * @remarks
 * wasm-pack's `nodejs` loader reads the `.wasm` side-file through `fs` and `path`,
 * which bundlers, direct script tags and test runners resolve differently. This
 * module removes the file load altogether: the binary is written into a JavaScript
 * module as base64 text, and the loader is rewritten to decode and instantiate it
 * from memory.
 *
 * The loader rewrite is line-based:
 *
 * 1. every line importing `TextDecoder` / `TextEncoder` from `util` is deleted
 *    (both are globals in every supported host);
 * 2. everything from the first `const path = ` line to the end of the file is
 *    deleted (that tail only serves the file load);
 * 3. a fixed epilogue is appended.
 *
 * @packageDocumentation
 */

import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { FileSystemUtils } from "./file-utils.js";
import { BuildLogger } from "./logger.js";
import { PackagingToolFailureError, TransformPatternMismatchError } from "./pipeline-errors.js";

/**
 * Matches a loader line importing a text codec from `util`.
 *
 * @public
 */
export const TEXT_CODEC_IMPORT_PATTERN: RegExp = /Text..coder.*= require\(.util.\)/;

/**
 * Matches the first line of the loader's file-loading tail.
 *
 * @public
 */
export const PATH_CONSTRUCTION_PATTERN: RegExp = /^const path = /;

/**
 * Checks whether a loader line imports a text codec from `util`.
 *
 * @example
 * ```typescript
 * isTextCodecImport("const { TextDecoder, TextEncoder } = require(`util`);"); // true
 * ```
 *
 * @public
 */
export function isTextCodecImport(line: string): boolean {
	return TEXT_CODEC_IMPORT_PATTERN.test(line);
}

/**
 * Checks whether a loader line starts the file-loading tail.
 *
 * @public
 */
export function isPathConstruction(line: string): boolean {
	return PATH_CONSTRUCTION_PATTERN.test(line);
}

/**
 * Renders the payload module exporting a binary as base64 text.
 *
 * @example
 * ```typescript
 * encodeWasmPayload(new Uint8Array([0x00, 0x61, 0x73, 0x6d]));
 * // "module.exports = `AGFzbQ==`;\n"
 * ```
 *
 * @public
 */
export function encodeWasmPayload(bytes: Uint8Array): string {
	return `module.exports = \`${Buffer.from(bytes).toString("base64")}\`;\n`;
}

/**
 * Returns the epilogue appended to the rewritten loader.
 *
 * @remarks
 * The epilogue relies on the `imports` and `wasm` bindings the wasm-bindgen glue
 * declares at the top of the loader. Its base64 decoder uses neither `atob` nor
 * `Buffer`, skips characters outside the base64 alphabet (line breaks, padding) and
 * caches the decoded bytes.
 *
 * @param payloadModule - Specifier of the payload module, relative to the loader
 *
 * @public
 */
export function createLoaderEpilogue(payloadModule: string): string {
	return `
const __wasmPayload = require(${JSON.stringify(payloadModule)});

const __BASE64_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/";

function __decodeBase64(text) {
	const lookup = new Uint8Array(128);
	for (let i = 0; i < __BASE64_ALPHABET.length; i++) {
		lookup[__BASE64_ALPHABET.charCodeAt(i)] = i;
	}
	const digits = text.replace(/[^A-Za-z0-9+/]/g, "");
	const bytes = new Uint8Array(Math.floor((digits.length * 3) / 4));
	let offset = 0;
	for (let i = 0; i < digits.length; i += 4) {
		const a = lookup[digits.charCodeAt(i)];
		const b = lookup[digits.charCodeAt(i + 1)];
		const c = lookup[digits.charCodeAt(i + 2)] || 0;
		const d = lookup[digits.charCodeAt(i + 3)] || 0;
		bytes[offset++] = (a << 2) | (b >> 4);
		if (i + 2 < digits.length) bytes[offset++] = ((b & 15) << 4) | (c >> 2);
		if (i + 3 < digits.length) bytes[offset++] = ((c & 3) << 6) | d;
	}
	return bytes;
}

let __wasmBytes;

function loadWasmBytes() {
	if (__wasmBytes === undefined) {
		__wasmBytes = __decodeBase64(__wasmPayload);
	}
	return __wasmBytes;
}
module.exports.loadWasmBytes = loadWasmBytes;

let __wasmInstance;

function loadWasmModule() {
	if (__wasmInstance === undefined) {
		const compiled = new WebAssembly.Module(loadWasmBytes());
		__wasmInstance = new WebAssembly.Instance(compiled, imports);
		wasm = __wasmInstance.exports;
		module.exports.__wasm = wasm;
	}
	return __wasmInstance;
}
module.exports.loadWasmModule = loadWasmModule;
`;
}

/**
 * Declarations appended to the loader's `.d.ts`.
 *
 * @public
 */
export const LOADER_TYPES_EPILOGUE: string = `
/**
 * Decodes the embedded WebAssembly binary.
 */
export function loadWasmBytes(): Uint8Array;

/**
 * Instantiates the embedded WebAssembly module. Call once before using any other export.
 */
export function loadWasmModule(): WebAssembly.Instance;
`;

/**
 * Outcome of a loader rewrite.
 *
 * @public
 */
export interface LoaderTransformResult {
	/**
	 * Rewritten loader source.
	 */
	source: string;

	/**
	 * Number of text codec import lines deleted ahead of the truncation point.
	 */
	removedImports: number;

	/**
	 * 1-based line number of the first path construction line, if any.
	 */
	truncatedAtLine: number | undefined;

	/**
	 * Total number of deleted lines.
	 */
	removedLines: number;
}

/**
 * Rewrites a wasm-bindgen loader so it no longer loads the binary from disk.
 *
 * @param source - Loader source as generated by wasm-pack
 * @param epilogue - Text appended verbatim after the remaining lines
 *
 * @example
 * ```typescript
 * const { source } = transformLoaderSource(loader, createLoaderEpilogue('./example_js_bg.wasm.js'));
 * ```
 *
 * @public
 */
export function transformLoaderSource(source: string, epilogue: string): LoaderTransformResult {
	const lines = source.split("\n");
	if (lines.at(-1) === "") {
		lines.pop();
	}

	const cut = lines.findIndex(isPathConstruction);
	const head = cut === -1 ? lines : lines.slice(0, cut);
	const kept = head.filter((line) => !isTextCodecImport(line));

	return {
		source: kept.map((line) => `${line}\n`).join("") + epilogue,
		removedImports: head.length - kept.length,
		truncatedAtLine: cut === -1 ? undefined : cut + 1,
		removedLines: lines.length - kept.length,
	};
}

/**
 * Options for {@link embedWasmModule}.
 *
 * @public
 */
export interface EmbedWasmOptions {
	/**
	 * wasm-pack output directory.
	 */
	outDir: string;

	/**
	 * Base name of the loader (`<moduleName>.js`, `<moduleName>_bg.wasm`).
	 */
	moduleName: string;

	/**
	 * Throw instead of warning when a rewrite pattern matches nothing.
	 */
	strict?: boolean;
}

/**
 * Files written by {@link embedWasmModule}.
 *
 * @public
 */
export interface EmbeddedWasmModule {
	payloadPath: string;
	loaderPath: string;
	typesPath: string;
	wasmSize: number;
	transform: LoaderTransformResult;
}

/**
 * Embeds a wasm-pack build's binary into its loader.
 *
 * @remarks
 * Writes `<moduleName>_bg.wasm.js`, rewrites `<moduleName>.js` and extends
 * `<moduleName>.d.ts`. The original `.wasm` file is left in place.
 *
 * @throws {@link PackagingToolFailureError} when the wasm-pack outputs are missing
 * @throws {@link TransformPatternMismatchError} in strict mode, when a pattern matches nothing
 *
 * @public
 */
export async function embedWasmModule(options: EmbedWasmOptions): Promise<EmbeddedWasmModule> {
	const logger = BuildLogger.createLogger("wasm-embed");
	const wasmPath = join(options.outDir, `${options.moduleName}_bg.wasm`);
	const payloadPath = join(options.outDir, `${options.moduleName}_bg.wasm.js`);
	const loaderPath = join(options.outDir, `${options.moduleName}.js`);
	const typesPath = join(options.outDir, `${options.moduleName}.d.ts`);

	for (const path of [wasmPath, loaderPath, typesPath]) {
		if (!(await FileSystemUtils.isFile(path))) {
			throw new PackagingToolFailureError(`wasm-pack output is missing: ${path}`);
		}
	}

	const loader = await readFile(loaderPath, "utf-8");
	const transform = transformLoaderSource(loader, createLoaderEpilogue(`./${options.moduleName}_bg.wasm.js`));

	const mismatches: string[] = [];
	if (transform.removedImports === 0) {
		mismatches.push(`no line matches ${TEXT_CODEC_IMPORT_PATTERN}`);
	}
	if (transform.truncatedAtLine === undefined) {
		mismatches.push(`no line matches ${PATH_CONSTRUCTION_PATTERN}`);
	}
	for (const mismatch of mismatches) {
		const message = `${loaderPath}: ${mismatch}`;
		if (options.strict) {
			throw new TransformPatternMismatchError(message);
		}
		logger.warn(message);
	}

	const wasm = await readFile(wasmPath);
	await writeFile(payloadPath, encodeWasmPayload(wasm));
	await writeFile(loaderPath, transform.source);
	const types = await readFile(typesPath, "utf-8");
	await writeFile(typesPath, types + LOADER_TYPES_EPILOGUE);

	logger.info(
		`Embedded ${BuildLogger.formatSize(wasm.byteLength)} of WebAssembly, removed ${transform.removedLines} loader line(s)`,
	);

	return { payloadPath, loaderPath, typesPath, wasmSize: wasm.byteLength, transform };
}
