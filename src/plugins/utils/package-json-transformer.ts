/**
 * Package.json transformation for the web module.
 *
 * @remarks
 * wasm-pack writes a package.json whose `files` list names the `.wasm` side-file.
 * After the WASM embedding transform the binary ships inside
 * `<module>_bg.wasm.js` instead, so the manifest is rewritten to publish the
 * payload module, point `main` and `types` at the rewritten loader, and drop the
 * side-file. The result is sorted with sort-package-json.
 *
 * @packageDocumentation
 */

import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import sortPkg from "sort-package-json";
import type { PackageJson } from "../../types/package-json.js";

/**
 * Options for {@link transformWebManifest}.
 *
 * @public
 */
export interface WebManifestOptions {
	/**
	 * Base name of the loader (e.g. `"example_js"`).
	 */
	moduleName: string;

	/**
	 * Keep the `.wasm` side-file in `files`.
	 *
	 * @defaultValue `false`
	 */
	keepWasmFile?: boolean;
}

/**
 * Narrows a parsed JSON value to a package.json object.
 *
 * @internal
 */
export function isPackageJson(value: unknown): value is PackageJson {
	if (typeof value !== "object" || value === null || Array.isArray(value)) {
		return false;
	}
	if ("files" in value && value.files !== undefined) {
		return Array.isArray(value.files) && value.files.every((file) => typeof file === "string");
	}
	return true;
}

/**
 * Normalizes a `files` entry (`./foo.js` and `foo.js` are the same entry).
 */
function normalizeFileEntry(file: string): string {
	return file.startsWith("./") ? file.slice(2) : file;
}

/**
 * Rewrites a wasm-pack manifest for an embedded binary.
 *
 * @example
 * ```typescript
 * import { transformWebManifest } from 'native-bindings-builder';
 *
 * transformWebManifest(
 *   { name: '@example/example-js', files: ['example_js_bg.wasm', 'example_js.js', 'example_js.d.ts'] },
 *   { moduleName: 'example_js' },
 * );
 * // {
 * //   name: "@example/example-js",
 * //   main: "example_js.js",
 * //   types: "example_js.d.ts",
 * //   files: ["example_js.d.ts", "example_js.js", "example_js_bg.wasm.js"],
 * // }
 * ```
 *
 * @public
 */
export function transformWebManifest(packageJson: PackageJson, options: WebManifestOptions): PackageJson {
	const loader = `${options.moduleName}.js`;
	const types = `${options.moduleName}.d.ts`;
	const wasm = `${options.moduleName}_bg.wasm`;
	const payload = `${options.moduleName}_bg.wasm.js`;

	const files = new Set((packageJson.files ?? []).map(normalizeFileEntry));
	for (const file of [loader, types, payload]) {
		files.add(file);
	}
	if (!options.keepWasmFile) {
		files.delete(wasm);
	}

	const processedManifest: PackageJson = {
		...packageJson,
		main: packageJson.main ?? loader,
		types: packageJson.types ?? types,
		files: [...files].sort(),
	};

	return sortPkg(processedManifest);
}

/**
 * Reads and validates a package.json file.
 *
 * @throws Error when the file does not hold a package.json object
 *
 * @public
 */
export async function readPackageJson(path: string): Promise<PackageJson> {
	const parsed: unknown = JSON.parse(await readFile(path, "utf-8"));
	if (!isPackageJson(parsed)) {
		throw new Error(`${path} is not a valid package.json`);
	}
	return parsed;
}

/**
 * Rewrites the package.json in a wasm-pack output directory.
 *
 * @returns The written manifest
 *
 * @public
 */
export async function updateWebPackageJson(outDir: string, options: WebManifestOptions): Promise<PackageJson> {
	const path = join(outDir, "package.json");
	const manifest = transformWebManifest(await readPackageJson(path), options);
	await writeFile(path, `${JSON.stringify(manifest, null, 2)}\n`);
	return manifest;
}
