/**
 * E2E tests for the Python wheel and web module flows.
 *
 * Verifies that:
 * - The wheel bundles the host library next to the generated bindings
 * - The web module loads with its WebAssembly binary embedded
 * - A missing tool fails the chain before anything runs
 */

import { rm } from "node:fs/promises";
import { createRequire } from "node:module";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { NativeBindingsBuilder } from "../../src/builders/native-bindings-builder.js";
import {
	assertFileNotExists,
	assertInvoked,
	assertStageFailed,
	assertStageSucceeded,
} from "../utils/assertions.js";
import { MINIMAL_WASM, webAssemblyInstance } from "../utils/fake-toolchain.js";
import type { TestWorkspace } from "../utils/workspace.js";
import { createWorkspace, readWorkspaceFile } from "../utils/workspace.js";

function exportedFunction(exports: unknown, name: string): () => unknown {
	if (typeof exports !== "object" || exports === null) {
		throw new Error("module.exports is not an object");
	}
	const value: unknown = Reflect.get(exports, name);
	if (typeof value !== "function") {
		throw new Error(`${name} is not exported`);
	}
	return () => Reflect.apply(value, exports, []);
}

describe("python and web release E2E", () => {
	let workspace: TestWorkspace;

	beforeEach(async () => {
		workspace = await createWorkspace();
	});

	afterEach(async () => {
		await workspace.cleanup();
	});

	test("builds the wheel and the web module in one run", async () => {
		const results = await new NativeBindingsBuilder(workspace.options).run(["python", "web"]);

		expect(results.map((result) => result.stage)).toEqual(["python", "web"]);
		for (const result of results) {
			assertStageSucceeded(result);
		}
		expect(
			await readWorkspaceFile(workspace, "crate", "bindings-python", "dist", "example_ffi-0.1.0-py3-none-any.whl"),
		).toBe("example_ffi/__init__.py\nexample_ffi/example_ffi.py\nexample_ffi/libexample_ffi.so\n");
	});

	test("the web module instantiates its embedded binary without the side-file", async () => {
		await new NativeBindingsBuilder(workspace.options).run(["web"]);
		const pkg = join(workspace.crateDir, "pkg");
		await rm(join(pkg, "example_ffi_bg.wasm"));

		const loaded: unknown = createRequire(join(pkg, "package.json"))("./example_ffi.js");

		expect(exportedFunction(loaded, "greet")()).toBe("hello");
		const bytes = exportedFunction(loaded, "loadWasmBytes")();
		expect(bytes instanceof Uint8Array ? Array.from(bytes) : bytes).toEqual(Array.from(MINIMAL_WASM));
		expect(exportedFunction(loaded, "loadWasmModule")()).toBeInstanceOf(webAssemblyInstance());
	});

	test("keeps wasm-pack's side-file out of the published files", async () => {
		await new NativeBindingsBuilder(workspace.options).run(["web"]);

		const manifest: unknown = JSON.parse(await readWorkspaceFile(workspace, "crate", "pkg", "package.json"));

		expect(manifest).toMatchObject({ files: ["example_ffi.d.ts", "example_ffi.js", "example_ffi_bg.wasm.js"] });
	});

	test("fails before building when Python is missing", async () => {
		workspace.toolchain.failOn(
			(invocation) => invocation.command === "python" && invocation.args[0] === "--version",
			127,
		);

		const [result] = await new NativeBindingsBuilder(workspace.options).run(["python"]);

		assertStageFailed(result, "PreconditionUnsatisfiedError", 1);
		assertInvoked(workspace.toolchain, "python --version");
		expect(workspace.toolchain.commands()).not.toContain("cargo build --release");
		await assertFileNotExists(
			join(workspace.crateDir, "bindings-python", "dist", "example_ffi-0.1.0-py3-none-any.whl"),
		);
	});
});
