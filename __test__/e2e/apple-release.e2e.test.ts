/**
 * E2E tests for the Apple release flow.
 *
 * Verifies that:
 * - Universal libraries are merged once per run and shared by later chains
 * - Both Swift modules and the xcframework are laid out
 * - A merge failure stops the run with lipo's exit code
 */

import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { NativeBindingsBuilder } from "../../src/builders/native-bindings-builder.js";
import { assertFileExists, assertStageFailed, assertStageSucceeded } from "../utils/assertions.js";
import type { TestWorkspace } from "../utils/workspace.js";
import { createWorkspace, readWorkspaceFile } from "../utils/workspace.js";

describe("apple release E2E", () => {
	let workspace: TestWorkspace;

	beforeEach(async () => {
		workspace = await createWorkspace({ platform: "darwin" });
	});

	afterEach(async () => {
		await workspace.cleanup();
	});

	test("builds both Swift modules and the xcframework in one run", async () => {
		const results = await new NativeBindingsBuilder(workspace.options).run([
			"swift-ios",
			"swift-darwin",
			"bindings-swift",
		]);

		expect(results.map((result) => result.executed)).toEqual([
			["ios-universal", "swift-ios"],
			["darwin-universal", "swift-darwin"],
			["bindings-swift"],
		]);
		for (const result of results) {
			assertStageSucceeded(result);
		}
		await assertFileExists(join(workspace.crateDir, "ffi", "swift-ios", "example_ffi.swiftmodule"));
		await assertFileExists(join(workspace.crateDir, "ffi", "swift-darwin", "example_ffi.swiftmodule"));
		await assertFileExists(join(workspace.crateDir, "bindings-swift", "Sources", "Bindings", "example_ffi.swift"));
	});

	test("merges each universal library once", async () => {
		await new NativeBindingsBuilder(workspace.options).run(["swift-ios", "swift-darwin", "bindings-swift"]);

		const merged = workspace.toolchain
			.commands()
			.filter((command) => command.startsWith("lipo -create"))
			.map((command) => command.split(" ")[2]);
		expect(merged).toEqual([
			join(workspace.targetDir, "ios-universal", "release", "libexample_ffi.a"),
			join(workspace.targetDir, "ios-universal-sim", "release", "libexample_ffi.a"),
			join(workspace.targetDir, "darwin-universal", "release", "libexample_ffi.dylib"),
			join(workspace.targetDir, "darwin-universal", "release", "libexample_ffi.a"),
		]);
	});

	test("fills the simulator slice from the simulator libraries", async () => {
		await new NativeBindingsBuilder(workspace.options).run(["bindings-swift"]);

		expect(
			await readWorkspaceFile(
				workspace,
				"crate",
				"bindings-swift",
				"example_ffiFFI.xcframework",
				"ios-arm64_x86_64-simulator",
				"example_ffiFFI.a",
			),
		).toBe("arch:aarch64\narch:x86_64\n");
	});

	test("stops when lipo fails", async () => {
		workspace.toolchain.failOn(
			(invocation) => invocation.command === "lipo" && invocation.args[0] === "-create",
			2,
		);

		const results = await new NativeBindingsBuilder(workspace.options).run(["swift-ios", "swift-darwin"]);

		expect(results).toHaveLength(1);
		assertStageFailed(results[0], "CompilationFailureError", 2);
		expect(workspace.toolchain.commands().filter((command) => command.startsWith("swiftc -emit-module"))).toEqual([]);
	});
});
