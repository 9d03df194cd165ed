/**
 * Unit tests for platform package assembly.
 */

import { readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { listTree } from "../../__test__/utils/fake-toolchain.js";
import type { TestWorkspace } from "../../__test__/utils/workspace.js";
import { createWorkspace } from "../../__test__/utils/workspace.js";
import { CrossCompiler } from "../plugins/utils/cross-compiler.js";
import { FileSystemUtils } from "../plugins/utils/file-utils.js";
import { PackagingToolFailureError } from "../plugins/utils/pipeline-errors.js";
import { TargetMatrix } from "../plugins/utils/target-matrix.js";
import type { BuildContext, PlatformPackage, StageName } from "../types/builder-types.js";
import { createBuildContext, createStageRun, executeStage } from "./build-lifecycle.js";
import {
	androidProjectDir,
	assembleAndroidPackage,
	assemblePythonWheel,
	assembleSwiftModule,
	assembleXcframework,
	buildWebModule,
	publishAndroidPackage,
} from "./platform-packages.js";

let workspace: TestWorkspace;

/** Reads the single file a package produced. */
async function readOutput(pkg: PlatformPackage): Promise<Buffer> {
	const [output] = pkg.outputs;
	expect(pkg.outputs).toHaveLength(1);
	if (output === undefined) {
		throw new Error(`${pkg.platform} package has no outputs`);
	}
	return readFile(output);
}

async function runStages(context: BuildContext, ...stages: StageName[]): Promise<void> {
	const run = createStageRun(context);
	for (const stage of stages) {
		await executeStage(stage, context, run);
	}
}

beforeEach(async () => {
	workspace = await createWorkspace();
});

afterEach(async () => {
	await workspace.cleanup();
});

describe("assembleAndroidPackage", () => {
	const JNI_LISTING = [
		"jniLibs/arm64-v8a/libexample_ffi.so",
		"jniLibs/armeabi-v7a/libexample_ffi.so",
		"jniLibs/x86/libexample_ffi.so",
		"jniLibs/x86_64/libexample_ffi.so",
		"kotlin/uniffi/example_ffi/example_ffi.kt",
	];

	test("lays out every ABI and the Kotlin sources before running Gradle", async () => {
		await runStages(workspace.context, "kotlin");

		const pkg = await assembleAndroidPackage(workspace.context);

		const aar = join(workspace.crateDir, "ffi", "android", "lib-release.aar");
		expect(pkg).toEqual({ platform: "android", layoutDir: androidProjectDir(workspace.context), outputs: [aar] });
		expect(await readFile(aar, "utf-8")).toBe(`${JNI_LISTING.join("\n")}\n`);
		expect(workspace.toolchain.invocations.at(-1)).toEqual({
			command: "./gradlew",
			args: ["assemble"],
			cwd: join(workspace.crateDir, "bindings-android"),
		});
	});

	test("produces an identical archive when run twice and drops stale files", async () => {
		await runStages(workspace.context, "kotlin");
		const first = await readFile(await assembleAndroidPackage(workspace.context));

		const kotlinDest = join(workspace.crateDir, "bindings-android", "lib", "src", "main", "kotlin");
		await writeFile(join(kotlinDest, "Stale.kt"), "stale");
		const second = await readFile(await assembleAndroidPackage(workspace.context));

		expect(second.equals(first)).toBe(true);
	});

	test("refuses to package when an ABI is missing", async () => {
		await runStages(workspace.context, "kotlin");
		const missing = join(workspace.crateDir, "ffi", "kotlin", "jniLibs", "x86", "libexample_ffi.so");
		await rm(missing);

		await expect(assembleAndroidPackage(workspace.context)).rejects.toThrow(
			new PackagingToolFailureError(`Missing i686-linux-android library: ${missing}`),
		);
		expect(workspace.toolchain.commands()).not.toContain("./gradlew assemble");
	});

	test("propagates Gradle's exit code", async () => {
		await runStages(workspace.context, "kotlin");
		workspace.toolchain.failOn((invocation) => invocation.command === "./gradlew", 4);

		const failure = await assembleAndroidPackage(workspace.context).catch((error: unknown) => error);

		expect(failure).toBeInstanceOf(PackagingToolFailureError);
		if (!(failure instanceof PackagingToolFailureError)) return;
		expect(failure.exitCode).toBe(4);
		expect(failure.message).toBe("gradlew assemble failed: ./gradlew assemble exited with code 4");
	});

	test("publishes with the configured tasks and the Windows wrapper on Windows", async () => {
		const context = createBuildContext({
			...workspace.options,
			platform: "win32",
			android: { publishTasks: ["publishToMavenLocal"] },
		});

		await publishAndroidPackage(context);

		expect(workspace.toolchain.commands()).toEqual(["gradlew.bat publishToMavenLocal"]);
	});
});

describe("assembleSwiftModule", () => {
	test("compiles the iOS module against the static universal library", async () => {
		await runStages(workspace.context, "ios-universal");
		const outDir = join(workspace.crateDir, "ffi", "swift-ios");

		const pkg = await assembleSwiftModule(workspace.context, "ios");

		expect(pkg.outputs).toEqual([join(outDir, "example_ffi.swiftmodule")]);
		expect(await listTree(outDir)).toEqual([
			"example_ffi.swift",
			"example_ffi.swiftmodule",
			"example_ffiFFI.h",
			"example_ffiFFI.modulemap",
			"libexample_ffi.a",
		]);
		expect(await readFile(join(outDir, "libexample_ffi.a"), "utf-8")).toBe("arch:aarch64\narch:x86_64\n");
		expect(workspace.toolchain.invocations.at(-1)).toEqual({
			command: "swiftc",
			args: [
				"-emit-module",
				"-module-name",
				"example_ffi",
				"-Xcc",
				`-fmodule-map-file=${join(outDir, "example_ffiFFI.modulemap")}`,
				"-I",
				".",
				"-L",
				".",
				"-lexample_ffi",
				"example_ffi.swift",
			],
			cwd: outDir,
		});
	});

	test("generates formatted bindings from the device library", async () => {
		await runStages(workspace.context, "ios-universal");

		await assembleSwiftModule(workspace.context, "ios");

		const device = join(workspace.targetDir, "aarch64-apple-ios", "release", "libexample_ffi.a");
		const outDir = join(workspace.crateDir, "ffi", "swift-ios");
		expect(workspace.toolchain.commands()).toContain(
			`cargo run -p uniffi-bindgen generate --library ${device} --language swift --out-dir ${outDir}`,
		);
	});

	test("compiles the macOS module against the dynamic universal library", async () => {
		await runStages(workspace.context, "darwin-universal");
		const outDir = join(workspace.crateDir, "ffi", "swift-darwin");

		await assembleSwiftModule(workspace.context, "darwin");

		expect(await FileSystemUtils.isFile(join(outDir, "libexample_ffi.dylib"))).toBe(true);
		expect(await FileSystemUtils.isFile(join(outDir, "libexample_ffi.a"))).toBe(false);
	});

	test("requires the universal library", async () => {
		await new CrossCompiler(workspace.context).compile(TargetMatrix.find("aarch64-apple-darwin"), ["static"]);

		await expect(assembleSwiftModule(workspace.context, "darwin")).rejects.toThrow("Missing darwin-universal library");
	});
});

describe("assembleXcframework", () => {
	const framework = (): string => join(workspace.crateDir, "bindings-swift", "example_ffiFFI.xcframework");

	test("populates every slice and leaves only the renamed binding in the sources", async () => {
		const context = createBuildContext({ ...workspace.options, swift: { renameBindingTo: "ExampleFFI.swift" } });
		await runStages(context, "ios-universal", "darwin-universal");

		const pkg = await assembleXcframework(context);

		const sources = join(workspace.crateDir, "bindings-swift", "Sources", "Bindings");
		expect(await listTree(sources)).toEqual(["ExampleFFI.swift"]);
		expect(await listTree(framework())).toEqual([
			"Info.plist",
			"ios-arm64/Headers/example_ffiFFI.h",
			"ios-arm64/example_ffiFFI.a",
			"ios-arm64_x86_64-simulator/Headers/example_ffiFFI.h",
			"ios-arm64_x86_64-simulator/example_ffiFFI.a",
			"macos-arm64_x86_64/Headers/example_ffiFFI.h",
			"macos-arm64_x86_64/example_ffiFFI.a",
		]);
		expect(pkg.outputs[0]).toBe(join(sources, "ExampleFFI.swift"));
		expect(pkg.outputs).toHaveLength(7);
	});

	test("copies the matching library into each slice", async () => {
		await runStages(workspace.context, "ios-universal", "darwin-universal");

		await assembleXcframework(workspace.context);

		const slice = (name: string): Promise<string> => readFile(join(framework(), name, "example_ffiFFI.a"), "utf-8");
		expect(await slice("ios-arm64")).toBe("arch:aarch64\nformat:static\n");
		expect(await slice("ios-arm64_x86_64-simulator")).toBe("arch:aarch64\narch:x86_64\n");
		expect(await slice("macos-arm64_x86_64")).toBe("arch:aarch64\narch:x86_64\n");
		expect(await readFile(join(framework(), "Info.plist"), "utf-8")).toBe("<plist/>\n");
	});

	test("fails when the macOS universal library was never built", async () => {
		await runStages(workspace.context, "ios-universal");
		const missing = join(workspace.targetDir, "darwin-universal", "release", "libexample_ffi.a");

		await expect(assembleXcframework(workspace.context)).rejects.toThrow(
			`Missing macos-arm64_x86_64 library: ${missing}`,
		);
	});
});

describe("assemblePythonWheel", () => {
	const project = (): string => join(workspace.crateDir, "bindings-python");
	const packageDir = (): string => join(project(), "src", "example_ffi");

	test("builds and reinstalls a wheel with the host library", async () => {
		const pkg = await assemblePythonWheel(workspace.context);

		const wheel = join(project(), "dist", "example_ffi-0.1.0-py3-none-any.whl");
		const library = join(workspace.targetDir, "release", "libexample_ffi.so");
		expect(pkg).toEqual({ platform: "python", layoutDir: project(), outputs: [wheel] });
		expect(workspace.toolchain.commands()).toEqual([
			`pip install -r ${join(project(), "requirements.txt")}`,
			"cargo build --release",
			`cargo run -p uniffi-bindgen generate --library ${library} --language python --no-format --out-dir ${packageDir()}`,
			"python setup.py --verbose bdist_wheel",
			`pip install ${wheel} --force-reinstall`,
		]);
		expect(await readFile(wheel, "utf-8")).toBe(
			"example_ffi/__init__.py\nexample_ffi/example_ffi.py\nexample_ffi/libexample_ffi.so\n",
		);
	});

	test("replaces stale native libraries and produces an identical wheel twice", async () => {
		await writeFile(join(packageDir(), "libstale.so"), "stale");

		const first = await readOutput(await assemblePythonWheel(workspace.context));
		const second = await readOutput(await assemblePythonWheel(workspace.context));

		expect(first.toString()).not.toContain("libstale.so");
		expect(second.equals(first)).toBe(true);
	});

	test("introspects the static library on macOS", async () => {
		await workspace.cleanup();
		workspace = await createWorkspace({ platform: "darwin" });

		await assemblePythonWheel(workspace.context);

		const staticLibrary = join(workspace.targetDir, "release", "libexample_ffi.a");
		expect(workspace.toolchain.commands()).toContain(
			`cargo run -p uniffi-bindgen generate --library ${staticLibrary} --language python --no-format --out-dir ${packageDir()}`,
		);
		expect(await FileSystemUtils.isFile(join(packageDir(), "libexample_ffi.dylib"))).toBe(true);
	});

	test("skips the reinstall when disabled", async () => {
		const context = createBuildContext({ ...workspace.options, python: { installWheel: false } });

		await assemblePythonWheel(context);

		expect(workspace.toolchain.commands().filter((command) => command.includes("--force-reinstall"))).toEqual([]);
	});

	test("fails when setup.py produces no wheel", async () => {
		const context = createBuildContext({ ...workspace.options, python: { python: "python3" } });

		await expect(assemblePythonWheel(context)).rejects.toThrow(
			`setup.py bdist_wheel produced no wheel in ${join(project(), "dist")}`,
		);
	});
});

describe("buildWebModule", () => {
	test("runs wasm-pack for nodejs with weak refs and embeds the binary", async () => {
		const context = createBuildContext({ ...workspace.options, web: { scope: "example", extraArgs: ["--dev"] } });

		const pkg = await buildWebModule(context);

		const outDir = join(workspace.crateDir, "pkg");
		expect(workspace.toolchain.invocations).toEqual([
			{
				command: "wasm-pack",
				args: ["build", "--target", "nodejs", "--scope", "example", "--out-dir", "pkg", "--dev"],
				cwd: workspace.crateDir,
				env: { WASM_BINDGEN_WEAKREF: "1" },
			},
		]);
		expect(pkg.outputs).toEqual([
			join(outDir, "example_ffi.js"),
			join(outDir, "example_ffi.d.ts"),
			join(outDir, "example_ffi_bg.wasm.js"),
			join(outDir, "package.json"),
		]);
		expect(await readFile(join(outDir, "example_ffi_bg.wasm.js"), "utf-8")).toBe(
			"module.exports = `AGFzbQEAAAA=`;\n",
		);
	});

	test("publishes the payload module instead of the side-file", async () => {
		await buildWebModule(workspace.context);

		const manifest: unknown = JSON.parse(await readFile(join(workspace.crateDir, "pkg", "package.json"), "utf-8"));
		expect(manifest).toEqual({
			name: "example_ffi",
			version: "0.1.0",
			main: "example_ffi.js",
			types: "example_ffi.d.ts",
			files: ["example_ffi.d.ts", "example_ffi.js", "example_ffi_bg.wasm.js"],
		});
	});

	test("clears earlier output", async () => {
		await buildWebModule(workspace.context);
		await writeFile(join(workspace.crateDir, "pkg", "stale.js"), "");

		await buildWebModule(workspace.context);

		expect(await FileSystemUtils.isFile(join(workspace.crateDir, "pkg", "stale.js"))).toBe(false);
	});

	test("propagates wasm-pack's exit code", async () => {
		workspace.toolchain.failOn((invocation) => invocation.command === "wasm-pack", 2);

		const failure = await buildWebModule(workspace.context).catch((error: unknown) => error);

		expect(failure).toBeInstanceOf(PackagingToolFailureError);
		if (!(failure instanceof PackagingToolFailureError)) return;
		expect(failure.exitCode).toBe(2);
	});
});
