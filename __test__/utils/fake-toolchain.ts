/**
 * In-process stand-in for the external toolchain.
 *
 * Records every invocation and writes the files the real tool would write, so
 * stages can run end to end against a temporary directory.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { LIPO_ARCH_NAMES } from "../../src/plugins/utils/artifact-combiner.js";
import { libraryFileName } from "../../src/plugins/utils/cross-compiler.js";
import { FileSystemUtils } from "../../src/plugins/utils/file-utils.js";
import { ToolFailureError } from "../../src/plugins/utils/pipeline-errors.js";
import { TargetMatrix } from "../../src/plugins/utils/target-matrix.js";
import type { ToolInvocation, ToolResult, ToolRunner } from "../../src/plugins/utils/tool-runner.js";
import { formatInvocation } from "../../src/plugins/utils/tool-runner.js";
import type { ArtifactFormat, Target } from "../../src/types/builder-types.js";

/** Smallest valid WebAssembly module: magic number and version. */
export const MINIMAL_WASM: Uint8Array = new Uint8Array([0x00, 0x61, 0x73, 0x6d, 0x01, 0x00, 0x00, 0x00]);

/** The host's `WebAssembly` namespace, read from the global object. */
export const WEB_ASSEMBLY: unknown = Reflect.get(globalThis, "WebAssembly");

/** The host's `WebAssembly.Instance` constructor. */
export function webAssemblyInstance(): Function {
	const constructor: unknown =
		typeof WEB_ASSEMBLY === "object" && WEB_ASSEMBLY !== null ? Reflect.get(WEB_ASSEMBLY, "Instance") : undefined;
	if (typeof constructor !== "function") {
		throw new Error("WebAssembly.Instance is not available");
	}
	return constructor;
}

/** Loader written by the fake wasm-pack, shaped like wasm-bindgen's nodejs output. */
export function fakeWasmLoader(moduleName: string): string {
	return [
		"let imports = {};",
		"imports['__wbindgen_placeholder__'] = module.exports;",
		"let wasm;",
		"const { TextDecoder, TextEncoder } = require(`util`);",
		"",
		"module.exports.greet = function() { return 'hello'; };",
		"",
		`const path = require('path').join(__dirname, '${moduleName}_bg.wasm');`,
		"const bytes = require('fs').readFileSync(path);",
		"",
		"const wasmModule = new WebAssembly.Module(bytes);",
		"const wasmInstance = new WebAssembly.Instance(wasmModule, imports);",
		"wasm = wasmInstance.exports;",
		"module.exports.__wasm = wasm;",
		"",
	].join("\n");
}

/** Options for {@link FakeToolchain}. */
export interface FakeToolchainOptions {
	/** Cargo target directory. */
	targetDir: string;
	/** Library name as written by cargo. */
	libraryName: string;
	/** Build mode directory name. */
	mode?: string;
	/** Host platform used for host library names. */
	platform?: NodeJS.Platform;
}

type FailurePredicate = (invocation: ToolInvocation) => boolean;

/**
 * Fake {@link ToolRunner} that simulates cargo, lipo, the binding generator and the packagers.
 */
export class FakeToolchain implements ToolRunner {
	readonly invocations: ToolInvocation[] = [];
	private readonly options: Required<FakeToolchainOptions>;
	private readonly failures: { predicate: FailurePredicate; exitCode: number }[] = [];
	private readonly omitted = new Set<string>();

	constructor(options: FakeToolchainOptions) {
		this.options = { mode: "release", platform: "linux", ...options };
	}

	/** Makes matching invocations exit with the given code. */
	failOn(predicate: FailurePredicate, exitCode: number): this {
		this.failures.push({ predicate, exitCode });
		return this;
	}

	/** Makes cargo exit 0 without writing artifacts for a triple. */
	omitArtifact(triple: string): this {
		this.omitted.add(triple);
		return this;
	}

	/** Invocations formatted as command lines. */
	commands(): string[] {
		return this.invocations.map((invocation) => formatInvocation(invocation));
	}

	async run(invocation: ToolInvocation): Promise<ToolResult> {
		this.invocations.push(invocation);

		const failure = this.failures.find((f) => f.predicate(invocation));
		if (failure) {
			throw new ToolFailureError(formatInvocation(invocation), failure.exitCode, "simulated failure");
		}

		const { command, args } = invocation;
		if (args.includes("--version") || command === "xcrun") {
			return { stdout: `${command} 1.0.0\n`, stderr: "" };
		}
		if (command === "cargo") {
			return this.cargo(invocation);
		}
		if (command === "lipo") {
			return this.lipo(args);
		}
		if (command.endsWith("gradlew") || command === "gradlew.bat") {
			return this.gradle(invocation);
		}
		if (command === "swiftc") {
			const moduleName = argAfter(args, "-module-name");
			await writeFile(join(invocation.cwd, `${moduleName}.swiftmodule`), `swiftmodule ${moduleName}\n`);
			return ok();
		}
		if (command === "python") {
			return this.setupPy(invocation);
		}
		if (command === "wasm-pack") {
			return this.wasmPack(invocation);
		}
		return ok();
	}

	private async cargo(invocation: ToolInvocation): Promise<ToolResult> {
		const [subcommand] = invocation.args;
		if (subcommand === "ndk") {
			const target = TargetMatrix.find(argAfter(invocation.args, "-t"));
			const jniLibs = argAfter(invocation.args, "-o");
			if (this.omitted.has(target.triple)) return ok();
			const library = await this.writeArtifact(target, "dynamic");
			const abiDir = join(jniLibs, target.androidAbi ?? target.triple);
			await mkdir(abiDir, { recursive: true });
			const fileName = libraryFileName(this.options.libraryName, target, "dynamic", this.options.platform);
			await writeFile(join(abiDir, fileName), library);
			return ok();
		}
		if (subcommand === "build") {
			const triple = invocation.args.includes("--target") ? argAfter(invocation.args, "--target") : "host";
			const target = TargetMatrix.find(triple);
			if (this.omitted.has(triple)) return ok();
			await this.writeArtifact(target, "dynamic");
			await this.writeArtifact(target, "static");
			return ok();
		}
		if (subcommand === "run") {
			return this.bindgen(invocation.args);
		}
		return ok();
	}

	private async writeArtifact(target: Target, format: ArtifactFormat): Promise<string> {
		const dir =
			target.os === "host"
				? join(this.options.targetDir, this.options.mode)
				: join(this.options.targetDir, target.triple, this.options.mode);
		const path = join(dir, libraryFileName(this.options.libraryName, target, format, this.options.platform));
		const content = `arch:${target.arch}\nformat:${format}\n`;
		await mkdir(dir, { recursive: true });
		await writeFile(path, content);
		return content;
	}

	private async lipo(args: readonly string[]): Promise<ToolResult> {
		if (args[0] === "-archs") {
			const content = await readFile(requireArg(args[1], "-archs"), "utf-8");
			const archs = content
				.split("\n")
				.filter((line) => line.startsWith("arch:"))
				.map((line) => line.slice("arch:".length))
				.map((arch) => LIPO_ARCH_NAMES[toArch(arch)] ?? arch);
			return { stdout: `${archs.join(" ")}\n`, stderr: "" };
		}
		const output = argAfter(args, "-output");
		const inputs = args.slice(args.indexOf(output) + 1);
		const archLines: string[] = [];
		for (const input of inputs) {
			const content = await readFile(input, "utf-8");
			archLines.push(...content.split("\n").filter((line) => line.startsWith("arch:")));
		}
		await writeFile(output, `${archLines.join("\n")}\n`);
		return ok();
	}

	private async bindgen(args: readonly string[]): Promise<ToolResult> {
		const language = argAfter(args, "--language");
		const outDir = argAfter(args, "--out-dir");
		const name = this.options.libraryName;
		await mkdir(outDir, { recursive: true });
		if (language === "kotlin") {
			const packageDir = join(outDir, "uniffi", name);
			await mkdir(packageDir, { recursive: true });
			await writeFile(join(packageDir, `${name}.kt`), `package uniffi.${name}\n`);
		} else if (language === "swift") {
			await writeFile(join(outDir, `${name}.swift`), `import ${name}FFI\n`);
			await writeFile(join(outDir, `${name}FFI.h`), "#pragma once\n");
			await writeFile(join(outDir, `${name}FFI.modulemap`), `module ${name}FFI {}\n`);
		} else if (language === "python") {
			await writeFile(join(outDir, `${name}.py`), `# ${name}\n`);
		}
		return ok();
	}

	private async gradle(invocation: ToolInvocation): Promise<ToolResult> {
		if (!invocation.args.includes("assemble")) return ok();
		const mainDir = join(invocation.cwd, "lib", "src", "main");
		const listing = (await listTree(mainDir)).join("\n");
		const aar = join(invocation.cwd, "lib", "build", "outputs", "aar", "lib-release.aar");
		await mkdir(dirname(aar), { recursive: true });
		await writeFile(aar, `${listing}\n`);
		return ok();
	}

	private async setupPy(invocation: ToolInvocation): Promise<ToolResult> {
		if (!invocation.args.includes("bdist_wheel")) return ok();
		const distDir = join(invocation.cwd, "dist");
		const listing = (await listTree(join(invocation.cwd, "src"))).join("\n");
		await mkdir(distDir, { recursive: true });
		await writeFile(join(distDir, `${this.options.libraryName}-0.1.0-py3-none-any.whl`), `${listing}\n`);
		return ok();
	}

	private async wasmPack(invocation: ToolInvocation): Promise<ToolResult> {
		const outDir = resolve(invocation.cwd, argAfter(invocation.args, "--out-dir"));
		const moduleName = this.options.libraryName;
		await mkdir(outDir, { recursive: true });
		await writeFile(join(outDir, `${moduleName}.js`), fakeWasmLoader(moduleName));
		await writeFile(join(outDir, `${moduleName}.d.ts`), "export function greet(): string;\n");
		await writeFile(join(outDir, `${moduleName}_bg.wasm`), MINIMAL_WASM);
		await writeFile(
			join(outDir, "package.json"),
			`${JSON.stringify(
				{
					name: moduleName,
					version: "0.1.0",
					files: [`${moduleName}_bg.wasm`, `${moduleName}.js`, `${moduleName}.d.ts`],
					main: `${moduleName}.js`,
					types: `${moduleName}.d.ts`,
				},
				null,
				2,
			)}\n`,
		);
		return ok();
	}
}

function ok(): ToolResult {
	return { stdout: "", stderr: "" };
}

function requireArg(value: string | undefined, flag: string): string {
	if (value === undefined) {
		throw new Error(`Missing value for ${flag}`);
	}
	return value;
}

function argAfter(args: readonly string[], flag: string): string {
	const index = args.indexOf(flag);
	return requireArg(index === -1 ? undefined : args[index + 1], flag);
}

function toArch(value: string): Target["arch"] {
	const archs: readonly Target["arch"][] = ["aarch64", "armv7", "i686", "x86_64", "wasm32", "native", "universal"];
	return archs.find((arch) => arch === value) ?? "native";
}

/** Lists a directory tree's files, relative and sorted. */
export function listTree(root: string): Promise<string[]> {
	return FileSystemUtils.listFiles(root, "**/*");
}
