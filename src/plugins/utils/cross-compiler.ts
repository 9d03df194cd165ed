/**
 * Cross-compilation driver.
 *
 * @remarks
 * Invokes cargo once per target triple and verifies that every expected artifact
 * exists at its deterministic location afterwards. Distinct targets write to
 * distinct subtrees of the cargo target directory; targets are built one after
 * another so the same triple is never compiled twice at the same time.
 *
 * @packageDocumentation
 */

import { join } from "node:path";
import type { ArtifactFormat, BuildContext, CompiledArtifact, Target } from "../../types/builder-types.js";
import { FileSystemUtils } from "./file-utils.js";
import { BuildLogger } from "./logger.js";
import { CompilationFailureError, rethrowToolFailure } from "./pipeline-errors.js";
import { TargetMatrix } from "./target-matrix.js";
import type { ToolInvocation } from "./tool-runner.js";

/**
 * Returns the file name cargo gives a library for a target and format.
 *
 * @param libraryName - Library name without prefix or extension
 * @param target - Compilation target
 * @param format - Artifact format
 * @param hostPlatform - Platform used for the host target
 *
 * @example
 * ```typescript
 * libraryFileName('nostr_ffi', TargetMatrix.find('aarch64-apple-darwin'), 'dynamic', 'linux');
 * // "libnostr_ffi.dylib"
 * libraryFileName('nostr_ffi', HOST_TARGET, 'dynamic', 'win32');
 * // "nostr_ffi.dll"
 * ```
 *
 * @public
 */
export function libraryFileName(
	libraryName: string,
	target: Target,
	format: ArtifactFormat,
	hostPlatform: NodeJS.Platform,
): string {
	const windowsHost = target.os === "host" && hostPlatform === "win32";

	if (format === "wasm") {
		return `${libraryName}.wasm`;
	}
	if (format === "static") {
		return windowsHost ? `${libraryName}.lib` : `lib${libraryName}.a`;
	}
	if (windowsHost) {
		return `${libraryName}.dll`;
	}
	const apple = target.os === "ios" || target.os === "macos" || (target.os === "host" && hostPlatform === "darwin");
	return `lib${libraryName}.${apple ? "dylib" : "so"}`;
}

/**
 * Drives the native compiler for individual targets.
 *
 * @example
 * ```typescript
 * const compiler = new CrossCompiler(context);
 * const artifacts = await compiler.compileAll(TargetMatrix.resolve('ios'), ['static']);
 * ```
 *
 * @public
 */
export class CrossCompiler {
	private readonly context: BuildContext;

	constructor(context: BuildContext) {
		this.context = context;
	}

	/**
	 * Directory cargo writes a target's artifacts to.
	 */
	outputDir(target: Target): string {
		return target.os === "host"
			? join(this.context.targetDir, this.context.mode)
			: join(this.context.targetDir, target.triple, this.context.mode);
	}

	/**
	 * Deterministic path of a target's artifact.
	 */
	artifactPath(target: Target, format: ArtifactFormat): string {
		return join(
			this.outputDir(target),
			libraryFileName(this.context.libraryName, target, format, this.context.platform),
		);
	}

	/**
	 * Describes an artifact at its deterministic path without compiling it.
	 */
	artifact(target: Target, format: ArtifactFormat): CompiledArtifact {
		return Object.freeze({ path: this.artifactPath(target, format), target, format });
	}

	/**
	 * Directory Android libraries are copied to, one subdirectory per ABI.
	 */
	jniLibsDir(): string {
		return join(this.context.ffiDir, "kotlin", "jniLibs");
	}

	/**
	 * Builds the compiler invocation for a target.
	 */
	invocation(target: Target): ToolInvocation {
		const release = this.context.mode === "release" ? ["--release"] : [];
		const cwd = this.context.crateDir;

		if (target.os === "android") {
			return {
				command: "cargo",
				args: ["ndk", "-t", target.triple, "-o", this.jniLibsDir(), "build", ...release],
				cwd,
			};
		}
		if (target.os === "host") {
			return { command: "cargo", args: ["build", ...release], cwd };
		}
		return { command: "cargo", args: ["build", ...release, "--target", target.triple], cwd };
	}

	/**
	 * Compiles one target.
	 *
	 * @param target - The target to build
	 * @param formats - Formats the crate must emit for this target
	 * @returns One artifact per requested format
	 * @throws {@link CompilationFailureError} when cargo fails or an artifact is missing afterwards
	 */
	async compile(target: Target, formats: readonly ArtifactFormat[]): Promise<CompiledArtifact[]> {
		const logger = BuildLogger.createLogger("cargo");
		const timer = BuildLogger.createTimer();

		await rethrowToolFailure(
			() => this.context.runner.run(this.invocation(target)),
			(failure) =>
				new CompilationFailureError(`Compilation failed for ${target.triple}: ${failure.message}`, failure.exitCode, {
					cause: failure,
				}),
		);

		const artifacts: CompiledArtifact[] = [];
		for (const format of formats) {
			const artifact = this.artifact(target, format);
			if (!(await FileSystemUtils.isFile(artifact.path))) {
				throw new CompilationFailureError(`Expected ${format} artifact for ${target.triple} at ${artifact.path}`);
			}
			artifacts.push(artifact);
		}

		logger.info(`Compiled ${target.triple} (${this.context.mode}) in ${timer.format()}`);
		return artifacts;
	}

	/**
	 * Compiles targets one after another, in the given order.
	 */
	async compileAll(targets: readonly Target[], formats: readonly ArtifactFormat[]): Promise<CompiledArtifact[]> {
		const artifacts: CompiledArtifact[] = [];
		for (const target of targets) {
			artifacts.push(...(await this.compile(target, formats)));
		}
		return artifacts;
	}

	/**
	 * Installs the compiler targets and cargo helpers the pipeline relies on.
	 *
	 * @remarks
	 * `cargo-lipo` is only installed on macOS hosts.
	 */
	async installToolchain(): Promise<void> {
		const cwd = this.context.crateDir;
		const run = (command: string, args: string[]) =>
			rethrowToolFailure(
				() => this.context.runner.run({ command, args, cwd }),
				(failure) =>
					new CompilationFailureError(`Toolchain setup failed: ${failure.message}`, failure.exitCode, {
						cause: failure,
					}),
			);

		await run("rustup", ["target", "add", ...TargetMatrix.resolve("ios").map((t) => t.triple)]);
		await run("rustup", ["target", "add", ...TargetMatrix.resolve("darwin").map((t) => t.triple)]);
		await run("rustup", ["target", "add", ...TargetMatrix.resolve("android").map((t) => t.triple)]);
		if (this.context.platform === "darwin") {
			await run("cargo", ["install", "cargo-lipo"]);
		}
		await run("cargo", ["install", "cbindgen"]);
		await run("cargo", ["install", "cargo-ndk"]);
	}
}
