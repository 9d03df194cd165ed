/**
 * Type definitions for the Native Bindings Builder.
 *
 * @remarks
 * This module provides the data model shared by every pipeline stage: targets,
 * compiled artifacts, binding sets, platform packages, toolchain prerequisites,
 * and the builder's configuration options.
 *
 * @packageDocumentation
 */

import type { ToolRunner } from "../plugins/utils/tool-runner.js";

/**
 * Build mode passed to the native compiler.
 *
 * @remarks
 * | Mode      | cargo flag  | Output directory            |
 * |-----------|-------------|-----------------------------|
 * | `release` | `--release` | `target/<triple>/release/`  |
 * | `debug`   | none        | `target/<triple>/debug/`    |
 *
 * @public
 */
export type BuildMode = "release" | "debug";

/**
 * Platform family selector understood by the target matrix.
 *
 * @public
 */
export type PlatformFamily = "android" | "ios" | "darwin" | "web" | "host";

/**
 * Operating-system family of a compilation target.
 *
 * @public
 */
export type TargetOs = "android" | "ios" | "macos" | "wasm" | "host";

/**
 * CPU architecture of a compilation target.
 *
 * @remarks
 * `universal` is reserved for the virtual target of a merged multi-architecture artifact.
 *
 * @public
 */
export type TargetArch = "aarch64" | "armv7" | "i686" | "x86_64" | "wasm32" | "native" | "universal";

/**
 * A compilation target triple.
 *
 * @remarks
 * Targets come from the fixed inventory in the target matrix and are frozen once resolved.
 *
 * @example
 * ```typescript
 * const target: Target = {
 *   triple: "aarch64-apple-ios-sim",
 *   os: "ios",
 *   arch: "aarch64",
 *   variant: "simulator",
 * };
 * ```
 *
 * @public
 */
export interface Target {
	/**
	 * The Rust target triple (e.g. `"armv7-linux-androideabi"`).
	 */
	readonly triple: string;

	/**
	 * Operating-system family.
	 */
	readonly os: TargetOs;

	/**
	 * CPU architecture.
	 */
	readonly arch: TargetArch;

	/**
	 * Optional environment variant.
	 */
	readonly variant?: "simulator";

	/**
	 * Android ABI directory name used under `jniLibs/` (Android targets only).
	 */
	readonly androidAbi?: string;
}

/**
 * Format tag of a compiled artifact.
 *
 * @public
 */
export type ArtifactFormat = "dynamic" | "static" | "wasm";

/**
 * A file produced by the native compiler for one target.
 *
 * @public
 */
export interface CompiledArtifact {
	/**
	 * Absolute path of the artifact.
	 */
	readonly path: string;

	/**
	 * The target the artifact was built for.
	 */
	readonly target: Target;

	/**
	 * Artifact format.
	 */
	readonly format: ArtifactFormat;
}

/**
 * A multi-architecture artifact merged from single-architecture inputs.
 *
 * @public
 */
export interface UniversalArtifact extends CompiledArtifact {
	/**
	 * Name of the universal group (e.g. `"ios-universal-sim"`).
	 */
	readonly group: string;

	/**
	 * Architectures embedded in the artifact, sorted by name.
	 */
	readonly architectures: readonly TargetArch[];
}

/**
 * A fixed group of targets merged into one universal artifact.
 *
 * @public
 */
export interface UniversalGroup {
	/**
	 * Group name, also used as the output directory under the cargo target dir.
	 */
	readonly name: string;

	/**
	 * Triples of the members, in inventory order.
	 */
	readonly triples: readonly string[];
}

/**
 * Destination language of the binding generator.
 *
 * @public
 */
export type BindingLanguage = "kotlin" | "swift" | "python";

/**
 * Source files emitted by one binding generator run.
 *
 * @remarks
 * A binding set belongs to exactly one artifact and one language.
 *
 * @public
 */
export interface BindingSet {
	/**
	 * Destination language.
	 */
	readonly language: BindingLanguage;

	/**
	 * The artifact whose interface was introspected.
	 */
	readonly artifact: CompiledArtifact;

	/**
	 * Directory the bindings were written to.
	 */
	readonly outDir: string;

	/**
	 * Generated source files, relative to `outDir`.
	 */
	readonly sources: readonly string[];

	/**
	 * Generated C headers, relative to `outDir`.
	 */
	readonly headers: readonly string[];

	/**
	 * Generated Clang module maps, relative to `outDir`.
	 */
	readonly moduleMaps: readonly string[];
}

/**
 * Platform family of a finished distributable.
 *
 * @public
 */
export type PackagePlatform = "android" | "swift" | "python" | "web";

/**
 * A finished, ecosystem-native distributable.
 *
 * @public
 */
export interface PlatformPackage {
	/**
	 * Package platform.
	 */
	readonly platform: PackagePlatform;

	/**
	 * Root of the layout the package was assembled in.
	 */
	readonly layoutDir: string;

	/**
	 * Absolute paths of the distributable files.
	 */
	readonly outputs: readonly string[];
}

/**
 * An external dependency that must be satisfied before a stage runs.
 *
 * @public
 */
export type ToolchainPrerequisite =
	| {
			readonly kind: "directory";
			/** Environment variable holding the directory path. */
			readonly env: string;
			/** Human-readable name of the folder (e.g. `"NDK"`). */
			readonly description: string;
	  }
	| {
			readonly kind: "tool";
			/** Executable to check. */
			readonly command: string;
			/** Check arguments (e.g. `["--version"]`). */
			readonly args: readonly string[];
			/** Human-readable name of the tool. */
			readonly description: string;
	  };

/**
 * Names of the pipeline stages exposed on the command line.
 *
 * @public
 */
export type StageName =
	| "init"
	| "clean-android"
	| "android"
	| "kotlin"
	| "bindings-android"
	| "publish-android"
	| "ios-universal"
	| "darwin-universal"
	| "swift-ios"
	| "swift-darwin"
	| "bindings-swift"
	| "python"
	| "web";

/**
 * Binding generator configuration.
 *
 * @public
 */
export interface BindgenOptions {
	/**
	 * Cargo package of the generator binary.
	 *
	 * @defaultValue `"uniffi-bindgen"`
	 */
	package?: string;
}

/**
 * Android archive layout configuration.
 *
 * @public
 */
export interface AndroidPackageOptions {
	/**
	 * Gradle project directory, relative to the crate dir.
	 *
	 * @defaultValue `"bindings-android"`
	 */
	projectDir?: string;

	/**
	 * Top-level directory of the generated Kotlin package inside `<ffi>/kotlin`.
	 *
	 * @defaultValue `"uniffi"`
	 */
	kotlinPackageRoot?: string;

	/**
	 * Archive written by Gradle, relative to the project dir.
	 *
	 * @defaultValue `"lib/build/outputs/aar/lib-release.aar"`
	 */
	aarPath?: string;

	/**
	 * Gradle tasks run by the `publish-android` stage.
	 *
	 * @defaultValue `["publishToSonatype", "closeAndReleaseSonatypeStagingRepository"]`
	 */
	publishTasks?: string[];
}

/**
 * Swift module and framework layout configuration.
 *
 * @public
 */
export interface SwiftPackageOptions {
	/**
	 * Swift module name passed to `swiftc -module-name`.
	 */
	moduleName?: string;

	/**
	 * Name of the Swift file emitted by the generator (e.g. `"nostr.swift"`).
	 */
	bindingFile?: string;

	/**
	 * Name of the framework (e.g. `"nostrFFI"`), used for the `.xcframework`
	 * directory, the module map and the slice libraries.
	 */
	frameworkName?: string;

	/**
	 * Swift package directory, relative to the crate dir.
	 *
	 * @defaultValue `"bindings-swift"`
	 */
	packageDir?: string;

	/**
	 * Sources directory inside the Swift package.
	 *
	 * @defaultValue `"Sources/Bindings"`
	 */
	sourcesDir?: string;

	/**
	 * File name the binding file is renamed to inside the Swift package.
	 */
	renameBindingTo?: string;
}

/**
 * Python wheel layout configuration.
 *
 * @public
 */
export interface PythonPackageOptions {
	/**
	 * Python project directory, relative to the crate dir.
	 *
	 * @defaultValue `"bindings-python"`
	 */
	projectDir?: string;

	/**
	 * Package directory that receives the bindings, relative to the project dir.
	 */
	packageDir?: string;

	/**
	 * Requirements file installed before the build, relative to the project dir.
	 *
	 * @defaultValue `"requirements.txt"`
	 */
	requirements?: string;

	/**
	 * Python interpreter.
	 *
	 * @defaultValue `"python"`
	 */
	python?: string;

	/**
	 * pip executable.
	 *
	 * @defaultValue `"pip"`
	 */
	pip?: string;

	/**
	 * Reinstall the freshly built wheel after packaging.
	 *
	 * @defaultValue `true`
	 */
	installWheel?: boolean;
}

/**
 * Web module configuration.
 *
 * @public
 */
export interface WebModuleOptions {
	/**
	 * wasm-bindgen crate directory, relative to the crate dir.
	 */
	crateDir?: string;

	/**
	 * npm scope passed to wasm-pack.
	 */
	scope?: string;

	/**
	 * wasm-pack output directory, relative to the web crate dir.
	 *
	 * @defaultValue `"pkg"`
	 */
	outDir?: string;

	/**
	 * Base name of the generated loader (e.g. `"nostr_js"`).
	 */
	moduleName?: string;

	/**
	 * Extra arguments appended to `wasm-pack build`.
	 */
	extraArgs?: string[];

	/**
	 * Fail the stage when a loader rewrite pattern does not match.
	 *
	 * @defaultValue `false` (log a warning instead)
	 */
	strictPatterns?: boolean;
}

/**
 * Configuration options for the NativeBindingsBuilder.
 *
 * @example
 * ```typescript
 * import { NativeBindingsBuilder } from 'native-bindings-builder';
 *
 * export default NativeBindingsBuilder.create({
 *   libraryName: 'example_ffi',
 *   targetDir: '../../target',
 *   android: { kotlinPackageRoot: 'example' },
 *   swift: { moduleName: 'example_ffi', bindingFile: 'example.swift', frameworkName: 'exampleFFI' },
 *   python: { packageDir: 'src/example' },
 *   web: { crateDir: '../example-js', scope: 'example', moduleName: 'example_js' },
 * });
 * ```
 *
 * @public
 */
export interface NativeBindingsBuilderOptions {
	/**
	 * Library name as written by cargo, without `lib` prefix or extension.
	 */
	libraryName: string;

	/**
	 * Crate directory all relative paths resolve against.
	 *
	 * @defaultValue `process.cwd()`
	 */
	crateDir?: string;

	/**
	 * Cargo target directory, relative to the crate dir.
	 *
	 * @defaultValue `"target"`
	 */
	targetDir?: string;

	/**
	 * Directory receiving intermediate FFI outputs, relative to the crate dir.
	 *
	 * @defaultValue `"ffi"`
	 */
	ffiDir?: string;

	/**
	 * Compiler build mode.
	 *
	 * @defaultValue `"release"`
	 */
	mode?: BuildMode;

	/**
	 * Stages run when no `--stage` flag is given.
	 */
	stages?: StageName[];

	/**
	 * Binding generator configuration.
	 */
	bindgen?: BindgenOptions;

	/**
	 * Android archive configuration.
	 */
	android?: AndroidPackageOptions;

	/**
	 * Swift configuration.
	 */
	swift?: SwiftPackageOptions;

	/**
	 * Python wheel configuration.
	 */
	python?: PythonPackageOptions;

	/**
	 * Web module configuration.
	 */
	web?: WebModuleOptions;

	/**
	 * Environment used for prerequisites and passed to external tools.
	 *
	 * @defaultValue `process.env`
	 */
	env?: NodeJS.ProcessEnv;

	/**
	 * Host platform, used to pick host library extensions.
	 *
	 * @defaultValue `process.platform`
	 */
	platform?: NodeJS.Platform;

	/**
	 * Runner used for every external tool invocation.
	 *
	 * @defaultValue a `ProcessToolRunner`
	 */
	runner?: ToolRunner;
}

/**
 * Result of running one requested stage chain.
 *
 * @public
 */
export interface BuildResult {
	/**
	 * Whether every stage of the chain succeeded.
	 */
	success: boolean;

	/**
	 * The requested stage.
	 */
	stage: StageName;

	/**
	 * Stages executed, in order.
	 */
	executed: StageName[];

	/**
	 * Files produced by the chain.
	 */
	outputs: string[];

	/**
	 * Duration in milliseconds.
	 */
	duration: number;

	/**
	 * Process exit code for this chain: 0 on success, otherwise the failing tool's code.
	 */
	exitCode: number;

	/**
	 * Errors raised by the failing stage.
	 */
	errors?: Error[];
}

/**
 * Builder options with every nested default applied.
 *
 * @internal
 */
export interface ResolvedPackageOptions {
	bindgen: Required<BindgenOptions>;
	android: Required<AndroidPackageOptions>;
	swift: Required<SwiftPackageOptions>;
	python: Required<PythonPackageOptions>;
	web: Required<WebModuleOptions>;
}

/**
 * Context threaded through every stage of one builder run.
 *
 * @remarks
 * All paths are absolute. Holding them here instead of in fixed relative paths lets
 * separate runs (and tests) work against distinct roots.
 *
 * @public
 */
export interface BuildContext {
	/**
	 * Crate directory; working directory of cargo and the binding generator.
	 */
	crateDir: string;

	/**
	 * Cargo target directory.
	 *
	 * @example `"/work/nostr/target"`
	 */
	targetDir: string;

	/**
	 * Directory receiving intermediate FFI outputs (jniLibs, Swift modules, archives).
	 */
	ffiDir: string;

	/**
	 * Library name as written by cargo.
	 */
	libraryName: string;

	/**
	 * Compiler build mode.
	 */
	mode: BuildMode;

	/**
	 * Host platform.
	 */
	platform: NodeJS.Platform;

	/**
	 * Environment for prerequisites.
	 */
	env: NodeJS.ProcessEnv;

	/**
	 * Runner for every external tool.
	 */
	runner: ToolRunner;

	/**
	 * Package layout options.
	 */
	packages: ResolvedPackageOptions;
}
