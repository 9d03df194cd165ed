/**
 * Release pipeline for a native library with foreign-language bindings.
 *
 * @remarks
 * This package compiles one cargo crate for a fixed inventory of Android, Apple,
 * WebAssembly and host targets and assembles ecosystem-native distributables from
 * the results:
 *
 * - **Android archive**: four ABIs plus Kotlin bindings, packaged by Gradle
 * - **Swift package**: an xcframework of universal static libraries plus Swift bindings
 * - **Python wheel**: the host library plus Python bindings, packaged by setuptools
 * - **Web module**: a wasm-pack build with the WebAssembly binary embedded in its loader
 *
 * ## Quick Start
 *
 * Create a `release.ts` file in the crate directory:
 *
 * @example
 * ```typescript
 * import { NativeBindingsBuilder } from 'native-bindings-builder';
 *
 * export default NativeBindingsBuilder.create({
 *   libraryName: 'example_ffi',
 *   targetDir: '../../target',
 *   android: { kotlinPackageRoot: 'example' },
 *   swift: { bindingFile: 'example.swift', frameworkName: 'exampleFFI', renameBindingTo: 'Example.swift' },
 *   python: { packageDir: 'src/example' },
 *   web: { crateDir: '../example-js', scope: 'example', moduleName: 'example_js' },
 * });
 * ```
 *
 * ## Running Stages
 *
 * ```bash
 * # Android archive (compiles all four ABIs first)
 * node release.js --stage bindings-android
 *
 * # Swift modules in debug mode
 * node release.js --stage swift-ios --stage swift-darwin --mode debug
 * ```
 *
 * @packageDocumentation
 */

/* v8 ignore start - Export module, tested through its members */

// =============================================================================
// Core Builder
// =============================================================================

export { NativeBindingsBuilder } from "./builders/native-bindings-builder.js";

// =============================================================================
// Stages
// =============================================================================

export type { StageDefinition, StageRun } from "./hooks/build-lifecycle.js";
export {
	createBuildContext,
	createStageRun,
	executeStage,
	isStageName,
	planStages,
	STAGES,
} from "./hooks/build-lifecycle.js";
export type { SwiftFlavor } from "./hooks/platform-packages.js";
export {
	assembleAndroidPackage,
	assemblePythonWheel,
	assembleSwiftModule,
	assembleXcframework,
	buildWebModule,
	publishAndroidPackage,
} from "./hooks/platform-packages.js";

// =============================================================================
// Pipeline Components
// =============================================================================

export { ArtifactCombiner, LIPO_ARCH_NAMES } from "./plugins/utils/artifact-combiner.js";
export type { GenerateBindingsRequest } from "./plugins/utils/binding-generator.js";
export { BINDING_SOURCE_PATTERNS, BindingGenerator } from "./plugins/utils/binding-generator.js";
export { CrossCompiler, libraryFileName } from "./plugins/utils/cross-compiler.js";
export { FileSystemUtils } from "./plugins/utils/file-utils.js";
export type { FileEntry, Logger, StageLogger, Timer } from "./plugins/utils/logger.js";
export { BuildLogger } from "./plugins/utils/logger.js";
export type { WebManifestOptions } from "./plugins/utils/package-json-transformer.js";
export {
	readPackageJson,
	transformWebManifest,
	updateWebPackageJson,
} from "./plugins/utils/package-json-transformer.js";
export type { PipelineErrorKind } from "./plugins/utils/pipeline-errors.js";
export {
	CompilationFailureError,
	GenerationFailureError,
	MergeInputMissingError,
	PackagingToolFailureError,
	PipelineError,
	PreconditionUnsatisfiedError,
	ToolFailureError,
	TransformPatternMismatchError,
} from "./plugins/utils/pipeline-errors.js";
export {
	ANDROID_NDK_HOME,
	ANDROID_SDK_ROOT,
	CARGO,
	describePrerequisiteFailure,
	LIPO,
	PreconditionChecker,
	SWIFTC,
	toolPrerequisite,
	WASM_PACK,
} from "./plugins/utils/precondition-checker.js";
export { HOST_TARGET, TargetMatrix } from "./plugins/utils/target-matrix.js";
export type { ToolInvocation, ToolResult, ToolRunner } from "./plugins/utils/tool-runner.js";
export { formatInvocation, ProcessToolRunner } from "./plugins/utils/tool-runner.js";
export type { EmbeddedWasmModule, EmbedWasmOptions, LoaderTransformResult } from "./plugins/utils/wasm-embedding.js";
export {
	createLoaderEpilogue,
	embedWasmModule,
	encodeWasmPayload,
	isPathConstruction,
	isTextCodecImport,
	LOADER_TYPES_EPILOGUE,
	PATH_CONSTRUCTION_PATTERN,
	TEXT_CODEC_IMPORT_PATTERN,
	transformLoaderSource,
} from "./plugins/utils/wasm-embedding.js";

// =============================================================================
// Types
// =============================================================================

export type {
	AndroidPackageOptions,
	ArtifactFormat,
	BindgenOptions,
	BindingLanguage,
	BindingSet,
	BuildContext,
	BuildMode,
	BuildResult,
	CompiledArtifact,
	NativeBindingsBuilderOptions,
	PackagePlatform,
	PlatformFamily,
	PlatformPackage,
	PythonPackageOptions,
	ResolvedPackageOptions,
	StageName,
	SwiftPackageOptions,
	Target,
	TargetArch,
	TargetOs,
	ToolchainPrerequisite,
	UniversalArtifact,
	UniversalGroup,
	WebModuleOptions,
} from "./types/builder-types.js";
export type { PackageJson } from "./types/package-json.js";

/* v8 ignore stop */
