/**
 * Platform package assembly.
 *
 * @remarks
 * Each function lays compiled artifacts and binding sets out in the layout one
 * ecosystem's packager expects, then runs that packager. Destination layouts are
 * cleared before they are populated, so assembling twice from the same inputs
 * yields the same package and files from an earlier run with different inputs
 * cannot leak into a new one.
 *
 * These are the only functions that invoke third-party packagers (Gradle, swiftc,
 * setuptools, pip, wasm-pack). A packager's non-zero exit becomes a
 * {@link PackagingToolFailureError} carrying the same exit code.
 *
 * @packageDocumentation
 */

import { rename } from "node:fs/promises";
import { basename, join, resolve } from "node:path";
import { ArtifactCombiner } from "../plugins/utils/artifact-combiner.js";
import { BindingGenerator } from "../plugins/utils/binding-generator.js";
import { CrossCompiler } from "../plugins/utils/cross-compiler.js";
import { FileSystemUtils } from "../plugins/utils/file-utils.js";
import { BuildLogger } from "../plugins/utils/logger.js";
import { updateWebPackageJson } from "../plugins/utils/package-json-transformer.js";
import { PackagingToolFailureError, rethrowToolFailure } from "../plugins/utils/pipeline-errors.js";
import { HOST_TARGET, TargetMatrix } from "../plugins/utils/target-matrix.js";
import type { ToolInvocation, ToolResult } from "../plugins/utils/tool-runner.js";
import { embedWasmModule } from "../plugins/utils/wasm-embedding.js";
import type { ArtifactFormat, BuildContext, CompiledArtifact, PlatformPackage } from "../types/builder-types.js";

/**
 * Apple flavor of a standalone Swift module.
 *
 * @public
 */
export type SwiftFlavor = "ios" | "darwin";

/**
 * One slice of the xcframework: directory name and the library copied into it.
 *
 * @internal
 */
interface XcframeworkSlice {
	directory: string;
	library: (combiner: ArtifactCombiner, compiler: CrossCompiler) => CompiledArtifact;
}

const XCFRAMEWORK_SLICES: readonly XcframeworkSlice[] = [
	{
		directory: "ios-arm64",
		library: (_combiner, compiler) => compiler.artifact(TargetMatrix.find("aarch64-apple-ios"), "static"),
	},
	{
		directory: "ios-arm64_x86_64-simulator",
		library: (combiner) => combiner.universal(TargetMatrix.universalGroup("ios-universal-sim"), "static"),
	},
	{
		directory: "macos-arm64_x86_64",
		library: (combiner) => combiner.universal(TargetMatrix.universalGroup("darwin-universal"), "static"),
	},
];

/**
 * Runs a packager, converting its failure into a {@link PackagingToolFailureError}.
 */
function runPackager(context: BuildContext, invocation: ToolInvocation, step: string): Promise<ToolResult> {
	return rethrowToolFailure(
		() => context.runner.run(invocation),
		(failure) =>
			new PackagingToolFailureError(`${step} failed: ${failure.message}`, failure.exitCode, { cause: failure }),
	);
}

/**
 * Fails when an input file a packager needs is missing.
 */
async function requireFile(path: string, description: string): Promise<void> {
	if (!(await FileSystemUtils.isFile(path))) {
		throw new PackagingToolFailureError(`Missing ${description}: ${path}`);
	}
}

/**
 * Gradle wrapper executable for the host.
 */
function gradleWrapper(context: BuildContext): string {
	return context.platform === "win32" ? "gradlew.bat" : "./gradlew";
}

/**
 * Android project directory.
 *
 * @internal
 */
export function androidProjectDir(context: BuildContext): string {
	return resolve(context.crateDir, context.packages.android.projectDir);
}

/**
 * Assembles the Android archive.
 *
 * @remarks
 * Copies `<ffi>/kotlin/jniLibs` (one directory per ABI) and the generated Kotlin
 * package into the Gradle project, runs `gradlew assemble`, and copies the archive
 * into `<ffi>/android`. Every Android ABI must be present before Gradle runs.
 *
 * @public
 */
export async function assembleAndroidPackage(context: BuildContext): Promise<PlatformPackage> {
	const logger = BuildLogger.createStageLogger("bindings-android");
	const options = context.packages.android;
	const project = androidProjectDir(context);
	const compiler = new CrossCompiler(context);
	const jniLibs = compiler.jniLibsDir();
	const kotlinPackage = join(context.ffiDir, "kotlin", options.kotlinPackageRoot);

	const abis: Record<string, string> = {};
	for (const target of TargetMatrix.resolve("android")) {
		const abi = target.androidAbi ?? target.triple;
		const fileName = basename(compiler.artifactPath(target, "dynamic"));
		await requireFile(join(jniLibs, abi, fileName), `${target.triple} library`);
		abis[target.triple] = abi;
	}
	logger.entries("native libraries", abis);

	const jniLibsDest = join(project, "lib", "src", "main", "jniLibs");
	const kotlinDest = join(project, "lib", "src", "main", "kotlin");
	await FileSystemUtils.cleanDirectory(jniLibsDest);
	await FileSystemUtils.cleanDirectory(kotlinDest);
	await FileSystemUtils.copyDirectory(jniLibs, jniLibsDest);
	const sources = await FileSystemUtils.copyDirectory(kotlinPackage, join(kotlinDest, options.kotlinPackageRoot));
	logger.fileOp("copied Kotlin sources", sources);

	await runPackager(context, { command: gradleWrapper(context), args: ["assemble"], cwd: project }, "gradlew assemble");

	const aar = join(project, options.aarPath);
	await requireFile(aar, "Android archive");
	const outDir = join(context.ffiDir, "android");
	await FileSystemUtils.cleanDirectory(outDir);
	const output = await FileSystemUtils.copyFileInto(aar, outDir);
	logger.success("assembled", basename(output));

	return { platform: "android", layoutDir: project, outputs: [output] };
}

/**
 * Publishes the assembled Android archive with the configured Gradle tasks.
 *
 * @public
 */
export async function publishAndroidPackage(context: BuildContext): Promise<void> {
	const tasks = context.packages.android.publishTasks;
	await runPackager(
		context,
		{ command: gradleWrapper(context), args: tasks, cwd: androidProjectDir(context) },
		`gradlew ${tasks.join(" ")}`,
	);
	BuildLogger.createStageLogger("publish-android").success(`ran ${tasks.join(", ")}`);
}

/**
 * Builds a standalone Swift module for iOS or macOS.
 *
 * @remarks
 * Generates Swift bindings into `<ffi>/swift-<flavor>` from the first device
 * target's static library, copies the universal library next to them (static
 * `ios-universal` for iOS, dynamic `darwin-universal` for macOS) and compiles the
 * module with `swiftc -emit-module`.
 *
 * @public
 */
export async function assembleSwiftModule(context: BuildContext, flavor: SwiftFlavor): Promise<PlatformPackage> {
	const logger = BuildLogger.createStageLogger(`swift-${flavor}`);
	const options = context.packages.swift;
	const compiler = new CrossCompiler(context);
	const combiner = new ArtifactCombiner(context, compiler);
	const outDir = join(context.ffiDir, `swift-${flavor}`);

	const [device] = TargetMatrix.resolve(flavor);
	if (!device) {
		throw new PackagingToolFailureError(`No ${flavor} target to generate Swift bindings from`);
	}
	const universalGroup = TargetMatrix.universalGroup(flavor === "ios" ? "ios-universal" : "darwin-universal");
	const format: ArtifactFormat = flavor === "ios" ? "static" : "dynamic";

	const bindings = await new BindingGenerator(context).generate({
		artifact: compiler.artifact(device, "static"),
		language: "swift",
		outDir,
		format: true,
	});

	const universal = combiner.universal(universalGroup, format);
	await requireFile(universal.path, `${universalGroup.name} library`);
	await FileSystemUtils.copyFileInto(universal.path, outDir);

	const moduleMap = join(outDir, `${options.frameworkName}.modulemap`);
	await requireFile(moduleMap, "module map");

	await runPackager(
		context,
		{
			command: "swiftc",
			args: [
				"-emit-module",
				"-module-name",
				options.moduleName,
				"-Xcc",
				`-fmodule-map-file=${moduleMap}`,
				"-I",
				".",
				"-L",
				".",
				`-l${context.libraryName}`,
				options.bindingFile,
			],
			cwd: outDir,
		},
		"swiftc",
	);

	const outputs = await FileSystemUtils.listFiles(outDir, `${options.moduleName}.{swiftmodule,swiftdoc}`);
	logger.fileOp("generated", bindings.sources);

	return { platform: "swift", layoutDir: outDir, outputs: outputs.map((file) => join(outDir, file)) };
}

/**
 * Lays out the Swift package and its xcframework.
 *
 * @remarks
 * Generates Swift bindings into the package's sources directory, renames the
 * binding file, copies the generated headers into every slice's `Headers`
 * directory and the slice libraries as `<framework>.a`, then removes headers and
 * module maps from the sources directory. The framework's `Info.plist` is not
 * touched.
 *
 * @public
 */
export async function assembleXcframework(context: BuildContext): Promise<PlatformPackage> {
	const logger = BuildLogger.createStageLogger("bindings-swift");
	const options = context.packages.swift;
	const compiler = new CrossCompiler(context);
	const combiner = new ArtifactCombiner(context, compiler);
	const packageDir = resolve(context.crateDir, options.packageDir);
	const sourcesDir = join(packageDir, options.sourcesDir);
	const framework = join(packageDir, `${options.frameworkName}.xcframework`);

	const [device] = TargetMatrix.resolve("ios");
	if (!device) {
		throw new PackagingToolFailureError("No iOS target to generate Swift bindings from");
	}

	const bindings = await new BindingGenerator(context).generate({
		artifact: compiler.artifact(device, "static"),
		language: "swift",
		outDir: sourcesDir,
	});

	const bindingPath = join(sourcesDir, options.bindingFile);
	await requireFile(bindingPath, "Swift binding file");
	const renamed = join(sourcesDir, options.renameBindingTo);
	if (renamed !== bindingPath) {
		await rename(bindingPath, renamed);
	}

	const outputs: string[] = [renamed];
	for (const slice of XCFRAMEWORK_SLICES) {
		const sliceDir = join(framework, slice.directory);
		const headersDir = join(sliceDir, "Headers");
		const library = slice.library(combiner, compiler);
		await requireFile(library.path, `${slice.directory} library`);

		await FileSystemUtils.cleanDirectory(headersDir);
		for (const header of bindings.headers) {
			outputs.push(await FileSystemUtils.copyFileInto(join(sourcesDir, header), headersDir));
		}
		outputs.push(await FileSystemUtils.copyFileTo(library.path, join(sliceDir, `${options.frameworkName}.a`)));
	}

	for (const file of [...bindings.headers, ...bindings.moduleMaps]) {
		await FileSystemUtils.remove(join(sourcesDir, file));
	}

	logger.fileOp(
		"populated slices",
		XCFRAMEWORK_SLICES.map((slice) => slice.directory),
	);
	logger.success("laid out", `${options.frameworkName}.xcframework`);

	return { platform: "swift", layoutDir: packageDir, outputs };
}

/**
 * Builds and optionally reinstalls the Python wheel.
 *
 * @remarks
 * Compiles the library for the host, generates Python bindings into the package
 * directory (which also holds hand-written sources, so it is not cleared), replaces
 * the native library shipped in the package and runs `setup.py bdist_wheel`. On
 * macOS the bindings are generated from the static library.
 *
 * @public
 */
export async function assemblePythonWheel(context: BuildContext): Promise<PlatformPackage> {
	const logger = BuildLogger.createStageLogger("python");
	const options = context.packages.python;
	const project = resolve(context.crateDir, options.projectDir);
	const packageDir = join(project, options.packageDir);
	const distDir = join(project, "dist");
	const compiler = new CrossCompiler(context);

	await FileSystemUtils.remove(distDir);
	await runPackager(
		context,
		{ command: options.pip, args: ["install", "-r", join(project, options.requirements)], cwd: context.crateDir },
		"pip install -r",
	);

	const introspected: ArtifactFormat = context.platform === "darwin" ? "static" : "dynamic";
	const formats: ArtifactFormat[] = introspected === "static" ? ["static", "dynamic"] : ["dynamic"];
	await compiler.compile(HOST_TARGET, formats);

	await new BindingGenerator(context).generate({
		artifact: compiler.artifact(HOST_TARGET, introspected),
		language: "python",
		outDir: packageDir,
		clean: false,
	});

	for (const stale of await FileSystemUtils.listFiles(packageDir, "*.{so,dylib,dll}")) {
		await FileSystemUtils.remove(join(packageDir, stale));
	}
	const library = await FileSystemUtils.copyFileInto(compiler.artifactPath(HOST_TARGET, "dynamic"), packageDir);
	logger.info(`Bundled ${basename(library)}`);

	await runPackager(
		context,
		{ command: options.python, args: ["setup.py", "--verbose", "bdist_wheel"], cwd: project },
		"setup.py bdist_wheel",
	);

	const wheels = (await FileSystemUtils.listFiles(distDir, "*.whl")).map((wheel) => join(distDir, wheel));
	if (wheels.length === 0) {
		throw new PackagingToolFailureError(`setup.py bdist_wheel produced no wheel in ${distDir}`);
	}

	if (options.installWheel) {
		for (const wheel of wheels) {
			await runPackager(
				context,
				{ command: options.pip, args: ["install", wheel, "--force-reinstall"], cwd: project },
				"pip install wheel",
			);
		}
	}

	logger.success("built", wheels.map((wheel) => basename(wheel)).join(", "));
	return { platform: "python", layoutDir: project, outputs: wheels };
}

/**
 * Builds the web module with the WebAssembly binary embedded in its loader.
 *
 * @remarks
 * Runs `wasm-pack build --target nodejs` with `WASM_BINDGEN_WEAKREF=1`, applies the
 * WASM embedding transform and rewrites the output's package.json.
 *
 * @public
 */
export async function buildWebModule(context: BuildContext): Promise<PlatformPackage> {
	const logger = BuildLogger.createStageLogger("web");
	const options = context.packages.web;
	const crateDir = resolve(context.crateDir, options.crateDir);
	const outDir = resolve(crateDir, options.outDir);

	await FileSystemUtils.cleanDirectory(outDir);
	await runPackager(
		context,
		{
			command: "wasm-pack",
			args: [
				"build",
				"--target",
				"nodejs",
				...(options.scope ? ["--scope", options.scope] : []),
				"--out-dir",
				options.outDir,
				...options.extraArgs,
			],
			cwd: crateDir,
			env: { WASM_BINDGEN_WEAKREF: "1" },
		},
		"wasm-pack build",
	);

	const embedded = await embedWasmModule({
		outDir,
		moduleName: options.moduleName,
		strict: options.strictPatterns,
	});
	const outputs = [embedded.loaderPath, embedded.typesPath, embedded.payloadPath];

	const manifestPath = join(outDir, "package.json");
	if (await FileSystemUtils.isFile(manifestPath)) {
		const manifest = await updateWebPackageJson(outDir, { moduleName: options.moduleName });
		logger.fileOp("package files", manifest.files ?? []);
		outputs.push(manifestPath);
	}

	logger.success("built", basename(embedded.loaderPath));
	return { platform: "web", layoutDir: outDir, outputs };
}
