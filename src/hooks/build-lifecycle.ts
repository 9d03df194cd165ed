/**
 * Stage orchestration for the Native Bindings Builder.
 *
 * @remarks
 * The pipeline is a dependency graph over named stages. Requesting a stage runs its
 * dependency closure first, depth-first in declared order, each stage at most once
 * per run and strictly one after another.
 *
 * ## Stages
 *
 * | Stage              | Depends on                        | Prerequisites                  |
 * |--------------------|-----------------------------------|--------------------------------|
 * | `init`             |                                   | cargo                          |
 * | `clean-android`    |                                   |                                |
 * | `android`          |                                   | `ANDROID_NDK_HOME`, cargo      |
 * | `kotlin`           | `clean-android`, `android`        | cargo                          |
 * | `bindings-android` | `kotlin`                          | `ANDROID_SDK_ROOT`             |
 * | `publish-android`  | `bindings-android`                |                                |
 * | `ios-universal`    |                                   | cargo, lipo                    |
 * | `darwin-universal` |                                   | cargo, lipo                    |
 * | `swift-ios`        | `ios-universal`                   | swiftc                         |
 * | `swift-darwin`     | `darwin-universal`                | swiftc                         |
 * | `bindings-swift`   | `ios-universal`, `darwin-universal` |                              |
 * | `python`           |                                   | cargo, python, pip             |
 * | `web`              |                                   | wasm-pack                      |
 *
 * The prerequisites of the whole closure are checked before the first stage runs,
 * so a missing SDK root fails the run before anything is compiled. The first
 * failing stage aborts the chain; artifacts already produced are left in place.
 *
 * @packageDocumentation
 */

import { join, resolve } from "node:path";
import { ArtifactCombiner } from "../plugins/utils/artifact-combiner.js";
import { BindingGenerator } from "../plugins/utils/binding-generator.js";
import { CrossCompiler } from "../plugins/utils/cross-compiler.js";
import { FileSystemUtils } from "../plugins/utils/file-utils.js";
import { BuildLogger } from "../plugins/utils/logger.js";
import {
	ANDROID_NDK_HOME,
	ANDROID_SDK_ROOT,
	CARGO,
	LIPO,
	PreconditionChecker,
	SWIFTC,
	WASM_PACK,
	toolPrerequisite,
} from "../plugins/utils/precondition-checker.js";
import { TargetMatrix } from "../plugins/utils/target-matrix.js";
import { ProcessToolRunner } from "../plugins/utils/tool-runner.js";
import type {
	BuildContext,
	NativeBindingsBuilderOptions,
	StageName,
	ToolchainPrerequisite,
} from "../types/builder-types.js";
import {
	assembleAndroidPackage,
	assemblePythonWheel,
	assembleSwiftModule,
	assembleXcframework,
	buildWebModule,
	publishAndroidPackage,
} from "./platform-packages.js";

/**
 * Definition of one pipeline stage.
 *
 * @public
 */
export interface StageDefinition {
	/**
	 * One-line description shown in logs.
	 */
	description: string;

	/**
	 * Stages that must complete first, in order.
	 */
	dependsOn: readonly StageName[];

	/**
	 * Prerequisites checked before the run starts.
	 */
	prerequisites: (context: BuildContext) => readonly ToolchainPrerequisite[];

	/**
	 * Stages whose outputs this stage removes. They run again when a later chain needs them.
	 */
	invalidates?: readonly StageName[];

	/**
	 * Runs the stage.
	 *
	 * @returns Absolute paths of the files the stage produced
	 */
	run: (context: BuildContext) => Promise<string[]>;
}

const none = (): readonly ToolchainPrerequisite[] => [];

/**
 * The stage graph.
 *
 * @public
 */
export const STAGES: Readonly<Record<StageName, StageDefinition>> = {
	init: {
		description: "Install compiler targets and cargo helpers",
		dependsOn: [],
		prerequisites: () => [CARGO],
		run: async (context) => {
			await new CrossCompiler(context).installToolchain();
			return [];
		},
	},
	"clean-android": {
		description: "Remove Android outputs",
		dependsOn: [],
		prerequisites: none,
		invalidates: ["android", "kotlin", "bindings-android", "publish-android"],
		run: async (context) => {
			await FileSystemUtils.remove(join(context.ffiDir, "android"));
			await FileSystemUtils.remove(join(context.ffiDir, "kotlin"));
			return [];
		},
	},
	android: {
		description: "Compile the Android libraries",
		dependsOn: [],
		prerequisites: () => [ANDROID_NDK_HOME, CARGO],
		run: async (context) => {
			const artifacts = await new CrossCompiler(context).compileAll(TargetMatrix.resolve("android"), ["dynamic"]);
			return artifacts.map((artifact) => artifact.path);
		},
	},
	kotlin: {
		description: "Generate Kotlin bindings",
		dependsOn: ["clean-android", "android"],
		prerequisites: () => [CARGO],
		run: async (context) => {
			const compiler = new CrossCompiler(context);
			// jniLibs share the output directory
			const bindings = await new BindingGenerator(context).generate({
				artifact: compiler.artifact(TargetMatrix.find("x86_64-linux-android"), "dynamic"),
				language: "kotlin",
				outDir: join(context.ffiDir, "kotlin"),
				clean: false,
			});
			return bindings.sources.map((source) => join(bindings.outDir, source));
		},
	},
	"bindings-android": {
		description: "Assemble the Android archive",
		dependsOn: ["kotlin"],
		prerequisites: () => [ANDROID_SDK_ROOT],
		run: async (context) => [...(await assembleAndroidPackage(context)).outputs],
	},
	"publish-android": {
		description: "Publish the Android archive",
		dependsOn: ["bindings-android"],
		prerequisites: none,
		run: async (context) => {
			await publishAndroidPackage(context);
			return [];
		},
	},
	"ios-universal": {
		description: "Compile and merge the iOS libraries",
		dependsOn: [],
		prerequisites: () => [CARGO, LIPO],
		run: async (context) => {
			const compiler = new CrossCompiler(context);
			const combiner = new ArtifactCombiner(context, compiler);
			await compiler.compileAll(TargetMatrix.resolve("ios"), ["static"]);
			const outputs: string[] = [];
			for (const group of TargetMatrix.universalGroups("ios")) {
				const universals = await combiner.combineFormats(group, ["static"]);
				outputs.push(...universals.map((universal) => universal.path));
			}
			return outputs;
		},
	},
	"darwin-universal": {
		description: "Compile and merge the macOS libraries",
		dependsOn: [],
		prerequisites: () => [CARGO, LIPO],
		run: async (context) => {
			const compiler = new CrossCompiler(context);
			const combiner = new ArtifactCombiner(context, compiler);
			await compiler.compileAll(TargetMatrix.resolve("darwin"), ["dynamic", "static"]);
			const outputs: string[] = [];
			for (const group of TargetMatrix.universalGroups("darwin")) {
				const universals = await combiner.combineFormats(group, ["dynamic", "static"]);
				outputs.push(...universals.map((universal) => universal.path));
			}
			return outputs;
		},
	},
	"swift-ios": {
		description: "Build the iOS Swift module",
		dependsOn: ["ios-universal"],
		prerequisites: () => [SWIFTC],
		run: async (context) => [...(await assembleSwiftModule(context, "ios")).outputs],
	},
	"swift-darwin": {
		description: "Build the macOS Swift module",
		dependsOn: ["darwin-universal"],
		prerequisites: () => [SWIFTC],
		run: async (context) => [...(await assembleSwiftModule(context, "darwin")).outputs],
	},
	"bindings-swift": {
		description: "Lay out the Swift package and xcframework",
		dependsOn: ["ios-universal", "darwin-universal"],
		prerequisites: none,
		run: async (context) => [...(await assembleXcframework(context)).outputs],
	},
	python: {
		description: "Build the Python wheel",
		dependsOn: [],
		prerequisites: (context) => [
			CARGO,
			toolPrerequisite(context.packages.python.python, "Python"),
			toolPrerequisite(context.packages.python.pip, "pip"),
		],
		run: async (context) => [...(await assemblePythonWheel(context)).outputs],
	},
	web: {
		description: "Build the web module",
		dependsOn: [],
		prerequisites: () => [WASM_PACK],
		run: async (context) => [...(await buildWebModule(context)).outputs],
	},
};

/**
 * Checks whether a string names a stage.
 *
 * @public
 */
export function isStageName(value: string): value is StageName {
	return Object.hasOwn(STAGES, value);
}

/**
 * Returns the stages a request runs, dependencies first.
 *
 * @example
 * ```typescript
 * planStages(['bindings-android']);
 * // ["clean-android", "android", "kotlin", "bindings-android"]
 * ```
 *
 * @throws Error when the stage graph has a cycle
 *
 * @public
 */
export function planStages(
	requested: readonly StageName[],
	stages: Readonly<Record<StageName, StageDefinition>> = STAGES,
): StageName[] {
	const plan: StageName[] = [];
	const visiting = new Set<StageName>();

	const visit = (name: StageName): void => {
		if (plan.includes(name)) return;
		if (visiting.has(name)) {
			throw new Error(`Stage dependency cycle at ${name}`);
		}
		visiting.add(name);
		for (const dependency of stages[name].dependsOn) {
			visit(dependency);
		}
		visiting.delete(name);
		plan.push(name);
	};

	for (const name of requested) {
		visit(name);
	}
	return plan;
}

/**
 * State of one builder run.
 *
 * @public
 */
export interface StageRun {
	/**
	 * Checker shared by every stage of the run.
	 */
	checker: PreconditionChecker;

	/**
	 * Stages completed so far, in order. A stage that ran again appears again.
	 */
	completed: StageName[];

	/**
	 * Completed stages whose outputs a later stage removed.
	 */
	invalidated: Set<StageName>;
}

/**
 * Starts a run. Prerequisite results are kept for the run only.
 *
 * @public
 */
export function createStageRun(context: BuildContext): StageRun {
	return {
		checker: new PreconditionChecker(context.env, context.runner, context.crateDir),
		completed: [],
		invalidated: new Set<StageName>(),
	};
}

/**
 * Resolves builder options into a build context with absolute paths.
 *
 * @public
 */
export function createBuildContext(options: NativeBindingsBuilderOptions): BuildContext {
	const crateDir = resolve(options.crateDir ?? process.cwd());
	const env = options.env ?? process.env;
	const libraryName = options.libraryName;
	const swiftBindingFile = options.swift?.bindingFile ?? `${libraryName}.swift`;

	return {
		crateDir,
		targetDir: resolve(crateDir, options.targetDir ?? "target"),
		ffiDir: resolve(crateDir, options.ffiDir ?? "ffi"),
		libraryName,
		mode: options.mode ?? "release",
		platform: options.platform ?? process.platform,
		env,
		runner: options.runner ?? new ProcessToolRunner(env),
		packages: {
			bindgen: {
				package: options.bindgen?.package ?? "uniffi-bindgen",
			},
			android: {
				projectDir: options.android?.projectDir ?? "bindings-android",
				kotlinPackageRoot: options.android?.kotlinPackageRoot ?? "uniffi",
				aarPath: options.android?.aarPath ?? join("lib", "build", "outputs", "aar", "lib-release.aar"),
				publishTasks: options.android?.publishTasks ?? [
					"publishToSonatype",
					"closeAndReleaseSonatypeStagingRepository",
				],
			},
			swift: {
				moduleName: options.swift?.moduleName ?? libraryName,
				bindingFile: swiftBindingFile,
				frameworkName: options.swift?.frameworkName ?? `${libraryName}FFI`,
				packageDir: options.swift?.packageDir ?? "bindings-swift",
				sourcesDir: options.swift?.sourcesDir ?? join("Sources", "Bindings"),
				renameBindingTo: options.swift?.renameBindingTo ?? swiftBindingFile,
			},
			python: {
				projectDir: options.python?.projectDir ?? "bindings-python",
				packageDir: options.python?.packageDir ?? join("src", libraryName),
				requirements: options.python?.requirements ?? "requirements.txt",
				python: options.python?.python ?? "python",
				pip: options.python?.pip ?? "pip",
				installWheel: options.python?.installWheel ?? true,
			},
			web: {
				crateDir: options.web?.crateDir ?? ".",
				scope: options.web?.scope ?? "",
				outDir: options.web?.outDir ?? "pkg",
				moduleName: options.web?.moduleName ?? libraryName,
				extraArgs: options.web?.extraArgs ?? [],
				strictPatterns: options.web?.strictPatterns ?? false,
			},
		},
	};
}

/**
 * Runs a stage and its dependency closure.
 *
 * @remarks
 * Stages already completed in this run are skipped, unless their outputs were
 * removed since or will be removed by a stage planned before them. Prerequisites of
 * every stage that still has to run are checked before the first one starts.
 *
 * @param name - The requested stage
 * @param context - Build context of the run
 * @param run - Run state shared across requests
 * @returns Files produced by the stages this call ran
 * @throws The first stage error, unchanged
 *
 * @public
 */
export async function executeStage(name: StageName, context: BuildContext, run: StageRun): Promise<string[]> {
	const stale = new Set(run.invalidated);
	const pending = planStages([name]).filter((stage) => {
		if (run.completed.includes(stage) && !stale.has(stage)) {
			return false;
		}
		for (const invalidated of STAGES[stage].invalidates ?? []) {
			stale.add(invalidated);
		}
		return true;
	});

	for (const stage of pending) {
		await run.checker.checkAll(STAGES[stage].prerequisites(context));
	}

	const outputs: string[] = [];
	for (const stage of pending) {
		const logger = BuildLogger.createStageLogger(stage);
		const timer = BuildLogger.createTimer();
		logger.info(`${STAGES[stage].description}...`);

		outputs.push(...(await STAGES[stage].run(context)));
		for (const invalidated of STAGES[stage].invalidates ?? []) {
			if (run.completed.includes(invalidated)) {
				run.invalidated.add(invalidated);
			}
		}
		run.invalidated.delete(stage);
		run.completed.push(stage);

		logger.ready(`completed in ${timer.format()}`);
	}
	return outputs;
}
