/**
 * Main NativeBindingsBuilder class for releasing a native library to several ecosystems.
 *
 * @remarks
 * This module provides the primary entry point of the release pipeline. The
 * `NativeBindingsBuilder` class resolves the requested stages, runs each stage chain
 * through the build lifecycle and reports one result per requested stage.
 *
 */

import { parseArgs } from "node:util";
import type { StageRun } from "../hooks/build-lifecycle.js";
import { createBuildContext, createStageRun, executeStage, isStageName } from "../hooks/build-lifecycle.js";
import { FileSystemUtils } from "../plugins/utils/file-utils.js";
import { BuildLogger } from "../plugins/utils/logger.js";
import { PipelineError } from "../plugins/utils/pipeline-errors.js";
import type {
	BuildContext,
	BuildMode,
	BuildResult,
	NativeBindingsBuilderOptions,
	StageName,
} from "../types/builder-types.js";

/**
 * Stages and mode requested on the command line.
 *
 * @internal
 */
interface CommandLineRequest {
	stages?: StageName[];
	mode?: BuildMode;
}

/**
 * Builder that compiles a native library and assembles its platform packages.
 *
 * @remarks
 * NativeBindingsBuilder drives the pipeline stages:
 *
 * 1. **Preconditions**: SDK roots and tools are checked before anything is compiled
 * 2. **Cross-compilation**: cargo runs once per target triple
 * 3. **Universal artifacts**: Apple libraries are merged with lipo
 * 4. **Bindings**: the binding generator emits Kotlin, Swift or Python sources
 * 5. **Packaging**: Gradle, swiftc, setuptools and wasm-pack produce the distributables
 *
 * ## Command line
 *
 * | Flag                     | Effect                                   |
 * |--------------------------|------------------------------------------|
 * | `--stage <name>`         | Run a stage chain (repeatable)           |
 * | `--mode release\|debug`  | Compiler build mode (default `release`)  |
 *
 * @example
 * Basic usage in a release script:
 * ```typescript
 * import { NativeBindingsBuilder } from 'native-bindings-builder';
 *
 * export default NativeBindingsBuilder.create({
 *   libraryName: 'example_ffi',
 *   targetDir: '../../target',
 * });
 * ```
 *
 * @example
 * Running stages from the command line:
 * ```bash
 * node release.js --stage bindings-android
 * node release.js --stage swift-ios --stage swift-darwin --mode debug
 * ```
 *
 * @example
 * Programmatic usage:
 * ```typescript
 * import type { BuildResult } from 'native-bindings-builder';
 * import { NativeBindingsBuilder } from 'native-bindings-builder';
 *
 * const builder = new NativeBindingsBuilder({ libraryName: 'example_ffi' });
 * const results: BuildResult[] = await builder.run(['python']);
 * ```
 *
 * @public
 */
export class NativeBindingsBuilder {
	/**
	 * Package version read from package.json.
	 *
	 * @internal
	 */
	private static readonly VERSION: string = FileSystemUtils.builderVersion();

	/**
	 * Stages run when neither `--stage` nor `options.stages` is given.
	 */
	static readonly DEFAULT_STAGES: readonly StageName[] = ["bindings-android", "bindings-swift", "python", "web"];

	/**
	 * Default options applied to all runs.
	 */
	static readonly DEFAULT_OPTIONS: Partial<NativeBindingsBuilderOptions> = {
		targetDir: "target",
		ffiDir: "ffi",
		mode: "release",
	};

	/**
	 * Builder configuration options.
	 *
	 * @internal
	 */
	private readonly options: NativeBindingsBuilderOptions;

	/**
	 * @param options - Builder configuration options
	 */
	constructor(options: NativeBindingsBuilderOptions) {
		this.options = { ...NativeBindingsBuilder.DEFAULT_OPTIONS, ...options };
	}

	/**
	 * Creates a builder, runs the requested stages and sets `process.exitCode`.
	 *
	 * @remarks
	 * The exit code is that of the first failed stage chain (the failing tool's own
	 * exit code for tool failures), or 0 when every chain succeeded.
	 *
	 * @param options - Builder configuration options
	 * @returns One build result per requested stage
	 */
	static async create(options: NativeBindingsBuilderOptions): Promise<BuildResult[]> {
		const builder = new NativeBindingsBuilder(options);
		const results = await builder.run();
		process.exitCode = results.find((result) => !result.success)?.exitCode ?? 0;
		return results;
	}

	/**
	 * Runs stage chains in order.
	 *
	 * @remarks
	 * Stages resolve from, in order: the `stages` argument, `--stage` flags,
	 * `options.stages`, and {@link NativeBindingsBuilder.DEFAULT_STAGES}. Chains share
	 * one run, so a dependency needed by two requested stages runs once. The first
	 * failing chain stops the run; later stages are not attempted.
	 *
	 * @param stages - Stages to run
	 * @returns One result per attempted stage
	 */
	async run(stages?: StageName[]): Promise<BuildResult[]> {
		const logger = BuildLogger.createLogger("native-bindings");
		const timer = BuildLogger.createTimer();

		BuildLogger.printBanner(NativeBindingsBuilder.VERSION);

		const request = this.parseCommandLine();
		const resolvedStages = stages ?? this.resolveStages(request);
		const context = createBuildContext({ ...this.options, mode: request.mode ?? this.options.mode });
		const run = createStageRun(context);

		logger.info(`Running stages: ${resolvedStages.join(", ")} (${context.mode})`);

		const results: BuildResult[] = [];
		for (const stage of resolvedStages) {
			const result = await this.execute(stage, context, run);
			results.push(result);
			if (!result.success) {
				break;
			}
		}

		const failed = results.find((result) => !result.success);
		if (failed) {
			logger.error(`Stage ${failed.stage} failed with exit code ${failed.exitCode}`);
		} else {
			const outputs = results.flatMap((result) => result.outputs);
			BuildLogger.printFileTable(await BuildLogger.collectFileInfo(outputs, context.crateDir));
			BuildLogger.printSummary(run.completed, timer.elapsed());
		}

		return results;
	}

	/**
	 * Runs a single stage chain in a fresh run.
	 *
	 * @remarks
	 * Lower-level method without banner, command-line parsing or summary output.
	 */
	async build(stage: StageName): Promise<BuildResult> {
		const context = createBuildContext(this.options);
		return this.execute(stage, context, createStageRun(context));
	}

	/**
	 * Runs one chain and converts a failure into a failed result.
	 *
	 * @internal
	 */
	private async execute(stage: StageName, context: BuildContext, run: StageRun): Promise<BuildResult> {
		const timer = BuildLogger.createTimer();
		const completedBefore = run.completed.length;

		try {
			const outputs = await executeStage(stage, context, run);
			return {
				success: true,
				stage,
				executed: run.completed.slice(completedBefore),
				outputs,
				duration: timer.elapsed(),
				exitCode: 0,
			};
		} catch (error) {
			const errorObj = error instanceof Error ? error : new Error(String(error));
			BuildLogger.createStageLogger(stage).error(errorObj.message);
			return {
				success: false,
				stage,
				executed: run.completed.slice(completedBefore),
				outputs: [],
				duration: timer.elapsed(),
				exitCode: errorObj instanceof PipelineError ? errorObj.exitCode : 1,
				errors: [errorObj],
			};
		}
	}

	/**
	 * Reads `--stage` and `--mode` from the command line.
	 *
	 * @remarks
	 * Unknown stage names and modes are reported and ignored.
	 *
	 * @internal
	 */
	private parseCommandLine(): CommandLineRequest {
		const logger = BuildLogger.createLogger("native-bindings");
		const { values } = parseArgs({
			args: process.argv.slice(2),
			options: {
				stage: { type: "string", multiple: true },
				mode: { type: "string" },
			},
			allowPositionals: true,
			strict: false,
		});

		const request: CommandLineRequest = {};

		const stageValues = Array.isArray(values.stage) ? values.stage : [];
		const stages: StageName[] = [];
		for (const value of stageValues) {
			if (typeof value === "string" && isStageName(value)) {
				stages.push(value);
			} else {
				logger.warn(`Ignoring unknown stage: ${String(value)}`);
			}
		}
		if (stages.length > 0) {
			request.stages = stages;
		}

		const mode = values.mode;
		if (mode === "release" || mode === "debug") {
			request.mode = mode;
		} else if (mode !== undefined) {
			logger.warn(`Ignoring unknown mode: ${String(mode)}`);
		}

		return request;
	}

	/**
	 * Resolves the stages to run when none are passed to {@link NativeBindingsBuilder.run}.
	 *
	 * @internal
	 */
	private resolveStages(request: CommandLineRequest): StageName[] {
		return request.stages ?? this.options.stages ?? [...NativeBindingsBuilder.DEFAULT_STAGES];
	}
}

/**
 * Re-export types for convenience.
 */
export type {
	AndroidPackageOptions,
	BindgenOptions,
	BuildMode,
	BuildResult,
	NativeBindingsBuilderOptions,
	PythonPackageOptions,
	StageName,
	SwiftPackageOptions,
	WebModuleOptions,
} from "../types/builder-types.js";
