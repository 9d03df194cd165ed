/**
 * Binding generator invocation.
 *
 * @remarks
 * The generator is an opaque tool: it introspects a compiled library's exported
 * interface and writes sources for one destination language. This module only
 * owns the contract around it (arguments, output directory, failure signal).
 *
 * @packageDocumentation
 */

import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { BindingLanguage, BindingSet, BuildContext, CompiledArtifact } from "../../types/builder-types.js";
import { FileSystemUtils } from "./file-utils.js";
import { BuildLogger } from "./logger.js";
import { GenerationFailureError, ToolFailureError } from "./pipeline-errors.js";

/**
 * Source file pattern emitted for each destination language.
 *
 * @public
 */
export const BINDING_SOURCE_PATTERNS: Record<BindingLanguage, string> = {
	kotlin: "**/*.kt",
	swift: "**/*.swift",
	python: "**/*.py",
};

/**
 * Request for one generator run.
 *
 * @public
 */
export interface GenerateBindingsRequest {
	/**
	 * Library to introspect.
	 */
	artifact: CompiledArtifact;

	/**
	 * Destination language.
	 */
	language: BindingLanguage;

	/**
	 * Absolute output directory.
	 */
	outDir: string;

	/**
	 * Let the generator run the language formatter.
	 *
	 * @defaultValue `false`
	 */
	format?: boolean;

	/**
	 * Clear `outDir` before generating, and remove it again if generation fails.
	 *
	 * @remarks
	 * Pass `false` when `outDir` also holds hand-written sources. A failed run then
	 * removes only the binding files it added.
	 *
	 * @defaultValue `true`
	 */
	clean?: boolean;
}

/**
 * Runs the binding generator through `cargo run`.
 *
 * @example
 * ```typescript
 * const generator = new BindingGenerator(context);
 * const bindings = await generator.generate({
 *   artifact: compiler.artifact(TargetMatrix.find('x86_64-linux-android'), 'dynamic'),
 *   language: 'kotlin',
 *   outDir: join(context.ffiDir, 'kotlin'),
 * });
 * ```
 *
 * @public
 */
export class BindingGenerator {
	private readonly context: BuildContext;

	constructor(context: BuildContext) {
		this.context = context;
	}

	/**
	 * Builds the generator's argument list.
	 */
	args(request: GenerateBindingsRequest): string[] {
		return [
			"run",
			"-p",
			this.context.packages.bindgen.package,
			"generate",
			"--library",
			request.artifact.path,
			"--language",
			request.language,
			...(request.format ? [] : ["--no-format"]),
			"--out-dir",
			request.outDir,
		];
	}

	/**
	 * Generates a binding set.
	 *
	 * @throws {@link GenerationFailureError} carrying the generator's exit code
	 */
	async generate(request: GenerateBindingsRequest): Promise<BindingSet> {
		const logger = BuildLogger.createLogger(this.context.packages.bindgen.package);
		const timer = BuildLogger.createTimer();
		const clean = request.clean ?? true;

		if (!(await FileSystemUtils.isFile(request.artifact.path))) {
			throw new GenerationFailureError(`Library to introspect does not exist: ${request.artifact.path}`);
		}

		if (clean) {
			await FileSystemUtils.cleanDirectory(request.outDir);
		} else {
			await mkdir(request.outDir, { recursive: true });
		}
		const existing = clean ? [] : await this.bindingFiles(request);

		logger.info(`Generating ${request.language} bindings from ${request.artifact.target.triple}...`);

		try {
			await this.context.runner.run({ command: "cargo", args: this.args(request), cwd: this.context.crateDir });
		} catch (error) {
			if (!(error instanceof ToolFailureError)) {
				throw error;
			}
			if (clean) {
				await FileSystemUtils.remove(request.outDir);
			} else {
				for (const file of await this.bindingFiles(request)) {
					if (!existing.includes(file)) {
						await FileSystemUtils.remove(join(request.outDir, file));
					}
				}
			}
			throw new GenerationFailureError(
				`Generating ${request.language} bindings failed: ${error.message}`,
				error.exitCode,
				{ cause: error },
			);
		}

		const [sources, headers, moduleMaps] = await this.listOutputs(request);

		if (sources.length === 0) {
			throw new GenerationFailureError(`Generator emitted no ${request.language} sources into ${request.outDir}`);
		}

		logger.info(`Generated ${sources.length} ${request.language} source(s) in ${timer.format()}`);

		return Object.freeze({
			language: request.language,
			artifact: request.artifact,
			outDir: request.outDir,
			sources: Object.freeze(sources),
			headers: Object.freeze(headers),
			moduleMaps: Object.freeze(moduleMaps),
		});
	}

	/**
	 * Lists sources, headers and module maps in `outDir`.
	 */
	private listOutputs(request: GenerateBindingsRequest): Promise<[string[], string[], string[]]> {
		return Promise.all([
			FileSystemUtils.listFiles(request.outDir, BINDING_SOURCE_PATTERNS[request.language]),
			FileSystemUtils.listFiles(request.outDir, "**/*.h"),
			FileSystemUtils.listFiles(request.outDir, "**/*.modulemap"),
		]);
	}

	private async bindingFiles(request: GenerateBindingsRequest): Promise<string[]> {
		return (await this.listOutputs(request)).flat();
	}
}
