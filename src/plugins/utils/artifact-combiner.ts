/**
 * Multi-architecture artifact merging.
 *
 * @remarks
 * Fuses single-architecture libraries of one operating system into a universal
 * ("fat") library with `lipo`. A universal library missing an architecture crashes
 * on that architecture at runtime, so every input must be present before anything
 * is written.
 *
 * @packageDocumentation
 */

import { mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import type {
	ArtifactFormat,
	BuildContext,
	CompiledArtifact,
	Target,
	TargetArch,
	UniversalArtifact,
	UniversalGroup,
} from "../../types/builder-types.js";
import type { CrossCompiler } from "./cross-compiler.js";
import { libraryFileName } from "./cross-compiler.js";
import { FileSystemUtils } from "./file-utils.js";
import { BuildLogger } from "./logger.js";
import { CompilationFailureError, MergeInputMissingError, rethrowToolFailure } from "./pipeline-errors.js";
import { TargetMatrix } from "./target-matrix.js";

/**
 * Architecture names as reported by `lipo -archs`.
 *
 * @public
 */
export const LIPO_ARCH_NAMES: Partial<Record<TargetArch, string>> = {
	aarch64: "arm64",
	x86_64: "x86_64",
	armv7: "armv7",
	i686: "i386",
};

const virtualTarget = (group: string, member: Target): Target =>
	Object.freeze({ triple: group, os: member.os, arch: "universal" });

/**
 * Merges single-architecture artifacts into universal artifacts.
 *
 * @example
 * ```typescript
 * const combiner = new ArtifactCombiner(context, new CrossCompiler(context));
 * const universal = await combiner.combineGroup(TargetMatrix.universalGroup('darwin-universal'), 'dynamic');
 * await combiner.inspect(universal); // ["arm64", "x86_64"]
 * ```
 *
 * @public
 */
export class ArtifactCombiner {
	private readonly context: BuildContext;
	private readonly compiler: CrossCompiler;

	constructor(context: BuildContext, compiler: CrossCompiler) {
		this.context = context;
		this.compiler = compiler;
	}

	/**
	 * Deterministic path of a group's universal artifact.
	 */
	outputPath(group: string, inputs: readonly CompiledArtifact[]): string {
		const [first] = inputs;
		if (!first) {
			throw new MergeInputMissingError(`Universal artifact ${group} has no inputs`);
		}
		return join(
			this.context.targetDir,
			group,
			this.context.mode,
			libraryFileName(this.context.libraryName, first.target, first.format, this.context.platform),
		);
	}

	/**
	 * Merges artifacts into one universal artifact.
	 *
	 * @remarks
	 * Inputs are ordered by architecture before `lipo` runs, so any input order yields
	 * the same invocation and the same output.
	 *
	 * @param group - Name of the universal group (output directory)
	 * @param inputs - At least two artifacts of one format and one OS, distinct architectures
	 * @throws {@link MergeInputMissingError} when the inputs are invalid or a file is missing
	 */
	async combine(group: string, inputs: readonly CompiledArtifact[]): Promise<UniversalArtifact> {
		const logger = BuildLogger.createLogger("lipo");
		const [first] = inputs;

		if (!first || inputs.length < 2) {
			throw new MergeInputMissingError(`Universal artifact ${group} needs at least 2 inputs, got ${inputs.length}`);
		}
		for (const input of inputs) {
			if (input.format !== first.format) {
				throw new MergeInputMissingError(
					`Universal artifact ${group} mixes ${first.format} and ${input.format} inputs`,
				);
			}
			if (input.target.os !== first.target.os) {
				throw new MergeInputMissingError(
					`Universal artifact ${group} mixes ${first.target.os} and ${input.target.os} inputs`,
				);
			}
		}
		const architectures = inputs.map((input) => input.target.arch);
		if (new Set(architectures).size !== architectures.length) {
			throw new MergeInputMissingError(
				`Universal artifact ${group} has duplicate architectures: ${architectures.join(", ")}`,
			);
		}

		for (const input of inputs) {
			if (!(await FileSystemUtils.isFile(input.path))) {
				throw new MergeInputMissingError(
					`Missing ${input.target.arch} input (${input.target.triple}) for ${group}: ${input.path}`,
				);
			}
		}

		const ordered = [...inputs].sort((a, b) => a.target.arch.localeCompare(b.target.arch));
		const output = this.outputPath(group, ordered);
		await mkdir(dirname(output), { recursive: true });

		logger.info(`Merging ${ordered.map((input) => input.target.triple).join(", ")} into ${group}`);

		await rethrowToolFailure(
			() =>
				this.context.runner.run({
					command: "lipo",
					args: ["-create", "-output", output, ...ordered.map((input) => input.path)],
					cwd: this.context.crateDir,
				}),
			(failure) =>
				new CompilationFailureError(`Merging ${group} failed: ${failure.message}`, failure.exitCode, {
					cause: failure,
				}),
		);

		const architecturesInOrder: TargetArch[] = ordered.map((input) => input.target.arch);
		const universal: UniversalArtifact = Object.freeze({
			path: output,
			format: first.format,
			group,
			target: virtualTarget(group, first.target),
			architectures: Object.freeze(architecturesInOrder),
		});

		await this.verify(universal);
		return universal;
	}

	/**
	 * Checks that a universal artifact embeds every architecture it was merged from.
	 *
	 * @throws {@link MergeInputMissingError} naming the architectures lipo does not report
	 */
	async verify(universal: UniversalArtifact): Promise<void> {
		const reported = new Set(await this.inspect(universal));
		const missing = universal.architectures.filter((arch) => !reported.has(LIPO_ARCH_NAMES[arch] ?? arch));
		if (missing.length > 0) {
			throw new MergeInputMissingError(`Universal artifact ${universal.group} is missing ${missing.join(", ")}`);
		}
	}

	/**
	 * Merges the members of a fixed universal group for one format.
	 *
	 * @remarks
	 * Member artifacts are taken from their deterministic compiler output paths.
	 */
	async combineGroup(group: UniversalGroup, format: ArtifactFormat): Promise<UniversalArtifact> {
		const inputs = group.triples.map((triple) => this.compiler.artifact(TargetMatrix.find(triple), format));
		return this.combine(group.name, inputs);
	}

	/**
	 * Merges every format of a group independently.
	 *
	 * @returns One universal artifact per format, in the given format order
	 */
	async combineFormats(group: UniversalGroup, formats: readonly ArtifactFormat[]): Promise<UniversalArtifact[]> {
		const universals: UniversalArtifact[] = [];
		for (const format of formats) {
			universals.push(await this.combineGroup(group, format));
		}
		return universals;
	}

	/**
	 * Describes a group's universal artifact at its deterministic path without merging.
	 */
	universal(group: UniversalGroup, format: ArtifactFormat): CompiledArtifact {
		const inputs = group.triples.map((triple) => this.compiler.artifact(TargetMatrix.find(triple), format));
		const [first] = inputs;
		if (!first) {
			throw new MergeInputMissingError(`Universal artifact ${group.name} has no inputs`);
		}
		const artifact: CompiledArtifact = {
			path: this.outputPath(group.name, inputs),
			format,
			target: virtualTarget(group.name, first.target),
		};
		return Object.freeze(artifact);
	}

	/**
	 * Lists the architectures embedded in a library.
	 *
	 * @returns Architecture names as printed by `lipo -archs`
	 */
	async inspect(artifact: CompiledArtifact): Promise<string[]> {
		const { stdout } = await this.context.runner.run({
			command: "lipo",
			args: ["-archs", artifact.path],
			cwd: this.context.crateDir,
		});
		return stdout.trim().split(/\s+/).filter(Boolean);
	}
}
