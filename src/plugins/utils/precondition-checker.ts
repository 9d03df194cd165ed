/**
 * Toolchain precondition checks.
 *
 * @remarks
 * Runs before any stage work so a missing SDK root fails the pipeline before a
 * single target is compiled.
 *
 * @packageDocumentation
 */

import type { ToolchainPrerequisite } from "../../types/builder-types.js";
import { FileSystemUtils } from "./file-utils.js";
import { BuildLogger } from "./logger.js";
import { PreconditionUnsatisfiedError, ToolFailureError } from "./pipeline-errors.js";
import type { ToolRunner } from "./tool-runner.js";

/**
 * Android NDK root, required to cross-compile the Android matrix.
 *
 * @public
 */
export const ANDROID_NDK_HOME: ToolchainPrerequisite = {
	kind: "directory",
	env: "ANDROID_NDK_HOME",
	description: "NDK",
};

/**
 * Android SDK root, required by Gradle to assemble the archive.
 *
 * @public
 */
export const ANDROID_SDK_ROOT: ToolchainPrerequisite = {
	kind: "directory",
	env: "ANDROID_SDK_ROOT",
	description: "SDK",
};

/**
 * Native compiler driver.
 *
 * @public
 */
export const CARGO: ToolchainPrerequisite = {
	kind: "tool",
	command: "cargo",
	args: ["--version"],
	description: "cargo",
};

/**
 * Apple's multi-architecture tool, located through `xcrun`.
 *
 * @public
 */
export const LIPO: ToolchainPrerequisite = {
	kind: "tool",
	command: "xcrun",
	args: ["--find", "lipo"],
	description: "lipo",
};

/**
 * Swift compiler.
 *
 * @public
 */
export const SWIFTC: ToolchainPrerequisite = {
	kind: "tool",
	command: "swiftc",
	args: ["--version"],
	description: "swiftc",
};

/**
 * wasm-bindgen packaging tool.
 *
 * @public
 */
export const WASM_PACK: ToolchainPrerequisite = {
	kind: "tool",
	command: "wasm-pack",
	args: ["--version"],
	description: "wasm-pack",
};

/**
 * Builds a prerequisite for a configurable executable (e.g. the Python interpreter).
 *
 * @public
 */
export function toolPrerequisite(command: string, description: string = command): ToolchainPrerequisite {
	return { kind: "tool", command, args: ["--version"], description };
}

/**
 * Returns the message shown when a prerequisite is not satisfied.
 *
 * @example
 * ```typescript
 * describePrerequisiteFailure(ANDROID_NDK_HOME);
 * // "Please, set the ANDROID_NDK_HOME env variable to point to your NDK folder"
 * ```
 *
 * @public
 */
export function describePrerequisiteFailure(prerequisite: ToolchainPrerequisite): string {
	if (prerequisite.kind === "directory") {
		return `Please, set the ${prerequisite.env} env variable to point to your ${prerequisite.description} folder`;
	}
	return `${prerequisite.description} is required: \`${[prerequisite.command, ...prerequisite.args].join(" ")}\` failed`;
}

/**
 * Verifies toolchain prerequisites for one builder run.
 *
 * @remarks
 * A checker lives for exactly one run: each prerequisite is checked at most once per
 * run and results are never carried over to the next run.
 *
 * @public
 */
export class PreconditionChecker {
	private readonly env: NodeJS.ProcessEnv;
	private readonly runner: ToolRunner;
	private readonly cwd: string;
	private readonly satisfied = new Set<string>();

	constructor(env: NodeJS.ProcessEnv, runner: ToolRunner, cwd: string) {
		this.env = env;
		this.runner = runner;
		this.cwd = cwd;
	}

	/**
	 * Checks one prerequisite.
	 *
	 * @throws {@link PreconditionUnsatisfiedError} when the prerequisite is not met
	 */
	async check(prerequisite: ToolchainPrerequisite): Promise<void> {
		const key = prerequisite.kind === "directory" ? `env:${prerequisite.env}` : `tool:${prerequisite.command}`;
		if (this.satisfied.has(key)) {
			return;
		}

		if (prerequisite.kind === "directory") {
			const path = this.env[prerequisite.env];
			if (!path || !(await FileSystemUtils.isDirectory(path))) {
				BuildLogger.createLogger("preconditions").error(describePrerequisiteFailure(prerequisite));
				throw new PreconditionUnsatisfiedError(describePrerequisiteFailure(prerequisite));
			}
		} else {
			try {
				await this.runner.run({ command: prerequisite.command, args: prerequisite.args, cwd: this.cwd });
			} catch (error) {
				if (error instanceof ToolFailureError) {
					throw new PreconditionUnsatisfiedError(describePrerequisiteFailure(prerequisite));
				}
				throw error;
			}
		}

		this.satisfied.add(key);
	}

	/**
	 * Checks prerequisites in order, stopping at the first unsatisfied one.
	 */
	async checkAll(prerequisites: readonly ToolchainPrerequisite[]): Promise<void> {
		for (const prerequisite of prerequisites) {
			await this.check(prerequisite);
		}
	}
}
