/**
 * Error taxonomy of the release pipeline.
 *
 * @remarks
 * Every failure is fatal. Errors carry the exit code the process should end with,
 * which for tool failures is the exit code of the external tool itself.
 *
 * @packageDocumentation
 */

/**
 * Kinds of pipeline failure.
 *
 * @public
 */
export type PipelineErrorKind =
	| "PreconditionUnsatisfied"
	| "CompilationFailure"
	| "MergeInputMissing"
	| "GenerationFailure"
	| "PackagingToolFailure"
	| "TransformPatternMismatch"
	| "ToolFailure";

/**
 * Base class of all pipeline errors.
 *
 * @public
 */
export class PipelineError extends Error {
	readonly kind: PipelineErrorKind;
	readonly exitCode: number;

	constructor(kind: PipelineErrorKind, message: string, exitCode = 1, options?: { cause?: unknown }) {
		super(message, options);
		this.name = `${kind}Error`;
		this.kind = kind;
		// A tool killed by a signal reports no code; never surface 0 for a failure.
		this.exitCode = exitCode === 0 ? 1 : exitCode;
	}
}

/**
 * Raised by the tool runner when an external process fails to spawn or exits non-zero.
 *
 * @public
 */
export class ToolFailureError extends PipelineError {
	readonly command: string;
	readonly stderr: string;

	constructor(command: string, exitCode: number, stderr = "", options?: { cause?: unknown }) {
		super("ToolFailure", `${command} exited with code ${exitCode}`, exitCode, options);
		this.command = command;
		this.stderr = stderr;
	}
}

/**
 * A required SDK root, compiler target or tool is not available.
 *
 * @public
 */
export class PreconditionUnsatisfiedError extends PipelineError {
	constructor(message: string) {
		super("PreconditionUnsatisfied", message, 1);
	}
}

/**
 * The native compiler failed or did not produce an expected artifact.
 *
 * @public
 */
export class CompilationFailureError extends PipelineError {
	constructor(message: string, exitCode = 1, options?: { cause?: unknown }) {
		super("CompilationFailure", message, exitCode, options);
	}
}

/**
 * A universal artifact cannot be formed from the given inputs.
 *
 * @public
 */
export class MergeInputMissingError extends PipelineError {
	constructor(message: string, exitCode = 1, options?: { cause?: unknown }) {
		super("MergeInputMissing", message, exitCode, options);
	}
}

/**
 * The binding generator failed.
 *
 * @public
 */
export class GenerationFailureError extends PipelineError {
	constructor(message: string, exitCode = 1, options?: { cause?: unknown }) {
		super("GenerationFailure", message, exitCode, options);
	}
}

/**
 * A platform packager (Gradle, swiftc, setuptools, pip, wasm-pack) failed.
 *
 * @public
 */
export class PackagingToolFailureError extends PipelineError {
	constructor(message: string, exitCode = 1, options?: { cause?: unknown }) {
		super("PackagingToolFailure", message, exitCode, options);
	}
}

/**
 * A loader rewrite pattern did not match the generated loader source.
 *
 * @remarks
 * Only raised when strict pattern checking is enabled; otherwise the mismatch is
 * reported as a warning.
 *
 * @public
 */
export class TransformPatternMismatchError extends PipelineError {
	constructor(message: string) {
		super("TransformPatternMismatch", message, 1);
	}
}

/**
 * Runs a tool step and re-raises a {@link ToolFailureError} as the given stage error.
 *
 * @param step - The tool invocation
 * @param wrap - Builds the stage error from the tool failure
 * @returns The step's result
 *
 * @internal
 */
export async function rethrowToolFailure<T>(
	step: () => Promise<T>,
	wrap: (failure: ToolFailureError) => PipelineError,
): Promise<T> {
	try {
		return await step();
	} catch (error) {
		if (error instanceof ToolFailureError) {
			throw wrap(error);
		}
		throw error;
	}
}
