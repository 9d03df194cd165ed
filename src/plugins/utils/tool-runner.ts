/**
 * External tool invocation.
 *
 * @remarks
 * Every pipeline stage is a contract around one or more external processes
 * (cargo, lipo, the binding generator, Gradle, swiftc, setuptools, pip, wasm-pack).
 * Stages never spawn processes themselves: they describe a {@link ToolInvocation}
 * and hand it to a {@link ToolRunner}, so tests can substitute a fake toolchain.
 *
 * @packageDocumentation
 */

import { spawn } from "node:child_process";
import { BuildLogger } from "./logger.js";
import { ToolFailureError } from "./pipeline-errors.js";

/**
 * One external process invocation.
 *
 * @public
 */
export interface ToolInvocation {
	/**
	 * Executable name or path.
	 */
	command: string;

	/**
	 * Arguments, passed without a shell.
	 */
	args: readonly string[];

	/**
	 * Working directory.
	 */
	cwd: string;

	/**
	 * Extra environment variables merged over the runner's base environment.
	 */
	env?: Record<string, string>;
}

/**
 * Captured output of a successful invocation.
 *
 * @public
 */
export interface ToolResult {
	stdout: string;
	stderr: string;
}

/**
 * Runs external tools.
 *
 * @remarks
 * Implementations resolve with the captured output when the tool exits 0 and reject
 * with a {@link ToolFailureError} carrying the tool's exit code otherwise.
 *
 * @public
 */
export interface ToolRunner {
	run(invocation: ToolInvocation): Promise<ToolResult>;
}

/**
 * Formats an invocation for log output.
 *
 * @example
 * ```typescript
 * formatInvocation({ command: 'cargo', args: ['build', '--release'], cwd: '.' });
 * // "cargo build --release"
 * ```
 *
 * @public
 */
export function formatInvocation(invocation: Pick<ToolInvocation, "command" | "args">): string {
	return [invocation.command, ...invocation.args].map((part) => (/\s/.test(part) ? `"${part}"` : part)).join(" ");
}

/**
 * {@link ToolRunner} backed by `child_process.spawn`.
 *
 * @remarks
 * Stdout lines are relayed to a logger tagged with the command's base name; stderr
 * is collected and logged when the tool fails. Each call blocks its caller until
 * the tool exits.
 *
 * @public
 */
export class ProcessToolRunner implements ToolRunner {
	private readonly baseEnv: NodeJS.ProcessEnv;

	/**
	 * @param baseEnv - Environment every tool inherits
	 */
	constructor(baseEnv: NodeJS.ProcessEnv = process.env) {
		this.baseEnv = baseEnv;
	}

	run(invocation: ToolInvocation): Promise<ToolResult> {
		const name = invocation.command.split(/[\\/]/).pop() ?? invocation.command;
		const logger = BuildLogger.createLogger(name);
		const display = formatInvocation(invocation);

		logger.info(display);

		return new Promise((resolve, reject) => {
			const child = spawn(invocation.command, [...invocation.args], {
				cwd: invocation.cwd,
				env: { ...this.baseEnv, ...invocation.env },
				stdio: ["inherit", "pipe", "pipe"],
				shell: false,
			});

			let stdout = "";
			let stderr = "";

			child.stdout?.on("data", (data: Buffer) => {
				const text = data.toString();
				stdout += text;
				for (const line of text.split("\n")) {
					if (line.trim()) logger.info(line.trimEnd());
				}
			});

			child.stderr?.on("data", (data: Buffer) => {
				stderr += data.toString();
			});

			child.on("close", (code, signal) => {
				if (code === 0) {
					resolve({ stdout, stderr });
					return;
				}
				logger.error(`${display} failed with ${code === null ? `signal ${signal}` : `code ${code}`}`);
				if (stderr) logger.error(stderr.trimEnd());
				reject(new ToolFailureError(display, code ?? 1, stderr));
			});

			child.on("error", (err) => {
				logger.error(`Failed to spawn ${invocation.command}: ${err.message}`);
				// 127 mirrors a shell's "command not found"
				reject(new ToolFailureError(display, 127, err.message, { cause: err }));
			});
		});
	}
}
