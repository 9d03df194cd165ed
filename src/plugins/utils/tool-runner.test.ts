/**
 * Unit tests for external tool invocation.
 */

import { tmpdir } from "node:os";
import { describe, expect, test } from "vitest";
import { ToolFailureError } from "./pipeline-errors.js";
import { formatInvocation, ProcessToolRunner } from "./tool-runner.js";

describe("formatInvocation", () => {
	test("joins command and arguments", () => {
		expect(formatInvocation({ command: "cargo", args: ["build", "--release"] })).toBe("cargo build --release");
	});

	test("quotes arguments containing whitespace", () => {
		expect(formatInvocation({ command: "lipo", args: ["-archs", "/tmp/my lib.a"] })).toBe(
			'lipo -archs "/tmp/my lib.a"',
		);
	});
});

describe("ProcessToolRunner", () => {
	const runner = new ProcessToolRunner({ ...process.env, BASE_VALUE: "base" });

	test("captures stdout of a successful tool", async () => {
		const result = await runner.run({
			command: process.execPath,
			args: ["-e", "process.stdout.write('arm64 x86_64\\n')"],
			cwd: tmpdir(),
		});

		expect(result.stdout).toBe("arm64 x86_64\n");
	});

	test("merges invocation env over the base env", async () => {
		const result = await runner.run({
			command: process.execPath,
			args: ["-e", "process.stdout.write(process.env.BASE_VALUE + ':' + process.env.WASM_BINDGEN_WEAKREF)"],
			cwd: tmpdir(),
			env: { WASM_BINDGEN_WEAKREF: "1" },
		});

		expect(result.stdout).toBe("base:1");
	});

	test("rejects with the tool's exit code and stderr", async () => {
		const failure = await runner
			.run({
				command: process.execPath,
				args: ["-e", "process.stderr.write('boom'); process.exit(3)"],
				cwd: tmpdir(),
			})
			.catch((error: unknown) => error);

		expect(failure).toBeInstanceOf(ToolFailureError);
		if (!(failure instanceof ToolFailureError)) return;
		expect(failure.exitCode).toBe(3);
		expect(failure.stderr).toBe("boom");
		expect(failure.kind).toBe("ToolFailure");
	});

	test("rejects with 127 when the command cannot be spawned", async () => {
		const failure = await runner
			.run({ command: "definitely-not-a-real-tool-xyz", args: [], cwd: tmpdir() })
			.catch((error: unknown) => error);

		expect(failure).toBeInstanceOf(ToolFailureError);
		if (!(failure instanceof ToolFailureError)) return;
		expect(failure.exitCode).toBe(127);
		expect(failure.command).toBe("definitely-not-a-real-tool-xyz");
	});
});
