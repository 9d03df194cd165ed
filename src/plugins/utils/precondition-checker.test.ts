/**
 * Unit tests for toolchain precondition checks.
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { PreconditionUnsatisfiedError, ToolFailureError } from "./pipeline-errors.js";
import {
	ANDROID_NDK_HOME,
	ANDROID_SDK_ROOT,
	CARGO,
	describePrerequisiteFailure,
	LIPO,
	PreconditionChecker,
	toolPrerequisite,
} from "./precondition-checker.js";
import type { ToolInvocation, ToolResult } from "./tool-runner.js";

function stubRunner(failing: readonly string[] = []) {
	return {
		run: vi.fn(async (invocation: ToolInvocation): Promise<ToolResult> => {
			if (failing.includes(invocation.command)) {
				throw new ToolFailureError(invocation.command, 127, "not found");
			}
			return { stdout: "", stderr: "" };
		}),
	};
}

let dir: string;

beforeEach(async () => {
	dir = await mkdtemp(join(tmpdir(), "preconditions-"));
});

afterEach(async () => {
	await rm(dir, { recursive: true, force: true });
});

describe("describePrerequisiteFailure", () => {
	test("names the variable and folder of a directory prerequisite", () => {
		expect(describePrerequisiteFailure(ANDROID_NDK_HOME)).toBe(
			"Please, set the ANDROID_NDK_HOME env variable to point to your NDK folder",
		);
		expect(describePrerequisiteFailure(ANDROID_SDK_ROOT)).toBe(
			"Please, set the ANDROID_SDK_ROOT env variable to point to your SDK folder",
		);
	});

	test("names the check command of a tool prerequisite", () => {
		expect(describePrerequisiteFailure(LIPO)).toBe("lipo is required: `xcrun --find lipo` failed");
		expect(describePrerequisiteFailure(toolPrerequisite("python3", "Python"))).toBe(
			"Python is required: `python3 --version` failed",
		);
	});
});

describe("PreconditionChecker", () => {
	test("accepts a directory variable pointing at a directory", async () => {
		const checker = new PreconditionChecker({ ANDROID_NDK_HOME: dir }, stubRunner(), dir);

		await expect(checker.check(ANDROID_NDK_HOME)).resolves.toBeUndefined();
	});

	test("rejects an unset directory variable", async () => {
		const checker = new PreconditionChecker({}, stubRunner(), dir);

		await expect(checker.check(ANDROID_NDK_HOME)).rejects.toThrow(
			new PreconditionUnsatisfiedError(
				"Please, set the ANDROID_NDK_HOME env variable to point to your NDK folder",
			),
		);
	});

	test("rejects a variable pointing at a file or a missing path", async () => {
		await writeFile(join(dir, "file"), "");

		const fileChecker = new PreconditionChecker({ ANDROID_SDK_ROOT: join(dir, "file") }, stubRunner(), dir);
		const missingChecker = new PreconditionChecker({ ANDROID_SDK_ROOT: join(dir, "missing") }, stubRunner(), dir);

		await expect(fileChecker.check(ANDROID_SDK_ROOT)).rejects.toBeInstanceOf(PreconditionUnsatisfiedError);
		await expect(missingChecker.check(ANDROID_SDK_ROOT)).rejects.toBeInstanceOf(PreconditionUnsatisfiedError);
	});

	test("checks tools through the runner", async () => {
		const runner = stubRunner();
		const checker = new PreconditionChecker({}, runner, dir);

		await checker.check(CARGO);

		expect(runner.run).toHaveBeenCalledWith({ command: "cargo", args: ["--version"], cwd: dir });
	});

	test("converts a failed tool check into an unsatisfied precondition", async () => {
		const checker = new PreconditionChecker({}, stubRunner(["swiftc"]), dir);

		const failure = await checker.check(toolPrerequisite("swiftc")).catch((error: unknown) => error);

		expect(failure).toBeInstanceOf(PreconditionUnsatisfiedError);
		if (!(failure instanceof PreconditionUnsatisfiedError)) return;
		expect(failure.exitCode).toBe(1);
		expect(failure.message).toBe("swiftc is required: `swiftc --version` failed");
	});

	test("checks each prerequisite once per checker", async () => {
		const runner = stubRunner();
		const checker = new PreconditionChecker({}, runner, dir);

		await checker.checkAll([CARGO, CARGO]);
		await checker.check(CARGO);

		expect(runner.run).toHaveBeenCalledTimes(1);
	});

	test("does not share results between checkers", async () => {
		const runner = stubRunner();

		await new PreconditionChecker({}, runner, dir).check(CARGO);
		await new PreconditionChecker({}, runner, dir).check(CARGO);

		expect(runner.run).toHaveBeenCalledTimes(2);
	});

	test("stops at the first unsatisfied prerequisite", async () => {
		const runner = stubRunner();
		const checker = new PreconditionChecker({}, runner, dir);

		await expect(checker.checkAll([ANDROID_NDK_HOME, CARGO])).rejects.toBeInstanceOf(PreconditionUnsatisfiedError);
		expect(runner.run).not.toHaveBeenCalled();
	});
});
