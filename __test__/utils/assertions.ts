/**
 * Test assertion helpers shared by unit and e2e tests.
 */

import { expect } from "vitest";
import { FileSystemUtils } from "../../src/plugins/utils/file-utils.js";
import type { BuildResult } from "../../src/types/builder-types.js";
import type { FakeToolchain } from "./fake-toolchain.js";

/** Assert that a stage chain succeeded with exit code 0. */
export function assertStageSucceeded(result: BuildResult | undefined): void {
	expect(result?.errors).toBeUndefined();
	expect(result?.success).toBe(true);
	expect(result?.exitCode).toBe(0);
}

/** Assert that a stage chain failed with a specific error kind and exit code. */
export function assertStageFailed(result: BuildResult | undefined, errorName: string, exitCode: number): void {
	expect(result?.success).toBe(false);
	expect(result?.exitCode).toBe(exitCode);
	expect(result?.errors?.[0]?.name).toBe(errorName);
}

/** Assert that a file exists. */
export async function assertFileExists(path: string): Promise<void> {
	expect(await FileSystemUtils.isFile(path)).toBe(true);
}

/** Assert that a file does NOT exist. */
export async function assertFileNotExists(path: string): Promise<void> {
	expect(await FileSystemUtils.isFile(path)).toBe(false);
}

/** Assert that the toolchain ran a command line. */
export function assertInvoked(toolchain: FakeToolchain, commandLine: string): void {
	expect(toolchain.commands()).toContain(commandLine);
}

/** Assert that no invocation ran a command. */
export function assertNotInvoked(toolchain: FakeToolchain, command: string): void {
	expect(toolchain.invocations.filter((invocation) => invocation.command === command)).toEqual([]);
}
