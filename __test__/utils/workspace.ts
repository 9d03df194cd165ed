/**
 * Test utility for isolated crate workspaces.
 *
 * Creates a temporary crate layout (crate dir, cargo target dir, SDK roots and the
 * hand-written parts of each platform project) wired to a {@link FakeToolchain}.
 */

import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createBuildContext } from "../../src/hooks/build-lifecycle.js";
import type { BuildContext, BuildMode, NativeBindingsBuilderOptions } from "../../src/types/builder-types.js";
import { FakeToolchain } from "./fake-toolchain.js";

/** Library name used by every workspace. */
export const LIBRARY_NAME = "example_ffi";

/** A temporary crate workspace. */
export interface TestWorkspace {
	/** Temporary root holding everything below. */
	root: string;
	/** Crate directory. */
	crateDir: string;
	/** Cargo target directory (`<root>/target`, shared like a cargo workspace). */
	targetDir: string;
	/** Builder options pointing at the workspace. */
	options: NativeBindingsBuilderOptions;
	/** Fake toolchain receiving every invocation. */
	toolchain: FakeToolchain;
	/** Build context resolved from `options`. */
	context: BuildContext;
	/** Removes the workspace. */
	cleanup: () => Promise<void>;
}

/** Options for {@link createWorkspace}. */
export interface WorkspaceOptions {
	/** Host platform simulated by the workspace. */
	platform?: NodeJS.Platform;
	/** Build mode directory the fake compiler writes to. */
	mode?: BuildMode;
	/** Leave the SDK root variables unset. */
	withoutSdks?: boolean;
	/** Extra builder options. */
	builderOptions?: Partial<NativeBindingsBuilderOptions>;
}

/**
 * Creates a workspace in the system temp directory.
 */
export async function createWorkspace(options: WorkspaceOptions = {}): Promise<TestWorkspace> {
	const root = await mkdtemp(join(tmpdir(), "native-bindings-"));
	const crateDir = join(root, "crate");
	const targetDir = join(root, "target");
	const platform = options.platform ?? "linux";

	const env: NodeJS.ProcessEnv = {};
	if (!options.withoutSdks) {
		env.ANDROID_NDK_HOME = join(root, "ndk");
		env.ANDROID_SDK_ROOT = join(root, "sdk");
		await mkdir(env.ANDROID_NDK_HOME, { recursive: true });
		await mkdir(env.ANDROID_SDK_ROOT, { recursive: true });
	}

	await mkdir(join(crateDir, "bindings-android", "lib"), { recursive: true });
	await mkdir(join(crateDir, "bindings-swift", `${LIBRARY_NAME}FFI.xcframework`), { recursive: true });
	await writeFile(join(crateDir, "bindings-swift", `${LIBRARY_NAME}FFI.xcframework`, "Info.plist"), "<plist/>\n");
	await mkdir(join(crateDir, "bindings-python", "src", LIBRARY_NAME), { recursive: true });
	await writeFile(join(crateDir, "bindings-python", "requirements.txt"), "wheel\n");
	await writeFile(join(crateDir, "bindings-python", "src", LIBRARY_NAME, "__init__.py"), "from .example_ffi import *\n");

	const toolchain = new FakeToolchain({
		targetDir,
		libraryName: LIBRARY_NAME,
		platform,
		mode: options.mode ?? "release",
	});
	const builderOptions: NativeBindingsBuilderOptions = {
		libraryName: LIBRARY_NAME,
		crateDir,
		targetDir: "../target",
		env,
		platform,
		runner: toolchain,
		...options.builderOptions,
	};

	return {
		root,
		crateDir,
		targetDir,
		options: builderOptions,
		toolchain,
		context: createBuildContext(builderOptions),
		cleanup: () => rm(root, { recursive: true, force: true }),
	};
}

/** Reads a workspace file as text. */
export function readWorkspaceFile(workspace: TestWorkspace, ...segments: string[]): Promise<string> {
	return readFile(join(workspace.root, ...segments), "utf-8");
}
