/**
 * Fixed inventory of compilation targets.
 *
 * @remarks
 * The matrices below are a closed enumeration that covers the shipped device
 * population. Supporting a new target means adding it here; there is no runtime
 * discovery.
 *
 * @packageDocumentation
 */

import type { PlatformFamily, Target, UniversalGroup } from "../../types/builder-types.js";

const target = (value: Target): Target => Object.freeze({ ...value });

const TARGETS = {
	"aarch64-linux-android": target({
		triple: "aarch64-linux-android",
		os: "android",
		arch: "aarch64",
		androidAbi: "arm64-v8a",
	}),
	"armv7-linux-androideabi": target({
		triple: "armv7-linux-androideabi",
		os: "android",
		arch: "armv7",
		androidAbi: "armeabi-v7a",
	}),
	"i686-linux-android": target({ triple: "i686-linux-android", os: "android", arch: "i686", androidAbi: "x86" }),
	"x86_64-linux-android": target({
		triple: "x86_64-linux-android",
		os: "android",
		arch: "x86_64",
		androidAbi: "x86_64",
	}),
	"aarch64-apple-ios": target({ triple: "aarch64-apple-ios", os: "ios", arch: "aarch64" }),
	"x86_64-apple-ios": target({ triple: "x86_64-apple-ios", os: "ios", arch: "x86_64" }),
	"aarch64-apple-ios-sim": target({
		triple: "aarch64-apple-ios-sim",
		os: "ios",
		arch: "aarch64",
		variant: "simulator",
	}),
	"aarch64-apple-darwin": target({ triple: "aarch64-apple-darwin", os: "macos", arch: "aarch64" }),
	"x86_64-apple-darwin": target({ triple: "x86_64-apple-darwin", os: "macos", arch: "x86_64" }),
	"wasm32-unknown-unknown": target({ triple: "wasm32-unknown-unknown", os: "wasm", arch: "wasm32" }),
} as const satisfies Record<string, Target>;

/**
 * The host target: cargo's default target, written to `target/<mode>/`.
 *
 * @public
 */
export const HOST_TARGET: Target = target({ triple: "host", os: "host", arch: "native" });

type InventoryTriple = keyof typeof TARGETS;

const MATRIX: Record<PlatformFamily, readonly Target[]> = {
	android: Object.freeze([
		TARGETS["aarch64-linux-android"],
		TARGETS["armv7-linux-androideabi"],
		TARGETS["i686-linux-android"],
		TARGETS["x86_64-linux-android"],
	]),
	ios: Object.freeze([TARGETS["aarch64-apple-ios"], TARGETS["x86_64-apple-ios"], TARGETS["aarch64-apple-ios-sim"]]),
	darwin: Object.freeze([TARGETS["aarch64-apple-darwin"], TARGETS["x86_64-apple-darwin"]]),
	web: Object.freeze([TARGETS["wasm32-unknown-unknown"]]),
	host: Object.freeze([HOST_TARGET]),
};

const group = (name: string, triples: InventoryTriple[]): UniversalGroup =>
	Object.freeze({ name, triples: Object.freeze([...triples]) });

const UNIVERSAL_GROUPS: Record<PlatformFamily, readonly UniversalGroup[]> = {
	android: [],
	// "ios-universal" pairs the device slice with the Intel simulator slice; Apple
	// silicon simulators get their own group
	ios: Object.freeze([
		group("ios-universal", ["aarch64-apple-ios", "x86_64-apple-ios"]),
		group("ios-universal-sim", ["aarch64-apple-ios-sim", "x86_64-apple-ios"]),
	]),
	darwin: Object.freeze([group("darwin-universal", ["aarch64-apple-darwin", "x86_64-apple-darwin"])]),
	web: [],
	host: [],
};

/**
 * Static lookup of the target inventory.
 *
 * @example
 * ```typescript
 * import { TargetMatrix } from 'native-bindings-builder';
 *
 * TargetMatrix.resolve('darwin').map((t) => t.triple);
 * // ["aarch64-apple-darwin", "x86_64-apple-darwin"]
 * ```
 *
 * @public
 */
// biome-ignore lint/complexity/noStaticOnlyClass: Intentional static-only class for API organization
export class TargetMatrix {
	/**
	 * Returns the ordered targets required for a platform family.
	 */
	static resolve(family: PlatformFamily): readonly Target[] {
		return MATRIX[family];
	}

	/**
	 * Returns the universal groups formed within a platform family.
	 */
	static universalGroups(family: PlatformFamily): readonly UniversalGroup[] {
		return UNIVERSAL_GROUPS[family];
	}

	/**
	 * Looks up a universal group by name.
	 *
	 * @throws Error for an unknown group
	 */
	static universalGroup(name: string): UniversalGroup {
		for (const groups of Object.values(UNIVERSAL_GROUPS)) {
			const found = groups.find((g) => g.name === name);
			if (found) return found;
		}
		throw new Error(`Unknown universal group: ${name}`);
	}

	/**
	 * Looks up a target by triple.
	 *
	 * @throws Error for a triple outside the inventory
	 */
	static find(triple: string): Target {
		if (triple === HOST_TARGET.triple) {
			return HOST_TARGET;
		}
		const found = Object.values(TARGETS).find((t) => t.triple === triple);
		if (!found) {
			throw new Error(`Target ${triple} is not part of the target inventory`);
		}
		return found;
	}
}
