/**
 * Minimal package.json shape read and written by the web module stage.
 *
 * @public
 */
export interface PackageJson {
	name?: string;
	version?: string;
	description?: string;
	main?: string;
	types?: string;
	module?: string;
	sideEffects?: boolean | string[];
	files?: string[];
	[key: string]: unknown;
}
