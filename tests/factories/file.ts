import type { ReleaseFile } from "../../src/release.js";

export const fileFactory = (overrides: Partial<ReleaseFile> = {}): ReleaseFile => {
	const name = overrides.name ?? "media.mkv";
	return {
		name,
		path: name,
		length: 0,
		absolutePath: `/tmp/${name}`,
		...overrides,
	};
};
