import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { FilterSpec, MetadataRecord, Rating } from "../metadata/types";
import type { OutputConfig } from "../output/resolve";

export function makeRecord(
	id: string,
	tags: readonly string[],
	extra: Partial<MetadataRecord> = {},
): MetadataRecord {
	return {
		id,
		rating: "s",
		score: 3,
		tags: new Set(tags),
		fileExt: "png",
		imageWidth: 64,
		imageHeight: 48,
		...extra,
	};
}

export function makeFilter(overrides: Partial<FilterSpec> = {}): FilterSpec {
	return {
		requiredTags: new Set<string>(),
		bannedTags: new Set<string>(),
		atleastTags: new Set<string>(),
		atleastNum: 0,
		ratings: new Set<Rating>(),
		...overrides,
	};
}

export function makeOutput(
	saveDir: string,
	overrides: Partial<OutputConfig> = {},
): OutputConfig {
	return {
		saveDir,
		imgSize: 16,
		faces: false,
		faceScale: 2,
		faceMinConfidence: 0.5,
		minCropSize: 0,
		overwrite: false,
		...overrides,
	};
}

export async function makeTempDir(): Promise<string> {
	return await fs.mkdtemp(path.join(os.tmpdir(), "booru-curator-"));
}
