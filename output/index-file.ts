import fs from "node:fs/promises";
import path from "node:path";
import type { MetadataRecord } from "../metadata/types";

export const INDEX_FILE = "index.json";

export type IndexEntry = {
	id: string;
	rating: string | null;
	score: number | null;
	tags: string[];
	file_ext: string | null;
	image_width: number | null;
	image_height: number | null;
	filename: string;
};

export function toIndexEntry(
	record: MetadataRecord,
	filename: string,
): IndexEntry {
	return {
		id: record.id,
		rating: record.rating ?? null,
		score: record.score ?? null,
		tags: [...(record.tags ?? [])].sort(),
		file_ext: record.fileExt ?? null,
		image_width: record.imageWidth ?? null,
		image_height: record.imageHeight ?? null,
		filename,
	};
}

/** Replaces saveDir/index.json with the records added by this run */
export async function writeRunIndex(
	saveDir: string,
	entries: readonly IndexEntry[],
): Promise<string> {
	const jsonfile = path.join(saveDir, INDEX_FILE);
	await fs.writeFile(jsonfile, JSON.stringify({ data: entries }), "utf8");
	return jsonfile;
}
