import fg from "fast-glob";
import path from "node:path";

/** Every file below `cwd`, sorted so shard order is stable between runs */
export async function getFilesInFolder(cwd: string): Promise<PathList> {
	const filesRel = await fg(["**/*"], {
		cwd: cwd,
		onlyFiles: true,
		unique: true,
		dot: false,
	});
	return filesRel.sort().map((f) => path.join(cwd, f));
}

/** Dataset ids are decimal integers */
export function isNumericId(id: string): boolean {
	return /^\d+$/.test(id);
}

/**
 * Dumps shard originals into 1000 buckets by id, e.g. id 123456 with ext "jpg"
 * lives at original/0456/123456.jpg
 */
export function sourceImagePath(
	directory: string,
	id: string,
	fileExt: string,
): ImagePath {
	if (!isNumericId(id)) {
		throw new Error(`id "${id}" is not numeric, no source bucket`);
	}
	const bucket = Number.parseInt(id.slice(-3), 10);
	return path.join(
		directory,
		"original",
		String(bucket).padStart(4, "0"),
		`${id}.${fileExt}`,
	);
}

export function secondsSince(startMs: number, nowMs = Date.now()): string {
	return ((nowMs - startMs) / 1000).toFixed(2);
}
