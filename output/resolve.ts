import fs from "node:fs/promises";
import path from "node:path";
import type { MetadataRecord } from "../metadata/types";

/** Outputs are always re-encoded to this format */
export const OUTPUT_EXT = "jpg";

export type OutputConfig = Readonly<{
	saveDir: string;
	/** Checked for an already processed copy before redoing work */
	linkDir?: string;
	imgSize: number;
	faces: boolean;
	faceScale: number;
	faceMinConfidence: number;
	/** Face crops with a smaller side are dropped; 0 keeps every crop */
	minCropSize: number;
	overwrite: boolean;
}>;

export type Resolution =
	| { action: "skip"; targetPath: ImagePath }
	| { action: "link"; targetPath: ImagePath; linkSource: ImagePath }
	| { action: "create"; targetPath: ImagePath };

export function outputFilename(record: MetadataRecord): string {
	return `${record.id}.${OUTPUT_EXT}`;
}

const MISSING_CODES: ReadonlySet<unknown> = new Set(["ENOENT", "ENOTDIR"]);

/**
 * Follows symlinks, so a dangling link counts as missing. Any other stat
 * failure (EACCES, EIO, ELOOP) is rethrown.
 */
export async function pathExists(p: string): Promise<boolean> {
	try {
		await fs.stat(p);
		return true;
	} catch (err) {
		if (err instanceof Error && "code" in err && MISSING_CODES.has(err.code)) {
			return false;
		}
		throw err;
	}
}

/**
 * Decides how a matching record is materialized. Only the presence of the
 * output filename is consulted, so a changed img-size or face-scale needs a
 * fresh save directory.
 */
export async function resolveOutput(
	record: MetadataRecord,
	output: OutputConfig,
): Promise<Resolution> {
	const file = outputFilename(record);
	const targetPath = path.join(output.saveDir, file);

	if (output.overwrite) return { action: "create", targetPath };

	if (await pathExists(targetPath)) return { action: "skip", targetPath };

	if (output.linkDir) {
		const linkSource = path.resolve(output.linkDir, file);
		if (await pathExists(linkSource)) {
			return { action: "link", targetPath, linkSource };
		}
	}

	return { action: "create", targetPath };
}
