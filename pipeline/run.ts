import chalk from "chalk";
import fs from "node:fs/promises";
import bar from "../bar";
import { ConfigurationError } from "../errors";
import type { FaceDetector } from "../faces/detector";
import { selectWindow } from "../faces/window";
import type { ImageOps } from "../image/sharp";
import type { FilterSpec, MetadataRecord } from "../metadata/types";
import {
	type IndexEntry,
	toIndexEntry,
	writeRunIndex,
} from "../output/index-file";
import {
	type OutputConfig,
	outputFilename,
	resolveOutput,
} from "../output/resolve";
import { matches } from "../select/predicate";
import { sourceImagePath } from "../utils";

export type Outcome =
	| "skipped"
	| "linked"
	| "created"
	| "dropped"
	| "unsupported"
	| "failed";

export type RunSummary = Readonly<{
	/** Records the predicate was evaluated on */
	processedCount: number;
	/** Records now present in saveDir: written, linked or already there */
	addedCount: number;
	tally: Readonly<Record<Outcome, number>>;
}>;

export type PipelineDeps = Readonly<{
	/** Dataset root holding original/NNNN/<id>.<ext> */
	directory: string;
	images: ImageOps;
	/** Required when output.faces is set */
	detector?: FaceDetector;
}>;

const ADDED: ReadonlySet<Outcome> = new Set<Outcome>(["skipped", "linked", "created"]);

/** Still-image formats sharp decodes; zip, swf and video posts are passed over */
export const SOURCE_EXTS: ReadonlySet<string> = new Set([
	"jpg",
	"jpeg",
	"png",
	"gif",
	"webp",
	"avif",
	"tif",
	"tiff",
]);

async function createOutput(
	record: MetadataRecord,
	targetPath: ImagePath,
	output: OutputConfig,
	deps: PipelineDeps,
): Promise<"created" | "dropped"> {
	if (!record.fileExt) {
		throw new Error(`record ${record.id} has no file extension`);
	}
	const source = sourceImagePath(deps.directory, record.id, record.fileExt);
	let image = await deps.images.load(source);

	if (output.faces && deps.detector) {
		const boxes = await deps.detector.detect(image);
		const window = selectWindow(
			image.width,
			image.height,
			boxes,
			output.faceScale,
		);
		if (!window || window.width < output.minCropSize) return "dropped";
		image = await deps.images.crop(image, window);
	}

	const resized = await deps.images.resize(image, output.imgSize);
	await deps.images.save(resized, targetPath);
	return "created";
}

async function materialize(
	record: MetadataRecord,
	output: OutputConfig,
	deps: PipelineDeps,
): Promise<Outcome> {
	if (record.fileExt && !SOURCE_EXTS.has(record.fileExt.toLowerCase())) {
		return "unsupported";
	}
	const resolution = await resolveOutput(record, output);
	switch (resolution.action) {
		case "skip":
			return "skipped";
		case "link":
			await deps.images.symlink(resolution.linkSource, resolution.targetPath);
			return "linked";
		case "create":
			return await createOutput(record, resolution.targetPath, output, deps);
	}
}

/**
 * Scans records in order, materializing every match into output.saveDir until
 * maxExamples records have been added. One record is finished before the next
 * starts; a failing record is reported and the scan goes on.
 */
export async function runPipeline(
	records: readonly MetadataRecord[],
	filter: FilterSpec,
	output: OutputConfig,
	maxExamples: number,
	deps: PipelineDeps,
): Promise<RunSummary> {
	if (output.faces && !deps.detector) {
		throw new ConfigurationError("face mode needs a face detector");
	}
	await fs.mkdir(output.saveDir, { recursive: true });

	const tally: Record<Outcome, number> = {
		skipped: 0,
		linked: 0,
		created: 0,
		dropped: 0,
		unsupported: 0,
		failed: 0,
	};
	const entries: IndexEntry[] = [];
	let processedCount = 0;
	let addedCount = 0;

	const b = bar.start(records.length, { task: "Selecting images" });
	for (const record of records) {
		if (addedCount >= maxExamples) break;

		processedCount++;
		b.tick(record.id, addedCount);
		if (!matches(record, filter)) continue;

		let outcome: Outcome;
		try {
			outcome = await materialize(record, output, deps);
		} catch (err) {
			const msg = err instanceof Error ? err.message : String(err);
			console.error(chalk.red(`\nUnable to process image ${record.id}: ${msg}`));
			outcome = "failed";
		}

		tally[outcome]++;
		if (ADDED.has(outcome)) {
			addedCount++;
			entries.push(toIndexEntry(record, outputFilename(record)));
		}
	}
	b.stop(`${addedCount} added`);

	const jsonfile = await writeRunIndex(output.saveDir, entries);
	console.log(`Saved JSON metadata file: ${jsonfile}`);

	return { processedCount, addedCount, tally };
}
