import chalk from "chalk";
import { hideBin } from "yargs/helpers";
import yargs from "yargs/yargs";
import { buildRunConfig } from "./config";
import { createFaceApiDetector } from "./faces/detector";
import { sharpImageOps } from "./image/sharp";
import { loadMetadata } from "./metadata/load";
import { previewMatches } from "./pipeline/preview";
import { runPipeline } from "./pipeline/run";
import { secondsSince } from "./utils";

async function main() {
	const argv = await yargs(hideBin(process.argv))
		.scriptName("booru-curator")
		.option("directory", {
			alias: "d",
			type: "string",
			default: "danbooru2018",
			describe: "Dataset directory containing metadata/ and original/",
		})
		.option("metadata-dir", {
			type: "string",
			default: "metadata",
			describe: "Metadata path below the dataset directory; every file in it is loaded",
		})
		.option("save-dir", {
			type: "string",
			default: "out-images",
			describe: "Directory processed images are saved to",
		})
		.option("link-dir", {
			type: "string",
			default: "",
			describe:
				"Directory with already processed images; matching files are symlinked instead of redone",
		})
		// Filter options
		.option("required-tags", {
			alias: "r",
			type: "string",
			default: "",
			describe: "Comma-separated tags that must all be present",
		})
		.option("banned-tags", {
			alias: "b",
			type: "string",
			default: "",
			describe: "Comma-separated tags that must not be present",
		})
		.option("atleast-tags", {
			alias: "a",
			type: "string",
			default: "",
			describe: "Comma-separated tags of which at least --atleast-num must be present",
		})
		.option("atleast-num", {
			alias: "n",
			type: "number",
			default: 0,
			describe: "Minimum number of --atleast-tags required",
		})
		.option("ratings", {
			type: "string",
			default: "s,q,e",
			describe:
				'Only include images with these ratings: "s,q,e" stand for safe,questionable,explicit',
		})
		.option("score-range", {
			type: "string",
			default: "",
			describe: 'Inclusive score range "min,max"; unbounded when empty',
		})
		// Output options
		.option("img-size", {
			type: "number",
			default: 256,
			describe: "Side of the square output images",
		})
		.option("max-examples", {
			type: "number",
			describe: "Stop once this many images have been added",
		})
		.option("overwrite", {
			type: "boolean",
			default: false,
			describe: "Redo images already present in the save directory",
		})
		.option("preview", {
			type: "boolean",
			default: false,
			describe: "List matching records instead of processing them",
		})
		// Face options
		.option("faces", {
			type: "boolean",
			default: false,
			describe: "Crop each image to a square around its most confident face",
		})
		.option("face-scale", {
			type: "number",
			default: 2.5,
			describe: "Crop side as a multiple of the face box size",
		})
		.option("face-min-confidence", {
			type: "number",
			default: 0.5,
			describe: "Min confidence for face detection (0..1)",
		})
		.option("min-crop-size", {
			type: "number",
			default: 0,
			describe: "Drop face crops smaller than this many pixels (0 keeps all)",
		})
		.option("models", {
			type: "string",
			default: "models",
			describe: "Directory holding the face-api ssd_mobilenetv1 weights",
		})
		.strict()
		.help()
		.parseAsync();

	// Fails before any record is read
	const config = buildRunConfig({
		directory: argv.directory,
		metadataDir: argv["metadata-dir"],
		saveDir: argv["save-dir"],
		linkDir: argv["link-dir"],
		requiredTags: argv["required-tags"],
		bannedTags: argv["banned-tags"],
		atleastTags: argv["atleast-tags"],
		atleastNum: argv["atleast-num"],
		ratings: argv.ratings,
		scoreRange: argv["score-range"],
		imgSize: argv["img-size"],
		maxExamples: argv["max-examples"],
		overwrite: argv.overwrite,
		preview: argv.preview,
		faces: argv.faces,
		faceScale: argv["face-scale"],
		faceMinConfidence: argv["face-min-confidence"],
		minCropSize: argv["min-crop-size"],
		models: argv.models,
	});

	const { records } = await loadMetadata(config.metadataDir);

	if (config.preview) {
		previewMatches(records, config.filter, config.maxExamples, config.directory);
		return;
	}

	const detector = config.output.faces
		? await createFaceApiDetector(
				config.modelsDir,
				config.output.faceMinConfidence,
			)
		: undefined;

	const start = Date.now();
	const summary = await runPipeline(
		records,
		config.filter,
		config.output,
		config.maxExamples,
		{ directory: config.directory, images: sharpImageOps, detector },
	);

	const { tally } = summary;
	console.log(
		chalk.dim(
			`created ${tally.created}, linked ${tally.linked}, already present ${tally.skipped}, no face ${tally.dropped}, not an image ${tally.unsupported}, failed ${tally.failed}`,
		),
	);
	console.log(
		`\nProcessed ${summary.processedCount} files. Added ${summary.addedCount} images. It took ${secondsSince(start)} sec`,
	);
}

await main().catch((err) => {
	console.error(err instanceof Error ? err.message : String(err));
	process.exitCode = 1;
});
