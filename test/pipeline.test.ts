import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import { test } from "node:test";
import { ConfigurationError } from "../errors";
import type { FaceDetector } from "../faces/detector";
import type { CropWindow, FaceBox } from "../faces/window";
import type { ImageOps, RawImage } from "../image/sharp";
import { runPipeline } from "../pipeline/run";
import { makeFilter, makeOutput, makeRecord, makeTempDir } from "./helpers";

const DATASET = "/dataset";

function rawImage(width: number, height: number): RawImage {
	return { data: Buffer.alloc(width * height * 3), width, height, channels: 3 };
}

/** Writes a marker file instead of pixels; unknown paths load as 100x80 */
function fakeImageOps(
	sizes: Record<string, readonly [number, number]> = {},
	missing: ReadonlySet<string> = new Set(),
) {
	const loaded: string[] = [];
	const crops: CropWindow[] = [];
	const ops: ImageOps = {
		async load(filePath) {
			loaded.push(filePath);
			if (missing.has(filePath)) throw new Error(`ENOENT: ${filePath}`);
			const [w, h] = sizes[filePath] ?? [100, 80];
			return rawImage(w, h);
		},
		async crop(_image, window) {
			crops.push(window);
			return rawImage(window.width, window.height);
		},
		async resize(_image, size) {
			return rawImage(size, size);
		},
		async save(image, filePath) {
			await fs.writeFile(filePath, `${image.width}x${image.height}`);
		},
		async symlink(existingPath, newPath) {
			await fs.symlink(existingPath, newPath);
		},
	};
	return { ops, loaded, crops };
}

const source = (id: string) =>
	path.join(DATASET, "original", id.padStart(4, "0"), `${id}.png`);

test("a rerun skips outputs from an earlier run and only creates new ones", async () => {
	const saveDir = await makeTempDir();
	await fs.writeFile(path.join(saveDir, "1.jpg"), "old");
	await fs.writeFile(path.join(saveDir, "2.jpg"), "old");
	const { ops, loaded } = fakeImageOps();
	const records = ["1", "2", "3"].map((id) => makeRecord(id, ["cat"]));

	const summary = await runPipeline(
		records,
		makeFilter({ requiredTags: new Set(["cat"]) }),
		makeOutput(saveDir),
		Number.POSITIVE_INFINITY,
		{ directory: DATASET, images: ops },
	);

	assert.equal(summary.processedCount, 3);
	assert.equal(summary.addedCount, 3);
	assert.deepEqual(summary.tally, {
		skipped: 2,
		linked: 0,
		created: 1,
		dropped: 0,
		unsupported: 0,
		failed: 0,
	});
	assert.deepEqual(loaded, [source("3")]);
	assert.equal(await fs.readFile(path.join(saveDir, "1.jpg"), "utf8"), "old");
	assert.equal(await fs.readFile(path.join(saveDir, "3.jpg"), "utf8"), "16x16");
});

test("a rerun counts only earlier outputs when the new record does not match", async () => {
	const saveDir = await makeTempDir();
	await fs.writeFile(path.join(saveDir, "1.jpg"), "old");
	await fs.writeFile(path.join(saveDir, "2.jpg"), "old");
	const { ops } = fakeImageOps();
	const records = [
		makeRecord("1", ["cat"]),
		makeRecord("2", ["cat"]),
		makeRecord("3", ["dog"]),
	];

	const summary = await runPipeline(
		records,
		makeFilter({ requiredTags: new Set(["cat"]) }),
		makeOutput(saveDir),
		Number.POSITIVE_INFINITY,
		{ directory: DATASET, images: ops },
	);

	assert.equal(summary.processedCount, 3);
	assert.equal(summary.addedCount, 2);
});

test("scanning stops once maxExamples records are added", async () => {
	const saveDir = await makeTempDir();
	const { ops } = fakeImageOps();
	const records = ["1", "2", "3", "4", "5"].map((id) => makeRecord(id, []));

	const summary = await runPipeline(
		records,
		makeFilter(),
		makeOutput(saveDir),
		2,
		{ directory: DATASET, images: ops },
	);

	assert.equal(summary.addedCount, 2);
	assert.equal(summary.processedCount, 2);
	const written = (await fs.readdir(saveDir)).filter((f) => f.endsWith(".jpg"));
	assert.deepEqual(written.sort(), ["1.jpg", "2.jpg"]);
});

test("maxExamples of zero processes nothing", async () => {
	const saveDir = await makeTempDir();
	const { ops, loaded } = fakeImageOps();

	const summary = await runPipeline(
		[makeRecord("1", [])],
		makeFilter(),
		makeOutput(saveDir),
		0,
		{ directory: DATASET, images: ops },
	);

	assert.equal(summary.processedCount, 0);
	assert.equal(summary.addedCount, 0);
	assert.deepEqual(loaded, []);
});

test("non-matching records count as processed only", async () => {
	const saveDir = await makeTempDir();
	const { ops } = fakeImageOps();
	const records = [makeRecord("1", ["photo"]), makeRecord("2", ["drawing"])];

	const summary = await runPipeline(
		records,
		makeFilter({ bannedTags: new Set(["photo"]) }),
		makeOutput(saveDir),
		Number.POSITIVE_INFINITY,
		{ directory: DATASET, images: ops },
	);

	assert.equal(summary.processedCount, 2);
	assert.equal(summary.addedCount, 1);
});

test("copies in the link directory are symlinked instead of redone", async () => {
	const saveDir = await makeTempDir();
	const linkDir = await makeTempDir();
	await fs.writeFile(path.join(linkDir, "1.jpg"), "linked");
	const { ops, loaded } = fakeImageOps();

	const summary = await runPipeline(
		[makeRecord("1", [])],
		makeFilter(),
		makeOutput(saveDir, { linkDir }),
		Number.POSITIVE_INFINITY,
		{ directory: DATASET, images: ops },
	);

	assert.equal(summary.tally.linked, 1);
	assert.equal(summary.addedCount, 1);
	assert.deepEqual(loaded, []);
	const target = path.join(saveDir, "1.jpg");
	assert.equal((await fs.lstat(target)).isSymbolicLink(), true);
	assert.equal(await fs.readlink(target), path.join(linkDir, "1.jpg"));
});

test("face mode crops around the face and drops images without one", async () => {
	const saveDir = await makeTempDir();
	const { ops, crops } = fakeImageOps({ [source("1")]: [50, 50] });
	// Only the default 100x80 image has a face
	const detector: FaceDetector = {
		async detect(image): Promise<FaceBox[]> {
			return image.width === 100
				? [{ x: 40, y: 30, width: 10, height: 20, confidence: 0.9 }]
				: [];
		},
	};

	const summary = await runPipeline(
		[makeRecord("1", []), makeRecord("2", [])],
		makeFilter(),
		makeOutput(saveDir, { faces: true, faceScale: 2 }),
		Number.POSITIVE_INFINITY,
		{ directory: DATASET, images: ops, detector },
	);

	assert.equal(summary.processedCount, 2);
	assert.equal(summary.addedCount, 1);
	assert.equal(summary.tally.dropped, 1);
	assert.deepEqual(crops, [{ x: 25, y: 20, width: 40, height: 40 }]);
	const written = (await fs.readdir(saveDir)).filter((f) => f.endsWith(".jpg"));
	assert.deepEqual(written, ["2.jpg"]);
});

test("face crops below minCropSize are dropped", async () => {
	const saveDir = await makeTempDir();
	const { ops } = fakeImageOps();
	const detector: FaceDetector = {
		async detect() {
			return [{ x: 40, y: 30, width: 10, height: 20, confidence: 0.9 }];
		},
	};

	const summary = await runPipeline(
		[makeRecord("1", [])],
		makeFilter(),
		makeOutput(saveDir, { faces: true, faceScale: 2, minCropSize: 50 }),
		Number.POSITIVE_INFINITY,
		{ directory: DATASET, images: ops, detector },
	);

	assert.equal(summary.addedCount, 0);
	assert.equal(summary.tally.dropped, 1);
});

test("an unreadable source fails that record and the run goes on", async () => {
	const saveDir = await makeTempDir();
	const { ops } = fakeImageOps({}, new Set([source("1")]));

	const summary = await runPipeline(
		[makeRecord("1", []), makeRecord("2", [])],
		makeFilter(),
		makeOutput(saveDir),
		Number.POSITIVE_INFINITY,
		{ directory: DATASET, images: ops },
	);

	assert.equal(summary.processedCount, 2);
	assert.equal(summary.addedCount, 1);
	assert.equal(summary.tally.failed, 1);
});

test("zip and video posts are tallied as unsupported and never loaded", async () => {
	const saveDir = await makeTempDir();
	const { ops, loaded } = fakeImageOps();

	const summary = await runPipeline(
		[
			makeRecord("1", [], { fileExt: "zip" }),
			makeRecord("2", [], { fileExt: "webm" }),
			makeRecord("3", [], { fileExt: "PNG" }),
		],
		makeFilter(),
		makeOutput(saveDir),
		Number.POSITIVE_INFINITY,
		{ directory: DATASET, images: ops },
	);

	assert.equal(summary.processedCount, 3);
	assert.equal(summary.addedCount, 1);
	assert.equal(summary.tally.unsupported, 2);
	assert.equal(summary.tally.created, 1);
	assert.deepEqual(loaded, [
		path.join(DATASET, "original", "0003", "3.PNG"),
	]);
});

test("a non-numeric id fails that record instead of guessing a bucket", async () => {
	const saveDir = await makeTempDir();
	const { ops, loaded } = fakeImageOps();

	const summary = await runPipeline(
		[makeRecord("abc", []), makeRecord("2", [])],
		makeFilter(),
		makeOutput(saveDir),
		Number.POSITIVE_INFINITY,
		{ directory: DATASET, images: ops },
	);

	assert.equal(summary.tally.failed, 1);
	assert.equal(summary.addedCount, 1);
	assert.deepEqual(loaded, [source("2")]);
});

test("an unreadable output path fails the record rather than redoing it", async () => {
	const saveDir = await makeTempDir();
	const looped = path.join(saveDir, "1.jpg");
	await fs.symlink(looped, looped);
	const { ops, loaded } = fakeImageOps();

	const summary = await runPipeline(
		[makeRecord("1", [])],
		makeFilter(),
		makeOutput(saveDir),
		Number.POSITIVE_INFINITY,
		{ directory: DATASET, images: ops },
	);

	assert.equal(summary.tally.failed, 1);
	assert.equal(summary.addedCount, 0);
	assert.deepEqual(loaded, []);
});

test("face mode without a detector is a configuration error", async () => {
	const saveDir = await makeTempDir();
	const { ops } = fakeImageOps();

	await assert.rejects(
		runPipeline(
			[makeRecord("1", [])],
			makeFilter(),
			makeOutput(saveDir, { faces: true }),
			1,
			{ directory: DATASET, images: ops },
		),
		ConfigurationError,
	);
});

test("index.json lists every added record", async () => {
	const saveDir = await makeTempDir();
	await fs.writeFile(path.join(saveDir, "1.jpg"), "old");
	const { ops } = fakeImageOps();

	await runPipeline(
		[
			makeRecord("1", ["b", "a"], { score: 7 }),
			makeRecord("2", ["c"], { rating: "q" }),
		],
		makeFilter(),
		makeOutput(saveDir),
		Number.POSITIVE_INFINITY,
		{ directory: DATASET, images: ops },
	);

	const index: unknown = JSON.parse(
		await fs.readFile(path.join(saveDir, "index.json"), "utf8"),
	);
	assert.deepEqual(index, {
		data: [
			{
				id: "1",
				rating: "s",
				score: 7,
				tags: ["a", "b"],
				file_ext: "png",
				image_width: 64,
				image_height: 48,
				filename: "1.jpg",
			},
			{
				id: "2",
				rating: "q",
				score: 3,
				tags: ["c"],
				file_ext: "png",
				image_width: 64,
				image_height: 48,
				filename: "2.jpg",
			},
		],
	});
});
