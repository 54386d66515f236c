import chalk from "chalk";
import fs from "node:fs";
import path from "node:path";
import readline from "node:readline";
import { z } from "zod";
import { getFilesInFolder } from "../utils";
import { isRating, type MetadataRecord, type Rating } from "./types";

const tagSchema = z.union([
	z.string(),
	z.object({ name: z.string() }).transform((t) => t.name),
]);

// A field that fails to parse becomes undefined instead of rejecting the line
const recordLineSchema = z.object({
	id: z.union([z.string().min(1), z.number().int()]).transform(String),
	rating: z.string().optional().catch(undefined),
	score: z.union([z.number(), z.string()]).optional().catch(undefined),
	file_ext: z.string().min(1).optional().catch(undefined),
	image_width: z.coerce.number().int().positive().optional().catch(undefined),
	image_height: z.coerce.number().int().positive().optional().catch(undefined),
	tags: z.union([z.array(tagSchema), z.string()]).optional().catch(undefined),
});

const RATING_WORDS: ReadonlyMap<string, Rating> = new Map<string, Rating>([
	["safe", "s"],
	["questionable", "q"],
	["explicit", "e"],
]);

export function normalizeRating(value: string | undefined): Rating | undefined {
	if (value === undefined) return undefined;
	const v = value.trim().toLowerCase();
	if (isRating(v)) return v;
	return RATING_WORDS.get(v);
}

function normalizeScore(value: number | string | undefined): number | undefined {
	if (value === undefined) return undefined;
	if (typeof value === "string" && value.trim() === "") return undefined;
	const n = typeof value === "number" ? value : Number(value);
	return Number.isInteger(n) ? n : undefined;
}

function normalizeTags(
	value: readonly string[] | string | undefined,
): ReadonlySet<string> | undefined {
	if (value === undefined) return undefined;
	const list = typeof value === "string" ? value.split(/\s+/) : value;
	return new Set(list.filter((t) => t.length > 0));
}

/** Parses one JSON line of a metadata shard; null when it has no usable id */
export function parseRecordLine(line: string): MetadataRecord | null {
	let json: unknown;
	try {
		json = JSON.parse(line);
	} catch {
		return null;
	}

	const parsed = recordLineSchema.safeParse(json);
	if (!parsed.success) return null;
	const raw = parsed.data;

	return {
		id: raw.id,
		rating: normalizeRating(raw.rating),
		score: normalizeScore(raw.score),
		tags: normalizeTags(raw.tags),
		fileExt: raw.file_ext,
		imageWidth: raw.image_width,
		imageHeight: raw.image_height,
	};
}

export type MetadataTable = {
	records: MetadataRecord[];
	/** Lines that were not JSON or carried no id */
	rejected: number;
};

/**
 * Reads every shard below `metadataDir` into memory. Later duplicates of an
 * id are dropped so ids stay unique within the table.
 */
export async function loadMetadata(metadataDir: string): Promise<MetadataTable> {
	const stat = await fs.promises.stat(metadataDir).catch(() => null);
	if (!stat || !stat.isDirectory()) {
		throw new Error(`Metadata directory not found: ${metadataDir}`);
	}

	const files = await getFilesInFolder(metadataDir);
	const seen = new Set<string>();
	const records: MetadataRecord[] = [];
	let rejected = 0;

	for (const file of files) {
		const rl = readline.createInterface({
			input: fs.createReadStream(file, { encoding: "utf8" }),
			crlfDelay: Infinity,
		});
		for await (const line of rl) {
			if (line.trim() === "") continue;
			const record = parseRecordLine(line);
			if (!record) {
				rejected++;
				continue;
			}
			if (seen.has(record.id)) continue;
			seen.add(record.id);
			records.push(record);
		}
	}

	console.log(
		`Loaded ${chalk.bold(records.length)} records from ${files.length} shard(s) in ${path.basename(metadataDir)}`,
	);
	if (rejected > 0) {
		console.log(chalk.yellow(`⚠️ Skipped ${rejected} unreadable metadata line(s)`));
	}

	return { records, rejected };
}
