import path from "node:path";
import { z, ZodError } from "zod";
import { ConfigurationError } from "./errors";
import { normalizeRating } from "./metadata/load";
import type { FilterSpec, Rating } from "./metadata/types";
import type { OutputConfig } from "./output/resolve";

const csvToSet = (value: string): Set<string> =>
	new Set(
		value
			.split(",")
			.map((entry) => entry.trim())
			.filter((entry) => entry.length > 0),
	);

const ratingsSchema = z
	.string()
	.transform((value, ctx) => {
		const ratings = new Set<Rating>();
		for (const entry of csvToSet(value)) {
			const rating = normalizeRating(entry);
			if (!rating) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					message: `unknown rating "${entry}" (use s,q,e)`,
				});
				return z.NEVER;
			}
			ratings.add(rating);
		}
		return ratings;
	});

const scoreRangeSchema = z
	.string()
	.transform((value, ctx): readonly [number, number] | undefined => {
		if (value.trim() === "") return undefined;
		const parts = value.split(",").map((p) => Number(p.trim()));
		const [min, max] = parts;
		if (
			parts.length !== 2 ||
			min === undefined ||
			max === undefined ||
			!Number.isInteger(min) ||
			!Number.isInteger(max)
		) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `expected "min,max" integers, got "${value}"`,
			});
			return z.NEVER;
		}
		if (min > max) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `min ${min} is greater than max ${max}`,
			});
			return z.NEVER;
		}
		return [min, max] as const;
	});

const cliValuesSchema = z.object({
	directory: z.string().min(1),
	metadataDir: z.string().min(1).default("metadata"),
	saveDir: z.string().min(1),
	linkDir: z.string().default(""),
	requiredTags: z.string().default("").transform(csvToSet),
	bannedTags: z.string().default("").transform(csvToSet),
	atleastTags: z.string().default("").transform(csvToSet),
	atleastNum: z.number().int().min(0).default(0),
	ratings: ratingsSchema.default("s,q,e"),
	scoreRange: scoreRangeSchema.default(""),
	overwrite: z.boolean().default(false),
	preview: z.boolean().default(false),
	faces: z.boolean().default(false),
	faceScale: z.number().positive().default(2.5),
	faceMinConfidence: z.number().min(0).max(1).default(0.5),
	minCropSize: z.number().int().min(0).default(0),
	maxExamples: z.number().int().min(0).optional(),
	imgSize: z.number().int().positive().default(256),
	models: z.string().min(1).default("models"),
});

export type CliValues = z.input<typeof cliValuesSchema>;

export type RunConfig = Readonly<{
	directory: string;
	metadataDir: string;
	modelsDir: string;
	filter: FilterSpec;
	output: OutputConfig;
	maxExamples: number;
	preview: boolean;
}>;

function describeIssues(err: ZodError): string {
	return err.issues
		.map((issue) => {
			const flag = issue.path
				.join(".")
				.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
			return `--${flag}: ${issue.message}`;
		})
		.join("\n");
}

/** Validates raw CLI values; throws ConfigurationError listing every bad setting */
export function buildRunConfig(values: CliValues): RunConfig {
	const parsed = cliValuesSchema.safeParse(values);
	if (!parsed.success) {
		throw new ConfigurationError(
			`Invalid configuration:\n${describeIssues(parsed.error)}`,
		);
	}
	const v = parsed.data;
	const directory = path.resolve(v.directory);

	return {
		directory,
		metadataDir: path.resolve(directory, v.metadataDir),
		modelsDir: path.resolve(v.models),
		filter: {
			requiredTags: v.requiredTags,
			bannedTags: v.bannedTags,
			atleastTags: v.atleastTags,
			atleastNum: v.atleastNum,
			ratings: v.ratings,
			scoreRange: v.scoreRange,
		},
		output: {
			saveDir: path.resolve(v.saveDir),
			linkDir: v.linkDir.trim() === "" ? undefined : path.resolve(v.linkDir),
			imgSize: v.imgSize,
			faces: v.faces,
			faceScale: v.faceScale,
			faceMinConfidence: v.faceMinConfidence,
			minCropSize: v.minCropSize,
			overwrite: v.overwrite,
		},
		maxExamples: v.maxExamples ?? Number.POSITIVE_INFINITY,
		preview: v.preview,
	};
}
