/** Danbooru rating letters: safe, questionable, explicit */
export const RATINGS = ["s", "q", "e"] as const;

export type Rating = (typeof RATINGS)[number];

/**
 * Normalized view of one image's annotations. Fields the loader could not
 * parse are left undefined; such a record never passes the predicate.
 */
export type MetadataRecord = Readonly<{
	id: string;
	rating?: Rating;
	score?: number;
	tags?: ReadonlySet<string>;
	fileExt?: string;
	imageWidth?: number;
	imageHeight?: number;
}>;

export type FilterSpec = Readonly<{
	requiredTags: ReadonlySet<string>;
	bannedTags: ReadonlySet<string>;
	atleastTags: ReadonlySet<string>;
	atleastNum: number;
	/** Empty set allows every rating */
	ratings: ReadonlySet<Rating>;
	/** Inclusive; undefined is unbounded */
	scoreRange?: readonly [min: number, max: number];
}>;

export function isRating(value: string): value is Rating {
	return (RATINGS as readonly string[]).includes(value);
}
