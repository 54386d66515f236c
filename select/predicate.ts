import type { FilterSpec, MetadataRecord } from "../metadata/types";

/**
 * True when the record satisfies every clause of the filter. An empty clause
 * never disqualifies; a record missing its rating, score or tags never matches.
 */
export function matches(record: MetadataRecord, filter: FilterSpec): boolean {
	const { tags, rating, score } = record;
	if (!tags || rating === undefined || score === undefined) return false;

	for (const tag of filter.requiredTags) {
		if (!tags.has(tag)) return false;
	}

	for (const tag of filter.bannedTags) {
		if (tags.has(tag)) return false;
	}

	if (filter.atleastTags.size > 0) {
		let present = 0;
		for (const tag of filter.atleastTags) {
			if (tags.has(tag)) present++;
		}
		if (present < filter.atleastNum) return false;
	}

	if (filter.ratings.size > 0 && !filter.ratings.has(rating)) return false;

	if (filter.scoreRange) {
		const [min, max] = filter.scoreRange;
		if (score < min || score > max) return false;
	}

	return true;
}
