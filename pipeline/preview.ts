import chalk from "chalk";
import type { FilterSpec, MetadataRecord } from "../metadata/types";
import { matches } from "../select/predicate";
import { isNumericId, sourceImagePath } from "../utils";

/** One line per matching record: id, rating, score, source path, then tags */
export function formatPreview(
	record: MetadataRecord,
	directory: string,
): string {
	let source = "(no file extension)";
	if (!isNumericId(record.id)) source = "(no source path)";
	else if (record.fileExt) {
		source = sourceImagePath(directory, record.id, record.fileExt);
	}
	const tags = [...(record.tags ?? [])].sort().join(" ");
	return `${record.id} [${record.rating ?? "?"}] score=${record.score ?? "?"} ${source}\n  ${tags}`;
}

/** Prints up to maxExamples matching records without writing anything */
export function previewMatches(
	records: readonly MetadataRecord[],
	filter: FilterSpec,
	maxExamples: number,
	directory: string,
): MetadataRecord[] {
	const shown: MetadataRecord[] = [];
	for (const record of records) {
		if (shown.length >= maxExamples) break;
		if (!matches(record, filter)) continue;
		shown.push(record);
		console.log(formatPreview(record, directory));
	}
	console.log(chalk.bold(`\n${shown.length} matching record(s) shown.`));
	return shown;
}
