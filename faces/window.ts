export type FaceBox = Readonly<{
	x: number;
	y: number;
	width: number;
	height: number;
	/** 0..1 */
	confidence: number;
}>;

/** Source-pixel rectangle extracted before resizing */
export type CropWindow = Readonly<{
	x: number;
	y: number;
	width: number;
	height: number;
}>;

function clamp(value: number, min: number, max: number): number {
	return Math.max(min, Math.min(max, value));
}

function isUsable(box: FaceBox): boolean {
	return (
		Number.isFinite(box.x) &&
		Number.isFinite(box.y) &&
		Number.isFinite(box.confidence) &&
		box.width > 0 &&
		box.height > 0
	);
}

/** Highest confidence wins; on a tie the larger box, then the earlier one. */
export function pickBestBox(boxes: readonly FaceBox[]): FaceBox | null {
	const usable = boxes.filter(isUsable);
	if (usable.length === 0) return null;
	return usable.reduce((a, b) => {
		if (a.confidence !== b.confidence) return a.confidence > b.confidence ? a : b;
		return a.width * a.height >= b.width * b.height ? a : b;
	});
}

/**
 * Square window of side max(w, h) * faceScale centered on the best face.
 * A window that would cross an edge is shifted back inside rather than cut,
 * and one larger than the image shrinks to its shorter side.
 */
export function selectWindow(
	imageWidth: number,
	imageHeight: number,
	boxes: readonly FaceBox[],
	faceScale: number,
): CropWindow | null {
	const limit = Math.min(Math.floor(imageWidth), Math.floor(imageHeight));
	if (!(limit >= 1)) return null;

	const best = pickBestBox(boxes);
	if (!best) return null;

	const cx = best.x + best.width / 2;
	const cy = best.y + best.height / 2;

	const side = clamp(
		Math.round(Math.max(best.width, best.height) * faceScale),
		1,
		limit,
	);
	const x = clamp(Math.round(cx - side / 2), 0, Math.floor(imageWidth) - side);
	const y = clamp(Math.round(cy - side / 2), 0, Math.floor(imageHeight) - side);

	return { x, y, width: side, height: side };
}
