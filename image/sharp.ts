import fs from "node:fs/promises";
import sharp from "sharp";
import type { CropWindow } from "../faces/window";

/** Decoded, auto-oriented pixels */
export type RawImage = Readonly<{
	data: Buffer;
	width: number;
	height: number;
	channels: 1 | 2 | 3 | 4;
}>;

export interface ImageOps {
	load(filePath: ImagePath): Promise<RawImage>;
	crop(image: RawImage, window: CropWindow): Promise<RawImage>;
	/** Fits inside a size × size square, padding the short side */
	resize(image: RawImage, size: number): Promise<RawImage>;
	save(image: RawImage, filePath: ImagePath): Promise<void>;
	symlink(existingPath: ImagePath, newPath: ImagePath): Promise<void>;
}

const WHITE = { r: 255, g: 255, b: 255 };
const JPEG_QUALITY = 95;

function fromRaw(image: RawImage): sharp.Sharp {
	return sharp(image.data, {
		raw: { width: image.width, height: image.height, channels: image.channels },
	});
}

async function toRaw(pipeline: sharp.Sharp): Promise<RawImage> {
	const { data, info } = await pipeline
		.raw()
		.toBuffer({ resolveWithObject: true });
	return {
		data,
		width: info.width,
		height: info.height,
		channels: info.channels,
	};
}

export const sharpImageOps: ImageOps = {
	async load(filePath) {
		// flatten drops alpha onto white, srgb forces 3 channels for greyscale input
		return await toRaw(
			sharp(filePath, { failOn: "none" })
				.rotate()
				.flatten({ background: WHITE })
				.toColourspace("srgb"),
		);
	},

	async crop(image, window) {
		return await toRaw(
			fromRaw(image).extract({
				left: window.x,
				top: window.y,
				width: window.width,
				height: window.height,
			}),
		);
	},

	async resize(image, size) {
		return await toRaw(
			fromRaw(image).resize(size, size, { fit: "contain", background: WHITE }),
		);
	},

	async save(image, filePath) {
		// written beside the target, then renamed into place
		const tmpPath = `${filePath}.${process.pid}.tmp`;
		await fromRaw(image)
			.jpeg({ quality: JPEG_QUALITY, mozjpeg: true })
			.toFile(tmpPath);
		try {
			await fs.rename(tmpPath, filePath);
		} catch (err) {
			await fs.rm(tmpPath, { force: true });
			throw err;
		}
	},

	async symlink(existingPath, newPath) {
		await fs.symlink(existingPath, newPath);
	},
};
