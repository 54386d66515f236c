// faces/detector.ts
import fs from "node:fs/promises";
import type { RawImage } from "../image/sharp";
import type { FaceBox } from "./window";

export interface FaceDetector {
	/** Zero or more faces in source-pixel coordinates; empty when none found */
	detect(image: RawImage): Promise<FaceBox[]>;
}

type FaceApi = typeof import("@vladmandic/face-api/dist/face-api.node-wasm.js");
type Tensor3D = ReturnType<FaceApi["tf"]["tensor3d"]>;

let faceapi: FaceApi | null = null;
let loadedModelsDir: string | null = null;

/**
 * face-api on the tfjs WASM backend. Imported on first use so runs without
 * --faces never pay for it.
 */
export async function loadFaceApi(): Promise<FaceApi> {
	if (faceapi) return faceapi;

	const fa = await import("@vladmandic/face-api/dist/face-api.node-wasm.js");
	if (!(await fa.tf.setBackend("wasm"))) {
		throw new Error("Unable to initialize the tfjs wasm backend");
	}
	await fa.tf.ready();

	faceapi = fa;
	return fa;
}

/** HWC int32 tensor over the decoded pixels; the caller disposes it */
export function imageToTensor(fa: FaceApi, image: RawImage): Tensor3D {
	return fa.tf.tensor3d(
		new Int32Array(image.data),
		[image.height, image.width, image.channels],
		"int32",
	);
}

async function ensureModels(modelsDir: string): Promise<FaceApi> {
	if (faceapi && loadedModelsDir === modelsDir) return faceapi;

	// Fail early on a missing models dir
	const stat = await fs.stat(modelsDir).catch(() => null);
	if (!stat || !stat.isDirectory()) {
		throw new Error(`Models directory not found: ${modelsDir}`);
	}

	const fa = await loadFaceApi();
	await fa.nets.ssdMobilenetv1.loadFromDisk(modelsDir);
	loadedModelsDir = modelsDir;
	return fa;
}

/** SSD MobileNet v1 detector from face-api, weights read from `modelsDir` */
export async function createFaceApiDetector(
	modelsDir: string,
	minConfidence: number,
): Promise<FaceDetector> {
	const fa = await ensureModels(modelsDir);
	const options = new fa.SsdMobilenetv1Options({ minConfidence });

	return {
		async detect(image) {
			const tensor = imageToTensor(fa, image);
			try {
				const detections = await fa.detectAllFaces(tensor, options);
				return detections.map((d) => ({
					x: d.box.x,
					y: d.box.y,
					width: d.box.width,
					height: d.box.height,
					confidence: d.score,
				}));
			} finally {
				tensor.dispose();
			}
		},
	};
}
