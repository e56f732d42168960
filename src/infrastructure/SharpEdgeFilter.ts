import sharp from 'sharp';
import type { FaceRegion, IEdgeFilter } from '../core/interfaces/IImageLoader';

/** Energy at which the response reaches 0.5. */
const HALF_RESPONSE_ENERGY = 0.01;
const MIN_REGION_SIZE = 3;

/**
 * Mean squared 4-neighbour Laplacian over the interior pixels, on a 0..1
 * intensity scale. Reads the first channel of each pixel.
 */
export function laplacianEnergy(data: Uint8Array, width: number, height: number, channels = 1): number {
    if (width < MIN_REGION_SIZE || height < MIN_REGION_SIZE) return 0;

    const at = (x: number, y: number) => data[(y * width + x) * channels] / 255;
    let sum = 0;
    let count = 0;
    for (let y = 1; y < height - 1; y++) {
        for (let x = 1; x < width - 1; x++) {
            const lap = 4 * at(x, y) - at(x - 1, y) - at(x + 1, y) - at(x, y - 1) - at(x, y + 1);
            sum += lap * lap;
            count++;
        }
    }
    return count > 0 ? sum / count : 0;
}

export function energyToResponse(energy: number): number {
    if (energy <= 0) return 0;
    return energy / (energy + HALF_RESPONSE_ENERGY);
}

export class SharpEdgeFilter implements IEdgeFilter {
    async edgeResponse(region: FaceRegion): Promise<number | null> {
        const { image, boundingBox } = region;
        if (!image.width || !image.height) return null;

        const safeX = Math.max(0, Math.min(Math.round(boundingBox.x * image.width), image.width - 1));
        const safeY = Math.max(0, Math.min(Math.round(boundingBox.y * image.height), image.height - 1));
        const safeW = Math.max(1, Math.min(Math.round(boundingBox.width * image.width), image.width - safeX));
        const safeH = Math.max(1, Math.min(Math.round(boundingBox.height * image.height), image.height - safeY));
        if (safeW < MIN_REGION_SIZE || safeH < MIN_REGION_SIZE) return null;

        const { data, info } = await sharp(image.data)
            .extract({ left: safeX, top: safeY, width: safeW, height: safeH })
            .greyscale()
            .raw()
            .toBuffer({ resolveWithObject: true });

        return energyToResponse(laplacianEnergy(data, info.width, info.height, info.channels));
    }
}
