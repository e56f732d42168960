import { makePhotoCandidate, type Photo, type PhotoCandidate } from '../models/photo';

export interface ImageSize {
    width: number;
    height: number;
}

const FULL_RESOLUTION = 4_000_000;

/**
 * Picks the photo the other faces get composited into.
 */
export class BasePhotoService {
    static suitability(photo: Photo, size: ImageSize | undefined): number {
        if (photo.overallScore !== undefined) return photo.overallScore;

        let score = 0.5;
        if (size && size.width > 0 && size.height > 0) {
            const pixels = size.width * size.height;
            if (pixels > 2_000_000) score += 0.3;
            else if (pixels > 1_000_000) score += 0.2;

            const aspect = size.width / size.height;
            if (aspect >= 0.75 && aspect <= 1.5) score += 0.2;
        }
        return Math.min(1, score);
    }

    static technicalQuality(size: ImageSize | undefined): number {
        if (!size) return 0;
        return Math.min(1, (size.width * size.height) / FULL_RESOLUTION);
    }

    static photoScore(photo: Photo, size: ImageSize | undefined): number {
        return this.suitability(photo, size) * 0.6 + this.technicalQuality(size) * 0.4;
    }

    /** Highest-scoring photo; the first wins ties. Sizes fall back to the photo's own dimensions. */
    static select(photos: readonly Photo[], sizes: ReadonlyMap<string, ImageSize> = new Map()): PhotoCandidate | null {
        let best: Photo | null = null;
        let bestScore = -Infinity;

        for (const photo of photos) {
            const score = this.photoScore(photo, this.sizeOf(photo, sizes));
            if (score > bestScore) {
                best = photo;
                bestScore = score;
            }
        }

        if (!best) return null;
        return makePhotoCandidate(best, bestScore, bestScore * 0.6, bestScore * 0.4);
    }

    private static sizeOf(photo: Photo, sizes: ReadonlyMap<string, ImageSize>): ImageSize | undefined {
        const known = sizes.get(photo.id);
        if (known) return known;
        if (photo.width && photo.height) return { width: photo.width, height: photo.height };
        return undefined;
    }
}
