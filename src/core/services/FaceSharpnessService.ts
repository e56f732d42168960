import type { FaceRegion, IEdgeFilter } from '../interfaces/IImageLoader';
import { clamp, rectArea, type Rect } from '../models/geometry';
import { DEFAULT_THRESHOLDS, type SharpnessThresholds } from '../models/thresholds';
import { errorMessage } from '../errors';
import logger from '../../logger';

/**
 * Face sharpness proxy: larger faces and stronger edge responses score higher.
 * This is not true blur detection.
 */
export class FaceSharpnessService {
    static areaScore(boundingBox: Rect, t: SharpnessThresholds = DEFAULT_THRESHOLDS.sharpness): number {
        const area = rectArea(boundingBox);
        let score = t.base;
        for (const step of t.areaBonuses) {
            if (area > step.above) {
                score += step.bonus;
                break;
            }
        }
        return score;
    }

    static combine(boundingBox: Rect, edgeResponse: number | null, t: SharpnessThresholds = DEFAULT_THRESHOLDS.sharpness): number {
        const edge = edgeResponse === null ? 0 : clamp(edgeResponse) * t.edgeWeight;
        return Math.min(1, this.areaScore(boundingBox, t) + edge);
    }

    /** A failing filter contributes nothing; the area term still counts. */
    static async measure(region: FaceRegion, filter?: IEdgeFilter, t: SharpnessThresholds = DEFAULT_THRESHOLDS.sharpness): Promise<number> {
        let edgeResponse: number | null = null;
        if (filter) {
            try {
                edgeResponse = await filter.edgeResponse(region);
            } catch (err) {
                logger.warn(`[FaceSharpness] Edge filter failed for photo ${region.image.photoId}: ${errorMessage(err)}`);
            }
        }
        return this.combine(region.boundingBox, edgeResponse, t);
    }
}
