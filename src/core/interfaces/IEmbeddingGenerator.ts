import type { FaceEmbedding } from '../models/analysis';
import type { FaceRegion } from './IImageLoader';

export interface IEmbeddingGenerator {
    /** Null (or a rejection) sends the face down the position-only fallback. */
    embed(region: FaceRegion): Promise<FaceEmbedding | null>;
    /** Distance between two descriptors, 0 (identical) to 2 (opposite). */
    distance(a: FaceEmbedding, b: FaceEmbedding): number;
}
