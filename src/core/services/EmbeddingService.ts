/**
 * EmbeddingService.ts
 *
 * Descriptor helpers for the identity resolver:
 * - L2 normalization and distance between descriptors
 * - Parsing descriptors from arrays, Float32 buffers or JSON
 * - Wrapping a plain vector function as an IEmbeddingGenerator
 */

import type { FaceEmbedding } from '../models/analysis';
import type { IEmbeddingGenerator } from '../interfaces/IEmbeddingGenerator';
import type { FaceRegion } from '../interfaces/IImageLoader';
import { clamp } from '../models/geometry';
import { EmbeddingError, errorMessage } from '../errors';

export type RawDescriptor = number[] | Float32Array | Buffer | string;

export type VectorFunction = (region: FaceRegion) => Promise<RawDescriptor | null>;

export class EmbeddingService {
    /**
     * L2-normalize a vector (unit length).
     */
    static normalizeVector(vec: readonly number[]): number[] {
        let magnitude = 0;
        for (let i = 0; i < vec.length; i++) {
            magnitude += vec[i] * vec[i];
        }
        magnitude = Math.sqrt(magnitude);

        if (magnitude === 0) return [...vec];

        return vec.map(v => v / magnitude);
    }

    /**
     * Euclidean distance between two descriptors after L2 normalization.
     * For unit vectors: distance = sqrt(2 * (1 - cosine_similarity)),
     * range 0 (identical) to 2 (opposite). Mismatched lengths give Infinity.
     */
    static computeDistance(vecA: readonly number[], vecB: readonly number[]): number {
        if (vecA.length === 0 || vecA.length !== vecB.length) {
            return Infinity;
        }

        const normA = this.normalizeVector(vecA);
        const normB = this.normalizeVector(vecB);

        let sum = 0;
        for (let i = 0; i < normA.length; i++) {
            const diff = normA[i] - normB[i];
            sum += diff * diff;
        }
        return Math.sqrt(sum);
    }

    /**
     * Parse a descriptor from an array, a Float32 BLOB or a JSON string.
     * Returns null if the input holds no usable numbers.
     */
    static parseDescriptor(raw: RawDescriptor | null | undefined): number[] | null {
        if (!raw) return null;

        if (Array.isArray(raw)) {
            return raw.every(v => Number.isFinite(v)) ? raw : null;
        }

        if (raw instanceof Float32Array) {
            return Array.from(raw);
        }

        // Buffer (BLOB from SQLite)
        if (Buffer.isBuffer(raw)) {
            if (raw.byteLength === 0 || raw.byteLength % 4 !== 0) return null;
            const copy = new Uint8Array(raw);
            return Array.from(new Float32Array(copy.buffer));
        }

        try {
            const parsed: unknown = JSON.parse(raw);
            if (Array.isArray(parsed) && parsed.every((v): v is number => typeof v === 'number' && Number.isFinite(v))) {
                return parsed;
            }
            return null;
        } catch {
            return null;
        }
    }

    static toBlob(vector: readonly number[]): Buffer {
        return Buffer.from(new Float32Array(vector).buffer);
    }

    /**
     * Adapt a function producing raw vectors into the embedding collaborator
     * the engine consumes.
     */
    static createVectorEmbeddingGenerator(vectorFn: VectorFunction, confidence = 1): IEmbeddingGenerator {
        return {
            embed: async (region: FaceRegion): Promise<FaceEmbedding | null> => {
                let raw: RawDescriptor | null;
                try {
                    raw = await vectorFn(region);
                } catch (err) {
                    throw new EmbeddingError(`Embedding failed for photo ${region.image.photoId}: ${errorMessage(err)}`, { cause: err });
                }
                const vector = this.parseDescriptor(raw);
                if (!vector || vector.length === 0) return null;
                return { vector, confidence: clamp(confidence) };
            },
            distance: (a: FaceEmbedding, b: FaceEmbedding) => this.computeDistance(a.vector, b.vector)
        };
    }
}
