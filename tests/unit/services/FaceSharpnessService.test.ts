/**
 * FaceSharpnessService Unit Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { FaceSharpnessService } from '../../../src/core/services/FaceSharpnessService';
import type { FaceRegion, IEdgeFilter } from '../../../src/core/interfaces/IImageLoader';
import logger from '../../../src/logger';

function region(size: number): FaceRegion {
    return {
        image: { photoId: 'p1', width: 1000, height: 1000, data: Buffer.alloc(0) },
        boundingBox: { x: 0.1, y: 0.1, width: size, height: size }
    };
}

describe('FaceSharpnessService', () => {
    describe('areaScore', () => {
        it.each([
            [0.4, 0.7],
            [0.25, 0.5],
            [0.15, 0.4],
            [0.1, 0.3]
        ])('should score a %s-wide face at %s', (size, expected) => {
            expect(FaceSharpnessService.areaScore(region(size).boundingBox)).toBeCloseTo(expected, 10);
        });
    });

    describe('combine', () => {
        it('should add the weighted edge response', () => {
            const box = region(0.4).boundingBox;

            expect(FaceSharpnessService.combine(box, 1)).toBeCloseTo(0.9, 10);
            expect(FaceSharpnessService.combine(box, 0.5)).toBeCloseTo(0.8, 10);
            expect(FaceSharpnessService.combine(box, null)).toBeCloseTo(0.7, 10);
        });

        it('should cap the score at 1', () => {
            const thresholds = { base: 0.9, areaBonuses: [{ above: 0.1, bonus: 0.4 }], edgeWeight: 0.2 };

            expect(FaceSharpnessService.combine(region(0.4).boundingBox, 1, thresholds)).toBe(1);
        });
    });

    describe('measure', () => {
        it('should use the edge filter response', async () => {
            // Arrange
            const filter: IEdgeFilter = { edgeResponse: vi.fn().mockResolvedValue(0.5) };

            // Act
            const sharpness = await FaceSharpnessService.measure(region(0.25), filter);

            // Assert
            expect(sharpness).toBeCloseTo(0.6, 10);
            expect(filter.edgeResponse).toHaveBeenCalledTimes(1);
        });

        it('should fall back to the area score when the filter throws', async () => {
            // Arrange
            const filter: IEdgeFilter = { edgeResponse: vi.fn().mockRejectedValue(new Error('decode failed')) };

            // Act
            const sharpness = await FaceSharpnessService.measure(region(0.25), filter);

            // Assert
            expect(sharpness).toBeCloseTo(0.5, 10);
            expect(logger.warn).toHaveBeenCalledWith(expect.stringContaining('decode failed'));
        });

        it('should use the area score without a filter', async () => {
            expect(await FaceSharpnessService.measure(region(0.1))).toBeCloseTo(0.3, 10);
        });
    });
});
