/**
 * SharpEdgeFilter Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

const { pipeline, sharpMock } = vi.hoisted(() => {
    const pipeline = {
        extract: vi.fn(),
        greyscale: vi.fn(),
        raw: vi.fn(),
        toBuffer: vi.fn()
    };
    return { pipeline, sharpMock: vi.fn() };
});

vi.mock('sharp', () => ({ default: sharpMock }));

import { energyToResponse, laplacianEnergy, SharpEdgeFilter } from '../../../src/infrastructure/SharpEdgeFilter';
import type { FaceRegion } from '../../../src/core/interfaces/IImageLoader';

// 3x3 black patch with one white centre pixel: Laplacian 4 at the only interior pixel
const SPOT = Uint8Array.from([0, 0, 0, 0, 255, 0, 0, 0, 0]);

function region(width: number, boxSize: number): FaceRegion {
    return {
        image: { photoId: 'p1', width, height: width, data: Buffer.from('encoded-image') },
        boundingBox: { x: 0.1, y: 0.1, width: boxSize, height: boxSize }
    };
}

describe('SharpEdgeFilter', () => {
    describe('laplacianEnergy', () => {
        it('should measure a single bright spot', () => {
            expect(laplacianEnergy(SPOT, 3, 3)).toBeCloseTo(16, 10);
        });

        it('should read the first channel of interleaved pixels', () => {
            const rgb = new Uint8Array(27);
            rgb[12] = 255;

            expect(laplacianEnergy(rgb, 3, 3, 3)).toBeCloseTo(16, 10);
        });

        it('should be zero for flat or tiny patches', () => {
            expect(laplacianEnergy(new Uint8Array(16).fill(128), 4, 4)).toBe(0);
            expect(laplacianEnergy(Uint8Array.from([0, 255, 0, 255]), 2, 2)).toBe(0);
        });
    });

    describe('energyToResponse', () => {
        it('should map energy into [0,1)', () => {
            expect(energyToResponse(0)).toBe(0);
            expect(energyToResponse(0.01)).toBeCloseTo(0.5, 10);
            expect(energyToResponse(16)).toBeCloseTo(16 / 16.01, 10);
        });
    });

    describe('edgeResponse', () => {
        beforeEach(() => {
            sharpMock.mockReturnValue(pipeline);
            pipeline.extract.mockReturnValue(pipeline);
            pipeline.greyscale.mockReturnValue(pipeline);
            pipeline.raw.mockReturnValue(pipeline);
            pipeline.toBuffer.mockResolvedValue({ data: SPOT, info: { width: 3, height: 3, channels: 1 } });
        });

        it('should crop the face and score its edges', async () => {
            // Act
            const response = await new SharpEdgeFilter().edgeResponse(region(100, 0.2));

            // Assert
            expect(pipeline.extract).toHaveBeenCalledWith({ left: 10, top: 10, width: 20, height: 20 });
            expect(response).toBeCloseTo(16 / 16.01, 10);
        });

        it('should skip regions smaller than a few pixels', async () => {
            const response = await new SharpEdgeFilter().edgeResponse(region(100, 0.02));

            expect(response).toBeNull();
            expect(sharpMock).not.toHaveBeenCalled();
        });
    });
});
