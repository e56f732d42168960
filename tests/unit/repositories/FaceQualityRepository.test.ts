/**
 * FaceQualityRepository Unit Tests
 *
 * Runs against an in-memory SQLite database.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { closeDB, initDB, isDBInitialized } from '../../../src/db';
import { FaceQualityRepository } from '../../../src/data/repositories/FaceQualityRepository';
import { makeRecord } from '../../mocks/fixtures';

describe('FaceQualityRepository', () => {
    beforeEach(() => {
        initDB(':memory:');
    });

    afterEach(() => {
        closeDB();
    });

    it('should store faces and read them back in rank order', () => {
        // Arrange
        const weaker = makeRecord({ photoId: 'p1', detectionIndex: 0, compositeScore: 0.4, eyesOpen: false, pose: { pitch: 5, yaw: -12, roll: 2 } });
        const stronger = makeRecord({ photoId: 'p1', detectionIndex: 1, compositeScore: 0.9 });

        // Act
        FaceQualityRepository.saveFaces('p1', [stronger, weaker]);
        const faces = FaceQualityRepository.getFacesByPhoto('p1');

        // Assert
        expect(faces.map(f => f.id)).toEqual(['p1#1', 'p1#0']);
        expect(faces[1]).toEqual(weaker);
    });

    it('should replace the faces of a photo on save', () => {
        FaceQualityRepository.saveFaces('p1', [
            makeRecord({ photoId: 'p1', detectionIndex: 0 }),
            makeRecord({ photoId: 'p1', detectionIndex: 1 })
        ]);

        FaceQualityRepository.saveFaces('p1', [makeRecord({ photoId: 'p1', detectionIndex: 2 })]);

        expect(FaceQualityRepository.countFaces()).toBe(1);
        expect(FaceQualityRepository.getFacesByPhoto('p1')[0].detectionIndex).toBe(2);
    });

    it('should return the best faces across photos', () => {
        // Arrange
        FaceQualityRepository.saveFaces('p1', [makeRecord({ photoId: 'p1', compositeScore: 0.7 })]);
        FaceQualityRepository.saveFaces('p2', [
            makeRecord({ photoId: 'p2', detectionIndex: 0, compositeScore: 0.9 }),
            makeRecord({ photoId: 'p2', detectionIndex: 1, compositeScore: 0.2 })
        ]);

        // Act
        const top = FaceQualityRepository.getTopFaces(2);

        // Assert
        expect(top.map(f => f.id)).toEqual(['p2#0', 'p1#0']);
    });

    it('should delete the faces of one photo', () => {
        FaceQualityRepository.saveFaces('p1', [
            makeRecord({ photoId: 'p1', detectionIndex: 0 }),
            makeRecord({ photoId: 'p1', detectionIndex: 1 })
        ]);
        FaceQualityRepository.saveFaces('p2', [makeRecord({ photoId: 'p2' })]);

        expect(FaceQualityRepository.deleteByPhoto('p1')).toBe(2);
        expect(FaceQualityRepository.countFaces()).toBe(1);
    });

    it('should report a missing database', () => {
        closeDB();

        expect(isDBInitialized()).toBe(false);
        expect(() => FaceQualityRepository.getFacesByPhoto('p1'))
            .toThrow('FaceQualityRepository.getFacesByPhoto failed: Database not initialized; call initDB first');
    });
});
