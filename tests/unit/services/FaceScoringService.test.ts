/**
 * FaceScoringService Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { FaceScoringService } from '../../../src/core/services/FaceScoringService';
import { makePhoto, makeRecord } from '../../mocks/fixtures';

const OPEN = { leftOpen: true, rightOpen: true, confidence: 1 };
const CLOSED = { leftOpen: false, rightOpen: false, confidence: 1 };
const NEUTRAL = { intensity: 0.5, naturalness: 0.5, confidence: 0.5 };

describe('FaceScoringService', () => {
    describe('compositeScore', () => {
        it('should weight capture, eyes, expression, sharpness and pose', () => {
            // Act
            const score = FaceScoringService.compositeScore({
                captureQuality: 0.8,
                eyeState: OPEN,
                expression: NEUTRAL,
                sharpness: 0.6,
                pose: { pitch: 0, yaw: 0, roll: 0 }
            });

            // Assert: 0.24 + 0.25 + 0.1 + 0.09 + 0.1
            expect(score).toBeCloseTo(0.78, 10);
        });

        it('should drop the eye term for closed eyes and halve the pose term off-axis', () => {
            const score = FaceScoringService.compositeScore({
                captureQuality: 0.8,
                eyeState: CLOSED,
                expression: NEUTRAL,
                sharpness: 0.6,
                pose: { pitch: 0, yaw: 30, roll: 0 }
            });

            // 0.24 + 0 + 0.1 + 0.09 + 0.05
            expect(score).toBeCloseTo(0.48, 10);
        });

        it('should treat one closed eye as closed', () => {
            const score = FaceScoringService.compositeScore({
                captureQuality: 0,
                eyeState: { leftOpen: true, rightOpen: false, confidence: 1 },
                expression: { intensity: 0, naturalness: 0, confidence: 0 },
                sharpness: 0,
                pose: { pitch: 0, yaw: 0, roll: 0 }
            });

            expect(score).toBeCloseTo(0.1, 10);
        });
    });

    describe('score', () => {
        it('should build a frozen record with defaults for missing detector data', () => {
            // Arrange
            const photo = makePhoto('p1');

            // Act
            const record = FaceScoringService.score({
                photo,
                detectionIndex: 2,
                face: { boundingBox: { x: 0.1, y: 0.1, width: 0.2, height: 0.2 } },
                sharpness: 0.4
            });

            // Assert: capture 0.5, eyes unknown (open), neutral expression, optimal pose
            expect(record.id).toBe('p1#2');
            expect(record.photoId).toBe('p1');
            expect(record.photoTimestamp).toBe(photo.timestamp);
            expect(record.captureQuality).toBe(0.5);
            expect(record.eyeState).toEqual({ leftOpen: true, rightOpen: true, confidence: 0 });
            expect(record.expression).toEqual({ intensity: 0.5, naturalness: 0.5, confidence: 0 });
            expect(record.compositeScore).toBeCloseTo(0.66, 10);
            expect(Object.isFrozen(record)).toBe(true);
            expect(Object.isFrozen(record.eyeState)).toBe(true);
        });

        it('should clamp out-of-range capture quality and sharpness', () => {
            const record = FaceScoringService.score({
                photo: makePhoto('p1'),
                detectionIndex: 0,
                face: { boundingBox: { x: 0, y: 0, width: 0.5, height: 0.5 }, captureQuality: 1.7 },
                sharpness: 3
            });

            expect(record.captureQuality).toBe(1);
            expect(record.sharpness).toBe(1);
            expect(record.compositeScore).toBeCloseTo(0.3 + 0.25 + 0.1 + 0.15 + 0.1, 10);
        });
    });

    describe('rank', () => {
        it('should sort best first and keep detector order on ties', () => {
            // Arrange
            const a = makeRecord({ photoId: 'p', detectionIndex: 0, compositeScore: 0.3 });
            const b = makeRecord({ photoId: 'p', detectionIndex: 1, compositeScore: 0.9 });
            const c = makeRecord({ photoId: 'p', detectionIndex: 2, compositeScore: 0.3 });

            // Act
            const ranked = FaceScoringService.rank([c, a, b]);

            // Assert
            expect(ranked.map(r => r.detectionIndex)).toEqual([1, 0, 2]);
        });
    });
});
