/**
 * Test data builders for faces, photos and observations.
 */

import type { FaceEmbedding, FaceObservation, PersonFaceQualityAnalysis } from '../../src/core/models/analysis';
import type { FaceAngle, FaceQualityRecord } from '../../src/core/models/face';
import type { Point, Rect } from '../../src/core/models/geometry';
import type { Photo } from '../../src/core/models/photo';

export const BASE_TIME = new Date('2024-06-01T12:00:00.000Z');

/**
 * Six-point eye as a clockwise ring: left corner, upper-left, upper-right,
 * right corner, lower-right, lower-left. EAR = gap / width.
 */
export function makeEye(cx: number, cy: number, width: number, gap: number): Point[] {
    return [
        { x: cx - width / 2, y: cy },
        { x: cx - width / 4, y: cy - gap / 2 },
        { x: cx + width / 4, y: cy - gap / 2 },
        { x: cx + width / 2, y: cy },
        { x: cx + width / 4, y: cy + gap / 2 },
        { x: cx - width / 4, y: cy + gap / 2 }
    ];
}

export function closedEyes() {
    return {
        leftEye: makeEye(0.35, 0.4, 0.1, 0),
        rightEye: makeEye(0.65, 0.4, 0.1, 0)
    };
}

export function makePhoto(id: string, secondsAfterBase = 0, extra: Partial<Photo> = {}): Photo {
    return {
        id,
        filePath: `/photos/${id}.jpg`,
        timestamp: new Date(BASE_TIME.getTime() + secondsAfterBase * 1000),
        ...extra
    };
}

let recordCounter = 0;

export interface RecordOptions {
    id?: string;
    photoId?: string;
    secondsAfterBase?: number;
    detectionIndex?: number;
    boundingBox?: Rect;
    compositeScore?: number;
    captureQuality?: number;
    eyesOpen?: boolean;
    expression?: { intensity: number; naturalness: number; confidence?: number };
    pose?: FaceAngle;
    sharpness?: number;
}

export function makeRecord(options: RecordOptions = {}): FaceQualityRecord {
    recordCounter += 1;
    const photoId = options.photoId ?? `photo-${recordCounter}`;
    const detectionIndex = options.detectionIndex ?? 0;
    const eyesOpen = options.eyesOpen ?? true;
    const expression = options.expression ?? { intensity: 0.5, naturalness: 0.5 };
    return {
        id: options.id ?? `${photoId}#${detectionIndex}`,
        photoId,
        photoTimestamp: new Date(BASE_TIME.getTime() + (options.secondsAfterBase ?? 0) * 1000),
        detectionIndex,
        boundingBox: options.boundingBox ?? { x: 0.1, y: 0.1, width: 0.2, height: 0.2 },
        captureQuality: options.captureQuality ?? 0.8,
        eyeState: { leftOpen: eyesOpen, rightOpen: eyesOpen, confidence: 1 },
        expression: { confidence: 0.5, ...expression },
        pose: options.pose ?? { pitch: 0, yaw: 0, roll: 0 },
        sharpness: options.sharpness ?? 0.8,
        compositeScore: options.compositeScore ?? 0.5
    };
}

export function makeObservation(options: RecordOptions = {}, vector: number[] | null = null, confidence = 1): FaceObservation {
    const embedding: FaceEmbedding | null = vector ? { vector, confidence } : null;
    return { record: makeRecord(options), embedding };
}

export function makePersonAnalysis(personId: string, best: FaceQualityRecord, worst: FaceQualityRecord, others: FaceQualityRecord[] = []): PersonFaceQualityAnalysis {
    return {
        personId,
        allFaces: [best, worst, ...others],
        bestFace: best,
        worstFace: worst,
        improvementPotential: Math.max(0, best.compositeScore - worst.compositeScore)
    };
}
