import type { Point, Rect } from './geometry';
import { clamp } from './geometry';
import { DEFAULT_THRESHOLDS, type Thresholds } from './thresholds';

/**
 * Landmark point sets supplied by the detector or a landmark provider.
 * Every region is optional; an absent region is an expected outcome.
 */
export interface FaceLandmarks {
    leftEye?: Point[];
    rightEye?: Point[];
    outerLips?: Point[];
    innerLips?: Point[];
    faceContour?: Point[];
}

/** Head pose in degrees. */
export interface FaceAngle {
    pitch: number;
    yaw: number;
    roll: number;
}

export const NEUTRAL_ANGLE: FaceAngle = { pitch: 0, yaw: 0, roll: 0 };

/** One face as emitted by the external detector. */
export interface DetectedFace {
    boundingBox: Rect;
    landmarks?: FaceLandmarks;
    /** Detector capture quality in [0,1]. */
    captureQuality?: number;
    pose?: FaceAngle;
}

export interface EyeState {
    leftOpen: boolean;
    rightOpen: boolean;
    confidence: number;
}

export interface ExpressionQuality {
    intensity: number;
    naturalness: number;
    confidence: number;
}

/**
 * Scored face. Created once by the scorer and frozen.
 */
export interface FaceQualityRecord {
    readonly id: string;
    readonly photoId: string;
    readonly photoTimestamp: Date;
    /** Position in the detector's output for this photo. */
    readonly detectionIndex: number;
    readonly boundingBox: Readonly<Rect>;
    readonly captureQuality: number;
    readonly eyeState: Readonly<EyeState>;
    readonly expression: Readonly<ExpressionQuality>;
    readonly pose: Readonly<FaceAngle>;
    readonly sharpness: number;
    readonly compositeScore: number;
}

export type FaceIssue =
    | 'eyes_closed'
    | 'blurred_face'
    | 'poor_expression'
    | 'awkward_pose'
    | 'unflattering_angle'
    | 'none';

export const FACE_ISSUE_SEVERITY: Record<FaceIssue, number> = {
    eyes_closed: 1.0,
    blurred_face: 0.9,
    poor_expression: 0.8,
    awkward_pose: 0.7,
    unflattering_angle: 0.6,
    none: 0
};

export const FACE_ISSUE_DESCRIPTION: Record<FaceIssue, string> = {
    eyes_closed: 'Eyes closed or partially closed',
    blurred_face: 'Face is blurred or out of focus',
    poor_expression: 'Unflattering expression',
    awkward_pose: 'Awkward head position',
    unflattering_angle: 'Unflattering camera angle',
    none: 'No issues detected'
};

export function bothOpen(eyes: EyeState): boolean {
    return eyes.leftOpen && eyes.rightOpen;
}

export function expressionOverall(expression: ExpressionQuality): number {
    return expression.intensity * 0.4 + expression.naturalness * 0.6;
}

export function makeExpression(intensity: number, naturalness: number, confidence: number): ExpressionQuality {
    return {
        intensity: clamp(intensity),
        naturalness: clamp(naturalness),
        confidence: clamp(confidence)
    };
}

export function isOptimalAngle(angle: FaceAngle, thresholds: Thresholds = DEFAULT_THRESHOLDS): boolean {
    const limits = thresholds.pose.optimal;
    return Math.abs(angle.pitch) < limits.pitch
        && Math.abs(angle.yaw) < limits.yaw
        && Math.abs(angle.roll) < limits.roll;
}

export function isAlignmentCompatible(a: FaceAngle, b: FaceAngle, thresholds: Thresholds = DEFAULT_THRESHOLDS): boolean {
    const limits = thresholds.pose.alignment;
    return Math.abs(a.pitch - b.pitch) < limits.pitch
        && Math.abs(a.yaw - b.yaw) < limits.yaw
        && Math.abs(a.roll - b.roll) < limits.roll;
}

/**
 * Issues present on a face, in detection order (eyes, expression, angle,
 * sharpness, capture).
 */
export function identifiedIssues(face: FaceQualityRecord, thresholds: Thresholds = DEFAULT_THRESHOLDS): FaceIssue[] {
    const issues: FaceIssue[] = [];
    if (!bothOpen(face.eyeState)) issues.push('eyes_closed');
    if (expressionOverall(face.expression) < thresholds.issues.minExpression) issues.push('poor_expression');
    if (!isOptimalAngle(face.pose, thresholds)) issues.push('unflattering_angle');
    if (face.sharpness < thresholds.issues.minSharpness) issues.push('blurred_face');
    if (face.captureQuality < thresholds.issues.minCaptureQuality) issues.push('awkward_pose');
    return issues;
}

export function primaryIssue(face: FaceQualityRecord, thresholds: Thresholds = DEFAULT_THRESHOLDS): FaceIssue {
    let worst: FaceIssue = 'none';
    for (const issue of identifiedIssues(face, thresholds)) {
        if (FACE_ISSUE_SEVERITY[issue] > FACE_ISSUE_SEVERITY[worst]) worst = issue;
    }
    return worst;
}
