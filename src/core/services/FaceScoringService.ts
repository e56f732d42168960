import type { DetectedFace, EyeState, ExpressionQuality, FaceAngle, FaceQualityRecord } from '../models/face';
import { bothOpen, expressionOverall, isOptimalAngle, NEUTRAL_ANGLE } from '../models/face';
import { clamp } from '../models/geometry';
import type { Photo } from '../models/photo';
import { DEFAULT_THRESHOLDS, type Thresholds } from '../models/thresholds';
import { EyeStateService } from './signals/EyeStateService';
import { ExpressionService } from './signals/ExpressionService';

export interface CompositeInputs {
    captureQuality: number;
    eyeState: EyeState;
    expression: ExpressionQuality;
    sharpness: number;
    pose: FaceAngle;
}

export interface ScoreRequest {
    photo: Photo;
    detectionIndex: number;
    face: DetectedFace;
    sharpness: number;
}

export class FaceScoringService {
    /**
     * Weighted blend of capture quality, eyes, expression, sharpness and pose,
     * clamped to [0,1].
     */
    static compositeScore(inputs: CompositeInputs, t: Thresholds = DEFAULT_THRESHOLDS): number {
        const w = t.scoring.weights;
        const eyeScore = bothOpen(inputs.eyeState) ? 1 : 0;
        const poseScore = isOptimalAngle(inputs.pose, t) ? 1 : t.scoring.suboptimalPoseScore;

        return clamp(
            w.capture * inputs.captureQuality +
            w.eyes * eyeScore +
            w.expression * expressionOverall(inputs.expression) +
            w.sharpness * inputs.sharpness +
            w.pose * poseScore
        );
    }

    static score(request: ScoreRequest, t: Thresholds = DEFAULT_THRESHOLDS): FaceQualityRecord {
        const { photo, detectionIndex, face } = request;
        const captureQuality = clamp(face.captureQuality ?? t.scoring.defaultCaptureQuality);
        const eyeState = EyeStateService.analyze(face.landmarks, t.eye);
        const expression = ExpressionService.analyze(face.landmarks);
        const pose = face.pose ?? NEUTRAL_ANGLE;
        const sharpness = clamp(request.sharpness);

        const compositeScore = this.compositeScore({ captureQuality, eyeState, expression, sharpness, pose }, t);

        return Object.freeze({
            id: `${photo.id}#${detectionIndex}`,
            photoId: photo.id,
            photoTimestamp: photo.timestamp,
            detectionIndex,
            boundingBox: Object.freeze({ ...face.boundingBox }),
            captureQuality,
            eyeState: Object.freeze({ ...eyeState }),
            expression: Object.freeze({ ...expression }),
            pose: Object.freeze({ ...pose }),
            sharpness,
            compositeScore
        });
    }

    /** Highest composite first; ties keep detector order. */
    static rank(records: readonly FaceQualityRecord[]): FaceQualityRecord[] {
        return [...records].sort((a, b) => b.compositeScore - a.compositeScore || a.detectionIndex - b.detectionIndex);
    }
}
