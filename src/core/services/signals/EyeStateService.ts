import type { EyeState, FaceLandmarks } from '../../models/face';
import { clamp } from '../../models/geometry';
import { DEFAULT_THRESHOLDS, type EyeThresholds } from '../../models/thresholds';
import { adaptiveEyeThreshold, eyeAspectRatio } from './landmarkGeometry';

/** Optimistic default: eyes we cannot see are not penalized. */
export const UNKNOWN_EYE_STATE: Readonly<EyeState> = Object.freeze({ leftOpen: true, rightOpen: true, confidence: 0 });

export interface EyeMeasurement {
    leftEAR: number;
    rightEAR: number;
    threshold: number;
    state: EyeState;
}

export class EyeStateService {
    /**
     * Open/closed state of both eyes using an adaptive EAR threshold.
     */
    static analyze(landmarks: FaceLandmarks | undefined, t: EyeThresholds = DEFAULT_THRESHOLDS.eye): EyeState {
        return this.measure(landmarks, t)?.state ?? { ...UNKNOWN_EYE_STATE };
    }

    /** Raw ratios behind `analyze`; null when either eye region is missing. */
    static measure(landmarks: FaceLandmarks | undefined, t: EyeThresholds = DEFAULT_THRESHOLDS.eye): EyeMeasurement | null {
        const leftEye = landmarks?.leftEye;
        const rightEye = landmarks?.rightEye;
        if (!leftEye || !rightEye) return null;

        const leftEAR = eyeAspectRatio(leftEye, t);
        const rightEAR = eyeAspectRatio(rightEye, t);
        const avgEAR = (leftEAR + rightEAR) / 2;
        const threshold = adaptiveEyeThreshold(avgEAR, t);

        return {
            leftEAR,
            rightEAR,
            threshold,
            state: {
                leftOpen: leftEAR > threshold,
                rightOpen: rightEAR > threshold,
                confidence: clamp(Math.min(1, avgEAR / threshold))
            }
        };
    }
}
