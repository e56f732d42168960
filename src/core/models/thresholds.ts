/**
 * Every numeric cutoff the engine uses, in one place.
 *
 * Services take a `Thresholds` argument defaulting to `DEFAULT_THRESHOLDS`;
 * `ConfigService` merges user overrides over these values.
 */

export interface EyeThresholds {
    /** Minimum landmark points per eye before EAR is computed. */
    minLandmarkPoints: number;
    /** Horizontal spans at or below this return the neutral ratio. */
    minHorizontalSpan: number;
    neutralRatio: number;
    /** Adaptive bands, checked in order: avgEAR > above → threshold. */
    bands: { above: number; threshold: number }[];
    /** Threshold used when no band matches. */
    floorThreshold: number;
}

export interface ScoringWeights {
    capture: number;
    eyes: number;
    expression: number;
    sharpness: number;
    pose: number;
}

export interface ScoringThresholds {
    weights: ScoringWeights;
    /** Pose contribution when the pose is outside the optimal envelope. */
    suboptimalPoseScore: number;
    defaultCaptureQuality: number;
}

export interface SharpnessThresholds {
    base: number;
    /** Checked in order: face area > above → bonus. */
    areaBonuses: { above: number; bonus: number }[];
    edgeWeight: number;
}

export interface AngleLimits {
    pitch: number;
    yaw: number;
    roll: number;
}

export interface PoseThresholds {
    optimal: AngleLimits;
    alignment: AngleLimits;
}

export interface IssueThresholds {
    minExpression: number;
    minSharpness: number;
    minCaptureQuality: number;
}

export interface MatchingThresholds {
    minimumSimilarity: number;
    strongSimilarity: number;
    strongConfidence: number;
    mediumSimilarity: number;
    requiredSecondaryChecks: number;
    positionDistance: number;
    temporalWindowMs: number;
    sizeRatioMin: number;
    sizeRatioMax: number;
    fallbackCenterDistance: number;
    fallbackWidthDifference: number;
    smileDifference: number;
    /** Angle normalizers in degrees. */
    poseNormalizers: AngleLimits;
}

export interface AggregationThresholds {
    minFacesPerPerson: number;
    minImprovementPotential: number;
    /** Persons above this potential count as improvable. */
    improvableThreshold: number;
}

export interface EligibilityThresholds {
    minPhotos: number;
    minOverallPotential: number;
}

export interface Thresholds {
    eye: EyeThresholds;
    scoring: ScoringThresholds;
    sharpness: SharpnessThresholds;
    pose: PoseThresholds;
    issues: IssueThresholds;
    matching: MatchingThresholds;
    aggregation: AggregationThresholds;
    eligibility: EligibilityThresholds;
}

export const DEFAULT_THRESHOLDS: Thresholds = {
    eye: {
        minLandmarkPoints: 6,
        minHorizontalSpan: 0.001,
        neutralRatio: 0.5,
        bands: [
            { above: 0.30, threshold: 0.21 },
            { above: 0.20, threshold: 0.18 },
            { above: 0.12, threshold: 0.15 }
        ],
        floorThreshold: 0.12
    },
    scoring: {
        weights: { capture: 0.30, eyes: 0.25, expression: 0.20, sharpness: 0.15, pose: 0.10 },
        suboptimalPoseScore: 0.5,
        defaultCaptureQuality: 0.5
    },
    sharpness: {
        base: 0.3,
        areaBonuses: [
            { above: 0.1, bonus: 0.4 },
            { above: 0.05, bonus: 0.2 },
            { above: 0.02, bonus: 0.1 }
        ],
        edgeWeight: 0.2
    },
    pose: {
        optimal: { pitch: 15, yaw: 20, roll: 10 },
        alignment: { pitch: 25, yaw: 30, roll: 20 }
    },
    issues: {
        minExpression: 0.5,
        minSharpness: 0.6,
        minCaptureQuality: 0.5
    },
    matching: {
        minimumSimilarity: 0.2,
        strongSimilarity: 0.6,
        strongConfidence: 0.5,
        mediumSimilarity: 0.4,
        requiredSecondaryChecks: 2,
        positionDistance: 0.4,
        temporalWindowMs: 5 * 60 * 1000,
        sizeRatioMin: 0.5,
        sizeRatioMax: 2.0,
        fallbackCenterDistance: 0.3,
        fallbackWidthDifference: 0.5,
        smileDifference: 0.3,
        poseNormalizers: { pitch: 90, yaw: 90, roll: 180 }
    },
    aggregation: {
        minFacesPerPerson: 2,
        minImprovementPotential: 0.2,
        improvableThreshold: 0.3
    },
    eligibility: {
        minPhotos: 2,
        minOverallPotential: 0.3
    }
};
