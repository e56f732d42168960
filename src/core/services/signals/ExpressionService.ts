import type { ExpressionQuality, FaceLandmarks } from '../../models/face';
import { makeExpression } from '../../models/face';
import { clamp, mean, type Point } from '../../models/geometry';
import { balance, boundsOf, landmarkSpread, turningAngle } from './landmarkGeometry';

export interface LipAnalysis {
    curvature: number;
    symmetry: number;
    width: number;
    openness: number;
    quality: number;
}

export interface CheekAnalysis {
    elevation: number;
    definition: number;
    quality: number;
}

export interface EyeCreaseAnalysis {
    creasing: number;
    symmetry: number;
    quality: number;
}

export interface RegionalAnalysis {
    lip: LipAnalysis;
    cheek: CheekAnalysis;
    eye: EyeCreaseAnalysis;
}

export const NEUTRAL_EXPRESSION: Readonly<ExpressionQuality> = Object.freeze({ intensity: 0.5, naturalness: 0.5, confidence: 0 });

const MIN_LIP_POINTS = 12;
const DETAILED_LIP_POINTS = 16;
const MIN_CONTOUR_POINTS = 10;
const DETAILED_CONTOUR_POINTS = 15;
const MIN_EYE_POINTS = 6;

// Outer-lip indices: corners, top and bottom centre.
const LEFT_CORNER = 0;
const RIGHT_CORNER = 6;
const TOP_CENTER = 3;
const BOTTOM_CENTER = 9;

const POSED_PENALTY = 0.8;
const COORDINATED_BONUS = 1.1;

export class ExpressionService {

    /**
     * Smile quality fused from lip, cheek and eye-crease signals.
     */
    static analyze(landmarks: FaceLandmarks | undefined): ExpressionQuality {
        if (!landmarks) return { ...NEUTRAL_EXPRESSION };
        return this.combine(this.analyzeRegions(landmarks));
    }

    static analyzeRegions(landmarks: FaceLandmarks): RegionalAnalysis {
        return {
            lip: this.analyzeLips(landmarks.outerLips, landmarks.innerLips),
            cheek: this.analyzeCheeks(landmarks.faceContour),
            eye: this.analyzeEyeCreasing(landmarks.leftEye, landmarks.rightEye)
        };
    }

    static combine({ lip, cheek, eye }: RegionalAnalysis): ExpressionQuality {
        const avgQuality = (lip.quality + cheek.quality + eye.quality) / 3;

        const weighted = lip.curvature * 0.6 + eye.creasing * 0.25 + cheek.elevation * 0.15;
        const intensity = weighted * (0.5 + avgQuality * 0.5);

        let naturalness = eye.creasing * 0.4 + lip.symmetry * 0.3 + cheek.definition * 0.3;
        // Strong mouth activity with a still eye region reads as posed
        if (lip.curvature > 0.8 && eye.creasing < 0.1) {
            naturalness *= POSED_PENALTY;
        }
        if (lip.curvature > 0) {
            const ratio = eye.creasing / lip.curvature;
            if (ratio >= 0.2 && ratio <= 3.0) naturalness *= COORDINATED_BONUS;
        }

        const consistency = this.intensityConsistency([lip.curvature, cheek.elevation, eye.creasing]);
        const avgSymmetry = (lip.symmetry + eye.symmetry) / 2;
        const confidence = avgQuality * 0.4 + consistency * 0.3 + avgSymmetry * 0.3;

        return makeExpression(intensity, naturalness, confidence);
    }

    /** 1 when the regions agree, lower as they spread apart. */
    static intensityConsistency(intensities: number[]): number {
        const avg = mean(intensities);
        const deviation = mean(intensities.map(v => Math.abs(v - avg)));
        return Math.max(0, 1 - deviation * 2);
    }

    // ==========================================
    // Lips
    // ==========================================

    static analyzeLips(outer: Point[] | undefined, inner: Point[] | undefined): LipAnalysis {
        if (!outer) return { curvature: 0.5, symmetry: 0.5, width: 0.5, openness: 0.5, quality: 0 };
        if (outer.length < MIN_LIP_POINTS) return { curvature: 0.5, symmetry: 0.5, width: 0.5, openness: 0.5, quality: 0.3 };

        return {
            curvature: this.lipCurvature(outer),
            symmetry: this.lipSymmetry(outer),
            width: Math.min(1, Math.abs(outer[RIGHT_CORNER].x - outer[LEFT_CORNER].x) * 15),
            openness: this.lipOpenness(outer, inner),
            quality: this.lipQuality(outer)
        };
    }

    /** Corner elevation above the mouth centre, with side measures on detailed contours. */
    static lipCurvature(points: Point[]): number {
        const left = points[LEFT_CORNER];
        const right = points[RIGHT_CORNER];
        const mouthCenterY = (points[TOP_CENTER].y + points[BOTTOM_CENTER].y) / 2;
        const avgCornerY = (left.y + right.y) / 2;

        const measurements = [Math.max(0, (mouthCenterY - avgCornerY) * 40)];
        if (points.length >= DETAILED_LIP_POINTS) {
            measurements.push(Math.max(0, (points[1].y - left.y) * 30));
            measurements.push(Math.max(0, (points[5].y - right.y) * 30));
        }
        return Math.min(1, mean(measurements));
    }

    static lipSymmetry(points: Point[]): number {
        const center = points[TOP_CENTER];
        const primary = balance(
            Math.abs(points[LEFT_CORNER].x - center.x),
            Math.abs(points[RIGHT_CORNER].x - center.x)
        );
        if (primary === null) return 0.5;

        const measurements = [primary];
        if (points.length >= DETAILED_LIP_POINTS) {
            const upper = balance(Math.abs(points[1].x - center.x), Math.abs(points[5].x - center.x));
            if (upper !== null) measurements.push(upper);
            const lowerCenter = points[BOTTOM_CENTER];
            const lower = balance(Math.abs(points[11].x - lowerCenter.x), Math.abs(points[7].x - lowerCenter.x));
            if (lower !== null) measurements.push(lower);
        }
        return clamp(mean(measurements));
    }

    static lipOpenness(outer: Point[], inner: Point[] | undefined): number {
        const outerGap = Math.abs(outer[TOP_CENTER].y - outer[BOTTOM_CENTER].y);
        let gap = outerGap;
        if (inner && inner.length >= 6) {
            gap = (outerGap + Math.abs(inner[1].y - inner[4].y)) / 2;
        }
        return Math.min(1, gap * 30);
    }

    static lipQuality(points: Point[]): number {
        const width = Math.abs(points[RIGHT_CORNER].x - points[LEFT_CORNER].x);
        const height = Math.abs(points[TOP_CENTER].y - points[BOTTOM_CENTER].y);
        const aspect = width > 0 ? height / width : Infinity;
        const proportion = aspect > 0.05 && aspect < 0.5 ? 1 : 0.6;
        return proportion * Math.min(1, landmarkSpread(points) * 20);
    }

    // ==========================================
    // Cheeks
    // ==========================================

    static analyzeCheeks(contour: Point[] | undefined): CheekAnalysis {
        if (!contour) return { elevation: 0.5, definition: 0.5, quality: 0 };
        if (contour.length < MIN_CONTOUR_POINTS) return { elevation: 0.5, definition: 0.5, quality: 0.3 };

        return {
            elevation: this.cheekElevation(contour),
            definition: this.cheekDefinition(contour),
            quality: this.cheekQuality(contour)
        };
    }

    /** Cheek height above the jaw point. */
    static cheekElevation(contour: Point[]): number {
        const n = contour.length;
        const leftCheek = contour[Math.floor(n * 0.3)];
        const rightCheek = contour[Math.floor(n * 0.7)];
        const jaw = contour[Math.floor(n * 0.5)];
        const avgCheekY = (leftCheek.y + rightCheek.y) / 2;
        return clamp((jaw.y - avgCheekY) * 5);
    }

    static cheekDefinition(contour: Point[]): number {
        if (contour.length < DETAILED_CONTOUR_POINTS) return 0.5;
        const angles: number[] = [];
        for (let i = 0; i < contour.length - 2; i += 2) {
            angles.push(turningAngle(contour[i], contour[i + 1], contour[i + 2]));
        }
        return Math.min(1, mean(angles) * 2);
    }

    static cheekQuality(contour: Point[]): number {
        const { width, height } = boundsOf(contour);
        const aspect = width > 0 ? height / width : Infinity;
        const proportion = aspect > 0.8 && aspect < 2.0 ? 1 : 0.6;
        return proportion * Math.min(1, landmarkSpread(contour) * 5);
    }

    // ==========================================
    // Eye creasing
    // ==========================================

    static analyzeEyeCreasing(leftEye: Point[] | undefined, rightEye: Point[] | undefined): EyeCreaseAnalysis {
        if (!leftEye || !rightEye) return { creasing: 0.5, symmetry: 0.5, quality: 0 };

        const left = this.eyeCreasing(leftEye);
        const right = this.eyeCreasing(rightEye);
        return {
            creasing: (left + right) / 2,
            symmetry: 1 - Math.abs(left - right),
            quality: Math.min(this.eyeQuality(leftEye), this.eyeQuality(rightEye))
        };
    }

    /** Vertical compression of the eye; a squint scores high. */
    static eyeCreasing(points: Point[]): number {
        if (points.length < MIN_EYE_POINTS) return 0.5;
        return clamp(1 - Math.abs(points[2].y - points[4].y) * 20);
    }

    static eyeQuality(points: Point[]): number {
        if (points.length < MIN_EYE_POINTS) return 0;
        const width = Math.abs(points[3].x - points[0].x);
        const height = Math.abs(points[1].y - points[5].y);
        const aspect = width > 0 ? height / width : Infinity;
        const proportion = aspect > 0.1 && aspect < 0.8 ? 1 : 0.6;
        return proportion * Math.min(1, landmarkSpread(points) * 15);
    }
}
