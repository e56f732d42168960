import {
    IMPROVEMENT_PRIORITY,
    improvementTypeFor,
    type ClusterFaceAnalysis,
    type ImprovementType,
    type PersonFaceQualityAnalysis,
    type PersonFaceReplacement
} from '../models/analysis';
import { bothOpen, expressionOverall, isAlignmentCompatible, isOptimalAngle, primaryIssue } from '../models/face';
import { DEFAULT_THRESHOLDS, type Thresholds } from '../models/thresholds';
import { PersonAggregationService } from './PersonAggregationService';

export interface ImprovementAssessment {
    score: number;
    fixes: ImprovementType[];
    isSignificant: boolean;
}

const MIN_SOURCE_SCORE = 0.6;
const MIN_REPLACEMENT_CONFIDENCE = 0.7;
const MIN_EXPECTED_IMPROVEMENT = 0.15;

export class ReplacementPlanningService {
    /** What swapping the worst face for the best one would fix. */
    static assess(person: PersonFaceQualityAnalysis, t: Thresholds = DEFAULT_THRESHOLDS): ImprovementAssessment {
        const best = person.bestFace;
        const worst = person.worstFace;
        const fixes: ImprovementType[] = [];
        let score = 0;

        if (!bothOpen(worst.eyeState) && bothOpen(best.eyeState)) {
            score += 0.4;
            fixes.push('eyes_closed');
        }
        if (expressionOverall(best.expression) > expressionOverall(worst.expression) + 0.25) {
            score += 0.3;
            fixes.push('poor_expression');
        }
        if (!isOptimalAngle(worst.pose, t) && isOptimalAngle(best.pose, t)) {
            score += 0.2;
            fixes.push('unflattering_angle');
        }
        if (best.sharpness > worst.sharpness + 0.3) {
            score += 0.15;
            fixes.push('blurred_face');
        }
        if (best.captureQuality > worst.captureQuality + 0.2) {
            score += 0.1;
            fixes.push('awkward_pose');
        }

        const gain = PersonAggregationService.qualityGain(person);
        return {
            score,
            fixes,
            isSignificant: PersonAggregationService.shouldReplace(person) && gain > 0.15 && score > 0.3
        };
    }

    static isFeasible(replacement: PersonFaceReplacement, t: Thresholds = DEFAULT_THRESHOLDS): boolean {
        return isAlignmentCompatible(replacement.sourceFace.pose, replacement.destinationFace.pose, t)
            && replacement.confidence > 0.5
            && replacement.sourceFace.compositeScore > replacement.destinationFace.compositeScore;
    }

    static expectedImprovement(replacement: PersonFaceReplacement): number {
        return replacement.sourceFace.compositeScore - replacement.destinationFace.compositeScore;
    }

    /**
     * Face swaps into the base photo, best first. A person is skipped when
     * their face in the base photo is already their best one, or when they do
     * not appear in it.
     */
    static plan(analysis: ClusterFaceAnalysis, t: Thresholds = DEFAULT_THRESHOLDS): PersonFaceReplacement[] {
        const basePhotoId = analysis.basePhotoCandidate?.photo.id;
        if (!basePhotoId) return [];

        const replacements: PersonFaceReplacement[] = [];
        for (const person of analysis.personAnalyses.values()) {
            const replacement = this.planPerson(person, basePhotoId, t);
            if (replacement) replacements.push(replacement);
        }
        return this.rank(replacements);
    }

    static planPerson(person: PersonFaceQualityAnalysis, basePhotoId: string, t: Thresholds = DEFAULT_THRESHOLDS): PersonFaceReplacement | null {
        if (!this.assess(person, t).isSignificant) return null;

        const source = person.bestFace;
        if (source.compositeScore <= MIN_SOURCE_SCORE) return null;

        const destination = person.allFaces.find(f => f.photoId === basePhotoId);
        if (!destination || destination.id === source.id) return null;

        const gain = source.compositeScore - destination.compositeScore;
        let confidence = source.compositeScore * 0.4 + Math.min(0.3, gain * 2);
        if (!bothOpen(destination.eyeState) && bothOpen(source.eyeState)) confidence += 0.2;
        if (isOptimalAngle(source.pose, t)) confidence += 0.1;

        const replacement: PersonFaceReplacement = {
            personId: person.personId,
            sourceFace: source,
            destinationPhotoId: basePhotoId,
            destinationFace: destination,
            improvementType: improvementTypeFor(primaryIssue(destination, t)),
            confidence: Math.min(1, confidence)
        };

        if (replacement.confidence <= MIN_REPLACEMENT_CONFIDENCE) return null;
        if (!this.isFeasible(replacement, t)) return null;
        if (this.expectedImprovement(replacement) <= MIN_EXPECTED_IMPROVEMENT) return null;
        return replacement;
    }

    /** Larger improvement first, then confidence, then issue priority. */
    static rank(replacements: readonly PersonFaceReplacement[]): PersonFaceReplacement[] {
        return [...replacements].sort((a, b) => {
            const improvementDiff = this.expectedImprovement(b) - this.expectedImprovement(a);
            if (Math.abs(improvementDiff) > 0.05) return improvementDiff;
            const confidenceDiff = b.confidence - a.confidence;
            if (Math.abs(confidenceDiff) > 0.03) return confidenceDiff;
            return IMPROVEMENT_PRIORITY[a.improvementType] - IMPROVEMENT_PRIORITY[b.improvementType];
        });
    }
}
