import {
    ELIGIBILITY_MESSAGES,
    improvementTypeFor,
    type ClusterFaceAnalysis,
    type EligibilityReason,
    type EligibilityResult,
    type PersonImprovement
} from '../models/analysis';
import { primaryIssue } from '../models/face';
import { DEFAULT_THRESHOLDS, type Thresholds } from '../models/thresholds';

export class EligibilityService {
    /**
     * Whether a cluster is worth a composite. Outcomes are values, never
     * exceptions.
     */
    static evaluate(photoCount: number, analysis: ClusterFaceAnalysis | null, t: Thresholds = DEFAULT_THRESHOLDS): EligibilityResult {
        if (photoCount < t.eligibility.minPhotos) {
            return this.notEligible('insufficient_photos', 1.0);
        }
        if (!analysis || analysis.personAnalyses.size === 0) {
            return this.notEligible('no_face_variations', 0.9);
        }
        if (analysis.overallImprovementPotential <= t.eligibility.minOverallPotential) {
            return this.notEligible('no_face_variations', 0.8);
        }

        const improvements: PersonImprovement[] = [...analysis.personAnalyses.values()].map(person => ({
            personId: person.personId,
            sourcePhotoId: person.bestFace.photoId,
            improvementType: improvementTypeFor(primaryIssue(person.worstFace, t)),
            confidence: person.improvementPotential
        }));

        return {
            isEligible: true,
            reason: 'eligible',
            confidence: analysis.overallImprovementPotential,
            improvements
        };
    }

    static notEligible(reason: Exclude<EligibilityReason, 'eligible'>, confidence: number): EligibilityResult {
        return { isEligible: false, reason, confidence, improvements: [] };
    }

    static message(result: EligibilityResult): string {
        return ELIGIBILITY_MESSAGES[result.reason];
    }
}
